// ──────────────────────────────────────────────
// Weft - Gemini Provider Implementation
// ──────────────────────────────────────────────

import { z } from "zod";
import type {
  ChatMessage,
  GenerationBackend,
  GenerationConfig,
  LengthUnit,
  LLMProviderType,
  LLMRequestOptions,
} from "@weft/types";
import { DEFAULT_LLM_OPTIONS, PROVIDER_MODELS } from "@weft/types";
import { BackendFailureError, createLogger, measureDuration, sanitizeErrorMessage, startTimer } from "@weft/utils";
import { readEventData } from "./sse.js";

const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta/models";

// Map deprecated model names to their current replacements
const DEPRECATED_MODEL_MAP: Record<string, string> = {
  "gemini-pro": "gemini-2.0-flash",
  "gemini-pro-vision": "gemini-2.0-flash",
  "gemini-ultra": "gemini-2.0-flash",
};

const logger = createLogger("llm", { provider: "gemini" });

// Gemini API response shape (minimal); streaming events carry the same shape
const responseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      })
    )
    .optional(),
});

type GeminiResponse = z.infer<typeof responseSchema>;

function extractText(data: GeminiResponse): string {
  const parts = data.candidates?.[0]?.content?.parts ?? [];
  return parts.map((part) => part.text ?? "").join("");
}

export class GeminiProvider implements GenerationBackend {
  readonly provider: LLMProviderType = "gemini";
  readonly lengthUnit: LengthUnit = "tokens";
  readonly model: string;
  readonly maxLength: number;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(apiKey: string, model?: string, options: LLMRequestOptions = {}) {
    const merged = { ...DEFAULT_LLM_OPTIONS, ...options };
    this.apiKey = apiKey;
    const requested = (model && model.trim()) || PROVIDER_MODELS.gemini;
    this.model = DEPRECATED_MODEL_MAP[requested] ?? requested;
    this.maxLength = merged.maxLength;
    this.timeoutMs = merged.timeoutMs;
  }

  async chat(systemPrompt: string, messages: ChatMessage[], config: GenerationConfig): Promise<string> {
    const timer = startTimer();
    const url = `${GEMINI_API_BASE}/${this.model}:generateContent?key=${this.apiKey}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.post(url, this.buildBody(systemPrompt, messages, config), controller.signal);
      const parsed = responseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new BackendFailureError("gemini", "Unexpected response shape");
      }

      const content = extractText(parsed.data);
      logger.debug({ model: this.model, durationMs: measureDuration(timer) }, "Chat completion finished");
      return content;
    } catch (error) {
      throw this.wrapError(error);
    } finally {
      clearTimeout(timeout);
    }
  }

  async *chatStreaming(
    systemPrompt: string,
    messages: ChatMessage[],
    config: GenerationConfig
  ): AsyncGenerator<string> {
    const url = `${GEMINI_API_BASE}/${this.model}:streamGenerateContent?alt=sse&key=${this.apiKey}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.post(url, this.buildBody(systemPrompt, messages, config), controller.signal);
      if (!response.body) {
        throw new BackendFailureError("gemini", "Streaming response has no body");
      }
      clearTimeout(timeout);

      for await (const data of readEventData(response.body)) {
        const parsed = responseSchema.safeParse(JSON.parse(data));
        const delta = parsed.success ? extractText(parsed.data) : "";
        if (delta) yield delta;
      }
    } catch (error) {
      throw this.wrapError(error);
    } finally {
      clearTimeout(timeout);
      controller.abort();
    }
  }

  private buildBody(
    systemPrompt: string,
    messages: ChatMessage[],
    config: GenerationConfig
  ): Record<string, unknown> {
    return {
      contents: messages
        .filter((message) => message.role !== "system")
        .map((message) => ({
          role: message.role === "assistant" ? "model" : "user",
          parts: [{ text: message.content }],
        })),
      systemInstruction: systemPrompt ? { parts: [{ text: systemPrompt }] } : undefined,
      generationConfig: {
        maxOutputTokens: config.maxTokens,
        temperature: config.temperature,
        topP: config.topP,
        presencePenalty: config.presencePenalty,
        frequencyPenalty: config.frequencyPenalty,
      },
    };
  }

  private async post(url: string, body: Record<string, unknown>, signal: AbortSignal): Promise<Response> {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      signal,
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorBody = await response.text().catch(() => "Unknown error");
      throw new BackendFailureError("gemini", `Request failed with status ${response.status}: ${errorBody}`);
    }
    return response;
  }

  private wrapError(error: unknown): BackendFailureError {
    if (error instanceof BackendFailureError) return error;
    if (error instanceof DOMException && error.name === "AbortError") {
      return new BackendFailureError("gemini", `Request timed out after ${this.timeoutMs}ms`, { cause: error });
    }
    return new BackendFailureError("gemini", sanitizeErrorMessage(error), { cause: error });
  }
}
