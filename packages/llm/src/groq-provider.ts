// ──────────────────────────────────────────────
// Weft - Groq Provider Implementation
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

const GROQ_API_BASE = "https://api.groq.com/openai/v1/chat/completions";

const logger = createLogger("llm", { provider: "groq" });

// Groq (OpenAI-compatible) response shapes
const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).partial().optional() }))
    .optional(),
});

const chunkSchema = z.object({
  choices: z
    .array(z.object({ delta: z.object({ content: z.string().nullish() }).partial().optional() }))
    .optional(),
});

export class GroqProvider implements GenerationBackend {
  readonly provider: LLMProviderType = "groq";
  readonly lengthUnit: LengthUnit = "tokens";
  readonly model: string;
  readonly maxLength: number;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(apiKey: string, model?: string, options: LLMRequestOptions = {}) {
    const merged = { ...DEFAULT_LLM_OPTIONS, ...options };
    this.apiKey = apiKey;
    this.model = model ?? PROVIDER_MODELS.groq;
    this.maxLength = merged.maxLength;
    this.timeoutMs = merged.timeoutMs;
  }

  async chat(systemPrompt: string, messages: ChatMessage[], config: GenerationConfig): Promise<string> {
    const timer = startTimer();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.post(this.buildBody(systemPrompt, messages, config, false), controller.signal);
      const parsed = completionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new BackendFailureError("groq", "Unexpected response shape");
      }

      const content = parsed.data.choices?.[0]?.message?.content ?? "";
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
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.post(this.buildBody(systemPrompt, messages, config, true), controller.signal);
      if (!response.body) {
        throw new BackendFailureError("groq", "Streaming response has no body");
      }
      // The timeout only guards the connection; the body may take longer
      clearTimeout(timeout);

      for await (const data of readEventData(response.body)) {
        if (data === "[DONE]") break;
        const parsed = chunkSchema.safeParse(JSON.parse(data));
        const delta = parsed.success ? parsed.data.choices?.[0]?.delta?.content : undefined;
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
    config: GenerationConfig,
    stream: boolean
  ): Record<string, unknown> {
    return {
      model: this.model,
      messages: [{ role: "system", content: systemPrompt }, ...messages],
      max_tokens: config.maxTokens,
      temperature: config.temperature,
      top_p: config.topP,
      presence_penalty: config.presencePenalty,
      frequency_penalty: config.frequencyPenalty,
      stream,
    };
  }

  private async post(body: Record<string, unknown>, signal: AbortSignal): Promise<Response> {
    const response = await fetch(GROQ_API_BASE, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      signal,
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorBody = await response.text().catch(() => "Unknown error");
      throw new BackendFailureError("groq", `Request failed with status ${response.status}: ${errorBody}`);
    }
    return response;
  }

  private wrapError(error: unknown): BackendFailureError {
    if (error instanceof BackendFailureError) return error;
    if (error instanceof DOMException && error.name === "AbortError") {
      return new BackendFailureError("groq", `Request timed out after ${this.timeoutMs}ms`, { cause: error });
    }
    return new BackendFailureError("groq", sanitizeErrorMessage(error), { cause: error });
  }
}
