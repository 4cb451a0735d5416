// ──────────────────────────────────────────────
// Weft - LLM Types
// ──────────────────────────────────────────────

import type { ChatRole } from "./workflow.js";
import type { RetrievalSource } from "./retrieval.js";

export type MessageRole = ChatRole | "system";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface GenerationConfig {
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  presencePenalty?: number;
  frequencyPenalty?: number;
}

export type LengthUnit = "chars" | "tokens";

export interface GenerationBackend {
  readonly model: string;
  // Context budget in `lengthUnit`
  readonly maxLength: number;
  readonly lengthUnit: LengthUnit;
  chat(systemPrompt: string, messages: ChatMessage[], config: GenerationConfig): Promise<string>;
  chatStreaming(
    systemPrompt: string,
    messages: ChatMessage[],
    config: GenerationConfig
  ): AsyncIterable<string>;
}

export interface EmbeddingBackend {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface CitationResult {
  answer: string;
  indices: number[];
}

export interface CitationBackend {
  insertCitations(
    answer: string,
    chunkContents: string[],
    chunkVectors: number[][],
    embeddingModel: string,
    keywordWeight: number,
    vectorWeight: number
  ): Promise<CitationResult>;
}

// Backends injected into every component through the execution engine
export interface ComponentServices {
  getChatBackend(llmId: string): GenerationBackend;
  citation: CitationBackend;
  graphSource?: RetrievalSource;
  createWebSearch?(apiKey: string): RetrievalSource;
  // Used when a retrieval stage sets no key of its own
  webSearchApiKey?: string;
  maxRenderedChars?: number;
}

export type LLMProviderType = "gemini" | "groq";

export const LLM_PROVIDERS: LLMProviderType[] = ["gemini", "groq"];

export interface LLMRequestOptions {
  timeoutMs?: number;
  maxLength?: number;
}

export const DEFAULT_LLM_OPTIONS: Required<LLMRequestOptions> = {
  timeoutMs: 30000,
  maxLength: 8192,
};

export const PROVIDER_MODELS: Record<LLMProviderType, string> = {
  gemini: "gemini-2.0-flash",
  groq: "llama-3.3-70b-versatile",
};
