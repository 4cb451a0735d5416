// ──────────────────────────────────────────────
// Weft - Component Types
// ──────────────────────────────────────────────

import type { ChatMessage, GenerationConfig } from "./llm.js";
import type { DocAggregate, SanitizedChunk } from "./retrieval.js";

export interface CitationReference {
  chunks: SanitizedChunk[];
  docAggs: DocAggregate[];
}

export type Reference = CitationReference | [];

export interface ResultRow {
  content: string;
  reference?: Reference;
  // JSON-serialized chunk payload produced by retrieval stages
  chunks?: string;
  emptyResponse?: string;
}

export type StreamEvent =
  | { type: "partial"; content: string }
  | { type: "final"; content: string; reference: Reference };

export type StreamState = "pending" | "streaming" | "drained" | "cancelled";

export type PromptInputElement =
  | { kind: "literal"; key: "user"; name: string }
  | { kind: "node"; key: string; name: string }
  | { kind: "begin-param"; key: string; entryNodeId: string; paramKey: string; name: string };

export interface ComponentInfo {
  prompt: string;
  messages: ChatMessage[];
  config: GenerationConfig;
}

export interface ComponentLogger {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  debug: (message: string, data?: Record<string, unknown>) => void;
}

export interface BeginQueryParam {
  key: string;
  name: string;
  value?: string;
  type?: string;
  optional?: boolean;
}

export type ComponentType =
  | "Begin"
  | "Answer"
  | "Generate"
  | "Retrieval"
  | "Relevant"
  | "RewriteQuestion"
  | "ExeSQL"
  | "Message";

export const USER_INPUT_ELEMENT_NAME = "Input your question here:";
export const DEFAULT_EMPTY_RESPONSE = "Nothing found in knowledgebase (mock response).";
export const DEFAULT_USER_TURN = "Output: ";
export const DEFAULT_HISTORY_WINDOW_SIZE = 22;
export const CREDENTIAL_HINT =
  " Please set a valid LLM API key for the configured model provider.";
