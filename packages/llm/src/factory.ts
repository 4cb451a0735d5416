// ──────────────────────────────────────────────
// Weft - LLM Provider Factory
// ──────────────────────────────────────────────

import type { GenerationBackend, LLMProviderType, LLMRequestOptions } from "@weft/types";
import { ConfigurationError } from "@weft/utils";
import { GeminiProvider } from "./gemini-provider.js";
import { GroqProvider } from "./groq-provider.js";

export function createGenerationBackend(
  provider: LLMProviderType,
  apiKey: string,
  model?: string,
  options?: LLMRequestOptions
): GenerationBackend {
  switch (provider) {
    case "gemini":
      return new GeminiProvider(apiKey, model, options);
    case "groq":
      return new GroqProvider(apiKey, model, options);
    default:
      throw new ConfigurationError(`Unsupported LLM provider: ${String(provider)}`);
  }
}
