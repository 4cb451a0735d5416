// ──────────────────────────────────────────────
// Weft - Default services
// Builds the backend bundle stages receive from the engine
// ──────────────────────────────────────────────

import type { ComponentServices, GenerationBackend, LLMProviderType } from "@weft/types";
import { LLM_PROVIDERS } from "@weft/types";
import { DeterministicEmbedder, HybridCitationInserter, TavilySearch, createGenerationBackend } from "@weft/llm";
import type { AppConfig } from "@weft/utils";
import { KnowledgeGraphSummarySource } from "./retrieval/graph-source.js";

export interface ServiceOverrides {
  // Entity name -> fact, summarized by the knowledge graph source
  graphEntities?: Record<string, string>;
}

export interface LlmSelection {
  provider: LLMProviderType;
  model: string | undefined;
}

// "model@provider" picks both; a bare id is a model for the configured provider
export function parseLlmId(llmId: string, fallback: LlmSelection): LlmSelection {
  const at = llmId.lastIndexOf("@");
  if (at > 0) {
    const suffix = llmId.slice(at + 1).toLowerCase();
    const provider = LLM_PROVIDERS.find((candidate) => candidate === suffix);
    if (provider) {
      return { provider, model: llmId.slice(0, at) };
    }
  }
  return { provider: fallback.provider, model: llmId || fallback.model };
}

export function embeddingDimensions(model: string): number {
  const match = /deterministic-(\d+)/.exec(model);
  const parsed = match ? Number(match[1]) : NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 64;
}

export function createDefaultServices(config: AppConfig, overrides: ServiceOverrides = {}): ComponentServices {
  const backends = new Map<string, GenerationBackend>();
  const embedder = new DeterministicEmbedder(embeddingDimensions(config.embedding.model));

  return {
    getChatBackend(llmId: string): GenerationBackend {
      const cached = backends.get(llmId);
      if (cached) return cached;

      const { provider, model } = parseLlmId(llmId, {
        provider: config.llm.provider,
        model: config.llm.model,
      });
      const backend = createGenerationBackend(provider, config.llm.apiKey, model, {
        maxLength: config.llm.maxLength,
        timeoutMs: config.llm.timeoutMs,
      });
      backends.set(llmId, backend);
      return backend;
    },
    citation: new HybridCitationInserter(embedder),
    graphSource: new KnowledgeGraphSummarySource(overrides.graphEntities),
    createWebSearch: (apiKey) => new TavilySearch(apiKey),
    webSearchApiKey: config.retrieval.tavilyApiKey || undefined,
    maxRenderedChars: config.retrieval.maxRenderedChars,
  };
}
