// ──────────────────────────────────────────────
// Weft - Retrieval component
// Fans in the graph and web sources and renders a knowledge prompt
// ──────────────────────────────────────────────

import { z } from "zod";
import type { ComponentType } from "@weft/types";
import { DEFAULT_MAX_RENDERED_CHARS } from "@weft/types";
import { renderKnowledgePrompt } from "../prompt/knowledge-prompt.js";
import { extractRetrievalQuery, fanIn, type FanInEntry } from "../retrieval/fan-in.js";
import { sanitizeChunk, toPayloadChunk } from "../retrieval/sanitize.js";
import { baseParamsSchema, ComponentBase, rowsResult, type StageResult } from "./base.js";
import { checkDecimalFloat, checkPositiveNumber } from "./param-checks.js";

export const retrievalParamsSchema = baseParamsSchema.extend({
  similarityThreshold: z.number().default(0.2),
  keywordsSimilarityWeight: z.number().default(0.5),
  topN: z.number().default(8),
  topK: z.number().default(1024),
  kbIds: z.array(z.string()).default([]),
  emptyResponse: z.string().default(""),
  tavilyApiKey: z.string().default(""),
  useKg: z.boolean().default(false),
});

export type RetrievalParams = z.infer<typeof retrievalParamsSchema>;

export class RetrievalComponent extends ComponentBase<RetrievalParams> {
  readonly componentName: ComponentType = "Retrieval";

  override check(): void {
    super.check();
    checkDecimalFloat(this.params.similarityThreshold, "[Retrieval] Similarity threshold");
    checkDecimalFloat(this.params.keywordsSimilarityWeight, "[Retrieval] Keyword similarity weight");
    checkPositiveNumber(this.params.topN, "[Retrieval] Top N");
  }

  query(): string {
    return extractRetrievalQuery(this.getInput()[0]?.content ?? "");
  }

  protected async invoke(): Promise<StageResult> {
    const query = this.query();
    const { services } = this.runtime;

    if (this.params.kbIds.length > 0) {
      this.logger.warn("Knowledge base ids are set but no knowledge base backend is configured", {
        kbIds: this.params.kbIds,
      });
    }

    const entries: FanInEntry[] = [];
    if (this.params.useKg) {
      if (services.graphSource) {
        entries.push({ source: services.graphSource, maxResults: 1, summaryOnly: true });
      } else {
        this.logger.warn("Knowledge graph retrieval requested but no graph source is configured");
      }
    }

    const webKey = this.params.tavilyApiKey || services.webSearchApiKey || "";
    if (webKey) {
      const webSearch = services.createWebSearch?.(webKey);
      if (webSearch) {
        entries.push({ source: webSearch, maxResults: this.params.topN });
      } else {
        this.logger.warn("Web search key is set but no web search backend is configured");
      }
    }

    const merged = await fanIn(query, entries, this.logger);
    this.logger.info("Retrieval finished", { query, chunks: merged.chunks.length });

    if (merged.chunks.length === 0) {
      const emptyResponse = this.params.emptyResponse.trim() ? this.params.emptyResponse : "";
      return rowsResult([{ content: emptyResponse, emptyResponse }]);
    }

    const maxChars = services.maxRenderedChars ?? DEFAULT_MAX_RENDERED_CHARS;
    return rowsResult([
      {
        content: renderKnowledgePrompt(merged.chunks.map(sanitizeChunk), maxChars),
        chunks: JSON.stringify(merged.chunks.map(toPayloadChunk)),
      },
    ]);
  }
}
