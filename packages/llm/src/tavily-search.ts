// ──────────────────────────────────────────────
// Weft - Tavily Web Search Source
// ──────────────────────────────────────────────

import { z } from "zod";
import type { DocAggregate, RetrievalChunk, RetrievalResultSet, RetrievalSource } from "@weft/types";
import { BackendFailureError, sanitizeErrorMessage } from "@weft/utils";

const TAVILY_API_BASE = "https://api.tavily.com/search";
const DEFAULT_TIMEOUT_MS = 15000;

const searchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(""),
        url: z.string(),
        content: z.string().default(""),
        score: z.number().optional(),
      })
    )
    .default([]),
});

export class TavilySearch implements RetrievalSource {
  readonly name = "tavily";
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(apiKey: string, timeoutMs = DEFAULT_TIMEOUT_MS) {
    this.apiKey = apiKey;
    this.timeoutMs = timeoutMs;
  }

  async retrieve(query: string, maxResults: number): Promise<RetrievalResultSet> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(TAVILY_API_BASE, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        signal: controller.signal,
        body: JSON.stringify({
          api_key: this.apiKey,
          query,
          max_results: maxResults,
        }),
      });

      if (!response.ok) {
        const errorBody = await response.text().catch(() => "Unknown error");
        throw new BackendFailureError("tavily", `Search failed with status ${response.status}: ${errorBody}`);
      }

      const parsed = searchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new BackendFailureError("tavily", "Unexpected response shape");
      }

      const chunks: RetrievalChunk[] = parsed.data.results.map((result) => ({
        content: result.content,
        docId: result.url,
        docName: result.title,
        source: this.name,
        metadata: result.score === undefined ? undefined : { score: result.score },
      }));

      return { chunks, docAggs: aggregateDocuments(chunks) };
    } catch (error) {
      if (error instanceof BackendFailureError) throw error;
      if (error instanceof DOMException && error.name === "AbortError") {
        throw new BackendFailureError("tavily", `Search timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new BackendFailureError("tavily", sanitizeErrorMessage(error), { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function aggregateDocuments(chunks: RetrievalChunk[]): DocAggregate[] {
  const seen = new Set<string>();
  const docAggs: DocAggregate[] = [];
  for (const chunk of chunks) {
    if (seen.has(chunk.docId)) continue;
    seen.add(chunk.docId);
    docAggs.push({ docId: chunk.docId, docName: chunk.docName });
  }
  return docAggs;
}
