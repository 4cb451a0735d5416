// ──────────────────────────────────────────────
// Weft - Retrieval fan-in
// Sources run concurrently; results merge in the order given
// ──────────────────────────────────────────────

import type {
  ComponentLogger,
  DocAggregate,
  RetrievalChunk,
  RetrievalResultSet,
  RetrievalSource,
} from "@weft/types";
import { sanitizeErrorMessage } from "@weft/utils";

export interface FanInEntry {
  source: RetrievalSource;
  maxResults: number;
  // Keep only the first chunk and flag it as weighted
  summaryOnly?: boolean;
}

export async function fanIn(
  query: string,
  entries: FanInEntry[],
  logger: ComponentLogger
): Promise<RetrievalResultSet> {
  const settled = await Promise.allSettled(
    entries.map((entry) => entry.source.retrieve(query, entry.maxResults))
  );

  const chunks: RetrievalChunk[] = [];
  const docAggs: DocAggregate[] = [];
  const seenDocs = new Set<string>();

  const addAggregate = (agg: DocAggregate): void => {
    if (seenDocs.has(agg.docId)) return;
    seenDocs.add(agg.docId);
    docAggs.push(agg);
  };

  settled.forEach((outcome, index) => {
    const entry = entries[index];
    if (!entry) return;

    if (outcome.status === "rejected") {
      logger.error("Retrieval source failed", {
        source: entry.source.name,
        error: sanitizeErrorMessage(outcome.reason),
      });
      return;
    }

    if (entry.summaryOnly) {
      const first = outcome.value.chunks[0];
      if (!first) return;
      chunks.push({ ...first, hasWeightedContent: true });
      addAggregate({ docId: first.docId, docName: first.docName });
      return;
    }

    chunks.push(...outcome.value.chunks);
    outcome.value.docAggs.forEach(addAggregate);
  });

  return { chunks, docAggs };
}

export function extractRetrievalQuery(content: string): string {
  const segments = content.split(/USER:|ASSISTANT:/);
  const last = segments[segments.length - 1] ?? "";
  return last.replace(/^user[:：\s]*/i, "");
}
