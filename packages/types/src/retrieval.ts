// ──────────────────────────────────────────────
// Weft - Retrieval Types
// ──────────────────────────────────────────────

export interface RetrievalChunk {
  content: string;
  docId: string;
  docName: string;
  hasWeightedContent?: boolean;
  source?: string;
  vector?: number[];
  contentTokens?: string[];
  metadata?: Record<string, unknown>;
}

// A chunk as exposed in a citation reference: no vectors, no token lists
export type SanitizedChunk = Omit<RetrievalChunk, "vector" | "contentTokens">;

export interface DocAggregate {
  docId: string;
  docName: string;
}

export interface RetrievalResultSet {
  chunks: RetrievalChunk[];
  docAggs: DocAggregate[];
}

export interface RetrievalSource {
  readonly name: string;
  retrieve(query: string, maxResults: number): Promise<RetrievalResultSet>;
}

export const DEFAULT_MAX_RENDERED_CHARS = 200_000;
