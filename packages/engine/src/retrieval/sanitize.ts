// ──────────────────────────────────────────────
// Weft - Chunk sanitation
// Strips internal fields and coerces values JSON cannot carry
// ──────────────────────────────────────────────

import type { RetrievalChunk, SanitizedChunk } from "@weft/types";
import { isRecord } from "@weft/utils";

function toJsonSafe(value: unknown): unknown {
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toJsonSafe);
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toJsonSafe(inner);
    }
    return out;
  }
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : String(value);
    default:
      return String(value);
  }
}

export function sanitizeChunk(chunk: RetrievalChunk): SanitizedChunk {
  const sanitized: SanitizedChunk = {
    content: chunk.content,
    docId: chunk.docId,
    docName: chunk.docName,
  };
  if (chunk.hasWeightedContent !== undefined) sanitized.hasWeightedContent = chunk.hasWeightedContent;
  if (chunk.source !== undefined) sanitized.source = chunk.source;
  if (chunk.metadata !== undefined) {
    const metadata: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(chunk.metadata)) {
      metadata[key] = toJsonSafe(value);
    }
    sanitized.metadata = metadata;
  }
  return sanitized;
}

// Chunk as carried in a retrieval row's payload: sanitized, vector kept for citation
export function toPayloadChunk(chunk: RetrievalChunk): SanitizedChunk & { vector?: number[] } {
  const sanitized = sanitizeChunk(chunk);
  return chunk.vector && chunk.vector.length > 0 ? { ...sanitized, vector: [...chunk.vector] } : sanitized;
}
