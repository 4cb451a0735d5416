// ──────────────────────────────────────────────
// Weft - Citation assembly
// Best effort: any payload or backend problem yields the uncited answer
// ──────────────────────────────────────────────

import { z } from "zod";
import type {
  CitationBackend,
  CitationReference,
  ComponentLogger,
  DocAggregate,
  ResultRow,
  SanitizedChunk,
} from "@weft/types";
import { CREDENTIAL_HINT } from "@weft/types";
import { CitationDataError, safeJsonParse, sanitizeErrorMessage } from "@weft/utils";
import { sanitizeChunk } from "../retrieval/sanitize.js";

export const KEYWORD_WEIGHT = 0.7;
export const VECTOR_WEIGHT = 0.3;

const payloadSchema = z.array(
  z.object({
    content: z.string().default(""),
    docId: z.string().optional(),
    docName: z.string().optional(),
    hasWeightedContent: z.boolean().optional(),
    source: z.string().optional(),
    vector: z.array(z.number()).optional(),
    metadata: z.record(z.unknown()).optional(),
  })
);

export interface DecodedChunk {
  chunk: SanitizedChunk;
  vector: number[];
}

export function decodeChunkPayload(payload: string | undefined): DecodedChunk[] {
  if (!payload) {
    throw new CitationDataError("Retrieval result carries no chunk payload");
  }
  const json = safeJsonParse(payload);
  if (!json.success) {
    throw new CitationDataError(`Chunk payload is not valid JSON: ${json.error}`);
  }
  const parsed = payloadSchema.safeParse(json.data);
  if (!parsed.success) {
    throw new CitationDataError("Chunk payload is not a list of chunks");
  }

  return parsed.data.map((raw, index) => ({
    chunk: sanitizeChunk({
      content: raw.content,
      docId: raw.docId ?? `unknown_doc_${index}`,
      docName: raw.docName ?? `Unknown Document ${index}`,
      hasWeightedContent: raw.hasWeightedContent,
      source: raw.source,
      metadata: raw.metadata,
    }),
    vector: raw.vector ?? [],
  }));
}

// Decoded chunks of the first row, or [] when there is nothing usable
export function readCitableChunks(rows: ResultRow[], logger: ComponentLogger): DecodedChunk[] {
  try {
    return decodeChunkPayload(rows[0]?.chunks);
  } catch (error) {
    if (!(error instanceof CitationDataError)) throw error;
    logger.warn("Citation skipped", { reason: error.message });
    return [];
  }
}

export function withCredentialHint(answer: string): string {
  const lowered = answer.toLowerCase();
  if (lowered.includes("invalid key") || lowered.includes("invalid api")) {
    return answer + CREDENTIAL_HINT;
  }
  return answer;
}

export interface CitationContext {
  citation: CitationBackend;
  embeddingModel: string;
  logger: ComponentLogger;
}

export interface CitedAnswer {
  content: string;
  reference: CitationReference;
}

function uncited(answer: string): CitedAnswer {
  return { content: answer, reference: { chunks: [], docAggs: [] } };
}

export async function assembleCitation(
  rows: ResultRow[],
  answer: string,
  context: CitationContext
): Promise<CitedAnswer> {
  return citeAnswer(readCitableChunks(rows, context.logger), answer, context);
}

export async function citeAnswer(
  decoded: DecodedChunk[],
  answer: string,
  context: CitationContext
): Promise<CitedAnswer> {
  if (decoded.length === 0) {
    return uncited(answer);
  }

  let cited: { answer: string; indices: number[] };
  try {
    cited = await context.citation.insertCitations(
      answer,
      decoded.map((entry) => entry.chunk.content),
      decoded.map((entry) => entry.vector),
      context.embeddingModel,
      KEYWORD_WEIGHT,
      VECTOR_WEIGHT
    );
  } catch (error) {
    context.logger.warn("Citation backend failed, returning uncited answer", {
      error: sanitizeErrorMessage(error),
    });
    return uncited(answer);
  }

  const chunks = decoded.map((entry) => entry.chunk);
  const docAggs: DocAggregate[] = [];
  const seen = new Set<string>();

  for (const index of cited.indices) {
    if (!Number.isInteger(index) || index < 0 || index >= chunks.length) continue;
    const chunk = chunks[index];
    if (!chunk || seen.has(chunk.docId)) continue;
    seen.add(chunk.docId);
    docAggs.push({ docId: chunk.docId, docName: chunk.docName });
  }

  return {
    content: withCredentialHint(cited.answer),
    reference: { chunks, docAggs },
  };
}
