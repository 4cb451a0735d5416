// ──────────────────────────────────────────────
// Weft - Knowledge Utilities
// Token estimation, deterministic embeddings, similarity
// ──────────────────────────────────────────────

import { createHash } from "node:crypto";

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 1);
}

export function buildDeterministicEmbedding(text: string, dimensions = 64): number[] {
  const values: number[] = [];
  let iteration = 0;

  while (values.length < dimensions) {
    const digest = createHash("sha256").update(`${iteration}:${text}`).digest();
    for (const byte of digest) {
      values.push(byte / 127.5 - 1);
      if (values.length >= dimensions) {
        break;
      }
    }
    iteration += 1;
  }

  return values;
}

export function cosineSimilarity(left: number[], right: number[]): number {
  if (left.length === 0 || right.length === 0 || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  left.forEach((l, i) => {
    const r = right[i] ?? 0;
    dot += l * r;
    leftNorm += l * l;
    rightNorm += r * r;
  });

  const denom = Math.sqrt(leftNorm) * Math.sqrt(rightNorm);
  if (denom === 0) {
    return 0;
  }

  return dot / denom;
}

// Share of `query` tokens that also appear in `candidate`
export function keywordOverlap(query: string, candidate: string): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) return 0;

  const candidateTokens = new Set(tokenize(candidate));
  let hits = 0;
  for (const token of queryTokens) {
    if (candidateTokens.has(token)) hits += 1;
  }
  return hits / queryTokens.size;
}
