// ──────────────────────────────────────────────
// Weft - Deterministic Embedding Backend
// Hash-derived vectors; stable across runs, no network
// ──────────────────────────────────────────────

import type { EmbeddingBackend } from "@weft/types";
import { buildDeterministicEmbedding } from "@weft/utils";

export class DeterministicEmbedder implements EmbeddingBackend {
  readonly model: string;
  private readonly dimensions: number;

  constructor(dimensions = 64) {
    this.dimensions = dimensions;
    this.model = `deterministic-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => buildDeterministicEmbedding(text, this.dimensions));
  }
}
