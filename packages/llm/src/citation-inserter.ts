// ──────────────────────────────────────────────
// Weft - Hybrid Citation Inserter
// Scores each answer sentence against the retrieved chunks and
// appends an ` [ID:i]` marker for the best match above threshold
// ──────────────────────────────────────────────

import type { CitationBackend, CitationResult, EmbeddingBackend } from "@weft/types";
import { cosineSimilarity, createLogger, keywordOverlap } from "@weft/utils";

export const CITATION_THRESHOLD = 0.35;

const logger = createLogger("citation");

// Pieces end right after a terminator, so joining them restores the text
export function splitSentences(text: string): string[] {
  return text.split(/(?<=[.!?。！？\n])/);
}

export class HybridCitationInserter implements CitationBackend {
  constructor(
    private readonly embedder: EmbeddingBackend,
    private readonly threshold = CITATION_THRESHOLD
  ) {}

  async insertCitations(
    answer: string,
    chunkContents: string[],
    chunkVectors: number[][],
    embeddingModel: string,
    keywordWeight: number,
    vectorWeight: number
  ): Promise<CitationResult> {
    if (chunkContents.length === 0) {
      return { answer, indices: [] };
    }

    const compareVectors = embeddingModel === this.embedder.model;
    if (!compareVectors) {
      logger.debug(
        { embeddingModel, embedder: this.embedder.model },
        "Embedding model mismatch, scoring on keywords only"
      );
    }

    const used: number[] = [];
    const pieces: string[] = [];

    for (const piece of splitSentences(answer)) {
      const sentence = piece.trim();
      if (sentence.length < 2) {
        pieces.push(piece);
        continue;
      }

      const sentenceVector = compareVectors ? (await this.embedder.embed([sentence]))[0] ?? [] : [];
      let best = -1;
      let bestScore = this.threshold;

      chunkContents.forEach((content, index) => {
        const keywordScore = keywordOverlap(sentence, content);
        const vectorScore = cosineSimilarity(sentenceVector, chunkVectors[index] ?? []);
        const score = keywordScore * keywordWeight + vectorScore * vectorWeight;
        if (score >= bestScore && (best < 0 || score > bestScore)) {
          best = index;
          bestScore = score;
        }
      });

      if (best < 0) {
        pieces.push(piece);
        continue;
      }

      pieces.push(piece.replace(/\s*$/, (trailing) => ` [ID:${best}]${trailing}`));
      if (!used.includes(best)) used.push(best);
    }

    return { answer: pieces.join(""), indices: used };
  }
}
