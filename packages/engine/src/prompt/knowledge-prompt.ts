// ──────────────────────────────────────────────
// Weft - Knowledge prompt rendering
// ──────────────────────────────────────────────

import type { SanitizedChunk } from "@weft/types";
import { truncateString } from "@weft/utils";

const KNOWLEDGE_HEADER = "Relevant information from knowledge base:\n";

export function renderKnowledgePrompt(chunks: SanitizedChunk[], maxChars: number): string {
  const body = chunks
    .map((chunk, index) => `[${index + 1}] ${chunk.docName}\n${chunk.content}`)
    .join("\n\n");
  return truncateString(KNOWLEDGE_HEADER + body, maxChars);
}
