// ──────────────────────────────────────────────
// Weft - Knowledge graph summary source
// ──────────────────────────────────────────────

import type { RetrievalResultSet, RetrievalSource } from "@weft/types";
import { tokenize } from "@weft/utils";

export const GRAPH_DOC_ID = "knowledge_graph";
export const GRAPH_DOC_NAME = "Knowledge Graph";

// Summarizes the known entities a query mentions as a single chunk
export class KnowledgeGraphSummarySource implements RetrievalSource {
  readonly name = "knowledge-graph";
  private readonly entities: Map<string, string>;

  constructor(entities: Record<string, string> = {}) {
    this.entities = new Map(Object.entries(entities).map(([name, fact]) => [name.toLowerCase(), fact]));
  }

  async retrieve(query: string, maxResults: number): Promise<RetrievalResultSet> {
    const mentioned = [...new Set(tokenize(query))].filter((token) => this.entities.has(token));
    const facts = mentioned
      .slice(0, Math.max(1, maxResults))
      .map((entity) => `${entity}: ${this.entities.get(entity) ?? ""}`);

    const content =
      facts.length > 0
        ? `Knowledge graph summary for "${query}":\n${facts.join("\n")}`
        : `Knowledge graph summary for "${query}": no related entities.`;

    return {
      chunks: [{ content, docId: GRAPH_DOC_ID, docName: GRAPH_DOC_NAME, source: this.name }],
      docAggs: [{ docId: GRAPH_DOC_ID, docName: GRAPH_DOC_NAME }],
    };
  }
}
