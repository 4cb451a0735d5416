// ──────────────────────────────────────────────
// Weft - LLM Package
// ──────────────────────────────────────────────

export { GeminiProvider } from "./gemini-provider.js";
export { GroqProvider } from "./groq-provider.js";
export { createGenerationBackend } from "./factory.js";
export { DeterministicEmbedder } from "./embedding.js";
export { HybridCitationInserter, CITATION_THRESHOLD, splitSentences } from "./citation-inserter.js";
export { TavilySearch, aggregateDocuments } from "./tavily-search.js";
export { readEventData } from "./sse.js";
