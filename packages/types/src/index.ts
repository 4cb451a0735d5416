// ──────────────────────────────────────────────
// Weft - Shared Types
// ──────────────────────────────────────────────

export * from "./workflow.js";
export * from "./component.js";
export * from "./llm.js";
export * from "./retrieval.js";
