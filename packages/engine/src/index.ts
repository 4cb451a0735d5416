// ──────────────────────────────────────────────
// Weft - Engine Package
// ──────────────────────────────────────────────

export {
  registerComponent,
  resolveComponent,
  listAvailableComponents,
  isComponentRegistered,
  clearRegistry,
} from "./registry.js";
export { validateGraph, findParentCycle, FATAL_ISSUES } from "./graph-validator.js";
export type { GraphIssue, GraphIssueKind, GraphValidationResult } from "./graph-validator.js";
export { WorkflowGraph } from "./workflow-graph.js";
export { workflowDocumentSchema } from "./document-schema.js";
export { Canvas, DEFAULT_MAX_STEPS } from "./execution-engine.js";
export type { CanvasOptions, RunTurnInput, StepStatus, TurnResult, TurnStep } from "./execution-engine.js";
export type { WorkflowRuntime } from "./runtime.js";
export { StageStream, finalOnlyStream } from "./stream.js";
export type { FinalEvent, StreamSource } from "./stream.js";
export { createDefaultServices, parseLlmId, embeddingDimensions } from "./services.js";
export type { ServiceOverrides, LlmSelection } from "./services.js";

export { extractDependencies, schedulingDependencies } from "./prompt/dependencies.js";
export { substitutePlaceholders, toBulletList } from "./prompt/substitution.js";
export { prepareMessages, fitMessages, buildCandidateMessages, BUDGET_SCALE } from "./prompt/message-fit.js";
export type { PreparedMessages } from "./prompt/message-fit.js";
export { renderKnowledgePrompt } from "./prompt/knowledge-prompt.js";
export { fanIn, extractRetrievalQuery } from "./retrieval/fan-in.js";
export type { FanInEntry } from "./retrieval/fan-in.js";
export { KnowledgeGraphSummarySource } from "./retrieval/graph-source.js";
export { sanitizeChunk } from "./retrieval/sanitize.js";
export { assembleCitation, citeAnswer, decodeChunkPayload, KEYWORD_WEIGHT, VECTOR_WEIGHT } from "./citation/cite.js";
export type { CitedAnswer } from "./citation/cite.js";

export { ComponentBase, beOutput, parseParams } from "./components/base.js";
export type { ComponentDefinition, StageResult, StageKwargs, DebugKwargs } from "./components/base.js";
export { extractSql } from "./components/exesql.js";
export {
  registerAllComponents,
  BUILTIN_COMPONENTS,
  AnswerComponent,
  BeginComponent,
  ExeSqlComponent,
  GenerateComponent,
  MessageComponent,
  RelevantComponent,
  RetrievalComponent,
  RewriteQuestionComponent,
} from "./components/index.js";
