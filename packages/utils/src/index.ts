// ──────────────────────────────────────────────
// Weft - Utils Package
// ──────────────────────────────────────────────

export { rootLogger, createLogger, createTurnId, createTurnLogger } from "./logger.js";
export { loadConfig, getEnvOrThrow, getEnvOrDefault, getEnvAsNumber } from "./config.js";
export type { AppConfig } from "./config.js";
export {
  WeftError,
  ConfigurationError,
  DuplicateComponentTypeError,
  UnknownComponentTypeError,
  NodeNotFoundError,
  DuplicateNodeIdError,
  ParentCycleError,
  WorkflowDocumentError,
  BackendFailureError,
  CitationDataError,
  StageOutputPendingError,
  ExecutionError,
} from "./errors.js";
export {
  safeJsonParse,
  truncateString,
  measureDuration,
  startTimer,
  sanitizeErrorMessage,
  isRecord,
  stripReasoning,
} from "./helpers.js";
export {
  estimateTokens,
  tokenize,
  buildDeterministicEmbedding,
  cosineSimilarity,
  keywordOverlap,
} from "./knowledge.js";
