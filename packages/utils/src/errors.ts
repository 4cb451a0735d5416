// ──────────────────────────────────────────────
// Weft - Error Taxonomy
// ──────────────────────────────────────────────

export class WeftError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WeftError";
    this.code = code;
  }
}

export class ConfigurationError extends WeftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIGURATION_ERROR", options);
    this.name = "ConfigurationError";
  }
}

export class UnknownComponentTypeError extends WeftError {
  readonly componentName: string;

  constructor(componentName: string, available: string[]) {
    super(
      `Component "${componentName}" is not recognized. Available: ${available.join(", ")}`,
      "UNKNOWN_COMPONENT_TYPE"
    );
    this.name = "UnknownComponentTypeError";
    this.componentName = componentName;
  }
}

export class DuplicateComponentTypeError extends WeftError {
  readonly componentName: string;

  constructor(componentName: string) {
    super(`Component type "${componentName}" is already registered`, "DUPLICATE_COMPONENT_TYPE");
    this.name = "DuplicateComponentTypeError";
    this.componentName = componentName;
  }
}

export class NodeNotFoundError extends WeftError {
  readonly nodeId: string;

  constructor(nodeId: string, role = "Node") {
    super(`${role} "${nodeId}" not found in workflow`, "NODE_NOT_FOUND");
    this.name = "NodeNotFoundError";
    this.nodeId = nodeId;
  }
}

export class DuplicateNodeIdError extends WeftError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super(`Node with ID "${nodeId}" already exists in the workflow`, "DUPLICATE_NODE_ID");
    this.name = "DuplicateNodeIdError";
    this.nodeId = nodeId;
  }
}

export class ParentCycleError extends WeftError {
  constructor(nodeId: string, parentId: string) {
    super(
      `Setting parent of "${nodeId}" to "${parentId}" would create a cycle in the parent chain`,
      "PARENT_CYCLE"
    );
    this.name = "ParentCycleError";
  }
}

export class WorkflowDocumentError extends WeftError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid workflow document: ${issues.join("; ")}`, "INVALID_DOCUMENT");
    this.name = "WorkflowDocumentError";
    this.issues = issues;
  }
}

export class BackendFailureError extends WeftError {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super(`${backend}: ${message}`, "BACKEND_FAILURE", options);
    this.name = "BackendFailureError";
    this.backend = backend;
  }
}

export class CitationDataError extends WeftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CITATION_DATA", options);
    this.name = "CitationDataError";
  }
}

export class StageOutputPendingError extends WeftError {
  constructor(componentId: string) {
    super(
      `Output of "${componentId}" is still streaming; drain the stream before reading the final output`,
      "OUTPUT_PENDING"
    );
    this.name = "StageOutputPendingError";
  }
}

export class ExecutionError extends WeftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "EXECUTION_ERROR", options);
    this.name = "ExecutionError";
  }
}
