// ──────────────────────────────────────────────
// Weft - Workflow Types
// ──────────────────────────────────────────────

export type ChatRole = "user" | "assistant";

export type HistoryEntry = [role: ChatRole, content: string];

export interface ComponentObjectDocument {
  component_name: string;
  params: Record<string, unknown>;
}

// Wire shape of a single node inside the "components" map
export interface ComponentDocument {
  obj: ComponentObjectDocument;
  downstream: string[];
  upstream: string[];
  parent_id: string;
}

export interface WorkflowDocument {
  components: Record<string, ComponentDocument>;
  history: HistoryEntry[];
  messages: unknown[];
  reference: unknown[];
  path: string[];
  answer: string[];
}

export interface WorkflowNode {
  id: string;
  componentName: string;
  params: Record<string, unknown>;
  upstream: string[];
  downstream: string[];
  parentId: string | null;
}

export interface WorkflowGraphInit {
  id?: string;
  description?: string;
}

export const DEFAULT_WORKFLOW_ID = "default_workflow";
export const DEFAULT_WORKFLOW_DESCRIPTION = "A workflow created programmatically.";
