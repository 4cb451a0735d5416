// ──────────────────────────────────────────────
// Weft - Workflow Runtime
// What the execution engine exposes to every stage
// ──────────────────────────────────────────────

import type {
  ChatMessage,
  ComponentInfo,
  ComponentLogger,
  ComponentServices,
  ResultRow,
  WorkflowNode,
} from "@weft/types";
import type { ComponentBase, StageResult } from "./components/base.js";

export interface WorkflowRuntime {
  readonly services: ComponentServices;
  readonly logger: ComponentLogger;

  getComponent(id: string): ComponentBase | undefined;
  // "" when the id is not part of the workflow
  getComponentName(id: string): string;
  getNode(id: string): WorkflowNode | undefined;

  getHistory(windowSize: number): ChatMessage[];
  getLatestUserTurn(): string;
  recordUserTurn(text: string): void;

  // Output of the most recently executed upstream stage
  getInput(componentId: string): ResultRow[];
  getInputResult(componentId: string): StageResult | null;

  setComponentInfo(id: string, info: ComponentInfo): void;
  getComponentInfo(id: string): ComponentInfo | undefined;

  getTenantId(): string;
  getEmbeddingModel(): string;
  setEmbeddingModel(id: string): void;
}
