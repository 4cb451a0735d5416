// ──────────────────────────────────────────────
// Weft - Canvas
// In-process execution engine: walks one conversational turn through
// the workflow graph, one stage at a time
// ──────────────────────────────────────────────

import type { Logger } from "pino";
import type {
  ChatMessage,
  ComponentInfo,
  ComponentLogger,
  ComponentServices,
  HistoryEntry,
  Reference,
  ResultRow,
  WorkflowDocument,
  WorkflowNode,
} from "@weft/types";
import {
  ConfigurationError,
  ExecutionError,
  NodeNotFoundError,
  createLogger,
  createTurnId,
  createTurnLogger,
  measureDuration,
  sanitizeErrorMessage,
  startTimer,
} from "@weft/utils";
import { beOutput, type ComponentBase, type StageResult } from "./components/base.js";
import { registerAllComponents } from "./components/index.js";
import { FATAL_ISSUES, validateGraph } from "./graph-validator.js";
import { resolveComponent } from "./registry.js";
import type { WorkflowRuntime } from "./runtime.js";
import type { StageStream } from "./stream.js";
import type { WorkflowGraph } from "./workflow-graph.js";

export const DEFAULT_MAX_STEPS = 128;

export type StepStatus = "completed" | "streaming" | "failed";

export interface TurnStep {
  nodeId: string;
  componentName: string;
  status: StepStatus;
  durationMs: number;
  error: string | null;
}

export interface CanvasOptions {
  services: ComponentServices;
  tenantId?: string;
  embeddingModel?: string;
  maxSteps?: number;
  onStepStart?: (nodeId: string, componentName: string) => Promise<void>;
  onStepComplete?: (step: TurnStep) => Promise<void>;
}

export interface RunTurnInput {
  question?: string;
  stream?: boolean;
}

export type TurnResult =
  | { kind: "rows"; rows: ResultRow[] }
  | { kind: "stream"; stream: StageStream };

export class Canvas implements WorkflowRuntime {
  readonly services: ComponentServices;
  private readonly components = new Map<string, ComponentBase>();
  private readonly componentInfo = new Map<string, ComponentInfo>();
  private readonly tenantId: string;
  private readonly maxSteps: number;
  private embeddingModel: string;
  private pinoLogger: Logger;

  constructor(
    readonly graph: WorkflowGraph,
    private readonly options: CanvasOptions
  ) {
    this.services = options.services;
    this.tenantId = options.tenantId ?? "default";
    this.embeddingModel = options.embeddingModel ?? "";
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.pinoLogger = createLogger("canvas", { workflowId: graph.id });
    this.activate();
  }

  get logger(): ComponentLogger {
    const log = this.pinoLogger;
    return {
      info: (message, data) => log.info(data ?? {}, message),
      warn: (message, data) => log.warn(data ?? {}, message),
      error: (message, data) => log.error(data ?? {}, message),
      debug: (message, data) => log.debug(data ?? {}, message),
    };
  }

  async runTurn(input: RunTurnInput = {}): Promise<TurnResult> {
    const turnId = createTurnId();
    this.pinoLogger = createTurnLogger(this.graph.id, turnId);
    const turnTimer = startTimer();
    const { question } = input;

    this.pinoLogger.info(
      { hasQuestion: question !== undefined, stream: input.stream ?? false },
      "Turn started"
    );

    if (this.graph.path.length === 0) {
      const greeting = await this.advance([this.entryNodeId()], {});
      if (question === undefined) {
        this.pinoLogger.info({ durationMs: measureDuration(turnTimer) }, "Prologue delivered");
        return greeting;
      }
      if (greeting.kind === "stream") {
        await greeting.stream.drain();
      }
    } else if (question === undefined) {
      throw new ExecutionError("A question is required once the conversation has started");
    }

    const answerId = this.lastAnswerId();
    this.graph.history.push(["user", question]);
    this.graph.messages.push({ role: "user", content: question, id: turnId });
    this.requireComponent(answerId).setOutput(beOutput(question));

    const result = await this.advance(this.requireNode(answerId).downstream, {
      stream: input.stream ?? false,
    });
    this.pinoLogger.info(
      { kind: result.kind, steps: this.graph.path.length, durationMs: measureDuration(turnTimer) },
      "Turn finished"
    );
    return result;
  }

  toDocument(): WorkflowDocument {
    return this.graph.toDocument();
  }

  // ── WorkflowRuntime ───────────────────────────

  getComponent(id: string): ComponentBase | undefined {
    return this.components.get(id);
  }

  getComponentName(id: string): string {
    return this.graph.getNode(id)?.componentName ?? "";
  }

  getNode(id: string): WorkflowNode | undefined {
    return this.graph.getNode(id);
  }

  getHistory(windowSize: number): ChatMessage[] {
    return this.graph.history
      .slice(-windowSize)
      .map(([role, content]) => ({ role, content }));
  }

  getLatestUserTurn(): string {
    for (let i = this.graph.history.length - 1; i >= 0; i--) {
      const entry = this.graph.history[i];
      if (entry && entry[0] === "user") return entry[1];
    }
    return "";
  }

  recordUserTurn(text: string): void {
    const { history } = this.graph;
    const last = history[history.length - 1];
    if (last && last[0] === "user") {
      if (last[1] !== text) {
        history[history.length - 1] = ["user", text];
      }
      return;
    }
    history.push(["user", text]);
  }

  getInput(componentId: string): ResultRow[] {
    return this.inputComponent(componentId)?.output(false) ?? [];
  }

  getInputResult(componentId: string): StageResult | null {
    return this.inputComponent(componentId)?.lastResult ?? null;
  }

  setComponentInfo(id: string, info: ComponentInfo): void {
    this.componentInfo.set(id, info);
  }

  getComponentInfo(id: string): ComponentInfo | undefined {
    return this.componentInfo.get(id);
  }

  getTenantId(): string {
    return this.tenantId;
  }

  getEmbeddingModel(): string {
    return this.embeddingModel;
  }

  setEmbeddingModel(id: string): void {
    this.embeddingModel = id;
  }

  // ── Internals ─────────────────────────────────

  private activate(): void {
    registerAllComponents();

    const validation = validateGraph(this.graph.listNodes());
    const fatal = validation.issues.filter((issue) => FATAL_ISSUES.has(issue.kind));
    if (fatal.length > 0) {
      throw new ConfigurationError(
        `Invalid workflow graph: ${fatal.map((issue) => issue.message).join("; ")}`
      );
    }
    for (const issue of validation.issues) {
      this.pinoLogger.warn({ kind: issue.kind, nodeId: issue.nodeId, otherId: issue.otherId }, issue.message);
    }

    for (const node of this.graph.listNodes()) {
      const definition = resolveComponent(node.componentName);
      this.components.set(node.id, definition.create(node.id, node.params, this));
    }
    for (const component of this.components.values()) {
      component.check();
    }

    this.pinoLogger.info({ nodeCount: this.components.size }, "Workflow activated");
  }

  // Runs stages breadth-first until an answer node ends the turn
  private async advance(start: string[], kwargs: { stream?: boolean }): Promise<TurnResult> {
    const queue = [...start];
    let steps = 0;

    for (let nodeId = queue.shift(); nodeId !== undefined; nodeId = queue.shift()) {
      steps += 1;
      if (steps > this.maxSteps) {
        throw new ExecutionError(`Turn exceeded the limit of ${this.maxSteps} steps`);
      }

      const component = this.requireComponent(nodeId);
      const result = await this.runStage(component, kwargs);
      this.graph.path.push(nodeId);

      if (component.componentName === "Answer") {
        return this.finishTurn(result);
      }

      for (const next of this.nextNodes(component, result)) {
        if (!queue.includes(next)) queue.push(next);
      }
    }

    throw new ExecutionError("Turn ended without reaching an Answer node");
  }

  private async runStage(component: ComponentBase, kwargs: { stream?: boolean }): Promise<StageResult> {
    const { id, componentName } = component;
    const stepTimer = startTimer();
    await this.options.onStepStart?.(id, componentName);

    const history: HistoryEntry[] = this.graph.history.map(([role, content]) => [role, content]);
    try {
      const result = await component.run(history, kwargs);
      const step: TurnStep = {
        nodeId: id,
        componentName,
        status: result.kind === "stream" ? "streaming" : "completed",
        durationMs: measureDuration(stepTimer),
        error: null,
      };
      this.pinoLogger.debug({ ...step }, "Stage finished");
      await this.options.onStepComplete?.(step);
      return result;
    } catch (err) {
      const error = sanitizeErrorMessage(err);
      this.pinoLogger.error({ nodeId: id, componentName, error }, "Stage failed");
      await this.options.onStepComplete?.({
        nodeId: id,
        componentName,
        status: "failed",
        durationMs: measureDuration(stepTimer),
        error,
      });
      throw err;
    }
  }

  // A branching stage names its target in its output; others fan out to all downstream
  private nextNodes(component: ComponentBase, result: StageResult): string[] {
    const { downstream } = component;
    if (result.kind === "rows") {
      const target = result.rows[0]?.content;
      if (target !== undefined && downstream.includes(target)) {
        return [target];
      }
    }
    return downstream;
  }

  private finishTurn(result: StageResult): TurnResult {
    if (result.kind === "stream") {
      result.stream.onDrained((final) => this.recordAnswer(final.content, final.reference));
      return result;
    }

    const content = result.rows.map((row) => row.content).join("\n");
    this.recordAnswer(content, result.rows[0]?.reference ?? []);
    return result;
  }

  private recordAnswer(content: string, reference: Reference): void {
    this.graph.history.push(["assistant", content]);
    this.graph.messages.push({ role: "assistant", content });
    this.graph.reference.push(reference);
  }

  private inputComponent(componentId: string): ComponentBase | undefined {
    const upstream = this.getNode(componentId)?.upstream ?? [];
    for (let i = this.graph.path.length - 1; i >= 0; i--) {
      const id = this.graph.path[i];
      if (id !== undefined && upstream.includes(id)) {
        return this.components.get(id);
      }
    }
    return upstream
      .map((id) => this.components.get(id))
      .find((component) => component?.lastResult != null);
  }

  private entryNodeId(): string {
    const entry = this.graph.listNodes().find((node) => node.componentName === "Begin");
    if (!entry) {
      throw new ExecutionError("Workflow has no Begin node to start from");
    }
    return entry.id;
  }

  private lastAnswerId(): string {
    for (let i = this.graph.path.length - 1; i >= 0; i--) {
      const id = this.graph.path[i];
      if (id !== undefined && this.getComponentName(id) === "Answer") return id;
    }
    throw new ExecutionError("No Answer node has run yet; cannot accept a question");
  }

  private requireNode(id: string): WorkflowNode {
    const node = this.graph.getNode(id);
    if (!node) throw new NodeNotFoundError(id);
    return node;
  }

  private requireComponent(id: string): ComponentBase {
    const component = this.components.get(id);
    if (!component) throw new NodeNotFoundError(id, "Component");
    return component;
  }
}
