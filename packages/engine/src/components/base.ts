// ──────────────────────────────────────────────
// Weft - Component Base
// Contract shared by every stage type
// ──────────────────────────────────────────────

import { z } from "zod";
import type { ComponentLogger, ComponentType, HistoryEntry, ResultRow } from "@weft/types";
import { DEFAULT_HISTORY_WINDOW_SIZE } from "@weft/types";
import { ConfigurationError, StageOutputPendingError } from "@weft/utils";
import type { WorkflowRuntime } from "../runtime.js";
import type { StageStream } from "../stream.js";
import { checkPositiveInteger } from "./param-checks.js";

export type StageResult =
  | { kind: "rows"; rows: ResultRow[] }
  | { kind: "stream"; stream: StageStream };

export interface StageKwargs {
  stream?: boolean;
}

export type DebugKwargs = Record<string, string>;

export interface ComponentDefinition {
  name: ComponentType;
  create(id: string, params: Record<string, unknown>, runtime: WorkflowRuntime): ComponentBase;
}

export const baseParamsSchema = z.object({
  messageHistoryWindowSize: z.number().default(DEFAULT_HISTORY_WINDOW_SIZE),
});

export type BaseParams = z.infer<typeof baseParamsSchema>;

export function parseParams<S extends z.ZodTypeAny>(
  schema: S,
  raw: Record<string, unknown>,
  componentName: string
): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "params"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`[${componentName}] Invalid parameters: ${details}`);
  }
  return result.data;
}

export function beOutput(content: string): ResultRow[] {
  return [{ content, reference: [] }];
}

export function rowsResult(rows: ResultRow[]): StageResult {
  return { kind: "rows", rows };
}

export abstract class ComponentBase<P extends BaseParams = BaseParams> {
  abstract readonly componentName: ComponentType;
  private result: StageResult | null = null;

  constructor(
    readonly id: string,
    protected readonly params: P,
    protected readonly runtime: WorkflowRuntime
  ) {}

  get upstream(): string[] {
    return this.runtime.getNode(this.id)?.upstream ?? [];
  }

  get downstream(): string[] {
    return this.runtime.getNode(this.id)?.downstream ?? [];
  }

  get lastResult(): StageResult | null {
    return this.result;
  }

  check(): void {
    checkPositiveInteger(
      this.params.messageHistoryWindowSize,
      `[${this.componentName}] Message window size`
    );
  }

  async run(history: HistoryEntry[], kwargs: StageKwargs = {}): Promise<StageResult> {
    // A failed run must not leave the previous turn's output behind
    this.result = null;
    const result = await this.invoke(history, kwargs);
    this.result = result;
    return result;
  }

  async debug(kwargs: DebugKwargs = {}): Promise<ResultRow[]> {
    void kwargs;
    const result = await this.invoke([], {});
    return result.kind === "rows" ? result.rows : [];
  }

  getInput(): ResultRow[] {
    return this.runtime.getInput(this.id);
  }

  output(allowPartial = false): ResultRow[] {
    const result = this.result;
    if (!result) return [];
    if (result.kind === "rows") return result.rows;

    const final = result.stream.finalEvent;
    if (final) {
      return [{ content: final.content, reference: final.reference }];
    }
    if (!allowPartial) {
      throw new StageOutputPendingError(this.id);
    }
    return [{ content: result.stream.latestContent, reference: [] }];
  }

  // Engine-owned: seeds the cached output without running the stage
  setOutput(rows: ResultRow[]): void {
    this.result = rowsResult(rows);
  }

  beOutput(content: string): ResultRow[] {
    return beOutput(content);
  }

  protected get logger(): ComponentLogger {
    const base = this.runtime.logger;
    const scope = { componentId: this.id, componentName: this.componentName };
    return {
      info: (msg, data) => base.info(msg, { ...scope, ...data }),
      warn: (msg, data) => base.warn(msg, { ...scope, ...data }),
      error: (msg, data) => base.error(msg, { ...scope, ...data }),
      debug: (msg, data) => base.debug(msg, { ...scope, ...data }),
    };
  }

  protected abstract invoke(history: HistoryEntry[], kwargs: StageKwargs): Promise<StageResult>;
}
