// ──────────────────────────────────────────────
// Weft - Answer component
// User-facing sink; relays its upstream output or stream
// ──────────────────────────────────────────────

import type { ComponentType } from "@weft/types";
import { ComponentBase, rowsResult, type BaseParams, type StageResult } from "./base.js";

export class AnswerComponent extends ComponentBase<BaseParams> {
  readonly componentName: ComponentType = "Answer";

  protected async invoke(): Promise<StageResult> {
    const upstream = this.runtime.getInputResult(this.id);
    if (upstream?.kind === "stream") {
      return upstream;
    }
    return rowsResult(this.getInput());
  }
}
