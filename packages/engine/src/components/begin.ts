// ──────────────────────────────────────────────
// Weft - Begin component
// Entry node: greets the user and carries the workflow's input parameters
// ──────────────────────────────────────────────

import { z } from "zod";
import type { BeginQueryParam, ComponentType } from "@weft/types";
import { baseParamsSchema, ComponentBase, beOutput, rowsResult, type StageResult } from "./base.js";

export const beginParamsSchema = baseParamsSchema.extend({
  prologue: z.string().default("Hi! How can I help you today?"),
  query: z
    .array(
      z.object({
        key: z.string(),
        name: z.string().default(""),
        value: z.string().optional(),
        type: z.string().optional(),
        optional: z.boolean().optional(),
      })
    )
    .default([]),
});

export type BeginParams = z.infer<typeof beginParamsSchema>;

export class BeginComponent extends ComponentBase<BeginParams> {
  readonly componentName: ComponentType = "Begin";

  get queryParams(): BeginQueryParam[] {
    return this.params.query;
  }

  // undefined when no parameter has that key
  getQueryValue(key: string): string | undefined {
    const param = this.params.query.find((entry) => entry.key === key);
    return param ? param.value ?? "" : undefined;
  }

  protected async invoke(): Promise<StageResult> {
    return rowsResult(beOutput(this.params.prologue));
  }
}
