// ──────────────────────────────────────────────
// Weft - RewriteQuestion component
// Passthrough: the rewriting backend is disabled, but the stage still
// owns the latest user-turn slot in history
// ──────────────────────────────────────────────

import { z } from "zod";
import type { ComponentType } from "@weft/types";
import { beOutput, rowsResult, type StageResult } from "./base.js";
import { GenerateComponent, generateParamsSchema } from "./generate.js";

export const rewriteParamsSchema = generateParamsSchema.extend({
  temperature: z.number().default(0.9),
  language: z.string().default(""),
});

export type RewriteParams = z.infer<typeof rewriteParamsSchema>;

export class RewriteQuestionComponent extends GenerateComponent<RewriteParams> {
  override readonly componentName: ComponentType = "RewriteQuestion";

  protected override async invoke(): Promise<StageResult> {
    const question = this.getInput()[0]?.content ?? "";
    this.logger.debug("Question rewriting is disabled, passing the question through", {
      language: this.params.language || undefined,
    });

    this.runtime.recordUserTurn(question);
    return rowsResult(beOutput(question));
  }
}
