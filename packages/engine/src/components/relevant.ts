// ──────────────────────────────────────────────
// Weft - Relevant component
// Grades upstream content against the latest question: yes or no
// ──────────────────────────────────────────────

import { z } from "zod";
import type { ComponentType, ResultRow } from "@weft/types";
import { truncateString } from "@weft/utils";
import { beOutput, rowsResult, type StageResult } from "./base.js";
import { GenerateComponent, generateParamsSchema } from "./generate.js";
import { checkEmpty } from "./param-checks.js";

export const GRADER_PROMPT = [
  "You are a grader assessing relevance of a retrieved document to a user question.",
  "It does not need to be a stringent test. The goal is to filter out erroneous retrievals.",
  "If the document contains keyword(s) or semantic meaning related to the user question, grade it as relevant.",
  "Give a binary score 'yes' or 'no' to indicate whether the document is relevant to the question.",
  "No other words needed except 'yes' or 'no'.",
].join("\n");

export const relevantParamsSchema = generateParamsSchema.extend({
  yes: z.string().default(""),
  no: z.string().default(""),
});

export type RelevantParams = z.infer<typeof relevantParamsSchema>;

export class RelevantComponent extends GenerateComponent<RelevantParams> {
  override readonly componentName: ComponentType = "Relevant";

  override check(): void {
    super.check();
    checkEmpty(this.params.yes, "[Relevant] 'Yes'");
    checkEmpty(this.params.no, "[Relevant] 'No'");
  }

  protected override async invoke(): Promise<StageResult> {
    const question = this.runtime.getLatestUserTurn();
    const documents = this.getInput()
      .map((row) => row.content)
      .join(" - ");
    if (!documents) {
      return rowsResult(beOutput(this.params.no));
    }

    const backend = this.chatBackend();
    const charLimit = backend.maxLength * 4 - 20;
    let input = `Question: ${question}\nDocuments: \n${documents}`;
    if (input.length > charLimit) {
      this.logger.warn("Relevance input exceeds the backend budget, truncating", {
        length: input.length,
        charLimit,
      });
      input = truncateString(input, charLimit);
    }

    const messages = [{ role: "user" as const, content: input }];
    const config = this.generationConfig();
    const response = await backend.chat(GRADER_PROMPT, messages, config);
    this.runtime.setComponentInfo(this.id, { prompt: GRADER_PROMPT, messages, config });

    const lowered = response.toLowerCase();
    if (lowered.includes("yes")) return rowsResult(beOutput(this.params.yes));
    if (lowered.includes("no")) return rowsResult(beOutput(this.params.no));

    this.logger.warn("Ambiguous relevance grade, defaulting to no", { response });
    return rowsResult(beOutput(this.params.no));
  }

  override async debug(): Promise<ResultRow[]> {
    const result = await this.invoke();
    return result.kind === "rows" ? result.rows : [];
  }
}
