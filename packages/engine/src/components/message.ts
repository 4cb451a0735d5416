// ──────────────────────────────────────────────
// Weft - Message component
// Replies with one of a fixed set of messages
// ──────────────────────────────────────────────

import { z } from "zod";
import type { ComponentType } from "@weft/types";
import { ConfigurationError } from "@weft/utils";
import { baseParamsSchema, ComponentBase, beOutput, rowsResult, type StageResult } from "./base.js";
import { checkEmpty } from "./param-checks.js";

export const messageParamsSchema = baseParamsSchema.extend({
  messages: z.array(z.string()).default([]),
});

export type MessageParams = z.infer<typeof messageParamsSchema>;

export class MessageComponent extends ComponentBase<MessageParams> {
  readonly componentName: ComponentType = "Message";

  override check(): void {
    super.check();
    if (this.params.messages.length === 0) {
      throw new ConfigurationError("[Message] Messages should not be empty");
    }
    this.params.messages.forEach((message, index) => checkEmpty(message, `[Message] Message ${index + 1}`));
  }

  protected async invoke(): Promise<StageResult> {
    const { messages } = this.params;
    const picked = messages[Math.floor(Math.random() * messages.length)] ?? "";
    return rowsResult(beOutput(picked));
  }
}
