// ──────────────────────────────────────────────
// Weft - Generation stream source
// check-empty -> streaming -> cite -> done
// ──────────────────────────────────────────────

import type { Reference, StreamEvent } from "@weft/types";
import { stripReasoning } from "@weft/utils";
import type { StreamSource } from "../stream.js";

type Phase = "check-empty" | "streaming" | "cite" | "done";

export interface GenerationStreamPlan {
  // Set when the retrieval context was empty: no backend call is made
  emptyMessage: string | null;
  // Starts the backend call; yields text increments
  open(): AsyncIterable<string>;
  finalize(answer: string): Promise<{ content: string; reference: Reference }>;
}

export class GenerationStreamSource implements StreamSource {
  private phase: Phase = "check-empty";
  private iterator: AsyncIterator<string> | null = null;
  private answer = "";

  constructor(private readonly plan: GenerationStreamPlan) {}

  async pull(): Promise<StreamEvent | null> {
    switch (this.phase) {
      case "check-empty":
        return this.checkEmpty();
      case "streaming":
        return this.nextPartial();
      case "cite":
        return this.cite();
      case "done":
        return null;
    }
  }

  async close(): Promise<void> {
    this.phase = "done";
    const iterator = this.iterator;
    this.iterator = null;
    await iterator?.return?.();
  }

  private async checkEmpty(): Promise<StreamEvent | null> {
    const { emptyMessage } = this.plan;
    if (emptyMessage !== null) {
      this.phase = "done";
      return { type: "final", content: emptyMessage, reference: [] };
    }

    this.iterator = this.plan.open()[Symbol.asyncIterator]();
    this.phase = "streaming";
    return this.nextPartial();
  }

  private async nextPartial(): Promise<StreamEvent | null> {
    const iterator = this.iterator;
    if (!iterator) {
      this.phase = "cite";
      return this.cite();
    }

    const step = await iterator.next();
    if (step.done) {
      this.iterator = null;
      this.phase = "cite";
      return this.cite();
    }

    this.answer += step.value;
    return { type: "partial", content: stripReasoning(this.answer) };
  }

  private async cite(): Promise<StreamEvent | null> {
    this.phase = "done";
    const final = await this.plan.finalize(stripReasoning(this.answer));
    return { type: "final", content: final.content, reference: final.reference };
  }
}
