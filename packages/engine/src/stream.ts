// ──────────────────────────────────────────────
// Weft - Stage Stream
// Pull-based channel of partial/final events with explicit states
// ──────────────────────────────────────────────

import type { Reference, StreamEvent, StreamState } from "@weft/types";

export type FinalEvent = Extract<StreamEvent, { type: "final" }>;

// Produces events one pull at a time; `null` means nothing left
export interface StreamSource {
  pull(): Promise<StreamEvent | null>;
  close?(): Promise<void>;
}

type DrainListener = (final: FinalEvent) => void;

export class StageStream implements AsyncIterable<StreamEvent> {
  private currentState: StreamState = "pending";
  private latest = "";
  private final: FinalEvent | null = null;
  private readonly listeners: DrainListener[] = [];

  constructor(private readonly source: StreamSource) {}

  get state(): StreamState {
    return this.currentState;
  }

  // Content of the most recent event seen, partial or final
  get latestContent(): string {
    return this.latest;
  }

  // Settled only once the stream is drained
  get finalEvent(): FinalEvent | null {
    return this.final;
  }

  async next(): Promise<IteratorResult<StreamEvent, undefined>> {
    if (this.isClosed()) {
      return { done: true, value: undefined };
    }
    this.currentState = "streaming";

    let event: StreamEvent | null;
    try {
      event = await this.source.pull();
    } catch (error) {
      await this.cancel();
      throw error;
    }

    // Cancelled while the pull was in flight
    if (this.isClosed()) {
      return { done: true, value: undefined };
    }

    if (event === null) {
      event = { type: "final", content: this.latest, reference: [] };
    }

    this.latest = event.content;
    if (event.type === "final") {
      this.settle(event);
    }
    return { done: false, value: event };
  }

  async cancel(): Promise<void> {
    if (this.isClosed()) return;
    this.currentState = "cancelled";
    await this.source.close?.();
  }

  // Runs once the final event has been pulled; never runs after cancel
  onDrained(listener: DrainListener): void {
    if (this.final) {
      listener(this.final);
      return;
    }
    this.listeners.push(listener);
  }

  async drain(): Promise<FinalEvent> {
    for await (const event of this) {
      void event;
    }
    if (!this.final) {
      throw new Error("Stream was cancelled before it was drained");
    }
    return this.final;
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        await this.cancel();
        return { done: true, value: undefined };
      },
    };
  }

  private isClosed(): boolean {
    return this.currentState === "drained" || this.currentState === "cancelled";
  }

  private settle(event: FinalEvent): void {
    this.final = event;
    this.currentState = "drained";
    for (const listener of this.listeners.splice(0)) {
      listener(event);
    }
  }
}

// Stream of a single final event
export function finalOnlyStream(content: string, reference: Reference): StageStream {
  let sent = false;
  return new StageStream({
    pull: async () => {
      if (sent) return null;
      sent = true;
      return { type: "final", content, reference };
    },
  });
}
