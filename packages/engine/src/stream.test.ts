import test from "node:test";
import assert from "node:assert/strict";
import type { StreamEvent } from "@weft/types";
import { StageStream, finalOnlyStream, type StreamSource } from "./stream.js";

function scripted(events: StreamEvent[]): StreamSource & { closed: boolean } {
  const queue = [...events];
  return {
    closed: false,
    async pull() {
      return queue.shift() ?? null;
    },
    async close() {
      this.closed = true;
    },
  };
}

test("draining settles the final event and notifies listeners once", async () => {
  const stream = new StageStream(
    scripted([
      { type: "partial", content: "Hel" },
      { type: "partial", content: "Hello" },
      { type: "final", content: "Hello!", reference: [] },
    ])
  );
  const seen: string[] = [];
  stream.onDrained((final) => seen.push(final.content));

  assert.equal(stream.state, "pending");
  const first = await stream.next();
  assert.deepEqual(first, { done: false, value: { type: "partial", content: "Hel" } });
  assert.equal(stream.state, "streaming");
  assert.equal(stream.finalEvent, null);

  const final = await stream.drain();
  assert.deepEqual(final, { type: "final", content: "Hello!", reference: [] });
  assert.equal(stream.state, "drained");
  assert.deepEqual(seen, ["Hello!"]);

  stream.onDrained((late) => seen.push(`late:${late.content}`));
  assert.deepEqual(seen, ["Hello!", "late:Hello!"]);
  assert.deepEqual(await stream.next(), { done: true, value: undefined });
});

test("a source that ends without a final event yields one from the latest content", async () => {
  const stream = new StageStream(scripted([{ type: "partial", content: "partial answer" }]));
  const final = await stream.drain();
  assert.deepEqual(final, { type: "final", content: "partial answer", reference: [] });
});

test("cancel closes the source and never commits a final event", async () => {
  const source = scripted([
    { type: "partial", content: "a" },
    { type: "final", content: "ab", reference: [] },
  ]);
  const stream = new StageStream(source);
  let drained = false;
  stream.onDrained(() => {
    drained = true;
  });

  await stream.next();
  await stream.cancel();

  assert.equal(stream.state, "cancelled");
  assert.equal(source.closed, true);
  assert.equal(stream.finalEvent, null);
  assert.equal(stream.latestContent, "a");
  assert.deepEqual(await stream.next(), { done: true, value: undefined });
  assert.equal(drained, false);
  await assert.rejects(stream.drain(), /cancelled before it was drained/);
});

test("breaking out of for-await cancels the stream", async () => {
  const stream = new StageStream(
    scripted([
      { type: "partial", content: "x" },
      { type: "partial", content: "xy" },
    ])
  );
  for await (const event of stream) {
    assert.equal(event.content, "x");
    break;
  }
  assert.equal(stream.state, "cancelled");
});

test("a failing pull cancels the stream and rethrows", async () => {
  const stream = new StageStream({
    async pull() {
      throw new Error("backend down");
    },
  });
  await assert.rejects(stream.next(), /backend down/);
  assert.equal(stream.state, "cancelled");
});

test("finalOnlyStream yields exactly one final event", async () => {
  const events: StreamEvent[] = [];
  for await (const event of finalOnlyStream("done", [])) {
    events.push(event);
  }
  assert.deepEqual(events, [{ type: "final", content: "done", reference: [] }]);
});
