import test from "node:test";
import assert from "node:assert/strict";
import type { ChatMessage } from "@weft/types";
import { buildCandidateMessages, fitMessages, prepareMessages } from "./message-fit.js";

const chars = (text: string): number => text.length;

test("buildCandidateMessages drops a trailing assistant turn", () => {
  const messages = buildCandidateMessages("sys", [
    { role: "user", content: "q" },
    { role: "assistant", content: "a" },
  ]);
  assert.deepEqual(messages, [
    { role: "system", content: "sys" },
    { role: "user", content: "q" },
  ]);
});

test("buildCandidateMessages adds a default user turn to an empty history", () => {
  assert.deepEqual(buildCandidateMessages("sys", []), [
    { role: "system", content: "sys" },
    { role: "user", content: "Output: " },
  ]);
});

test("fitMessages keeps the newest messages that fit", () => {
  const messages: ChatMessage[] = [
    { role: "system", content: "S" },
    { role: "user", content: "aaaa" },
    { role: "assistant", content: "bbbb" },
    { role: "user", content: "cc" },
  ];

  assert.deepEqual(fitMessages(messages, 7, chars), [
    { role: "system", content: "S" },
    { role: "assistant", content: "bbbb" },
    { role: "user", content: "cc" },
  ]);
});

test("fitMessages always admits one message after the system prompt", () => {
  const long = "x".repeat(50);
  const fitted = fitMessages(
    [
      { role: "system", content: "S" },
      { role: "user", content: "earlier" },
      { role: "user", content: long },
    ],
    10,
    chars
  );
  assert.deepEqual(fitted, [
    { role: "system", content: "S" },
    { role: "user", content: long },
  ]);
});

test("prepareMessages splits out the system prompt", () => {
  assert.deepEqual(prepareMessages("sys", [], 100, "chars"), {
    systemPrompt: "sys",
    messages: [{ role: "user", content: "Output: " }],
  });
});

test("prepareMessages measures estimated tokens against 97% of the budget", () => {
  const prepared = prepareMessages(
    "sys",
    [
      { role: "user", content: "a".repeat(16) },
      { role: "assistant", content: "b".repeat(16) },
      { role: "user", content: "c".repeat(16) },
    ],
    10,
    "tokens"
  );

  // budget floor(9.7) = 9: system 1 + c 4 + b 4
  assert.deepEqual(prepared.messages, [
    { role: "assistant", content: "b".repeat(16) },
    { role: "user", content: "c".repeat(16) },
  ]);
});
