import test from "node:test";
import assert from "node:assert/strict";
import { safeJsonParse, sanitizeErrorMessage, stripReasoning, truncateString } from "./helpers.js";
import { cosineSimilarity, estimateTokens, keywordOverlap, tokenize } from "./knowledge.js";

test("stripReasoning drops everything through the last closing think tag", () => {
  assert.equal(stripReasoning("<think>a</think>mid</think>Answer"), "Answer");
  assert.equal(stripReasoning("No reasoning"), "No reasoning");
});

test("truncateString keeps the limit including the ellipsis", () => {
  assert.equal(truncateString("abcdefghij", 8), "abcde...");
  assert.equal(truncateString("short", 8), "short");
});

test("sanitizeErrorMessage redacts keys and bearer tokens", () => {
  assert.equal(
    sanitizeErrorMessage(new Error("failed for key=abcdefghijklmnopqrstuvwxyz")),
    "failed for key=[REDACTED]"
  );
  assert.equal(sanitizeErrorMessage(new Error("Bearer test-secret rejected")), "Bearer [REDACTED] rejected");
  assert.equal(sanitizeErrorMessage("not an error"), "An unexpected error occurred");
});

test("safeJsonParse reports failures instead of throwing", () => {
  assert.deepEqual(safeJsonParse('{"a":1}'), { success: true, data: { a: 1 } });
  assert.equal(safeJsonParse("{").success, false);
});

test("token helpers estimate and compare text", () => {
  assert.equal(estimateTokens("abcde"), 2);
  assert.deepEqual(tokenize("Paris, the capital!"), ["paris", "the", "capital"]);
  assert.equal(keywordOverlap("capital of France", "Paris is the capital of France"), 1);
  assert.equal(cosineSimilarity([1, 0], [1, 0]), 1);
  assert.equal(cosineSimilarity([1, 0], [0, 1]), 0);
  assert.equal(cosineSimilarity([1], [1, 2]), 0);
});
