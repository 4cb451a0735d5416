import test from "node:test";
import assert from "node:assert/strict";
import { DeterministicEmbedder } from "./embedding.js";
import { HybridCitationInserter, splitSentences } from "./citation-inserter.js";

const chunks = ["Paris is the capital of France", "Berlin is in Germany"];

test("splitSentences keeps every character", () => {
  const text = "One. Two!\nThree";
  const pieces = splitSentences(text);
  assert.deepEqual(pieces, ["One.", " Two!", "\n", "Three"]);
  assert.equal(pieces.join(""), text);
});

test("markers go after the best-scoring sentence and indices follow first use", async () => {
  const inserter = new HybridCitationInserter(new DeterministicEmbedder());

  const result = await inserter.insertCitations(
    "Berlin is big. Paris is the capital of France. Berlin is in Germany.",
    chunks,
    [[], []],
    "deterministic-64",
    0.7,
    0.3
  );

  assert.equal(
    result.answer,
    "Berlin is big. [ID:1] Paris is the capital of France. [ID:0] Berlin is in Germany. [ID:1]"
  );
  assert.deepEqual(result.indices, [1, 0]);
});

test("sentences below the threshold stay unmarked", async () => {
  const inserter = new HybridCitationInserter(new DeterministicEmbedder());

  const result = await inserter.insertCitations("Tokyo has trains.", chunks, [], "other-model", 0.7, 0.3);

  assert.equal(result.answer, "Tokyo has trains.");
  assert.deepEqual(result.indices, []);
});

test("no chunks returns the answer untouched", async () => {
  const inserter = new HybridCitationInserter(new DeterministicEmbedder());
  const result = await inserter.insertCitations("Anything.", [], [], "deterministic-64", 0.7, 0.3);
  assert.deepEqual(result, { answer: "Anything.", indices: [] });
});
