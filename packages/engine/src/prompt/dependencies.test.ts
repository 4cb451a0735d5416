import test from "node:test";
import assert from "node:assert/strict";
import { USER_INPUT_ELEMENT_NAME } from "@weft/types";
import { extractDependencies, schedulingDependencies } from "./dependencies.js";

test("extractDependencies lists placeholders in first-occurrence order without repeats", () => {
  const elements = extractDependencies(
    "Use {Retrieval:kb} and {begin@lang}. Again {Retrieval:kb}, then {Generate:g1} for {user} on {input}."
  );

  assert.deepEqual(elements, [
    { kind: "literal", key: "user", name: USER_INPUT_ELEMENT_NAME },
    { kind: "node", key: "Retrieval:kb", name: "Retrieval:kb" },
    { kind: "begin-param", key: "begin@lang", entryNodeId: "begin", paramKey: "lang", name: "lang" },
    { kind: "node", key: "Generate:g1", name: "Generate:g1" },
  ]);
});

test("extractDependencies accepts plain node ids", () => {
  const keys = extractDependencies("Answer using {kb1} and {kb1}").map((element) => element.key);
  assert.deepEqual(keys, ["user", "kb1"]);
});

test("extractDependencies ignores text that is not a placeholder", () => {
  const keys = extractDependencies('Return JSON like {"a": 1} or { spaced }').map((element) => element.key);
  assert.deepEqual(keys, ["user"]);
});

test("schedulingDependencies skips answer and begin anchors", () => {
  const ids = schedulingDependencies(
    extractDependencies("{Answer:a1} {begin@topic} {Retrieval:kb} {Relevant:r1}")
  );
  assert.deepEqual(ids, ["Retrieval:kb", "Relevant:r1"]);
});
