import test from "node:test";
import assert from "node:assert/strict";
import type { StreamEvent } from "@weft/types";
import { ConfigurationError, StageOutputPendingError } from "@weft/utils";
import { Canvas } from "../execution-engine.js";
import { FakeChatBackend, FakeCitationBackend, FakeRetrievalSource, fakeServices } from "../testing/fakes.js";
import { WorkflowGraph } from "../workflow-graph.js";

function ragGraph(prompt: string, generateParams: Record<string, unknown> = {}): WorkflowGraph {
  const graph = new WorkflowGraph();
  graph.addNode("begin", "Begin", { query: [{ key: "topic", name: "Topic", value: "birds" }] });
  graph.addNode("answer", "Answer");
  graph.addNode("kb1", "Retrieval");
  graph.addNode("gen", "Generate", { llmId: "fake", prompt, ...generateParams });
  graph.connect("begin", "answer");
  graph.connect("answer", "kb1");
  graph.connect("kb1", "gen");
  graph.connect("gen", "answer");
  return graph;
}

function stage(canvas: Canvas, id: string) {
  const component = canvas.getComponent(id);
  assert.ok(component, `component ${id} should exist`);
  return component;
}

const CHUNKS = JSON.stringify([
  { content: "Paris is in France", docId: "d1", docName: "Doc 1" },
  { content: "Paris is large", docId: "d1", docName: "Doc 1" },
]);

test("empty retrieval short-circuits before any backend call", async () => {
  const chat = new FakeChatBackend({ responses: ["unused"] });
  const canvas = new Canvas(ragGraph("Answer using {kb1}"), { services: fakeServices(chat) });

  const result = await stage(canvas, "gen").run([], {});

  assert.deepEqual(result, {
    kind: "rows",
    rows: [{ content: "Nothing found in knowledgebase (mock response).", reference: [] }],
  });
  assert.equal(chat.calls.length, 0);
});

test("the configured empty response wins over the default message", async () => {
  const chat = new FakeChatBackend();
  const canvas = new Canvas(ragGraph("Answer using {kb1}"), { services: fakeServices(chat) });
  stage(canvas, "kb1").setOutput([{ content: "No docs", emptyResponse: "No docs" }]);

  const rows = stage(canvas, "gen").output();
  assert.deepEqual(rows, []);

  const result = await stage(canvas, "gen").run([], {});
  assert.deepEqual(result, { kind: "rows", rows: [{ content: "No docs", reference: [] }] });
  assert.equal(chat.calls.length, 0);
});

test("generation fills the prompt, strips reasoning and cites deduplicated documents", async () => {
  const chat = new FakeChatBackend({ responses: ["<think>hmm</think>Paris is in France."] });
  const citation = new FakeCitationBackend((answer) => ({
    answer: `${answer} [ID:0] [ID:1]`,
    indices: [0, 1, 7],
  }));
  const canvas = new Canvas(ragGraph("Answer using {kb1}", { maxTokens: 128, temperature: 0.5 }), {
    services: fakeServices(chat, { citation }),
    embeddingModel: "deterministic-64",
  });
  stage(canvas, "kb1").setOutput([{ content: "Relevant info", chunks: CHUNKS }]);

  const result = await stage(canvas, "gen").run([], {});

  assert.deepEqual(result, {
    kind: "rows",
    rows: [
      {
        content: "Paris is in France. [ID:0] [ID:1]",
        reference: {
          chunks: [
            { content: "Paris is in France", docId: "d1", docName: "Doc 1" },
            { content: "Paris is large", docId: "d1", docName: "Doc 1" },
          ],
          docAggs: [{ docId: "d1", docName: "Doc 1" }],
        },
      },
    ],
  });

  assert.deepEqual(chat.calls[0], {
    systemPrompt: "Answer using   - Relevant info",
    messages: [{ role: "user", content: "Output: " }],
    config: { maxTokens: 128, temperature: 0.5 },
    streaming: false,
  });
  assert.deepEqual(citation.calls[0], {
    answer: "Paris is in France.",
    chunkContents: ["Paris is in France", "Paris is large"],
    chunkVectors: [[], []],
    embeddingModel: "deterministic-64",
    keywordWeight: 0.7,
    vectorWeight: 0.3,
  });
  assert.deepEqual(canvas.getComponentInfo("gen"), {
    prompt: "Answer using   - Relevant info",
    messages: [{ role: "user", content: "Output: " }],
    config: { maxTokens: 128, temperature: 0.5 },
  });
});

test("chunk vectors from retrieval reach the citation backend", async () => {
  const chat = new FakeChatBackend({ responses: ["Paris is in France."] });
  const citation = new FakeCitationBackend((answer) => ({ answer: `${answer} [ID:0]`, indices: [0] }));
  const web = new FakeRetrievalSource("web", {
    chunks: [
      { content: "Paris is in France", docId: "d1", docName: "Doc 1", vector: [1, 0, 0] },
      { content: "Paris is large", docId: "d2", docName: "Doc 2" },
    ],
    docAggs: [],
  });
  const graph = ragGraph("Answer using {kb1}");
  graph.setParameters("kb1", { tavilyApiKey: "test-secret" });
  const canvas = new Canvas(graph, {
    services: fakeServices(chat, { citation, createWebSearch: () => web }),
  });
  stage(canvas, "answer").setOutput([{ content: "USER: where is Paris?" }]);

  await stage(canvas, "kb1").run([], {});
  const result = await stage(canvas, "gen").run([], {});

  assert.deepEqual(citation.calls[0]?.chunkVectors, [[1, 0, 0], []]);
  assert.deepEqual(result, {
    kind: "rows",
    rows: [
      {
        content: "Paris is in France. [ID:0]",
        reference: {
          chunks: [
            { content: "Paris is in France", docId: "d1", docName: "Doc 1" },
            { content: "Paris is large", docId: "d2", docName: "Doc 2" },
          ],
          docAggs: [{ docId: "d1", docName: "Doc 1" }],
        },
      },
    ],
  });
});

test("a failing citation backend falls back to the uncited answer", async () => {
  const chat = new FakeChatBackend({ responses: ["Plain answer"] });
  const citation = new FakeCitationBackend(undefined, new Error("citation down"));
  const canvas = new Canvas(ragGraph("Answer using {kb1}"), {
    services: fakeServices(chat, { citation }),
  });
  stage(canvas, "kb1").setOutput([{ content: "Relevant info", chunks: CHUNKS }]);

  const result = await stage(canvas, "gen").run([], {});
  assert.deepEqual(result, {
    kind: "rows",
    rows: [{ content: "Plain answer", reference: { chunks: [], docAggs: [] } }],
  });
});

test("answer placeholders read the latest history entry and {input} reads the upstream output", async () => {
  const chat = new FakeChatBackend({ responses: ["ok"] });
  const graph = ragGraph("Q={answer} I={input} M={kb1}");
  graph.history = [
    ["user", "hello"],
    ["assistant", "hi"],
    ["user", "why?"],
  ];
  const canvas = new Canvas(graph, { services: fakeServices(chat) });
  stage(canvas, "kb1").setOutput([{ content: "a $& b \\1" }]);

  await stage(canvas, "gen").run([], {});
  assert.equal(chat.calls[0]?.systemPrompt, "Q=why? I=  - a $& b \\1 M=  - a $& b \\1");
});

test("{input} resolves to empty text when the upstream output is blank", async () => {
  const chat = new FakeChatBackend({ responses: ["ok"] });
  const canvas = new Canvas(ragGraph("I=[{input}] Q=[{answer}]"), { services: fakeServices(chat) });
  stage(canvas, "kb1").setOutput([{ content: "  " }]);

  await stage(canvas, "gen").run([], {});
  assert.equal(chat.calls[0]?.systemPrompt, "I=[] Q=[]");
});

test("a failed generation clears the previous output", async () => {
  const chat = new FakeChatBackend({ failWith: new Error("backend down") });
  const canvas = new Canvas(ragGraph("Answer using {kb1}"), { services: fakeServices(chat) });
  stage(canvas, "kb1").setOutput([{ content: "Relevant info" }]);
  stage(canvas, "gen").setOutput([{ content: "stale answer" }]);

  await assert.rejects(stage(canvas, "gen").run([], {}), /backend down/);
  assert.deepEqual(stage(canvas, "gen").output(), []);
  assert.equal(stage(canvas, "gen").lastResult, null);
});

test("begin parameters resolve from the entry node", async () => {
  const chat = new FakeChatBackend({ responses: ["ok"] });
  const canvas = new Canvas(ragGraph("Topic: {begin@topic}. Missing: [{begin@mood}]"), {
    services: fakeServices(chat),
  });

  await stage(canvas, "gen").run([], {});
  assert.equal(chat.calls[0]?.systemPrompt, "Topic: birds. Missing: []");
});

test("streaming into a lone answer node yields accumulated partials then the final answer", async () => {
  const chat = new FakeChatBackend({ deltas: ["<think>x</think>Hel", "lo"] });
  const canvas = new Canvas(ragGraph("Answer using {kb1}"), { services: fakeServices(chat) });
  stage(canvas, "kb1").setOutput([{ content: "Some context" }]);
  const gen = stage(canvas, "gen");

  const result = await gen.run([], { stream: true });
  assert.equal(result.kind, "stream");
  if (result.kind !== "stream") return;

  assert.equal(chat.calls.length, 0);
  assert.throws(() => gen.output(false), StageOutputPendingError);

  const events: StreamEvent[] = [];
  for await (const event of result.stream) {
    events.push(event);
    if (event.type === "partial") {
      assert.deepEqual(gen.output(true), [{ content: event.content, reference: [] }]);
    }
  }

  assert.deepEqual(events, [
    { type: "partial", content: "Hel" },
    { type: "partial", content: "Hello" },
    { type: "final", content: "Hello", reference: [] },
  ]);
  assert.equal(chat.calls[0]?.streaming, true);
  assert.deepEqual(gen.output(false), [{ content: "Hello", reference: [] }]);
});

test("streaming with empty retrieval yields a single final event", async () => {
  const chat = new FakeChatBackend({ deltas: ["never"] });
  const canvas = new Canvas(ragGraph("Answer using {kb1}"), { services: fakeServices(chat) });

  const result = await stage(canvas, "gen").run([], { stream: true });
  assert.equal(result.kind, "stream");
  if (result.kind !== "stream") return;

  const events: StreamEvent[] = [];
  for await (const event of result.stream) {
    events.push(event);
  }
  assert.deepEqual(events, [
    { type: "final", content: "Nothing found in knowledgebase (mock response).", reference: [] },
  ]);
  assert.equal(chat.calls.length, 0);
});

test("stream requests fall back to a synchronous answer with several downstream nodes", async () => {
  const chat = new FakeChatBackend({ responses: ["sync"] });
  const graph = ragGraph("No placeholders here");
  graph.addNode("extra", "Answer");
  graph.connect("gen", "extra");
  const canvas = new Canvas(graph, { services: fakeServices(chat) });

  const result = await stage(canvas, "gen").run([], { stream: true });
  assert.deepEqual(result, { kind: "rows", rows: [{ content: "sync", reference: [] }] });
});

test("debug fills placeholders from configured inputs and kwargs", async () => {
  const chat = new FakeChatBackend({ responses: ["debugged"] });
  const canvas = new Canvas(
    ragGraph("Summarize {kb1} for {topic}", { debugInputs: [{ key: "kb1", value: "facts" }] }),
    { services: fakeServices(chat) }
  );

  const rows = await stage(canvas, "gen").debug({ topic: "cats" });

  assert.deepEqual(rows, [{ content: "debugged" }]);
  assert.deepEqual(chat.calls[0]?.messages, [{ role: "user", content: "Debug input: Output please." }]);
  assert.equal(chat.calls[0]?.systemPrompt, "Summarize facts for cats");
});

test("invalid generation settings fail at activation", () => {
  assert.throws(
    () =>
      new Canvas(ragGraph("x", { temperature: 2 }), {
        services: fakeServices(new FakeChatBackend()),
      }),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message === "[Generate] Temperature 2 not supported, should be a float number in range [0, 1]"
  );
  assert.throws(
    () => new Canvas(ragGraph("x", { llmId: "" }), { services: fakeServices(new FakeChatBackend()) }),
    /\[Generate\] LLM should not be empty/
  );
});
