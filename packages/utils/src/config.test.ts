import test, { afterEach } from "node:test";
import assert from "node:assert/strict";
import { getEnvAsNumber, getEnvOrThrow, loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

const KEYS = ["LLM_PROVIDER", "LLM_MODEL", "LLM_MAX_LENGTH", "TAVILY_API_KEY", "WEFT_TEST_VALUE"];
const saved = new Map(KEYS.map((key) => [key, process.env[key]]));

afterEach(() => {
  for (const [key, value] of saved) {
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

test("loadConfig applies defaults for unset variables", () => {
  for (const key of KEYS) delete process.env[key];

  const config = loadConfig();

  assert.equal(config.llm.provider, "groq");
  assert.equal(config.llm.model, undefined);
  assert.equal(config.llm.maxLength, 8192);
  assert.equal(config.llm.timeoutMs, 30000);
  assert.equal(config.retrieval.tavilyApiKey, "");
  assert.equal(config.retrieval.maxRenderedChars, 200000);
});

test("loadConfig reads provider, model and limits from the environment", () => {
  process.env["LLM_PROVIDER"] = "gemini";
  process.env["LLM_MODEL"] = "gemini-2.0-flash";
  process.env["LLM_MAX_LENGTH"] = "2048";

  const config = loadConfig();

  assert.equal(config.llm.provider, "gemini");
  assert.equal(config.llm.model, "gemini-2.0-flash");
  assert.equal(config.llm.maxLength, 2048);
});

test("an unknown provider is a configuration error", () => {
  process.env["LLM_PROVIDER"] = "openai";
  assert.throws(() => loadConfig(), (error: unknown) =>
    error instanceof ConfigurationError && error.message === 'Invalid LLM_PROVIDER "openai". Valid: gemini, groq'
  );
});

test("numeric and required variables are validated", () => {
  process.env["WEFT_TEST_VALUE"] = "many";
  assert.throws(() => getEnvAsNumber("WEFT_TEST_VALUE", 1), /must be a number, got: many/);

  delete process.env["WEFT_TEST_VALUE"];
  assert.equal(getEnvAsNumber("WEFT_TEST_VALUE", 7), 7);
  assert.throws(() => getEnvOrThrow("WEFT_TEST_VALUE"), ConfigurationError);
});
