// ──────────────────────────────────────────────
// Weft - Environment Configuration Helper
// ──────────────────────────────────────────────

import type { LLMProviderType } from "@weft/types";
import { LLM_PROVIDERS, DEFAULT_LLM_OPTIONS, DEFAULT_MAX_RENDERED_CHARS } from "@weft/types";
import { ConfigurationError } from "./errors.js";

export function getEnvOrThrow(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  tenantId: string;

  llm: {
    provider: LLMProviderType;
    model: string | undefined;
    apiKey: string;
    maxLength: number;
    timeoutMs: number;
  };

  embedding: {
    model: string;
  };

  retrieval: {
    tavilyApiKey: string;
    maxRenderedChars: number;
  };
}

export function loadConfig(): AppConfig {
  return {
    nodeEnv: getEnvOrDefault("NODE_ENV", "development"),
    logLevel: getEnvOrDefault("LOG_LEVEL", "info"),
    tenantId: getEnvOrDefault("WEFT_TENANT_ID", "default"),

    llm: {
      provider: parseProvider(getEnvOrDefault("LLM_PROVIDER", "groq")),
      model: process.env["LLM_MODEL"] || undefined,
      apiKey: getEnvOrDefault("LLM_API_KEY", ""),
      maxLength: getEnvAsNumber("LLM_MAX_LENGTH", DEFAULT_LLM_OPTIONS.maxLength),
      timeoutMs: getEnvAsNumber("LLM_TIMEOUT_MS", DEFAULT_LLM_OPTIONS.timeoutMs),
    },

    embedding: {
      model: getEnvOrDefault("EMBEDDING_MODEL", "deterministic-64"),
    },

    retrieval: {
      tavilyApiKey: getEnvOrDefault("TAVILY_API_KEY", ""),
      maxRenderedChars: getEnvAsNumber("RETRIEVAL_MAX_RENDERED_CHARS", DEFAULT_MAX_RENDERED_CHARS),
    },
  };
}

function parseProvider(value: string): LLMProviderType {
  const match = LLM_PROVIDERS.find((provider) => provider === value);
  if (!match) {
    throw new ConfigurationError(
      `Invalid LLM_PROVIDER "${value}". Valid: ${LLM_PROVIDERS.join(", ")}`
    );
  }
  return match;
}
