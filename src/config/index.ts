/**
 * Env-based configuration for chat sessions.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { ConfigError } from "../errors";
import type { BackendKind } from "../adapters/llm/types";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type Env = Record<string, string | undefined>;

const BACKEND_KINDS: readonly BackendKind[] = ["openai", "anthropic", "stub"];

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
export const DEFAULT_ANTHROPIC_MODEL = "claude-3-5-sonnet-20241022";
export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";

export interface AppConfig {
  /** Backend selection and credentials */
  backend: {
    provider: BackendKind;
    openaiApiKey?: string;
    openaiModel: string;
    anthropicApiKey?: string;
    anthropicModel: string;
    /** Per-request SDK timeout (ms). */
    requestTimeoutMs: number;
  };

  /** Session behaviour */
  session: {
    systemPrompt: string;
    /** Response-length cap sent on every call. */
    maxTokens: number;
    /** Auto-trim bound after each exchange; 0 keeps the whole transcript. */
    maxTurns: number;
    /** Stream replies in the CLI. */
    stream: boolean;
  };

  /** Retry policy for transient backend failures */
  retry: {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };

  /** Transcript persistence */
  storage: {
    transcriptDir: string;
  };
}

function getEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return defaultValue;
  return v.trim();
}

function getInt(env: Env, key: string, defaultValue: number, min = 0): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  const n = Number(v);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`Invalid ${key}: expected an integer >= ${min}, got "${v}"`);
  }
  return n;
}

function getProvider(env: Env): BackendKind {
  const v = (getEnv(env, "CHAT_PROVIDER") ?? "openai").toLowerCase();
  const kind = BACKEND_KINDS.find((k) => k === v);
  if (!kind) throw new ConfigError(`Invalid CHAT_PROVIDER "${v}" (expected ${BACKEND_KINDS.join(", ")})`);
  return kind;
}

/**
 * Build config from environment variables.
 * CHAT_PROVIDER selects the backend (openai, anthropic, stub).
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const stream = getEnv(env, "CHAT_STREAM");
  return {
    backend: {
      provider: getProvider(env),
      openaiApiKey: getEnv(env, "OPENAI_API_KEY"),
      openaiModel: getEnv(env, "OPENAI_MODEL_NAME", DEFAULT_OPENAI_MODEL) ?? DEFAULT_OPENAI_MODEL,
      anthropicApiKey: getEnv(env, "ANTHROPIC_API_KEY"),
      anthropicModel: getEnv(env, "ANTHROPIC_MODEL_NAME", DEFAULT_ANTHROPIC_MODEL) ?? DEFAULT_ANTHROPIC_MODEL,
      requestTimeoutMs: getInt(env, "CHAT_REQUEST_TIMEOUT_MS", 60_000, 1),
    },
    session: {
      systemPrompt: getEnv(env, "CHAT_SYSTEM_PROMPT", DEFAULT_SYSTEM_PROMPT) ?? DEFAULT_SYSTEM_PROMPT,
      maxTokens: getInt(env, "CHAT_MAX_TOKENS", 1024, 1),
      maxTurns: getInt(env, "CHAT_MAX_TURNS", 0),
      stream: stream === "1" || stream === "true",
    },
    retry: {
      maxRetries: getInt(env, "CHAT_MAX_RETRIES", 3),
      baseDelayMs: getInt(env, "CHAT_RETRY_BASE_MS", 500),
      maxDelayMs: getInt(env, "CHAT_RETRY_MAX_MS", 8000),
    },
    storage: {
      transcriptDir: getEnv(env, "TRANSCRIPT_DIR") ?? path.join(process.cwd(), "data", "transcripts"),
    },
  };
}
