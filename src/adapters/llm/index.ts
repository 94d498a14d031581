/**
 * Backend factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { BackendKind, IChatBackend } from "./types";
import { StubBackend } from "./stub";
import { OpenAIBackend } from "./openai";
import { AnthropicBackend } from "./anthropic";
import { logger } from "../../logging";

export type {
  BackendKind,
  IChatBackend,
  Message,
  Usage,
  CompletionRequest,
  CompletionResult,
  StreamChunk,
} from "./types";
export { StubBackend, splitFragments } from "./stub";
export type { StubReply, StubBackendConfig } from "./stub";
export { OpenAIBackend } from "./openai";
export type { OpenAITransport, OpenAIBackendConfig, OpenAIReply, OpenAIReplyChunk } from "./openai";
export { AnthropicBackend } from "./anthropic";
export type { AnthropicTransport, AnthropicBackendConfig, AnthropicReply, AnthropicStreamEvent } from "./anthropic";

/** Build a specific backend; falls back to the stub when its API key is missing. */
export function createBackendFor(kind: BackendKind, config: AppConfig): IChatBackend {
  const { openaiApiKey, openaiModel, anthropicApiKey, anthropicModel, requestTimeoutMs } = config.backend;
  if (kind === "openai" && openaiApiKey) {
    return new OpenAIBackend({ apiKey: openaiApiKey, model: openaiModel, timeoutMs: requestTimeoutMs });
  }
  if (kind === "anthropic" && anthropicApiKey) {
    return new AnthropicBackend({ apiKey: anthropicApiKey, model: anthropicModel, timeoutMs: requestTimeoutMs });
  }
  if (kind !== "stub") {
    logger.warn({ event: "BACKEND_FALLBACK", requested: kind }, "No API key for backend; using stub");
  }
  return new StubBackend();
}

export function createBackend(config: AppConfig): IChatBackend {
  return createBackendFor(config.backend.provider, config);
}
