/**
 * Error taxonomy for chat sessions and backends.
 * Every error carries a `code` so callers can switch without instanceof chains.
 */

import type { BackendKind } from "../adapters/llm/types";

export type ChatErrorCode = "INVALID_STATE" | "BACKEND_OVERLOADED" | "BACKEND_UNAVAILABLE" | "CONFIG";

export abstract class ChatError extends Error {
  abstract readonly code: ChatErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed caller input, or a session/stream used out of order. */
export class InvalidStateError extends ChatError {
  readonly code = "INVALID_STATE";
}

/** Transient backend failure (rate limit, overload, dropped connection). Retryable. */
export class BackendOverloadedError extends ChatError {
  readonly code = "BACKEND_OVERLOADED";
  readonly backend: BackendKind;
  readonly status?: number;

  constructor(backend: BackendKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.backend = backend;
    this.status = options?.status;
  }
}

/** Backend still failing after the retry budget ran out. `cause` is the last attempt's error. */
export class BackendUnavailableError extends ChatError {
  readonly code = "BACKEND_UNAVAILABLE";
  readonly backend: BackendKind;
  readonly attempts: number;

  constructor(backend: BackendKind, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${backend} backend unavailable after ${attempts} attempt(s): ${reason}`, { cause });
    this.backend = backend;
    this.attempts = attempts;
  }
}

export class ConfigError extends ChatError {
  readonly code = "CONFIG";
}

/** HTTP statuses both vendors use for transient conditions (529 = Anthropic "overloaded"). */
const TRANSIENT_STATUS_CODES = new Set([408, 409, 429, 500, 502, 503, 504, 529]);

export function isTransientStatus(status: number | undefined): boolean {
  return status !== undefined && TRANSIENT_STATUS_CODES.has(status);
}

export function isChatError(err: unknown): err is ChatError {
  return err instanceof ChatError;
}
