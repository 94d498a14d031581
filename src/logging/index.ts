/**
 * Structured logging for chat sessions.
 * Logs backend calls, retries and errors with timestamps. JSON output for shipping.
 * Message text is never logged, only lengths.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info; silent under NODE_ENV=test)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";
import type { BackendKind } from "../adapters/llm/types";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? fallback;
}

const isTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL, isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true, destination: 2 } }),
    });
  } else {
    streams.push({ stream: pino.destination(2) });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log a completed backend call (summary only). */
export function logBackendCall(
  log: pino.Logger,
  info: {
    backend: BackendKind;
    model: string;
    messageCount: number;
    responseLength: number;
    durationMs: number;
    attempts: number;
    streamed: boolean;
  }
): void {
  log.info({ event: "BACKEND_CALL", ...info }, "Backend call completed");
}

/** Log a retry after a transient failure. */
export function logRetry(log: pino.Logger, backend: BackendKind, attempt: number, delayMs: number, err: Error): void {
  log.warn({ event: "BACKEND_RETRY", backend, attempt, delayMs: Math.round(delayMs), err: err.message }, "Retrying backend call");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, name: err.name, stack: err.stack, ...context }, "Error");
}
