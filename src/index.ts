/**
 * Public API: sessions, backends, transcript stores, config.
 */

export * from "./session";
export * from "./adapters/llm";
export * from "./errors";
export { Transcript, createTurn, recordsToTurns } from "./memory/transcript";
export { MemoryTranscriptStore, FileTranscriptStore } from "./memory/store";
export type { FileTranscriptStoreOptions } from "./memory/store";
export type { Turn, TurnRole, TranscriptRecord, TranscriptStore } from "./memory/types";
export { loadConfig } from "./config";
export type { AppConfig } from "./config";
export { createLogger, logger } from "./logging";
export { getLastExchangeMetrics } from "./metrics";
export type { ExchangeMetrics } from "./metrics";
