export { ChatSession, DEFAULT_MAX_TOKENS } from "./chat-session";
export type { ChatSessionOptions, StreamOptions, FailurePolicy, CancelPolicy } from "./chat-session";
export { ReplyStream } from "./reply-stream";
export type { StreamOutcome } from "./reply-stream";
export { withRetry, backoffDelay, DEFAULT_RETRY_OPTIONS } from "./retry";
export type { RetryOptions, RetryResult } from "./retry";
export { compareBackends } from "./compare";
export type { ComparisonRow } from "./compare";
