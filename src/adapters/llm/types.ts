/**
 * Chat backend types.
 * Each backend is a strategy chosen when the session is built; the session never branches on vendor.
 */

export type BackendKind = "openai" | "anthropic" | "stub";

export interface Message {
  role: "user" | "assistant";
  content: string;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionRequest {
  /** Standing instruction; each backend decides how it travels on the wire. */
  system: string;
  /** Full conversation, oldest first. */
  messages: Message[];
  /** Response-length cap (mandatory for Anthropic, forwarded to OpenAI as well). */
  maxTokens: number;
  signal?: AbortSignal;
}

export interface CompletionResult {
  text: string;
  usage?: Usage;
  stopReason?: string;
}

export type StreamChunk =
  | { type: "delta"; text: string }
  | { type: "usage"; usage: Usage };

/**
 * Backend interface: transcript in, assistant reply out.
 * Implementations map transient vendor failures to BackendOverloadedError and rethrow everything else.
 */
export interface IChatBackend {
  readonly kind: BackendKind;
  readonly model: string;

  complete(request: CompletionRequest): Promise<CompletionResult>;

  /** Lazy: nothing is sent until iteration starts. */
  stream(request: CompletionRequest): AsyncIterable<StreamChunk>;
}
