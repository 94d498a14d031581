/**
 * Anthropic Messages backend.
 * The system instruction goes in the dedicated `system` field; `max_tokens` is mandatory.
 */

import Anthropic from "@anthropic-ai/sdk";
import { BackendOverloadedError, isTransientStatus } from "../../errors";
import type { IChatBackend, CompletionRequest, CompletionResult, StreamChunk } from "./types";

type NonStreamingBody = Anthropic.Messages.MessageCreateParamsNonStreaming;
type StreamingBody = Anthropic.Messages.MessageCreateParamsStreaming;

/** The parts of a Messages API response this backend reads. */
export interface AnthropicReply {
  content: Array<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/** The stream events this backend reads; anything else passes through untouched. */
export type AnthropicStreamEvent =
  | { type: "message_start"; message: { usage: { input_tokens: number; output_tokens: number } } }
  | { type: "content_block_delta"; delta: { type: string; text?: string } }
  | { type: "message_delta"; usage: { output_tokens: number } }
  | { type: "content_block_start" | "content_block_stop" | "message_stop" };

/** The two SDK calls this backend makes. Swappable so tests never touch the network. */
export interface AnthropicTransport {
  create(body: NonStreamingBody, signal?: AbortSignal): Promise<AnthropicReply>;
  createStream(body: StreamingBody, signal?: AbortSignal): Promise<AsyncIterable<AnthropicStreamEvent>>;
}

export interface AnthropicBackendConfig {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

export function createAnthropicTransport(cfg: AnthropicBackendConfig): AnthropicTransport {
  const client = new Anthropic({ apiKey: cfg.apiKey, maxRetries: 0, timeout: cfg.timeoutMs });
  return {
    create: (body, signal) => client.messages.create(body, { signal }),
    createStream: (body, signal) => client.messages.create(body, { signal }),
  };
}

function toBackendError(err: unknown): unknown {
  if (err instanceof Anthropic.APIConnectionError) {
    return new BackendOverloadedError("anthropic", err.message, { cause: err });
  }
  if (err instanceof Anthropic.APIError && isTransientStatus(err.status)) {
    return new BackendOverloadedError("anthropic", err.message, { status: err.status, cause: err });
  }
  return err;
}

export class AnthropicBackend implements IChatBackend {
  readonly kind = "anthropic";
  readonly model: string;
  private readonly transport: AnthropicTransport;

  constructor(cfg: AnthropicBackendConfig, transport?: AnthropicTransport) {
    this.model = cfg.model;
    this.transport = transport ?? createAnthropicTransport(cfg);
  }

  /** Messages API conversations open on a user turn; leading assistant turns (left by a trim) are dropped. */
  buildMessages(request: CompletionRequest): Anthropic.Messages.MessageParam[] {
    const start = request.messages.findIndex((m) => m.role === "user");
    const messages = start === -1 ? [] : request.messages.slice(start);
    return messages.map((m) => ({ role: m.role, content: m.content }));
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    let response: AnthropicReply;
    try {
      response = await this.transport.create(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          system: request.system || undefined,
          messages: this.buildMessages(request),
        },
        request.signal
      );
    } catch (err) {
      throw toBackendError(err);
    }
    const text = response.content
      .map((block) => (block.type === "text" ? block.text ?? "" : ""))
      .join("");
    return {
      text,
      usage: { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
      stopReason: response.stop_reason ?? undefined,
    };
  }

  async *stream(request: CompletionRequest): AsyncGenerator<StreamChunk> {
    let inputTokens: number | undefined;
    let outputTokens: number | undefined;
    try {
      const events = await this.transport.createStream(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          system: request.system || undefined,
          messages: this.buildMessages(request),
          stream: true,
        },
        request.signal
      );
      for await (const event of events) {
        if (event.type === "message_start") {
          inputTokens = event.message.usage.input_tokens;
          outputTokens = event.message.usage.output_tokens;
        } else if (event.type === "content_block_delta" && event.delta.type === "text_delta" && event.delta.text) {
          yield { type: "delta", text: event.delta.text };
        } else if (event.type === "message_delta") {
          outputTokens = event.usage.output_tokens;
        }
      }
    } catch (err) {
      throw toBackendError(err);
    }
    if (inputTokens !== undefined || outputTokens !== undefined) {
      yield { type: "usage", usage: { inputTokens: inputTokens ?? 0, outputTokens: outputTokens ?? 0 } };
    }
  }
}
