/**
 * OpenAI Chat Completions backend.
 * The system instruction travels as a synthetic leading "system" message.
 */

import OpenAI from "openai";
import { BackendOverloadedError, isTransientStatus } from "../../errors";
import type { IChatBackend, CompletionRequest, CompletionResult, StreamChunk, Usage } from "./types";

type NonStreamingBody = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
type StreamingBody = OpenAI.Chat.ChatCompletionCreateParamsStreaming;

interface CompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
}

/** The parts of a chat completion this backend reads. */
export interface OpenAIReply {
  choices: Array<{ message: { content: string | null }; finish_reason: string | null }>;
  usage?: CompletionUsage | null;
}

/** The parts of a streamed chunk this backend reads. */
export interface OpenAIReplyChunk {
  choices: Array<{ delta: { content?: string | null } }>;
  usage?: CompletionUsage | null;
}

/** The two SDK calls this backend makes. Swappable so tests never touch the network. */
export interface OpenAITransport {
  create(body: NonStreamingBody, signal?: AbortSignal): Promise<OpenAIReply>;
  createStream(body: StreamingBody, signal?: AbortSignal): Promise<AsyncIterable<OpenAIReplyChunk>>;
}

export interface OpenAIBackendConfig {
  apiKey: string;
  model: string;
  /** Per-request timeout passed to the SDK (ms). */
  timeoutMs?: number;
}

export function createOpenAITransport(cfg: OpenAIBackendConfig): OpenAITransport {
  // Retries belong to the session; the SDK's own loop would multiply attempts.
  const client = new OpenAI({ apiKey: cfg.apiKey, maxRetries: 0, timeout: cfg.timeoutMs });
  return {
    create: (body, signal) => client.chat.completions.create(body, { signal }),
    createStream: (body, signal) => client.chat.completions.create(body, { signal }),
  };
}

function toUsage(usage: CompletionUsage | null | undefined): Usage | undefined {
  if (!usage) return undefined;
  return { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens };
}

function toBackendError(err: unknown): unknown {
  if (err instanceof OpenAI.APIConnectionError) {
    return new BackendOverloadedError("openai", err.message, { cause: err });
  }
  if (err instanceof OpenAI.APIError && isTransientStatus(err.status)) {
    return new BackendOverloadedError("openai", err.message, { status: err.status, cause: err });
  }
  return err;
}

export class OpenAIBackend implements IChatBackend {
  readonly kind = "openai";
  readonly model: string;
  private readonly transport: OpenAITransport;

  constructor(cfg: OpenAIBackendConfig, transport?: OpenAITransport) {
    this.model = cfg.model;
    this.transport = transport ?? createOpenAITransport(cfg);
  }

  buildMessages(request: CompletionRequest): OpenAI.Chat.ChatCompletionMessageParam[] {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) messages.push({ role: "system", content: request.system });
    for (const m of request.messages) messages.push({ role: m.role, content: m.content });
    return messages;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    let response: OpenAIReply;
    try {
      response = await this.transport.create(
        {
          model: this.model,
          messages: this.buildMessages(request),
          max_tokens: request.maxTokens,
          stream: false,
        },
        request.signal
      );
    } catch (err) {
      throw toBackendError(err);
    }
    const choice = response.choices[0];
    return {
      text: choice?.message?.content ?? "",
      usage: toUsage(response.usage),
      stopReason: choice?.finish_reason ?? undefined,
    };
  }

  async *stream(request: CompletionRequest): AsyncGenerator<StreamChunk> {
    try {
      const chunks = await this.transport.createStream(
        {
          model: this.model,
          messages: this.buildMessages(request),
          max_tokens: request.maxTokens,
          stream: true,
          stream_options: { include_usage: true },
        },
        request.signal
      );
      for await (const chunk of chunks) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield { type: "delta", text: delta };
        const usage = toUsage(chunk.usage);
        if (usage) yield { type: "usage", usage };
      }
    } catch (err) {
      throw toBackendError(err);
    }
  }
}
