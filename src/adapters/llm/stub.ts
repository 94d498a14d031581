/**
 * Stub backend for tests or when no provider key is configured.
 * Replays scripted replies in order, then echoes the last user message.
 */

import type { IChatBackend, CompletionRequest, CompletionResult, StreamChunk, Usage } from "./types";

/** A scripted reply: text, an error to throw, or text that breaks off mid-stream. */
export type StubReply = string | Error | { text: string; failAfterChunks: number; error: Error };

export interface StubBackendConfig {
  model?: string;
  replies?: StubReply[];
}

function countWords(s: string): number {
  const words = s.trim().split(/\s+/);
  return words[0] === "" ? 0 : words.length;
}

/** Split into word-sized fragments whose concatenation is the original text. */
export function splitFragments(text: string): string[] {
  return text.match(/\s*\S+\s*/g) ?? (text ? [text] : []);
}

export class StubBackend implements IChatBackend {
  readonly kind = "stub";
  readonly model: string;
  /** Every request received, in order. */
  readonly calls: CompletionRequest[] = [];
  private readonly script: StubReply[];

  constructor(cfg: StubBackendConfig = {}) {
    this.model = cfg.model ?? "stub";
    this.script = [...(cfg.replies ?? [])];
  }

  private next(request: CompletionRequest): StubReply {
    this.calls.push({ ...request, messages: request.messages.map((m) => ({ ...m })) });
    const scripted = this.script.shift();
    if (scripted !== undefined) return scripted;
    const lastUser = [...request.messages].reverse().find((m) => m.role === "user");
    return `echo: ${lastUser?.content ?? ""}`;
  }

  private usageFor(request: CompletionRequest, text: string): Usage {
    const input = request.messages.reduce((n, m) => n + countWords(m.content), countWords(request.system));
    return { inputTokens: input, outputTokens: countWords(text) };
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const reply = this.next(request);
    if (reply instanceof Error) throw reply;
    if (typeof reply !== "string") throw reply.error;
    return { text: reply, usage: this.usageFor(request, reply), stopReason: "end_turn" };
  }

  async *stream(request: CompletionRequest): AsyncGenerator<StreamChunk> {
    const reply = this.next(request);
    if (reply instanceof Error) throw reply;
    const text = typeof reply === "string" ? reply : reply.text;
    const fragments = splitFragments(text);
    for (let i = 0; i < fragments.length; i++) {
      if (typeof reply !== "string" && i === reply.failAfterChunks) throw reply.error;
      yield { type: "delta", text: fragments[i] };
    }
    if (typeof reply !== "string") throw reply.error;
    yield { type: "usage", usage: this.usageFor(request, text) };
  }
}
