/**
 * ChatSession: one conversation against one backend.
 *
 * Keeps the transcript, forwards it with the system instruction on every call, and
 * appends the reply. The backend is fixed at construction; send() and stream() look the
 * same whichever vendor sits behind it.
 *
 * One exchange at a time: a second send()/stream() while one is in flight is rejected.
 */

import type { Logger } from "pino";
import type { IChatBackend, CompletionRequest, StreamChunk, Usage } from "../adapters/llm/types";
import { BackendOverloadedError, BackendUnavailableError, InvalidStateError } from "../errors";
import { logger as defaultLogger, logBackendCall, logError, logRetry } from "../logging";
import { recordExchangeMetrics } from "../metrics";
import { Transcript } from "../memory/transcript";
import type { Turn, TranscriptStore } from "../memory/types";
import { DEFAULT_RETRY_OPTIONS, withRetry } from "./retry";
import type { RetryOptions } from "./retry";
import { ReplyStream } from "./reply-stream";
import type { StreamControl, StreamOutcome } from "./reply-stream";

/** What happens to the user turn when an exchange fails. */
export type FailurePolicy = "rollback" | "keep";

/** What happens to streamed text when the consumer stops early. */
export type CancelPolicy = "discard" | "commit";

export const DEFAULT_MAX_TOKENS = 1024;

export interface ChatSessionOptions {
  backend: IChatBackend;
  systemInstruction: string;
  /** Response-length cap sent on every call. */
  maxTokens?: number;
  /** Trim the transcript to this many turns after each exchange; 0 or unset keeps everything. */
  maxTurns?: number;
  retry?: Partial<RetryOptions>;
  onFailure?: FailurePolicy;
  /** Turns to start from (e.g. a restored transcript). */
  initialTurns?: readonly Turn[];
  logger?: Logger;
}

export interface StreamOptions {
  onCancel?: CancelPolicy;
}

interface OpenedStream {
  iterator: AsyncIterator<StreamChunk>;
  /** Chunks read while waiting for the first text fragment. */
  head: StreamChunk[];
  done: boolean;
}

/** Pull chunks until the first text fragment arrives, so a failure before it can still be retried. */
async function openStream(backend: IChatBackend, request: CompletionRequest): Promise<OpenedStream> {
  const iterator = backend.stream(request)[Symbol.asyncIterator]();
  const head: StreamChunk[] = [];
  for (;;) {
    const r = await iterator.next();
    if (r.done) return { iterator, head, done: true };
    head.push(r.value);
    if (r.value.type === "delta") return { iterator, head, done: false };
  }
}

function addUsage(a: Usage, b: Usage | undefined): Usage {
  if (!b) return a;
  return { inputTokens: a.inputTokens + b.inputTokens, outputTokens: a.outputTokens + b.outputTokens };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class ChatSession {
  readonly backend: IChatBackend;
  readonly systemInstruction: string;
  private readonly transcript: Transcript;
  private readonly maxTokens: number;
  private readonly maxTurns: number;
  private readonly retryOptions: Partial<RetryOptions>;
  private readonly onFailure: FailurePolicy;
  private readonly log: Logger;
  private totals: Usage = { inputTokens: 0, outputTokens: 0 };
  private busy = false;

  constructor(private readonly options: ChatSessionOptions) {
    if (options.maxTokens !== undefined && (!Number.isInteger(options.maxTokens) || options.maxTokens < 1)) {
      throw new InvalidStateError(`maxTokens must be a positive integer, got ${options.maxTokens}`);
    }
    if (options.maxTurns !== undefined && (!Number.isInteger(options.maxTurns) || options.maxTurns < 0)) {
      throw new InvalidStateError(`maxTurns must be a non-negative integer, got ${options.maxTurns}`);
    }
    this.backend = options.backend;
    this.systemInstruction = options.systemInstruction;
    this.transcript = new Transcript(options.initialTurns);
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxTurns = options.maxTurns ?? 0;
    this.retryOptions = options.retry ?? {};
    this.onFailure = options.onFailure ?? "rollback";
    this.log = (options.logger ?? defaultLogger).child({ backend: options.backend.kind, model: options.backend.model });
  }

  /** Send one user message and resolve with the assistant's reply. */
  async send(userText: string): Promise<string> {
    this.assertInput(userText);
    this.assertIdle();
    this.busy = true;
    const started = Date.now();
    const userTurn = this.transcript.append("user", userText);
    const request = this.buildRequest();
    let attempts = 0;
    try {
      const { value, attempts: used } = await withRetry(
        this.backend.kind,
        (attempt) => {
          attempts = attempt;
          return this.backend.complete(request);
        },
        this.retryPolicy()
      );
      this.commitExchange(value.text, value.usage);
      const durationMs = Date.now() - started;
      logBackendCall(this.log, {
        backend: this.backend.kind,
        model: this.backend.model,
        messageCount: request.messages.length,
        responseLength: value.text.length,
        durationMs,
        attempts: used,
        streamed: false,
      });
      recordExchangeMetrics({
        backend: this.backend.kind,
        model: this.backend.model,
        latencyMs: durationMs,
        attempts: used,
        usage: value.usage,
        outcome: "ok",
      });
      return value.text;
    } catch (err) {
      this.failExchange(userTurn, err, attempts, started);
      throw err;
    } finally {
      this.busy = false;
    }
  }

  /**
   * Stream the reply as text fragments. Input is checked now; the request goes out when
   * iteration starts. The assistant turn is appended once the stream is exhausted.
   */
  stream(userText: string, options: StreamOptions = {}): ReplyStream {
    this.assertInput(userText);
    this.assertIdle();
    const onCancel = options.onCancel ?? "discard";
    return new ReplyStream((control) => this.runStream(userText, onCancel, control));
  }

  /** Drop oldest turns until at most `maxTurns` remain. Returns how many were removed. */
  trim(maxTurns: number): number {
    this.assertIdle();
    return this.transcript.trim(maxTurns);
  }

  getTranscript(): readonly Turn[] {
    return this.transcript.getTurns();
  }

  /** Token totals across completed exchanges. */
  usage(): Usage {
    return { ...this.totals };
  }

  clear(): void {
    this.assertIdle();
    this.transcript.clear();
    this.totals = { inputTokens: 0, outputTokens: 0 };
  }

  /** New session with a copy of this transcript and the same options, against another backend. */
  fork(backend: IChatBackend): ChatSession {
    this.assertIdle();
    return new ChatSession({ ...this.options, backend, initialTurns: this.transcript.getTurns() });
  }

  async save(store: TranscriptStore, id: string): Promise<void> {
    this.assertIdle();
    await store.save(id, this.transcript.toRecords());
    this.log.info({ event: "TRANSCRIPT_SAVE", id, turns: this.transcript.length }, "Transcript saved");
  }

  /** Replace the transcript with the one stored under `id`. Resolves false when none exists. */
  async load(store: TranscriptStore, id: string): Promise<boolean> {
    this.assertIdle();
    const records = await store.load(id);
    if (!records) return false;
    const restored = Transcript.fromRecords(records);
    this.transcript.clear();
    for (const turn of restored.getTurns()) this.transcript.append(turn.role, turn.text);
    this.log.info({ event: "TRANSCRIPT_LOAD", id, turns: restored.length }, "Transcript loaded");
    return true;
  }

  static async restore(store: TranscriptStore, id: string, options: ChatSessionOptions): Promise<ChatSession | null> {
    const records = await store.load(id);
    if (!records) return null;
    return new ChatSession({ ...options, initialTurns: Transcript.fromRecords(records).getTurns() });
  }

  private async *runStream(
    userText: string,
    onCancel: CancelPolicy,
    control: StreamControl
  ): AsyncGenerator<string, void, undefined> {
    try {
      this.assertIdle();
    } catch (err) {
      control.settle({ status: "failed", error: err });
      throw err;
    }
    this.busy = true;
    const { signal } = control;
    const started = Date.now();
    const userTurn = this.transcript.append("user", userText);
    const request = this.buildRequest(signal);
    const parts: string[] = [];
    let usage: Usage | undefined;
    let attempts = 0;
    let firstFragmentMs: number | undefined;
    let source: AsyncIterator<StreamChunk> | undefined;
    let finished = false;

    const take = (chunk: StreamChunk): string | null => {
      if (chunk.type === "usage") {
        usage = chunk.usage;
        return null;
      }
      if (firstFragmentMs === undefined) firstFragmentMs = Date.now() - started;
      parts.push(chunk.text);
      return chunk.text;
    };

    try {
      const { value: opened } = await withRetry(
        this.backend.kind,
        (attempt) => {
          if (signal.aborted) throw new InvalidStateError("Reply stream was cancelled");
          attempts = attempt;
          return openStream(this.backend, request);
        },
        this.retryPolicy()
      );
      source = opened.iterator;
      for (const chunk of opened.head) {
        const fragment = take(chunk);
        if (fragment === null) continue;
        yield fragment;
        if (signal.aborted) return;
      }
      if (!opened.done) {
        for (;;) {
          let r: IteratorResult<StreamChunk>;
          try {
            r = await source.next();
          } catch (err) {
            // Fragments already reached the caller; a retry would duplicate them.
            throw err instanceof BackendOverloadedError ? new BackendUnavailableError(this.backend.kind, attempts, err) : err;
          }
          if (r.done) break;
          const fragment = take(r.value);
          if (fragment === null) continue;
          yield fragment;
          if (signal.aborted) return;
        }
      }
      // Both SDKs end a stream quietly when its request is aborted.
      if (signal.aborted) return;
      const text = parts.join("");
      this.commitExchange(text, usage);
      finished = true;
      const durationMs = Date.now() - started;
      logBackendCall(this.log, {
        backend: this.backend.kind,
        model: this.backend.model,
        messageCount: request.messages.length,
        responseLength: text.length,
        durationMs,
        attempts,
        streamed: true,
      });
      recordExchangeMetrics({
        backend: this.backend.kind,
        model: this.backend.model,
        latencyMs: durationMs,
        firstFragmentMs,
        attempts,
        usage,
        outcome: "ok",
      });
      control.settle({ status: "completed", text });
    } catch (err) {
      finished = true;
      if (signal.aborted) {
        control.settle(this.cancelExchange(userTurn, parts.join(""), usage, onCancel, attempts, started));
        return;
      }
      this.failExchange(userTurn, err, attempts, started);
      control.settle({ status: "failed", error: err });
      throw err;
    } finally {
      if (!finished) {
        control.settle(this.cancelExchange(userTurn, parts.join(""), usage, onCancel, attempts, started));
        await source?.return?.();
      }
      this.busy = false;
    }
  }

  private buildRequest(signal?: AbortSignal): CompletionRequest {
    return {
      system: this.systemInstruction,
      messages: this.transcript.getTurns().map((t) => ({ role: t.role, content: t.text })),
      maxTokens: this.maxTokens,
      signal,
    };
  }

  private retryPolicy(): RetryOptions {
    return {
      ...DEFAULT_RETRY_OPTIONS,
      ...this.retryOptions,
      onRetry: (attempt, delayMs, err) => {
        logRetry(this.log, this.backend.kind, attempt, delayMs, err);
        this.retryOptions.onRetry?.(attempt, delayMs, err);
      },
    };
  }

  private commitExchange(text: string, usage: Usage | undefined): void {
    this.transcript.append("assistant", text);
    this.totals = addUsage(this.totals, usage);
    if (this.maxTurns > 0) this.autoTrim();
  }

  /** Trim to maxTurns, then keep the transcript starting on a user turn. */
  private autoTrim(): void {
    let removed = this.transcript.trim(this.maxTurns);
    if (this.transcript.first()?.role === "assistant") {
      removed += this.transcript.trim(this.transcript.length - 1);
    }
    if (removed > 0) {
      this.log.debug({ event: "TRANSCRIPT_TRIM", removed, remaining: this.transcript.length }, "Transcript trimmed");
    }
  }

  private failExchange(userTurn: Turn, err: unknown, attempts: number, started: number): void {
    if (this.onFailure === "rollback") this.transcript.removeLast(userTurn);
    logError(this.log, toError(err), { event: "EXCHANGE_FAILED", attempts, policy: this.onFailure });
    recordExchangeMetrics({
      backend: this.backend.kind,
      model: this.backend.model,
      latencyMs: Date.now() - started,
      attempts,
      outcome: "failed",
    });
  }

  private cancelExchange(
    userTurn: Turn,
    partial: string,
    usage: Usage | undefined,
    policy: CancelPolicy,
    attempts: number,
    started: number
  ): StreamOutcome {
    const commit = policy === "commit" && partial.length > 0;
    if (commit) {
      this.commitExchange(partial, usage);
    } else {
      this.transcript.removeLast(userTurn);
    }
    this.log.info({ event: "STREAM_CANCELLED", committed: commit, partialLength: partial.length }, "Stream cancelled");
    recordExchangeMetrics({
      backend: this.backend.kind,
      model: this.backend.model,
      latencyMs: Date.now() - started,
      attempts,
      outcome: "cancelled",
    });
    return { status: "cancelled", committed: commit, text: partial };
  }

  private assertInput(userText: string): void {
    if (typeof userText !== "string" || userText.trim() === "") {
      throw new InvalidStateError("Message must be a non-empty string");
    }
  }

  private assertIdle(): void {
    if (this.busy) throw new InvalidStateError("exchange already in progress");
  }
}
