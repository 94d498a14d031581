/**
 * ReplyStream: a lazy, single-use sequence of reply fragments.
 * The producer (the session) settles the outcome; text() waits for it.
 */

import { InvalidStateError } from "../errors";

export type StreamOutcome =
  | { status: "completed"; text: string }
  | { status: "cancelled"; committed: boolean; text: string }
  | { status: "failed"; error: unknown };

export interface StreamControl {
  /** Aborted once cancel() is called. */
  readonly signal: AbortSignal;
  settle(outcome: StreamOutcome): void;
}

export type FragmentProducer = (control: StreamControl) => AsyncGenerator<string, void, undefined>;

export class ReplyStream implements AsyncIterable<string> {
  private readonly controller = new AbortController();
  private iterator: AsyncGenerator<string, void, undefined> | null = null;
  private consumed = false;
  private outcome: StreamOutcome | null = null;
  private waiters: Array<(outcome: StreamOutcome) => void> = [];

  constructor(private readonly produce: FragmentProducer) {}

  /** Starts the exchange. A second call throws: the stream cannot be restarted. */
  [Symbol.asyncIterator](): AsyncIterator<string> {
    if (this.consumed) throw new InvalidStateError("Reply stream can only be iterated once");
    this.consumed = true;
    this.iterator = this.produce({
      signal: this.controller.signal,
      settle: (outcome) => this.settle(outcome),
    });
    return this.iterator;
  }

  /** Settled outcome, or null while the stream is pending or running. */
  getOutcome(): StreamOutcome | null {
    return this.outcome;
  }

  /**
   * Full reply text. Drains the stream if nobody has started iterating it.
   * Rejects with the failure, or with InvalidStateError when cancelled and discarded.
   * An iterator that was started by hand and then dropped without return() never settles,
   * and the session stays busy; call cancel() to settle it and release the session.
   */
  async text(): Promise<string> {
    if (!this.consumed) {
      const it = this[Symbol.asyncIterator]();
      let r = await it.next();
      while (!r.done) r = await it.next();
    }
    const outcome = this.outcome ?? (await new Promise<StreamOutcome>((resolve) => this.waiters.push(resolve)));
    if (outcome.status === "failed") throw outcome.error;
    if (outcome.status === "cancelled" && !outcome.committed) {
      throw new InvalidStateError("Reply stream was cancelled");
    }
    return outcome.text;
  }

  /** Stop the exchange. The session applies its cancel policy (discard or commit the partial text). */
  async cancel(): Promise<void> {
    if (this.outcome) return;
    this.controller.abort();
    if (this.iterator) await this.iterator.return(undefined);
    this.consumed = true;
    // Never started: nothing reached the transcript.
    if (!this.outcome) this.settle({ status: "cancelled", committed: false, text: "" });
  }

  private settle(outcome: StreamOutcome): void {
    if (this.outcome) return;
    this.outcome = outcome;
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve(outcome);
  }
}
