/**
 * Unit tests for exponential backoff.
 */

import { withRetry, backoffDelay, DEFAULT_RETRY_OPTIONS } from "../../../src/session/retry";
import type { RetryOptions } from "../../../src/session/retry";
import { BackendOverloadedError, BackendUnavailableError } from "../../../src/errors";

function options(overrides: Partial<RetryOptions> = {}): RetryOptions {
  return { ...DEFAULT_RETRY_OPTIONS, sleep: async () => undefined, random: () => 0, ...overrides };
}

const overloaded = () => new BackendOverloadedError("stub", "busy", { status: 529 });

describe("backoffDelay", () => {
  it("doubles per retry and caps at maxDelayMs", () => {
    const opts = options({ baseDelayMs: 100, maxDelayMs: 1000 });
    expect([0, 1, 2, 3, 4].map((i) => backoffDelay(i, opts, () => 0))).toEqual([100, 200, 400, 800, 1000]);
  });

  it("adds at most `jitter` extra", () => {
    const opts = options({ baseDelayMs: 100, jitter: 0.5 });
    expect(backoffDelay(0, opts, () => 1)).toBe(150);
  });
});

describe("withRetry", () => {
  it("returns the success after two transient failures, in exactly three calls", async () => {
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(overloaded())
      .mockRejectedValueOnce(overloaded())
      .mockResolvedValueOnce("done");
    const result = await withRetry("stub", fn, options());
    expect(result).toEqual({ value: "done", attempts: 3 });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map((c) => c[0])).toEqual([1, 2, 3]);
  });

  it("waits with increasing delays between attempts", async () => {
    const waits: number[] = [];
    const onRetry = jest.fn();
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValueOnce(overloaded()).mockRejectedValueOnce(overloaded()).mockResolvedValueOnce("ok");
    await withRetry("stub", fn, options({ baseDelayMs: 10, sleep: async (ms) => void waits.push(ms), onRetry }));
    expect(waits).toEqual([10, 20]);
    expect(onRetry.mock.calls.map((c) => [c[0], c[1]])).toEqual([
      [1, 10],
      [2, 20],
    ]);
  });

  it("throws BackendUnavailableError once the budget is spent", async () => {
    const last = overloaded();
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValueOnce(overloaded()).mockRejectedValueOnce(last);
    const err = await withRetry("stub", fn, options({ maxRetries: 1 })).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendUnavailableError);
    expect(err).toMatchObject({ backend: "stub", attempts: 2, cause: last });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("propagates non-transient errors without retrying", async () => {
    const fatal = new Error("bad request");
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(fatal);
    await expect(withRetry("stub", fn, options())).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
