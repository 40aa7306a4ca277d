import { describe, expect, it, vi } from "vitest";
import { RetryExhaustedError, TransportError } from "../src/errors.js";
import { computeBackoffMs, withRetry, type RetryPolicy } from "../src/retry.js";
import { fakeSleep, silentLogger } from "./support.js";

const policy: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  minDelayMs: 2_000,
  maxDelayMs: 60_000,
  isRetryable: (error) => error instanceof TransportError,
};

describe("computeBackoffMs", () => {
  it("doubles from the base and clamps to the configured bounds", () => {
    expect(computeBackoffMs(1, policy)).toBe(2_000);
    expect(computeBackoffMs(2, policy)).toBe(2_000);
    expect(computeBackoffMs(3, policy)).toBe(4_000);
    expect(computeBackoffMs(4, policy)).toBe(8_000);
    expect(computeBackoffMs(7, policy)).toBe(60_000);
  });

  it("adds jitter but never exceeds the maximum", () => {
    const jittered = { ...policy, jitterMs: 100 };

    expect(computeBackoffMs(2, jittered, () => 0.5)).toBe(2_050);
    expect(computeBackoffMs(7, jittered, () => 0.99)).toBe(60_000);
  });
});

describe("withRetry", () => {
  it("retries transport errors with growing delays until the call succeeds", async () => {
    const sleep = fakeSleep();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransportError("network", "connection refused"))
      .mockRejectedValueOnce(new TransportError("timeout", "timed out"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(silentLogger, "op", fn, policy, { sleep })).resolves.toBe("ok");

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2_000, 4_000]);
  });

  it("rethrows non-retryable errors without waiting", async () => {
    const sleep = fakeSleep();
    const failure = new Error("bad payload");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(silentLogger, "op", fn, policy, { sleep })).rejects.toBe(failure);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("gives up after maxAttempts with the last error as cause", async () => {
    const sleep = fakeSleep();
    const lastError = new TransportError("network", "connection reset");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(lastError);

    const error = await withRetry(silentLogger, "op", fn, policy, { sleep }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (!(error instanceof RetryExhaustedError)) {
      return;
    }
    expect(error.attempts).toBe(3);
    expect(error.cause).toBe(lastError);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const sleep = fakeSleep();
    const failure = new TransportError("network", "connection reset");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(
      withRetry(silentLogger, "op", fn, policy, { sleep, signal: controller.signal }),
    ).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("does not call again when aborted during a backoff wait", async () => {
    const controller = new AbortController();
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {
      controller.abort();
    });
    const failure = new TransportError("network", "connection reset");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(
      withRetry(silentLogger, "op", fn, policy, { sleep, signal: controller.signal }),
    ).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});
