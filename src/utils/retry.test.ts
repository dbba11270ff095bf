import { describe, it, expect, vi } from "vitest";
import { withRetry, isTransientError, RetryExhaustedError } from "./retry";

function rateLimited(): Error & { status: number } {
  return Object.assign(new Error("Too Many Requests"), { status: 429 });
}

describe("isTransientError", () => {
  it("recognizes rate limits and server errors", () => {
    expect(isTransientError(rateLimited())).toBe(true);
    expect(isTransientError({ response: { status: 503 } })).toBe(true);
    expect(isTransientError({ code: "ECONNRESET" })).toBe(true);
    expect(isTransientError({ code: "rate_limited" })).toBe(true);
  });

  it("rejects client errors", () => {
    expect(isTransientError({ status: 404 })).toBe(false);
    expect(isTransientError(new Error("boom"))).toBe(false);
    expect(isTransientError(null)).toBe(false);
  });
});

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn().mockRejectedValueOnce(rateLimited()).mockResolvedValueOnce("ok");
    const sleep = vi.fn().mockResolvedValue(undefined);

    const result = await withRetry(fn, { operation: "test", sleep });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it("backs off exponentially", async () => {
    const fn = vi.fn().mockRejectedValue(rateLimited());
    const sleep = vi.fn().mockResolvedValue(undefined);

    await expect(
      withRetry(fn, { operation: "append row", attempts: 4, baseDelayMs: 100, sleep })
    ).rejects.toThrow("append row failed after 4 attempts");

    expect(fn).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200, 400]);
  });

  it("wraps the last error when attempts run out", async () => {
    const last = rateLimited();
    const fn = vi.fn().mockRejectedValue(last);

    const error = await withRetry(fn, {
      operation: "read",
      attempts: 2,
      sleep: () => Promise.resolve(),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error instanceof RetryExhaustedError && error.cause).toBe(last);
  });

  it("does not retry permanent failures", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("invalid range"));

    await expect(withRetry(fn, { operation: "update" })).rejects.toThrow("invalid range");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
