import { describe, it, expect, vi } from "vitest";
import { withRateLimitRetry } from "../../providers/retry.js";
import { AuthenticationError, NetworkError, RateLimitError } from "../../core/errors.js";

const noWait = { retries: 1, backoffMs: 0 };

describe("withRateLimitRetry", () => {
  it("should return the first result without retrying", async () => {
    const fn = vi.fn().mockResolvedValueOnce("code");
    await expect(withRateLimitRetry(fn, noWait)).resolves.toBe("code");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should retry once after a rate limit", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitError("OpenAI"))
      .mockResolvedValueOnce("second try");
    const attempts: number[] = [];

    await expect(withRateLimitRetry(fn, noWait, (n) => attempts.push(n))).resolves.toBe("second try");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(attempts).toEqual([1, 2]);
  });

  it("should wait the configured backoff before the retry", async () => {
    vi.useFakeTimers();
    try {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new RateLimitError("OpenAI"))
        .mockResolvedValueOnce("after backoff");

      const pending = withRateLimitRetry(fn, { retries: 1, backoffMs: 2000 });

      await vi.advanceTimersByTimeAsync(1999);
      expect(fn).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toBe("after backoff");
      expect(fn).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });

  it("should surface a second rate limit", async () => {
    const fn = vi.fn().mockRejectedValue(new RateLimitError("OpenAI", "slow down"));
    await expect(withRateLimitRetry(fn, noWait)).rejects.toThrow("OpenAI is throttling requests: slow down");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should not retry other errors", async () => {
    const auth = vi.fn().mockRejectedValue(new AuthenticationError("OpenAI", "bad key"));
    await expect(withRateLimitRetry(auth, noWait)).rejects.toBeInstanceOf(AuthenticationError);
    expect(auth).toHaveBeenCalledTimes(1);

    const network = vi.fn().mockRejectedValue(new NetworkError("OpenAI", "ECONNRESET"));
    await expect(withRateLimitRetry(network, noWait)).rejects.toBeInstanceOf(NetworkError);
    expect(network).toHaveBeenCalledTimes(1);
  });

  it("should not retry at all when retries is 0", async () => {
    const fn = vi.fn().mockRejectedValue(new RateLimitError("Gemini"));
    await expect(withRateLimitRetry(fn, { retries: 0, backoffMs: 0 })).rejects.toBeInstanceOf(RateLimitError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
