import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  DEFAULT_RETRY_CONFIG,
  calculateBackoff,
  retryWithBackoff,
} from "./retry";
import { NetworkError, NotFoundError } from "./errors";

describe("retry module", () => {
  describe("DEFAULT_RETRY_CONFIG", () => {
    it("should have sensible defaults", () => {
      expect(DEFAULT_RETRY_CONFIG.maxAttempts).toBe(3);
      expect(DEFAULT_RETRY_CONFIG.baseDelayMs).toBe(1000);
      expect(DEFAULT_RETRY_CONFIG.maxDelayMs).toBe(30000);
      expect(DEFAULT_RETRY_CONFIG.jitterFactor).toBe(0);
    });
  });

  describe("calculateBackoff", () => {
    const config = { baseDelayMs: 1000, maxDelayMs: 30000, jitterFactor: 0 };

    it("should double the delay on each attempt", () => {
      expect(calculateBackoff(0, config)).toBe(1000);
      expect(calculateBackoff(1, config)).toBe(2000);
      expect(calculateBackoff(2, config)).toBe(4000);
      expect(calculateBackoff(3, config)).toBe(8000);
    });

    it("should cap at maxDelayMs", () => {
      const capped = { ...config, maxDelayMs: 3000 };
      expect(calculateBackoff(2, capped)).toBe(3000);
      expect(calculateBackoff(6, capped)).toBe(3000);
    });

    it("should keep jittered delays within bounds", () => {
      const jittered = { ...config, jitterFactor: 0.5 };
      for (let i = 0; i < 20; i++) {
        const delay = calculateBackoff(0, jittered);
        expect(delay).toBeGreaterThanOrEqual(500);
        expect(delay).toBeLessThanOrEqual(1500);
      }
    });
  });

  describe("retryWithBackoff", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should succeed on first attempt", async () => {
      const fn = vi.fn().mockResolvedValue("ok");

      const result = await retryWithBackoff(fn);

      expect(result).toEqual({ success: true, data: "ok", attempts: 1 });
      expect(fn).toHaveBeenCalledWith(0);
    });

    it("should retry retryable errors until success", async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new NetworkError("connection reset"))
        .mockRejectedValueOnce(new NetworkError("connection reset"))
        .mockResolvedValue("ok");

      const resultPromise = retryWithBackoff(fn, { baseDelayMs: 10 });
      await vi.advanceTimersByTimeAsync(100);
      const result = await resultPromise;

      expect(result.success).toBe(true);
      expect(result.attempts).toBe(3);
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it("should stop on non-retryable errors", async () => {
      const fn = vi.fn().mockRejectedValue(NotFoundError.flag("missing"));

      const result = await retryWithBackoff(fn);

      expect(result.success).toBe(false);
      expect(result.error?.message).toBe('Flag "missing" not found');
      expect(result.attempts).toBe(1);
    });

    it("should make exactly maxAttempts attempts and resolve", async () => {
      const fn = vi.fn().mockRejectedValue(new Error("boom"));

      const resultPromise = retryWithBackoff(fn, {
        maxAttempts: 4,
        shouldRetry: () => true,
      });
      // 1000 + 2000 + 4000
      await vi.advanceTimersByTimeAsync(7000);
      const result = await resultPromise;

      expect(result.success).toBe(false);
      expect(result.error?.message).toBe("boom");
      expect(result.attempts).toBe(4);
      expect(fn).toHaveBeenCalledTimes(4);
    });

    it("should wait between attempts with doubling delays", async () => {
      const fn = vi.fn().mockRejectedValue(new Error("boom"));

      const resultPromise = retryWithBackoff(fn, {
        maxAttempts: 3,
        shouldRetry: () => true,
      });

      await vi.advanceTimersByTimeAsync(0);
      expect(fn).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(999);
      expect(fn).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(fn).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(2000);
      expect(fn).toHaveBeenCalledTimes(3);

      await resultPromise;
    });

    it("should wrap non-Error rejections", async () => {
      const fn = vi.fn().mockRejectedValue("plain string");

      const result = await retryWithBackoff(fn, { shouldRetry: () => false });

      expect(result.error).toBeInstanceOf(Error);
      expect(result.error?.message).toBe("plain string");
    });
  });
});
