import { describe, it, expect, vi } from "vitest";

import {
  AuthError,
  NotFoundError,
  RateLimitError,
  TransientNetworkError,
  UnknownError,
} from "../../../src/errors.js";
import {
  DEFAULT_RETRY_POLICY,
  computeDelay,
  withRetry,
} from "../../../src/utils/retry.js";

const policy = {
  maxAttempts: 4,
  baseDelayMs: 100,
  maxDelayMs: 500,
  backoffMultiplier: 2,
  rateLimitDelayMs: 250,
};

describe("utils/retry", () => {
  describe("computeDelay", () => {
    it("should back off exponentially for transient errors", () => {
      const error = new TransientNetworkError("reset");

      expect(computeDelay(error, 0, policy)).toBe(100);
      expect(computeDelay(error, 1, policy)).toBe(200);
      expect(computeDelay(error, 2, policy)).toBe(400);
    });

    it("should cap the delay", () => {
      expect(computeDelay(new TransientNetworkError("reset"), 5, policy)).toBe(
        500
      );
      expect(computeDelay(new RateLimitError("429", 90_000), 0, policy)).toBe(
        500
      );
    });

    it("should honour Retry-After, else the rate-limit delay", () => {
      expect(computeDelay(new RateLimitError("429", 300), 3, policy)).toBe(300);
      expect(computeDelay(new RateLimitError("429"), 3, policy)).toBe(250);
    });
  });

  describe("withRetry", () => {
    it("should return the first successful result", async () => {
      const operation = vi.fn().mockResolvedValue("ok");
      const sleep = vi.fn().mockResolvedValue(undefined);

      await expect(withRetry(operation, { ...policy, sleep })).resolves.toBe(
        "ok"
      );
      expect(operation).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should retry transient failures until one succeeds", async () => {
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new TransientNetworkError("reset"))
        .mockRejectedValueOnce(new RateLimitError("429"))
        .mockResolvedValue("ok");
      const sleep = vi.fn().mockResolvedValue(undefined);
      const onRetry = vi.fn();

      await expect(
        withRetry(operation, { ...policy, sleep, onRetry })
      ).resolves.toBe("ok");
      expect(sleep.mock.calls).toEqual([[100], [250]]);
      expect(onRetry.mock.calls.map(([info]) => info.attempt)).toEqual([1, 2]);
    });

    it("should throw the last error once attempts run out", async () => {
      const last = new TransientNetworkError("still down");
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new TransientNetworkError("down"))
        .mockRejectedValueOnce(last);
      const sleep = vi.fn().mockResolvedValue(undefined);

      await expect(
        withRetry(operation, { ...policy, maxAttempts: 2, sleep })
      ).rejects.toBe(last);
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it.each([
      ["auth", new AuthError("401")],
      ["not found", new NotFoundError("404")],
      ["unknown", new UnknownError("422")],
    ])("should not retry %s errors", async (_name, error) => {
      const operation = vi.fn().mockRejectedValue(error);
      const sleep = vi.fn().mockResolvedValue(undefined);

      await expect(withRetry(operation, { ...policy, sleep })).rejects.toBe(
        error
      );
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it("should normalize raw errors before deciding", async () => {
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new TypeError("fetch failed"))
        .mockResolvedValue("ok");
      const sleep = vi.fn().mockResolvedValue(undefined);

      await expect(withRetry(operation, { ...policy, sleep })).resolves.toBe(
        "ok"
      );
      expect(sleep).toHaveBeenCalledWith(100);
    });

    it("should keep attempt counts separate between calls", async () => {
      const sleep = vi.fn().mockResolvedValue(undefined);
      const flaky = () =>
        vi
          .fn()
          .mockRejectedValueOnce(new TransientNetworkError("a"))
          .mockRejectedValueOnce(new TransientNetworkError("b"))
          .mockResolvedValue("ok");
      const options = { ...DEFAULT_RETRY_POLICY, maxAttempts: 3, sleep };

      await expect(withRetry(flaky(), options)).resolves.toBe("ok");
      await expect(withRetry(flaky(), options)).resolves.toBe("ok");
    });
  });
});
