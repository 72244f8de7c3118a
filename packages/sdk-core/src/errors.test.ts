import { describe, it, expect, vi } from "vitest";
import {
  ConfigurationError,
  ErrorCategory,
  ErrorCode,
  FlagTierError,
  NetworkError,
  NotFoundError,
  ValidationError,
  classifyError,
  isConfigurationError,
  isNetworkError,
  isNotFoundError,
  isRetryable,
  isValidationError,
  withDefault,
} from "./errors";

describe("errors", () => {
  describe("FlagTierError subclasses", () => {
    it("should categorise configuration errors as fatal", () => {
      const error = new ConfigurationError(
        "platform is required",
        ErrorCode.CONFIG_MISSING_OPTION,
        { option: "platform" },
      );

      expect(error).toBeInstanceOf(FlagTierError);
      expect(error.name).toBe("ConfigurationError");
      expect(error.category).toBe(ErrorCategory.CONFIGURATION);
      expect(error.option).toBe("platform");
      expect(error.retryable).toBe(false);
      expect(isConfigurationError(error)).toBe(true);
    });

    it("should build not-found errors for flags and experiments", () => {
      const flag = NotFoundError.flag("dark-mode");
      const experiment = NotFoundError.experiment("checkout-test");

      expect(flag.message).toBe('Flag "dark-mode" not found');
      expect(flag.code).toBe(ErrorCode.NOT_FOUND_FLAG);
      expect(flag.key).toBe("dark-mode");
      expect(experiment.message).toBe('Experiment "checkout-test" not found');
      expect(experiment.statusCode).toBe(404);
      expect(isNotFoundError(experiment)).toBe(true);
    });

    it("should mark network errors retryable except for client statuses", () => {
      expect(new NetworkError("connection refused").retryable).toBe(true);
      expect(NetworkError.fromStatus("/flags", 503, "Service Unavailable").retryable).toBe(true);
      expect(NetworkError.fromStatus("/flags", 429, "Too Many Requests").retryable).toBe(true);
      expect(NetworkError.fromStatus("/flags", 401, "Unauthorized").retryable).toBe(false);
    });

    it("should carry status and path in HTTP status errors", () => {
      const error = NetworkError.fromStatus("/api/v1/health", 502, "Bad Gateway");

      expect(error.message).toBe("Request to /api/v1/health failed: 502 Bad Gateway");
      expect(error.statusCode).toBe(502);
      expect(error.code).toBe(ErrorCode.NETWORK_HTTP_STATUS);
      expect(isNetworkError(error)).toBe(true);
    });

    it("should serialise to JSON", () => {
      const error = new ValidationError("bad payload", { details: "data.0.flagKey" });

      expect(error.toJSON()).toEqual({
        name: "ValidationError",
        code: ErrorCode.VAL_MALFORMED_PAYLOAD,
        category: ErrorCategory.VALIDATION,
        message: "bad payload",
        details: "data.0.flagKey",
        retryable: false,
        statusCode: undefined,
      });
      expect(isValidationError(error)).toBe(true);
    });
  });

  describe("isRetryable", () => {
    it("should read the retryable flag of FlagTier errors", () => {
      expect(NetworkError.timeout().retryable).toBe(true);
      expect(isRetryable(NetworkError.timeout())).toBe(true);
      expect(isRetryable(NotFoundError.flag("x"))).toBe(false);
    });

    it("should guess from the name of other errors", () => {
      const abort = new Error("stopped");
      abort.name = "AbortError";
      expect(isRetryable(abort)).toBe(true);
      expect(isRetryable(new Error("boom"))).toBe(false);
      expect(isRetryable("boom")).toBe(false);
    });
  });

  describe("classifyError", () => {
    it("should pass FlagTier errors through", () => {
      const error = NotFoundError.flag("x");
      expect(classifyError(error)).toBe(error);
    });

    it("should map AbortError to a timeout", () => {
      const abort = new Error("The operation was aborted");
      abort.name = "AbortError";

      const classified = classifyError(abort);

      expect(classified).toBeInstanceOf(NetworkError);
      expect(classified.code).toBe(ErrorCode.NETWORK_TIMEOUT);
    });

    it("should map fetch TypeErrors to network errors", () => {
      const classified = classifyError(new TypeError("fetch failed"));

      expect(classified).toBeInstanceOf(NetworkError);
      expect(classified.message).toBe("fetch failed");
    });

    it("should wrap anything else as internal", () => {
      expect(classifyError(new Error("boom")).category).toBe(ErrorCategory.INTERNAL);
      expect(classifyError(42).message).toBe("42");
    });
  });

  describe("withDefault", () => {
    it("should return the operation result on success", async () => {
      await expect(withDefault(async () => "value", "fallback")).resolves.toBe("value");
    });

    it("should return the fallback for FlagTier errors", async () => {
      const onError = vi.fn();

      const result = await withDefault(
        async () => {
          throw NotFoundError.flag("missing");
        },
        false,
        onError,
      );

      expect(result).toBe(false);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toBeInstanceOf(NotFoundError);
    });

    it("should let other errors propagate", async () => {
      await expect(
        withDefault(async () => {
          throw new RangeError("bug");
        }, "fallback"),
      ).rejects.toThrow(RangeError);
    });
  });
});
