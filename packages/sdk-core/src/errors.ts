/**
 * Error categories for FlagTier SDK failures
 */
export enum ErrorCategory {
  CONFIGURATION = "CONFIGURATION",
  VALIDATION = "VALIDATION",
  NOT_FOUND = "NOT_FOUND",
  NETWORK = "NETWORK",
  INTERNAL = "INTERNAL",
}

/**
 * Error codes
 */
export enum ErrorCode {
  // Client construction
  CONFIG_MISSING_OPTION = "CONFIG_001",
  CONFIG_CONFLICTING_OPTION = "CONFIG_002",
  CONFIG_INVALID_VALUE = "CONFIG_003",

  // Payload validation
  VAL_MALFORMED_PAYLOAD = "VAL_001",

  // Not found
  NOT_FOUND_GENERIC = "NOT_FOUND_001",
  NOT_FOUND_FLAG = "NOT_FOUND_002",
  NOT_FOUND_EXPERIMENT = "NOT_FOUND_003",

  // Transport
  NETWORK_ERROR = "NETWORK_001",
  NETWORK_TIMEOUT = "NETWORK_002",
  NETWORK_ABORTED = "NETWORK_003",
  NETWORK_HTTP_STATUS = "NETWORK_004",

  INTERNAL_ERROR = "INTERNAL_001",
}

/**
 * Base class for FlagTier errors
 */
export class FlagTierError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly details?: string;
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    code: ErrorCode,
    category: ErrorCategory,
    options?: {
      details?: string;
      retryable?: boolean;
      statusCode?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = "FlagTierError";
    this.code = code;
    this.category = category;
    this.details = options?.details;
    this.retryable = options?.retryable ?? false;
    this.statusCode = options?.statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FlagTierError);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      details: this.details,
      retryable: this.retryable,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Invalid client construction. Never recovered.
 */
export class ConfigurationError extends FlagTierError {
  readonly option?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_MISSING_OPTION,
    options?: { option?: string; details?: string },
  ) {
    super(message, code, ErrorCategory.CONFIGURATION, {
      details: options?.details,
      retryable: false,
    });
    this.name = "ConfigurationError";
    this.option = options?.option;
  }
}

/**
 * Payload returned by the service did not have the expected shape
 */
export class ValidationError extends FlagTierError {
  constructor(
    message: string,
    options?: { details?: string; cause?: unknown },
  ) {
    super(message, ErrorCode.VAL_MALFORMED_PAYLOAD, ErrorCategory.VALIDATION, {
      ...options,
      retryable: false,
    });
    this.name = "ValidationError";
  }
}

/**
 * Flag or experiment key absent from the loaded definitions
 */
export class NotFoundError extends FlagTierError {
  readonly key: string;

  constructor(
    message: string,
    key: string,
    code: ErrorCode = ErrorCode.NOT_FOUND_GENERIC,
  ) {
    super(message, code, ErrorCategory.NOT_FOUND, {
      retryable: false,
      statusCode: 404,
    });
    this.name = "NotFoundError";
    this.key = key;
  }

  static flag(key: string): NotFoundError {
    return new NotFoundError(
      `Flag "${key}" not found`,
      key,
      ErrorCode.NOT_FOUND_FLAG,
    );
  }

  static experiment(key: string): NotFoundError {
    return new NotFoundError(
      `Experiment "${key}" not found`,
      key,
      ErrorCode.NOT_FOUND_EXPERIMENT,
    );
  }
}

/**
 * Transport failure (connection, timeout or non-success status)
 */
export class NetworkError extends FlagTierError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_ERROR,
    options?: { details?: string; statusCode?: number; cause?: unknown },
  ) {
    super(message, code, ErrorCategory.NETWORK, {
      ...options,
      // 4xx responses won't change on a second attempt
      retryable:
        options?.statusCode === undefined ||
        options.statusCode >= 500 ||
        options.statusCode === 429,
    });
    this.name = "NetworkError";
  }

  static timeout(message: string = "Request timed out"): NetworkError {
    return new NetworkError(message, ErrorCode.NETWORK_TIMEOUT);
  }

  static aborted(message: string = "Request was aborted"): NetworkError {
    return new NetworkError(message, ErrorCode.NETWORK_ABORTED);
  }

  static fromStatus(
    path: string,
    statusCode: number,
    statusText: string,
  ): NetworkError {
    return new NetworkError(
      `Request to ${path} failed: ${statusCode} ${statusText}`.trim(),
      ErrorCode.NETWORK_HTTP_STATUS,
      { statusCode },
    );
  }
}

// --- Helper functions ---

export function isFlagTierError(error: unknown): error is FlagTierError {
  return error instanceof FlagTierError;
}

export function isConfigurationError(
  error: unknown,
): error is ConfigurationError {
  return (
    error instanceof FlagTierError &&
    error.category === ErrorCategory.CONFIGURATION
  );
}

export function isValidationError(error: unknown): error is ValidationError {
  return (
    error instanceof FlagTierError &&
    error.category === ErrorCategory.VALIDATION
  );
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return (
    error instanceof FlagTierError && error.category === ErrorCategory.NOT_FOUND
  );
}

export function isNetworkError(error: unknown): error is NetworkError {
  return (
    error instanceof FlagTierError && error.category === ErrorCategory.NETWORK
  );
}

/**
 * Check if an error is worth another attempt
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof FlagTierError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const name = error.name.toLowerCase();
    if (
      name.includes("network") ||
      name.includes("timeout") ||
      name.includes("abort")
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Classify a raw error into a FlagTierError
 */
export function classifyError(error: unknown): FlagTierError {
  if (error instanceof FlagTierError) {
    return error;
  }

  // fetch() rejects with AbortError on timeout
  if (error instanceof Error && error.name === "AbortError") {
    return NetworkError.timeout();
  }

  // fetch() rejects with TypeError on connection failure
  if (error instanceof TypeError) {
    return new NetworkError(error.message, ErrorCode.NETWORK_ERROR, {
      details: "Network request failed",
      cause: error,
    });
  }

  if (error instanceof Error) {
    return new FlagTierError(
      error.message,
      ErrorCode.INTERNAL_ERROR,
      ErrorCategory.INTERNAL,
      { details: error.stack, cause: error },
    );
  }

  return new FlagTierError(
    String(error),
    ErrorCode.INTERNAL_ERROR,
    ErrorCategory.INTERNAL,
  );
}

/**
 * Run an operation and fall back to a default when it fails with a
 * FlagTierError. Other errors propagate unchanged.
 */
export async function withDefault<T>(
  operation: () => Promise<T>,
  fallback: T,
  onError?: (error: FlagTierError) => void,
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (!(error instanceof FlagTierError)) {
      throw error;
    }
    onError?.(error);
    return fallback;
  }
}
