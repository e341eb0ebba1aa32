/**
 * Error taxonomy shared by connectors and the reconciliation engine.
 *
 * Connectors translate every transport or service failure into one of the
 * `ConnectorError` subclasses below; retry and isolation logic branches on
 * nothing else.
 */

// ============================================================================
// Connector Errors
// ============================================================================

export type ErrorCategory =
  | "auth"
  | "rate_limit"
  | "permission"
  | "not_found"
  | "transient_network"
  | "unknown";

export abstract class ConnectorError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}

export class AuthError extends ConnectorError {
  code = "AUTH_ERROR" as const;
  category = "auth" as const;

  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "AuthError";
  }
}

export class RateLimitError extends ConnectorError {
  code = "RATE_LIMITED" as const;
  category = "rate_limit" as const;
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, status?: number) {
    super(message, status);
    this.name = "RateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class PermissionError extends ConnectorError {
  code = "PERMISSION_DENIED" as const;
  category = "permission" as const;

  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "PermissionError";
  }
}

export class NotFoundError extends ConnectorError {
  code = "NOT_FOUND" as const;
  category = "not_found" as const;

  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "NotFoundError";
  }
}

export class TransientNetworkError extends ConnectorError {
  code = "TRANSIENT_NETWORK" as const;
  category = "transient_network" as const;

  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "TransientNetworkError";
  }
}

export class UnknownError extends ConnectorError {
  code = "UNKNOWN" as const;
  category = "unknown" as const;

  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "UnknownError";
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends Error {
  code = "CONFIGURATION_ERROR" as const;
  details?: string[];

  constructor(message: string, details?: string[]) {
    super(message);
    this.name = "ConfigurationError";
    this.details = details;
  }
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * True for failures worth retrying against the same service
 */
export function isRetryable(
  error: unknown
): error is RateLimitError | TransientNetworkError {
  return (
    error instanceof RateLimitError || error instanceof TransientNetworkError
  );
}

/**
 * Map any thrown value onto the connector taxonomy.
 *
 * `fetch` rejects with a `TypeError` on DNS/socket failures and with an
 * `AbortError`/`TimeoutError` when a signal fires.
 */
export function normalizeError(error: unknown): ConnectorError {
  if (error instanceof ConnectorError) {
    return error;
  }

  if (error instanceof Error) {
    if (
      error.name === "TypeError" ||
      error.name === "AbortError" ||
      error.name === "TimeoutError"
    ) {
      return new TransientNetworkError(error.message);
    }
    return new UnknownError(error.message);
  }

  return new UnknownError(String(error));
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(
  value: string | null,
  now = Date.now()
): number | undefined {
  if (value === null || value.trim() === "") {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

/**
 * Build the taxonomy error for a non-2xx HTTP response
 */
export function errorFromResponse(
  status: number,
  body: string,
  headers: Headers
): ConnectorError {
  const detail = body.length > 200 ? `${body.slice(0, 200)}...` : body;
  const message =
    detail !== ""
      ? `HTTP ${String(status)}: ${detail}`
      : `HTTP ${String(status)}`;

  if (status === 401) {
    return new AuthError(message, status);
  }
  if (status === 403) {
    return new PermissionError(message, status);
  }
  if (status === 404) {
    return new NotFoundError(message, status);
  }
  if (status === 429) {
    return new RateLimitError(
      message,
      parseRetryAfter(headers.get("retry-after")),
      status
    );
  }
  if (status === 408 || status >= 500) {
    return new TransientNetworkError(message, status);
  }
  return new UnknownError(message, status);
}
