/**
 * @quorumkit/sdk: SDK types.
 *
 * Types specific to the SDK client layer.
 */

// =============================================================================
// Client Configuration
// =============================================================================

export interface QuorumkitClientConfig {
  /** Base URL of the node (e.g., "http://localhost:3000") */
  readonly baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts (default: 3) */
  readonly retries?: number | undefined;
  /** First backoff delay in milliseconds, doubled per attempt (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

export interface QuorumkitResponse<T> {
  readonly data: T;
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

export interface RequestOptions {
  /**
   * Sent as Idempotency-Key and reused across retries. POSTs get a
   * generated key when none is given.
   */
  readonly idempotencyKey?: string | undefined;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the node, or from the transport.
 *
 * `code` is the node's error code (e.g. "INVALID_SIGNATURES") or one of
 * TIMEOUT, NETWORK_ERROR, INVALID_RESPONSE with `statusCode` 0 for
 * transport failures.
 */
export class QuorumkitError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "QuorumkitError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
