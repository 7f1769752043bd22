/**
 * @quorumkit/sdk: HTTP Client.
 *
 * Wraps native fetch() with:
 * - Request ID generation
 * - Timeout handling
 * - Retry logic (exponential backoff)
 * - Idempotency keys on POST, reused across retries
 * - Error normalization
 * - Response validation against Zod schemas
 *
 * Retry policy: network errors and timeouts are retried for every method.
 * 5xx responses are retried too, except 502: the node reports a failed
 * external call that way, and the action has already been rolled back.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { ErrorEnvelopeSchema } from "./schemas.js";
import type { QuorumkitClientConfig, QuorumkitResponse, RequestOptions } from "./types.js";
import { QuorumkitError } from "./types.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

// =============================================================================
// Internal Helpers
// =============================================================================

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = [
    "content-type",
    "x-request-id",
    "x-idempotent-replay",
    "retry-after",
  ];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

function toError(status: number, body: unknown, fallbackCode: string): QuorumkitError {
  const envelope = ErrorEnvelopeSchema.safeParse(body);
  if (envelope.success) {
    const { code, message, details } = envelope.data.error;
    return new QuorumkitError(code, message, status, details);
  }
  return new QuorumkitError(fallbackCode, `HTTP ${status}`, status);
}

// =============================================================================
// HTTP Client
// =============================================================================

interface ParseOptions {
  /** Decode `body.data` rather than the whole body (default: true) */
  readonly unwrap?: boolean | undefined;
}

/**
 * Low-level HTTP client for a quorumkit node.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: QuorumkitClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async get<T>(
    path: string,
    schema: Schema<T>,
    options: ParseOptions = {},
  ): Promise<QuorumkitResponse<T>> {
    return this.request("GET", path, schema, options, undefined, undefined);
  }

  async post<T>(
    path: string,
    body: unknown,
    schema: Schema<T>,
    options: RequestOptions & ParseOptions = {},
  ): Promise<QuorumkitResponse<T>> {
    const idempotencyKey = options.idempotencyKey ?? globalThis.crypto.randomUUID();
    return this.request("POST", path, schema, options, body, idempotencyKey);
  }

  /**
   * Core request method with retry logic.
   */
  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: Schema<T>,
    options: ParseOptions,
    body: unknown,
    idempotencyKey: string | undefined,
  ): Promise<QuorumkitResponse<T>> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": "application/json",
      "X-Request-Id": generateRequestId(),
    };
    if (idempotencyKey !== undefined) {
      headers["Idempotency-Key"] = idempotencyKey;
    }

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      const backoffMs = Math.min(this.retryDelayMs * Math.pow(2, attempt), 10000);

      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt < this.maxRetries) {
          await sleep(backoffMs);
          continue;
        }
        if (error instanceof QuorumkitError) {
          throw error;
        }
        throw new QuorumkitError("NETWORK_ERROR", lastError.message, 0);
      }

      const responseBody = await parseResponseBody(response);

      if (response.ok) {
        return {
          data: this.decode(schema, responseBody, response.status, options.unwrap !== false),
          status: response.status,
          headers: extractHeaders(response),
        };
      }

      const retryable = response.status >= 500 && response.status !== 502;
      if (retryable && attempt < this.maxRetries) {
        lastError = toError(response.status, responseBody, "SERVER_ERROR");
        await sleep(backoffMs);
        continue;
      }

      throw toError(
        response.status,
        responseBody,
        response.status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR",
      );
    }

    throw new QuorumkitError(
      "NETWORK_ERROR",
      lastError?.message ?? "Request failed after all retries",
      0,
    );
  }

  private decode<T>(schema: Schema<T>, body: unknown, status: number, unwrap: boolean): T {
    const payload =
      unwrap && typeof body === "object" && body !== null && "data" in body ? body.data : body;

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new QuorumkitError(
        "INVALID_RESPONSE",
        "Response did not match the expected shape",
        status,
        parsed.error.issues,
      );
    }
    return parsed.data;
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new QuorumkitError(
          "TIMEOUT",
          `Request timed out after ${this.timeout}ms`,
          0,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
