/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps module errors to HTTP status codes by their `code`.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { isMultisigError, type MultisigErrorCode } from "@quorumkit/multisig";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 500 | 502;

const STATUS_MAP: Record<MultisigErrorCode, ErrorStatus> = {
  INVALID_SIGNATURES: 401,
  SIGNATURE_INDEX_OUT_OF_RANGE: 400,
  INVALID_ARGUMENT: 400,
  EXECUTION_FAILED: 502,
  // Configuration is fixed at startup; reaching here is a server fault.
  INVALID_CONFIG: 500,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), err.status);
  }

  if (isMultisigError(err)) {
    const status = STATUS_MAP[err.code];
    if (status !== 500) {
      return c.json(createErrorEnvelope(err.code, err.message), status);
    }
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
