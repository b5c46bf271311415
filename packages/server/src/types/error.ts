/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { LedgerErrorCode } from "@centwise/ledger";
import type { ReportErrorCode } from "@centwise/reports";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Known API error codes: every domain code plus HTTP-level ones.
 */
export type ApiErrorCode =
  | LedgerErrorCode
  | ReportErrorCode
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
