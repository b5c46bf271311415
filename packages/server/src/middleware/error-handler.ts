/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain errors (LedgerError, ReportError), request validation
 * failures (ZodError) and Hono HTTPExceptions to HTTP status codes.
 * Anything else is a 500 whose message is never sent to the client.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { LedgerError } from "@centwise/ledger";
import type { LedgerErrorCode } from "@centwise/ledger";
import { ReportError } from "@centwise/reports";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 401 | 404 | 409 | 422 | 500 | 503;

const LEDGER_STATUS: Record<LedgerErrorCode, ErrorStatus> = {
  VALIDATION_ERROR: 400,
  INVALID_AMOUNT: 400,
  NOT_FOUND: 404,
  ACCOUNT_IN_USE: 409,
  CATEGORY_IN_USE: 409,
  INSUFFICIENT_FUNDS: 422,
  CONCURRENCY_TIMEOUT: 503,
};

interface Mapped {
  readonly status: ErrorStatus;
  readonly envelope: ErrorEnvelope;
}

/** Collapse zod issues into one message per field path. */
export function zodFieldErrors(error: ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "body";
    fields[path] ??= issue.message;
  }
  return fields;
}

function httpStatus(status: number): ErrorStatus {
  if (status === 401) return 401;
  if (status === 404) return 404;
  return status < 500 ? 400 : 500;
}

/**
 * Map a thrown value to its status and envelope, or undefined when it
 * is not an error the API knows.
 */
export function mapError(err: unknown): Mapped | undefined {
  if (err instanceof LedgerError) {
    return {
      status: LEDGER_STATUS[err.code],
      envelope: createErrorEnvelope(
        err.code,
        err.message,
        err.fields !== undefined ? { fields: err.fields } : undefined,
      ),
    };
  }

  if (err instanceof ReportError) {
    return { status: 400, envelope: createErrorEnvelope(err.code, err.message) };
  }

  if (err instanceof ZodError) {
    return {
      status: 400,
      envelope: createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        fields: zodFieldErrors(err),
      }),
    };
  }

  if (err instanceof HTTPException) {
    const status = httpStatus(err.status);
    if (status === 500) return undefined;
    return {
      status,
      envelope: createErrorEnvelope(
        status === 401 ? "UNAUTHORIZED" : status === 404 ? "NOT_FOUND" : "VALIDATION_ERROR",
        err.message,
      ),
    };
  }

  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

export interface ErrorHandlerOptions {
  /** Called with every error that maps to a 500 before the response is sent. */
  readonly onUnexpected?: ((err: Error, requestId: string | undefined) => void) | undefined;
}

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(
  options: ErrorHandlerOptions = {},
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const mapped = mapError(err);
    if (mapped !== undefined) {
      return c.json(mapped.envelope, mapped.status);
    }

    options.onUnexpected?.(err, c.get("requestId"));
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
