/**
 * @centwise/ledger — Field validation for ledger inputs.
 *
 * Every check throws LedgerError("VALIDATION_ERROR") with a per-field
 * message, before any balance is touched.
 */

import type { EntityId } from "@centwise/types";
import { MAX_ENTRY_AMOUNT, parseAmount } from "./money-math.js";
import { LedgerError } from "./types.js";

/** Longest account or category name. */
export const MAX_NAME_LENGTH = 64;

export function invalid(field: string, message: string): LedgerError {
  return new LedgerError("VALIDATION_ERROR", message, { [field]: message });
}

/**
 * Parse an entry amount: strictly positive, at most 8 integer digits.
 * Malformed strings raise INVALID_AMOUNT from the parser.
 */
export function requireEntryAmount(amount: string, field = "amount"): bigint {
  const value = parseAmount(amount);
  if (value <= 0n) {
    throw invalid(field, "Amount must be greater than 0.");
  }
  if (value > MAX_ENTRY_AMOUNT) {
    throw invalid(field, "Amount must not exceed 99999999.99.");
  }
  return value;
}

/**
 * Trim and check a display name. `reserved` names are rejected outright.
 */
export function requireName(name: string, reserved: readonly string[] = [], field = "name"): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw invalid(field, "Name must not be blank.");
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw invalid(field, `Name must be at most ${String(MAX_NAME_LENGTH)} characters.`);
  }
  if (reserved.includes(trimmed)) {
    throw invalid(field, `"${trimmed}" is a reserved name.`);
  }
  return trimmed;
}

export function requireDescription(description: string): string {
  if (description.trim().length === 0) {
    throw invalid("description", "Description must not be blank.");
  }
  return description;
}

export function requireId(id: EntityId, field: string): EntityId {
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw invalid(field, "Must be a positive integer id.");
  }
  return id;
}

/** Normalize an ISO-8601 timestamp to `toISOString()` form. */
export function normalizeTimestamp(value: string, field = "createdAt"): string {
  const parsed = new Date(value);
  if (value.trim() === "" || Number.isNaN(parsed.getTime())) {
    throw invalid(field, "Must be an ISO-8601 timestamp.");
  }
  return parsed.toISOString();
}
