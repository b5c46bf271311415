/**
 * @centwise/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint minor units (cents) internally.
 * String amounts are converted to/from bigint via fixed two-decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are decimal strings with at most two fractional digits
 * - Formatted amounts always carry exactly two fractional digits
 */

import type { Amount } from "@centwise/types";
import { LedgerError } from "./types.js";

/** Fractional digits of every amount in the tracker. */
export const AMOUNT_DECIMALS = 2;

/** Largest entry amount in minor units: 8 integer digits, 2 fractional. */
export const MAX_ENTRY_AMOUNT = 9_999_999_999n;

const AMOUNT_FORMAT = /^-?\d+(\.\d+)?$/;

/**
 * Parse a decimal string amount into bigint minor units.
 *
 * "100.50" → 10050n
 * "100"    → 10000n
 * "-50.2"  → -5020n
 */
export function parseAmount(amount: string): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!AMOUNT_FORMAT.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > AMOUNT_DECIMALS) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(AMOUNT_DECIMALS)} allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(AMOUNT_DECIMALS, "0"));
  return negative ? -value : value;
}

/**
 * Convert bigint minor units back to a decimal string.
 *
 * 10050n → "100.50"
 * -5n    → "-0.05"
 */
export function formatAmount(minor: bigint): Amount {
  const negative = minor < 0n;
  const abs = negative ? -minor : minor;
  const str = abs.toString().padStart(AMOUNT_DECIMALS + 1, "0");
  const intPart = str.slice(0, str.length - AMOUNT_DECIMALS);
  const fracPart = str.slice(str.length - AMOUNT_DECIMALS);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}
