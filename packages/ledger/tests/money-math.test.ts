/**
 * Tests for the deterministic money math engine.
 *
 * Covers:
 * - parseAmount / formatAmount
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import {
  parseAmount,
  formatAmount,
  MAX_ENTRY_AMOUNT,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100")).toBe(10000n);
  });

  it("parses two decimals", () => {
    expect(parseAmount("100.50")).toBe(10050n);
  });

  it("pads a single fractional digit", () => {
    expect(parseAmount("1.5")).toBe(150n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-50.25")).toBe(-5025n);
  });

  it("ignores surrounding whitespace", () => {
    expect(parseAmount(" 7.00 ")).toBe(700n);
  });

  it("rejects more than two decimals", () => {
    try {
      parseAmount("1.005");
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect(err).toMatchObject({ code: "INVALID_AMOUNT" });
    }
  });

  it("rejects empty and non-numeric strings", () => {
    expect(() => parseAmount("")).toThrow(/Invalid amount/);
    expect(() => parseAmount("abc")).toThrow(/Invalid amount format/);
    expect(() => parseAmount("1e5")).toThrow(/Invalid amount format/);
    expect(() => parseAmount(".5")).toThrow(/Invalid amount format/);
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with two decimals", () => {
    expect(formatAmount(10050n)).toBe("100.50");
  });

  it("formats zero", () => {
    expect(formatAmount(0n)).toBe("0.00");
  });

  it("formats sub-unit amounts", () => {
    expect(formatAmount(5n)).toBe("0.05");
    expect(formatAmount(-5n)).toBe("-0.05");
  });

  it("formats the largest entry amount", () => {
    expect(formatAmount(MAX_ENTRY_AMOUNT)).toBe("99999999.99");
  });
});
