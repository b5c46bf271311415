/**
 * @centwise/reports — Types
 *
 * Report shapes. Every money value is a two-decimal Amount string and
 * every month is the first day of a UTC calendar month ("2024-03-01").
 */

import type { Account, Amount, Category, EntityId, Expense, Income, Transfer } from "@centwise/types";

// =============================================================================
// Errors
// =============================================================================

export type ReportErrorCode = "INVALID_PERIOD";

export class ReportError extends Error {
  public readonly code: ReportErrorCode;

  constructor(code: ReportErrorCode, message: string) {
    super(message);
    this.name = "ReportError";
    this.code = code;
  }
}

// =============================================================================
// Periods
// =============================================================================

/**
 * Raw period bounds as callers send them.
 * `start` is "YYYY-MM" or "YYYY-MM-DD"; so is `end`.
 */
export interface PeriodInput {
  readonly start?: string | undefined;
  readonly end?: string | undefined;
}

/**
 * A period resolved to whole UTC days.
 * `from` / `to` are inclusive ISO timestamps for ledger queries.
 */
export interface ResolvedPeriod {
  readonly start: string | null;
  readonly end: string | null;
  readonly from: string | undefined;
  readonly to: string | undefined;
}

// =============================================================================
// Input rows
// =============================================================================

/**
 * Rows a report is built from, already restricted to the period and
 * account of interest. `incomingTransfers` holds only transfers out of
 * the system account, which count as income.
 */
export interface ReportRows {
  readonly accounts: readonly Account[];
  readonly categories: readonly Category[];
  readonly expenses: readonly Expense[];
  readonly incomes: readonly Income[];
  readonly incomingTransfers: readonly Transfer[];
}

// =============================================================================
// Summary
// =============================================================================

export interface SummaryTotals {
  readonly income: Amount;
  readonly transfersIn: Amount;
  readonly incomeIncludingTransfers: Amount;
  readonly expense: Amount;
  readonly net: Amount;
}

export interface AccountBalanceLine {
  readonly accountId: EntityId;
  readonly account: string;
  readonly balance: Amount;
}

export interface Summary {
  readonly period: {
    readonly start: string | null;
    readonly end: string | null;
    readonly accountId: EntityId | null;
  };
  readonly totals: SummaryTotals;
  readonly balances: {
    readonly totalBalance: Amount;
    readonly byAccount: readonly AccountBalanceLine[];
  };
}

// =============================================================================
// Cash flow
// =============================================================================

export const CASHFLOW_GROUPINGS = ["none", "account", "category", "account_category"] as const;

export type CashflowGrouping = (typeof CASHFLOW_GROUPINGS)[number];

export interface CategoryLine {
  readonly categoryId: EntityId;
  readonly category: string;
  readonly total: Amount;
}

export interface AccountLine {
  readonly accountId: EntityId;
  readonly account: string;
  readonly income: Amount;
  readonly expense: Amount;
  readonly net: Amount;
  /** Present for the account_category grouping. */
  readonly byCategory?: readonly CategoryLine[];
}

export interface MonthlyCashflowRow {
  readonly month: string;
  readonly income: Amount;
  readonly expense: Amount;
  readonly net: Amount;
  readonly byAccount?: readonly AccountLine[];
  readonly byCategory?: readonly CategoryLine[];
}

// =============================================================================
// Totals
// =============================================================================

export interface IncomeTotal {
  /** Income entries only. */
  readonly income: Amount;
  /** Deposits from the system account. */
  readonly transfersIn: Amount;
  readonly total: Amount;
}

export interface TransferTotal {
  readonly count: number;
  readonly total: Amount;
}
