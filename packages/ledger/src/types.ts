/**
 * @centwise/ledger — Types for the balance-consistency engine.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid mutations throw, never silently succeed
 * - A thrown error means no balance and no row changed
 */

import type { Amount, Clock, EntityId } from "@centwise/types";
import type { LedgerStore } from "./store/types.js";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "VALIDATION_ERROR"
  | "INSUFFICIENT_FUNDS"
  | "NOT_FOUND"
  | "CONCURRENCY_TIMEOUT"
  | "ACCOUNT_IN_USE"
  | "CATEGORY_IN_USE"
  | "INVALID_AMOUNT";

/** Per-field messages attached to a VALIDATION_ERROR. */
export type FieldErrors = Readonly<Record<string, string>>;

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly fields: FieldErrors | undefined;

  constructor(code: LedgerErrorCode, message: string, fields?: FieldErrors) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.fields = fields;
  }
}

// ─── Mutation Inputs ─────────────────────────────────────────────────────

export interface AccountInput {
  readonly name: string;
}

export interface CategoryInput {
  readonly name: string;
}

export interface ExpenseInput {
  readonly accountId: EntityId;
  readonly categoryId: EntityId;
  readonly amount: string;
  readonly description: string;
  /** ISO timestamp for imported or backdated entries; defaults to the clock. */
  readonly createdAt?: string | undefined;
}

export interface IncomeInput {
  readonly accountId: EntityId;
  readonly amount: string;
  readonly description: string;
  readonly createdAt?: string | undefined;
}

export interface TransferInput {
  readonly fromAccountId: EntityId;
  readonly toAccountId: EntityId;
  readonly amount: string;
  readonly createdAt?: string | undefined;
}

/** Partial update: absent fields keep their stored values. */
export type ExpensePatch = Partial<Omit<ExpenseInput, "createdAt">>;
export type IncomePatch = Partial<Omit<IncomeInput, "createdAt">>;
export type TransferPatch = Partial<Omit<TransferInput, "createdAt">>;

/**
 * One mutation of a ledger entry.
 * Every kind of entry goes through the same three operations.
 */
export type EntryMutation<TInput, TPatch> =
  | { readonly op: "create"; readonly input: TInput }
  | { readonly op: "update"; readonly id: EntityId; readonly patch: TPatch }
  | { readonly op: "delete"; readonly id: EntityId };

export type ExpenseMutation = EntryMutation<ExpenseInput, ExpensePatch>;
export type IncomeMutation = EntryMutation<IncomeInput, IncomePatch>;
export type TransferMutation = EntryMutation<TransferInput, TransferPatch>;

export interface TransferOptions {
  /**
   * Let one side of the transfer be the user's system account.
   * Only deposit flows pass this.
   */
  readonly allowSystemAccount?: boolean | undefined;
}

export interface DepositInput {
  readonly accountId: EntityId;
  readonly amount: string;
  readonly createdAt?: string | undefined;
}

export interface RandomDepositInput {
  readonly accountId: EntityId;
  readonly min: string;
  readonly max: string;
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Filter for single-sided entries. Time bounds are inclusive ISO timestamps.
 */
export interface EntryFilter {
  readonly accountId?: EntityId | undefined;
  readonly from?: string | undefined;
  readonly to?: string | undefined;
}

export interface TransferFilter {
  readonly fromAccountId?: EntityId | undefined;
  readonly toAccountId?: EntityId | undefined;
  /** Only transfers whose from-account is the user's system account. */
  readonly fromSystemOnly?: boolean | undefined;
  readonly from?: string | undefined;
  readonly to?: string | undefined;
}

// ─── Consistency Check ───────────────────────────────────────────────────

export interface BalanceDrift {
  readonly accountId: EntityId;
  readonly name: string;
  readonly cached: Amount;
  readonly computed: Amount;
}

export interface BalanceCheckReport {
  readonly consistent: boolean;
  readonly accountsChecked: number;
  readonly drifts: readonly BalanceDrift[];
  readonly checkedAt: string;
}

// ─── Engine Options ──────────────────────────────────────────────────────

export interface LedgerOptions {
  readonly store: LedgerStore;
  readonly clock?: Clock | undefined;
}
