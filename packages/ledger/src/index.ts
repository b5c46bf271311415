/**
 * @centwise/ledger — Balance-consistency engine.
 *
 * Keeps cached account balances equal to the sum of ledger activity:
 * - Expenses and incomes move one account, transfers move two
 * - Edits reverse the stored effect before applying the new one
 * - Accounts are locked in ascending id order before balances are read
 * - Transfers never overdraw a non-system account
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid mutations throw and change nothing
 * - Zero runtime dependencies
 */

// Core engine
export { Ledger, translateStoreError } from "./ledger.js";

// External account
export { SYSTEM_ACCOUNT_NAME, getOrCreateSystemAccount } from "./system-account.js";

// Balance effects
export type { BalanceDelta, BalanceEffect } from "./effects.js";
export {
  expenseEffect,
  incomeEffect,
  transferEffect,
  reverseEffect,
  netEffect,
  applyEffect,
  effectAccounts,
} from "./effects.js";

// Consistency audit
export type { LedgerHistory } from "./balance-calculator.js";
export { computeBalances, findDrifts, buildBalanceReport } from "./balance-calculator.js";

// Money math
export {
  AMOUNT_DECIMALS,
  MAX_ENTRY_AMOUNT,
  parseAmount,
  formatAmount,
} from "./money-math.js";

// Validation
export { MAX_NAME_LENGTH } from "./validation.js";

// Persistence port
export type {
  StoreErrorCode,
  StoreConstraint,
  NewAccount,
  NewCategory,
  NewExpense,
  NewIncome,
  NewTransfer,
  CategoryChanges,
  ExpenseChanges,
  IncomeChanges,
  TransferChanges,
  EntryQuery,
  TransferQuery,
  AccountQuery,
  StoreReader,
  StoreTransaction,
  LedgerStore,
} from "./store/types.js";
export { StoreError } from "./store/types.js";
export { InMemoryLedgerStore, DEFAULT_LOCK_TIMEOUT_MS } from "./store/in-memory-store.js";
export type { InMemoryLedgerStoreOptions } from "./store/in-memory-store.js";
export { LockManager } from "./store/lock-manager.js";
export type { LockOwner } from "./store/lock-manager.js";

// Types
export type {
  LedgerErrorCode,
  FieldErrors,
  AccountInput,
  CategoryInput,
  ExpenseInput,
  IncomeInput,
  TransferInput,
  ExpensePatch,
  IncomePatch,
  TransferPatch,
  EntryMutation,
  ExpenseMutation,
  IncomeMutation,
  TransferMutation,
  TransferOptions,
  DepositInput,
  RandomDepositInput,
  EntryFilter,
  TransferFilter,
  BalanceDrift,
  BalanceCheckReport,
  LedgerOptions,
} from "./types.js";
export { LedgerError } from "./types.js";
