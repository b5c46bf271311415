/**
 * @centwise/types — Shared entity types for the centwise stack.
 *
 * These types are used across all centwise packages:
 * - Accounts with cached balances
 * - Categories
 * - Ledger entries (expenses, incomes, transfers)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are strings; arithmetic lives in @centwise/ledger
 */

export type {
  EntityId,
  UserId,
  Amount,
  Account,
  Category,
  Expense,
  Income,
  Transfer,
  LedgerEntryKind,
  Clock,
} from "./entities.js";

export {
  isAmount,
  isLedgerEntryKind,
  isAccount,
  isCategory,
  isExpense,
  isIncome,
  isTransfer,
} from "./guards.js";
