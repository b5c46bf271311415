/**
 * @centwise/ledger — Persistence port.
 *
 * Defines the transactional boundary the ledger engine runs on.
 * Implementations: InMemoryLedgerStore (this package) and the
 * SQLite store in @centwise/store-sqlite.
 *
 * Contract:
 * - transaction() is all-or-nothing; a thrown error discards every write
 * - Balances change only through adjustBalance() (signed delta, never overwrite)
 * - lockAccounts() takes exclusive row locks in ascending id order and
 *   holds them until the enclosing transaction ends (or unlockAccounts())
 * - Constraints listed in StoreConstraint are enforced by the store itself
 */

import type {
  Account,
  Category,
  EntityId,
  Expense,
  Income,
  Transfer,
  UserId,
} from "@centwise/types";

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "UNIQUE_VIOLATION"
  | "REFERENCE_VIOLATION"
  | "CHECK_VIOLATION"
  | "LOCK_TIMEOUT"
  | "ROW_NOT_FOUND"
  | "CLOSED";

/**
 * Named storage constraints.
 * The ledger maps each one to a domain error.
 */
export type StoreConstraint =
  | "account_name_per_user"
  | "system_account_per_user"
  | "category_name_per_user"
  | "account_has_entries"
  | "category_has_expenses"
  | "entry_account_exists"
  | "expense_category_exists"
  | "positive_amount"
  | "distinct_transfer_accounts";

export class StoreError extends Error {
  public readonly code: StoreErrorCode;
  public readonly constraint: StoreConstraint | undefined;

  constructor(code: StoreErrorCode, message: string, constraint?: StoreConstraint) {
    super(message);
    this.name = "StoreError";
    this.code = code;
    this.constraint = constraint;
  }
}

// =============================================================================
// Rows
// =============================================================================

export interface NewAccount {
  readonly userId: UserId;
  readonly name: string;
  readonly isSystem: boolean;
}

export type NewCategory = Omit<Category, "id">;
export type NewExpense = Omit<Expense, "id">;
export type NewIncome = Omit<Income, "id">;
export type NewTransfer = Omit<Transfer, "id">;

export type CategoryChanges = Pick<Category, "name" | "updatedAt">;
export type ExpenseChanges = Pick<
  Expense,
  "accountId" | "categoryId" | "amount" | "description" | "updatedAt"
>;
export type IncomeChanges = Pick<Income, "accountId" | "amount" | "description" | "updatedAt">;
export type TransferChanges = Pick<Transfer, "fromAccountId" | "toAccountId" | "amount">;

// =============================================================================
// Queries
// =============================================================================

/** Time bounds are inclusive ISO-8601 timestamps compared on `createdAt`. */
export interface EntryQuery {
  readonly userId: UserId;
  readonly accountId?: EntityId | undefined;
  readonly from?: string | undefined;
  readonly to?: string | undefined;
}

export interface TransferQuery {
  readonly userId: UserId;
  readonly fromAccountId?: EntityId | undefined;
  readonly toAccountId?: EntityId | undefined;
  readonly from?: string | undefined;
  readonly to?: string | undefined;
}

export interface AccountQuery {
  readonly includeSystem?: boolean | undefined;
}

// =============================================================================
// Handles
// =============================================================================

/**
 * Read access. Results are ordered by ascending id.
 */
export interface StoreReader {
  getAccount(id: EntityId): Promise<Account | undefined>;
  listAccounts(userId: UserId, query?: AccountQuery): Promise<readonly Account[]>;
  findSystemAccount(userId: UserId): Promise<Account | undefined>;

  getCategory(id: EntityId): Promise<Category | undefined>;
  listCategories(userId: UserId): Promise<readonly Category[]>;

  getExpense(id: EntityId): Promise<Expense | undefined>;
  listExpenses(query: EntryQuery): Promise<readonly Expense[]>;

  getIncome(id: EntityId): Promise<Income | undefined>;
  listIncomes(query: EntryQuery): Promise<readonly Income[]>;

  getTransfer(id: EntityId): Promise<Transfer | undefined>;
  listTransfers(query: TransferQuery): Promise<readonly Transfer[]>;
}

/**
 * Read-write access inside one transaction.
 */
export interface StoreTransaction extends StoreReader {
  insertAccount(row: NewAccount): Promise<Account>;
  renameAccount(id: EntityId, name: string): Promise<Account>;
  deleteAccount(id: EntityId): Promise<void>;

  /** Add a signed delta (minor units) to an account's balance. */
  adjustBalance(accountId: EntityId, delta: bigint): Promise<void>;

  /**
   * Exclusively lock the given accounts until the transaction ends.
   * Returns the rows that exist, ordered by id; missing ids are skipped.
   */
  lockAccounts(ids: readonly EntityId[]): Promise<readonly Account[]>;

  /**
   * Release every lock this transaction holds. Only called before the
   * transaction has written anything.
   */
  unlockAccounts(): Promise<void>;

  insertCategory(row: NewCategory): Promise<Category>;
  updateCategory(id: EntityId, changes: CategoryChanges): Promise<Category>;
  deleteCategory(id: EntityId): Promise<void>;

  insertExpense(row: NewExpense): Promise<Expense>;
  updateExpense(id: EntityId, changes: ExpenseChanges): Promise<Expense>;
  deleteExpense(id: EntityId): Promise<void>;

  insertIncome(row: NewIncome): Promise<Income>;
  updateIncome(id: EntityId, changes: IncomeChanges): Promise<Income>;
  deleteIncome(id: EntityId): Promise<void>;

  insertTransfer(row: NewTransfer): Promise<Transfer>;
  updateTransfer(id: EntityId, changes: TransferChanges): Promise<Transfer>;
  deleteTransfer(id: EntityId): Promise<void>;
}

/**
 * A transactional store for accounts, categories and ledger entries.
 */
export interface LedgerStore {
  /** Run `work` as one atomic unit. */
  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;

  /** Run `work` against committed state only. */
  read<T>(work: (reader: StoreReader) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
