/**
 * @centwise/ledger — In-memory LedgerStore implementation.
 *
 * Keeps every table in plain Maps. Suitable for:
 * - Unit and integration tests
 * - Local development (STORE_DRIVER=memory)
 *
 * Not durable: all state is lost on process exit.
 *
 * Isolation:
 * - Committed tables are never mutated; a commit builds new Maps and swaps them in
 * - A transaction writes to its own overlay and reads committed state through it
 * - Balance changes are kept as deltas and added to the committed balance at commit,
 *   so two transactions adjusting one account never overwrite each other
 * - read() sees a fixed snapshot of committed state
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
import { formatAmount, parseAmount } from "../money-math.js";
import { LockManager } from "./lock-manager.js";
import type { LockOwner } from "./lock-manager.js";
import type {
  AccountQuery,
  CategoryChanges,
  EntryQuery,
  ExpenseChanges,
  IncomeChanges,
  LedgerStore,
  NewAccount,
  NewCategory,
  NewExpense,
  NewIncome,
  NewTransfer,
  StoreReader,
  StoreTransaction,
  TransferChanges,
  TransferQuery,
} from "./types.js";
import { StoreError } from "./types.js";

/** Default wait for an account lock before giving up. */
export const DEFAULT_LOCK_TIMEOUT_MS = 5_000;

// ─── Tables ──────────────────────────────────────────────────────────────

interface AccountRecord {
  readonly id: EntityId;
  readonly userId: UserId;
  readonly name: string;
  readonly isSystem: boolean;
  readonly balance: bigint;
}

interface Tables {
  readonly accounts: ReadonlyMap<EntityId, AccountRecord>;
  readonly categories: ReadonlyMap<EntityId, Category>;
  readonly expenses: ReadonlyMap<EntityId, Expense>;
  readonly incomes: ReadonlyMap<EntityId, Income>;
  readonly transfers: ReadonlyMap<EntityId, Transfer>;
}

type TableName = keyof Tables;

function emptyTables(): Tables {
  return {
    accounts: new Map(),
    categories: new Map(),
    expenses: new Map(),
    incomes: new Map(),
    transfers: new Map(),
  };
}

/**
 * Rows of one table as seen by a reader: the base Map plus local changes.
 * A `null` change marks a deleted row.
 */
class TableView<R extends { readonly id: EntityId }> {
  private readonly _base: () => ReadonlyMap<EntityId, R>;
  private readonly _changes = new Map<EntityId, R | null>();

  constructor(base: () => ReadonlyMap<EntityId, R>) {
    this._base = base;
  }

  get(id: EntityId): R | undefined {
    if (this._changes.has(id)) return this._changes.get(id) ?? undefined;
    return this._base().get(id);
  }

  rows(): R[] {
    const merged = new Map(this._base());
    this.applyTo(merged);
    return [...merged.values()].sort((a, b) => a.id - b.id);
  }

  put(row: R): void {
    this._changes.set(row.id, row);
  }

  remove(id: EntityId): void {
    this._changes.set(id, null);
  }

  changedIds(): EntityId[] {
    return [...this._changes.keys()];
  }

  applyTo(target: Map<EntityId, R>): void {
    for (const [id, row] of this._changes) {
      if (row === null) target.delete(id);
      else target.set(id, row);
    }
  }
}

interface Views {
  readonly accounts: TableView<AccountRecord>;
  readonly categories: TableView<Category>;
  readonly expenses: TableView<Expense>;
  readonly incomes: TableView<Income>;
  readonly transfers: TableView<Transfer>;
}

function viewsOf(tables: () => Tables): Views {
  return {
    accounts: new TableView(() => tables().accounts),
    categories: new TableView(() => tables().categories),
    expenses: new TableView(() => tables().expenses),
    incomes: new TableView(() => tables().incomes),
    transfers: new TableView(() => tables().transfers),
  };
}

function withinPeriod(createdAt: string, from: string | undefined, to: string | undefined): boolean {
  if (from !== undefined && createdAt < from) return false;
  if (to !== undefined && createdAt > to) return false;
  return true;
}

function matchesEntry(row: Expense | Income, query: EntryQuery): boolean {
  return (
    row.userId === query.userId &&
    (query.accountId === undefined || row.accountId === query.accountId) &&
    withinPeriod(row.createdAt, query.from, query.to)
  );
}

// ─── Reader ──────────────────────────────────────────────────────────────

class InMemoryReader implements StoreReader {
  protected readonly _views: Views;
  private _closed = false;

  constructor(views: Views) {
    this._views = views;
  }

  close(): void {
    this._closed = true;
  }

  async getAccount(id: EntityId): Promise<Account | undefined> {
    this._assertOpen();
    const record = this._views.accounts.get(id);
    return record === undefined ? undefined : this._toAccount(record);
  }

  async listAccounts(userId: UserId, query?: AccountQuery): Promise<readonly Account[]> {
    this._assertOpen();
    const includeSystem = query?.includeSystem === true;
    return this._views.accounts
      .rows()
      .filter((r) => r.userId === userId && (includeSystem || !r.isSystem))
      .map((r) => this._toAccount(r));
  }

  async findSystemAccount(userId: UserId): Promise<Account | undefined> {
    this._assertOpen();
    const record = this._views.accounts.rows().find((r) => r.userId === userId && r.isSystem);
    return record === undefined ? undefined : this._toAccount(record);
  }

  async getCategory(id: EntityId): Promise<Category | undefined> {
    this._assertOpen();
    return this._views.categories.get(id);
  }

  async listCategories(userId: UserId): Promise<readonly Category[]> {
    this._assertOpen();
    return this._views.categories.rows().filter((r) => r.userId === userId);
  }

  async getExpense(id: EntityId): Promise<Expense | undefined> {
    this._assertOpen();
    return this._views.expenses.get(id);
  }

  async listExpenses(query: EntryQuery): Promise<readonly Expense[]> {
    this._assertOpen();
    return this._views.expenses.rows().filter((r) => matchesEntry(r, query));
  }

  async getIncome(id: EntityId): Promise<Income | undefined> {
    this._assertOpen();
    return this._views.incomes.get(id);
  }

  async listIncomes(query: EntryQuery): Promise<readonly Income[]> {
    this._assertOpen();
    return this._views.incomes.rows().filter((r) => matchesEntry(r, query));
  }

  async getTransfer(id: EntityId): Promise<Transfer | undefined> {
    this._assertOpen();
    return this._views.transfers.get(id);
  }

  async listTransfers(query: TransferQuery): Promise<readonly Transfer[]> {
    this._assertOpen();
    return this._views.transfers
      .rows()
      .filter(
        (r) =>
          r.userId === query.userId &&
          (query.fromAccountId === undefined || r.fromAccountId === query.fromAccountId) &&
          (query.toAccountId === undefined || r.toAccountId === query.toAccountId) &&
          withinPeriod(r.createdAt, query.from, query.to),
      );
  }

  protected _balanceOf(record: AccountRecord): bigint {
    return record.balance;
  }

  protected _assertOpen(): void {
    if (this._closed) {
      throw new StoreError("CLOSED", "Transaction handle used after it ended");
    }
  }

  protected _toAccount(record: AccountRecord): Account {
    return {
      id: record.id,
      userId: record.userId,
      name: record.name,
      balance: formatAmount(this._balanceOf(record)),
      isSystem: record.isSystem,
    };
  }
}

// ─── Transaction ─────────────────────────────────────────────────────────

interface TransactionContext {
  readonly committed: () => Tables;
  readonly nextId: (table: TableName) => EntityId;
  readonly locks: LockManager;
  readonly owner: LockOwner;
}

class InMemoryTransaction extends InMemoryReader implements StoreTransaction {
  private readonly _ctx: TransactionContext;
  private readonly _deltas = new Map<EntityId, bigint>();

  constructor(ctx: TransactionContext) {
    super(viewsOf(ctx.committed));
    this._ctx = ctx;
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  async insertAccount(row: NewAccount): Promise<Account> {
    this._assertOpen();
    this._assertAccountNameFree(row.userId, row.name, undefined);
    if (row.isSystem && this._views.accounts.rows().some((r) => r.userId === row.userId && r.isSystem)) {
      throw new StoreError(
        "UNIQUE_VIOLATION",
        `User ${row.userId} already has a system account`,
        "system_account_per_user",
      );
    }

    const record: AccountRecord = { id: this._ctx.nextId("accounts"), ...row, balance: 0n };
    this._views.accounts.put(record);
    return this._account(record.id);
  }

  async renameAccount(id: EntityId, name: string): Promise<Account> {
    this._assertOpen();
    const record = this._requireRow(this._views.accounts, id, "Account");
    this._assertAccountNameFree(record.userId, name, id);
    this._views.accounts.put({ ...record, name });
    return this._account(id);
  }

  async deleteAccount(id: EntityId): Promise<void> {
    this._assertOpen();
    this._requireRow(this._views.accounts, id, "Account");

    const referenced =
      this._views.expenses.rows().some((r) => r.accountId === id) ||
      this._views.incomes.rows().some((r) => r.accountId === id) ||
      this._views.transfers.rows().some((r) => r.fromAccountId === id || r.toAccountId === id);
    if (referenced) {
      throw new StoreError(
        "REFERENCE_VIOLATION",
        `Account ${String(id)} is referenced by ledger entries`,
        "account_has_entries",
      );
    }

    this._views.accounts.remove(id);
    this._deltas.delete(id);
  }

  async adjustBalance(accountId: EntityId, delta: bigint): Promise<void> {
    this._assertOpen();
    this._requireRow(this._views.accounts, accountId, "Account");
    this._deltas.set(accountId, (this._deltas.get(accountId) ?? 0n) + delta);
  }

  async lockAccounts(ids: readonly EntityId[]): Promise<readonly Account[]> {
    this._assertOpen();
    await this._ctx.locks.acquire(this._ctx.owner, ids);

    const rows: Account[] = [];
    for (const id of [...new Set(ids)].sort((a, b) => a - b)) {
      const account = await this.getAccount(id);
      if (account !== undefined) rows.push(account);
    }
    return rows;
  }

  async unlockAccounts(): Promise<void> {
    this._assertOpen();
    this._ctx.locks.releaseAll(this._ctx.owner);
  }

  // ─── Categories ─────────────────────────────────────────────────────

  async insertCategory(row: NewCategory): Promise<Category> {
    this._assertOpen();
    this._assertCategoryNameFree(row.userId, row.name, undefined);
    const category: Category = { id: this._ctx.nextId("categories"), ...row };
    this._views.categories.put(category);
    return category;
  }

  async updateCategory(id: EntityId, changes: CategoryChanges): Promise<Category> {
    this._assertOpen();
    const current = this._requireRow(this._views.categories, id, "Category");
    this._assertCategoryNameFree(current.userId, changes.name, id);
    const updated: Category = { ...current, ...changes };
    this._views.categories.put(updated);
    return updated;
  }

  async deleteCategory(id: EntityId): Promise<void> {
    this._assertOpen();
    this._requireRow(this._views.categories, id, "Category");
    if (this._views.expenses.rows().some((r) => r.categoryId === id)) {
      throw new StoreError(
        "REFERENCE_VIOLATION",
        `Category ${String(id)} is referenced by expenses`,
        "category_has_expenses",
      );
    }
    this._views.categories.remove(id);
  }

  // ─── Entries ────────────────────────────────────────────────────────

  async insertExpense(row: NewExpense): Promise<Expense> {
    this._assertOpen();
    this._assertPositive(row.amount);
    this._assertAccountExists(row.accountId);
    this._assertCategoryExists(row.categoryId);
    const expense: Expense = { id: this._ctx.nextId("expenses"), ...row };
    this._views.expenses.put(expense);
    return expense;
  }

  async updateExpense(id: EntityId, changes: ExpenseChanges): Promise<Expense> {
    this._assertOpen();
    const current = this._requireRow(this._views.expenses, id, "Expense");
    this._assertPositive(changes.amount);
    this._assertAccountExists(changes.accountId);
    this._assertCategoryExists(changes.categoryId);
    const updated: Expense = { ...current, ...changes };
    this._views.expenses.put(updated);
    return updated;
  }

  async deleteExpense(id: EntityId): Promise<void> {
    this._assertOpen();
    this._requireRow(this._views.expenses, id, "Expense");
    this._views.expenses.remove(id);
  }

  async insertIncome(row: NewIncome): Promise<Income> {
    this._assertOpen();
    this._assertPositive(row.amount);
    this._assertAccountExists(row.accountId);
    const income: Income = { id: this._ctx.nextId("incomes"), ...row };
    this._views.incomes.put(income);
    return income;
  }

  async updateIncome(id: EntityId, changes: IncomeChanges): Promise<Income> {
    this._assertOpen();
    const current = this._requireRow(this._views.incomes, id, "Income");
    this._assertPositive(changes.amount);
    this._assertAccountExists(changes.accountId);
    const updated: Income = { ...current, ...changes };
    this._views.incomes.put(updated);
    return updated;
  }

  async deleteIncome(id: EntityId): Promise<void> {
    this._assertOpen();
    this._requireRow(this._views.incomes, id, "Income");
    this._views.incomes.remove(id);
  }

  async insertTransfer(row: NewTransfer): Promise<Transfer> {
    this._assertOpen();
    this._assertTransferShape(row);
    const transfer: Transfer = { id: this._ctx.nextId("transfers"), ...row };
    this._views.transfers.put(transfer);
    return transfer;
  }

  async updateTransfer(id: EntityId, changes: TransferChanges): Promise<Transfer> {
    this._assertOpen();
    const current = this._requireRow(this._views.transfers, id, "Transfer");
    this._assertTransferShape(changes);
    const updated: Transfer = { ...current, ...changes };
    this._views.transfers.put(updated);
    return updated;
  }

  async deleteTransfer(id: EntityId): Promise<void> {
    this._assertOpen();
    this._requireRow(this._views.transfers, id, "Transfer");
    this._views.transfers.remove(id);
  }

  // ─── Commit ─────────────────────────────────────────────────────────

  /**
   * Build the tables that result from applying this transaction to `base`.
   * `base` itself is left untouched.
   */
  mergeInto(base: Tables): Tables {
    const accounts = new Map(base.accounts);
    this._views.accounts.applyTo(accounts);

    // Rewritten rows carry no balance of their own; the committed one stands.
    for (const id of this._views.accounts.changedIds()) {
      const record = accounts.get(id);
      if (record !== undefined) {
        accounts.set(id, { ...record, balance: base.accounts.get(id)?.balance ?? 0n });
      }
    }

    for (const [id, delta] of this._deltas) {
      const record = accounts.get(id);
      if (record === undefined) {
        throw new StoreError("ROW_NOT_FOUND", `Account ${String(id)} no longer exists`);
      }
      accounts.set(id, { ...record, balance: record.balance + delta });
    }

    const categories = new Map(base.categories);
    this._views.categories.applyTo(categories);
    const expenses = new Map(base.expenses);
    this._views.expenses.applyTo(expenses);
    const incomes = new Map(base.incomes);
    this._views.incomes.applyTo(incomes);
    const transfers = new Map(base.transfers);
    this._views.transfers.applyTo(transfers);

    return { accounts, categories, expenses, incomes, transfers };
  }

  protected override _balanceOf(record: AccountRecord): bigint {
    const committed = this._ctx.committed().accounts.get(record.id)?.balance ?? 0n;
    return committed + (this._deltas.get(record.id) ?? 0n);
  }

  // ─── Constraint checks ──────────────────────────────────────────────

  private _account(id: EntityId): Account {
    return this._toAccount(this._requireRow(this._views.accounts, id, "Account"));
  }

  private _requireRow<R extends { readonly id: EntityId }>(
    view: TableView<R>,
    id: EntityId,
    label: string,
  ): R {
    const row = view.get(id);
    if (row === undefined) {
      throw new StoreError("ROW_NOT_FOUND", `${label} ${String(id)} not found`);
    }
    return row;
  }

  private _assertAccountNameFree(userId: UserId, name: string, except: EntityId | undefined): void {
    const taken = this._views.accounts
      .rows()
      .some((r) => r.userId === userId && r.name === name && r.id !== except);
    if (taken) {
      throw new StoreError(
        "UNIQUE_VIOLATION",
        `Account name "${name}" already exists`,
        "account_name_per_user",
      );
    }
  }

  private _assertCategoryNameFree(userId: UserId, name: string, except: EntityId | undefined): void {
    const taken = this._views.categories
      .rows()
      .some((r) => r.userId === userId && r.name === name && r.id !== except);
    if (taken) {
      throw new StoreError(
        "UNIQUE_VIOLATION",
        `Category name "${name}" already exists`,
        "category_name_per_user",
      );
    }
  }

  private _assertAccountExists(id: EntityId): void {
    if (this._views.accounts.get(id) === undefined) {
      throw new StoreError(
        "REFERENCE_VIOLATION",
        `Account ${String(id)} does not exist`,
        "entry_account_exists",
      );
    }
  }

  private _assertCategoryExists(id: EntityId): void {
    if (this._views.categories.get(id) === undefined) {
      throw new StoreError(
        "REFERENCE_VIOLATION",
        `Category ${String(id)} does not exist`,
        "expense_category_exists",
      );
    }
  }

  private _assertPositive(amount: string): void {
    if (parseAmount(amount) <= 0n) {
      throw new StoreError("CHECK_VIOLATION", `Amount must be positive, got ${amount}`, "positive_amount");
    }
  }

  private _assertTransferShape(row: Pick<Transfer, "fromAccountId" | "toAccountId" | "amount">): void {
    this._assertPositive(row.amount);
    if (row.fromAccountId === row.toAccountId) {
      throw new StoreError(
        "CHECK_VIOLATION",
        "Transfer accounts must differ",
        "distinct_transfer_accounts",
      );
    }
    this._assertAccountExists(row.fromAccountId);
    this._assertAccountExists(row.toAccountId);
  }
}

// ─── Whole-state validation ──────────────────────────────────────────────

/**
 * Re-check every cross-row constraint on the tables about to be committed.
 * Catches conflicts between transactions that each passed their own checks.
 */
function validateTables(tables: Tables): void {
  const accountNames = new Set<string>();
  const systemOwners = new Set<UserId>();
  for (const account of tables.accounts.values()) {
    const key = `${account.userId}\u0000${account.name}`;
    if (accountNames.has(key)) {
      throw new StoreError(
        "UNIQUE_VIOLATION",
        `Account name "${account.name}" already exists`,
        "account_name_per_user",
      );
    }
    accountNames.add(key);

    if (account.isSystem) {
      if (systemOwners.has(account.userId)) {
        throw new StoreError(
          "UNIQUE_VIOLATION",
          `User ${account.userId} already has a system account`,
          "system_account_per_user",
        );
      }
      systemOwners.add(account.userId);
    }
  }

  const categoryNames = new Set<string>();
  for (const category of tables.categories.values()) {
    const key = `${category.userId}\u0000${category.name}`;
    if (categoryNames.has(key)) {
      throw new StoreError(
        "UNIQUE_VIOLATION",
        `Category name "${category.name}" already exists`,
        "category_name_per_user",
      );
    }
    categoryNames.add(key);
  }

  const accountIds: EntityId[] = [];
  for (const expense of tables.expenses.values()) {
    accountIds.push(expense.accountId);
    if (!tables.categories.has(expense.categoryId)) {
      throw new StoreError(
        "REFERENCE_VIOLATION",
        `Category ${String(expense.categoryId)} does not exist`,
        "expense_category_exists",
      );
    }
  }
  for (const income of tables.incomes.values()) accountIds.push(income.accountId);
  for (const transfer of tables.transfers.values()) {
    accountIds.push(transfer.fromAccountId, transfer.toAccountId);
  }

  for (const id of accountIds) {
    if (!tables.accounts.has(id)) {
      throw new StoreError(
        "REFERENCE_VIOLATION",
        `Account ${String(id)} does not exist`,
        "entry_account_exists",
      );
    }
  }
}

// ─── Store ───────────────────────────────────────────────────────────────

export interface InMemoryLedgerStoreOptions {
  /** Milliseconds to wait for an account lock. Default 5000. */
  readonly lockTimeoutMs?: number | undefined;
}

export class InMemoryLedgerStore implements LedgerStore {
  private _tables: Tables = emptyTables();
  private readonly _sequences: Record<TableName, number> = {
    accounts: 0,
    categories: 0,
    expenses: 0,
    incomes: 0,
    transfers: 0,
  };
  private readonly _locks: LockManager;
  private _closed = false;

  constructor(options?: InMemoryLedgerStoreOptions) {
    this._locks = new LockManager(options?.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS);
  }

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    this._assertOpen();
    const owner: LockOwner = Symbol("transaction");
    const tx = new InMemoryTransaction({
      committed: () => this._tables,
      nextId: (table) => ++this._sequences[table],
      locks: this._locks,
      owner,
    });

    try {
      const result = await work(tx);
      const next = tx.mergeInto(this._tables);
      validateTables(next);
      this._tables = next;
      return result;
    } finally {
      tx.close();
      this._locks.releaseAll(owner);
    }
  }

  async read<T>(work: (reader: StoreReader) => Promise<T>): Promise<T> {
    this._assertOpen();
    const snapshot = this._tables;
    const reader = new InMemoryReader(viewsOf(() => snapshot));
    try {
      return await work(reader);
    } finally {
      reader.close();
    }
  }

  async close(): Promise<void> {
    this._closed = true;
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new StoreError("CLOSED", "Store is closed");
    }
  }
}
