/**
 * @centwise/store-sqlite — Durable LedgerStore on a single SQLite connection.
 *
 * better-sqlite3 is synchronous, but ledger work awaits between
 * statements, so units of work are queued one at a time through a
 * WriteGate. Each transaction runs inside BEGIN IMMEDIATE, which also
 * makes lockAccounts() a plain read: nothing else can write meanwhile.
 *
 * Reads share the queue so they never observe a transaction that has
 * not committed yet.
 */

import Database from "better-sqlite3";
import type {
  Account,
  Category,
  EntityId,
  Expense,
  Income,
  Transfer,
  UserId,
} from "@centwise/types";
import { DEFAULT_LOCK_TIMEOUT_MS, StoreError, formatAmount, parseAmount } from "@centwise/ledger";
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
  StoreConstraint,
  StoreReader,
  StoreTransaction,
  TransferChanges,
  TransferQuery,
} from "@centwise/ledger";
import { applySchema } from "./schema.js";
import { mapSqliteError } from "./errors.js";
import { WriteGate } from "./write-gate.js";

// ─── Rows ────────────────────────────────────────────────────────────────

interface AccountRow {
  id: number;
  user_id: string;
  name: string;
  balance: number;
  is_system: number;
}

interface CategoryRow {
  id: number;
  user_id: string;
  name: string;
  created_at: string;
  updated_at: string;
}

interface ExpenseRow {
  id: number;
  user_id: string;
  account_id: number;
  category_id: number;
  amount: number;
  description: string;
  created_at: string;
  updated_at: string;
}

interface IncomeRow {
  id: number;
  user_id: string;
  account_id: number;
  amount: number;
  description: string;
  created_at: string;
  updated_at: string;
}

interface TransferRow {
  id: number;
  user_id: string;
  from_account_id: number;
  to_account_id: number;
  amount: number;
  created_at: string;
}

interface PeriodParams {
  from: string | null;
  to: string | null;
}

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    balance: formatAmount(BigInt(row.balance)),
    isSystem: row.is_system === 1,
  };
}

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toExpense(row: ExpenseRow): Expense {
  return {
    id: row.id,
    userId: row.user_id,
    accountId: row.account_id,
    categoryId: row.category_id,
    amount: formatAmount(BigInt(row.amount)),
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toIncome(row: IncomeRow): Income {
  return {
    id: row.id,
    userId: row.user_id,
    accountId: row.account_id,
    amount: formatAmount(BigInt(row.amount)),
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toTransfer(row: TransferRow): Transfer {
  return {
    id: row.id,
    userId: row.user_id,
    fromAccountId: row.from_account_id,
    toAccountId: row.to_account_id,
    amount: formatAmount(BigInt(row.amount)),
    createdAt: row.created_at,
  };
}

// ─── Statements ──────────────────────────────────────────────────────────

const ACCOUNT_COLUMNS = "id, user_id, name, balance, is_system";
const CATEGORY_COLUMNS = "id, user_id, name, created_at, updated_at";
const EXPENSE_COLUMNS =
  "id, user_id, account_id, category_id, amount, description, created_at, updated_at";
const INCOME_COLUMNS = "id, user_id, account_id, amount, description, created_at, updated_at";
const TRANSFER_COLUMNS = "id, user_id, from_account_id, to_account_id, amount, created_at";

const PERIOD_CLAUSE =
  "(@from IS NULL OR created_at >= @from) AND (@to IS NULL OR created_at <= @to)";

function prepareStatements(db: Database.Database) {
  return {
    getAccount: db.prepare<[number], AccountRow>(`SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = ?`),
    listAccounts: db.prepare<{ user_id: string; include_system: number }, AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts
       WHERE user_id = @user_id AND (@include_system = 1 OR is_system = 0)
       ORDER BY id`,
    ),
    findSystemAccount: db.prepare<[string], AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE user_id = ? AND is_system = 1`,
    ),
    insertAccount: db.prepare<[string, string, number]>(
      "INSERT INTO accounts (user_id, name, is_system) VALUES (?, ?, ?)",
    ),
    renameAccount: db.prepare<[string, number]>("UPDATE accounts SET name = ? WHERE id = ?"),
    deleteAccount: db.prepare<[number]>("DELETE FROM accounts WHERE id = ?"),
    adjustBalance: db.prepare<[bigint, number]>("UPDATE accounts SET balance = balance + ? WHERE id = ?"),
    accountReferenced: db.prepare<{ id: number }, { referenced: number }>(
      `SELECT EXISTS (SELECT 1 FROM expenses WHERE account_id = @id)
           OR EXISTS (SELECT 1 FROM incomes WHERE account_id = @id)
           OR EXISTS (SELECT 1 FROM transfers WHERE from_account_id = @id OR to_account_id = @id)
         AS referenced`,
    ),

    getCategory: db.prepare<[number], CategoryRow>(`SELECT ${CATEGORY_COLUMNS} FROM categories WHERE id = ?`),
    listCategories: db.prepare<[string], CategoryRow>(
      `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE user_id = ? ORDER BY id`,
    ),
    insertCategory: db.prepare<[string, string, string, string]>(
      "INSERT INTO categories (user_id, name, created_at, updated_at) VALUES (?, ?, ?, ?)",
    ),
    updateCategory: db.prepare<[string, string, number]>(
      "UPDATE categories SET name = ?, updated_at = ? WHERE id = ?",
    ),
    deleteCategory: db.prepare<[number]>("DELETE FROM categories WHERE id = ?"),
    categoryReferenced: db.prepare<[number], { referenced: number }>(
      "SELECT EXISTS (SELECT 1 FROM expenses WHERE category_id = ?) AS referenced",
    ),

    getExpense: db.prepare<[number], ExpenseRow>(`SELECT ${EXPENSE_COLUMNS} FROM expenses WHERE id = ?`),
    listExpenses: db.prepare<PeriodParams & { user_id: string; account_id: number | null }, ExpenseRow>(
      `SELECT ${EXPENSE_COLUMNS} FROM expenses
       WHERE user_id = @user_id AND (@account_id IS NULL OR account_id = @account_id) AND ${PERIOD_CLAUSE}
       ORDER BY id`,
    ),
    insertExpense: db.prepare<[string, number, number, bigint, string, string, string]>(
      `INSERT INTO expenses (user_id, account_id, category_id, amount, description, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    ),
    updateExpense: db.prepare<[number, number, bigint, string, string, number]>(
      `UPDATE expenses SET account_id = ?, category_id = ?, amount = ?, description = ?, updated_at = ?
       WHERE id = ?`,
    ),
    deleteExpense: db.prepare<[number]>("DELETE FROM expenses WHERE id = ?"),

    getIncome: db.prepare<[number], IncomeRow>(`SELECT ${INCOME_COLUMNS} FROM incomes WHERE id = ?`),
    listIncomes: db.prepare<PeriodParams & { user_id: string; account_id: number | null }, IncomeRow>(
      `SELECT ${INCOME_COLUMNS} FROM incomes
       WHERE user_id = @user_id AND (@account_id IS NULL OR account_id = @account_id) AND ${PERIOD_CLAUSE}
       ORDER BY id`,
    ),
    insertIncome: db.prepare<[string, number, bigint, string, string, string]>(
      `INSERT INTO incomes (user_id, account_id, amount, description, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ),
    updateIncome: db.prepare<[number, bigint, string, string, number]>(
      "UPDATE incomes SET account_id = ?, amount = ?, description = ?, updated_at = ? WHERE id = ?",
    ),
    deleteIncome: db.prepare<[number]>("DELETE FROM incomes WHERE id = ?"),

    getTransfer: db.prepare<[number], TransferRow>(`SELECT ${TRANSFER_COLUMNS} FROM transfers WHERE id = ?`),
    listTransfers: db.prepare<
      PeriodParams & { user_id: string; from_account_id: number | null; to_account_id: number | null },
      TransferRow
    >(
      `SELECT ${TRANSFER_COLUMNS} FROM transfers
       WHERE user_id = @user_id
         AND (@from_account_id IS NULL OR from_account_id = @from_account_id)
         AND (@to_account_id IS NULL OR to_account_id = @to_account_id)
         AND ${PERIOD_CLAUSE}
       ORDER BY id`,
    ),
    insertTransfer: db.prepare<[string, number, number, bigint, string]>(
      `INSERT INTO transfers (user_id, from_account_id, to_account_id, amount, created_at)
       VALUES (?, ?, ?, ?, ?)`,
    ),
    updateTransfer: db.prepare<[number, number, bigint, number]>(
      "UPDATE transfers SET from_account_id = ?, to_account_id = ?, amount = ? WHERE id = ?",
    ),
    deleteTransfer: db.prepare<[number]>("DELETE FROM transfers WHERE id = ?"),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

function period(query: { from?: string | undefined; to?: string | undefined }): PeriodParams {
  return { from: query.from ?? null, to: query.to ?? null };
}

// ─── Reader ──────────────────────────────────────────────────────────────

class SqliteReader implements StoreReader {
  private _open = true;

  constructor(protected readonly _stmts: Statements) {}

  /** Invalidate the handle once its unit of work ends. */
  end(): void {
    this._open = false;
  }

  protected _assertOpen(): void {
    if (!this._open) {
      throw new StoreError("CLOSED", "Transaction handle used after it ended");
    }
  }

  async getAccount(id: EntityId): Promise<Account | undefined> {
    this._assertOpen();
    const row = this._stmts.getAccount.get(id);
    return row === undefined ? undefined : toAccount(row);
  }

  async listAccounts(userId: UserId, query?: AccountQuery): Promise<readonly Account[]> {
    this._assertOpen();
    const rows = this._stmts.listAccounts.all({
      user_id: userId,
      include_system: query?.includeSystem === true ? 1 : 0,
    });
    return rows.map(toAccount);
  }

  async findSystemAccount(userId: UserId): Promise<Account | undefined> {
    this._assertOpen();
    const row = this._stmts.findSystemAccount.get(userId);
    return row === undefined ? undefined : toAccount(row);
  }

  async getCategory(id: EntityId): Promise<Category | undefined> {
    this._assertOpen();
    const row = this._stmts.getCategory.get(id);
    return row === undefined ? undefined : toCategory(row);
  }

  async listCategories(userId: UserId): Promise<readonly Category[]> {
    this._assertOpen();
    return this._stmts.listCategories.all(userId).map(toCategory);
  }

  async getExpense(id: EntityId): Promise<Expense | undefined> {
    this._assertOpen();
    const row = this._stmts.getExpense.get(id);
    return row === undefined ? undefined : toExpense(row);
  }

  async listExpenses(query: EntryQuery): Promise<readonly Expense[]> {
    this._assertOpen();
    const rows = this._stmts.listExpenses.all({
      user_id: query.userId,
      account_id: query.accountId ?? null,
      ...period(query),
    });
    return rows.map(toExpense);
  }

  async getIncome(id: EntityId): Promise<Income | undefined> {
    this._assertOpen();
    const row = this._stmts.getIncome.get(id);
    return row === undefined ? undefined : toIncome(row);
  }

  async listIncomes(query: EntryQuery): Promise<readonly Income[]> {
    this._assertOpen();
    const rows = this._stmts.listIncomes.all({
      user_id: query.userId,
      account_id: query.accountId ?? null,
      ...period(query),
    });
    return rows.map(toIncome);
  }

  async getTransfer(id: EntityId): Promise<Transfer | undefined> {
    this._assertOpen();
    const row = this._stmts.getTransfer.get(id);
    return row === undefined ? undefined : toTransfer(row);
  }

  async listTransfers(query: TransferQuery): Promise<readonly Transfer[]> {
    this._assertOpen();
    const rows = this._stmts.listTransfers.all({
      user_id: query.userId,
      from_account_id: query.fromAccountId ?? null,
      to_account_id: query.toAccountId ?? null,
      ...period(query),
    });
    return rows.map(toTransfer);
  }
}

// ─── Transaction ─────────────────────────────────────────────────────────

class SqliteTransaction extends SqliteReader implements StoreTransaction {
  async insertAccount(row: NewAccount): Promise<Account> {
    this._assertOpen();
    const info = this._exec(() =>
      this._stmts.insertAccount.run(row.userId, row.name, row.isSystem ? 1 : 0),
    );
    return this._requireAccount(Number(info.lastInsertRowid));
  }

  async renameAccount(id: EntityId, name: string): Promise<Account> {
    this._assertOpen();
    this._changed(this._exec(() => this._stmts.renameAccount.run(name, id)).changes, "Account", id);
    return this._requireAccount(id);
  }

  async deleteAccount(id: EntityId): Promise<void> {
    this._assertOpen();
    this._requireAccount(id);
    if (this._stmts.accountReferenced.get({ id })?.referenced === 1) {
      throw new StoreError(
        "REFERENCE_VIOLATION",
        `Account ${String(id)} is referenced by ledger entries`,
        "account_has_entries",
      );
    }
    this._exec(() => this._stmts.deleteAccount.run(id));
  }

  async adjustBalance(accountId: EntityId, delta: bigint): Promise<void> {
    this._assertOpen();
    const info = this._exec(() => this._stmts.adjustBalance.run(delta, accountId));
    this._changed(info.changes, "Account", accountId);
  }

  async lockAccounts(ids: readonly EntityId[]): Promise<readonly Account[]> {
    this._assertOpen();
    const locked: Account[] = [];
    for (const id of [...new Set(ids)].sort((a, b) => a - b)) {
      const row = this._stmts.getAccount.get(id);
      if (row !== undefined) locked.push(toAccount(row));
    }
    return locked;
  }

  async unlockAccounts(): Promise<void> {
    this._assertOpen();
  }

  async insertCategory(row: NewCategory): Promise<Category> {
    this._assertOpen();
    const info = this._exec(() =>
      this._stmts.insertCategory.run(row.userId, row.name, row.createdAt, row.updatedAt),
    );
    return this._requireCategory(Number(info.lastInsertRowid));
  }

  async updateCategory(id: EntityId, changes: CategoryChanges): Promise<Category> {
    this._assertOpen();
    const info = this._exec(() => this._stmts.updateCategory.run(changes.name, changes.updatedAt, id));
    this._changed(info.changes, "Category", id);
    return this._requireCategory(id);
  }

  async deleteCategory(id: EntityId): Promise<void> {
    this._assertOpen();
    this._requireCategory(id);
    if (this._stmts.categoryReferenced.get(id)?.referenced === 1) {
      throw new StoreError(
        "REFERENCE_VIOLATION",
        `Category ${String(id)} is referenced by expenses`,
        "category_has_expenses",
      );
    }
    this._exec(() => this._stmts.deleteCategory.run(id));
  }

  async insertExpense(row: NewExpense): Promise<Expense> {
    this._assertOpen();
    this._assertAccountExists(row.accountId);
    this._assertCategoryExists(row.categoryId);
    const info = this._exec(() =>
      this._stmts.insertExpense.run(
        row.userId,
        row.accountId,
        row.categoryId,
        parseAmount(row.amount),
        row.description,
        row.createdAt,
        row.updatedAt,
      ),
    );
    const id = Number(info.lastInsertRowid);
    return this._requireRow(this._stmts.getExpense.get(id), toExpense, "Expense", id);
  }

  async updateExpense(id: EntityId, changes: ExpenseChanges): Promise<Expense> {
    this._assertOpen();
    this._assertAccountExists(changes.accountId);
    this._assertCategoryExists(changes.categoryId);
    const info = this._exec(() =>
      this._stmts.updateExpense.run(
        changes.accountId,
        changes.categoryId,
        parseAmount(changes.amount),
        changes.description,
        changes.updatedAt,
        id,
      ),
    );
    this._changed(info.changes, "Expense", id);
    return this._requireRow(this._stmts.getExpense.get(id), toExpense, "Expense", id);
  }

  async deleteExpense(id: EntityId): Promise<void> {
    this._assertOpen();
    this._changed(this._exec(() => this._stmts.deleteExpense.run(id)).changes, "Expense", id);
  }

  async insertIncome(row: NewIncome): Promise<Income> {
    this._assertOpen();
    this._assertAccountExists(row.accountId);
    const info = this._exec(() =>
      this._stmts.insertIncome.run(
        row.userId,
        row.accountId,
        parseAmount(row.amount),
        row.description,
        row.createdAt,
        row.updatedAt,
      ),
    );
    const id = Number(info.lastInsertRowid);
    return this._requireRow(this._stmts.getIncome.get(id), toIncome, "Income", id);
  }

  async updateIncome(id: EntityId, changes: IncomeChanges): Promise<Income> {
    this._assertOpen();
    this._assertAccountExists(changes.accountId);
    const info = this._exec(() =>
      this._stmts.updateIncome.run(
        changes.accountId,
        parseAmount(changes.amount),
        changes.description,
        changes.updatedAt,
        id,
      ),
    );
    this._changed(info.changes, "Income", id);
    return this._requireRow(this._stmts.getIncome.get(id), toIncome, "Income", id);
  }

  async deleteIncome(id: EntityId): Promise<void> {
    this._assertOpen();
    this._changed(this._exec(() => this._stmts.deleteIncome.run(id)).changes, "Income", id);
  }

  async insertTransfer(row: NewTransfer): Promise<Transfer> {
    this._assertOpen();
    this._assertAccountExists(row.fromAccountId);
    this._assertAccountExists(row.toAccountId);
    const info = this._exec(() =>
      this._stmts.insertTransfer.run(
        row.userId,
        row.fromAccountId,
        row.toAccountId,
        parseAmount(row.amount),
        row.createdAt,
      ),
    );
    const id = Number(info.lastInsertRowid);
    return this._requireRow(this._stmts.getTransfer.get(id), toTransfer, "Transfer", id);
  }

  async updateTransfer(id: EntityId, changes: TransferChanges): Promise<Transfer> {
    this._assertOpen();
    this._assertAccountExists(changes.fromAccountId);
    this._assertAccountExists(changes.toAccountId);
    const info = this._exec(() =>
      this._stmts.updateTransfer.run(
        changes.fromAccountId,
        changes.toAccountId,
        parseAmount(changes.amount),
        id,
      ),
    );
    this._changed(info.changes, "Transfer", id);
    return this._requireRow(this._stmts.getTransfer.get(id), toTransfer, "Transfer", id);
  }

  async deleteTransfer(id: EntityId): Promise<void> {
    this._assertOpen();
    this._changed(this._exec(() => this._stmts.deleteTransfer.run(id)).changes, "Transfer", id);
  }

  // ─── Helpers ─────────────────────────────────────────────────────────

  private _exec<T>(statement: () => T): T {
    try {
      return statement();
    } catch (err) {
      throw mapSqliteError(err);
    }
  }

  private _changed(changes: number, label: string, id: EntityId): void {
    if (changes === 0) {
      throw new StoreError("ROW_NOT_FOUND", `${label} ${String(id)} not found`);
    }
  }

  private _requireRow<R, T>(row: R | undefined, map: (row: R) => T, label: string, id: EntityId): T {
    if (row === undefined) {
      throw new StoreError("ROW_NOT_FOUND", `${label} ${String(id)} not found`);
    }
    return map(row);
  }

  private _requireAccount(id: EntityId): Account {
    return this._requireRow(this._stmts.getAccount.get(id), toAccount, "Account", id);
  }

  private _requireCategory(id: EntityId): Category {
    return this._requireRow(this._stmts.getCategory.get(id), toCategory, "Category", id);
  }

  private _assertAccountExists(id: EntityId): void {
    this._assertReference(this._stmts.getAccount.get(id) !== undefined, "Account", id, "entry_account_exists");
  }

  private _assertCategoryExists(id: EntityId): void {
    this._assertReference(
      this._stmts.getCategory.get(id) !== undefined,
      "Category",
      id,
      "expense_category_exists",
    );
  }

  private _assertReference(exists: boolean, label: string, id: EntityId, constraint: StoreConstraint): void {
    if (!exists) {
      throw new StoreError("REFERENCE_VIOLATION", `${label} ${String(id)} does not exist`, constraint);
    }
  }
}

// ─── Store ───────────────────────────────────────────────────────────────

export interface SqliteLedgerStoreOptions {
  /** Database file path, or ":memory:". Default ":memory:". */
  readonly filename?: string | undefined;

  /** Milliseconds to wait for the connection before giving up. Default 5000. */
  readonly lockTimeoutMs?: number | undefined;
}

export class SqliteLedgerStore implements LedgerStore {
  private readonly _db: Database.Database;
  private readonly _stmts: Statements;
  private readonly _gate: WriteGate;
  private _closed = false;

  constructor(options?: SqliteLedgerStoreOptions) {
    this._db = new Database(options?.filename ?? ":memory:");
    applySchema(this._db);
    this._stmts = prepareStatements(this._db);
    this._gate = new WriteGate(options?.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS);
  }

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    this._assertOpen();
    return this._gate.run(async () => {
      this._db.exec("BEGIN IMMEDIATE");
      const tx = new SqliteTransaction(this._stmts);
      try {
        const result = await work(tx);
        this._db.exec("COMMIT");
        return result;
      } catch (err) {
        if (this._db.inTransaction) this._db.exec("ROLLBACK");
        throw mapSqliteError(err);
      } finally {
        tx.end();
      }
    });
  }

  async read<T>(work: (reader: StoreReader) => Promise<T>): Promise<T> {
    this._assertOpen();
    return this._gate.run(async () => {
      const reader = new SqliteReader(this._stmts);
      try {
        return await work(reader);
      } finally {
        reader.end();
      }
    });
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    await this._gate.drain();
    this._db.close();
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new StoreError("CLOSED", "Store is closed");
    }
  }
}
