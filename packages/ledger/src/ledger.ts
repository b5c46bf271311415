/**
 * @centwise/ledger — Core Ledger class.
 *
 * Keeps every account's cached balance equal to the net effect of the
 * entries that reference it. Each mutation is one store transaction:
 *
 *   validate → lock accounts → re-read entry → reverse prior effect
 *            → check funds (transfers) → apply new effect → write row
 *
 * API surface:
 * - createAccount() / renameAccount() / deleteAccount() / getAccount() / listAccounts()
 * - createCategory() / renameCategory() / deleteCategory() / getCategory() / listCategories()
 * - applyExpense() / applyIncome() / applyTransfer() — create, update or delete an entry
 * - getExpense() / listExpenses() and the income and transfer equivalents
 * - getOrCreateSystemAccount() — the per-user external account
 * - depositFromExternal() / depositRandomFromExternal() — salary-style deposits
 * - checkBalances() — audit cached balances against history
 */

import type {
  Account,
  Category,
  Clock,
  EntityId,
  Expense,
  Income,
  Transfer,
  UserId,
} from "@centwise/types";
import {
  notFound,
  requireUsableAccount,
  requireUsableCategory,
  requireVisibleAccount,
  requireVisibleCategory,
} from "./accounts.js";
import { buildBalanceReport } from "./balance-calculator.js";
import {
  applyEffect,
  expenseEffect,
  incomeEffect,
  netEffect,
  reverseEffect,
  transferEffect,
} from "./effects.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type { LedgerStore, StoreReader, StoreTransaction } from "./store/types.js";
import { StoreError } from "./store/types.js";
import { getOrCreateSystemAccount, SYSTEM_ACCOUNT_NAME } from "./system-account.js";
import type {
  AccountInput,
  BalanceCheckReport,
  CategoryInput,
  DepositInput,
  EntryFilter,
  ExpenseInput,
  ExpenseMutation,
  ExpensePatch,
  IncomeInput,
  IncomeMutation,
  IncomePatch,
  LedgerOptions,
  RandomDepositInput,
  TransferFilter,
  TransferInput,
  TransferMutation,
  TransferOptions,
  TransferPatch,
} from "./types.js";
import { LedgerError } from "./types.js";
import {
  invalid,
  normalizeTimestamp,
  requireDescription,
  requireEntryAmount,
  requireId,
  requireName,
} from "./validation.js";

// ─── Store error translation ─────────────────────────────────────────────

/**
 * Map a persistence failure to the ledger's error taxonomy.
 * Anything that is not a StoreError passes through untouched.
 */
export function translateStoreError(err: unknown): unknown {
  if (!(err instanceof StoreError)) return err;

  switch (err.code) {
    case "LOCK_TIMEOUT":
      return new LedgerError("CONCURRENCY_TIMEOUT", "Timed out waiting for account locks; retry the request");
    case "ROW_NOT_FOUND":
      return new LedgerError("NOT_FOUND", err.message);
    case "CHECK_VIOLATION":
      return new LedgerError("VALIDATION_ERROR", err.message);
    case "UNIQUE_VIOLATION":
      if (err.constraint === "account_name_per_user") {
        return invalid("name", "An account with this name already exists.");
      }
      if (err.constraint === "category_name_per_user") {
        return invalid("name", "A category with this name already exists.");
      }
      return new LedgerError("VALIDATION_ERROR", err.message);
    case "REFERENCE_VIOLATION":
      if (err.constraint === "account_has_entries") {
        return new LedgerError("ACCOUNT_IN_USE", "Account still has ledger entries; delete them first");
      }
      if (err.constraint === "category_has_expenses") {
        return new LedgerError("CATEGORY_IN_USE", "Category still has expenses; delete them first");
      }
      return new LedgerError("NOT_FOUND", err.message);
    case "CLOSED":
      return err;
  }
}

// ─── Internal helpers ────────────────────────────────────────────────────

const EXPENSE_ACCOUNT = {
  field: "accountId",
  allowSystem: false,
  systemMessage: "System account cannot be used for expenses.",
} as const;

const INCOME_ACCOUNT = {
  field: "accountId",
  allowSystem: false,
  systemMessage: "System account cannot be used for incomes.",
} as const;

const SYSTEM_TRANSFER_MESSAGE = "System accounts cannot be used in regular transfers.";

function defined<T>(values: readonly (T | undefined)[]): T[] {
  const out: T[] = [];
  for (const value of values) if (value !== undefined) out.push(value);
  return out;
}

/**
 * Lock the accounts an entry mutation touches, then read the entry under
 * those locks. If the stored row names an account outside the lock set
 * (it changed between the read and the lock), release everything and take
 * the wider set in one ascending pass, then read again. Nothing has been
 * written at that point.
 */
async function lockForEntry<R>(
  tx: StoreTransaction,
  load: () => Promise<R | undefined>,
  accountsOf: (row: R) => readonly EntityId[],
  incoming: readonly EntityId[],
): Promise<R | undefined> {
  const locked = new Set<EntityId>();
  for (;;) {
    const row = await load();
    const needed = [...incoming, ...(row === undefined ? [] : accountsOf(row))];
    if (needed.every((id) => locked.has(id))) return row;

    // Waiting for a lower id while holding a higher one breaks the lock order.
    if (locked.size > 0) await tx.unlockAccounts();
    for (const id of needed) locked.add(id);
    await tx.lockAccounts([...locked]);
  }
}

// ─── Ledger ──────────────────────────────────────────────────────────────

/**
 * Balance-consistency engine over a LedgerStore.
 *
 * Every public method is scoped to one user. Rows owned by another user
 * behave as if they did not exist, except when referenced from an input
 * field, where they are a validation error on that field.
 */
export class Ledger {
  private readonly _store: LedgerStore;
  private readonly _clock: Clock;

  constructor(options: LedgerOptions) {
    this._store = options.store;
    this._clock = options.clock ?? (() => new Date());
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  /**
   * Create an account. Balances start at 0.00; money enters through
   * income or a deposit from the system account.
   */
  async createAccount(userId: UserId, input: AccountInput): Promise<Account> {
    const name = requireName(input.name, [SYSTEM_ACCOUNT_NAME]);
    return this._write((tx) => tx.insertAccount({ userId, name, isSystem: false }));
  }

  async renameAccount(userId: UserId, id: EntityId, input: AccountInput): Promise<Account> {
    const name = requireName(input.name, [SYSTEM_ACCOUNT_NAME]);
    return this._write(async (tx) => {
      await requireVisibleAccount(tx, userId, id);
      return tx.renameAccount(id, name);
    });
  }

  /**
   * Delete an account. Rejected with ACCOUNT_IN_USE while any entry
   * references it.
   */
  async deleteAccount(userId: UserId, id: EntityId): Promise<void> {
    await this._write(async (tx) => {
      await tx.lockAccounts([id]);
      await requireVisibleAccount(tx, userId, id);
      await tx.deleteAccount(id);
    });
  }

  async getAccount(userId: UserId, id: EntityId): Promise<Account> {
    return this._read((reader) => requireVisibleAccount(reader, userId, id));
  }

  /** Accounts of the user, system account excluded, ordered by id. */
  async listAccounts(userId: UserId): Promise<readonly Account[]> {
    return this._read((reader) => reader.listAccounts(userId));
  }

  // ─── Categories ─────────────────────────────────────────────────────

  async createCategory(userId: UserId, input: CategoryInput): Promise<Category> {
    const name = requireName(input.name);
    const now = this._now();
    return this._write((tx) => tx.insertCategory({ userId, name, createdAt: now, updatedAt: now }));
  }

  async renameCategory(userId: UserId, id: EntityId, input: CategoryInput): Promise<Category> {
    const name = requireName(input.name);
    return this._write(async (tx) => {
      await requireVisibleCategory(tx, userId, id);
      return tx.updateCategory(id, { name, updatedAt: this._now() });
    });
  }

  /** Rejected with CATEGORY_IN_USE while any expense references it. */
  async deleteCategory(userId: UserId, id: EntityId): Promise<void> {
    await this._write(async (tx) => {
      await requireVisibleCategory(tx, userId, id);
      await tx.deleteCategory(id);
    });
  }

  async getCategory(userId: UserId, id: EntityId): Promise<Category> {
    return this._read((reader) => requireVisibleCategory(reader, userId, id));
  }

  async listCategories(userId: UserId): Promise<readonly Category[]> {
    return this._read((reader) => reader.listCategories(userId));
  }

  // ─── Expenses ───────────────────────────────────────────────────────

  /**
   * Create, update or delete an expense. Returns the entry as persisted,
   * or as it was before deletion.
   */
  async applyExpense(userId: UserId, mutation: ExpenseMutation): Promise<Expense> {
    switch (mutation.op) {
      case "create":
        return this._createExpense(userId, mutation.input);
      case "update":
        return this._updateExpense(userId, mutation.id, mutation.patch);
      case "delete":
        return this._deleteExpense(userId, mutation.id);
    }
  }

  async getExpense(userId: UserId, id: EntityId): Promise<Expense> {
    const expense = await this._read((reader) => reader.getExpense(id));
    if (expense === undefined || expense.userId !== userId) throw notFound("Expense", id);
    return expense;
  }

  async listExpenses(userId: UserId, filter?: EntryFilter): Promise<readonly Expense[]> {
    const query = { userId, accountId: filter?.accountId, ...normalizePeriod(filter) };
    return this._read((reader) => reader.listExpenses(query));
  }

  private async _createExpense(userId: UserId, input: ExpenseInput): Promise<Expense> {
    requireId(input.accountId, "accountId");
    requireId(input.categoryId, "categoryId");
    const amount = formatAmount(requireEntryAmount(input.amount));
    const description = requireDescription(input.description);
    const createdAt = this._createdAt(input.createdAt);

    return this._write(async (tx) => {
      await tx.lockAccounts([input.accountId]);
      await requireUsableAccount(tx, userId, input.accountId, EXPENSE_ACCOUNT);
      await requireUsableCategory(tx, userId, input.categoryId);

      const row = { accountId: input.accountId, categoryId: input.categoryId, amount, description };
      await applyEffect(tx, expenseEffect(row));
      return tx.insertExpense({ userId, ...row, createdAt, updatedAt: this._now() });
    });
  }

  private async _updateExpense(userId: UserId, id: EntityId, patch: ExpensePatch): Promise<Expense> {
    if (patch.accountId !== undefined) requireId(patch.accountId, "accountId");
    if (patch.categoryId !== undefined) requireId(patch.categoryId, "categoryId");
    const amount = patch.amount === undefined ? undefined : formatAmount(requireEntryAmount(patch.amount));
    const description = patch.description === undefined ? undefined : requireDescription(patch.description);

    return this._write(async (tx) => {
      const current = await lockForEntry(
        tx,
        () => tx.getExpense(id),
        (row) => [row.accountId],
        defined([patch.accountId]),
      );
      if (current === undefined || current.userId !== userId) throw notFound("Expense", id);

      const next = {
        accountId: patch.accountId ?? current.accountId,
        categoryId: patch.categoryId ?? current.categoryId,
        amount: amount ?? current.amount,
        description: description ?? current.description,
      };
      await requireUsableAccount(tx, userId, next.accountId, EXPENSE_ACCOUNT);
      await requireUsableCategory(tx, userId, next.categoryId);

      await applyEffect(tx, netEffect(reverseEffect(expenseEffect(current)), expenseEffect(next)));
      return tx.updateExpense(id, { ...next, updatedAt: this._now() });
    });
  }

  private async _deleteExpense(userId: UserId, id: EntityId): Promise<Expense> {
    return this._write(async (tx) => {
      const current = await lockForEntry(tx, () => tx.getExpense(id), (row) => [row.accountId], []);
      if (current === undefined || current.userId !== userId) throw notFound("Expense", id);

      await applyEffect(tx, reverseEffect(expenseEffect(current)));
      await tx.deleteExpense(id);
      return current;
    });
  }

  // ─── Incomes ────────────────────────────────────────────────────────

  async applyIncome(userId: UserId, mutation: IncomeMutation): Promise<Income> {
    switch (mutation.op) {
      case "create":
        return this._createIncome(userId, mutation.input);
      case "update":
        return this._updateIncome(userId, mutation.id, mutation.patch);
      case "delete":
        return this._deleteIncome(userId, mutation.id);
    }
  }

  async getIncome(userId: UserId, id: EntityId): Promise<Income> {
    const income = await this._read((reader) => reader.getIncome(id));
    if (income === undefined || income.userId !== userId) throw notFound("Income", id);
    return income;
  }

  async listIncomes(userId: UserId, filter?: EntryFilter): Promise<readonly Income[]> {
    const query = { userId, accountId: filter?.accountId, ...normalizePeriod(filter) };
    return this._read((reader) => reader.listIncomes(query));
  }

  private async _createIncome(userId: UserId, input: IncomeInput): Promise<Income> {
    requireId(input.accountId, "accountId");
    const amount = formatAmount(requireEntryAmount(input.amount));
    const description = requireDescription(input.description);
    const createdAt = this._createdAt(input.createdAt);

    return this._write(async (tx) => {
      await tx.lockAccounts([input.accountId]);
      await requireUsableAccount(tx, userId, input.accountId, INCOME_ACCOUNT);

      const row = { accountId: input.accountId, amount, description };
      await applyEffect(tx, incomeEffect(row));
      return tx.insertIncome({ userId, ...row, createdAt, updatedAt: this._now() });
    });
  }

  private async _updateIncome(userId: UserId, id: EntityId, patch: IncomePatch): Promise<Income> {
    if (patch.accountId !== undefined) requireId(patch.accountId, "accountId");
    const amount = patch.amount === undefined ? undefined : formatAmount(requireEntryAmount(patch.amount));
    const description = patch.description === undefined ? undefined : requireDescription(patch.description);

    return this._write(async (tx) => {
      const current = await lockForEntry(
        tx,
        () => tx.getIncome(id),
        (row) => [row.accountId],
        defined([patch.accountId]),
      );
      if (current === undefined || current.userId !== userId) throw notFound("Income", id);

      const next = {
        accountId: patch.accountId ?? current.accountId,
        amount: amount ?? current.amount,
        description: description ?? current.description,
      };
      await requireUsableAccount(tx, userId, next.accountId, INCOME_ACCOUNT);

      await applyEffect(tx, netEffect(reverseEffect(incomeEffect(current)), incomeEffect(next)));
      return tx.updateIncome(id, { ...next, updatedAt: this._now() });
    });
  }

  private async _deleteIncome(userId: UserId, id: EntityId): Promise<Income> {
    return this._write(async (tx) => {
      const current = await lockForEntry(tx, () => tx.getIncome(id), (row) => [row.accountId], []);
      if (current === undefined || current.userId !== userId) throw notFound("Income", id);

      await applyEffect(tx, reverseEffect(incomeEffect(current)));
      await tx.deleteIncome(id);
      return current;
    });
  }

  // ─── Transfers ──────────────────────────────────────────────────────

  /**
   * Create, update or delete a transfer.
   *
   * Both accounts are locked (ascending id) before any balance is read.
   * An update first reverses the stored effect, so the funds check sees
   * the balances as if this transfer had never existed; a failed check
   * restores the reversed effect before aborting.
   *
   * `allowSystemAccount` lets one side be the user's system account on
   * create and update. Deleting never needs it.
   */
  async applyTransfer(
    userId: UserId,
    mutation: TransferMutation,
    options?: TransferOptions,
  ): Promise<Transfer> {
    const allowSystem = options?.allowSystemAccount === true;
    switch (mutation.op) {
      case "create":
        return this._createTransfer(userId, mutation.input, allowSystem);
      case "update":
        return this._updateTransfer(userId, mutation.id, mutation.patch, allowSystem);
      case "delete":
        return this._deleteTransfer(userId, mutation.id);
    }
  }

  async getTransfer(userId: UserId, id: EntityId): Promise<Transfer> {
    const transfer = await this._read((reader) => reader.getTransfer(id));
    if (transfer === undefined || transfer.userId !== userId) throw notFound("Transfer", id);
    return transfer;
  }

  /**
   * Transfers of the user. `fromSystemOnly` keeps the deposits from the
   * system account; a user without one has none.
   */
  async listTransfers(userId: UserId, filter?: TransferFilter): Promise<readonly Transfer[]> {
    const period = normalizePeriod(filter);
    return this._read(async (reader) => {
      let fromAccountId = filter?.fromAccountId;
      if (filter?.fromSystemOnly === true) {
        const system = await reader.findSystemAccount(userId);
        if (system === undefined) return [];
        if (fromAccountId !== undefined && fromAccountId !== system.id) return [];
        fromAccountId = system.id;
      }
      return reader.listTransfers({
        userId,
        fromAccountId,
        toAccountId: filter?.toAccountId,
        from: period.from,
        to: period.to,
      });
    });
  }

  private async _createTransfer(
    userId: UserId,
    input: TransferInput,
    allowSystem: boolean,
  ): Promise<Transfer> {
    requireId(input.fromAccountId, "fromAccountId");
    requireId(input.toAccountId, "toAccountId");
    const minor = requireEntryAmount(input.amount);
    const amount = formatAmount(minor);
    const createdAt = this._createdAt(input.createdAt);
    assertDistinct(input.fromAccountId, input.toAccountId);

    return this._write(async (tx) => {
      await tx.lockAccounts([input.fromAccountId, input.toAccountId]);
      await this._checkTransferAccounts(tx, userId, input.fromAccountId, input.toAccountId, allowSystem);

      const from = await tx.getAccount(input.fromAccountId);
      if (from !== undefined) assertFunds(from, minor);

      const row = { fromAccountId: input.fromAccountId, toAccountId: input.toAccountId, amount };
      await applyEffect(tx, transferEffect(row));
      return tx.insertTransfer({ userId, ...row, createdAt });
    });
  }

  private async _updateTransfer(
    userId: UserId,
    id: EntityId,
    patch: TransferPatch,
    allowSystem: boolean,
  ): Promise<Transfer> {
    if (patch.fromAccountId !== undefined) requireId(patch.fromAccountId, "fromAccountId");
    if (patch.toAccountId !== undefined) requireId(patch.toAccountId, "toAccountId");
    const minorPatch = patch.amount === undefined ? undefined : requireEntryAmount(patch.amount);

    return this._write(async (tx) => {
      // Lock old and new accounts together: reversal touches the old pair.
      const current = await lockForEntry(
        tx,
        () => tx.getTransfer(id),
        (row) => [row.fromAccountId, row.toAccountId],
        defined([patch.fromAccountId, patch.toAccountId]),
      );
      if (current === undefined || current.userId !== userId) throw notFound("Transfer", id);

      const next = {
        fromAccountId: patch.fromAccountId ?? current.fromAccountId,
        toAccountId: patch.toAccountId ?? current.toAccountId,
        amount: minorPatch === undefined ? current.amount : formatAmount(minorPatch),
      };
      assertDistinct(next.fromAccountId, next.toAccountId);
      await this._checkTransferAccounts(tx, userId, next.fromAccountId, next.toAccountId, allowSystem);

      const prior = transferEffect(current);
      await applyEffect(tx, reverseEffect(prior));

      const from = await tx.getAccount(next.fromAccountId);
      if (from !== undefined && !hasFunds(from, parseAmount(next.amount))) {
        await applyEffect(tx, prior);
        throw insufficientFunds();
      }

      await applyEffect(tx, transferEffect(next));
      return tx.updateTransfer(id, next);
    });
  }

  private async _deleteTransfer(userId: UserId, id: EntityId): Promise<Transfer> {
    return this._write(async (tx) => {
      const current = await lockForEntry(
        tx,
        () => tx.getTransfer(id),
        (row) => [row.fromAccountId, row.toAccountId],
        [],
      );
      if (current === undefined || current.userId !== userId) throw notFound("Transfer", id);

      await applyEffect(tx, reverseEffect(transferEffect(current)));
      await tx.deleteTransfer(id);
      return current;
    });
  }

  private async _checkTransferAccounts(
    reader: StoreReader,
    userId: UserId,
    fromAccountId: EntityId,
    toAccountId: EntityId,
    allowSystem: boolean,
  ): Promise<void> {
    const usage = { allowSystem, systemMessage: SYSTEM_TRANSFER_MESSAGE };
    await requireUsableAccount(reader, userId, fromAccountId, { ...usage, field: "fromAccountId" });
    await requireUsableAccount(reader, userId, toAccountId, { ...usage, field: "toAccountId" });
  }

  // ─── External account & deposits ────────────────────────────────────

  async getOrCreateSystemAccount(userId: UserId): Promise<Account> {
    try {
      return await getOrCreateSystemAccount(this._store, userId);
    } catch (err) {
      throw translateStoreError(err);
    }
  }

  /**
   * Deposit money from outside the tracked accounts, e.g. a salary.
   * The target must be one of the user's own non-system accounts.
   */
  async depositFromExternal(userId: UserId, input: DepositInput): Promise<Transfer> {
    requireId(input.accountId, "accountId");
    requireEntryAmount(input.amount);
    await this.getAccount(userId, input.accountId);

    const system = await this.getOrCreateSystemAccount(userId);
    return this.applyTransfer(
      userId,
      {
        op: "create",
        input: {
          fromAccountId: system.id,
          toAccountId: input.accountId,
          amount: input.amount,
          createdAt: input.createdAt,
        },
      },
      { allowSystemAccount: true },
    );
  }

  /**
   * Deposit a random amount in [min, max], rounded half-up to the cent.
   * `random` returns a number in [0, 1).
   */
  async depositRandomFromExternal(
    userId: UserId,
    input: RandomDepositInput,
    random: () => number = Math.random,
  ): Promise<Transfer> {
    const min = parseAmount(input.min);
    const max = parseAmount(input.max);
    if (max < min) {
      throw invalid("max", "'max' must be >= 'min'.");
    }

    const amount = min + BigInt(Math.round(Number(max - min) * random()));
    return this.depositFromExternal(userId, { accountId: input.accountId, amount: formatAmount(amount) });
  }

  // ─── Consistency ────────────────────────────────────────────────────

  /**
   * Recompute every account of the user (system account included) from
   * its entries and report accounts whose cached balance differs.
   */
  async checkBalances(userId: UserId): Promise<BalanceCheckReport> {
    const checkedAt = this._now();
    return this._read(async (reader) => {
      const accounts = await reader.listAccounts(userId, { includeSystem: true });
      const expenses = await reader.listExpenses({ userId });
      const incomes = await reader.listIncomes({ userId });
      const transfers = await reader.listTransfers({ userId });
      return buildBalanceReport(accounts, { expenses, incomes, transfers }, checkedAt);
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _now(): string {
    return this._clock().toISOString();
  }

  private _createdAt(explicit: string | undefined): string {
    return explicit === undefined ? this._now() : normalizeTimestamp(explicit);
  }

  private async _write<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    try {
      return await this._store.transaction(work);
    } catch (err) {
      throw translateStoreError(err);
    }
  }

  private async _read<T>(work: (reader: StoreReader) => Promise<T>): Promise<T> {
    try {
      return await this._store.read(work);
    } catch (err) {
      throw translateStoreError(err);
    }
  }
}

// ─── Transfer rules ──────────────────────────────────────────────────────

function assertDistinct(fromAccountId: EntityId, toAccountId: EntityId): void {
  if (fromAccountId === toAccountId) {
    throw invalid("toAccountId", "From and to accounts must be different.");
  }
}

/** System accounts model unlimited outside funds and are never short. */
function hasFunds(from: Account, amount: bigint): boolean {
  return from.isSystem || parseAmount(from.balance) >= amount;
}

function insufficientFunds(): LedgerError {
  return new LedgerError("INSUFFICIENT_FUNDS", "Insufficient funds in the from account.");
}

function assertFunds(from: Account, amount: bigint): void {
  if (!hasFunds(from, amount)) throw insufficientFunds();
}

function normalizePeriod(filter: EntryFilter | TransferFilter | undefined): {
  from: string | undefined;
  to: string | undefined;
} {
  return {
    from: filter?.from === undefined ? undefined : normalizeTimestamp(filter.from, "from"),
    to: filter?.to === undefined ? undefined : normalizeTimestamp(filter.to, "to"),
  };
}
