/**
 * Report aggregations.
 *
 * Pure functions over rows that are already restricted to a period and
 * account. Sums run on bigint minor units and are formatted once.
 */

import type { Account, EntityId, Transfer } from "@centwise/types";
import { formatAmount, parseAmount } from "@centwise/ledger";
import { monthOf } from "./period.js";
import type {
  AccountBalanceLine,
  AccountLine,
  CashflowGrouping,
  CategoryLine,
  IncomeTotal,
  MonthlyCashflowRow,
  ReportRows,
  SummaryTotals,
  TransferTotal,
} from "./types.js";

export const UNCATEGORIZED = "Uncategorized";

// ─── Helpers ─────────────────────────────────────────────────────────────

function total(rows: readonly { readonly amount: string }[]): bigint {
  return rows.reduce((sum, row) => sum + parseAmount(row.amount), 0n);
}

function bump<K>(map: Map<K, bigint>, key: K, amount: bigint): void {
  map.set(key, (map.get(key) ?? 0n) + amount);
}

function byName<T>(nameOf: (item: T) => string, idOf: (item: T) => EntityId): (a: T, b: T) => number {
  return (a, b) => {
    const an = nameOf(a);
    const bn = nameOf(b);
    if (an !== bn) return an < bn ? -1 : 1;
    return idOf(a) - idOf(b);
  };
}

class NameIndex {
  private readonly _accounts: Map<EntityId, string>;
  private readonly _categories: Map<EntityId, string>;

  constructor(rows: ReportRows) {
    this._accounts = new Map(rows.accounts.map((a) => [a.id, a.name]));
    this._categories = new Map(rows.categories.map((c) => [c.id, c.name]));
  }

  account(id: EntityId): string {
    return this._accounts.get(id) ?? `Account ${String(id)}`;
  }

  category(id: EntityId): string {
    return this._categories.get(id) ?? UNCATEGORIZED;
  }
}

// ─── Summary ─────────────────────────────────────────────────────────────

export function summaryTotals(rows: ReportRows): SummaryTotals {
  const income = total(rows.incomes);
  const transfersIn = total(rows.incomingTransfers);
  const expense = total(rows.expenses);
  return {
    income: formatAmount(income),
    transfersIn: formatAmount(transfersIn),
    incomeIncludingTransfers: formatAmount(income + transfersIn),
    expense: formatAmount(expense),
    net: formatAmount(income + transfersIn - expense),
  };
}

/** Current balances of the regular accounts, sorted by name. */
export function balanceLines(accounts: readonly Account[]): {
  totalBalance: string;
  byAccount: AccountBalanceLine[];
} {
  const regular = accounts
    .filter((a) => !a.isSystem)
    .sort(byName((a) => a.name, (a) => a.id));
  return {
    totalBalance: formatAmount(total(regular.map((a) => ({ amount: a.balance })))),
    byAccount: regular.map((a) => ({ accountId: a.id, account: a.name, balance: a.balance })),
  };
}

// ─── Totals ──────────────────────────────────────────────────────────────

export function totalsByCategory(rows: ReportRows): CategoryLine[] {
  const names = new NameIndex(rows);
  const sums = new Map<EntityId, bigint>();
  for (const expense of rows.expenses) bump(sums, expense.categoryId, parseAmount(expense.amount));
  return categoryLines(sums, names);
}

export function incomeTotal(rows: ReportRows): IncomeTotal {
  const income = total(rows.incomes);
  const transfersIn = total(rows.incomingTransfers);
  return {
    income: formatAmount(income),
    transfersIn: formatAmount(transfersIn),
    total: formatAmount(income + transfersIn),
  };
}

export function transferTotal(transfers: readonly Transfer[]): TransferTotal {
  return { count: transfers.length, total: formatAmount(total(transfers)) };
}

function categoryLines(sums: ReadonlyMap<EntityId, bigint>, names: NameIndex): CategoryLine[] {
  return [...sums]
    .map(([categoryId, sum]) => ({ categoryId, category: names.category(categoryId), total: formatAmount(sum) }))
    .sort(byName((l) => l.category, (l) => l.categoryId));
}

// ─── Monthly cash flow ───────────────────────────────────────────────────

interface MonthBucket {
  income: bigint;
  expense: bigint;
  readonly accounts: Map<EntityId, { income: bigint; expense: bigint; categories: Map<EntityId, bigint> }>;
  readonly categories: Map<EntityId, bigint>;
}

function bucketFor(months: Map<string, MonthBucket>, timestamp: string): MonthBucket {
  const month = monthOf(timestamp);
  let bucket = months.get(month);
  if (bucket === undefined) {
    bucket = { income: 0n, expense: 0n, accounts: new Map(), categories: new Map() };
    months.set(month, bucket);
  }
  return bucket;
}

function accountFor(bucket: MonthBucket, accountId: EntityId) {
  let entry = bucket.accounts.get(accountId);
  if (entry === undefined) {
    entry = { income: 0n, expense: 0n, categories: new Map<EntityId, bigint>() };
    bucket.accounts.set(accountId, entry);
  }
  return entry;
}

/**
 * Income, expense and net per UTC month, ascending. Deposits from the
 * system account count as income of the account they land in.
 */
export function monthlyCashflow(rows: ReportRows, by: CashflowGrouping = "none"): MonthlyCashflowRow[] {
  const names = new NameIndex(rows);
  const months = new Map<string, MonthBucket>();

  const credit = (timestamp: string, accountId: EntityId, amount: string): void => {
    const minor = parseAmount(amount);
    const bucket = bucketFor(months, timestamp);
    bucket.income += minor;
    accountFor(bucket, accountId).income += minor;
  };

  for (const income of rows.incomes) credit(income.createdAt, income.accountId, income.amount);
  for (const transfer of rows.incomingTransfers) credit(transfer.createdAt, transfer.toAccountId, transfer.amount);

  for (const expense of rows.expenses) {
    const minor = parseAmount(expense.amount);
    const bucket = bucketFor(months, expense.createdAt);
    bucket.expense += minor;
    bump(bucket.categories, expense.categoryId, minor);
    const account = accountFor(bucket, expense.accountId);
    account.expense += minor;
    bump(account.categories, expense.categoryId, minor);
  }

  const ordered = [...months].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return ordered.map(([month, bucket]) => {
    const row: MonthlyCashflowRow = {
      month,
      income: formatAmount(bucket.income),
      expense: formatAmount(bucket.expense),
      net: formatAmount(bucket.income - bucket.expense),
    };

    switch (by) {
      case "none":
        return row;
      case "category":
        return { ...row, byCategory: categoryLines(bucket.categories, names) };
      case "account":
      case "account_category": {
        const withCategories = by === "account_category";
        const byAccount: AccountLine[] = [...bucket.accounts]
          .map(([accountId, sums]) => ({
            accountId,
            account: names.account(accountId),
            income: formatAmount(sums.income),
            expense: formatAmount(sums.expense),
            net: formatAmount(sums.income - sums.expense),
            ...(withCategories ? { byCategory: categoryLines(sums.categories, names) } : {}),
          }))
          .sort(byName((l) => l.account, (l) => l.accountId));
        return { ...row, byAccount };
      }
    }
  });
}
