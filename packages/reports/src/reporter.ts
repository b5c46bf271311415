/**
 * Reporter — loads ledger rows for a user and period and aggregates them.
 *
 * Usage:
 *   const reporter = new Reporter({ ledger });
 *   const summary = await reporter.summary(userId, { start: "2024-03" });
 */

import type { Clock, EntityId, UserId } from "@centwise/types";
import type { Ledger } from "@centwise/ledger";
import {
  balanceLines,
  incomeTotal,
  monthlyCashflow,
  summaryTotals,
  totalsByCategory,
  transferTotal,
} from "./aggregations.js";
import { currentMonth, resolvePeriod } from "./period.js";
import type {
  CashflowGrouping,
  CategoryLine,
  IncomeTotal,
  MonthlyCashflowRow,
  PeriodInput,
  ReportRows,
  ResolvedPeriod,
  Summary,
  TransferTotal,
} from "./types.js";

/** The ledger queries reports read from. */
export type ReportSource = Pick<
  Ledger,
  "listAccounts" | "listCategories" | "listExpenses" | "listIncomes" | "listTransfers"
>;

export interface ReporterOptions {
  readonly ledger: ReportSource;
  readonly clock?: Clock;
}

export interface ReportQuery extends PeriodInput {
  readonly accountId?: EntityId | undefined;
}

export interface CashflowQuery extends ReportQuery {
  readonly by?: CashflowGrouping | undefined;
}

export interface TransferTotalQuery extends PeriodInput {
  readonly fromAccountId?: EntityId | undefined;
  readonly toAccountId?: EntityId | undefined;
}

export class Reporter {
  private readonly _ledger: ReportSource;
  private readonly _clock: Clock;

  constructor(options: ReporterOptions) {
    this._ledger = options.ledger;
    this._clock = options.clock ?? (() => new Date());
  }

  /**
   * Period totals and current balances. Without start and end the
   * period is the current month.
   */
  async summary(userId: UserId, query: ReportQuery = {}): Promise<Summary> {
    const bounds = query.start === undefined && query.end === undefined ? currentMonth(this._clock()) : query;
    const period = resolvePeriod(bounds);
    const rows = await this._load(userId, period, query.accountId);
    return {
      period: { start: period.start, end: period.end, accountId: query.accountId ?? null },
      totals: summaryTotals(rows),
      balances: balanceLines(rows.accounts),
    };
  }

  async monthlyCashflow(userId: UserId, query: CashflowQuery = {}): Promise<MonthlyCashflowRow[]> {
    const rows = await this._load(userId, resolvePeriod(query), query.accountId);
    return monthlyCashflow(rows, query.by ?? "none");
  }

  async totalsByCategory(userId: UserId, query: ReportQuery = {}): Promise<CategoryLine[]> {
    const rows = await this._load(userId, resolvePeriod(query), query.accountId);
    return totalsByCategory(rows);
  }

  async incomeTotal(userId: UserId, query: ReportQuery = {}): Promise<IncomeTotal> {
    const rows = await this._load(userId, resolvePeriod(query), query.accountId);
    return incomeTotal(rows);
  }

  async transferTotal(userId: UserId, query: TransferTotalQuery = {}): Promise<TransferTotal> {
    const period = resolvePeriod(query);
    const transfers = await this._ledger.listTransfers(userId, {
      fromAccountId: query.fromAccountId,
      toAccountId: query.toAccountId,
      from: period.from,
      to: period.to,
    });
    return transferTotal(transfers);
  }

  private async _load(userId: UserId, period: ResolvedPeriod, accountId: EntityId | undefined): Promise<ReportRows> {
    const filter = { accountId, from: period.from, to: period.to };
    const [accounts, categories, expenses, incomes, incomingTransfers] = await Promise.all([
      this._ledger.listAccounts(userId),
      this._ledger.listCategories(userId),
      this._ledger.listExpenses(userId, filter),
      this._ledger.listIncomes(userId, filter),
      this._ledger.listTransfers(userId, {
        fromSystemOnly: true,
        toAccountId: accountId,
        from: period.from,
        to: period.to,
      }),
    ]);
    return { accounts, categories, expenses, incomes, incomingTransfers };
  }
}
