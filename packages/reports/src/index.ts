/**
 * @centwise/reports — Read-only reporting over ledger rows.
 *
 * - Period parsing on whole UTC days ("YYYY-MM" or "YYYY-MM-DD")
 * - Summary, monthly cash flow in four groupings, totals by category
 * - Deposits from the system account count as income everywhere
 */

export { Reporter } from "./reporter.js";
export type {
  ReportSource,
  ReporterOptions,
  ReportQuery,
  CashflowQuery,
  TransferTotalQuery,
} from "./reporter.js";

export {
  UNCATEGORIZED,
  summaryTotals,
  balanceLines,
  totalsByCategory,
  incomeTotal,
  transferTotal,
  monthlyCashflow,
} from "./aggregations.js";

export { parseStart, parseEnd, resolvePeriod, currentMonth, monthOf, daysInMonth } from "./period.js";

export type {
  ReportErrorCode,
  PeriodInput,
  ResolvedPeriod,
  ReportRows,
  SummaryTotals,
  AccountBalanceLine,
  Summary,
  CashflowGrouping,
  CategoryLine,
  AccountLine,
  MonthlyCashflowRow,
  IncomeTotal,
  TransferTotal,
} from "./types.js";
export { ReportError, CASHFLOW_GROUPINGS } from "./types.js";
