/**
 * @centwise/ledger — Balance recomputation from ledger history.
 *
 * Cached balances are never derived this way on the read path. This module
 * exists to audit them: sum every persisted entry's effect per account and
 * compare with what the account row says.
 */

import type { Account, EntityId, Expense, Income, Transfer } from "@centwise/types";
import { expenseEffect, incomeEffect, netEffect, transferEffect } from "./effects.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type { BalanceCheckReport, BalanceDrift } from "./types.js";

export interface LedgerHistory {
  readonly expenses: readonly Expense[];
  readonly incomes: readonly Income[];
  readonly transfers: readonly Transfer[];
}

/**
 * Net effect of all entries, in minor units, per account id.
 * Accounts without entries are absent.
 */
export function computeBalances(history: LedgerHistory): Map<EntityId, bigint> {
  const effect = netEffect(
    ...history.expenses.map(expenseEffect),
    ...history.incomes.map(incomeEffect),
    ...history.transfers.map(transferEffect),
  );
  return new Map(effect.map((d) => [d.accountId, d.delta]));
}

/**
 * Compare cached balances against the recomputed ones.
 */
export function findDrifts(
  accounts: readonly Account[],
  history: LedgerHistory,
): BalanceDrift[] {
  const computed = computeBalances(history);
  const drifts: BalanceDrift[] = [];

  for (const account of accounts) {
    const expected = computed.get(account.id) ?? 0n;
    if (parseAmount(account.balance) !== expected) {
      drifts.push({
        accountId: account.id,
        name: account.name,
        cached: account.balance,
        computed: formatAmount(expected),
      });
    }
  }

  return drifts;
}

export function buildBalanceReport(
  accounts: readonly Account[],
  history: LedgerHistory,
  checkedAt: string,
): BalanceCheckReport {
  const drifts = findDrifts(accounts, history);
  return {
    consistent: drifts.length === 0,
    accountsChecked: accounts.length,
    drifts,
    checkedAt,
  };
}
