/**
 * @centwise/ledger — Balance effects of ledger entries.
 *
 * Every entry kind maps to a list of signed per-account deltas:
 *
 *   expense  → [account −amount]
 *   income   → [account +amount]
 *   transfer → [from −amount, to +amount]
 *
 * Mutations compose from these: create applies the effect, delete applies
 * its reverse, update applies reverse(old) then new.
 */

import type { EntityId, Expense, Income, Transfer } from "@centwise/types";
import { parseAmount } from "./money-math.js";
import type { StoreTransaction } from "./store/types.js";

export interface BalanceDelta {
  readonly accountId: EntityId;
  /** Signed change in minor units. */
  readonly delta: bigint;
}

export type BalanceEffect = readonly BalanceDelta[];

export type ExpenseShape = Pick<Expense, "accountId" | "amount">;
export type IncomeShape = Pick<Income, "accountId" | "amount">;
export type TransferShape = Pick<Transfer, "fromAccountId" | "toAccountId" | "amount">;

export function expenseEffect(expense: ExpenseShape): BalanceEffect {
  return [{ accountId: expense.accountId, delta: -parseAmount(expense.amount) }];
}

export function incomeEffect(income: IncomeShape): BalanceEffect {
  return [{ accountId: income.accountId, delta: parseAmount(income.amount) }];
}

export function transferEffect(transfer: TransferShape): BalanceEffect {
  const amount = parseAmount(transfer.amount);
  return [
    { accountId: transfer.fromAccountId, delta: -amount },
    { accountId: transfer.toAccountId, delta: amount },
  ];
}

export function reverseEffect(effect: BalanceEffect): BalanceEffect {
  return effect.map((d) => ({ accountId: d.accountId, delta: -d.delta }));
}

/**
 * Collapse several effects into one delta per account.
 * Zero deltas are dropped; the result is ordered by account id.
 */
export function netEffect(...effects: readonly BalanceEffect[]): BalanceEffect {
  const totals = new Map<EntityId, bigint>();
  for (const effect of effects) {
    for (const { accountId, delta } of effect) {
      totals.set(accountId, (totals.get(accountId) ?? 0n) + delta);
    }
  }

  return [...totals]
    .filter(([, delta]) => delta !== 0n)
    .sort(([a], [b]) => a - b)
    .map(([accountId, delta]) => ({ accountId, delta }));
}

export async function applyEffect(tx: StoreTransaction, effect: BalanceEffect): Promise<void> {
  for (const { accountId, delta } of effect) {
    await tx.adjustBalance(accountId, delta);
  }
}

/** Account ids an effect touches, ascending. */
export function effectAccounts(...effects: readonly BalanceEffect[]): EntityId[] {
  const ids = new Set<EntityId>();
  for (const effect of effects) {
    for (const { accountId } of effect) ids.add(accountId);
  }
  return [...ids].sort((a, b) => a - b);
}
