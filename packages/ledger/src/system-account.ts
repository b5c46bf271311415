/**
 * @centwise/ledger — External-account provisioner.
 *
 * Each user has at most one system account. It models money entering or
 * leaving the tracked accounts, is hidden from listings and may run a
 * negative balance.
 */

import type { Account, UserId } from "@centwise/types";
import type { LedgerStore } from "./store/types.js";
import { StoreError } from "./store/types.js";

/** Display name of every system account. Users cannot take it. */
export const SYSTEM_ACCOUNT_NAME = "External (System)";

/**
 * Return the user's system account, creating it on first use.
 *
 * Runs in its own transaction so the row is committed before any transfer
 * references it. Two first calls racing each other are settled by the
 * store's one-system-account-per-user constraint: the loser re-reads and
 * returns the winner's row.
 */
export async function getOrCreateSystemAccount(
  store: LedgerStore,
  userId: UserId,
): Promise<Account> {
  try {
    return await store.transaction(async (tx) => {
      const existing = await tx.findSystemAccount(userId);
      if (existing !== undefined) return existing;
      return tx.insertAccount({ userId, name: SYSTEM_ACCOUNT_NAME, isSystem: true });
    });
  } catch (err) {
    if (!(err instanceof StoreError) || err.code !== "UNIQUE_VIOLATION") throw err;

    const winner = await store.read((reader) => reader.findSystemAccount(userId));
    if (winner === undefined) throw err;
    return winner;
  }
}
