/**
 * Shared fixtures for ledger tests.
 */

import type { Account, EntityId, UserId } from "@centwise/types";
import { Ledger } from "../src/ledger.js";
import { InMemoryLedgerStore } from "../src/store/in-memory-store.js";
import type { InMemoryLedgerStoreOptions } from "../src/store/in-memory-store.js";

export const ALICE: UserId = "alice";
export const BOB: UserId = "bob";
export const NOW = "2024-03-10T12:00:00.000Z";

export interface Harness {
  readonly store: InMemoryLedgerStore;
  readonly ledger: Ledger;
}

export function createHarness(options?: InMemoryLedgerStoreOptions): Harness {
  const store = new InMemoryLedgerStore(options);
  const ledger = new Ledger({ store, clock: () => new Date(NOW) });
  return { store, ledger };
}

/**
 * Create an account and, when `opening` is given, deposit it from the
 * user's system account.
 */
export async function openAccount(
  ledger: Ledger,
  userId: UserId,
  name: string,
  opening?: string,
): Promise<Account> {
  const account = await ledger.createAccount(userId, { name });
  if (opening !== undefined) {
    await ledger.depositFromExternal(userId, { accountId: account.id, amount: opening });
  }
  return account;
}

export async function balanceOf(ledger: Ledger, userId: UserId, id: EntityId): Promise<string> {
  const account = await ledger.getAccount(userId, id);
  return account.balance;
}
