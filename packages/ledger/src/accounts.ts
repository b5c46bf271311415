/**
 * @centwise/ledger — Ownership and usage rules for referenced rows.
 *
 * Rules:
 * - A referenced id that does not exist is NOT_FOUND
 * - A referenced id owned by another user is a VALIDATION_ERROR on that field
 * - System accounts are usable only where the caller says so
 */

import type { Account, Category, EntityId, UserId } from "@centwise/types";
import type { StoreReader } from "./store/types.js";
import { LedgerError } from "./types.js";
import { invalid } from "./validation.js";

export interface AccountUsage {
  /** Input field the id came from, used in error messages. */
  readonly field: string;
  readonly allowSystem: boolean;
  /** Message when a system account is referenced without permission. */
  readonly systemMessage: string;
}

export function notFound(kind: string, id: EntityId): LedgerError {
  return new LedgerError("NOT_FOUND", `${kind} ${String(id)} not found`);
}

/**
 * Resolve an account referenced by an entry.
 */
export async function requireUsableAccount(
  reader: StoreReader,
  userId: UserId,
  id: EntityId,
  usage: AccountUsage,
): Promise<Account> {
  const account = await reader.getAccount(id);
  if (account === undefined) {
    throw notFound("Account", id);
  }
  if (account.userId !== userId) {
    throw invalid(usage.field, "Account must belong to the user.");
  }
  if (account.isSystem && !usage.allowSystem) {
    throw invalid(usage.field, usage.systemMessage);
  }
  return account;
}

export async function requireUsableCategory(
  reader: StoreReader,
  userId: UserId,
  id: EntityId,
): Promise<Category> {
  const category = await reader.getCategory(id);
  if (category === undefined) {
    throw notFound("Category", id);
  }
  if (category.userId !== userId) {
    throw invalid("categoryId", "Category must belong to the user.");
  }
  return category;
}

/**
 * Resolve an account addressed directly (get, rename, delete).
 * Foreign and system accounts are invisible here.
 */
export async function requireVisibleAccount(
  reader: StoreReader,
  userId: UserId,
  id: EntityId,
): Promise<Account> {
  const account = await reader.getAccount(id);
  if (account === undefined || account.userId !== userId || account.isSystem) {
    throw notFound("Account", id);
  }
  return account;
}

export async function requireVisibleCategory(
  reader: StoreReader,
  userId: UserId,
  id: EntityId,
): Promise<Category> {
  const category = await reader.getCategory(id);
  if (category === undefined || category.userId !== userId) {
    throw notFound("Category", id);
  }
  return category;
}
