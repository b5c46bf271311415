/**
 * Runtime Type Guards
 *
 * Narrowing functions for centwise entity types.
 * These enable safe runtime validation at system boundaries
 * (API responses, deserialized data, imported files).
 */

import type {
  Account,
  Amount,
  Category,
  Expense,
  Income,
  LedgerEntryKind,
  Transfer,
} from "./entities.js";

const AMOUNT_PATTERN = /^-?\d+\.\d{2}$/;
const ENTRY_KINDS = new Set<string>(["expense", "income", "transfer"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

function isId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

// =============================================================================
// Primitive guards
// =============================================================================

export function isAmount(value: unknown): value is Amount {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isLedgerEntryKind(value: unknown): value is LedgerEntryKind {
  return typeof value === "string" && ENTRY_KINDS.has(value);
}

// =============================================================================
// Entity guards
// =============================================================================

export function isAccount(value: unknown): value is Account {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.userId === "string" &&
    typeof value.name === "string" &&
    value.name.length > 0 &&
    isAmount(value.balance) &&
    typeof value.isSystem === "boolean"
  );
}

export function isCategory(value: unknown): value is Category {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.userId === "string" &&
    typeof value.name === "string" &&
    typeof value.createdAt === "string" &&
    typeof value.updatedAt === "string"
  );
}

export function isExpense(value: unknown): value is Expense {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.userId === "string" &&
    isId(value.accountId) &&
    isId(value.categoryId) &&
    isAmount(value.amount) &&
    typeof value.description === "string" &&
    typeof value.createdAt === "string" &&
    typeof value.updatedAt === "string"
  );
}

export function isIncome(value: unknown): value is Income {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.userId === "string" &&
    isId(value.accountId) &&
    isAmount(value.amount) &&
    typeof value.description === "string" &&
    typeof value.createdAt === "string" &&
    typeof value.updatedAt === "string"
  );
}

export function isTransfer(value: unknown): value is Transfer {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.userId === "string" &&
    isId(value.fromAccountId) &&
    isId(value.toAccountId) &&
    value.fromAccountId !== value.toAccountId &&
    isAmount(value.amount) &&
    typeof value.createdAt === "string"
  );
}
