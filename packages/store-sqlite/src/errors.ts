/**
 * Translate SQLite constraint failures into StoreError.
 */

import { StoreError } from "@centwise/ledger";
import type { StoreConstraint } from "@centwise/ledger";

const CHECK_CONSTRAINTS: readonly StoreConstraint[] = ["positive_amount", "distinct_transfer_accounts"];

function sqliteCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function uniqueConstraint(message: string): StoreConstraint | undefined {
  if (message.includes("accounts.name")) return "account_name_per_user";
  if (message.includes("categories.name")) return "category_name_per_user";
  // The partial index covers user_id alone
  if (message.includes("accounts.user_id")) return "system_account_per_user";
  return undefined;
}

function checkConstraint(message: string): StoreConstraint | undefined {
  return CHECK_CONSTRAINTS.find((name) => message.includes(name));
}

/**
 * Map a better-sqlite3 error to a StoreError. Anything that is not a
 * constraint failure is returned as is.
 */
export function mapSqliteError(err: unknown): unknown {
  if (err instanceof StoreError) return err;
  const code = sqliteCode(err);
  if (code === undefined || !(err instanceof Error)) return err;

  switch (code) {
    case "SQLITE_CONSTRAINT_UNIQUE":
    case "SQLITE_CONSTRAINT_PRIMARYKEY":
      return new StoreError("UNIQUE_VIOLATION", err.message, uniqueConstraint(err.message));
    case "SQLITE_CONSTRAINT_FOREIGNKEY":
      return new StoreError("REFERENCE_VIOLATION", err.message);
    case "SQLITE_CONSTRAINT_CHECK":
      return new StoreError("CHECK_VIOLATION", err.message, checkConstraint(err.message));
    case "SQLITE_BUSY":
    case "SQLITE_LOCKED":
      return new StoreError("LOCK_TIMEOUT", err.message);
    default:
      return err;
  }
}
