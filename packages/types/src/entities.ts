/**
 * Entity Types
 *
 * The records a personal finance tracker keeps per user.
 *
 * Rules:
 * - All amounts are decimal strings with exactly two fractional digits
 * - Every record is owned by exactly one user
 * - Account balances are cached values maintained by the ledger engine,
 *   never written directly by callers
 */

/** Numeric row identifier, assigned by the store. */
export type EntityId = number;

/** Opaque identifier of the acting user (issued by the auth layer). */
export type UserId = string;

/**
 * A fixed-point amount with two fractional digits.
 * e.g. "1250.00", "-40.10"
 */
export type Amount = string;

/**
 * A money container owned by one user.
 * `balance` equals the sum of the effects of every persisted entry
 * that references the account.
 */
export interface Account {
  readonly id: EntityId;
  readonly userId: UserId;
  readonly name: string;
  readonly balance: Amount;

  /** The hidden per-user account standing for money outside the tracker. */
  readonly isSystem: boolean;
}

/** Classification for expenses. Carries no balance. */
export interface Category {
  readonly id: EntityId;
  readonly userId: UserId;
  readonly name: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Money leaving an account. */
export interface Expense {
  readonly id: EntityId;
  readonly userId: UserId;
  readonly accountId: EntityId;
  readonly categoryId: EntityId;
  readonly amount: Amount;
  readonly description: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Money arriving in an account. */
export interface Income {
  readonly id: EntityId;
  readonly userId: UserId;
  readonly accountId: EntityId;
  readonly amount: Amount;
  readonly description: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Money moving between two accounts of the same user. */
export interface Transfer {
  readonly id: EntityId;
  readonly userId: UserId;
  readonly fromAccountId: EntityId;
  readonly toAccountId: EntityId;
  readonly amount: Amount;
  readonly createdAt: string;
}

/** The three kinds of record that move account balances. */
export type LedgerEntryKind = "expense" | "income" | "transfer";

/** Source of the current time for entry timestamps. */
export type Clock = () => Date;
