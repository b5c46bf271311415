/**
 * Demo data seeding.
 *
 * Fills an empty user with two accounts, a set of categories and a few
 * months of randomly dated incomes, expenses and transfers. Every row
 * goes through the Ledger, so balances stay consistent with the entries:
 * opening balances are deposits from the system account.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { EntityId, UserId } from "@centwise/types";
import { LedgerError } from "@centwise/ledger";
import type { Ledger } from "@centwise/ledger";

// =============================================================================
// Seed Data
// =============================================================================

function rangeSchema(floor: number) {
  return z
    .object({ min: z.number().int().min(floor), max: z.number().int().min(floor) })
    .refine((r) => r.min <= r.max, { message: "min must be <= max" });
}

/** Entry amounts must be positive; day offsets may be zero. */
const AmountRangeSchema = rangeSchema(1);
const DayRangeSchema = rangeSchema(0);

export const DemoSeedSchema = z.object({
  accounts: z
    .array(z.object({ name: z.string().min(1), openingBalance: z.string() }))
    .min(2),
  incomeSources: z.array(z.string().min(1)).min(1),
  expenseItems: z
    .array(z.object({ category: z.string().min(1), descriptions: z.array(z.string().min(1)).min(1) }))
    .min(1),
  counts: z.object({
    incomes: z.number().int().min(0),
    expenses: z.number().int().min(0),
    transfers: z.number().int().min(0),
  }),
  ranges: z.object({
    income: AmountRangeSchema,
    expense: AmountRangeSchema,
    transfer: AmountRangeSchema,
    daysBack: DayRangeSchema,
  }),
});

export type DemoSeed = z.infer<typeof DemoSeedSchema>;

const DEFAULT_SEED_URL = new URL("./data/demo-seed.json", import.meta.url);

/**
 * Load and validate seed data.
 *
 * @throws {z.ZodError} if the file does not match the schema
 */
export function loadDemoSeed(url: URL = DEFAULT_SEED_URL): DemoSeed {
  return DemoSeedSchema.parse(JSON.parse(readFileSync(url, "utf-8")));
}

// =============================================================================
// Seeding
// =============================================================================

export interface SeedOptions {
  /** Returns numbers in [0, 1). */
  readonly random?: () => number;
  readonly now?: Date;
  readonly data?: DemoSeed;
}

export interface SeedResult {
  readonly seeded: boolean;
  readonly accounts: number;
  readonly categories: number;
  readonly incomes: number;
  readonly expenses: number;
  readonly transfers: number;
  /** Transfers dropped because the source account ran short. */
  readonly skippedTransfers: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const NOTHING_SEEDED: SeedResult = {
  seeded: false,
  accounts: 0,
  categories: 0,
  incomes: 0,
  expenses: 0,
  transfers: 0,
  skippedTransfers: 0,
};

/**
 * Seed demo data for a user that has no accounts yet. Users with
 * accounts are left untouched.
 */
export async function seedDemoData(
  ledger: Ledger,
  userId: UserId,
  options: SeedOptions = {},
): Promise<SeedResult> {
  const random = options.random ?? Math.random;
  const now = options.now ?? new Date();
  const data = options.data ?? loadDemoSeed();

  if ((await ledger.listAccounts(userId)).length > 0) {
    return NOTHING_SEEDED;
  }

  const randomInt = (range: { readonly min: number; readonly max: number }): number =>
    range.min + Math.floor(random() * (range.max - range.min + 1));
  const pick = <T>(items: readonly T[]): T => {
    const item = items[Math.floor(random() * items.length)];
    if (item === undefined) {
      throw new Error("Cannot pick from an empty list");
    }
    return item;
  };
  const daysAgo = (days: number): string => new Date(now.getTime() - days * DAY_MS).toISOString();
  const randomDate = (): string => daysAgo(randomInt(data.ranges.daysBack));

  // Categories: reuse any the user already has
  const categoryIds = new Map<string, EntityId>();
  for (const existing of await ledger.listCategories(userId)) {
    categoryIds.set(existing.name, existing.id);
  }
  let categories = 0;
  for (const item of data.expenseItems) {
    if (!categoryIds.has(item.category)) {
      const created = await ledger.createCategory(userId, { name: item.category });
      categoryIds.set(created.name, created.id);
      categories++;
    }
  }

  // Accounts, funded before the oldest entry
  const openedAt = daysAgo(data.ranges.daysBack.max + 1);
  const accountIds: EntityId[] = [];
  for (const seedAccount of data.accounts) {
    const account = await ledger.createAccount(userId, { name: seedAccount.name });
    await ledger.depositFromExternal(userId, {
      accountId: account.id,
      amount: seedAccount.openingBalance,
      createdAt: openedAt,
    });
    accountIds.push(account.id);
  }

  for (let i = 0; i < data.counts.incomes; i++) {
    await ledger.applyIncome(userId, {
      op: "create",
      input: {
        accountId: pick(accountIds),
        amount: String(randomInt(data.ranges.income)),
        description: pick(data.incomeSources),
        createdAt: randomDate(),
      },
    });
  }

  for (let i = 0; i < data.counts.expenses; i++) {
    const item = pick(data.expenseItems);
    const categoryId = categoryIds.get(item.category);
    if (categoryId === undefined) {
      throw new Error(`Seed category missing: ${item.category}`);
    }
    await ledger.applyExpense(userId, {
      op: "create",
      input: {
        accountId: pick(accountIds),
        categoryId,
        amount: String(randomInt(data.ranges.expense)),
        description: pick(item.descriptions),
        createdAt: randomDate(),
      },
    });
  }

  const [fromAccountId, toAccountId] = accountIds;
  let transfers = 0;
  let skippedTransfers = 0;
  if (fromAccountId !== undefined && toAccountId !== undefined) {
    for (let i = 0; i < data.counts.transfers; i++) {
      try {
        await ledger.applyTransfer(userId, {
          op: "create",
          input: {
            fromAccountId,
            toAccountId,
            amount: String(randomInt(data.ranges.transfer)),
            createdAt: randomDate(),
          },
        });
        transfers++;
      } catch (err) {
        if (!(err instanceof LedgerError) || err.code !== "INSUFFICIENT_FUNDS") {
          throw err;
        }
        skippedTransfers++;
      }
    }
  }

  return {
    seeded: true,
    accounts: accountIds.length,
    categories,
    incomes: data.counts.incomes,
    expenses: data.counts.expenses,
    transfers,
    skippedTransfers,
  };
}
