/**
 * Tests for SqliteLedgerStore against an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Account } from "@centwise/types";
import { StoreError } from "@centwise/ledger";
import { SqliteLedgerStore } from "../src/sqlite-store.js";
import { mapSqliteError } from "../src/errors.js";

const ALICE = "alice";
const NOW = "2024-03-10T12:00:00.000Z";

let store: SqliteLedgerStore;

beforeEach(() => {
  store = new SqliteLedgerStore();
});

afterEach(async () => {
  await store.close();
});

async function insertAccount(name: string, isSystem = false): Promise<Account> {
  return store.transaction((tx) => tx.insertAccount({ userId: ALICE, name, isSystem }));
}

async function balance(id: number): Promise<string | undefined> {
  const account = await store.read((reader) => reader.getAccount(id));
  return account?.balance;
}

// ─── Transactions ────────────────────────────────────────────────────────

describe("transactions", () => {
  it("rolls back every write when the work throws", async () => {
    const account = await insertAccount("Cash");

    await expect(
      store.transaction(async (tx) => {
        await tx.adjustBalance(account.id, 500n);
        await tx.insertAccount({ userId: ALICE, name: "Ghost", isSystem: false });
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await balance(account.id)).toBe("0.00");
    const all = await store.read((reader) => reader.listAccounts(ALICE));
    expect(all.map((a) => a.name)).toEqual(["Cash"]);
  });

  it("shows a transaction its own writes", async () => {
    const account = await insertAccount("Cash");

    const seen = await store.transaction(async (tx) => {
      await tx.adjustBalance(account.id, 250n);
      await tx.adjustBalance(account.id, -50n);
      return (await tx.getAccount(account.id))?.balance;
    });

    expect(seen).toBe("2.00");
    expect(await balance(account.id)).toBe("2.00");
  });

  it("runs overlapping transactions one after another", async () => {
    const account = await insertAccount("Cash");

    await Promise.all([
      store.transaction((tx) => tx.adjustBalance(account.id, 100n)),
      store.transaction((tx) => tx.adjustBalance(account.id, 250n)),
      store.transaction((tx) => tx.adjustBalance(account.id, -25n)),
    ]);

    expect(await balance(account.id)).toBe("3.25");
  });

  it("rejects a handle used after its transaction ended", async () => {
    const leaked = await store.transaction(async (tx) => tx);

    await expect(leaked.getAccount(1)).rejects.toMatchObject({ code: "CLOSED" });
  });

  it("times out while another unit of work holds the connection", async () => {
    const fast = new SqliteLedgerStore({ lockTimeoutMs: 20 });
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const holder = fast.transaction(async () => {
      await gate;
    });

    await expect(fast.read((reader) => reader.listCategories(ALICE))).rejects.toMatchObject({
      code: "LOCK_TIMEOUT",
    });

    release();
    await holder;
    expect(await fast.read((reader) => reader.listCategories(ALICE))).toEqual([]);
    await fast.close();
  });

  it("rejects work after close", async () => {
    const other = new SqliteLedgerStore();
    await other.close();

    await expect(other.read((reader) => reader.listCategories(ALICE))).rejects.toMatchObject({
      code: "CLOSED",
    });
  });
});

// ─── Constraints ─────────────────────────────────────────────────────────

describe("constraints", () => {
  it("rejects a duplicate account name per user", async () => {
    await insertAccount("Cash");

    await expect(insertAccount("Cash")).rejects.toMatchObject({
      code: "UNIQUE_VIOLATION",
      constraint: "account_name_per_user",
    });
    await expect(
      store.transaction((tx) => tx.insertAccount({ userId: "bob", name: "Cash", isSystem: false })),
    ).resolves.toMatchObject({ userId: "bob", name: "Cash" });
  });

  it("allows at most one system account per user", async () => {
    await insertAccount("External", true);

    await expect(insertAccount("Other external", true)).rejects.toMatchObject({
      code: "UNIQUE_VIOLATION",
      constraint: "system_account_per_user",
    });
  });

  it("rejects a duplicate category name per user", async () => {
    const category = { userId: ALICE, name: "Food", createdAt: NOW, updatedAt: NOW };
    await store.transaction((tx) => tx.insertCategory(category));

    await expect(store.transaction((tx) => tx.insertCategory(category))).rejects.toMatchObject({
      code: "UNIQUE_VIOLATION",
      constraint: "category_name_per_user",
    });
  });

  it("restricts deleting an account that entries reference", async () => {
    const account = await insertAccount("Cash");
    await store.transaction((tx) =>
      tx.insertIncome({
        userId: ALICE,
        accountId: account.id,
        amount: "1.00",
        description: "x",
        createdAt: NOW,
        updatedAt: NOW,
      }),
    );

    await expect(store.transaction((tx) => tx.deleteAccount(account.id))).rejects.toMatchObject({
      code: "REFERENCE_VIOLATION",
      constraint: "account_has_entries",
    });
  });

  it("restricts deleting a category that expenses reference", async () => {
    const account = await insertAccount("Cash");
    const category = await store.transaction((tx) =>
      tx.insertCategory({ userId: ALICE, name: "Food", createdAt: NOW, updatedAt: NOW }),
    );
    await store.transaction((tx) =>
      tx.insertExpense({
        userId: ALICE,
        accountId: account.id,
        categoryId: category.id,
        amount: "1.00",
        description: "x",
        createdAt: NOW,
        updatedAt: NOW,
      }),
    );

    await expect(store.transaction((tx) => tx.deleteCategory(category.id))).rejects.toMatchObject({
      code: "REFERENCE_VIOLATION",
      constraint: "category_has_expenses",
    });
  });

  it("checks amounts and transfer accounts", async () => {
    const a = await insertAccount("A");
    const b = await insertAccount("B");
    const transfer = (fromAccountId: number, toAccountId: number, amount: string) =>
      store.transaction((tx) =>
        tx.insertTransfer({ userId: ALICE, fromAccountId, toAccountId, amount, createdAt: NOW }),
      );

    await expect(transfer(a.id, b.id, "0.00")).rejects.toMatchObject({
      code: "CHECK_VIOLATION",
      constraint: "positive_amount",
    });
    await expect(transfer(a.id, a.id, "1.00")).rejects.toMatchObject({
      code: "CHECK_VIOLATION",
      constraint: "distinct_transfer_accounts",
    });
    await expect(transfer(a.id, 99, "1.00")).rejects.toMatchObject({
      code: "REFERENCE_VIOLATION",
      constraint: "entry_account_exists",
    });
  });

  it("reports missing rows", async () => {
    await expect(store.transaction((tx) => tx.adjustBalance(42, 1n))).rejects.toMatchObject({
      code: "ROW_NOT_FOUND",
    });
    await expect(store.transaction((tx) => tx.deleteTransfer(42))).rejects.toMatchObject({
      code: "ROW_NOT_FOUND",
    });
  });
});

// ─── Queries ─────────────────────────────────────────────────────────────

describe("queries", () => {
  it("hides system accounts unless asked", async () => {
    await insertAccount("Cash");
    await insertAccount("External (System)", true);

    const visible = await store.read((reader) => reader.listAccounts(ALICE));
    const all = await store.read((reader) => reader.listAccounts(ALICE, { includeSystem: true }));

    expect(visible.map((a) => a.name)).toEqual(["Cash"]);
    expect(all.map((a) => a.isSystem)).toEqual([false, true]);
  });

  it("filters entries by account and inclusive period", async () => {
    const a = await insertAccount("A");
    const b = await insertAccount("B");
    const income = (accountId: number, createdAt: string) =>
      store.transaction((tx) =>
        tx.insertIncome({ userId: ALICE, accountId, amount: "5.00", description: "x", createdAt, updatedAt: createdAt }),
      );
    await income(a.id, "2024-01-31T23:59:59.999Z");
    const first = await income(a.id, "2024-02-01T00:00:00.000Z");
    await income(b.id, "2024-02-10T00:00:00.000Z");
    await income(a.id, "2024-03-01T00:00:00.000Z");

    const rows = await store.read((reader) =>
      reader.listIncomes({
        userId: ALICE,
        accountId: a.id,
        from: "2024-02-01T00:00:00.000Z",
        to: "2024-02-29T23:59:59.999Z",
      }),
    );

    expect(rows.map((r) => r.id)).toEqual([first.id]);
  });

  it("filters transfers by direction", async () => {
    const a = await insertAccount("A");
    const b = await insertAccount("B");
    const c = await insertAccount("C");
    const move = (fromAccountId: number, toAccountId: number) =>
      store.transaction((tx) =>
        tx.insertTransfer({ userId: ALICE, fromAccountId, toAccountId, amount: "1.00", createdAt: NOW }),
      );
    const ab = await move(a.id, b.id);
    const cb = await move(c.id, b.id);
    await move(b.id, a.id);

    const intoB = await store.read((reader) => reader.listTransfers({ userId: ALICE, toAccountId: b.id }));
    const fromC = await store.read((reader) =>
      reader.listTransfers({ userId: ALICE, fromAccountId: c.id, toAccountId: b.id }),
    );

    expect(intoB.map((t) => t.id)).toEqual([ab.id, cb.id]);
    expect(fromC.map((t) => t.id)).toEqual([cb.id]);
  });

  it("lockAccounts returns existing rows in id order", async () => {
    const a = await insertAccount("A");
    const b = await insertAccount("B");

    const locked = await store.transaction((tx) => tx.lockAccounts([b.id, 77, a.id, b.id]));

    expect(locked.map((acc) => acc.id)).toEqual([a.id, b.id]);
  });

  it("round-trips amounts through minor units", async () => {
    const a = await insertAccount("A");
    const income = await store.transaction((tx) =>
      tx.insertIncome({
        userId: ALICE,
        accountId: a.id,
        amount: "99999999.99",
        description: "max",
        createdAt: NOW,
        updatedAt: NOW,
      }),
    );

    expect(income.amount).toBe("99999999.99");
  });
});

// ─── Error mapping ───────────────────────────────────────────────────────

describe("mapSqliteError", () => {
  function sqliteError(code: string, message: string): Error {
    return Object.assign(new Error(message), { code });
  }

  it("maps unique failures to the named constraint", () => {
    const mapped = mapSqliteError(
      sqliteError("SQLITE_CONSTRAINT_UNIQUE", "UNIQUE constraint failed: categories.user_id, categories.name"),
    );

    expect(mapped).toBeInstanceOf(StoreError);
    expect(mapped).toMatchObject({ code: "UNIQUE_VIOLATION", constraint: "category_name_per_user" });
  });

  it("maps busy databases to LOCK_TIMEOUT", () => {
    expect(mapSqliteError(sqliteError("SQLITE_BUSY", "database is locked"))).toMatchObject({
      code: "LOCK_TIMEOUT",
    });
  });

  it("passes through errors it does not know", () => {
    const plain = new Error("boom");

    expect(mapSqliteError(plain)).toBe(plain);
  });
});
