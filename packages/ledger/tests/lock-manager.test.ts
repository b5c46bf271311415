/**
 * Tests for LockManager: ordering, re-entrancy, hand-off and timeouts.
 */

import { describe, it, expect } from "vitest";
import { LockManager } from "../src/store/lock-manager.js";
import { StoreError } from "../src/store/types.js";

describe("LockManager", () => {
  it("grants free ids immediately", async () => {
    const locks = new LockManager(100);
    const owner = Symbol("a");

    await locks.acquire(owner, [3, 1, 3]);

    expect(locks.holderOf(1)).toBe(owner);
    expect(locks.holderOf(3)).toBe(owner);
  });

  it("is re-entrant for the same owner", async () => {
    const locks = new LockManager(100);
    const owner = Symbol("a");

    await locks.acquire(owner, [1]);
    await locks.acquire(owner, [1, 2]);

    expect(locks.holderOf(2)).toBe(owner);
  });

  it("hands a released id to the first waiter", async () => {
    const locks = new LockManager(1_000);
    const a = Symbol("a");
    const b = Symbol("b");
    const c = Symbol("c");
    const order: string[] = [];

    await locks.acquire(a, [1]);
    const waitB = locks.acquire(b, [1]).then(() => order.push("b"));
    const waitC = locks.acquire(c, [1]).then(() => order.push("c"));

    locks.releaseAll(a);
    await waitB;
    expect(locks.holderOf(1)).toBe(b);

    locks.releaseAll(b);
    await waitC;
    expect(order).toEqual(["b", "c"]);
    expect(locks.holderOf(1)).toBe(c);
  });

  it("times out and releases what the failed call acquired", async () => {
    const locks = new LockManager(20);
    const a = Symbol("a");
    const b = Symbol("b");

    await locks.acquire(a, [2]);

    await expect(locks.acquire(b, [1, 2])).rejects.toBeInstanceOf(StoreError);
    expect(locks.holderOf(1)).toBeUndefined();
    expect(locks.holderOf(2)).toBe(a);
  });

  it("reports LOCK_TIMEOUT", async () => {
    const locks = new LockManager(10);
    await locks.acquire(Symbol("a"), [7]);

    await expect(locks.acquire(Symbol("b"), [7])).rejects.toMatchObject({ code: "LOCK_TIMEOUT" });
  });

  it("forgets a timed-out waiter", async () => {
    const locks = new LockManager(10);
    const a = Symbol("a");
    const b = Symbol("b");

    await locks.acquire(a, [1]);
    await expect(locks.acquire(b, [1])).rejects.toMatchObject({ code: "LOCK_TIMEOUT" });

    locks.releaseAll(a);
    expect(locks.holderOf(1)).toBeUndefined();
  });
});
