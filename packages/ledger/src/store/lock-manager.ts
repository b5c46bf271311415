/**
 * @centwise/ledger — Per-account exclusive locks.
 *
 * Properties:
 * - Ids are acquired one at a time in ascending order (no lock-order deadlock)
 * - Re-entrant for the same owner
 * - FIFO hand-off: a released id goes straight to the next waiter
 * - A wait past the deadline releases what that call acquired and throws
 */

import type { EntityId } from "@centwise/types";
import { StoreError } from "./types.js";

/** Opaque token identifying the holder of a set of locks. */
export type LockOwner = symbol;

interface Waiter {
  readonly owner: LockOwner;
  readonly grant: () => void;
}

export class LockManager {
  private readonly _holders = new Map<EntityId, LockOwner>();
  private readonly _queues = new Map<EntityId, Waiter[]>();
  private readonly _timeoutMs: number;

  constructor(timeoutMs: number) {
    this._timeoutMs = timeoutMs;
  }

  /**
   * Acquire every id for `owner`, waiting at most the configured timeout overall.
   */
  async acquire(owner: LockOwner, ids: readonly EntityId[]): Promise<void> {
    const ordered = [...new Set(ids)].sort((a, b) => a - b);
    const deadline = Date.now() + this._timeoutMs;
    const acquired: EntityId[] = [];

    for (const id of ordered) {
      const holder = this._holders.get(id);
      if (holder === owner) continue;

      if (holder === undefined) {
        this._holders.set(id, owner);
        acquired.push(id);
        continue;
      }

      try {
        await this._wait(owner, id, deadline);
        acquired.push(id);
      } catch (err) {
        for (const held of acquired) this._releaseOne(held, owner);
        throw err;
      }
    }
  }

  /**
   * Release every id held by `owner`.
   */
  releaseAll(owner: LockOwner): void {
    for (const [id, holder] of [...this._holders]) {
      if (holder === owner) this._releaseOne(id, owner);
    }
  }

  /** Current holder of an id, if any. */
  holderOf(id: EntityId): LockOwner | undefined {
    return this._holders.get(id);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _wait(owner: LockOwner, id: EntityId, deadline: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const remaining = Math.max(0, deadline - Date.now());
      const waiter: Waiter = {
        owner,
        grant: () => {
          clearTimeout(timer);
          resolve();
        },
      };

      const timer = setTimeout(() => {
        const queue = this._queues.get(id);
        if (queue !== undefined) {
          const index = queue.indexOf(waiter);
          if (index >= 0) queue.splice(index, 1);
          if (queue.length === 0) this._queues.delete(id);
        }
        reject(
          new StoreError(
            "LOCK_TIMEOUT",
            `Timed out after ${String(this._timeoutMs)}ms waiting for account ${String(id)}`,
          ),
        );
      }, remaining);

      const queue = this._queues.get(id) ?? [];
      queue.push(waiter);
      this._queues.set(id, queue);
    });
  }

  private _releaseOne(id: EntityId, owner: LockOwner): void {
    if (this._holders.get(id) !== owner) return;

    const queue = this._queues.get(id);
    const next = queue?.shift();
    if (queue !== undefined && queue.length === 0) this._queues.delete(id);

    if (next === undefined) {
      this._holders.delete(id);
      return;
    }

    this._holders.set(id, next.owner);
    next.grant();
  }
}
