/**
 * FIFO queue that admits one unit of work at a time.
 *
 * A caller that waits longer than `timeoutMs` for its turn is rejected
 * with LOCK_TIMEOUT and gives up its place without running.
 */

import { StoreError } from "@centwise/ledger";

export class WriteGate {
  private _tail: Promise<void> = Promise.resolve();

  constructor(private readonly _timeoutMs: number) {}

  async run<T>(work: () => Promise<T>): Promise<T> {
    const previous = this._tail;
    let release: () => void = () => undefined;
    const mine = new Promise<void>((resolve) => {
      release = resolve;
    });
    this._tail = previous.then(() => mine);

    try {
      await this._wait(previous);
    } catch (err) {
      // Followers still queue behind `previous` through the chained tail
      release();
      throw err;
    }

    try {
      return await work();
    } finally {
      release();
    }
  }

  /** Resolves once every queued unit of work has finished. */
  async drain(): Promise<void> {
    await this._tail;
  }

  private _wait(previous: Promise<void>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new StoreError("LOCK_TIMEOUT", `Timed out after ${String(this._timeoutMs)}ms waiting for the database`));
      }, this._timeoutMs);
      previous.then(
        () => {
          clearTimeout(timer);
          resolve();
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }
}
