/**
 * FinanceService — Composition root for the domain layer.
 *
 * Owns the persistence store and wires the Ledger and Reporter on top
 * of it. One instance serves every user; rows are scoped per user by
 * the ledger itself.
 */

import type { Clock } from "@centwise/types";
import { InMemoryLedgerStore, Ledger } from "@centwise/ledger";
import type { LedgerStore } from "@centwise/ledger";
import { SqliteLedgerStore } from "@centwise/store-sqlite";
import { Reporter } from "@centwise/reports";

export type StoreDriver = "memory" | "sqlite";

export interface FinanceServiceConfig {
  readonly driver: StoreDriver;
  /** SQLite file; only read by the sqlite driver. */
  readonly databasePath?: string | undefined;
  readonly lockTimeoutMs?: number | undefined;
  readonly clock?: Clock | undefined;
  /** Source of [0, 1) numbers for random salary deposits. */
  readonly random?: (() => number) | undefined;
}

export class FinanceService {
  readonly ledger: Ledger;
  readonly reporter: Reporter;
  readonly random: () => number;
  readonly driver: StoreDriver;

  private readonly _store: LedgerStore;
  private _stopped = false;

  constructor(config: FinanceServiceConfig) {
    this.driver = config.driver;
    this._store =
      config.driver === "sqlite"
        ? new SqliteLedgerStore({
            filename: config.databasePath,
            lockTimeoutMs: config.lockTimeoutMs,
          })
        : new InMemoryLedgerStore({ lockTimeoutMs: config.lockTimeoutMs });

    const clock = config.clock ?? (() => new Date());
    this.ledger = new Ledger({ store: this._store, clock });
    this.reporter = new Reporter({ ledger: this.ledger, clock });
    this.random = config.random ?? Math.random;
  }

  /**
   * Readiness: the service is running and the store answers a read.
   */
  async isReady(): Promise<boolean> {
    if (this._stopped) {
      return false;
    }
    try {
      await this._store.read(async () => true);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Close the store. Further calls fail with a store error.
   */
  async stop(): Promise<void> {
    if (this._stopped) {
      return;
    }
    this._stopped = true;
    await this._store.close();
  }
}
