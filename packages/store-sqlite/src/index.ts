/**
 * @centwise/store-sqlite — LedgerStore backed by SQLite.
 */

export { SqliteLedgerStore } from "./sqlite-store.js";
export type { SqliteLedgerStoreOptions } from "./sqlite-store.js";
export { SCHEMA_SQL, applySchema } from "./schema.js";
export { mapSqliteError } from "./errors.js";
export { WriteGate } from "./write-gate.js";
