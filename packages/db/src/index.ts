import { MemoryLedgerStore } from "./memory-store.js";
import { PostgresLedgerStore } from "./postgres-store.js";
import type { LedgerDefaults, LedgerStore } from "./store.js";

export { MemoryLedgerStore } from "./memory-store.js";
export { PostgresLedgerStore } from "./postgres-store.js";
export {
  compositeKey,
  emptyBalance,
  emptyCustodyAccount,
  type LedgerDefaults,
  type LedgerReader,
  type LedgerStore,
  type LedgerTransaction,
  type LedgerWriter
} from "./store.js";

export function createLedgerStore(defaults: LedgerDefaults, databaseUrl?: string): LedgerStore {
  if (!databaseUrl) {
    return new MemoryLedgerStore(defaults);
  }
  return new PostgresLedgerStore(databaseUrl, defaults);
}
