import type { LedgerStore } from "@stagepay/db";
import type { Logger } from "pino";
import { AdminConsole } from "./admin.js";
import { AuthorizationVerifier } from "./authorization.js";
import { CollectibleRegistry } from "./collectibles.js";
import { type Clock, type EnginePolicy, systemClock } from "./context.js";
import { CurrencyNormalizer } from "./currency.js";
import { CustodyLedger } from "./custody.js";
import { InventoryLedger } from "./inventory.js";
import { PaymentService } from "./payments.js";
import { LedgerQueries } from "./queries.js";
import { SettlementEngine } from "./settlement.js";

export interface EngineOptions {
  store: LedgerStore;
  policy: EnginePolicy;
  logger: Logger;
  clock?: Clock;
}

export interface Engine {
  store: LedgerStore;
  policy: EnginePolicy;
  clock: Clock;
  normalizer: CurrencyNormalizer;
  verifier: AuthorizationVerifier;
  settlement: SettlementEngine;
  inventory: InventoryLedger;
  payments: PaymentService;
  collectibles: CollectibleRegistry;
  admin: AdminConsole;
  queries: LedgerQueries;
}

export function createEngine(options: EngineOptions): Engine {
  const { store, policy, logger } = options;
  const clock = options.clock ?? systemClock;

  const custody = new CustodyLedger();
  const normalizer = new CurrencyNormalizer(policy.currencies);
  const verifier = new AuthorizationVerifier(policy.domain, clock);
  const settlement = new SettlementEngine(custody, policy, logger.child({ component: "settlement" }));

  return {
    store,
    policy,
    clock,
    normalizer,
    verifier,
    settlement,
    inventory: new InventoryLedger({ store, clock, policy, settlement, normalizer, logger }),
    payments: new PaymentService({ store, clock, verifier, settlement, logger }),
    collectibles: new CollectibleRegistry({ store, clock, verifier, logger }),
    admin: new AdminConsole({ store, clock, policy, custody, logger }),
    queries: new LedgerQueries(store)
  };
}
