import { Keypair } from "@solana/web3.js";
import { type LedgerDefaults, MemoryLedgerStore } from "@stagepay/db";
import { type CreateEventInput, CURRENCIES, type Currency, type PlatformSettings } from "@stagepay/shared-types";
import { pino } from "pino";
import { type AuthorizationPayload, signAuthorization, type SignatureEnvelope } from "./authorization.js";
import { type CallerContext, callerContext, type Clock, type EnginePolicy, MAX_FEE_PERCENTAGE, MAX_TIERS } from "./context.js";
import { createEngine, type Engine } from "./engine.js";
import type { EventDetails } from "./inventory.js";

export const START_MS = Date.parse("2026-03-01T12:00:00.000Z");
export const START_SECONDS = Math.floor(START_MS / 1000);
export const TREASURY = "stagepay-treasury";

export class ManualClock implements Clock {
  constructor(public ms: number = START_MS) {}

  now(): number {
    return this.ms;
  }

  advanceSeconds(seconds: number): void {
    this.ms += seconds * 1000;
  }
}

export const silentLogger = pino({ level: "silent" });

export const testPolicy: EnginePolicy = {
  currencies: {
    native: { currency: "native", symbol: "SOL", decimals: 9 },
    stable: { currency: "stable", symbol: "USDC", decimals: 6 }
  },
  treasuryAccount: TREASURY,
  paymentCooldownSeconds: 60,
  minTierPrice: 10n ** 14n,
  maxTierPrice: 10n ** 21n,
  maxTiers: MAX_TIERS,
  maxFeePercentage: MAX_FEE_PERCENTAGE,
  domain: { name: "StagePay", version: "1", chainId: "solana:localnet" }
};

export function newIdentity(): string {
  return Keypair.generate().publicKey.toBase58();
}

export function testDefaults(settings: Partial<PlatformSettings> = {}): LedgerDefaults {
  return {
    settings: {
      feePercentage: 5,
      feeRecipient: newIdentity(),
      trustedVerifier: newIdentity(),
      paused: false,
      collectibleBaseUri: "https://collectibles.test/",
      collectibleMaxSupply: 10000,
      nextCollectibleId: 0,
      ...settings
    },
    paymentLimits: CURRENCIES.map((currency) => ({
      currency,
      minPayment: 1_000_000n,
      maxPayment: 10_000_000_000n,
      verifiedMaxPayment: 100_000_000_000n
    }))
  };
}

export interface Harness {
  engine: Engine;
  store: MemoryLedgerStore;
  clock: ManualClock;
  verifier: Keypair;
  feeRecipient: string;
  admin: CallerContext;
  organizer: CallerContext;
  commissionRecipient: string;
  sign(payload: AuthorizationPayload, signer?: Keypair): SignatureEnvelope;
  fund(identity: string, currency: Currency, amount: bigint): Promise<bigint>;
  custody(identity: string, currency: Currency): Promise<bigint>;
  createEvent(overrides?: Partial<CreateEventInput>): Promise<EventDetails>;
}

export function createHarness(settings: Partial<PlatformSettings> = {}): Harness {
  const verifier = Keypair.generate();
  const feeRecipient = newIdentity();
  const store = new MemoryLedgerStore(
    testDefaults({ trustedVerifier: verifier.publicKey.toBase58(), feeRecipient, ...settings })
  );
  const clock = new ManualClock();
  const engine = createEngine({ store, policy: testPolicy, logger: silentLogger, clock });
  const admin = callerContext(newIdentity(), ["admin"]);
  const organizer = callerContext(newIdentity(), ["organizer"]);
  const commissionRecipient = newIdentity();

  return {
    engine,
    store,
    clock,
    verifier,
    feeRecipient,
    admin,
    organizer,
    commissionRecipient,
    sign: (payload, signer = verifier) => signAuthorization(testPolicy.domain, payload, signer.secretKey),
    fund: (identity, currency, amount) => engine.admin.depositFunds(admin, identity, currency, amount),
    custody: async (identity, currency) => (await engine.queries.getCustodyAccount(identity, currency)).balance,
    createEvent: (overrides = {}) =>
      engine.inventory.createEvent(organizer, {
        id: "spring-gala",
        name: "Spring Gala",
        description: "Evening concert",
        startAt: "2026-03-01T00:00:00.000Z",
        endAt: "2026-03-02T00:00:00.000Z",
        tierIds: ["ga", "vip"],
        prices: [25n * 10n ** 18n, 100n * 10n ** 18n],
        maxQuantities: [100, 2],
        currency: "stable",
        commissionPercentage: 10,
        commissionRecipient,
        ...overrides
      })
  };
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}
