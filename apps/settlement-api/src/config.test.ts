import { Keypair } from "@solana/web3.js";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { buildLedgerDefaults, buildPolicy } from "./setup.js";

const VERIFIER = Keypair.generate().publicKey.toBase58();
const ZERO_KEY = "11111111111111111111111111111111";

const withVerifier = (env: NodeJS.ProcessEnv = {}) => loadConfig({ TRUSTED_VERIFIER_PUBKEY: VERIFIER, ...env });

describe("loadConfig", () => {
  it("falls back to the documented defaults", () => {
    const config = withVerifier();

    expect(config).toMatchObject({
      port: 3001,
      databaseUrl: undefined,
      dbFallbackToMemory: true,
      rateLimitWindowMs: 60000,
      rateLimitMax: 60,
      paymentCooldownSeconds: 60,
      trustedVerifier: VERIFIER,
      feeRecipient: "stagepay-treasury",
      nativeDecimals: 9,
      stableDecimals: 6,
      treasuryAccount: "stagepay-treasury",
      platformFeePercentage: 5,
      minTierPrice: 100_000_000_000_000n,
      maxTierPrice: 1_000_000_000_000_000_000_000n,
      collectibleMaxSupply: 10000,
      logLevel: "info"
    });
  });

  it("treats an empty DATABASE_URL as unset", () => {
    expect(withVerifier({ DATABASE_URL: "" }).databaseUrl).toBeUndefined();
    expect(withVerifier({ DB_FALLBACK_TO_MEMORY: "0" }).dbFallbackToMemory).toBe(false);
  });

  it("fails on invalid values", () => {
    expect(() => withVerifier({ PORT: "not-a-port" })).toThrow(/^Invalid environment: PORT: /);
    expect(() => withVerifier({ PLATFORM_FEE_PERCENTAGE: "21" })).toThrow(/PLATFORM_FEE_PERCENTAGE/);
  });

  it("requires a non-zero trusted verifier", () => {
    expect(() => loadConfig({})).toThrow(/TRUSTED_VERIFIER_PUBKEY/);
    expect(() => loadConfig({ TRUSTED_VERIFIER_PUBKEY: "" })).toThrow(/TRUSTED_VERIFIER_PUBKEY: must be a base58 public key/);
    expect(() => loadConfig({ TRUSTED_VERIFIER_PUBKEY: ZERO_KEY })).toThrow(
      "Invalid environment: TRUSTED_VERIFIER_PUBKEY: must not be the all-zero key"
    );
  });

  it("sends platform fees to the treasury unless a fee recipient is set", () => {
    const feeRecipient = Keypair.generate().publicKey.toBase58();

    expect(withVerifier({ FEE_RECIPIENT_PUBKEY: "", TREASURY_ACCOUNT: "vault" }).feeRecipient).toBe("vault");
    expect(withVerifier({ FEE_RECIPIENT_PUBKEY: feeRecipient }).feeRecipient).toBe(feeRecipient);
    expect(() => withVerifier({ FEE_RECIPIENT_PUBKEY: ZERO_KEY })).toThrow(/FEE_RECIPIENT_PUBKEY/);
  });
});

describe("buildPolicy", () => {
  it("derives the engine policy from the configuration", () => {
    const policy = buildPolicy(withVerifier({ SOLANA_NETWORK: "localnet", STABLE_DECIMALS: "8" }));

    expect(policy.currencies.stable).toEqual({ currency: "stable", symbol: "USDC", decimals: 8 });
    expect(policy.domain).toEqual({ name: "StagePay", version: "1", chainId: "solana:localnet" });
    expect(policy.maxTiers).toBe(10);
    expect(policy.maxFeePercentage).toBe(20);
  });

  it("seeds limits for both currencies", () => {
    const defaults = buildLedgerDefaults(withVerifier());
    expect(defaults.paymentLimits.map((limits) => limits.currency)).toEqual(["native", "stable"]);
    expect(defaults.settings).toMatchObject({ feePercentage: 5, paused: false, nextCollectibleId: 0 });
  });
});
