import type { EnginePolicy } from "@stagepay/core";
import { MAX_FEE_PERCENTAGE, MAX_TIERS } from "@stagepay/core";
import type { LedgerDefaults } from "@stagepay/db";
import { CURRENCIES } from "@stagepay/shared-types";
import type { AppConfig } from "./config.js";

// Minor units; both currencies share the same bounds until an admin changes them.
const DEFAULT_MIN_PAYMENT = 1_000_000n;
const DEFAULT_MAX_PAYMENT = 10_000_000_000n;
const DEFAULT_VERIFIED_MAX_PAYMENT = 100_000_000_000n;

export function buildPolicy(config: AppConfig): EnginePolicy {
  return {
    currencies: {
      native: { currency: "native", symbol: "SOL", decimals: config.nativeDecimals },
      stable: { currency: "stable", symbol: "USDC", decimals: config.stableDecimals }
    },
    treasuryAccount: config.treasuryAccount,
    paymentCooldownSeconds: config.paymentCooldownSeconds,
    minTierPrice: config.minTierPrice,
    maxTierPrice: config.maxTierPrice,
    maxTiers: MAX_TIERS,
    maxFeePercentage: MAX_FEE_PERCENTAGE,
    domain: {
      name: config.authDomainName,
      version: config.authDomainVersion,
      chainId: `solana:${config.solanaNetwork}`
    }
  };
}

export function buildLedgerDefaults(config: AppConfig): LedgerDefaults {
  return {
    settings: {
      feePercentage: config.platformFeePercentage,
      feeRecipient: config.feeRecipient,
      trustedVerifier: config.trustedVerifier,
      paused: false,
      collectibleBaseUri: config.collectibleBaseUri,
      collectibleMaxSupply: config.collectibleMaxSupply,
      nextCollectibleId: 0
    },
    paymentLimits: CURRENCIES.map((currency) => ({
      currency,
      minPayment: DEFAULT_MIN_PAYMENT,
      maxPayment: DEFAULT_MAX_PAYMENT,
      verifiedMaxPayment: DEFAULT_VERIFIED_MAX_PAYMENT
    }))
  };
}
