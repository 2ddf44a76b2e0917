import type { Currency } from "@stagepay/shared-types";
import type { CurrencyProfile } from "./context.js";
import { ValidationError } from "./errors.js";

/** Tier prices are stored with this many fractional digits, whatever the settlement currency. */
export const CANONICAL_DECIMALS = 18;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/**
 * Rescales a canonical amount to a currency with `decimals` fractional digits.
 * Scaling down floors; a non-zero amount that floors to zero is rejected so a
 * priced item can never settle for nothing.
 */
export function toCurrencyUnits(amount: bigint, decimals: number): bigint {
  if (amount < 0n) {
    throw new ValidationError("InvalidAmount", "Amount cannot be negative");
  }
  if (decimals >= CANONICAL_DECIMALS) {
    return amount * pow10(decimals - CANONICAL_DECIMALS);
  }

  const scaled = amount / pow10(CANONICAL_DECIMALS - decimals);
  if (amount > 0n && scaled === 0n) {
    throw new ValidationError(
      "AmountTooSmallAfterScaling",
      `Amount ${amount} truncates to zero at ${decimals} decimals`
    );
  }
  return scaled;
}

export function toCanonicalUnits(amount: bigint, decimals: number): bigint {
  if (amount < 0n) {
    throw new ValidationError("InvalidAmount", "Amount cannot be negative");
  }
  if (decimals >= CANONICAL_DECIMALS) {
    return amount / pow10(decimals - CANONICAL_DECIMALS);
  }
  return amount * pow10(CANONICAL_DECIMALS - decimals);
}

export function formatUnits(amount: bigint, decimals: number): string {
  const negative = amount < 0n;
  const digits = (negative ? -amount : amount).toString().padStart(decimals + 1, "0");
  const whole = digits.slice(0, digits.length - decimals);
  const fraction = digits.slice(digits.length - decimals).replace(/0+$/, "");
  const sign = negative ? "-" : "";
  return fraction.length > 0 ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}

export class CurrencyNormalizer {
  constructor(private readonly currencies: Record<Currency, CurrencyProfile>) {}

  decimalsOf(currency: Currency): number {
    return this.currencies[currency].decimals;
  }

  toSettlementUnits(canonicalAmount: bigint, currency: Currency): bigint {
    return toCurrencyUnits(canonicalAmount, this.decimalsOf(currency));
  }

  toCanonical(amount: bigint, currency: Currency): bigint {
    return toCanonicalUnits(amount, this.decimalsOf(currency));
  }

  format(amount: bigint, currency: Currency): string {
    const profile = this.currencies[currency];
    return `${formatUnits(amount, profile.decimals)} ${profile.symbol}`;
  }
}
