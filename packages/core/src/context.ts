import { PublicKey } from "@solana/web3.js";
import type { Currency } from "@stagepay/shared-types";
import { AuthorizationError, ValidationError } from "./errors.js";

export type Role = "admin" | "organizer";

/**
 * Who is calling a privileged operation. Built by the transport layer after it
 * has authenticated the caller; the engine only checks roles and identities.
 */
export interface CallerContext {
  identity: string;
  roles: ReadonlySet<Role>;
}

export function callerContext(identity: string, roles: Role[] = []): CallerContext {
  return { identity, roles: new Set(roles) };
}

export function requireRole(ctx: CallerContext, role: Role): void {
  if (!ctx.roles.has(role)) {
    throw new AuthorizationError("Unauthorized", `Caller ${ctx.identity} lacks the ${role} role`);
  }
}

export interface Clock {
  /** Epoch milliseconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

export function nowSeconds(clock: Clock): number {
  return Math.floor(clock.now() / 1000);
}

// The all-zero ed25519 key; never a valid destination for funds.
export const ZERO_IDENTITY = PublicKey.default.toBase58();

export function isValidIdentity(value: string): boolean {
  try {
    return new PublicKey(value).toBase58() === value;
  } catch {
    return false;
  }
}

export function assertIdentity(value: string, field: string): void {
  if (!isValidIdentity(value) || value === ZERO_IDENTITY) {
    throw new ValidationError("InvalidRecipient", `${field} must be a non-zero public key`);
  }
}

export interface CurrencyProfile {
  currency: Currency;
  symbol: string;
  decimals: number;
}

export interface AuthorizationDomain {
  name: string;
  version: string;
  chainId: string;
}

export interface EnginePolicy {
  currencies: Record<Currency, CurrencyProfile>;
  /** Custody account that holds funds owed to organizers until withdrawal. */
  treasuryAccount: string;
  paymentCooldownSeconds: number;
  minTierPrice: bigint;
  maxTierPrice: bigint;
  maxTiers: number;
  maxFeePercentage: number;
  domain: AuthorizationDomain;
}

export const MAX_TIERS = 10;
export const MAX_FEE_PERCENTAGE = 20;
