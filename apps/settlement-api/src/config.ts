import "dotenv/config";
import { isValidIdentity, ZERO_IDENTITY } from "@stagepay/core";
import { z } from "zod";

const publicKeySchema = z
  .string()
  .refine(isValidIdentity, "must be a base58 public key")
  .refine((value) => value !== ZERO_IDENTITY, "must not be the all-zero key");

const unsetWhenEmpty = (value: unknown) => (value === "" ? undefined : value);

const integerString = z.string().regex(/^\d+$/).transform((value) => BigInt(value));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z
    .string()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : undefined)),
  DB_FALLBACK_TO_MEMORY: z.string().default("1"),
  ADMIN_API_KEY: z.string().min(1).default("dev-admin-key"),
  ORGANIZER_API_KEY: z.string().min(1).default("dev-organizer-key"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  PAYMENT_COOLDOWN_SECONDS: z.coerce.number().int().nonnegative().default(60),
  TRUSTED_VERIFIER_PUBKEY: publicKeySchema,
  FEE_RECIPIENT_PUBKEY: z.preprocess(unsetWhenEmpty, publicKeySchema.optional()),
  AUTH_DOMAIN_NAME: z.string().min(1).default("StagePay"),
  AUTH_DOMAIN_VERSION: z.string().min(1).default("1"),
  SOLANA_NETWORK: z.string().min(1).default("devnet"),
  NATIVE_DECIMALS: z.coerce.number().int().min(0).max(36).default(9),
  STABLE_DECIMALS: z.coerce.number().int().min(0).max(36).default(6),
  TREASURY_ACCOUNT: z.string().min(1).default("stagepay-treasury"),
  PLATFORM_FEE_PERCENTAGE: z.coerce.number().int().min(0).max(20).default(5),
  MIN_TIER_PRICE: integerString.default("100000000000000"),
  MAX_TIER_PRICE: integerString.default("1000000000000000000000"),
  COLLECTIBLE_BASE_URI: z.string().default("https://collectibles.stagepay.dev/metadata/"),
  COLLECTIBLE_MAX_SUPPLY: z.coerce.number().int().positive().default(10000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment: ${issues.join("; ")}`);
  }

  const values = parsed.data;
  return Object.freeze({
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    dbFallbackToMemory: values.DB_FALLBACK_TO_MEMORY !== "0",
    adminApiKey: values.ADMIN_API_KEY,
    organizerApiKey: values.ORGANIZER_API_KEY,
    rateLimitWindowMs: values.RATE_LIMIT_WINDOW_MS,
    rateLimitMax: values.RATE_LIMIT_MAX,
    paymentCooldownSeconds: values.PAYMENT_COOLDOWN_SECONDS,
    trustedVerifier: values.TRUSTED_VERIFIER_PUBKEY,
    feeRecipient: values.FEE_RECIPIENT_PUBKEY ?? values.TREASURY_ACCOUNT,
    authDomainName: values.AUTH_DOMAIN_NAME,
    authDomainVersion: values.AUTH_DOMAIN_VERSION,
    solanaNetwork: values.SOLANA_NETWORK,
    nativeDecimals: values.NATIVE_DECIMALS,
    stableDecimals: values.STABLE_DECIMALS,
    treasuryAccount: values.TREASURY_ACCOUNT,
    platformFeePercentage: values.PLATFORM_FEE_PERCENTAGE,
    minTierPrice: values.MIN_TIER_PRICE,
    maxTierPrice: values.MAX_TIER_PRICE,
    collectibleBaseUri: values.COLLECTIBLE_BASE_URI,
    collectibleMaxSupply: values.COLLECTIBLE_MAX_SUPPLY,
    logLevel: values.LOG_LEVEL
  });
}
