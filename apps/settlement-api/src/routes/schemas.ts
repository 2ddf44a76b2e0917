import { CURRENCIES } from "@stagepay/shared-types";
import type { Response } from "express";
import { z } from "zod";

export const identitySchema = z.string().min(32).max(44);

export const amountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer string")
  .transform((value) => BigInt(value));

export const currencySchema = z.enum(CURRENCIES);

export const envelopeSchema = z.object({
  signer: identitySchema,
  signature: z.string().min(1)
});

export const deadlineSchema = z.number().int().nonnegative();

export function rejectInvalid(res: Response, error: z.ZodError, what = "body"): void {
  res.status(400).json({ error: `Invalid ${what}`, details: error.flatten() });
}
