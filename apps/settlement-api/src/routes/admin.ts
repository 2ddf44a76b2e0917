import type { Engine } from "@stagepay/core";
import { Router } from "express";
import { z } from "zod";
import { callerOf } from "../middleware/caller-auth.js";
import { asyncRoute } from "../middleware/error-handler.js";
import { amountSchema, currencySchema, identitySchema, rejectInvalid } from "./schemas.js";

const verificationSchema = z.object({
  identities: z.array(identitySchema).min(1).max(100),
  verified: z.boolean()
});

const limitsSchema = z.object({
  minPayment: amountSchema,
  maxPayment: amountSchema,
  verifiedMaxPayment: amountSchema
});

const feeSchema = z.object({ feePercentage: z.number().int() });
const feeRecipientSchema = z.object({ feeRecipient: identitySchema });
const verifierSchema = z.object({ trustedVerifier: identitySchema });
const baseUriSchema = z.object({ baseUri: z.string().max(200) });

const depositSchema = z.object({
  identity: z.string().min(1).max(64),
  currency: currencySchema,
  amount: amountSchema
});

export function createAdminRouter(engine: Engine): Router {
  const router = Router();
  const { admin } = engine;

  router.post(
    "/verification",
    asyncRoute(async (req, res) => {
      const parsed = verificationSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const { identities, verified } = parsed.data;
      await admin.setVerificationStatusBatch(callerOf(req), identities, verified);
      res.json({ identities, verified });
    })
  );

  router.put(
    "/payment-limits/:currency",
    asyncRoute(async (req, res) => {
      const currency = currencySchema.safeParse(req.params.currency);
      if (!currency.success) {
        rejectInvalid(res, currency.error, "currency");
        return;
      }
      const parsed = limitsSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const limits = await admin.updatePaymentLimits(callerOf(req), currency.data, parsed.data);
      res.json({ limits });
    })
  );

  router.put(
    "/fee",
    asyncRoute(async (req, res) => {
      const parsed = feeSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      await admin.updateFeePercentage(callerOf(req), parsed.data.feePercentage);
      res.json(parsed.data);
    })
  );

  router.put(
    "/fee-recipient",
    asyncRoute(async (req, res) => {
      const parsed = feeRecipientSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      await admin.updateFeeRecipient(callerOf(req), parsed.data.feeRecipient);
      res.json(parsed.data);
    })
  );

  router.put(
    "/verifier",
    asyncRoute(async (req, res) => {
      const parsed = verifierSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      await admin.updateVerifier(callerOf(req), parsed.data.trustedVerifier);
      res.json(parsed.data);
    })
  );

  router.post(
    "/nonces/:account/invalidate",
    asyncRoute(async (req, res) => {
      await admin.invalidateNonce(callerOf(req), req.params.account);
      res.json({ account: req.params.account, revoked: true });
    })
  );

  router.post(
    "/pause",
    asyncRoute(async (req, res) => {
      await admin.pause(callerOf(req));
      res.json({ paused: true });
    })
  );

  router.post(
    "/unpause",
    asyncRoute(async (req, res) => {
      await admin.unpause(callerOf(req));
      res.json({ paused: false });
    })
  );

  router.put(
    "/base-uri",
    asyncRoute(async (req, res) => {
      const parsed = baseUriSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      await admin.setBaseUri(callerOf(req), parsed.data.baseUri);
      res.json(parsed.data);
    })
  );

  router.post(
    "/deposits",
    asyncRoute(async (req, res) => {
      const parsed = depositSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const { identity, currency, amount } = parsed.data;
      const balance = await admin.depositFunds(callerOf(req), identity, currency, amount);
      res.status(201).json({ identity, currency, balance });
    })
  );

  router.post(
    "/accounts/:identity/freeze",
    asyncRoute(async (req, res) => {
      await admin.freezeAccount(callerOf(req), req.params.identity);
      res.json({ identity: req.params.identity, frozen: true });
    })
  );

  router.post(
    "/accounts/:identity/unfreeze",
    asyncRoute(async (req, res) => {
      await admin.unfreezeAccount(callerOf(req), req.params.identity);
      res.json({ identity: req.params.identity, frozen: false });
    })
  );

  return router;
}
