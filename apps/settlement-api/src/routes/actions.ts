import { callerContext, type Engine } from "@stagepay/core";
import { Router } from "express";
import { z } from "zod";
import { asyncRoute } from "../middleware/error-handler.js";
import {
  amountSchema,
  currencySchema,
  deadlineSchema,
  envelopeSchema,
  identitySchema,
  rejectInvalid
} from "./schemas.js";

const ticketSchema = z.object({
  account: identitySchema,
  recipient: identitySchema.optional(),
  amount: amountSchema.optional()
});

const paymentSchema = z.object({
  account: identitySchema,
  recipient: identitySchema,
  amount: amountSchema,
  currency: currencySchema,
  deadline: deadlineSchema,
  nonce: amountSchema.optional(),
  authorization: envelopeSchema
});

const collectibleSchema = z.object({
  account: identitySchema,
  uri: z.string().min(1).max(200),
  deadline: deadlineSchema,
  nonce: amountSchema.optional(),
  authorization: envelopeSchema
});

const accountSchema = z.object({
  account: identitySchema
});

const tokenIdSchema = z.coerce.number().int().nonnegative();

/**
 * Buyer-facing operations. `account` is the acting wallet; the router is
 * mounted behind `requireAccountSignature`, so that wallet signed the request.
 */
export function createActionsRouter(engine: Engine): Router {
  const router = Router();

  router.post(
    "/events/:eventId/tiers/:tierId/tickets",
    asyncRoute(async (req, res) => {
      const parsed = ticketSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const { account, recipient, amount } = parsed.data;
      const receipt = await engine.inventory.issueTicket({
        eventId: req.params.eventId,
        tierId: req.params.tierId,
        recipient: recipient ?? account,
        payment: { payer: account, amount }
      });
      res.status(201).json({ receipt });
    })
  );

  router.post(
    "/payments",
    asyncRoute(async (req, res) => {
      const parsed = paymentSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const { account, ...rest } = parsed.data;
      const receipt = await engine.payments.payRecipient({ payer: account, ...rest });
      res.status(201).json({ receipt });
    })
  );

  router.post(
    "/collectibles",
    asyncRoute(async (req, res) => {
      const parsed = collectibleSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const { account, ...rest } = parsed.data;
      const receipt = await engine.collectibles.mintCollectible({ recipient: account, ...rest });
      res.status(201).json({ receipt });
    })
  );

  router.post(
    "/collectibles/:tokenId/burn",
    asyncRoute(async (req, res) => {
      const tokenId = tokenIdSchema.safeParse(req.params.tokenId);
      if (!tokenId.success) {
        rejectInvalid(res, tokenId.error, "token id");
        return;
      }
      const parsed = accountSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      await engine.collectibles.burnCollectible(callerContext(parsed.data.account), tokenId.data);
      res.json({ tokenId: tokenId.data, burned: true });
    })
  );

  router.post(
    "/withdrawals",
    asyncRoute(async (req, res) => {
      const parsed = accountSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const receipt = await engine.payments.withdraw(parsed.data.account);
      res.json({ receipt });
    })
  );

  return router;
}
