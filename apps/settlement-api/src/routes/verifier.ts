import { type Engine, ticketTokenId } from "@stagepay/core";
import { CURRENCIES } from "@stagepay/shared-types";
import { Router } from "express";
import { z } from "zod";
import { asyncRoute } from "../middleware/error-handler.js";
import { currencySchema, rejectInvalid } from "./schemas.js";

const auditQuerySchema = z.object({
  afterId: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(200).default(50)
});

const tokenIdSchema = z.coerce.number().int().nonnegative();

/** Public, read-only view of the ledger. */
export function createVerifierRouter(engine: Engine): Router {
  const router = Router();
  const { inventory, queries, collectibles } = engine;

  router.get(
    "/events",
    asyncRoute(async (_req, res) => {
      res.json({ events: await inventory.listEvents() });
    })
  );

  router.get(
    "/events/:eventId",
    asyncRoute(async (req, res) => {
      res.json(await inventory.getEvent(req.params.eventId));
    })
  );

  router.get(
    "/events/:eventId/tiers/:tierId",
    asyncRoute(async (req, res) => {
      const { eventId, tierId } = req.params;
      const tier = await inventory.getTier(eventId, tierId);
      res.json({ tier, tokenId: ticketTokenId(eventId, tierId) });
    })
  );

  router.get(
    "/events/:eventId/tiers/:tierId/tickets/:owner",
    asyncRoute(async (req, res) => {
      const { eventId, tierId, owner } = req.params;
      const quantity = await inventory.ticketBalance(owner, eventId, tierId);
      res.json({ owner, eventId, tierId, tokenId: ticketTokenId(eventId, tierId), quantity });
    })
  );

  router.get(
    "/tickets/:owner",
    asyncRoute(async (req, res) => {
      res.json({ holdings: await inventory.listHoldings(req.params.owner) });
    })
  );

  router.get(
    "/balances/:owner",
    asyncRoute(async (req, res) => {
      const balances = await Promise.all(
        CURRENCIES.map((currency) => queries.getBalance(req.params.owner, currency))
      );
      res.json({ balances });
    })
  );

  router.get(
    "/nonces/:account",
    asyncRoute(async (req, res) => {
      res.json({ account: req.params.account, nonce: await queries.getNonce(req.params.account) });
    })
  );

  router.get(
    "/payment-limits/:currency",
    asyncRoute(async (req, res) => {
      const currency = currencySchema.safeParse(req.params.currency);
      if (!currency.success) {
        rejectInvalid(res, currency.error, "currency");
        return;
      }
      res.json({ limits: await queries.getPaymentLimits(currency.data) });
    })
  );

  router.get(
    "/verification/:identity",
    asyncRoute(async (req, res) => {
      res.json({ identity: req.params.identity, verified: await queries.isVerified(req.params.identity) });
    })
  );

  router.get(
    "/custody/:identity/:currency",
    asyncRoute(async (req, res) => {
      const currency = currencySchema.safeParse(req.params.currency);
      if (!currency.success) {
        rejectInvalid(res, currency.error, "currency");
        return;
      }
      res.json({ account: await queries.getCustodyAccount(req.params.identity, currency.data) });
    })
  );

  router.get(
    "/collectibles/:tokenId",
    asyncRoute(async (req, res) => {
      const tokenId = tokenIdSchema.safeParse(req.params.tokenId);
      if (!tokenId.success) {
        rejectInvalid(res, tokenId.error, "token id");
        return;
      }
      const collectible = await collectibles.getCollectible(tokenId.data);
      res.json({ collectible, tokenUri: await collectibles.tokenUri(tokenId.data) });
    })
  );

  router.get(
    "/settings",
    asyncRoute(async (_req, res) => {
      res.json({ settings: await queries.getSettings() });
    })
  );

  router.get(
    "/audit",
    asyncRoute(async (req, res) => {
      const parsed = auditQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error, "query");
        return;
      }
      res.json({ records: await queries.listAudit(parsed.data.afterId, parsed.data.limit) });
    })
  );

  return router;
}
