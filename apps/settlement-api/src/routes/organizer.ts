import type { Engine } from "@stagepay/core";
import { Router } from "express";
import { z } from "zod";
import { callerOf } from "../middleware/caller-auth.js";
import { asyncRoute } from "../middleware/error-handler.js";
import { amountSchema, currencySchema, identitySchema, rejectInvalid } from "./schemas.js";

const createEventSchema = z.object({
  id: z.string().min(3).max(80).regex(/^[a-z0-9-]+$/),
  name: z.string().min(3).max(120),
  description: z.string().max(1000).default(""),
  startAt: z.string().datetime(),
  endAt: z.string().datetime(),
  currency: currencySchema,
  commissionPercentage: z.number().int(),
  commissionRecipient: identitySchema,
  tierIds: z.array(z.string().min(1).max(40)),
  prices: z.array(amountSchema),
  maxQuantities: z.array(z.number().int()),
  status: z.enum(["draft", "published"]).optional()
});

const transitionSchema = z.object({
  transition: z.enum(["publish", "cancel", "complete", "reactivate"])
});

const tierPatchSchema = z
  .object({
    price: amountSchema.optional(),
    active: z.boolean().optional()
  })
  .refine((value) => value.price !== undefined || value.active !== undefined, {
    message: "price or active is required"
  });

export function createOrganizerRouter(engine: Engine): Router {
  const router = Router();
  const { inventory } = engine;

  router.get(
    "/events",
    asyncRoute(async (_req, res) => {
      const events = await inventory.listEvents();
      res.json({ events });
    })
  );

  router.get(
    "/events/:eventId",
    asyncRoute(async (req, res) => {
      const details = await inventory.getEvent(req.params.eventId);
      res.json(details);
    })
  );

  router.post(
    "/events",
    asyncRoute(async (req, res) => {
      const parsed = createEventSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const created = await inventory.createEvent(callerOf(req), parsed.data);
      res.status(201).json(created);
    })
  );

  router.post(
    "/events/:eventId/status",
    asyncRoute(async (req, res) => {
      const parsed = transitionSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const event = await inventory.transitionEvent(callerOf(req), req.params.eventId, parsed.data.transition);
      res.json({ event });
    })
  );

  router.patch(
    "/events/:eventId/tiers/:tierId",
    asyncRoute(async (req, res) => {
      const parsed = tierPatchSchema.safeParse(req.body);
      if (!parsed.success) {
        rejectInvalid(res, parsed.error);
        return;
      }
      const { eventId, tierId } = req.params;
      const tier = await inventory.updateTier(callerOf(req), eventId, tierId, parsed.data);
      res.json({ tier });
    })
  );

  router.get(
    "/events/:eventId/stats",
    asyncRoute(async (req, res) => {
      const stats = await inventory.eventStats(req.params.eventId);
      res.json({ stats });
    })
  );

  return router;
}
