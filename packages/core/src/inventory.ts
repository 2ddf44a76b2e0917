import type { LedgerStore, LedgerTransaction } from "@stagepay/db";
import type {
  CreateEventInput,
  EventEntity,
  EventStatus,
  EventTier,
  EventTransition,
  TicketHolding,
  TicketReceipt
} from "@stagepay/shared-types";
import { createHash } from "crypto";
import type { Logger } from "pino";
import { recordAudit } from "./audit.js";
import { assertIdentity, type CallerContext, type Clock, type EnginePolicy } from "./context.js";
import { CANONICAL_DECIMALS, type CurrencyNormalizer } from "./currency.js";
import { AuthorizationError, StateConflictError, ValidationError } from "./errors.js";
import type { SettlementEngine } from "./settlement.js";

export interface TierUpdate {
  price?: bigint;
  active?: boolean;
}

export interface PaymentProof {
  payer: string;
  /** Amount the payer attached, in the event currency's minor units. Required for native payments. */
  amount?: bigint;
}

export interface IssueTicketRequest {
  eventId: string;
  tierId: string;
  recipient: string;
  payment: PaymentProof;
}

export interface EventDetails {
  event: EventEntity;
  tiers: EventTier[];
}

export interface TierStats {
  tierId: string;
  soldCount: number;
  maxQuantity: number;
  remaining: number;
  price: bigint;
  settlementPrice: bigint;
}

export interface EventStats {
  eventId: string;
  ticketsSold: number;
  capacity: number;
  tiers: TierStats[];
}

interface InventoryDeps {
  store: LedgerStore;
  clock: Clock;
  policy: EnginePolicy;
  settlement: SettlementEngine;
  normalizer: CurrencyNormalizer;
  logger: Logger;
}

const TRANSITIONS: Record<EventTransition, { from: EventStatus; to: EventStatus }> = {
  publish: { from: "draft", to: "published" },
  cancel: { from: "published", to: "cancelled" },
  complete: { from: "published", to: "completed" },
  reactivate: { from: "cancelled", to: "published" }
};

/**
 * Ticket token ids are derived from the event and tier keys alone, so any
 * party can rebuild them without a lookup.
 */
export function ticketTokenId(eventId: string, tierId: string): string {
  return createHash("sha256")
    .update(`${eventId.length}:${eventId}|${tierId.length}:${tierId}`)
    .digest("hex");
}

export function isEventActive(event: EventEntity, nowMs: number): boolean {
  return (
    event.status === "published" &&
    nowMs >= new Date(event.startAt).getTime() &&
    nowMs <= new Date(event.endAt).getTime()
  );
}

function assertManager(ctx: CallerContext, event: EventEntity): void {
  if (ctx.roles.has("admin")) {
    return;
  }
  if (!ctx.roles.has("organizer") || ctx.identity !== event.organizer) {
    throw new AuthorizationError("Unauthorized", `Caller ${ctx.identity} does not manage event ${event.id}`);
  }
}

export class InventoryLedger {
  private readonly logger: Logger;

  constructor(private readonly deps: InventoryDeps) {
    this.logger = deps.logger.child({ component: "inventory" });
  }

  async createEvent(ctx: CallerContext, input: CreateEventInput): Promise<EventDetails> {
    if (!ctx.roles.has("organizer") && !ctx.roles.has("admin")) {
      throw new AuthorizationError("Unauthorized", `Caller ${ctx.identity} cannot create events`);
    }
    assertIdentity(ctx.identity, "organizer");
    this.validateEventInput(input);

    const now = this.deps.clock.now();
    const details = await this.deps.store.transaction(async (tx) => {
      if (await tx.getEvent(input.id)) {
        throw new StateConflictError("EventAlreadyExists", `Event ${input.id} already exists`);
      }

      const event: EventEntity = {
        id: input.id,
        name: input.name,
        description: input.description,
        startAt: new Date(input.startAt).toISOString(),
        endAt: new Date(input.endAt).toISOString(),
        organizer: ctx.identity,
        status: input.status ?? "published",
        currency: input.currency,
        commissionPercentage: input.commissionPercentage,
        commissionRecipient: input.commissionRecipient,
        tierIds: [...input.tierIds],
        createdAt: new Date(now).toISOString()
      };
      const tiers: EventTier[] = input.tierIds.map((tierId, index) => ({
        eventId: input.id,
        tierId,
        price: input.prices[index] ?? 0n,
        maxQuantity: input.maxQuantities[index] ?? 0,
        soldCount: 0,
        active: true
      }));

      await tx.insertEvent(event, tiers);
      await recordAudit(
        tx,
        "EventCreated",
        ctx.identity,
        { eventId: event.id, tiers: tiers.length, currency: event.currency, status: event.status },
        now
      );
      return { event, tiers };
    });

    this.logger.info({ eventId: details.event.id, organizer: ctx.identity }, "event created");
    return details;
  }

  async transitionEvent(ctx: CallerContext, eventId: string, transition: EventTransition): Promise<EventEntity> {
    const rule = TRANSITIONS[transition];
    const now = this.deps.clock.now();
    const updated = await this.deps.store.transaction(async (tx) => {
      const event = await tx.getEvent(eventId);
      if (!event) {
        throw new ValidationError("EventNotFound", `Event ${eventId} not found`);
      }
      assertManager(ctx, event);
      if (event.status !== rule.from) {
        throw new StateConflictError(
          "InvalidTransition",
          `Cannot ${transition} event ${eventId} while it is ${event.status}`
        );
      }

      const next: EventEntity = { ...event, status: rule.to };
      await tx.saveEvent(next);
      await recordAudit(
        tx,
        "EventStatusChanged",
        ctx.identity,
        { eventId, from: event.status, to: rule.to },
        now
      );
      return next;
    });

    this.logger.info({ eventId, status: updated.status }, "event status changed");
    return updated;
  }

  /**
   * Reprices a tier. Only the upper bound is enforced here: a tier may be
   * priced below what its settlement currency can represent, in which case
   * issuance fails with AmountTooSmallAfterScaling.
   */
  async updateTierPrice(ctx: CallerContext, eventId: string, tierId: string, price: bigint): Promise<EventTier> {
    return this.updateTier(ctx, eventId, tierId, { price });
  }

  async setTierActive(ctx: CallerContext, eventId: string, tierId: string, active: boolean): Promise<EventTier> {
    return this.updateTier(ctx, eventId, tierId, { active });
  }

  /** Applies a price change and an activation change together, or neither. */
  async updateTier(ctx: CallerContext, eventId: string, tierId: string, update: TierUpdate): Promise<EventTier> {
    const { price, active } = update;
    if (price !== undefined && (price <= 0n || price > this.deps.policy.maxTierPrice)) {
      throw new ValidationError("PriceOutOfRange", `Price must be in (0, ${this.deps.policy.maxTierPrice}]`);
    }
    const now = this.deps.clock.now();
    return this.deps.store.transaction(async (tx) => {
      const { tier } = await this.loadManagedTier(tx, ctx, eventId, tierId);
      const next: EventTier = { ...tier, price: price ?? tier.price, active: active ?? tier.active };
      await tx.saveTier(next);
      if (price !== undefined) {
        await recordAudit(
          tx,
          "TierPriceUpdated",
          ctx.identity,
          { eventId, tierId, from: tier.price.toString(), to: price.toString() },
          now
        );
      }
      if (active !== undefined) {
        await recordAudit(tx, "TierActivationChanged", ctx.identity, { eventId, tierId, active }, now);
      }
      return next;
    });
  }

  /**
   * Sells one ticket of a tier. Payment settles first; the sold count and the
   * holding are only written afterwards, and all of it commits together or
   * not at all.
   */
  async issueTicket(request: IssueTicketRequest): Promise<TicketReceipt> {
    const { eventId, tierId, recipient, payment } = request;
    const now = this.deps.clock.now();

    const receipt = await this.deps.store.transaction(async (tx) => {
      const settings = await tx.getSettings();
      if (settings.paused) {
        throw new StateConflictError("Paused", "Ticket sales are paused");
      }
      assertIdentity(recipient, "recipient");
      assertIdentity(payment.payer, "payer");

      const event = await tx.getEvent(eventId);
      if (!event) {
        throw new ValidationError("EventNotFound", `Event ${eventId} not found`);
      }
      if (!isEventActive(event, now)) {
        throw new StateConflictError("EventNotActive", `Event ${eventId} is not on sale`);
      }

      const tier = await tx.getTier(eventId, tierId);
      if (!tier) {
        throw new ValidationError("TierNotFound", `Tier ${tierId} not found in event ${eventId}`);
      }
      if (!tier.active) {
        throw new StateConflictError("TierNotActive", `Tier ${tierId} is not on sale`);
      }
      if (tier.soldCount >= tier.maxQuantity) {
        throw new StateConflictError("TierSoldOut", `Tier ${tierId} is sold out`);
      }

      const amount = this.deps.normalizer.toSettlementUnits(tier.price, event.currency);
      const paymentRequired = event.currency === "native" || payment.amount !== undefined;
      if (paymentRequired && payment.amount !== amount) {
        throw new ValidationError(
          "IncorrectPayment",
          `Tier ${tierId} costs ${amount} ${event.currency} units, got ${payment.amount ?? "nothing"}`
        );
      }

      const settlement = await this.deps.settlement.settle(
        tx,
        {
          payer: payment.payer,
          payee: event.organizer,
          amount,
          currency: event.currency,
          commissionPercentage: event.commissionPercentage,
          commissionRecipient: event.commissionRecipient,
          mode: "deferred"
        },
        new Date(now)
      );

      const soldCount = tier.soldCount + 1;
      await tx.saveTier({ ...tier, soldCount });

      const tokenId = ticketTokenId(eventId, tierId);
      const holding = await tx.getHolding(recipient, tokenId);
      await tx.saveHolding({
        owner: recipient,
        tokenId,
        eventId,
        tierId,
        quantity: (holding?.quantity ?? 0) + 1
      });

      await recordAudit(
        tx,
        "TicketIssued",
        payment.payer,
        {
          eventId,
          tierId,
          tokenId,
          recipient,
          currency: event.currency,
          amount: amount.toString(),
          commission: settlement.commission.toString()
        },
        now
      );

      return { tokenId, eventId, tierId, recipient, soldCount, settlement };
    });

    this.logger.info(
      { eventId, tierId, recipient, soldCount: receipt.soldCount, amount: receipt.settlement.amount.toString() },
      "ticket issued"
    );
    return receipt;
  }

  async listEvents(): Promise<EventEntity[]> {
    return this.deps.store.read((reader) => reader.listEvents());
  }

  async getEvent(eventId: string): Promise<EventDetails> {
    return this.deps.store.read(async (reader) => {
      const event = await reader.getEvent(eventId);
      if (!event) {
        throw new ValidationError("EventNotFound", `Event ${eventId} not found`);
      }
      return { event, tiers: await reader.listTiers(eventId) };
    });
  }

  async getTier(eventId: string, tierId: string): Promise<EventTier> {
    const tier = await this.deps.store.read((reader) => reader.getTier(eventId, tierId));
    if (!tier) {
      throw new ValidationError("TierNotFound", `Tier ${tierId} not found in event ${eventId}`);
    }
    return tier;
  }

  async ticketBalance(owner: string, eventId: string, tierId: string): Promise<number> {
    const holding = await this.deps.store.read((reader) => reader.getHolding(owner, ticketTokenId(eventId, tierId)));
    return holding?.quantity ?? 0;
  }

  async listHoldings(owner: string): Promise<TicketHolding[]> {
    return this.deps.store.read((reader) => reader.listHoldings(owner));
  }

  async eventStats(eventId: string): Promise<EventStats> {
    const { event, tiers } = await this.getEvent(eventId);
    const tierStats = tiers.map((tier) => ({
      tierId: tier.tierId,
      soldCount: tier.soldCount,
      maxQuantity: tier.maxQuantity,
      remaining: tier.maxQuantity - tier.soldCount,
      price: tier.price,
      settlementPrice: this.settlementPriceOrZero(tier.price, event)
    }));
    return {
      eventId,
      ticketsSold: tierStats.reduce((sum, tier) => sum + tier.soldCount, 0),
      capacity: tierStats.reduce((sum, tier) => sum + tier.maxQuantity, 0),
      tiers: tierStats
    };
  }

  private settlementPriceOrZero(price: bigint, event: EventEntity): bigint {
    const decimals = this.deps.normalizer.decimalsOf(event.currency);
    return price / 10n ** BigInt(Math.max(0, CANONICAL_DECIMALS - decimals));
  }

  private async loadManagedTier(
    tx: LedgerTransaction,
    ctx: CallerContext,
    eventId: string,
    tierId: string
  ): Promise<{ event: EventEntity; tier: EventTier }> {
    const event = await tx.getEvent(eventId);
    if (!event) {
      throw new ValidationError("EventNotFound", `Event ${eventId} not found`);
    }
    assertManager(ctx, event);
    const tier = await tx.getTier(eventId, tierId);
    if (!tier) {
      throw new ValidationError("TierNotFound", `Tier ${tierId} not found in event ${eventId}`);
    }
    return { event, tier };
  }

  private validateEventInput(input: CreateEventInput): void {
    const { policy } = this.deps;
    if (input.id.trim().length === 0 || input.name.trim().length === 0) {
      throw new ValidationError("InvalidEventDetails", "Event id and name are required");
    }

    const startMs = new Date(input.startAt).getTime();
    const endMs = new Date(input.endAt).getTime();
    if (Number.isNaN(startMs) || Number.isNaN(endMs) || startMs >= endMs) {
      throw new ValidationError("InvalidSchedule", "endAt must be later than startAt");
    }

    if (input.prices.length !== input.tierIds.length || input.maxQuantities.length !== input.tierIds.length) {
      throw new ValidationError("TierArrayMismatch", "tierIds, prices and maxQuantities must have equal lengths");
    }
    if (input.tierIds.length < 1 || input.tierIds.length > policy.maxTiers) {
      throw new ValidationError("InvalidTierCount", `An event needs between 1 and ${policy.maxTiers} tiers`);
    }
    if (new Set(input.tierIds).size !== input.tierIds.length) {
      throw new ValidationError("DuplicateTier", "Tier ids must be unique");
    }

    for (const price of input.prices) {
      if (price < policy.minTierPrice || price > policy.maxTierPrice) {
        throw new ValidationError(
          "PriceOutOfRange",
          `Tier price ${price} is outside [${policy.minTierPrice}, ${policy.maxTierPrice}]`
        );
      }
    }
    for (const quantity of input.maxQuantities) {
      if (!Number.isInteger(quantity) || quantity <= 0) {
        throw new ValidationError("InvalidSupply", "Tier supply must be a positive integer");
      }
    }

    if (
      !Number.isInteger(input.commissionPercentage) ||
      input.commissionPercentage < 0 ||
      input.commissionPercentage > 100
    ) {
      throw new ValidationError("InvalidCommission", "Commission percentage must be an integer in [0, 100]");
    }
    assertIdentity(input.commissionRecipient, "commissionRecipient");
  }
}
