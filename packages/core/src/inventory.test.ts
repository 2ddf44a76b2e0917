import type { CreateEventInput } from "@stagepay/shared-types";
import { beforeEach, describe, expect, it } from "vitest";
import { callerContext, ZERO_IDENTITY } from "./context.js";
import type { ValidationCode } from "./errors.js";
import { isEventActive, ticketTokenId } from "./inventory.js";
import { createHarness, type Harness, newIdentity, TREASURY } from "./test-harness.js";

const TICKET_PRICE = 25_000_000n;
const VIP_PRICE = 100_000_000n;

const invalidEvents: Array<[ValidationCode, Partial<CreateEventInput>]> = [
  ["InvalidTierCount", { tierIds: [], prices: [], maxQuantities: [] }],
  [
    "InvalidTierCount",
    {
      tierIds: Array.from({ length: 11 }, (_, index) => `t${index}`),
      prices: Array.from({ length: 11 }, () => 10n ** 18n),
      maxQuantities: Array.from({ length: 11 }, () => 1)
    }
  ],
  ["TierArrayMismatch", { prices: [10n ** 18n] }],
  ["DuplicateTier", { tierIds: ["ga", "ga"] }],
  ["PriceOutOfRange", { prices: [10n ** 14n - 1n, 10n ** 18n] }],
  ["PriceOutOfRange", { prices: [10n ** 21n + 1n, 10n ** 18n] }],
  ["InvalidSupply", { maxQuantities: [0, 1] }],
  ["InvalidCommission", { commissionPercentage: 101 }],
  ["InvalidRecipient", { commissionRecipient: ZERO_IDENTITY }],
  ["InvalidSchedule", { endAt: "2026-03-01T00:00:00.000Z" }],
  ["InvalidEventDetails", { name: "   " }]
];

describe("InventoryLedger", () => {
  let h: Harness;
  let buyer: string;

  beforeEach(async () => {
    h = createHarness();
    buyer = newIdentity();
    await h.fund(buyer, "stable", 1_000_000_000n);
  });

  const issue = (tierId: string, recipient = buyer, amount?: bigint) =>
    h.engine.inventory.issueTicket({ eventId: "spring-gala", tierId, recipient, payment: { payer: buyer, amount } });

  describe("createEvent", () => {
    it("creates a published event owned by the caller", async () => {
      const { event, tiers } = await h.createEvent();

      expect(event).toMatchObject({
        id: "spring-gala",
        organizer: h.organizer.identity,
        status: "published",
        currency: "stable",
        tierIds: ["ga", "vip"]
      });
      expect(tiers).toEqual([
        { eventId: "spring-gala", tierId: "ga", price: 25n * 10n ** 18n, maxQuantity: 100, soldCount: 0, active: true },
        { eventId: "spring-gala", tierId: "vip", price: 100n * 10n ** 18n, maxQuantity: 2, soldCount: 0, active: true }
      ]);
    });

    it("creates drafts on request", async () => {
      const { event } = await h.createEvent({ status: "draft" });
      expect(event.status).toBe("draft");
    });

    it.each(invalidEvents)("rejects with %s", async (code, overrides) => {
      await expect(h.createEvent(overrides)).rejects.toMatchObject({ code });
    });

    it("accepts the inclusive price bounds and a 100% commission", async () => {
      const { tiers } = await h.createEvent({ prices: [10n ** 14n, 10n ** 21n], commissionPercentage: 100 });
      expect(tiers.map((tier) => tier.price)).toEqual([10n ** 14n, 10n ** 21n]);
    });

    it("rejects a duplicate event id", async () => {
      await h.createEvent();
      await expect(h.createEvent()).rejects.toMatchObject({ code: "EventAlreadyExists" });
    });

    it("requires the organizer or admin role", async () => {
      await expect(
        h.engine.inventory.createEvent(callerContext(newIdentity()), {
          id: "x-event",
          name: "X Event",
          description: "",
          startAt: "2026-03-01T00:00:00.000Z",
          endAt: "2026-03-02T00:00:00.000Z",
          tierIds: ["ga"],
          prices: [10n ** 18n],
          maxQuantities: [1],
          currency: "stable",
          commissionPercentage: 0,
          commissionRecipient: newIdentity()
        })
      ).rejects.toMatchObject({ code: "Unauthorized" });
    });
  });

  describe("issueTicket", () => {
    beforeEach(async () => {
      await h.createEvent();
    });

    it("settles into the treasury and credits organizer and commission recipient", async () => {
      const receipt = await issue("ga");

      expect(receipt).toMatchObject({
        tokenId: ticketTokenId("spring-gala", "ga"),
        soldCount: 1,
        settlement: { amount: TICKET_PRICE, commission: 2_500_000n, remainder: 22_500_000n, mode: "deferred" }
      });
      expect(await h.custody(buyer, "stable")).toBe(1_000_000_000n - TICKET_PRICE);
      expect(await h.custody(TREASURY, "stable")).toBe(TICKET_PRICE);
      expect((await h.engine.queries.getBalance(h.organizer.identity, "stable")).pending).toBe(22_500_000n);
      expect((await h.engine.queries.getBalance(h.commissionRecipient, "stable")).pending).toBe(2_500_000n);
      expect(await h.engine.inventory.ticketBalance(buyer, "spring-gala", "ga")).toBe(1);
    });

    it("issues to a recipient other than the payer", async () => {
      const friend = newIdentity();
      await issue("ga", friend);

      expect(await h.engine.inventory.ticketBalance(friend, "spring-gala", "ga")).toBe(1);
      expect(await h.engine.inventory.ticketBalance(buyer, "spring-gala", "ga")).toBe(0);
    });

    it("fails the sale after the last seat without charging the buyer", async () => {
      await issue("vip");
      await issue("vip");
      const before = await h.custody(buyer, "stable");

      await expect(issue("vip")).rejects.toMatchObject({ code: "TierSoldOut" });
      expect(await h.custody(buyer, "stable")).toBe(before);
      expect((await h.engine.inventory.getTier("spring-gala", "vip")).soldCount).toBe(2);
    });

    it("sells the last seat to exactly one of two concurrent buyers", async () => {
      await issue("vip");
      const results = await Promise.allSettled([issue("vip"), issue("vip")]);

      const rejected = results.filter((result): result is PromiseRejectedResult => result.status === "rejected");
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toMatchObject({ code: "TierSoldOut" });
      expect(await h.custody(buyer, "stable")).toBe(1_000_000_000n - 2n * VIP_PRICE);
    });

    it("writes nothing when the payment fails", async () => {
      const broke = newIdentity();
      await expect(
        h.engine.inventory.issueTicket({
          eventId: "spring-gala",
          tierId: "ga",
          recipient: broke,
          payment: { payer: broke }
        })
      ).rejects.toMatchObject({ code: "InsufficientFunds" });

      expect((await h.engine.inventory.getTier("spring-gala", "ga")).soldCount).toBe(0);
      expect(await h.engine.inventory.ticketBalance(broke, "spring-gala", "ga")).toBe(0);
      expect((await h.engine.queries.getBalance(h.organizer.identity, "stable")).pending).toBe(0n);
    });

    it("rejects a stated amount that does not match the price", async () => {
      await expect(issue("ga", buyer, TICKET_PRICE - 1n)).rejects.toMatchObject({ code: "IncorrectPayment" });
      await expect(issue("ga", buyer, TICKET_PRICE)).resolves.toMatchObject({ soldCount: 1 });
    });

    it("fails once a repriced tier no longer survives scaling", async () => {
      await h.engine.inventory.updateTierPrice(h.organizer, "spring-gala", "ga", 10n ** 11n);

      await expect(issue("ga")).rejects.toMatchObject({ code: "AmountTooSmallAfterScaling" });
      expect((await h.engine.inventory.getTier("spring-gala", "ga")).soldCount).toBe(0);
    });

    it("refuses inactive tiers", async () => {
      await h.engine.inventory.setTierActive(h.organizer, "spring-gala", "ga", false);
      await expect(issue("ga")).rejects.toMatchObject({ code: "TierNotActive" });
    });

    it("refuses sales outside the event window", async () => {
      h.clock.ms = Date.parse("2026-03-02T00:00:00.001Z");
      await expect(issue("ga")).rejects.toMatchObject({ code: "EventNotActive" });
    });

    it("refuses unknown events, tiers and a zero recipient", async () => {
      await expect(
        h.engine.inventory.issueTicket({ eventId: "nope", tierId: "ga", recipient: buyer, payment: { payer: buyer } })
      ).rejects.toMatchObject({ code: "EventNotFound" });
      await expect(issue("balcony")).rejects.toMatchObject({ code: "TierNotFound" });
      await expect(issue("ga", ZERO_IDENTITY)).rejects.toMatchObject({ code: "InvalidRecipient" });
    });

    it("refuses sales while the platform is paused", async () => {
      await h.engine.admin.pause(h.admin);
      await expect(issue("ga")).rejects.toMatchObject({ code: "Paused" });
    });

    it("lets the organizer withdraw the proceeds", async () => {
      await issue("ga");

      const receipt = await h.engine.payments.withdraw(h.organizer.identity);
      expect(receipt.stableAmount).toBe(22_500_000n);
      expect(await h.custody(h.organizer.identity, "stable")).toBe(22_500_000n);
      expect(await h.custody(TREASURY, "stable")).toBe(2_500_000n);
    });
  });

  describe("native events", () => {
    beforeEach(async () => {
      await h.fund(buyer, "native", 10_000_000_000n);
      await h.createEvent({ currency: "native", prices: [10n ** 18n, 2n * 10n ** 18n] });
    });

    it("requires the attached amount to match the price exactly", async () => {
      await expect(issue("ga")).rejects.toMatchObject({ code: "IncorrectPayment" });
      await expect(issue("ga", buyer, 999_999_999n)).rejects.toMatchObject({ code: "IncorrectPayment" });

      const receipt = await issue("ga", buyer, 1_000_000_000n);
      expect(receipt.settlement).toMatchObject({ currency: "native", amount: 1_000_000_000n, commission: 100_000_000n });
    });
  });

  describe("status transitions", () => {
    it("follows draft, published, cancelled and back", async () => {
      await h.createEvent({ status: "draft" });
      await expect(issue("ga")).rejects.toMatchObject({ code: "EventNotActive" });

      await h.engine.inventory.transitionEvent(h.organizer, "spring-gala", "publish");
      await issue("ga");

      await h.engine.inventory.transitionEvent(h.organizer, "spring-gala", "cancel");
      await expect(issue("ga")).rejects.toMatchObject({ code: "EventNotActive" });

      const event = await h.engine.inventory.transitionEvent(h.organizer, "spring-gala", "reactivate");
      expect(event.status).toBe("published");
      await expect(issue("ga")).resolves.toMatchObject({ soldCount: 2 });
    });

    it("rejects transitions that do not apply", async () => {
      await h.createEvent();
      await h.engine.inventory.transitionEvent(h.organizer, "spring-gala", "complete");

      await expect(
        h.engine.inventory.transitionEvent(h.organizer, "spring-gala", "reactivate")
      ).rejects.toMatchObject({ code: "InvalidTransition" });
    });

    it("only lets the event's organizer or an admin manage it", async () => {
      await h.createEvent();
      const other = callerContext(newIdentity(), ["organizer"]);

      await expect(h.engine.inventory.transitionEvent(other, "spring-gala", "cancel")).rejects.toMatchObject({
        code: "Unauthorized"
      });
      await expect(
        h.engine.inventory.updateTierPrice(other, "spring-gala", "ga", 10n ** 18n)
      ).rejects.toMatchObject({ code: "Unauthorized" });
      await expect(h.engine.inventory.transitionEvent(h.admin, "spring-gala", "cancel")).resolves.toMatchObject({
        status: "cancelled"
      });
    });
  });

  describe("updateTierPrice", () => {
    it("enforces (0, maxTierPrice]", async () => {
      await h.createEvent();
      await expect(h.engine.inventory.updateTierPrice(h.organizer, "spring-gala", "ga", 0n)).rejects.toMatchObject({
        code: "PriceOutOfRange"
      });
      await expect(
        h.engine.inventory.updateTierPrice(h.organizer, "spring-gala", "ga", 10n ** 21n + 1n)
      ).rejects.toMatchObject({ code: "PriceOutOfRange" });
    });
  });

  describe("updateTier", () => {
    beforeEach(async () => {
      await h.createEvent();
    });

    it("applies a price and an activation change together", async () => {
      const tier = await h.engine.inventory.updateTier(h.organizer, "spring-gala", "ga", {
        price: 30n * 10n ** 18n,
        active: false
      });

      expect(tier).toMatchObject({ price: 30n * 10n ** 18n, active: false });
      expect(await h.engine.inventory.getTier("spring-gala", "ga")).toEqual(tier);
    });

    it("writes neither change when one of them is rejected", async () => {
      await expect(
        h.engine.inventory.updateTier(h.organizer, "spring-gala", "ga", { price: 0n, active: false })
      ).rejects.toMatchObject({ code: "PriceOutOfRange" });

      expect(await h.engine.inventory.getTier("spring-gala", "ga")).toMatchObject({
        price: 25n * 10n ** 18n,
        active: true
      });
    });
  });

  describe("eventStats", () => {
    it("summarises sales per tier", async () => {
      await h.createEvent();
      await issue("vip");

      const stats = await h.engine.inventory.eventStats("spring-gala");
      expect(stats).toEqual({
        eventId: "spring-gala",
        ticketsSold: 1,
        capacity: 102,
        tiers: [
          {
            tierId: "ga",
            soldCount: 0,
            maxQuantity: 100,
            remaining: 100,
            price: 25n * 10n ** 18n,
            settlementPrice: TICKET_PRICE
          },
          {
            tierId: "vip",
            soldCount: 1,
            maxQuantity: 2,
            remaining: 1,
            price: 100n * 10n ** 18n,
            settlementPrice: VIP_PRICE
          }
        ]
      });
    });
  });
});

describe("isEventActive", () => {
  const event = {
    id: "e",
    name: "E",
    description: "",
    startAt: "2026-03-01T00:00:00.000Z",
    endAt: "2026-03-02T00:00:00.000Z",
    organizer: "o",
    status: "published" as const,
    currency: "stable" as const,
    commissionPercentage: 0,
    commissionRecipient: "r",
    tierIds: [],
    createdAt: "2026-02-01T00:00:00.000Z"
  };

  it("includes both ends of the window", () => {
    expect(isEventActive(event, Date.parse(event.startAt))).toBe(true);
    expect(isEventActive(event, Date.parse(event.endAt))).toBe(true);
    expect(isEventActive(event, Date.parse(event.endAt) + 1)).toBe(false);
    expect(isEventActive({ ...event, status: "draft" }, Date.parse(event.startAt))).toBe(false);
  });
});
