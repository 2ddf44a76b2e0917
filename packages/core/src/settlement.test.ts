import { type LedgerTransaction, MemoryLedgerStore } from "@stagepay/db";
import type { Currency } from "@stagepay/shared-types";
import fc from "fast-check";
import { beforeEach, describe, expect, it } from "vitest";
import { CustodyLedger } from "./custody.js";
import { SettlementEngine, type SettlementRequest, splitCommission } from "./settlement.js";
import { newIdentity, silentLogger, START_MS, testDefaults, testPolicy, thrown, TREASURY } from "./test-harness.js";

describe("splitCommission", () => {
  it("floors the commission", () => {
    expect(splitCommission(1000n, 5)).toEqual({ commission: 50n, remainder: 950n });
    expect(splitCommission(999n, 5)).toEqual({ commission: 49n, remainder: 950n });
    expect(splitCommission(1n, 99)).toEqual({ commission: 0n, remainder: 1n });
  });

  it("rejects percentages outside [0, 100]", () => {
    expect(thrown(() => splitCommission(100n, 101))).toMatchObject({ code: "InvalidCommission" });
    expect(thrown(() => splitCommission(100n, 2.5))).toMatchObject({ code: "InvalidCommission" });
  });

  it("never creates or loses units", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 10n ** 30n }), fc.integer({ min: 0, max: 100 }), (amount, pct) => {
        const { commission, remainder } = splitCommission(amount, pct);
        expect(commission + remainder).toBe(amount);
        expect(commission * 100n <= amount * BigInt(pct)).toBe(true);
      })
    );
  });
});

describe("SettlementEngine", () => {
  let store: MemoryLedgerStore;
  let engine: SettlementEngine;
  let payer: string;
  let payee: string;
  let platform: string;

  const custody = new CustodyLedger();
  const settledAt = new Date(START_MS);

  beforeEach(async () => {
    store = new MemoryLedgerStore(testDefaults());
    engine = new SettlementEngine(custody, testPolicy, silentLogger);
    payer = newIdentity();
    payee = newIdentity();
    platform = newIdentity();
    await store.transaction((tx) => custody.deposit(tx, payer, "stable", 1000n));
  });

  const balanceOf = async (identity: string, currency: Currency = "stable") =>
    (await store.read((reader) => reader.getCustodyAccount(identity, currency))).balance;
  const pendingOf = async (identity: string) =>
    (await store.read((reader) => reader.getBalance(identity, "stable"))).pending;
  const run = <T>(work: (tx: LedgerTransaction) => Promise<T>) => store.transaction(work);

  function request(overrides: Partial<SettlementRequest> = {}): SettlementRequest {
    return {
      payer,
      payee,
      amount: 1000n,
      currency: "stable",
      commissionPercentage: 5,
      commissionRecipient: platform,
      mode: "direct",
      ...overrides
    };
  }

  it("pays the payee and the commission recipient directly", async () => {
    const receipt = await run((tx) => engine.settle(tx, request(), settledAt));

    expect(receipt).toMatchObject({ amount: 1000n, commission: 50n, remainder: 950n, mode: "direct" });
    expect(await balanceOf(payer)).toBe(0n);
    expect(await balanceOf(payee)).toBe(950n);
    expect(await balanceOf(platform)).toBe(50n);
  });

  it("merges the legs when the payee also takes the commission", async () => {
    await run((tx) => engine.settle(tx, request({ commissionRecipient: payee }), settledAt));

    expect(await balanceOf(payee)).toBe(1000n);
  });

  it("leaves the payee unpaid when the commission leg fails", async () => {
    await run((tx) => tx.setFrozen(platform, true));

    await expect(run((tx) => engine.settle(tx, request(), settledAt))).rejects.toMatchObject({
      code: "AccountFrozen"
    });
    expect(await balanceOf(payee)).toBe(0n);
    expect(await balanceOf(payer)).toBe(1000n);
  });

  it("fails with InsufficientFunds when the payer is short", async () => {
    await expect(run((tx) => engine.settle(tx, request({ amount: 1001n }), settledAt))).rejects.toMatchObject({
      code: "InsufficientFunds"
    });
  });

  it("rejects a zero amount", async () => {
    await expect(run((tx) => engine.settle(tx, request({ amount: 0n }), settledAt))).rejects.toMatchObject({
      code: "InvalidAmount"
    });
  });

  it("holds deferred settlements in the treasury as pending balances", async () => {
    await run((tx) => engine.settle(tx, request({ mode: "deferred", commissionPercentage: 10 }), settledAt));

    expect(await balanceOf(TREASURY)).toBe(1000n);
    expect(await pendingOf(payee)).toBe(900n);
    expect(await pendingOf(platform)).toBe(100n);
  });

  it("withdraws pending balances once", async () => {
    await run((tx) => engine.settle(tx, request({ mode: "deferred", commissionPercentage: 10 }), settledAt));

    const receipt = await run((tx) => engine.withdraw(tx, payee, settledAt));
    expect(receipt).toEqual({
      owner: payee,
      nativeAmount: 0n,
      stableAmount: 900n,
      withdrawnAt: settledAt.toISOString()
    });
    expect(await balanceOf(payee)).toBe(900n);
    expect(await balanceOf(TREASURY)).toBe(100n);
    expect(await store.read((reader) => reader.getBalance(payee, "stable"))).toEqual({
      owner: payee,
      currency: "stable",
      pending: 0n,
      withdrawn: 900n
    });

    await expect(run((tx) => engine.withdraw(tx, payee, settledAt))).rejects.toMatchObject({
      code: "NothingToWithdraw"
    });
  });

  it("keeps pending plus withdrawn equal to everything credited", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.record({ amount: fc.bigInt({ min: 1n, max: 10n ** 12n }), withdraw: fc.boolean() }), {
          maxLength: 8
        }),
        async (steps) => {
          const owner = newIdentity();
          let credited = 0n;
          for (const step of steps) {
            await run((tx) => engine.creditBalance(tx, owner, "native", step.amount));
            await run((tx) => custody.deposit(tx, TREASURY, "native", step.amount));
            credited += step.amount;
            if (step.withdraw) {
              await run((tx) => engine.withdraw(tx, owner, settledAt));
            }
          }
          const record = await store.read((reader) => reader.getBalance(owner, "native"));
          expect(record.pending + record.withdrawn).toBe(credited);
          expect(await balanceOf(owner, "native")).toBe(record.withdrawn);
        }
      ),
      { numRuns: 25 }
    );
  });

  describe("quoteAndValidate", () => {
    it("enforces the minimum and the unverified maximum", async () => {
      await expect(run((tx) => engine.quoteAndValidate(tx, 999_999n, "stable", payee))).rejects.toMatchObject({
        code: "BelowMinimum"
      });
      await expect(
        run((tx) => engine.quoteAndValidate(tx, 10_000_000_001n, "stable", payee))
      ).rejects.toMatchObject({ code: "AboveMaximum" });
      await expect(run((tx) => engine.quoteAndValidate(tx, 10_000_000_000n, "stable", payee))).resolves.toMatchObject({
        currency: "stable"
      });
    });

    it("lets verified recipients receive up to the verified maximum", async () => {
      await run((tx) => tx.setVerified(payee, true));

      await expect(
        run((tx) => engine.quoteAndValidate(tx, 100_000_000_000n, "stable", payee))
      ).resolves.toMatchObject({ verifiedMaxPayment: 100_000_000_000n });
      await expect(
        run((tx) => engine.quoteAndValidate(tx, 100_000_000_001n, "stable", payee))
      ).rejects.toMatchObject({ code: "AboveMaximum" });
    });
  });

  describe("assertCooldown", () => {
    it("blocks a payer until the cooldown has elapsed", async () => {
      await run((tx) => engine.recordSettlement(tx, payer, START_MS));

      await expect(run((tx) => engine.assertCooldown(tx, payer, START_MS + 59_000))).rejects.toMatchObject({
        code: "RateLimited",
        retryAfterSeconds: 1
      });
      await expect(run((tx) => engine.assertCooldown(tx, payer, START_MS + 60_000))).resolves.toBeUndefined();
    });
  });
});
