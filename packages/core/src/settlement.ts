import type { LedgerTransaction } from "@stagepay/db";
import {
  CURRENCIES,
  type Currency,
  type PaymentLimits,
  type SettlementReceipt,
  type WithdrawalReceipt
} from "@stagepay/shared-types";
import type { Logger } from "pino";
import type { EnginePolicy } from "./context.js";
import type { CustodyLedger } from "./custody.js";
import { RateLimitError, StateConflictError, ValidationError } from "./errors.js";

export interface CommissionSplit {
  commission: bigint;
  remainder: bigint;
}

export type SettlementMode = "direct" | "deferred";

export interface SettlementRequest {
  payer: string;
  payee: string;
  amount: bigint;
  currency: Currency;
  commissionPercentage: number;
  commissionRecipient: string;
  mode: SettlementMode;
}

export function splitCommission(amount: bigint, commissionPercentage: number): CommissionSplit {
  if (amount < 0n) {
    throw new ValidationError("InvalidAmount", "Amount cannot be negative");
  }
  if (!Number.isInteger(commissionPercentage) || commissionPercentage < 0 || commissionPercentage > 100) {
    throw new ValidationError("InvalidCommission", "Commission percentage must be an integer in [0, 100]");
  }
  const commission = (amount * BigInt(commissionPercentage)) / 100n;
  return { commission, remainder: amount - commission };
}

export function assertWithinLimits(limits: PaymentLimits, amount: bigint, verified: boolean): void {
  if (amount < limits.minPayment) {
    throw new ValidationError("BelowMinimum", `Payment ${amount} is below the ${limits.currency} minimum ${limits.minPayment}`);
  }
  const ceiling = verified ? limits.verifiedMaxPayment : limits.maxPayment;
  if (amount > ceiling) {
    throw new ValidationError("AboveMaximum", `Payment ${amount} exceeds the ${limits.currency} maximum ${ceiling}`);
  }
}

/**
 * Splits payments into commission and payee parts and moves the funds.
 *
 * Every method runs inside the caller's store transaction; a throw anywhere
 * discards the transfers and balance changes already staged for the
 * operation.
 */
export class SettlementEngine {
  constructor(
    private readonly custody: CustodyLedger,
    private readonly policy: EnginePolicy,
    private readonly logger: Logger
  ) {}

  async quoteAndValidate(
    tx: LedgerTransaction,
    amount: bigint,
    currency: Currency,
    recipient: string
  ): Promise<PaymentLimits> {
    const [limits, verified] = await Promise.all([tx.getPaymentLimits(currency), tx.isVerified(recipient)]);
    assertWithinLimits(limits, amount, verified);
    return limits;
  }

  /**
   * `direct` pays the payee before the commission recipient: if the
   * commission leg fails the whole settlement fails with it, so the platform
   * can never be paid while the primary payee is not. `deferred` moves the
   * full amount into the treasury and credits both parties' pending balances.
   */
  async settle(tx: LedgerTransaction, request: SettlementRequest, settledAt: Date): Promise<SettlementReceipt> {
    if (request.amount <= 0n) {
      throw new ValidationError("InvalidAmount", "Settlement amount must be positive");
    }
    const { commission, remainder } = splitCommission(request.amount, request.commissionPercentage);
    const legs = this.legs(request.payee, remainder, request.commissionRecipient, commission);

    if (request.mode === "direct") {
      for (const leg of legs) {
        await this.custody.transfer(tx, {
          currency: request.currency,
          from: request.payer,
          to: leg.to,
          amount: leg.amount
        });
      }
    } else {
      await this.custody.transfer(tx, {
        currency: request.currency,
        from: request.payer,
        to: this.policy.treasuryAccount,
        amount: request.amount
      });
      for (const leg of legs) {
        await this.creditBalance(tx, leg.to, request.currency, leg.amount);
      }
    }

    this.logger.debug(
      {
        payer: request.payer,
        payee: request.payee,
        currency: request.currency,
        amount: request.amount.toString(),
        commission: commission.toString(),
        mode: request.mode
      },
      "settlement staged"
    );

    return {
      payer: request.payer,
      payee: request.payee,
      currency: request.currency,
      amount: request.amount,
      commission,
      remainder,
      commissionRecipient: request.commissionRecipient,
      mode: request.mode,
      settledAt: settledAt.toISOString()
    };
  }

  async creditBalance(tx: LedgerTransaction, owner: string, currency: Currency, amount: bigint): Promise<void> {
    if (amount === 0n) {
      return;
    }
    const record = await tx.getBalance(owner, currency);
    await tx.saveBalance({ ...record, pending: record.pending + amount });
  }

  /**
   * Pays out every pending balance of `owner` from the treasury. Balances are
   * zeroed before the first transfer is issued.
   */
  async withdraw(tx: LedgerTransaction, owner: string, withdrawnAt: Date): Promise<WithdrawalReceipt> {
    const records = await Promise.all(CURRENCIES.map((currency) => tx.getBalance(owner, currency)));
    const payable = records.filter((record) => record.pending > 0n);
    if (payable.length === 0) {
      throw new StateConflictError("NothingToWithdraw", `No pending balance for ${owner}`);
    }

    for (const record of payable) {
      await tx.saveBalance({ ...record, pending: 0n, withdrawn: record.withdrawn + record.pending });
    }
    for (const record of payable) {
      await this.custody.transfer(tx, {
        currency: record.currency,
        from: this.policy.treasuryAccount,
        to: owner,
        amount: record.pending
      });
    }

    const paid = (currency: Currency): bigint =>
      payable.find((record) => record.currency === currency)?.pending ?? 0n;

    return {
      owner,
      nativeAmount: paid("native"),
      stableAmount: paid("stable"),
      withdrawnAt: withdrawnAt.toISOString()
    };
  }

  async assertCooldown(tx: LedgerTransaction, payer: string, nowMs: number): Promise<void> {
    const last = await tx.getLastPaymentAt(payer);
    if (last === null) {
      return;
    }
    const readyAt = last + this.policy.paymentCooldownSeconds * 1000;
    if (nowMs < readyAt) {
      throw new RateLimitError(payer, Math.ceil((readyAt - nowMs) / 1000));
    }
  }

  async recordSettlement(tx: LedgerTransaction, payer: string, nowMs: number): Promise<void> {
    await tx.setLastPaymentAt(payer, nowMs);
  }

  private legs(
    payee: string,
    remainder: bigint,
    commissionRecipient: string,
    commission: bigint
  ): Array<{ to: string; amount: bigint }> {
    if (payee === commissionRecipient) {
      return [{ to: payee, amount: remainder + commission }];
    }
    return [
      { to: payee, amount: remainder },
      { to: commissionRecipient, amount: commission }
    ].filter((leg) => leg.amount > 0n);
  }
}
