import type { LedgerStore } from "@stagepay/db";
import type { Currency, SettlementReceipt, WithdrawalReceipt } from "@stagepay/shared-types";
import type { Logger } from "pino";
import { recordAudit } from "./audit.js";
import type { AuthorizationVerifier, SignatureEnvelope } from "./authorization.js";
import { assertIdentity, type Clock } from "./context.js";
import { StateConflictError, ValidationError } from "./errors.js";
import type { SettlementEngine } from "./settlement.js";

export interface PayRecipientInput {
  payer: string;
  recipient: string;
  /** Minor units of `currency`. */
  amount: bigint;
  currency: Currency;
  /** Unix seconds. */
  deadline: number;
  nonce?: bigint;
  authorization: SignatureEnvelope;
}

export interface PaymentReceipt extends SettlementReceipt {
  nonce: bigint;
}

interface PaymentDeps {
  store: LedgerStore;
  clock: Clock;
  verifier: AuthorizationVerifier;
  settlement: SettlementEngine;
  logger: Logger;
}

export class PaymentService {
  private readonly logger: Logger;

  constructor(private readonly deps: PaymentDeps) {
    this.logger = deps.logger.child({ component: "payments" });
  }

  /**
   * Pays `recipient` directly from the payer's custody account, less the
   * platform fee. Requires an authorization from the trusted verifier over the
   * payer's current nonce.
   */
  async payRecipient(input: PayRecipientInput): Promise<PaymentReceipt> {
    const now = this.deps.clock.now();

    const receipt = await this.deps.store.transaction(async (tx) => {
      const settings = await tx.getSettings();
      if (settings.paused) {
        throw new StateConflictError("Paused", "Payments are paused");
      }
      assertIdentity(input.payer, "payer");
      assertIdentity(input.recipient, "recipient");
      if (input.amount <= 0n) {
        throw new ValidationError("InvalidAmount", "Payment amount must be positive");
      }

      await this.deps.settlement.assertCooldown(tx, input.payer, now);
      await this.deps.settlement.quoteAndValidate(tx, input.amount, input.currency, input.recipient);

      const nonce = await this.deps.verifier.consume(tx, {
        payload: {
          type: "PayRecipient",
          account: input.payer,
          recipient: input.recipient,
          amount: input.amount,
          currency: input.currency,
          deadline: input.deadline
        },
        envelope: input.authorization,
        claimedNonce: input.nonce
      });

      const settlement = await this.deps.settlement.settle(
        tx,
        {
          payer: input.payer,
          payee: input.recipient,
          amount: input.amount,
          currency: input.currency,
          commissionPercentage: settings.feePercentage,
          commissionRecipient: settings.feeRecipient,
          mode: "direct"
        },
        new Date(now)
      );
      await this.deps.settlement.recordSettlement(tx, input.payer, now);

      await recordAudit(
        tx,
        "PaymentProcessed",
        input.payer,
        {
          recipient: input.recipient,
          currency: input.currency,
          amount: input.amount.toString(),
          fee: settlement.commission.toString(),
          nonce: nonce.toString()
        },
        now
      );
      return { ...settlement, nonce };
    });

    this.logger.info(
      {
        payer: receipt.payer,
        recipient: receipt.payee,
        currency: receipt.currency,
        amount: receipt.amount.toString(),
        fee: receipt.commission.toString()
      },
      "payment processed"
    );
    return receipt;
  }

  async withdraw(owner: string): Promise<WithdrawalReceipt> {
    const now = this.deps.clock.now();
    const receipt = await this.deps.store.transaction(async (tx) => {
      assertIdentity(owner, "owner");
      const result = await this.deps.settlement.withdraw(tx, owner, new Date(now));
      await recordAudit(
        tx,
        "BalanceWithdrawn",
        owner,
        { native: result.nativeAmount.toString(), stable: result.stableAmount.toString() },
        now
      );
      return result;
    });

    this.logger.info(
      { owner, native: receipt.nativeAmount.toString(), stable: receipt.stableAmount.toString() },
      "balance withdrawn"
    );
    return receipt;
  }
}
