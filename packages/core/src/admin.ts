import type { LedgerStore, LedgerTransaction } from "@stagepay/db";
import type { AuditDetails, AuditKind, Currency, PaymentLimits, PlatformSettings } from "@stagepay/shared-types";
import type { Logger } from "pino";
import { recordAudit } from "./audit.js";
import { MAX_NONCE } from "./authorization.js";
import { assertIdentity, type CallerContext, type Clock, type EnginePolicy, requireRole } from "./context.js";
import type { CustodyLedger } from "./custody.js";
import { StateConflictError, ValidationError } from "./errors.js";

interface AdminDeps {
  store: LedgerStore;
  clock: Clock;
  policy: EnginePolicy;
  custody: CustodyLedger;
  logger: Logger;
}

export type PaymentLimitsInput = Omit<PaymentLimits, "currency">;

/**
 * Platform administration. Every operation requires the admin role and leaves
 * an audit record.
 */
export class AdminConsole {
  private readonly logger: Logger;

  constructor(private readonly deps: AdminDeps) {
    this.logger = deps.logger.child({ component: "admin" });
  }

  async setVerificationStatus(ctx: CallerContext, identity: string, verified: boolean): Promise<void> {
    await this.setVerificationStatusBatch(ctx, [identity], verified);
  }

  /** All-or-nothing: one unchanged identity rejects the whole batch. */
  async setVerificationStatusBatch(ctx: CallerContext, identities: string[], verified: boolean): Promise<void> {
    await this.run(ctx, async (tx, audit) => {
      for (const identity of identities) {
        assertIdentity(identity, "identity");
        if ((await tx.isVerified(identity)) === verified) {
          throw new StateConflictError(
            "VerificationUnchanged",
            `${identity} is already ${verified ? "verified" : "unverified"}`
          );
        }
        await tx.setVerified(identity, verified);
        await audit("VerificationStatusChanged", { identity, verified });
      }
    });
  }

  async updatePaymentLimits(ctx: CallerContext, currency: Currency, input: PaymentLimitsInput): Promise<PaymentLimits> {
    const { minPayment, maxPayment, verifiedMaxPayment } = input;
    if (minPayment <= 0n || minPayment >= maxPayment || maxPayment >= verifiedMaxPayment) {
      throw new ValidationError(
        "InvalidLimits",
        "Limits must satisfy 0 < minPayment < maxPayment < verifiedMaxPayment"
      );
    }
    const limits: PaymentLimits = { currency, minPayment, maxPayment, verifiedMaxPayment };
    await this.run(ctx, async (tx, audit) => {
      await tx.savePaymentLimits(limits);
      await audit("PaymentLimitsUpdated", {
        currency,
        minPayment: minPayment.toString(),
        maxPayment: maxPayment.toString(),
        verifiedMaxPayment: verifiedMaxPayment.toString()
      });
    });
    return limits;
  }

  async updateFeePercentage(ctx: CallerContext, feePercentage: number): Promise<void> {
    const { maxFeePercentage } = this.deps.policy;
    if (!Number.isInteger(feePercentage) || feePercentage < 0 || feePercentage > maxFeePercentage) {
      throw new ValidationError("FeeTooHigh", `Fee percentage must be an integer in [0, ${maxFeePercentage}]`);
    }
    await this.updateSettings(ctx, "FeePercentageUpdated", (settings) => ({ ...settings, feePercentage }), {
      feePercentage
    });
  }

  async updateFeeRecipient(ctx: CallerContext, feeRecipient: string): Promise<void> {
    assertIdentity(feeRecipient, "feeRecipient");
    await this.updateSettings(ctx, "FeeRecipientUpdated", (settings) => ({ ...settings, feeRecipient }), {
      feeRecipient
    });
  }

  async updateVerifier(ctx: CallerContext, trustedVerifier: string): Promise<void> {
    assertIdentity(trustedVerifier, "trustedVerifier");
    await this.updateSettings(ctx, "VerifierUpdated", (settings) => ({ ...settings, trustedVerifier }), {
      trustedVerifier
    });
  }

  /** Revokes every outstanding and future authorization for `account`. */
  async invalidateNonce(ctx: CallerContext, account: string): Promise<void> {
    await this.run(ctx, async (tx, audit) => {
      await tx.setNonce(account, MAX_NONCE);
      await audit("NonceInvalidated", { account });
    });
  }

  async pause(ctx: CallerContext): Promise<void> {
    await this.run(ctx, async (tx, audit) => {
      const settings = await tx.getSettings();
      if (settings.paused) {
        throw new StateConflictError("Paused", "Platform is already paused");
      }
      await tx.saveSettings({ ...settings, paused: true });
      await audit("Paused", {});
    });
  }

  async unpause(ctx: CallerContext): Promise<void> {
    await this.run(ctx, async (tx, audit) => {
      const settings = await tx.getSettings();
      if (!settings.paused) {
        throw new StateConflictError("NotPaused", "Platform is not paused");
      }
      await tx.saveSettings({ ...settings, paused: false });
      await audit("Unpaused", {});
    });
  }

  async setBaseUri(ctx: CallerContext, collectibleBaseUri: string): Promise<void> {
    await this.updateSettings(ctx, "BaseUriChanged", (settings) => ({ ...settings, collectibleBaseUri }), {
      baseUri: collectibleBaseUri
    });
  }

  async depositFunds(ctx: CallerContext, identity: string, currency: Currency, amount: bigint): Promise<bigint> {
    if (identity !== this.deps.policy.treasuryAccount) {
      assertIdentity(identity, "identity");
    }
    return this.run(ctx, async (tx, audit) => {
      const balance = await this.deps.custody.deposit(tx, identity, currency, amount);
      await audit("FundsDeposited", { identity, currency, amount: amount.toString() });
      return balance;
    });
  }

  async freezeAccount(ctx: CallerContext, identity: string): Promise<void> {
    await this.run(ctx, async (tx, audit) => {
      await tx.setFrozen(identity, true);
      await audit("AccountFrozen", { identity });
    });
  }

  async unfreezeAccount(ctx: CallerContext, identity: string): Promise<void> {
    await this.run(ctx, async (tx, audit) => {
      await tx.setFrozen(identity, false);
      await audit("AccountUnfrozen", { identity });
    });
  }

  private async updateSettings(
    ctx: CallerContext,
    kind: AuditKind,
    update: (settings: PlatformSettings) => PlatformSettings,
    details: AuditDetails
  ): Promise<void> {
    await this.run(ctx, async (tx, audit) => {
      await tx.saveSettings(update(await tx.getSettings()));
      await audit(kind, details);
    });
  }

  private async run<T>(
    ctx: CallerContext,
    work: (tx: LedgerTransaction, audit: (kind: AuditKind, details: AuditDetails) => Promise<void>) => Promise<T>
  ): Promise<T> {
    requireRole(ctx, "admin");
    const now = this.deps.clock.now();
    const kinds: AuditKind[] = [];
    const result = await this.deps.store.transaction((tx) =>
      work(tx, async (kind, details) => {
        kinds.push(kind);
        await recordAudit(tx, kind, ctx.identity, details, now);
      })
    );
    for (const kind of kinds) {
      this.logger.info({ admin: ctx.identity, kind }, "admin change applied");
    }
    return result;
  }
}
