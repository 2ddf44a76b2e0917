import type { LedgerStore } from "@stagepay/db";
import type {
  AuditRecord,
  BalanceRecord,
  Currency,
  CustodyAccount,
  PaymentLimits,
  PlatformSettings
} from "@stagepay/shared-types";

export const MAX_AUDIT_PAGE = 200;

export interface CustodyView extends CustodyAccount {
  frozen: boolean;
}

/** Read-only lookups; none of these take the writer lock. */
export class LedgerQueries {
  constructor(private readonly store: LedgerStore) {}

  getBalance(owner: string, currency: Currency): Promise<BalanceRecord> {
    return this.store.read((reader) => reader.getBalance(owner, currency));
  }

  getNonce(account: string): Promise<bigint> {
    return this.store.read((reader) => reader.getNonce(account));
  }

  getPaymentLimits(currency: Currency): Promise<PaymentLimits> {
    return this.store.read((reader) => reader.getPaymentLimits(currency));
  }

  isVerified(identity: string): Promise<boolean> {
    return this.store.read((reader) => reader.isVerified(identity));
  }

  getSettings(): Promise<PlatformSettings> {
    return this.store.read((reader) => reader.getSettings());
  }

  getCustodyAccount(identity: string, currency: Currency): Promise<CustodyView> {
    return this.store.read(async (reader) => {
      const [account, frozen] = await Promise.all([
        reader.getCustodyAccount(identity, currency),
        reader.isFrozen(identity)
      ]);
      return { ...account, frozen };
    });
  }

  listAudit(afterId = 0, limit = 50): Promise<AuditRecord[]> {
    const bounded = Math.min(Math.max(1, Math.floor(limit)), MAX_AUDIT_PAGE);
    return this.store.read((reader) => reader.listAudit({ afterId, limit: bounded }));
  }
}
