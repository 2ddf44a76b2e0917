import type {
  AuditQuery,
  AuditRecord,
  BalanceRecord,
  Collectible,
  Currency,
  CustodyAccount,
  EventEntity,
  EventTier,
  NewAuditRecord,
  PaymentLimits,
  PlatformSettings,
  TicketHolding
} from "@stagepay/shared-types";

export interface LedgerReader {
  listEvents(): Promise<EventEntity[]>;
  getEvent(eventId: string): Promise<EventEntity | null>;
  getTier(eventId: string, tierId: string): Promise<EventTier | null>;
  listTiers(eventId: string): Promise<EventTier[]>;
  getHolding(owner: string, tokenId: string): Promise<TicketHolding | null>;
  listHoldings(owner: string): Promise<TicketHolding[]>;
  getBalance(owner: string, currency: Currency): Promise<BalanceRecord>;
  getCustodyAccount(identity: string, currency: Currency): Promise<CustodyAccount>;
  isFrozen(identity: string): Promise<boolean>;
  getNonce(account: string): Promise<bigint>;
  getLastPaymentAt(payer: string): Promise<number | null>;
  getPaymentLimits(currency: Currency): Promise<PaymentLimits>;
  isVerified(identity: string): Promise<boolean>;
  getSettings(): Promise<PlatformSettings>;
  getCollectible(tokenId: number): Promise<Collectible | null>;
  listAudit(query: AuditQuery): Promise<AuditRecord[]>;
}

export interface LedgerWriter {
  insertEvent(event: EventEntity, tiers: EventTier[]): Promise<void>;
  saveEvent(event: EventEntity): Promise<void>;
  saveTier(tier: EventTier): Promise<void>;
  saveHolding(holding: TicketHolding): Promise<void>;
  saveBalance(record: BalanceRecord): Promise<void>;
  saveCustodyAccount(account: CustodyAccount): Promise<void>;
  setFrozen(identity: string, frozen: boolean): Promise<void>;
  setNonce(account: string, value: bigint): Promise<void>;
  setLastPaymentAt(payer: string, at: number): Promise<void>;
  savePaymentLimits(limits: PaymentLimits): Promise<void>;
  setVerified(identity: string, verified: boolean): Promise<void>;
  saveSettings(settings: PlatformSettings): Promise<void>;
  saveCollectible(collectible: Collectible): Promise<void>;
  deleteCollectible(tokenId: number): Promise<void>;
  appendAudit(record: NewAuditRecord): Promise<AuditRecord>;
}

export interface LedgerTransaction extends LedgerReader, LedgerWriter {}

/**
 * Keyed record store behind every engine operation.
 *
 * `transaction` is the single-writer boundary: at most one transaction runs at
 * a time, and its writes become visible only if `work` resolves. A rejected
 * `work` leaves the store exactly as it was.
 */
export interface LedgerStore {
  readonly mode: "memory" | "postgres";
  init(): Promise<void>;
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
  read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface LedgerDefaults {
  settings: PlatformSettings;
  paymentLimits: PaymentLimits[];
}

export function compositeKey(...parts: Array<string | number>): string {
  return parts.join(":");
}

export function emptyBalance(owner: string, currency: Currency): BalanceRecord {
  return { owner, currency, pending: 0n, withdrawn: 0n };
}

export function emptyCustodyAccount(identity: string, currency: Currency): CustodyAccount {
  return { identity, currency, balance: 0n };
}
