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
import {
  compositeKey,
  emptyBalance,
  emptyCustodyAccount,
  type LedgerDefaults,
  type LedgerReader,
  type LedgerStore,
  type LedgerTransaction
} from "./store.js";

interface MemoryState {
  events: Map<string, EventEntity>;
  tiers: Map<string, EventTier>;
  holdings: Map<string, TicketHolding>;
  balances: Map<string, BalanceRecord>;
  custody: Map<string, CustodyAccount>;
  frozen: Set<string>;
  nonces: Map<string, bigint>;
  lastPayments: Map<string, number>;
  limits: Map<Currency, PaymentLimits>;
  verified: Set<string>;
  settings: PlatformSettings;
  collectibles: Map<number, Collectible>;
}

function copyEvent(event: EventEntity): EventEntity {
  return { ...event, tierIds: [...event.tierIds] };
}

function createState(defaults: LedgerDefaults): MemoryState {
  return {
    events: new Map(),
    tiers: new Map(),
    holdings: new Map(),
    balances: new Map(),
    custody: new Map(),
    frozen: new Set(),
    nonces: new Map(),
    lastPayments: new Map(),
    limits: new Map(defaults.paymentLimits.map((limits) => [limits.currency, { ...limits }])),
    verified: new Set(),
    settings: { ...defaults.settings },
    collectibles: new Map()
  };
}

class MemoryLedgerView implements LedgerTransaction {
  readonly pendingAudit: AuditRecord[] = [];

  constructor(
    private readonly state: MemoryState,
    private readonly audit: AuditRecord[]
  ) {}

  async listEvents(): Promise<EventEntity[]> {
    return [...this.state.events.values()]
      .map(copyEvent)
      .sort((a, b) => a.startAt.localeCompare(b.startAt));
  }

  async getEvent(eventId: string): Promise<EventEntity | null> {
    const event = this.state.events.get(eventId);
    return event ? copyEvent(event) : null;
  }

  async getTier(eventId: string, tierId: string): Promise<EventTier | null> {
    const tier = this.state.tiers.get(compositeKey(eventId, tierId));
    return tier ? { ...tier } : null;
  }

  async listTiers(eventId: string): Promise<EventTier[]> {
    const event = this.state.events.get(eventId);
    if (!event) {
      return [];
    }
    const tiers: EventTier[] = [];
    for (const tierId of event.tierIds) {
      const tier = this.state.tiers.get(compositeKey(eventId, tierId));
      if (tier) {
        tiers.push({ ...tier });
      }
    }
    return tiers;
  }

  async getHolding(owner: string, tokenId: string): Promise<TicketHolding | null> {
    const holding = this.state.holdings.get(compositeKey(owner, tokenId));
    return holding ? { ...holding } : null;
  }

  async listHoldings(owner: string): Promise<TicketHolding[]> {
    return [...this.state.holdings.values()]
      .filter((holding) => holding.owner === owner)
      .map((holding) => ({ ...holding }));
  }

  async getBalance(owner: string, currency: Currency): Promise<BalanceRecord> {
    const record = this.state.balances.get(compositeKey(owner, currency));
    return record ? { ...record } : emptyBalance(owner, currency);
  }

  async getCustodyAccount(identity: string, currency: Currency): Promise<CustodyAccount> {
    const account = this.state.custody.get(compositeKey(identity, currency));
    return account ? { ...account } : emptyCustodyAccount(identity, currency);
  }

  async isFrozen(identity: string): Promise<boolean> {
    return this.state.frozen.has(identity);
  }

  async getNonce(account: string): Promise<bigint> {
    return this.state.nonces.get(account) ?? 0n;
  }

  async getLastPaymentAt(payer: string): Promise<number | null> {
    return this.state.lastPayments.get(payer) ?? null;
  }

  async getPaymentLimits(currency: Currency): Promise<PaymentLimits> {
    const limits = this.state.limits.get(currency);
    if (!limits) {
      throw new Error(`Payment limits for ${currency} are not configured`);
    }
    return { ...limits };
  }

  async isVerified(identity: string): Promise<boolean> {
    return this.state.verified.has(identity);
  }

  async getSettings(): Promise<PlatformSettings> {
    return { ...this.state.settings };
  }

  async getCollectible(tokenId: number): Promise<Collectible | null> {
    const collectible = this.state.collectibles.get(tokenId);
    return collectible ? { ...collectible } : null;
  }

  async listAudit(query: AuditQuery): Promise<AuditRecord[]> {
    return [...this.audit, ...this.pendingAudit]
      .filter((record) => record.id > query.afterId)
      .slice(0, query.limit)
      .map((record) => ({ ...record, details: { ...record.details } }));
  }

  async insertEvent(event: EventEntity, tiers: EventTier[]): Promise<void> {
    this.state.events.set(event.id, copyEvent(event));
    for (const tier of tiers) {
      this.state.tiers.set(compositeKey(tier.eventId, tier.tierId), { ...tier });
    }
  }

  async saveEvent(event: EventEntity): Promise<void> {
    this.state.events.set(event.id, copyEvent(event));
  }

  async saveTier(tier: EventTier): Promise<void> {
    this.state.tiers.set(compositeKey(tier.eventId, tier.tierId), { ...tier });
  }

  async saveHolding(holding: TicketHolding): Promise<void> {
    this.state.holdings.set(compositeKey(holding.owner, holding.tokenId), { ...holding });
  }

  async saveBalance(record: BalanceRecord): Promise<void> {
    this.state.balances.set(compositeKey(record.owner, record.currency), { ...record });
  }

  async saveCustodyAccount(account: CustodyAccount): Promise<void> {
    this.state.custody.set(compositeKey(account.identity, account.currency), { ...account });
  }

  async setFrozen(identity: string, frozen: boolean): Promise<void> {
    if (frozen) {
      this.state.frozen.add(identity);
    } else {
      this.state.frozen.delete(identity);
    }
  }

  async setNonce(account: string, value: bigint): Promise<void> {
    this.state.nonces.set(account, value);
  }

  async setLastPaymentAt(payer: string, at: number): Promise<void> {
    this.state.lastPayments.set(payer, at);
  }

  async savePaymentLimits(limits: PaymentLimits): Promise<void> {
    this.state.limits.set(limits.currency, { ...limits });
  }

  async setVerified(identity: string, verified: boolean): Promise<void> {
    if (verified) {
      this.state.verified.add(identity);
    } else {
      this.state.verified.delete(identity);
    }
  }

  async saveSettings(settings: PlatformSettings): Promise<void> {
    this.state.settings = { ...settings };
  }

  async saveCollectible(collectible: Collectible): Promise<void> {
    this.state.collectibles.set(collectible.tokenId, { ...collectible });
  }

  async deleteCollectible(tokenId: number): Promise<void> {
    this.state.collectibles.delete(tokenId);
  }

  async appendAudit(record: NewAuditRecord): Promise<AuditRecord> {
    const last = this.pendingAudit.at(-1) ?? this.audit.at(-1);
    const stored: AuditRecord = { ...record, details: { ...record.details }, id: (last?.id ?? 0) + 1 };
    this.pendingAudit.push(stored);
    return { ...stored, details: { ...stored.details } };
  }
}

export class MemoryLedgerStore implements LedgerStore {
  readonly mode = "memory" as const;
  private state: MemoryState;
  private readonly audit: AuditRecord[] = [];
  private queue: Promise<unknown> = Promise.resolve();

  constructor(defaults: LedgerDefaults) {
    this.state = createState(defaults);
  }

  async init(): Promise<void> {
    return;
  }

  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runStaged(work));
    // The queue keeps draining after a failed transaction; the failure itself
    // still reaches the caller through `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T> {
    return work(new MemoryLedgerView(this.state, this.audit));
  }

  async close(): Promise<void> {
    return;
  }

  private async runStaged<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const staged = structuredClone(this.state);
    const view = new MemoryLedgerView(staged, this.audit);
    const result = await work(view);
    this.state = staged;
    this.audit.push(...view.pendingAudit);
    return result;
  }
}
