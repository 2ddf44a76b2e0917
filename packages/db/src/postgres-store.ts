import type {
  AuditDetails,
  AuditKind,
  AuditQuery,
  AuditRecord,
  BalanceRecord,
  Collectible,
  Currency,
  CustodyAccount,
  EventEntity,
  EventStatus,
  EventTier,
  NewAuditRecord,
  PaymentLimits,
  PlatformSettings,
  TicketHolding
} from "@stagepay/shared-types";
import { Pool, type PoolClient } from "pg";
import {
  emptyBalance,
  emptyCustodyAccount,
  type LedgerDefaults,
  type LedgerReader,
  type LedgerStore,
  type LedgerTransaction
} from "./store.js";

// Ledger-wide advisory lock: every write transaction is serialized on it.
const LEDGER_LOCK_KEY = 724201;

interface DbEventRow {
  id: string;
  name: string;
  description: string;
  start_at: string;
  end_at: string;
  organizer: string;
  status: EventStatus;
  currency: Currency;
  commission_percentage: number;
  commission_recipient: string;
  tier_ids: string[];
  created_at: string;
}

interface DbTierRow {
  event_id: string;
  tier_id: string;
  price: string;
  max_quantity: number;
  sold_count: number;
  active: boolean;
}

interface DbHoldingRow {
  owner: string;
  token_id: string;
  event_id: string;
  tier_id: string;
  quantity: number;
}

interface DbBalanceRow {
  pending: string;
  withdrawn: string;
}

interface DbAmountRow {
  value: string;
}

interface DbLimitsRow {
  currency: Currency;
  min_payment: string;
  max_payment: string;
  verified_max_payment: string;
}

interface DbSettingsRow {
  fee_percentage: number;
  fee_recipient: string;
  trusted_verifier: string;
  paused: boolean;
  collectible_base_uri: string;
  collectible_max_supply: number;
  next_collectible_id: number;
}

interface DbCollectibleRow {
  token_id: number;
  owner: string;
  uri: string;
  minted_at: string;
}

interface DbAuditRow {
  id: string;
  kind: AuditKind;
  at: string;
  actor: string;
  details: AuditDetails;
}

const EVENT_COLUMNS = `
  id, name, description, start_at, end_at, organizer, status, currency,
  commission_percentage, commission_recipient, tier_ids, created_at
`;

function toEventEntity(row: DbEventRow): EventEntity {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    startAt: new Date(row.start_at).toISOString(),
    endAt: new Date(row.end_at).toISOString(),
    organizer: row.organizer,
    status: row.status,
    currency: row.currency,
    commissionPercentage: Number(row.commission_percentage),
    commissionRecipient: row.commission_recipient,
    tierIds: [...row.tier_ids],
    createdAt: new Date(row.created_at).toISOString()
  };
}

function toEventTier(row: DbTierRow): EventTier {
  return {
    eventId: row.event_id,
    tierId: row.tier_id,
    price: BigInt(row.price),
    maxQuantity: Number(row.max_quantity),
    soldCount: Number(row.sold_count),
    active: row.active
  };
}

function toHolding(row: DbHoldingRow): TicketHolding {
  return {
    owner: row.owner,
    tokenId: row.token_id,
    eventId: row.event_id,
    tierId: row.tier_id,
    quantity: Number(row.quantity)
  };
}

function toSettings(row: DbSettingsRow): PlatformSettings {
  return {
    feePercentage: Number(row.fee_percentage),
    feeRecipient: row.fee_recipient,
    trustedVerifier: row.trusted_verifier,
    paused: row.paused,
    collectibleBaseUri: row.collectible_base_uri,
    collectibleMaxSupply: Number(row.collectible_max_supply),
    nextCollectibleId: Number(row.next_collectible_id)
  };
}

function toCollectible(row: DbCollectibleRow): Collectible {
  return {
    tokenId: Number(row.token_id),
    owner: row.owner,
    uri: row.uri,
    mintedAt: new Date(row.minted_at).toISOString()
  };
}

function toAuditRecord(row: DbAuditRow): AuditRecord {
  return {
    id: Number(row.id),
    kind: row.kind,
    at: new Date(row.at).toISOString(),
    actor: row.actor,
    details: row.details
  };
}

class PostgresLedgerView implements LedgerTransaction {
  constructor(private readonly client: PoolClient) {}

  async listEvents(): Promise<EventEntity[]> {
    const result = await this.client.query<DbEventRow>(
      `SELECT ${EVENT_COLUMNS} FROM events ORDER BY start_at ASC;`
    );
    return result.rows.map(toEventEntity);
  }

  async getEvent(eventId: string): Promise<EventEntity | null> {
    const result = await this.client.query<DbEventRow>(
      `SELECT ${EVENT_COLUMNS} FROM events WHERE id = $1 LIMIT 1;`,
      [eventId]
    );
    const row = result.rows[0];
    return row ? toEventEntity(row) : null;
  }

  async getTier(eventId: string, tierId: string): Promise<EventTier | null> {
    const result = await this.client.query<DbTierRow>(
      `
        SELECT event_id, price::text AS price, tier_id, max_quantity, sold_count, active
        FROM event_tiers
        WHERE event_id = $1 AND tier_id = $2
        LIMIT 1;
      `,
      [eventId, tierId]
    );
    const row = result.rows[0];
    return row ? toEventTier(row) : null;
  }

  async listTiers(eventId: string): Promise<EventTier[]> {
    const result = await this.client.query<DbTierRow>(
      `
        SELECT event_id, price::text AS price, tier_id, max_quantity, sold_count, active
        FROM event_tiers
        WHERE event_id = $1
        ORDER BY position ASC;
      `,
      [eventId]
    );
    return result.rows.map(toEventTier);
  }

  async getHolding(owner: string, tokenId: string): Promise<TicketHolding | null> {
    const result = await this.client.query<DbHoldingRow>(
      `
        SELECT owner, token_id, event_id, tier_id, quantity
        FROM ticket_holdings
        WHERE owner = $1 AND token_id = $2
        LIMIT 1;
      `,
      [owner, tokenId]
    );
    const row = result.rows[0];
    return row ? toHolding(row) : null;
  }

  async listHoldings(owner: string): Promise<TicketHolding[]> {
    const result = await this.client.query<DbHoldingRow>(
      `
        SELECT owner, token_id, event_id, tier_id, quantity
        FROM ticket_holdings
        WHERE owner = $1
        ORDER BY event_id ASC, tier_id ASC;
      `,
      [owner]
    );
    return result.rows.map(toHolding);
  }

  async getBalance(owner: string, currency: Currency): Promise<BalanceRecord> {
    const result = await this.client.query<DbBalanceRow>(
      `
        SELECT pending::text AS pending, withdrawn::text AS withdrawn
        FROM balances
        WHERE owner = $1 AND currency = $2;
      `,
      [owner, currency]
    );
    const row = result.rows[0];
    if (!row) {
      return emptyBalance(owner, currency);
    }
    return { owner, currency, pending: BigInt(row.pending), withdrawn: BigInt(row.withdrawn) };
  }

  async getCustodyAccount(identity: string, currency: Currency): Promise<CustodyAccount> {
    const result = await this.client.query<DbAmountRow>(
      `SELECT balance::text AS value FROM custody_accounts WHERE identity = $1 AND currency = $2;`,
      [identity, currency]
    );
    const row = result.rows[0];
    if (!row) {
      return emptyCustodyAccount(identity, currency);
    }
    return { identity, currency, balance: BigInt(row.value) };
  }

  async isFrozen(identity: string): Promise<boolean> {
    const result = await this.client.query(
      `SELECT 1 FROM frozen_accounts WHERE identity = $1 LIMIT 1;`,
      [identity]
    );
    return result.rows.length > 0;
  }

  async getNonce(account: string): Promise<bigint> {
    const result = await this.client.query<DbAmountRow>(
      `SELECT value::text AS value FROM nonces WHERE account = $1;`,
      [account]
    );
    const row = result.rows[0];
    return row ? BigInt(row.value) : 0n;
  }

  async getLastPaymentAt(payer: string): Promise<number | null> {
    const result = await this.client.query<DbAmountRow>(
      `SELECT last_payment_at::text AS value FROM payment_cooldowns WHERE payer = $1;`,
      [payer]
    );
    const row = result.rows[0];
    return row ? Number(row.value) : null;
  }

  async getPaymentLimits(currency: Currency): Promise<PaymentLimits> {
    const result = await this.client.query<DbLimitsRow>(
      `
        SELECT
          currency,
          min_payment::text AS min_payment,
          max_payment::text AS max_payment,
          verified_max_payment::text AS verified_max_payment
        FROM payment_limits
        WHERE currency = $1;
      `,
      [currency]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Payment limits for ${currency} are not configured`);
    }
    return {
      currency: row.currency,
      minPayment: BigInt(row.min_payment),
      maxPayment: BigInt(row.max_payment),
      verifiedMaxPayment: BigInt(row.verified_max_payment)
    };
  }

  async isVerified(identity: string): Promise<boolean> {
    const result = await this.client.query(
      `SELECT 1 FROM verified_identities WHERE identity = $1 LIMIT 1;`,
      [identity]
    );
    return result.rows.length > 0;
  }

  async getSettings(): Promise<PlatformSettings> {
    const result = await this.client.query<DbSettingsRow>(
      `
        SELECT
          fee_percentage, fee_recipient, trusted_verifier, paused,
          collectible_base_uri, collectible_max_supply, next_collectible_id
        FROM platform_settings
        WHERE id = 1;
      `
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error("Platform settings are not initialized");
    }
    return toSettings(row);
  }

  async getCollectible(tokenId: number): Promise<Collectible | null> {
    const result = await this.client.query<DbCollectibleRow>(
      `SELECT token_id, owner, uri, minted_at FROM collectibles WHERE token_id = $1;`,
      [tokenId]
    );
    const row = result.rows[0];
    return row ? toCollectible(row) : null;
  }

  async listAudit(query: AuditQuery): Promise<AuditRecord[]> {
    const result = await this.client.query<DbAuditRow>(
      `
        SELECT id::text AS id, kind, at, actor, details
        FROM audit_log
        WHERE id > $1
        ORDER BY id ASC
        LIMIT $2;
      `,
      [query.afterId, query.limit]
    );
    return result.rows.map(toAuditRecord);
  }

  async insertEvent(event: EventEntity, tiers: EventTier[]): Promise<void> {
    await this.client.query(
      `
        INSERT INTO events (${EVENT_COLUMNS})
        VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12);
      `,
      [
        event.id,
        event.name,
        event.description,
        event.startAt,
        event.endAt,
        event.organizer,
        event.status,
        event.currency,
        event.commissionPercentage,
        event.commissionRecipient,
        event.tierIds,
        event.createdAt
      ]
    );

    for (const [position, tier] of tiers.entries()) {
      await this.client.query(
        `
          INSERT INTO event_tiers (event_id, tier_id, price, max_quantity, sold_count, active, position)
          VALUES ($1,$2,$3,$4,$5,$6,$7);
        `,
        [
          tier.eventId,
          tier.tierId,
          tier.price.toString(),
          tier.maxQuantity,
          tier.soldCount,
          tier.active,
          position
        ]
      );
    }
  }

  async saveEvent(event: EventEntity): Promise<void> {
    await this.client.query(
      `
        UPDATE events
        SET
          name = $2,
          description = $3,
          start_at = $4,
          end_at = $5,
          status = $6,
          commission_percentage = $7,
          commission_recipient = $8
        WHERE id = $1;
      `,
      [
        event.id,
        event.name,
        event.description,
        event.startAt,
        event.endAt,
        event.status,
        event.commissionPercentage,
        event.commissionRecipient
      ]
    );
  }

  async saveTier(tier: EventTier): Promise<void> {
    await this.client.query(
      `
        UPDATE event_tiers
        SET price = $3, max_quantity = $4, sold_count = $5, active = $6
        WHERE event_id = $1 AND tier_id = $2;
      `,
      [tier.eventId, tier.tierId, tier.price.toString(), tier.maxQuantity, tier.soldCount, tier.active]
    );
  }

  async saveHolding(holding: TicketHolding): Promise<void> {
    await this.client.query(
      `
        INSERT INTO ticket_holdings (owner, token_id, event_id, tier_id, quantity)
        VALUES ($1, $2, $3, $4, $5)
        ON CONFLICT (owner, token_id)
        DO UPDATE SET quantity = EXCLUDED.quantity;
      `,
      [holding.owner, holding.tokenId, holding.eventId, holding.tierId, holding.quantity]
    );
  }

  async saveBalance(record: BalanceRecord): Promise<void> {
    await this.client.query(
      `
        INSERT INTO balances (owner, currency, pending, withdrawn)
        VALUES ($1, $2, $3, $4)
        ON CONFLICT (owner, currency)
        DO UPDATE SET pending = EXCLUDED.pending, withdrawn = EXCLUDED.withdrawn;
      `,
      [record.owner, record.currency, record.pending.toString(), record.withdrawn.toString()]
    );
  }

  async saveCustodyAccount(account: CustodyAccount): Promise<void> {
    await this.client.query(
      `
        INSERT INTO custody_accounts (identity, currency, balance)
        VALUES ($1, $2, $3)
        ON CONFLICT (identity, currency)
        DO UPDATE SET balance = EXCLUDED.balance;
      `,
      [account.identity, account.currency, account.balance.toString()]
    );
  }

  async setFrozen(identity: string, frozen: boolean): Promise<void> {
    if (frozen) {
      await this.client.query(
        `INSERT INTO frozen_accounts (identity) VALUES ($1) ON CONFLICT (identity) DO NOTHING;`,
        [identity]
      );
      return;
    }
    await this.client.query(`DELETE FROM frozen_accounts WHERE identity = $1;`, [identity]);
  }

  async setNonce(account: string, value: bigint): Promise<void> {
    await this.client.query(
      `
        INSERT INTO nonces (account, value)
        VALUES ($1, $2)
        ON CONFLICT (account)
        DO UPDATE SET value = EXCLUDED.value;
      `,
      [account, value.toString()]
    );
  }

  async setLastPaymentAt(payer: string, at: number): Promise<void> {
    await this.client.query(
      `
        INSERT INTO payment_cooldowns (payer, last_payment_at)
        VALUES ($1, $2)
        ON CONFLICT (payer)
        DO UPDATE SET last_payment_at = EXCLUDED.last_payment_at;
      `,
      [payer, at]
    );
  }

  async savePaymentLimits(limits: PaymentLimits): Promise<void> {
    await this.client.query(
      `
        INSERT INTO payment_limits (currency, min_payment, max_payment, verified_max_payment)
        VALUES ($1, $2, $3, $4)
        ON CONFLICT (currency)
        DO UPDATE SET
          min_payment = EXCLUDED.min_payment,
          max_payment = EXCLUDED.max_payment,
          verified_max_payment = EXCLUDED.verified_max_payment;
      `,
      [
        limits.currency,
        limits.minPayment.toString(),
        limits.maxPayment.toString(),
        limits.verifiedMaxPayment.toString()
      ]
    );
  }

  async setVerified(identity: string, verified: boolean): Promise<void> {
    if (verified) {
      await this.client.query(
        `INSERT INTO verified_identities (identity) VALUES ($1) ON CONFLICT (identity) DO NOTHING;`,
        [identity]
      );
      return;
    }
    await this.client.query(`DELETE FROM verified_identities WHERE identity = $1;`, [identity]);
  }

  async saveSettings(settings: PlatformSettings): Promise<void> {
    await this.client.query(
      `
        UPDATE platform_settings
        SET
          fee_percentage = $1,
          fee_recipient = $2,
          trusted_verifier = $3,
          paused = $4,
          collectible_base_uri = $5,
          collectible_max_supply = $6,
          next_collectible_id = $7
        WHERE id = 1;
      `,
      [
        settings.feePercentage,
        settings.feeRecipient,
        settings.trustedVerifier,
        settings.paused,
        settings.collectibleBaseUri,
        settings.collectibleMaxSupply,
        settings.nextCollectibleId
      ]
    );
  }

  async saveCollectible(collectible: Collectible): Promise<void> {
    await this.client.query(
      `
        INSERT INTO collectibles (token_id, owner, uri, minted_at)
        VALUES ($1, $2, $3, $4)
        ON CONFLICT (token_id)
        DO UPDATE SET owner = EXCLUDED.owner, uri = EXCLUDED.uri;
      `,
      [collectible.tokenId, collectible.owner, collectible.uri, collectible.mintedAt]
    );
  }

  async deleteCollectible(tokenId: number): Promise<void> {
    await this.client.query(`DELETE FROM collectibles WHERE token_id = $1;`, [tokenId]);
  }

  async appendAudit(record: NewAuditRecord): Promise<AuditRecord> {
    const result = await this.client.query<DbAuditRow>(
      `
        INSERT INTO audit_log (kind, at, actor, details)
        VALUES ($1, $2, $3, $4)
        RETURNING id::text AS id, kind, at, actor, details;
      `,
      [record.kind, record.at, record.actor, JSON.stringify(record.details)]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error("Audit insert returned no row");
    }
    return toAuditRecord(row);
  }
}

export class PostgresLedgerStore implements LedgerStore {
  readonly mode = "postgres" as const;
  private readonly pool: Pool;

  constructor(
    databaseUrl: string,
    private readonly defaults: LedgerDefaults
  ) {
    this.pool = new Pool({
      connectionString: databaseUrl
    });
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS events (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT NOT NULL,
        start_at TIMESTAMPTZ NOT NULL,
        end_at TIMESTAMPTZ NOT NULL,
        organizer TEXT NOT NULL,
        status TEXT NOT NULL,
        currency TEXT NOT NULL,
        commission_percentage INTEGER NOT NULL,
        commission_recipient TEXT NOT NULL,
        tier_ids TEXT[] NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS event_tiers (
        event_id TEXT NOT NULL REFERENCES events(id),
        tier_id TEXT NOT NULL,
        price NUMERIC(78, 0) NOT NULL,
        max_quantity INTEGER NOT NULL,
        sold_count INTEGER NOT NULL DEFAULT 0 CHECK (sold_count <= max_quantity),
        active BOOLEAN NOT NULL DEFAULT TRUE,
        position INTEGER NOT NULL,
        PRIMARY KEY(event_id, tier_id)
      );
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ticket_holdings (
        owner TEXT NOT NULL,
        token_id TEXT NOT NULL,
        event_id TEXT NOT NULL,
        tier_id TEXT NOT NULL,
        quantity INTEGER NOT NULL,
        PRIMARY KEY(owner, token_id)
      );
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS balances (
        owner TEXT NOT NULL,
        currency TEXT NOT NULL,
        pending NUMERIC(78, 0) NOT NULL DEFAULT 0,
        withdrawn NUMERIC(78, 0) NOT NULL DEFAULT 0,
        PRIMARY KEY(owner, currency)
      );
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS custody_accounts (
        identity TEXT NOT NULL,
        currency TEXT NOT NULL,
        balance NUMERIC(78, 0) NOT NULL DEFAULT 0 CHECK (balance >= 0),
        PRIMARY KEY(identity, currency)
      );
    `);

    await this.pool.query(`CREATE TABLE IF NOT EXISTS frozen_accounts (identity TEXT PRIMARY KEY);`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS nonces (
        account TEXT PRIMARY KEY,
        value NUMERIC(78, 0) NOT NULL
      );
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS payment_cooldowns (
        payer TEXT PRIMARY KEY,
        last_payment_at BIGINT NOT NULL
      );
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS payment_limits (
        currency TEXT PRIMARY KEY,
        min_payment NUMERIC(78, 0) NOT NULL,
        max_payment NUMERIC(78, 0) NOT NULL,
        verified_max_payment NUMERIC(78, 0) NOT NULL
      );
    `);
    await this.pool.query(`CREATE TABLE IF NOT EXISTS verified_identities (identity TEXT PRIMARY KEY);`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS platform_settings (
        id SMALLINT PRIMARY KEY DEFAULT 1 CHECK (id = 1),
        fee_percentage INTEGER NOT NULL,
        fee_recipient TEXT NOT NULL,
        trusted_verifier TEXT NOT NULL,
        paused BOOLEAN NOT NULL DEFAULT FALSE,
        collectible_base_uri TEXT NOT NULL,
        collectible_max_supply INTEGER NOT NULL,
        next_collectible_id INTEGER NOT NULL DEFAULT 0
      );
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS collectibles (
        token_id INTEGER PRIMARY KEY,
        owner TEXT NOT NULL,
        uri TEXT NOT NULL,
        minted_at TIMESTAMPTZ NOT NULL
      );
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS audit_log (
        id BIGSERIAL PRIMARY KEY,
        kind TEXT NOT NULL,
        at TIMESTAMPTZ NOT NULL,
        actor TEXT NOT NULL,
        details JSONB NOT NULL
      );
    `);

    await this.pool.query(`CREATE INDEX IF NOT EXISTS ticket_holdings_owner_idx ON ticket_holdings(owner);`);
    await this.pool.query(`CREATE INDEX IF NOT EXISTS collectibles_owner_idx ON collectibles(owner);`);

    const settings = this.defaults.settings;
    await this.pool.query(
      `
        INSERT INTO platform_settings (
          id, fee_percentage, fee_recipient, trusted_verifier, paused,
          collectible_base_uri, collectible_max_supply, next_collectible_id
        ) VALUES (1, $1, $2, $3, $4, $5, $6, $7)
        ON CONFLICT (id) DO NOTHING;
      `,
      [
        settings.feePercentage,
        settings.feeRecipient,
        settings.trustedVerifier,
        settings.paused,
        settings.collectibleBaseUri,
        settings.collectibleMaxSupply,
        settings.nextCollectibleId
      ]
    );

    for (const limits of this.defaults.paymentLimits) {
      await this.pool.query(
        `
          INSERT INTO payment_limits (currency, min_payment, max_payment, verified_max_payment)
          VALUES ($1, $2, $3, $4)
          ON CONFLICT (currency) DO NOTHING;
        `,
        [
          limits.currency,
          limits.minPayment.toString(),
          limits.maxPayment.toString(),
          limits.verifiedMaxPayment.toString()
        ]
      );
    }
  }

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN;");
      await client.query("SELECT pg_advisory_xact_lock($1);", [LEDGER_LOCK_KEY]);
      const result = await work(new PostgresLedgerView(client));
      await client.query("COMMIT;");
      return result;
    } catch (error) {
      await client.query("ROLLBACK;");
      throw error;
    } finally {
      client.release();
    }
  }

  async read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(new PostgresLedgerView(client));
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
