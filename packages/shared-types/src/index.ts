export const CURRENCIES = ["native", "stable"] as const;

export type Currency = (typeof CURRENCIES)[number];

export type EventStatus = "draft" | "published" | "cancelled" | "completed";

export interface EventEntity {
  id: string;
  name: string;
  description: string;
  startAt: string;
  endAt: string;
  organizer: string;
  status: EventStatus;
  currency: Currency;
  commissionPercentage: number;
  commissionRecipient: string;
  tierIds: string[];
  createdAt: string;
}

export interface EventTier {
  eventId: string;
  tierId: string;
  /** Unit price in canonical (18-decimal) units. */
  price: bigint;
  maxQuantity: number;
  soldCount: number;
  active: boolean;
}

export interface CreateEventInput {
  id: string;
  name: string;
  description: string;
  startAt: string;
  endAt: string;
  tierIds: string[];
  prices: bigint[];
  maxQuantities: number[];
  currency: Currency;
  commissionPercentage: number;
  commissionRecipient: string;
  status?: Extract<EventStatus, "draft" | "published">;
}

export type EventTransition = "publish" | "cancel" | "complete" | "reactivate";

export interface TicketHolding {
  owner: string;
  tokenId: string;
  eventId: string;
  tierId: string;
  quantity: number;
}

export interface BalanceRecord {
  owner: string;
  currency: Currency;
  pending: bigint;
  withdrawn: bigint;
}

export interface CustodyAccount {
  identity: string;
  currency: Currency;
  balance: bigint;
}

export interface PaymentLimits {
  currency: Currency;
  minPayment: bigint;
  maxPayment: bigint;
  verifiedMaxPayment: bigint;
}

export interface PlatformSettings {
  feePercentage: number;
  feeRecipient: string;
  trustedVerifier: string;
  paused: boolean;
  collectibleBaseUri: string;
  collectibleMaxSupply: number;
  nextCollectibleId: number;
}

export interface Collectible {
  tokenId: number;
  owner: string;
  uri: string;
  mintedAt: string;
}

export type AuditKind =
  | "EventCreated"
  | "EventStatusChanged"
  | "TierPriceUpdated"
  | "TierActivationChanged"
  | "TicketIssued"
  | "PaymentProcessed"
  | "BalanceWithdrawn"
  | "VerificationStatusChanged"
  | "PaymentLimitsUpdated"
  | "FeePercentageUpdated"
  | "FeeRecipientUpdated"
  | "VerifierUpdated"
  | "NonceInvalidated"
  | "Paused"
  | "Unpaused"
  | "BaseUriChanged"
  | "FundsDeposited"
  | "AccountFrozen"
  | "AccountUnfrozen"
  | "TokenMinted"
  | "TokenBurned";

export type AuditDetails = Record<string, string | number | boolean | null>;

export interface AuditRecord {
  id: number;
  kind: AuditKind;
  at: string;
  actor: string;
  details: AuditDetails;
}

export type NewAuditRecord = Omit<AuditRecord, "id">;

export interface AuditQuery {
  afterId: number;
  limit: number;
}

export interface SettlementReceipt {
  payer: string;
  payee: string;
  currency: Currency;
  amount: bigint;
  commission: bigint;
  remainder: bigint;
  commissionRecipient: string;
  mode: "direct" | "deferred";
  settledAt: string;
}

export interface TicketReceipt {
  tokenId: string;
  eventId: string;
  tierId: string;
  recipient: string;
  soldCount: number;
  settlement: SettlementReceipt;
}

export interface WithdrawalReceipt {
  owner: string;
  nativeAmount: bigint;
  stableAmount: bigint;
  withdrawnAt: string;
}

export interface CollectibleReceipt {
  tokenId: number;
  owner: string;
  uri: string;
  tokenUri: string;
}
