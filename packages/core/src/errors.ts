/**
 * Ledger errors
 *
 * Every failure an engine operation can report. Each error is terminal for
 * the operation that raised it: it is thrown out of the store transaction,
 * which discards every write the operation staged.
 */

export type ErrorKind =
  | "validation"
  | "authorization"
  | "state-conflict"
  | "transfer-failure"
  | "rate-limit";

export type ValidationCode =
  | "InvalidRecipient"
  | "InvalidAmount"
  | "InvalidCommission"
  | "PriceOutOfRange"
  | "InvalidSupply"
  | "InvalidTierCount"
  | "TierArrayMismatch"
  | "DuplicateTier"
  | "InvalidEventDetails"
  | "InvalidSchedule"
  | "InvalidLimits"
  | "FeeTooHigh"
  | "InvalidCurrency"
  | "InvalidUri"
  | "AmountTooSmallAfterScaling"
  | "IncorrectPayment"
  | "BelowMinimum"
  | "AboveMaximum"
  | "EventNotFound"
  | "TierNotFound"
  | "TokenNotFound";

export type AuthorizationCode =
  | "ExpiredAuthorization"
  | "InvalidAuthorization"
  | "Unauthorized"
  | "NotTokenOwner";

export type StateConflictCode =
  | "EventAlreadyExists"
  | "EventNotActive"
  | "TierNotActive"
  | "TierSoldOut"
  | "InvalidTransition"
  | "VerificationUnchanged"
  | "Paused"
  | "NotPaused"
  | "SupplyExhausted"
  | "NothingToWithdraw";

export type TransferFailureCode = "InsufficientFunds" | "AccountFrozen";

export type RateLimitCode = "RateLimited";

export type ErrorCode =
  | ValidationCode
  | AuthorizationCode
  | StateConflictCode
  | TransferFailureCode
  | RateLimitCode;

/**
 * Base error for every engine failure
 */
export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = "LedgerError";
    Object.setPrototypeOf(this, LedgerError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message
    };
  }
}

/**
 * Malformed or out-of-range input; raised before any state is touched
 */
export class ValidationError extends LedgerError {
  constructor(code: ValidationCode, message: string) {
    super(message, "validation", code);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Bad signature, expired deadline, stale nonce or an unprivileged caller
 */
export class AuthorizationError extends LedgerError {
  constructor(code: AuthorizationCode, message: string) {
    super(message, "authorization", code);
    this.name = "AuthorizationError";
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * The request is well-formed but the current state forbids it
 */
export class StateConflictError extends LedgerError {
  constructor(code: StateConflictCode, message: string) {
    super(message, "state-conflict", code);
    this.name = "StateConflictError";
    Object.setPrototypeOf(this, StateConflictError.prototype);
  }
}

/**
 * A transfer between custody accounts did not go through
 */
export class TransferFailureError extends LedgerError {
  constructor(
    code: TransferFailureCode,
    message: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(message, "transfer-failure", code);
    this.name = "TransferFailureError";
    Object.setPrototypeOf(this, TransferFailureError.prototype);
  }
}

/**
 * The payer settled too recently
 */
export class RateLimitError extends LedgerError {
  constructor(
    public readonly payer: string,
    public readonly retryAfterSeconds: number
  ) {
    super(`Payer ${payer} must wait ${retryAfterSeconds}s before the next payment`, "rate-limit", "RateLimited");
    this.name = "RateLimitError";
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
