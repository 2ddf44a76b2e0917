import type { LedgerTransaction } from "@stagepay/db";
import type { Currency } from "@stagepay/shared-types";
import { ZERO_IDENTITY } from "./context.js";
import { TransferFailureError, ValidationError } from "./errors.js";

export interface TransferRequest {
  currency: Currency;
  from: string;
  to: string;
  amount: bigint;
}

/**
 * Transfer primitive for both settlement currencies. Funds live in custody
 * accounts inside the ledger store, so a transfer is part of the enclosing
 * transaction and disappears with it when a later step fails.
 */
export class CustodyLedger {
  async transfer(tx: LedgerTransaction, request: TransferRequest): Promise<void> {
    const { currency, from, to, amount } = request;
    if (amount < 0n) {
      throw new ValidationError("InvalidAmount", "Transfer amount cannot be negative");
    }
    if (to === ZERO_IDENTITY) {
      throw new ValidationError("InvalidRecipient", "Funds cannot be sent to the all-zero key");
    }
    if (amount === 0n || from === to) {
      return;
    }

    for (const identity of [from, to]) {
      if (await tx.isFrozen(identity)) {
        throw new TransferFailureError("AccountFrozen", `Account ${identity} is frozen`, from, to);
      }
    }

    const source = await tx.getCustodyAccount(from, currency);
    if (source.balance < amount) {
      throw new TransferFailureError(
        "InsufficientFunds",
        `Account ${from} holds ${source.balance} ${currency}, needs ${amount}`,
        from,
        to
      );
    }

    const destination = await tx.getCustodyAccount(to, currency);
    await tx.saveCustodyAccount({ ...source, balance: source.balance - amount });
    await tx.saveCustodyAccount({ ...destination, balance: destination.balance + amount });
  }

  async deposit(tx: LedgerTransaction, identity: string, currency: Currency, amount: bigint): Promise<bigint> {
    if (amount <= 0n) {
      throw new ValidationError("InvalidAmount", "Deposit amount must be positive");
    }
    const account = await tx.getCustodyAccount(identity, currency);
    const balance = account.balance + amount;
    await tx.saveCustodyAccount({ ...account, balance });
    return balance;
  }
}
