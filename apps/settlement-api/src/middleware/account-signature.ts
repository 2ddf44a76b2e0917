import { PublicKey } from "@solana/web3.js";
import { type Clock, isValidIdentity, ZERO_IDENTITY } from "@stagepay/core";
import { createHash } from "crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { IncomingMessage, ServerResponse } from "http";
import nacl from "tweetnacl";

export const SIGNATURE_HEADER = "x-account-signature";
export const TIMESTAMP_HEADER = "x-account-timestamp";

export interface SignedRequestParts {
  method: string;
  /** Path and query exactly as requested, e.g. `/api/actions/payments`. */
  path: string;
  /** Epoch milliseconds. */
  timestamp: number;
  body: string | Uint8Array;
}

const rawBodies = new WeakMap<IncomingMessage, Buffer>();

/** `verify` hook for `express.json` that keeps the bytes the client signed. */
export function captureRawBody(req: IncomingMessage, _res: ServerResponse, buf: Buffer): void {
  rawBodies.set(req, buf);
}

export function signedRequestMessage(parts: SignedRequestParts): Buffer {
  const bodyHash = createHash("sha256").update(parts.body).digest("hex");
  return Buffer.from(
    ["StagePay request", parts.method.toUpperCase(), parts.path, String(parts.timestamp), bodyHash].join("\n")
  );
}

/** Client side of the scheme: a base64 ed25519 signature for `x-account-signature`. */
export function signAccountRequest(secretKey: Uint8Array, parts: SignedRequestParts): string {
  return Buffer.from(nacl.sign.detached(signedRequestMessage(parts), secretKey)).toString("base64");
}

export interface AccountSignatureOptions {
  clock: Clock;
  /** How far `x-account-timestamp` may drift from the server clock. */
  maxSkewMs: number;
}

/**
 * Proves that a request was signed by the wallet it acts for. Each signed
 * request is accepted once; a replay within the skew window is refused.
 */
export class AccountSignatureVerifier {
  private readonly seen = new Map<string, number>();

  constructor(private readonly options: AccountSignatureOptions) {}

  verify(req: Request, account: string): boolean {
    const signature = req.header(SIGNATURE_HEADER);
    const timestamp = Number(req.header(TIMESTAMP_HEADER));
    if (!signature || !Number.isSafeInteger(timestamp)) {
      return false;
    }
    if (!isValidIdentity(account) || account === ZERO_IDENTITY) {
      return false;
    }

    const now = this.options.clock.now();
    if (Math.abs(now - timestamp) > this.options.maxSkewMs) {
      return false;
    }

    const signatureBytes = Buffer.from(signature, "base64");
    if (signatureBytes.length !== nacl.sign.signatureLength) {
      return false;
    }

    const message = signedRequestMessage({
      method: req.method,
      path: req.originalUrl,
      timestamp,
      body: rawBodies.get(req) ?? ""
    });
    if (!nacl.sign.detached.verify(message, signatureBytes, new PublicKey(account).toBytes())) {
      return false;
    }

    this.forgetExpired(now);
    const replayKey = createHash("sha256").update(account).update(message).digest("hex");
    if (this.seen.has(replayKey)) {
      return false;
    }
    this.seen.set(replayKey, timestamp + this.options.maxSkewMs);
    return true;
  }

  private forgetExpired(now: number): void {
    for (const [key, expiresAt] of this.seen) {
      if (expiresAt < now) {
        this.seen.delete(key);
      }
    }
  }
}

/** Buyer-facing routes act for `account` in the body; its wallet must have signed the request. */
export function requireAccountSignature(verifier: AccountSignatureVerifier): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const body: unknown = req.body;
    const account = typeof body === "object" && body !== null ? Reflect.get(body, "account") : undefined;

    if (typeof account !== "string" || !verifier.verify(req, account)) {
      res.status(401).json({ error: "Request must be signed by the account it acts for", code: "Unauthorized" });
      return;
    }
    next();
  };
}
