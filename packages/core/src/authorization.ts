import { PublicKey } from "@solana/web3.js";
import type { LedgerTransaction } from "@stagepay/db";
import type { Currency } from "@stagepay/shared-types";
import { createHash } from "crypto";
import nacl from "tweetnacl";
import { type AuthorizationDomain, type Clock, nowSeconds, ZERO_IDENTITY } from "./context.js";
import { AuthorizationError } from "./errors.js";

/** Nonce value that permanently revokes an account's authorizations. */
export const MAX_NONCE = (1n << 256n) - 1n;

export interface PayRecipientPayload {
  type: "PayRecipient";
  account: string;
  recipient: string;
  amount: bigint;
  currency: Currency;
  nonce: bigint;
  /** Unix seconds. */
  deadline: number;
}

export interface MintCollectiblePayload {
  type: "MintCollectible";
  account: string;
  recipient: string;
  uri: string;
  nonce: bigint;
  deadline: number;
}

export type AuthorizationPayload = PayRecipientPayload | MintCollectiblePayload;

export type UnsignedPayload<P extends AuthorizationPayload = AuthorizationPayload> = P extends AuthorizationPayload
  ? Omit<P, "nonce">
  : never;

export interface SignatureEnvelope {
  /** Base58 public key of the claimed signer. */
  signer: string;
  /** Base64 ed25519 signature over the authorization digest. */
  signature: string;
}

export interface AuthorizationRequest {
  payload: UnsignedPayload;
  envelope: SignatureEnvelope;
  /** Nonce the client signed over, when it states one. */
  claimedNonce?: bigint;
}

function sha256(...parts: Array<string | Uint8Array>): Buffer {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(part);
  }
  return hash.digest();
}

export function encodeDomain(domain: AuthorizationDomain): string {
  return JSON.stringify(["AuthorizationDomain", domain.name, domain.version, domain.chainId]);
}

export function encodePayload(payload: AuthorizationPayload): string {
  switch (payload.type) {
    case "PayRecipient":
      return JSON.stringify([
        payload.type,
        payload.account,
        payload.recipient,
        payload.amount.toString(),
        payload.currency,
        payload.nonce.toString(),
        payload.deadline
      ]);
    case "MintCollectible":
      return JSON.stringify([
        payload.type,
        payload.account,
        payload.recipient,
        payload.uri,
        payload.nonce.toString(),
        payload.deadline
      ]);
  }
}

export function authorizationDigest(domain: AuthorizationDomain, payload: AuthorizationPayload): Uint8Array {
  return sha256(sha256(encodeDomain(domain)), sha256(encodePayload(payload)));
}

export function signAuthorization(
  domain: AuthorizationDomain,
  payload: AuthorizationPayload,
  secretKey: Uint8Array
): SignatureEnvelope {
  const keyPair = nacl.sign.keyPair.fromSecretKey(secretKey);
  const signature = nacl.sign.detached(authorizationDigest(domain, payload), secretKey);
  return {
    signer: new PublicKey(keyPair.publicKey).toBase58(),
    signature: Buffer.from(signature).toString("base64")
  };
}

/**
 * Returns the envelope's signer when its signature verifies over `digest`,
 * otherwise null. The all-zero key is a small-order point that verifies
 * forged signatures, so it never counts as a signer.
 */
export function recoverSigner(digest: Uint8Array, envelope: SignatureEnvelope): string | null {
  let publicKey: Uint8Array;
  try {
    publicKey = new PublicKey(envelope.signer).toBytes();
  } catch {
    return null;
  }
  if (envelope.signer === ZERO_IDENTITY) {
    return null;
  }

  const signature = Buffer.from(envelope.signature, "base64");
  if (signature.length !== nacl.sign.signatureLength) {
    return null;
  }
  return nacl.sign.detached.verify(digest, signature, publicKey) ? envelope.signer : null;
}

function withNonce(payload: UnsignedPayload, nonce: bigint): AuthorizationPayload {
  switch (payload.type) {
    case "PayRecipient":
      return { ...payload, nonce };
    case "MintCollectible":
      return { ...payload, nonce };
  }
}

export class AuthorizationVerifier {
  constructor(
    private readonly domain: AuthorizationDomain,
    private readonly clock: Clock
  ) {}

  /**
   * Checks an authorization against the account's current nonce and the
   * trusted verifier, then consumes the nonce. The nonce only advances once
   * the signer matches; a forged or mis-signed request leaves it untouched.
   *
   * @returns the nonce that was consumed
   */
  async consume(tx: LedgerTransaction, request: AuthorizationRequest): Promise<bigint> {
    const { payload, envelope, claimedNonce } = request;
    if (nowSeconds(this.clock) > payload.deadline) {
      throw new AuthorizationError("ExpiredAuthorization", "Authorization deadline has passed");
    }

    const current = await tx.getNonce(payload.account);
    if (current === MAX_NONCE) {
      throw new AuthorizationError("InvalidAuthorization", `Authorizations for ${payload.account} are revoked`);
    }
    if (claimedNonce !== undefined && claimedNonce !== current) {
      throw new AuthorizationError("InvalidAuthorization", "Authorization nonce is stale");
    }

    const settings = await tx.getSettings();
    if (settings.trustedVerifier === ZERO_IDENTITY) {
      throw new AuthorizationError("InvalidAuthorization", "No trusted verifier is configured");
    }
    const digest = authorizationDigest(this.domain, withNonce(payload, current));
    const signer = recoverSigner(digest, envelope);
    if (signer === null || signer !== settings.trustedVerifier) {
      throw new AuthorizationError("InvalidAuthorization", "Authorization was not signed by the trusted verifier");
    }

    await tx.setNonce(payload.account, current + 1n);
    return current;
  }
}
