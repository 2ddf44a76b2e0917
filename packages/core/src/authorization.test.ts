import { Keypair } from "@solana/web3.js";
import { MemoryLedgerStore } from "@stagepay/db";
import { beforeEach, describe, expect, it } from "vitest";
import {
  type AuthorizationRequest,
  AuthorizationVerifier,
  authorizationDigest,
  MAX_NONCE,
  type PayRecipientPayload,
  recoverSigner,
  signAuthorization
} from "./authorization.js";
import { ZERO_IDENTITY } from "./context.js";
import { ManualClock, newIdentity, START_SECONDS, testDefaults, testPolicy } from "./test-harness.js";

describe("AuthorizationVerifier", () => {
  let trusted: Keypair;
  let store: MemoryLedgerStore;
  let clock: ManualClock;
  let verifier: AuthorizationVerifier;
  let payload: Omit<PayRecipientPayload, "nonce">;

  beforeEach(() => {
    trusted = Keypair.generate();
    store = new MemoryLedgerStore(testDefaults({ trustedVerifier: trusted.publicKey.toBase58() }));
    clock = new ManualClock();
    verifier = new AuthorizationVerifier(testPolicy.domain, clock);
    payload = {
      type: "PayRecipient",
      account: newIdentity(),
      recipient: newIdentity(),
      amount: 5_000_000n,
      currency: "stable",
      deadline: START_SECONDS + 300
    };
  });

  function request(nonce: bigint, signer: Keypair = trusted): AuthorizationRequest {
    return {
      payload,
      envelope: signAuthorization(testPolicy.domain, { ...payload, nonce }, signer.secretKey)
    };
  }

  const consume = (req: AuthorizationRequest) => store.transaction((tx) => verifier.consume(tx, req));
  const nonceOf = (account: string) => store.read((reader) => reader.getNonce(account));

  it("consumes the current nonce for a trusted signature", async () => {
    await expect(consume(request(0n))).resolves.toBe(0n);
    expect(await nonceOf(payload.account)).toBe(1n);
  });

  it("rejects a replayed authorization", async () => {
    const first = request(0n);
    await consume(first);

    await expect(consume(first)).rejects.toMatchObject({ code: "InvalidAuthorization" });
    expect(await nonceOf(payload.account)).toBe(1n);
  });

  it("accepts up to and including the deadline second", async () => {
    clock.ms = payload.deadline * 1000 + 999;
    await expect(consume(request(0n))).resolves.toBe(0n);
  });

  it("rejects an authorization past its deadline", async () => {
    clock.ms = (payload.deadline + 1) * 1000;
    await expect(consume(request(0n))).rejects.toMatchObject({ code: "ExpiredAuthorization" });
  });

  it("does not burn the nonce when the signer is not trusted", async () => {
    await expect(consume(request(0n, Keypair.generate()))).rejects.toMatchObject({ code: "InvalidAuthorization" });
    expect(await nonceOf(payload.account)).toBe(0n);

    await expect(consume(request(0n))).resolves.toBe(0n);
  });

  it("rejects a payload that differs from what was signed", async () => {
    const signed = request(0n);
    payload = { ...payload, amount: payload.amount + 1n };

    await expect(consume({ ...signed, payload })).rejects.toMatchObject({ code: "InvalidAuthorization" });
  });

  it("rejects a stated nonce that is not the current one", async () => {
    await expect(consume({ ...request(0n), claimedNonce: 4n })).rejects.toMatchObject({
      code: "InvalidAuthorization"
    });
  });

  it("rejects everything once the nonce is revoked", async () => {
    await store.transaction((tx) => tx.setNonce(payload.account, MAX_NONCE));

    await expect(consume(request(MAX_NONCE))).rejects.toMatchObject({ code: "InvalidAuthorization" });
  });
});

// R = the identity point, S = 0: verifies for the all-zero key over any message.
const SMALL_ORDER_SIGNATURE = Buffer.from([1, ...new Array<number>(63).fill(0)]).toString("base64");

describe("AuthorizationVerifier without a configured verifier", () => {
  it("rejects envelopes claiming the all-zero key", async () => {
    const store = new MemoryLedgerStore(testDefaults({ trustedVerifier: ZERO_IDENTITY }));
    const verifier = new AuthorizationVerifier(testPolicy.domain, new ManualClock());
    const account = newIdentity();

    await expect(
      store.transaction((tx) =>
        verifier.consume(tx, {
          payload: {
            type: "PayRecipient",
            account,
            recipient: newIdentity(),
            amount: 5_000_000n,
            currency: "stable",
            deadline: START_SECONDS + 300
          },
          envelope: { signer: ZERO_IDENTITY, signature: SMALL_ORDER_SIGNATURE }
        })
      )
    ).rejects.toMatchObject({ code: "InvalidAuthorization" });
    expect(await store.read((reader) => reader.getNonce(account))).toBe(0n);
  });
});

describe("recoverSigner", () => {
  const signer = Keypair.generate();
  const payload: PayRecipientPayload = {
    type: "PayRecipient",
    account: signer.publicKey.toBase58(),
    recipient: signer.publicKey.toBase58(),
    amount: 1n,
    currency: "native",
    nonce: 0n,
    deadline: 0
  };
  const digest = authorizationDigest(testPolicy.domain, payload);

  it("returns the signer of a valid signature", () => {
    const envelope = signAuthorization(testPolicy.domain, payload, signer.secretKey);
    expect(envelope.signer).toBe(signer.publicKey.toBase58());
    expect(recoverSigner(digest, envelope)).toBe(signer.publicKey.toBase58());
  });

  it("returns null for a malformed envelope", () => {
    expect(recoverSigner(digest, { signer: "not-a-key", signature: "AAAA" })).toBeNull();
    expect(recoverSigner(digest, { signer: signer.publicKey.toBase58(), signature: "AAAA" })).toBeNull();
  });

  it("never recovers the all-zero key", () => {
    expect(recoverSigner(digest, { signer: ZERO_IDENTITY, signature: SMALL_ORDER_SIGNATURE })).toBeNull();
  });

  it("binds the signature to the domain", () => {
    const envelope = signAuthorization({ ...testPolicy.domain, chainId: "solana:mainnet" }, payload, signer.secretKey);
    expect(recoverSigner(digest, envelope)).toBeNull();
  });
});
