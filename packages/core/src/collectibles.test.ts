import { beforeEach, describe, expect, it } from "vitest";
import type { MintCollectibleInput } from "./collectibles.js";
import { callerContext } from "./context.js";
import { createHarness, type Harness, newIdentity, START_SECONDS } from "./test-harness.js";

describe("CollectibleRegistry", () => {
  let h: Harness;
  let collector: string;

  beforeEach(() => {
    h = createHarness({ collectibleMaxSupply: 2 });
    collector = newIdentity();
  });

  async function signedMint(uri: string, recipient = collector): Promise<MintCollectibleInput> {
    const deadline = START_SECONDS + 600;
    const nonce = await h.engine.queries.getNonce(recipient);
    const authorization = h.sign({ type: "MintCollectible", account: recipient, recipient, uri, nonce, deadline });
    return { recipient, uri, deadline, authorization };
  }

  it("mints sequential token ids", async () => {
    const first = await h.engine.collectibles.mintCollectible(await signedMint("gala/1.json"));
    const second = await h.engine.collectibles.mintCollectible(await signedMint("gala/2.json"));

    expect(first).toEqual({
      tokenId: 0,
      owner: collector,
      uri: "gala/1.json",
      tokenUri: "https://collectibles.test/gala/1.json"
    });
    expect(second.tokenId).toBe(1);
    expect(await h.engine.queries.getNonce(collector)).toBe(2n);
  });

  it("stops at the supply cap without consuming the nonce", async () => {
    await h.engine.collectibles.mintCollectible(await signedMint("a.json"));
    await h.engine.collectibles.mintCollectible(await signedMint("b.json"));

    await expect(h.engine.collectibles.mintCollectible(await signedMint("c.json"))).rejects.toMatchObject({
      code: "SupplyExhausted"
    });
    expect(await h.engine.queries.getNonce(collector)).toBe(2n);
  });

  it("only lets the owner burn a token", async () => {
    const { tokenId } = await h.engine.collectibles.mintCollectible(await signedMint("a.json"));

    await expect(h.engine.collectibles.burnCollectible(callerContext(newIdentity()), tokenId)).rejects.toMatchObject({
      code: "NotTokenOwner"
    });

    await h.engine.collectibles.burnCollectible(callerContext(collector), tokenId);
    await expect(h.engine.collectibles.getCollectible(tokenId)).rejects.toMatchObject({ code: "TokenNotFound" });
  });

  it("resolves token uris against the current base uri", async () => {
    const { tokenId } = await h.engine.collectibles.mintCollectible(await signedMint("a.json"));
    await h.engine.admin.setBaseUri(h.admin, "ipfs://stagepay/");

    expect(await h.engine.collectibles.tokenUri(tokenId)).toBe("ipfs://stagepay/a.json");
  });

  it("rejects mints that the verifier did not sign", async () => {
    const input = await signedMint("a.json");
    await expect(
      h.engine.collectibles.mintCollectible({ ...input, uri: "b.json" })
    ).rejects.toMatchObject({ code: "InvalidAuthorization" });
  });
});
