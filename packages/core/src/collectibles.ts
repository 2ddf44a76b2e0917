import type { LedgerStore } from "@stagepay/db";
import type { Collectible, CollectibleReceipt } from "@stagepay/shared-types";
import type { Logger } from "pino";
import { recordAudit } from "./audit.js";
import type { AuthorizationVerifier, SignatureEnvelope } from "./authorization.js";
import { assertIdentity, type CallerContext, type Clock } from "./context.js";
import { AuthorizationError, StateConflictError, ValidationError } from "./errors.js";

export interface MintCollectibleInput {
  recipient: string;
  uri: string;
  deadline: number;
  nonce?: bigint;
  authorization: SignatureEnvelope;
}

interface CollectibleDeps {
  store: LedgerStore;
  clock: Clock;
  verifier: AuthorizationVerifier;
  logger: Logger;
}

export class CollectibleRegistry {
  private readonly logger: Logger;

  constructor(private readonly deps: CollectibleDeps) {
    this.logger = deps.logger.child({ component: "collectibles" });
  }

  async mintCollectible(input: MintCollectibleInput): Promise<CollectibleReceipt> {
    const now = this.deps.clock.now();
    const receipt = await this.deps.store.transaction(async (tx) => {
      const settings = await tx.getSettings();
      if (settings.paused) {
        throw new StateConflictError("Paused", "Minting is paused");
      }
      assertIdentity(input.recipient, "recipient");
      if (input.uri.length === 0) {
        throw new ValidationError("InvalidUri", "Collectible uri is required");
      }

      await this.deps.verifier.consume(tx, {
        payload: {
          type: "MintCollectible",
          account: input.recipient,
          recipient: input.recipient,
          uri: input.uri,
          deadline: input.deadline
        },
        envelope: input.authorization,
        claimedNonce: input.nonce
      });

      if (settings.nextCollectibleId >= settings.collectibleMaxSupply) {
        throw new StateConflictError("SupplyExhausted", `All ${settings.collectibleMaxSupply} collectibles are minted`);
      }

      const tokenId = settings.nextCollectibleId;
      await tx.saveSettings({ ...settings, nextCollectibleId: tokenId + 1 });
      await tx.saveCollectible({
        tokenId,
        owner: input.recipient,
        uri: input.uri,
        mintedAt: new Date(now).toISOString()
      });
      await recordAudit(tx, "TokenMinted", input.recipient, { tokenId, uri: input.uri }, now);

      return { tokenId, owner: input.recipient, uri: input.uri, tokenUri: settings.collectibleBaseUri + input.uri };
    });

    this.logger.info({ tokenId: receipt.tokenId, owner: receipt.owner }, "collectible minted");
    return receipt;
  }

  async burnCollectible(ctx: CallerContext, tokenId: number): Promise<void> {
    const now = this.deps.clock.now();
    await this.deps.store.transaction(async (tx) => {
      const collectible = await tx.getCollectible(tokenId);
      if (!collectible) {
        throw new ValidationError("TokenNotFound", `Collectible ${tokenId} not found`);
      }
      if (collectible.owner !== ctx.identity) {
        throw new AuthorizationError("NotTokenOwner", `Caller ${ctx.identity} does not own collectible ${tokenId}`);
      }
      await tx.deleteCollectible(tokenId);
      await recordAudit(tx, "TokenBurned", ctx.identity, { tokenId }, now);
    });
    this.logger.info({ tokenId, owner: ctx.identity }, "collectible burned");
  }

  async getCollectible(tokenId: number): Promise<Collectible> {
    const collectible = await this.deps.store.read((reader) => reader.getCollectible(tokenId));
    if (!collectible) {
      throw new ValidationError("TokenNotFound", `Collectible ${tokenId} not found`);
    }
    return collectible;
  }

  async tokenUri(tokenId: number): Promise<string> {
    return this.deps.store.read(async (reader) => {
      const collectible = await reader.getCollectible(tokenId);
      if (!collectible) {
        throw new ValidationError("TokenNotFound", `Collectible ${tokenId} not found`);
      }
      const settings = await reader.getSettings();
      return settings.collectibleBaseUri + collectible.uri;
    });
  }
}
