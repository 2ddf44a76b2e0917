import type { Engine } from "@stagepay/core";
import cors from "cors";
import express from "express";
import type { Logger } from "pino";
import {
  AccountSignatureVerifier,
  captureRawBody,
  requireAccountSignature,
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER
} from "./middleware/account-signature.js";
import { type ApiKeys, callerAuth } from "./middleware/caller-auth.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { createIpRateLimiter } from "./middleware/rate-limit.js";
import { requestAuditLogger } from "./middleware/request-audit-log.js";
import { createActionsRouter } from "./routes/actions.js";
import { createAdminRouter } from "./routes/admin.js";
import { createOrganizerRouter } from "./routes/organizer.js";
import { createVerifierRouter } from "./routes/verifier.js";

export interface AppOptions {
  engine: Engine;
  logger: Logger;
  keys: ApiKeys;
  rateLimit: { windowMs: number; maxRequests: number };
  /** Accepted drift of signed request timestamps; five minutes when unset. */
  signatureMaxSkewMs?: number;
}

export function createApp(options: AppOptions): express.Express {
  const { engine, logger, keys } = options;
  const app = express();
  const signatures = new AccountSignatureVerifier({
    clock: engine.clock,
    maxSkewMs: options.signatureMaxSkewMs ?? 5 * 60_000
  });

  // Amounts are bigints; they go over the wire as decimal strings.
  app.set("json replacer", (_key: string, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );

  app.use(
    cors({
      origin: "*",
      methods: ["GET", "POST", "PUT", "PATCH", "OPTIONS"],
      allowedHeaders: ["Content-Type", "x-api-key", "x-caller-identity", SIGNATURE_HEADER, TIMESTAMP_HEADER]
    })
  );
  app.use(express.json({ verify: captureRawBody }));

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      service: "settlement-api",
      storeMode: engine.store.mode,
      timestamp: new Date(engine.clock.now()).toISOString()
    });
  });

  app.use(
    "/api/actions",
    createIpRateLimiter({
      windowMs: options.rateLimit.windowMs,
      maxRequests: options.rateLimit.maxRequests,
      now: () => engine.clock.now()
    }),
    requestAuditLogger(logger),
    requireAccountSignature(signatures),
    createActionsRouter(engine)
  );
  app.use("/api/organizer", callerAuth(keys, ["organizer", "admin"], signatures), createOrganizerRouter(engine));
  app.use("/api/admin", callerAuth(keys, ["admin"], signatures), createAdminRouter(engine));
  app.use("/api/verifier", createVerifierRouter(engine));

  app.use(createErrorHandler(logger));

  return app;
}
