import { type CallerContext, callerContext, type Role } from "@stagepay/core";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { AccountSignatureVerifier } from "./account-signature.js";

export interface ApiKeys {
  adminApiKey: string;
  organizerApiKey: string;
}

const callers = new WeakMap<Request, CallerContext>();

const ADMIN_IDENTITY = "admin-console";

/**
 * Resolves `x-api-key` to a role and `x-caller-identity` to the caller's
 * public key. Only requests whose role is in `accepted` get through. A claimed
 * identity only counts when that key signed the request.
 */
export function callerAuth(keys: ApiKeys, accepted: Role[], signatures: AccountSignatureVerifier): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = req.header("x-api-key");
    const role: Role | null =
      apiKey === keys.adminApiKey ? "admin" : apiKey === keys.organizerApiKey ? "organizer" : null;

    if (!role || !accepted.includes(role)) {
      res.status(401).json({ error: "Unauthorized", code: "Unauthorized" });
      return;
    }

    const identity = req.header("x-caller-identity");
    if (!identity && role === "organizer") {
      res.status(401).json({ error: "x-caller-identity header is required", code: "Unauthorized" });
      return;
    }
    if (identity && !signatures.verify(req, identity)) {
      res.status(401).json({ error: "Request must be signed by x-caller-identity", code: "Unauthorized" });
      return;
    }

    callers.set(req, callerContext(identity ?? ADMIN_IDENTITY, [role]));
    next();
  };
}

export function callerOf(req: Request): CallerContext {
  const caller = callers.get(req);
  if (!caller) {
    throw new Error("callerAuth middleware did not run for this route");
  }
  return caller;
}
