import { isLedgerError, type LedgerError, RateLimitError } from "@stagepay/core";
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "pino";

export function statusFor(error: LedgerError): number {
  switch (error.kind) {
    case "validation":
      return error.code.endsWith("NotFound") ? 404 : 400;
    case "authorization":
      return error.code === "Unauthorized" || error.code === "NotTokenOwner" ? 403 : 401;
    case "state-conflict":
      return 409;
    case "transfer-failure":
      return 402;
    case "rate-limit":
      return 429;
  }
}

/** Express 4 does not forward rejected handler promises; this does. */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (isLedgerError(err)) {
      if (err instanceof RateLimitError) {
        res.setHeader("Retry-After", String(err.retryAfterSeconds));
      }
      res.status(statusFor(err)).json({ error: err.message, code: err.code, kind: err.kind });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Invalid JSON body" });
      return;
    }

    logger.error({ err, route: req.originalUrl }, "unhandled request error");
    const message = err instanceof Error ? err.message : "Unknown error";
    res.status(500).json({ error: message });
  };
}
