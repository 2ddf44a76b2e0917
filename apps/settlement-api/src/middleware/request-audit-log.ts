import { randomUUID } from "crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "pino";

function stringField(body: unknown, field: string): string | undefined {
  if (typeof body !== "object" || body === null || !(field in body)) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, field);
  return typeof value === "string" ? value : undefined;
}

/** One log line per action request; the request id is echoed back as `x-request-id`. */
export function requestAuditLogger(logger: Logger): RequestHandler {
  const log = logger.child({ component: "request-audit" });

  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = randomUUID();
    const startedAt = Date.now();

    res.setHeader("x-request-id", requestId);

    res.on("finish", () => {
      log.info(
        {
          requestId,
          method: req.method,
          route: req.originalUrl,
          eventId: typeof req.params.eventId === "string" ? req.params.eventId : undefined,
          account: stringField(req.body, "account"),
          ip: req.ip,
          statusCode: res.statusCode,
          durationMs: Date.now() - startedAt
        },
        "action request"
      );
    });

    next();
  };
}
