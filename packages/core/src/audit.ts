import type { LedgerTransaction } from "@stagepay/db";
import type { AuditDetails, AuditKind, AuditRecord } from "@stagepay/shared-types";

export function recordAudit(
  tx: LedgerTransaction,
  kind: AuditKind,
  actor: string,
  details: AuditDetails,
  atMs: number
): Promise<AuditRecord> {
  return tx.appendAudit({
    kind,
    actor,
    details,
    at: new Date(atMs).toISOString()
  });
}
