/**
 * Audit service — append-only log of configuration changes and
 * terminal delivery failures.
 */

import { randomUUID } from "crypto";
import { auditLog, type Database } from "../db/index.js";

export type AuditAction =
  | "bridge_config.saved"
  | "bridge_config.deleted"
  | "delivery.failed";

export interface AuditEntry {
  tenantId: string;
  action: AuditAction;
  targetType: "bridge_config" | "webhook";
  targetId: string;
  metadata?: Record<string, unknown>;
}

export type AuditRecorder = (entry: AuditEntry) => Promise<void>;

export function createAuditRecorder(db: Database): AuditRecorder {
  return async (entry) => {
    await db.insert(auditLog).values({
      id: randomUUID(),
      tenantId: entry.tenantId,
      action: entry.action,
      targetType: entry.targetType,
      targetId: entry.targetId,
      metadata: entry.metadata ?? null,
      createdAt: new Date().toISOString(),
    });
  };
}
