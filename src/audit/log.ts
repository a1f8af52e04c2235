/**
 * Audit Log — thin wrapper over the database audit store.
 *
 * Detachment runs outlive the call that started them, so their outcomes land
 * here as well as in the log. RED entries are also logged as warnings.
 */

import type { AuditEntry, Logger } from "../types.js";
import type { HandoffDatabase, AuditFilter } from "../db/index.js";

export interface AuditLog {
  append(entry: AuditEntry): void;
  query(filter: AuditFilter): AuditEntry[];
  recent(limit?: number): AuditEntry[];
  count(): number;
}

interface AuditLogParams {
  db: HandoffDatabase;
  logger: Logger;
}

export function createAuditLog(params: AuditLogParams): AuditLog {
  const { db, logger } = params;

  function append(entry: AuditEntry): void {
    db.audit.insert(entry);

    if (entry.level === "RED") {
      const subject = entry.cluster ? ` (${entry.cluster})` : "";
      logger.warn(`[handoff:audit] RED: ${entry.action}${subject}: ${entry.detail}`);
    }
  }

  function query(filter: AuditFilter): AuditEntry[] {
    return db.audit.query(filter);
  }

  function recent(limit = 50): AuditEntry[] {
    return db.audit.query({ limit });
  }

  function count(): number {
    return db.audit.count();
  }

  return { append, query, recent, count };
}
