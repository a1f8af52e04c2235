/**
 * Standalone runtime.
 *
 * Wires config, logger, database, audit log and the migration-from syncer,
 * and registers the syncer on an event dispatcher.
 *
 * Usage:
 *   import { startHandoff } from "./standalone.js";
 *   const hub = startHandoff();                 // load config from file
 *   await hub.dispatcher.dispatch(event);
 *   hub.stop();
 */

import { loadHandoffConfig, type HandoffConfig } from "./config.js";
import { createHandoffLogger } from "./logger.js";
import { createDatabase, type HandoffDatabase } from "./db/index.js";
import { createAuditLog, type AuditLog } from "./audit/log.js";
import { createMigrationFromSyncer, type MigrationFromSyncer } from "./migration/syncer.js";
import { createEventDispatcher, type EventDispatcher } from "./migration/dispatcher.js";
import { MIGRATION_FROM_EVENT } from "./migration/types.js";
import type { Logger } from "./types.js";

export interface HandoffInstance {
  config: HandoffConfig;
  logger: Logger;
  db: HandoffDatabase;
  auditLog: AuditLog;
  syncer: MigrationFromSyncer;
  dispatcher: EventDispatcher;
  /** Close the database. */
  stop: () => void;
}

export interface StartHandoffOptions {
  /** Config override. If not provided, loaded from file. */
  config?: HandoffConfig;
  /** Logger override. If not provided, a Winston logger at config.logLevel. */
  logger?: Logger;
  /** Database override, e.g. a client for a remote hub store. */
  db?: HandoffDatabase;
}

export function startHandoff(opts?: StartHandoffOptions): HandoffInstance {
  const config = opts?.config ?? loadHandoffConfig();
  const logger = opts?.logger ?? createHandoffLogger({ level: config.logLevel });

  const db = opts?.db ?? createDatabase(config);
  db.migrate();
  const auditLog = createAuditLog({ db, logger });

  const syncer = createMigrationFromSyncer({
    db,
    auditLog,
    logger,
    hubName: config.hubName,
    pollIntervalMs: config.detach.pollIntervalMs,
    detachTimeoutMs: config.detach.timeoutMs,
  });

  const dispatcher = createEventDispatcher(logger);
  dispatcher.register(MIGRATION_FROM_EVENT, syncer);

  logger.info(`[handoff] Hub ${config.hubName} ready (${db.backend} store)`);

  return {
    config,
    logger,
    db,
    auditLog,
    syncer,
    dispatcher,
    stop: () => db.close(),
  };
}
