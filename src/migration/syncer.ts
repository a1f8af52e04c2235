/**
 * Migration-from syncer — runs on the source hub for each migration-from
 * instruction.
 *
 *   decode → credentials → agent config → annotate → detachment wait
 *
 * Two result channels:
 * - preparation (everything up to annotation) resolves or rejects with the
 *   call, so the sender learns whether the handoff was set up;
 * - the detachment wait resolves later to a DetachmentOutcome that is also
 *   logged and audited, since the sender may be long gone by then.
 *
 * Every stage before the wait is idempotent. Redelivering the same
 * instruction is the recovery path for any failure.
 */

import type { Logger } from "../types.js";
import type { HandoffDatabase } from "../db/index.js";
import type { AuditLog } from "../audit/log.js";
import { uniqueId, errorMessage } from "../utils/id.js";
import { decodeMigrationInstruction } from "./decoder.js";
import { propagateCredentials } from "./credentials.js";
import { provisionTargetConfig } from "./target-config.js";
import { annotateClusters } from "./annotator.js";
import { confirmDetachment } from "./detach.js";
import { MigrationStageError } from "./errors.js";
import type {
  DetachTick,
  DetachmentOutcome,
  MigrationInstruction,
  MigrationRun,
  MigrationStage,
  PrepareResult,
} from "./types.js";

export interface MigrationFromSyncerConfig {
  db: HandoffDatabase;
  auditLog: AuditLog;
  logger: Logger;
  /** Recorded on audit entries. */
  hubName: string;
  /** Delay between detachment passes (ms). */
  pollIntervalMs?: number;
  /** Upper bound on the detachment wait. null waits until cancelled. */
  detachTimeoutMs?: number | null;
}

export interface SyncOptions {
  /** Cancels the detachment wait. Preparation is not interrupted. */
  signal?: AbortSignal;
  /** Called after every detachment pass, after the pass is audited. */
  onTick?: (tick: DetachTick) => void;
}

export interface MigrationFromSyncer {
  /**
   * Decode the payload and run every stage up to annotation.
   *
   * @throws DecodeError for a malformed payload
   * @throws MigrationStageError for a store failure, naming the stage
   */
  prepare(payload: Uint8Array | string): Promise<PrepareResult>;

  /** Prepare, then start the detachment wait without awaiting it. */
  sync(payload: Uint8Array | string, opts?: SyncOptions): Promise<MigrationRun>;

  /**
   * Event-handler form: prepare and wait for detachment to end.
   * Only preparation failures reject; detachment outcomes are logged and audited.
   */
  handle(payload: Uint8Array | string, signal?: AbortSignal): Promise<DetachmentOutcome>;
}

export function createMigrationFromSyncer(config: MigrationFromSyncerConfig): MigrationFromSyncer {
  const { db, auditLog, logger, hubName, pollIntervalMs } = config;
  const detachTimeoutMs = config.detachTimeoutMs ?? null;
  const { secrets, agentConfigs, managedClusters } = db.resources;

  function audit(
    action: string,
    level: "GREEN" | "YELLOW" | "RED",
    detail: string,
    extra?: { cluster?: string; result?: string; duration?: number },
  ): void {
    auditLog.append({
      id: uniqueId("audit"),
      timestamp: Date.now(),
      hub: hubName,
      action,
      level,
      detail,
      ...extra,
    });
  }

  async function stage<T>(name: MigrationStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new MigrationStageError(name, err);
    }
  }

  async function prepare(payload: Uint8Array | string): Promise<PrepareResult> {
    const startedAt = Date.now();
    let instruction: MigrationInstruction;

    try {
      instruction = decodeMigrationInstruction(payload);
    } catch (err) {
      logger.error(`[handoff:migration] Rejected instruction: ${errorMessage(err)}`);
      audit("migration.rejected", "RED", errorMessage(err));
      throw err;
    }

    const { bootstrapCredential, targetConfig, clusterNames } = instruction;
    const configName = targetConfig.metadata.name;
    logger.info(
      `[handoff:migration] Preparing handoff of ${clusterNames.length} cluster(s) via agent config ${configName}`,
    );

    try {
      const credentials = await stage("credentials", () =>
        propagateCredentials(secrets, bootstrapCredential, logger));

      const provisioned = await stage("config", () =>
        provisionTargetConfig(agentConfigs, targetConfig, bootstrapCredential, logger));

      const { annotated, skipped } = await stage("annotate", () =>
        annotateClusters(managedClusters, clusterNames, configName, logger));

      audit(
        "migration.prepared",
        "GREEN",
        `${clusterNames.length} cluster(s) migrating to agent config ${configName}`,
        { result: `annotated=${annotated.length} skipped=${skipped.length}`, duration: Date.now() - startedAt },
      );

      return {
        instruction,
        credentials,
        configCreated: provisioned.created,
        annotated,
        skipped,
      };
    } catch (err) {
      logger.error(`[handoff:migration] Preparation failed: ${errorMessage(err)}`);
      audit("migration.prepare_failed", "RED", errorMessage(err), { duration: Date.now() - startedAt });
      throw err;
    }
  }

  function recordOutcome(outcome: DetachmentOutcome, startedAt: number): void {
    const duration = Date.now() - startedAt;

    switch (outcome.status) {
      case "detached":
        logger.info(
          `[handoff:migration] Detachment confirmed after ${outcome.ticks} tick(s), deleted: [${outcome.deleted.join(", ")}]`,
        );
        audit("migration.detached", "GREEN", `all clusters detached after ${outcome.ticks} tick(s)`, {
          result: outcome.deleted.join(","),
          duration,
        });
        break;
      case "cancelled":
        logger.warn(`[handoff:migration] Detachment wait cancelled after ${outcome.ticks} tick(s)`);
        audit("migration.detach_cancelled", "YELLOW", `cancelled after ${outcome.ticks} tick(s)`, { duration });
        break;
      case "timed-out":
        logger.warn(`[handoff:migration] Detachment wait timed out after ${outcome.timeoutMs}ms`);
        audit("migration.detach_timed_out", "YELLOW", `timed out after ${outcome.timeoutMs}ms`, { duration });
        break;
      case "failed":
        logger.error(`[handoff:migration] Failed to detach managed clusters: ${outcome.error.message}`);
        audit("migration.detach_failed", "RED", outcome.error.message, { duration });
        break;
    }
  }

  async function sync(payload: Uint8Array | string, opts?: SyncOptions): Promise<MigrationRun> {
    const prepared = await prepare(payload);
    const startedAt = Date.now();

    const detachment = confirmDetachment(managedClusters, prepared.instruction.clusterNames, {
      logger,
      intervalMs: pollIntervalMs,
      signal: opts?.signal,
      timeoutMs: detachTimeoutMs,
      onTick: (tick) => {
        for (const cluster of tick.deleted) {
          audit("migration.cluster_detached", "GREEN", `deleted on tick ${tick.tick}`, { cluster });
        }
        opts?.onTick?.(tick);
      },
    }).then((outcome) => {
      try {
        recordOutcome(outcome, startedAt);
      } catch (err) {
        logger.error(`[handoff:migration] Failed to record detachment outcome: ${errorMessage(err)}`);
      }
      return outcome;
    });

    return { prepared, detachment };
  }

  async function handle(payload: Uint8Array | string, signal?: AbortSignal): Promise<DetachmentOutcome> {
    const run = await sync(payload, { signal });
    return run.detachment;
  }

  return { prepare, sync, handle };
}
