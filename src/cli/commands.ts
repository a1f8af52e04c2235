/**
 * CLI command implementations. Each takes a running hub and its arguments and
 * returns an exit code; index.ts owns process state.
 */

import fs from "node:fs";
import type { HandoffInstance } from "../standalone.js";
import { createMigrationFromSyncer } from "../migration/syncer.js";
import {
  ANNOTATION_AGENT_CONFIG,
  ANNOTATION_MIGRATING,
  CONDITION_AVAILABLE,
} from "../migration/types.js";
import type { ManagedCluster } from "../types.js";

/** Where command output goes. console in the binary, a buffer in tests. */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export interface MigrateFromArgs {
  file: string;
  /** undefined: flag absent, use the configured bound. null: --timeout 0, no bound. */
  timeoutMs: number | null | undefined;
  intervalMs: number | null;
}

function parseCount(flag: string, raw: string | undefined): number {
  const value = raw === undefined ? NaN : Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${flag} expects a non-negative integer, got "${raw ?? ""}"`);
  }
  return value;
}

export function parseMigrateFromArgs(args: string[]): MigrateFromArgs {
  let file: string | undefined;
  let timeoutMs: number | null | undefined;
  let intervalMs: number | null = null;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--timeout") {
      timeoutMs = parseCount("--timeout", args[++i]) || null;
    } else if (args[i] === "--interval") {
      intervalMs = parseCount("--interval", args[++i]);
    } else if (!file) {
      file = args[i];
    } else {
      throw new Error(`unexpected argument "${args[i]}"`);
    }
  }

  if (!file) {
    throw new Error("Usage: handoff migrate-from <payload.json> [--timeout <ms>] [--interval <ms>]");
  }
  return { file, timeoutMs, intervalMs };
}

/**
 * Run one migration-from instruction read from a file, waiting for detachment.
 * Exit code 0 only when every cluster ends detached.
 */
export async function cmdMigrateFrom(
  hub: HandoffInstance,
  args: string[],
  out: Output,
  signal?: AbortSignal,
): Promise<number> {
  const parsed = parseMigrateFromArgs(args);
  const payload = fs.readFileSync(parsed.file);

  // Flags override the configured wait
  const syncer = parsed.timeoutMs === undefined && parsed.intervalMs === null
    ? hub.syncer
    : createMigrationFromSyncer({
        db: hub.db,
        auditLog: hub.auditLog,
        logger: hub.logger,
        hubName: hub.config.hubName,
        pollIntervalMs: parsed.intervalMs ?? hub.config.detach.pollIntervalMs,
        detachTimeoutMs: parsed.timeoutMs === undefined ? hub.config.detach.timeoutMs : parsed.timeoutMs,
      });

  // Passes can report before sync() returns; hold their lines until the summary is out
  const held: string[] = [];
  let summarized = false;
  const progress = (line: string): void => {
    if (summarized) out.log(line);
    else held.push(line);
  };

  const run = await syncer.sync(payload, {
    signal,
    onTick: (tick) => {
      if (tick.deleted.length > 0) {
        progress(`tick ${tick.tick}: detached [${tick.deleted.join(", ")}]`);
      }
      if (tick.pending !== null) {
        progress(`tick ${tick.tick}: waiting on ${tick.pending}`);
      }
    },
  });
  const { prepared } = run;
  out.log(
    `prepared: config=${prepared.instruction.targetConfig.metadata.name}` +
    ` created=${prepared.configCreated}` +
    ` annotated=[${prepared.annotated.join(", ")}]` +
    ` skipped=[${prepared.skipped.join(", ")}]`,
  );
  summarized = true;
  held.forEach((line) => out.log(line));

  const outcome = await run.detachment;
  switch (outcome.status) {
    case "detached":
      out.log(`detached after ${outcome.ticks} tick(s): [${outcome.deleted.join(", ")}]`);
      return 0;
    case "cancelled":
      out.error(`detachment cancelled after ${outcome.ticks} tick(s)`);
      return 130;
    case "timed-out":
      out.error(`detachment timed out after ${outcome.timeoutMs}ms`);
      return 2;
    case "failed":
      out.error(`detachment failed: ${outcome.error.message}`);
      return 1;
  }
}

export function cmdAudit(hub: HandoffInstance, args: string[], out: Output): number {
  let limit = 50;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--limit") {
      limit = parseCount("--limit", args[++i]);
    }
  }

  for (const entry of hub.auditLog.recent(limit)) {
    const subject = entry.cluster ? ` ${entry.cluster}` : "";
    out.log(`${new Date(entry.timestamp).toISOString()} ${entry.level} ${entry.action}${subject}: ${entry.detail}`);
  }
  return 0;
}

export function describeCluster(cluster: ManagedCluster): string {
  const annotations = cluster.metadata.annotations ?? {};
  const available = cluster.status.conditions.find((c) => c.type === CONDITION_AVAILABLE)?.status ?? "-";
  const migrating = ANNOTATION_MIGRATING in annotations
    ? `migrating→${annotations[ANNOTATION_AGENT_CONFIG] ?? "?"}`
    : "stable";
  return `${cluster.metadata.name}\tavailable=${available}\t${migrating}`;
}

export async function cmdClusters(hub: HandoffInstance, out: Output): Promise<number> {
  const clusters = await hub.db.resources.managedClusters.list();
  if (clusters.length === 0) {
    out.log("No managed clusters.");
    return 0;
  }
  for (const cluster of clusters) {
    out.log(describeCluster(cluster));
  }
  return 0;
}
