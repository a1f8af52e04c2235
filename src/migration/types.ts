/**
 * Migration-from — Type Definitions
 *
 * Types for handing managed clusters off from this (source) hub.
 *
 * Per-cluster lifecycle on the source hub:
 *   stable → announced (annotated) → handed-off (Availability=Unknown) → detached (deleted)
 */

import type { AgentConfig, BootstrapSecret, ManagedCluster } from "../types.js";

// --- Well-known names ---

/** Suffix of the backup bootstrap secret's name. */
export const BOOTSTRAP_SECRET_BACKUP_SUFFIX = "-backup";

/** Presence-only marker: the cluster is being handed off. */
export const ANNOTATION_MIGRATING = "cluster-handoff.dev/migrating";

/** Name of the agent config the cluster's agent should bootstrap with next. */
export const ANNOTATION_AGENT_CONFIG = "cluster-handoff.dev/agent-config";

/** Availability condition on a managed cluster. */
export const CONDITION_AVAILABLE = "ManagedClusterConditionAvailable";

/** Event type the migration-from syncer is registered under. */
export const MIGRATION_FROM_EVENT = "MigrationFrom";

// --- Instruction ---

/** Decoded unit of work. One per inbound message. */
export interface MigrationInstruction {
  readonly bootstrapCredential: BootstrapSecret;
  readonly targetConfig: AgentConfig;
  /** Ordered, without repeats. */
  readonly clusterNames: readonly string[];
}

export function backupSecretName(primary: string): string {
  return `${primary}${BOOTSTRAP_SECRET_BACKUP_SUFFIX}`;
}

/** True when the cluster's Availability condition is present and Unknown. */
export function isAvailabilityUnknown(cluster: ManagedCluster): boolean {
  return cluster.status.conditions.some(
    (c) => c.type === CONDITION_AVAILABLE && c.status === "Unknown",
  );
}

// --- Results ---

export interface PropagatedCredentials {
  primary: BootstrapSecret;
  backup: BootstrapSecret;
}

export interface ProvisionResult {
  config: AgentConfig;
  /** False when an object of that name already existed and was left alone. */
  created: boolean;
}

export interface AnnotateResult {
  /** Clusters written in this run. */
  annotated: string[];
  /** Clusters already announced for the same config. */
  skipped: string[];
}

/** Outcome of preparation (everything before the detachment wait). */
export interface PrepareResult extends AnnotateResult {
  instruction: MigrationInstruction;
  credentials: PropagatedCredentials;
  configCreated: boolean;
}

/** One pass of the detachment poll. */
export interface DetachTick {
  tick: number;
  /** Clusters found already gone in this pass. */
  absent: string[];
  /** Clusters deleted in this pass. */
  deleted: string[];
  /** First cluster still reachable from this hub; null once the pass completed. */
  pending: string | null;
}

export interface DetachReport {
  ticks: number;
  /** Every cluster this wait deleted, in deletion order. */
  deleted: string[];
}

export type DetachmentOutcome =
  | { status: "detached"; ticks: number; deleted: string[] }
  | { status: "cancelled"; ticks: number }
  | { status: "timed-out"; ticks: number; timeoutMs: number }
  | { status: "failed"; ticks: number; error: Error };

/** Both result channels of one run. */
export interface MigrationRun {
  prepared: PrepareResult;
  /** Never rejects. */
  detachment: Promise<DetachmentOutcome>;
}

export type MigrationStage = "credentials" | "config" | "annotate";
