/**
 * Migration-from — module exports.
 */

// --- Types ---
export type {
  MigrationInstruction,
  PropagatedCredentials,
  ProvisionResult,
  AnnotateResult,
  PrepareResult,
  DetachTick,
  DetachReport,
  DetachmentOutcome,
  MigrationRun,
  MigrationStage,
} from "./types.js";

export {
  BOOTSTRAP_SECRET_BACKUP_SUFFIX,
  ANNOTATION_MIGRATING,
  ANNOTATION_AGENT_CONFIG,
  CONDITION_AVAILABLE,
  MIGRATION_FROM_EVENT,
  backupSecretName,
  isAvailabilityUnknown,
} from "./types.js";

// --- Errors ---
export {
  DecodeError,
  MigrationStageError,
  CancellationError,
  UnknownEventTypeError,
} from "./errors.js";

// --- Stages ---
export { decodeMigrationInstruction } from "./decoder.js";
export { propagateCredentials } from "./credentials.js";
export { provisionTargetConfig } from "./target-config.js";
export { annotateClusters, isAnnouncedFor } from "./annotator.js";

export type { PollOptions, ConfirmOptions } from "./detach.js";
export { pollUntilDetached, confirmDetachment } from "./detach.js";

// --- Syncer ---
export type {
  MigrationFromSyncer,
  MigrationFromSyncerConfig,
  SyncOptions,
} from "./syncer.js";

export { createMigrationFromSyncer } from "./syncer.js";

// --- Dispatcher ---
export type { HubEvent, EventSyncer, EventDispatcher } from "./dispatcher.js";
export { createEventDispatcher } from "./dispatcher.js";
