import type { MigrationStage } from "./types.js";

/** The inbound payload is not a valid migration instruction. */
export class DecodeError extends Error {
  /** Dotted path of the offending field, "" for the payload itself. */
  readonly field: string;

  constructor(field: string, message: string) {
    super(field ? `invalid migration instruction: ${field}: ${message}` : `invalid migration instruction: ${message}`);
    this.name = "DecodeError";
    this.field = field;
  }
}

/** A store failure during preparation, tagged with the stage it stopped. */
export class MigrationStageError extends Error {
  readonly stage: MigrationStage;

  constructor(stage: MigrationStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`migration ${stage} stage failed: ${reason}`, { cause });
    this.name = "MigrationStageError";
    this.stage = stage;
  }
}

/** The caller aborted the detachment wait. */
export class CancellationError extends Error {
  readonly ticks: number;

  constructor(ticks: number) {
    super(`detachment wait cancelled after ${ticks} tick(s)`);
    this.name = "CancellationError";
    this.ticks = ticks;
  }
}

export class UnknownEventTypeError extends Error {
  readonly eventType: string;

  constructor(eventType: string) {
    super(`no syncer registered for event type "${eventType}"`);
    this.name = "UnknownEventTypeError";
    this.eventType = eventType;
  }
}
