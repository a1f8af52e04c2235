import type { ObjectKey, ResourceKind } from "../types.js";

export type StoreErrorReason =
  | "NotFound"
  | "AlreadyExists"
  | "Conflict"
  | "Invalid"
  | "Unavailable";

/** Failure of a single resource store call. */
export class ResourceStoreError extends Error {
  readonly reason: StoreErrorReason;
  readonly kind: ResourceKind;
  readonly key: ObjectKey;

  constructor(reason: StoreErrorReason, kind: ResourceKind, key: ObjectKey, message?: string) {
    super(message ?? `${kind} ${formatKey(key)}: ${reason}`);
    this.name = "ResourceStoreError";
    this.reason = reason;
    this.kind = kind;
    this.key = key;
  }
}

export function formatKey(key: ObjectKey): string {
  return key.namespace ? `${key.namespace}/${key.name}` : key.name;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof ResourceStoreError && err.reason === "NotFound";
}

export function isConflict(err: unknown): boolean {
  return err instanceof ResourceStoreError && err.reason === "Conflict";
}
