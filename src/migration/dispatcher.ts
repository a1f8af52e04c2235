/**
 * Event dispatcher: routes inbound hub events to the syncer registered for
 * their type.
 *
 * The transport that delivers events is outside this package; it hands each
 * event to dispatch() and redelivers on rejection.
 */

import type { Logger } from "../types.js";
import { UnknownEventTypeError } from "./errors.js";

/** An inbound event as delivered by the transport. */
export interface HubEvent {
  type: string;
  payload: Uint8Array | string;
}

/** Anything that can apply one event's payload to this hub. */
export interface EventSyncer {
  handle(payload: Uint8Array | string, signal?: AbortSignal): Promise<unknown>;
}

export interface EventDispatcher {
  /** @throws Error when the type already has a syncer */
  register(type: string, syncer: EventSyncer): void;
  /** @throws UnknownEventTypeError when no syncer is registered for the type */
  dispatch(event: HubEvent, signal?: AbortSignal): Promise<void>;
  types(): string[];
}

export function createEventDispatcher(logger: Logger): EventDispatcher {
  const syncers = new Map<string, EventSyncer>();

  return {
    register(type, syncer) {
      if (syncers.has(type)) {
        throw new Error(`syncer already registered for event type "${type}"`);
      }
      syncers.set(type, syncer);
      logger.debug?.(`[handoff:dispatch] Registered syncer for ${type}`);
    },

    async dispatch(event, signal) {
      const syncer = syncers.get(event.type);
      if (!syncer) {
        logger.warn(`[handoff:dispatch] Dropping event of unknown type ${event.type}`);
        throw new UnknownEventTypeError(event.type);
      }
      await syncer.handle(event.payload, signal);
    },

    types() {
      return Array.from(syncers.keys());
    },
  };
}
