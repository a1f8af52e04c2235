/**
 * Detachment confirmation: waits until every handed-off cluster has left this
 * hub, deleting each one once its agent is seen to be gone.
 *
 * The agent's departure is only observable indirectly: the source hub loses
 * contact and the cluster's Availability condition goes Unknown. Each pass
 * walks the cluster list in order:
 *
 *   - not found        → already detached, next cluster
 *   - Available=Unknown → delete, next cluster
 *   - anything else    → pass incomplete; the next pass starts over from the top
 *
 * The wait succeeds on the first pass that reaches the end of the list.
 */

import type { Logger, ManagedCluster } from "../types.js";
import type { ResourceClient } from "../db/index.js";
import { isNotFound } from "../db/index.js";
import { DEFAULT_POLL_INTERVAL_MS } from "../config.js";
import { errorMessage } from "../utils/id.js";
import { CancellationError } from "./errors.js";
import type { DetachReport, DetachTick, DetachmentOutcome } from "./types.js";
import { isAvailabilityUnknown } from "./types.js";

export interface PollOptions {
  logger: Logger;
  /** Delay between passes (ms). Default: 2000. The first pass runs immediately. */
  intervalMs?: number;
  /** Aborting stops the wait at its next suspension point. */
  signal?: AbortSignal;
  /** Called after every pass. */
  onTick?: (tick: DetachTick) => void;
}

export interface ConfirmOptions extends PollOptions {
  /** Upper bound on the whole wait. null, 0 or absent waits until the signal fires. */
  timeoutMs?: number | null;
}

/** Resolves after `ms`, or as soon as the signal aborts. */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

async function runPass(
  clusters: ResourceClient<ManagedCluster>,
  clusterNames: readonly string[],
  tick: number,
  logger: Logger,
): Promise<DetachTick> {
  const report: DetachTick = { tick, absent: [], deleted: [], pending: null };

  for (const name of clusterNames) {
    const cluster = await clusters.get({ name });
    if (!cluster) {
      report.absent.push(name);
      continue;
    }

    if (!isAvailabilityUnknown(cluster)) {
      logger.debug?.(`[handoff:migration:detach] tick ${tick}: ${name} still available to this hub`);
      report.pending = name;
      return report;
    }

    try {
      await clusters.delete({ name });
      logger.info(`[handoff:migration:detach] tick ${tick}: ${name} lost contact, detached`);
      report.deleted.push(name);
    } catch (err) {
      // A concurrent run got there first
      if (!isNotFound(err)) throw err;
      report.absent.push(name);
    }
  }

  return report;
}

/**
 * Poll until every named cluster is gone.
 *
 * No upper bound on the number of passes; bound it with the signal, or use
 * {@link confirmDetachment}.
 *
 * @throws CancellationError when the signal fires before the wait completes
 * @throws ResourceStoreError on any store failure other than not-found
 */
export async function pollUntilDetached(
  clusters: ResourceClient<ManagedCluster>,
  clusterNames: readonly string[],
  options: PollOptions,
): Promise<DetachReport> {
  const { logger, signal, onTick } = options;
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const deleted: string[] = [];
  let ticks = 0;

  for (;;) {
    if (signal?.aborted) throw new CancellationError(ticks);

    ticks++;
    const report = await runPass(clusters, clusterNames, ticks, logger);
    deleted.push(...report.deleted);
    onTick?.(report);

    if (report.pending === null) {
      return { ticks, deleted };
    }
    await delay(intervalMs, signal);
  }
}

/**
 * Bounded form of {@link pollUntilDetached}. Never rejects: every way the wait
 * can end maps to a {@link DetachmentOutcome}.
 */
export async function confirmDetachment(
  clusters: ResourceClient<ManagedCluster>,
  clusterNames: readonly string[],
  options: ConfirmOptions,
): Promise<DetachmentOutcome> {
  const { signal, onTick, timeoutMs: bound, ...pollOptions } = options;
  const timeoutMs = typeof bound === "number" && bound > 0 ? bound : null;
  const controller = new AbortController();
  let timedOut = false;
  let ticks = 0;

  const forwardAbort = (): void => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener("abort", forwardAbort, { once: true });
  }

  const timer = timeoutMs !== null
    ? setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs)
    : null;

  try {
    const report = await pollUntilDetached(clusters, clusterNames, {
      ...pollOptions,
      signal: controller.signal,
      onTick: (tick) => {
        ticks = tick.tick;
        // Observer errors are logged, not counted as a failed pass
        try {
          onTick?.(tick);
        } catch (err) {
          pollOptions.logger.error(
            `[handoff:migration:detach] tick ${tick.tick}: onTick hook failed: ${errorMessage(err)}`,
          );
        }
      },
    });
    return { status: "detached", ticks: report.ticks, deleted: report.deleted };
  } catch (err) {
    if (err instanceof CancellationError) {
      return timedOut && timeoutMs !== null
        ? { status: "timed-out", ticks: err.ticks, timeoutMs }
        : { status: "cancelled", ticks: err.ticks };
    }
    // Failures happen inside a pass that never reported
    return {
      status: "failed",
      ticks: ticks + 1,
      error: err instanceof Error ? err : new Error(String(err)),
    };
  } finally {
    if (timer) clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
  }
}
