/**
 * Configuration resolution.
 * Merges raw config with sensible defaults.
 *
 * Two loading modes:
 *   1. Embedded:    resolveHandoffConfig(raw), the host passes raw config
 *   2. Standalone:  loadHandoffConfig(), reads from file / env directly
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { LogLevel } from "./logger.js";

export type DatabaseBackend = "memory" | "sqlite";

/** Polling interval of the detachment wait (ms). */
export const DEFAULT_POLL_INTERVAL_MS = 2_000;

export interface DetachConfig {
  pollIntervalMs: number;
  /** Upper bound on the detachment wait. null waits until cancelled. */
  timeoutMs: number | null;
}

export interface HandoffConfig {
  dataDir: string;
  dbBackend: DatabaseBackend;
  /** Name of this hub, recorded on audit entries. */
  hubName: string;
  logLevel: LogLevel;
  detach: DetachConfig;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && (LOG_LEVELS as readonly string[]).includes(v);
}

function isDatabaseBackend(v: unknown): v is DatabaseBackend {
  return v === "memory" || v === "sqlite";
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Safely coerce an unknown value to a string-keyed record. */
function toRecord(v: unknown): Record<string, unknown> {
  return isRecord(v) ? v : {};
}

function nonNegative(v: unknown): number | null {
  return typeof v === "number" && Number.isFinite(v) && v >= 0 ? v : null;
}

export function resolveHandoffConfig(raw?: Record<string, unknown> | null): HandoffConfig {
  const r = raw ?? {};
  const detachRaw = toRecord(r.detach);

  const envLevel = process.env.HANDOFF_LOG_LEVEL;
  const logLevel: LogLevel = isLogLevel(envLevel)
    ? envLevel
    : isLogLevel(r.logLevel) ? r.logLevel : "info";

  return {
    dataDir: typeof r.dataDir === "string" ? r.dataDir : ".handoff",
    dbBackend: isDatabaseBackend(r.dbBackend) ? r.dbBackend : "memory",
    hubName: typeof r.hubName === "string" && r.hubName.trim().length > 0
      ? r.hubName.trim()
      : "local-hub",
    logLevel,
    detach: {
      pollIntervalMs: nonNegative(detachRaw.pollIntervalMs) ?? DEFAULT_POLL_INTERVAL_MS,
      // 0 and absent both mean "no timeout"
      timeoutMs: nonNegative(detachRaw.timeoutMs) || null,
    },
  };
}

/**
 * Default config file search paths (highest priority first):
 *   1. $HANDOFF_CONFIG env
 *   2. ./handoff.json (cwd)
 *   3. ~/.handoff/handoff.json
 */
function resolveConfigPath(): string | null {
  if (process.env.HANDOFF_CONFIG) {
    return process.env.HANDOFF_CONFIG;
  }
  const cwdPath = path.resolve("handoff.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".handoff", "handoff.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

/**
 * Load config from the file system.
 * Falls back to defaults if no config file is found.
 */
export function loadHandoffConfig(): HandoffConfig {
  const configPath = resolveConfigPath();
  if (!configPath || !fs.existsSync(configPath)) {
    return resolveHandoffConfig({});
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
  if (!isRecord(raw)) {
    throw new Error(`Invalid handoff config at ${configPath}: expected a JSON object`);
  }
  return resolveHandoffConfig(raw);
}
