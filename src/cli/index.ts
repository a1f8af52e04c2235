#!/usr/bin/env node
/**
 * handoff CLI — source-hub side of cluster handoff.
 *
 * Commands:
 *   handoff migrate-from <payload.json>   Apply a migration-from instruction and wait for detachment
 *   handoff audit [--limit n]             Show recent audit entries
 *   handoff clusters                      List managed clusters and their handoff state
 *
 * Config is read from $HANDOFF_CONFIG, ./handoff.json or ~/.handoff/handoff.json.
 */

import { startHandoff } from "../standalone.js";
import { cmdAudit, cmdClusters, cmdMigrateFrom, type Output } from "./commands.js";

const console_: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

function showHelp(): void {
  console.log(`
handoff — hand managed clusters off from this hub

Usage:
  handoff migrate-from <payload.json> [--timeout <ms>] [--interval <ms>]
  handoff audit [--limit <n>]
  handoff clusters
  handoff help

--timeout 0 waits without a bound, overriding detach.timeoutMs from the config.
Ctrl-C during migrate-from cancels the detachment wait; credentials, config and
annotations already written stay in place.
`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case "migrate-from": {
      const hub = startHandoff();
      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once("SIGINT", onSigint);
      try {
        return await cmdMigrateFrom(hub, args.slice(1), console_, controller.signal);
      } finally {
        process.removeListener("SIGINT", onSigint);
        hub.stop();
      }
    }
    case "audit": {
      const hub = startHandoff();
      try {
        return cmdAudit(hub, args.slice(1), console_);
      } finally {
        hub.stop();
      }
    }
    case "clusters": {
      const hub = startHandoff();
      try {
        return await cmdClusters(hub, console_);
      } finally {
        hub.stop();
      }
    }
    case "help":
    case "--help":
    case "-h":
    case undefined:
      showHelp();
      return 0;
    default:
      console.error(`Unknown command: ${command}`);
      showHelp();
      return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  },
);
