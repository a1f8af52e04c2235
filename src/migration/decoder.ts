/**
 * Instruction decoder.
 *
 * Payload (UTF-8 JSON):
 *
 *   {
 *     "bootstrapSecret": { "metadata": { "name", "namespace" }, "data": { "<key>": "<base64>" } },
 *     "agentConfig":     { "metadata": { "name" }, "spec": { "hubAddress"? } },
 *     "managedClusters": ["cluster-a", "cluster-b"]
 *   }
 */

import type { AgentConfig, AgentConfigSpec, BootstrapSecret } from "../types.js";
import { isRecord } from "../db/codec.js";
import { DecodeError } from "./errors.js";
import type { MigrationInstruction } from "./types.js";

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

function isBase64(v: unknown): v is string {
  return typeof v === "string" && v.length % 4 === 0 && BASE64_RE.test(v);
}

function requireRecord(v: unknown, field: string): Record<string, unknown> {
  if (!isRecord(v)) throw new DecodeError(field, "expected an object");
  return v;
}

function requireName(v: unknown, field: string): string {
  if (typeof v !== "string" || v.trim().length === 0) {
    throw new DecodeError(field, "expected a non-empty string");
  }
  return v;
}

function parseJson(payload: Uint8Array | string): unknown {
  let text: string;
  if (typeof payload === "string") {
    text = payload;
  } else {
    try {
      text = new TextDecoder("utf-8", { fatal: true }).decode(payload);
    } catch {
      throw new DecodeError("", "payload is not valid UTF-8");
    }
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DecodeError("", `payload is not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
}

function decodeSecret(raw: unknown): BootstrapSecret {
  const secret = requireRecord(raw, "bootstrapSecret");
  const meta = requireRecord(secret.metadata, "bootstrapSecret.metadata");
  const name = requireName(meta.name, "bootstrapSecret.metadata.name");
  const namespace = requireName(meta.namespace, "bootstrapSecret.metadata.namespace");

  const rawData = secret.data === undefined ? {} : requireRecord(secret.data, "bootstrapSecret.data");
  // fromEntries keeps keys such as "__proto__" as own properties
  const data = Object.fromEntries(
    Object.entries(rawData).map(([key, value]): [string, Buffer] => {
      if (!isBase64(value)) {
        throw new DecodeError(`bootstrapSecret.data.${key}`, "expected a base64 string");
      }
      return [key, Buffer.from(value, "base64")];
    }),
  );

  return { metadata: { name, namespace }, data };
}

function decodeAgentConfig(raw: unknown): AgentConfig {
  const config = requireRecord(raw, "agentConfig");
  const meta = requireRecord(config.metadata, "agentConfig.metadata");
  const name = requireName(meta.name, "agentConfig.metadata.name");

  const spec: AgentConfigSpec = {};
  if (config.spec !== undefined) {
    const rawSpec = requireRecord(config.spec, "agentConfig.spec");
    if (rawSpec.hubAddress !== undefined) {
      spec.hubAddress = requireName(rawSpec.hubAddress, "agentConfig.spec.hubAddress");
    }
  }

  return { metadata: { name }, spec };
}

function decodeClusterNames(raw: unknown): string[] {
  if (!Array.isArray(raw)) {
    throw new DecodeError("managedClusters", "expected an array of cluster names");
  }
  const seen = new Set<string>();
  const names: string[] = [];
  raw.forEach((v: unknown, i) => {
    const name = requireName(v, `managedClusters[${i}]`);
    if (seen.has(name)) return;
    seen.add(name);
    names.push(name);
  });
  return names;
}

/**
 * Decode an inbound migration-from payload.
 *
 * @throws DecodeError on any malformed input
 */
export function decodeMigrationInstruction(payload: Uint8Array | string): MigrationInstruction {
  const root = requireRecord(parseJson(payload), "");

  return {
    bootstrapCredential: decodeSecret(root.bootstrapSecret),
    targetConfig: decodeAgentConfig(root.agentConfig),
    clusterNames: decodeClusterNames(root.managedClusters),
  };
}
