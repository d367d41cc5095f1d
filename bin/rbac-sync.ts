#!/usr/bin/env node
/**
 * Standalone CLI entry point for rbac-sync commands.
 *
 * Reads config from environment variables and/or a JSON config file, loads
 * RBAC state from a snapshot file, and runs one command against SpiceDB.
 *
 * Usage:
 *   npx tsx bin/rbac-sync.ts --state rbac.json <command> [options]
 *   npm run cli -- --state rbac.json <command> [options]
 */

import { Command } from "commander";
import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import { homedir } from "node:os";
import { type RbacSyncConfig, rbacSyncConfigSchema, isRecord } from "../config.js";
import { InMemoryRbacSource } from "../rbac-source.js";
import { SpiceDbClient } from "../spicedb.js";
import { createRbacSyncService } from "../index.js";
import { registerCommands } from "../cli.js";

// ============================================================================
// Config loading
// ============================================================================

function loadConfigFile(configPath?: string): Record<string, unknown> | null {
  const candidates = configPath
    ? [resolve(configPath)]
    : [
        resolve("rbac-sync.config.json"),
        join(homedir(), ".config", "rbac-sync", "config.json"),
      ];
  for (const path of candidates) {
    if (existsSync(path)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(readFileSync(path, "utf-8"));
      } catch (err) {
        console.error(`Failed to parse config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
      if (!isRecord(parsed)) {
        console.error(`Config file ${path} must contain a JSON object`);
        process.exit(1);
      }
      return parsed;
    }
  }
  return null;
}

function loadConfigFromEnv(): Record<string, unknown> {
  const env = process.env;
  const config: Record<string, unknown> = {};

  // SpiceDB config
  const spicedb: Record<string, unknown> = {};
  if (env.RBAC_SYNC_SPICEDB_TOKEN ?? env.SPICEDB_TOKEN)
    spicedb.token = env.RBAC_SYNC_SPICEDB_TOKEN ?? env.SPICEDB_TOKEN;
  if (env.RBAC_SYNC_SPICEDB_ENDPOINT ?? env.SPICEDB_ENDPOINT)
    spicedb.endpoint = env.RBAC_SYNC_SPICEDB_ENDPOINT ?? env.SPICEDB_ENDPOINT;
  if (env.RBAC_SYNC_SPICEDB_INSECURE)
    spicedb.insecure = env.RBAC_SYNC_SPICEDB_INSECURE !== "false";
  if (Object.keys(spicedb).length > 0) config.spicedb = spicedb;

  return config;
}

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...base };
  for (const key of Object.keys(override)) {
    const current = result[key];
    const next = override[key];
    result[key] = isRecord(current) && isRecord(next) ? deepMerge(current, next) : next;
  }
  return result;
}

function argValue(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  return idx !== -1 ? process.argv[idx + 1] : undefined;
}

// ============================================================================
// Main
// ============================================================================

const program = new Command()
  .name("rbac-sync")
  .description("Standalone CLI for RBAC → SpiceDB relationship sync")
  .option("--config <path>", "Path to config JSON file")
  .option("--state <path>", "Path to an RBAC snapshot JSON file");

// Extract global options before subcommand parsing
const configPath = argValue("--config");
const statePath = argValue("--state");

const fileConfig = loadConfigFile(configPath);
const envConfig = loadConfigFromEnv();

// Merge: env vars override file config, both override defaults
const mergedConfig = fileConfig
  ? deepMerge(fileConfig, envConfig)
  : envConfig;

let cfg: RbacSyncConfig;
try {
  cfg = rbacSyncConfigSchema.parse(mergedConfig);
} catch (err) {
  console.error(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
  console.error("\nProvide config via environment variables or a JSON config file.");
  console.error("SpiceDB token: SPICEDB_TOKEN (or --config with spicedb.token)");
  process.exit(1);
}

let source: InMemoryRbacSource;
try {
  source = statePath ? InMemoryRbacSource.fromFile(resolve(statePath)) : new InMemoryRbacSource();
} catch (err) {
  console.error(`Failed to load RBAC state: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

const spicedb = new SpiceDbClient(cfg.spicedb);
const service = createRbacSyncService({
  config: mergedConfig,
  source,
  store: spicedb,
  schema: spicedb,
  logger: {
    info: () => {},
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  },
});

registerCommands(program, { engine: service.engine, source, spicedb, cfg });

try {
  await program.parseAsync(process.argv);
} finally {
  spicedb.close();
}
