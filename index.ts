/**
 * RBAC → ReBAC Relation Synchronization Service
 *
 * Keeps SpiceDB's relationship graph equal to the translation of the
 * relational RBAC model:
 * - RBAC source: authoritative groups, roles, role bindings, workspaces
 * - SpiceDB: derived relationship tuples, written only by this service
 *
 * Mutations are pushed as they commit (onDomainObjectChanged); a periodic
 * reconciler repairs whatever the live path missed.
 *
 * Lag: a synced mutation is visible once onDomainObjectChanged resolves. A
 * mutation whose event was lost, or whose sync failed, is repaired by the
 * first reconcile pass after it, so the graph lags RBAC by at most
 * reconcile.intervalMs plus the sync retry budget (see repairLagBoundMs).
 * With the reconciler disabled nothing bounds that lag.
 */

import { type RbacSyncConfig, rbacSyncConfigSchema } from "./config.js";
import { RelationSyncEngine } from "./engine.js";
import { type Logger, consoleLogger } from "./logger.js";
import type { RbacSource } from "./rbac-source.js";
import type { RelationStore } from "./relation-store.js";
import { SpiceDbClient, loadBundledSchema } from "./spicedb.js";
import type { SyncRecordStore } from "./sync-records.js";

export type SchemaAdmin = Pick<SpiceDbClient, "readSchema" | "writeSchema">;

export type RbacSyncServiceOptions = {
  /** Parsed with rbacSyncConfigSchema. */
  config: unknown;
  source: RbacSource;
  /** Defaults to a SpiceDbClient for config.spicedb. */
  store?: RelationStore;
  /** Checked and written on start; defaults to the SpiceDbClient when no store is given. */
  schema?: SchemaAdmin;
  records?: SyncRecordStore;
  logger?: Logger;
  now?: () => Date;
};

export type RbacSyncService = {
  id: "rbac-sync";
  cfg: RbacSyncConfig;
  engine: RelationSyncEngine;
  start(): Promise<void>;
  stop(): Promise<void>;
};

// ============================================================================
// Service
// ============================================================================

export function createRbacSyncService(options: RbacSyncServiceOptions): RbacSyncService {
  const cfg = rbacSyncConfigSchema.parse(options.config);
  const logger = options.logger ?? consoleLogger;

  let client: SpiceDbClient | undefined;
  let store: RelationStore;
  if (options.store) {
    store = options.store;
  } else {
    client = new SpiceDbClient(cfg.spicedb);
    store = client;
  }
  const schema = options.schema ?? client;

  const engine = new RelationSyncEngine({
    source: options.source,
    store,
    ...(options.records ? { records: options.records } : {}),
    executor: {
      batchSize: cfg.sync.batchSize,
      retry: {
        maxAttempts: cfg.sync.maxAttempts,
        baseDelayMs: cfg.sync.baseDelayMs,
        maxDelayMs: cfg.sync.maxDelayMs,
      },
      callTimeoutMs: cfg.sync.callTimeoutMs,
    },
    translationAttempts: cfg.sync.translationAttempts,
    reconcile: {
      intervalMs: cfg.reconcile.intervalMs,
      concurrency: cfg.reconcile.concurrency,
    },
    logger,
    ...(options.now ? { now: options.now } : {}),
  });

  logger.info(`rbac-sync: registered (spicedb: ${cfg.spicedb.endpoint})`);

  return {
    id: "rbac-sync",
    cfg,
    engine,

    async start() {
      let schemaOk = schema === undefined;
      if (schema) {
        try {
          const existing = await schema.readSchema();
          // Auto-write schema if SpiceDB has none of ours yet
          if (!existing || !existing.includes("definition role_binding")) {
            logger.info("rbac-sync: writing SpiceDB schema (first run)");
            await schema.writeSchema(loadBundledSchema());
            logger.info("rbac-sync: SpiceDB schema written successfully");
          }
          schemaOk = true;
        } catch (err) {
          logger.warn(`rbac-sync: SpiceDB schema check failed, syncs will retry: ${String(err)}`);
        }
      }

      if (cfg.reconcile.enabled) engine.reconciler.start();

      logger.info(
        `rbac-sync: initialized (spicedb: ${schemaOk ? "OK" : "UNREACHABLE"}, reconcile: ${cfg.reconcile.enabled ? `every ${cfg.reconcile.intervalMs}ms` : "disabled"})`,
      );
    },

    async stop() {
      engine.reconciler.stop();
      await engine.idle();
      client?.close();
      logger.info("rbac-sync: stopped");
    },
  };
}

// ============================================================================
// Public API
// ============================================================================

export { rbacSyncConfigSchema, repairLagBoundMs, type RbacSyncConfig } from "./config.js";
export { RelationSyncEngine, type EngineOptions, type DriftReport } from "./engine.js";
export {
  Reconciler,
  readOwnedRelationships,
  type ReconcileReport,
  type ReconcilerOptions,
  type SyncOutcome,
} from "./reconciler.js";
export { SyncExecutor, backoffDelay, type Applied, type ExecutorOptions, type RetryPolicy } from "./executor.js";
export { diff, applyDelta, isEmptyDelta, type Delta } from "./differ.js";
export {
  translate,
  planRole,
  permissionToRelation,
  attributeKeyToResourceType,
  ownsRelationship,
  ownershipFilters,
  graphNodes,
} from "./translator.js";
export * from "./tuples.js";
export * from "./domain.js";
export * from "./errors.js";
export { InMemoryRelationStore, type RelationStore, type RelationshipFilter } from "./relation-store.js";
export { InMemoryRbacSource, parseRbacSnapshot, type RbacSource, type RbacSnapshot } from "./rbac-source.js";
export {
  InMemorySyncRecordStore,
  type SyncRecord,
  type SyncRecordStore,
  type SyncStatus,
} from "./sync-records.js";
export { SpiceDbClient, type SpiceDbConfig, type ConsistencyMode } from "./spicedb.js";
export { registerCommands, type CliContext } from "./cli.js";
export { consoleLogger, silentLogger, type Logger } from "./logger.js";
