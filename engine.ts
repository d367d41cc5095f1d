/**
 * Relation Synchronization Engine
 *
 * Entry points for the rest of the system:
 * - onDomainObjectChanged(ref): called after an RBAC write commits
 * - forceReconcile(ref | "all"): administrative repair trigger
 *
 * Live syncs diff the freshly translated canonical set against the sync
 * record's last applied set, without reading the store. Reconciliation diffs
 * against what the store actually holds. Both run through one per-object
 * serializer, so deltas for an object are applied in submission order and
 * the later one is always computed from the fresher RBAC state.
 *
 * A change with dependents is applied in two steps: the changed object's
 * grants land first, then the dependents sync, and the changed object's own
 * revokes go last. A role whose sub-role ids change therefore keeps its old
 * sub-roles until the bindings point at the new ones.
 *
 * Sync failures never reach the caller as exceptions: they are logged and
 * returned as a "failed" outcome, and the record stays failed until the next
 * pass or manual retry.
 */

import { type Delta, applyDelta, describeDelta, diff, isEmptyDelta } from "./differ.js";
import { type DomainObjectRef, refKey } from "./domain.js";
import {
  IncompleteDomainStateError,
  type RbacSyncError,
  SyncError,
  SyncRejectedError,
  SyncUnavailableError,
} from "./errors.js";
import { type ExecutorOptions, SyncExecutor } from "./executor.js";
import { KeyedSerializer } from "./keyed-serializer.js";
import { type Logger, silentLogger } from "./logger.js";
import type { RbacSource } from "./rbac-source.js";
import {
  type ReconcileReport,
  type ReconcileTarget,
  Reconciler,
  type ReconcilerOptions,
  type SyncOutcome,
  readOwnedRelationships,
  summarize,
} from "./reconciler.js";
import type { RelationStore } from "./relation-store.js";
import {
  InMemorySyncRecordStore,
  type SyncRecord,
  type SyncRecordStore,
  newRecord,
  transition,
} from "./sync-records.js";
import { graphNodes, translate } from "./translator.js";
import { RelationshipSet } from "./tuples.js";

// ============================================================================
// Types
// ============================================================================

export type EngineOptions = {
  source: RbacSource;
  store: RelationStore;
  records?: SyncRecordStore;
  executor?: ExecutorOptions;
  /** Times RBAC state is re-read when translation finds it inconsistent. */
  translationAttempts?: number;
  reconcile?: ReconcilerOptions;
  logger?: Logger;
  now?: () => Date;
};

export type DriftReport = {
  ref: DomainObjectRef;
  canonical: RelationshipSet;
  observed: RelationshipSet;
  delta: Delta;
};

type Target = {
  deleted: boolean;
  canonical: RelationshipSet;
};

export const DEFAULT_TRANSLATION_ATTEMPTS = 3;

// ============================================================================
// Engine
// ============================================================================

export class RelationSyncEngine implements ReconcileTarget {
  readonly reconciler: Reconciler;
  private readonly source: RbacSource;
  private readonly store: RelationStore;
  private readonly records: SyncRecordStore;
  private readonly executor: SyncExecutor;
  private readonly translationAttempts: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly serializer = new KeyedSerializer<SyncOutcome>();

  constructor(options: EngineOptions) {
    this.source = options.source;
    this.store = options.store;
    this.records = options.records ?? new InMemorySyncRecordStore();
    this.logger = options.logger ?? silentLogger;
    this.executor = new SyncExecutor(options.store, { logger: this.logger, ...options.executor });
    this.translationAttempts = Math.max(1, options.translationAttempts ?? DEFAULT_TRANSLATION_ATTEMPTS);
    this.now = options.now ?? (() => new Date());
    this.reconciler = new Reconciler(this, { logger: this.logger, ...options.reconcile });
  }

  // --------------------------------------------------------------------------
  // Entry points
  // --------------------------------------------------------------------------

  /**
   * Syncs a changed domain object, then every object whose translation
   * depends on it. The first outcome is the changed object's.
   */
  async onDomainObjectChanged(ref: DomainObjectRef): Promise<SyncOutcome[]> {
    const dependents = await this.dependentsOf(ref);
    if (dependents.length === 0) {
      return [await this.schedule(ref, "sync", () => this.syncTask(ref))];
    }

    const granted = await this.schedule(ref, "grant", () => this.grantTask(ref));
    // Dependents would revoke access the missing grants should cover; the
    // reconciler retries the whole group.
    if (granted.status === "failed") return [granted];

    const rest = await Promise.all(
      dependents.map((dep) => this.schedule(dep, "sync", () => this.syncTask(dep))),
    );
    const settled = await this.schedule(ref, "sync", () => this.syncTask(ref));
    return [{ ...settled, added: settled.added + granted.added }, ...rest];
  }

  async forceReconcile(target: DomainObjectRef | "all"): Promise<ReconcileReport> {
    if (target === "all") return this.reconciler.runPass();
    return summarize([await this.reconcile(target)]);
  }

  reconcile(ref: DomainObjectRef): Promise<SyncOutcome> {
    return this.schedule(ref, "reconcile", () => this.reconcileTask(ref));
  }

  /** Compares canonical state with the store without repairing anything. */
  async checkDrift(ref: DomainObjectRef): Promise<DriftReport> {
    const record = await this.records.get(ref);
    const target = await this.resolveTarget(ref);
    const known = target.canonical.union(record?.lastAppliedSet ?? RelationshipSet.empty());
    const observed = await readOwnedRelationships(this.store, ref, known);
    return { ref, canonical: target.canonical, observed, delta: diff(observed, target.canonical) };
  }

  getRecord(ref: DomainObjectRef): Promise<SyncRecord | undefined> {
    return this.records.get(ref);
  }

  async trackedRefs(): Promise<DomainObjectRef[]> {
    const refs = new Map<string, DomainObjectRef>();
    for (const ref of await this.source.listDomainObjects()) refs.set(refKey(ref), ref);
    for (const record of await this.records.list()) refs.set(refKey(record.ref), record.ref);
    return [...refs.values()];
  }

  /** Resolves once every sync submitted so far has settled. */
  idle(): Promise<void> {
    return this.serializer.idle();
  }

  // --------------------------------------------------------------------------
  // Tasks
  // --------------------------------------------------------------------------

  private schedule(
    ref: DomainObjectRef,
    label: "grant" | "sync" | "reconcile",
    task: () => Promise<SyncOutcome>,
  ): Promise<SyncOutcome> {
    return this.serializer.run(refKey(ref), label, task);
  }

  private async syncTask(ref: DomainObjectRef): Promise<SyncOutcome> {
    const existing = await this.records.get(ref);
    const record = beginSync(existing ?? newRecord(ref));

    let target: Target;
    try {
      target = await this.resolveTarget(ref);
    } catch (err) {
      if (err instanceof IncompleteDomainStateError) return this.fail(record, err);
      throw err;
    }

    if (target.deleted && !existing) {
      return { ref, status: "untracked", added: 0, removed: 0, drift: false };
    }

    await this.records.put(record);
    return this.applyAndRecord(record, diff(record.lastAppliedSet, target.canonical), target, false);
  }

  /**
   * Applies only the additions of a sync. The record stays "syncing" with
   * the grants folded in, and the follow-up sync applies the removals.
   */
  private async grantTask(ref: DomainObjectRef): Promise<SyncOutcome> {
    const existing = await this.records.get(ref);
    const record = beginSync(existing ?? newRecord(ref));

    let target: Target;
    try {
      target = await this.resolveTarget(ref);
    } catch (err) {
      if (err instanceof IncompleteDomainStateError) return this.fail(record, err);
      throw err;
    }

    if (target.deleted && !existing) {
      return { ref, status: "untracked", added: 0, removed: 0, drift: false };
    }

    const grants: Delta = {
      add: target.canonical.difference(record.lastAppliedSet),
      remove: RelationshipSet.empty(),
    };
    await this.records.put(record);
    try {
      const applied = await this.executor.apply(grants);
      await this.records.put({ ...record, lastAppliedSet: record.lastAppliedSet.union(grants.add) });
      return { ref, status: "syncing", added: applied.added, removed: 0, drift: false };
    } catch (err) {
      if (!(err instanceof SyncError)) throw err;
      const confirmed = new RelationshipSet(err.progress.added);
      return this.fail({ ...record, lastAppliedSet: record.lastAppliedSet.union(confirmed) }, err);
    }
  }

  private async reconcileTask(ref: DomainObjectRef): Promise<SyncOutcome> {
    const existing = await this.records.get(ref);
    let record = beginSync(existing ?? newRecord(ref));

    let target: Target;
    let observed: RelationshipSet;
    try {
      target = await this.resolveTarget(ref);
      const known = target.canonical.union(record.lastAppliedSet);
      observed = await readOwnedRelationships(this.store, ref, known);
    } catch (err) {
      if (err instanceof IncompleteDomainStateError) return this.fail(record, err);
      return this.fail(record, new SyncUnavailableError(1, { added: [], removed: [] }, err));
    }

    if (target.deleted && !existing && observed.size === 0) {
      return { ref, status: "untracked", added: 0, removed: 0, drift: false };
    }

    const delta = diff(observed, target.canonical);
    const drift = !isEmptyDelta(delta);
    if (drift) {
      this.logger.warn(`rbac-sync: drift detected for ${refKey(ref)} (${describeDelta(delta)}), repairing`);
    }

    record = { ...record, lastAppliedSet: observed };
    await this.records.put(record);
    return this.applyAndRecord(record, delta, target, drift);
  }

  private async applyAndRecord(
    record: SyncRecord,
    delta: Delta,
    target: Target,
    drift: boolean,
  ): Promise<SyncOutcome> {
    const { ref } = record;
    try {
      const applied = await this.executor.apply(delta);

      if (target.deleted) {
        await this.records.delete(ref);
        this.logger.info(`rbac-sync: ${refKey(ref)} deleted, removed ${applied.removed} relationships`);
        return { ref, status: "deleted", added: applied.added, removed: applied.removed, drift };
      }

      await this.records.put({
        ...transition(record, "synced"),
        lastAppliedSet: target.canonical,
        lastSyncedAt: this.now(),
        lastError: undefined,
        failures: 0,
      });
      if (!isEmptyDelta(delta)) {
        this.logger.info(`rbac-sync: synced ${refKey(ref)} (${describeDelta(delta)})`);
      }
      return { ref, status: "synced", added: applied.added, removed: applied.removed, drift };
    } catch (err) {
      if (!(err instanceof SyncError)) throw err;
      const confirmed: Delta = {
        add: new RelationshipSet(err.progress.added),
        remove: new RelationshipSet(err.progress.removed),
      };
      // The record reflects what the store confirmed, so the next attempt
      // re-issues only the remainder.
      return this.fail(
        { ...record, lastAppliedSet: applyDelta(record.lastAppliedSet, confirmed) },
        err,
        drift,
      );
    }
  }

  private async fail(record: SyncRecord, err: RbacSyncError, drift = false): Promise<SyncOutcome> {
    const failed: SyncRecord = {
      ...transition(record, "failed"),
      lastError: err.message,
      failures: record.failures + 1,
    };
    await this.records.put(failed);

    const message = `rbac-sync: sync of ${refKey(record.ref)} failed (${failed.failures} in a row): ${err.message}`;
    if (err instanceof SyncRejectedError || err instanceof IncompleteDomainStateError) {
      this.logger.error(message);
    } else {
      this.logger.warn(message);
    }
    return { ref: record.ref, status: "failed", added: 0, removed: 0, drift, error: err };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async resolveTarget(ref: DomainObjectRef): Promise<Target> {
    for (let attempt = 1; ; attempt++) {
      const state = await this.source.load(ref);
      if (!state) return { deleted: true, canonical: RelationshipSet.empty() };
      try {
        return { deleted: false, canonical: translate(state) };
      } catch (err) {
        if (!(err instanceof IncompleteDomainStateError) || attempt >= this.translationAttempts) {
          throw err;
        }
        this.logger.debug?.(`rbac-sync: re-reading state for ${refKey(ref)}: ${err.reason}`);
      }
    }
  }

  private async dependentsOf(ref: DomainObjectRef): Promise<DomainObjectRef[]> {
    const self = refKey(ref);
    const found = new Map<string, DomainObjectRef>();
    for (const dep of await this.source.listDependents(ref)) found.set(refKey(dep), dep);

    // Records still pointing at the object cover deletions the source has
    // already cascaded away.
    const nodes = graphNodes(ref);
    for (const record of await this.records.list()) {
      if (nodes.some((node) => record.lastAppliedSet.mentions(node))) {
        found.set(refKey(record.ref), record.ref);
      }
    }
    found.delete(self);
    return [...found.values()];
  }
}

function beginSync(record: SyncRecord): SyncRecord {
  return record.status === "syncing" ? record : transition(record, "syncing");
}
