/**
 * Reconciler
 *
 * Self-healing path for lost events, failed syncs and manual edits to the
 * relationship store. A pass re-derives the canonical set of every known
 * domain object, reads what the store actually holds for it and applies the
 * difference through the regular executor path. Runs periodically and on
 * demand; passes never overlap.
 */

import type { DomainObjectRef } from "./domain.js";
import { refKey } from "./domain.js";
import { type Logger, silentLogger } from "./logger.js";
import type { RelationStore } from "./relation-store.js";
import type { SyncStatus } from "./sync-records.js";
import { ownershipFilters, ownsRelationship } from "./translator.js";
import { RelationshipSet } from "./tuples.js";
import type { RbacSyncError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export type SyncOutcome = {
  ref: DomainObjectRef;
  /** "deleted": tuples removed and tracking dropped; "untracked": nothing to do for an unknown object. */
  status: SyncStatus | "deleted" | "untracked";
  added: number;
  removed: number;
  /** The store held something other than the last applied set. */
  drift: boolean;
  error?: RbacSyncError;
};

export type ReconcileReport = {
  checked: number;
  drifted: number;
  repaired: number;
  failed: number;
  outcomes: SyncOutcome[];
};

export interface ReconcileTarget {
  /** Every domain object known to the RBAC source or tracked in sync records. */
  trackedRefs(): Promise<DomainObjectRef[]>;
  reconcile(ref: DomainObjectRef): Promise<SyncOutcome>;
}

export type ReconcilerOptions = {
  intervalMs?: number;
  /** Objects reconciled in parallel during a pass. */
  concurrency?: number;
  logger?: Logger;
};

export const DEFAULT_RECONCILE_INTERVAL_MS = 5 * 60_000;
export const DEFAULT_RECONCILE_CONCURRENCY = 4;

// ============================================================================
// Store observation
// ============================================================================

/**
 * The tuples the store actually holds in a domain object's namespace.
 * `known` (canonical plus last applied) decides which filters are read.
 */
export async function readOwnedRelationships(
  store: RelationStore,
  ref: DomainObjectRef,
  known: RelationshipSet,
): Promise<RelationshipSet> {
  const observed = new RelationshipSet();
  for (const filter of ownershipFilters(ref, known)) {
    for (const rel of await store.readRelationships(filter)) {
      if (ownsRelationship(ref, rel)) observed.add(rel);
    }
  }
  return observed;
}

async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return results;
}

export function summarize(outcomes: SyncOutcome[]): ReconcileReport {
  return {
    checked: outcomes.length,
    drifted: outcomes.filter((o) => o.drift).length,
    repaired: outcomes.filter((o) => o.drift && o.status !== "failed").length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    outcomes,
  };
}

// ============================================================================
// Reconciler
// ============================================================================

export class Reconciler {
  private readonly intervalMs: number;
  private readonly concurrency: number;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<ReconcileReport> | null = null;

  constructor(
    private readonly target: ReconcileTarget,
    options: ReconcilerOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_RECONCILE_INTERVAL_MS;
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_RECONCILE_CONCURRENCY);
    this.logger = options.logger ?? silentLogger;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.runPass().catch((err) => {
        this.logger.error(`rbac-sync: reconcile pass failed: ${String(err)}`);
      });
    }, this.intervalMs);
    this.timer.unref?.();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Runs a full pass, or joins the one already in progress. */
  runPass(): Promise<ReconcileReport> {
    if (!this.running) {
      this.running = this.pass().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async pass(): Promise<ReconcileReport> {
    const refs = await this.target.trackedRefs();
    const outcomes = await mapWithConcurrency(refs, this.concurrency, (ref) =>
      this.reconcileOne(ref),
    );
    const report = summarize(outcomes);
    this.logger.info(
      `rbac-sync: reconcile pass checked ${report.checked} objects (drifted ${report.drifted}, repaired ${report.repaired}, failed ${report.failed})`,
    );
    return report;
  }

  private async reconcileOne(ref: DomainObjectRef): Promise<SyncOutcome> {
    try {
      return await this.target.reconcile(ref);
    } catch (err) {
      this.logger.error(`rbac-sync: reconcile of ${refKey(ref)} crashed: ${String(err)}`);
      return { ref, status: "failed", added: 0, removed: 0, drift: false };
    }
  }
}
