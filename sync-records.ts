/**
 * Sync records: what was last pushed to the relationship store for each
 * domain object, and where the object stands in its sync lifecycle.
 *
 *   unsynced → syncing → synced
 *   synced   → syncing          (mutation or detected drift)
 *   syncing  → failed           (retries exhausted or rejected)
 *   failed   → syncing          (next reconciliation pass or manual retry)
 */

import { type DomainObjectRef, refKey } from "./domain.js";
import { RelationshipSet } from "./tuples.js";

export type SyncStatus = "unsynced" | "syncing" | "synced" | "failed";

export type SyncRecord = {
  ref: DomainObjectRef;
  lastAppliedSet: RelationshipSet;
  lastSyncedAt: Date | null;
  status: SyncStatus;
  lastError?: string;
  /** Consecutive failed syncs; reset on success. */
  failures: number;
};

const TRANSITIONS: Record<SyncStatus, readonly SyncStatus[]> = {
  unsynced: ["syncing"],
  syncing: ["synced", "failed"],
  synced: ["syncing"],
  failed: ["syncing"],
};

export function canTransition(from: SyncStatus, to: SyncStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(record: SyncRecord, to: SyncStatus): SyncRecord {
  if (!canTransition(record.status, to)) {
    throw new Error(
      `Invalid sync transition for ${refKey(record.ref)}: ${record.status} → ${to}`,
    );
  }
  return { ...record, status: to };
}

export function newRecord(ref: DomainObjectRef): SyncRecord {
  return {
    ref,
    lastAppliedSet: RelationshipSet.empty(),
    lastSyncedAt: null,
    status: "unsynced",
    failures: 0,
  };
}

// ============================================================================
// Store
// ============================================================================

export interface SyncRecordStore {
  get(ref: DomainObjectRef): Promise<SyncRecord | undefined>;
  put(record: SyncRecord): Promise<void>;
  delete(ref: DomainObjectRef): Promise<void>;
  list(): Promise<SyncRecord[]>;
}

export class InMemorySyncRecordStore implements SyncRecordStore {
  private readonly records = new Map<string, SyncRecord>();

  async get(ref: DomainObjectRef): Promise<SyncRecord | undefined> {
    return this.records.get(refKey(ref));
  }

  async put(record: SyncRecord): Promise<void> {
    this.records.set(refKey(record.ref), record);
  }

  async delete(ref: DomainObjectRef): Promise<void> {
    this.records.delete(refKey(ref));
  }

  async list(): Promise<SyncRecord[]> {
    return [...this.records.values()];
  }
}
