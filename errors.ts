/**
 * Error taxonomy for relation synchronization.
 *
 * Store errors are raised by RelationStore implementations; sync errors are
 * raised by the executor once its retry budget or a permanent rejection ends
 * an apply. IncompleteDomainStateError comes from the translator.
 */

import type { Relationship } from "./tuples.js";
import { formatRelationship } from "./tuples.js";

export class RbacSyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RbacSyncError";
  }
}

// ============================================================================
// Translation
// ============================================================================

export class IncompleteDomainStateError extends RbacSyncError {
  constructor(
    readonly domainObject: string,
    readonly reason: string,
  ) {
    super(`Incomplete domain state for ${domainObject}: ${reason}`);
    this.name = "IncompleteDomainStateError";
  }
}

// ============================================================================
// Relationship store
// ============================================================================

export class StoreUnavailableError extends RbacSyncError {
  override cause: unknown;
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "StoreUnavailableError";
    this.cause = cause;
  }
}

export class StoreRejectedError extends RbacSyncError {
  override cause: unknown;
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "StoreRejectedError";
    this.cause = cause;
  }
}

/** A create (touch=false) hit relationships that already exist. */
export class RelationshipConflictError extends StoreRejectedError {
  constructor(readonly existing: Relationship[]) {
    super(
      `Relationships already exist: ${existing.map(formatRelationship).join(", ")}`,
    );
    this.name = "RelationshipConflictError";
  }
}

// ============================================================================
// Sync
// ============================================================================

export type SyncProgress = {
  added: Relationship[];
  removed: Relationship[];
};

export class SyncError extends RbacSyncError {
  override cause: unknown;
  constructor(
    message: string,
    readonly progress: SyncProgress,
    cause?: unknown,
  ) {
    super(message);
    this.name = "SyncError";
    this.cause = cause;
  }
}

export class SyncUnavailableError extends SyncError {
  constructor(attempts: number, progress: SyncProgress, cause?: unknown) {
    super(
      `Relationship store unavailable after ${attempts} attempts: ${describeCause(cause)}`,
      progress,
      cause,
    );
    this.name = "SyncUnavailableError";
  }
}

export class SyncRejectedError extends SyncError {
  constructor(
    readonly relationship: Relationship,
    progress: SyncProgress,
    cause?: unknown,
  ) {
    super(
      `Relationship store rejected ${formatRelationship(relationship)}: ${describeCause(cause)}`,
      progress,
      cause,
    );
    this.name = "SyncRejectedError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
