/**
 * Relationship Store Contract
 *
 * The operations the engine needs from the remote ReBAC store, plus an
 * in-process implementation with the same semantics:
 * - touch writes are idempotent, creates (touch=false) reject the whole
 *   batch if any relationship already exists;
 * - deletes are delete-if-exists;
 * - tuples failing identifier validation are rejected.
 */

import { RelationshipConflictError, StoreRejectedError } from "./errors.js";
import {
  type Relationship,
  RelationshipSet,
  formatRelationship,
  validateRelationship,
} from "./tuples.js";

// ============================================================================
// Types
// ============================================================================

export type RelationshipFilter = {
  resourceType: string;
  resourceId?: string;
  resourceIdPrefix?: string;
  relation?: string;
  subjectType?: string;
  subjectId?: string;
  subjectRelation?: string;
};

export interface RelationStore {
  /** Returns the store's revision token for the write, when it has one. */
  writeRelationships(touch: boolean, relationships: Relationship[]): Promise<string | undefined>;
  deleteRelationships(relationships: Relationship[]): Promise<string | undefined>;
  readRelationships(filter: RelationshipFilter): Promise<Relationship[]>;
}

export function matchesFilter(rel: Relationship, filter: RelationshipFilter): boolean {
  if (rel.object.type !== filter.resourceType) return false;
  if (filter.resourceId !== undefined && rel.object.id !== filter.resourceId) return false;
  if (filter.resourceIdPrefix !== undefined && !rel.object.id.startsWith(filter.resourceIdPrefix)) {
    return false;
  }
  if (filter.relation !== undefined && rel.relation !== filter.relation) return false;
  if (filter.subjectType !== undefined && rel.subject.object.type !== filter.subjectType) return false;
  if (filter.subjectId !== undefined && rel.subject.object.id !== filter.subjectId) return false;
  if (filter.subjectRelation !== undefined && rel.subject.relation !== filter.subjectRelation) {
    return false;
  }
  return true;
}

// ============================================================================
// In-memory store
// ============================================================================

export type StoreCall =
  | { op: "write"; touch: boolean; relationships: Relationship[] }
  | { op: "delete"; relationships: Relationship[] }
  | { op: "read"; filter: RelationshipFilter };

export type StoreHooks = {
  /** Runs before the call touches state; throwing fails the call. */
  before?: (call: StoreCall) => void | Promise<void>;
  /** Runs after the call changed state. */
  after?: (call: StoreCall) => void;
};

export class InMemoryRelationStore implements RelationStore {
  private tuples: RelationshipSet;
  private revision = 0;
  readonly calls: StoreCall[] = [];
  hooks: StoreHooks = {};

  constructor(initial: Iterable<Relationship> = []) {
    this.tuples = new RelationshipSet(initial);
  }

  snapshot(): RelationshipSet {
    return new RelationshipSet(this.tuples);
  }

  /** Replaces the store contents without recording a call. */
  seed(relationships: Iterable<Relationship>): void {
    this.tuples = new RelationshipSet(relationships);
  }

  async writeRelationships(touch: boolean, relationships: Relationship[]): Promise<string> {
    const call: StoreCall = { op: "write", touch, relationships };
    await this.begin(call);
    this.validate(relationships);

    if (!touch) {
      const existing = relationships.filter((rel) => this.tuples.has(rel));
      if (existing.length > 0) throw new RelationshipConflictError(existing);
    }
    for (const rel of relationships) this.tuples.add(rel);
    return this.finish(call);
  }

  async deleteRelationships(relationships: Relationship[]): Promise<string> {
    const call: StoreCall = { op: "delete", relationships };
    await this.begin(call);
    this.validate(relationships);

    for (const rel of relationships) this.tuples.delete(rel);
    return this.finish(call);
  }

  async readRelationships(filter: RelationshipFilter): Promise<Relationship[]> {
    const call: StoreCall = { op: "read", filter };
    await this.begin(call);
    return this.tuples.filter((rel) => matchesFilter(rel, filter)).toArray();
  }

  private async begin(call: StoreCall): Promise<void> {
    this.calls.push(call);
    await this.hooks.before?.(call);
  }

  private finish(call: StoreCall): string {
    this.revision++;
    this.hooks.after?.(call);
    return `rev-${this.revision}`;
  }

  private validate(relationships: Relationship[]): void {
    for (const rel of relationships) {
      const problems = validateRelationship(rel);
      if (problems.length > 0) {
        throw new StoreRejectedError(`${formatRelationship(rel)}: ${problems.join("; ")}`);
      }
    }
  }
}
