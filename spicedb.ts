/**
 * SpiceDB Client Wrapper
 *
 * Wraps @authzed/authzed-node as a RelationStore: TOUCH/CREATE writes,
 * DELETE updates and filtered reads. Also exposes WriteSchema, ReadSchema
 * and CheckPermission for the CLI and service startup.
 *
 * gRPC failures are mapped onto the store error taxonomy so the executor can
 * tell retryable outages from permanent rejections.
 */

import { v1 } from "@authzed/authzed-node";
import { status } from "@grpc/grpc-js";
import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

import { RelationshipConflictError, StoreRejectedError, StoreUnavailableError } from "./errors.js";
import type { RelationStore, RelationshipFilter } from "./relation-store.js";
import { type Relationship, objectRef, relationship, subjectRef } from "./tuples.js";

// ============================================================================
// Types
// ============================================================================

export type SpiceDbConfig = {
  endpoint: string;
  token: string;
  insecure: boolean;
};

export type ConsistencyMode =
  | { mode: "full" }
  | { mode: "at_least_as_fresh"; token: string }
  | { mode: "minimize_latency" };

// ============================================================================
// Conversion
// ============================================================================

export function toApiRelationship(rel: Relationship): v1.Relationship {
  return v1.Relationship.create({
    resource: v1.ObjectReference.create({
      objectType: rel.object.type,
      objectId: rel.object.id,
    }),
    relation: rel.relation,
    subject: v1.SubjectReference.create({
      object: v1.ObjectReference.create({
        objectType: rel.subject.object.type,
        objectId: rel.subject.object.id,
      }),
      optionalRelation: rel.subject.relation ?? "",
    }),
  });
}

export function fromApiRelationship(rel: v1.Relationship | undefined): Relationship | null {
  if (!rel?.resource || !rel.subject?.object) return null;
  return relationship(
    objectRef(rel.resource.objectType, rel.resource.objectId),
    rel.relation,
    subjectRef(
      objectRef(rel.subject.object.objectType, rel.subject.object.objectId),
      rel.subject.optionalRelation,
    ),
  );
}

export function toApiFilter(filter: RelationshipFilter): v1.RelationshipFilter {
  return v1.RelationshipFilter.create({
    resourceType: filter.resourceType,
    ...(filter.resourceId ? { optionalResourceId: filter.resourceId } : {}),
    ...(filter.resourceIdPrefix ? { optionalResourceIdPrefix: filter.resourceIdPrefix } : {}),
    ...(filter.relation ? { optionalRelation: filter.relation } : {}),
    ...(filter.subjectType
      ? {
          optionalSubjectFilter: v1.SubjectFilter.create({
            subjectType: filter.subjectType,
            ...(filter.subjectId ? { optionalSubjectId: filter.subjectId } : {}),
            ...(filter.subjectRelation !== undefined
              ? {
                  optionalRelation: v1.SubjectFilter_RelationFilter.create({
                    relation: filter.subjectRelation,
                  }),
                }
              : {}),
          }),
        }
      : {}),
  });
}

// ============================================================================
// Error mapping
// ============================================================================

const TRANSIENT_CODES: ReadonlySet<number> = new Set([
  status.CANCELLED,
  status.UNKNOWN,
  status.DEADLINE_EXCEEDED,
  status.RESOURCE_EXHAUSTED,
  status.ABORTED,
  status.INTERNAL,
  status.UNAVAILABLE,
]);

function grpcCode(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "number") {
    return err.code;
  }
  return null;
}

/**
 * Maps a failed call onto the store error taxonomy. Errors without a gRPC
 * status (connection setup, socket resets) count as unavailability.
 */
export function toStoreError(err: unknown, batch: Relationship[] = []): Error {
  const message = err instanceof Error ? err.message : String(err);
  const code = grpcCode(err);
  if (code === null || TRANSIENT_CODES.has(code)) {
    return new StoreUnavailableError(`SpiceDB unavailable: ${message}`, err);
  }
  if (code === status.ALREADY_EXISTS) {
    const conflict = new RelationshipConflictError(batch);
    conflict.cause = err;
    return conflict;
  }
  return new StoreRejectedError(`SpiceDB rejected request: ${message}`, err);
}

// ============================================================================
// Client
// ============================================================================

export class SpiceDbClient implements RelationStore {
  private client: ReturnType<typeof v1.NewClient>;
  private promises: ReturnType<typeof v1.NewClient>["promises"];

  constructor(
    config: SpiceDbConfig,
    private readonly readConsistency: ConsistencyMode = { mode: "full" },
  ) {
    if (config.insecure) {
      this.client = v1.NewClient(
        config.token,
        config.endpoint,
        v1.ClientSecurity.INSECURE_LOCALHOST_ALLOWED,
      );
    } else {
      this.client = v1.NewClient(config.token, config.endpoint);
    }
    this.promises = this.client.promises;
  }

  close(): void {
    this.client.close();
  }

  // --------------------------------------------------------------------------
  // Schema
  // --------------------------------------------------------------------------

  async writeSchema(schema: string): Promise<void> {
    const request = v1.WriteSchemaRequest.create({ schema });
    try {
      await this.promises.writeSchema(request);
    } catch (err) {
      throw toStoreError(err);
    }
  }

  /** The stored schema text, or null when none has been written yet. */
  async readSchema(): Promise<string | null> {
    const request = v1.ReadSchemaRequest.create({});
    try {
      const response = await this.promises.readSchema(request);
      return response.schemaText;
    } catch (err) {
      if (grpcCode(err) === status.NOT_FOUND) return null;
      throw toStoreError(err);
    }
  }

  // --------------------------------------------------------------------------
  // RelationStore
  // --------------------------------------------------------------------------

  async writeRelationships(touch: boolean, rels: Relationship[]): Promise<string | undefined> {
    const operation = touch
      ? v1.RelationshipUpdate_Operation.TOUCH
      : v1.RelationshipUpdate_Operation.CREATE;
    return this.update(operation, rels);
  }

  async deleteRelationships(rels: Relationship[]): Promise<string | undefined> {
    return this.update(v1.RelationshipUpdate_Operation.DELETE, rels);
  }

  private async update(
    operation: v1.RelationshipUpdate_Operation,
    rels: Relationship[],
  ): Promise<string | undefined> {
    if (rels.length === 0) return undefined;
    const updates = rels.map((rel) =>
      v1.RelationshipUpdate.create({ operation, relationship: toApiRelationship(rel) }),
    );
    const request = v1.WriteRelationshipsRequest.create({ updates });
    try {
      const response = await this.promises.writeRelationships(request);
      return response.writtenAt?.token;
    } catch (err) {
      throw toStoreError(err, rels);
    }
  }

  async readRelationships(filter: RelationshipFilter): Promise<Relationship[]> {
    const request = v1.ReadRelationshipsRequest.create({
      relationshipFilter: toApiFilter(filter),
      consistency: this.buildConsistency(this.readConsistency),
    });

    let results: v1.ReadRelationshipsResponse[];
    try {
      results = await this.promises.readRelationships(request);
    } catch (err) {
      throw toStoreError(err);
    }

    const rels: Relationship[] = [];
    for (const r of results) {
      const rel = fromApiRelationship(r.relationship);
      if (rel) rels.push(rel);
    }
    return rels;
  }

  // --------------------------------------------------------------------------
  // Permissions
  // --------------------------------------------------------------------------

  private buildConsistency(mode?: ConsistencyMode) {
    if (!mode || mode.mode === "minimize_latency") {
      return v1.Consistency.create({
        requirement: { oneofKind: "minimizeLatency", minimizeLatency: true },
      });
    }
    if (mode.mode === "at_least_as_fresh") {
      return v1.Consistency.create({
        requirement: {
          oneofKind: "atLeastAsFresh",
          atLeastAsFresh: v1.ZedToken.create({ token: mode.token }),
        },
      });
    }
    return v1.Consistency.create({
      requirement: { oneofKind: "fullyConsistent", fullyConsistent: true },
    });
  }

  async checkPermission(params: {
    resourceType: string;
    resourceId: string;
    permission: string;
    subjectType: string;
    subjectId: string;
    subjectRelation?: string;
    consistency?: ConsistencyMode;
  }): Promise<boolean> {
    const request = v1.CheckPermissionRequest.create({
      resource: v1.ObjectReference.create({
        objectType: params.resourceType,
        objectId: params.resourceId,
      }),
      permission: params.permission,
      subject: v1.SubjectReference.create({
        object: v1.ObjectReference.create({
          objectType: params.subjectType,
          objectId: params.subjectId,
        }),
        optionalRelation: params.subjectRelation ?? "",
      }),
      consistency: this.buildConsistency(params.consistency),
    });

    try {
      const response = await this.promises.checkPermission(request);
      return (
        response.permissionship ===
        v1.CheckPermissionResponse_Permissionship.HAS_PERMISSION
      );
    } catch (err) {
      throw toStoreError(err);
    }
  }
}

// ============================================================================
// Bundled schema
// ============================================================================

export const SCHEMA_PATH = join(dirname(fileURLToPath(import.meta.url)), "schema.zed");

export function loadBundledSchema(): string {
  return readFileSync(SCHEMA_PATH, "utf-8");
}
