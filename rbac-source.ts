/**
 * RBAC Source of Truth
 *
 * The query interface the engine reads current RBAC state through, and an
 * in-memory implementation backed by a snapshot (used by the standalone CLI
 * and by tests). Deletes cascade the way the relational store does: removing
 * a group detaches it from parent groups and bindings, removing a role drops
 * its bindings.
 */

import { readFileSync } from "node:fs";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import {
  type DomainObjectRef,
  type DomainState,
  type Group,
  type Role,
  type RoleBinding,
  type Workspace,
  domainRef,
} from "./domain.js";
import { objectRef } from "./tuples.js";

// ============================================================================
// Interface
// ============================================================================

export interface RbacSource {
  /** Current state of a domain object, or null if it no longer exists. */
  load(ref: DomainObjectRef): Promise<DomainState | null>;
  listDomainObjects(): Promise<DomainObjectRef[]>;
  /** Domain objects whose translation reads `ref`'s state. */
  listDependents(ref: DomainObjectRef): Promise<DomainObjectRef[]>;
}

// ============================================================================
// Snapshot schema
// ============================================================================

const Id = Type.String({ minLength: 1 });

const AttributeFilterSchema = Type.Object(
  {
    key: Id,
    operation: Type.Union([Type.Literal("equal"), Type.Literal("in")]),
    value: Type.Union([Type.String(), Type.Array(Type.String())]),
  },
  { additionalProperties: false },
);

const AccessSchema = Type.Object(
  {
    permission: Id,
    resourceDefinitions: Type.Optional(
      Type.Array(Type.Object({ attributeFilter: AttributeFilterSchema }, { additionalProperties: false })),
    ),
  },
  { additionalProperties: false },
);

export const RbacSnapshotSchema = Type.Object(
  {
    groups: Type.Optional(
      Type.Array(
        Type.Object(
          {
            id: Id,
            principals: Type.Optional(Type.Array(Id)),
            subgroups: Type.Optional(Type.Array(Id)),
          },
          { additionalProperties: false },
        ),
      ),
    ),
    roles: Type.Optional(
      Type.Array(
        Type.Object(
          { id: Id, name: Type.Optional(Type.String()), access: Type.Array(AccessSchema) },
          { additionalProperties: false },
        ),
      ),
    ),
    bindings: Type.Optional(
      Type.Array(
        Type.Object(
          {
            id: Id,
            roleId: Id,
            groupIds: Type.Array(Id),
            scope: Type.Object({ type: Id, id: Id }, { additionalProperties: false }),
          },
          { additionalProperties: false },
        ),
      ),
    ),
    workspaces: Type.Optional(
      Type.Array(
        Type.Object({ id: Id, parentId: Type.Optional(Id) }, { additionalProperties: false }),
      ),
    ),
  },
  { additionalProperties: false },
);

export type RbacSnapshot = Static<typeof RbacSnapshotSchema>;

export function parseRbacSnapshot(value: unknown): RbacSnapshot {
  if (!Value.Check(RbacSnapshotSchema, value)) {
    const problems = [...Value.Errors(RbacSnapshotSchema, value)]
      .slice(0, 5)
      .map((e) => `${e.path || "/"}: ${e.message}`);
    throw new Error(`Invalid RBAC snapshot: ${problems.join("; ")}`);
  }
  return value;
}

// ============================================================================
// In-memory source
// ============================================================================

export class InMemoryRbacSource implements RbacSource {
  private readonly groups = new Map<string, Group>();
  private readonly roles = new Map<string, Role>();
  private readonly bindings = new Map<string, RoleBinding>();
  private readonly workspaces = new Map<string, Workspace>();

  constructor(snapshot: RbacSnapshot = {}) {
    for (const g of snapshot.groups ?? []) {
      this.putGroup({ id: g.id, principals: g.principals ?? [], subgroups: g.subgroups ?? [] });
    }
    for (const r of snapshot.roles ?? []) {
      this.putRole({
        id: r.id,
        ...(r.name !== undefined ? { name: r.name } : {}),
        access: r.access.map((a) => ({
          permission: a.permission,
          resourceDefinitions: a.resourceDefinitions ?? [],
        })),
      });
    }
    for (const b of snapshot.bindings ?? []) {
      this.putBinding({ ...b, scope: objectRef(b.scope.type, b.scope.id) });
    }
    for (const w of snapshot.workspaces ?? []) this.putWorkspace(w);
  }

  static fromFile(path: string): InMemoryRbacSource {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return new InMemoryRbacSource(parseRbacSnapshot(raw));
  }

  // --------------------------------------------------------------------------
  // RbacSource
  // --------------------------------------------------------------------------

  async load(ref: DomainObjectRef): Promise<DomainState | null> {
    switch (ref.kind) {
      case "group": {
        const group = this.groups.get(ref.id);
        if (!group) return null;
        return {
          kind: "group",
          group: structuredClone(group),
          resolvedGroupIds: group.subgroups.filter((id) => this.groups.has(id)),
        };
      }
      case "role": {
        const role = this.roles.get(ref.id);
        return role ? { kind: "role", role: structuredClone(role) } : null;
      }
      case "role_binding": {
        const binding = this.bindings.get(ref.id);
        if (!binding) return null;
        const role = this.roles.get(binding.roleId);
        return {
          kind: "role_binding",
          binding: structuredClone(binding),
          role: role ? structuredClone(role) : null,
          resolvedGroupIds: binding.groupIds.filter((id) => this.groups.has(id)),
        };
      }
      case "workspace": {
        const workspace = this.workspaces.get(ref.id);
        if (!workspace) return null;
        const parent = workspace.parentId ? this.workspaces.get(workspace.parentId) : undefined;
        return {
          kind: "workspace",
          workspace: { ...workspace },
          parent: parent ? { ...parent } : null,
        };
      }
    }
  }

  async listDomainObjects(): Promise<DomainObjectRef[]> {
    const sorted = (ids: Iterable<string>) => [...ids].sort();
    return [
      ...sorted(this.groups.keys()).map((id) => domainRef("group", id)),
      ...sorted(this.roles.keys()).map((id) => domainRef("role", id)),
      ...sorted(this.bindings.keys()).map((id) => domainRef("role_binding", id)),
      ...sorted(this.workspaces.keys()).map((id) => domainRef("workspace", id)),
    ];
  }

  async listDependents(ref: DomainObjectRef): Promise<DomainObjectRef[]> {
    switch (ref.kind) {
      case "group":
        return [
          ...[...this.groups.values()]
            .filter((g) => g.subgroups.includes(ref.id))
            .map((g) => domainRef("group", g.id)),
          ...[...this.bindings.values()]
            .filter((b) => b.groupIds.includes(ref.id))
            .map((b) => domainRef("role_binding", b.id)),
        ];
      case "role":
        return [...this.bindings.values()]
          .filter((b) => b.roleId === ref.id)
          .map((b) => domainRef("role_binding", b.id));
      case "role_binding":
        return [];
      case "workspace":
        return [...this.workspaces.values()]
          .filter((w) => w.parentId === ref.id)
          .map((w) => domainRef("workspace", w.id));
    }
  }

  // --------------------------------------------------------------------------
  // Mutations
  // --------------------------------------------------------------------------

  putGroup(group: Group): void {
    this.groups.set(group.id, structuredClone(group));
  }

  deleteGroup(id: string): void {
    this.groups.delete(id);
    for (const group of this.groups.values()) {
      group.subgroups = group.subgroups.filter((sub) => sub !== id);
    }
    for (const binding of this.bindings.values()) {
      binding.groupIds = binding.groupIds.filter((groupId) => groupId !== id);
    }
  }

  putRole(role: Role): void {
    this.roles.set(role.id, structuredClone(role));
  }

  deleteRole(id: string): void {
    this.roles.delete(id);
    for (const binding of [...this.bindings.values()]) {
      if (binding.roleId === id) this.bindings.delete(binding.id);
    }
  }

  putBinding(binding: RoleBinding): void {
    this.bindings.set(binding.id, structuredClone(binding));
  }

  deleteBinding(id: string): void {
    this.bindings.delete(id);
  }

  putWorkspace(workspace: Workspace): void {
    this.workspaces.set(workspace.id, { ...workspace });
  }

  deleteWorkspace(id: string): void {
    const children = [...this.workspaces.values()].filter((w) => w.parentId === id);
    if (children.length > 0) {
      throw new Error(
        `Workspace ${id} still has children: ${children.map((w) => w.id).join(", ")}`,
      );
    }
    this.workspaces.delete(id);
  }
}
