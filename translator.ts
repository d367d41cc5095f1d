/**
 * RBAC → Relationship Translator
 *
 * Pure, deterministic mapping from one RBAC domain object (plus the entities
 * it references) to the canonical tuple set the relationship store must hold
 * for it. Never reads graph-store state.
 *
 * Emitted shapes:
 * - group:G #member user:P | group:S#member
 * - role:R #<permission> user:*                     (unconditional permission)
 * - role:R_<perm>_<digest> #<permission> user:*     (scoped sub-role)
 * - rbac/v1role:R #role role:<R or sub-role>
 * - role_binding:B #granted role:<R or sub-role>
 * - role_binding:B #subject group:G#member
 * - rbac/v1role:R #binding role_binding:B
 * - <scope> #user_grant role_binding:B
 * - workspace:W #parent workspace:P
 */

import { createHash } from "node:crypto";

import type { Access, DomainObjectRef, DomainState, ResourceDefinition, Role } from "./domain.js";
import { refKey, stateRef } from "./domain.js";
import { IncompleteDomainStateError } from "./errors.js";
import type { RelationshipFilter } from "./relation-store.js";
import {
  type ObjectReference,
  type Relationship,
  RelationshipSet,
  WILDCARD_ID,
  objectRef,
  relationship,
  subjectRef,
} from "./tuples.js";

// ============================================================================
// Schema names
// ============================================================================

export const ObjectTypes = {
  user: "user",
  group: "group",
  role: "role",
  roleBinding: "role_binding",
  v1Role: "rbac/v1role",
  workspace: "workspace",
} as const;

export const Relations = {
  member: "member",
  role: "role",
  binding: "binding",
  granted: "granted",
  subject: "subject",
  userGrant: "user_grant",
  parent: "parent",
} as const;

const DIGEST_LENGTH = 12;

// ============================================================================
// Permission and resource naming
// ============================================================================

/**
 * `cost-management:*:read` → `cost_management_all_read`.
 * Returns null when the permission is not `app:resource:verb`.
 *
 * The result is used as a relation on `role` without checking it against the
 * SpiceDB schema. The bundled schema.zed declares only the relations of the
 * permissions the bundled example uses; SpiceDB rejects a tuple for any
 * other permission until schema.zed gains a matching `role` relation (and
 * the `role_binding` and resource permissions that read it).
 */
export function permissionToRelation(permission: string): string | null {
  const parts = permission.split(":");
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) return null;
  return parts.map((part) => part.replace(/\*/g, "all").replace(/-/g, "_")).join("_");
}

/** `cost-management.aws.account` → `cost_management/aws_account`. */
export function attributeKeyToResourceType(key: string): string | null {
  const segments = key.split(".");
  if (segments.length < 2 || segments.some((s) => s.length === 0)) return null;
  const [app, ...rest] = segments;
  return `${app.replace(/-/g, "_")}/${rest.join("_").replace(/-/g, "_")}`;
}

function filterValues(def: ResourceDefinition): string[] {
  const { operation, value } = def.attributeFilter;
  const raw =
    operation === "in" && !Array.isArray(value)
      ? value.split(",")
      : Array.isArray(value)
        ? value
        : [value];
  return raw.map((v) => v.trim()).filter((v) => v.length > 0);
}

// ============================================================================
// Role planning
// ============================================================================

export type ScopedGrant = {
  subRoleId: string;
  /** `<relation>_<digest>`; shared by the sub-role and its sub-bindings. */
  suffix: string;
  relation: string;
  resources: ObjectReference[];
};

export type RolePlan = {
  /** Relations granted tenant-wide, sorted. */
  unconditional: string[];
  /** Scoped sub-roles, sorted by id. */
  scoped: ScopedGrant[];
};

function filterDigest(relation: string, defs: ResourceDefinition[]): string {
  const canonical = defs
    .map((def) =>
      JSON.stringify([
        def.attributeFilter.key,
        def.attributeFilter.operation,
        [...filterValues(def)].sort(),
      ]),
    )
    .sort();
  return createHash("sha256")
    .update(JSON.stringify([relation, canonical]))
    .digest("hex")
    .slice(0, DIGEST_LENGTH);
}

function scopedResources(
  role: Role,
  access: Access,
  owner: string,
): ObjectReference[] {
  const resources: ObjectReference[] = [];
  for (const def of access.resourceDefinitions) {
    const type = attributeKeyToResourceType(def.attributeFilter.key);
    if (!type) {
      throw new IncompleteDomainStateError(
        owner,
        `role ${role.id} has unsupported attribute filter key "${def.attributeFilter.key}"`,
      );
    }
    const values = filterValues(def);
    if (values.length === 0) {
      throw new IncompleteDomainStateError(
        owner,
        `role ${role.id} has an attribute filter on "${def.attributeFilter.key}" without values`,
      );
    }
    for (const id of values) resources.push(objectRef(type, id));
  }
  return resources;
}

/**
 * Splits a role's access list into tenant-wide relations and scoped
 * sub-roles. Sub-role ids are derived from (role id, permission, filters), so
 * the same role always yields the same ids.
 */
export function planRole(role: Role, owner = `role/${role.id}`): RolePlan {
  const unconditional = new Set<string>();
  const scoped = new Map<string, ScopedGrant>();

  for (const access of role.access) {
    const relation = permissionToRelation(access.permission);
    if (!relation) {
      throw new IncompleteDomainStateError(
        owner,
        `role ${role.id} has malformed permission "${access.permission}"`,
      );
    }
    if (access.resourceDefinitions.length === 0) {
      unconditional.add(relation);
      continue;
    }
    const suffix = `${relation}_${filterDigest(relation, access.resourceDefinitions)}`;
    const subRoleId = `${role.id}_${suffix}`;
    if (!scoped.has(subRoleId)) {
      scoped.set(subRoleId, {
        subRoleId,
        suffix,
        relation,
        resources: scopedResources(role, access, owner),
      });
    }
  }

  return {
    unconditional: [...unconditional].sort(),
    scoped: [...scoped.values()].sort((a, b) => (a.subRoleId < b.subRoleId ? -1 : 1)),
  };
}

// ============================================================================
// Translation
// ============================================================================

const everyUser = subjectRef(objectRef(ObjectTypes.user, WILDCARD_ID));

function memberSet(type: string, id: string) {
  return subjectRef(objectRef(type, id), Relations.member);
}

function bindingTuples(
  bindingId: string,
  grantedRoleId: string,
  v1RoleId: string,
  groupIds: string[],
  scopes: ObjectReference[],
): Relationship[] {
  const binding = objectRef(ObjectTypes.roleBinding, bindingId);
  const tuples: Relationship[] = [
    relationship(binding, Relations.granted, subjectRef(objectRef(ObjectTypes.role, grantedRoleId))),
    relationship(objectRef(ObjectTypes.v1Role, v1RoleId), Relations.binding, subjectRef(binding)),
  ];
  for (const groupId of groupIds) {
    tuples.push(relationship(binding, Relations.subject, memberSet(ObjectTypes.group, groupId)));
  }
  for (const scope of scopes) {
    tuples.push(relationship(scope, Relations.userGrant, subjectRef(binding)));
  }
  return tuples;
}

/**
 * Canonical tuple set for one domain object.
 * Throws IncompleteDomainStateError when a referenced entity is missing.
 */
export function translate(state: DomainState): RelationshipSet {
  const owner = refKey(stateRef(state));
  const set = new RelationshipSet();

  switch (state.kind) {
    case "group": {
      const group = objectRef(ObjectTypes.group, state.group.id);
      for (const principal of state.group.principals) {
        set.add(relationship(group, Relations.member, subjectRef(objectRef(ObjectTypes.user, principal))));
      }
      for (const subgroupId of state.group.subgroups) {
        if (!state.resolvedGroupIds.includes(subgroupId)) {
          throw new IncompleteDomainStateError(owner, `subgroup ${subgroupId} not found`);
        }
        set.add(relationship(group, Relations.member, memberSet(ObjectTypes.group, subgroupId)));
      }
      return set;
    }

    case "role": {
      const { role } = state;
      const plan = planRole(role, owner);
      const v1Role = objectRef(ObjectTypes.v1Role, role.id);
      if (plan.unconditional.length > 0) {
        const base = objectRef(ObjectTypes.role, role.id);
        for (const relation of plan.unconditional) {
          set.add(relationship(base, relation, everyUser));
        }
        set.add(relationship(v1Role, Relations.role, subjectRef(base)));
      }
      for (const grant of plan.scoped) {
        const subRole = objectRef(ObjectTypes.role, grant.subRoleId);
        set.add(relationship(subRole, grant.relation, everyUser));
        set.add(relationship(v1Role, Relations.role, subjectRef(subRole)));
      }
      return set;
    }

    case "role_binding": {
      const { binding, role } = state;
      if (!role) {
        throw new IncompleteDomainStateError(owner, `role ${binding.roleId} not found`);
      }
      const missing = binding.groupIds.filter((id) => !state.resolvedGroupIds.includes(id));
      if (missing.length > 0) {
        throw new IncompleteDomainStateError(owner, `groups not found: ${missing.join(", ")}`);
      }
      const plan = planRole(role, owner);
      if (plan.unconditional.length > 0) {
        for (const t of bindingTuples(binding.id, role.id, role.id, binding.groupIds, [binding.scope])) {
          set.add(t);
        }
      }
      for (const grant of plan.scoped) {
        const subBindingId = `${binding.id}_${grant.suffix}`;
        for (const t of bindingTuples(subBindingId, grant.subRoleId, role.id, binding.groupIds, grant.resources)) {
          set.add(t);
        }
      }
      return set;
    }

    case "workspace": {
      const { workspace, parent } = state;
      if (workspace.parentId === undefined) return set;
      if (!parent || parent.id !== workspace.parentId) {
        throw new IncompleteDomainStateError(owner, `parent workspace ${workspace.parentId} not found`);
      }
      set.add(
        relationship(
          objectRef(ObjectTypes.workspace, workspace.id),
          Relations.parent,
          subjectRef(objectRef(ObjectTypes.workspace, parent.id)),
        ),
      );
      return set;
    }
  }
}

// ============================================================================
// Ownership
// ============================================================================

/** `id` is `baseId` itself or a sub-role / sub-binding derived from it. */
function derivedFrom(baseId: string, id: string): boolean {
  return id === baseId || id.startsWith(`${baseId}_`);
}

/** Graph nodes that stand for a domain object in other objects' tuples. */
export function graphNodes(ref: DomainObjectRef): ObjectReference[] {
  switch (ref.kind) {
    case "group":
      return [objectRef(ObjectTypes.group, ref.id)];
    case "role":
      return [objectRef(ObjectTypes.role, ref.id), objectRef(ObjectTypes.v1Role, ref.id)];
    case "role_binding":
      return [objectRef(ObjectTypes.roleBinding, ref.id)];
    case "workspace":
      return [objectRef(ObjectTypes.workspace, ref.id)];
  }
}

/**
 * Whether a tuple lies in the namespace a domain object's canonical set is
 * drawn from. Canonical sets of distinct domain objects never overlap.
 */
export function ownsRelationship(ref: DomainObjectRef, rel: Relationship): boolean {
  switch (ref.kind) {
    case "group":
      return (
        rel.object.type === ObjectTypes.group &&
        rel.object.id === ref.id &&
        rel.relation === Relations.member
      );
    case "workspace":
      return (
        rel.object.type === ObjectTypes.workspace &&
        rel.object.id === ref.id &&
        rel.relation === Relations.parent
      );
    case "role":
      return (
        (rel.object.type === ObjectTypes.role && derivedFrom(ref.id, rel.object.id)) ||
        (rel.object.type === ObjectTypes.v1Role &&
          rel.object.id === ref.id &&
          rel.relation === Relations.role)
      );
    case "role_binding":
      return (
        (rel.object.type === ObjectTypes.roleBinding && derivedFrom(ref.id, rel.object.id)) ||
        (rel.subject.object.type === ObjectTypes.roleBinding &&
          derivedFrom(ref.id, rel.subject.object.id) &&
          (rel.relation === Relations.binding || rel.relation === Relations.userGrant))
      );
  }
}

/**
 * Store read filters covering every tuple a domain object may own, given
 * the tuples already known for it (canonical and last applied).
 */
export function ownershipFilters(ref: DomainObjectRef, known: RelationshipSet): RelationshipFilter[] {
  const filters: RelationshipFilter[] = [];
  switch (ref.kind) {
    case "group":
      filters.push({ resourceType: ObjectTypes.group, resourceId: ref.id, relation: Relations.member });
      break;
    case "workspace":
      filters.push({ resourceType: ObjectTypes.workspace, resourceId: ref.id, relation: Relations.parent });
      break;
    case "role":
      filters.push(
        { resourceType: ObjectTypes.role, resourceIdPrefix: ref.id },
        { resourceType: ObjectTypes.v1Role, resourceId: ref.id, relation: Relations.role },
      );
      break;
    case "role_binding":
      filters.push({ resourceType: ObjectTypes.roleBinding, resourceIdPrefix: ref.id });
      for (const rel of known) {
        if (!ownsRelationship(ref, rel) || rel.object.type === ObjectTypes.roleBinding) continue;
        filters.push({
          resourceType: rel.object.type,
          resourceId: rel.object.id,
          relation: rel.relation,
          subjectType: ObjectTypes.roleBinding,
        });
      }
      break;
  }

  const seen = new Set<string>();
  return filters.filter((f) => {
    const key = JSON.stringify(f);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
