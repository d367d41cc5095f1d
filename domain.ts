/**
 * RBAC Domain Types
 *
 * The relational RBAC entities the translator reads, and the references the
 * engine tracks sync state under.
 */

import type { ObjectReference } from "./tuples.js";

// ============================================================================
// Entities
// ============================================================================

export type Group = {
  id: string;
  /** Principal usernames assigned directly to the group. */
  principals: string[];
  /** Ids of groups nested in this one. */
  subgroups: string[];
};

export type AttributeFilter = {
  key: string;
  operation: "equal" | "in";
  value: string | string[];
};

export type ResourceDefinition = {
  attributeFilter: AttributeFilter;
};

export type Access = {
  /** `application:resource:verb`, e.g. `cost-management:*:read`. */
  permission: string;
  resourceDefinitions: ResourceDefinition[];
};

export type Role = {
  id: string;
  name?: string;
  access: Access[];
};

/** A role assigned to groups within a scope (workspace or resource node). */
export type RoleBinding = {
  id: string;
  roleId: string;
  groupIds: string[];
  scope: ObjectReference;
};

export type Workspace = {
  id: string;
  parentId?: string;
};

// ============================================================================
// References
// ============================================================================

export const DOMAIN_KINDS = ["group", "role", "role_binding", "workspace"] as const;

export type DomainKind = (typeof DOMAIN_KINDS)[number];

export type DomainObjectRef = {
  kind: DomainKind;
  id: string;
};

export function isDomainKind(value: string): value is DomainKind {
  return DOMAIN_KINDS.some((kind) => kind === value);
}

export function domainRef(kind: DomainKind, id: string): DomainObjectRef {
  return { kind, id };
}

export function refKey(ref: DomainObjectRef): string {
  return `${ref.kind}/${ref.id}`;
}

// ============================================================================
// Translation input
// ============================================================================

/**
 * Everything the translator needs to describe one domain object. Referenced
 * entities are resolved by the source; `null` / absent ids mean the source
 * could not find them.
 */
export type DomainState =
  | { kind: "group"; group: Group; resolvedGroupIds: string[] }
  | { kind: "role"; role: Role }
  | {
      kind: "role_binding";
      binding: RoleBinding;
      role: Role | null;
      resolvedGroupIds: string[];
    }
  | { kind: "workspace"; workspace: Workspace; parent: Workspace | null };

export function stateRef(state: DomainState): DomainObjectRef {
  switch (state.kind) {
    case "group":
      return domainRef("group", state.group.id);
    case "role":
      return domainRef("role", state.role.id);
    case "role_binding":
      return domainRef("role_binding", state.binding.id);
    case "workspace":
      return domainRef("workspace", state.workspace.id);
  }
}
