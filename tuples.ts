/**
 * Relationship Tuple Model
 *
 * Canonical representation of `object#relation@subject` tuples. Identity is
 * structural: two relationships are the same tuple when their canonical text
 * form (zed format) is equal, and RelationshipSet indexes on that form.
 */

// ============================================================================
// Types
// ============================================================================

export type ObjectReference = {
  readonly type: string;
  readonly id: string;
};

export type SubjectReference = {
  readonly object: ObjectReference;
  readonly relation?: string;
};

export type Relationship = {
  readonly object: ObjectReference;
  readonly relation: string;
  readonly subject: SubjectReference;
};

export const WILDCARD_ID = "*";

// ============================================================================
// Construction
// ============================================================================

export function objectRef(type: string, id: string): ObjectReference {
  return Object.freeze({ type, id });
}

export function subjectRef(object: ObjectReference, relation?: string): SubjectReference {
  return Object.freeze(relation ? { object, relation } : { object });
}

export function relationship(
  object: ObjectReference,
  relation: string,
  subject: SubjectReference,
): Relationship {
  return Object.freeze({ object, relation, subject });
}

export function sameObject(a: ObjectReference, b: ObjectReference): boolean {
  return a.type === b.type && a.id === b.id;
}

// ============================================================================
// Text form
// ============================================================================

export function formatObject(ref: ObjectReference): string {
  return `${ref.type}:${ref.id}`;
}

export function formatSubject(subject: SubjectReference): string {
  const base = formatObject(subject.object);
  return subject.relation ? `${base}#${subject.relation}` : base;
}

/** Canonical key, e.g. `group:g1#member@group:g2#member`. */
export function formatRelationship(rel: Relationship): string {
  return `${formatObject(rel.object)}#${rel.relation}@${formatSubject(rel.subject)}`;
}

export function parseObjectReference(text: string): ObjectReference {
  const idx = text.lastIndexOf(":");
  if (idx <= 0 || idx === text.length - 1) {
    throw new Error(`Invalid object reference "${text}" (expected type:id)`);
  }
  return objectRef(text.slice(0, idx), text.slice(idx + 1));
}

export function parseSubjectReference(text: string): SubjectReference {
  const hash = text.indexOf("#");
  if (hash === -1) return subjectRef(parseObjectReference(text));
  return subjectRef(parseObjectReference(text.slice(0, hash)), text.slice(hash + 1));
}

export function parseRelationship(text: string): Relationship {
  const at = text.indexOf("@");
  const hash = text.indexOf("#");
  if (at === -1 || hash === -1 || hash > at) {
    throw new Error(`Invalid relationship "${text}" (expected type:id#relation@subject)`);
  }
  return relationship(
    parseObjectReference(text.slice(0, hash)),
    text.slice(hash + 1, at),
    parseSubjectReference(text.slice(at + 1)),
  );
}

// ============================================================================
// Validation
// ============================================================================

const TYPE_SEGMENT = /^[a-z][a-z0-9_]{1,62}[a-z0-9]$/;
const RELATION_NAME = /^[a-z][a-z0-9_]{1,62}[a-z0-9]$/;
const OBJECT_ID = /^[a-zA-Z0-9/_|\-=+]{1,1024}$/;

function isValidType(type: string): boolean {
  return type.split("/").every((segment) => TYPE_SEGMENT.test(segment));
}

/**
 * Returns the problems the relationship store would reject this tuple for,
 * or an empty list. Only subjects may use the `*` wildcard id.
 */
export function validateRelationship(rel: Relationship): string[] {
  const problems: string[] = [];
  if (!isValidType(rel.object.type)) problems.push(`invalid object type "${rel.object.type}"`);
  if (!OBJECT_ID.test(rel.object.id)) problems.push(`invalid object id "${rel.object.id}"`);
  if (!RELATION_NAME.test(rel.relation)) problems.push(`invalid relation "${rel.relation}"`);
  const subject = rel.subject;
  if (!isValidType(subject.object.type)) {
    problems.push(`invalid subject type "${subject.object.type}"`);
  }
  if (subject.object.id !== WILDCARD_ID && !OBJECT_ID.test(subject.object.id)) {
    problems.push(`invalid subject id "${subject.object.id}"`);
  }
  if (subject.relation !== undefined && !RELATION_NAME.test(subject.relation)) {
    problems.push(`invalid subject relation "${subject.relation}"`);
  }
  if (subject.object.id === WILDCARD_ID && subject.relation !== undefined) {
    problems.push("wildcard subjects cannot carry a relation");
  }
  return problems;
}

// ============================================================================
// RelationshipSet
// ============================================================================

export class RelationshipSet implements Iterable<Relationship> {
  private readonly index = new Map<string, Relationship>();

  constructor(relationships: Iterable<Relationship> = []) {
    for (const rel of relationships) this.add(rel);
  }

  static empty(): RelationshipSet {
    return new RelationshipSet();
  }

  get size(): number {
    return this.index.size;
  }

  add(rel: Relationship): this {
    this.index.set(formatRelationship(rel), rel);
    return this;
  }

  delete(rel: Relationship): boolean {
    return this.index.delete(formatRelationship(rel));
  }

  has(rel: Relationship): boolean {
    return this.index.has(formatRelationship(rel));
  }

  /** Elements of this set not in `other`. */
  difference(other: RelationshipSet): RelationshipSet {
    const result = new RelationshipSet();
    for (const [key, rel] of this.index) {
      if (!other.index.has(key)) result.index.set(key, rel);
    }
    return result;
  }

  union(other: RelationshipSet): RelationshipSet {
    const result = new RelationshipSet(this);
    for (const [key, rel] of other.index) result.index.set(key, rel);
    return result;
  }

  filter(predicate: (rel: Relationship) => boolean): RelationshipSet {
    const result = new RelationshipSet();
    for (const [key, rel] of this.index) {
      if (predicate(rel)) result.index.set(key, rel);
    }
    return result;
  }

  equals(other: RelationshipSet): boolean {
    if (this.size !== other.size) return false;
    for (const key of this.index.keys()) {
      if (!other.index.has(key)) return false;
    }
    return true;
  }

  /** True if any tuple has `node` as its object or as its subject object. */
  mentions(node: ObjectReference): boolean {
    for (const rel of this.index.values()) {
      if (sameObject(rel.object, node) || sameObject(rel.subject.object, node)) return true;
    }
    return false;
  }

  /** Tuples in canonical text order. */
  toArray(): Relationship[] {
    return [...this.index.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, rel]) => rel);
  }

  toStrings(): string[] {
    return [...this.index.keys()].sort();
  }

  [Symbol.iterator](): Iterator<Relationship> {
    return this.index.values();
  }
}
