/**
 * Canonical set differ.
 *
 * Applying `remove` then `add` (in either order, the two are disjoint) to a
 * store holding exactly `previous` leaves it holding exactly `next`.
 */

import { RelationshipSet } from "./tuples.js";

export type Delta = {
  add: RelationshipSet;
  remove: RelationshipSet;
};

export function diff(previous: RelationshipSet, next: RelationshipSet): Delta {
  return {
    add: next.difference(previous),
    remove: previous.difference(next),
  };
}

export function isEmptyDelta(delta: Delta): boolean {
  return delta.add.size === 0 && delta.remove.size === 0;
}

/** The set a store holding `current` ends up with after `delta`. */
export function applyDelta(current: RelationshipSet, delta: Delta): RelationshipSet {
  return current.difference(delta.remove).union(delta.add);
}

export function describeDelta(delta: Delta): string {
  return `+${delta.add.size}/-${delta.remove.size}`;
}
