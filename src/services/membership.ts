import type { RelationshipStore } from './relationship-store';
import {
  FEDORA_RELS_EXT_URI,
  IS_MEMBER_OF,
  IS_MEMBER_OF_COLLECTION,
  MEMBERSHIP_PREDICATES,
} from '../types/relationships';

/**
 * An object whose outgoing relationships can be read and written
 */
export interface RelatedObject {
  id: string;
  relationships: RelationshipStore;
}

/**
 * Anything identified by a PID (collections are only referenced by id here)
 */
export interface Identified {
  id: string;
}

/**
 * Add `member` to `collection` via isMemberOfCollection.
 * Idempotent: an existing triple is left as is, never duplicated.
 *
 * @returns true if a triple was written
 */
export function addToCollection(member: RelatedObject, collection: Identified): boolean {
  const existing = member.relationships.get(
    FEDORA_RELS_EXT_URI,
    IS_MEMBER_OF_COLLECTION,
    collection.id
  );
  if (existing.length > 0) {
    return false;
  }

  member.relationships.add(FEDORA_RELS_EXT_URI, IS_MEMBER_OF_COLLECTION, collection.id);
  console.log(`[MEMBERSHIP] Added ${member.id} to ${collection.id}`);
  return true;
}

/**
 * Remove `member` from `collection` under both membership predicates.
 * A member that is not in the collection is left untouched.
 */
export function removeFromCollection(member: RelatedObject, collection: Identified): void {
  for (const predicate of MEMBERSHIP_PREDICATES) {
    member.relationships.remove(FEDORA_RELS_EXT_URI, predicate, collection.id);
  }
  console.log(`[MEMBERSHIP] Removed ${member.id} from ${collection.id}`);
}

/**
 * Every collection the object belongs to, under either membership predicate.
 * Deduplicated, blank values dropped; order carries no meaning.
 */
export function getParentPids(object: RelatedObject): string[] {
  const parents = new Set<string>();

  for (const predicate of [IS_MEMBER_OF_COLLECTION, IS_MEMBER_OF]) {
    for (const triple of object.relationships.get(FEDORA_RELS_EXT_URI, predicate)) {
      if (triple.object.length > 0) {
        parents.add(triple.object);
      }
    }
  }

  return [...parents];
}

/**
 * Parents of `object` other than `excludedParent`
 */
export function getOtherParents(object: RelatedObject, excludedParent: Identified): string[] {
  const parents = new Set(getParentPids(object));
  parents.delete(excludedParent.id);
  return [...parents];
}

/**
 * Move `member` from `source` to `destination`.
 * The destination link is written before the source link is dropped, so the
 * member is never left without either parent. Same source and destination is
 * a no-op.
 *
 * @returns false when nothing was moved
 */
export function migrateToCollection(
  member: RelatedObject,
  source: Identified,
  destination: Identified
): boolean {
  if (source.id === destination.id) {
    return false;
  }
  addToCollection(member, destination);
  removeFromCollection(member, source);
  return true;
}

/**
 * Give `member` an additional parent, keeping its current ones
 */
export function shareWithCollection(member: RelatedObject, destination: Identified): boolean {
  return addToCollection(member, destination);
}
