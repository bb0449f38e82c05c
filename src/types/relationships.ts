import { z } from 'zod';
import { PidSchema } from './pid';

// =============================================================================
// Predicate vocabulary
// =============================================================================

/**
 * Namespace of the external relations (RELS-EXT) ontology
 */
export const FEDORA_RELS_EXT_URI = 'info:fedora/fedora-system:def/relations-external#';

/**
 * Namespace of the object model ontology (content models, labels, owners)
 */
export const FEDORA_MODEL_URI = 'info:fedora/fedora-system:def/model#';

/**
 * Namespace of the view ontology (last modified date)
 */
export const FEDORA_VIEW_URI = 'info:fedora/fedora-system:def/view#';

export const IS_MEMBER_OF_COLLECTION = 'isMemberOfCollection';

/**
 * Legacy membership predicate. Older objects were linked with it, so reads and
 * removals always consider it alongside isMemberOfCollection.
 */
export const IS_MEMBER_OF = 'isMemberOf';

export const HAS_MODEL = 'hasModel';

/**
 * Content model identifying collection objects
 */
export const COLLECTION_CONTENT_MODEL = 'islandora:collectionCModel';

/**
 * Predicates that place an object inside a collection
 */
export const MEMBERSHIP_PREDICATES = [IS_MEMBER_OF_COLLECTION, IS_MEMBER_OF] as const;

// =============================================================================
// Relationship triple
// =============================================================================

/**
 * RelationshipTriple - One outgoing edge of a repository object
 *
 * Several triples may share a predicate (multi-valued relations).
 *
 * Example:
 * {
 *   "subject": "test:42",
 *   "predicate_uri": "info:fedora/fedora-system:def/relations-external#",
 *   "predicate": "isMemberOfCollection",
 *   "object": "test:collection"
 * }
 */
export const RelationshipTripleSchema = z.object({
  subject: PidSchema,
  predicate_uri: z.string().min(1),
  predicate: z.string().min(1),
  object: z.string(),
});

export type RelationshipTriple = z.infer<typeof RelationshipTripleSchema>;

/**
 * Relationship as written in a seed file (the subject is implied by the
 * enclosing object)
 */
export const SeedRelationshipSchema = RelationshipTripleSchema.omit({ subject: true });

/**
 * Check whether a triple matches a (predicate URI, predicate, value?) pattern.
 * An omitted value matches any object.
 */
export function matchesTriple(
  triple: RelationshipTriple,
  predicateUri: string,
  predicate: string,
  value?: string
): boolean {
  return (
    triple.predicate_uri === predicateUri &&
    triple.predicate === predicate &&
    (value === undefined || triple.object === value)
  );
}
