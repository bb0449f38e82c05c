import { z } from 'zod';
import { PidSchema } from './pid';
import { SeedRelationshipSchema } from './relationships';
import type { RelationshipStore } from '../services/relationship-store';

export const ObjectStateSchema = z.enum(['Active', 'Inactive', 'Deleted']);

export type ObjectState = z.infer<typeof ObjectStateSchema>;

/**
 * RepositoryObject - An object as held by the repository session.
 * The session owns its lifecycle; membership code only touches
 * `relationships` (and bumps `lastModified` after a change).
 */
export interface RepositoryObject {
  id: string;
  label: string;
  owner: string;
  state: ObjectState;
  lastModified: string; // ISO 8601
  relationships: RelationshipStore;
}

// =============================================================================
// Seed file schema
// =============================================================================

/**
 * One object in a repository seed file
 *
 * Example:
 * {
 *   "pid": "test:1",
 *   "label": "Foo Bears",
 *   "owner": "admin",
 *   "models": ["islandora:collectionCModel"],
 *   "relationships": [
 *     {
 *       "predicate_uri": "info:fedora/fedora-system:def/relations-external#",
 *       "predicate": "isMemberOfCollection",
 *       "object": "islandora:root"
 *     }
 *   ]
 * }
 */
export const ObjectSeedSchema = z.object({
  pid: PidSchema,
  label: z.string().default(''),
  owner: z.string().default(''),
  state: ObjectStateSchema.default('Active'),
  last_modified: z.string().datetime().optional(),
  models: z.array(PidSchema).default([]),
  relationships: z.array(SeedRelationshipSchema).default([]),
});

export type ObjectSeed = z.input<typeof ObjectSeedSchema>;

export const RepositorySeedSchema = z.object({
  objects: z.array(ObjectSeedSchema),
});

export type RepositorySeed = z.input<typeof RepositorySeedSchema>;
