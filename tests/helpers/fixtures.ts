import { MemoryObjectRepository } from '../../src/services/repository';
import { MemoryRelationshipStore } from '../../src/services/relationship-store';
import type { RelatedObject } from '../../src/services/membership';
import type { AppConfig } from '../../src/config';
import {
  COLLECTION_CONTENT_MODEL,
  FEDORA_RELS_EXT_URI,
  IS_MEMBER_OF,
  IS_MEMBER_OF_COLLECTION,
} from '../../src/types/relationships';

export function memberOf(collection: string) {
  return { predicate_uri: FEDORA_RELS_EXT_URI, predicate: IS_MEMBER_OF_COLLECTION, object: collection };
}

export function legacyMemberOf(collection: string) {
  return { predicate_uri: FEDORA_RELS_EXT_URI, predicate: IS_MEMBER_OF, object: collection };
}

/**
 * Bare object with an empty relationship set
 */
export function relatedObject(id: string): RelatedObject & { relationships: MemoryRelationshipStore } {
  return { id, relationships: new MemoryRelationshipStore(id) };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 8787,
    backend: 'memory',
    queryTimeoutMs: 10000,
    namespaces: { restrictionEnforced: false, allowedNamespaces: [] },
    paging: { defaultPageSize: 10, maxPageSize: 1000 },
    ...overrides,
  };
}

/**
 * Two collections in the "test" namespace, one in "other", and members:
 * - test:a  Active, isMemberOfCollection test:1
 * - test:b  Active, isMemberOf test:1 (legacy predicate)
 * - test:c  Inactive, isMemberOfCollection test:1
 * - test:d  Active, member of test:1 and test:2
 */
export function buildRepository(): MemoryObjectRepository {
  return MemoryObjectRepository.fromSeed({
    objects: [
      { pid: 'test:1', label: 'Foo Bears', owner: 'admin', models: [COLLECTION_CONTENT_MODEL] },
      { pid: 'test:2', label: 'Other', owner: 'admin', models: [COLLECTION_CONTENT_MODEL] },
      { pid: 'other:9', label: 'Bearings', owner: 'admin', models: [COLLECTION_CONTENT_MODEL] },
      {
        pid: 'test:a',
        label: 'Alpha',
        owner: 'alice',
        last_modified: '2024-01-01T00:00:00.000Z',
        relationships: [memberOf('test:1')],
      },
      {
        pid: 'test:b',
        label: 'Bravo',
        owner: 'bob',
        last_modified: '2024-01-02T00:00:00.000Z',
        relationships: [legacyMemberOf('test:1')],
      },
      {
        pid: 'test:c',
        label: 'Charlie',
        owner: 'carol',
        state: 'Inactive',
        last_modified: '2024-01-03T00:00:00.000Z',
        relationships: [memberOf('test:1')],
      },
      {
        pid: 'test:d',
        label: 'Delta',
        owner: 'dave',
        last_modified: '2024-01-04T00:00:00.000Z',
        relationships: [memberOf('test:1'), memberOf('test:2')],
      },
    ],
  });
}
