import type { CollectionCandidate, FilterMode, MemberRecord, PageResult } from '../types/collection';
import { FEDORA_RELS_EXT_URI, MEMBERSHIP_PREDICATES } from '../types/relationships';
import type { RepositoryObject } from '../types/object';
import { assertPagination } from '../utils/validation';
import { assertValidPid } from '../types/pid';
import { getParentPids } from './membership';
import { ObjectRepository, isCollection } from './repository';
import { QueryBackend, compareMembers, matchesTextFilter } from './query-backend';

/**
 * Query backend answering from an in-process object repository.
 * Every call recomputes from the repository; nothing is cached.
 */
export class MemoryQueryBackend implements QueryBackend {
  readonly supportsWrites = true;

  constructor(private repository: ObjectRepository) {}

  async collectionExists(pid: string): Promise<boolean> {
    assertValidPid(pid, 'collection PID');
    const object = this.repository.getObject(pid);
    return object !== undefined && isCollection(object);
  }

  async queryParents(pid: string): Promise<string[] | undefined> {
    assertValidPid(pid);
    const object = this.repository.getObject(pid);
    return object ? getParentPids(object) : undefined;
  }

  async queryMembers(
    collectionPid: string,
    page: number,
    limit: number,
    filterMode: FilterMode
  ): Promise<PageResult> {
    assertValidPid(collectionPid, 'collection PID');
    assertPagination(page, limit);

    const members = this.repository
      .listObjects()
      .filter((object) => isMemberOf(object, collectionPid))
      .filter((object) => filterMode === 'manage' || object.state === 'Active')
      .map(toMemberRecord)
      .sort(compareMembers);

    const offset = page * limit;
    return {
      total: members.length,
      items: members.slice(offset, offset + limit),
    };
  }

  async findCollections(textFilter: string): Promise<CollectionCandidate[]> {
    return this.repository
      .listObjects()
      .filter(isCollection)
      .map((object) => ({ pid: object.id, label: object.label }))
      .filter((candidate) => matchesTextFilter(candidate, textFilter));
  }
}

function isMemberOf(object: RepositoryObject, collectionPid: string): boolean {
  return MEMBERSHIP_PREDICATES.some(
    (predicate) =>
      object.relationships.get(FEDORA_RELS_EXT_URI, predicate, collectionPid).length > 0
  );
}

function toMemberRecord(object: RepositoryObject): MemberRecord {
  return {
    pid: object.id,
    ...(object.label ? { title: object.label } : {}),
    ...(object.owner ? { owner: object.owner } : {}),
    modified: object.lastModified,
  };
}
