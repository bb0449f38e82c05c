/**
 * Collection Operations
 *
 * Entry points used by the HTTP handlers. Reads resolve PIDs through the
 * query backend; writes resolve them against the object repository and are
 * only accepted when the backend reads that same repository. Anything
 * missing is a 404.
 *
 * Membership writes are idempotent: adding an existing member or removing an
 * absent one succeeds without changing anything.
 */

import type { PagingConfig } from '../config';
import type {
  FilterMode,
  ListMembersResponse,
  MembershipResponse,
  ParentsResponse,
  TransferMembersRequest,
  TransferMembersResponse,
} from '../types/collection';
import type { RepositoryObject } from '../types/object';
import { assertValidPid } from '../types/pid';
import { InvalidArgumentError, NotFoundError, ReadOnlyBackendError } from '../utils/errors';
import { assertPagination } from '../utils/validation';
import {
  addToCollection,
  getParentPids,
  migrateToCollection,
  removeFromCollection,
  shareWithCollection,
} from './membership';
import type { QueryBackend } from './query-backend';
import { type ObjectRepository, isCollection, requireObject } from './repository';

/**
 * Get a collection object or throw NotFoundError.
 * Objects without the collection content model don't count.
 */
export function requireCollection(repository: ObjectRepository, pid: string): RepositoryObject {
  assertValidPid(pid, 'collection PID');
  const object = repository.getObject(pid);
  if (!object || !isCollection(object)) {
    throw new NotFoundError('Collection', pid);
  }
  return object;
}

function requireMember(repository: ObjectRepository, pid: string): RepositoryObject {
  assertValidPid(pid, 'member PID');
  return requireObject(repository, pid, 'Object');
}

function assertWritable(backend: QueryBackend): void {
  if (!backend.supportsWrites) {
    throw new ReadOnlyBackendError();
  }
}

/**
 * Children that are not members of `source`, as a 400 before anything is written
 */
function assertChildrenOf(source: RepositoryObject, children: RepositoryObject[]): void {
  const strays = children
    .filter((child) => !getParentPids(child).includes(source.id))
    .map((child) => child.id);

  if (strays.length > 0) {
    throw new InvalidArgumentError(`Not members of ${source.id}: ${strays.join(', ')}`, {
      source: source.id,
      children: strays,
    });
  }
}

function touch(object: RepositoryObject): void {
  object.lastModified = new Date().toISOString();
}

/**
 * One page of a collection's members
 */
export async function listMembers(
  backend: QueryBackend,
  collectionPid: string,
  page: number,
  limit: number,
  filterMode: FilterMode,
  paging: PagingConfig
): Promise<ListMembersResponse> {
  assertPagination(page, limit, paging.maxPageSize);
  assertValidPid(collectionPid, 'collection PID');

  if (!(await backend.collectionExists(collectionPid))) {
    throw new NotFoundError('Collection', collectionPid);
  }

  const result = await backend.queryMembers(collectionPid, page, limit, filterMode);

  return {
    collection: collectionPid,
    page,
    limit,
    total: result.total,
    total_pages: Math.ceil(result.total / limit),
    items: result.items,
  };
}

export function addMember(
  repository: ObjectRepository,
  backend: QueryBackend,
  collectionPid: string,
  memberPid: string
): MembershipResponse {
  assertWritable(backend);
  const collection = requireCollection(repository, collectionPid);
  const member = requireMember(repository, memberPid);

  if (addToCollection(member, collection)) {
    touch(member);
  }

  return {
    collection: collection.id,
    member: member.id,
    parents: getParentPids(member),
  };
}

export function removeMember(
  repository: ObjectRepository,
  backend: QueryBackend,
  collectionPid: string,
  memberPid: string
): MembershipResponse {
  assertWritable(backend);
  const collection = requireCollection(repository, collectionPid);
  const member = requireMember(repository, memberPid);

  const before = getParentPids(member).length;
  removeFromCollection(member, collection);
  if (getParentPids(member).length !== before) {
    touch(member);
  }

  return {
    collection: collection.id,
    member: member.id,
    parents: getParentPids(member),
  };
}

/**
 * Move children from one collection to another.
 * Every PID is resolved, and every child checked against the source, before
 * anything is written; a bad child leaves all relationships unchanged.
 */
export function migrateMembers(
  repository: ObjectRepository,
  backend: QueryBackend,
  sourcePid: string,
  req: TransferMembersRequest
): TransferMembersResponse {
  assertWritable(backend);
  const source = requireCollection(repository, sourcePid);
  const destination = requireCollection(repository, req.destination);
  const children = req.children.map((pid) => requireMember(repository, pid));
  assertChildrenOf(source, children);

  for (const child of children) {
    if (migrateToCollection(child, source, destination)) {
      touch(child);
    }
  }

  console.log(
    `[MEMBERSHIP] Migrated ${children.length} children from ${source.id} to ${destination.id}`
  );

  return {
    source: source.id,
    destination: destination.id,
    moved: children.map((child) => child.id),
  };
}

/**
 * Add children of one collection to another, keeping their current parents
 */
export function shareMembers(
  repository: ObjectRepository,
  backend: QueryBackend,
  sourcePid: string,
  req: TransferMembersRequest
): TransferMembersResponse {
  assertWritable(backend);
  const source = requireCollection(repository, sourcePid);
  const destination = requireCollection(repository, req.destination);
  const children = req.children.map((pid) => requireMember(repository, pid));
  assertChildrenOf(source, children);

  for (const child of children) {
    if (shareWithCollection(child, destination)) {
      touch(child);
    }
  }

  console.log(
    `[MEMBERSHIP] Shared ${children.length} children of ${source.id} with ${destination.id}`
  );

  return {
    source: source.id,
    destination: destination.id,
    moved: children.map((child) => child.id),
  };
}

/**
 * Parents of an object, optionally without one excluded parent
 */
export async function getParents(
  backend: QueryBackend,
  pid: string,
  excludePid?: string
): Promise<ParentsResponse> {
  assertValidPid(pid);
  if (excludePid !== undefined) {
    assertValidPid(excludePid, 'excluded parent PID');
  }

  const parents = await backend.queryParents(pid);
  if (parents === undefined) {
    throw new NotFoundError('Object', pid);
  }

  if (excludePid === undefined) {
    return { pid, parents };
  }

  return {
    pid,
    parents: parents.filter((parent) => parent !== excludePid),
    excluded: excludePid,
  };
}
