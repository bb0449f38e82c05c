import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import {
  AddMemberRequestSchema,
  ListMembersQuerySchema,
  TransferMembersRequestSchema,
} from '../types/collection';
import { parsePagination, validateBody, validateQuery } from '../utils/validation';
import { searchCollections } from '../services/collections';
import {
  addMember,
  listMembers,
  migrateMembers,
  removeMember,
  shareMembers,
} from '../services/collection-ops';
import { routeParam } from './params';

/**
 * GET /collections/search?q=
 * Namespace-restricted collection lookup for autocomplete widgets
 * Returns { "<pid>": "<label> (<pid>)" }
 */
export async function searchCollectionsHandler(c: Context<HonoEnv>): Promise<Response> {
  const backend = c.get('backend');
  const config = c.get('config');
  const q = (c.req.query('q') ?? '').trim();

  if (q.length === 0) {
    return c.json({});
  }

  const response = await searchCollections(backend, q, config.namespaces);

  console.log(`[HANDLER] GET /collections/search q="${q}" → ${Object.keys(response).length} matches`);

  return c.json(response);
}

/**
 * GET /collections/:pid/members
 * List members with page-based pagination
 * Query params: page (zero-based), limit, mode (view | manage)
 */
export async function listMembersHandler(c: Context<HonoEnv>): Promise<Response> {
  const backend = c.get('backend');
  const config = c.get('config');
  const pid = routeParam(c, 'pid');

  const query = validateQuery(new URL(c.req.url), ListMembersQuerySchema);
  const { page, limit } = parsePagination(query.page, query.limit, config.paging);

  const response = await listMembers(
    backend,
    pid,
    page,
    limit,
    query.mode ?? 'view',
    config.paging
  );

  return c.json(response);
}

/**
 * POST /collections/:pid/members
 * Add an object to the collection (no-op if already a member)
 * Refused with 409 when the query backend cannot see repository writes
 */
export async function addMemberHandler(c: Context<HonoEnv>): Promise<Response> {
  const repository = c.get('repository');
  const backend = c.get('backend');
  const pid = routeParam(c, 'pid');

  const body = await validateBody(c.req.raw, AddMemberRequestSchema);

  const response = addMember(repository, backend, pid, body.member_pid);

  return c.json(response, 200);
}

/**
 * DELETE /collections/:pid/members/:memberPid
 * Remove an object from the collection under both membership predicates
 */
export async function removeMemberHandler(c: Context<HonoEnv>): Promise<Response> {
  const repository = c.get('repository');
  const backend = c.get('backend');
  const pid = routeParam(c, 'pid');
  const memberPid = routeParam(c, 'memberPid');

  const response = removeMember(repository, backend, pid, memberPid);

  return c.json(response, 200);
}

/**
 * POST /collections/:pid/migrate
 * Move children of this collection into the destination collection
 * Every child must currently be a member of :pid
 */
export async function migrateMembersHandler(c: Context<HonoEnv>): Promise<Response> {
  const repository = c.get('repository');
  const backend = c.get('backend');
  const pid = routeParam(c, 'pid');

  const body = await validateBody(c.req.raw, TransferMembersRequestSchema);

  const response = migrateMembers(repository, backend, pid, body);

  return c.json(response, 200);
}

/**
 * POST /collections/:pid/share
 * Add children of this collection to the destination as well
 */
export async function shareMembersHandler(c: Context<HonoEnv>): Promise<Response> {
  const repository = c.get('repository');
  const backend = c.get('backend');
  const pid = routeParam(c, 'pid');

  const body = await validateBody(c.req.raw, TransferMembersRequestSchema);

  const response = shareMembers(repository, backend, pid, body);

  return c.json(response, 200);
}
