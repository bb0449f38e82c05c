import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import { getParents } from '../services/collection-ops';
import { routeParam } from './params';

/**
 * GET /objects/:pid/parents
 * Collections the object belongs to
 * Query params: exclude (a parent PID to leave out)
 */
export async function getParentsHandler(c: Context<HonoEnv>): Promise<Response> {
  const backend = c.get('backend');
  const pid = routeParam(c, 'pid');
  const exclude = c.req.query('exclude') || undefined;

  const response = await getParents(backend, pid, exclude);

  return c.json(response);
}
