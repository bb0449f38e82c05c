import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import { ValidationError } from '../utils/errors';

/**
 * Read a path parameter, throwing ValidationError if the route didn't bind it
 */
export function routeParam(c: Context<HonoEnv>, name: string): string {
  const value = c.req.param(name);
  if (!value) {
    throw new ValidationError(`Missing route parameter: ${name}`);
  }
  return value;
}
