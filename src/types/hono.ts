/**
 * Shared Hono context types for handlers
 */
import type { AppConfig } from '../config';
import type { ObjectRepository } from '../services/repository';
import type { QueryBackend } from '../services/query-backend';

/**
 * Variables injected by middleware into the Hono context
 */
export type Variables = {
  config: AppConfig;
  repository: ObjectRepository;
  backend: QueryBackend;
};

/**
 * Full Hono environment type
 * Use this for handler context types: Context<HonoEnv>
 */
export type HonoEnv = {
  Variables: Variables;
};
