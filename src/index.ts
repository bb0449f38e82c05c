import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { HonoEnv } from './types/hono';
import type { AppConfig } from './config';
import type { ObjectRepository } from './services/repository';
import type { QueryBackend } from './services/query-backend';
import { errorToResponse } from './utils/errors';

// Handlers
import {
  searchCollectionsHandler,
  listMembersHandler,
  addMemberHandler,
  removeMemberHandler,
  migrateMembersHandler,
  shareMembersHandler,
} from './handlers/collections';
import { getParentsHandler } from './handlers/objects';

export const SERVICE_NAME = 'collection-membership-api';
export const SERVICE_VERSION = '0.1.0';

/**
 * Services shared by every request
 */
export interface AppDependencies {
  config: AppConfig;
  repository: ObjectRepository;
  backend: QueryBackend;
}

export function createApp(deps: AppDependencies): Hono<HonoEnv> {
  const app = new Hono<HonoEnv>();

  // CORS middleware (optional, configure as needed)
  app.use('/*', cors());

  // Inject services
  app.use('*', async (c, next) => {
    c.set('config', deps.config);
    c.set('repository', deps.repository);
    c.set('backend', deps.backend);
    await next();
  });

  // Global error handler
  app.onError((err) => {
    return errorToResponse(err);
  });

  // Health check
  app.get('/', (c) => {
    return c.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: 'ok',
    });
  });

  // Routes

  // GET /collections/search?q= (must come before /:pid routes)
  app.get('/collections/search', searchCollectionsHandler);

  // GET /collections/:pid/members
  app.get('/collections/:pid/members', listMembersHandler);

  // POST /collections/:pid/members
  app.post('/collections/:pid/members', addMemberHandler);

  // DELETE /collections/:pid/members/:memberPid
  app.delete('/collections/:pid/members/:memberPid', removeMemberHandler);

  // POST /collections/:pid/migrate - Move children to another collection
  app.post('/collections/:pid/migrate', migrateMembersHandler);

  // POST /collections/:pid/share - Add children to another collection as well
  app.post('/collections/:pid/share', shareMembersHandler);

  // GET /objects/:pid/parents?exclude=
  app.get('/objects/:pid/parents', getParentsHandler);

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: 'NOT_FOUND',
        message: 'Route not found',
      },
      404
    );
  });

  return app;
}
