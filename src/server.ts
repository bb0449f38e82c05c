import { serve } from '@hono/node-server';
import { AppConfig, loadConfig } from './config';
import { createApp } from './index';
import { TripleStoreClient } from './clients/triple-store';
import { MemoryQueryBackend } from './services/memory-backend';
import { SparqlQueryBackend } from './services/sparql-backend';
import type { QueryBackend } from './services/query-backend';
import { MemoryObjectRepository, loadRepositorySeed } from './services/repository';

function createBackend(config: AppConfig, repository: MemoryObjectRepository): QueryBackend {
  if (config.backend === 'sparql' && config.queryServiceURL) {
    return new SparqlQueryBackend(
      new TripleStoreClient(config.queryServiceURL, config.queryTimeoutMs)
    );
  }
  return new MemoryQueryBackend(repository);
}

async function main(): Promise<void> {
  const config = loadConfig(process.env);

  const repository = config.repositorySeed
    ? await loadRepositorySeed(config.repositorySeed)
    : new MemoryObjectRepository();

  const backend = createBackend(config, repository);
  const app = createApp({ config, repository, backend });

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`[SERVER] Listening on http://localhost:${info.port} (backend: ${config.backend})`);
  });
}

main().catch((error) => {
  console.error('[SERVER] Failed to start:', error);
  process.exit(1);
});
