import type { Env } from './types/env';

export type QueryBackendKind = 'memory' | 'sparql';

/**
 * Namespace restriction applied to collection search results
 */
export interface NamespaceConfig {
  restrictionEnforced: boolean;
  allowedNamespaces: string[];
}

/**
 * Page-size defaults for member listings
 */
export interface PagingConfig {
  defaultPageSize: number;
  maxPageSize: number;
}

export interface AppConfig {
  port: number;
  backend: QueryBackendKind;
  queryServiceURL?: string;
  queryTimeoutMs: number;
  repositorySeed?: string;
  namespaces: NamespaceConfig;
  paging: PagingConfig;
}

export const DEFAULT_ALLOWED_NAMESPACES =
  'default: demo: changeme: ilives: islandora-book: books: newspapers:';

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || parseInt(raw, 10) < 1) {
    throw new Error(`Invalid ${name}: must be a positive integer (got: ${raw})`);
  }
  return parseInt(raw, 10);
}

/**
 * Validate environment configuration
 */
export function validateEnv(env: Env): void {
  const backend = env.QUERY_BACKEND || 'memory';
  if (backend !== 'memory' && backend !== 'sparql') {
    throw new Error(`Invalid QUERY_BACKEND: must be 'memory' or 'sparql' (got: ${backend})`);
  }

  if (backend === 'sparql') {
    if (!env.QUERY_SERVICE_URL) {
      throw new Error('QUERY_SERVICE_URL is required when QUERY_BACKEND=sparql');
    }

    // Validate URL format
    try {
      new URL(env.QUERY_SERVICE_URL);
    } catch {
      throw new Error(`Invalid QUERY_SERVICE_URL: ${env.QUERY_SERVICE_URL}`);
    }
  }

  const paging = getPagingConfig(env);
  if (paging.defaultPageSize > paging.maxPageSize) {
    throw new Error(
      `DEFAULT_PAGE_SIZE (${paging.defaultPageSize}) cannot exceed MAX_PAGE_SIZE (${paging.maxPageSize})`
    );
  }

  getPort(env);
  getQueryTimeout(env);
}

export function getPort(env: Env): number {
  return parsePositiveInt('PORT', env.PORT, 8787);
}

export function getBackendKind(env: Env): QueryBackendKind {
  return env.QUERY_BACKEND === 'sparql' ? 'sparql' : 'memory';
}

/**
 * Get query service (SPARQL endpoint) URL from environment
 */
export function getQueryServiceURL(env: Env): string | undefined {
  return env.QUERY_SERVICE_URL;
}

export function getQueryTimeout(env: Env): number {
  return parsePositiveInt('QUERY_TIMEOUT_MS', env.QUERY_TIMEOUT_MS, 10000);
}

/**
 * Namespace restriction settings. Bare entries ("demo") are normalised to
 * the colon form ("demo:") used for matching.
 */
export function getNamespaceConfig(env: Env): NamespaceConfig {
  const raw = env.ALLOWED_NAMESPACES ?? DEFAULT_ALLOWED_NAMESPACES;
  const allowedNamespaces = raw
    .split(/\s+/)
    .filter((entry) => entry.length > 0)
    .map((entry) => (entry.endsWith(':') ? entry : `${entry}:`));

  return {
    restrictionEnforced: env.NAMESPACE_RESTRICTION === 'true',
    allowedNamespaces,
  };
}

export function getPagingConfig(env: Env): PagingConfig {
  return {
    defaultPageSize: parsePositiveInt('DEFAULT_PAGE_SIZE', env.DEFAULT_PAGE_SIZE, 10),
    maxPageSize: parsePositiveInt('MAX_PAGE_SIZE', env.MAX_PAGE_SIZE, 1000),
  };
}

/**
 * Validate the environment and assemble the configuration struct handed to
 * the app at construction time
 */
export function loadConfig(env: Env): AppConfig {
  validateEnv(env);

  return {
    port: getPort(env),
    backend: getBackendKind(env),
    queryServiceURL: getQueryServiceURL(env),
    queryTimeoutMs: getQueryTimeout(env),
    repositorySeed: env.REPOSITORY_SEED || undefined,
    namespaces: getNamespaceConfig(env),
    paging: getPagingConfig(env),
  };
}
