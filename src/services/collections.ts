import type { NamespaceConfig } from '../config';
import { namespaceAccessible } from '../lib/namespaces';
import type { SearchCollectionsResponse } from '../types/collection';
import { QueryBackend, matchesTextFilter } from './query-backend';

/**
 * Label shown for a collection in search results
 */
export function formatCollectionLabel(pid: string, label: string): string {
  return `${label} (${pid})`;
}

/**
 * Find collections whose label or PID contains `textFilter`
 * (case-insensitive, literal), restricted to accessible namespaces.
 *
 * @returns Map of PID to "<label> (<pid>)"
 */
export async function searchCollections(
  backend: QueryBackend,
  textFilter: string,
  namespaces: NamespaceConfig
): Promise<SearchCollectionsResponse> {
  const candidates = await backend.findCollections(textFilter);

  const result: SearchCollectionsResponse = {};
  for (const candidate of candidates) {
    // Backends may match loosely; keep literal matches only
    if (!matchesTextFilter(candidate, textFilter)) {
      continue;
    }
    if (!namespaceAccessible(candidate.pid, namespaces)) {
      continue;
    }
    result[candidate.pid] = formatCollectionLabel(candidate.pid, candidate.label);
  }

  return result;
}
