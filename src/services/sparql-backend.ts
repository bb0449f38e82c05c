import type { CollectionCandidate, FilterMode, MemberRecord, PageResult } from '../types/collection';
import { COLLECTION_CONTENT_MODEL } from '../types/relationships';
import { assertValidPid, pidToUri, uriToPid } from '../types/pid';
import { BackendUnavailableError } from '../utils/errors';
import { assertPagination } from '../utils/validation';
import { integer, prepareQuery, regexLiteral, uri } from '../utils/sparql';
import type { SparqlBinding, TripleStoreClient } from '../clients/triple-store';
import type { QueryBackend } from './query-backend';

const PREFIXES = `PREFIX fedora-model: <info:fedora/fedora-system:def/model#>
PREFIX fedora-rels-ext: <info:fedora/fedora-system:def/relations-external#>
PREFIX fedora-view: <info:fedora/fedora-system:def/view#>`;

const MEMBERSHIP_PATTERN = `{ ?object fedora-rels-ext:isMemberOfCollection $collection }
  UNION
  { ?object fedora-rels-ext:isMemberOf $collection }
  ?object fedora-model:state ?state .`;

// Only Active members are visible outside management views
function stateFilter(filterMode: FilterMode): string {
  return filterMode === 'manage' ? '' : 'FILTER(?state = fedora-model:Active)';
}

export function membersQuery(filterMode: FilterMode): string {
  return `${PREFIXES}
SELECT DISTINCT ?object ?title ?owner ?date_modified
WHERE {
  ${MEMBERSHIP_PATTERN}
  OPTIONAL { ?object fedora-model:label ?title }
  OPTIONAL { ?object fedora-model:ownerId ?owner }
  OPTIONAL { ?object fedora-view:lastModifiedDate ?date_modified }
  ${stateFilter(filterMode)}
}
ORDER BY ?title ?object
LIMIT $limit
OFFSET $offset`;
}

export function membersCountQuery(filterMode: FilterMode): string {
  return `${PREFIXES}
SELECT (COUNT(DISTINCT ?object) AS ?count)
WHERE {
  ${MEMBERSHIP_PATTERN}
  ${stateFilter(filterMode)}
}`;
}

export const COLLECTION_EXISTS_QUERY = `${PREFIXES}
SELECT (COUNT(*) AS ?count)
WHERE {
  $collection fedora-model:hasModel $model .
}`;

export const PARENTS_QUERY = `${PREFIXES}
SELECT DISTINCT ?parent
WHERE {
  $object fedora-model:state ?state .
  OPTIONAL {
    { $object fedora-rels-ext:isMemberOfCollection ?parent }
    UNION
    { $object fedora-rels-ext:isMemberOf ?parent }
  }
}`;

export const COLLECTION_SEARCH_QUERY = `${PREFIXES}
SELECT DISTINCT ?pid ?label
WHERE {
  ?pid fedora-model:hasModel $model ;
       fedora-model:label ?label .
  FILTER(regex(?label, $filter, "i") || regex(str(?pid), $filter, "i"))
}
ORDER BY ?label`;

/**
 * Query backend over a remote resource index (SPARQL)
 * Pages server-side with LIMIT/OFFSET and counts with a separate query.
 * The index is read-only from here; membership writes are refused.
 */
export class SparqlQueryBackend implements QueryBackend {
  readonly supportsWrites = false;

  constructor(private client: TripleStoreClient) {}

  async collectionExists(pid: string): Promise<boolean> {
    assertValidPid(pid, 'collection PID');

    const rows = await this.client.select(
      prepareQuery(COLLECTION_EXISTS_QUERY, {
        collection: uri(pidToUri(pid)),
        model: uri(pidToUri(COLLECTION_CONTENT_MODEL)),
      })
    );

    return parseCount(rows) > 0;
  }

  async queryParents(pid: string): Promise<string[] | undefined> {
    assertValidPid(pid);

    const rows = await this.client.select(
      prepareQuery(PARENTS_QUERY, { object: uri(pidToUri(pid)) })
    );

    // No row at all means the object has no state, i.e. does not exist
    if (rows.length === 0) {
      return undefined;
    }

    const parents = new Set<string>();
    for (const row of rows) {
      const parent = row.parent ? uriToPid(row.parent.value).trim() : '';
      if (parent.length > 0) {
        parents.add(parent);
      }
    }
    return [...parents];
  }

  async queryMembers(
    collectionPid: string,
    page: number,
    limit: number,
    filterMode: FilterMode
  ): Promise<PageResult> {
    assertValidPid(collectionPid, 'collection PID');
    assertPagination(page, limit);

    const collection = uri(pidToUri(collectionPid));

    const [countRows, memberRows] = await Promise.all([
      this.client.select(prepareQuery(membersCountQuery(filterMode), { collection })),
      this.client.select(
        prepareQuery(membersQuery(filterMode), {
          collection,
          limit: integer(limit),
          offset: integer(page * limit),
        })
      ),
    ]);

    return {
      total: parseCount(countRows),
      items: memberRows.flatMap(toMemberRecord),
    };
  }

  async findCollections(textFilter: string): Promise<CollectionCandidate[]> {
    const rows = await this.client.select(
      prepareQuery(COLLECTION_SEARCH_QUERY, {
        model: uri(pidToUri(COLLECTION_CONTENT_MODEL)),
        filter: regexLiteral(textFilter),
      })
    );

    return rows.flatMap((row) =>
      row.pid ? [{ pid: uriToPid(row.pid.value), label: row.label?.value ?? '' }] : []
    );
  }
}

function parseCount(rows: SparqlBinding[]): number {
  const raw = rows[0]?.count?.value;
  if (raw === undefined) {
    return 0;
  }
  const count = Number(raw);
  if (!Number.isInteger(count) || count < 0) {
    throw new BackendUnavailableError('Malformed count in query response', { count: raw });
  }
  return count;
}

function toMemberRecord(row: SparqlBinding): MemberRecord[] {
  if (!row.object) {
    return [];
  }
  return [
    {
      pid: uriToPid(row.object.value),
      ...(row.title ? { title: row.title.value } : {}),
      ...(row.owner ? { owner: row.owner.value } : {}),
      ...(row.date_modified ? { modified: row.date_modified.value } : {}),
    },
  ];
}
