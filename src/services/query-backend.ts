import type { CollectionCandidate, FilterMode, PageResult } from '../types/collection';

/**
 * Query service used for member listings and collection lookup.
 *
 * Implementations page server-side: `page` is zero-based, `limit` is the page
 * size, and `total` is counted independently of the returned slice.
 * Failures of the underlying service surface as BackendUnavailableError;
 * bad arguments are rejected with InvalidArgumentError before querying.
 */
export interface QueryBackend {
  /**
   * True when membership writes made through the object repository are
   * visible to this backend's queries. Writes are refused otherwise.
   */
  readonly supportsWrites: boolean;

  /**
   * Whether `pid` names an object with the collection content model
   */
  collectionExists(pid: string): Promise<boolean>;

  /**
   * Parents of an object under either membership predicate, or undefined
   * when the object is unknown
   */
  queryParents(pid: string): Promise<string[] | undefined>;

  queryMembers(
    collectionPid: string,
    page: number,
    limit: number,
    filterMode: FilterMode
  ): Promise<PageResult>;

  /**
   * Collection objects whose label or PID contains `textFilter`,
   * compared case-insensitively as literal text
   */
  findCollections(textFilter: string): Promise<CollectionCandidate[]>;
}

/**
 * Case-insensitive literal substring match on label or PID
 */
export function matchesTextFilter(candidate: CollectionCandidate, textFilter: string): boolean {
  const needle = textFilter.toLowerCase();
  return (
    candidate.label.toLowerCase().includes(needle) ||
    candidate.pid.toLowerCase().includes(needle)
  );
}

/**
 * Order used for member listings: title, then PID
 */
export function compareMembers(
  a: { pid: string; title?: string },
  b: { pid: string; title?: string }
): number {
  const byTitle = (a.title ?? '').localeCompare(b.title ?? '');
  return byTitle !== 0 ? byTitle : a.pid.localeCompare(b.pid);
}
