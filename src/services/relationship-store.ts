import { RelationshipTriple, matchesTriple } from '../types/relationships';

/**
 * Accessor for the outgoing relationship triples of one repository object.
 *
 * `add` and `remove` mutate the object's relationship set in place.
 * Removing a triple that does not exist is a no-op. Object values are
 * stored and compared with surrounding whitespace trimmed.
 */
export interface RelationshipStore {
  /**
   * Triples with the given predicate; only those whose object equals
   * `value` when a value is given
   */
  get(predicateUri: string, predicate: string, value?: string): RelationshipTriple[];

  add(predicateUri: string, predicate: string, value: string): void;

  /**
   * Remove every triple matching (predicateUri, predicate, value)
   */
  remove(predicateUri: string, predicate: string, value: string): void;
}

/**
 * In-memory relationship set owned by a repository object.
 * Duplicates are stored as given; callers that need uniqueness check first.
 */
export class MemoryRelationshipStore implements RelationshipStore {
  private triples: RelationshipTriple[] = [];

  constructor(private subject: string, initial: Array<Omit<RelationshipTriple, 'subject'>> = []) {
    for (const triple of initial) {
      this.add(triple.predicate_uri, triple.predicate, triple.object);
    }
  }

  get(predicateUri: string, predicate: string, value?: string): RelationshipTriple[] {
    return this.triples
      .filter((triple) => matchesTriple(triple, predicateUri, predicate, value?.trim()))
      .map((triple) => ({ ...triple }));
  }

  add(predicateUri: string, predicate: string, value: string): void {
    this.triples.push({
      subject: this.subject,
      predicate_uri: predicateUri,
      predicate,
      object: value.trim(),
    });
  }

  remove(predicateUri: string, predicate: string, value: string): void {
    this.triples = this.triples.filter(
      (triple) => !matchesTriple(triple, predicateUri, predicate, value.trim())
    );
  }

  /**
   * Snapshot of every triple, in insertion order
   */
  all(): RelationshipTriple[] {
    return this.triples.map((triple) => ({ ...triple }));
  }
}
