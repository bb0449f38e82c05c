import { readFile } from 'node:fs/promises';
import { NotFoundError } from '../utils/errors';
import {
  ObjectSeed,
  ObjectSeedSchema,
  RepositoryObject,
  RepositorySeed,
  RepositorySeedSchema,
} from '../types/object';
import {
  COLLECTION_CONTENT_MODEL,
  FEDORA_MODEL_URI,
  HAS_MODEL,
} from '../types/relationships';
import { MemoryRelationshipStore } from './relationship-store';

/**
 * Lookup of repository objects for the current session
 */
export interface ObjectRepository {
  getObject(pid: string): RepositoryObject | undefined;
  listObjects(): RepositoryObject[];
}

/**
 * Object repository kept in process memory, optionally seeded from JSON.
 * Objects are returned by reference so relationship changes are visible to
 * every later reader, including the in-memory query backend.
 */
export class MemoryObjectRepository implements ObjectRepository {
  private objects = new Map<string, RepositoryObject>();

  static fromSeed(seed: RepositorySeed): MemoryObjectRepository {
    const parsed = RepositorySeedSchema.parse(seed);
    const repository = new MemoryObjectRepository();
    for (const object of parsed.objects) {
      repository.addObject(object);
    }
    return repository;
  }

  /**
   * Create an object; content models become hasModel triples
   */
  addObject(seed: ObjectSeed): RepositoryObject {
    const parsed = ObjectSeedSchema.parse(seed);
    if (this.objects.has(parsed.pid)) {
      throw new Error(`Duplicate object in repository: ${parsed.pid}`);
    }

    const relationships = new MemoryRelationshipStore(parsed.pid, parsed.relationships);
    for (const model of parsed.models) {
      relationships.add(FEDORA_MODEL_URI, HAS_MODEL, model);
    }

    const object: RepositoryObject = {
      id: parsed.pid,
      label: parsed.label,
      owner: parsed.owner,
      state: parsed.state,
      lastModified: parsed.last_modified ?? new Date().toISOString(),
      relationships,
    };

    this.objects.set(object.id, object);
    return object;
  }

  getObject(pid: string): RepositoryObject | undefined {
    return this.objects.get(pid);
  }

  listObjects(): RepositoryObject[] {
    return [...this.objects.values()];
  }

  get size(): number {
    return this.objects.size;
  }
}

/**
 * Get an object or throw NotFoundError
 */
export function requireObject(
  repository: ObjectRepository,
  pid: string,
  resource: string = 'Object'
): RepositoryObject {
  const object = repository.getObject(pid);
  if (!object) {
    throw new NotFoundError(resource, pid);
  }
  return object;
}

/**
 * Check if an object carries the collection content model
 */
export function isCollection(object: RepositoryObject): boolean {
  return object.relationships.get(FEDORA_MODEL_URI, HAS_MODEL, COLLECTION_CONTENT_MODEL).length > 0;
}

/**
 * Read a seed file and build a repository from it
 */
export async function loadRepositorySeed(path: string): Promise<MemoryObjectRepository> {
  const raw = await readFile(path, 'utf8');
  const repository = MemoryObjectRepository.fromSeed(JSON.parse(raw));
  console.log(`[REPOSITORY] Loaded ${repository.size} objects from ${path}`);
  return repository;
}
