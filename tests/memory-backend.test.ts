import { describe, it, expect } from 'vitest';
import { MemoryQueryBackend } from '../src/services/memory-backend';
import { MemoryObjectRepository } from '../src/services/repository';
import { InvalidArgumentError } from '../src/utils/errors';
import { COLLECTION_CONTENT_MODEL } from '../src/types/relationships';
import { buildRepository, memberOf } from './helpers/fixtures';

describe('MemoryQueryBackend.queryMembers', () => {
  it('lists Active members under either predicate, ordered by title', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    const result = await backend.queryMembers('test:1', 0, 10, 'view');

    expect(result.total).toBe(3);
    expect(result.items).toEqual([
      { pid: 'test:a', title: 'Alpha', owner: 'alice', modified: '2024-01-01T00:00:00.000Z' },
      { pid: 'test:b', title: 'Bravo', owner: 'bob', modified: '2024-01-02T00:00:00.000Z' },
      { pid: 'test:d', title: 'Delta', owner: 'dave', modified: '2024-01-04T00:00:00.000Z' },
    ]);
  });

  it('includes inactive members in manage mode', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    const result = await backend.queryMembers('test:1', 0, 10, 'manage');

    expect(result.total).toBe(4);
    expect(result.items.map((item) => item.pid)).toEqual(['test:a', 'test:b', 'test:c', 'test:d']);
  });

  it('counts the total independently of the page slice', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    const result = await backend.queryMembers('test:1', 1, 2, 'manage');

    expect(result.total).toBe(4);
    expect(result.items.map((item) => item.pid)).toEqual(['test:c', 'test:d']);
  });

  it('returns an empty page past the end', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    const result = await backend.queryMembers('test:1', 5, 2, 'view');

    expect(result).toEqual({ total: 3, items: [] });
  });

  it('covers every member exactly once across ceil(N/L) pages', async () => {
    const repository = MemoryObjectRepository.fromSeed({
      objects: [
        { pid: 'test:col', label: 'Collection', models: [COLLECTION_CONTENT_MODEL] },
        ...Array.from({ length: 23 }, (_, i) => ({
          pid: `test:m${i}`,
          label: `Member ${String(i).padStart(2, '0')}`,
          relationships: [memberOf('test:col')],
        })),
      ],
    });
    const backend = new MemoryQueryBackend(repository);
    const limit = 5;

    const first = await backend.queryMembers('test:col', 0, limit, 'view');
    const pages = Math.ceil(first.total / limit);
    const seen: string[] = [];
    for (let page = 0; page < pages; page++) {
      const result = await backend.queryMembers('test:col', page, limit, 'view');
      expect(result.items.length).toBeLessThanOrEqual(limit);
      seen.push(...result.items.map((item) => item.pid));
    }

    expect(pages).toBe(5);
    expect(seen).toHaveLength(23);
    expect(new Set(seen).size).toBe(23);
  });

  it('omits title and owner when the object has none', async () => {
    const repository = MemoryObjectRepository.fromSeed({
      objects: [
        { pid: 'test:col', models: [COLLECTION_CONTENT_MODEL] },
        {
          pid: 'test:bare',
          last_modified: '2024-02-01T00:00:00.000Z',
          relationships: [memberOf('test:col')],
        },
      ],
    });
    const backend = new MemoryQueryBackend(repository);

    const result = await backend.queryMembers('test:col', 0, 10, 'view');

    expect(result.items).toEqual([{ pid: 'test:bare', modified: '2024-02-01T00:00:00.000Z' }]);
  });

  it.each([
    [-1, 10],
    [0, 0],
    [1.5, 10],
    [0, -3],
  ])('rejects page=%s limit=%s', async (page, limit) => {
    const backend = new MemoryQueryBackend(buildRepository());

    await expect(backend.queryMembers('test:1', page, limit, 'view')).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });

  it('rejects a malformed collection PID', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    await expect(backend.queryMembers('no-namespace', 0, 10, 'view')).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });
});

describe('MemoryQueryBackend.findCollections', () => {
  it('matches label or PID case-insensitively', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    expect(await backend.findCollections('BEAR')).toEqual([
      { pid: 'test:1', label: 'Foo Bears' },
      { pid: 'other:9', label: 'Bearings' },
    ]);
    expect(await backend.findCollections('test:2')).toEqual([{ pid: 'test:2', label: 'Other' }]);
  });

  it('only returns objects with the collection content model', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    expect(await backend.findCollections('alpha')).toEqual([]);
  });

  it('treats regex metacharacters as text', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    expect(await backend.findCollections('.*')).toEqual([]);
  });
});

describe('MemoryQueryBackend lookups', () => {
  it('recognises collections by content model', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    expect(await backend.collectionExists('test:1')).toBe(true);
    expect(await backend.collectionExists('test:a')).toBe(false);
    expect(await backend.collectionExists('test:none')).toBe(false);
  });

  it('reads parents, or undefined for an unknown object', async () => {
    const backend = new MemoryQueryBackend(buildRepository());

    expect(await backend.queryParents('test:d')).toEqual(['test:1', 'test:2']);
    expect(await backend.queryParents('test:none')).toBeUndefined();
  });

  it('accepts membership writes', () => {
    expect(new MemoryQueryBackend(buildRepository()).supportsWrites).toBe(true);
  });
});
