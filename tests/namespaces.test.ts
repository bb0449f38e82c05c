import { describe, it, expect } from 'vitest';
import { namespaceAccessible } from '../src/lib/namespaces';
import { getNamespace } from '../src/types/pid';

describe('namespaceAccessible', () => {
  it('allows everything when restriction is off', () => {
    const config = { restrictionEnforced: false, allowedNamespaces: [] };

    expect(namespaceAccessible('anything:1', config)).toBe(true);
  });

  it('allows only listed namespaces when restriction is on', () => {
    const config = { restrictionEnforced: true, allowedNamespaces: ['demo:', 'books:'] };

    expect(namespaceAccessible('demo:1', config)).toBe(true);
    expect(namespaceAccessible('books:abc', config)).toBe(true);
    expect(namespaceAccessible('secret:1', config)).toBe(false);
  });

  it('compares whole namespaces, not prefixes', () => {
    const config = { restrictionEnforced: true, allowedNamespaces: ['demo:'] };

    expect(namespaceAccessible('demonstration:1', config)).toBe(false);
  });
});

describe('getNamespace', () => {
  it('returns the part before the first colon', () => {
    expect(getNamespace('islandora:root')).toBe('islandora');
    expect(getNamespace('a:b:c')).toBe('a');
  });
});
