import { vi } from 'vitest';

export type Binding = Record<string, { type: string; value: string }>;

export function sparqlResults(bindings: Binding[]): Response {
  return new Response(JSON.stringify({ head: { vars: [] }, results: { bindings } }), {
    status: 200,
    headers: { 'Content-Type': 'application/sparql-results+json' },
  });
}

export function countResult(count: number): Response {
  return sparqlResults([{ count: { type: 'literal', value: String(count) } }]);
}

function queryOf(init?: RequestInit): string {
  const body = typeof init?.body === 'string' ? init.body : '';
  return new URLSearchParams(body).get('query') ?? '';
}

/**
 * Replace global fetch with a handler that sees the submitted SPARQL text
 */
export function stubFetch(handler: (query: string) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_input: unknown, init?: RequestInit) => handler(queryOf(init)));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}
