/**
 * Client for the resource index SPARQL endpoint
 * Submits SELECT queries and returns their variable bindings
 */

import { z } from 'zod';
import { BackendUnavailableError, describeError } from '../utils/errors';

/**
 * One RDF term in a result row
 */
export const SparqlTermSchema = z.object({
  type: z.string(),
  value: z.string(),
  datatype: z.string().optional(),
  'xml:lang': z.string().optional(),
});

export type SparqlTerm = z.infer<typeof SparqlTermSchema>;

/**
 * SPARQL 1.1 Query Results JSON Format
 */
export const SparqlResultsSchema = z.object({
  head: z.object({
    vars: z.array(z.string()).default([]),
  }),
  results: z.object({
    bindings: z.array(z.record(SparqlTermSchema)),
  }),
});

export type SparqlBinding = Record<string, SparqlTerm>;

export class TripleStoreClient {
  constructor(
    private endpoint: string,
    private timeoutMs: number = 10000
  ) {
    // Remove trailing slash if present
    this.endpoint = endpoint.replace(/\/$/, '');
  }

  /**
   * Run a SELECT query
   * Throws BackendUnavailableError if the service can't be reached, times
   * out, fails, or answers with something other than JSON results
   */
  async select(query: string): Promise<SparqlBinding[]> {
    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    console.log(`[SPARQL] → ${this.endpoint}`);

    let body: unknown;
    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Accept': 'application/sparql-results+json',
        },
        body: new URLSearchParams({ query }).toString(),
        signal: controller.signal,
      });

      const duration = Date.now() - startTime;
      console.log(`[SPARQL] ← ${this.endpoint} (${duration}ms, status: ${response.status})`);

      if (!response.ok) {
        const text = await response.text();
        throw new BackendUnavailableError(
          `Query failed: ${response.status} ${response.statusText}`,
          { status: response.status, body: text.slice(0, 500) }
        );
      }

      body = await response.json();
    } catch (error) {
      const duration = Date.now() - startTime;
      console.log(`[SPARQL] ✘ ${this.endpoint} (${duration}ms, error: ${describeError(error)})`);

      if (error instanceof BackendUnavailableError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new BackendUnavailableError(`Query timeout after ${this.timeoutMs}ms`);
      }
      throw new BackendUnavailableError(
        `Failed to reach query service: ${describeError(error)}`
      );
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = SparqlResultsSchema.safeParse(body);
    if (!parsed.success) {
      throw new BackendUnavailableError('Malformed query response', {
        errors: parsed.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      });
    }

    return parsed.data.results.bindings;
  }
}
