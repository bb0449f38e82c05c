/**
 * Process environment read at startup
 */
export interface Env {
  /**
   * HTTP port
   * Default: 8787
   */
  PORT?: string;

  /**
   * Query backend implementation: "memory" or "sparql"
   * Default: memory
   */
  QUERY_BACKEND?: string;

  /**
   * SPARQL endpoint of the resource index
   * Example: http://localhost:8080/fedora/risearch or http://blazegraph:9999/sparql
   * Required when QUERY_BACKEND=sparql
   */
  QUERY_SERVICE_URL?: string;

  /**
   * Timeout for a single query service request, in milliseconds
   * Default: 10000
   */
  QUERY_TIMEOUT_MS?: string;

  /**
   * JSON file used to seed the in-memory object repository
   */
  REPOSITORY_SEED?: string;

  /**
   * "true" to hide objects whose namespace is not in ALLOWED_NAMESPACES
   */
  NAMESPACE_RESTRICTION?: string;

  /**
   * Space separated namespaces, each written with its trailing colon
   * Example: "default: demo: books:"
   */
  ALLOWED_NAMESPACES?: string;

  /**
   * Page size when a request gives no limit
   * Default: 10
   */
  DEFAULT_PAGE_SIZE?: string;

  /**
   * Largest limit a request may ask for
   * Default: 1000
   */
  MAX_PAGE_SIZE?: string;
}
