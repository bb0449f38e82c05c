/**
 * Prepared SPARQL queries
 *
 * Templates name their parameters as `$name`; result variables use `?name`.
 * Values are bound by kind and escaped for that kind, so user text can only
 * ever become a single string literal inside the query.
 *
 * @example
 * prepareQuery('SELECT ?o WHERE { ?o <p> $target } LIMIT $limit', {
 *   target: uri('info:fedora/test:1'),
 *   limit: integer(10),
 * });
 */

import { InvalidArgumentError } from './errors';

export type SparqlParam =
  | { kind: 'uri'; value: string }
  | { kind: 'literal'; value: string }
  | { kind: 'regex'; value: string }
  | { kind: 'integer'; value: number };

export function uri(value: string): SparqlParam {
  return { kind: 'uri', value };
}

export function literal(value: string): SparqlParam {
  return { kind: 'literal', value };
}

/**
 * Text to be matched literally by regex(); metacharacters are escaped
 */
export function regexLiteral(value: string): SparqlParam {
  return { kind: 'regex', value };
}

export function integer(value: number): SparqlParam {
  return { kind: 'integer', value };
}

const LITERAL_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  "'": "\\'",
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
};

/**
 * Quote a string as a SPARQL double-quoted literal
 */
export function escapeLiteral(value: string): string {
  return `"${value.replace(/[\\"'\n\r\t\b\f]/g, (char) => LITERAL_ESCAPES[char] ?? char)}"`;
}

/**
 * Escape XPath regular-expression metacharacters so the pattern matches the
 * text itself
 */
export function escapeRegex(value: string): string {
  return value.replace(/[\\|.?*+(){}$\-[\]^]/g, '\\$&');
}

// Characters IRIREF excludes
const INVALID_IRI_CHARS = /[\s<>"{}|^`\\]/;

/**
 * Wrap an IRI in angle brackets
 * Throws InvalidArgumentError for characters an IRI cannot hold
 */
export function formatUri(value: string): string {
  if (value.length === 0 || INVALID_IRI_CHARS.test(value)) {
    throw new InvalidArgumentError(`Invalid URI for query: ${value}`);
  }
  return `<${value}>`;
}

export function formatParam(param: SparqlParam): string {
  switch (param.kind) {
    case 'uri':
      return formatUri(param.value);
    case 'literal':
      return escapeLiteral(param.value);
    case 'regex':
      return escapeLiteral(escapeRegex(param.value));
    case 'integer':
      if (!Number.isSafeInteger(param.value)) {
        throw new InvalidArgumentError(`Invalid integer for query: ${param.value}`);
      }
      return String(param.value);
  }
}

/**
 * Substitute `$name` placeholders in a single pass; bound text is never
 * scanned for further placeholders
 */
export function prepareQuery(template: string, params: Record<string, SparqlParam>): string {
  return template.replace(/\$([A-Za-z_][A-Za-z0-9_]*)/g, (_match, name: string) => {
    const param = params[name];
    if (!param) {
      throw new Error(`Missing query parameter: ${name}`);
    }
    return formatParam(param);
  });
}
