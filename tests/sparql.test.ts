import { describe, it, expect } from 'vitest';
import {
  escapeLiteral,
  escapeRegex,
  formatUri,
  integer,
  literal,
  prepareQuery,
  regexLiteral,
  uri,
} from '../src/utils/sparql';
import { InvalidArgumentError } from '../src/utils/errors';

describe('escapeLiteral', () => {
  it('quotes plain text', () => {
    expect(escapeLiteral('Foo Bears')).toBe('"Foo Bears"');
  });

  it('escapes quotes, backslashes and line breaks', () => {
    expect(escapeLiteral(`a"b'c\\d\ne\tf`)).toBe(`"a\\"b\\'c\\\\d\\ne\\tf"`);
  });
});

describe('escapeRegex', () => {
  it('escapes XPath regex metacharacters', () => {
    expect(escapeRegex('a.b*c+d?(e)[f]{g}|h^i$j-k\\l')).toBe(
      'a\\.b\\*c\\+d\\?\\(e\\)\\[f\\]\\{g\\}\\|h\\^i\\$j\\-k\\\\l'
    );
  });

  it('leaves ordinary text alone', () => {
    expect(escapeRegex('bear')).toBe('bear');
  });
});

describe('formatUri', () => {
  it('wraps an IRI in angle brackets', () => {
    expect(formatUri('info:fedora/test:1')).toBe('<info:fedora/test:1>');
  });

  it.each(['info:fedora/test:1> } DROP ALL {', 'has space', ''])('rejects %j', (value) => {
    expect(() => formatUri(value)).toThrow(InvalidArgumentError);
  });
});

describe('prepareQuery', () => {
  it('binds each parameter by kind', () => {
    const query = prepareQuery(
      'SELECT ?o WHERE { ?o <p> $target . FILTER(regex(?l, $filter, "i") && ?n = $name) } LIMIT $limit',
      {
        target: uri('info:fedora/test:1'),
        filter: regexLiteral('a.b'),
        name: literal('x'),
        limit: integer(10),
      }
    );

    expect(query).toBe(
      'SELECT ?o WHERE { ?o <p> <info:fedora/test:1> . FILTER(regex(?l, "a\\\\.b", "i") && ?n = "x") } LIMIT 10'
    );
  });

  it('does not expand placeholders inside bound values', () => {
    const query = prepareQuery('FILTER(?l = $a || ?l = $b)', {
      a: literal('$b'),
      b: literal('second'),
    });

    expect(query).toBe('FILTER(?l = "$b" || ?l = "second")');
  });

  it('keeps an injection attempt inside a single literal', () => {
    const query = prepareQuery('FILTER(regex(?label, $filter, "i"))', {
      filter: regexLiteral("'; DROP ALL; --"),
    });

    expect(query).toBe(`FILTER(regex(?label, "\\'; DROP ALL; \\\\-\\\\-", "i"))`);
  });

  it('throws on a missing parameter', () => {
    expect(() => prepareQuery('LIMIT $limit', {})).toThrow('Missing query parameter: limit');
  });

  it('rejects non-integer numbers', () => {
    expect(() => prepareQuery('LIMIT $limit', { limit: integer(1.5) })).toThrow(
      InvalidArgumentError
    );
  });
});
