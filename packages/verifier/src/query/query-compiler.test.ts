/**
 * Unit tests for the query compiler and matcher
 * @packageDocumentation
 */

import { compileQuery, parseQueryLine } from './query-compiler';
import { InvalidPatternError } from './pattern-errors';

describe('compileQuery', () => {
  describe('Syntax', () => {
    it('should compile comma-separated literals and wildcards', () => {
      const query = compileQuery('*, S1, *, S3, *');

      expect(query.segments).toEqual([
        { kind: 'capture', name: null, min: 0, captureIndex: 0 },
        { kind: 'literal', router: 'S1' },
        { kind: 'capture', name: null, min: 0, captureIndex: 1 },
        { kind: 'literal', router: 'S3' },
        { kind: 'capture', name: null, min: 0, captureIndex: 2 },
      ]);
      expect(query.captureCount).toBe(3);
    });

    it('should accept whitespace-separated regex-style tokens', () => {
      const query = compileQuery('.* S1 .+ . S3');

      expect(query.segments.map((segment) => segment.kind)).toEqual([
        'capture',
        'literal',
        'capture',
        'any',
        'literal',
      ]);
      expect(query.segments[2]).toEqual({ kind: 'capture', name: null, min: 1, captureIndex: 1 });
    });

    it('should compile bracketed captures', () => {
      const query = compileQuery('[head], S1, [], S3');

      expect(query.segments[0]).toEqual({ kind: 'capture', name: 'head', min: 0, captureIndex: 0 });
      expect(query.segments[2]).toEqual({ kind: 'capture', name: null, min: 0, captureIndex: 1 });
    });

    it('should render the canonical form', () => {
      expect(compileQuery('.*  S1 [mid] .+ .').toString()).toBe('*, S1, [mid], +, .');
    });

    it('should list literal routers once in pattern order', () => {
      expect(compileQuery('S2, *, S1, S2').literals).toEqual(['S2', 'S1']);
    });
  });

  describe('Invalid patterns', () => {
    it.each([
      ['', 'Pattern is empty'],
      ['   ', 'Pattern is empty'],
      ['S1,,S2', 'Empty token'],
      [',S1', 'Empty token'],
      ['S1,', 'Empty token'],
      ['[head, S1', "Unbalanced '['"],
      ['S1, tail]', "Unbalanced ']'"],
      ['[a[b]]', "Unbalanced '['"],
      ['S1*', "Invalid router name 'S1*'"],
      ['[1abc]', "Invalid capture name '1abc'"],
      ['[a], S1, [a]', "Duplicate capture name 'a'"],
    ])('should reject %j', (pattern, message) => {
      expect(() => compileQuery(pattern)).toThrow(InvalidPatternError);
      expect(() => compileQuery(pattern)).toThrow(message);
    });

    it('should report the offending position', () => {
      try {
        compileQuery('S1, S2,, S3');
        throw new Error('expected compileQuery to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidPatternError);
        expect((error as InvalidPatternError).position).toBe(7);
        expect((error as InvalidPatternError).pattern).toBe('S1, S2,, S3');
      }
    });
  });

  describe('Matching', () => {
    it('should match a literal-only pattern exactly', () => {
      const query = compileQuery('S1, S2, S3');

      expect(query.accepts(['S1', 'S2', 'S3'])).toBe(true);
      expect(query.accepts(['S1', 'S2'])).toBe(false);
      expect(query.accepts(['S1', 'S2', 'S3', 'S4'])).toBe(false);
      expect(query.accepts(['S1', 'S3', 'S2'])).toBe(false);
    });

    it('should resolve captures leftmost-first', () => {
      const query = compileQuery('*, B, *');

      const match = query.match(['A', 'B', 'C', 'B', 'D']);

      expect(match).not.toBeNull();
      expect(match?.captures).toEqual([
        { index: 0, name: null, routers: ['A'], start: 0 },
        { index: 1, name: null, routers: ['C', 'B', 'D'], start: 2 },
      ]);
    });

    it('should give empty captures when nothing precedes or follows', () => {
      const match = compileQuery('*, S1, *, S3, *').match(['S1', 'S2', 'S3']);

      expect(match?.captures.map((capture) => capture.routers)).toEqual([[], ['S2'], []]);
    });

    it('should expose named captures', () => {
      const match = compileQuery('[before], S2, [after]').match(['S1', 'S2', 'S3']);

      expect(match?.named).toEqual({ before: ['S1'], after: ['S3'] });
    });

    it('should require at least one router for one-or-more captures', () => {
      const query = compileQuery('S1, +, S3');

      expect(query.accepts(['S1', 'S3'])).toBe(false);
      expect(query.accepts(['S1', 'S2', 'S3'])).toBe(true);
      expect(query.match(['S1', 'S2', 'S4', 'S3'])?.captures[0].routers).toEqual(['S2', 'S4']);
    });

    it('should match exactly one router with the any token', () => {
      const query = compileQuery('S1, ., S3');

      expect(query.accepts(['S1', 'S2', 'S3'])).toBe(true);
      expect(query.accepts(['S1', 'S3'])).toBe(false);
      expect(query.accepts(['S1', 'S2', 'S2', 'S3'])).toBe(false);
    });

    it('should reject traces missing a required literal', () => {
      expect(compileQuery('*, S1, *, S3, *').accepts(['S1', 'S2'])).toBe(false);
    });

    it('should backtrack when the first occurrence of a literal does not lead to a match', () => {
      const match = compileQuery('*, B, C').match(['B', 'A', 'B', 'C']);

      expect(match?.captures[0].routers).toEqual(['B', 'A']);
    });

    it('should reject the empty trace unless every segment can be empty', () => {
      expect(compileQuery('*').accepts([])).toBe(true);
      expect(compileQuery('*, S1').accepts([])).toBe(false);
    });

    it('should handle long traces without exponential backtracking', () => {
      const query = compileQuery('*, *, *, *, *, *, *, *, Z');
      const trace = new Array<string>(200).fill('A');

      expect(query.accepts(trace)).toBe(false);
      expect(query.accepts([...trace, 'Z'])).toBe(true);
    });
  });
});

describe('Label constraints', () => {
  it('should split the initial and final stacks off the router path', () => {
    // Act
    const query = compileQuery('<ip> .* S1 .* S3 .* <ip>');

    // Assert
    expect(query.segments.map((segment) => segment.kind)).toEqual([
      'capture',
      'literal',
      'capture',
      'literal',
      'capture',
    ]);
    expect(query.literals).toEqual(['S1', 'S3']);
    expect(query.initialLabels?.atoms).toEqual([{ kind: 'label', label: 'ip' }]);
    expect(query.finalLabels?.atoms).toEqual([{ kind: 'label', label: 'ip' }]);
    expect(query.toString()).toBe('<ip> *, S1, *, S3, * <ip>');
  });

  it('should leave stacks unconstrained without angle brackets', () => {
    const query = compileQuery('*, S1, *');

    expect(query.initialLabels).toBeNull();
    expect(query.finalLabels).toBeNull();
  });

  it('should parse wildcards and the empty stack', () => {
    const query = compileQuery('<smpls, .+> S1 <>');

    expect(query.initialLabels?.atoms).toEqual([
      { kind: 'label', label: 'smpls' },
      { kind: 'labels', min: 1 },
    ]);
    expect(query.finalLabels?.atoms).toEqual([]);
    expect(query.initialLabels?.labels).toEqual(['smpls']);
  });

  it('should match stacks outermost label first', () => {
    const constraint = compileQuery('<10, .*> S1 <.>').initialLabels;

    expect(constraint?.matches(['10'])).toBe(true);
    expect(constraint?.matches(['10', '20', '30'])).toBe(true);
    expect(constraint?.matches(['20', '10'])).toBe(false);
    expect(constraint?.matches([])).toBe(false);
  });

  it('should match the empty stack only against <>', () => {
    const query = compileQuery('<> S1 <>');

    expect(query.initialLabels?.matches([])).toBe(true);
    expect(query.initialLabels?.matches(['10'])).toBe(false);
  });

  it('should admit a result only when its final stack matches', () => {
    const query = compileQuery('<10> S1, S2 <12>');

    expect(query.admits({ trace: ['S1', 'S2'], labels: ['12'] })).toBe(true);
    expect(query.admits({ trace: ['S1', 'S2'], labels: ['11'] })).toBe(false);
    expect(query.admits({ trace: ['S1'], labels: ['12'] })).toBe(false);
  });

  it('should admit any final stack when unconstrained', () => {
    expect(compileQuery('S1, S2').admits({ trace: ['S1', 'S2'], labels: ['99'] })).toBe(true);
  });

  it.each([
    ['<ip> S1', 'Missing final label constraint'],
    ['<ip S1', "Unbalanced '<'"],
    ['S1 <ip>', "Unexpected '<'"],
    ['S1, <ip>, S2', "Unexpected '<'"],
    ['S1 > S2', "Unexpected '>'"],
    ['<ip> S1 > S2 <ip>', "Unexpected '>'"],
    ['<ip> <ip>', 'Pattern is empty'],
    ['<ip*> S1 <ip>', "Invalid label 'ip*'"],
    ['<ip> S1 <[x]>', "Invalid label '[x]'"],
  ])('should reject %j', (pattern, message) => {
    expect(() => compileQuery(pattern)).toThrow(InvalidPatternError);
    expect(() => compileQuery(pattern)).toThrow(message);
  });

  it('should never compile an angle-bracketed token as a router', () => {
    // Arrange
    const { pattern, k } = parseQueryLine('<ip> .* S1 .* S3 .* <ip> 1');

    // Act
    const query = compileQuery(pattern);

    // Assert
    expect(k).toBe(1);
    expect(query.segments).not.toContainEqual({ kind: 'literal', router: '<ip>' });
    expect(query.segments).toHaveLength(5);
  });
});

describe('parseQueryLine', () => {
  it('should split the pattern from the trailing bound', () => {
    expect(parseQueryLine('.* S1 .* S3 .* 1')).toEqual({ pattern: '.* S1 .* S3 .*', k: 1 });
  });

  it('should trim surrounding whitespace', () => {
    expect(parseQueryLine('  *, S1, *   0 ')).toEqual({ pattern: '*, S1, *', k: 0 });
  });

  it('should reject a line without a bound', () => {
    expect(() => parseQueryLine('*, S1, *')).toThrow(InvalidPatternError);
  });
});
