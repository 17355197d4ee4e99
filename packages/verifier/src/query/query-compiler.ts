/**
 * Path query compiler
 *
 * Compiles a pattern over router names into an immutable matcher that is
 * built once and reused for every trace of every failure scenario.
 *
 * Pattern syntax (tokens separated by commas and/or whitespace):
 *
 * | Token              | Meaning                                  |
 * |--------------------|------------------------------------------|
 * | `S1`               | the router named `S1`                    |
 * | `*`, `.*`, `[]`    | unnamed capture, zero or more routers    |
 * | `+`, `.+`          | unnamed capture, one or more routers     |
 * | `[name]`           | named capture, zero or more routers      |
 * | `.`                | exactly one router, not captured         |
 *
 * A pattern may be wrapped in label constraints, `<initial> path <final>`,
 * on the label stack the packet enters with and the one it ends with. Inside
 * `<…>` a token is a label, `.` (one label), `.*` or `.+`; `<>` is the
 * empty stack.
 *
 * @packageDocumentation
 */

import { CaptureMatch, Label } from '@labelpath/shared';
import { InvalidPatternError } from './pattern-errors';

export interface LiteralSegment {
  readonly kind: 'literal';
  readonly router: string;
}

export interface CaptureSegment {
  readonly kind: 'capture';
  /** Capture name, or null for an unnamed group */
  readonly name: string | null;
  /** Minimum number of routers covered (0 or 1) */
  readonly min: 0 | 1;
  /** Position among the pattern's capture groups */
  readonly captureIndex: number;
}

export interface AnySegment {
  readonly kind: 'any';
}

export type PatternSegment = LiteralSegment | CaptureSegment | AnySegment;

export type LabelAtom =
  | { readonly kind: 'label'; readonly label: Label }
  | { readonly kind: 'anyLabel' }
  | { readonly kind: 'labels'; readonly min: 0 | 1 };

/**
 * Anchored pattern over a label stack, outermost label first
 */
export class LabelConstraint {
  readonly atoms: readonly LabelAtom[];

  constructor(atoms: LabelAtom[]) {
    this.atoms = Object.freeze([...atoms]);
    Object.freeze(this);
  }

  /**
   * Labels named literally, in order without duplicates
   */
  get labels(): Label[] {
    const labels: Label[] = [];
    for (const atom of this.atoms) {
      if (atom.kind === 'label' && !labels.includes(atom.label)) {
        labels.push(atom.label);
      }
    }
    return labels;
  }

  matches(stack: readonly Label[]): boolean {
    const atoms = this.atoms;
    const n = stack.length;
    const failed = new Set<number>();

    const step = (index: number, pos: number): boolean => {
      if (index === atoms.length) {
        return pos === n;
      }
      const key = index * (n + 1) + pos;
      if (failed.has(key)) {
        return false;
      }

      const atom = atoms[index];
      let matched = false;
      switch (atom.kind) {
        case 'label':
          matched = pos < n && stack[pos] === atom.label && step(index + 1, pos + 1);
          break;
        case 'anyLabel':
          matched = pos < n && step(index + 1, pos + 1);
          break;
        case 'labels':
          for (let end = pos + atom.min; end <= n && !matched; end++) {
            matched = step(index + 1, end);
          }
          break;
      }

      if (!matched) {
        failed.add(key);
      }
      return matched;
    };

    return step(0, 0);
  }

  toString(): string {
    const atoms = this.atoms.map((atom) => {
      switch (atom.kind) {
        case 'label':
          return atom.label;
        case 'anyLabel':
          return '.';
        case 'labels':
          return atom.min === 0 ? '.*' : '.+';
      }
    });
    return `<${atoms.join(', ')}>`;
  }
}

export interface LabelConstraints {
  initial?: LabelConstraint;
  final?: LabelConstraint;
}

/**
 * Accepted split of a trace
 */
export interface QueryMatch {
  /** Capture groups in pattern order */
  captures: CaptureMatch[];
  /** Routers covered by each named capture */
  named: Record<string, string[]>;
}

interface Token {
  text: string;
  position: number;
  bracketed: boolean;
}

const CAPTURE_NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * Compiled path query
 * @remarks
 * Matching is anchored: the whole trace must be consumed. Capture groups are
 * resolved left to right, each taking the shortest run of routers that still
 * lets the rest of the pattern match, so the last group absorbs whatever
 * remains. Against `[A, B, C, B, D]` the pattern `*, B, *` yields the groups
 * `[A]` and `[C, B, D]`.
 */
export class CompiledQuery {
  readonly segments: readonly PatternSegment[];
  readonly captureCount: number;
  /** Constraint on the stack the packet enters with, or null for any */
  readonly initialLabels: LabelConstraint | null;
  /** Constraint on the stack the packet ends with, or null for any */
  readonly finalLabels: LabelConstraint | null;

  /**
   * `minRemaining[i]`: fewest routers segments `i..end` can match
   */
  private readonly minRemaining: readonly number[];

  constructor(
    readonly source: string,
    segments: PatternSegment[],
    labels: LabelConstraints = {}
  ) {
    this.segments = Object.freeze([...segments]);
    this.initialLabels = labels.initial ?? null;
    this.finalLabels = labels.final ?? null;
    this.captureCount = segments.filter((segment) => segment.kind === 'capture').length;

    const minRemaining = new Array<number>(segments.length + 1).fill(0);
    for (let i = segments.length - 1; i >= 0; i--) {
      minRemaining[i] = minRemaining[i + 1] + minLength(segments[i]);
    }
    this.minRemaining = Object.freeze(minRemaining);
    Object.freeze(this);
  }

  /**
   * Router names the pattern requires literally, in pattern order without duplicates
   */
  get literals(): string[] {
    const routers: string[] = [];
    for (const segment of this.segments) {
      if (segment.kind === 'literal' && !routers.includes(segment.router)) {
        routers.push(segment.router);
      }
    }
    return routers;
  }

  /**
   * Test a trace and report the accepted split
   * @returns The split, or null if the trace is rejected
   */
  match(trace: readonly string[]): QueryMatch | null {
    const segments = this.segments;
    const minRemaining = this.minRemaining;
    const n = trace.length;
    if (n < minRemaining[0]) {
      return null;
    }

    // A (segment, position) pair that failed once fails every time
    const width = n + 1;
    const failed = new Uint8Array((segments.length + 1) * width);
    const ends = new Array<number>(segments.length).fill(0);

    const step = (index: number, pos: number): boolean => {
      if (index === segments.length) {
        return pos === n;
      }
      const key = index * width + pos;
      if (failed[key] === 1 || n - pos < minRemaining[index]) {
        return false;
      }

      const segment = segments[index];
      switch (segment.kind) {
        case 'literal':
          if (trace[pos] === segment.router && step(index + 1, pos + 1)) {
            ends[index] = pos + 1;
            return true;
          }
          break;
        case 'any':
          if (step(index + 1, pos + 1)) {
            ends[index] = pos + 1;
            return true;
          }
          break;
        case 'capture':
          for (let end = pos + segment.min; end <= n - minRemaining[index + 1]; end++) {
            if (step(index + 1, end)) {
              ends[index] = end;
              return true;
            }
          }
          break;
      }

      failed[key] = 1;
      return false;
    };

    if (!step(0, 0)) {
      return null;
    }

    const captures: CaptureMatch[] = [];
    const named: Record<string, string[]> = {};
    let pos = 0;
    segments.forEach((segment, index) => {
      const end = ends[index];
      if (segment.kind === 'capture') {
        const routers = trace.slice(pos, end);
        captures.push({ index: segment.captureIndex, name: segment.name, routers, start: pos });
        if (segment.name !== null) {
          named[segment.name] = routers;
        }
      }
      pos = end;
    });

    return { captures, named };
  }

  accepts(trace: readonly string[]): boolean {
    return this.match(trace) !== null;
  }

  /**
   * Test a simulation result: its trace and, when constrained, its final label stack
   */
  admits(result: { trace: readonly string[]; labels: readonly Label[] }): boolean {
    return this.accepts(result.trace) && (this.finalLabels?.matches(result.labels) ?? true);
  }

  /**
   * Canonical comma-separated form of the pattern
   */
  toString(): string {
    const path = this.segments
      .map((segment) => {
        switch (segment.kind) {
          case 'literal':
            return segment.router;
          case 'any':
            return '.';
          case 'capture':
            if (segment.name !== null) {
              return `[${segment.name}]`;
            }
            return segment.min === 0 ? '*' : '+';
        }
      })
      .join(', ');
    if (this.initialLabels === null || this.finalLabels === null) {
      return path;
    }
    return `${this.initialLabels.toString()} ${path} ${this.finalLabels.toString()}`;
  }
}

/**
 * Compile a pattern string
 * @throws InvalidPatternError on unbalanced brackets, empty tokens, bad literals or capture names
 *
 * @example
 * ```typescript
 * const query = compileQuery('*, S1, [middle], S3, *');
 * query.match(['S1', 'S2', 'S3'])?.named.middle; // ['S2']
 *
 * compileQuery('<10> *, S1, *, S3, * <.*>').initialLabels?.matches(['10']); // true
 * ```
 */
export function compileQuery(pattern: string): CompiledQuery {
  const { labels, start, end } = splitLabelConstraints(pattern);
  const tokens = tokenize(pattern, start, end);
  const names = new Set<string>();
  let captureIndex = 0;

  const segments = tokens.map((token): PatternSegment => {
    if (token.bracketed) {
      const name = token.text === '' ? null : token.text;
      if (name !== null) {
        if (!CAPTURE_NAME.test(name)) {
          throw new InvalidPatternError(`Invalid capture name '${name}'`, pattern, token.position);
        }
        if (names.has(name)) {
          throw new InvalidPatternError(`Duplicate capture name '${name}'`, pattern, token.position);
        }
        names.add(name);
      }
      return { kind: 'capture', name, min: 0, captureIndex: captureIndex++ };
    }

    switch (token.text) {
      case '*':
      case '.*':
        return { kind: 'capture', name: null, min: 0, captureIndex: captureIndex++ };
      case '+':
      case '.+':
        return { kind: 'capture', name: null, min: 1, captureIndex: captureIndex++ };
      case '.':
        return { kind: 'any' };
    }

    if (/[*+]/.test(token.text)) {
      throw new InvalidPatternError(`Invalid router name '${token.text}'`, pattern, token.position);
    }
    return { kind: 'literal', router: token.text };
  });

  return new CompiledQuery(pattern, segments, labels);
}

/**
 * Split a query line of the form `<pattern> <k>`
 * @throws InvalidPatternError if the line does not end with a non-negative integer bound
 *
 * @example
 * ```typescript
 * parseQueryLine('.* S1 .* S3 .* 1'); // { pattern: '.* S1 .* S3 .*', k: 1 }
 * ```
 */
export function parseQueryLine(line: string): { pattern: string; k: number } {
  const match = /^(.*\S)\s+(\d+)$/.exec(line.trim());
  if (!match) {
    throw new InvalidPatternError('Query line must end with a failure bound', line, line.length);
  }
  return { pattern: match[1], k: parseInt(match[2], 10) };
}

function minLength(segment: PatternSegment): number {
  return segment.kind === 'capture' ? segment.min : 1;
}

/**
 * Cut the leading `<initial>` and trailing `<final>` constraints off a pattern
 * @returns The constraints and the bounds of the router path between them
 */
function splitLabelConstraints(pattern: string): { labels: LabelConstraints; start: number; end: number } {
  let start = 0;
  let end = pattern.length;
  while (start < end && /\s/.test(pattern[start])) {
    start++;
  }
  while (end > start && /\s/.test(pattern[end - 1])) {
    end--;
  }
  if (pattern[start] !== '<') {
    return { labels: {}, start, end };
  }

  const close = pattern.indexOf('>', start + 1);
  if (close === -1) {
    throw new InvalidPatternError("Unbalanced '<'", pattern, start);
  }
  const open = pattern.lastIndexOf('<', end - 1);
  if (pattern[end - 1] !== '>' || open <= close) {
    throw new InvalidPatternError('Missing final label constraint', pattern, end);
  }

  return {
    labels: {
      initial: parseLabelConstraint(pattern, start + 1, close),
      final: parseLabelConstraint(pattern, open + 1, end - 1),
    },
    start: close + 1,
    end: open,
  };
}

function parseLabelConstraint(pattern: string, start: number, end: number): LabelConstraint {
  const atoms: LabelAtom[] = [];
  const word = /[^\s,]+/g;
  const content = pattern.slice(start, end);

  for (let found = word.exec(content); found !== null; found = word.exec(content)) {
    const text = found[0];
    switch (text) {
      case '.':
        atoms.push({ kind: 'anyLabel' });
        continue;
      case '*':
      case '.*':
        atoms.push({ kind: 'labels', min: 0 });
        continue;
      case '+':
      case '.+':
        atoms.push({ kind: 'labels', min: 1 });
        continue;
    }
    if (/[<>[\]*+]/.test(text)) {
      throw new InvalidPatternError(`Invalid label '${text}'`, pattern, start + found.index);
    }
    atoms.push({ kind: 'label', label: text });
  }

  return new LabelConstraint(atoms);
}

function tokenize(pattern: string, from: number, to: number): Token[] {
  const tokens: Token[] = [];
  let afterComma = false;
  let i = from;

  while (i < to) {
    const ch = pattern[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === ',') {
      if (tokens.length === 0 || afterComma) {
        throw new InvalidPatternError('Empty token', pattern, i);
      }
      afterComma = true;
      i++;
      continue;
    }

    if (ch === ']') {
      throw new InvalidPatternError("Unbalanced ']'", pattern, i);
    }

    if (ch === '<' || ch === '>') {
      throw new InvalidPatternError(`Unexpected '${ch}'`, pattern, i);
    }

    if (ch === '[') {
      const close = pattern.indexOf(']', i + 1);
      const nested = pattern.indexOf('[', i + 1);
      if (close === -1 || close >= to || (nested !== -1 && nested < close)) {
        throw new InvalidPatternError("Unbalanced '['", pattern, i);
      }
      tokens.push({ text: pattern.slice(i + 1, close).trim(), position: i, bracketed: true });
      afterComma = false;
      i = close + 1;
      continue;
    }

    const start = i;
    while (i < to && !/[\s,[\]<>]/.test(pattern[i])) {
      i++;
    }
    tokens.push({ text: pattern.slice(start, i), position: start, bracketed: false });
    afterComma = false;
  }

  if (afterComma) {
    throw new InvalidPatternError('Empty token', pattern, to);
  }
  if (tokens.length === 0) {
    throw new InvalidPatternError('Pattern is empty', pattern, from);
  }
  return tokens;
}
