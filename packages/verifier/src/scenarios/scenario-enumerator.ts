/**
 * Failure-scenario enumeration
 *
 * Produces every set of 0..k failed links lazily, smallest sets first.
 * Scenarios are addressed by index and materialized on demand through
 * combinadic unranking, so memory stays constant however large the
 * enumeration is.
 *
 * @packageDocumentation
 */

import { Link } from '@labelpath/shared';
import { NetworkModel } from '../model/network-model';

/**
 * One set of simultaneously failed links
 * @remarks
 * Failures are scenario-scoped: the model itself never changes.
 */
export class FailureScenario {
  private readonly failedIds: ReadonlySet<number>;

  constructor(
    /** Position in the enumeration */
    readonly index: bigint,
    /** Failed links, ordered by id */
    readonly failedLinks: readonly Link[]
  ) {
    this.failedIds = new Set(failedLinks.map((link) => link.id));
  }

  get size(): number {
    return this.failedLinks.length;
  }

  isFailed(linkId: number): boolean {
    return this.failedIds.has(linkId);
  }

  /** Names of the failed links */
  describe(): string[] {
    return this.failedLinks.map((link) => link.name);
  }
}

/**
 * Advisory returned when the enumeration is larger than the configured threshold
 */
export interface EnumerationOverflow {
  total: bigint;
  limit: bigint;
  k: number;
  candidateLinks: number;
}

/**
 * Error thrown when a caller decides not to proceed with an oversized enumeration
 */
export class EnumerationOverflowError extends Error {
  constructor(
    public readonly total: bigint,
    public readonly limit: bigint
  ) {
    super(`Failure enumeration needs ${total} scenarios, above the limit of ${limit}`);
    this.name = 'EnumerationOverflowError';
    Object.setPrototypeOf(this, EnumerationOverflowError.prototype);
  }
}

export interface ScenarioEnumeratorOptions {
  /**
   * Ids of the links allowed to fail (default: every link)
   */
  candidateLinks?: readonly number[];
  /**
   * Threshold above which {@link ScenarioEnumerator.checkLimit} reports an overflow
   */
  limit?: bigint;
}

/**
 * C(n, r) as an exact integer
 */
export function binomial(n: number, r: number): bigint {
  if (r < 0 || r > n) {
    return 0n;
  }
  const m = Math.min(r, n - r);
  let result = 1n;
  for (let i = 1; i <= m; i++) {
    result = (result * BigInt(n - m + i)) / BigInt(i);
  }
  return result;
}

/**
 * Number of link subsets of size 0..k: C(n, 0) + ... + C(n, k)
 */
export function countScenarios(linkCount: number, k: number): bigint {
  let total = 0n;
  for (let size = 0; size <= Math.min(k, linkCount); size++) {
    total += binomial(linkCount, size);
  }
  return total;
}

/**
 * Hands out each scenario index exactly once
 * @remarks
 * Several consumers may share a cursor: `next()` is synchronous, so two
 * callers never receive the same index.
 */
export class ScenarioCursor {
  private nextIndex = 0n;

  constructor(
    private readonly enumerator: ScenarioEnumerator,
    private readonly end: bigint
  ) {}

  /**
   * @returns The next scenario, or null when the range is exhausted
   */
  next(): FailureScenario | null {
    if (this.nextIndex >= this.end) {
      return null;
    }
    const scenario = this.enumerator.scenarioAt(this.nextIndex);
    this.nextIndex++;
    return scenario;
  }

  /** Number of scenarios handed out so far */
  get consumed(): bigint {
    return this.nextIndex;
  }
}

/**
 * Deterministic enumerator of all failure scenarios of size 0..k
 * @remarks
 * Order: by size, then lexicographically by link id within a size. The
 * same model, bound and candidates always give the same sequence.
 *
 * @example
 * ```typescript
 * const enumerator = new ScenarioEnumerator(model, 2);
 * enumerator.total; // 16n for 5 links
 * for (const scenario of enumerator) {
 *   if (violates(scenario)) break; // smallest violating scenario
 * }
 * ```
 */
export class ScenarioEnumerator implements Iterable<FailureScenario> {
  readonly k: number;
  readonly total: bigint;
  private readonly candidates: readonly Link[];
  private readonly limit?: bigint;

  /**
   * First index of each size: `sizeOffsets[s]` = C(n,0) + ... + C(n,s-1)
   */
  private readonly sizeOffsets: readonly bigint[];

  /**
   * @throws {RangeError} If k is negative or not an integer, or a candidate id is unknown
   */
  constructor(model: NetworkModel, k: number, options: ScenarioEnumeratorOptions = {}) {
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError(`Failure bound must be a non-negative integer, got ${k}`);
    }

    const ids = options.candidateLinks
      ? Array.from(new Set(options.candidateLinks)).sort((a, b) => a - b)
      : model.links.map((link) => link.id);
    this.candidates = ids.map((id) => model.getLink(id));
    this.k = Math.min(k, this.candidates.length);
    this.limit = options.limit;

    const offsets: bigint[] = [0n];
    for (let size = 0; size <= this.k; size++) {
      offsets.push(offsets[size] + binomial(this.candidates.length, size));
    }
    this.sizeOffsets = offsets;
    this.total = offsets[this.k + 1];
  }

  /** Links that may fail, ordered by id */
  get candidateLinks(): readonly Link[] {
    return this.candidates;
  }

  /**
   * Report whether the enumeration exceeds the configured limit
   * @returns The overflow advisory, or null if within the limit or no limit is set
   */
  checkLimit(): EnumerationOverflow | null {
    if (this.limit === undefined || this.total <= this.limit) {
      return null;
    }
    return {
      total: this.total,
      limit: this.limit,
      k: this.k,
      candidateLinks: this.candidates.length,
    };
  }

  /**
   * Materialize the scenario at a given enumeration index
   * @throws {RangeError} If the index is outside `[0, total)`
   */
  scenarioAt(index: bigint): FailureScenario {
    if (index < 0n || index >= this.total) {
      throw new RangeError(`Scenario index ${index} outside [0, ${this.total})`);
    }

    let size = 0;
    while (index >= this.sizeOffsets[size + 1]) {
      size++;
    }

    const positions = unrankCombination(this.candidates.length, size, index - this.sizeOffsets[size]);
    return new FailureScenario(
      index,
      positions.map((position) => this.candidates[position])
    );
  }

  /**
   * Cursor over `[0, end)`, where `end` defaults to the full enumeration
   */
  cursor(end: bigint = this.total): ScenarioCursor {
    return new ScenarioCursor(this, end < this.total ? end : this.total);
  }

  *[Symbol.iterator](): Iterator<FailureScenario> {
    const cursor = this.cursor();
    for (let scenario = cursor.next(); scenario !== null; scenario = cursor.next()) {
      yield scenario;
    }
  }
}

/**
 * The `rank`-th r-subset of {0..n-1} in lexicographic order
 */
function unrankCombination(n: number, r: number, rank: bigint): number[] {
  const result: number[] = [];
  let remaining = rank;
  let next = 0;
  for (let slot = 0; slot < r; slot++) {
    // Skip first elements whose blocks of combinations lie entirely before the rank
    for (;;) {
      const block = binomial(n - next - 1, r - slot - 1);
      if (remaining < block) {
        break;
      }
      remaining -= block;
      next++;
    }
    result.push(next);
    next++;
  }
  return result;
}
