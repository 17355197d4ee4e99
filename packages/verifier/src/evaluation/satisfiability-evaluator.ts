/**
 * k-failure satisfiability evaluation
 * @packageDocumentation
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { IngressSpec, SimulationResult, Verdict, formatLabelStack } from '@labelpath/shared';
import { NetworkModel } from '../model/network-model';
import { CompiledQuery } from '../query/query-compiler';
import {
  EnumerationOverflowError,
  FailureScenario,
  ScenarioCursor,
  ScenarioEnumerator,
} from '../scenarios/scenario-enumerator';
import {
  DEFAULT_MAX_HOPS,
  InvalidIngressError,
  ResolvedIngress,
  resolveIngress,
  simulate,
} from '../simulation/forwarding-simulator';
import { Logger, createSilentLogger } from '../utils/logger';

/** What to do when the failure enumeration exceeds `enumerationLimit` */
export const OVERFLOW_POLICIES = ['abort', 'proceed', 'sample'] as const;

export type OverflowPolicy = (typeof OVERFLOW_POLICIES)[number];

/** Default threshold for {@link EvaluatorOptions.enumerationLimit} */
export const DEFAULT_ENUMERATION_LIMIT = 1_000_000n;

export interface EvaluatorOptions {
  /** Per-packet hop cap passed to the simulator */
  maxHops?: number;
  /** Scenario count above which `overflowPolicy` applies */
  enumerationLimit?: bigint;
  /**
   * - `abort`: throw {@link EnumerationOverflowError}
   * - `proceed`: log a warning and evaluate everything
   * - `sample`: evaluate the first `enumerationLimit` scenarios; without a
   *   violation the verdict is `Inconclusive`
   */
  overflowPolicy?: OverflowPolicy;
}

export interface EvaluationScope {
  /** Names of the links allowed to fail (default: every link) */
  failableLinks?: string[];
}

export interface ConcurrentEvaluationScope extends EvaluationScope {
  /** Number of cooperative workers sharing the scenario cursor */
  concurrency?: number;
}

/**
 * Enumeration prepared for one query
 */
interface EvaluationPlan {
  enumerator: ScenarioEnumerator;
  ingress: ResolvedIngress;
  /** Exclusive end of the scenario range to evaluate */
  end: bigint;
  truncated: boolean;
}

/**
 * Keeps the violation with the lowest enumeration index
 * @remarks
 * The only state workers share besides the abort signal. Offers are
 * synchronous, so no two workers interleave inside `offer`.
 */
export class ViolationCollector {
  private best: { scenario: FailureScenario; result: SimulationResult } | null = null;

  offer(scenario: FailureScenario, result: SimulationResult): void {
    if (this.best === null || scenario.index < this.best.scenario.index) {
      this.best = { scenario, result };
    }
  }

  get violation(): { scenario: FailureScenario; result: SimulationResult } | null {
    return this.best;
  }
}

/**
 * Decides whether a path query holds under every failure scenario of size up to k
 * @remarks
 * A scenario satisfies the query when the trace of the simulated packet is
 * accepted by the compiled pattern and, if the query constrains it, the
 * final label stack matches. The query is satisfied only if every
 * scenario does; otherwise the first rejecting scenario in enumeration order
 * is reported as the counterexample, which is also the smallest one.
 *
 * @example
 * ```typescript
 * const evaluator = new SatisfiabilityEvaluator(model, { maxHops: 500 }, logger);
 * const verdict = evaluator.evaluate(
 *   compileQuery('*, S1, *, S3, *'),
 *   { router: 'S1', interface: 'e1', labels: ['10'] },
 *   1
 * );
 * if (verdict.status === 'Violated') {
 *   console.log(verdict.counterexample.failedLinks);
 * }
 * ```
 */
export class SatisfiabilityEvaluator {
  private readonly maxHops: number;
  private readonly enumerationLimit: bigint;
  private readonly overflowPolicy: OverflowPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly model: NetworkModel,
    options: EvaluatorOptions = {},
    logger?: Logger
  ) {
    this.maxHops = options.maxHops ?? DEFAULT_MAX_HOPS;
    this.enumerationLimit = options.enumerationLimit ?? DEFAULT_ENUMERATION_LIMIT;
    this.overflowPolicy = options.overflowPolicy ?? 'abort';
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Evaluate scenarios one after the other, stopping at the first violation
   * @throws EnumerationOverflowError if the enumeration is too large and the policy is `abort`
   * @throws InvalidIngressError if the ingress is unknown or its labels fail the initial constraint
   */
  evaluate(query: CompiledQuery, ingress: IngressSpec, k: number, scope: EvaluationScope = {}): Verdict {
    const plan = this.plan(query, ingress, k, scope);
    const cursor = plan.enumerator.cursor(plan.end);

    for (let scenario = cursor.next(); scenario !== null; scenario = cursor.next()) {
      const result = simulate(this.model, scenario, plan.ingress, { maxHops: this.maxHops });
      if (!query.admits(result)) {
        return this.violated(query, k, cursor, scenario, result);
      }
    }

    return this.completed(query, k, plan, cursor);
  }

  /**
   * Evaluate scenarios with a pool of cooperative workers
   * @remarks
   * Workers pull scenarios from one shared cursor and yield to the event loop
   * between scenarios. The first violation aborts the shared signal, which
   * the other workers check before taking their next scenario. The reported
   * counterexample is the one with the lowest index, so the verdict matches
   * {@link evaluate}.
   *
   * All workers share one thread and each simulation runs to completion, so
   * `concurrency` above 1 interleaves scenarios without speeding them up. What
   * the pool adds is a run that gives the event loop a turn after every
   * scenario.
   * @throws EnumerationOverflowError if the enumeration is too large and the policy is `abort`
   */
  async evaluateConcurrently(
    query: CompiledQuery,
    ingress: IngressSpec,
    k: number,
    scope: ConcurrentEvaluationScope = {}
  ): Promise<Verdict> {
    const concurrency = scope.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    const plan = this.plan(query, ingress, k, scope);
    const cursor = plan.enumerator.cursor(plan.end);
    const controller = new AbortController();
    const collector = new ViolationCollector();

    const worker = async (workerId: number): Promise<void> => {
      let evaluated = 0;
      while (!controller.signal.aborted) {
        const scenario = cursor.next();
        if (scenario === null) {
          break;
        }

        const result = simulate(this.model, scenario, plan.ingress, { maxHops: this.maxHops });
        evaluated++;

        if (!query.admits(result)) {
          collector.offer(scenario, result);
          controller.abort();
          break;
        }
        await yieldToEventLoop();
      }
      this.logger.debug({ workerId, evaluated }, 'Evaluation worker finished');
    };

    await Promise.all(Array.from({ length: concurrency }, (_, workerId) => worker(workerId)));

    const violation = collector.violation;
    if (violation) {
      return this.violated(query, k, cursor, violation.scenario, violation.result);
    }
    return this.completed(query, k, plan, cursor);
  }

  private plan(query: CompiledQuery, ingress: IngressSpec, k: number, scope: EvaluationScope): EvaluationPlan {
    const resolved = resolveIngress(this.model, ingress);
    const initial = query.initialLabels;
    if (initial !== null && !initial.matches(ingress.labels)) {
      throw new InvalidIngressError(
        `Ingress label stack ${formatLabelStack(ingress.labels)} does not match ${initial.toString()}`
      );
    }
    const candidateLinks = scope.failableLinks?.map((name) => this.model.resolveLink(name).id);
    const enumerator = new ScenarioEnumerator(this.model, k, {
      candidateLinks,
      limit: this.enumerationLimit,
    });

    let end = enumerator.total;
    let truncated = false;
    const overflow = enumerator.checkLimit();
    if (overflow) {
      const context = {
        query: query.toString(),
        total: overflow.total.toString(),
        limit: overflow.limit.toString(),
        policy: this.overflowPolicy,
      };
      switch (this.overflowPolicy) {
        case 'abort':
          this.logger.error(context, 'Failure enumeration exceeds limit');
          throw new EnumerationOverflowError(overflow.total, overflow.limit);
        case 'proceed':
          this.logger.warn(context, 'Failure enumeration exceeds limit, evaluating all scenarios');
          break;
        case 'sample':
          this.logger.warn(context, 'Failure enumeration exceeds limit, evaluating a prefix only');
          end = overflow.limit;
          truncated = true;
          break;
      }
    }

    this.logger.info(
      {
        query: query.toString(),
        ingress: `${resolved.router}.${ingress.interface}`,
        k: enumerator.k,
        scenarios: end.toString(),
      },
      'Evaluating query'
    );

    return { enumerator, ingress: resolved, end, truncated };
  }

  private violated(
    query: CompiledQuery,
    k: number,
    cursor: ScenarioCursor,
    scenario: FailureScenario,
    result: SimulationResult
  ): Verdict {
    const failedLinks = scenario.describe();
    this.logger.info(
      { query: query.toString(), failedLinks, trace: result.trace, outcome: result.outcome },
      'Query violated'
    );
    return {
      status: 'Violated',
      k,
      scenariosEvaluated: cursor.consumed,
      counterexample: {
        scenarioIndex: scenario.index,
        failedLinks,
        trace: result.trace,
        outcome: result.outcome,
      },
    };
  }

  private completed(query: CompiledQuery, k: number, plan: EvaluationPlan, cursor: ScenarioCursor): Verdict {
    if (plan.truncated) {
      this.logger.info(
        { query: query.toString(), evaluated: cursor.consumed.toString() },
        'Query inconclusive'
      );
      return {
        status: 'Inconclusive',
        k,
        scenariosEvaluated: cursor.consumed,
        totalScenarios: plan.enumerator.total,
      };
    }

    this.logger.info(
      { query: query.toString(), evaluated: cursor.consumed.toString() },
      'Query satisfied'
    );
    return { status: 'Satisfied', k, scenariosEvaluated: cursor.consumed };
  }
}
