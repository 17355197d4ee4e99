/**
 * Verification job runner
 * @packageDocumentation
 */

import { Verdict } from '@labelpath/shared';
import { NetworkParser } from '../config/network-parser';
import { JobConfig } from '../config/types';
import { SatisfiabilityEvaluator } from '../evaluation/satisfiability-evaluator';
import { NetworkModel } from '../model/network-model';
import { compileQuery } from '../query/query-compiler';
import { Logger, createSilentLogger } from '../utils/logger';

/**
 * Outcome of one query of a job
 */
export interface QueryReport {
  name: string;
  /** Canonical form of the compiled pattern */
  pattern: string;
  verdict: Verdict;
}

/**
 * Parse the job's network once and evaluate every query against it, in file order
 * @param model - Already-parsed network; loaded from `job.network` when omitted
 * @remarks
 * Queries run with `job.evaluation.concurrency` cooperative workers. Any
 * error (parse, pattern, overflow under `abort`) stops the job.
 */
export async function runJob(job: JobConfig, logger?: Logger, model?: NetworkModel): Promise<QueryReport[]> {
  const log = logger ?? createSilentLogger();
  const network =
    model ?? NetworkParser.loadFiles(job.network.topology, job.network.routing, log.child({ component: 'network-parser' }));

  const evaluator = new SatisfiabilityEvaluator(
    network,
    {
      maxHops: job.simulation.maxHops,
      enumerationLimit: job.evaluation.enumerationLimit,
      overflowPolicy: job.evaluation.overflowPolicy,
    },
    log.child({ component: 'evaluator' })
  );

  const reports: QueryReport[] = [];
  for (const query of job.queries) {
    const compiled = compileQuery(query.pattern);
    const verdict = await evaluator.evaluateConcurrently(compiled, query.ingress, query.k, {
      concurrency: job.evaluation.concurrency,
      failableLinks: query.failableLinks,
    });
    reports.push({ name: query.name, pattern: compiled.toString(), verdict });
    log.info({ query: query.name, status: verdict.status }, `Query ${query.name}: ${verdict.status}`);
  }
  return reports;
}
