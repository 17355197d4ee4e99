/**
 * labelpath command implementations
 *
 * Each command returns the text to print on stdout; the entry point owns the
 * process (streams, exit codes).
 */

import * as fs from 'fs';
import {
  ConfigEnvironment,
  ConfigLoader,
  GraphEncoder,
  Logger,
  NetworkParser,
  SatisfiabilityEvaluator,
  compileQuery,
  parseOverflowPolicy,
  runJob,
  serializeGraph,
} from '@labelpath/verifier';
import { IngressOptions, buildIngress, formatVerdict, parsePositiveInteger, resolveQueryArguments } from './report';

export interface VerifyOptions extends IngressOptions {
  maxHops?: string;
  enumerationLimit?: string;
  overflowPolicy?: string;
  concurrency?: string;
  failable?: string[];
}

export interface EncodeOptions extends IngressOptions {
  /** Run the evaluation and store the verdict as the graph's ground truth */
  label?: boolean;
  output?: string;
  pretty?: boolean;
}

/**
 * `labelpath verify <topology> <routing> <query> [k]`
 */
export async function verifyCommand(
  topologyPath: string,
  routingPath: string,
  query: string,
  k: string | undefined,
  options: VerifyOptions,
  logger: Logger
): Promise<string> {
  const { pattern, k: bound } = resolveQueryArguments(query, k);
  const compiled = compileQuery(pattern);
  const model = NetworkParser.loadFiles(topologyPath, routingPath, logger.child({ component: 'network-parser' }));

  const evaluator = new SatisfiabilityEvaluator(
    model,
    {
      maxHops: options.maxHops !== undefined ? parsePositiveInteger('--max-hops', options.maxHops) : undefined,
      enumerationLimit:
        options.enumerationLimit !== undefined
          ? BigInt(parsePositiveInteger('--enumeration-limit', options.enumerationLimit))
          : undefined,
      overflowPolicy: options.overflowPolicy !== undefined ? parseOverflowPolicy(options.overflowPolicy) : undefined,
    },
    logger.child({ component: 'evaluator' })
  );

  const verdict = await evaluator.evaluateConcurrently(compiled, buildIngress(options), bound, {
    concurrency: options.concurrency !== undefined ? parsePositiveInteger('--concurrency', options.concurrency) : 1,
    failableLinks: options.failable,
  });
  return formatVerdict(compiled.toString(), verdict);
}

/**
 * `labelpath encode <topology> <routing> <query> [k]`
 * @returns The serialized graph, or a one-line summary when written to `--output`
 */
export async function encodeCommand(
  topologyPath: string,
  routingPath: string,
  query: string,
  k: string | undefined,
  options: EncodeOptions,
  logger: Logger
): Promise<string> {
  const { pattern, k: bound } = resolveQueryArguments(query, k);
  const compiled = compileQuery(pattern);
  const model = NetworkParser.loadFiles(topologyPath, routingPath, logger.child({ component: 'network-parser' }));
  const ingress = buildIngress(options);

  let label: boolean | undefined;
  if (options.label) {
    const evaluator = new SatisfiabilityEvaluator(model, {}, logger.child({ component: 'evaluator' }));
    const verdict = await evaluator.evaluateConcurrently(compiled, ingress, bound);
    label = verdict.status === 'Satisfied';
  }

  const graph = GraphEncoder.encode(model, compiled, { k: bound, ingress, label });
  const json = serializeGraph(graph, options.pretty ?? false);
  logger.info({ nodes: graph.nodes.length, edges: graph.edges.length }, 'Encoded graph');

  if (options.output) {
    fs.writeFileSync(options.output, `${json}\n`);
    return `Wrote ${graph.nodes.length} nodes and ${graph.edges.length} edges to ${options.output}`;
  }
  return json;
}

/**
 * `labelpath run <job.yaml>`
 */
export async function runCommand(
  jobPath: string,
  logger: Logger,
  env: ConfigEnvironment = process.env
): Promise<string> {
  const job = ConfigLoader.loadConfig(jobPath, env);
  logger.level = job.logLevel;
  const reports = await runJob(job, logger);
  return reports.map((report) => formatVerdict(report.name, report.verdict)).join('\n');
}
