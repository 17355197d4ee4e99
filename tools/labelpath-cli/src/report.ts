/**
 * Option parsing and verdict formatting for the labelpath CLI
 */

import { IngressSpec, Verdict } from '@labelpath/shared';
import { ConfigurationError, parseQueryLine } from '@labelpath/verifier';

/**
 * Ingress options shared by `verify` and `encode`
 */
export interface IngressOptions {
  ingressRouter: string;
  ingressInterface: string;
  labels?: string;
  egress?: string[];
}

/**
 * Split a comma-separated label list; an empty string is the empty stack
 */
export function parseLabels(value: string | undefined): string[] {
  if (value === undefined || value.trim() === '') {
    return [];
  }
  return value.split(',').map((label, index) => {
    const trimmed = label.trim();
    if (trimmed === '') {
      throw new ConfigurationError(`Empty label at position ${index} in "${value}"`);
    }
    return trimmed;
  });
}

export function buildIngress(options: IngressOptions): IngressSpec {
  const ingress: IngressSpec = {
    router: options.ingressRouter,
    interface: options.ingressInterface,
    labels: parseLabels(options.labels),
  };
  if (options.egress && options.egress.length > 0) {
    ingress.egress = options.egress;
  }
  return ingress;
}

/**
 * Parse a positive integer option
 * @throws ConfigurationError if the value is not a positive integer
 */
export function parsePositiveInteger(name: string, value: string): number {
  const trimmed = value.trim();
  if (!/^[0-9]+$/.test(trimmed) || Number(trimmed) < 1 || !Number.isSafeInteger(Number(trimmed))) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return Number(trimmed);
}

/**
 * Resolve the query and failure bound from positional arguments
 * @remarks
 * With `k` omitted, `query` is read as a query line: the pattern followed
 * by the bound (`"*, S1, *, S3, * 1"`).
 */
export function resolveQueryArguments(query: string, k: string | undefined): { pattern: string; k: number } {
  if (k === undefined) {
    return parseQueryLine(query);
  }
  const trimmed = k.trim();
  if (!/^[0-9]+$/.test(trimmed)) {
    throw new ConfigurationError(`k must be a non-negative integer, got "${k}"`);
  }
  return { pattern: query, k: Number(trimmed) };
}

/**
 * Human-readable verdict, one fact per line
 */
export function formatVerdict(name: string, verdict: Verdict): string {
  switch (verdict.status) {
    case 'Satisfied':
      return `${name}: Satisfied (k=${verdict.k}, ${verdict.scenariosEvaluated} scenarios)`;
    case 'Inconclusive':
      return (
        `${name}: Inconclusive (k=${verdict.k}, ` +
        `${verdict.scenariosEvaluated} of ${verdict.totalScenarios} scenarios)`
      );
    case 'Violated': {
      const { counterexample } = verdict;
      return [
        `${name}: Violated (k=${verdict.k}, ${verdict.scenariosEvaluated} scenarios)`,
        `  failed links: ${counterexample.failedLinks.length > 0 ? counterexample.failedLinks.join(', ') : 'none'}`,
        `  trace: ${counterexample.trace.join(' -> ')}`,
        `  outcome: ${counterexample.outcome}`,
      ].join('\n');
    }
  }
}
