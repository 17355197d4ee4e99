/**
 * Verification job configuration types
 *
 * Shape of a validated YAML job file after defaults and environment
 * overrides have been applied.
 *
 * @packageDocumentation
 */

import { IngressSpec } from '@labelpath/shared';
import { OverflowPolicy } from '../evaluation/satisfiability-evaluator';
import { LogLevel } from '../utils/logger';

/**
 * Locations of the two network documents
 * @remarks
 * Relative paths in the job file are resolved against the job file's
 * directory; the loaded config always holds absolute paths.
 */
export interface NetworkConfig {
  topology: string;
  routing: string;
}

export interface SimulationConfig {
  /** Per-packet hop cap (default: 1000) */
  maxHops: number;
}

export interface EvaluationConfig {
  /** Scenario count above which `overflowPolicy` applies (default: 1000000) */
  enumerationLimit: bigint;
  /** Default: `abort` */
  overflowPolicy: OverflowPolicy;
  /** Cooperative workers per query (default: 1) */
  concurrency: number;
}

/**
 * One query of a job
 *
 * @example
 * ```yaml
 * - name: s1-to-s3
 *   pattern: "*, S1, *, S3, *"
 *   k: 1
 *   ingress: { router: S1, interface: e0, labels: ["10"] }
 *   egress: [S3]
 *   failableLinks: [S2.e1--S3.e0]
 * ```
 */
export interface QueryConfig {
  /** Unique within the job */
  name: string;
  pattern: string;
  /** Maximum number of simultaneously failed links */
  k: number;
  ingress: IngressSpec;
  /** Links allowed to fail; every link when omitted */
  failableLinks?: string[];
}

export interface JobConfig {
  logLevel: LogLevel;
  network: NetworkConfig;
  simulation: SimulationConfig;
  evaluation: EvaluationConfig;
  queries: QueryConfig[];
}
