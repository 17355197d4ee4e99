/**
 * Configuration Loader Module
 *
 * Loads verification jobs from YAML files, validates every field, applies
 * defaults and then environment overrides.
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { IngressSpec } from '@labelpath/shared';
import {
  DEFAULT_ENUMERATION_LIMIT,
  OVERFLOW_POLICIES,
  OverflowPolicy,
} from '../evaluation/satisfiability-evaluator';
import { DEFAULT_MAX_HOPS } from '../simulation/forwarding-simulator';
import { LOG_LEVELS, LogLevel } from '../utils/logger';
import { EvaluationConfig, JobConfig, QueryConfig, SimulationConfig } from './types';

/**
 * Custom Error Class for Configuration Errors
 *
 * Thrown when a job file or an environment override fails validation.
 *
 * @example
 * ```typescript
 * throw new ConfigurationError('Missing required field: network.topology');
 * ```
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

type RawObject = Record<string, unknown>;

/**
 * Environment variables read by {@link ConfigLoader.loadConfig}
 */
export type ConfigEnvironment = Partial<
  Record<'LOG_LEVEL' | 'MAX_HOPS' | 'ENUMERATION_LIMIT' | 'OVERFLOW_POLICY' | 'CONCURRENCY', string>
>;

/**
 * Configuration Loader Class
 *
 * @example
 * ```typescript
 * try {
 *   const job = ConfigLoader.loadConfig('./jobs/backbone.yaml');
 *   console.log(`Loaded ${job.queries.length} queries`);
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.error(`Configuration error: ${error.message}`);
 *     process.exit(5);
 *   }
 * }
 * ```
 */
export class ConfigLoader {
  /**
   * Load and validate a job file
   * @param filePath - Path to the YAML job file
   * @param env - Environment overrides (default: `process.env`)
   * @throws ConfigurationError if the file is missing, not YAML, or invalid
   */
  static loadConfig(filePath: string, env: ConfigEnvironment = process.env): JobConfig {
    let fileContent: string;
    try {
      fileContent = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new ConfigurationError(`Configuration file not found: ${filePath}`);
      }
      throw new ConfigurationError(`Failed to read configuration file: ${(error as Error).message}`);
    }

    let config: unknown;
    try {
      config = yaml.load(fileContent);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML syntax: ${(error as Error).message}`);
    }

    return this.parseConfig(config, path.dirname(path.resolve(filePath)), env);
  }

  /**
   * Validate an already-parsed job document
   * @param baseDir - Directory relative network paths are resolved against
   */
  static parseConfig(config: unknown, baseDir: string, env: ConfigEnvironment = {}): JobConfig {
    if (!isObject(config)) {
      throw new ConfigurationError('Configuration must be a YAML object');
    }

    const network = requireObject(config, 'network', 'network');
    const job: JobConfig = {
      logLevel: optionalEnum(config, 'logLevel', 'logLevel', LOG_LEVELS) ?? 'info',
      network: {
        topology: path.resolve(baseDir, requireString(network, 'topology', 'network.topology')),
        routing: path.resolve(baseDir, requireString(network, 'routing', 'network.routing')),
      },
      simulation: this.parseSimulation(config),
      evaluation: this.parseEvaluation(config),
      queries: this.parseQueries(config),
    };

    this.applyEnvironment(job, env);
    return job;
  }

  private static parseSimulation(config: RawObject): SimulationConfig {
    const simulation = optionalObject(config, 'simulation', 'simulation') ?? {};
    return {
      maxHops: optionalInteger(simulation, 'maxHops', 'simulation.maxHops', 1) ?? DEFAULT_MAX_HOPS,
    };
  }

  private static parseEvaluation(config: RawObject): EvaluationConfig {
    const evaluation = optionalObject(config, 'evaluation', 'evaluation') ?? {};
    const limit = optionalInteger(evaluation, 'enumerationLimit', 'evaluation.enumerationLimit', 1);
    return {
      enumerationLimit: limit === undefined ? DEFAULT_ENUMERATION_LIMIT : BigInt(limit),
      overflowPolicy:
        optionalEnum(evaluation, 'overflowPolicy', 'evaluation.overflowPolicy', OVERFLOW_POLICIES) ?? 'abort',
      concurrency: optionalInteger(evaluation, 'concurrency', 'evaluation.concurrency', 1) ?? 1,
    };
  }

  private static parseQueries(config: RawObject): QueryConfig[] {
    const raw = config.queries;
    if (raw === undefined) {
      throw new ConfigurationError('Missing required field: queries');
    }
    if (!Array.isArray(raw) || raw.length === 0) {
      throw new ConfigurationError('queries must be a non-empty array');
    }

    const names = new Set<string>();
    return raw.map((entry: unknown, index): QueryConfig => {
      const field = `queries[${index}]`;
      if (!isObject(entry)) {
        throw new ConfigurationError(`${field} must be an object`);
      }

      const name = requireString(entry, 'name', `${field}.name`);
      if (names.has(name)) {
        throw new ConfigurationError(`Duplicate query name: ${name}`);
      }
      names.add(name);

      const k = optionalInteger(entry, 'k', `${field}.k`, 0);
      if (k === undefined) {
        throw new ConfigurationError(`Missing required field: ${field}.k`);
      }

      const query: QueryConfig = {
        name,
        pattern: requireString(entry, 'pattern', `${field}.pattern`),
        k,
        ingress: this.parseIngress(entry, field),
      };
      const failableLinks = optionalStringArray(entry, 'failableLinks', `${field}.failableLinks`);
      if (failableLinks !== undefined) {
        query.failableLinks = failableLinks;
      }
      return query;
    });
  }

  private static parseIngress(entry: RawObject, field: string): IngressSpec {
    const ingress = requireObject(entry, 'ingress', `${field}.ingress`);
    const spec: IngressSpec = {
      router: requireString(ingress, 'router', `${field}.ingress.router`),
      interface: requireString(ingress, 'interface', `${field}.ingress.interface`),
      labels: optionalStringArray(ingress, 'labels', `${field}.ingress.labels`) ?? [],
    };
    const egress = optionalStringArray(entry, 'egress', `${field}.egress`);
    if (egress !== undefined) {
      spec.egress = egress;
    }
    return spec;
  }

  /**
   * Apply `LOG_LEVEL`, `MAX_HOPS`, `ENUMERATION_LIMIT`, `OVERFLOW_POLICY` and `CONCURRENCY`
   */
  private static applyEnvironment(job: JobConfig, env: ConfigEnvironment): void {
    if (env.LOG_LEVEL !== undefined) {
      job.logLevel = envEnum('LOG_LEVEL', env.LOG_LEVEL, LOG_LEVELS);
    }
    if (env.MAX_HOPS !== undefined) {
      job.simulation.maxHops = Number(envInteger('MAX_HOPS', env.MAX_HOPS));
    }
    if (env.ENUMERATION_LIMIT !== undefined) {
      job.evaluation.enumerationLimit = envInteger('ENUMERATION_LIMIT', env.ENUMERATION_LIMIT);
    }
    if (env.OVERFLOW_POLICY !== undefined) {
      job.evaluation.overflowPolicy = envEnum('OVERFLOW_POLICY', env.OVERFLOW_POLICY, OVERFLOW_POLICIES);
    }
    if (env.CONCURRENCY !== undefined) {
      job.evaluation.concurrency = Number(envInteger('CONCURRENCY', env.CONCURRENCY));
    }
  }
}

/**
 * Check a log level given on the command line or in code
 * @throws ConfigurationError if the level is unknown
 */
export function parseLogLevel(value: string): LogLevel {
  return envEnum('logLevel', value, LOG_LEVELS);
}

/**
 * Check an overflow policy given on the command line or in code
 * @throws ConfigurationError if the policy is unknown
 */
export function parseOverflowPolicy(value: string): OverflowPolicy {
  return envEnum('overflowPolicy', value, OVERFLOW_POLICIES);
}

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return allowed.some((candidate) => candidate === value);
}

function requireObject(parent: RawObject, key: string, field: string): RawObject {
  const value = optionalObject(parent, key, field);
  if (value === undefined) {
    throw new ConfigurationError(`Missing required field: ${field}`);
  }
  return value;
}

function optionalObject(parent: RawObject, key: string, field: string): RawObject | undefined {
  const value = parent[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new ConfigurationError(`${field} must be an object`);
  }
  return value;
}

function requireString(parent: RawObject, key: string, field: string): string {
  const value = parent[key];
  if (value === undefined || value === null) {
    throw new ConfigurationError(`Missing required field: ${field}`);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${field} must be a non-empty string`);
  }
  return value.trim();
}

function optionalInteger(parent: RawObject, key: string, field: string, min: number): number | undefined {
  const value = parent[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < min) {
    throw new ConfigurationError(`${field} must be an integer >= ${min}`);
  }
  return value;
}

function optionalEnum<T extends string>(
  parent: RawObject,
  key: string,
  field: string,
  allowed: readonly T[]
): T | undefined {
  const value = parent[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isOneOf(value, allowed)) {
    throw new ConfigurationError(`${field} must be one of: ${allowed.join(', ')}`);
  }
  return value;
}

/**
 * Strings, or integers written without quotes (`labels: [10, 20]`)
 */
function optionalStringArray(parent: RawObject, key: string, field: string): string[] | undefined {
  const value = parent[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${field} must be an array`);
  }
  return value.map((item: unknown, index) => {
    if (typeof item === 'number' && Number.isInteger(item)) {
      return String(item);
    }
    if (typeof item !== 'string' || item.trim() === '') {
      throw new ConfigurationError(`${field}[${index}] must be a non-empty string`);
    }
    return item.trim();
  });
}

function envEnum<T extends string>(name: string, value: string, allowed: readonly T[]): T {
  const normalized = value.trim().toLowerCase();
  if (!isOneOf(normalized, allowed)) {
    throw new ConfigurationError(`Invalid ${name}: ${value} (expected one of: ${allowed.join(', ')})`);
  }
  return normalized;
}

function envInteger(name: string, value: string): bigint {
  const trimmed = value.trim();
  if (!/^[0-9]+$/.test(trimmed) || BigInt(trimmed) < 1n) {
    throw new ConfigurationError(`Invalid ${name}: ${value} (expected a positive integer)`);
  }
  return BigInt(trimmed);
}
