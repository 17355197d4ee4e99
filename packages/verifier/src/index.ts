/**
 * MPLS Path-Query Verifier Library Exports
 * Side-effect-free entry point for library consumers
 * @packageDocumentation
 */

import { NetworkParser } from './config/network-parser';
import {
  DanglingInterfaceError,
  MalformedInputError,
  NetworkParseError,
  UnknownReferenceError,
} from './config/network-errors';
import {
  ConfigLoader,
  ConfigurationError,
  parseLogLevel,
  parseOverflowPolicy,
} from './config/config-loader';
import { ForwardingTable } from './model/forwarding-table';
import { NetworkModel, UnknownLinkError } from './model/network-model';
import { CompiledQuery, compileQuery, parseQueryLine } from './query/query-compiler';
import { InvalidPatternError } from './query/pattern-errors';
import {
  EnumerationOverflowError,
  FailureScenario,
  ScenarioCursor,
  ScenarioEnumerator,
  binomial,
  countScenarios,
} from './scenarios/scenario-enumerator';
import {
  DEFAULT_MAX_HOPS,
  InvalidIngressError,
  applyActions,
  resolveIngress,
  selectRoute,
  simulate,
} from './simulation/forwarding-simulator';
import {
  DEFAULT_ENUMERATION_LIMIT,
  OVERFLOW_POLICIES,
  SatisfiabilityEvaluator,
  ViolationCollector,
} from './evaluation/satisfiability-evaluator';
import { GraphEncoder, serializeGraph } from './encoding/graph-encoder';
import { ExitCode, exitCodeFor } from './errors/exit-codes';
import { runJob } from './jobs/job-runner';
import { LOG_LEVELS, createLogger, createSilentLogger } from './utils/logger';

// Export public API
export {
  NetworkParser,
  NetworkParseError,
  MalformedInputError,
  DanglingInterfaceError,
  UnknownReferenceError,
  ConfigLoader,
  ConfigurationError,
  parseLogLevel,
  parseOverflowPolicy,
  ForwardingTable,
  NetworkModel,
  UnknownLinkError,
  CompiledQuery,
  compileQuery,
  parseQueryLine,
  InvalidPatternError,
  ScenarioEnumerator,
  ScenarioCursor,
  FailureScenario,
  EnumerationOverflowError,
  binomial,
  countScenarios,
  DEFAULT_MAX_HOPS,
  InvalidIngressError,
  resolveIngress,
  simulate,
  selectRoute,
  applyActions,
  DEFAULT_ENUMERATION_LIMIT,
  OVERFLOW_POLICIES,
  SatisfiabilityEvaluator,
  ViolationCollector,
  GraphEncoder,
  serializeGraph,
  ExitCode,
  exitCodeFor,
  runJob,
  LOG_LEVELS,
  createLogger,
  createSilentLogger,
};

// Export configuration types
export type { JobConfig, NetworkConfig, SimulationConfig, EvaluationConfig, QueryConfig } from './config/types';
export type { ConfigEnvironment } from './config/config-loader';
export type { NetworkDocument } from './config/network-errors';
export type { Router, ReadonlyForwardingTable } from './model/network-model';
export type {
  PatternSegment,
  LiteralSegment,
  CaptureSegment,
  AnySegment,
  QueryMatch,
} from './query/query-compiler';
export type {
  EnumerationOverflow,
  ScenarioEnumeratorOptions,
} from './scenarios/scenario-enumerator';
export type { SimulationOptions, ResolvedIngress } from './simulation/forwarding-simulator';
export type {
  EvaluatorOptions,
  EvaluationScope,
  ConcurrentEvaluationScope,
  OverflowPolicy,
} from './evaluation/satisfiability-evaluator';
export type { EncodeOptions } from './encoding/graph-encoder';
export type { QueryReport } from './jobs/job-runner';
export type { Logger, LogLevel } from './utils/logger';
