/**
 * Simulation and Verification Result Types
 *
 * Outcomes of a single forwarding simulation and the verdicts produced when a
 * query is checked against every failure scenario of size up to k.
 *
 * @packageDocumentation
 */

import { Label } from './network';

/**
 * How a simulated packet's journey ended
 * @remarks
 * All outcomes are valid results: a misconfigured network legitimately drops,
 * loops or black-holes packets. `Cancelled` only appears when the caller
 * passes an already aborted `signal` to the simulator.
 */
export type SimulationOutcome =
  | 'Delivered'
  | 'Dropped'
  | 'Malformed'
  | 'Unreachable'
  | 'Loop'
  | 'Cancelled';

/** All outcomes, in reporting order */
export const SIMULATION_OUTCOMES: readonly SimulationOutcome[] = [
  'Delivered',
  'Dropped',
  'Malformed',
  'Unreachable',
  'Loop',
  'Cancelled',
] as const;

/**
 * Result of simulating one packet under one failure scenario
 */
export interface SimulationResult {
  /** Router names in visiting order, starting with the ingress router */
  trace: string[];
  outcome: SimulationOutcome;
  /** Number of links crossed */
  hops: number;
  /** Label stack when the simulation stopped */
  labels: Label[];
  /** Interface id the packet was last received on */
  interface: number;
}

/**
 * One capture group of an accepted trace
 */
export interface CaptureMatch {
  /** Position of the capture among the pattern's capture groups */
  index: number;
  /** Capture name, or null for an unnamed group */
  name: string | null;
  /** Routers covered by the capture */
  routers: string[];
  /** Trace offset of the first router covered */
  start: number;
}

/**
 * Counterexample reported for a violated query
 */
export interface Counterexample {
  /** Enumeration index of the failing scenario */
  scenarioIndex: bigint;
  /** Names of the failed links */
  failedLinks: string[];
  trace: string[];
  outcome: SimulationOutcome;
}

export interface SatisfiedVerdict {
  status: 'Satisfied';
  k: number;
  scenariosEvaluated: bigint;
}

export interface ViolatedVerdict {
  status: 'Violated';
  k: number;
  scenariosEvaluated: bigint;
  counterexample: Counterexample;
}

/**
 * Only produced when enumeration was truncated by the `sample` overflow policy
 * and no violation was found among the evaluated scenarios
 */
export interface InconclusiveVerdict {
  status: 'Inconclusive';
  k: number;
  scenariosEvaluated: bigint;
  totalScenarios: bigint;
}

export type Verdict = SatisfiedVerdict | ViolatedVerdict | InconclusiveVerdict;

export function isViolated(verdict: Verdict): verdict is ViolatedVerdict {
  return verdict.status === 'Violated';
}

export function isSatisfied(verdict: Verdict): verdict is SatisfiedVerdict {
  return verdict.status === 'Satisfied';
}
