/**
 * Label-switched forwarding simulation
 * @packageDocumentation
 */

import {
  ForwardingAction,
  ForwardingRoute,
  ForwardingRule,
  IngressSpec,
  Label,
  SimulationOutcome,
  SimulationResult,
  topLabel,
} from '@labelpath/shared';
import { NetworkModel } from '../model/network-model';
import { FailureScenario } from '../scenarios/scenario-enumerator';

/**
 * Default safety cap on links crossed by a single packet
 * @remarks
 * Revisited (interface, stack) states are caught exactly; the cap only stops
 * packets whose stack keeps growing, for which no state ever repeats.
 */
export const DEFAULT_MAX_HOPS = 1000;

export interface SimulationOptions {
  /** Maximum number of links crossed before the packet counts as looping */
  maxHops?: number;
  /** Checked before every hop; an aborted simulation ends with `Cancelled` */
  signal?: AbortSignal;
}

/**
 * Ingress resolved against a model
 */
export interface ResolvedIngress {
  router: string;
  interfaceId: number;
  labels: readonly Label[];
  egress: ReadonlySet<string>;
}

/**
 * Error thrown when an ingress names a router or interface the model lacks
 */
export class InvalidIngressError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidIngressError';
    Object.setPrototypeOf(this, InvalidIngressError.prototype);
  }
}

/**
 * Resolve an ingress specification to interface ids
 * @throws InvalidIngressError if the router or interface does not exist
 */
export function resolveIngress(model: NetworkModel, ingress: IngressSpec): ResolvedIngress {
  if (!model.getRouter(ingress.router)) {
    throw new InvalidIngressError(`Unknown ingress router: ${ingress.router}`);
  }
  const iface = model.findInterface(ingress.router, ingress.interface);
  if (!iface) {
    throw new InvalidIngressError(
      `Unknown ingress interface: ${ingress.router}.${ingress.interface}`
    );
  }
  return {
    router: ingress.router,
    interfaceId: iface.id,
    labels: [...ingress.labels],
    egress: new Set(ingress.egress ?? []),
  };
}

/**
 * Simulate one packet hop by hop under a failure scenario
 * @param model - Network model (never modified)
 * @param scenario - Links failed for this run
 * @param ingress - Where the packet enters and with which labels
 * @returns Visited routers and how the journey ended
 * @remarks
 * Each hop looks up the rule for (incoming interface, top label), picks the
 * first traffic-engineering group with a route over an active link, applies
 * the route's actions to a copy of the stack and crosses the link. The run
 * ends with:
 * - `Delivered` on reaching a declared egress router
 * - `Dropped` when no rule matches
 * - `Unreachable` when every candidate route uses a failed link
 * - `Malformed` when a pop or swap meets an empty stack
 * - `Loop` when an (interface, stack) state repeats or `maxHops` is exceeded
 *
 * The function is pure: the same inputs always give the same result.
 */
export function simulate(
  model: NetworkModel,
  scenario: FailureScenario,
  ingress: ResolvedIngress,
  options: SimulationOptions = {}
): SimulationResult {
  const maxHops = options.maxHops ?? DEFAULT_MAX_HOPS;
  const trace = [ingress.router];
  const seen = new Set<string>();

  let router = ingress.router;
  let interfaceId = ingress.interfaceId;
  let labels: Label[] = [...ingress.labels];
  let hops = 0;

  const finish = (outcome: SimulationOutcome): SimulationResult => ({
    trace,
    outcome,
    hops,
    labels,
    interface: interfaceId,
  });

  for (;;) {
    if (options.signal?.aborted) {
      return finish('Cancelled');
    }
    if (ingress.egress.has(router)) {
      return finish('Delivered');
    }

    const state = stateKey(interfaceId, labels);
    if (seen.has(state)) {
      return finish('Loop');
    }
    seen.add(state);

    const rule = model.lookupRule(interfaceId, topLabel(labels));
    if (!rule) {
      return finish('Dropped');
    }

    const route = selectRoute(model, rule, scenario);
    if (!route) {
      return finish('Unreachable');
    }

    const next = applyActions(labels, route.actions);
    if (next === null) {
      return finish('Malformed');
    }

    if (hops >= maxHops) {
      return finish('Loop');
    }

    const peer = model.peerOf(route.outInterface);
    labels = next;
    interfaceId = peer.id;
    router = peer.router;
    hops++;
    trace.push(router);
  }
}

/**
 * First route, in group priority order, whose link is active in the scenario
 */
export function selectRoute(
  model: NetworkModel,
  rule: ForwardingRule,
  scenario: FailureScenario
): ForwardingRoute | null {
  for (const group of rule.groups) {
    for (const route of group.routes) {
      if (!scenario.isFailed(model.getInterface(route.outInterface).linkId)) {
        return route;
      }
    }
  }
  return null;
}

/**
 * Apply actions to a copy of a stack
 * @returns The new stack, or null if a pop or swap meets an empty stack
 */
export function applyActions(
  labels: readonly Label[],
  actions: readonly ForwardingAction[]
): Label[] | null {
  const stack = [...labels];
  for (const action of actions) {
    switch (action.type) {
      case 'push':
        stack.unshift(action.label);
        break;
      case 'swap':
        if (stack.length === 0) {
          return null;
        }
        stack[0] = action.label;
        break;
      case 'pop':
        if (stack.length === 0) {
          return null;
        }
        stack.shift();
        break;
    }
  }
  return stack;
}

function stateKey(interfaceId: number, labels: readonly Label[]): string {
  return JSON.stringify([interfaceId, labels]);
}
