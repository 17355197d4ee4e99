/**
 * MPLS Network Model Types
 *
 * Shapes of the immutable forwarding model built from a topology document
 * and a routing document. Identifiers are numeric and assigned in canonical
 * order (routers and interfaces sorted by name, links by endpoint), so two
 * documents describing the same network always produce the same ids.
 *
 * @packageDocumentation
 */

/** An MPLS label. Labels are opaque strings taken verbatim from the routing document. */
export type Label = string;

/**
 * Label stack, outermost label first
 * @remarks
 * Stacks are never mutated in place; every forwarding action produces a new array.
 */
export type LabelStack = readonly Label[];

/**
 * Router interface
 * @remarks
 * Owned by exactly one router and attached to exactly one link once the
 * topology is fully parsed.
 */
export interface RouterInterface {
  /** Canonical numeric id, unique across the whole network */
  readonly id: number;
  /** Name of the owning router */
  readonly router: string;
  /** Interface name, unique within its router */
  readonly name: string;
  /** Id of the link this interface is attached to */
  readonly linkId: number;
}

/**
 * Undirected physical link between two interfaces of two distinct routers
 */
export interface Link {
  /** Canonical numeric id */
  readonly id: number;
  /** Interface id of the lower endpoint (by `router.interface` key) */
  readonly a: number;
  /** Interface id of the higher endpoint */
  readonly b: number;
  /** Display name, e.g. `S1.e1--S2.e0` */
  readonly name: string;
}

/** Replace the top label */
export interface SwapAction {
  readonly type: 'swap';
  readonly label: Label;
}

/** Push a new label on top of the stack */
export interface PushAction {
  readonly type: 'push';
  readonly label: Label;
}

/** Remove the top label */
export interface PopAction {
  readonly type: 'pop';
}

export type ForwardingAction = SwapAction | PushAction | PopAction;

/**
 * One way of forwarding a matched packet: an outgoing interface and the
 * label operations applied before the packet leaves through it
 */
export interface ForwardingRoute {
  /** Outgoing interface id (always owned by the rule's router) */
  readonly outInterface: number;
  /** Actions applied in order */
  readonly actions: readonly ForwardingAction[];
}

/**
 * Traffic-engineering group
 * @remarks
 * Groups are listed in priority order. The first group holding a route over
 * an active link is used; later groups are backups for link failures.
 */
export interface TrafficEngineeringGroup {
  readonly routes: readonly ForwardingRoute[];
}

/**
 * Forwarding rule keyed by (incoming interface, top label)
 */
export interface ForwardingRule {
  /** Name of the router holding the rule */
  readonly router: string;
  /** Incoming interface id */
  readonly inInterface: number;
  /** Top label matched, or null for an unlabelled packet */
  readonly label: Label | null;
  /** Traffic-engineering groups in priority order (at least one) */
  readonly groups: readonly TrafficEngineeringGroup[];
}

/**
 * Where a simulated packet enters the network
 */
export interface IngressSpec {
  /** Ingress router name */
  router: string;
  /** Interface of the ingress router the packet arrives on */
  interface: string;
  /** Initial label stack, outermost first (empty for an unlabelled packet) */
  labels: Label[];
  /** Routers at which the packet counts as delivered */
  egress?: string[];
}

/**
 * Top label of a stack, or null when the stack is empty
 */
export function topLabel(stack: LabelStack): Label | null {
  return stack.length > 0 ? stack[0] : null;
}

/**
 * Render a label stack for logs and reports, e.g. `[10 20]` or `[]`
 */
export function formatLabelStack(stack: LabelStack): string {
  return `[${stack.join(' ')}]`;
}

/**
 * Key identifying an interface by router and name, e.g. `S1.e0`
 */
export function interfaceKey(router: string, name: string): string {
  return `${router}.${name}`;
}
