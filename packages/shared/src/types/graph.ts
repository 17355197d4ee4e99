/**
 * Graph Encoding Contract
 *
 * Feature schema of the directed graph handed to the external learned
 * classifier. The order of {@link NODE_TYPES}, {@link NODE_FEATURES},
 * {@link EDGE_TYPES} and {@link EDGE_FEATURES} defines feature-vector columns:
 * append new entries at the end and bump {@link GRAPH_SCHEMA_VERSION}, never
 * reorder.
 *
 * @packageDocumentation
 */

/** Version of the feature layout below */
export const GRAPH_SCHEMA_VERSION = 1;

export const NODE_TYPES = [
  'Router',
  'Interface',
  'Label',
  'Rule',
  'PushAction',
  'SwapAction',
  'PopAction',
  'Query',
  'QueryAtom',
  'Any',
  'OneOrMore',
  'ZeroOrMore',
] as const;

export type NodeType = (typeof NODE_TYPES)[number];

/**
 * Node feature columns: the node-type one-hot followed by query annotations
 */
export const NODE_FEATURES = [
  ...NODE_TYPES.map((type) => `type:${type}`),
  'queryLiteral',
  'queryCapture',
  'queryAny',
  'priority',
  'k',
] as const;

export const EDGE_TYPES = [
  'owns',
  'link',
  'rule-input',
  'rule-label',
  'action',
  'action-label',
  'rule-output',
  'query-sequence',
  'query-reference',
  'query-label',
] as const;

export type EdgeType = (typeof EDGE_TYPES)[number];

export const EDGE_FEATURES = EDGE_TYPES.map((type) => `type:${type}`);

export interface GraphNode {
  /** Position of the node in `nodes` and row of `x` */
  id: number;
  type: NodeType;
  /** Human-readable identity, e.g. `router:S1` or `intf:S1:e0` */
  label: string;
  features: number[];
}

export interface GraphEdge {
  source: number;
  target: number;
  type: EdgeType;
  features: number[];
}

/**
 * Serialized graph consumed by the learner
 */
export interface EncodedGraph {
  schemaVersion: number;
  nodes: GraphNode[];
  edges: GraphEdge[];
  /** Node feature matrix, one row per node */
  x: number[][];
  /** `[sources, targets]` */
  edgeIndex: [number[], number[]];
  /** Edge feature matrix, one row per edge */
  edgeAttr: number[][];
  /** Index of the Query node */
  queryNode: number;
  /** True only for the Query node: the node the prediction is read from */
  mask: boolean[];
  /** Ground-truth label when requested: 1 satisfied, 0 violated */
  y?: number;
}
