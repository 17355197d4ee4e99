/**
 * Graph Encoder
 *
 * Turns a network model and a compiled query into the typed directed graph
 * consumed by the external learned classifier. Node and edge feature columns
 * follow the contract in `@labelpath/shared` (`NODE_FEATURES`,
 * `EDGE_FEATURES`).
 *
 * @packageDocumentation
 */

import {
  EDGE_TYPES,
  EdgeType,
  EncodedGraph,
  ForwardingAction,
  GRAPH_SCHEMA_VERSION,
  GraphEdge,
  GraphNode,
  IngressSpec,
  Label,
  NODE_FEATURES,
  NODE_TYPES,
  NodeType,
} from '@labelpath/shared';
import { NetworkModel } from '../model/network-model';
import { CompiledQuery, LabelAtom, LabelConstraint, PatternSegment } from '../query/query-compiler';

export interface EncodeOptions {
  /** Failure bound, stored on the query node */
  k: number;
  /** Adds the initial label stack to the query side of the graph */
  ingress?: IngressSpec;
  /** Ground truth: true if the query is satisfied */
  label?: boolean;
}

type NodeFeature = 'queryLiteral' | 'queryCapture' | 'queryAny' | 'priority' | 'k';

interface PendingNode {
  type: NodeType;
  label: string;
  annotations: Partial<Record<NodeFeature, number>>;
}

const ANNOTATIONS: readonly NodeFeature[] = ['queryLiteral', 'queryCapture', 'queryAny', 'priority', 'k'];

const ANNOTATION_COLUMNS: Record<NodeFeature, number> = {
  queryLiteral: NODE_FEATURES.indexOf('queryLiteral'),
  queryCapture: NODE_FEATURES.indexOf('queryCapture'),
  queryAny: NODE_FEATURES.indexOf('queryAny'),
  priority: NODE_FEATURES.indexOf('priority'),
  k: NODE_FEATURES.indexOf('k'),
};

/**
 * Accumulates nodes and edges in insertion order
 */
class GraphBuilder {
  readonly nodes: PendingNode[] = [];
  readonly edges: Array<{ source: number; target: number; type: EdgeType }> = [];
  private readonly byLabel = new Map<string, number>();

  addNode(type: NodeType, label: string, annotations: PendingNode['annotations'] = {}): number {
    const id = this.nodes.length;
    this.nodes.push({ type, label, annotations });
    this.byLabel.set(label, id);
    return id;
  }

  /**
   * Existing node with this label, or a new one
   */
  ensureNode(type: NodeType, label: string): number {
    return this.byLabel.get(label) ?? this.addNode(type, label);
  }

  nodeId(label: string): number | undefined {
    return this.byLabel.get(label);
  }

  annotate(id: number, feature: NodeFeature, value: number): void {
    this.nodes[id].annotations[feature] = value;
  }

  addEdge(source: number, target: number, type: EdgeType): void {
    this.edges.push({ source, target, type });
  }
}

const routerKey = (name: string): string => `router:${name}`;
const interfaceKey = (router: string, name: string): string => `intf:${router}:${name}`;
const labelKey = (label: Label): string => `label:${label}`;
// Real label keys all start with `label:`
const NO_LABEL_KEY = 'label-none';
const EMPTY_STACK_KEY = 'label-empty';

/**
 * Graph encoder
 *
 * @example
 * ```typescript
 * const graph = GraphEncoder.encode(model, compileQuery('*, S1, *, S3, *'), { k: 1 });
 * fs.writeFileSync('sample.json', serializeGraph(graph));
 * ```
 */
export class GraphEncoder {
  /**
   * Encode a model and a query
   * @remarks
   * Nodes are created in a fixed order: routers each followed by their
   * interfaces, labels (`label-none` first), rule routes with their actions,
   * then the query side. Identical inputs give identical graphs.
   *
   * An initial label constraint on the query replaces the ingress label atoms.
   */
  static encode(model: NetworkModel, query: CompiledQuery, options: EncodeOptions): EncodedGraph {
    const builder = new GraphBuilder();

    this.encodeTopology(builder, model);
    this.encodeLabels(builder, model, query, options.ingress);
    this.encodeRules(builder, model);
    const queryNode = this.encodeQuery(builder, query, options);

    return this.finish(builder, queryNode, options.label);
  }

  private static encodeTopology(builder: GraphBuilder, model: NetworkModel): void {
    for (const router of model.routers) {
      const routerNode = builder.addNode('Router', routerKey(router.name));
      for (const iface of router.interfaces) {
        builder.addEdge(routerNode, builder.addNode('Interface', interfaceKey(router.name, iface.name)), 'owns');
      }
    }

    for (const link of model.links) {
      const a = model.getInterface(link.a);
      const b = model.getInterface(link.b);
      const from = this.requireNode(builder, interfaceKey(a.router, a.name));
      const to = this.requireNode(builder, interfaceKey(b.router, b.name));
      builder.addEdge(from, to, 'link');
      builder.addEdge(to, from, 'link');
    }
  }

  private static encodeLabels(
    builder: GraphBuilder,
    model: NetworkModel,
    query: CompiledQuery,
    ingress?: IngressSpec
  ): void {
    builder.addNode('Label', NO_LABEL_KEY);
    const labels = [
      ...model.collectLabels(),
      ...(ingress?.labels ?? []),
      ...(query.initialLabels?.labels ?? []),
      ...(query.finalLabels?.labels ?? []),
    ];
    for (const label of labels) {
      builder.ensureNode('Label', labelKey(label));
    }
  }

  /**
   * One Rule node per route of every traffic-engineering group
   */
  private static encodeRules(builder: GraphBuilder, model: NetworkModel): void {
    for (const router of model.routers) {
      let index = 0;
      for (const rule of router.table.getAllRules()) {
        const input = model.getInterface(rule.inInterface);
        rule.groups.forEach((group, priority) => {
          for (const route of group.routes) {
            const name = `${router.name}:rule${index}`;
            const ruleNode = builder.addNode('Rule', name, { priority });
            builder.addEdge(this.requireNode(builder, interfaceKey(input.router, input.name)), ruleNode, 'rule-input');
            if (rule.label !== null) {
              builder.addEdge(ruleNode, this.requireNode(builder, labelKey(rule.label)), 'rule-label');
            }

            let last = ruleNode;
            route.actions.forEach((action, position) => {
              const actionNode = this.encodeAction(builder, action, `${name}:action${position}`);
              builder.addEdge(last, actionNode, 'action');
              last = actionNode;
            });

            const output = model.getInterface(route.outInterface);
            builder.addEdge(last, this.requireNode(builder, interfaceKey(output.router, output.name)), 'rule-output');
            index++;
          }
        });
      }
    }
  }

  private static encodeAction(builder: GraphBuilder, action: ForwardingAction, name: string): number {
    switch (action.type) {
      case 'push': {
        const node = builder.addNode('PushAction', `${name}:PUSH`);
        builder.addEdge(node, this.requireNode(builder, labelKey(action.label)), 'action-label');
        return node;
      }
      case 'swap': {
        const node = builder.addNode('SwapAction', `${name}:SWAP`);
        builder.addEdge(node, this.requireNode(builder, labelKey(action.label)), 'action-label');
        return node;
      }
      case 'pop':
        return builder.addNode('PopAction', `${name}:POP`);
    }
  }

  private static encodeQuery(builder: GraphBuilder, query: CompiledQuery, options: EncodeOptions): number {
    const queryNode = builder.addNode('Query', 'query', { k: options.k });

    let last = queryNode;
    if (query.initialLabels !== null) {
      last = this.encodeLabelConstraint(builder, query.initialLabels, queryNode);
    } else {
      for (const label of options.ingress?.labels ?? []) {
        const atom = builder.addNode('QueryAtom', `atom:label:${label}`);
        builder.addEdge(queryNode, atom, 'query-label');
        builder.addEdge(atom, this.requireNode(builder, labelKey(label)), 'query-reference');
      }
    }

    for (const segment of query.segments) {
      const node = this.encodeSegment(builder, segment);
      builder.addEdge(last, node, 'query-sequence');
      last = node;
    }

    if (query.finalLabels !== null) {
      this.encodeLabelConstraint(builder, query.finalLabels, last);
    }
    return queryNode;
  }

  /**
   * Chain of label atoms hanging off `from`
   * @returns The last node of the chain
   */
  private static encodeLabelConstraint(builder: GraphBuilder, constraint: LabelConstraint, from: number): number {
    if (constraint.atoms.length === 0) {
      const empty = builder.ensureNode('Label', EMPTY_STACK_KEY);
      builder.addEdge(from, empty, 'query-label');
      return empty;
    }

    let last = from;
    for (const atom of constraint.atoms) {
      const node = this.encodeLabelAtom(builder, atom);
      builder.addEdge(last, node, 'query-label');
      last = node;
    }
    return last;
  }

  private static encodeLabelAtom(builder: GraphBuilder, atom: LabelAtom): number {
    switch (atom.kind) {
      case 'label': {
        const node = builder.addNode('QueryAtom', `atom:label:${atom.label}`, { queryLiteral: 1 });
        builder.addEdge(node, this.requireNode(builder, labelKey(atom.label)), 'query-reference');
        return node;
      }
      case 'anyLabel':
        return builder.addNode('Any', 'atom:label:.', { queryAny: 1 });
      case 'labels':
        return atom.min === 1
          ? builder.addNode('OneOrMore', 'atom:label:.+')
          : builder.addNode('ZeroOrMore', 'atom:label:.*');
    }
  }

  private static encodeSegment(builder: GraphBuilder, segment: PatternSegment): number {
    switch (segment.kind) {
      case 'literal': {
        const atom = builder.addNode('QueryAtom', `atom:router:${segment.router}`, { queryLiteral: 1 });
        // Literals may name routers the topology lacks
        const router = builder.ensureNode('Router', routerKey(segment.router));
        builder.annotate(router, 'queryLiteral', 1);
        builder.addEdge(atom, router, 'query-reference');
        return atom;
      }
      case 'capture': {
        const pattern = segment.name !== null ? `[${segment.name}]` : segment.min === 1 ? '.+' : '.*';
        return builder.addNode(segment.min === 1 ? 'OneOrMore' : 'ZeroOrMore', `atom:router:${pattern}`, {
          queryCapture: 1,
        });
      }
      case 'any':
        return builder.addNode('Any', 'atom:router:.', { queryAny: 1 });
    }
  }

  private static requireNode(builder: GraphBuilder, label: string): number {
    const id = builder.nodeId(label);
    if (id === undefined) {
      throw new Error(`Graph node ${label} has not been created`);
    }
    return id;
  }

  private static finish(builder: GraphBuilder, queryNode: number, label?: boolean): EncodedGraph {
    const nodes: GraphNode[] = builder.nodes.map((pending, id) => {
      const features = new Array<number>(NODE_FEATURES.length).fill(0);
      features[NODE_TYPES.indexOf(pending.type)] = 1;
      for (const feature of ANNOTATIONS) {
        const value = pending.annotations[feature];
        if (value !== undefined) {
          features[ANNOTATION_COLUMNS[feature]] = value;
        }
      }
      return { id, type: pending.type, label: pending.label, features };
    });

    const edges: GraphEdge[] = builder.edges.map(({ source, target, type }) => {
      const features = new Array<number>(EDGE_TYPES.length).fill(0);
      features[EDGE_TYPES.indexOf(type)] = 1;
      return { source, target, type, features };
    });

    const graph: EncodedGraph = {
      schemaVersion: GRAPH_SCHEMA_VERSION,
      nodes,
      edges,
      x: nodes.map((node) => node.features),
      edgeIndex: [edges.map((edge) => edge.source), edges.map((edge) => edge.target)],
      edgeAttr: edges.map((edge) => edge.features),
      queryNode,
      mask: nodes.map((node) => node.id === queryNode),
    };
    if (label !== undefined) {
      graph.y = label ? 1 : 0;
    }
    return graph;
  }
}

/**
 * Stable JSON form of an encoded graph
 */
export function serializeGraph(graph: EncodedGraph, pretty = false): string {
  return JSON.stringify(graph, null, pretty ? 2 : undefined);
}
