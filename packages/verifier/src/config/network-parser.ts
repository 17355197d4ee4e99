/**
 * Network Parser Module
 *
 * Builds the immutable {@link NetworkModel} from a P-Rex topology document
 * and a P-Rex routing document. Both documents are validated completely
 * before a model is returned; any problem aborts the whole parse.
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  ForwardingAction,
  ForwardingRoute,
  ForwardingRule,
  Link,
  RouterInterface,
  TrafficEngineeringGroup,
} from '@labelpath/shared';
import { ForwardingTable } from '../model/forwarding-table';
import { NetworkModel, Router } from '../model/network-model';
import { Logger } from '../utils/logger';
import {
  DanglingInterfaceError,
  MalformedInputError,
  NetworkDocument,
  UnknownReferenceError,
} from './network-errors';

type XmlElement = Record<string, unknown>;

/**
 * Elements that may repeat and are therefore always parsed as arrays
 */
const REPEATED_ELEMENTS = new Set([
  'router',
  'interface',
  'link',
  'shared_interface',
  'routing',
  'destination',
  'te-group',
  'route',
  'action',
]);

const ATTRIBUTE_PREFIX = '@_';

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseAttributeValue: false,
  parseTagValue: false,
  isArray: (name: string, _jpath: string, _isLeafNode: boolean, isAttribute: boolean) =>
    !isAttribute && REPEATED_ELEMENTS.has(name),
});

/**
 * Router and interfaces declared by the topology document, before ids are assigned
 */
interface DeclaredRouter {
  name: string;
  interfaces: string[];
}

/**
 * Network Parser Class
 *
 * Static class turning the two XML documents into a validated model.
 *
 * @example
 * ```typescript
 * try {
 *   const model = NetworkParser.loadFiles('./topo.xml', './routing.xml');
 *   console.log(`Loaded ${model.routers.length} routers`);
 * } catch (error) {
 *   if (error instanceof NetworkParseError) {
 *     console.error(`${error.document} ${error.field}: ${error.message}`);
 *     process.exit(2);
 *   }
 * }
 * ```
 */
export class NetworkParser {
  /**
   * Read both documents from disk and parse them
   * @throws MalformedInputError if a file cannot be read
   */
  static loadFiles(topologyPath: string, routingPath: string, logger?: Logger): NetworkModel {
    const topologyXml = this.readDocument(topologyPath, 'topology');
    const routingXml = this.readDocument(routingPath, 'routing');
    return this.parse(topologyXml, routingXml, logger);
  }

  /**
   * Parse a topology document and a routing document into a model
   * @throws MalformedInputError, DanglingInterfaceError, UnknownReferenceError
   */
  static parse(topologyXml: string, routingXml: string, logger?: Logger): NetworkModel {
    const topology = this.parseXml(topologyXml, 'topology', 'network');
    const routing = this.parseXml(routingXml, 'routing', 'routes');

    const declared = this.parseRouters(topology);

    // Canonical ids: routers by name, then interfaces by name
    declared.sort((a, b) => compareNames(a.name, b.name));
    const interfaceIds = new Map<string, Map<string, number>>();
    const interfaceSpecs: Array<{ router: string; name: string }> = [];
    for (const router of declared) {
      const ids = new Map<string, number>();
      for (const name of [...router.interfaces].sort(compareNames)) {
        ids.set(name, interfaceSpecs.length);
        interfaceSpecs.push({ router: router.name, name });
      }
      interfaceIds.set(router.name, ids);
    }

    const linkEnds = this.parseLinks(topology, interfaceIds, interfaceSpecs.length);

    // Interface ids are canonical, so ordering links by endpoint ids is too
    linkEnds.sort((x, y) => x[0] - y[0] || x[1] - y[1]);
    const linkOfInterface = new Map<number, number>();
    const links: Link[] = linkEnds.map(([a, b], id) => {
      linkOfInterface.set(a, id);
      linkOfInterface.set(b, id);
      const nameA = `${interfaceSpecs[a].router}.${interfaceSpecs[a].name}`;
      const nameB = `${interfaceSpecs[b].router}.${interfaceSpecs[b].name}`;
      return { id, a, b, name: `${nameA}--${nameB}` };
    });

    const interfaces: RouterInterface[] = interfaceSpecs.map((spec, id) => {
      const linkId = linkOfInterface.get(id);
      if (linkId === undefined) {
        throw new DanglingInterfaceError(spec.router, spec.name);
      }
      return { id, router: spec.router, name: spec.name, linkId };
    });

    const tables = new Map<string, ForwardingTable>(
      declared.map((router) => [router.name, new ForwardingTable(router.name, logger)])
    );
    this.parseRoutings(routing, interfaceIds, tables);

    const routers: Router[] = declared.map((router) => {
      const ids = interfaceIds.get(router.name) ?? new Map<string, number>();
      const table = tables.get(router.name) ?? new ForwardingTable(router.name, logger);
      return {
        name: router.name,
        interfaces: Array.from(ids.values()).map((id) => interfaces[id]),
        table,
      };
    });

    const model = new NetworkModel(routers, interfaces, links);

    logger?.info(
      {
        routers: model.routers.length,
        interfaces: model.interfaces.length,
        links: model.links.length,
        rules: model.rules.length,
      },
      'Parsed network model'
    );

    return model;
  }

  private static readDocument(filePath: string, document: NetworkDocument): string {
    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new MalformedInputError(`File not found: ${filePath}`, document, 'file');
      }
      throw new MalformedInputError(
        `Failed to read ${filePath}: ${(error as Error).message}`,
        document,
        'file'
      );
    }
  }

  private static parseXml(xml: string, document: NetworkDocument, rootTag: string): XmlElement {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new MalformedInputError(`Invalid XML at ${line}:${col}: ${msg}`, document, 'document');
    }

    const parsed: unknown = xmlParser.parse(xml);
    const root = isElement(parsed) ? parsed[rootTag] : undefined;
    if (root === undefined) {
      throw new MalformedInputError(`Missing root element <${rootTag}>`, document, rootTag);
    }
    return asElement(root, document, rootTag);
  }

  private static parseRouters(topology: XmlElement): DeclaredRouter[] {
    const routers: DeclaredRouter[] = [];
    const seen = new Set<string>();

    children(topology, 'routers', 'router', 'topology', 'network').forEach((element, index) => {
      const field = `routers.router[${index}]`;
      const name = requireAttribute(element, 'name', 'topology', field);
      if (seen.has(name)) {
        throw new MalformedInputError(`Duplicate router name: ${name}`, 'topology', field);
      }
      seen.add(name);

      const interfaces: string[] = [];
      const routerField = `router[${name}]`;
      children(element, 'interfaces', 'interface', 'topology', routerField).forEach(
        (ifaceElement, ifaceIndex) => {
          const ifaceField = `${routerField}.interface[${ifaceIndex}]`;
          const ifaceName = requireAttribute(ifaceElement, 'name', 'topology', ifaceField);
          if (interfaces.includes(ifaceName)) {
            throw new MalformedInputError(
              `Duplicate interface ${ifaceName} on router ${name}`,
              'topology',
              ifaceField
            );
          }
          interfaces.push(ifaceName);
        }
      );

      routers.push({ name, interfaces });
    });

    return routers;
  }

  /**
   * @returns Interface id pairs, lower id first
   */
  private static parseLinks(
    topology: XmlElement,
    interfaceIds: Map<string, Map<string, number>>,
    interfaceCount: number
  ): Array<[number, number]> {
    const attached = new Array<boolean>(interfaceCount).fill(false);
    const links: Array<[number, number]> = [];

    children(topology, 'links', 'link', 'topology', 'network').forEach((element, index) => {
      const field = `links.link[${index}]`;
      const sides = children(element, 'sides', 'shared_interface', 'topology', field);
      if (sides.length !== 2) {
        throw new MalformedInputError(
          `Link must have exactly 2 sides, got ${sides.length}`,
          'topology',
          `${field}.sides`
        );
      }

      const ends = sides.map((side, sideIndex) => {
        const sideField = `${field}.sides.shared_interface[${sideIndex}]`;
        const router = requireAttribute(side, 'router', 'topology', sideField);
        const ifaceName = requireAttribute(side, 'interface', 'topology', sideField);
        const ids = interfaceIds.get(router);
        if (!ids) {
          throw new UnknownReferenceError('topology', sideField, 'router', router);
        }
        const id = ids.get(ifaceName);
        if (id === undefined) {
          throw new UnknownReferenceError('topology', sideField, 'interface', `${router}.${ifaceName}`);
        }
        if (attached[id]) {
          throw new MalformedInputError(
            `Interface ${router}.${ifaceName} is attached to more than one link`,
            'topology',
            sideField
          );
        }
        return { router, id };
      });

      const [first, second] = ends;
      if (first.router === second.router) {
        throw new MalformedInputError(
          `Link connects router ${first.router} to itself`,
          'topology',
          field
        );
      }

      attached[first.id] = true;
      attached[second.id] = true;
      links.push(first.id < second.id ? [first.id, second.id] : [second.id, first.id]);
    });

    return links;
  }

  private static parseRoutings(
    routing: XmlElement,
    interfaceIds: Map<string, Map<string, number>>,
    tables: Map<string, ForwardingTable>
  ): void {
    children(routing, 'routings', 'routing', 'routing', 'routes').forEach((element, index) => {
      const field = `routings.routing[${index}]`;
      const router = requireAttribute(element, 'for', 'routing', field);
      const ids = interfaceIds.get(router);
      const table = tables.get(router);
      if (!ids || !table) {
        throw new UnknownReferenceError('routing', `${field}.for`, 'router', router);
      }

      const resolveInterface = (name: string, refField: string): number => {
        const id = ids.get(name);
        if (id === undefined) {
          throw new UnknownReferenceError('routing', refField, 'interface', `${router}.${name}`);
        }
        return id;
      };

      const routerField = `routing[${router}]`;
      children(element, 'destinations', 'destination', 'routing', routerField).forEach(
        (destination, destIndex) => {
          const destField = `${routerField}.destination[${destIndex}]`;
          const inInterface = resolveInterface(
            requireAttribute(destination, 'from', 'routing', destField),
            `${destField}.from`
          );
          const label = optionalAttribute(destination, 'label');

          if (table.lookup(inInterface, label) !== null) {
            throw new MalformedInputError(
              `Duplicate rule for interface ${router}.${attributeValue(destination, 'from')} and label ${label ?? 'none'}`,
              'routing',
              destField
            );
          }

          const groups = this.parseGroups(destination, destField, resolveInterface);
          const rule: ForwardingRule = { router, inInterface, label, groups };
          table.addRule(rule);
        }
      );
    });
  }

  private static parseGroups(
    destination: XmlElement,
    destField: string,
    resolveInterface: (name: string, refField: string) => number
  ): TrafficEngineeringGroup[] {
    const groupElements = children(destination, 'te-groups', 'te-group', 'routing', destField);
    if (groupElements.length === 0) {
      throw new MalformedInputError('Destination has no te-group', 'routing', `${destField}.te-groups`);
    }

    return groupElements.map((group, groupIndex) => {
      const groupField = `${destField}.te-group[${groupIndex}]`;
      const routeElements = children(group, 'routes', 'route', 'routing', groupField);
      if (routeElements.length === 0) {
        throw new MalformedInputError('te-group has no route', 'routing', `${groupField}.routes`);
      }

      const routes = routeElements.map((route, routeIndex): ForwardingRoute => {
        const routeField = `${groupField}.route[${routeIndex}]`;
        const outInterface = resolveInterface(
          requireAttribute(route, 'to', 'routing', routeField),
          `${routeField}.to`
        );
        const actions = children(route, 'actions', 'action', 'routing', routeField, true).map(
          (action, actionIndex) => parseAction(action, `${routeField}.action[${actionIndex}]`)
        );
        return { outInterface, actions };
      });

      return { routes };
    });
  }
}

function parseAction(element: XmlElement, field: string): ForwardingAction {
  const type = requireAttribute(element, 'type', 'routing', field).toLowerCase();
  switch (type) {
    case 'pop':
      return { type: 'pop' };
    case 'swap':
      return { type: 'swap', label: requireAttribute(element, 'arg', 'routing', field) };
    case 'push':
      return { type: 'push', label: requireAttribute(element, 'arg', 'routing', field) };
    default:
      throw new MalformedInputError(`Unknown action type: ${type}`, 'routing', `${field}.type`);
  }
}

function isElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Empty elements (`<interface/>`) parse to an empty string
 */
function asElement(value: unknown, document: NetworkDocument, field: string): XmlElement {
  if (value === '') {
    return {};
  }
  if (!isElement(value)) {
    throw new MalformedInputError('Expected an element', document, field);
  }
  return value;
}

/**
 * Items of a `<container><item/>...</container>` block
 * @param optional - Whether a missing container means "no items" rather than an error
 */
function children(
  parent: XmlElement,
  container: string,
  item: string,
  document: NetworkDocument,
  field: string,
  optional = false
): XmlElement[] {
  const block = parent[container];
  if (block === undefined) {
    if (optional) {
      return [];
    }
    throw new MalformedInputError(`Missing required element <${container}>`, document, `${field}.${container}`);
  }
  if (Array.isArray(block)) {
    throw new MalformedInputError(`Element <${container}> appears more than once`, document, `${field}.${container}`);
  }

  const items = asElement(block, document, `${field}.${container}`)[item];
  if (items === undefined) {
    return [];
  }
  if (!Array.isArray(items)) {
    throw new MalformedInputError(`Expected <${item}> elements`, document, `${field}.${container}`);
  }
  return items.map((value: unknown, index) => asElement(value, document, `${field}.${item}[${index}]`));
}

function attributeValue(element: XmlElement, name: string): string | undefined {
  const value = element[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === 'string' ? value.trim() : undefined;
}

function requireAttribute(
  element: XmlElement,
  name: string,
  document: NetworkDocument,
  field: string
): string {
  const value = attributeValue(element, name);
  if (value === undefined || value === '') {
    throw new MalformedInputError(`Missing required attribute '${name}'`, document, `${field}@${name}`);
  }
  return value;
}

/**
 * A missing or empty label attribute keys the rule for unlabelled packets
 */
function optionalAttribute(element: XmlElement, name: string): string | null {
  const value = attributeValue(element, name);
  return value === undefined || value === '' ? null : value;
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
