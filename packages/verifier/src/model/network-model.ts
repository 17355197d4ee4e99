/**
 * Immutable topology and forwarding model
 * @packageDocumentation
 */

import { ForwardingRule, Label, Link, RouterInterface, interfaceKey } from '@labelpath/shared';
import { ForwardingTable, compareLabels } from './forwarding-table';

/**
 * Read-only view of a router's forwarding table
 */
export type ReadonlyForwardingTable = Pick<ForwardingTable, 'router' | 'lookup' | 'getAllRules' | 'size'>;

/**
 * Error thrown when a link name does not match any link of the model
 */
export class UnknownLinkError extends Error {
  constructor(public readonly linkName: string) {
    super(`Unknown link: ${linkName}`);
    this.name = 'UnknownLinkError';
    Object.setPrototypeOf(this, UnknownLinkError.prototype);
  }
}

/**
 * Router with its interfaces (sorted by name) and forwarding table
 */
export interface Router {
  readonly name: string;
  readonly interfaces: readonly RouterInterface[];
  readonly table: ReadonlyForwardingTable;
}

/**
 * Network topology plus MPLS forwarding configuration
 * @remarks
 * Built once by {@link NetworkParser} and never mutated afterwards. Failure
 * scenarios are applied by the simulator on top of the model, so a single
 * instance can be shared by every evaluation, including concurrent ones.
 *
 * Ids are canonical: `interfaces[id].id === id` and `links[id].id === id`.
 */
export class NetworkModel {
  readonly routers: readonly Router[];
  readonly interfaces: readonly RouterInterface[];
  readonly links: readonly Link[];

  private readonly routersByName: ReadonlyMap<string, Router>;
  private readonly interfacesByKey: ReadonlyMap<string, RouterInterface>;
  private readonly linksByName: ReadonlyMap<string, Link>;

  constructor(routers: Router[], interfaces: RouterInterface[], links: Link[]) {
    interfaces.forEach((iface, index) => {
      if (iface.id !== index) {
        throw new Error(`Interface ${iface.router}.${iface.name} has id ${iface.id}, expected ${index}`);
      }
    });
    links.forEach((link, index) => {
      if (link.id !== index) {
        throw new Error(`Link ${link.name} has id ${link.id}, expected ${index}`);
      }
    });

    this.routers = Object.freeze([...routers]);
    this.interfaces = Object.freeze([...interfaces]);
    this.links = Object.freeze([...links]);
    this.routersByName = new Map(routers.map((router) => [router.name, router]));
    this.interfacesByKey = new Map(
      interfaces.map((iface) => [interfaceKey(iface.router, iface.name), iface])
    );
    this.linksByName = new Map(
      links.flatMap((link): Array<[string, Link]> => {
        const [left, right] = link.name.split('--');
        return [
          [link.name, link],
          [`${right}--${left}`, link],
        ];
      })
    );
    Object.freeze(this);
  }

  getRouter(name: string): Router | undefined {
    return this.routersByName.get(name);
  }

  /**
   * @throws {RangeError} If no interface has this id
   */
  getInterface(id: number): RouterInterface {
    const iface = this.interfaces[id];
    if (!iface) {
      throw new RangeError(`Unknown interface id: ${id}`);
    }
    return iface;
  }

  findInterface(router: string, name: string): RouterInterface | undefined {
    return this.interfacesByKey.get(interfaceKey(router, name));
  }

  /**
   * @throws {RangeError} If no link has this id
   */
  getLink(id: number): Link {
    const link = this.links[id];
    if (!link) {
      throw new RangeError(`Unknown link id: ${id}`);
    }
    return link;
  }

  /**
   * Find a link by name, in either endpoint order (`S1.e1--S2.e0` or `S2.e0--S1.e1`)
   * @throws UnknownLinkError if no link has this name
   */
  resolveLink(name: string): Link {
    const link = this.linksByName.get(name.trim());
    if (!link) {
      throw new UnknownLinkError(name);
    }
    return link;
  }

  /**
   * Link an interface is attached to
   */
  linkOf(interfaceId: number): Link {
    return this.getLink(this.getInterface(interfaceId).linkId);
  }

  /**
   * Interface at the other end of an interface's link
   */
  peerOf(interfaceId: number): RouterInterface {
    const link = this.linkOf(interfaceId);
    return this.getInterface(link.a === interfaceId ? link.b : link.a);
  }

  /**
   * Rule of the router owning `interfaceId` for a packet received there with `label` on top
   */
  lookupRule(interfaceId: number, label: Label | null): ForwardingRule | null {
    const iface = this.getInterface(interfaceId);
    return this.routersByName.get(iface.router)?.table.lookup(interfaceId, label) ?? null;
  }

  /**
   * All rules: routers by name, then incoming interface, then label
   */
  get rules(): ForwardingRule[] {
    return this.routers.flatMap((router) => router.table.getAllRules());
  }

  /**
   * Every label matched or written by a rule, sorted
   */
  collectLabels(): Label[] {
    const labels = new Set<Label>();
    for (const rule of this.rules) {
      if (rule.label !== null) {
        labels.add(rule.label);
      }
      for (const group of rule.groups) {
        for (const route of group.routes) {
          for (const action of route.actions) {
            if (action.type !== 'pop') {
              labels.add(action.label);
            }
          }
        }
      }
    }
    return Array.from(labels).sort(compareLabels);
  }

  /**
   * `router.interface` name of an interface id
   */
  describeInterface(interfaceId: number): string {
    const iface = this.getInterface(interfaceId);
    return interfaceKey(iface.router, iface.name);
  }
}
