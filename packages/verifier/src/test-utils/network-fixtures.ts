/**
 * Network Fixture Builders
 *
 * Produce P-Rex topology and routing documents from compact descriptions so
 * tests can state a network in a few lines.
 *
 * Usage:
 * ```typescript
 * const { topologyXml, routingXml } = buildNetworkXml(
 *   [{ name: 'A', interfaces: ['e0'] }, { name: 'B', interfaces: ['e0'] }],
 *   [['A', 'e0', 'B', 'e0']],
 *   [{ router: 'A', from: 'e0', label: '10', groups: [[{ to: 'e0', actions: [{ swap: '11' }] }]] }]
 * );
 * ```
 */

import { NetworkModel } from '../model/network-model';
import { NetworkParser } from '../config/network-parser';

export interface RouterFixture {
  name: string;
  interfaces: string[];
}

/** `[routerA, interfaceA, routerB, interfaceB]` */
export type LinkFixture = [string, string, string, string];

export type ActionFixture = 'pop' | { swap: string } | { push: string };

export interface RouteFixture {
  to: string;
  actions?: ActionFixture[];
}

export interface RuleFixture {
  router: string;
  from: string;
  /** Omitted or null for the unlabelled-packet rule */
  label?: string | null;
  /** Traffic-engineering groups in priority order, each a list of routes */
  groups: RouteFixture[][];
}

export interface NetworkXml {
  topologyXml: string;
  routingXml: string;
}

export function buildTopologyXml(routers: RouterFixture[], links: LinkFixture[]): string {
  const routerXml = routers
    .map((router) => {
      const interfaces = router.interfaces
        .map((name) => `          <interface name="${name}"/>`)
        .join('\n');
      return [
        `      <router name="${router.name}">`,
        '        <interfaces>',
        interfaces,
        '        </interfaces>',
        '      </router>',
      ].join('\n');
    })
    .join('\n');

  const linkXml = links
    .map(([routerA, ifaceA, routerB, ifaceB]) =>
      [
        '      <link>',
        '        <sides>',
        `          <shared_interface router="${routerA}" interface="${ifaceA}"/>`,
        `          <shared_interface router="${routerB}" interface="${ifaceB}"/>`,
        '        </sides>',
        '      </link>',
      ].join('\n')
    )
    .join('\n');

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<network>',
    '  <routers>',
    routerXml,
    '  </routers>',
    '  <links>',
    linkXml,
    '  </links>',
    '</network>',
    '',
  ].join('\n');
}

export function buildRoutingXml(rules: RuleFixture[]): string {
  const byRouter = new Map<string, RuleFixture[]>();
  for (const rule of rules) {
    byRouter.set(rule.router, [...(byRouter.get(rule.router) ?? []), rule]);
  }

  const routingXml = Array.from(byRouter.entries())
    .map(([router, routerRules]) => {
      const destinations = routerRules.map((rule) => {
        const label = rule.label === undefined || rule.label === null ? '' : ` label="${rule.label}"`;
        const groups = rule.groups.map((routes) => {
          const routeXml = routes.map((route) => {
            const actions = (route.actions ?? []).map((action) => {
              if (action === 'pop') {
                return '<action type="pop"/>';
              }
              if ('swap' in action) {
                return `<action type="swap" arg="${action.swap}"/>`;
              }
              return `<action type="push" arg="${action.push}"/>`;
            });
            return `<route to="${route.to}"><actions>${actions.join('')}</actions></route>`;
          });
          return `<te-group><routes>${routeXml.join('')}</routes></te-group>`;
        });
        return `        <destination from="${rule.from}"${label}><te-groups>${groups.join('')}</te-groups></destination>`;
      });
      return [
        `    <routing for="${router}">`,
        '      <destinations>',
        ...destinations,
        '      </destinations>',
        '    </routing>',
      ].join('\n');
    })
    .join('\n');

  return ['<routes>', '  <routings>', routingXml, '  </routings>', '</routes>', ''].join('\n');
}

export function buildNetworkXml(
  routers: RouterFixture[],
  links: LinkFixture[],
  rules: RuleFixture[]
): NetworkXml {
  return { topologyXml: buildTopologyXml(routers, links), routingXml: buildRoutingXml(rules) };
}

/**
 * S1 - S2 - S3 with label 10 swapped to 11 at S1 and to 12 at S2
 * @remarks
 * Interface ids: S1.e1 = 0, S2.e0 = 1, S2.e1 = 2, S3.e0 = 3.
 * Link ids: S1.e1--S2.e0 = 0, S2.e1--S3.e0 = 1.
 * Ingress: router S1, interface e1, labels ['10'].
 */
export function linearNetworkXml(): NetworkXml {
  return buildNetworkXml(
    [
      { name: 'S1', interfaces: ['e1'] },
      { name: 'S2', interfaces: ['e0', 'e1'] },
      { name: 'S3', interfaces: ['e0'] },
    ],
    [
      ['S1', 'e1', 'S2', 'e0'],
      ['S2', 'e1', 'S3', 'e0'],
    ],
    [
      { router: 'S1', from: 'e1', label: '10', groups: [[{ to: 'e1', actions: [{ swap: '11' }] }]] },
      { router: 'S2', from: 'e0', label: '11', groups: [[{ to: 'e1', actions: [{ swap: '12' }] }]] },
    ]
  );
}

/**
 * Parsed {@link linearNetworkXml}
 */
export function createLinearNetwork(): NetworkModel {
  const { topologyXml, routingXml } = linearNetworkXml();
  return NetworkParser.parse(topologyXml, routingXml);
}

/**
 * Ring A - B - C - D - A with a primary path A -> B -> C and a backup
 * A -> D -> C used when A-B fails
 * @remarks
 * Link ids (by endpoint): A.b--B.a = 0, A.d--D.a = 1, B.c--C.b = 2, C.d--D.c = 3.
 * Ingress: router A, interface d, labels ['10'].
 */
export function ringNetworkXml(): NetworkXml {
  return buildNetworkXml(
    [
      { name: 'A', interfaces: ['b', 'd'] },
      { name: 'B', interfaces: ['a', 'c'] },
      { name: 'C', interfaces: ['b', 'd'] },
      { name: 'D', interfaces: ['a', 'c'] },
    ],
    [
      ['A', 'b', 'B', 'a'],
      ['B', 'c', 'C', 'b'],
      ['C', 'd', 'D', 'c'],
      ['D', 'a', 'A', 'd'],
    ],
    [
      {
        router: 'A',
        from: 'd',
        label: '10',
        groups: [
          [{ to: 'b', actions: [{ swap: '20' }] }],
          [{ to: 'd', actions: [{ swap: '30' }] }],
        ],
      },
      { router: 'B', from: 'a', label: '20', groups: [[{ to: 'c', actions: ['pop'] }]] },
      { router: 'D', from: 'a', label: '30', groups: [[{ to: 'c', actions: ['pop'] }]] },
    ]
  );
}

export function createRingNetwork(): NetworkModel {
  const { topologyXml, routingXml } = ringNetworkXml();
  return NetworkParser.parse(topologyXml, routingXml);
}
