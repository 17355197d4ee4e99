/**
 * Per-router MPLS forwarding table
 * @packageDocumentation
 */

import { ForwardingRule, Label } from '@labelpath/shared';

/**
 * Forwarding table of a single router, keyed by (incoming interface, top label)
 * @remarks
 * Lookups are exact: unlike IP routing there is no prefix matching, a label
 * either has a rule on the interface it arrived on or the packet cannot be
 * forwarded. A `null` label keys the rule applied to unlabelled packets.
 *
 * @example
 * ```typescript
 * const table = new ForwardingTable('S1');
 * table.addRule({
 *   router: 'S1',
 *   inInterface: 0,
 *   label: '10',
 *   groups: [{ routes: [{ outInterface: 1, actions: [{ type: 'swap', label: '11' }] }] }],
 * });
 *
 * table.lookup(0, '10'); // the rule above
 * table.lookup(0, '99'); // null
 * ```
 */
export class ForwardingTable {
  /**
   * Internal storage for rules
   * Key: incoming interface id, then top label (null for unlabelled)
   */
  private readonly rules: Map<number, Map<Label | null, ForwardingRule>>;

  private count = 0;

  /**
   * Optional logger instance for structured logging
   * @remarks
   * If provided, logs rule insertions at DEBUG level.
   */
  private readonly logger?: {
    debug: (obj: object, msg?: string) => void;
  };

  /**
   * Creates a new ForwardingTable
   * @param router - Name of the router owning the table
   * @param logger - Optional logger instance for structured logging
   */
  constructor(
    public readonly router: string,
    logger?: {
      debug: (obj: object, msg?: string) => void;
    }
  ) {
    this.rules = new Map();
    this.logger = logger;
  }

  /**
   * Add a rule to the table
   * @throws {Error} If the rule belongs to another router or its key is already taken
   */
  addRule(rule: ForwardingRule): void {
    if (rule.router !== this.router) {
      throw new Error(`Rule for router ${rule.router} added to table of ${this.router}`);
    }

    let byLabel = this.rules.get(rule.inInterface);
    if (!byLabel) {
      byLabel = new Map();
      this.rules.set(rule.inInterface, byLabel);
    }
    if (byLabel.has(rule.label)) {
      throw new Error(
        `Duplicate rule on ${this.router} for interface ${rule.inInterface}, label ${rule.label ?? 'none'}`
      );
    }

    byLabel.set(rule.label, rule);
    this.count++;

    this.logger?.debug(
      { router: this.router, inInterface: rule.inInterface, label: rule.label, groups: rule.groups.length },
      `Added rule on ${this.router}`
    );
  }

  /**
   * Find the rule for a packet received on `inInterface` carrying `label` on top
   * @returns The matching rule, or null if the packet cannot be forwarded
   */
  lookup(inInterface: number, label: Label | null): ForwardingRule | null {
    return this.rules.get(inInterface)?.get(label) ?? null;
  }

  /**
   * All rules, ordered by incoming interface id and then label (unlabelled first)
   */
  getAllRules(): ForwardingRule[] {
    const interfaces = Array.from(this.rules.keys()).sort((a, b) => a - b);
    const result: ForwardingRule[] = [];
    for (const inInterface of interfaces) {
      const byLabel = this.rules.get(inInterface);
      if (!byLabel) {
        continue;
      }
      const entries = Array.from(byLabel.values()).sort((a, b) => compareLabels(a.label, b.label));
      result.push(...entries);
    }
    return result;
  }

  /**
   * Number of rules in the table
   */
  get size(): number {
    return this.count;
  }
}

/**
 * Order labels with unlabelled first, then by code unit
 */
export function compareLabels(a: Label | null, b: Label | null): number {
  if (a === b) {
    return 0;
  }
  if (a === null) {
    return -1;
  }
  if (b === null) {
    return 1;
  }
  return a < b ? -1 : 1;
}
