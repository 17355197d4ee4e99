/**
 * Unit tests for ForwardingTable
 * @packageDocumentation
 */

import { ForwardingRule, Label } from '@labelpath/shared';
import { ForwardingTable, compareLabels } from './forwarding-table';

/**
 * Mock logger for testing log output without console noise
 */
const createMockLogger = (): { debug: jest.Mock } => ({
  debug: jest.fn(),
});

const rule = (inInterface: number, label: Label | null, router = 'S1'): ForwardingRule => ({
  router,
  inInterface,
  label,
  groups: [{ routes: [{ outInterface: 9, actions: [{ type: 'pop' }] }] }],
});

describe('ForwardingTable', () => {
  describe('Constructor and Initialization', () => {
    it('should create an empty table', () => {
      // Arrange & Act
      const table = new ForwardingTable('S1');

      // Assert
      expect(table.router).toBe('S1');
      expect(table.size).toBe(0);
      expect(table.getAllRules()).toEqual([]);
    });
  });

  describe('addRule()', () => {
    it('should add a rule and log it at debug level', () => {
      // Arrange
      const mockLogger = createMockLogger();
      const table = new ForwardingTable('S1', mockLogger);

      // Act
      table.addRule(rule(0, '10'));

      // Assert
      expect(table.size).toBe(1);
      expect(mockLogger.debug).toHaveBeenCalledWith(
        { router: 'S1', inInterface: 0, label: '10', groups: 1 },
        'Added rule on S1'
      );
    });

    it('should keep rules for the same label on different interfaces apart', () => {
      // Arrange
      const table = new ForwardingTable('S1');

      // Act
      table.addRule(rule(0, '10'));
      table.addRule(rule(1, '10'));

      // Assert
      expect(table.size).toBe(2);
    });

    it('should reject a duplicate (interface, label) key', () => {
      // Arrange
      const table = new ForwardingTable('S1');
      table.addRule(rule(0, '10'));

      // Act & Assert
      expect(() => table.addRule(rule(0, '10'))).toThrow(
        'Duplicate rule on S1 for interface 0, label 10'
      );
    });

    it('should reject a second unlabelled rule on one interface', () => {
      // Arrange
      const table = new ForwardingTable('S1');
      table.addRule(rule(0, null));

      // Act & Assert
      expect(() => table.addRule(rule(0, null))).toThrow(
        'Duplicate rule on S1 for interface 0, label none'
      );
    });

    it('should reject a rule of another router', () => {
      // Arrange
      const table = new ForwardingTable('S1');

      // Act & Assert
      expect(() => table.addRule(rule(0, '10', 'S2'))).toThrow(
        'Rule for router S2 added to table of S1'
      );
    });
  });

  describe('lookup()', () => {
    it('should match exactly on interface and label', () => {
      // Arrange
      const table = new ForwardingTable('S1');
      const labelled = rule(0, '10');
      const unlabelled = rule(0, null);
      table.addRule(labelled);
      table.addRule(unlabelled);

      // Act & Assert
      expect(table.lookup(0, '10')).toBe(labelled);
      expect(table.lookup(0, null)).toBe(unlabelled);
      expect(table.lookup(0, '1')).toBeNull();
      expect(table.lookup(1, '10')).toBeNull();
    });
  });

  describe('getAllRules()', () => {
    it('should order by interface, then unlabelled first, then label', () => {
      // Arrange
      const table = new ForwardingTable('S1');
      table.addRule(rule(2, '5'));
      table.addRule(rule(0, '20'));
      table.addRule(rule(0, null));
      table.addRule(rule(0, '100'));

      // Act
      const keys = table.getAllRules().map((entry) => [entry.inInterface, entry.label]);

      // Assert
      expect(keys).toEqual([
        [0, null],
        [0, '100'],
        [0, '20'],
        [2, '5'],
      ]);
    });
  });
});

describe('compareLabels', () => {
  it('should sort null before any label', () => {
    expect(compareLabels(null, '0')).toBe(-1);
    expect(compareLabels('0', null)).toBe(1);
    expect(compareLabels(null, null)).toBe(0);
  });

  it('should compare labels as strings', () => {
    expect(['b', 'a', '10', '9'].sort(compareLabels)).toEqual(['10', '9', 'a', 'b']);
  });
});
