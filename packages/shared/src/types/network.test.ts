/**
 * Unit Tests for Network Model Helpers
 */

import { formatLabelStack, interfaceKey, topLabel } from './network';

describe('Network model helpers', () => {
  describe('topLabel()', () => {
    it('should return the outermost label', () => {
      expect(topLabel(['10', '20'])).toBe('10');
    });

    it('should return null for an empty stack', () => {
      expect(topLabel([])).toBeNull();
    });
  });

  describe('formatLabelStack()', () => {
    it('should render labels outermost first', () => {
      expect(formatLabelStack(['10', '20'])).toBe('[10 20]');
    });

    it('should render an empty stack as empty brackets', () => {
      expect(formatLabelStack([])).toBe('[]');
    });
  });

  it('should key interfaces by router and name', () => {
    expect(interfaceKey('S1', 'e0')).toBe('S1.e0');
  });
});
