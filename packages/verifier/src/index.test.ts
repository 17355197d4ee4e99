import * as lib from './index';

describe('index.ts exports', () => {
  it('should export NetworkParser', () => {
    expect(typeof lib.NetworkParser).toBe('function');
  });

  it('should export compileQuery', () => {
    expect(typeof lib.compileQuery).toBe('function');
  });

  it('should export SatisfiabilityEvaluator', () => {
    expect(typeof lib.SatisfiabilityEvaluator).toBe('function');
  });

  it('should export GraphEncoder', () => {
    expect(typeof lib.GraphEncoder).toBe('function');
  });

  it('should export ConfigLoader', () => {
    expect(typeof lib.ConfigLoader).toBe('function');
  });

  it('should export createLogger', () => {
    expect(typeof lib.createLogger).toBe('function');
  });

  it('should NOT export test fixtures', () => {
    expect('createLinearNetwork' in lib).toBe(false);
  });
});
