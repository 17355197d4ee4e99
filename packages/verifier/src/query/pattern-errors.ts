/**
 * Error thrown when a query pattern cannot be compiled
 */
export class InvalidPatternError extends Error {
  constructor(
    message: string,
    public readonly pattern: string,
    public readonly position: number
  ) {
    super(`${message} (at position ${position} in "${pattern}")`);
    this.name = 'InvalidPatternError';
    Object.setPrototypeOf(this, InvalidPatternError.prototype);
  }
}
