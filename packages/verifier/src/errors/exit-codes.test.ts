/**
 * Unit tests for exitCodeFor
 * @packageDocumentation
 */

import { ConfigurationError } from '../config/config-loader';
import { DanglingInterfaceError, MalformedInputError } from '../config/network-errors';
import { UnknownLinkError } from '../model/network-model';
import { InvalidPatternError } from '../query/pattern-errors';
import { EnumerationOverflowError } from '../scenarios/scenario-enumerator';
import { InvalidIngressError } from '../simulation/forwarding-simulator';
import { ExitCode, exitCodeFor } from './exit-codes';

describe('exitCodeFor', () => {
  it.each<[string, unknown, ExitCode]>([
    ['malformed input', new MalformedInputError('bad', 'routing', 'routes'), 2],
    ['dangling interface', new DanglingInterfaceError('S1', 'e9'), 2],
    ['invalid pattern', new InvalidPatternError('Empty token', 'S1,,S2', 3), 3],
    ['enumeration overflow', new EnumerationOverflowError(10n, 5n), 4],
    ['exhausted call stack', new RangeError('Maximum call stack size exceeded'), 4],
    ['configuration error', new ConfigurationError('Missing required field: queries'), 5],
    ['unknown ingress', new InvalidIngressError('Unknown ingress router: S9'), 5],
    ['unknown failable link', new UnknownLinkError('S1.e1--S9.e0'), 5],
    ['anything else', new Error('boom'), 1],
    ['a non-error value', 'boom', 1],
  ])('should map %s', (_case, error, expected) => {
    expect(exitCodeFor(error)).toBe(expected);
  });

  it('should expose success as zero', () => {
    expect(ExitCode.Success).toBe(0);
  });
});
