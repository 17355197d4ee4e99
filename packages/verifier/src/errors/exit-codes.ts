/**
 * Process exit codes
 * @packageDocumentation
 */

import { ConfigurationError } from '../config/config-loader';
import { NetworkParseError } from '../config/network-errors';
import { UnknownLinkError } from '../model/network-model';
import { InvalidPatternError } from '../query/pattern-errors';
import { EnumerationOverflowError } from '../scenarios/scenario-enumerator';
import { InvalidIngressError } from '../simulation/forwarding-simulator';

/**
 * Exit codes of the command-line tools
 * @remarks
 * A completed evaluation exits with `Success` whatever the verdict; the
 * verdict itself is printed.
 */
export const ExitCode = {
  Success: 0,
  Failure: 1,
  ParseError: 2,
  InvalidPattern: 3,
  ResourceExhausted: 4,
  ConfigurationError: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Map an error to the exit code reported for it
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof NetworkParseError) {
    return ExitCode.ParseError;
  }
  if (error instanceof InvalidPatternError) {
    return ExitCode.InvalidPattern;
  }
  if (error instanceof EnumerationOverflowError || error instanceof RangeError) {
    return ExitCode.ResourceExhausted;
  }
  if (
    error instanceof ConfigurationError ||
    error instanceof InvalidIngressError ||
    error instanceof UnknownLinkError
  ) {
    return ExitCode.ConfigurationError;
  }
  return ExitCode.Failure;
}
