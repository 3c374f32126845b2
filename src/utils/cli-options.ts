/**
 * navindex - CLI Option Parsers
 * @module utils/cli-options
 */

import { InvalidArgumentError } from 'commander';

/**
 * Option parser for counts and byte sizes. Commander reports the thrown
 * error as an invalid option value and exits with its usage error code.
 */
export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got '${value}'`);
  }
  return Number.parseInt(value, 10);
}
