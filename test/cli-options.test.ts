/**
 * Tests for the CLI option parsers
 */

import { describe, it, expect } from 'vitest';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { parseInteger } from '../src/utils/cli-options';

describe('parseInteger', () => {
  it('should accept non-negative integers', () => {
    expect(parseInteger('0')).toBe(0);
    expect(parseInteger('2500')).toBe(2500);
  });

  it('should reject negative, fractional and partly numeric values', () => {
    for (const value of ['-1', '1.5', '12abc', 'many', '']) {
      expect(() => parseInteger(value)).toThrow(InvalidArgumentError);
    }
  });

  it('should surface as a commander usage error', () => {
    const program = new Command()
      .exitOverride()
      .configureOutput({ writeErr: () => undefined })
      .option('--max-files <number>', 'Maximum number of files to index', parseInteger);

    let caught: unknown;
    try {
      program.parse(['--max-files', 'lots'], { from: 'user' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CommanderError);
    if (caught instanceof CommanderError) {
      expect(caught.code).toBe('commander.invalidArgument');
      expect(caught.exitCode).toBe(1);
      expect(caught.message).toBe(
        "error: option '--max-files <number>' argument 'lots' is invalid. Expected a non-negative integer, got 'lots'"
      );
    }
  });
});
