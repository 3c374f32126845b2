/**
 * Tests for shared utilities
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, IndexError, NavIndexError, isNavIndexError, wrapError } from '../src/utils/errors';
import { fingerprint } from '../src/utils/hash';
import { Logger, type LogEntry } from '../src/utils/logger';
import { joinRelative, normalizePath, stemOf, getExtension, isIgnored } from '../src/utils/paths';
import { pluralize, truncate } from '../src/utils/strings';

describe('errors', () => {
  it('should wrap unknown values as internal errors', () => {
    const wrapped = wrapError('boom', 'Indexing failed');

    expect(wrapped).toBeInstanceOf(NavIndexError);
    expect(wrapped.code).toBe('INTERNAL_ERROR');
    expect(wrapped.message).toBe('Indexing failed: boom');
  });

  it('should pass NavIndexErrors through unchanged', () => {
    const error = new ConfigError('Invalid configuration', ['scan.maxFiles must be a number']);
    expect(wrapError(error)).toBe(error);
    expect(isNavIndexError(error)).toBe(true);
    expect(isNavIndexError(new Error('plain'))).toBe(false);
  });

  it('should render a CLI message with a suggested fix', () => {
    const error = new ConfigError('Invalid configuration', []);
    expect(error.toCliOutput(false)).toBe(
      '[ERR] Invalid configuration\n\nFix: Run `navindex config --validate` and fix the listed fields.'
    );
  });

  it('should serialize the violations of an IndexError', () => {
    const error = new IndexError('Index violates 1 invariant', ['duplicate file record: a.py']);
    expect(error.toJSON()).toMatchObject({
      code: 'INVARIANT_VIOLATION',
      message: 'Index violates 1 invariant',
      technical: { violations: ['duplicate file record: a.py'] },
    });
  });
});

describe('logger', () => {
  it('should drop entries below the configured level', () => {
    const entries: LogEntry[] = [];
    const log = new Logger({ level: 'warn', output: (entry) => entries.push(entry) });

    log.info('ignored');
    log.warn('kept', { path: 'a.py' });

    expect(entries.map((entry) => [entry.level, entry.message, entry.context])).toEqual([
      ['warn', 'kept', { path: 'a.py' }],
    ]);
  });

  it('should merge child context into every entry', () => {
    const entries: LogEntry[] = [];
    const log = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });

    log.child({ component: 'scanner' }).child({ root: '/repo' }).debug('Scan complete', { files: 2 });

    expect(entries[0].context).toEqual({ component: 'scanner', root: '/repo', files: 2 });
  });

  it('should change level when reconfigured', () => {
    const entries: LogEntry[] = [];
    const log = new Logger({ level: 'silent', output: (entry) => entries.push(entry) });

    log.error('hidden');
    log.configure({ level: 'error' });
    log.error('shown');

    expect(entries.map((entry) => entry.message)).toEqual(['shown']);
  });
});

describe('paths', () => {
  it('should normalize separators and leading dots', () => {
    expect(normalizePath('./src/app.ts')).toBe('src/app.ts');
    expect(normalizePath('src\\lib\\util.py')).toBe('src/lib/util.py');
  });

  it('should refuse to climb above the root', () => {
    expect(joinRelative('src/a', '../b', './c.ts')).toBe('src/b/c.ts');
    expect(joinRelative('src', '../../x')).toBeNull();
  });

  it('should split stems and extensions', () => {
    expect(stemOf('src/main.test.ts')).toBe('main.test');
    expect(stemOf('.gitignore')).toBe('.gitignore');
    expect(getExtension('lib/Util.PY')).toBe('.py');
    expect(getExtension('Makefile')).toBe('');
  });

  it('should match gitignore-style patterns', () => {
    expect(isIgnored('build/out.js', ['build/'])).toBe(true);
    expect(isIgnored('src/build.ts', ['build/'])).toBe(false);
    expect(isIgnored('anything', [])).toBe(false);
  });
});

describe('strings', () => {
  it('should pluralize counts', () => {
    expect(pluralize(1, 'file')).toBe('1 file');
    expect(pluralize(0, 'file')).toBe('0 files');
    expect(pluralize(2, 'hop')).toBe('2 hops');
  });

  it('should truncate with a suffix', () => {
    expect(truncate('Hello World', 8)).toBe('Hello...');
    expect(truncate('short', 8)).toBe('short');
  });
});

describe('fingerprint', () => {
  it('should hash bytes with sha-256', () => {
    expect(fingerprint(new Uint8Array())).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(fingerprint('abc')).toBe(fingerprint(new TextEncoder().encode('abc')));
  });
});
