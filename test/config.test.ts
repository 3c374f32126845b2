/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

import {
  DEFAULT_CONFIG,
  generateDefaultConfig,
  loadConfig,
  mergeConfig,
  normalizeExtensions,
  readConfigSource,
  validateUserConfig,
} from '../src/config';
import { ConfigError } from '../src/utils/errors';

describe('config', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'navindex-config-'));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should return the defaults without a config file', async () => {
      expect(await loadConfig(testDir)).toEqual(DEFAULT_CONFIG);
    });

    it('should merge a config file over the defaults', async () => {
      fs.writeFileSync(
        path.join(testDir, '.navindexrc.json'),
        JSON.stringify({ scan: { maxFiles: 50, filterExtensions: ['PY'] }, output: { format: 'compact' } })
      );

      const config = await loadConfig(testDir);

      expect(config.scan.maxFiles).toBe(50);
      expect(config.scan.filterExtensions).toEqual(['.py']);
      expect(config.scan.maxFileSize).toBe(DEFAULT_CONFIG.scan.maxFileSize);
      expect(config.output.format).toBe('compact');
      expect(config.output.maxTokens).toBe(6000);
    });

    it('should read the navindex key of package.json', async () => {
      fs.writeFileSync(
        path.join(testDir, 'package.json'),
        JSON.stringify({ name: 'demo', navindex: { navigation: { hopLimit: 5 } } })
      );

      const source = await readConfigSource(testDir);
      expect(source.path).toBe(path.join(testDir, 'package.json'));
      expect((await loadConfig(testDir)).navigation.hopLimit).toBe(5);
    });

    it('should prefer a dedicated file over package.json', async () => {
      fs.writeFileSync(path.join(testDir, 'package.json'), JSON.stringify({ navindex: { ignore: ['a/'] } }));
      fs.writeFileSync(path.join(testDir, '.navindexrc'), JSON.stringify({ ignore: ['b/'] }));

      expect((await loadConfig(testDir)).ignore).toEqual(['b/']);
    });

    it('should reject invalid values with every problem listed', async () => {
      fs.writeFileSync(
        path.join(testDir, '.navindexrc.json'),
        JSON.stringify({ scan: { maxFiles: 'many' }, navigation: { hopLimit: 0 } })
      );

      const failure = loadConfig(testDir);
      await expect(failure).rejects.toBeInstanceOf(ConfigError);
      await expect(failure).rejects.toMatchObject({
        code: 'CONFIG_INVALID',
        errors: ['scan.maxFiles must be a number', 'navigation.hopLimit must be an integer of at least 1'],
        message:
          'Invalid configuration in .navindexrc.json: scan.maxFiles must be a number; ' +
          'navigation.hopLimit must be an integer of at least 1',
      });
    });

    it('should reject unreadable JSON', async () => {
      fs.writeFileSync(path.join(testDir, '.navindexrc.json'), '{ not json');
      await expect(loadConfig(testDir)).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('validateUserConfig', () => {
    it('should require an object', () => {
      expect(validateUserConfig('nope')).toEqual({ valid: false, errors: ['configuration must be an object'] });
    });

    it('should report fields of the wrong type', () => {
      const { errors } = validateUserConfig({
        scan: 5,
        concurrency: { maxWorkers: 'x' },
        logging: { level: 'loud' },
      });

      expect(errors).toEqual([
        'scan must be an object',
        'concurrency.maxWorkers must be a number or null',
        'logging.level must be a log level (debug, info, warn, error, silent)',
      ]);
    });

    it('should accept null workers', () => {
      expect(validateUserConfig({ concurrency: { maxWorkers: null } }).valid).toBe(true);
    });

    it('should accept the generated starter file', () => {
      expect(validateUserConfig(JSON.parse(generateDefaultConfig('json')))).toEqual({ valid: true, errors: [] });
    });

    it('should enforce a minimum compact budget', () => {
      expect(validateUserConfig({ output: { maxTokens: 10 } }).errors).toEqual([
        'output.maxTokens must be an integer of at least 100',
      ]);
    });
  });

  describe('mergeConfig', () => {
    it('should append ignore patterns to the defaults', () => {
      expect(mergeConfig({ ignore: ['fixtures/'] }).ignore).toEqual(['fixtures/']);
    });

    it('should keep unspecified sections at their defaults', () => {
      const config = mergeConfig({ cache: { enabled: false } });
      expect(config.cache).toEqual({ ...DEFAULT_CONFIG.cache, enabled: false });
      expect(config.entryPoints).toEqual(DEFAULT_CONFIG.entryPoints);
    });
  });

  describe('normalizeExtensions', () => {
    it('should add dots, lowercase and de-duplicate', () => {
      expect(normalizeExtensions(['py', '.TS', '', '.', 'py'])).toEqual(['.py', '.ts']);
    });
  });
});
