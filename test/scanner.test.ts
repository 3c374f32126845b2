/**
 * Tests for the filesystem scanner and in-memory sources
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

import { createMemorySources, readIgnoreFiles, scanDirectory } from '../src/sources/index';
import { FileSystemError } from '../src/utils/errors';
import { Logger, type LogEntry } from '../src/utils/logger';

function write(root: string, relativePath: string, content: string): void {
  const file = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
}

describe('scanDirectory', () => {
  let testDir: string;
  const silent = new Logger({ level: 'silent' });

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'navindex-scan-'));
    write(testDir, '.gitignore', 'generated/\n# comment\n');
    write(testDir, 'README.md', '# demo\n');
    write(testDir, 'src/app.ts', 'export const a = 1;\n');
    write(testDir, 'src/big.ts', `export const data = '${'x'.repeat(100)}';\n`);
    write(testDir, 'generated/out.ts', 'export {};\n');
    write(testDir, 'dist/bundle.js', 'console.log(1);\n');
    write(testDir, 'lib.pyc', 'compiled');
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  const paths = async (options: Parameters<typeof scanDirectory>[1] = {}): Promise<string[]> =>
    (await scanDirectory(testDir, { maxFileSize: 50, logger: silent, ...options })).map((source) => source.path);

  it('should apply default exclusions, ignore files and the size limit', async () => {
    expect(await paths()).toEqual(['.gitignore', 'README.md', 'src/app.ts']);
  });

  it('should read file contents and sizes', async () => {
    const sources = await scanDirectory(testDir, { maxFileSize: 50, logger: silent });
    const app = sources.find((source) => source.path === 'src/app.ts');

    expect(app?.size).toBe(20);
    expect(new TextDecoder().decode(app?.content)).toBe('export const a = 1;\n');
  });

  it('should keep only the requested extensions', async () => {
    expect(await paths({ filterExtensions: ['.ts'] })).toEqual(['src/app.ts']);
  });

  it('should add extra ignore patterns', async () => {
    expect(await paths({ ignore: ['src/'] })).toEqual(['.gitignore', 'README.md']);
  });

  it('should skip ignore files when asked', async () => {
    expect(await paths({ useIgnoreFiles: false })).toEqual([
      '.gitignore',
      'README.md',
      'generated/out.ts',
      'src/app.ts',
    ]);
  });

  it('should stop at the file limit with a warning', async () => {
    const entries: LogEntry[] = [];
    const log = new Logger({ level: 'warn', output: (entry) => entries.push(entry) });

    const sources = await scanDirectory(testDir, { maxFiles: 1, maxFileSize: 50, logger: log });

    expect(sources.map((source) => source.path)).toEqual(['.gitignore']);
    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe('File limit reached, remaining files skipped');
    expect(entries[0].context).toEqual({ component: 'scanner', maxFiles: 1, skipped: 3 });
  });

  it('should reject a missing root', async () => {
    await expect(scanDirectory(path.join(testDir, 'missing'))).rejects.toBeInstanceOf(FileSystemError);
  });

  it('should reject a file as root', async () => {
    await expect(scanDirectory(path.join(testDir, 'README.md'))).rejects.toThrow('Not a directory');
  });

  it('should list root ignore file patterns without comments', () => {
    expect(readIgnoreFiles(testDir)).toEqual(['generated/']);
  });
});

describe('createMemorySources', () => {
  it('should encode strings and sort by normalized path', () => {
    const sources = createMemorySources({ './b.py': 'x', 'a.py': 'é' });

    expect(sources.map((source) => source.path)).toEqual(['a.py', 'b.py']);
    expect(sources[0].size).toBe(2);
  });
});
