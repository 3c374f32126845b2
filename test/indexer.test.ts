/**
 * Tests for the Indexer module
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

import { indexSources, indexDirectory, indexProject } from '../src/indexer';
import { MemoryParseCache } from '../src/cache/index';
import { mergeConfig } from '../src/config';
import { createMemorySources } from '../src/sources/index';
import { Logger, type LogEntry } from '../src/utils/logger';

const silent = new Logger({ level: 'silent' });

const twoFiles = {
  'main.py': 'import lib\nimport requests\n',
  'lib.py': 'def helper():\n    pass\n',
};

describe('indexSources', () => {
  it('should index a small project end to end', async () => {
    const { index } = await indexSources(createMemorySources(twoFiles), { root: 'demo', logger: silent });

    expect(index.root).toBe('demo');
    expect(index.files.map((file) => file.path)).toEqual(['lib.py', 'main.py']);
    expect(index.files[0].functions).toEqual([{ name: 'helper', file: 'lib.py', line: 1, params: [] }]);
    expect(index.files[1].imports).toEqual(['lib', 'requests']);
    expect(index.edges).toEqual([
      { source: 'main.py', token: 'lib', target: 'lib.py', confidence: 'heuristic' },
      { source: 'main.py', token: 'requests', confidence: 'unresolved' },
    ]);
    expect(index.entryPoints.map((candidate) => candidate.reason)).toEqual(['filename-pattern', 'graph-shape']);
    expect(index.paths).toEqual([
      {
        kind: 'entry-to-hub',
        label: 'entry → most-referenced',
        files: ['main.py', 'lib.py'],
        detail: 'main.py reaches lib.py (imported 1 time) in 1 hop',
      },
    ]);
    expect(index.cycles).toEqual([]);
    expect(index.diagnostics.resolvedEdges).toBe(1);
    expect(index.diagnostics.unresolvedEdges).toBe(1);
  });

  it('should produce identical indexes for identical input', async () => {
    const first = await indexSources(createMemorySources(twoFiles), { logger: silent, maxWorkers: 1 });
    const second = await indexSources(createMemorySources(twoFiles), { logger: silent, maxWorkers: 4 });

    expect(JSON.stringify(second.index)).toBe(JSON.stringify(first.index));
  });

  it('should report a mutual import as a cycle and an isolated cluster', async () => {
    const { index } = await indexSources(
      createMemorySources({ 'a.py': 'import b\n', 'b.py': 'import a\n' }),
      { logger: silent }
    );

    expect(index.entryPoints).toEqual([]);
    expect(index.cycles).toEqual([['a.py', 'b.py']]);
    expect(index.paths).toEqual([
      {
        kind: 'isolated-component',
        label: 'isolated component',
        files: ['a.py', 'b.py'],
        detail: '2 connected files not reached from any entry point',
      },
    ]);
  });

  it('should degrade unparseable files instead of failing', async () => {
    const sources = createMemorySources({
      'data.py': new Uint8Array([0x70, 0x00, 0x71]),
      'notes.xyz': 'free text\n',
      'ok.py': 'x = 1\n',
    });

    const { index } = await indexSources(sources, { logger: silent });

    const byPath = new Map(index.files.map((file) => [file.path, file]));
    expect(byPath.get('data.py')?.parseStatus).toBe('failed');
    expect(byPath.get('data.py')?.lineCount).toBe(0);
    expect(byPath.get('notes.xyz')?.parseStatus).toBe('skipped');
    expect(byPath.get('notes.xyz')?.lineCount).toBe(1);
    expect(byPath.get('ok.py')?.parseStatus).toBe('parsed');
    expect(index.diagnostics.warnings).toEqual([
      { path: 'data.py', message: 'Binary content cannot be parsed as python' },
    ]);
    expect(index.diagnostics.failedFiles).toBe(1);
  });

  it('should ignore repeated paths after the first', async () => {
    const entries: LogEntry[] = [];
    const log = new Logger({ level: 'warn', output: (entry) => entries.push(entry) });
    const [source] = createMemorySources({ 'a.py': 'x = 1\n' });

    const { index } = await indexSources([source, { ...source }], { logger: log });

    expect(index.files).toHaveLength(1);
    expect(entries.map((entry) => entry.message)).toEqual(['Duplicate input path ignored']);
    expect(index.diagnostics.warnings).toEqual([{ path: 'a.py', message: 'Duplicate input path ignored' }]);
  });

  it('should build an index from completed files when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const { index } = await indexSources(createMemorySources(twoFiles), {
      logger: silent,
      signal: controller.signal,
    });

    expect(index.diagnostics.cancelled).toBe(true);
    expect(index.files).toEqual([]);
  });

  it('should stop parsing when aborted while files are in flight', async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 50; i++) {
      files[`mod${String(i).padStart(2, '0')}.py`] = `def fn${i}():\n    pass\n`;
    }
    const controller = new AbortController();
    // Abort from the event loop a few turns after parsing starts
    let turns = 0;
    const tick = (): void => {
      if (++turns === 5) controller.abort();
      else setImmediate(tick);
    };
    setImmediate(tick);

    const { index } = await indexSources(createMemorySources(files), {
      logger: silent,
      maxWorkers: 1,
      signal: controller.signal,
    });

    expect(index.diagnostics.cancelled).toBe(true);
    expect(index.files.length).toBeGreaterThan(0);
    expect(index.files.length).toBeLessThan(50);
    expect(index.diagnostics.totalFiles).toBe(index.files.length);
  });

  it('should serve unchanged files from a shared cache', async () => {
    const cache = new MemoryParseCache();

    const first = await indexSources(createMemorySources(twoFiles), { cache, logger: silent });
    const second = await indexSources(createMemorySources(twoFiles), { cache, logger: silent });

    expect(first.report.cachedFiles).toBe(0);
    expect(second.report.cachedFiles).toBe(2);
    expect(second.index).toEqual(first.index);
  });

  it('should parse again only the file whose content changed', async () => {
    const cache = new MemoryParseCache();
    const files = { ...twoFiles, 'app.py': 'import lib\n' };

    await indexSources(createMemorySources(files), { cache, logger: silent });
    const { index, report } = await indexSources(
      createMemorySources({ ...files, 'lib.py': 'def helpex():\n    pass\n' }),
      { cache, logger: silent }
    );

    expect(report.cachedFiles).toBe(2);
    const lib = index.files.find((file) => file.path === 'lib.py');
    expect(lib?.functions.map((fn) => fn.name)).toEqual(['helpex']);
  });

  it('should time every phase', async () => {
    const { report } = await indexSources(createMemorySources(twoFiles), { logger: silent });
    expect(Object.keys(report.phases)).toEqual(['parse', 'resolve', 'graph', 'entryPoints', 'navigation', 'cycles', 'assemble']);
    expect(Number.isNaN(Date.parse(report.startedAt))).toBe(false);
  });
});

describe('indexDirectory', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'navindex-test-'));
    fs.writeFileSync(path.join(testDir, 'main.py'), twoFiles['main.py']);
    fs.writeFileSync(path.join(testDir, 'lib.py'), twoFiles['lib.py']);
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should index the files under a directory', async () => {
    fs.mkdirSync(path.join(testDir, 'node_modules', 'dep'), { recursive: true });
    fs.writeFileSync(path.join(testDir, 'node_modules', 'dep', 'index.js'), 'module.exports = 1;\n');

    const { index } = await indexDirectory(testDir, { logger: silent });

    expect(index.root).toBe(path.basename(testDir));
    expect(index.files.map((file) => file.path)).toEqual(['lib.py', 'main.py']);
    expect(index.edges[0].target).toBe('lib.py');
  });

  it('should reuse the persistent cache on a second project run', async () => {
    const config = mergeConfig({ concurrency: { maxWorkers: 2 } });

    const first = await indexProject(testDir, config, { logger: silent });
    const second = await indexProject(testDir, config, { logger: silent });

    expect(fs.existsSync(path.join(testDir, '.navindex', 'parse-cache.json.gz'))).toBe(true);
    expect(first.report.cachedFiles).toBe(0);
    expect(second.report.cachedFiles).toBe(2);
    expect(second.index.files.map((file) => file.path)).toEqual(['lib.py', 'main.py']);
  });

  it('should not write a cache when caching is disabled', async () => {
    const config = mergeConfig({ cache: { enabled: false } });

    await indexProject(testDir, config, { logger: silent });

    expect(fs.existsSync(path.join(testDir, '.navindex'))).toBe(false);
  });
});
