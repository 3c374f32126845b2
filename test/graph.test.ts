/**
 * Tests for the file graph, entry points and navigation paths
 */

import { describe, it, expect } from 'vitest';
import {
  CycleDetector,
  FileGraph,
  inferEntryPoints,
  entryFiles,
  synthesizeNavigationPaths,
  ENTRY_PATH_LABEL,
  ISOLATED_COMPONENT_LABEL,
} from '../src/graph/index';
import { makeEdges, makeRecord } from './helpers';

describe('FileGraph', () => {
  const records = ['a.ts', 'b.ts', 'c.ts', 'd.ts', 'e.ts'].map((path) => makeRecord(path, 'typescript'));
  const edges = [
    ...makeEdges([
      ['a.ts', 'b.ts'],
      ['a.ts', 'c.ts'],
      ['b.ts', 'c.ts'],
      ['c.ts', 'b.ts'],
      ['d.ts', 'e.ts'],
    ]),
    { source: 'a.ts', token: 'react', confidence: 'unresolved' as const },
  ];
  const graph = FileGraph.build(records, edges);

  it('should count degrees from resolved edges only', () => {
    expect(graph.inDegree('b.ts')).toBe(2);
    expect(graph.inDegree('a.ts')).toBe(0);
    expect(graph.outDegree('a.ts')).toBe(2);
    expect(graph.outDegree('e.ts')).toBe(0);
    expect(graph.unresolvedCount('a.ts')).toBe(1);
  });

  it('should balance in-degrees against out-degrees', () => {
    let totalIn = 0;
    let totalOut = 0;
    for (const degree of graph.degreeMap().values()) {
      totalIn += degree.in;
      totalOut += degree.out;
    }
    expect(totalIn).toBe(5);
    expect(totalOut).toBe(5);
  });

  it('should report edge statistics', () => {
    expect(graph.stats()).toEqual({ files: 5, edges: 6, resolvedEdges: 5, unresolvedEdges: 1 });
  });

  it('should list neighbors in lexical order', () => {
    expect(graph.successors('a.ts')).toEqual(['b.ts', 'c.ts']);
    expect(graph.predecessors('c.ts')).toEqual(['a.ts', 'b.ts']);
    expect(graph.predecessors('a.ts')).toEqual([]);
  });

  it('should keep edges to unknown files out of the degrees', () => {
    const partial = FileGraph.build([makeRecord('a.ts', 'typescript')], makeEdges([['a.ts', 'ghost.ts']]));
    expect(partial.edges()).toHaveLength(1);
    expect(partial.inDegree('ghost.ts')).toBe(0);
    expect(partial.has('ghost.ts')).toBe(false);
  });

  it('should group weakly connected components', () => {
    expect(graph.weaklyConnectedComponents()).toEqual([
      ['a.ts', 'b.ts', 'c.ts'],
      ['d.ts', 'e.ts'],
    ]);
  });

  it('should keep unconnected files as singleton components', () => {
    const lonely = FileGraph.build([makeRecord('z.ts', 'typescript'), makeRecord('y.ts', 'typescript')], []);
    expect(lonely.weaklyConnectedComponents()).toEqual([['y.ts'], ['z.ts']]);
  });

  it('should find import cycles', () => {
    expect(graph.findCycles()).toEqual([['b.ts', 'c.ts']]);
  });
});

describe('CycleDetector', () => {
  it('should report self-imports as cycles', () => {
    const detector = new CycleDetector(
      new Map([
        ['a', ['a']],
        ['b', []],
      ])
    );
    expect(detector.detectCycles()).toEqual([['a']]);
  });

  it('should order cycles by their first member', () => {
    const detector = new CycleDetector(
      new Map([
        ['x', ['y']],
        ['y', ['x']],
        ['c', ['a']],
        ['a', ['c']],
        ['m', []],
      ])
    );
    expect(detector.detectCycles()).toEqual([
      ['a', 'c'],
      ['x', 'y'],
    ]);
  });

  it('should report no cycles for an acyclic graph', () => {
    expect(new CycleDetector(new Map([['a', ['b']], ['b', []]])).detectCycles()).toEqual([]);
  });

  it('should separate a cycle from the chain that leads into it', () => {
    const detector = new CycleDetector(
      new Map([
        ['a', ['b']],
        ['b', ['c']],
        ['c', ['d']],
        ['d', ['b', 'e']],
        ['e', []],
      ])
    );
    expect(detector.detectCycles()).toEqual([['b', 'c', 'd']]);
  });

  it('should handle import chains deeper than the call stack', () => {
    const depth = 50_000;
    const name = (i: number): string => `n${String(i).padStart(5, '0')}`;
    const adjacency = new Map<string, string[]>();
    for (let i = 0; i < depth; i++) adjacency.set(name(i), i + 1 < depth ? [name(i + 1)] : [name(0)]);

    const cycles = new CycleDetector(adjacency).detectCycles();

    expect(cycles).toHaveLength(1);
    expect(cycles[0]).toHaveLength(depth);
    expect(cycles[0][0]).toBe('n00000');
  });
});

describe('inferEntryPoints', () => {
  it('should combine the file name and graph shape signals', () => {
    const graph = FileGraph.build(
      [makeRecord('main.py', 'python', ['lib']), makeRecord('lib.py', 'python')],
      makeEdges([['main.py', 'lib.py']])
    );

    expect(inferEntryPoints(graph)).toEqual([
      {
        path: 'main.py',
        reason: 'filename-pattern',
        justification: "file name 'main' is a conventional entry point",
      },
      {
        path: 'main.py',
        reason: 'graph-shape',
        justification: 'imported by no file, imports 1 file',
      },
    ]);
  });

  it('should rank by signal count, then out-degree, then path', () => {
    const graph = FileGraph.build(
      ['app.py', 'cli.py', 'run.py', 'tool.py', 'lib.py'].map((path) => makeRecord(path, 'python')),
      makeEdges([
        ['app.py', 'lib.py'],
        ['run.py', 'cli.py'],
        ['run.py', 'lib.py'],
        ['tool.py', 'lib.py'],
      ])
    );

    const candidates = inferEntryPoints(graph);
    expect(candidates.map((candidate) => [candidate.path, candidate.reason])).toEqual([
      ['app.py', 'filename-pattern'],
      ['app.py', 'graph-shape'],
      ['run.py', 'graph-shape'],
      ['tool.py', 'graph-shape'],
      ['cli.py', 'filename-pattern'],
    ]);
    expect(candidates[2].justification).toBe('imported by no file, imports 2 files');
    expect(entryFiles(candidates)).toEqual(['app.py', 'run.py', 'tool.py', 'cli.py']);
  });

  it('should accept package-root names only in package roots', () => {
    const graph = FileGraph.build(
      [makeRecord('src/index.ts', 'typescript'), makeRecord('tools/deep/main.go', 'go')],
      []
    );

    expect(inferEntryPoints(graph).map((candidate) => candidate.path)).toEqual(['tools/deep/main.go']);
    expect(
      inferEntryPoints(graph, { isPackageRoot: (dir) => dir === 'src' }).map((candidate) => candidate.path)
    ).toEqual(['src/index.ts', 'tools/deep/main.go']);
  });

  it('should not propose isolated files by shape', () => {
    const graph = FileGraph.build([makeRecord('notes.py', 'python')], []);
    expect(inferEntryPoints(graph)).toEqual([]);
  });
});

describe('synthesizeNavigationPaths', () => {
  const records = ['main.py', 'a.py', 'b.py', 'hub.py', 'x.py', 'y.py'].map((path) => makeRecord(path, 'python'));
  const graph = FileGraph.build(
    records,
    makeEdges([
      ['main.py', 'a.py'],
      ['main.py', 'b.py'],
      ['a.py', 'hub.py'],
      ['b.py', 'hub.py'],
      ['x.py', 'y.py'],
      ['y.py', 'x.py'],
    ])
  );
  const entryPoints = inferEntryPoints(graph);

  it('should only pick main.py as an entry point', () => {
    expect(entryFiles(entryPoints)).toEqual(['main.py']);
  });

  it('should lead from the entry point to the most-imported file', () => {
    const paths = synthesizeNavigationPaths(graph, entryPoints);

    expect(paths[0]).toEqual({
      kind: 'entry-to-hub',
      label: ENTRY_PATH_LABEL,
      files: ['main.py', 'a.py', 'hub.py'],
      detail: 'main.py reaches hub.py (imported 2 times) in 2 hops',
    });
  });

  it('should add a path for clusters no entry point reaches', () => {
    const paths = synthesizeNavigationPaths(graph, entryPoints);

    expect(paths).toHaveLength(2);
    expect(paths[1]).toEqual({
      kind: 'isolated-component',
      label: ISOLATED_COMPONENT_LABEL,
      files: ['x.py', 'y.py'],
      detail: '2 connected files not reached from any entry point',
    });
  });

  it('should stop the walk at the hop limit', () => {
    const [first] = synthesizeNavigationPaths(graph, entryPoints, { hopLimit: 1 });

    expect(first.files).toEqual(['main.py', 'a.py']);
    expect(first.detail).toBe('main.py reaches a.py (imported 1 time) in 1 hop');
  });

  it('should cap the members listed for a cluster', () => {
    const paths = synthesizeNavigationPaths(graph, entryPoints, { clusterMemberCap: 1 });

    expect(paths[1].files).toEqual(['x.py']);
    expect(paths[1].detail).toBe('2 connected files not reached from any entry point (1 more not listed)');
  });

  it('should skip entry paths when none are requested', () => {
    const paths = synthesizeNavigationPaths(graph, entryPoints, { maxEntryPaths: 0 });
    expect(paths.map((path) => path.kind)).toEqual(['isolated-component']);
  });

  it('should produce no path from an entry point that imports nothing', () => {
    const single = FileGraph.build([makeRecord('main.py', 'python')], []);
    expect(synthesizeNavigationPaths(single, inferEntryPoints(single))).toEqual([]);
  });
});
