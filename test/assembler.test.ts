/**
 * Tests for the Index Assembler
 */

import { describe, it, expect } from 'vitest';
import { assembleIndex, validateIndex, INDEX_SCHEMA_VERSION } from '../src/core/index';
import type { AssemblyInput } from '../src/core/index';
import { IndexError } from '../src/utils/errors';
import { makeRecord } from './helpers';

function input(overrides: Partial<AssemblyInput> = {}): AssemblyInput {
  return {
    root: 'demo',
    files: [makeRecord('b.py', 'python', ['z', 'a']), makeRecord('a.py', 'python'), makeRecord('notes.txt', 'unknown')],
    edges: [
      { source: 'b.py', token: 'a', target: 'a.py', confidence: 'heuristic' },
      { source: 'b.py', token: 'z', confidence: 'unresolved' },
    ],
    entryPoints: [],
    paths: [],
    cycles: [],
    warnings: [
      { path: 'z.bin', message: 'binary content' },
      { path: 'c.py', message: 'parse failed' },
    ],
    cancelled: false,
    ...overrides,
  };
}

describe('assembleIndex', () => {
  it('should sort files by path', () => {
    const index = assembleIndex(input());
    expect(index.files.map((file) => file.path)).toEqual(['a.py', 'b.py', 'notes.txt']);
    expect(index.version).toBe(INDEX_SCHEMA_VERSION);
    expect(index.root).toBe('demo');
  });

  it('should order edges by source, then by import position', () => {
    const index = assembleIndex(input());
    expect(index.edges.map((edge) => edge.token)).toEqual(['z', 'a']);
  });

  it('should order warnings by path', () => {
    const index = assembleIndex(input());
    expect(index.diagnostics.warnings.map((warning) => warning.path)).toEqual(['c.py', 'z.bin']);
  });

  it('should derive diagnostics', () => {
    const index = assembleIndex(input({ cancelled: true }));
    const { warnings, ...counts } = index.diagnostics;

    expect(counts).toEqual({
      totalFiles: 3,
      parsedFiles: 2,
      skippedFiles: 1,
      failedFiles: 0,
      resolvedEdges: 1,
      unresolvedEdges: 1,
      languages: { python: 2, unknown: 1 },
      cancelled: true,
    });
    expect(warnings).toHaveLength(2);
  });

  it('should freeze the whole index', () => {
    const index = assembleIndex(input());

    expect(Object.isFrozen(index)).toBe(true);
    expect(Object.isFrozen(index.files[0])).toBe(true);
    expect(Object.isFrozen(index.files[0].imports)).toBe(true);
    expect(() => index.files.push(makeRecord('x.py', 'python'))).toThrow(TypeError);
  });

  it('should leave its input untouched', () => {
    const source = input();
    assembleIndex(source);
    expect(source.files.map((file) => file.path)).toEqual(['b.py', 'a.py', 'notes.txt']);
    expect(Object.isFrozen(source.files)).toBe(false);
  });

  it('should reject edges to files outside the index', () => {
    const broken = input({
      edges: [{ source: 'a.py', token: 'ghost', target: 'ghost.py', confidence: 'exact' }],
    });

    expect(() => assembleIndex(broken)).toThrow(IndexError);
    try {
      assembleIndex(broken);
    } catch (error) {
      expect(error).toBeInstanceOf(IndexError);
      if (error instanceof IndexError) {
        expect(error.violations).toEqual(['edge target is not a file record: ghost.py']);
        expect(error.message).toBe('Index violates 1 invariant: edge target is not a file record: ghost.py');
        expect(error.code).toBe('INVARIANT_VIOLATION');
      }
    }
  });
});

describe('validateIndex', () => {
  it('should report every violated invariant', () => {
    const index = assembleIndex(input());
    const violations = validateIndex({
      ...index,
      files: [...index.files, makeRecord('a.py', 'python')],
      edges: [
        { source: 'b.py', token: 'a', target: 'a.py', confidence: 'unresolved' },
        { source: 'b.py', token: 'z', confidence: 'exact' },
      ],
      entryPoints: [{ path: 'main.py', reason: 'filename-pattern', justification: 'name' }],
      cycles: [['gone.py']],
    });

    expect(violations).toEqual([
      'duplicate file record: a.py',
      "edge b.py -> 'a' has a target but is unresolved",
      "edge b.py -> 'z' has no target but confidence exact",
      'entry point is not a file record: main.py',
      'cycle member is not a file record: gone.py',
    ]);
  });

  it('should accept a consistent index', () => {
    expect(validateIndex(assembleIndex(input()))).toEqual([]);
  });
});
