/**
 * navindex - Entry-Point Inference
 *
 * Two independent signals propose entry points: a conventional file name,
 * and a graph shape (imported by nobody, importing something).
 *
 * @module graph/entry-points
 */

import type { EntryPointCandidate } from '../types/index.js';
import { dirnameOf, stemOf } from '../utils/paths.js';
import type { FileGraph } from './file-graph.js';

export interface EntryPointOptions {
  /** File stems that mark an entry point */
  names?: string[];
  /** Minimum resolved out-degree for the graph-shape signal */
  minOutDegree?: number;
  /** Directories where the non-`main` names count */
  isPackageRoot?: (dir: string) => boolean;
}

export const DEFAULT_ENTRY_POINT_NAMES = ['main', '__main__', 'cli', 'index', 'app'];

/** Names that mark an entry point in any directory */
const ANYWHERE_NAMES = new Set(['main', '__main__']);

/**
 * Candidate entry points, strongest first.
 */
export function inferEntryPoints(graph: FileGraph, options: EntryPointOptions = {}): EntryPointCandidate[] {
  const names = new Set(options.names ?? DEFAULT_ENTRY_POINT_NAMES);
  const minOutDegree = options.minOutDegree ?? 1;
  const isPackageRoot = options.isPackageRoot ?? ((dir: string) => dir === '');

  interface Scored {
    path: string;
    candidates: EntryPointCandidate[];
    outDegree: number;
  }
  const scored: Scored[] = [];

  for (const path of graph.paths()) {
    const candidates: EntryPointCandidate[] = [];
    const stem = stemOf(path);

    if (names.has(stem) && (ANYWHERE_NAMES.has(stem) || isPackageRoot(dirnameOf(path)))) {
      candidates.push({
        path,
        reason: 'filename-pattern',
        justification: `file name '${stem}' is a conventional entry point`,
      });
    }

    const outDegree = graph.outDegree(path);
    if (graph.inDegree(path) === 0 && outDegree >= minOutDegree) {
      candidates.push({
        path,
        reason: 'graph-shape',
        justification: `imported by no file, imports ${outDegree} ${outDegree === 1 ? 'file' : 'files'}`,
      });
    }

    if (candidates.length > 0) scored.push({ path, candidates, outDegree });
  }

  scored.sort(
    (a, b) =>
      b.candidates.length - a.candidates.length ||
      b.outDegree - a.outDegree ||
      (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)
  );

  return scored.flatMap((entry) => entry.candidates);
}

/**
 * Distinct entry files in candidate order
 */
export function entryFiles(candidates: readonly EntryPointCandidate[]): string[] {
  return [...new Set(candidates.map((candidate) => candidate.path))];
}
