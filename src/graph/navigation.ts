/**
 * navindex - Navigation Path Synthesis
 *
 * Suggested reading orders through the import graph: from each strong
 * entry point to the most-referenced file it reaches, and one path per
 * connected cluster that no entry point leads into.
 *
 * @module graph/navigation
 */

import type { EntryPointCandidate, NavigationPath } from '../types/index.js';
import { entryFiles } from './entry-points.js';
import type { FileGraph } from './file-graph.js';

export interface NavigationOptions {
  /** Entry files to start paths from */
  maxEntryPaths?: number;
  /** Forward traversal depth limit */
  hopLimit?: number;
  /** Members listed per isolated component */
  clusterMemberCap?: number;
}

export const DEFAULT_NAVIGATION_OPTIONS: Required<NavigationOptions> = {
  maxEntryPaths: 5,
  hopLimit: 3,
  clusterMemberCap: 10,
};

export const ENTRY_PATH_LABEL = 'entry → most-referenced';
export const ISOLATED_COMPONENT_LABEL = 'isolated component';

export function synthesizeNavigationPaths(
  graph: FileGraph,
  entryPoints: readonly EntryPointCandidate[],
  options: NavigationOptions = {}
): NavigationPath[] {
  const { maxEntryPaths, hopLimit, clusterMemberCap } = { ...DEFAULT_NAVIGATION_OPTIONS, ...options };
  const paths: NavigationPath[] = [];

  const entries = entryFiles(entryPoints).filter((path) => graph.has(path));
  const connectivity = (path: string): number => graph.inDegree(path) + graph.outDegree(path);
  const ranked = [...entries].sort(
    (a, b) => connectivity(b) - connectivity(a) || (a < b ? -1 : a > b ? 1 : 0)
  );

  for (const entry of ranked.slice(0, Math.max(0, maxEntryPaths))) {
    const path = pathToHub(graph, entry, hopLimit);
    if (path) paths.push(path);
  }

  const entrySet = new Set(entries);
  const isolated = graph
    .weaklyConnectedComponents()
    .filter((component) => component.length >= 2 && !component.some((path) => entrySet.has(path)))
    .sort((a, b) => b.length - a.length || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));

  for (const component of isolated) {
    const files = component.slice(0, Math.max(0, clusterMemberCap));
    const hidden = component.length - files.length;
    paths.push({
      kind: 'isolated-component',
      label: ISOLATED_COMPONENT_LABEL,
      files,
      detail:
        `${component.length} connected files not reached from any entry point` +
        (hidden > 0 ? ` (${hidden} more not listed)` : ''),
    });
  }

  return paths;
}

/**
 * Breadth-first forward walk from `entry`; the path ends at the reached
 * file with the highest in-degree (ties: fewer hops, then lexical).
 */
function pathToHub(graph: FileGraph, entry: string, hopLimit: number): NavigationPath | undefined {
  const hops = new Map<string, number>([[entry, 0]]);
  const parent = new Map<string, string>();
  const queue: string[] = [entry];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    const depth = hops.get(current) ?? 0;
    if (depth >= hopLimit) continue;
    for (const next of graph.successors(current)) {
      if (hops.has(next)) continue;
      hops.set(next, depth + 1);
      parent.set(next, current);
      queue.push(next);
    }
  }

  let best: string | undefined;
  for (const [file, distance] of hops) {
    if (file === entry) continue;
    if (best === undefined) {
      best = file;
      continue;
    }
    const byDegree = graph.inDegree(file) - graph.inDegree(best);
    const byHops = (hops.get(best) ?? 0) - distance;
    if (byDegree > 0 || (byDegree === 0 && (byHops > 0 || (byHops === 0 && file < best)))) {
      best = file;
    }
  }
  if (best === undefined) return undefined;

  const files: string[] = [];
  for (let node: string | undefined = best; node !== undefined; node = parent.get(node)) {
    files.unshift(node);
  }

  const referenced = graph.inDegree(best);
  const distance = files.length - 1;
  return {
    kind: 'entry-to-hub',
    label: ENTRY_PATH_LABEL,
    files,
    detail: `${entry} reaches ${best} (imported ${referenced} ${referenced === 1 ? 'time' : 'times'}) in ${distance} ${distance === 1 ? 'hop' : 'hops'}`,
  };
}
