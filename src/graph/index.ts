/**
 * navindex - Graph Module
 *
 * File-level import graph, entry-point inference and navigation paths.
 *
 * @module graph
 */

export { FileGraph, type Degree, type GraphStats } from './file-graph.js';

export { CycleDetector, type Adjacency } from './cycle-detector.js';

export {
  inferEntryPoints,
  entryFiles,
  DEFAULT_ENTRY_POINT_NAMES,
  type EntryPointOptions,
} from './entry-points.js';

export {
  synthesizeNavigationPaths,
  DEFAULT_NAVIGATION_OPTIONS,
  ENTRY_PATH_LABEL,
  ISOLATED_COMPONENT_LABEL,
  type NavigationOptions,
} from './navigation.js';
