/**
 * navindex - Index Assembler
 * @module core/assembler
 *
 * Final phase of a run: orders every collection deterministically, derives
 * the aggregate diagnostics, checks the structural invariants and freezes
 * the result.
 */

import type {
  EntryPointCandidate,
  FileRecord,
  ImportEdge,
  IndexDiagnostics,
  IndexWarning,
  NavigationIndex,
  NavigationPath,
} from '../types/index.js';
import { IndexError } from '../utils/errors.js';

/** Version of the serialized index layout */
export const INDEX_SCHEMA_VERSION = '1.0';

export interface AssemblyInput {
  root: string;
  files: readonly FileRecord[];
  edges: readonly ImportEdge[];
  entryPoints: readonly EntryPointCandidate[];
  paths: readonly NavigationPath[];
  cycles: readonly string[][];
  warnings: readonly IndexWarning[];
  cancelled: boolean;
}

// =============================================================================
// Assembly
// =============================================================================

/**
 * @throws IndexError with every violated invariant
 */
export function assembleIndex(input: AssemblyInput): NavigationIndex {
  const files = [...input.files].sort((a, b) => compare(a.path, b.path));
  const edges = sortEdges(files, input.edges);
  const warnings = [...input.warnings].sort(
    (a, b) => compare(a.path, b.path) || compare(a.message, b.message)
  );

  const index: NavigationIndex = {
    version: INDEX_SCHEMA_VERSION,
    root: input.root,
    files,
    edges,
    entryPoints: [...input.entryPoints],
    paths: [...input.paths],
    cycles: input.cycles.map((cycle) => [...cycle]),
    diagnostics: computeDiagnostics(files, edges, warnings, input.cancelled),
  };

  const violations = validateIndex(index);
  if (violations.length > 0) {
    throw new IndexError(
      `Index violates ${violations.length} invariant${violations.length === 1 ? '' : 's'}: ${violations[0]}`,
      violations
    );
  }

  return deepFreeze(index);
}

/**
 * Structural invariants of an index, one message per violation.
 */
export function validateIndex(index: NavigationIndex): string[] {
  const violations: string[] = [];
  const known = new Set<string>();

  for (const file of index.files) {
    if (known.has(file.path)) violations.push(`duplicate file record: ${file.path}`);
    known.add(file.path);
  }

  for (const edge of index.edges) {
    if (!known.has(edge.source)) {
      violations.push(`edge source is not a file record: ${edge.source}`);
    }
    if (edge.target === undefined) {
      if (edge.confidence !== 'unresolved') {
        violations.push(`edge ${edge.source} -> '${edge.token}' has no target but confidence ${edge.confidence}`);
      }
    } else {
      if (edge.confidence === 'unresolved') {
        violations.push(`edge ${edge.source} -> '${edge.token}' has a target but is unresolved`);
      }
      if (!known.has(edge.target)) {
        violations.push(`edge target is not a file record: ${edge.target}`);
      }
    }
  }

  for (const candidate of index.entryPoints) {
    if (!known.has(candidate.path)) {
      violations.push(`entry point is not a file record: ${candidate.path}`);
    }
  }

  for (const path of index.paths) {
    for (const file of path.files) {
      if (!known.has(file)) violations.push(`navigation path file is not a file record: ${file}`);
    }
  }

  for (const cycle of index.cycles) {
    for (const file of cycle) {
      if (!known.has(file)) violations.push(`cycle member is not a file record: ${file}`);
    }
  }

  return violations;
}

// =============================================================================
// Helpers
// =============================================================================

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * By source path, then by the token's position in the source's imports.
 */
function sortEdges(files: readonly FileRecord[], edges: readonly ImportEdge[]): ImportEdge[] {
  const tokenOrder = new Map<string, Map<string, number>>();
  for (const file of files) {
    tokenOrder.set(file.path, new Map(file.imports.map((token, position) => [token, position])));
  }
  const position = (edge: ImportEdge): number =>
    tokenOrder.get(edge.source)?.get(edge.token) ?? Number.MAX_SAFE_INTEGER;

  return [...edges].sort(
    (a, b) => compare(a.source, b.source) || position(a) - position(b) || compare(a.token, b.token)
  );
}

function computeDiagnostics(
  files: readonly FileRecord[],
  edges: readonly ImportEdge[],
  warnings: IndexWarning[],
  cancelled: boolean
): IndexDiagnostics {
  const counts = { parsed: 0, skipped: 0, failed: 0 };
  const languageCounts = new Map<string, number>();
  for (const file of files) {
    counts[file.parseStatus]++;
    languageCounts.set(file.language, (languageCounts.get(file.language) ?? 0) + 1);
  }

  const languages: Record<string, number> = {};
  for (const language of [...languageCounts.keys()].sort()) {
    languages[language] = languageCounts.get(language) ?? 0;
  }

  const resolvedEdges = edges.filter((edge) => edge.target !== undefined).length;
  return {
    totalFiles: files.length,
    parsedFiles: counts.parsed,
    skippedFiles: counts.skipped,
    failedFiles: counts.failed,
    resolvedEdges,
    unresolvedEdges: edges.length - resolvedEdges,
    languages,
    cancelled,
    warnings,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
