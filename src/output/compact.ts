/**
 * navindex - Compact Encoder
 * @module output/compact
 *
 * One dense text block sized for a prompt. File lines are added in index
 * order until the token budget is spent.
 */

import type { FileRecord, NavigationIndex } from '../types/index.js';
import { estimateTokens } from '../utils/strings.js';

export interface CompactEncodeOptions {
  /** Approximate token budget (default: 6000) */
  maxTokens?: number;
}

/**
 * @example
 * ```text
 * # app: 2 files, 1 resolved / 0 unresolved imports
 * entry: main.py
 * path: main.py > lib.py
 * lib.py (python, 2L) | fn: helper()
 * main.py (python, 1L) -> lib.py
 * ```
 */
export function encodeCompact(index: NavigationIndex, options: CompactEncodeOptions = {}): string {
  const maxTokens = options.maxTokens ?? 6000;
  const { diagnostics } = index;
  const header: string[] = [
    `# ${index.root}: ${diagnostics.totalFiles} files, ` +
      `${diagnostics.resolvedEdges} resolved / ${diagnostics.unresolvedEdges} unresolved imports`,
  ];

  const entries = [...new Set(index.entryPoints.map((candidate) => candidate.path))];
  if (entries.length > 0) header.push(`entry: ${entries.join(', ')}`);

  for (const navigationPath of index.paths) {
    header.push(
      navigationPath.kind === 'entry-to-hub'
        ? `path: ${navigationPath.files.join(' > ')}`
        : `cluster: ${navigationPath.files.join(', ')}`
    );
  }
  for (const cycle of index.cycles) {
    header.push(`cycle: ${cycle.join(', ')}`);
  }

  const targets = new Map<string, string[]>();
  for (const edge of index.edges) {
    if (edge.target === undefined) continue;
    const list = targets.get(edge.source) ?? [];
    if (!list.includes(edge.target)) list.push(edge.target);
    targets.set(edge.source, list);
  }

  const lines = [...header];
  let used = estimateTokens(header.join('\n'));
  let written = 0;

  for (const file of index.files) {
    const line = fileLine(file, targets.get(file.path) ?? []);
    const cost = estimateTokens(line) + 1;
    if (used + cost > maxTokens) break;
    lines.push(line);
    used += cost;
    written++;
  }

  const omitted = index.files.length - written;
  if (omitted > 0) lines.push(`... ${omitted} more files omitted`);

  return lines.join('\n');
}

function fileLine(file: FileRecord, targets: string[]): string {
  let line = `${file.path} (${file.language}, ${file.lineCount}L)`;
  if (targets.length > 0) line += ` -> ${targets.join(', ')}`;
  if (file.functions.length > 0) {
    const functions = file.functions.map(
      (fn) => `${fn.owner ? `${fn.owner}.` : ''}${fn.name}(${fn.params.join(', ')})`
    );
    line += ` | fn: ${functions.join(', ')}`;
  }
  if (file.classes.length > 0) {
    const classes = file.classes.map((cls) =>
      cls.bases.length > 0 ? `${cls.name}(${cls.bases.join(', ')})` : cls.name
    );
    line += ` | cls: ${classes.join(', ')}`;
  }
  if (file.parseStatus === 'failed') line += ' | failed';
  return line;
}
