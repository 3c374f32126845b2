/**
 * navindex - In-memory Sources
 * @module sources/memory-sources
 *
 * Builds indexer input from strings, for editors, tests and callers that
 * already hold file contents.
 */

import type { SourceInput } from '../types/index.js';
import { normalizePath } from '../utils/paths.js';

const encoder = new TextEncoder();

/**
 * Usage:
 * ```typescript
 * const sources = createMemorySources({
 *   'main.py': 'import lib\n',
 *   'lib.py': 'def helper():\n    pass\n',
 * });
 * const { index } = await indexSources(sources);
 * ```
 */
export function createMemorySources(files: Record<string, string | Uint8Array>): SourceInput[] {
  return Object.entries(files)
    .map(([filePath, content]) => {
      const bytes = typeof content === 'string' ? encoder.encode(content) : content;
      return { path: normalizePath(filePath), content: bytes, size: bytes.byteLength };
    })
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
