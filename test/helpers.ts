/**
 * Shared fixtures for tests
 */

import type { FileLanguage, FileRecord, ImportEdge } from '../src/types/index';

export function makeRecord(path: string, language: FileLanguage, imports: string[] = []): FileRecord {
  return {
    path,
    language,
    size: 0,
    lineCount: 1,
    fingerprint: `fp-${path}`,
    imports,
    functions: [],
    classes: [],
    parseStatus: language === 'unknown' ? 'skipped' : 'parsed',
  };
}

/**
 * Resolved edges from `[source, target]` pairs, tokens named after targets
 */
export function makeEdges(pairs: Array<[string, string]>): ImportEdge[] {
  return pairs.map(([source, target]) => ({ source, token: target, target, confidence: 'exact' }));
}
