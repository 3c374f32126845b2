/**
 * navindex - Declaration Snippets
 * @module output/snippets
 *
 * Snippets need nothing beyond the 1-based lines stored in the index and
 * the file contents as scanned.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { NavigationIndex } from '../types/index.js';
import { extractSnippet, type Snippet } from '../utils/strings.js';

/**
 * Contents of an indexed file, `undefined` when unavailable
 */
export type ContentLookup = (filePath: string) => string | undefined;

export interface DeclarationSnippet extends Snippet {
  name: string;
  /** Declaration line */
  line: number;
}

/**
 * Snippets for every function and class of the index, grouped by file in
 * index order. Files without contents are left out.
 */
export function collectSnippets(
  index: NavigationIndex,
  contents: ContentLookup,
  contextLines = 2
): Map<string, DeclarationSnippet[]> {
  const byFile = new Map<string, DeclarationSnippet[]>();

  for (const file of index.files) {
    const declarations = [
      ...file.functions.map((fn) => ({ name: fn.owner ? `${fn.owner}.${fn.name}` : fn.name, line: fn.line })),
      ...file.classes.map((cls) => ({ name: cls.name, line: cls.line })),
    ].sort((a, b) => a.line - b.line || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    if (declarations.length === 0) continue;

    const text = contents(file.path);
    if (text === undefined) continue;

    byFile.set(
      file.path,
      declarations.map((declaration) => ({
        ...declaration,
        ...extractSnippet(text, declaration.line, contextLines),
      }))
    );
  }

  return byFile;
}

/**
 * Reads indexed files from disk relative to `rootPath`, once per file.
 */
export function createFileContentLookup(rootPath: string): ContentLookup {
  const cache = new Map<string, string | undefined>();
  return (filePath) => {
    if (cache.has(filePath)) return cache.get(filePath);
    let text: string | undefined;
    try {
      text = fs.readFileSync(path.join(rootPath, filePath), 'utf-8');
    } catch {
      // Deleted since the scan: no snippet
      text = undefined;
    }
    cache.set(filePath, text);
    return text;
  };
}
