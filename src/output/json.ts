/**
 * navindex - JSON Encoder
 * @module output/json
 */

import type { NavigationIndex } from '../types/index.js';
import { collectSnippets, type ContentLookup, type DeclarationSnippet } from './snippets.js';

export interface JsonEncodeOptions {
  /** Attach declaration snippets (requires `contents`) */
  snippets?: boolean;
  snippetContext?: number;
  contents?: ContentLookup;
  /** Indent output (default: true) */
  pretty?: boolean;
}

/**
 * Full structured form of the index. With snippets, a `snippets` object
 * keyed by file path follows the index fields.
 */
export function encodeJson(index: NavigationIndex, options: JsonEncodeOptions = {}): string {
  const indent = options.pretty === false ? undefined : 2;

  if (!options.snippets || !options.contents) {
    return JSON.stringify(index, null, indent);
  }

  const snippets: Record<string, Array<Omit<DeclarationSnippet, 'lines'>>> = {};
  for (const [file, entries] of collectSnippets(index, options.contents, options.snippetContext)) {
    snippets[file] = entries.map(({ name, line, startLine, endLine, text }) => ({
      name,
      line,
      startLine,
      endLine,
      text,
    }));
  }

  return JSON.stringify({ ...index, snippets }, null, indent);
}
