/**
 * navindex - Output Module
 *
 * Encoders render the same NavigationIndex at three fidelity levels.
 *
 * @module output
 */

import type { OutputFormat } from '../config.js';
import type { NavigationIndex } from '../types/index.js';
import { encodeCompact } from './compact.js';
import { encodeJson } from './json.js';
import { encodeMarkdown } from './markdown.js';
import type { ContentLookup } from './snippets.js';

export { encodeJson, type JsonEncodeOptions } from './json.js';
export { encodeMarkdown, type MarkdownEncodeOptions } from './markdown.js';
export { encodeCompact, type CompactEncodeOptions } from './compact.js';
export {
  collectSnippets,
  createFileContentLookup,
  type ContentLookup,
  type DeclarationSnippet,
} from './snippets.js';

export interface EncodeOptions {
  snippets?: boolean;
  snippetContext?: number;
  contents?: ContentLookup;
  maxTokens?: number;
}

/**
 * Render an index in the requested format
 */
export function encodeIndex(index: NavigationIndex, format: OutputFormat, options: EncodeOptions = {}): string {
  switch (format) {
    case 'json':
      return encodeJson(index, options);
    case 'markdown':
      return encodeMarkdown(index, options);
    case 'compact':
      return encodeCompact(index, { maxTokens: options.maxTokens });
  }
}
