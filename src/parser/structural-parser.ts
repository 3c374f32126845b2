/**
 * navindex - Structural Parser
 *
 * Extracts imports, function signatures and type declarations from one
 * file's text. Lines the recognizers cannot classify contribute nothing;
 * only content the parser cannot read at all raises a `ParseError`.
 *
 * @module parser/structural-parser
 */

import type { LanguageTag, ParsedStructure } from '../types/index.js';
import { ParseError, describeError } from '../utils/errors.js';
import { getDialect } from './dialects.js';
import { getLanguageConfig } from './languages.js';
import { extractDeclarations, extractImports } from './recognizers.js';
import { SourceText, countLines } from './source-text.js';

/**
 * Bumped whenever extraction output changes, so cached results from an
 * older parser are discarded.
 */
export const PARSER_VERSION = 3;

export function isBinaryContent(content: string): boolean {
  return content.includes('\u0000');
}

/**
 * Parse one file.
 *
 * @throws ParseError for binary content or an internal recognizer failure
 */
export function parse(content: string, language: LanguageTag): ParsedStructure {
  if (isBinaryContent(content)) {
    throw new ParseError('BINARY_CONTENT', `Binary content cannot be parsed as ${language}`);
  }

  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;
  const lineCount = countLines(text);
  const dialect = getDialect(language);

  if (!dialect) {
    return { imports: [], functions: [], classes: [], lineCount };
  }

  try {
    const source = new SourceText(text, getLanguageConfig(language));
    const imports = extractImports(source, dialect);
    const { functions, classes } = extractDeclarations(source, dialect);
    return { imports, functions, classes, lineCount };
  } catch (error) {
    throw new ParseError('PARSE_FAILED', `Structural parse failed: ${describeError(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Whether files of this language get structure at all.
 */
export function hasDialect(language: LanguageTag): boolean {
  return getDialect(language) !== undefined;
}
