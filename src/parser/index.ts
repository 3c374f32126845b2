/**
 * navindex - Parser Module
 *
 * Language classification and pattern-based structural parsing.
 *
 * @module parser
 */

export * from './types.js';
export { LANGUAGE_REGISTRY, classify, getLanguageByExtension, getLanguageConfig, isLanguageTag } from './languages.js';
export { getDialect } from './dialects.js';
export { SourceText, maskSource, countLines } from './source-text.js';
export { parameterNames, splitTopLevel, ownerName } from './recognizers.js';
export { parse, hasDialect, isBinaryContent, PARSER_VERSION } from './structural-parser.js';
