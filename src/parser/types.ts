/**
 * navindex - Parser Types
 *
 * Lexical syntax per language and the rule shapes consumed by the shared
 * recognizers. A language supplies data only; matching lives in
 * `recognizers.ts`.
 *
 * @module parser/types
 */

import type { ClassKind, LanguageTag } from '../types/index.js';

// ============================================================================
// LEXICAL SYNTAX
// ============================================================================

export interface CommentSyntax {
  /** Line comment openers */
  line: string[];
  /** Block comment delimiters, checked before line comments */
  block: Array<[open: string, close: string]>;
  /** Line comments only start at a word boundary (`$#` is not a comment in shell) */
  lineBoundary?: boolean;
}

export interface StringDelimiter {
  open: string;
  close: string;
  /** Backslash escapes the next character */
  escapes: boolean;
  /** A newline does not terminate the literal */
  multiline: boolean;
}

export interface LanguageConfig {
  id: LanguageTag;
  name: string;
  extensions: string[];
  /** Exact file names classified regardless of extension */
  filenames?: string[];
  comments: CommentSyntax;
  /** Longest delimiters first */
  strings: StringDelimiter[];
}

// ============================================================================
// DIALECT RULES
// ============================================================================

/**
 * How declarations nest: braces, indentation, or `end` keywords.
 */
export type BlockFamily = 'brace' | 'indent' | 'keyword';

/**
 * - `annotated`: `name: Type`, `name = default`, `*name` (Python, TS, Rust, Swift...)
 * - `c-like`: `Type name`, `Type name = default` (C, Java, C#, PHP)
 * - `go`: `name Type`, `a, b Type`
 * - `none`: declarations never carry parameters
 */
export type ParamStyle = 'annotated' | 'c-like' | 'go' | 'none';

export interface ImportRule {
  /** Global regex over the comment-free view. Group 1 is the token unless `tokens` is set. */
  pattern: RegExp;
  /** Turn one match into zero or more raw tokens */
  tokens?: (match: RegExpMatchArray) => string[];
}

export interface FunctionRule {
  /**
   * Global regex over the skeleton view with a `name` group and an
   * optional `owner` group. For `params: 'parens'` the match ends on the
   * opening parenthesis of the parameter list.
   */
  pattern: RegExp;
  /** `member` rules only match directly inside a type body */
  scope?: 'any' | 'member';
  params?: 'parens' | 'optional' | 'none';
  /** Anchored test against the text following the parameter list */
  requireAfter?: RegExp;
}

export interface TypeRule {
  /** Global regex over the skeleton view with a `name` group and an optional `kind` group */
  pattern: RegExp;
  /** Kind when the pattern has no `kind` group */
  kind?: ClassKind;
  /**
   * Brace family only. `required`: no `{` before `;` means no declaration;
   * `optional`: the entry stands without a body; `none`: never look for one.
   */
  body?: 'required' | 'optional' | 'none';
  /** `false` for blocks that only attribute methods (`impl`, `extension`) */
  declares?: boolean;
  /** Reject the match when the header text matches */
  headerGuard?: RegExp;
  /** Span name for non-declaring rules, derived from the header */
  spanName?: (header: string, groups: Record<string, string | undefined>) => string | undefined;
  /** Supertypes from the header text between the name and the body */
  bases?: (header: string, groups: Record<string, string | undefined>) => string[];
}

export interface KeywordBlocks {
  /** Number of block openers on a skeleton line */
  opens(line: string): number;
  /** Number of `end`-style closers on a skeleton line */
  closes(line: string): number;
}

export interface Dialect {
  family: BlockFamily;
  paramStyle: ParamStyle;
  imports: ImportRule[];
  functions: FunctionRule[];
  types: TypeRule[];
  /** Required by the keyword family */
  keywordBlocks?: KeywordBlocks;
  /** Headers of languages without statement terminators end at a depth-0 newline */
  newlineEndsHeader?: boolean;
  /** Names that are never declarations (control keywords and the like) */
  reserved?: ReadonlySet<string>;
}
