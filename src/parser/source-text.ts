/**
 * navindex - Source Views
 *
 * Two blanked copies of a file that keep every offset and newline in
 * place, so a match in either view maps straight back to a line:
 *
 * - `code`: comments blanked, string literals intact (import recognition)
 * - `skeleton`: comments and string contents blanked (declarations, nesting)
 *
 * @module parser/source-text
 */

import type { LanguageConfig } from './types.js';

function blank(ch: string): string {
  return ch === '\n' || ch === '\r' ? ch : ' ';
}

// ============================================================================
// MASKING
// ============================================================================

export function maskSource(
  text: string,
  config: Pick<LanguageConfig, 'comments' | 'strings'>
): { code: string; skeleton: string } {
  const code: string[] = [];
  const skeleton: string[] = [];
  const { comments, strings } = config;
  const length = text.length;

  const blankRange = (from: number, to: number): void => {
    for (let k = from; k < to; k++) {
      const ch = blank(text[k]);
      code.push(ch);
      skeleton.push(ch);
    }
  };

  let i = 0;
  scan: while (i < length) {
    for (const [open, close] of comments.block) {
      if (text.startsWith(open, i)) {
        const found = text.indexOf(close, i + open.length);
        const end = found === -1 ? length : found + close.length;
        blankRange(i, end);
        i = end;
        continue scan;
      }
    }

    for (const opener of comments.line) {
      if (!text.startsWith(opener, i)) continue;
      if (comments.lineBoundary && i > 0 && !/[\s;]/.test(text[i - 1])) continue;
      const found = text.indexOf('\n', i);
      const end = found === -1 ? length : found;
      blankRange(i, end);
      i = end;
      continue scan;
    }

    for (const delimiter of strings) {
      if (!text.startsWith(delimiter.open, i)) continue;

      for (const ch of delimiter.open) {
        code.push(ch);
        skeleton.push(ch);
      }
      let j = i + delimiter.open.length;
      while (j < length) {
        const ch = text[j];
        if (delimiter.escapes && ch === '\\' && j + 1 < length) {
          code.push(ch, text[j + 1]);
          skeleton.push(' ', blank(text[j + 1]));
          j += 2;
          continue;
        }
        if (text.startsWith(delimiter.close, j)) {
          for (const closeCh of delimiter.close) {
            code.push(closeCh);
            skeleton.push(closeCh);
          }
          j += delimiter.close.length;
          break;
        }
        // Unterminated single-line literal: recover at the newline
        if (ch === '\n' && !delimiter.multiline) break;
        code.push(ch);
        skeleton.push(blank(ch));
        j++;
      }
      i = j;
      continue scan;
    }

    code.push(text[i]);
    skeleton.push(text[i]);
    i++;
  }

  return { code: code.join(''), skeleton: skeleton.join('') };
}

// ============================================================================
// SOURCE TEXT
// ============================================================================

export interface BraceStructure {
  /** Depth before each offset; never negative */
  depth: Int32Array;
  /** Offset of `{` to offset of its `}`; unclosed braces close at end of text */
  closeOf: Map<number, number>;
}

export class SourceText {
  readonly text: string;
  readonly code: string;
  readonly skeleton: string;
  private readonly lineStarts: number[];
  private braces?: BraceStructure;

  constructor(text: string, config: Pick<LanguageConfig, 'comments' | 'strings'>) {
    this.text = text;
    const masked = maskSource(text, config);
    this.code = masked.code;
    this.skeleton = masked.skeleton;

    this.lineStarts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) this.lineStarts.push(i + 1);
    }
  }

  /**
   * 1-based line of an offset
   */
  lineAt(offset: number): number {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }

  lineStart(line: number): number {
    return this.lineStarts[Math.min(Math.max(line, 1), this.lineStarts.length) - 1];
  }

  /**
   * Offset just past the last character of a line, excluding its newline
   */
  lineEnd(line: number): number {
    if (line >= this.lineStarts.length) return this.text.length;
    return this.lineStarts[line] - 1;
  }

  get lineTotal(): number {
    return this.lineStarts.length;
  }

  skeletonLine(line: number): string {
    return this.skeleton.slice(this.lineStart(line), this.lineEnd(line));
  }

  /**
   * Brace depth and matching over the skeleton, computed on first use.
   */
  braceStructure(): BraceStructure {
    if (this.braces) return this.braces;

    const { skeleton } = this;
    const depth = new Int32Array(skeleton.length + 1);
    const closeOf = new Map<number, number>();
    const open: number[] = [];
    let current = 0;

    for (let i = 0; i < skeleton.length; i++) {
      depth[i] = current;
      const ch = skeleton[i];
      if (ch === '{') {
        open.push(i);
        current++;
      } else if (ch === '}') {
        const start = open.pop();
        if (start !== undefined) closeOf.set(start, i);
        current = Math.max(0, current - 1);
      }
    }
    depth[skeleton.length] = current;
    for (const start of open) {
      closeOf.set(start, skeleton.length);
    }

    this.braces = { depth, closeOf };
    return this.braces;
  }

  /**
   * Offset of the `)` matching the `(` at `openIndex`, or -1 when the list
   * never closes.
   */
  matchParen(openIndex: number): number {
    const { skeleton } = this;
    let depth = 0;
    for (let i = openIndex; i < skeleton.length; i++) {
      const ch = skeleton[i];
      if (ch === '(') depth++;
      else if (ch === ')') {
        depth--;
        if (depth === 0) return i;
      }
    }
    return -1;
  }
}

// ============================================================================
// LINE COUNTING
// ============================================================================

/**
 * Lines in a text: a trailing newline does not start a new line and an
 * empty text has none.
 */
export function countLines(text: string): number {
  if (text.length === 0) return 0;
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return text.endsWith('\n') ? count : count + 1;
}
