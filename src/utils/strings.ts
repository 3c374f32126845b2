/**
 * navindex - String Utilities
 * @module utils/strings
 */

// =============================================================================
// Formatting
// =============================================================================

/**
 * Truncate a string to a maximum length, adding ellipsis if needed
 *
 * @example
 * truncate('Hello World', 8) // 'Hello...'
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (!str || str.length <= maxLength) return str;
  return str.slice(0, Math.max(0, maxLength - suffix.length)) + suffix;
}

/**
 * @example
 * pluralize(1, 'file') // '1 file'
 * pluralize(3, 'match', 'matches') // '3 matches'
 */
export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * Estimate token count (rough approximation: ~4 chars per token)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

// =============================================================================
// Text Extraction
// =============================================================================

export interface Snippet {
  /** First included line, 1-based */
  startLine: number;
  /** Last included line, 1-based */
  endLine: number;
  lines: string[];
  /** Lines prefixed with right-aligned line numbers */
  text: string;
}

/**
 * Extract the lines around a declaration
 *
 * @param text - Full file text
 * @param line - Line number (1-indexed)
 * @param contextLines - Number of lines before/after to include
 *
 * @example
 * extractSnippet('a\nb\nc\nd', 3, 1).text // '2 | b\n3 | c\n4 | d'
 */
export function extractSnippet(text: string, line: number, contextLines = 2): Snippet {
  const all = text.split(/\r?\n/);
  if (all.length > 1 && all[all.length - 1] === '') all.pop();

  const lineIndex = Math.min(Math.max(line, 1), all.length) - 1;
  const start = Math.max(0, lineIndex - contextLines);
  const end = Math.min(all.length - 1, lineIndex + contextLines);

  const lines = all.slice(start, end + 1);
  const width = String(end + 1).length;
  const numbered = lines.map((content, offset) => `${String(start + offset + 1).padStart(width)} | ${content}`);

  return {
    startLine: start + 1,
    endLine: end + 1,
    lines,
    text: numbered.join('\n'),
  };
}
