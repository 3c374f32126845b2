/**
 * navindex - Markdown Encoder
 * @module output/markdown
 *
 * Human-readable report: summary, entry points, key files, navigation
 * paths, declarations, unresolved imports and cycles.
 */

import type { FileRecord, NavigationIndex } from '../types/index.js';
import { pluralize } from '../utils/strings.js';
import { collectSnippets, type ContentLookup, type DeclarationSnippet } from './snippets.js';

export interface MarkdownEncodeOptions {
  snippets?: boolean;
  snippetContext?: number;
  contents?: ContentLookup;
  /** Rows in the key files table (default: 10) */
  keyFileLimit?: number;
}

/**
 * Render the index as markdown.
 */
export function encodeMarkdown(index: NavigationIndex, options: MarkdownEncodeOptions = {}): string {
  const lines: string[] = [];
  const { diagnostics } = index;

  lines.push(`# Navigation Index: ${index.root}`);
  lines.push('');

  // Summary
  lines.push('## Summary');
  lines.push('');
  lines.push(
    `- Files: ${diagnostics.totalFiles} (${diagnostics.parsedFiles} parsed, ` +
      `${diagnostics.skippedFiles} skipped, ${diagnostics.failedFiles} failed)`
  );
  const languages = Object.entries(diagnostics.languages)
    .map(([language, count]) => `${language} (${count})`)
    .join(', ');
  lines.push(`- Languages: ${languages || 'none'}`);
  lines.push(`- Imports: ${diagnostics.resolvedEdges} resolved, ${diagnostics.unresolvedEdges} unresolved`);
  lines.push(`- Cycles: ${index.cycles.length}`);
  if (diagnostics.cancelled) {
    lines.push('- Indexing was cancelled; the index covers completed files only');
  }
  lines.push('');

  // Entry points
  if (index.entryPoints.length > 0) {
    lines.push('## Entry Points');
    lines.push('');
    for (const candidate of index.entryPoints) {
      lines.push(`- \`${candidate.path}\`: ${candidate.justification} (${candidate.reason})`);
    }
    lines.push('');
  }

  // Key files
  const keyFiles = rankKeyFiles(index, options.keyFileLimit ?? 10);
  if (keyFiles.length > 0) {
    lines.push('## Key Files');
    lines.push('');
    lines.push('| File | Imported by | Imports |');
    lines.push('|------|-------------|---------|');
    for (const file of keyFiles) {
      lines.push(`| \`${file.path}\` | ${file.importedBy} | ${file.imports} |`);
    }
    lines.push('');
  }

  // Navigation paths
  if (index.paths.length > 0) {
    lines.push('## Navigation Paths');
    lines.push('');
    for (const navigationPath of index.paths) {
      lines.push(`### ${navigationPath.label}`);
      lines.push('');
      const separator = navigationPath.kind === 'entry-to-hub' ? ' → ' : ', ';
      lines.push(navigationPath.files.map((file) => `\`${file}\``).join(separator));
      lines.push('');
      lines.push(`_${navigationPath.detail}_`);
      lines.push('');
    }
  }

  const snippets =
    options.snippets && options.contents
      ? collectSnippets(index, options.contents, options.snippetContext)
      : new Map<string, DeclarationSnippet[]>();

  // Functions
  const withFunctions = index.files.filter((file) => file.functions.length > 0);
  if (withFunctions.length > 0) {
    lines.push('## Functions');
    lines.push('');
    for (const file of withFunctions) {
      lines.push(`### \`${file.path}\``);
      lines.push('');
      for (const fn of file.functions) {
        const name = fn.owner ? `${fn.owner}.${fn.name}` : fn.name;
        lines.push(`- \`${name}(${fn.params.join(', ')})\` line ${fn.line}`);
      }
      lines.push('');
    }
  }

  // Classes
  const withClasses = index.files.filter((file) => file.classes.length > 0);
  if (withClasses.length > 0) {
    lines.push('## Classes');
    lines.push('');
    for (const file of withClasses) {
      lines.push(`### \`${file.path}\``);
      lines.push('');
      for (const cls of file.classes) {
        const bases = cls.bases.length > 0 ? ` extends ${cls.bases.join(', ')}` : '';
        lines.push(
          `- \`${cls.name}\` (${cls.kind})${bases}, ${pluralize(cls.methodCount, 'method')}, line ${cls.line}`
        );
      }
      lines.push('');
    }
  }

  // Snippets
  if (snippets.size > 0) {
    lines.push('## Snippets');
    lines.push('');
    for (const [file, entries] of snippets) {
      const language = index.files.find((record) => record.path === file)?.language ?? '';
      for (const entry of entries) {
        lines.push(`### \`${file}\`: ${entry.name}`);
        lines.push('');
        lines.push('```' + (language === 'unknown' ? '' : language));
        lines.push(entry.text);
        lines.push('```');
        lines.push('');
      }
    }
  }

  // Unresolved imports
  const unresolved = index.edges.filter((edge) => edge.target === undefined);
  if (unresolved.length > 0) {
    lines.push('## Unresolved Imports');
    lines.push('');
    for (const edge of unresolved) {
      lines.push(`- \`${edge.source}\`: \`${edge.token}\``);
    }
    lines.push('');
  }

  // Cycles
  if (index.cycles.length > 0) {
    lines.push('## Cycles');
    lines.push('');
    for (const cycle of index.cycles) {
      lines.push(`- ${cycle.map((file) => `\`${file}\``).join(' ↔ ')}`);
    }
    lines.push('');
  }

  // Warnings
  if (diagnostics.warnings.length > 0) {
    lines.push('## Warnings');
    lines.push('');
    for (const warning of diagnostics.warnings) {
      lines.push(`- \`${warning.path}\`: ${warning.message}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

interface KeyFile {
  path: string;
  importedBy: number;
  imports: number;
}

/**
 * Files imported at least once, most-imported first.
 */
function rankKeyFiles(index: NavigationIndex, limit: number): KeyFile[] {
  const importedBy = new Map<string, number>();
  const imports = new Map<string, number>();
  for (const edge of index.edges) {
    if (edge.target === undefined) continue;
    importedBy.set(edge.target, (importedBy.get(edge.target) ?? 0) + 1);
    imports.set(edge.source, (imports.get(edge.source) ?? 0) + 1);
  }

  return index.files
    .filter((file: FileRecord) => (importedBy.get(file.path) ?? 0) > 0)
    .map((file) => ({
      path: file.path,
      importedBy: importedBy.get(file.path) ?? 0,
      imports: imports.get(file.path) ?? 0,
    }))
    .sort((a, b) => b.importedBy - a.importedBy || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .slice(0, limit);
}
