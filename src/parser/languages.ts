/**
 * navindex - Language Classifier
 *
 * Maps a path to a language tag by extension, falling back to well-known
 * file names. Classification is a pure function of the path.
 *
 * @module parser/languages
 */

import type { FileLanguage, LanguageTag } from '../types/index.js';
import { basenameOf, getExtension } from '../utils/paths.js';
import type { CommentSyntax, LanguageConfig, StringDelimiter } from './types.js';

// ============================================================================
// SHARED SYNTAX
// ============================================================================

const C_COMMENTS: CommentSyntax = { line: ['//'], block: [['/*', '*/']] };
const HASH_COMMENTS: CommentSyntax = { line: ['#'], block: [] };
const NO_COMMENTS: CommentSyntax = { line: [], block: [] };

const dq: StringDelimiter = { open: '"', close: '"', escapes: true, multiline: false };
const sq: StringDelimiter = { open: "'", close: "'", escapes: true, multiline: false };

function multiline(delimiter: StringDelimiter): StringDelimiter {
  return { ...delimiter, multiline: true };
}

function raw(open: string, close = open): StringDelimiter {
  return { open, close, escapes: false, multiline: true };
}

// ============================================================================
// LANGUAGE REGISTRY
// ============================================================================

/**
 * Registry of every language the classifier knows
 */
export const LANGUAGE_REGISTRY: Record<LanguageTag, LanguageConfig> = {
  typescript: {
    id: 'typescript',
    name: 'TypeScript',
    extensions: ['.ts', '.tsx', '.mts', '.cts'],
    comments: C_COMMENTS,
    strings: [dq, sq, { open: '`', close: '`', escapes: true, multiline: true }],
  },
  javascript: {
    id: 'javascript',
    name: 'JavaScript',
    extensions: ['.js', '.jsx', '.mjs', '.cjs'],
    comments: C_COMMENTS,
    strings: [dq, sq, { open: '`', close: '`', escapes: true, multiline: true }],
  },
  python: {
    id: 'python',
    name: 'Python',
    extensions: ['.py', '.pyi', '.pyw'],
    comments: HASH_COMMENTS,
    strings: [multiline({ ...dq, open: '"""', close: '"""' }), multiline({ ...sq, open: "'''", close: "'''" }), dq, sq],
  },
  go: {
    id: 'go',
    name: 'Go',
    extensions: ['.go'],
    comments: C_COMMENTS,
    strings: [dq, sq, raw('`')],
  },
  rust: {
    id: 'rust',
    name: 'Rust',
    extensions: ['.rs'],
    comments: C_COMMENTS,
    // `'` opens lifetimes as well as char literals
    strings: [multiline(dq)],
  },
  java: {
    id: 'java',
    name: 'Java',
    extensions: ['.java'],
    comments: C_COMMENTS,
    strings: [multiline({ ...dq, open: '"""', close: '"""' }), dq, sq],
  },
  kotlin: {
    id: 'kotlin',
    name: 'Kotlin',
    extensions: ['.kt', '.kts'],
    comments: C_COMMENTS,
    strings: [raw('"""'), dq, sq],
  },
  csharp: {
    id: 'csharp',
    name: 'C#',
    extensions: ['.cs'],
    comments: C_COMMENTS,
    strings: [raw('@"', '"'), dq, sq],
  },
  c: {
    id: 'c',
    name: 'C',
    extensions: ['.c', '.h'],
    comments: C_COMMENTS,
    strings: [dq, sq],
  },
  cpp: {
    id: 'cpp',
    name: 'C++',
    extensions: ['.cpp', '.cc', '.cxx', '.c++', '.hpp', '.hh', '.hxx', '.h++', '.ipp'],
    comments: C_COMMENTS,
    strings: [dq, sq],
  },
  ruby: {
    id: 'ruby',
    name: 'Ruby',
    extensions: ['.rb', '.rake', '.gemspec', '.ru'],
    filenames: ['Rakefile', 'Gemfile', 'Guardfile', 'Vagrantfile'],
    comments: { line: ['#'], block: [['=begin', '=end']] },
    strings: [multiline(dq), multiline(sq)],
  },
  php: {
    id: 'php',
    name: 'PHP',
    extensions: ['.php', '.phtml'],
    comments: { line: ['//', '#'], block: [['/*', '*/']] },
    strings: [multiline(dq), multiline(sq)],
  },
  swift: {
    id: 'swift',
    name: 'Swift',
    extensions: ['.swift'],
    comments: C_COMMENTS,
    strings: [multiline({ ...dq, open: '"""', close: '"""' }), dq],
  },
  lua: {
    id: 'lua',
    name: 'Lua',
    extensions: ['.lua'],
    comments: { line: ['--'], block: [['--[[', ']]']] },
    strings: [raw('[[', ']]'), dq, sq],
  },
  shell: {
    id: 'shell',
    name: 'Shell',
    extensions: ['.sh', '.bash', '.zsh', '.ksh'],
    filenames: ['.bashrc', '.zshrc', '.profile'],
    comments: { line: ['#'], block: [], lineBoundary: true },
    strings: [multiline(dq), raw("'")],
  },
  make: {
    id: 'make',
    name: 'Makefile',
    extensions: ['.mk', '.mak'],
    filenames: ['Makefile', 'makefile', 'GNUmakefile'],
    comments: HASH_COMMENTS,
    strings: [],
  },
  json: {
    id: 'json',
    name: 'JSON',
    extensions: ['.json', '.jsonc', '.json5'],
    comments: NO_COMMENTS,
    strings: [dq],
  },
  yaml: {
    id: 'yaml',
    name: 'YAML',
    extensions: ['.yaml', '.yml'],
    comments: HASH_COMMENTS,
    strings: [dq, sq],
  },
  toml: {
    id: 'toml',
    name: 'TOML',
    extensions: ['.toml'],
    filenames: ['Pipfile'],
    comments: HASH_COMMENTS,
    strings: [dq, sq],
  },
  markdown: {
    id: 'markdown',
    name: 'Markdown',
    extensions: ['.md', '.markdown', '.mdx'],
    comments: NO_COMMENTS,
    strings: [],
  },
  html: {
    id: 'html',
    name: 'HTML',
    extensions: ['.html', '.htm', '.xhtml', '.vue', '.svelte'],
    comments: { line: [], block: [['<!--', '-->']] },
    strings: [],
  },
  css: {
    id: 'css',
    name: 'CSS',
    extensions: ['.css', '.scss', '.sass', '.less'],
    comments: { line: [], block: [['/*', '*/']] },
    strings: [dq, sq],
  },
  sql: {
    id: 'sql',
    name: 'SQL',
    extensions: ['.sql'],
    comments: { line: ['--'], block: [['/*', '*/']] },
    strings: [sq],
  },
  dockerfile: {
    id: 'dockerfile',
    name: 'Dockerfile',
    extensions: ['.dockerfile'],
    filenames: ['Dockerfile', 'Containerfile'],
    comments: HASH_COMMENTS,
    strings: [],
  },
  cmake: {
    id: 'cmake',
    name: 'CMake',
    extensions: ['.cmake'],
    filenames: ['CMakeLists.txt'],
    comments: HASH_COMMENTS,
    strings: [dq],
  },
};

// ============================================================================
// LOOKUP TABLES
// ============================================================================

const byExtension = new Map<string, LanguageTag>();
const byFilename = new Map<string, LanguageTag>();

for (const config of Object.values(LANGUAGE_REGISTRY)) {
  for (const ext of config.extensions) {
    byExtension.set(ext, config.id);
  }
  for (const filename of config.filenames ?? []) {
    byFilename.set(filename, config.id);
  }
}

/**
 * Get language config by file extension
 */
export function getLanguageByExtension(extension: string): LanguageConfig | undefined {
  const ext = extension.startsWith('.') ? extension : `.${extension}`;
  const tag = byExtension.get(ext.toLowerCase());
  return tag ? LANGUAGE_REGISTRY[tag] : undefined;
}

export function getLanguageConfig(tag: LanguageTag): LanguageConfig {
  return LANGUAGE_REGISTRY[tag];
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Classify a repo-relative path.
 *
 * Exact file names win over extensions, so `CMakeLists.txt` is CMake and
 * not plain text. Files like `Dockerfile.dev` fall back on their prefix.
 */
export function classify(path: string): FileLanguage {
  const base = basenameOf(path);

  const named = byFilename.get(base);
  if (named) return named;

  const ext = getExtension(base);
  if (ext) {
    const tag = byExtension.get(ext);
    if (tag) return tag;
  }

  const prefix = base.split('.')[0];
  if (prefix !== base) {
    const prefixed = byFilename.get(prefix);
    if (prefixed) return prefixed;
  }

  return 'unknown';
}

/**
 * Narrow an arbitrary string (from a cache file, say) to a known tag.
 */
export function isLanguageTag(value: string): value is LanguageTag {
  return Object.prototype.hasOwnProperty.call(LANGUAGE_REGISTRY, value);
}
