/**
 * navindex - Language Dialects
 *
 * Each supported code language contributes only vocabulary: import rules,
 * declaration rules, its block family and how it spells parameters. Data
 * formats (JSON, YAML, Markdown...) have no dialect and stay inert.
 *
 * @module parser/dialects
 */

import type { LanguageTag } from '../types/index.js';
import {
  basesAfterColon,
  basesAfterKeywords,
  basesFromList,
  ownerName,
  splitTopLevel,
  stripBalanced,
} from './recognizers.js';
import type { Dialect, KeywordBlocks } from './types.js';

// ============================================================================
// SHARED VOCABULARY
// ============================================================================

/** Keywords that look like a call when followed by `(` */
const CONTROL_WORDS = [
  'if', 'else', 'elif', 'for', 'foreach', 'while', 'do', 'switch', 'case', 'catch',
  'try', 'return', 'throw', 'new', 'delete', 'typeof', 'sizeof', 'alignof', 'decltype',
  'with', 'await', 'yield', 'super', 'this', 'void', 'in', 'of', 'lock', 'using', 'fixed',
  'checked', 'unchecked', 'synchronized', 'assert', 'when', 'match', 'guard', 'defer',
  'go', 'select', 'function', 'func', 'fn', 'fun', 'def', 'var', 'let', 'val', 'const',
  'extends', 'implements', 'where', 'import', 'export', 'static_assert', 'and', 'or', 'not',
];

function reserved(...extra: string[]): ReadonlySet<string> {
  return new Set([...CONTROL_WORDS, ...extra]);
}

function quoted(text: string): string[] {
  return [...text.matchAll(/["']([^"'\n]+)["']/g)].map((match) => match[1]);
}

// ============================================================================
// ECMASCRIPT (TypeScript, JavaScript)
// ============================================================================

const JS_IDENT = '[A-Za-z_$][\\w$]*';
const JS_MODIFIERS = '(?:(?:public|private|protected|static|async|readonly|override|abstract|declare|get|set|accessor)[ \\t]+)*';

const ecmascript: Dialect = {
  family: 'brace',
  paramStyle: 'annotated',
  imports: [
    { pattern: /\bimport\s+(?:type\s+)?(?:[\w*${}\s,]+?\s+from\s+)?["']([^"'\n]+)["']/g },
    { pattern: /\bexport\s+(?:type\s+)?(?:\*(?:\s+as\s+[\w$]+)?|\{[^}]*\})\s*from\s+["']([^"'\n]+)["']/g },
    { pattern: /\brequire\s*\(\s*["']([^"'\n]+)["']\s*\)/g },
    { pattern: /\bimport\s*\(\s*["']([^"'\n]+)["']\s*\)/g },
  ],
  functions: [
    {
      pattern: new RegExp(`(?<![\\w$.])function[ \\t]*\\*?[ \\t]*(?<name>${JS_IDENT})[ \\t]*(?:<[^>\\n]*>)?[ \\t]*\\(`, 'g'),
    },
    {
      pattern: new RegExp(`(?<![\\w$.])(?:const|let|var)[ \\t]+(?<name>${JS_IDENT})[ \\t]*=[ \\t]*(?:async[ \\t]+)?function\\b[ \\t]*\\*?[ \\t]*(?:${JS_IDENT})?[ \\t]*\\(`, 'g'),
    },
    {
      pattern: new RegExp(`(?<![\\w$.])(?:const|let|var)[ \\t]+(?<name>${JS_IDENT})[ \\t]*(?::[^=\\n]+)?=[ \\t]*(?:async[ \\t]*)?(?:<[^>\\n]*>[ \\t]*)?\\(`, 'g'),
      requireAfter: /^\s*(?::[^=;{]*?)?=>/,
    },
    {
      pattern: new RegExp(`^[ \\t]*${JS_MODIFIERS}\\*?[ \\t]*(?<name>#?${JS_IDENT})[ \\t]*\\??[ \\t]*(?:<[^>\\n]*>)?[ \\t]*\\(`, 'gm'),
      scope: 'member',
      requireAfter: /^\s*(?::[^;{}=]*(?:\{[^}]*\}[^;{}=]*)?)?[{;]/,
    },
    {
      pattern: new RegExp(`^[ \\t]*${JS_MODIFIERS}(?<name>#?${JS_IDENT})[ \\t]*(?::[^=\\n]+)?=[ \\t]*(?:async[ \\t]*)?\\(`, 'gm'),
      scope: 'member',
      requireAfter: /^\s*(?::[^=;{]*?)?=>/,
    },
  ],
  types: [
    {
      pattern: new RegExp(`(?<![\\w$.])(?:(?:export|default|declare|abstract)[ \\t]+)*class[ \\t]+(?<name>${JS_IDENT})`, 'g'),
      kind: 'class',
      body: 'required',
      bases: (header) => basesAfterKeywords(header, ['extends', 'implements']),
    },
    {
      pattern: new RegExp(`(?<![\\w$.])(?:(?:export|declare)[ \\t]+)*interface[ \\t]+(?<name>${JS_IDENT})`, 'g'),
      kind: 'interface',
      body: 'required',
      bases: (header) => basesAfterKeywords(header, ['extends']),
    },
    {
      pattern: new RegExp(`(?<![\\w$.])(?:(?:export|declare|const)[ \\t]+)*enum[ \\t]+(?<name>${JS_IDENT})`, 'g'),
      kind: 'enum',
      body: 'required',
    },
    {
      pattern: new RegExp(`(?<![\\w$.])(?:(?:export|declare)[ \\t]+)*type[ \\t]+(?<name>${JS_IDENT})[ \\t]*(?:<[^=\\n]*>)?[ \\t]*=`, 'g'),
      kind: 'type',
      body: 'none',
    },
    {
      pattern: new RegExp(`(?<![\\w$.])(?:(?:export|declare)[ \\t]+)*namespace[ \\t]+(?<name>${JS_IDENT})`, 'g'),
      kind: 'module',
      body: 'required',
    },
  ],
  reserved: reserved(),
};

// ============================================================================
// PYTHON
// ============================================================================

const python: Dialect = {
  family: 'indent',
  paramStyle: 'annotated',
  imports: [
    {
      pattern: /^[ \t]*import[ \t]+([^\n;]+)/gm,
      tokens: (match) => splitTopLevel(match[1]).map((part) => part.split(/\s+as\s+/)[0].trim()),
    },
    {
      // `from . import a, b` names sibling modules; anything else names the module
      pattern: /^[ \t]*from[ \t]+(\.*[\w.]*)[ \t]+import[ \t]+(\([^)]*\)|[^\n;]+)/gm,
      tokens: (match) => {
        const module = match[1];
        if (/^\.+$/.test(module)) {
          return splitTopLevel(match[2].replace(/[()\\]/g, ' '))
            .map((part) => part.split(/\s+as\s+/)[0].trim())
            .filter((name) => name !== '*')
            .map((name) => `${module}${name}`);
        }
        return [module];
      },
    },
  ],
  functions: [
    { pattern: /^[ \t]*(?:async[ \t]+)?def[ \t]+(?<name>[A-Za-z_]\w*)[ \t]*(?:\[[^\]\n]*\])?[ \t]*\(/gm },
  ],
  types: [
    {
      pattern: /^[ \t]*class[ \t]+(?<name>[A-Za-z_]\w*)[ \t]*(?:\[[^\]\n]*\])?[ \t]*(?:\((?<bases>[^)]*)\))?[ \t]*:/gm,
      kind: 'class',
      bases: (_header, groups) => basesFromList(groups.bases),
    },
  ],
  reserved: reserved(),
};

// ============================================================================
// GO
// ============================================================================

const go: Dialect = {
  family: 'brace',
  paramStyle: 'go',
  newlineEndsHeader: true,
  imports: [
    { pattern: /\bimport[ \t]+(?:[\w.]+[ \t]+)?"([^"\n]+)"/g },
    { pattern: /\bimport[ \t]*\(([^)]*)\)/g, tokens: (match) => quoted(match[1]) },
  ],
  functions: [
    {
      pattern: /^func[ \t]*(?:\((?<owner>[^)]*)\)[ \t]*)?(?<name>[A-Za-z_]\w*)[ \t]*(?:\[[^\]\n]*\])?[ \t]*\(/gm,
    },
  ],
  types: [
    {
      pattern: /\btype[ \t]+(?<name>[A-Za-z_]\w*)(?:\[[^\]\n]*\])?[ \t]+(?<kind>struct|interface)\b/g,
      body: 'optional',
    },
    {
      pattern: /\btype[ \t]+(?<name>[A-Za-z_]\w*)(?:\[[^\]\n]*\])?[ \t]+(?!struct\b|interface\b)=?[ \t]*[\w*[\]]/g,
      kind: 'type',
      body: 'none',
    },
  ],
  reserved: reserved(),
};

// ============================================================================
// RUST
// ============================================================================

const rust: Dialect = {
  family: 'brace',
  paramStyle: 'annotated',
  imports: [
    {
      pattern: /(?<![\w:])use[ \t]+([^;]+);/g,
      tokens: (match) => {
        const path = match[1].split(/\s+as\s+/)[0].replace(/\s+/g, '');
        if (path.startsWith('{')) return [];
        return [path.split('::{')[0].replace(/::\*$/, '')];
      },
    },
    { pattern: /^[ \t]*(?:pub(?:\([^)]*\))?[ \t]+)?mod[ \t]+([A-Za-z_]\w*)[ \t]*;/gm, tokens: (match) => [`self::${match[1]}`] },
  ],
  functions: [
    { pattern: /(?<![\w.])fn[ \t]+(?<name>[A-Za-z_]\w*)[ \t]*(?:<[^(]*?>)?[ \t]*\(/g },
  ],
  types: [
    {
      pattern: /(?<![\w.])(?<kind>struct|enum|trait|union)[ \t]+(?<name>[A-Za-z_]\w*)/g,
      body: 'optional',
      bases: (header) => basesAfterColon(header, { separators: '+,', stopAt: /\bwhere\b/ }),
    },
    {
      pattern: /(?<![\w.])impl\b/g,
      declares: false,
      spanName: (header) => {
        const text = stripBalanced(header, '<', '>').split(/\bwhere\b/)[0];
        const parts = text.split(/\s+for\s+/);
        return ownerName(parts[parts.length - 1]);
      },
    },
  ],
  reserved: reserved(),
};

// ============================================================================
// JVM (Java, Kotlin)
// ============================================================================

const JAVA_MODIFIERS =
  '(?:@[\\w.]+(?:\\([^)\\n]*\\))?[ \\t]+)*(?:(?:public|protected|private|static|final|abstract|synchronized|native|default|strictfp|transient)[ \\t]+)*';
const JAVA_TYPE = '[\\w.$]+(?:<[^;{}()\\n]*>)?(?:\\[\\])*';

const java: Dialect = {
  family: 'brace',
  paramStyle: 'c-like',
  imports: [{ pattern: /^[ \t]*import[ \t]+(?:static[ \t]+)?([\w.]+(?:\.\*)?)[ \t]*;/gm }],
  functions: [
    {
      pattern: new RegExp(
        `^[ \\t]*${JAVA_MODIFIERS}(?:<[^>\\n]+>[ \\t]+)?${JAVA_TYPE}[ \\t]+(?<name>[A-Za-z_$][\\w$]*)[ \\t]*\\(`,
        'gm'
      ),
      scope: 'member',
      requireAfter: /^\s*(?:throws\b[^{;]*)?[{;]/,
    },
    {
      pattern: new RegExp(`^[ \\t]*${JAVA_MODIFIERS}(?<name>[A-Z][\\w$]*)[ \\t]*\\(`, 'gm'),
      scope: 'member',
      requireAfter: /^\s*(?:throws\b[^{;]*)?\{/,
    },
  ],
  types: [
    {
      pattern: /(?<![\w.@])(?:(?:public|protected|private|static|abstract|final|sealed|non-sealed|strictfp)[ \t]+)*(?<kind>class|interface|enum|record|@interface)[ \t]+(?<name>[A-Za-z_$][\w$]*)/g,
      body: 'optional',
      bases: (header) => basesAfterKeywords(header, ['extends', 'implements']),
    },
  ],
  reserved: reserved(),
};

const kotlin: Dialect = {
  family: 'brace',
  paramStyle: 'annotated',
  newlineEndsHeader: true,
  imports: [{ pattern: /^[ \t]*import[ \t]+([\w.]+(?:\.\*)?)/gm }],
  functions: [
    {
      pattern: /(?<![\w.])fun[ \t]+(?:<[^>\n]*>[ \t]*)?(?:(?<owner>[\w.]+(?:<[^>\n]*>)?\??)\.)?(?<name>[A-Za-z_]\w*)[ \t]*\(/g,
    },
  ],
  types: [
    {
      pattern: /(?<![\w.])(?:(?:data|sealed|abstract|open|annotation|inner|value|private|public|internal|protected|final|expect|actual)[ \t]+)*(?<kind>enum[ \t]+class|class|interface|object)[ \t]+(?<name>[A-Za-z_]\w*)/g,
      body: 'optional',
      bases: (header) => basesAfterColon(stripConstructor(header), { stopAt: /\bwhere\b/ }),
    },
  ],
  reserved: reserved(),
};

/**
 * Drop a leading primary constructor so its `val x: T` colons are not
 * mistaken for the supertype list.
 */
function stripConstructor(header: string): string {
  const trimmed = header.replace(/^\s*(?:<[^>]*>)?\s*(?:(?:private|public|internal|protected)\s+)?(?:constructor\s*)?/, '');
  if (!trimmed.startsWith('(')) return header;
  let depth = 0;
  for (let i = 0; i < trimmed.length; i++) {
    if (trimmed[i] === '(') depth++;
    else if (trimmed[i] === ')') {
      depth--;
      if (depth === 0) return trimmed.slice(i + 1);
    }
  }
  return header;
}

// ============================================================================
// C#
// ============================================================================

const CS_MODIFIERS =
  '(?:(?:public|private|protected|internal|static|virtual|override|abstract|async|sealed|extern|new|partial|unsafe|readonly|required)[ \\t]+)*';

const csharp: Dialect = {
  family: 'brace',
  paramStyle: 'c-like',
  imports: [
    { pattern: /^[ \t]*(?:global[ \t]+)?using[ \t]+(?:static[ \t]+)?(?:\w+[ \t]*=[ \t]*)?([\w.]+)[ \t]*;/gm },
  ],
  functions: [
    {
      pattern: new RegExp(
        `^[ \\t]*(?:\\[[^\\]\\n]*\\][ \\t]*)*${CS_MODIFIERS}[\\w.]+(?:<[^;{}()\\n]*>)?\\??(?:\\[\\])*[ \\t]+(?<name>[A-Za-z_]\\w*)[ \\t]*(?:<[^>\\n]*>)?[ \\t]*\\(`,
        'gm'
      ),
      scope: 'member',
      requireAfter: /^\s*(?:where\b[^{;]*)?(?:\{|=>|;)/,
    },
    {
      pattern: new RegExp(`^[ \\t]*${CS_MODIFIERS}(?<name>[A-Z]\\w*)[ \\t]*\\(`, 'gm'),
      scope: 'member',
      requireAfter: /^\s*(?::[^{;]*)?\{/,
    },
  ],
  types: [
    {
      pattern: /(?<![\w.])(?:(?:public|private|protected|internal|static|abstract|sealed|partial|readonly|ref|unsafe|new|file)[ \t]+)*(?<kind>record[ \t]+struct|record[ \t]+class|record|class|interface|struct|enum)[ \t]+(?<name>[A-Za-z_]\w*)/g,
      body: 'optional',
      bases: (header) => basesAfterColon(header.replace(/^\s*\([^)]*\)/, ''), { stopAt: /\bwhere\b/ }),
    },
  ],
  reserved: reserved(),
};

// ============================================================================
// C / C++
// ============================================================================

const C_QUALIFIERS =
  '(?:(?:static|inline|extern|virtual|constexpr|consteval|explicit|friend|const|volatile|unsigned|signed|struct|enum|typename)[ \\t]+)*';
const C_TYPE_TOKENS = '(?:[A-Za-z_][\\w:<>,]*[ \\t*&]+)+';
const C_AFTER_PARAMS = '\\s*(?:const\\b\\s*)?(?:noexcept\\b\\s*)?(?:override\\b\\s*)?(?:final\\b\\s*)?(?:->[^{;]*)?';

const cFamily: Dialect = {
  family: 'brace',
  paramStyle: 'c-like',
  imports: [
    { pattern: /^[ \t]*#[ \t]*include[ \t]*"([^"\n]+)"/gm },
    { pattern: /^[ \t]*#[ \t]*include[ \t]*<([^>\n]+)>/gm, tokens: (match) => [`<${match[1]}>`] },
  ],
  functions: [
    {
      pattern: new RegExp(
        `^[ \\t]*(?:template[ \\t]*<[^>\\n]*>[ \\t]*)?${C_QUALIFIERS}${C_TYPE_TOKENS}(?<owner>(?:[A-Za-z_]\\w*::)*)(?<name>~?[A-Za-z_]\\w*)[ \\t]*\\(`,
        'gm'
      ),
      requireAfter: new RegExp(`^${C_AFTER_PARAMS}(?::[^{;]*)?\\{`),
    },
    {
      pattern: new RegExp(
        `^[ \\t]*(?:template[ \\t]*<[^>\\n]*>[ \\t]*)?${C_QUALIFIERS}${C_TYPE_TOKENS}(?<name>~?[A-Za-z_]\\w*)[ \\t]*\\(`,
        'gm'
      ),
      scope: 'member',
      requireAfter: new RegExp(`^${C_AFTER_PARAMS}(?:=\\s*\\w+\\s*)?[{;]`),
    },
    {
      pattern: /^[ \t]*(?:(?:explicit|virtual|inline|constexpr)[ \t]+)*(?<name>~?[A-Za-z_]\w*)[ \t]*\(/gm,
      scope: 'member',
      requireAfter: /^\s*(?:noexcept\b\s*)?(?::[^{;]*)?(?:=\s*\w+\s*)?[{;]/,
    },
  ],
  types: [
    {
      pattern: /(?<![<,][ \t]*)(?<!\benum[ \t]+)\b(?<kind>enum[ \t]+class|enum[ \t]+struct|class|struct|union|enum)[ \t]+(?:alignas\([^)]*\)[ \t]*)?(?<name>[A-Za-z_]\w*)/g,
      body: 'required',
      headerGuard: /[(=]/,
      bases: (header) => basesAfterColon(header.replace(/\bfinal\b/, '')),
    },
  ],
  reserved: reserved('operator'),
};

// ============================================================================
// PHP
// ============================================================================

const php: Dialect = {
  family: 'brace',
  paramStyle: 'c-like',
  imports: [
    {
      pattern: /\b(?:require|include)(?:_once)?\s*\(?\s*(__DIR__\s*\.\s*)?["']([^"'\n]+)["']/g,
      tokens: (match) => {
        const path = match[2];
        if (!match[1]) return [path];
        return [path.startsWith('/') ? `.${path}` : `./${path}`];
      },
    },
    {
      pattern: /^[ \t]*use[ \t]+(?!function\b|const\b)([\w\\]+)(?:[ \t]*\\?\{[^}]*\})?(?:[ \t]+as[ \t]+\w+)?[ \t]*;/gm,
      tokens: (match) => [match[1].replace(/^\\+|\\+$/g, '')],
    },
  ],
  functions: [
    { pattern: /(?<![\w$>:])function[ \t]*&?[ \t]*(?<name>[A-Za-z_]\w*)[ \t]*\(/g },
  ],
  types: [
    {
      pattern: /(?<![\w$>:])(?:(?:abstract|final|readonly)[ \t]+)*(?<kind>class|interface|trait|enum)[ \t]+(?<name>[A-Za-z_]\w*)/g,
      body: 'required',
      bases: (header) => basesAfterKeywords(header.replace(/^\s*:\s*\w+/, ''), ['extends', 'implements']),
    },
  ],
  reserved: reserved(),
};

// ============================================================================
// SWIFT
// ============================================================================

const swift: Dialect = {
  family: 'brace',
  paramStyle: 'annotated',
  newlineEndsHeader: true,
  imports: [
    { pattern: /^[ \t]*(?:@\w+[ \t]+)*import[ \t]+(?:(?:typealias|struct|class|enum|protocol|let|var|func)[ \t]+)?([\w.]+)/gm },
  ],
  functions: [
    { pattern: /(?<![\w.])func[ \t]+(?<name>[A-Za-z_]\w*)[ \t]*(?:<[^>\n]*>)?[ \t]*\(/g },
    {
      pattern: /(?<![\w.])(?<name>init)[?!]?[ \t]*(?:<[^>\n]*>)?[ \t]*\(/g,
      scope: 'member',
      requireAfter: /^\s*(?:(?:throws|rethrows|async)\b\s*)*\{/,
    },
  ],
  types: [
    {
      pattern: /(?<![\w.])(?<kind>class|struct|enum|protocol|actor)[ \t]+(?<name>[A-Za-z_]\w*)/g,
      body: 'optional',
      bases: (header) => basesAfterColon(header, { stopAt: /\bwhere\b/ }),
    },
    {
      pattern: /(?<![\w.])extension[ \t]+(?<name>[A-Za-z_][\w.]*)/g,
      declares: false,
      spanName: (_header, groups) => ownerName(groups.name),
    },
  ],
  reserved: reserved('init'),
};

// ============================================================================
// RUBY
// ============================================================================

const rubyBlocks: KeywordBlocks = {
  opens(line) {
    const leading = /^\s*(class|module|def|if|unless|while|until|case|begin|for)\b/.exec(line);
    // `while x do` opens a single block
    const loopHeader = leading !== null && /^(while|until|for)$/.test(leading[1]);
    const dos = loopHeader ? 0 : (line.match(/\bdo\b/g) ?? []).length;
    return (leading ? 1 : 0) + dos;
  },
  closes(line) {
    return (line.match(/(?<![.\w:])end\b(?![?!])/g) ?? []).length;
  },
};

const ruby: Dialect = {
  family: 'keyword',
  paramStyle: 'annotated',
  keywordBlocks: rubyBlocks,
  imports: [
    { pattern: /^[ \t]*require[ \t]*\(?[ \t]*["']([^"'\n]+)["']/gm },
    {
      pattern: /^[ \t]*require_relative[ \t]*\(?[ \t]*["']([^"'\n]+)["']/gm,
      tokens: (match) => [match[1].startsWith('.') ? match[1] : `./${match[1]}`],
    },
  ],
  functions: [
    { pattern: /^[ \t]*def[ \t]+(?:self\.)?(?<name>[A-Za-z_]\w*[?!=]?)/gm, params: 'optional' },
  ],
  types: [
    {
      pattern: /^[ \t]*class[ \t]+(?<name>[A-Z][\w:]*)(?:[ \t]*<[ \t]*(?<base>[A-Z][\w:]*))?/gm,
      kind: 'class',
      bases: (_header, groups) => (groups.base ? [groups.base] : []),
    },
    { pattern: /^[ \t]*module[ \t]+(?<name>[A-Z][\w:]*)/gm, kind: 'module' },
  ],
  reserved: reserved(),
};

// ============================================================================
// LUA, SHELL, MAKE
// ============================================================================

const lua: Dialect = {
  family: 'keyword',
  paramStyle: 'annotated',
  imports: [{ pattern: /\brequire[ \t]*\(?[ \t]*["']([^"'\n]+)["']/g }],
  functions: [
    { pattern: /(?<![\w.])(?:local[ \t]+)?function[ \t]+(?:(?<owner>[\w.]+)[.:])?(?<name>[A-Za-z_]\w*)[ \t]*\(/g },
    { pattern: /(?<![\w.])(?:local[ \t]+)?(?:(?<owner>[\w.]+)\.)?(?<name>[A-Za-z_]\w*)[ \t]*=[ \t]*function[ \t]*\(/g },
  ],
  types: [],
  reserved: reserved(),
};

function shellSourceToken(raw: string): string {
  const unquoted = raw.replace(/["']/g, '');
  const rooted = unquoted.replace(/^(?:\$\{?\w+\}?|\$\([^)]*\))\//, './');
  return rooted;
}

const shell: Dialect = {
  family: 'brace',
  paramStyle: 'none',
  imports: [
    {
      pattern: /^[ \t]*(?:source|\.)[ \t]+("[^"\n]+"|'[^'\n]+'|[^\s;&|]+)/gm,
      tokens: (match) => [shellSourceToken(match[1])],
    },
  ],
  functions: [
    { pattern: /^[ \t]*(?:function[ \t]+)?(?<name>[A-Za-z_][\w:-]*)[ \t]*\([ \t]*\)/gm, params: 'none' },
    { pattern: /^[ \t]*function[ \t]+(?<name>[A-Za-z_][\w:-]*)[ \t]*(?=\{|$)/gm, params: 'none' },
  ],
  types: [],
  reserved: reserved(),
};

const make: Dialect = {
  family: 'keyword',
  paramStyle: 'none',
  imports: [
    {
      pattern: /^[ \t]*-?include[ \t]+([^\n]+)/gm,
      tokens: (match) => match[1].trim().split(/\s+/).filter((token) => !token.includes('$')),
    },
  ],
  functions: [],
  types: [],
};

// ============================================================================
// LOOKUP
// ============================================================================

const DIALECTS: Partial<Record<LanguageTag, Dialect>> = {
  typescript: ecmascript,
  javascript: ecmascript,
  python,
  go,
  rust,
  java,
  kotlin,
  csharp,
  c: cFamily,
  cpp: cFamily,
  ruby,
  php,
  swift,
  lua,
  shell,
  make,
};

/**
 * Parser dialect for a language, `undefined` for inert languages.
 */
export function getDialect(language: LanguageTag): Dialect | undefined {
  return DIALECTS[language];
}
