/**
 * navindex - Shared Recognizers
 *
 * Pattern-based extraction shared by every dialect. A dialect contributes
 * rules; this module walks them over the source views, finds declaration
 * bodies per block family and attributes methods to their types.
 *
 * @module parser/recognizers
 */

import type { ClassKind, ParsedStructure } from '../types/index.js';
import type { SourceText } from './source-text.js';
import type { Dialect, FunctionRule, ParamStyle, TypeRule } from './types.js';

type Groups = Record<string, string | undefined>;
type FunctionDecl = ParsedStructure['functions'][number];
type ClassDecl = ParsedStructure['classes'][number];

interface Span {
  name: string;
  /** Offset of the opening brace, or start of the header line */
  start: number;
  /** Offset of the closing brace, or end of the last body line */
  end: number;
  /** Brace depth of direct members (brace family) */
  bodyDepth: number;
  isType: boolean;
}

// ============================================================================
// TEXT HELPERS
// ============================================================================

const OPENERS = '([{<';
const CLOSERS = ')]}>';

/**
 * Split on separators that sit outside any bracket pair. `>` that belongs
 * to `=>` or `->` does not close anything.
 */
export function splitTopLevel(text: string, separators = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (OPENERS.includes(ch)) {
      depth++;
    } else if (CLOSERS.includes(ch)) {
      const arrow = ch === '>' && (text[i - 1] === '=' || text[i - 1] === '-');
      if (!arrow) depth = Math.max(0, depth - 1);
    } else if (depth === 0 && separators.includes(ch)) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Remove every bracketed group (nested included) delimited by `open`/`close`.
 */
export function stripBalanced(text: string, open: string, close: string): string {
  let depth = 0;
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === open) {
      depth++;
      continue;
    }
    if (ch === close && depth > 0) {
      const arrow = close === '>' && (text[i - 1] === '=' || text[i - 1] === '-');
      if (!arrow) {
        depth--;
        continue;
      }
    }
    if (depth === 0) out += ch;
  }
  return out;
}

/**
 * Index of the first `target` outside brackets, skipping `::`, `=>`, `==`
 * and comparison operators.
 */
function topLevelIndex(text: string, target: ':' | '='): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (OPENERS.includes(ch)) depth++;
    else if (CLOSERS.includes(ch)) {
      const arrow = ch === '>' && (text[i - 1] === '=' || text[i - 1] === '-');
      if (!arrow) depth = Math.max(0, depth - 1);
    } else if (depth === 0 && ch === target) {
      const next = text[i + 1];
      const prev = text[i - 1];
      if (target === ':' && (next === ':' || prev === ':')) continue;
      if (target === '=' && (next === '=' || next === '>' || '=!<>'.includes(prev ?? ''))) continue;
      return i;
    }
  }
  return -1;
}

function cutAt(text: string, index: number): string {
  return index === -1 ? text : text.slice(0, index);
}

const IDENTIFIER = /[A-Za-z_$][\w$]*/g;

function identifiers(text: string): string[] {
  return text.match(IDENTIFIER) ?? [];
}

// ============================================================================
// PARAMETERS
// ============================================================================

function annotatedName(piece: string): string | undefined {
  let head = cutAt(piece, topLevelIndex(piece, '='));
  head = cutAt(head, topLevelIndex(head, ':')).trim();
  // destructuring patterns have no single name
  if (/^[[{(]/.test(head)) return undefined;
  const ids = identifiers(head);
  return ids[ids.length - 1];
}

function cLikeName(piece: string): string | undefined {
  const head = cutAt(piece, topLevelIndex(piece, '='));
  const pointer = /\(\s*[*&^]\s*([A-Za-z_]\w*)\s*\)/.exec(head);
  if (pointer) return pointer[1];

  const cleaned = stripBalanced(stripBalanced(head, '<', '>'), '[', ']')
    .replace(/@\w+(?:\([^)]*\))?/g, ' ')
    .replace(/\.\.\./g, ' ');
  const ids = identifiers(cleaned);
  const last = ids[ids.length - 1];
  if (last === undefined) return undefined;
  if (last.startsWith('$')) return last.slice(1) || undefined;
  // a lone type (`void`, an unnamed prototype parameter) carries no name
  return ids.length > 1 ? last : undefined;
}

function goName(piece: string): string | undefined {
  return identifiers(piece)[0];
}

/**
 * Parameter names from the text between a declaration's parentheses.
 */
export function parameterNames(text: string, style: ParamStyle): string[] {
  if (style === 'none') return [];
  const names: string[] = [];
  for (const piece of splitTopLevel(text)) {
    const name =
      style === 'annotated' ? annotatedName(piece) : style === 'c-like' ? cLikeName(piece) : goName(piece);
    if (name) names.push(name);
  }
  return names;
}

// ============================================================================
// SUPERTYPES
// ============================================================================

function cleanTypeName(text: string): string {
  return stripBalanced(stripBalanced(text, '(', ')'), '[', ']')
    .replace(/^\\/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Supertypes listed after keywords such as `extends` and `implements`.
 */
export function basesAfterKeywords(header: string, keywords: string[]): string[] {
  const text = stripBalanced(header, '<', '>');
  const pattern = new RegExp(`\\b(?:${keywords.join('|')})\\b`, 'g');
  const positions = [...text.matchAll(pattern)].map((match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));

  const bases: string[] = [];
  positions.forEach((position, i) => {
    const next = positions[i + 1];
    const segment = text.slice(position.end, next ? next.start : text.length);
    for (const piece of splitTopLevel(segment)) {
      const name = cleanTypeName(piece);
      if (name) bases.push(name);
    }
  });
  return bases;
}

const ACCESS_WORDS = new Set(['public', 'private', 'protected', 'virtual', 'internal']);

/**
 * Supertypes listed after a single `:` (C++, C#, Kotlin, Swift, Rust traits).
 */
export function basesAfterColon(
  header: string,
  options: { separators?: string; stopAt?: RegExp } = {}
): string[] {
  const text = stripBalanced(header, '<', '>');
  const colon = /(?<!:):(?!:)/.exec(text);
  if (!colon) return [];

  let rest = text.slice(colon.index + 1);
  if (options.stopAt) {
    const stop = options.stopAt.exec(rest);
    if (stop) rest = rest.slice(0, stop.index);
  }

  const bases: string[] = [];
  for (const piece of splitTopLevel(rest, options.separators ?? ',')) {
    const words = cleanTypeName(piece)
      .split(' ')
      .filter((word) => word.length > 0 && !ACCESS_WORDS.has(word));
    if (words[0]) bases.push(words[0]);
  }
  return bases;
}

/**
 * Supertypes from a captured parenthesized list: `Base, Mixin, metaclass=M`.
 */
export function basesFromList(list: string | undefined): string[] {
  if (!list) return [];
  return splitTopLevel(list)
    .filter((piece) => topLevelIndex(piece, '=') === -1)
    .map(cleanTypeName)
    .filter((name) => name.length > 0);
}

// ============================================================================
// OWNERS
// ============================================================================

/**
 * Bare type name from a receiver or qualifier: `s *Server[T]` -> `Server`,
 * `ns::Widget::` -> `Widget`, `M.sub` -> `sub`.
 */
export function ownerName(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const stripped = stripBalanced(stripBalanced(raw, '<', '>'), '[', ']')
    .replace(/[*&]/g, ' ')
    .trim();
  const lastWord = stripped.split(/\s+/).pop() ?? '';
  const segments = lastWord.split(/::|\.|:/).filter((segment) => segment.length > 0);
  return segments[segments.length - 1];
}

// ============================================================================
// KINDS
// ============================================================================

const KIND_BY_KEYWORD: Record<string, ClassKind> = {
  class: 'class',
  record: 'class',
  'record class': 'class',
  actor: 'class',
  interface: 'interface',
  '@interface': 'interface',
  struct: 'struct',
  'record struct': 'struct',
  union: 'struct',
  enum: 'enum',
  'enum class': 'enum',
  'enum struct': 'enum',
  trait: 'trait',
  type: 'type',
  module: 'module',
  namespace: 'module',
  protocol: 'protocol',
  object: 'object',
};

function kindOf(keyword: string | undefined, fallback: ClassKind | undefined): ClassKind {
  if (keyword) {
    const kind = KIND_BY_KEYWORD[keyword.replace(/\s+/g, ' ')];
    if (kind) return kind;
  }
  return fallback ?? 'class';
}

// ============================================================================
// IMPORTS
// ============================================================================

/**
 * Raw import tokens in order of appearance, de-duplicated.
 */
export function extractImports(source: SourceText, dialect: Dialect): string[] {
  const found: Array<{ index: number; order: number; token: string }> = [];
  let order = 0;

  for (const rule of dialect.imports) {
    for (const match of source.code.matchAll(rule.pattern)) {
      const index = match.index ?? 0;
      const lead = match[0].length - match[0].trimStart().length;
      // a keyword inside a string literal is blanked in the skeleton
      if (source.skeleton[index + lead] !== source.code[index + lead]) continue;

      const tokens = rule.tokens ? rule.tokens(match) : [match[1] ?? ''];
      for (const token of tokens) {
        const trimmed = token.trim();
        if (trimmed) found.push({ index, order: order++, token: trimmed });
      }
    }
  }

  found.sort((a, b) => a.index - b.index || a.order - b.order);
  const seen = new Set<string>();
  const tokens: string[] = [];
  for (const { token } of found) {
    if (seen.has(token)) continue;
    seen.add(token);
    tokens.push(token);
  }
  return tokens;
}

// ============================================================================
// BLOCK SPANS
// ============================================================================

const MAX_HEADER_LENGTH = 2000;

/**
 * Find where a type header ends: at its body `{`, at a `;`, at a stray `}`,
 * or for newline-terminated languages at a line break outside parentheses.
 */
function findHeaderEnd(
  skeleton: string,
  from: number,
  newlineEnds: boolean
): { end: number; terminator: '{' | 'other' } {
  let parens = 0;
  const limit = Math.min(skeleton.length, from + MAX_HEADER_LENGTH);
  for (let i = from; i < limit; i++) {
    const ch = skeleton[i];
    if (ch === '(') parens++;
    else if (ch === ')') parens = Math.max(0, parens - 1);
    else if (ch === '{' && parens === 0) return { end: i, terminator: '{' };
    else if ((ch === ';' || ch === '}') && parens === 0) return { end: i, terminator: 'other' };
    else if (ch === '\n' && newlineEnds && parens === 0) {
      const sofar = skeleton.slice(from, i).trim();
      if (sofar.length > 0 && !/[,:]$/.test(sofar)) return { end: i, terminator: 'other' };
    }
  }
  return { end: limit, terminator: 'other' };
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Indentation block: from the header line to the last line indented deeper
 * than it. Scanning starts after `bodyFrom` so continuation lines of a
 * multi-line header never close the block.
 */
function indentSpan(source: SourceText, headerLine: number, bodyFrom: number): { start: number; end: number } {
  const indent = indentOf(source.skeletonLine(headerLine));
  let last = source.lineAt(bodyFrom);
  for (let line = last + 1; line <= source.lineTotal; line++) {
    const text = source.skeletonLine(line);
    if (text.trim().length === 0) continue;
    if (indentOf(text) <= indent) break;
    last = line;
  }
  return { start: source.lineStart(headerLine), end: source.lineEnd(last) };
}

/**
 * Keyword block: from the header line until openers and `end`s balance.
 */
function keywordSpan(source: SourceText, dialect: Dialect, headerLine: number): { start: number; end: number } {
  const blocks = dialect.keywordBlocks;
  let depth = 0;
  let line = headerLine;
  for (; line <= source.lineTotal; line++) {
    const text = source.skeletonLine(line);
    depth += blocks ? blocks.opens(text) - blocks.closes(text) : 0;
    if (depth <= 0) break;
  }
  return { start: source.lineStart(headerLine), end: source.lineEnd(Math.min(line, source.lineTotal)) };
}

function innermost(spans: Span[], offset: number, exclude?: Span): Span | undefined {
  let best: Span | undefined;
  for (const span of spans) {
    if (span === exclude) continue;
    if (span.start < offset && offset <= span.end) {
      if (!best || span.start >= best.start) best = span;
    }
  }
  return best;
}

// ============================================================================
// DECLARATIONS
// ============================================================================

function matchGroups(match: RegExpMatchArray): Groups {
  return match.groups ?? {};
}

function namePosition(match: RegExpMatchArray, name: string): number {
  const index = match.index ?? 0;
  const within = match[0].lastIndexOf(name);
  return within === -1 ? index : index + within;
}

interface TypeHit {
  decl?: ClassDecl;
  span?: Span;
  offset: number;
}

function collectTypes(source: SourceText, dialect: Dialect): TypeHit[] {
  const hits: TypeHit[] = [];
  const seen = new Set<string>();

  for (const rule of dialect.types) {
    for (const match of source.skeleton.matchAll(rule.pattern)) {
      const hit = typeHit(source, dialect, rule, match);
      if (!hit) continue;
      const key = `${hit.offset}`;
      if (seen.has(key)) continue;
      seen.add(key);
      hits.push(hit);
    }
  }

  return hits.sort((a, b) => a.offset - b.offset);
}

function typeHit(source: SourceText, dialect: Dialect, rule: TypeRule, match: RegExpMatchArray): TypeHit | undefined {
  const groups = matchGroups(match);
  const rawName = groups.name;
  const declares = rule.declares !== false;
  if (declares && (!rawName || dialect.reserved?.has(rawName))) return undefined;

  const offset = namePosition(match, rawName ?? match[0]);
  const line = source.lineAt(offset);
  const headerStart = (match.index ?? 0) + match[0].length;
  let header = '';
  let span: { start: number; end: number; bodyDepth: number } | undefined;

  if (dialect.family === 'brace') {
    if (rule.body === 'none') {
      header = source.skeleton.slice(headerStart, source.lineEnd(source.lineAt(headerStart)));
    } else {
      const { end, terminator } = findHeaderEnd(source.skeleton, headerStart, dialect.newlineEndsHeader ?? false);
      header = source.skeleton.slice(headerStart, end);
      if (rule.headerGuard?.test(header)) return undefined;
      if (terminator === '{') {
        const braces = source.braceStructure();
        span = {
          start: end,
          end: braces.closeOf.get(end) ?? source.skeleton.length,
          bodyDepth: braces.depth[end] + 1,
        };
      } else if (rule.body === 'required' || !declares) {
        return undefined;
      }
    }
  } else if (dialect.family === 'indent') {
    span = { ...indentSpan(source, line, headerStart), bodyDepth: 0 };
  } else {
    span = { ...keywordSpan(source, dialect, line), bodyDepth: 0 };
  }

  const name = declares ? rawName : rule.spanName?.(header, groups) ?? rawName;
  if (!name) return undefined;

  const spanEntry: Span | undefined = span ? { name, isType: true, ...span } : undefined;
  if (!declares) return { span: spanEntry, offset };

  return {
    decl: {
      name,
      line,
      kind: kindOf(groups.kind, rule.kind),
      bases: rule.bases?.(header, groups) ?? [],
      methodCount: 0,
    },
    span: spanEntry,
    offset,
  };
}

interface FunctionHit {
  decl: FunctionDecl;
  offset: number;
  rule: FunctionRule;
  explicitOwner?: string;
  /** Offset where the body search starts (indent family) */
  bodyFrom: number;
}

function functionHit(source: SourceText, dialect: Dialect, rule: FunctionRule, match: RegExpMatchArray): FunctionHit | undefined {
  const groups = matchGroups(match);
  const name = groups.name;
  if (!name || dialect.reserved?.has(name)) return undefined;

  const matchEnd = (match.index ?? 0) + match[0].length;
  const mode = rule.params ?? 'parens';
  let params: string[] = [];
  let after = matchEnd;

  const readParens = (open: number): boolean => {
    const close = source.matchParen(open);
    if (close === -1) return false;
    params = parameterNames(source.skeleton.slice(open + 1, close), dialect.paramStyle);
    after = close + 1;
    return true;
  };

  if (mode === 'parens') {
    const open = matchEnd - 1;
    if (source.skeleton[open] !== '(' || !readParens(open)) return undefined;
  } else if (mode === 'optional') {
    const rest = source.skeleton.slice(matchEnd, source.lineEnd(source.lineAt(matchEnd)));
    const gap = rest.length - rest.trimStart().length;
    if (rest[gap] === '(') {
      if (!readParens(matchEnd + gap)) return undefined;
    } else {
      const inline = rest.split(';')[0];
      params = parameterNames(inline, dialect.paramStyle);
      after = matchEnd + rest.length;
    }
  }

  if (rule.requireAfter && !rule.requireAfter.test(source.skeleton.slice(after, after + 400))) {
    return undefined;
  }

  const offset = namePosition(match, name);
  return {
    decl: { name, line: source.lineAt(offset), params },
    offset,
    rule,
    explicitOwner: ownerName(groups.owner),
    bodyFrom: after,
  };
}

/**
 * Functions and types of one file, with methods attributed to their
 * enclosing (or receiver) type and method counts filled in.
 */
export function extractDeclarations(
  source: SourceText,
  dialect: Dialect
): Pick<ParsedStructure, 'functions' | 'classes'> {
  const typeHits = collectTypes(source, dialect);
  const typeSpans = typeHits.flatMap((hit) => (hit.span ? [hit.span] : []));

  const functionHits: FunctionHit[] = [];
  const seen = new Set<string>();
  for (const rule of dialect.functions) {
    for (const match of source.skeleton.matchAll(rule.pattern)) {
      const hit = functionHit(source, dialect, rule, match);
      if (!hit) continue;
      const key = `${hit.decl.line}:${hit.decl.name}`;
      if (seen.has(key)) continue;
      seen.add(key);
      functionHits.push(hit);
    }
  }
  functionHits.sort((a, b) => a.offset - b.offset);

  // Indentation-scoped functions shadow the classes around them
  const functionSpans = new Map<FunctionHit, Span>();
  if (dialect.family === 'indent') {
    for (const hit of functionHits) {
      functionSpans.set(hit, {
        name: hit.decl.name,
        isType: false,
        bodyDepth: 0,
        ...indentSpan(source, hit.decl.line, hit.bodyFrom),
      });
    }
  }
  const allSpans = [...typeSpans, ...functionSpans.values()];
  const depth = dialect.family === 'brace' ? source.braceStructure().depth : undefined;

  const functions: FunctionDecl[] = [];
  for (const hit of functionHits) {
    let owner: string | undefined;

    if (depth) {
      const container = innermost(typeSpans, hit.offset);
      const direct = container !== undefined && depth[hit.offset] === container.bodyDepth;
      if (hit.rule.scope === 'member' && !direct) continue;
      if (direct && container) owner = container.name;
    } else {
      const container = innermost(allSpans, hit.offset, functionSpans.get(hit));
      if (hit.rule.scope === 'member' && !container?.isType) continue;
      if (container?.isType) owner = container.name;
    }

    owner = hit.explicitOwner ?? owner;
    functions.push(owner ? { ...hit.decl, owner } : hit.decl);
  }

  const classes: ClassDecl[] = [];
  for (const hit of typeHits) {
    if (!hit.decl) continue;
    const name = hit.decl.name;
    classes.push({
      ...hit.decl,
      methodCount: functions.filter((fn) => fn.owner === name).length,
    });
  }

  return { functions, classes };
}
