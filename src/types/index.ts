/**
 * navindex - Core Types
 * @module types
 *
 * Shared shapes of the navigation index. Everything the assembler returns
 * is deeply frozen, so these are declared readonly where callers could
 * otherwise be tempted to mutate.
 */

// =============================================================================
// Languages
// =============================================================================

/**
 * Languages the classifier recognizes. Only the code languages carry a
 * parser dialect; the rest become inert records.
 */
export type LanguageTag =
  | 'typescript'
  | 'javascript'
  | 'python'
  | 'go'
  | 'rust'
  | 'java'
  | 'kotlin'
  | 'csharp'
  | 'c'
  | 'cpp'
  | 'ruby'
  | 'php'
  | 'swift'
  | 'lua'
  | 'shell'
  | 'make'
  | 'json'
  | 'yaml'
  | 'toml'
  | 'markdown'
  | 'html'
  | 'css'
  | 'sql'
  | 'dockerfile'
  | 'cmake';

export type FileLanguage = LanguageTag | 'unknown';

// =============================================================================
// Per-file Structure
// =============================================================================

export interface FunctionEntry {
  name: string;
  /** Repo-relative path of the declaring file */
  file: string;
  /** 1-based line of the declaration header */
  line: number;
  /** Parameter names in declaration order, best effort */
  params: string[];
  /** Enclosing or receiver type when the function is a method */
  owner?: string;
}

export type ClassKind =
  | 'class'
  | 'interface'
  | 'struct'
  | 'enum'
  | 'trait'
  | 'type'
  | 'module'
  | 'protocol'
  | 'object';

export interface ClassEntry {
  name: string;
  file: string;
  line: number;
  kind: ClassKind;
  /** Declared supertypes in source order */
  bases: string[];
  methodCount: number;
}

/**
 * - `parsed`: structure extracted, freshly or from the parse cache
 * - `skipped`: no dialect for the language, kept as an inert record
 * - `failed`: the parser rejected the file, kept with empty structure
 */
export type ParseStatus = 'parsed' | 'skipped' | 'failed';

export interface FileRecord {
  path: string;
  language: FileLanguage;
  size: number;
  lineCount: number;
  /** sha-256 hex digest of the file bytes */
  fingerprint: string;
  /** Raw import tokens, first-seen order, de-duplicated */
  imports: string[];
  functions: FunctionEntry[];
  classes: ClassEntry[];
  parseStatus: ParseStatus;
}

// =============================================================================
// Parse Results
// =============================================================================

/**
 * What the structural parser produces. Entries carry no file path: the
 * same result is shared by every file with identical bytes.
 */
export interface ParsedStructure {
  imports: string[];
  functions: Array<Omit<FunctionEntry, 'file'>>;
  classes: Array<Omit<ClassEntry, 'file'>>;
  lineCount: number;
}

// =============================================================================
// Graph
// =============================================================================

export type ResolutionConfidence = 'exact' | 'heuristic' | 'unresolved';

export interface ImportEdge {
  source: string;
  token: string;
  /** Absent exactly when confidence is `unresolved` */
  target?: string;
  confidence: ResolutionConfidence;
}

export type EntryPointReason = 'filename-pattern' | 'graph-shape';

export interface EntryPointCandidate {
  path: string;
  reason: EntryPointReason;
  justification: string;
}

export type NavigationPathKind = 'entry-to-hub' | 'isolated-component';

export interface NavigationPath {
  kind: NavigationPathKind;
  label: string;
  files: string[];
  detail: string;
}

// =============================================================================
// Index
// =============================================================================

export interface IndexWarning {
  path: string;
  message: string;
}

export interface IndexDiagnostics {
  totalFiles: number;
  parsedFiles: number;
  skippedFiles: number;
  failedFiles: number;
  resolvedEdges: number;
  unresolvedEdges: number;
  /** Files per language tag, keys sorted */
  languages: Record<string, number>;
  cancelled: boolean;
  warnings: IndexWarning[];
}

export interface NavigationIndex {
  /** Index schema version */
  version: string;
  /** Display name of the indexed root */
  root: string;
  files: FileRecord[];
  edges: ImportEdge[];
  entryPoints: EntryPointCandidate[];
  paths: NavigationPath[];
  /** Import cycles, each a lexically sorted list of files */
  cycles: string[][];
  diagnostics: IndexDiagnostics;
}

// =============================================================================
// Inputs and Run Reporting
// =============================================================================

/**
 * One file handed to the indexer by a scanner or an embedding caller.
 */
export interface SourceInput {
  /** Repo-relative path */
  path: string;
  content: Uint8Array;
  size: number;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 when nothing was looked up */
  hitRate: number;
}

/**
 * Facts about a run that must not leak into the index itself.
 */
export interface IndexRunReport {
  startedAt: string;
  durationMs: number;
  phases: Record<string, number>;
  /** Files whose structure came from the parse cache */
  cachedFiles: number;
  cache: CacheStats | null;
}

export interface IndexRunResult {
  index: NavigationIndex;
  report: IndexRunReport;
}
