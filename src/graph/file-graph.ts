/**
 * navindex - File Graph
 *
 * Directed file-level import graph. Files are keyed by path and edges kept
 * as one flat list; degrees and neighbor sets are derived from that list,
 * so the graph never holds back-references between files.
 *
 * @module graph/file-graph
 */

import type { FileRecord, ImportEdge } from '../types/index.js';
import { CycleDetector } from './cycle-detector.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Degree {
  in: number;
  out: number;
}

export interface GraphStats {
  files: number;
  edges: number;
  resolvedEdges: number;
  unresolvedEdges: number;
}

// ============================================================================
// FILE GRAPH
// ============================================================================

/**
 * @example
 * ```ts
 * const graph = FileGraph.build(records, edges);
 * graph.inDegree('src/utils.ts');
 * graph.weaklyConnectedComponents();
 * ```
 */
export class FileGraph {
  private readonly filesByPath: ReadonlyMap<string, FileRecord>;
  private readonly edgeList: readonly ImportEdge[];
  private readonly outgoing = new Map<string, string[]>();
  private readonly incoming = new Map<string, string[]>();
  private readonly unresolved = new Map<string, number>();

  private constructor(records: readonly FileRecord[], edges: readonly ImportEdge[]) {
    this.filesByPath = new Map(records.map((record) => [record.path, record]));
    this.edgeList = edges;

    for (const record of records) {
      this.outgoing.set(record.path, []);
      this.incoming.set(record.path, []);
    }

    for (const edge of edges) {
      if (edge.target === undefined) {
        this.unresolved.set(edge.source, (this.unresolved.get(edge.source) ?? 0) + 1);
        continue;
      }
      this.outgoing.get(edge.source)?.push(edge.target);
      this.incoming.get(edge.target)?.push(edge.source);
    }
  }

  /**
   * Aggregate records and resolved edges. Edges whose endpoints are not
   * records are kept in the edge list but contribute no degree.
   */
  static build(records: readonly FileRecord[], edges: readonly ImportEdge[]): FileGraph {
    return new FileGraph(records, edges);
  }

  // ==========================================================================
  // File Queries
  // ==========================================================================

  has(path: string): boolean {
    return this.filesByPath.has(path);
  }

  getFile(path: string): FileRecord | undefined {
    return this.filesByPath.get(path);
  }

  /** All file paths in lexical order */
  paths(): string[] {
    return [...this.filesByPath.keys()].sort();
  }

  files(): FileRecord[] {
    return this.paths().flatMap((path) => {
      const record = this.filesByPath.get(path);
      return record ? [record] : [];
    });
  }

  edges(): readonly ImportEdge[] {
    return this.edgeList;
  }

  // ==========================================================================
  // Degree and Neighbor Queries
  // ==========================================================================

  /**
   * Number of resolved edges pointing at `path`
   */
  inDegree(path: string): number {
    return this.incoming.get(path)?.length ?? 0;
  }

  /**
   * Number of resolved edges leaving `path`
   */
  outDegree(path: string): number {
    return this.outgoing.get(path)?.length ?? 0;
  }

  unresolvedCount(path: string): number {
    return this.unresolved.get(path) ?? 0;
  }

  /** Distinct import targets of `path`, lexical order */
  successors(path: string): string[] {
    return uniqueSorted(this.outgoing.get(path) ?? []);
  }

  /** Distinct importers of `path`, lexical order */
  predecessors(path: string): string[] {
    return uniqueSorted(this.incoming.get(path) ?? []);
  }

  degreeMap(): Map<string, Degree> {
    const degrees = new Map<string, Degree>();
    for (const path of this.paths()) {
      degrees.set(path, { in: this.inDegree(path), out: this.outDegree(path) });
    }
    return degrees;
  }

  stats(): GraphStats {
    const resolvedEdges = this.edgeList.filter((edge) => edge.target !== undefined).length;
    return {
      files: this.filesByPath.size,
      edges: this.edgeList.length,
      resolvedEdges,
      unresolvedEdges: this.edgeList.length - resolvedEdges,
    };
  }

  // ==========================================================================
  // Structure
  // ==========================================================================

  /**
   * Components of the graph with edge direction ignored. Members are in
   * lexical order; components are ordered by their first member.
   */
  weaklyConnectedComponents(): string[][] {
    const parent = new Map<string, string>();
    for (const path of this.filesByPath.keys()) parent.set(path, path);

    const find = (node: string): string => {
      let root = node;
      for (let next = parent.get(root); next !== undefined && next !== root; next = parent.get(root)) {
        root = next;
      }
      // Path compression
      let current = node;
      while (current !== root) {
        const next = parent.get(current) ?? root;
        parent.set(current, root);
        current = next;
      }
      return root;
    };

    for (const [source, targets] of this.outgoing) {
      for (const target of targets) {
        if (!parent.has(target)) continue;
        const a = find(source);
        const b = find(target);
        if (a !== b) parent.set(a < b ? b : a, a < b ? a : b);
      }
    }

    const groups = new Map<string, string[]>();
    for (const path of this.paths()) {
      const root = find(path);
      const members = groups.get(root);
      if (members) members.push(path);
      else groups.set(root, [path]);
    }

    return [...groups.values()].sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  }

  /**
   * Import cycles: strongly connected components of two or more files,
   * plus files importing themselves.
   */
  findCycles(): string[][] {
    const adjacency = new Map<string, string[]>();
    for (const path of this.paths()) adjacency.set(path, this.successors(path));
    return new CycleDetector(adjacency).detectCycles();
  }
}

function uniqueSorted(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}
