/**
 * Cycle Detection for the File Graph
 *
 * Implements Tarjan's algorithm for finding strongly connected components
 * (SCCs) to detect import cycles.
 *
 * @module graph/cycle-detector
 */

// ============================================================================
// TYPES
// ============================================================================

/**
 * Successor lists keyed by node, neighbors in visiting order
 */
export type Adjacency = ReadonlyMap<string, readonly string[]>;

/** One node being visited: its next neighbor and running lowlink */
interface Frame {
  node: string;
  neighbors: readonly string[];
  next: number;
  low: number;
}

// ============================================================================
// CYCLE DETECTOR
// ============================================================================

/**
 * Detects cycles in a directed graph using Tarjan's SCC algorithm.
 * A cycle is an SCC with more than one node, or a node importing itself.
 *
 * @example
 * ```ts
 * const detector = new CycleDetector(adjacency);
 * const cycles = detector.detectCycles();
 * ```
 */
export class CycleDetector {
  constructor(private readonly adjacency: Adjacency) {}

  /**
   * Each cycle's members in lexical order, cycles ordered by first member.
   * Iterative, so chains of any depth stay off the call stack.
   */
  detectCycles(): string[][] {
    const index = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const sccs: string[][] = [];

    for (const start of [...this.adjacency.keys()].sort()) {
      if (index.has(start)) continue;

      const work: Frame[] = [];
      const visit = (node: string): void => {
        const order = index.size;
        index.set(node, order);
        stack.push(node);
        onStack.add(node);
        work.push({ node, neighbors: this.adjacency.get(node) ?? [], next: 0, low: order });
      };
      visit(start);

      while (work.length > 0) {
        const frame = work[work.length - 1];
        if (frame.next < frame.neighbors.length) {
          const neighbor = frame.neighbors[frame.next++];
          const neighborIndex = index.get(neighbor);
          if (neighborIndex === undefined) {
            visit(neighbor);
          } else if (onStack.has(neighbor)) {
            frame.low = Math.min(frame.low, neighborIndex);
          }
          continue;
        }

        work.pop();
        const parent = work[work.length - 1];
        if (parent !== undefined) parent.low = Math.min(parent.low, frame.low);

        // Root of an SCC: pop its members
        if (frame.low === index.get(frame.node)) {
          const scc: string[] = [];
          let member: string | undefined;
          do {
            member = stack.pop();
            if (member === undefined) break;
            onStack.delete(member);
            scc.push(member);
          } while (member !== frame.node);
          sccs.push(scc);
        }
      }
    }

    const cycles: string[][] = [];
    for (const scc of sccs) {
      if (scc.length > 1) {
        cycles.push([...scc].sort());
      } else if (scc.length === 1 && (this.adjacency.get(scc[0]) ?? []).includes(scc[0])) {
        cycles.push([scc[0]]);
      }
    }
    return cycles.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  }
}
