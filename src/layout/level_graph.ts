/**
 * Dependency levels over a directed graph that may contain cycles.
 *
 * Phase 1 walks breadth-first from the roots (nodes without an incoming
 * edge, or the first declared node when every node has one). Each node gets
 * a visitation index and an initial level; the first discovery wins. Nodes no
 * root reaches get level 0 and are appended to the visitation order.
 *
 * Phase 2 pushes `level[to] = max(level[to], level[from] + 1)` until nothing
 * changes, but only along edges whose target was visited after the source.
 * An edge back to an earlier (or the same) node closes a cycle and is left
 * out, so the pushing always reaches a fixed point.
 */

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
}

export interface LevelAssignment {
  /** Level per node id, in visitation order. */
  readonly levels: ReadonlyMap<string, number>;
  /** Visitation index per node id. */
  readonly visitOrder: ReadonlyMap<string, number>;
  /** Edges excluded from level pushing. */
  readonly backEdges: readonly GraphEdge[];
}

export class LevelGraph {
  private readonly nodeIds: readonly string[];
  private readonly children = new Map<string, string[]>();
  private readonly parents = new Map<string, string[]>();
  private readonly graphEdges: GraphEdge[] = [];

  /**
   * Edges naming an id outside `nodeIds` are not part of the graph.
   */
  constructor(nodeIds: readonly string[], edges: readonly GraphEdge[]) {
    this.nodeIds = [...new Set(nodeIds)];
    for (const id of this.nodeIds) {
      this.children.set(id, []);
      this.parents.set(id, []);
    }
    for (const edge of edges) {
      const out = this.children.get(edge.from);
      const incoming = this.parents.get(edge.to);
      if (!out || !incoming) continue;
      out.push(edge.to);
      incoming.push(edge.from);
      this.graphEdges.push({ from: edge.from, to: edge.to });
    }
  }

  get edges(): readonly GraphEdge[] {
    return this.graphEdges;
  }

  childrenOf(id: string): readonly string[] {
    return this.children.get(id) ?? [];
  }

  parentsOf(id: string): readonly string[] {
    return this.parents.get(id) ?? [];
  }

  roots(): string[] {
    const roots = this.nodeIds.filter((id) => this.parentsOf(id).length === 0);
    if (roots.length === 0 && this.nodeIds.length > 0) {
      return [this.nodeIds[0]];
    }
    return roots;
  }

  assignLevels(): LevelAssignment {
    const levels = new Map<string, number>();
    const visitOrder = new Map<string, number>();

    const queue: Array<[string, number]> = this.roots().map((id) => [id, 0]);
    for (let head = 0; head < queue.length; head++) {
      const [id, level] = queue[head];
      if (visitOrder.has(id)) continue;
      visitOrder.set(id, visitOrder.size);
      levels.set(id, level);
      for (const child of this.childrenOf(id)) {
        if (!visitOrder.has(child)) queue.push([child, level + 1]);
      }
    }

    for (const id of this.nodeIds) {
      if (!visitOrder.has(id)) {
        visitOrder.set(id, visitOrder.size);
        levels.set(id, 0);
      }
    }

    const forward: GraphEdge[] = [];
    const backEdges: GraphEdge[] = [];
    for (const edge of this.graphEdges) {
      const fromIndex = visitOrder.get(edge.from) ?? 0;
      const toIndex = visitOrder.get(edge.to) ?? 0;
      (toIndex > fromIndex ? forward : backEdges).push(edge);
    }

    let changed = true;
    while (changed) {
      changed = false;
      for (const { from, to } of forward) {
        const pushed = (levels.get(from) ?? 0) + 1;
        if ((levels.get(to) ?? 0) < pushed) {
          levels.set(to, pushed);
          changed = true;
        }
      }
    }

    return { levels, visitOrder, backEdges };
  }
}

/**
 * Node ids per level, each level ordered by declaration order.
 * Index `i` of the result holds level `i`; a level with no nodes is empty.
 */
export function groupByLevel(nodeIds: readonly string[], levels: ReadonlyMap<string, number>): string[][] {
  const maxLevel = Math.max(-1, ...levels.values());
  const grouped: string[][] = Array.from({ length: maxLevel + 1 }, () => []);
  for (const id of nodeIds) {
    const level = levels.get(id);
    if (level !== undefined && !grouped[level].includes(id)) grouped[level].push(id);
  }
  return grouped;
}
