interface GraphNode<T> {
  name: string;
  value: T;
}

export interface TopologicalSortResult<T> {
  ordered: T[];
  unresolved: string[];
}

/**
 * Directed graph over named nodes. Nodes live in an array indexed through
 * `indexByName`; each node owns the list of nodes that depend on it and a
 * count of dependencies not yet satisfied.
 *
 * Edges are only created between nodes already in the graph, so a dependency
 * on an unknown name never blocks ordering.
 */
export class DependencyGraph<T> {
  private readonly nodes: GraphNode<T>[] = [];
  private readonly indexByName = new Map<string, number>();
  private readonly dependents: number[][] = [];
  private readonly inDegree: number[] = [];
  private readonly edges = new Set<string>();

  addNode(name: string, value: T): void {
    const existing = this.indexByName.get(name);
    if (existing !== undefined) {
      this.nodes[existing].value = value;
      return;
    }

    this.indexByName.set(name, this.nodes.length);
    this.nodes.push({ name, value });
    this.dependents.push([]);
    this.inDegree.push(0);
  }

  /**
   * Records that `dependent` must come after `dependency`. Returns false when
   * no edge was added: unknown endpoint or duplicate. A self edge is kept and
   * its node can never become ready.
   */
  addDependency(dependent: string, dependency: string): boolean {
    const from = this.indexByName.get(dependency);
    const to = this.indexByName.get(dependent);
    if (from === undefined || to === undefined) return false;

    const key = `${from}:${to}`;
    if (this.edges.has(key)) return false;

    this.edges.add(key);
    this.dependents[from].push(to);
    this.inDegree[to]++;
    return true;
  }

  /**
   * Kahn's algorithm. The ready queue is seeded in insertion order and each
   * node's dependents are visited in the order their edges were added, so the
   * result is stable for a given input. Nodes left over sit on or behind a
   * cycle and are reported in insertion order.
   */
  topologicalSort(): TopologicalSortResult<T> {
    const remaining = [...this.inDegree];
    const queue: number[] = [];
    const ordered: T[] = [];
    const emitted = new Array<boolean>(this.nodes.length).fill(false);

    remaining.forEach((count, index) => {
      if (count === 0) queue.push(index);
    });

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      emitted[current] = true;
      ordered.push(this.nodes[current].value);

      for (const dependent of this.dependents[current]) {
        remaining[dependent]--;
        if (remaining[dependent] === 0) queue.push(dependent);
      }
    }

    const unresolved = this.nodes
      .filter((_, index) => !emitted[index])
      .map((node) => node.name);

    return { ordered, unresolved };
  }
}
