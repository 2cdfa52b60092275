/**
 * Disjoint-set over the integers 0..size-1 with path compression and
 * union by rank. `union` keeps the smaller index as the root when ranks
 * tie, so the representative of a set is stable for a given union order.
 */
export class DisjointSet {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    this.rank = new Array<number>(size).fill(0);
  }

  get size(): number {
    return this.parent.length;
  }

  find(index: number): number {
    let root = index;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    let current = index;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;

    if (this.rank[rootA] > this.rank[rootB]) {
      this.parent[rootB] = rootA;
    } else if (this.rank[rootA] < this.rank[rootB]) {
      this.parent[rootA] = rootB;
    } else if (rootA < rootB) {
      this.parent[rootB] = rootA;
      this.rank[rootA]++;
    } else {
      this.parent[rootA] = rootB;
      this.rank[rootB]++;
    }
  }

  /**
   * Members of each set, sets ordered by their smallest member and members
   * in ascending order.
   */
  groups(): number[][] {
    const byRoot = new Map<number, number[]>();
    for (let i = 0; i < this.parent.length; i++) {
      const root = this.find(i);
      const members = byRoot.get(root);
      if (members) {
        members.push(i);
      } else {
        byRoot.set(root, [i]);
      }
    }
    return Array.from(byRoot.values());
  }
}
