/**
 * Union-Find over small integer keys, with path compression and union by rank.
 */
export class UnionFind {
  private parent: Map<number, number> = new Map();
  private rank: Map<number, number> = new Map();

  /** Number of registered keys. */
  get size(): number {
    return this.parent.size;
  }

  has(x: number): boolean {
    return this.parent.has(x);
  }

  /**
   * Root of `x`. Unseen keys are registered as their own singleton set.
   */
  find(x: number): number {
    let root = this.parent.get(x);
    if (root === undefined) {
      this.parent.set(x, x);
      this.rank.set(x, 0);
      return x;
    }
    while (root !== this.parent.get(root)) {
      root = this.parent.get(root) ?? root;
    }

    let current = x;
    while (current !== root) {
      const next = this.parent.get(current) ?? root;
      this.parent.set(current, root);
      current = next;
    }
    return root;
  }

  /** Merge the sets of `x` and `y`; returns the surviving root. */
  union(x: number, y: number): number {
    let rootX = this.find(x);
    let rootY = this.find(y);
    if (rootX === rootY) return rootX;

    const rankX = this.rank.get(rootX) ?? 0;
    const rankY = this.rank.get(rootY) ?? 0;

    if (rankX < rankY) {
      [rootX, rootY] = [rootY, rootX];
    }
    this.parent.set(rootY, rootX);
    if (rankX === rankY) {
      this.rank.set(rootX, rankX + 1);
    }
    return rootX;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }
}
