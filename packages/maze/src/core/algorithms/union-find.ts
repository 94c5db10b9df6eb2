/**
 * Union-Find (Disjoint Set Union) over arena indices.
 *
 * Path halving plus union by size. Used to detect cycles when checking that
 * a link set forms a tree.
 *
 * @example
 * ```typescript
 * const sets = new UnionFind(4);
 * sets.union(0, 1); // true
 * sets.union(1, 0); // false: already joined, this edge would close a cycle
 * ```
 */
export class UnionFind {
  private readonly parent: Int32Array;
  private readonly sizes: Int32Array;
  private sets: number;

  constructor(size: number) {
    this.parent = new Int32Array(size);
    this.sizes = new Int32Array(size).fill(1);
    this.sets = size;
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
  }

  /**
   * Number of disjoint sets remaining.
   */
  get count(): number {
    return this.sets;
  }

  find(x: number): number {
    let node = x;
    let parent = this.parent[node] ?? node;
    while (parent !== node) {
      const grandparent = this.parent[parent] ?? parent;
      this.parent[node] = grandparent;
      node = grandparent;
      parent = this.parent[node] ?? node;
    }
    return node;
  }

  /**
   * Merge the sets containing x and y.
   * @returns False when they were already in the same set
   */
  union(x: number, y: number): boolean {
    let rootX = this.find(x);
    let rootY = this.find(y);
    if (rootX === rootY) return false;

    if ((this.sizes[rootX] ?? 0) < (this.sizes[rootY] ?? 0)) {
      [rootX, rootY] = [rootY, rootX];
    }
    this.parent[rootY] = rootX;
    this.sizes[rootX] = (this.sizes[rootX] ?? 0) + (this.sizes[rootY] ?? 0);
    this.sets--;
    return true;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }
}
