/**
 * Where a {@link UnionFind} keeps its parent links. `null` marks a root.
 *
 * `setParent` may be called from read-only queries (path compression), so
 * implementors must accept writes at any time.
 */
export interface ParentStore<T> {
  getParent(item: T): T | null;
  setParent(item: T, parent: T): void;
}

/** Total order over items: negative, zero or positive like `Array.prototype.sort`. */
export type Comparator<T> = (a: T, b: T) => number;

export const compareNumbers: Comparator<number> = (a, b) => a - b;

/**
 * Disjoint-set forest with path compression.
 *
 * Instead of union by rank or size, merging always makes the larger root the
 * parent of the smaller one. Board edges live at the top of the index range,
 * so they stay roots and a connection between two edges is a single root
 * comparison.
 */
export class UnionFind<T> {
  constructor(
    private readonly store: ParentStore<T>,
    private readonly compare: Comparator<T>
  ) {}

  findRoot(item: T): T {
    let root = item;
    let next = this.store.getParent(root);
    while (next !== null && next !== root) {
      root = next;
      next = this.store.getParent(root);
    }

    let current = item;
    while (current !== root) {
      const parent = this.store.getParent(current);
      this.store.setParent(current, root);
      if (parent === null) {
        break;
      }
      current = parent;
    }

    return root;
  }

  merge(item1: T, item2: T): void {
    const root1 = this.findRoot(item1);
    const root2 = this.findRoot(item2);
    const order = this.compare(root1, root2);

    if (order > 0) {
      this.store.setParent(root2, root1);
    } else if (order < 0) {
      this.store.setParent(root1, root2);
    }
  }

  isInSameSet(item1: T, item2: T): boolean {
    return this.findRoot(item1) === this.findRoot(item2);
  }
}
