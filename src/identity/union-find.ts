export type ConflictCheck = (a: number, b: number) => boolean;

const NO_CONFLICTS: ConflictCheck = () => false;

/**
 * Union-Find over arena indices `0..size-1` with union by rank.
 *
 * Each root owns the member set of its component, so a merge can be vetoed
 * when any member on one side conflicts with any member on the other. This
 * keeps conflicts from leaking in transitively (A~B and B~C while A and C
 * conflict).
 */
export class ConstrainedUnionFind {
  private readonly parent: number[];
  private readonly rank: number[];
  private readonly members: Array<Set<number> | null>;

  constructor(size: number, private readonly conflicts: ConflictCheck = NO_CONFLICTS) {
    this.parent = Array.from({ length: size }, (_, idx) => idx);
    this.rank = new Array<number>(size).fill(0);
    this.members = Array.from({ length: size }, (_, idx) => new Set([idx]));
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    let node = x;
    while (this.parent[node] !== root) {
      const next = this.parent[node];
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  connected(a: number, b: number) {
    return this.find(a) === this.find(b);
  }

  canUnion(a: number, b: number): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return true;

    for (const x of this.requireMembers(rootA)) {
      for (const y of this.requireMembers(rootB)) {
        if (this.conflicts(x, y) || this.conflicts(y, x)) return false;
      }
    }
    return true;
  }

  /** Merges the components of `a` and `b`; returns false when a conflict blocks it. */
  union(a: number, b: number): boolean {
    if (!this.canUnion(a, b)) return false;

    let rootA = this.find(a);
    let rootB = this.find(b);
    if (rootA === rootB) return true;

    if (this.rank[rootA] < this.rank[rootB]) {
      [rootA, rootB] = [rootB, rootA];
    }
    this.parent[rootB] = rootA;
    if (this.rank[rootA] === this.rank[rootB]) {
      this.rank[rootA] += 1;
    }

    const target = this.requireMembers(rootA);
    for (const member of this.requireMembers(rootB)) {
      target.add(member);
    }
    this.members[rootB] = null;
    return true;
  }

  /** Components in order of their smallest index, members ascending. */
  components(): number[][] {
    const byRoot = new Map<number, number[]>();
    for (let idx = 0; idx < this.parent.length; idx += 1) {
      const root = this.find(idx);
      const bucket = byRoot.get(root);
      if (bucket) bucket.push(idx);
      else byRoot.set(root, [idx]);
    }
    return [...byRoot.values()];
  }

  private requireMembers(root: number): Set<number> {
    const members = this.members[root];
    if (!members) {
      throw new Error(`union-find member set missing for root ${root}`);
    }
    return members;
  }
}
