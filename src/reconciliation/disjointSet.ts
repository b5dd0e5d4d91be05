/**
 * Union-find over 0..size-1 with path halving and union by size.
 * Makes identity equality transitive: A~B and B~C puts A, B and C together.
 */
export class DisjointSet {
  private readonly parent: number[];
  private readonly sizes: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, index) => index);
    this.sizes = new Array<number>(size).fill(1);
  }

  find(element: number): number {
    let current = element;
    while (this.parent[current] !== current) {
      this.parent[current] = this.parent[this.parent[current]];
      current = this.parent[current];
    }
    return current;
  }

  union(a: number, b: number): number {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return rootA;

    const [larger, smaller] = this.sizes[rootA] >= this.sizes[rootB] ? [rootA, rootB] : [rootB, rootA];
    this.parent[smaller] = larger;
    this.sizes[larger] += this.sizes[smaller];
    return larger;
  }
}
