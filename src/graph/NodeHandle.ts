/**
 * Opaque reference to a node's position in a graph.
 *
 * A graph interns exactly one handle per position, so handles compare with
 * `===` and work as `Map`/`Set` keys the same way their index would.
 * A handle is only meaningful for the graph that created it.
 */
export class NodeHandle {
  /**
   * @internal Created by `Graph.append` only.
   */
  constructor(
    readonly index: number,
    readonly owner: object
  ) {}

  equals(other: NodeHandle): boolean {
    return this.owner === other.owner && this.index === other.index;
  }

  /**
   * Negative, zero or positive as this handle comes before, at or after `other`
   */
  compareTo(other: NodeHandle): number {
    return this.index - other.index;
  }

  hashCode(): number {
    return this.index;
  }

  toString(): string {
    return `n${this.index}`;
  }
}

export function compareHandles(a: NodeHandle, b: NodeHandle): number {
  return a.compareTo(b);
}
