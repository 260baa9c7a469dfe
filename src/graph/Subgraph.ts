import { NodeHandle, compareHandles } from './NodeHandle.js';

/**
 * Ordered set of handles relevant to one computation.
 *
 * Handles are unique and ascending, so a child always comes before any of
 * its parents.
 */
export class Subgraph implements Iterable<NodeHandle> {
  private constructor(readonly handles: readonly NodeHandle[]) {}

  /**
   * Build from handles in any order, dropping duplicates
   */
  static from(handles: Iterable<NodeHandle>): Subgraph {
    const unique = [...new Set(handles)];
    unique.sort(compareHandles);
    return new Subgraph(unique);
  }

  /**
   * Wrap handles already known to be unique and ascending
   * @internal
   */
  static fromSorted(handles: readonly NodeHandle[]): Subgraph {
    return new Subgraph(handles);
  }

  get size(): number {
    return this.handles.length;
  }

  has(handle: NodeHandle): boolean {
    return this.handles.includes(handle);
  }

  [Symbol.iterator](): Iterator<NodeHandle> {
    return this.handles[Symbol.iterator]();
  }
}
