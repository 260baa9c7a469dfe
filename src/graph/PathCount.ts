/**
 * Path counting over a graph.
 *
 * The number of leaf-to-node paths in a DAG can grow exponentially with
 * depth; counting them in handle order with memoized child counts keeps the
 * work linear in the number of nodes. Counts are exact `bigint`s.
 */

import type { Graph } from './Graph.js';
import type { Subgraph } from './Subgraph.js';
import { NodeHandle } from './NodeHandle.js';
import { MissingPathCountError } from './Errors.js';

/**
 * Number of paths from any leaf to each node. A leaf has one path; a child
 * listed twice contributes its count twice.
 */
export function countPaths(graph: Graph, subgraph: Subgraph = graph.fullSubgraph()): Map<NodeHandle, bigint> {
  const counts = new Map<NodeHandle, bigint>();

  for (const handle of subgraph) {
    const { children } = graph.lookup(handle);
    if (children.length === 0) {
      counts.set(handle, 1n);
      continue;
    }

    let total = 0n;
    for (const child of children) {
      const count = counts.get(child);
      if (count === undefined) {
        throw new MissingPathCountError(child, handle);
      }
      total += count;
    }
    counts.set(handle, total);
  }

  return counts;
}

export function countPathsTo(graph: Graph, handle: NodeHandle): bigint {
  graph.validate(handle);
  const counts = countPaths(graph);
  return counts.get(handle) ?? 0n;
}
