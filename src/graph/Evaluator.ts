/**
 * Forward evaluation of a graph.
 */

import type { Graph } from './Graph.js';
import type { Subgraph } from './Subgraph.js';
import { ReadonlyValueMap, ValueMap } from './Node.js';

/**
 * Compute the value of every handle in `subgraph`, in order.
 *
 * The result starts as a copy of `bindings` (typically variable values) and
 * gains one entry per subgraph handle. A handle that is both bound and part
 * of the subgraph ends up with its computed value.
 */
export function evaluate(
  graph: Graph,
  subgraph: Subgraph,
  bindings: ReadonlyValueMap = new Map()
): ValueMap {
  const values: ValueMap = new Map(bindings);

  for (const handle of subgraph) {
    values.set(handle, graph.lookup(handle).computeValue(handle, values));
  }

  return values;
}
