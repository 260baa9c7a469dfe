/**
 * Symbolic differentiation of a graph.
 *
 * Every node that exists when the pass starts gets exactly one derivative
 * node, appended in construction order. Parents sharing a child share that
 * child's derivative node, so diamond-shaped graphs cost one node per
 * original node rather than one per path.
 *
 * The pass does not restrict itself to the ancestors of the target; nodes
 * unrelated to the target are differentiated too.
 */

import type { Graph } from './Graph.js';
import { DerivativeMap } from './Node.js';
import { NodeHandle } from './NodeHandle.js';
import { Subgraph } from './Subgraph.js';
import { ForeignHandleError, HandleOutOfRangeError } from './Errors.js';

export interface DerivativeResult {
  /** Handle of d(target)/d(wrt) */
  derivative: NodeHandle;
  /** Every node appended by the pass */
  subgraph: Subgraph;
  /** Original handle -> derivative handle */
  derivatives: ReadonlyMap<NodeHandle, NodeHandle>;
}

export function differentiate(
  graph: Graph,
  target: NodeHandle,
  wrt: Iterable<NodeHandle>
): DerivativeResult {
  graph.validate(target);

  const wrtSet: ReadonlySet<NodeHandle> = new Set(wrt);
  const derivatives: DerivativeMap = new Map();
  const appended: NodeHandle[] = [];

  // Fixed before the loop: derivative nodes are not themselves differentiated
  const originals = graph.fullSubgraph();

  // Also holds with handle checks disabled, so a bad target appends nothing
  if (originals.handles[target.index] !== target) {
    throw target.owner === graph
      ? new HandleOutOfRangeError(target, originals.size)
      : new ForeignHandleError(target);
  }

  for (const original of originals) {
    const node = graph.lookup(original).computeDerivative(original, wrtSet, derivatives);
    const handle = graph.append(node);
    derivatives.set(original, handle);
    appended.push(handle);
  }

  const derivative = derivatives.get(target);
  if (derivative === undefined) {
    throw new HandleOutOfRangeError(target, originals.size);
  }

  // Handles were appended in ascending order
  return {
    derivative,
    subgraph: Subgraph.fromSorted(appended),
    derivatives
  };
}
