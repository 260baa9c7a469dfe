/**
 * Node-kind contract for computation graphs.
 *
 * Every kind computes its own value and builds its own derivative node, so
 * new kinds plug in without touching Graph, the evaluator or the
 * differentiator.
 */

import { NodeHandle } from './NodeHandle.js';
import { MissingDerivativeError, MissingValueError } from './Errors.js';

export type ValueMap = Map<NodeHandle, number>;
export type ReadonlyValueMap = ReadonlyMap<NodeHandle, number>;

export type DerivativeMap = Map<NodeHandle, NodeHandle>;
export type ReadonlyDerivativeMap = ReadonlyMap<NodeHandle, NodeHandle>;

export interface Node {
  /** Kind name, e.g. 'constant' or 'sum' */
  readonly kind: string;

  /** Handles this node reads; all precede the node in its graph */
  readonly children: readonly NodeHandle[];

  /**
   * Value of this node. `values` must already hold every child's value
   * (and, for a variable, the node's own binding).
   */
  computeValue(self: NodeHandle, values: ReadonlyValueMap): number;

  /**
   * New, unattached node for d(self)/d(wrt). `derivatives` must already hold
   * the derivative handle of every child.
   */
  computeDerivative(
    self: NodeHandle,
    wrt: ReadonlySet<NodeHandle>,
    derivatives: ReadonlyDerivativeMap
  ): Node;

  toString(): string;
}

export function valueOf(values: ReadonlyValueMap, handle: NodeHandle, requiredBy: NodeHandle): number {
  const value = values.get(handle);
  if (value === undefined) {
    throw new MissingValueError(handle, requiredBy);
  }
  return value;
}

export function derivativeOf(
  derivatives: ReadonlyDerivativeMap,
  handle: NodeHandle,
  requiredBy: NodeHandle
): NodeHandle {
  const derivative = derivatives.get(handle);
  if (derivative === undefined) {
    throw new MissingDerivativeError(handle, requiredBy);
  }
  return derivative;
}
