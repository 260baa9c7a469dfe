/**
 * Test helper utilities shared by the graph specs
 */

import { Graph } from '../src/graph/Graph.js';
import { NodeHandle } from '../src/graph/NodeHandle.js';
import { ValueMap } from '../src/graph/Node.js';

/**
 * c = 1 + b
 */
export function buildConstantPlusVariable() {
  const graph = new Graph();
  const a = graph.constant(1);
  const b = graph.variable('b');
  const c = graph.sum(a, b);
  return { graph, a, b, c };
}

/**
 * x, then `length - 1` sums that each reference every earlier node.
 * The value (and path count) of node k is 2^(k-1).
 */
export function buildDenseChain(length: number) {
  const graph = new Graph();
  const x = graph.variable('x');
  const nodes: NodeHandle[] = [x];
  for (let i = 1; i < length; i++) {
    nodes.push(graph.sum(...nodes));
  }
  return { graph, x, nodes, last: nodes[nodes.length - 1] };
}

export function bind(...entries: [NodeHandle, number][]): ValueMap {
  return new Map(entries);
}
