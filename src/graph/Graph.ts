/**
 * Graph: append-only store of computation nodes
 *
 * Nodes are addressed by the handle `append` returns. A node can only
 * reference handles that already exist, so the graph is acyclic and
 * ascending handle order is a topological order.
 */

import { Node, ReadonlyValueMap, ValueMap } from './Node.js';
import { NodeHandle } from './NodeHandle.js';
import { Subgraph } from './Subgraph.js';
import { Constant, Product, Sum, Variable } from './Nodes.js';
import { ForeignHandleError, HandleOutOfRangeError } from './Errors.js';
import { evaluate } from './Evaluator.js';
import { DerivativeResult, differentiate } from './Differentiator.js';

export interface GraphOptions {
  /**
   * Reject handles from other graphs and out-of-range positions.
   * Disable to trust every handle. Default: true
   */
  checkHandles?: boolean;
}

export class Graph {
  readonly checkHandles: boolean;
  private nodes: Node[] = [];
  private handles: NodeHandle[] = [];

  constructor(options: GraphOptions = {}) {
    this.checkHandles = options.checkHandles ?? true;
  }

  get size(): number {
    return this.nodes.length;
  }

  append(node: Node): NodeHandle {
    if (this.checkHandles) {
      for (const child of node.children) {
        this.validate(child);
      }
    }

    const handle = new NodeHandle(this.nodes.length, this);
    this.nodes.push(node);
    this.handles.push(handle);
    return handle;
  }

  constant(value: number): NodeHandle {
    return this.append(new Constant(value));
  }

  variable(name?: string): NodeHandle {
    return this.append(new Variable(name));
  }

  sum(...children: NodeHandle[]): NodeHandle {
    return this.append(new Sum(children));
  }

  product(...children: NodeHandle[]): NodeHandle {
    return this.append(new Product(children));
  }

  lookup(handle: NodeHandle): Node {
    this.validate(handle);
    return this.nodes[handle.index];
  }

  /**
   * Throw if `handle` was not produced by this graph. No-op when handle
   * checks are disabled.
   */
  validate(handle: NodeHandle): void {
    if (!this.checkHandles) {
      return;
    }
    if (handle.owner !== this) {
      throw new ForeignHandleError(handle);
    }
    if (handle.index < 0 || handle.index >= this.nodes.length) {
      throw new HandleOutOfRangeError(handle, this.nodes.length);
    }
  }

  /**
   * Every current handle, ascending
   */
  fullSubgraph(): Subgraph {
    return Subgraph.fromSorted([...this.handles]);
  }

  /**
   * Evaluate `subgraph` (default: the whole graph) given variable bindings
   */
  evaluate(bindings: ReadonlyValueMap = new Map(), subgraph: Subgraph = this.fullSubgraph()): ValueMap {
    return evaluate(this, subgraph, bindings);
  }

  /**
   * Append the derivative of every node and return d(of)/d(wrt)
   */
  differentiate(of: NodeHandle, wrt: Iterable<NodeHandle>): DerivativeResult {
    return differentiate(this, of, wrt);
  }

  /**
   * Debug: print graph state
   */
  dump(): string {
    const lines: string[] = ['Graph:'];
    this.nodes.forEach((node, index) => {
      lines.push(`  [${index}]: ${node.toString()}`);
    });
    return lines.join('\n');
  }
}
