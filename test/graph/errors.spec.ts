import { describe, it, expect } from 'vitest';
import { Graph } from '../../src/graph/Graph.js';
import { NodeHandle } from '../../src/graph/NodeHandle.js';
import { Sum } from '../../src/graph/Nodes.js';
import {
  ForeignHandleError,
  GraphContractError,
  HandleOutOfRangeError,
  MissingDerivativeError,
  MissingPathCountError,
  MissingValueError,
  UnboundVariableError
} from '../../src/graph/Errors.js';

describe('Error messages', () => {
  it('should name the unbound variable', () => {
    const graph = new Graph();
    graph.variable('x');

    expect(() => graph.evaluate()).toThrow('Variable n0 has no bound value');
  });

  it('should name the missing child and its parent', () => {
    const graph = new Graph();
    const a = graph.constant(1);
    const s = graph.sum(a);
    const error = new MissingValueError(a, s);

    expect(error.message).toBe('Value for n0 required by n1 has not been computed');
    expect(error.name).toBe('MissingValueError');
  });

  it('should name the missing derivative', () => {
    const graph = new Graph();
    const a = graph.constant(1);
    const s = graph.sum(a);

    expect(() => new Sum([a]).computeDerivative(s, new Set(), new Map()))
      .toThrow('Derivative for n0 required by n1 has not been computed');
  });

  it('should describe foreign and out-of-range handles', () => {
    const graph = new Graph();
    graph.constant(1);
    const foreign = new Graph().constant(2);

    expect(() => graph.lookup(foreign)).toThrow('Handle n0 belongs to a different graph');
    expect(() => graph.lookup(new NodeHandle(3, graph)))
      .toThrow('Handle n3 is out of range for a graph of 1 nodes');
  });

  it('should share a common base class', () => {
    const graph = new Graph();
    const x = graph.variable();

    for (const error of [
      new UnboundVariableError(x),
      new MissingValueError(x, x),
      new MissingDerivativeError(x, x),
      new MissingPathCountError(x, x),
      new ForeignHandleError(x),
      new HandleOutOfRangeError(x, 0)
    ]) {
      expect(error).toBeInstanceOf(GraphContractError);
      expect(error).toBeInstanceOf(Error);
    }
  });
});
