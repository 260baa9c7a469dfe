import { describe, it, expect } from 'vitest';
import { Graph } from '../../src/graph/Graph.js';
import { GradientChecker, formatGradCheckResult } from '../../src/graph/GradientChecker.js';
import { Node, ReadonlyValueMap, valueOf } from '../../src/graph/Node.js';
import { NodeHandle } from '../../src/graph/NodeHandle.js';
import { Constant } from '../../src/graph/Nodes.js';
import { UnboundVariableError } from '../../src/graph/Errors.js';
import { bind } from '../helpers.js';

/**
 * u^2 with a wrong derivative rule
 */
class BrokenSquare implements Node {
  readonly kind = 'broken-square' as const;
  readonly children: readonly NodeHandle[];

  constructor(readonly operand: NodeHandle) {
    this.children = [operand];
  }

  computeValue(self: NodeHandle, values: ReadonlyValueMap): number {
    const u = valueOf(values, this.operand, self);
    return u * u;
  }

  computeDerivative(): Node {
    return new Constant(0);
  }

  toString(): string {
    return `(broken ${this.operand})`;
  }
}

function buildXTimesYPlusX() {
  const graph = new Graph();
  const x = graph.variable('x');
  const y = graph.variable('y');
  const f = graph.sum(graph.product(x, y), x);
  return { graph, x, y, f };
}

describe('Derivative Checking', () => {
  it('should validate d/dx(x * y + x)', () => {
    const { graph, x, y, f } = buildXTimesYPlusX();
    const result = new GradientChecker().check(graph, f, [x], bind([x, 3], [y, 2]));

    expect(result.passed).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.totalChecks).toBe(1);
    expect(result.maxError).toBeLessThan(1e-4);
  });

  it('should validate each partial separately', () => {
    const { graph, x, y, f } = buildXTimesYPlusX();
    const result = new GradientChecker().checkEach(graph, f, [x, y, x], bind([x, 3], [y, 2]));

    expect(result.passed).toBe(true);
    expect(result.totalChecks).toBe(2);
    expect(graph.size).toBe(16);
  });

  it('should validate a derivative with respect to a variable set', () => {
    const { graph, x, y, f } = buildXTimesYPlusX();
    const result = new GradientChecker().check(graph, f, [x, y], bind([x, 3], [y, 2]));

    expect(result.passed).toBe(true);
    expect(result.totalChecks).toBe(1);
    expect(graph.size).toBe(8);
  });

  it('should report a wrong derivative rule', () => {
    const graph = new Graph();
    const x = graph.variable('x');
    const f = graph.append(new BrokenSquare(x));

    const result = new GradientChecker().check(graph, f, [x], bind([x, 3]));

    expect(result.passed).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].wrt).toEqual([x]);
    expect(result.errors[0].analytical).toBe(0);
    expect(result.errors[0].numerical).toBeCloseTo(6, 4);
  });

  it('should require a binding for every checked variable', () => {
    const { graph, x, y, f } = buildXTimesYPlusX();

    expect(() => new GradientChecker().check(graph, f, [y], bind([x, 3]))).toThrow(UnboundVariableError);
  });

  describe('formatGradCheckResult', () => {
    it('should summarize a passing result', () => {
      const text = formatGradCheckResult(
        { passed: true, errors: [], maxError: 0, meanError: 0, totalChecks: 2 },
        'f'
      );

      expect(text).toBe('✓ f: 2 derivatives verified (max error: 0.00e+0)');
    });

    it('should list each failing derivative', () => {
      const graph = new Graph();
      const x = graph.variable('x');
      const text = formatGradCheckResult(
        {
          passed: false,
          errors: [{ wrt: [x], analytical: 0, numerical: 6, error: 6, relativeError: 1 }],
          maxError: 6,
          meanError: 6,
          totalChecks: 1
        },
        'f'
      );

      expect(text).toBe([
        '✗ f: 1/1 derivatives FAILED',
        '  d/d{n0}: analytical=0.000000, numerical=6.000000, error=6.00e+0'
      ].join('\n'));
    });
  });
});
