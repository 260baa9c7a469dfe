/**
 * Numerical derivative checking for computation graphs
 * Validates symbolic derivatives against finite difference approximations
 */

import type { Graph } from './Graph.js';
import type { Subgraph } from './Subgraph.js';
import { ReadonlyValueMap, ValueMap, valueOf } from './Node.js';
import { NodeHandle } from './NodeHandle.js';
import { UnboundVariableError } from './Errors.js';

export interface GradCheckResult {
  passed: boolean;
  errors: GradCheckError[];
  maxError: number;
  meanError: number;
  totalChecks: number;
}

export interface GradCheckError {
  wrt: NodeHandle[];
  analytical: number;
  numerical: number;
  error: number;
  relativeError: number;
}

interface CheckOutcome {
  error: number;
  failure?: GradCheckError;
}

/**
 * Format derivative check results as a human-readable string
 */
export function formatGradCheckResult(result: GradCheckResult, name: string): string {
  if (result.passed) {
    return `✓ ${name}: ${result.totalChecks} derivatives verified (max error: ${result.maxError.toExponential(2)})`;
  }

  const lines: string[] = [
    `✗ ${name}: ${result.errors.length}/${result.totalChecks} derivatives FAILED`
  ];
  for (const e of result.errors) {
    lines.push(
      `  d/d{${e.wrt.join(', ')}}: analytical=${e.analytical.toFixed(6)}, numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`
    );
  }
  return lines.join('\n');
}

/**
 * Derivative checker
 *
 * A derivative with respect to a set of variables is the directional
 * derivative along all of them at once, so the numerical side perturbs every
 * variable of the set together.
 */
export class GradientChecker {
  private epsilon: number;
  private tolerance: number;

  constructor(epsilon: number = 1e-5, tolerance: number = 1e-4) {
    this.epsilon = epsilon;
    this.tolerance = tolerance;
  }

  /**
   * Check d(target)/d(wrt) at `bindings` with a single differentiation pass.
   * `bindings` must cover every variable of the graph.
   */
  check(
    graph: Graph,
    target: NodeHandle,
    wrt: Iterable<NodeHandle>,
    bindings: ReadonlyValueMap
  ): GradCheckResult {
    return this.summarize([this.checkOne(graph, target, [...new Set(wrt)], bindings)]);
  }

  /**
   * Check the partial derivative for each variable separately.
   * Every variable adds one differentiation pass, and each pass doubles the
   * graph, so keep `variables` short.
   */
  checkEach(
    graph: Graph,
    target: NodeHandle,
    variables: Iterable<NodeHandle>,
    bindings: ReadonlyValueMap
  ): GradCheckResult {
    const outcomes: CheckOutcome[] = [];
    for (const variable of new Set(variables)) {
      outcomes.push(this.checkOne(graph, target, [variable], bindings));
    }
    return this.summarize(outcomes);
  }

  private checkOne(
    graph: Graph,
    target: NodeHandle,
    wrt: NodeHandle[],
    bindings: ReadonlyValueMap
  ): CheckOutcome {
    for (const variable of wrt) {
      if (!bindings.has(variable)) {
        throw new UnboundVariableError(variable);
      }
    }

    const originals = graph.fullSubgraph();
    const { derivative } = graph.differentiate(target, wrt);

    const analytical = valueOf(graph.evaluate(bindings), derivative, derivative);
    const numerical = this.numericalDerivative(graph, originals, target, wrt, bindings);

    const error = Math.abs(analytical - numerical);
    const relativeError = Math.abs(error / (numerical + 1e-10));

    if (error > this.tolerance && relativeError > this.tolerance) {
      return { error, failure: { wrt, analytical, numerical, error, relativeError } };
    }
    return { error };
  }

  /**
   * Central difference: (f(x+h) - f(x-h)) / (2h)
   */
  private numericalDerivative(
    graph: Graph,
    originals: Subgraph,
    target: NodeHandle,
    wrt: NodeHandle[],
    bindings: ReadonlyValueMap
  ): number {
    const fPlus = this.evaluateShifted(graph, originals, target, wrt, bindings, this.epsilon);
    const fMinus = this.evaluateShifted(graph, originals, target, wrt, bindings, -this.epsilon);
    return (fPlus - fMinus) / (2 * this.epsilon);
  }

  private evaluateShifted(
    graph: Graph,
    originals: Subgraph,
    target: NodeHandle,
    wrt: NodeHandle[],
    bindings: ReadonlyValueMap,
    shift: number
  ): number {
    const shifted: ValueMap = new Map(bindings);
    for (const variable of wrt) {
      shifted.set(variable, valueOf(bindings, variable, target) + shift);
    }
    return valueOf(graph.evaluate(shifted, originals), target, target);
  }

  private summarize(outcomes: CheckOutcome[]): GradCheckResult {
    const errors: GradCheckError[] = [];
    for (const outcome of outcomes) {
      if (outcome.failure) {
        errors.push(outcome.failure);
      }
    }

    const maxError = outcomes.length > 0 ? Math.max(...outcomes.map(o => o.error)) : 0;
    const meanError = outcomes.length > 0
      ? outcomes.reduce((sum, o) => sum + o.error, 0) / outcomes.length
      : 0;

    return {
      passed: errors.length === 0,
      errors,
      maxError,
      meanError,
      totalChecks: outcomes.length
    };
  }
}
