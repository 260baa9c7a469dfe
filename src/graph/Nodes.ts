/**
 * Built-in node kinds.
 */

import {
  Node,
  ReadonlyDerivativeMap,
  ReadonlyValueMap,
  derivativeOf,
  valueOf
} from './Node.js';
import { NodeHandle } from './NodeHandle.js';
import { UnboundVariableError } from './Errors.js';

/**
 * Numeric constant
 */
export class Constant implements Node {
  readonly kind = 'constant' as const;
  readonly children: readonly NodeHandle[] = [];

  constructor(readonly value: number) {}

  computeValue(): number {
    return this.value;
  }

  computeDerivative(): Node {
    // d/dx(c) = 0
    return new Constant(0);
  }

  toString(): string {
    return String(this.value);
  }
}

/**
 * Input whose value is supplied by the caller's bindings
 */
export class Variable implements Node {
  readonly kind = 'variable' as const;
  readonly children: readonly NodeHandle[] = [];

  constructor(readonly name?: string) {}

  computeValue(self: NodeHandle, values: ReadonlyValueMap): number {
    const value = values.get(self);
    if (value === undefined) {
      throw new UnboundVariableError(self);
    }
    return value;
  }

  computeDerivative(self: NodeHandle, wrt: ReadonlySet<NodeHandle>): Node {
    // d/dx(x) = 1, d/dx(y) = 0
    return new Constant(wrt.has(self) ? 1 : 0);
  }

  toString(): string {
    return this.name ?? 'var';
  }
}

export class Sum implements Node {
  readonly kind = 'sum' as const;

  constructor(readonly children: readonly NodeHandle[]) {}

  computeValue(self: NodeHandle, values: ReadonlyValueMap): number {
    let total = 0;
    for (const child of this.children) {
      total += valueOf(values, child, self);
    }
    return total;
  }

  computeDerivative(
    self: NodeHandle,
    _wrt: ReadonlySet<NodeHandle>,
    derivatives: ReadonlyDerivativeMap
  ): Node {
    // d/dx(u + v) = du/dx + dv/dx
    return new Sum(this.children.map(child => derivativeOf(derivatives, child, self)));
  }

  toString(): string {
    return `(+ ${this.children.join(' ')})`;
  }
}

export class Product implements Node {
  readonly kind = 'product' as const;

  constructor(readonly children: readonly NodeHandle[]) {}

  computeValue(self: NodeHandle, values: ReadonlyValueMap): number {
    let total = 1;
    for (const child of this.children) {
      total *= valueOf(values, child, self);
    }
    return total;
  }

  computeDerivative(
    self: NodeHandle,
    _wrt: ReadonlySet<NodeHandle>,
    derivatives: ReadonlyDerivativeMap
  ): Node {
    // d/dx(u * v * w) = du * v * w + u * dv * w + u * v * dw
    const terms = this.children.map((_, i) =>
      this.children.map((child, j) => (j === i ? derivativeOf(derivatives, child, self) : child))
    );
    return new SumOfProducts(terms);
  }

  toString(): string {
    return `(* ${this.children.join(' ')})`;
  }
}

/**
 * Sum of product terms. Closed under differentiation, which gives
 * `Product` derivatives of any order.
 */
export class SumOfProducts implements Node {
  readonly kind = 'sum-of-products' as const;
  readonly children: readonly NodeHandle[];

  constructor(readonly terms: readonly (readonly NodeHandle[])[]) {
    this.children = terms.flat();
  }

  computeValue(self: NodeHandle, values: ReadonlyValueMap): number {
    let total = 0;
    for (const term of this.terms) {
      let product = 1;
      for (const factor of term) {
        product *= valueOf(values, factor, self);
      }
      total += product;
    }
    return total;
  }

  computeDerivative(
    self: NodeHandle,
    _wrt: ReadonlySet<NodeHandle>,
    derivatives: ReadonlyDerivativeMap
  ): Node {
    // Product rule applied to each term
    const terms = this.terms.flatMap(term =>
      term.map((_, i) =>
        term.map((factor, j) => (j === i ? derivativeOf(derivatives, factor, self) : factor))
      )
    );
    return new SumOfProducts(terms);
  }

  toString(): string {
    return `(+ ${this.terms.map(term => `(* ${term.join(' ')})`).join(' ')})`;
  }
}
