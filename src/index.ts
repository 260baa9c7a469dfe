/**
 * Computation graphs with forward evaluation and symbolic differentiation
 *
 * Expressions are stored as an append-only DAG of nodes. Evaluation and
 * differentiation both walk the graph once in construction order.
 */

// Core API
export { Graph, type GraphOptions } from './graph/Graph.js';
export { Subgraph } from './graph/Subgraph.js';
export { evaluate } from './graph/Evaluator.js';
export { differentiate, type DerivativeResult } from './graph/Differentiator.js';
export { countPaths, countPathsTo } from './graph/PathCount.js';

// Node kinds
export { Constant, Variable, Sum, Product, SumOfProducts } from './graph/Nodes.js';
export { valueOf, derivativeOf } from './graph/Node.js';
export type {
  Node,
  ValueMap,
  ReadonlyValueMap,
  DerivativeMap,
  ReadonlyDerivativeMap
} from './graph/Node.js';
export type { NodeHandle } from './graph/NodeHandle.js';

// Errors
export {
  GraphContractError,
  UnboundVariableError,
  MissingValueError,
  MissingDerivativeError,
  MissingPathCountError,
  ForeignHandleError,
  HandleOutOfRangeError
} from './graph/Errors.js';

// Derivative verification utilities
export { GradientChecker, formatGradCheckResult } from './graph/GradientChecker.js';
export type { GradCheckResult, GradCheckError } from './graph/GradientChecker.js';
