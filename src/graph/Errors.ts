import { NodeHandle } from './NodeHandle.js';

/**
 * Base class for misuse of the graph API: foreign or stale handles,
 * unbound variables, values read before they were computed.
 */
export class GraphContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphContractError';
  }
}

export class UnboundVariableError extends GraphContractError {
  constructor(public handle: NodeHandle) {
    super(`Variable ${handle} has no bound value`);
    this.name = 'UnboundVariableError';
  }
}

export class MissingValueError extends GraphContractError {
  constructor(
    public handle: NodeHandle,
    public requiredBy: NodeHandle
  ) {
    super(`Value for ${handle} required by ${requiredBy} has not been computed`);
    this.name = 'MissingValueError';
  }
}

export class MissingDerivativeError extends GraphContractError {
  constructor(
    public handle: NodeHandle,
    public requiredBy: NodeHandle
  ) {
    super(`Derivative for ${handle} required by ${requiredBy} has not been computed`);
    this.name = 'MissingDerivativeError';
  }
}

export class MissingPathCountError extends GraphContractError {
  constructor(
    public handle: NodeHandle,
    public requiredBy: NodeHandle
  ) {
    super(`Path count for ${handle} required by ${requiredBy} has not been computed`);
    this.name = 'MissingPathCountError';
  }
}

export class ForeignHandleError extends GraphContractError {
  constructor(public handle: NodeHandle) {
    super(`Handle ${handle} belongs to a different graph`);
    this.name = 'ForeignHandleError';
  }
}

export class HandleOutOfRangeError extends GraphContractError {
  constructor(
    public handle: NodeHandle,
    public size: number
  ) {
    super(`Handle ${handle} is out of range for a graph of ${size} nodes`);
    this.name = 'HandleOutOfRangeError';
  }
}
