/**
 * Error types for decoding and simulation.
 *
 * Decode errors abort the whole decode. Resource errors mean the fixed capacities
 * are too small for the circuit at hand. Simulation errors are surfaced only by the
 * public simulate API; inside the scheduler "not ready" is a plain boolean.
 */

export enum DecodeErrorType {
  UNEXPECTED_APPLY = 'UNEXPECTED_APPLY',
  UNEXPECTED_LITERAL = 'UNEXPECTED_LITERAL',
  REDEFINITION = 'REDEFINITION',
  UNDEFINED_CIRCUIT = 'UNDEFINED_CIRCUIT',
  MISSING_ARGUMENTS = 'MISSING_ARGUMENTS',
  TRUNCATED = 'TRUNCATED',
  MISMATCHED_DEFINE = 'MISMATCHED_DEFINE',
  INVALID_CIRCUIT = 'INVALID_CIRCUIT',
}

export class DecodeError extends Error {
  constructor(
    public readonly type: DecodeErrorType,
    message: string,
    public readonly offset?: number
  ) {
    super(offset === undefined ? message : `${message} at byte ${offset}`);
    this.name = 'DecodeError';
  }
}

export enum ResourceErrorType {
  STACK_OVERFLOW = 'STACK_OVERFLOW',
  RING_FULL = 'RING_FULL',
  RING_EMPTY = 'RING_EMPTY',
  WIRE_OUT_OF_RANGE = 'WIRE_OUT_OF_RANGE',
  CIRCUIT_ID_OUT_OF_RANGE = 'CIRCUIT_ID_OUT_OF_RANGE',
  TOO_MANY_MODULES = 'TOO_MANY_MODULES',
}

export class ResourceError extends Error {
  constructor(
    public readonly type: ResourceErrorType,
    message: string
  ) {
    super(message);
    this.name = 'ResourceError';
  }
}

export enum SimulationErrorType {
  INPUT_ARITY = 'INPUT_ARITY',
  UNRESOLVED = 'UNRESOLVED',
}

export class SimulationError extends Error {
  constructor(
    public readonly type: SimulationErrorType,
    message: string
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}
