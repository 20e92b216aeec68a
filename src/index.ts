// NAND bytecode - nested circuits from a single primitive gate
// Bytecode decoder with arity inference, and a ring scheduler that evaluates to a fixed point

// Types
export {
  WireState,
  toWireState,
  NAND_ID,
  NAND_CIRCUIT,
  DEFAULT_LIMITS,
  MAX_ENCODABLE_CIRCUITS,
  MAX_ENCODABLE_WIRES,
  type Circuit,
  type CircuitId,
  type Module,
  type MachineLimits,
  type WireSlot,
} from './types/circuit.js';

// Errors
export {
  DecodeError,
  DecodeErrorType,
  ResourceError,
  ResourceErrorType,
  SimulationError,
  SimulationErrorType,
} from './types/errors.js';

// Circuit table
export * from './circuit/index.js';

// Bytecode decoding
export * from './bytecode/index.js';

// Simulation
export * from './simulator/index.js';

// Text assembly
export * from './assembler/index.js';

// Standard library
export {
  STDLIB,
  loadStandardLibrary,
  assembleStandardLibrary,
  readStandardLibrarySource,
  stdlibPath,
  type StdlibCircuit,
} from './library/stdlib.js';
