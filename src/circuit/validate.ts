// Bounds checks shared by the circuit table, decoder and scheduler

import {
  Circuit,
  CircuitId,
  MachineLimits,
  DEFAULT_LIMITS,
  MAX_ENCODABLE_CIRCUITS,
  MAX_ENCODABLE_WIRES,
  Module,
  WireSlot,
} from '../types/circuit.js';
import { ResourceError, ResourceErrorType } from '../types/errors.js';

/**
 * Merge partial limits over the defaults and check them against what the
 * byte encoding can address.
 */
export function resolveLimits(limits: Partial<MachineLimits> = {}): MachineLimits {
  const resolved = { ...DEFAULT_LIMITS, ...limits };

  for (const [key, value] of Object.entries(resolved)) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new RangeError(`Limit ${key} must be a positive integer, got ${value}`);
    }
  }
  if (resolved.maxCircuits > MAX_ENCODABLE_CIRCUITS) {
    throw new RangeError(
      `maxCircuits ${resolved.maxCircuits} exceeds the ${MAX_ENCODABLE_CIRCUITS} ids a 5-bit operand can name`
    );
  }
  if (resolved.wireCapacity > MAX_ENCODABLE_WIRES) {
    throw new RangeError(
      `wireCapacity ${resolved.wireCapacity} exceeds the ${MAX_ENCODABLE_WIRES} slots a literal can name`
    );
  }
  // NAND needs three slots, and the top-level frame needs a child frame
  if (resolved.wireCapacity < 3) {
    throw new RangeError(`wireCapacity must be at least 3, got ${resolved.wireCapacity}`);
  }
  if (resolved.stackDepth < 2) {
    throw new RangeError(`stackDepth must be at least 2, got ${resolved.stackDepth}`);
  }

  return resolved;
}

export function checkCircuitId(id: CircuitId, limits: MachineLimits): void {
  if (!Number.isInteger(id) || id < 0 || id >= limits.maxCircuits) {
    throw new ResourceError(
      ResourceErrorType.CIRCUIT_ID_OUT_OF_RANGE,
      `Circuit id ${id} outside 0..${limits.maxCircuits - 1}`
    );
  }
}

export function checkWireSlot(slot: WireSlot, limits: MachineLimits): void {
  if (!Number.isInteger(slot) || slot < 0 || slot >= limits.wireCapacity) {
    throw new ResourceError(
      ResourceErrorType.WIRE_OUT_OF_RANGE,
      `Wire slot ${slot} outside 0..${limits.wireCapacity - 1}`
    );
  }
}

/**
 * Describe why a circuit is not valid, or return null if it is.
 * Arity and module count must be positive and fit the frame and module capacity.
 */
export function circuitProblem(circuit: Circuit, limits: MachineLimits): string | null {
  const { inputCount, outputCount, modules } = circuit;

  if (inputCount <= 0) return `input count is ${inputCount}`;
  if (outputCount <= 0) return `output count is ${outputCount}`;
  if (modules.length === 0) return 'no modules';
  if (inputCount + outputCount > limits.wireCapacity) {
    return `${inputCount} inputs + ${outputCount} outputs exceed ${limits.wireCapacity} wire slots`;
  }
  if (modules.length > limits.maxModules) {
    return `${modules.length} modules exceed the limit of ${limits.maxModules}`;
  }
  for (const mod of modules) {
    for (const slot of mod.wiring) {
      if (slot < 0 || slot >= limits.wireCapacity) {
        return `module wiring uses slot ${slot}`;
      }
    }
  }
  return null;
}

export function isValidCircuit(circuit: Circuit | undefined, limits: MachineLimits): boolean {
  return circuit !== undefined && circuitProblem(circuit, limits) === null;
}

// Role of a wire slot within a circuit definition
export type WireRole = 'unused' | 'input' | 'output' | 'intermediate';

export interface WireUsage {
  roles: WireRole[];
  inputCount: number;
  outputCount: number;
}

export function emptyUsage(wireCapacity: number): WireUsage {
  return {
    roles: new Array<WireRole>(wireCapacity).fill('unused'),
    inputCount: 0,
    outputCount: 0,
  };
}

// A slot consumed by an application is either a circuit input or an intermediate
// wire, if an earlier application already produced it.
export function useAsInput(usage: WireUsage, slot: WireSlot): void {
  switch (usage.roles[slot]) {
    case 'intermediate':
    case 'input':
      break;
    case 'output':
      usage.roles[slot] = 'intermediate';
      usage.outputCount--;
      break;
    case 'unused':
      usage.roles[slot] = 'input';
      usage.inputCount++;
      break;
  }
}

// Symmetric: a produced slot already consumed earlier is intermediate
export function useAsOutput(usage: WireUsage, slot: WireSlot): void {
  switch (usage.roles[slot]) {
    case 'intermediate':
    case 'output':
      break;
    case 'input':
      usage.roles[slot] = 'intermediate';
      usage.inputCount--;
      break;
    case 'unused':
      usage.roles[slot] = 'output';
      usage.outputCount++;
      break;
  }
}

/**
 * Replay the wiring of every module in order, the way the decoder sees it.
 * `arityOf` gives the input count of each applied circuit.
 */
export function inferWireUsage(
  modules: readonly Module[],
  arityOf: (id: CircuitId) => Pick<Circuit, 'inputCount'>,
  wireCapacity: number
): WireUsage {
  const usage = emptyUsage(wireCapacity);
  for (const mod of modules) {
    const inputs = arityOf(mod.circuitId).inputCount;
    mod.wiring.forEach((slot, i) => {
      if (i < inputs) {
        useAsInput(usage, slot);
      } else {
        useAsOutput(usage, slot);
      }
    });
  }
  return usage;
}

/**
 * Inputs must occupy slots 0..n-1 and outputs the slots right after them,
 * since that is where the scheduler places them in a child frame.
 */
export function layoutProblem(circuit: Circuit, usage: WireUsage): string | null {
  if (usage.inputCount !== circuit.inputCount || usage.outputCount !== circuit.outputCount) {
    return `wiring has ${usage.inputCount} inputs and ${usage.outputCount} outputs, declared ${circuit.inputCount} and ${circuit.outputCount}`;
  }
  for (let slot = 0; slot < circuit.inputCount; slot++) {
    if (usage.roles[slot] !== 'input') {
      return `slot ${slot} should be an input but is ${usage.roles[slot]}`;
    }
  }
  for (let slot = circuit.inputCount; slot < circuit.inputCount + circuit.outputCount; slot++) {
    if (usage.roles[slot] !== 'output') {
      return `slot ${slot} should be an output but is ${usage.roles[slot]}`;
    }
  }
  return null;
}
