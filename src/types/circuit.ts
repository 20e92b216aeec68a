// Circuit types for the NAND bytecode machine
// Every circuit is built out of previously defined circuits, bottoming out at NAND (id 0)

export type CircuitId = number;
export type WireSlot = number;

// Tri-valued wire state. Undefined is the zero value so a cleared frame reads as unresolved.
export enum WireState {
  Undefined = 0,
  Off = 1,
  On = 2,
}

export function toWireState(value: number): WireState {
  switch (value) {
    case WireState.Off:
      return WireState.Off;
    case WireState.On:
      return WireState.On;
    default:
      return WireState.Undefined;
  }
}

// One application of a circuit inside another circuit's definition.
// wiring = [...input slots, ...output slots] in the enclosing frame.
export interface Module {
  readonly circuitId: CircuitId;
  readonly wiring: readonly WireSlot[];
}

export interface Circuit {
  readonly inputCount: number;
  readonly outputCount: number;
  readonly modules: readonly Module[];
}

export const NAND_ID: CircuitId = 0;

// The primitive gate: inputs in slots 0 and 1, output in slot 2.
// Its single module is a placeholder; the scheduler never expands it.
export const NAND_CIRCUIT: Circuit = Object.freeze({
  inputCount: 2,
  outputCount: 1,
  modules: Object.freeze([
    Object.freeze({ circuitId: NAND_ID, wiring: Object.freeze([0, 1, 2]) }),
  ]),
});

// Fixed capacities of the machine. Everything is preallocated against these.
export interface MachineLimits {
  // Wire slots per frame
  wireCapacity: number;
  // Size of the circuit table (ids 0..maxCircuits-1)
  maxCircuits: number;
  // Modules per circuit, also the ring capacity
  maxModules: number;
  // Number of wire frames, i.e. maximum nesting depth + 1
  stackDepth: number;
  // Read-ahead buffer of the decoder
  readBufferSize: number;
}

export const DEFAULT_LIMITS: MachineLimits = {
  wireCapacity: 32,
  maxCircuits: 32,
  maxModules: 32,
  stackDepth: 8,
  readBufferSize: 1024,
};

// Hard ceilings imposed by the byte encoding
export const MAX_ENCODABLE_CIRCUITS = 32; // 5-bit operand
export const MAX_ENCODABLE_WIRES = 128;   // 7-bit literal
