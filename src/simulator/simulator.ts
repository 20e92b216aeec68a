// Simulator: evaluates a circuit of a frozen table against an input vector

import { CircuitTable } from '../circuit/circuit-table.js';
import { decode, type DecoderOptions } from '../bytecode/decoder.js';
import type { ByteSource } from '../bytecode/byte-reader.js';
import { Circuit, CircuitId, WireState } from '../types/circuit.js';
import { SimulationError, SimulationErrorType } from '../types/errors.js';
import { type Bit, formatWires, fromWire, toWire } from './bits.js';
import { RingScheduler, type SimulationStats } from './scheduler.js';
import { WireFrameStack } from './wire-frame.js';

export interface SimulatorOptions {
  // Log each top-level simulation and scheduler stalls/retries
  verbose: boolean;
}

const DEFAULT_OPTIONS: SimulatorOptions = {
  verbose: false,
};

export type UnresolvedReason = 'stalled' | 'undefined-output';

export type SimulationResult =
  | { ok: true; outputs: WireState[] }
  | { ok: false; reason: UnresolvedReason; outputs: WireState[] };

export class Simulator {
  private table: CircuitTable;
  private stack: WireFrameStack;
  private scheduler: RingScheduler;
  private verbose: boolean;

  constructor(table: CircuitTable, options: Partial<SimulatorOptions> = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    // Decoding is over once simulation starts
    this.table = table.freeze();
    this.stack = new WireFrameStack(table.limits);
    this.scheduler = new RingScheduler(table, this.stack, opts.verbose);
    this.verbose = opts.verbose;
  }

  /**
   * Decode bytecode into a fresh table and create a simulator over it
   */
  static fromBytecode(
    source: ByteSource,
    options: Partial<SimulatorOptions & Pick<DecoderOptions, 'limits'>> = {}
  ): Simulator {
    const table = decode(source, { limits: options.limits ?? {}, verbose: options.verbose ?? false });
    return new Simulator(table, options);
  }

  getTable(): CircuitTable {
    return this.table;
  }

  circuit(id: CircuitId): Circuit {
    return this.table.lookup(id);
  }

  /**
   * Evaluate a circuit and report whether every output resolved.
   * Partial outputs are returned either way.
   */
  trySimulate(circuitId: CircuitId, inputs: readonly WireState[]): SimulationResult {
    const circuit = this.table.lookup(circuitId);
    if (inputs.length !== circuit.inputCount) {
      throw new SimulationError(
        SimulationErrorType.INPUT_ARITY,
        `Circuit ${circuitId} takes ${circuit.inputCount} inputs, got ${inputs.length}`
      );
    }

    this.scheduler.resetStats();
    this.stack.reset();
    const frame = this.stack.open(0);
    inputs.forEach((state, i) => frame.set(i, state));

    const resolved = this.scheduler.simulateAt(circuitId, 0);
    const outputs = frame.slice(circuit.inputCount, circuit.outputCount);

    if (this.verbose) {
      console.log(
        `[simulator] circuit ${circuitId}: ${formatWires(inputs)} -> ${formatWires(outputs)}${resolved ? '' : ' (stalled)'}`
      );
    }

    if (!resolved) {
      return { ok: false, reason: 'stalled', outputs };
    }
    if (outputs.some((state) => state === WireState.Undefined)) {
      return { ok: false, reason: 'undefined-output', outputs };
    }
    return { ok: true, outputs };
  }

  /**
   * Evaluate a circuit; unresolved outputs are an error, never a partial vector
   */
  simulate(circuitId: CircuitId, inputs: readonly WireState[]): WireState[] {
    const result = this.trySimulate(circuitId, inputs);
    if (!result.ok) {
      throw new SimulationError(
        SimulationErrorType.UNRESOLVED,
        `Circuit ${circuitId} is unresolvable (${result.reason}): outputs ${formatWires(result.outputs)}`
      );
    }
    return result.outputs;
  }

  simulateBits(circuitId: CircuitId, inputs: readonly Bit[]): Bit[] {
    return this.simulate(circuitId, inputs.map((bit) => toWire(bit))).map((state) => {
      const bit = fromWire(state);
      if (bit === null) {
        throw new SimulationError(SimulationErrorType.UNRESOLVED, `Circuit ${circuitId} left an output undefined`);
      }
      return bit;
    });
  }

  /**
   * Counters of the last simulation
   */
  getStats(): SimulationStats {
    return this.scheduler.getStats();
  }

  /**
   * Contents of every frame after the last simulation, for debugging
   */
  dumpFrames(): string[] {
    return this.stack.dump();
  }
}
