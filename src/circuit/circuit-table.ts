// Circuit table: fixed-size registry from small integer ids to circuit definitions
// Filled once by the decoder, then frozen before any simulation runs.

import {
  Circuit,
  CircuitId,
  MachineLimits,
  Module,
  NAND_CIRCUIT,
  NAND_ID,
} from '../types/circuit.js';
import { DecodeError, DecodeErrorType } from '../types/errors.js';
import {
  checkCircuitId,
  circuitProblem,
  inferWireUsage,
  isValidCircuit,
  layoutProblem,
  resolveLimits,
} from './validate.js';

function freezeCircuit(circuit: Circuit): Circuit {
  const modules: Module[] = circuit.modules.map((mod) =>
    Object.freeze({ circuitId: mod.circuitId, wiring: Object.freeze([...mod.wiring]) })
  );
  return Object.freeze({
    inputCount: circuit.inputCount,
    outputCount: circuit.outputCount,
    modules: Object.freeze(modules),
  });
}

export class CircuitTable {
  readonly limits: MachineLimits;
  private slots: (Circuit | undefined)[];
  private frozen: boolean = false;

  constructor(limits: Partial<MachineLimits> = {}) {
    this.limits = resolveLimits(limits);
    this.slots = new Array<Circuit | undefined>(this.limits.maxCircuits).fill(undefined);
    this.slots[NAND_ID] = NAND_CIRCUIT;
  }

  /**
   * Register a circuit under an unused id. The stored copy is deep-frozen.
   */
  define(id: CircuitId, circuit: Circuit): void {
    if (this.frozen) {
      throw new Error(`Circuit table is frozen, cannot define circuit ${id}`);
    }
    checkCircuitId(id, this.limits);
    if (this.isDefined(id)) {
      throw new DecodeError(DecodeErrorType.REDEFINITION, `Circuit ${id} is already defined`);
    }
    const problem = circuitProblem(circuit, this.limits);
    if (problem !== null) {
      throw new DecodeError(DecodeErrorType.INVALID_CIRCUIT, `Circuit ${id} is invalid: ${problem}`);
    }
    for (const mod of circuit.modules) {
      if (!this.isDefined(mod.circuitId)) {
        throw new DecodeError(
          DecodeErrorType.UNDEFINED_CIRCUIT,
          `Circuit ${id} applies undefined circuit ${mod.circuitId}`
        );
      }
      const target = this.lookup(mod.circuitId);
      if (mod.wiring.length !== target.inputCount + target.outputCount) {
        throw new DecodeError(
          DecodeErrorType.INVALID_CIRCUIT,
          `Circuit ${id} wires ${mod.wiring.length} slots to circuit ${mod.circuitId}, expected ${target.inputCount + target.outputCount}`
        );
      }
    }
    const usage = inferWireUsage(circuit.modules, (target) => this.lookup(target), this.limits.wireCapacity);
    const layout = layoutProblem(circuit, usage);
    if (layout !== null) {
      throw new DecodeError(DecodeErrorType.INVALID_CIRCUIT, `Circuit ${id} is invalid: ${layout}`);
    }
    this.slots[id] = freezeCircuit(circuit);
  }

  lookup(id: CircuitId): Circuit {
    const circuit = Number.isInteger(id) ? this.slots[id] : undefined;
    if (circuit === undefined || !isValidCircuit(circuit, this.limits)) {
      throw new DecodeError(DecodeErrorType.UNDEFINED_CIRCUIT, `Circuit ${id} is not defined`);
    }
    return circuit;
  }

  isDefined(id: CircuitId): boolean {
    if (!Number.isInteger(id) || id < 0 || id >= this.limits.maxCircuits) {
      return false;
    }
    return isValidCircuit(this.slots[id], this.limits);
  }

  /**
   * Ids of all defined circuits, ascending
   */
  ids(): CircuitId[] {
    const result: CircuitId[] = [];
    for (let id = 0; id < this.slots.length; id++) {
      if (this.isDefined(id)) result.push(id);
    }
    return result;
  }

  get size(): number {
    return this.ids().length;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}
