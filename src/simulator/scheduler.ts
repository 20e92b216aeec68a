// Ring scheduler: evaluates a compound circuit to a fixed point by retrying
// modules whose inputs are not resolved yet.
//
// The modules of the circuit are loaded into a ring in definition order. Each pop
// opens a child frame, copies the module's inputs into it and evaluates the target
// (NAND directly, anything else recursively). A module that is not ready goes back
// to the tail of the ring. After every full pass over the ring:
//   - nothing resolved  -> stall, the circuit cannot be resolved
//   - everything done   -> success
//   - otherwise         -> another pass over what is left

import { CircuitTable } from '../circuit/circuit-table.js';
import { CircuitId, Module, NAND_ID } from '../types/circuit.js';
import { ResourceError, ResourceErrorType } from '../types/errors.js';
import { evaluateNand } from './nand.js';
import { Ring } from './ring.js';
import { WireFrameStack } from './wire-frame.js';

export interface SimulationStats {
  nandEvaluations: number;
  moduleEvaluations: number;
  // Passes started after a pass that made partial progress
  retries: number;
  // Completed passes over a ring, at every nesting level
  passes: number;
  // Scheduler invocations that ended without progress
  stalls: number;
  // Deepest frame opened
  maxDepth: number;
}

export function emptyStats(): SimulationStats {
  return {
    nandEvaluations: 0,
    moduleEvaluations: 0,
    retries: 0,
    passes: 0,
    stalls: 0,
    maxDepth: 0,
  };
}

export class RingScheduler {
  private table: CircuitTable;
  private stack: WireFrameStack;
  private stats: SimulationStats = emptyStats();
  private verbose: boolean;

  constructor(table: CircuitTable, stack: WireFrameStack, verbose: boolean = false) {
    this.table = table;
    this.stack = stack;
    this.verbose = verbose;
  }

  getStats(): SimulationStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  /**
   * Evaluate a compound circuit whose inputs are already in the frame at `depth`.
   * Outputs are written to the same frame. Returns false if the circuit stalled.
   */
  simulateAt(circuitId: CircuitId, depth: number): boolean {
    if (depth + 1 >= this.stack.depth) {
      throw new ResourceError(
        ResourceErrorType.STACK_OVERFLOW,
        `Circuit ${circuitId} at depth ${depth} needs frame ${depth + 1}, stack has ${this.stack.depth}`
      );
    }

    const circuit = this.table.lookup(circuitId);
    const ring = Ring.from<Module>(circuit.modules, this.table.limits.maxModules);
    const frame = this.stack.frame(depth);

    let initialSize = ring.size;
    let remaining = ring.size;

    while (true) {
      const mod = ring.pop();
      const target = this.table.lookup(mod.circuitId);

      // Open the child frame with the module's inputs
      const child = this.stack.open(depth + 1);
      this.stats.maxDepth = Math.max(this.stats.maxDepth, depth + 1);
      for (let i = 0; i < target.inputCount; i++) {
        child.set(i, frame.get(mod.wiring[i]));
      }

      let ready: boolean;
      if (mod.circuitId === NAND_ID) {
        this.stats.nandEvaluations++;
        ready = evaluateNand(child);
      } else {
        this.stats.moduleEvaluations++;
        ready = this.simulateAt(mod.circuitId, depth + 1);
      }

      if (ready) {
        for (let o = target.inputCount; o < target.inputCount + target.outputCount; o++) {
          frame.set(mod.wiring[o], child.get(o));
        }
      } else {
        ring.push(mod);
      }

      remaining--;
      if (remaining > 0) continue;

      this.stats.passes++;
      if (ring.size === initialSize) {
        this.stats.stalls++;
        if (this.verbose) {
          console.log(`[scheduler] circuit ${circuitId} stalled at depth ${depth} with ${ring.size} pending`);
        }
        return false;
      }
      if (ring.size === 0) {
        return true;
      }

      // Partial progress: retry what is left
      initialSize = ring.size;
      remaining = ring.size;
      this.stats.retries++;
      if (this.verbose) {
        console.log(`[scheduler] circuit ${circuitId} retrying ${ring.size} modules at depth ${depth}`);
      }
    }
  }
}
