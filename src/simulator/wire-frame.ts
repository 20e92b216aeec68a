// Wire frames: one fixed-size frame of wire states per nesting depth
// All frames live in a single preallocated buffer, one row per depth.

import { MachineLimits, WireSlot, WireState, toWireState } from '../types/circuit.js';
import { ResourceError, ResourceErrorType } from '../types/errors.js';
import { formatWires } from './bits.js';

export class WireFrame {
  readonly depth: number;
  private view: Uint8Array;

  constructor(view: Uint8Array, depth: number) {
    this.view = view;
    this.depth = depth;
  }

  get capacity(): number {
    return this.view.length;
  }

  get(slot: WireSlot): WireState {
    this.check(slot);
    return toWireState(this.view[slot]);
  }

  set(slot: WireSlot, state: WireState): void {
    this.check(slot);
    this.view[slot] = state;
  }

  clear(): void {
    this.view.fill(WireState.Undefined);
  }

  /**
   * Copy of the states in [start, start + count)
   */
  slice(start: WireSlot, count: number): WireState[] {
    const states: WireState[] = [];
    for (let i = 0; i < count; i++) {
      states.push(this.get(start + i));
    }
    return states;
  }

  private check(slot: WireSlot): void {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.view.length) {
      throw new ResourceError(
        ResourceErrorType.WIRE_OUT_OF_RANGE,
        `Wire slot ${slot} outside frame of ${this.view.length} slots at depth ${this.depth}`
      );
    }
  }
}

export class WireFrameStack {
  readonly depth: number;
  readonly wireCapacity: number;
  private buffer: Uint8Array;
  private frames: WireFrame[];

  constructor(limits: Pick<MachineLimits, 'stackDepth' | 'wireCapacity'>) {
    this.depth = limits.stackDepth;
    this.wireCapacity = limits.wireCapacity;
    this.buffer = new Uint8Array(this.depth * this.wireCapacity);
    this.frames = [];
    for (let d = 0; d < this.depth; d++) {
      const start = d * this.wireCapacity;
      this.frames.push(new WireFrame(this.buffer.subarray(start, start + this.wireCapacity), d));
    }
  }

  /**
   * Frame at a depth, unchanged
   */
  frame(depth: number): WireFrame {
    const frame = Number.isInteger(depth) ? this.frames[depth] : undefined;
    if (frame === undefined) {
      throw new ResourceError(
        ResourceErrorType.STACK_OVERFLOW,
        `Frame depth ${depth} outside the stack of ${this.depth} frames`
      );
    }
    return frame;
  }

  /**
   * Frame at a depth, cleared to Undefined
   */
  open(depth: number): WireFrame {
    const frame = this.frame(depth);
    frame.clear();
    return frame;
  }

  reset(): void {
    this.buffer.fill(WireState.Undefined);
  }

  /**
   * One line per frame, '?' for undefined wires
   */
  dump(): string[] {
    return this.frames.map((frame) => formatWires(frame.slice(0, this.wireCapacity)));
  }
}
