// The primitive gate. Inputs in slots 0 and 1, output in slot 2.

import { WireState } from '../types/circuit.js';
import type { WireFrame } from './wire-frame.js';

export const NAND_IN_A = 0;
export const NAND_IN_B = 1;
export const NAND_OUT = 2;

export function nand(a: WireState, b: WireState): WireState {
  if (a === WireState.Undefined || b === WireState.Undefined) {
    return WireState.Undefined;
  }
  return a === WireState.On && b === WireState.On ? WireState.Off : WireState.On;
}

/**
 * Evaluate NAND in a frame. Returns false (not ready) when an input is undefined;
 * the output slot is then left Undefined.
 */
export function evaluateNand(frame: WireFrame): boolean {
  const out = nand(frame.get(NAND_IN_A), frame.get(NAND_IN_B));
  frame.set(NAND_OUT, out);
  return out !== WireState.Undefined;
}
