// Conversions between plain bits, integers and wire states

import { WireState } from '../types/circuit.js';

export type Bit = 0 | 1;

export function toWire(bit: Bit | boolean): WireState {
  return bit === 1 || bit === true ? WireState.On : WireState.Off;
}

/**
 * Bit value of a resolved wire, null for Undefined
 */
export function fromWire(state: WireState): Bit | null {
  switch (state) {
    case WireState.On:
      return 1;
    case WireState.Off:
      return 0;
    case WireState.Undefined:
      return null;
  }
}

/**
 * Bits of an unsigned value, most significant first
 */
export function toBits(value: number, width: number): Bit[] {
  if (!Number.isInteger(value) || value < 0 || value >= 2 ** width) {
    throw new RangeError(`${value} does not fit in ${width} unsigned bits`);
  }
  const bits: Bit[] = [];
  for (let i = width - 1; i >= 0; i--) {
    bits.push(((value >> i) & 1) === 1 ? 1 : 0);
  }
  return bits;
}

/**
 * Unsigned value of bits, most significant first
 */
export function fromBits(bits: readonly Bit[]): number {
  let value = 0;
  for (const bit of bits) {
    value = value * 2 + bit;
  }
  return value;
}

export function wireToChar(state: WireState): string {
  switch (state) {
    case WireState.On:
      return '1';
    case WireState.Off:
      return '0';
    case WireState.Undefined:
      return '?';
  }
}

export function formatWires(states: readonly WireState[]): string {
  return states.map(wireToChar).join('');
}
