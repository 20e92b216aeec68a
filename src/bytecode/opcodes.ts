// Byte tagging for the circuit bytecode
//
//   1 1 i i i i i i   DEFINE boundary, operand = circuit id (opens and closes)
//   1 0 i i i i i i   APPLY, operand = target circuit id
//   0 w w w w w w w   literal, operand = wire slot

export const OPERATION_BIT = 7;
export const DEFINE_BIT = 6;
export const ID_MASK = 0b0001_1111;
export const LITERAL_MASK = 0b0111_1111;

export type ByteKind = 'define' | 'apply' | 'literal';

export interface DecodedByte {
  kind: ByteKind;
  operand: number;
}

export function isOperation(byte: number): boolean {
  return ((byte >> OPERATION_BIT) & 1) === 1;
}

export function isDefineBoundary(byte: number): boolean {
  return isOperation(byte) && ((byte >> DEFINE_BIT) & 1) === 1;
}

export function classifyByte(byte: number): DecodedByte {
  if (!isOperation(byte)) {
    return { kind: 'literal', operand: byte & LITERAL_MASK };
  }
  return {
    kind: isDefineBoundary(byte) ? 'define' : 'apply',
    operand: byte & ID_MASK,
  };
}

function checkOperand(value: number, mask: number, what: string): void {
  if (!Number.isInteger(value) || value < 0 || value > mask) {
    throw new RangeError(`${what} ${value} does not fit in operand range 0..${mask}`);
  }
}

export function defineByte(id: number): number {
  checkOperand(id, ID_MASK, 'Circuit id');
  return 0b1100_0000 | id;
}

export function applyByte(id: number): number {
  checkOperand(id, ID_MASK, 'Circuit id');
  return 0b1000_0000 | id;
}

export function literalByte(slot: number): number {
  checkOperand(slot, LITERAL_MASK, 'Wire slot');
  return slot;
}
