// Standard circuit library: basic gates and adders, built from NAND
// Source lives in circuits/stdlib.nasm at the package root.

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { assemble } from '../assembler/assembler.js';
import { decode, type DecoderOptions } from '../bytecode/decoder.js';
import type { CircuitTable } from '../circuit/circuit-table.js';

export const STDLIB = {
  NAND: 0,
  NOT: 1,
  AND: 2,
  OR: 3,
  NOR: 4,
  XOR: 5,
  HALF_ADDER: 6,
  FULL_ADDER: 7,
  ADDER4: 8,
} as const;

export type StdlibCircuit = keyof typeof STDLIB;

const __dirname = dirname(fileURLToPath(import.meta.url));

// From src/library, or dist/src/library once built
const CANDIDATES = [
  join(__dirname, '..', '..', 'circuits', 'stdlib.nasm'),
  join(__dirname, '..', '..', '..', 'circuits', 'stdlib.nasm'),
];

export function stdlibPath(): string {
  const found = CANDIDATES.find((path) => existsSync(path));
  if (found === undefined) {
    throw new Error(`Standard library source not found, looked in ${CANDIDATES.join(', ')}`);
  }
  return found;
}

export function readStandardLibrarySource(path: string = stdlibPath()): string {
  return readFileSync(path, 'utf-8');
}

export function assembleStandardLibrary(path?: string): Uint8Array {
  return assemble(readStandardLibrarySource(path));
}

/**
 * Decode the standard library into a frozen circuit table
 */
export function loadStandardLibrary(options: Partial<DecoderOptions> = {}): CircuitTable {
  return decode(assembleStandardLibrary(), options);
}
