/**
 * Circuit Assembler
 *
 * Text form of the circuit bytecode, and listings for decoded circuits.
 */

export * from './lexer.js';
export * from './assembler.js';
export * from './disassembler.js';
