// Disassembler and circuit listings

import { classifyByte } from '../bytecode/opcodes.js';
import type { CircuitTable } from '../circuit/circuit-table.js';
import { CircuitId, NAND_ID } from '../types/circuit.js';

/**
 * Turn bytecode back into assembly text. Purely syntactic: literals are grouped
 * with the preceding apply, and DEFINE boundaries alternate between def and end.
 * Stray literals are listed as comments.
 */
export function disassemble(bytes: Uint8Array | readonly number[]): string {
  const lines: string[] = [];
  let inDef = false;
  let apply: number[] | null = null;

  const flush = () => {
    if (apply !== null) {
      lines.push(`  apply ${apply.join(' ')}`);
      apply = null;
    }
  };

  for (const b of bytes) {
    const { kind, operand } = classifyByte(b);
    switch (kind) {
      case 'define':
        flush();
        lines.push(inDef ? 'end' : `def ${operand}`);
        inDef = !inDef;
        break;
      case 'apply':
        flush();
        apply = [operand];
        break;
      case 'literal':
        if (apply === null) {
          lines.push(`  ; stray literal ${operand}`);
        } else {
          apply.push(operand);
        }
        break;
    }
  }
  flush();

  return lines.join('\n');
}

function formatSlots(slots: readonly number[]): string {
  return `(${slots.join(' ')})`;
}

/**
 * Arity and module list of a defined circuit
 */
export function describeCircuit(table: CircuitTable, id: CircuitId): string {
  const circuit = table.lookup(id);
  const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? '' : 's'}`;
  const header = `circuit ${id}: ${plural(circuit.inputCount, 'input')}, ${plural(circuit.outputCount, 'output')}`;

  if (id === NAND_ID) {
    return `${header} (NAND primitive)`;
  }

  const lines = [`${header}, ${plural(circuit.modules.length, 'module')}`];
  circuit.modules.forEach((mod, i) => {
    const target = table.lookup(mod.circuitId);
    const inputs = mod.wiring.slice(0, target.inputCount);
    const outputs = mod.wiring.slice(target.inputCount);
    lines.push(`  #${i} circuit ${mod.circuitId} ${formatSlots(inputs)} -> ${formatSlots(outputs)}`);
  });
  return lines.join('\n');
}
