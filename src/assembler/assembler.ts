/**
 * Circuit Assembler
 *
 * Turns the text form of circuit definitions into bytecode. One statement per line:
 *
 *   def <id>                 open a definition
 *   apply <target> <wire>*   apply a circuit, inputs first, then outputs
 *   end                      close the open definition
 *
 * Arities are not checked here; the decoder infers and validates them.
 */

import { applyByte, defineByte, ID_MASK, literalByte, LITERAL_MASK } from '../bytecode/opcodes.js';
import { Lexer, Token, TokenType } from './lexer.js';

export class AssemblerError extends Error {
  constructor(message: string, public line: number, public column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'AssemblerError';
  }
}

interface Statement {
  keyword: Token;
  operands: number[];
}

export class Assembler {
  private source: string;
  private tokens: Token[] = [];
  private pos: number = 0;
  private bytes: number[] = [];
  private openDef: { id: number; token: Token } | null = null;

  constructor(source: string) {
    this.source = source;
  }

  assemble(): Uint8Array {
    this.tokens = new Lexer(this.source).tokenize();
    this.pos = 0;
    this.bytes = [];
    this.openDef = null;

    let statement = this.nextStatement();
    while (statement !== null) {
      this.emit(statement);
      statement = this.nextStatement();
    }

    this.checkClosed();

    return Uint8Array.from(this.bytes);
  }

  private checkClosed(): void {
    if (this.openDef !== null) {
      const { id, token } = this.openDef;
      throw new AssemblerError(`Missing 'end' for 'def ${id}'`, token.line, token.column);
    }
  }

  private current(): Token {
    return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
  }

  private nextStatement(): Statement | null {
    while (this.current().type === TokenType.NEWLINE) {
      this.pos++;
    }

    const keyword = this.current();
    if (keyword.type === TokenType.EOF) {
      return null;
    }
    if (keyword.type === TokenType.NUMBER) {
      throw new AssemblerError(`Expected 'def', 'apply' or 'end', got ${keyword.value}`, keyword.line, keyword.column);
    }
    this.pos++;

    const operands: number[] = [];
    let token = this.current();
    while (token.type === TokenType.NUMBER) {
      if (typeof token.value !== 'number') {
        throw new AssemblerError('Malformed number', token.line, token.column);
      }
      operands.push(token.value);
      this.pos++;
      token = this.current();
    }
    if (token.type !== TokenType.NEWLINE && token.type !== TokenType.EOF) {
      throw new AssemblerError(`Unexpected '${token.value}' after '${keyword.value}'`, token.line, token.column);
    }

    return { keyword, operands };
  }

  private emit({ keyword, operands }: Statement): void {
    switch (keyword.type) {
      case TokenType.DEF: {
        this.expectOperands(keyword, operands, 1, 1);
        if (this.openDef !== null) {
          throw new AssemblerError(
            `Nested 'def', circuit ${this.openDef.id} is still open`,
            keyword.line,
            keyword.column
          );
        }
        const id = this.checkRange(keyword, operands[0], ID_MASK, 'Circuit id');
        this.openDef = { id, token: keyword };
        this.bytes.push(defineByte(id));
        break;
      }

      case TokenType.APPLY: {
        this.expectOperands(keyword, operands, 1, Infinity);
        if (this.openDef === null) {
          throw new AssemblerError(`'apply' outside of a definition`, keyword.line, keyword.column);
        }
        const [target, ...wires] = operands;
        this.bytes.push(applyByte(this.checkRange(keyword, target, ID_MASK, 'Circuit id')));
        for (const wire of wires) {
          this.bytes.push(literalByte(this.checkRange(keyword, wire, LITERAL_MASK, 'Wire slot')));
        }
        break;
      }

      case TokenType.END: {
        this.expectOperands(keyword, operands, 0, 0);
        if (this.openDef === null) {
          throw new AssemblerError(`'end' without 'def'`, keyword.line, keyword.column);
        }
        this.bytes.push(defineByte(this.openDef.id));
        this.openDef = null;
        break;
      }

      default:
        throw new AssemblerError(`Unexpected token ${keyword.type}`, keyword.line, keyword.column);
    }
  }

  private expectOperands(keyword: Token, operands: number[], min: number, max: number): void {
    if (operands.length < min || operands.length > max) {
      const expected = min === max ? `${min}` : `at least ${min}`;
      throw new AssemblerError(
        `'${keyword.value}' takes ${expected} operand(s), got ${operands.length}`,
        keyword.line,
        keyword.column
      );
    }
  }

  private checkRange(keyword: Token, value: number, max: number, what: string): number {
    if (value > max) {
      throw new AssemblerError(`${what} ${value} is out of range 0..${max}`, keyword.line, keyword.column);
    }
    return value;
  }
}

export function assemble(source: string): Uint8Array {
  return new Assembler(source).assemble();
}
