/**
 * Circuit Assembly Lexer
 *
 * Tokenizes the text form of circuit bytecode:
 *
 *   def 2          ; AND
 *     apply 0 0 1 3
 *     apply 1 3 2
 *   end
 */

export enum TokenType {
  DEF = 'DEF',
  APPLY = 'APPLY',
  END = 'END',
  NUMBER = 'NUMBER',
  NEWLINE = 'NEWLINE',
  EOF = 'EOF',
}

export interface Token {
  type: TokenType;
  value: string | number;
  line: number;
  column: number;
}

const KEYWORDS = new Map<string, TokenType>([
  ['def', TokenType.DEF],
  ['apply', TokenType.APPLY],
  ['end', TokenType.END],
]);

export class LexerError extends Error {
  constructor(message: string, public line: number, public column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'LexerError';
  }
}

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (!this.isAtEnd()) {
      this.scanToken();
    }

    this.tokens.push({
      type: TokenType.EOF,
      value: '',
      line: this.line,
      column: this.column,
    });

    return this.tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.pos];
  }

  private peekNext(): string {
    if (this.pos + 1 >= this.source.length) return '\0';
    return this.source[this.pos + 1];
  }

  private advance(): string {
    const char = this.source[this.pos++];
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private scanToken(): void {
    const startLine = this.line;
    const startColumn = this.column;
    const char = this.peek();

    switch (char) {
      case ' ':
      case '\t':
      case '\r':
        this.advance();
        break;

      case '\n':
        this.advance();
        this.tokens.push({
          type: TokenType.NEWLINE,
          value: '\n',
          line: startLine,
          column: startColumn,
        });
        break;

      case ';':
      case '#':
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
        break;

      default:
        if (this.isDigit(char)) {
          this.scanNumber(startLine, startColumn);
        } else if (this.isAlpha(char)) {
          this.scanKeyword(startLine, startColumn);
        } else {
          throw new LexerError(`Unexpected character '${char}'`, startLine, startColumn);
        }
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
  }

  private scanNumber(startLine: number, startColumn: number): void {
    let digits = '';
    let radix = 10;
    let valid = (c: string) => this.isDigit(c);

    if (this.peek() === '0' && (this.peekNext() === 'x' || this.peekNext() === 'X')) {
      this.advance();
      this.advance();
      radix = 16;
      valid = (c) => this.isDigit(c) || (c >= 'a' && c <= 'f') || (c >= 'A' && c <= 'F');
    } else if (this.peek() === '0' && (this.peekNext() === 'b' || this.peekNext() === 'B')) {
      this.advance();
      this.advance();
      radix = 2;
      valid = (c) => c === '0' || c === '1';
    }

    while (!this.isAtEnd() && valid(this.peek())) {
      digits += this.advance();
    }

    if (digits.length === 0) {
      throw new LexerError('Number prefix without digits', startLine, startColumn);
    }
    if (this.isAlpha(this.peek()) || this.isDigit(this.peek())) {
      throw new LexerError(`Invalid digit '${this.peek()}' in number`, this.line, this.column);
    }

    this.tokens.push({
      type: TokenType.NUMBER,
      value: parseInt(digits, radix),
      line: startLine,
      column: startColumn,
    });
  }

  private scanKeyword(startLine: number, startColumn: number): void {
    let word = '';
    while (!this.isAtEnd() && (this.isAlpha(this.peek()) || this.isDigit(this.peek()) || this.peek() === '_')) {
      word += this.advance();
    }

    const type = KEYWORDS.get(word.toLowerCase());
    if (type === undefined) {
      throw new LexerError(`Unknown directive '${word}'`, startLine, startColumn);
    }

    this.tokens.push({
      type,
      value: word.toLowerCase(),
      line: startLine,
      column: startColumn,
    });
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
