// packages/core/src/expressions/lexer.ts

import { ExpressionError } from '../utils/errors.js';

export const TokenType = {
  NUMBER: 'NUMBER',
  STRING: 'STRING',
  IDENTIFIER: 'IDENTIFIER',
  DOT: 'DOT',
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  OPERATOR: 'OPERATOR',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export interface Token {
  type: TokenType;
  value: string;
  /** Offset of the first character in the source. */
  position: number;
}

// Longest first so `>=` wins over `>`.
const OPERATORS = ['==', '!=', '>=', '<=', '&&', '||', '>', '<', '!'];

/**
 * Tokenizer for route conditions: numbers, quoted strings, identifiers,
 * dotted paths, parentheses and comparison/boolean operators.
 */
export class Lexer {
  private input = '';
  private position = 0;

  tokenize(input: string): Token[] {
    this.input = input;
    this.position = 0;
    const tokens: Token[] = [];

    while (true) {
      this.skipWhitespace();
      if (this.isAtEnd()) break;
      tokens.push(this.nextToken());
    }

    tokens.push({ type: TokenType.EOF, value: '', position: this.position });
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private peek(offset = 0): string {
    return this.input.charAt(this.position + offset);
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && /\s/.test(this.peek())) this.position++;
  }

  private nextToken(): Token {
    const start = this.position;
    const char = this.peek();

    if (/[0-9]/.test(char) || (char === '-' && /[0-9]/.test(this.peek(1)))) {
      return this.number(start);
    }
    if (char === '"' || char === "'") return this.string(start, char);
    if (/[A-Za-z_]/.test(char)) return this.identifier(start);

    if (char === '.') {
      this.position++;
      return { type: TokenType.DOT, value: '.', position: start };
    }
    if (char === '(' || char === ')') {
      this.position++;
      return { type: char === '(' ? TokenType.LPAREN : TokenType.RPAREN, value: char, position: start };
    }

    const op = OPERATORS.find((candidate) => this.input.startsWith(candidate, this.position));
    if (op) {
      this.position += op.length;
      return { type: TokenType.OPERATOR, value: op, position: start };
    }

    throw new ExpressionError(`Unexpected character '${char}'`, start);
  }

  private number(start: number): Token {
    if (this.peek() === '-') this.position++;
    while (/[0-9]/.test(this.peek())) this.position++;
    if (this.peek() === '.' && /[0-9]/.test(this.peek(1))) {
      this.position++;
      while (/[0-9]/.test(this.peek())) this.position++;
    }
    return { type: TokenType.NUMBER, value: this.input.slice(start, this.position), position: start };
  }

  private string(start: number, quote: string): Token {
    this.position++;
    let value = '';
    while (!this.isAtEnd() && this.peek() !== quote) {
      if (this.peek() === '\\' && this.position + 1 < this.input.length) {
        this.position++;
      }
      value += this.peek();
      this.position++;
    }
    if (this.isAtEnd()) throw new ExpressionError('Unterminated string', start);
    this.position++;
    return { type: TokenType.STRING, value, position: start };
  }

  private identifier(start: number): Token {
    while (/[A-Za-z0-9_]/.test(this.peek())) this.position++;
    return { type: TokenType.IDENTIFIER, value: this.input.slice(start, this.position), position: start };
  }
}
