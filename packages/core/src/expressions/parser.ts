// packages/core/src/expressions/parser.ts

import { ExpressionError } from '../utils/errors.js';
import type { CompareOperator, Expression } from './ast.js';
import { Lexer, type Token, TokenType } from './lexer.js';

const COMPARE_OPERATORS: readonly CompareOperator[] = ['==', '!=', '<', '<=', '>', '>='];

function isCompareOperator(value: string): value is CompareOperator {
  return (COMPARE_OPERATORS as readonly string[]).includes(value);
}

const KEYWORD_LITERALS = new Map<string, boolean | null>([
  ['true', true],
  ['True', true],
  ['false', false],
  ['False', false],
  ['null', null],
  ['None', null],
]);

/**
 * Recursive descent parser for route conditions.
 *
 * Precedence (lowest to highest):
 * 1. or / ||
 * 2. and / &&
 * 3. not / !
 * 4. comparison (== != < <= > >= in)
 * 5. primary (literal, state reference, parenthesized expression)
 */
export class Parser {
  private tokens: Token[] = [];
  private current = 0;

  parse(source: string): Expression {
    this.tokens = new Lexer().tokenize(source);
    this.current = 0;
    if (this.check(TokenType.EOF)) throw new ExpressionError('Empty expression', 0);

    const expression = this.parseOr();
    if (!this.check(TokenType.EOF)) {
      const token = this.peek();
      throw new ExpressionError(`Unexpected token '${token.value}'`, token.position);
    }
    return expression;
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.matchWord('or') || this.matchOperator('||')) {
      left = { type: 'Logical', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.matchWord('and') || this.matchOperator('&&')) {
      left = { type: 'Logical', operator: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expression {
    if (this.matchWord('not') || this.matchOperator('!')) {
      return { type: 'Not', argument: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    const left = this.parsePrimary();
    const token = this.peek();

    if (token.type === TokenType.OPERATOR && isCompareOperator(token.value)) {
      this.current++;
      return {
        type: 'Compare',
        operator: token.value,
        left,
        right: this.parsePrimary(),
      };
    }
    if (this.matchWord('in')) {
      return { type: 'Compare', operator: 'in', left, right: this.parsePrimary() };
    }
    return left;
  }

  private parsePrimary(): Expression {
    const token = this.advance();

    switch (token.type) {
      case TokenType.NUMBER:
        return { type: 'Literal', value: Number(token.value) };
      case TokenType.STRING:
        return { type: 'Literal', value: token.value };
      case TokenType.LPAREN: {
        const inner = this.parseOr();
        this.expect(TokenType.RPAREN, "Expected ')'");
        return inner;
      }
      case TokenType.IDENTIFIER:
        return this.parseIdentifier(token);
      default:
        throw new ExpressionError(
          token.type === TokenType.EOF ? 'Unexpected end of expression' : `Unexpected token '${token.value}'`,
          token.position,
        );
    }
  }

  private parseIdentifier(token: Token): Expression {
    const keyword = KEYWORD_LITERALS.get(token.value);
    if (keyword !== undefined) {
      return { type: 'Literal', value: keyword };
    }
    if (token.value !== 'state') {
      throw new ExpressionError(
        `Unknown identifier '${token.value}'; reference state fields as state.${token.value}`,
        token.position,
      );
    }

    const path: string[] = [];
    while (this.check(TokenType.DOT)) {
      this.current++;
      path.push(this.expect(TokenType.IDENTIFIER, 'Expected a field name after "."').value);
    }
    if (path.length === 0) {
      throw new ExpressionError("Expected 'state.<field>'", token.position);
    }
    return { type: 'StateRef', path };
  }

  private peek(): Token {
    return this.tokens[Math.min(this.current, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== TokenType.EOF) this.current++;
    return token;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private expect(type: TokenType, message: string): Token {
    const token = this.peek();
    if (token.type !== type) throw new ExpressionError(message, token.position);
    this.current++;
    return token;
  }

  private matchWord(word: string): boolean {
    const token = this.peek();
    if (token.type === TokenType.IDENTIFIER && token.value === word) {
      this.current++;
      return true;
    }
    return false;
  }

  private matchOperator(op: string): boolean {
    const token = this.peek();
    if (token.type === TokenType.OPERATOR && token.value === op) {
      this.current++;
      return true;
    }
    return false;
  }
}

export function parseExpression(source: string): Expression {
  return new Parser().parse(source);
}
