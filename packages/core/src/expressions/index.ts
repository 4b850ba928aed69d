// packages/core/src/expressions/index.ts -- barrel re-export

export type { Expression, CompareOperator, LiteralValue } from './ast.js';
export { Lexer, TokenType } from './lexer.js';
export type { Token } from './lexer.js';
export { Parser, parseExpression } from './parser.js';
export { evaluate, evaluateCondition, isTruthy, referencedFields, resolvePath } from './evaluate.js';
