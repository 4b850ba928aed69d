// packages/core/src/expressions/ast.ts

export type LiteralValue = string | number | boolean | null;

export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in';

export type Expression =
  | { type: 'Literal'; value: LiteralValue }
  /** `state.field` or `state.field.key` */
  | { type: 'StateRef'; path: string[] }
  | { type: 'Not'; argument: Expression }
  | { type: 'Logical'; operator: 'and' | 'or'; left: Expression; right: Expression }
  | { type: 'Compare'; operator: CompareOperator; left: Expression; right: Expression };
