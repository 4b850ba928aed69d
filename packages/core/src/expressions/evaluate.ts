// packages/core/src/expressions/evaluate.ts

import type { StateSnapshot } from '../state/state-record.js';
import { type StateValue, isPlainObject } from '../state/values.js';
import { ExpressionError } from '../utils/errors.js';
import type { CompareOperator, Expression } from './ast.js';

type Value = StateValue | undefined;

export function isTruthy(value: Value): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}

function deepEqual(a: Value, b: Value): boolean {
  // A missing value equals null.
  if ((a ?? null) === (b ?? null)) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length && keys.every((key) => deepEqual(a[key], b[key]))
    );
  }
  return false;
}

function describe(value: Value): string {
  if (value === undefined || value === null) return 'null';
  return Array.isArray(value) ? 'list' : typeof value;
}

function compare(operator: CompareOperator, left: Value, right: Value): boolean {
  switch (operator) {
    case '==':
      return deepEqual(left, right);
    case '!=':
      return !deepEqual(left, right);
    case 'in':
      if (Array.isArray(right)) return right.some((item) => deepEqual(left, item));
      if (typeof right === 'string' && typeof left === 'string') return right.includes(left);
      if (isPlainObject(right) && typeof left === 'string') return Object.hasOwn(right, left);
      throw new ExpressionError(`Cannot test membership of ${describe(left)} in ${describe(right)}`);
    default:
      if (typeof left === 'number' && typeof right === 'number') return ordered(operator, left, right);
      if (typeof left === 'string' && typeof right === 'string') return ordered(operator, left, right);
      throw new ExpressionError(`Cannot compare ${describe(left)} ${operator} ${describe(right)}`);
  }
}

function ordered<T extends number | string>(operator: '<' | '<=' | '>' | '>=', a: T, b: T): boolean {
  switch (operator) {
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
  }
}

/** Walk a dotted path through nested objects; undefined when any step is missing. */
export function resolvePath(snapshot: StateSnapshot, path: readonly string[]): Value {
  let value: Value = snapshot[path[0]];
  for (const key of path.slice(1)) {
    if (!isPlainObject(value) || !Object.hasOwn(value, key)) return undefined;
    value = value[key];
  }
  return value;
}

/** Evaluate an expression against a snapshot. Throws ExpressionError on type errors. */
export function evaluate(expression: Expression, snapshot: StateSnapshot): Value {
  switch (expression.type) {
    case 'Literal':
      return expression.value;
    case 'StateRef':
      return resolvePath(snapshot, expression.path);
    case 'Not':
      return !isTruthy(evaluate(expression.argument, snapshot));
    case 'Logical': {
      const left = isTruthy(evaluate(expression.left, snapshot));
      if (expression.operator === 'and') {
        return left && isTruthy(evaluate(expression.right, snapshot));
      }
      return left || isTruthy(evaluate(expression.right, snapshot));
    }
    case 'Compare':
      return compare(
        expression.operator,
        evaluate(expression.left, snapshot),
        evaluate(expression.right, snapshot),
      );
  }
}

export function evaluateCondition(expression: Expression, snapshot: StateSnapshot): boolean {
  return isTruthy(evaluate(expression, snapshot));
}

/** Top-level state fields an expression reads. */
export function referencedFields(expression: Expression): string[] {
  const fields = new Set<string>();
  const visit = (node: Expression): void => {
    switch (node.type) {
      case 'StateRef':
        fields.add(node.path[0]);
        break;
      case 'Not':
        visit(node.argument);
        break;
      case 'Logical':
      case 'Compare':
        visit(node.left);
        visit(node.right);
        break;
      case 'Literal':
        break;
    }
  };
  visit(expression);
  return [...fields];
}
