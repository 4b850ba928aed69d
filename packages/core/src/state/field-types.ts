// packages/core/src/state/field-types.ts — Field type tags for state and output fields

import type { StateValue } from './values.js';
import { isPlainObject } from './values.js';

export type PrimitiveTypeName = 'str' | 'int' | 'float' | 'bool';

export type FieldType =
  | { kind: 'primitive'; name: PrimitiveTypeName }
  | { kind: 'list'; item: PrimitiveTypeName | null }
  | { kind: 'dict' };

export type MergePolicy = 'last-writer-wins' | 'concat';

const PRIMITIVES: readonly PrimitiveTypeName[] = ['str', 'int', 'float', 'bool'];

function isPrimitiveName(value: string): value is PrimitiveTypeName {
  return (PRIMITIVES as readonly string[]).includes(value);
}

/**
 * Parse a type string such as `str`, `list[int]` or `dict`.
 * Returns null for anything unsupported.
 */
export function parseFieldType(raw: string): FieldType | null {
  const text = raw.replace(/\s+/g, '');
  if (isPrimitiveName(text)) return { kind: 'primitive', name: text };
  if (text === 'list') return { kind: 'list', item: null };
  if (text === 'dict') return { kind: 'dict' };

  const match = /^list\[(\w+)\]$/.exec(text);
  if (match && isPrimitiveName(match[1])) return { kind: 'list', item: match[1] };
  return null;
}

export function formatFieldType(type: FieldType): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'list':
      return type.item ? `list[${type.item}]` : 'list';
    case 'dict':
      return 'dict';
  }
}

export function mergePolicyFor(type: FieldType): MergePolicy {
  return type.kind === 'list' ? 'concat' : 'last-writer-wins';
}

function matchesPrimitive(name: PrimitiveTypeName, value: StateValue): boolean {
  switch (name) {
    case 'str':
      return typeof value === 'string';
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'bool':
      return typeof value === 'boolean';
  }
}

/** True when a non-null value has the shape the type requires. */
export function matchesFieldType(type: FieldType, value: StateValue): boolean {
  switch (type.kind) {
    case 'primitive':
      return matchesPrimitive(type.name, value);
    case 'list': {
      if (!Array.isArray(value)) return false;
      const item = type.item;
      return item === null || value.every((v) => matchesPrimitive(item, v));
    }
    case 'dict':
      return isPlainObject(value);
  }
}

/**
 * Whether a value declared as `source` may be stored in a field of type `target`.
 * `int` widens to `float`, and any list fits an untyped list.
 */
export function isTypeCompatible(source: FieldType, target: FieldType): boolean {
  if (source.kind === 'primitive' && target.kind === 'primitive') {
    return source.name === target.name || (source.name === 'int' && target.name === 'float');
  }
  if (source.kind === 'list' && target.kind === 'list') {
    if (target.item === null) return true;
    if (source.item === null) return false;
    return (
      source.item === target.item || (source.item === 'int' && target.item === 'float')
    );
  }
  return source.kind === 'dict' && target.kind === 'dict';
}

/**
 * Convert command-line text into a typed value. Lists and dicts are read as JSON;
 * a plain comma-separated string is accepted for lists.
 */
export function coerceFieldValue(type: FieldType, text: string): StateValue {
  switch (type.kind) {
    case 'primitive':
      return coercePrimitive(type.name, text);
    case 'list':
      if (text.trim().startsWith('[')) return parseJsonValue(text);
      return text
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map((part) => (type.item ? coercePrimitive(type.item, part) : part));
    case 'dict':
      return parseJsonValue(text);
  }
}

function coercePrimitive(name: PrimitiveTypeName, text: string): StateValue {
  switch (name) {
    case 'str':
      return text;
    case 'int':
    case 'float': {
      const n = Number(text);
      return text.trim() !== '' && Number.isFinite(n) ? n : text;
    }
    case 'bool':
      if (/^(true|yes|1)$/i.test(text)) return true;
      if (/^(false|no|0)$/i.test(text)) return false;
      return text;
  }
}

function parseJsonValue(text: string): StateValue {
  try {
    const parsed: StateValue = JSON.parse(text);
    return parsed;
  } catch {
    // Not JSON: keep the raw text so the type check reports it against the field.
    return text;
  }
}
