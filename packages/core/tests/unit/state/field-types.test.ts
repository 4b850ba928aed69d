import { describe, expect, it } from 'vitest';
import {
  coerceFieldValue,
  formatFieldType,
  isTypeCompatible,
  matchesFieldType,
  mergePolicyFor,
  parseFieldType,
} from '../../../src/state/field-types.js';

describe('parseFieldType', () => {
  it('parses primitives, lists and dict', () => {
    expect(parseFieldType('str')).toEqual({ kind: 'primitive', name: 'str' });
    expect(parseFieldType('list')).toEqual({ kind: 'list', item: null });
    expect(parseFieldType('list[int]')).toEqual({ kind: 'list', item: 'int' });
    expect(parseFieldType('dict')).toEqual({ kind: 'dict' });
  });

  it('ignores whitespace inside the brackets', () => {
    expect(parseFieldType('list[ str ]')).toEqual({ kind: 'list', item: 'str' });
  });

  it('returns null for unsupported types', () => {
    expect(parseFieldType('string')).toBeNull();
    expect(parseFieldType('list[dict]')).toBeNull();
    expect(parseFieldType('')).toBeNull();
  });

  it('formats back to the canonical spelling', () => {
    for (const raw of ['str', 'int', 'float', 'bool', 'list', 'list[float]', 'dict']) {
      const type = parseFieldType(raw);
      expect(type && formatFieldType(type)).toBe(raw);
    }
  });
});

describe('mergePolicyFor', () => {
  it('concatenates lists and overwrites everything else', () => {
    expect(mergePolicyFor({ kind: 'list', item: 'str' })).toBe('concat');
    expect(mergePolicyFor({ kind: 'primitive', name: 'int' })).toBe('last-writer-wins');
    expect(mergePolicyFor({ kind: 'dict' })).toBe('last-writer-wins');
  });
});

describe('matchesFieldType', () => {
  it('distinguishes int from float', () => {
    expect(matchesFieldType({ kind: 'primitive', name: 'int' }, 3)).toBe(true);
    expect(matchesFieldType({ kind: 'primitive', name: 'int' }, 3.5)).toBe(false);
    expect(matchesFieldType({ kind: 'primitive', name: 'float' }, 3)).toBe(true);
  });

  it('checks list items against the item type', () => {
    expect(matchesFieldType({ kind: 'list', item: 'str' }, ['a', 'b'])).toBe(true);
    expect(matchesFieldType({ kind: 'list', item: 'str' }, ['a', 1])).toBe(false);
    expect(matchesFieldType({ kind: 'list', item: null }, ['a', 1])).toBe(true);
  });

  it('accepts only plain objects for dict', () => {
    expect(matchesFieldType({ kind: 'dict' }, { a: 1 })).toBe(true);
    expect(matchesFieldType({ kind: 'dict' }, [1])).toBe(false);
  });
});

describe('isTypeCompatible', () => {
  const t = (raw: string) => {
    const type = parseFieldType(raw);
    if (!type) throw new Error(`bad type ${raw}`);
    return type;
  };

  it('widens int to float but not the reverse', () => {
    expect(isTypeCompatible(t('int'), t('float'))).toBe(true);
    expect(isTypeCompatible(t('float'), t('int'))).toBe(false);
  });

  it('lets any list fit an untyped list', () => {
    expect(isTypeCompatible(t('list[str]'), t('list'))).toBe(true);
    expect(isTypeCompatible(t('list'), t('list[str]'))).toBe(false);
    expect(isTypeCompatible(t('list[int]'), t('list[float]'))).toBe(true);
  });

  it('rejects mismatched kinds', () => {
    expect(isTypeCompatible(t('str'), t('list[str]'))).toBe(false);
    expect(isTypeCompatible(t('dict'), t('dict'))).toBe(true);
  });
});

describe('coerceFieldValue', () => {
  it('converts command-line text to typed values', () => {
    expect(coerceFieldValue({ kind: 'primitive', name: 'int' }, '42')).toBe(42);
    expect(coerceFieldValue({ kind: 'primitive', name: 'bool' }, 'yes')).toBe(true);
    expect(coerceFieldValue({ kind: 'primitive', name: 'bool' }, 'False')).toBe(false);
    expect(coerceFieldValue({ kind: 'primitive', name: 'str' }, '42')).toBe('42');
  });

  it('reads lists as JSON or comma-separated text', () => {
    expect(coerceFieldValue({ kind: 'list', item: 'int' }, '[1, 2]')).toEqual([1, 2]);
    expect(coerceFieldValue({ kind: 'list', item: 'int' }, '1, 2,3')).toEqual([1, 2, 3]);
    expect(coerceFieldValue({ kind: 'list', item: 'str' }, 'a,,b')).toEqual(['a', 'b']);
  });

  it('keeps unparseable text so the type check can report it', () => {
    expect(coerceFieldValue({ kind: 'primitive', name: 'int' }, 'abc')).toBe('abc');
    expect(coerceFieldValue({ kind: 'dict' }, '{oops')).toBe('{oops');
  });
});
