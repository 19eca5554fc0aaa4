import { describe, expect, test } from '@jest/globals';
import { classify, describeKind, isAbsent } from '../../src/validation/document-value';

describe('classify', () => {
  test('tags scalars', () => {
    expect(classify('Art')).toEqual({ kind: 'string', value: 'Art' });
    expect(classify(3.5)).toEqual({ kind: 'number', value: 3.5 });
    expect(classify(false)).toEqual({ kind: 'boolean', value: false });
    expect(classify(null)).toEqual({ kind: 'null' });
  });

  test('treats bigint as a number', () => {
    expect(classify(BigInt(12))).toEqual({ kind: 'number', value: 12 });
  });

  test('maps values with no JSON form to null', () => {
    expect(classify(undefined)).toEqual({ kind: 'null' });
    expect(classify(Symbol('x'))).toEqual({ kind: 'null' });
    expect(classify(() => 1)).toEqual({ kind: 'null' });
  });

  test('keeps array items unclassified', () => {
    const items = [{}, 'x'];
    const value = classify(items);
    expect(value.kind).toBe('array');
    expect(value.kind === 'array' && value.items).toBe(items);
  });

  test('lists object entries in insertion order without absent values', () => {
    const value = classify({ room: '101', skip: undefined, subject: 'math', fn: () => 1 });
    expect(value).toEqual({
      kind: 'object',
      entries: [
        ['room', '101'],
        ['subject', 'math'],
      ],
    });
  });
});

describe('isAbsent', () => {
  test('matches undefined, functions and symbols only', () => {
    expect(isAbsent(undefined)).toBe(true);
    expect(isAbsent(Symbol('x'))).toBe(true);
    expect(isAbsent(() => 1)).toBe(true);
    expect(isAbsent(null)).toBe(false);
    expect(isAbsent(0)).toBe(false);
    expect(isAbsent('')).toBe(false);
  });
});

describe('describeKind', () => {
  test('uses an article for every kind but null', () => {
    expect(describeKind('object')).toBe('an object');
    expect(describeKind('array')).toBe('an array');
    expect(describeKind('string')).toBe('a string');
    expect(describeKind('number')).toBe('a number');
    expect(describeKind('boolean')).toBe('a boolean');
    expect(describeKind('null')).toBe('null');
  });
});
