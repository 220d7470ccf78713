import { describe, it, expect } from 'vitest';

import { deepClone, deepEqual, isRecord, unionLists } from '../utils.js';

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});

describe('deepClone', () => {
  it('produces an unaliased copy', () => {
    const source = { a: { b: [1, 2] } };
    const copy = deepClone(source);
    copy.a.b.push(3);
    expect(source.a.b).toEqual([1, 2]);
    expect(deepEqual(deepClone(source), source)).toBe(true);
  });
});

describe('unionLists', () => {
  it('keeps first occurrences in order', () => {
    expect(unionLists(['a', 'b'], ['b', 'c', 'a', 'd'])).toEqual([
      'a',
      'b',
      'c',
      'd',
    ]);
  });

  it('compares items structurally', () => {
    expect(unionLists([{ x: 1 }], [{ x: 1 }, { x: 2 }])).toEqual([
      { x: 1 },
      { x: 2 },
    ]);
  });
});
