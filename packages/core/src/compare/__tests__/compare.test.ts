import { describe, it, expect } from 'vitest';

import { emptySchema, type Attr, type EnumMember, type Schema } from '../../schema/model.js';
import { compare, compareDict, compareSchemas, compareValue } from '../compare.js';
import { NO_CHANGE, diffEntries } from '../model.js';

const name: Attr = {
  caption: 'Name',
  requirement: 'optional',
  type: 'string_t',
  is_array: false,
};

describe('compareValue', () => {
  it('reports equal values as unchanged', () => {
    expect(compareValue(1, 1)).toEqual(NO_CHANGE);
    expect(compareValue(['a'], ['a'])).toEqual(NO_CHANGE);
  });

  it('reports unequal values as a change', () => {
    expect(compareValue('a', 'b')).toEqual({ kind: 'change', before: 'a', after: 'b' });
  });
});

describe('compareDict', () => {
  it('is unchanged when both sides are absent', () => {
    expect(compareDict(undefined, undefined)).toEqual(NO_CHANGE);
    expect(diffEntries(NO_CHANGE)).toEqual([]);
  });

  it('covers the keys of both sides', () => {
    expect(compareDict({ a: 1, b: 2, d: 5 }, { b: 3, c: 4, d: 5 })).toEqual({
      kind: 'map',
      entries: {
        a: { kind: 'removal', before: 1 },
        b: { kind: 'change', before: 2, after: 3 },
        d: NO_CHANGE,
        c: { kind: 'addition', after: 4 },
      },
    });
  });

  it('treats an absent side as empty', () => {
    expect(compareDict(undefined, { a: 'x' })).toEqual({
      kind: 'map',
      entries: { a: { kind: 'addition', after: 'x' } },
    });
  });
});

describe('compare', () => {
  it('is unchanged for equal records', () => {
    expect(compare('attr', name, { ...name })).toEqual(NO_CHANGE);
  });

  it('diffs every field of a changed record', () => {
    const diff = compare('attr', name, { ...name, requirement: 'required' });
    expect(diff).toEqual({
      kind: 'changed',
      model: 'attr',
      caption: NO_CHANGE,
      requirement: { kind: 'change', before: 'optional', after: 'required' },
      type: NO_CHANGE,
      description: NO_CHANGE,
      is_array: NO_CHANGE,
      deprecated: NO_CHANGE,
      enum: NO_CHANGE,
      group: NO_CHANGE,
      observable: NO_CHANGE,
      profile: NO_CHANGE,
      sibling: NO_CHANGE,
      object_type: NO_CHANGE,
      object_name: NO_CHANGE,
    });
  });

  it('diffs nested records when present on both sides', () => {
    const deprecated = { message: 'Use label.', since: '1.0.0' };
    const was: Attr = { ...name, deprecated };
    const added = compare('attr', name, was);
    expect(added).toMatchObject({
      deprecated: { kind: 'change', before: undefined, after: deprecated },
    });

    const moved = compare('attr', was, { ...name, deprecated: { ...deprecated, since: '1.1.0' } });
    expect(moved).toMatchObject({
      deprecated: {
        kind: 'changed',
        model: 'deprecation',
        message: NO_CHANGE,
        since: { kind: 'change', before: '1.0.0', after: '1.1.0' },
      },
    });
  });

  it('diffs enum members through the dictionary', () => {
    const diff = compare(
      'attr',
      { ...name, enum: { '1': { caption: 'One' }, '2': { caption: 'Two' } } },
      { ...name, enum: { '1': { caption: 'Uno' } } }
    );
    expect(diff).toMatchObject({
      enum: {
        kind: 'map',
        entries: {
          '1': {
            kind: 'changed',
            model: 'enumMember',
            caption: { kind: 'change', before: 'One', after: 'Uno' },
          },
          '2': { kind: 'removal', before: { caption: 'Two' } },
        },
      },
    });
  });

  it('rejects values that are not records', () => {
    const missing: EnumMember = JSON.parse('null');
    expect(() => compare('enumMember', missing, { caption: 'One' })).toThrow(
      'Cannot compare null with a record as enumMember'
    );
  });
});

describe('compareSchemas', () => {
  it('returns a changed node for equal schemas', () => {
    const diff = compareSchemas(emptySchema('1.0.0'), emptySchema('1.0.0'));
    expect(diff.kind).toBe('changed');
    expect(diff.version).toEqual(NO_CHANGE);
    expect(diff.classes).toEqual({ kind: 'map', entries: {} });
    expect(diff.base_event).toEqual(NO_CHANGE);
    expect(diff.profiles).toEqual(NO_CHANGE);
  });

  it('diffs classes, objects and categories', () => {
    const before: Schema = {
      ...emptySchema('1.0.0'),
      classes: { login: { caption: 'Login', name: 'login', uid: 3002, attributes: {} } },
      categories: { iam: { name: 'iam', caption: 'IAM', uid: 3 } },
    };
    const after: Schema = {
      ...emptySchema('1.1.0'),
      classes: { login: { caption: 'Login', name: 'login', uid: 3003, attributes: {} } },
      objects: { user: { caption: 'User', name: 'user', attributes: {} } },
      categories: { iam: { name: 'iam', caption: 'Identity', uid: 3 } },
    };
    const diff = compareSchemas(before, after);
    expect(diff.version).toEqual({ kind: 'change', before: '1.0.0', after: '1.1.0' });
    expect(diff.classes).toMatchObject({
      entries: { login: { kind: 'changed', uid: { kind: 'change', before: 3002, after: 3003 } } },
    });
    expect(diffEntries(diff.objects)).toEqual([
      ['user', { kind: 'addition', after: { caption: 'User', name: 'user', attributes: {} } }],
    ]);
    expect(diff.categories).toMatchObject({
      entries: {
        iam: { kind: 'changed', caption: { kind: 'change', before: 'IAM', after: 'Identity' } },
      },
    });
  });
});
