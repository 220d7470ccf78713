import { describe, it, expect } from 'vitest';

import type { AttrDefn, EventDefn, ObjectDefn } from '../../repository/definitions.js';
import { canUpdate, merge, prefixResults } from '../merge.js';

describe('canUpdate', () => {
  it('fills absent values by default', () => {
    expect(canUpdate(['caption'], undefined, 'A')).toBe(true);
    expect(canUpdate(['caption'], 'A', 'B')).toBe(false);
    expect(canUpdate(['caption'], undefined, undefined)).toBe(false);
  });

  it('replaces present values only with overwrite', () => {
    expect(canUpdate(['caption'], 'A', 'B', { overwrite: true })).toBe(true);
    expect(canUpdate(['caption'], 'A', undefined, { overwrite: true })).toBe(false);
    expect(
      canUpdate(['caption'], 'A', undefined, { overwrite: true, overwriteNone: true })
    ).toBe(true);
  });

  it('always merges two lists unless mergeLists is off', () => {
    expect(canUpdate(['profiles'], ['a'], ['b'])).toBe(true);
    expect(canUpdate(['profiles'], ['a'], ['b'], { mergeLists: false })).toBe(false);
  });

  it('matches allowed selectors as path prefixes', () => {
    const options = { overwrite: true, allowedFields: [['attributes', 'uid']] };
    expect(canUpdate(['attributes', 'uid', 'enum'], 1, 2, options)).toBe(true);
    expect(canUpdate(['attributes'], 1, 2, options)).toBe(false);
    expect(canUpdate(['caption'], 1, 2, options)).toBe(false);
  });

  it('never updates ignored fields', () => {
    expect(canUpdate(['uid'], undefined, 1, { ignoredFields: ['uid'] })).toBe(false);
    expect(canUpdate(['name'], undefined, 1, { ignoredFields: ['uid'] })).toBe(true);
  });
});

describe('merge', () => {
  it('fills missing fields and reports each change', () => {
    const left: AttrDefn = { caption: 'A' };
    const results = merge(
      { kind: 'attr', data: left },
      { kind: 'attr', data: { caption: 'B', type: 'string_t', description: 'd' } }
    );

    expect(results).toEqual([['type'], ['description']]);
    expect(left).toEqual({ caption: 'A', type: 'string_t', description: 'd' });
  });

  it('replaces values with overwrite', () => {
    const left: AttrDefn = { caption: 'A' };
    const results = merge(
      { kind: 'attr', data: left },
      { kind: 'attr', data: { caption: 'B', type: 'string_t' } },
      { overwrite: true }
    );

    expect(results).toEqual([['caption'], ['type']]);
    expect(left).toEqual({ caption: 'B', type: 'string_t' });
  });

  it('deletes values the right side lacks with overwriteNone', () => {
    const left: AttrDefn = { caption: 'A', group: 'context' };
    const results = merge(
      { kind: 'attr', data: left },
      { kind: 'attr', data: { caption: 'B' } },
      { overwrite: true, overwriteNone: true }
    );

    expect(results).toEqual([['caption'], ['group']]);
    expect(left).toEqual({ caption: 'B' });
  });

  it('merges dictionaries key by key', () => {
    const left: EventDefn = { attributes: { a: { caption: 'A' } } };
    const results = merge(
      { kind: 'event', data: left },
      {
        kind: 'event',
        data: { attributes: { a: { type: 't' }, b: { caption: 'B' } } },
      }
    );

    expect(results).toEqual([
      ['attributes', 'a', 'type'],
      ['attributes', 'b'],
    ]);
    expect(left.attributes).toEqual({
      a: { caption: 'A', type: 't' },
      b: { caption: 'B' },
    });
  });

  it('leaves out new dictionary entries when addDictItems is off', () => {
    const left: EventDefn = { attributes: { a: { caption: 'A' } } };
    const results = merge(
      { kind: 'event', data: left },
      {
        kind: 'event',
        data: { attributes: { a: { type: 't' }, b: { caption: 'B' } } },
      },
      { addDictItems: false }
    );

    expect(results).toEqual([['attributes', 'a', 'type']]);
    expect(Object.keys(left.attributes ?? {})).toEqual(['a']);
  });

  it('unions lists in first-seen order', () => {
    const left: ObjectDefn = { profiles: ['a', 'b'] };
    const results = merge(
      { kind: 'object', data: left },
      { kind: 'object', data: { profiles: ['b', 'c', 'a'] } }
    );

    expect(results).toEqual([['profiles']]);
    expect(left.profiles).toEqual(['a', 'b', 'c']);
  });

  it('reports nothing when a union adds no items', () => {
    const left: ObjectDefn = { profiles: ['a', 'b'] };
    expect(
      merge({ kind: 'object', data: left }, { kind: 'object', data: { profiles: ['a'] } })
    ).toEqual([]);
  });

  it('honors allowed and ignored fields', () => {
    const allowed: EventDefn = { uid: 1, caption: 'X' };
    expect(
      merge(
        { kind: 'event', data: allowed },
        { kind: 'event', data: { uid: 2, caption: 'Y' } },
        { overwrite: true, allowedFields: ['uid'] }
      )
    ).toEqual([['uid']]);
    expect(allowed).toEqual({ uid: 2, caption: 'X' });

    const ignored: EventDefn = { uid: 1, caption: 'X' };
    expect(
      merge(
        { kind: 'event', data: ignored },
        { kind: 'event', data: { uid: 2, caption: 'Y' } },
        { overwrite: true, ignoredFields: ['uid'] }
      )
    ).toEqual([['caption']]);
    expect(ignored).toEqual({ uid: 1, caption: 'Y' });
  });

  it('only merges fields both record kinds declare', () => {
    const left: EventDefn = {};
    const results = merge(
      { kind: 'event', data: left },
      {
        kind: 'include',
        data: { caption: 'C', annotations: { group: 'primary' } },
      }
    );

    expect(results).toEqual([['caption']]);
    expect(left).toEqual({ caption: 'C' });
  });

  it('copies right values instead of sharing them', () => {
    const left: AttrDefn = {};
    const right: AttrDefn = { enum: { '1': { caption: 'One' } } };
    merge({ kind: 'attr', data: left }, { kind: 'attr', data: right });

    const rightMember = right.enum?.['1'];
    if (rightMember) rightMember.caption = 'Changed';
    expect(left.enum).toEqual({ '1': { caption: 'One' } });
  });

  it('reports nothing when values are already equal', () => {
    const left: AttrDefn = { caption: 'A', type: 't' };
    expect(
      merge(
        { kind: 'attr', data: left },
        { kind: 'attr', data: { caption: 'A', type: 't' } },
        { overwrite: true }
      )
    ).toEqual([]);
  });
});

describe('prefixResults', () => {
  it('prepends the prefix to every path', () => {
    expect(prefixResults(['attributes', 'x'], [['caption'], ['type']])).toEqual([
      ['attributes', 'x', 'caption'],
      ['attributes', 'x', 'type'],
    ]);
  });
});
