import { describe, it, expect } from 'vitest';

import { emptySchema, type Attr, type Schema } from '../../schema/model.js';
import { compareSchemas } from '../compare.js';
import { formatDifference } from '../formatter.js';

const name: Attr = { caption: 'Name', requirement: 'optional', type: 'string_t', is_array: false };
const uid: Attr = { caption: 'UID', requirement: 'optional', type: 'string_t', is_array: false };

const before: Schema = {
  ...emptySchema('1.0.0'),
  objects: {
    user: {
      caption: 'User',
      name: 'user',
      description: 'alpha beta gamma delta epsilon zeta eta theta',
      attributes: { name },
    },
  },
};

const after: Schema = {
  ...emptySchema('1.1.0'),
  objects: {
    user: {
      caption: 'User',
      name: 'user',
      description: 'A person.',
      attributes: { name: { ...name, requirement: 'required' }, uid },
    },
  },
  types: { string_t: { caption: 'String', is_array: false } },
};

describe('formatDifference', () => {
  it('prints one line per difference in field order', () => {
    expect(formatDifference(compareSchemas(before, after))).toEqual([
      '~ objects.user.attributes.name.requirement: optional => required',
      '+ objects.user.attributes.uid: {caption: UID, requirement: optional, type: string_t, is_array: false}',
      '~ objects.user.description: alpha beta gamma delta epsilon... => A person.',
      '+ types.string_t: {caption: String, is_array: false}',
      '~ version: 1.0.0 => 1.1.0',
    ]);
  });

  it('prints nothing for equal schemas', () => {
    expect(formatDifference(compareSchemas(before, before))).toEqual([]);
  });

  it('expands changes into an addition and a removal', () => {
    const lines = formatDifference(
      compareSchemas(emptySchema('1.0.0'), emptySchema('1.1.0')),
      { collapseChanges: false }
    );
    expect(lines).toEqual(['+ version: 1.1.0', '- version: 1.0.0']);
  });

  it('prints the removed value', () => {
    expect(formatDifference(compareSchemas(before, { ...before, objects: {} }))).toEqual([
      '- objects.user: {caption: User, name: user, description: alpha beta gamma delta epsilon zeta...',
    ]);
  });

  it('colors lines on request', () => {
    const lines = formatDifference(
      compareSchemas(emptySchema('1.0.0'), emptySchema('1.1.0')),
      { colors: true }
    );
    expect(lines).toEqual(['\u001B[36m~ version: 1.0.0 => 1.1.0\u001B[0m']);
  });
});
