import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../../errors/codes.js';
import {
  dictionaryFile,
  eventFile,
  extensionFile,
  objectFile,
  plannerContext,
  repoOf,
} from '../../../test-utils/definitions.js';
import { DateTimeOp, DateTimePlanner } from '../datetime.js';
import { DictionaryOp, DictionaryPlanner } from '../dictionary.js';
import { ObjectTypeOp, ObjectTypePlanner, RecordTypeRegistry } from '../object-type.js';

describe('DictionaryOp', () => {
  const dictionary = dictionaryFile({
    attributes: {
      name: {
        caption: 'Name',
        type: 'string_t',
        description: 'The name.',
        enum: { '1': { caption: 'One' } },
      },
      unused: { caption: 'Unused' },
    },
  });
  const user = objectFile('objects/user.json', {
    name: 'user',
    attributes: {
      name: { requirement: 'required', description: 'The user name.' },
      extra: { caption: 'Extra' },
    },
  });

  it('backfills declared attributes without adding new ones', () => {
    const r = repoOf(dictionary, user);
    const context = plannerContext(r);

    expect(new DictionaryOp('objects/user.json').apply(context.schema)).toEqual([
      ['attributes', 'name', 'caption'],
      ['attributes', 'name', 'type'],
      ['attributes', 'name', 'enum'],
    ]);
    expect(context.schema.narrow('objects/user.json', 'object').data.attributes).toEqual({
      name: {
        caption: 'Name',
        requirement: 'required',
        type: 'string_t',
        description: 'The user name.',
        enum: { '1': { caption: 'One' } },
      },
      extra: { caption: 'Extra' },
    });
  });

  it('skips the dictionary itself', () => {
    const r = repoOf(dictionary, user);
    const planner = new DictionaryPlanner(plannerContext(r));
    expect(planner.analyze(r.require('dictionary.json'))).toBeUndefined();
    expect(planner.analyze(r.require('objects/user.json'))).toEqual(
      new DictionaryOp('objects/user.json')
    );
  });

  it('requires the dictionary', () => {
    const { schema } = plannerContext(repoOf(user));
    expect(() => new DictionaryOp('objects/user.json').apply(schema)).toThrow(
      'Missing dictionary.json (required by objects/user.json)'
    );
  });
});

describe('ObjectTypeOp', () => {
  function repo() {
    return repoOf(
      objectFile('objects/user.json', { name: 'user', caption: 'User' }),
      eventFile('events/system/proc.json', { name: 'proc', caption: 'Process Activity', uid: 1 }),
      extensionFile('extensions/acme/extension.json', { name: 'acme' }),
      objectFile('extensions/acme/objects/widget.json', { name: 'widget', caption: 'Widget' }),
      objectFile('objects/holder.json', {
        name: 'holder',
        attributes: {
          owner: { type: 'user' },
          process: { type: 'proc' },
          label: { type: 'string_t' },
          already: { type: 'object', object_type: 'user' },
        },
      })
    );
  }

  it('rewrites record-typed attributes to references', () => {
    const r = repo();
    const context = plannerContext(r);
    const op = new ObjectTypePlanner(context).analyze(r.require('objects/holder.json'));
    expect(op).toBeInstanceOf(ObjectTypeOp);

    const registry = new RecordTypeRegistry(r, ['acme'], true);
    expect(new ObjectTypeOp('objects/holder.json', registry).apply(context.schema)).toEqual([
      ['attributes', 'owner', 'type'],
      ['attributes', 'owner', 'object_type'],
      ['attributes', 'owner', 'object_name'],
      ['attributes', 'process', 'type'],
      ['attributes', 'process', 'object_type'],
      ['attributes', 'process', 'object_name'],
    ]);
    expect(context.schema.narrow('objects/holder.json', 'object').data.attributes).toEqual({
      owner: { type: 'object', object_type: 'user', object_name: 'User' },
      process: { type: 'event', object_type: 'proc', object_name: 'Process Activity' },
      label: { type: 'string_t' },
      already: { type: 'object', object_type: 'user' },
    });
  });

  it('knows prefixed extension keys only when prefixing', () => {
    const r = repo();
    expect(new RecordTypeRegistry(r, ['acme'], true).get('acme/widget')).toEqual({
      kind: 'object',
      caption: 'Widget',
    });
    expect(new RecordTypeRegistry(r, ['acme'], false).get('acme/widget')).toBeUndefined();
  });

  it('ignores records of disabled extensions', () => {
    const r = repo();
    expect(new RecordTypeRegistry(r, ['acme'], false).get('widget')).toEqual({
      kind: 'object',
      caption: 'Widget',
    });
    expect(new RecordTypeRegistry(r, [], false).get('widget')).toBeUndefined();
    expect(new RecordTypeRegistry(r, [], true).get('acme/widget')).toBeUndefined();
  });

  it('reports a type only a disabled extension defines as unknown', () => {
    const r = repoOf(
      extensionFile('extensions/acme/extension.json', { name: 'acme' }),
      objectFile('extensions/acme/objects/widget.json', { name: 'widget', caption: 'Widget' }),
      objectFile('objects/holder.json', { name: 'holder', attributes: { w: { type: 'widget' } } })
    );
    const context = plannerContext(r, { extensions: [] });
    const op = new ObjectTypePlanner(context).analyze(r.require('objects/holder.json'));
    if (!(op instanceof ObjectTypeOp)) throw new Error('expected an ObjectTypeOp');
    expect(() => op.apply(context.schema)).toThrow(
      'Unknown object type widget for attribute w'
    );
  });

  it('rejects unknown record names', () => {
    const r = repoOf(
      objectFile('objects/holder.json', { name: 'holder', attributes: { x: { type: 'gizmo' } } })
    );
    const { schema } = plannerContext(r);
    const op = new ObjectTypeOp('objects/holder.json', new RecordTypeRegistry(r, [], true));
    expect(() => op.apply(schema)).toThrow(
      expect.objectContaining({
        errorCode: ErrorCode.UNKNOWN_OBJECT_TYPE,
        message: 'Unknown object type gizmo for attribute x',
      })
    );
  });

  it('plans nothing when object types are off', () => {
    const r = repo();
    const planner = new ObjectTypePlanner(plannerContext(r, { setObjectTypes: false }));
    expect(planner.analyze(r.require('objects/holder.json'))).toBeUndefined();
  });
});

describe('DateTimeOp', () => {
  const path = 'objects/file.json';
  const file = objectFile(path, {
    name: 'file',
    attributes: {
      modified_time: { caption: 'Modified', type: 'timestamp_t', requirement: 'required' },
      name: { type: 'string_t' },
    },
  });

  it('adds an optional datetime twin for each timestamp', () => {
    const { schema } = plannerContext(repoOf(file));
    expect(new DateTimeOp(path).apply(schema)).toEqual([['attributes', 'modified_time_dt']]);
    expect(schema.narrow(path, 'object').data.attributes?.modified_time_dt).toEqual({
      caption: 'Modified',
      type: 'datetime_t',
      requirement: 'optional',
      profile: 'datetime',
    });
  });

  it('replaces an existing twin', () => {
    const withTwin = objectFile(path, {
      name: 'file',
      attributes: {
        modified_time: { caption: 'Modified', type: 'timestamp_t', requirement: 'required' },
        modified_time_dt: { caption: 'Old', type: 'string_t', requirement: 'required' },
      },
    });
    const { schema } = plannerContext(repoOf(withTwin));
    expect(new DateTimeOp(path).apply(schema)).toEqual([['attributes', 'modified_time_dt']]);
    expect(schema.narrow(path, 'object').data.attributes?.modified_time_dt).toEqual({
      caption: 'Modified',
      type: 'datetime_t',
      requirement: 'optional',
      profile: 'datetime',
    });
  });

  it('runs only when the datetime profile is enabled', () => {
    const r = repoOf(file);
    expect(new DateTimePlanner(plannerContext(r, { profiles: [] })).analyze(file)).toBeUndefined();
    expect(
      new DateTimePlanner(plannerContext(r, { profiles: ['datetime'] })).analyze(file)
    ).toEqual(new DateTimeOp(path));
  });
});
