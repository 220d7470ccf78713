import { describe, it, expect } from 'vitest';

import {
  compatibility,
  schemaAttr,
  schemaEvent,
  schemaObject,
  schemaWith,
} from '../../../test-utils/schemas.js';
import type { Schema } from '../../../schema/model.js';
import { NoRemovedRecordsRule } from '../removed-records.js';

const rule = new NoRemovedRecordsRule();

const classUid = schemaAttr('integer_t', { enum: { '3002': { caption: 'Login' } } });

function messages(before: Schema, after: Schema): string[] {
  return rule.validate(compatibility(before, after)).map((finding) => finding.message());
}

describe('NoRemovedRecordsRule', () => {
  it('reports removed events', () => {
    const findings = rule.validate(
      compatibility(
        schemaWith({ classes: { login: schemaEvent('login', {}, { caption: 'Login' }) } }),
        schemaWith({})
      )
    );
    expect(findings.map((finding) => finding.id)).toEqual(['RemovedEvent']);
    expect(findings[0]?.message()).toBe('event:login (Login) was removed');
  });

  it('reports events that reappear under another name', () => {
    const before = schemaWith({ classes: { login: schemaEvent('login', {}, { caption: 'Login' }) } });
    expect(
      messages(
        before,
        schemaWith({ classes: { sign_in: schemaEvent('sign_in', {}, { caption: 'Login' }) } })
      )
    ).toEqual(['event:login (Login) appears to have been renamed to event:sign_in']);

    expect(
      messages(
        schemaWith({
          classes: { login: schemaEvent('login', { class_uid: classUid }, { caption: 'Login' }) },
        }),
        schemaWith({
          classes: { auth: schemaEvent('auth', { class_uid: classUid }, { caption: 'Auth' }) },
        })
      )
    ).toEqual(['event:login (Login) appears to have been renamed to event:auth']);
  });

  it('reports removed and renamed objects', () => {
    const before = schemaWith({ objects: { user: schemaObject('user', {}, { caption: 'User' }) } });
    expect(messages(before, schemaWith({}))).toEqual(['object:user (User) was removed']);
    expect(
      messages(
        before,
        schemaWith({ objects: { person: schemaObject('person', {}, { caption: 'User' }) } })
      )
    ).toEqual(['object:user (User) appears to have been renamed to object:person']);
  });

  it('reports removed and renamed attributes', () => {
    const before = schemaWith({
      objects: {
        user: schemaObject('user', {
          name: schemaAttr('string_t', { caption: 'Name' }),
          uid: schemaAttr('string_t', { caption: 'UID' }),
        }),
      },
    });
    const after = schemaWith({
      objects: { user: schemaObject('user', { label: schemaAttr('string_t', { caption: 'Name' }) }) },
    });
    const findings = rule.validate(compatibility(before, after));
    expect(findings.map((finding) => finding.id)).toEqual(['RenamedAttr', 'RemovedAttr']);
    expect(findings.map((finding) => finding.message())).toEqual([
      'object:user.name (Name) appears to have been renamed to object:user.label',
      'object:user.uid (UID) was removed',
    ]);
  });

  it('reports removed and renamed enum members', () => {
    const activity = (members: Record<string, string>) =>
      schemaAttr('integer_t', {
        enum: Object.fromEntries(
          Object.entries(members).map(([key, caption]) => [key, { caption }])
        ),
      });
    const before = schemaWith({
      classes: {
        login: schemaEvent('login', { activity_id: activity({ 1: 'Logon', 2: 'Logoff', 3: 'Other' }) }),
      },
    });
    const after = schemaWith({
      classes: { login: schemaEvent('login', { activity_id: activity({ 1: 'Logon', 4: 'Logoff' }) }) },
    });
    expect(messages(before, after)).toEqual([
      'event:login.activity_id.2 (Logoff) appears to have been renamed to event:login.activity_id.4',
      'event:login.activity_id.3 (Other) was removed',
    ]);
  });

  it('finds nothing in unchanged schemas', () => {
    const schema = schemaWith({ objects: { user: schemaObject('user') } });
    expect(messages(schema, schema)).toEqual([]);
  });
});
