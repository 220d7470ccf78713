import { describe, it, expect } from 'vitest';

import { parseCompilationOptions, parseSeverityFlags } from '../flags.js';

describe('parseCompilationOptions', () => {
  it('leaves unset flags to the library defaults', () => {
    expect(parseCompilationOptions({})).toEqual({});
  });

  it('maps lists and negated switches', () => {
    expect(
      parseCompilationOptions({
        profile: ['host', 'cloud'],
        ignoreProfile: ['cloud'],
        ignoreExtension: ['acme'],
        prefixExtensions: false,
        setObservable: true,
      })
    ).toEqual({
      profiles: ['host', 'cloud'],
      ignoreProfiles: ['cloud'],
      ignoreExtensions: ['acme'],
      prefixExtensions: false,
      setObservable: true,
    });
  });
});

describe('parseSeverityFlags', () => {
  it('maps each finding to its flag', () => {
    expect(parseSeverityFlags({ info: ['RemovedEnumMember'], fatal: ['RemovedEvent'] })).toEqual({
      RemovedEnumMember: 'info',
      RemovedEvent: 'fatal',
    });
  });

  it('keeps the most severe flag for a finding named twice', () => {
    expect(parseSeverityFlags({ error: ['ChangedType'], warning: ['ChangedType'] })).toEqual({
      ChangedType: 'error',
    });
  });
});
