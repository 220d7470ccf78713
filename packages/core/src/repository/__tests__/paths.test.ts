import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import {
  categoryOf,
  categoryless,
  extensionOf,
  extensionless,
  pathDefinitionKind,
  sanitizePath,
  shortName,
} from '../paths.js';

describe('sanitizePath', () => {
  it('drops everything before the first repository entry', () => {
    expect(sanitizePath('/home/me/schema/objects/user.json')).toBe('objects/user.json');
    expect(sanitizePath('C:\\schema\\events\\system\\proc.json')).toBe(
      'events/system/proc.json'
    );
    expect(sanitizePath('/srv/schema', 'dictionary.json')).toBe('dictionary.json');
  });

  it('rejects paths outside the repository layout', () => {
    expect(() => sanitizePath('foo/bar.json')).toThrow(
      "Invalid key: foo/bar.json isn't an allowed file or directory."
    );
    expect(() => sanitizePath('foo/bar.json')).toThrow(
      expect.objectContaining({ errorCode: ErrorCode.INVALID_PATH })
    );
  });

  it('checks the shape of extension paths', () => {
    expect(sanitizePath('/x/extensions/acme/objects/w.json')).toBe(
      'extensions/acme/objects/w.json'
    );
    expect(() => sanitizePath('x/extensions/acme')).toThrow(
      'Invalid key: x/extensions/acme is missing extension name or contents.'
    );
    expect(() => sanitizePath('extensions/acme/widgets/w.json')).toThrow(
      "Invalid key: widgets isn't an allowed directory."
    );
    expect(() => sanitizePath('extensions/acme/readme.json')).toThrow(
      "Invalid key: readme.json isn't an allowed filename."
    );
  });
});

describe('path helpers', () => {
  it('splits extension paths', () => {
    expect(extensionOf('extensions/acme/objects/w.json')).toBe('acme');
    expect(extensionOf('objects/w.json')).toBeUndefined();
    expect(extensionless('extensions/acme/objects/w.json')).toBe('objects/w.json');
    expect(extensionless('objects/w.json')).toBe('objects/w.json');
  });

  it('finds category directories', () => {
    expect(categoryOf('events/system/proc.json')).toBe('system');
    expect(categoryOf('extensions/acme/events/system/x.json')).toBe('system');
    expect(categoryOf('events/base_event.json')).toBeUndefined();
    expect(categoryless('events/system/proc.json')).toBe('events/proc.json');
    expect(categoryless('extensions/acme/events/system/x.json')).toBe(
      'extensions/acme/events/x.json'
    );
  });

  it('names files by their stem', () => {
    expect(shortName('events/system/proc.json')).toBe('proc');
  });
});

describe('pathDefinitionKind', () => {
  it('derives the kind from the location', () => {
    expect(pathDefinitionKind('objects/user.json')).toBe('object');
    expect(pathDefinitionKind('events/system/proc.json')).toBe('event');
    expect(pathDefinitionKind('includes/common.json')).toBe('include');
    expect(pathDefinitionKind('profiles/host.json')).toBe('profile');
    expect(pathDefinitionKind('dictionary.json')).toBe('dictionary');
    expect(pathDefinitionKind('categories.json')).toBe('categories');
    expect(pathDefinitionKind('version.json')).toBe('version');
  });

  it('looks through extension directories', () => {
    expect(pathDefinitionKind('extensions/acme/extension.json')).toBe('extension');
    expect(pathDefinitionKind('extensions/acme/dictionary.json')).toBe('dictionary');
    expect(pathDefinitionKind('extensions/acme/events/system/x.json')).toBe('event');
  });
});
