import { describe, it, expect } from 'vitest';

import { schemaAttr, schemaObject, schemaWith } from '../../../test-utils/schemas.js';
import { isErr, isOk } from '../../../types/result.js';
import { countSeverity } from '../../summarize.js';
import { CompatibilityValidator } from '../validator.js';

const before = schemaWith({ objects: { user: schemaObject('user', { name: schemaAttr() }) } });
const after = schemaWith({}, '1.1.0');

describe('CompatibilityValidator', () => {
  it('runs every compatibility rule in order', () => {
    const result = CompatibilityValidator.fromSchemas(before, after).validate();
    expect(isOk(result)).toBe(true);
    if (!isOk(result)) return;
    expect([...result.value.keys()].map((rule) => rule.metadata.name)).toEqual([
      'No removed or renamed schema elements',
      'No changed class UIDs',
      'No increased requirements',
      'No changed attribute types',
      'No added required attributes',
    ]);
    expect(countSeverity(result.value, 'error')).toBe(1);
  });

  it('stops when an overridden finding is fatal', () => {
    const result = CompatibilityValidator.fromSchemas(before, after, {
      severities: { RemovedObject: 'fatal' },
    }).validate();
    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.finding.message()).toBe('object:user (user) was removed');
    }
  });
});
