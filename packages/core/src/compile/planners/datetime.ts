import { deepClone } from '@taxoforge/shared';

import {
  attrEntries,
  hasAttributes,
  type AttrDefn,
  type DefinitionFile,
} from '../../repository/definitions.js';
import type { RepoPath } from '../../repository/paths.js';
import type { FieldPath } from '../merge.js';
import { BasePlanner, type Analysis, type Operation } from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

export const DATETIME_PROFILE = 'datetime';

/**
 * Give every `timestamp_t` attribute an optional `<name>_dt` twin. A twin
 * already present is replaced by the derived one.
 */
export class DateTimeOp implements Operation {
  constructor(readonly target: RepoPath) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const file = schema.get(this.target);
    if (!hasAttributes(file) || file.data.attributes === undefined) return [];
    const { attributes } = file.data;

    const added: Array<[string, AttrDefn]> = [];
    for (const [name, attr] of attrEntries(attributes)) {
      if (attr.type !== 'timestamp_t') continue;
      added.push([
        `${name}_dt`,
        {
          ...deepClone(attr),
          type: 'datetime_t',
          profile: DATETIME_PROFILE,
          requirement: 'optional',
        },
      ]);
    }

    for (const [name, attr] of added) {
      attributes[name] = attr;
    }
    return added.map(([name]) => ['attributes', name]);
  }

  describe(): string {
    return `Add datetime attributes to ${this.target}`;
  }
}

export class DateTimePlanner extends BasePlanner {
  readonly name = 'datetime';

  analyze(file: DefinitionFile): Analysis {
    if (!this.options.profiles.includes(DATETIME_PROFILE)) return undefined;
    if (hasAttributes(file)) {
      return new DateTimeOp(file.path);
    }
    return undefined;
  }
}
