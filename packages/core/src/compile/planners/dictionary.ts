import { ErrorCode } from '../../errors/codes.js';
import {
  attrEntries,
  hasAttributes,
  type DefinitionFile,
} from '../../repository/definitions.js';
import { SpecialFiles, type RepoPath } from '../../repository/paths.js';
import { DefinitionError } from '../../types/errors.js';
import { merge, type FieldPath } from '../merge.js';
import {
  BasePlanner,
  underAttribute,
  type Analysis,
  type Operation,
} from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

/**
 * Fill in each attribute from its dictionary entry. Attribute by attribute,
 * so the record never gains attributes it does not declare while enum
 * members from the dictionary still reach it.
 */
export class DictionaryOp implements Operation {
  readonly prerequisite = SpecialFiles.DICTIONARY;

  constructor(readonly target: RepoPath) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const file = schema.get(this.target);
    if (!hasAttributes(file) || file.data.attributes === undefined) return [];

    if (!schema.has(SpecialFiles.DICTIONARY)) {
      throw new DefinitionError({
        message: `Missing ${SpecialFiles.DICTIONARY} (required by ${this.target})`,
        errorCode: ErrorCode.MISSING_DICTIONARY,
        context: { path: this.target },
      });
    }
    const dictionary = schema.narrow(SpecialFiles.DICTIONARY, 'dictionary').data;
    const entries = new Map(attrEntries(dictionary.attributes));

    const results: FieldPath[] = [];
    for (const [name, attr] of attrEntries(file.data.attributes)) {
      const entry = entries.get(name);
      if (entry === undefined) continue;
      results.push(
        ...underAttribute(
          name,
          merge({ kind: 'attr', data: attr }, { kind: 'attr', data: entry })
        )
      );
    }
    return results;
  }

  describe(): string {
    return `Dictionary ${this.target} <- ${this.prerequisite}`;
  }
}

export class DictionaryPlanner extends BasePlanner {
  readonly name = 'dictionary';

  analyze(file: DefinitionFile): Analysis {
    if (hasAttributes(file) && file.path !== SpecialFiles.DICTIONARY) {
      return new DictionaryOp(file.path);
    }
    return undefined;
  }
}
