import { compareSchemas } from '../../compare/compare.js';
import type { Schema } from '../../schema/model.js';
import { Validator, type Rule, type ValidatorOptions } from '../validator.js';
import { NoAddedRequiredAttrsRule } from './added-required-attrs.js';
import { NoChangedClassUidsRule } from './changed-class-uids.js';
import { NoChangedTypesRule } from './changed-type.js';
import type { CompatibilityContext } from './context.js';
import { NoIncreasedRequirementsRule } from './increased-requirement.js';
import { NoRemovedRecordsRule } from './removed-records.js';

/** Checks that `after` stays backwards compatible with `before`. */
export class CompatibilityValidator extends Validator<CompatibilityContext> {
  static fromSchemas(
    before: Schema,
    after: Schema,
    options?: ValidatorOptions
  ): CompatibilityValidator {
    return new CompatibilityValidator(
      { change: compareSchemas(before, after), before, after },
      options
    );
  }

  rules(): Array<Rule<CompatibilityContext>> {
    return [
      new NoRemovedRecordsRule(),
      new NoChangedClassUidsRule(),
      new NoIncreasedRequirementsRule(),
      new NoChangedTypesRule(),
      new NoAddedRequiredAttrsRule(),
    ];
  }
}
