import { isRecord } from '@taxoforge/shared';

import { ErrorCode } from '../../errors/codes.js';
import type { DefinitionFile } from '../../repository/definitions.js';
import {
  RepoPaths,
  SpecialFiles,
  pathParts,
  type RepoPath,
} from '../../repository/paths.js';
import { DefinitionError } from '../../types/errors.js';
import type { FieldPath } from '../merge.js';
import { BasePlanner, type Analysis, type Operation } from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';
import { modifiesCore } from './extension.js';

/** Give an event the category named by the directory it lives in. */
export class SetCategoryOp implements Operation {
  readonly prerequisite = SpecialFiles.CATEGORIES;

  constructor(readonly target: RepoPath) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const event = schema.narrow(this.target, 'event');
    if (event.data.category !== undefined) return [];

    const parts = pathParts(this.target);
    const idx = parts.indexOf(RepoPaths.EVENTS);
    if (idx < 0) {
      throw new DefinitionError({
        message: `Cannot assign category to non-event: ${this.target}`,
        context: { path: this.target },
      });
    }
    const category = parts[idx + 1];
    if (category === undefined || idx + 2 >= parts.length) {
      throw new DefinitionError({
        message: `${this.target} has no category and is not in a category directory`,
        errorCode: ErrorCode.UNKNOWN_CATEGORY,
        context: { path: this.target },
      });
    }

    const categories = schema.narrow(SpecialFiles.CATEGORIES, 'categories');
    if (!isRecord(categories.data.attributes)) {
      throw new DefinitionError({
        message: `${SpecialFiles.CATEGORIES} file is missing attributes`,
        context: { path: SpecialFiles.CATEGORIES },
      });
    }
    if (!isRecord(categories.data.attributes[category])) {
      throw new DefinitionError({
        message: `Unknown category: ${category}`,
        errorCode: ErrorCode.UNKNOWN_CATEGORY,
        context: { path: this.target, value: category },
      });
    }

    event.data.category = category;
    return [['category']];
  }

  describe(): string {
    return `Assign category to ${this.target}`;
  }
}

export class SetCategoryPlanner extends BasePlanner {
  readonly name = 'set-category';

  analyze(file: DefinitionFile): Analysis {
    if (
      file.kind === 'event' &&
      file.data.category === undefined &&
      !modifiesCore(this.schema.repo, file.path)
    ) {
      return new SetCategoryOp(file.path);
    }
    return undefined;
  }
}
