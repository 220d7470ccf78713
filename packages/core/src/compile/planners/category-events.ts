import { deepClone, isRecord } from '@taxoforge/shared';

import { getKey, type DefinitionFile } from '../../repository/definitions.js';
import { SpecialFiles, type RepoPath } from '../../repository/paths.js';
import type { FieldPath } from '../merge.js';
import { BasePlanner, type Analysis, type Operation } from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

/** List an event, without its attributes, under its category's `classes`. */
export class MapEventToCategoryOp implements Operation {
  readonly target = SpecialFiles.CATEGORIES;

  constructor(readonly prerequisite: RepoPath) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const event = schema.narrow(this.prerequisite, 'event').data;
    const key = getKey(event);
    if (event.category === undefined || event.uid === undefined || key === undefined) {
      return [];
    }

    const categories = schema.narrow(this.target, 'categories').data;
    // Events may name a category that categories.json does not list
    const category = categories.attributes?.[event.category];
    if (!isRecord(category)) return [];

    const entry = deepClone(event);
    delete entry.attributes;
    (category.classes ??= {})[key] = entry;
    return [['attributes', event.category, 'classes', key]];
  }

  describe(): string {
    return `Map event to category ${this.target} <- ${this.prerequisite}`;
  }
}

export class MapEventToCategoryPlanner extends BasePlanner {
  readonly name = 'map-event-to-category';

  analyze(file: DefinitionFile): Analysis {
    if (!this.options.mapEventsToCategories || file.kind !== 'event') {
      return undefined;
    }
    return new MapEventToCategoryOp(file.path);
  }
}
