import {
  attrEntries,
  hasAnnotations,
  type DefinitionFile,
} from '../../repository/definitions.js';
import type { RepoPath } from '../../repository/paths.js';
import { merge, type FieldPath } from '../merge.js';
import {
  BasePlanner,
  underAttribute,
  type Analysis,
  type Operation,
} from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

/** Push a record's `annotations` down into each of its attributes. */
export class AnnotationOp implements Operation {
  constructor(readonly target: RepoPath) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const file = schema.get(this.target);
    if (!hasAnnotations(file)) return [];

    const { annotations, attributes } = file.data;
    if (annotations === undefined || attributes === undefined) return [];

    const results: FieldPath[] = [];
    for (const [name, attr] of attrEntries(attributes)) {
      const changed = merge(
        { kind: 'attr', data: attr },
        { kind: 'attr', data: annotations },
        { overwrite: true, overwriteNone: false }
      );
      results.push(...underAttribute(name, changed));
    }
    return results;
  }

  describe(): string {
    return `Expand annotations in ${this.target}`;
  }
}

export class AnnotationPlanner extends BasePlanner {
  readonly name = 'annotations';

  analyze(file: DefinitionFile): Analysis {
    if (hasAnnotations(file)) {
      return new AnnotationOp(file.path);
    }
    return undefined;
  }
}
