import {
  isAttrDefn,
  type AttrMap,
  type DefinitionFile,
} from '../../repository/definitions.js';
import type { RepoPath } from '../../repository/paths.js';
import type { FieldPath } from '../merge.js';
import { BasePlanner, type Analysis, type Operation } from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

const BASE_EVENT = 'base_event';

/**
 * Append the caption of the single `uid` enum member to the description of
 * its `name` sibling. Returns false when either side is incomplete.
 */
function describeSibling(attributes: AttrMap, uid: string, name: string): boolean {
  const uidAttr = attributes[uid];
  const nameAttr = attributes[name];
  if (!isAttrDefn(uidAttr) || !isAttrDefn(nameAttr)) return false;

  const [member] = Object.values(uidAttr.enum ?? {});
  const { description } = nameAttr;
  if (member?.caption === undefined || description === undefined) return false;

  nameAttr.description = `${description.slice(0, -1)}: <code>${member.caption}</code>.`;
  return true;
}

/** Name the category and class in `category_name` and `class_name`. */
export class UidSiblingOp implements Operation {
  constructor(readonly target: RepoPath) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const event = schema.narrow(this.target, 'event').data;
    const { attributes } = event;
    if (attributes === undefined) return [];

    const results: FieldPath[] = [];
    if (
      event.name !== BASE_EVENT &&
      describeSibling(attributes, 'category_uid', 'category_name')
    ) {
      results.push(['attributes', 'category_name', 'description']);
    }
    if (describeSibling(attributes, 'class_uid', 'class_name')) {
      results.push(['attributes', 'class_name', 'description']);
    }
    return results;
  }

  describe(): string {
    return `Describe uid siblings in ${this.target}`;
  }
}

export class UidSiblingPlanner extends BasePlanner {
  readonly name = 'uid-sibling';

  analyze(file: DefinitionFile): Analysis {
    if (file.kind === 'event') {
      return new UidSiblingOp(file.path);
    }
    return undefined;
  }
}
