/**
 * UID synthesis for events.
 *
 *   class_uid = extension_uid * 100000 + category_uid * 1000 + uid
 *   type_uid  = class_uid * 100 + activity_id
 *
 * Each event gets single-member `category_uid` and `class_uid` enums and a
 * `type_uid` enum with one member per activity.
 */

import { compact, isRecord } from '@taxoforge/shared';

import { ErrorCode } from '../../errors/codes.js';
import type {
  AttrDefn,
  DefinitionFile,
  EnumMemberDefn,
  EventDefn,
} from '../../repository/definitions.js';
import {
  SpecialFiles,
  asPath,
  type RepoPath,
} from '../../repository/paths.js';
import { DefinitionError, isTaxoforgeError } from '../../types/errors.js';
import { merge, type FieldPath } from '../merge.js';
import { BasePlanner, type Analysis, type Operation } from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';
import { modifiesCore } from './extension.js';

const BASE_EVENT = 'base_event';
const UID_ATTRS = ['category_uid', 'class_uid', 'type_uid'] as const;

function member(caption: string | undefined, description: string | undefined): EnumMemberDefn {
  return compact({ caption, description });
}

function extensionUid(schema: WorkingSchema, event: EventDefn, target: RepoPath): number {
  if (event.src_extension === undefined) return 0;

  let dir: RepoPath;
  try {
    dir = schema.findExtensionPath(event.src_extension);
  } catch (error) {
    if (!isTaxoforgeError(error)) throw error;
    throw new DefinitionError({
      message: `Extension ${event.src_extension} not found for ${target}`,
      errorCode: ErrorCode.UNKNOWN_EXTENSION,
      context: { path: target, value: event.src_extension },
      cause: error,
    });
  }
  const extension = schema.narrow(asPath(dir, SpecialFiles.EXTENSION), 'extension');
  return extension.data.uid ?? 0;
}

export class UidOp implements Operation {
  readonly prerequisite = SpecialFiles.CATEGORIES;

  constructor(readonly target: RepoPath) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const event = schema.narrow(this.target, 'event').data;
    const attributes: Record<string, AttrDefn> = {};
    const enums: EventDefn = { attributes };

    const extUid = extensionUid(schema, event, this.target);

    let catUid = 0;
    if (event.category !== undefined) {
      const categories = schema.narrow(SpecialFiles.CATEGORIES, 'categories').data;
      if (categories.attributes === undefined) return [];

      const category = categories.attributes[event.category];
      if (isRecord(category)) {
        if (category.uid === undefined) {
          throw new DefinitionError({
            message: `Category ${event.category} has no uid`,
            context: { path: SpecialFiles.CATEGORIES, value: event.category },
          });
        }
        catUid = category.uid;
        attributes.category_uid = {
          enum: { [String(catUid)]: member(category.caption, category.description) },
        };
      }
    }

    let classUid = 0;
    if (event.uid !== undefined) {
      classUid = extUid * 100000 + catUid * 1000 + event.uid;
      enums.uid = classUid;
    } else if (event.name === BASE_EVENT) {
      enums.uid = 0;
    }

    attributes.class_uid = {
      enum: { [String(classUid)]: member(event.caption, event.description) },
    };

    const activity = event.attributes?.activity_id;
    if (isRecord(activity) && activity.enum !== undefined) {
      const types: Record<string, EnumMemberDefn> = {};
      for (const [key, value] of Object.entries(activity.enum)) {
        const typeUid = classUid * 100 + Number.parseInt(key, 10);
        types[String(typeUid)] = member(
          `${event.caption ?? ''}: ${value.caption ?? ''}`,
          value.description
        );
      }
      attributes.type_uid = { enum: types };
    }

    // Members inherited from base_event are replaced, not extended
    if (event.name !== BASE_EVENT) {
      for (const name of UID_ATTRS) {
        const inherited = event.attributes?.[name];
        if (isRecord(inherited)) inherited.enum = {};
      }
    }

    return merge(
      { kind: 'event', data: event },
      { kind: 'event', data: enums },
      {
        overwrite: true,
        allowedFields: [
          ['uid'],
          ['attributes', 'category_uid'],
          ['attributes', 'class_uid'],
          ['attributes', 'type_uid'],
        ],
      }
    );
  }

  describe(): string {
    return `UIDs for ${this.target}`;
  }
}

export class UidPlanner extends BasePlanner {
  readonly name = 'uid';

  analyze(file: DefinitionFile): Analysis {
    if (file.kind === 'event' && !modifiesCore(this.schema.repo, file.path)) {
      return new UidOp(file.path);
    }
    return undefined;
  }
}
