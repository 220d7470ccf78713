import type { SchemaObject } from 'ajv';

import type { DefinitionKind } from './definitions.js';

export const DEFINITIONS_SCHEMA_ID = 'taxoforge://definitions';

const str = { type: 'string' } as const;
const int = { type: 'integer' } as const;
const bool = { type: 'boolean' } as const;
const strList = { type: 'array', items: str } as const;
const includeTarget = { anyOf: [str, strList] } as const;
const ref = (name: string): SchemaObject => ({ $ref: `#/$defs/${name}` });
const mapOf = (items: SchemaObject): SchemaObject => ({
  type: 'object',
  additionalProperties: items,
});
const attrMap = mapOf({ anyOf: [ref('attr'), includeTarget] });

/**
 * Structural shape of every definition kind, checked when files are read.
 * Unknown properties are tolerated and ignored downstream.
 */
export const DEFINITIONS_SCHEMA: SchemaObject = {
  $id: DEFINITIONS_SCHEMA_ID,
  $defs: {
    deprecation: {
      type: 'object',
      properties: { message: str, since: str },
    },
    enumMember: {
      type: 'object',
      properties: { caption: str, description: str, notes: str },
    },
    type: {
      type: 'object',
      properties: {
        caption: str,
        description: str,
        is_array: bool,
        deprecated: ref('deprecation'),
        max_len: int,
        observable: int,
        range: { type: 'array', items: { type: 'number' } },
        regex: str,
        type: str,
        type_name: str,
        values: { type: 'array' },
      },
    },
    attr: {
      type: 'object',
      properties: {
        caption: str,
        requirement: str,
        type: str,
        description: str,
        is_array: bool,
        deprecated: ref('deprecation'),
        enum: mapOf(ref('enumMember')),
        group: str,
        observable: int,
        profile: includeTarget,
        sibling: str,
        object_type: str,
        object_name: str,
      },
    },
    version: {
      type: 'object',
      properties: { version: str },
    },
    dictionary: {
      type: 'object',
      properties: {
        name: str,
        caption: str,
        description: str,
        attributes: attrMap,
        types: {
          type: 'object',
          properties: {
            attributes: mapOf({ anyOf: [ref('type'), includeTarget] }),
            caption: str,
            description: str,
          },
        },
      },
    },
    object: {
      type: 'object',
      properties: {
        caption: str,
        name: str,
        description: str,
        attributes: attrMap,
        extends: str,
        observable: int,
        profiles: strList,
        constraints: mapOf(strList),
        deprecated: ref('deprecation'),
        include: includeTarget,
        src_extension: str,
        key: str,
      },
    },
    event: {
      type: 'object',
      properties: {
        caption: str,
        name: str,
        attributes: attrMap,
        description: str,
        uid: int,
        category: str,
        extends: str,
        profiles: strList,
        associations: mapOf(strList),
        constraints: mapOf(strList),
        deprecated: ref('deprecation'),
        include: includeTarget,
        src_extension: str,
        key: str,
      },
    },
    include: {
      type: 'object',
      properties: {
        caption: str,
        description: str,
        attributes: attrMap,
        annotations: ref('attr'),
      },
    },
    profile: {
      type: 'object',
      properties: {
        caption: str,
        name: str,
        meta: str,
        description: str,
        attributes: attrMap,
        deprecated: ref('deprecation'),
        annotations: ref('attr'),
        src_extension: str,
        key: str,
      },
    },
    extension: {
      type: 'object',
      properties: {
        name: str,
        uid: int,
        caption: str,
        version: str,
        description: str,
        deprecated: ref('deprecation'),
      },
    },
    categories: {
      type: 'object',
      properties: {
        attributes: mapOf({
          anyOf: [
            {
              type: 'object',
              properties: {
                caption: str,
                description: str,
                uid: int,
                type: str,
                classes: mapOf(ref('event')),
              },
            },
            includeTarget,
          ],
        }),
        caption: str,
        description: str,
        name: str,
      },
    },
  },
};

export function definitionSchemaRef(kind: DefinitionKind): SchemaObject {
  return { $ref: `${DEFINITIONS_SCHEMA_ID}#/$defs/${kind}` };
}
