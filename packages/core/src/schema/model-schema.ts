import type { SchemaObject } from 'ajv';

export const MODEL_SCHEMA_ID = 'taxoforge://model';

export type ModelKind =
  | 'deprecation'
  | 'enumMember'
  | 'type'
  | 'attr'
  | 'object'
  | 'categoryClass'
  | 'event'
  | 'profile'
  | 'extension'
  | 'category'
  | 'schema';

const str = { type: 'string' } as const;
const int = { type: 'integer' } as const;
const strList = { type: 'array', items: str } as const;
const isArray = { type: 'boolean', default: false } as const;
const ref = (kind: ModelKind): SchemaObject => ({ $ref: `#/$defs/${kind}` });
const mapOf = (items: SchemaObject): SchemaObject => ({
  type: 'object',
  additionalProperties: items,
});

/** A closed record: properties outside `properties` are removed on decode. */
const record = (
  properties: Record<string, SchemaObject>,
  required: string[] = []
): SchemaObject => ({
  type: 'object',
  properties,
  required,
  additionalProperties: false,
});

const classProperties: Record<string, SchemaObject> = {
  caption: str,
  name: str,
  description: str,
  uid: int,
  category: str,
  extends: str,
  profiles: strList,
  associations: mapOf(strList),
  constraints: mapOf(strList),
  deprecated: ref('deprecation'),
};

/**
 * Shape of the resolved schema model. Decoding with `useDefaults` and
 * `removeAdditional` fills `is_array` and the empty top-level maps, and drops
 * the working fields a definition carries (`key`, `include`, ...).
 */
export const MODEL_SCHEMA: SchemaObject = {
  $id: MODEL_SCHEMA_ID,
  $defs: {
    deprecation: record({ message: str, since: str }, ['message', 'since']),
    enumMember: record({ caption: str, description: str, notes: str }, ['caption']),
    type: record(
      {
        caption: str,
        description: str,
        is_array: isArray,
        deprecated: ref('deprecation'),
        max_len: int,
        observable: int,
        range: { type: 'array', items: { type: 'number' } },
        regex: str,
        type: str,
        type_name: str,
        values: { type: 'array' },
      },
      ['caption']
    ),
    attr: record(
      {
        caption: str,
        requirement: str,
        type: str,
        description: str,
        is_array: isArray,
        deprecated: ref('deprecation'),
        enum: mapOf(ref('enumMember')),
        group: str,
        observable: int,
        profile: { anyOf: [str, strList] },
        sibling: str,
        object_type: str,
        object_name: str,
      },
      ['caption', 'requirement', 'type']
    ),
    object: record(
      {
        caption: str,
        name: str,
        description: str,
        attributes: { ...mapOf(ref('attr')), default: {} },
        extends: str,
        observable: int,
        profiles: strList,
        constraints: mapOf(strList),
        deprecated: ref('deprecation'),
      },
      ['caption', 'name']
    ),
    categoryClass: record(classProperties, ['caption', 'name']),
    event: record(
      { ...classProperties, attributes: { ...mapOf(ref('attr')), default: {} } },
      ['caption', 'name']
    ),
    profile: record(
      {
        caption: str,
        name: str,
        meta: str,
        description: str,
        attributes: { ...mapOf(ref('attr')), default: {} },
        deprecated: ref('deprecation'),
        annotations: mapOf(str),
      },
      ['caption', 'name']
    ),
    extension: record(
      {
        name: str,
        uid: int,
        caption: str,
        version: str,
        description: str,
        deprecated: ref('deprecation'),
      },
      ['name', 'uid', 'caption']
    ),
    category: record(
      {
        name: str,
        caption: str,
        description: str,
        uid: int,
        type: str,
        classes: mapOf(ref('categoryClass')),
      },
      ['name', 'caption', 'uid']
    ),
    schema: record(
      {
        version: str,
        classes: { ...mapOf(ref('event')), default: {} },
        objects: { ...mapOf(ref('object')), default: {} },
        types: { ...mapOf(ref('type')), default: {} },
        base_event: ref('event'),
        profiles: mapOf(ref('profile')),
        extensions: mapOf(ref('extension')),
        categories: mapOf(ref('category')),
      },
      ['version']
    ),
  },
};

export function modelSchemaRef(kind: ModelKind): SchemaObject {
  return { $ref: `${MODEL_SCHEMA_ID}#/$defs/${kind}` };
}
