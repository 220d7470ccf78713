/**
 * Decoding of resolved schema elements from plain data, validated against
 * MODEL_SCHEMA.
 *
 * Used in both directions of the pipeline: the compiler materializes its
 * working definitions through these decoders, and the JSON boundary decodes
 * documents fetched from disk or a schema server. Input is copied before
 * validation since Ajv fills defaults and removes unknown properties in place.
 */

import type { ValidateFunction } from 'ajv';
import { isRecord } from '@taxoforge/shared';

import { createAjv, formatAjvErrors } from '../ajv/factory.js';
import { ErrorCode } from '../errors/codes.js';
import { DefinitionError } from '../types/errors.js';
import { dropNulls } from './keys.js';
import type {
  Attr,
  Category,
  Event,
  Extension,
  Profile,
  Schema,
  SchemaObject,
  Type,
} from './model.js';
import { MODEL_SCHEMA, modelSchemaRef, type ModelKind } from './model-schema.js';

interface Validators {
  type: ValidateFunction<Type>;
  attr: ValidateFunction<Attr>;
  object: ValidateFunction<SchemaObject>;
  event: ValidateFunction<Event>;
  profile: ValidateFunction<Profile>;
  extension: ValidateFunction<Extension>;
  category: ValidateFunction<Category>;
  schema: ValidateFunction<Schema>;
}

let validators: Validators | undefined;

function getValidators(): Validators {
  if (validators) return validators;
  const ajv = createAjv({ allErrors: false, useDefaults: true, removeAdditional: true });
  ajv.addSchema(MODEL_SCHEMA);
  const compile = <T>(kind: ModelKind) => ajv.compile<T>(modelSchemaRef(kind));
  validators = {
    type: compile<Type>('type'),
    attr: compile<Attr>('attr'),
    object: compile<SchemaObject>('object'),
    event: compile<Event>('event'),
    profile: compile<Profile>('profile'),
    extension: compile<Extension>('extension'),
    category: compile<Category>('category'),
    schema: compile<Schema>('schema'),
  };
  return validators;
}

function decode<T>(validate: ValidateFunction<T>, data: unknown, where: string): T {
  if (validate(data)) return data;
  throw new DefinitionError({
    message: `${where}: ${formatAjvErrors(validate.errors)}`,
    errorCode: ErrorCode.INVALID_DEFINITION,
    context: { path: where },
  });
}

/**
 * Copy of a record without its unresolved attribute directives: entries of
 * `attributes` that are not attribute records (an `include` path) are dropped.
 */
function withAttributeRecords(value: unknown): unknown {
  const copy = dropNulls(value);
  if (!isRecord(copy) || !isRecord(copy.attributes)) return copy;
  copy.attributes = Object.fromEntries(
    Object.entries(copy.attributes).filter(([, entry]) => isRecord(entry))
  );
  return copy;
}

export function decodeType(value: unknown, where: string): Type {
  return decode(getValidators().type, dropNulls(value), where);
}

export function decodeAttr(value: unknown, where: string): Attr {
  return decode(getValidators().attr, dropNulls(value), where);
}

export function decodeObject(value: unknown, where: string): SchemaObject {
  return decode(getValidators().object, withAttributeRecords(value), where);
}

export function decodeEvent(value: unknown, where: string): Event {
  return decode(getValidators().event, withAttributeRecords(value), where);
}

export function decodeProfile(value: unknown, where: string): Profile {
  return decode(getValidators().profile, withAttributeRecords(value), where);
}

export function decodeExtension(value: unknown, where: string): Extension {
  return decode(getValidators().extension, dropNulls(value), where);
}

/** Decode a category; `name`, when given, replaces the record's own. */
export function decodeCategory(value: unknown, where: string, name?: string): Category {
  const copy = dropNulls(value);
  if (name !== undefined && isRecord(copy)) copy.name = name;
  return decode(getValidators().category, copy, where);
}

/**
 * Decode a complete schema document (already using field names). Categories
 * without a `name` take their key.
 */
export function decodeSchema(value: unknown, where = 'schema'): Schema {
  const copy = dropNulls(value);
  if (isRecord(copy)) {
    for (const group of ['classes', 'objects', 'profiles'] as const) {
      const items = copy[group];
      if (!isRecord(items)) continue;
      for (const [key, item] of Object.entries(items)) {
        items[key] = withAttributeRecords(item);
      }
    }
    if (copy.base_event !== undefined) {
      copy.base_event = withAttributeRecords(copy.base_event);
    }
    if (isRecord(copy.categories)) {
      for (const [key, category] of Object.entries(copy.categories)) {
        if (isRecord(category) && category.name === undefined) category.name = key;
      }
    }
  }
  return decode(getValidators().schema, copy, where);
}
