/**
 * Builders for resolved schemas used by the diff and validation tests.
 */

import { compareSchemas } from '../compare/compare.js';
import {
  emptySchema,
  type Attr,
  type Event,
  type Profile,
  type Schema,
  type SchemaObject,
} from '../schema/model.js';
import type { CompatibilityContext } from '../validate/compatibility/context.js';

export function schemaAttr(type = 'string_t', extra: Partial<Attr> = {}): Attr {
  return { caption: type, requirement: 'optional', type, is_array: false, ...extra };
}

export function schemaEvent(
  name: string,
  attributes: Record<string, Attr> = {},
  extra: Partial<Event> = {}
): Event {
  return { caption: name, name, attributes, ...extra };
}

export function schemaObject(
  name: string,
  attributes: Record<string, Attr> = {},
  extra: Partial<SchemaObject> = {}
): SchemaObject {
  return { caption: name, name, attributes, ...extra };
}

export function schemaProfile(name: string, attributes: Record<string, Attr> = {}): Profile {
  return { caption: name, name, attributes };
}

export function schemaWith(parts: Partial<Schema>, version = '1.0.0'): Schema {
  return { ...emptySchema(version), ...parts };
}

export function compatibility(before: Schema, after: Schema): CompatibilityContext {
  return { change: compareSchemas(before, after), before, after };
}
