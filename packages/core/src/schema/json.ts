/**
 * Schemas to and from JSON text and files.
 */

import { promises as fs } from 'node:fs';

import { ErrorCode } from '../errors/codes.js';
import { RepositoryError, toError } from '../types/errors.js';
import { decodeSchema } from './decode.js';
import { keysToNames, namesToKeys } from './keys.js';
import type { Schema, WithAttributes } from './model.js';

export interface SchemaParseOptions {
  /**
   * Replace `object_t` attribute types with the `object_type` they carry,
   * matching the attribute dictionary (default: true)
   */
  resolveObjectTypes?: boolean;
}

function resolveAttributes(item: WithAttributes): void {
  for (const attr of Object.values(item.attributes)) {
    if (attr.type === 'object_t' && attr.object_type !== undefined) {
      attr.type = attr.object_type;
    }
  }
}

/** Replace `object_t` attribute types in classes, objects and profiles. */
export function resolveObjectTypes(schema: Schema): void {
  const items: WithAttributes[] = [
    ...Object.values(schema.classes),
    ...Object.values(schema.objects),
    ...Object.values(schema.profiles ?? {}),
  ];
  items.forEach(resolveAttributes);
}

/** Build a schema from parsed JSON. */
export function schemaFromData(
  data: unknown,
  options: SchemaParseOptions = {}
): Schema {
  const schema = decodeSchema(keysToNames(data));
  if (options.resolveObjectTypes ?? true) {
    resolveObjectTypes(schema);
  }
  return schema;
}

export function schemaFromJson(
  text: string,
  options: SchemaParseOptions = {}
): Schema {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new RepositoryError({
      message: `Invalid schema JSON: ${toError(error).message}`,
      errorCode: ErrorCode.PARSE_FAILED,
      cause: toError(error),
    });
  }
  return schemaFromData(data, options);
}

/** The schema as plain JSON data, with JSON property names restored. */
export function schemaToData(schema: Schema): unknown {
  return namesToKeys(schema);
}

export function schemaToJson(schema: Schema, indent?: number): string {
  return JSON.stringify(schemaToData(schema), null, indent);
}

export async function schemaFromFile(
  file: string,
  options: SchemaParseOptions = {}
): Promise<Schema> {
  const text = await fs.readFile(file, 'utf8');
  return schemaFromJson(text, options);
}

export async function schemaToFile(schema: Schema, file: string): Promise<void> {
  await fs.writeFile(file, schemaToJson(schema), 'utf8');
}
