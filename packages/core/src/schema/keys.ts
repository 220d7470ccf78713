import { isRecord } from '@taxoforge/shared';

/** JSON property names that differ from their in-memory field names. */
const KEY_TO_NAME: ReadonlyMap<string, string> = new Map([
  ['@deprecated', 'deprecated'],
  ['$include', 'include'],
]);

const NAME_TO_KEY: ReadonlyMap<string, string> = new Map(
  [...KEY_TO_NAME].map(([key, name]): [string, string] => [name, key])
);

function renameKeys(
  value: unknown,
  table: ReadonlyMap<string, string>
): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => renameKeys(item, table));
  }
  if (!isRecord(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    out[table.get(key) ?? key] = renameKeys(entry, table);
  }
  return out;
}

/** Rename JSON keys (`@deprecated`, `$include`) to field names, recursively. */
export function keysToNames(value: unknown): unknown {
  return renameKeys(value, KEY_TO_NAME);
}

/** Rename field names back to their JSON keys, recursively. */
export function namesToKeys(value: unknown): unknown {
  return renameKeys(value, NAME_TO_KEY);
}

/** Drop null-valued properties, recursively. Absent and null mean the same. */
export function dropNulls(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(dropNulls);
  if (!isRecord(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === null || entry === undefined) continue;
    out[key] = dropNulls(entry);
  }
  return out;
}
