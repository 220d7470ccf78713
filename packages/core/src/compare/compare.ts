import { deepEqual, isRecord, unionLists } from '@taxoforge/shared';

import { DiffError } from '../types/errors.js';
import type {
  Attr,
  Category,
  CategoryClass,
  DeprecationInfo,
  EnumMember,
  Event,
  Extension,
  Profile,
  Schema,
  SchemaObject,
  Type,
} from '../schema/model.js';
import {
  NO_CHANGE,
  type ChangedAttr,
  type ChangedCategory,
  type ChangedClassFields,
  type ChangedDeprecationInfo,
  type ChangedEnumMember,
  type ChangedEvent,
  type ChangedExtension,
  type ChangedMap,
  type ChangedObject,
  type ChangedProfile,
  type ChangedSchema,
  type ChangedType,
  type DictDifference,
  type Difference,
  type ModelKind,
  type ModelMap,
} from './model.js';

type Comparator<K extends ModelKind> = (
  before: ModelMap[K],
  after: ModelMap[K]
) => ChangedMap[K];

/** NoChange when the values are deeply equal, a Change otherwise. */
export function compareValue<T>(before: T, after: T): Difference<T> {
  return deepEqual(before, after) ? NO_CHANGE : { kind: 'change', before, after };
}

/**
 * Diff two dictionaries key by key. The result holds every key of both
 * sides: keys of `before` first, then keys only `after` has.
 */
export function compareDict<T, C = never>(
  before: Readonly<Record<string, T>> | undefined,
  after: Readonly<Record<string, T>> | undefined,
  compareEntry: (before: T, after: T) => Difference<T, C> = compareValue
): DictDifference<T, C> {
  if (before === undefined && after === undefined) return NO_CHANGE;
  const left = before ?? {};
  const right = after ?? {};
  const entries: Record<string, Difference<T, C>> = {};

  for (const key of unionLists(Object.keys(left), Object.keys(right))) {
    const was: T | undefined = Object.hasOwn(left, key) ? left[key] : undefined;
    const now: T | undefined = Object.hasOwn(right, key) ? right[key] : undefined;
    if (was === undefined && now !== undefined) {
      entries[key] = { kind: 'addition', after: now };
    } else if (was !== undefined && now === undefined) {
      entries[key] = { kind: 'removal', before: was };
    } else if (was !== undefined && now !== undefined) {
      entries[key] = deepEqual(was, now) ? NO_CHANGE : compareEntry(was, now);
    }
  }
  return { kind: 'map', entries };
}

// Records that may be absent diff field by field only when both sides exist.
function compareOptional<T, C>(
  before: T | undefined,
  after: T | undefined,
  compareRecord: (before: T, after: T) => Difference<T, C>
): Difference<T | undefined, C> {
  if (before !== undefined && after !== undefined) {
    return compareRecord(before, after);
  }
  return compareValue(before, after);
}

const byKind =
  <K extends ModelKind>(kind: K) =>
  (before: ModelMap[K], after: ModelMap[K]): Difference<ModelMap[K], ChangedMap[K]> =>
    compare(kind, before, after);

function compareDeprecated(
  before: { deprecated?: DeprecationInfo },
  after: { deprecated?: DeprecationInfo }
): Difference<DeprecationInfo | undefined, ChangedDeprecationInfo> {
  return compareOptional(before.deprecated, after.deprecated, byKind('deprecation'));
}

function compareAttributes(
  before: Record<string, Attr>,
  after: Record<string, Attr>
): DictDifference<Attr, ChangedAttr> {
  return compareDict(before, after, byKind('attr'));
}

function compareClassFields(before: CategoryClass, after: CategoryClass): ChangedClassFields {
  return {
    caption: compareValue(before.caption, after.caption),
    name: compareValue(before.name, after.name),
    description: compareValue(before.description, after.description),
    uid: compareValue(before.uid, after.uid),
    category: compareValue(before.category, after.category),
    extends: compareValue(before.extends, after.extends),
    profiles: compareValue(before.profiles, after.profiles),
    associations: compareDict(before.associations, after.associations),
    constraints: compareDict(before.constraints, after.constraints),
    deprecated: compareDeprecated(before, after),
  };
}

const compareEnumMember = (before: EnumMember, after: EnumMember): ChangedEnumMember => ({
  kind: 'changed',
  model: 'enumMember',
  caption: compareValue(before.caption, after.caption),
  description: compareValue(before.description, after.description),
  notes: compareValue(before.notes, after.notes),
});

const compareDeprecation = (
  before: DeprecationInfo,
  after: DeprecationInfo
): ChangedDeprecationInfo => ({
  kind: 'changed',
  model: 'deprecation',
  message: compareValue(before.message, after.message),
  since: compareValue(before.since, after.since),
});

const compareType = (before: Type, after: Type): ChangedType => ({
  kind: 'changed',
  model: 'type',
  caption: compareValue(before.caption, after.caption),
  description: compareValue(before.description, after.description),
  is_array: compareValue(before.is_array, after.is_array),
  deprecated: compareDeprecated(before, after),
  max_len: compareValue(before.max_len, after.max_len),
  observable: compareValue(before.observable, after.observable),
  range: compareValue(before.range, after.range),
  regex: compareValue(before.regex, after.regex),
  type: compareValue(before.type, after.type),
  type_name: compareValue(before.type_name, after.type_name),
  values: compareValue(before.values, after.values),
});

const compareAttr = (before: Attr, after: Attr): ChangedAttr => ({
  kind: 'changed',
  model: 'attr',
  caption: compareValue(before.caption, after.caption),
  requirement: compareValue(before.requirement, after.requirement),
  type: compareValue(before.type, after.type),
  description: compareValue(before.description, after.description),
  is_array: compareValue(before.is_array, after.is_array),
  deprecated: compareDeprecated(before, after),
  enum: compareDict(before.enum, after.enum, byKind('enumMember')),
  group: compareValue(before.group, after.group),
  observable: compareValue(before.observable, after.observable),
  profile: compareValue(before.profile, after.profile),
  sibling: compareValue(before.sibling, after.sibling),
  object_type: compareValue(before.object_type, after.object_type),
  object_name: compareValue(before.object_name, after.object_name),
});

const compareObject = (before: SchemaObject, after: SchemaObject): ChangedObject => ({
  kind: 'changed',
  model: 'object',
  caption: compareValue(before.caption, after.caption),
  name: compareValue(before.name, after.name),
  description: compareValue(before.description, after.description),
  attributes: compareAttributes(before.attributes, after.attributes),
  extends: compareValue(before.extends, after.extends),
  observable: compareValue(before.observable, after.observable),
  profiles: compareValue(before.profiles, after.profiles),
  constraints: compareDict(before.constraints, after.constraints),
  deprecated: compareDeprecated(before, after),
});

const compareEvent = (before: Event, after: Event): ChangedEvent => ({
  kind: 'changed',
  model: 'event',
  ...compareClassFields(before, after),
  attributes: compareAttributes(before.attributes, after.attributes),
});

const compareProfile = (before: Profile, after: Profile): ChangedProfile => ({
  kind: 'changed',
  model: 'profile',
  caption: compareValue(before.caption, after.caption),
  name: compareValue(before.name, after.name),
  meta: compareValue(before.meta, after.meta),
  description: compareValue(before.description, after.description),
  attributes: compareAttributes(before.attributes, after.attributes),
  deprecated: compareDeprecated(before, after),
  annotations: compareDict(before.annotations, after.annotations),
});

const compareExtension = (before: Extension, after: Extension): ChangedExtension => ({
  kind: 'changed',
  model: 'extension',
  name: compareValue(before.name, after.name),
  uid: compareValue(before.uid, after.uid),
  caption: compareValue(before.caption, after.caption),
  version: compareValue(before.version, after.version),
  description: compareValue(before.description, after.description),
  deprecated: compareDeprecated(before, after),
});

const compareCategory = (before: Category, after: Category): ChangedCategory => ({
  kind: 'changed',
  model: 'category',
  name: compareValue(before.name, after.name),
  caption: compareValue(before.caption, after.caption),
  description: compareValue(before.description, after.description),
  uid: compareValue(before.uid, after.uid),
  type: compareValue(before.type, after.type),
  classes: compareDict(before.classes, after.classes, byKind('categoryClass')),
});

const compareSchema = (before: Schema, after: Schema): ChangedSchema => ({
  kind: 'changed',
  model: 'schema',
  version: compareValue(before.version, after.version),
  classes: compareDict(before.classes, after.classes, byKind('event')),
  objects: compareDict(before.objects, after.objects, byKind('object')),
  types: compareDict(before.types, after.types, byKind('type')),
  base_event: compareOptional(before.base_event, after.base_event, byKind('event')),
  profiles: compareDict(before.profiles, after.profiles, byKind('profile')),
  extensions: compareDict(before.extensions, after.extensions, byKind('extension')),
  categories: compareDict(before.categories, after.categories, byKind('category')),
});

const COMPARATORS: { [K in ModelKind]: Comparator<K> } = {
  enumMember: compareEnumMember,
  deprecation: compareDeprecation,
  type: compareType,
  attr: compareAttr,
  object: compareObject,
  event: compareEvent,
  categoryClass: (before, after) => ({
    kind: 'changed',
    model: 'categoryClass',
    ...compareClassFields(before, after),
  }),
  profile: compareProfile,
  extension: compareExtension,
  category: compareCategory,
  schema: compareSchema,
};

/**
 * Diff two records of the same model. Equal records give NoChange;
 * otherwise every field of the model is diffed into a `changed` node.
 *
 * @throws DiffError when either side is not a record (data that bypassed
 * decoding)
 */
export function compare<K extends ModelKind>(
  kind: K,
  before: ModelMap[K],
  after: ModelMap[K]
): Difference<ModelMap[K], ChangedMap[K]> {
  if (!isRecord(before) || !isRecord(after)) {
    throw new DiffError({
      message: `Cannot compare ${describe(before)} with ${describe(after)} as ${kind}`,
      context: { operation: `compare ${kind}` },
    });
  }
  if (deepEqual(before, after)) return NO_CHANGE;
  const comparator = COMPARATORS[kind];
  return comparator(before, after);
}

/** Diff two schemas. The result is a `changed` node even for equal schemas. */
export function compareSchemas(before: Schema, after: Schema): ChangedSchema {
  return compareSchema(before, after);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return isRecord(value) ? 'a record' : `a ${typeof value}`;
}
