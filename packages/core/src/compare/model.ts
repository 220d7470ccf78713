/**
 * Diff tree for resolved schemas.
 *
 * Every node is tagged by `kind`:
 *
 *   no-change           the two values are equal
 *   addition / removal  the value exists on one side only
 *   change              two unequal plain values (or records of unequal presence)
 *   changed             two records of the same model, diffed field by field
 *   map                 a dictionary field, diffed key by key
 *
 * A `changed` node carries exactly the fields of its model, each holding the
 * diff of that field. Dictionary fields hold a `map` node, or `no-change`
 * when the dictionary is absent on both sides.
 */

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

export type NoChange = { readonly kind: 'no-change' };

export type Addition<T> = { readonly kind: 'addition'; readonly after: T };

export type Removal<T> = { readonly kind: 'removal'; readonly before: T };

export type Change<T> = {
  readonly kind: 'change';
  readonly before: T;
  readonly after: T;
};

export type SimpleDifference<T> = Addition<T> | Removal<T> | Change<T>;

/** Diff of one value; `C` is the `changed` node type when the value is a record. */
export type Difference<T, C = never> = NoChange | SimpleDifference<T> | C;

export type DiffMap<T, C = never> = {
  readonly kind: 'map';
  readonly entries: Record<string, Difference<T, C>>;
};

export type DictDifference<T, C = never> = NoChange | DiffMap<T, C>;

export const NO_CHANGE: NoChange = Object.freeze({ kind: 'no-change' });

/** Resolved-schema records that diff into `changed` nodes, by model name. */
export type ModelMap = {
  enumMember: EnumMember;
  deprecation: DeprecationInfo;
  type: Type;
  attr: Attr;
  object: SchemaObject;
  event: Event;
  categoryClass: CategoryClass;
  profile: Profile;
  extension: Extension;
  category: Category;
  schema: Schema;
};

export type ModelKind = keyof ModelMap;

type Changed<K extends ModelKind> = { readonly kind: 'changed'; readonly model: K };

export type ChangedEnumMember = Changed<'enumMember'> & {
  caption: Difference<string>;
  description: Difference<string | undefined>;
  notes: Difference<string | undefined>;
};

export type ChangedDeprecationInfo = Changed<'deprecation'> & {
  message: Difference<string>;
  since: Difference<string>;
};

type DeprecationDifference = Difference<DeprecationInfo | undefined, ChangedDeprecationInfo>;

export type ChangedType = Changed<'type'> & {
  caption: Difference<string>;
  description: Difference<string | undefined>;
  is_array: Difference<boolean>;
  deprecated: DeprecationDifference;
  max_len: Difference<number | undefined>;
  observable: Difference<number | undefined>;
  range: Difference<number[] | undefined>;
  regex: Difference<string | undefined>;
  type: Difference<string | undefined>;
  type_name: Difference<string | undefined>;
  values: Difference<unknown[] | undefined>;
};

export type ChangedAttr = Changed<'attr'> & {
  caption: Difference<string>;
  requirement: Difference<string>;
  type: Difference<string>;
  description: Difference<string | undefined>;
  is_array: Difference<boolean>;
  deprecated: DeprecationDifference;
  enum: DictDifference<EnumMember, ChangedEnumMember>;
  group: Difference<string | undefined>;
  observable: Difference<number | undefined>;
  profile: Difference<string | string[] | undefined>;
  sibling: Difference<string | undefined>;
  object_type: Difference<string | undefined>;
  object_name: Difference<string | undefined>;
};

export type AttrDifference = Difference<Attr, ChangedAttr>;

export type ChangedObject = Changed<'object'> & {
  caption: Difference<string>;
  name: Difference<string>;
  description: Difference<string | undefined>;
  attributes: DictDifference<Attr, ChangedAttr>;
  extends: Difference<string | undefined>;
  observable: Difference<number | undefined>;
  profiles: Difference<string[] | undefined>;
  constraints: DictDifference<string[]>;
  deprecated: DeprecationDifference;
};

export type ChangedClassFields = {
  caption: Difference<string>;
  name: Difference<string>;
  description: Difference<string | undefined>;
  uid: Difference<number | undefined>;
  category: Difference<string | undefined>;
  extends: Difference<string | undefined>;
  profiles: Difference<string[] | undefined>;
  associations: DictDifference<string[]>;
  constraints: DictDifference<string[]>;
  deprecated: DeprecationDifference;
};

export type ChangedEvent = Changed<'event'> &
  ChangedClassFields & { attributes: DictDifference<Attr, ChangedAttr> };

export type ChangedCategoryClass = Changed<'categoryClass'> & ChangedClassFields;

export type ChangedProfile = Changed<'profile'> & {
  caption: Difference<string>;
  name: Difference<string>;
  meta: Difference<string | undefined>;
  description: Difference<string | undefined>;
  attributes: DictDifference<Attr, ChangedAttr>;
  deprecated: DeprecationDifference;
  annotations: DictDifference<string>;
};

export type ChangedExtension = Changed<'extension'> & {
  name: Difference<string>;
  uid: Difference<number>;
  caption: Difference<string>;
  version: Difference<string | undefined>;
  description: Difference<string | undefined>;
  deprecated: DeprecationDifference;
};

export type ChangedCategory = Changed<'category'> & {
  name: Difference<string>;
  caption: Difference<string>;
  description: Difference<string | undefined>;
  uid: Difference<number>;
  type: Difference<string | undefined>;
  classes: DictDifference<CategoryClass, ChangedCategoryClass>;
};

export type ChangedSchema = Changed<'schema'> & {
  version: Difference<string>;
  classes: DictDifference<Event, ChangedEvent>;
  objects: DictDifference<SchemaObject, ChangedObject>;
  types: DictDifference<Type, ChangedType>;
  base_event: Difference<Event | undefined, ChangedEvent>;
  profiles: DictDifference<Profile, ChangedProfile>;
  extensions: DictDifference<Extension, ChangedExtension>;
  categories: DictDifference<Category, ChangedCategory>;
};

export type ChangedMap = {
  enumMember: ChangedEnumMember;
  deprecation: ChangedDeprecationInfo;
  type: ChangedType;
  attr: ChangedAttr;
  object: ChangedObject;
  event: ChangedEvent;
  categoryClass: ChangedCategoryClass;
  profile: ChangedProfile;
  extension: ChangedExtension;
  category: ChangedCategory;
  schema: ChangedSchema;
};

export type ChangedModel = ChangedMap[ModelKind];

export function isNoChange(node: { readonly kind: string }): node is NoChange {
  return node.kind === 'no-change';
}

/** Entries of a dictionary diff; none when the dictionary is absent on both sides. */
export function diffEntries<T, C>(
  diff: DictDifference<T, C>
): Array<[string, Difference<T, C>]> {
  return diff.kind === 'map' ? Object.entries(diff.entries) : [];
}
