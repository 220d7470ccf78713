/**
 * Resolved schema model: the output of compilation and the input of the
 * differ. Optional fields are omitted rather than set to undefined.
 */

export type Version = {
  version: string;
};

export type EnumMember = {
  caption: string;
  description?: string;
  notes?: string;
};

export type DeprecationInfo = {
  message: string;
  since: string;
};

export type Type = {
  caption: string;
  description?: string;
  is_array: boolean;
  deprecated?: DeprecationInfo;
  max_len?: number;
  observable?: number;
  range?: number[];
  regex?: string;
  type?: string;
  type_name?: string;
  values?: unknown[];
};

export type Attr = {
  caption: string;
  requirement: string;
  type: string;
  description?: string;
  is_array: boolean;
  deprecated?: DeprecationInfo;
  enum?: Record<string, EnumMember>;
  group?: string;
  observable?: number;
  profile?: string | string[];
  sibling?: string;
  object_type?: string;
  object_name?: string;
};

export type SchemaObject = {
  caption: string;
  name: string;
  description?: string;
  attributes: Record<string, Attr>;
  extends?: string;
  observable?: number;
  profiles?: string[];
  constraints?: Record<string, string[]>;
  deprecated?: DeprecationInfo;
};

export type Event = {
  caption: string;
  name: string;
  attributes: Record<string, Attr>;
  description?: string;
  uid?: number;
  category?: string;
  extends?: string;
  profiles?: string[];
  associations?: Record<string, string[]>;
  constraints?: Record<string, string[]>;
  deprecated?: DeprecationInfo;
};

/** An event as listed under its category: everything but the attributes. */
export type CategoryClass = Omit<Event, 'attributes'>;

export type Profile = {
  caption: string;
  name: string;
  meta?: string;
  description?: string;
  attributes: Record<string, Attr>;
  deprecated?: DeprecationInfo;
  annotations?: Record<string, string>;
};

export type Extension = {
  name: string;
  uid: number;
  caption: string;
  version?: string;
  description?: string;
  deprecated?: DeprecationInfo;
};

export type Category = {
  name: string;
  caption: string;
  description?: string;
  uid: number;
  type?: string;
  classes?: Record<string, CategoryClass>;
};

export type Schema = {
  version: string;
  classes: Record<string, Event>;
  objects: Record<string, SchemaObject>;
  types: Record<string, Type>;
  base_event?: Event;
  profiles?: Record<string, Profile>;
  extensions?: Record<string, Extension>;
  categories?: Record<string, Category>;
};

/** Kinds of schema elements named in validation findings. */
export const ElementType = {
  EVENT: 'event',
  OBJECT: 'object',
  ENUM_MEMBER: 'enum',
  ATTRIBUTE: 'attribute',
  TYPE: 'type',
} as const;

export type ElementType = (typeof ElementType)[keyof typeof ElementType];

/** Records that carry an attribute map. */
export type WithAttributes = SchemaObject | Event | Profile;

export function emptySchema(version = '0.0.0'): Schema {
  return { version, classes: {}, objects: {}, types: {} };
}
