/**
 * Record model for taxonomy source fragments.
 *
 * Every fragment kind is a plain object with optional fields. Definitions are
 * declared as type aliases (not interfaces) so that they stay assignable to
 * `Record<string, unknown>` for the field-driven merge walk.
 */

import { isRecord } from '@taxoforge/shared';

/** One or more repository paths to splice into a record. */
export type IncludeTarget = string | string[];

export type VersionDefn = {
  version?: string;
};

export type EnumMemberDefn = {
  caption?: string;
  description?: string;
  notes?: string;
};

export type DeprecationInfoDefn = {
  message?: string;
  since?: string;
};

export type TypeDefn = {
  caption?: string;
  description?: string;
  is_array?: boolean;
  deprecated?: DeprecationInfoDefn;
  max_len?: number;
  observable?: number;
  range?: number[];
  regex?: string;
  type?: string;
  type_name?: string;
  values?: unknown[];
};

export type DictionaryTypesDefn = {
  attributes?: Record<string, TypeDefn | IncludeTarget>;
  caption?: string;
  description?: string;
};

export type AttrDefn = {
  caption?: string;
  requirement?: string;
  type?: string;
  description?: string;
  is_array?: boolean;
  deprecated?: DeprecationInfoDefn;
  enum?: Record<string, EnumMemberDefn>;
  group?: string;
  observable?: number;
  profile?: string | string[];
  sibling?: string;
  object_type?: string;
  object_name?: string;
};

/** An attribute map entry: a definition or an `include` directive. */
export type AttrEntry = AttrDefn | IncludeTarget;
export type AttrMap = Record<string, AttrEntry>;

export type DictionaryDefn = {
  name?: string;
  caption?: string;
  description?: string;
  attributes?: AttrMap;
  types?: DictionaryTypesDefn;
};

export type ObjectDefn = {
  caption?: string;
  name?: string;
  description?: string;
  attributes?: AttrMap;
  extends?: string;
  observable?: number;
  profiles?: string[];
  constraints?: Record<string, string[]>;
  deprecated?: DeprecationInfoDefn;
  include?: IncludeTarget;
  src_extension?: string;
  key?: string;
};

export type EventDefn = {
  caption?: string;
  name?: string;
  attributes?: AttrMap;
  description?: string;
  uid?: number;
  category?: string;
  extends?: string;
  profiles?: string[];
  associations?: Record<string, string[]>;
  constraints?: Record<string, string[]>;
  deprecated?: DeprecationInfoDefn;
  include?: IncludeTarget;
  src_extension?: string;
  key?: string;
};

export type IncludeDefn = {
  caption?: string;
  description?: string;
  attributes?: AttrMap;
  annotations?: AttrDefn;
};

export type ProfileDefn = {
  caption?: string;
  name?: string;
  meta?: string;
  description?: string;
  attributes?: AttrMap;
  deprecated?: DeprecationInfoDefn;
  annotations?: AttrDefn;
  src_extension?: string;
  key?: string;
};

export type ExtensionDefn = {
  name?: string;
  uid?: number;
  caption?: string;
  version?: string;
  description?: string;
  deprecated?: DeprecationInfoDefn;
};

export type CategoryDefn = {
  caption?: string;
  description?: string;
  uid?: number;
  type?: string;
  classes?: Record<string, EventDefn>;
};

export type CategoriesDefn = {
  attributes?: Record<string, CategoryDefn | IncludeTarget>;
  caption?: string;
  description?: string;
  name?: string;
};

/** Top-level fragment kinds: one per repository file. */
export type DefinitionMap = {
  object: ObjectDefn;
  event: EventDefn;
  profile: ProfileDefn;
  include: IncludeDefn;
  extension: ExtensionDefn;
  dictionary: DictionaryDefn;
  categories: CategoriesDefn;
  version: VersionDefn;
};

export type DefinitionKind = keyof DefinitionMap;

export const DEFINITION_KINDS = [
  'object',
  'event',
  'profile',
  'include',
  'extension',
  'dictionary',
  'categories',
  'version',
] as const satisfies readonly DefinitionKind[];

/** Every record kind the merge walk understands, nested parts included. */
export type PartMap = DefinitionMap & {
  enumMember: EnumMemberDefn;
  deprecation: DeprecationInfoDefn;
  type: TypeDefn;
  dictionaryTypes: DictionaryTypesDefn;
  attr: AttrDefn;
  category: CategoryDefn;
};

export type PartKind = keyof PartMap;

/** A record tagged with its kind. */
export type Part = {
  [K in PartKind]: { kind: K; data: PartMap[K] };
}[PartKind];

export type DefinitionFileOf<K extends DefinitionKind> = {
  kind: K;
  path: string;
  data: DefinitionMap[K];
  /** Source text, kept when the reader is asked to preserve it */
  rawData?: string;
};

/** A repository entry. Narrow on `kind` to reach the typed data. */
export type DefinitionFile = {
  [K in DefinitionKind]: DefinitionFileOf<K>;
}[DefinitionKind];

type KindSelectors = {
  [K in DefinitionKind]: (
    file: DefinitionFile
  ) => DefinitionFileOf<K> | undefined;
};

const KIND_SELECTORS: KindSelectors = {
  object: (f) => (f.kind === 'object' ? f : undefined),
  event: (f) => (f.kind === 'event' ? f : undefined),
  profile: (f) => (f.kind === 'profile' ? f : undefined),
  include: (f) => (f.kind === 'include' ? f : undefined),
  extension: (f) => (f.kind === 'extension' ? f : undefined),
  dictionary: (f) => (f.kind === 'dictionary' ? f : undefined),
  categories: (f) => (f.kind === 'categories' ? f : undefined),
  version: (f) => (f.kind === 'version' ? f : undefined),
};

/** The file as the requested kind, or undefined on a mismatch. */
export function selectKind<K extends DefinitionKind>(
  file: DefinitionFile,
  kind: K
): DefinitionFileOf<K> | undefined {
  const select: KindSelectors[K] = KIND_SELECTORS[kind];
  return select(file);
}

// Capability groups

/** Union of the files of the given kinds, one member per kind. */
export type FilesOf<K extends DefinitionKind> = {
  [P in K]: DefinitionFileOf<P>;
}[K];

export type FileWithAttributes = FilesOf<
  'object' | 'event' | 'profile' | 'dictionary' | 'include'
>;
export type FileWithAnnotations = FilesOf<'profile' | 'include'>;
export type FileWithExtension = FilesOf<'object' | 'event' | 'profile'>;
export type RecordFile = FilesOf<'object' | 'event'>;

export function hasAttributes(file: DefinitionFile): file is FileWithAttributes {
  return (
    file.kind === 'object' ||
    file.kind === 'event' ||
    file.kind === 'profile' ||
    file.kind === 'dictionary' ||
    file.kind === 'include'
  );
}

export function hasAnnotations(file: DefinitionFile): file is FileWithAnnotations {
  return file.kind === 'profile' || file.kind === 'include';
}

export function canBeIntroducedByExtension(
  file: DefinitionFile
): file is FileWithExtension {
  return (
    file.kind === 'object' || file.kind === 'event' || file.kind === 'profile'
  );
}

export function isRecordFile(file: DefinitionFile): file is RecordFile {
  return file.kind === 'object' || file.kind === 'event';
}

/** Key of a record: the extension-prefixed key when set, else its name. */
export function getKey(data: {
  key?: string;
  name?: string;
}): string | undefined {
  return data.key ?? data.name;
}

export function isAttrDefn(entry: AttrEntry | undefined): entry is AttrDefn {
  return isRecord(entry);
}

/** Attribute definitions of a map, skipping `include` directives. */
export function attrEntries(
  attrs: AttrMap | undefined
): Array<[string, AttrDefn]> {
  const out: Array<[string, AttrDefn]> = [];
  for (const [name, entry] of Object.entries(attrs ?? {})) {
    if (isAttrDefn(entry)) out.push([name, entry]);
  }
  return out;
}

export function categoryEntries(
  data: CategoriesDefn
): Array<[string, CategoryDefn]> {
  const out: Array<[string, CategoryDefn]> = [];
  for (const [name, entry] of Object.entries(data.attributes ?? {})) {
    if (isRecord(entry)) out.push([name, entry]);
  }
  return out;
}

export function includeTargets(target: IncludeTarget | undefined): string[] {
  if (target === undefined) return [];
  return typeof target === 'string' ? [target] : [...target];
}

// Field registry

export type FieldShape =
  | { shape: 'value' }
  | { shape: 'part'; kind: PartKind }
  | { shape: 'dict'; of?: PartKind };

const VALUE = { shape: 'value' } as const;
const part = (kind: PartKind): FieldShape => ({ shape: 'part', kind });
const dict = (of?: PartKind): FieldShape => ({ shape: 'dict', of });

type FieldRegistry = {
  [K in PartKind]: { [F in keyof PartMap[K]]-?: FieldShape };
};

/**
 * Declared fields of every record kind, in declaration order, with the shape
 * the merge walk uses to decide between recursion and assignment.
 */
export const FIELD_SHAPES = {
  version: { version: VALUE },
  enumMember: { caption: VALUE, description: VALUE, notes: VALUE },
  deprecation: { message: VALUE, since: VALUE },
  type: {
    caption: VALUE,
    description: VALUE,
    is_array: VALUE,
    deprecated: part('deprecation'),
    max_len: VALUE,
    observable: VALUE,
    range: VALUE,
    regex: VALUE,
    type: VALUE,
    type_name: VALUE,
    values: VALUE,
  },
  dictionaryTypes: {
    attributes: dict('type'),
    caption: VALUE,
    description: VALUE,
  },
  attr: {
    caption: VALUE,
    requirement: VALUE,
    type: VALUE,
    description: VALUE,
    is_array: VALUE,
    deprecated: part('deprecation'),
    enum: dict('enumMember'),
    group: VALUE,
    observable: VALUE,
    profile: VALUE,
    sibling: VALUE,
    object_type: VALUE,
    object_name: VALUE,
  },
  dictionary: {
    name: VALUE,
    caption: VALUE,
    description: VALUE,
    attributes: dict('attr'),
    types: part('dictionaryTypes'),
  },
  object: {
    caption: VALUE,
    name: VALUE,
    description: VALUE,
    attributes: dict('attr'),
    extends: VALUE,
    observable: VALUE,
    profiles: VALUE,
    constraints: dict(),
    deprecated: part('deprecation'),
    include: VALUE,
    src_extension: VALUE,
    key: VALUE,
  },
  event: {
    caption: VALUE,
    name: VALUE,
    attributes: dict('attr'),
    description: VALUE,
    uid: VALUE,
    category: VALUE,
    extends: VALUE,
    profiles: VALUE,
    associations: dict(),
    constraints: dict(),
    deprecated: part('deprecation'),
    include: VALUE,
    src_extension: VALUE,
    key: VALUE,
  },
  include: {
    caption: VALUE,
    description: VALUE,
    attributes: dict('attr'),
    annotations: part('attr'),
  },
  profile: {
    caption: VALUE,
    name: VALUE,
    meta: VALUE,
    description: VALUE,
    attributes: dict('attr'),
    deprecated: part('deprecation'),
    annotations: part('attr'),
    src_extension: VALUE,
    key: VALUE,
  },
  extension: {
    name: VALUE,
    uid: VALUE,
    caption: VALUE,
    version: VALUE,
    description: VALUE,
    deprecated: part('deprecation'),
  },
  category: {
    caption: VALUE,
    description: VALUE,
    uid: VALUE,
    type: VALUE,
    classes: dict('event'),
  },
  categories: {
    attributes: dict('category'),
    caption: VALUE,
    description: VALUE,
    name: VALUE,
  },
} satisfies FieldRegistry;

export function fieldShapes(kind: PartKind): Record<string, FieldShape> {
  const shapes: FieldRegistry = FIELD_SHAPES;
  return shapes[kind];
}
