/**
 * The mutable overlay a compilation writes to.
 *
 * Files are deep-copied out of the backing repository on first access, so
 * operations mutate copies and the repository can back further compilations.
 */

import { deepClone, isRecord } from '@taxoforge/shared';

import {
  getKey,
  selectKind,
  type DefinitionFile,
  type DefinitionFileOf,
  type DefinitionKind,
} from '../repository/definitions.js';
import {
  RepoPaths,
  SpecialFiles,
  asPath,
  extensionOf,
  pathParts,
  type RepoPath,
} from '../repository/paths.js';
import type { Repository } from '../repository/repository.js';
import {
  decodeCategory,
  decodeEvent,
  decodeExtension,
  decodeObject,
  decodeProfile,
  decodeType,
} from '../schema/decode.js';
import { emptySchema, type Schema } from '../schema/model.js';
import { CompilationError, RepositoryError, toError } from '../types/errors.js';

const BASE_EVENT = 'base_event';

export class WorkingSchema {
  readonly repo: Repository;
  readonly #files = new Map<RepoPath, DefinitionFile>();

  constructor(repo: Repository) {
    this.repo = repo;
  }

  /** The working copy of a file, copied from the repository on first access. */
  get(path: RepoPath): DefinitionFile {
    let file = this.#files.get(path);
    if (file === undefined) {
      const source = this.repo.get(path);
      if (source === undefined) {
        throw new RepositoryError({
          message: `File ${path} not found in repository`,
          context: { path },
        });
      }
      file = deepClone(source);
      this.#files.set(path, file);
    }
    return file;
  }

  /** The working copy as the given kind, failing on a kind mismatch. */
  narrow<K extends DefinitionKind>(path: RepoPath, kind: K): DefinitionFileOf<K> {
    const file = this.get(path);
    const narrowed = selectKind(file, kind);
    if (narrowed === undefined) {
      throw new RepositoryError({
        message: `Expected ${kind} at ${path}, got ${file.kind}`,
        context: { path },
      });
    }
    return narrowed;
  }

  set(path: RepoPath, file: DefinitionFile): void {
    file.path = path;
    this.#files.set(path, file);
  }

  has(path: RepoPath): boolean {
    return this.#files.has(path) || this.repo.has(path);
  }

  /** Repository paths in order, followed by paths that only exist here. */
  paths(): RepoPath[] {
    const out = [...this.repo.paths()];
    for (const path of this.#files.keys()) {
      if (!this.repo.has(path)) out.push(path);
    }
    return out;
  }

  /** Paths that have been copied into (or created in) the overlay. */
  materialized(): RepoPath[] {
    return [...this.#files.keys()];
  }

  findObject(name: string): DefinitionFileOf<'object'> {
    return this.#findRecord(RepoPaths.OBJECTS, 'object', name);
  }

  findEvent(name: string): DefinitionFileOf<'event'> {
    return this.#findRecord(RepoPaths.EVENTS, 'event', name);
  }

  #findRecord<K extends 'object' | 'event'>(
    prefix: string,
    kind: K,
    name: string
  ): DefinitionFileOf<K> {
    const found: RepoPath[] = [];
    for (const [path, file] of this.#files) {
      if (pathParts(path)[0] !== prefix) continue;
      const record = selectKind(file, kind);
      if (record && (getKey(record.data) === name || record.data.name === name)) {
        found.push(path);
      }
    }

    const [shortest] = found.sort((a, b) => a.length - b.length);
    if (shortest === undefined) {
      throw new RepositoryError({
        message: `${kind === 'object' ? 'Object' : 'Event'} ${name} not found`,
        context: { value: name },
      });
    }
    return this.narrow(shortest, kind);
  }

  /**
   * Directory of an extension, given either its directory name or the name
   * declared in its `extension.json`.
   */
  findExtensionPath(name: string): RepoPath {
    if (this.repo.has(asPath(RepoPaths.EXTENSIONS, name, SpecialFiles.EXTENSION))) {
      return asPath(RepoPaths.EXTENSIONS, name);
    }

    for (const dir of this.repo.extensions()) {
      const path = asPath(RepoPaths.EXTENSIONS, dir, SpecialFiles.EXTENSION);
      if (!this.repo.has(path)) continue;
      const file = this.narrow(path, 'extension');
      if (file.data.name === name) {
        return asPath(RepoPaths.EXTENSIONS, dir);
      }
    }

    throw new RepositoryError({
      message: `Extension ${name} not found`,
      context: { value: name },
    });
  }

  /**
   * Assemble the resolved schema from the current state of every file.
   * Files of extensions not listed in `extensions` are left out.
   */
  schema(extensions?: readonly string[]): Schema {
    const schema = emptySchema();

    for (const path of this.paths()) {
      const dir = extensionOf(path);
      if (dir !== undefined && extensions !== undefined && !extensions.includes(dir)) {
        continue;
      }
      const file = this.get(path);
      try {
        materialize(schema, file);
      } catch (error) {
        const cause = toError(error);
        throw new CompilationError({
          message: `Error processing ${path}: ${cause.message}`,
          context: { path },
          cause,
        });
      }
    }

    const base = schema.classes[BASE_EVENT];
    if (base !== undefined) {
      schema.base_event = base;
    }
    return schema;
  }
}

function materialize(schema: Schema, file: DefinitionFile): void {
  const parts = pathParts(file.path);
  const top = parts[0];

  switch (file.kind) {
    case 'object': {
      if (top !== RepoPaths.OBJECTS) return;
      const key = getKey(file.data);
      if (key === undefined) throw new Error('object has no name');
      if (key.startsWith('_')) return;
      schema.objects[key] = decodeObject(file.data, key);
      return;
    }
    case 'event': {
      if (top !== RepoPaths.EVENTS) return;
      if (file.data.uid === undefined && file.data.name !== BASE_EVENT) return;
      const key = getKey(file.data);
      if (key === undefined) throw new Error('event has no name');
      schema.classes[key] = decodeEvent(file.data, key);
      return;
    }
    case 'profile': {
      if (top !== RepoPaths.PROFILES) return;
      const key = getKey(file.data);
      if (key === undefined) throw new Error('profile has no name');
      schema.profiles ??= {};
      schema.profiles[key] = decodeProfile(file.data, key);
      return;
    }
    case 'extension': {
      if (extensionOf(file.path) === undefined) return;
      const { name } = file.data;
      if (name === undefined) throw new Error('extension has no name');
      schema.extensions ??= {};
      schema.extensions[name] = decodeExtension(file.data, name);
      return;
    }
    case 'dictionary': {
      if (file.path !== SpecialFiles.DICTIONARY) return;
      for (const [name, type] of Object.entries(file.data.types?.attributes ?? {})) {
        if (isRecord(type)) {
          schema.types[name] = decodeType(type, name);
        }
      }
      return;
    }
    case 'version': {
      if (file.path !== SpecialFiles.VERSION) return;
      if (file.data.version === undefined) throw new Error('version is not set');
      schema.version = file.data.version;
      return;
    }
    case 'categories': {
      if (file.path !== SpecialFiles.CATEGORIES) return;
      schema.categories ??= {};
      for (const [name, category] of Object.entries(file.data.attributes ?? {})) {
        if (isRecord(category)) {
          schema.categories[name] = decodeCategory(category, name, name);
        }
      }
      return;
    }
    case 'include':
      return;
  }
}
