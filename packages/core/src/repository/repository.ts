/**
 * An insertion-ordered, path-keyed store of definition files.
 *
 * A Repository is read-only from the compiler's point of view: compilation
 * works on a copy-on-access overlay and never mutates it, so one repository
 * can back any number of compilations.
 */

import {
  selectKind,
  type DefinitionFile,
  type DefinitionFileOf,
  type DefinitionKind,
} from './definitions.js';
import {
  RepoPaths,
  pathDefinitionKind,
  pathParts,
  shortName,
  type RepoPath,
} from './paths.js';
import { RepositoryError } from '../types/errors.js';

export class Repository {
  readonly #contents: Map<RepoPath, DefinitionFile>;

  constructor(files: Iterable<DefinitionFile> = []) {
    this.#contents = new Map();
    for (const file of files) {
      this.set(file.path, file);
    }
  }

  get(path: RepoPath): DefinitionFile | undefined {
    return this.#contents.get(path);
  }

  /** Fetch a file or throw when the path is unknown. */
  require(path: RepoPath): DefinitionFile {
    const file = this.#contents.get(path);
    if (!file) {
      throw new RepositoryError({
        message: `No definition at ${path}`,
        context: { path },
      });
    }
    return file;
  }

  /** Add or replace a file. The file's `path` is rewritten to `path`. */
  set(path: RepoPath, file: DefinitionFile): void {
    file.path = path;
    this.#contents.set(path, file);
  }

  delete(path: RepoPath): boolean {
    return this.#contents.delete(path);
  }

  has(path: RepoPath): boolean {
    return this.#contents.has(path);
  }

  get size(): number {
    return this.#contents.size;
  }

  files(): IterableIterator<DefinitionFile> {
    return this.#contents.values();
  }

  paths(): IterableIterator<RepoPath> {
    return this.#contents.keys();
  }

  /**
   * Extension directory names. A directory name may differ from the name
   * declared in the extension's `extension.json`.
   */
  extensions(): Set<string> {
    const out = new Set<string>();
    for (const path of this.#contents.keys()) {
      const parts = pathParts(path);
      if (parts[0] === RepoPaths.EXTENSIONS && parts[1] !== undefined) {
        out.add(parts[1]);
      }
    }
    return out;
  }

  /** Names of all profiles, core and extension, falling back to the stem. */
  profiles(): string[] {
    const out: string[] = [];
    for (const [path, file] of this.#contents) {
      const parts = pathParts(path);
      const isCoreProfile = parts.length === 2 && parts[0] === RepoPaths.PROFILES;
      const isExtensionProfile =
        parts.length === 4 &&
        parts[0] === RepoPaths.EXTENSIONS &&
        parts[2] === RepoPaths.PROFILES;
      if (!isCoreProfile && !isExtensionProfile) continue;
      if (file.kind === 'profile' && typeof file.data.name === 'string') {
        out.push(file.data.name);
      } else {
        out.push(shortName(path));
      }
    }
    return out;
  }

  /** Fetch a file as the given kind, failing on a kind mismatch. */
  narrow<K extends DefinitionKind>(path: RepoPath, kind: K): DefinitionFileOf<K> {
    const file = this.require(path);
    const narrowed = selectKind(file, kind);
    if (!narrowed || pathDefinitionKind(path) !== kind) {
      throw new RepositoryError({
        message: `Expected ${kind} at ${path}, got ${file.kind}`,
        context: { path },
      });
    }
    return narrowed;
  }
}
