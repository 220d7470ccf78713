/**
 * Builders for in-memory repositories used across the compiler tests.
 */

import type {
  AttrDefn,
  DefinitionFile,
  DefinitionFileOf,
  DefinitionKind,
  DefinitionMap,
} from '../repository/definitions.js';
import type { RepoPath } from '../repository/paths.js';
import { Repository } from '../repository/repository.js';
import type { PlannerContext } from '../compile/operation.js';
import {
  resolveCompilationOptions,
  type CompilationOptions,
} from '../compile/options.js';
import { WorkingSchema } from '../compile/working-schema.js';

export function defn<K extends DefinitionKind>(
  kind: K,
  path: RepoPath,
  data: DefinitionMap[K]
): DefinitionFileOf<K> {
  return { kind, path, data };
}

export const objectFile = (path: RepoPath, data: DefinitionMap['object']) =>
  defn('object', path, data);
export const eventFile = (path: RepoPath, data: DefinitionMap['event']) =>
  defn('event', path, data);
export const profileFile = (path: RepoPath, data: DefinitionMap['profile']) =>
  defn('profile', path, data);
export const includeFile = (path: RepoPath, data: DefinitionMap['include']) =>
  defn('include', path, data);
export const extensionFile = (path: RepoPath, data: DefinitionMap['extension']) =>
  defn('extension', path, data);
export const dictionaryFile = (data: DefinitionMap['dictionary']) =>
  defn('dictionary', 'dictionary.json', data);
export const categoriesFile = (data: DefinitionMap['categories']) =>
  defn('categories', 'categories.json', data);
export const versionFile = (version: string) =>
  defn('version', 'version.json', { version });

export function repoOf(...files: DefinitionFile[]): Repository {
  return new Repository(files);
}

/** A complete attribute: caption, requirement and type set. */
export function attr(type: string, extra: AttrDefn = {}): AttrDefn {
  return { caption: type, requirement: 'optional', type, ...extra };
}

/** A fresh working schema over `repo` with resolved options. */
export function plannerContext(
  repo: Repository,
  options: CompilationOptions = {}
): PlannerContext {
  return {
    schema: new WorkingSchema(repo),
    options: resolveCompilationOptions(repo, options),
  };
}
