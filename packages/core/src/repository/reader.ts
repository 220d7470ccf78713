/**
 * Reads a directory of definition fragments into a Repository.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ValidateFunction } from 'ajv';

import { createAjv, formatAjvErrors } from '../ajv/factory.js';
import { ErrorCode } from '../errors/codes.js';
import { dropNulls, keysToNames } from '../schema/keys.js';
import { RepositoryError, toError } from '../types/errors.js';
import { silentLogger, type Logger } from '../util/logger.js';
import {
  DEFINITIONS_SCHEMA,
  definitionSchemaRef,
} from './definition-schema.js';
import type {
  DefinitionFile,
  DefinitionKind,
  DefinitionMap,
} from './definitions.js';
import {
  REPO_PATHS,
  RepoPaths,
  pathDefinitionKind,
  sanitizePath,
  type RepoPath,
} from './paths.js';
import { Repository } from './repository.js';

export interface ReadOptions {
  /** Keep each file's source text on `rawData` (default: false) */
  preserveRawData?: boolean;
  logger?: Logger;
}

type Validators = { [K in DefinitionKind]: ValidateFunction<DefinitionMap[K]> };

let validators: Validators | undefined;

function getValidators(): Validators {
  if (validators) return validators;
  const ajv = createAjv({ allErrors: false });
  ajv.addSchema(DEFINITIONS_SCHEMA);
  const compile = <K extends DefinitionKind>(kind: K) =>
    ajv.compile<DefinitionMap[K]>(definitionSchemaRef(kind));
  validators = {
    object: compile('object'),
    event: compile('event'),
    profile: compile('profile'),
    include: compile('include'),
    extension: compile('extension'),
    dictionary: compile('dictionary'),
    categories: compile('categories'),
    version: compile('version'),
  };
  return validators;
}

function check<T>(validate: ValidateFunction<T>, data: unknown, p: RepoPath): T {
  if (validate(data)) return data;
  throw new RepositoryError({
    message: `Failed to parse ${p}: ${formatAjvErrors(validate.errors)}`,
    errorCode: ErrorCode.PARSE_FAILED,
    context: { path: p },
  });
}

/**
 * Build a typed definition file from parsed JSON. The data must already use
 * field names (see keysToNames).
 */
export function toDefinitionFile(
  p: RepoPath,
  data: unknown,
  rawData?: string
): DefinitionFile {
  const v = getValidators();
  const kind = pathDefinitionKind(p);
  const base = { path: p, ...(rawData !== undefined ? { rawData } : {}) };
  switch (kind) {
    case 'object':
      return { ...base, kind, data: check(v.object, data, p) };
    case 'event':
      return { ...base, kind, data: check(v.event, data, p) };
    case 'profile':
      return { ...base, kind, data: check(v.profile, data, p) };
    case 'include':
      return { ...base, kind, data: check(v.include, data, p) };
    case 'extension':
      return { ...base, kind, data: check(v.extension, data, p) };
    case 'dictionary':
      return { ...base, kind, data: check(v.dictionary, data, p) };
    case 'categories':
      return { ...base, kind, data: check(v.categories, data, p) };
    case 'version':
      return { ...base, kind, data: check(v.version, data, p) };
  }
}

/** Parse one fragment's source text into a definition file. */
export function parseDefinition(
  filePath: string,
  raw: string,
  preserveRawData = false
): DefinitionFile {
  const p = sanitizePath(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new RepositoryError({
      message: `Failed to parse ${p}`,
      errorCode: ErrorCode.PARSE_FAILED,
      context: { path: p },
      cause: toError(error),
    });
  }
  return toDefinitionFile(
    p,
    keysToNames(dropNulls(parsed)),
    preserveRawData ? raw : undefined
  );
}

type RenameFn = (filePath: string) => string;

async function walk(
  dir: string,
  repo: Repository,
  options: ReadOptions,
  rename?: RenameFn
): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isFile() && path.extname(entry.name) === '.json') {
      const dest = rename ? rename(full) : full;
      const raw = await fs.readFile(full, 'utf8');
      const file = parseDefinition(dest, raw, options.preserveRawData);
      repo.set(file.path, file);
      (options.logger ?? silentLogger).debug(`read ${file.path}`);
    } else if (entry.isDirectory() && shouldDescend(full)) {
      await walk(full, repo, options, rename);
    }
  }
}

function shouldDescend(dir: string): boolean {
  const name = path.basename(dir);
  const parent = path.basename(path.dirname(dir));
  return (
    REPO_PATHS.includes(name) ||
    REPO_PATHS.includes(parent) ||
    dir.split(path.sep).includes(RepoPaths.EVENTS)
  );
}

/** Load a repository directory. */
export async function readRepository(
  dir: string,
  options: ReadOptions = {}
): Promise<Repository> {
  const repo = new Repository();
  await walk(path.resolve(dir), repo, options);
  return repo;
}

/**
 * Mount a directory of extensions (one subdirectory per extension) under
 * `extensions/`.
 */
export async function addExtensions(
  dir: string,
  repo: Repository,
  options: ReadOptions = {}
): Promise<void> {
  const root = path.resolve(dir);
  const entries = await fs.readdir(root, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (entry.isDirectory()) {
      await addExtension(path.join(root, entry.name), repo, options);
    }
  }
}

/** Mount a single extension directory as `extensions/<dirname>/`. */
export async function addExtension(
  dir: string,
  repo: Repository,
  options: ReadOptions = {}
): Promise<void> {
  const root = path.resolve(dir);
  const base = path.join(RepoPaths.EXTENSIONS, path.basename(root));
  await walk(root, repo, options, (file) =>
    path.join(base, path.relative(root, file))
  );
}
