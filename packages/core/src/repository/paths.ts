import path from 'node:path';

import { RepositoryError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import type { DefinitionKind } from './definitions.js';

/** Normalized, forward-slashed path of a file inside a repository. */
export type RepoPath = string;

export const RepoPaths = {
  OBJECTS: 'objects',
  EVENTS: 'events',
  EXTENSIONS: 'extensions',
  INCLUDES: 'includes',
  PROFILES: 'profiles',
} as const;

export const SpecialFiles = {
  DICTIONARY: 'dictionary.json',
  CATEGORIES: 'categories.json',
  VERSION: 'version.json',
  EXTENSION: 'extension.json',
} as const;

export const REPO_PATHS: readonly string[] = Object.values(RepoPaths);
export const SPECIAL_FILES: readonly string[] = Object.values(SpecialFiles);

function invalidPath(message: string, p: string): RepositoryError {
  return new RepositoryError({
    message,
    errorCode: ErrorCode.INVALID_PATH,
    context: { path: p },
  });
}

/** Split a path (either separator) into its non-empty parts. */
export function pathParts(...segments: string[]): string[] {
  return segments
    .join('/')
    .split(/[\\/]+/)
    .filter((part) => part !== '' && part !== '.');
}

export function asPath(...segments: string[]): RepoPath {
  return pathParts(...segments).join('/');
}

/**
 * Reduce a filesystem path to a repository path: everything before the first
 * repository directory or special file is dropped.
 */
export function sanitizePath(...segments: string[]): RepoPath {
  const parts = pathParts(...segments);
  const loc = parts.findIndex(
    (part) => REPO_PATHS.includes(part) || SPECIAL_FILES.includes(part)
  );
  const joined = parts.join('/');
  if (loc < 0) {
    throw invalidPath(
      `Invalid key: ${joined} isn't an allowed file or directory.`,
      joined
    );
  }

  const rest = parts.slice(loc);
  if (rest[0] === RepoPaths.EXTENSIONS) {
    if (rest.length < 3) {
      throw invalidPath(
        `Invalid key: ${joined} is missing extension name or contents.`,
        joined
      );
    }
    const third = rest[2] ?? '';
    if (rest.length > 3 && !REPO_PATHS.includes(third)) {
      throw invalidPath(
        `Invalid key: ${third} isn't an allowed directory.`,
        joined
      );
    }
    if (rest.length === 3 && !SPECIAL_FILES.includes(third)) {
      throw invalidPath(`Invalid key: ${third} isn't an allowed filename.`, joined);
    }
  }
  return rest.join('/');
}

/** File name without directory or extension. */
export function shortName(...segments: string[]): string {
  return path.posix.parse(asPath(...segments)).name;
}

/** Extension directory of a path, if the path lives in an extension. */
export function extensionOf(...segments: string[]): string | undefined {
  const parts = pathParts(...segments);
  return parts[0] === RepoPaths.EXTENSIONS ? parts[1] : undefined;
}

/** The path with any `extensions/<name>/` prefix removed. */
export function extensionless(...segments: string[]): RepoPath {
  const parts = pathParts(...segments);
  if (parts[0] === RepoPaths.EXTENSIONS) {
    return parts.slice(2).join('/');
  }
  return parts.join('/');
}

/** Category directory of an event path (`events/<category>/x.json`). */
export function categoryOf(...segments: string[]): string | undefined {
  const parts = pathParts(extensionless(...segments));
  if (parts[0] === RepoPaths.EVENTS && parts.length > 2) {
    return parts.slice(1, -1).join('/');
  }
  return undefined;
}

/** An event path without its category directories. */
export function categoryless(...segments: string[]): RepoPath {
  const parts = pathParts(...segments);
  const [idx, min] = extensionOf(...segments) !== undefined ? [2, 4] : [0, 2];
  if (parts[idx] === RepoPaths.EVENTS && parts.length > min) {
    return [...parts.slice(0, idx + 1), ...parts.slice(-1)].join('/');
  }
  return parts.join('/');
}

/** Expected definition kind for a repository path. */
export function pathDefinitionKind(...segments: string[]): DefinitionKind {
  const sanitized = sanitizePath(...segments);
  const parts = pathParts(sanitized);

  if (parts.length >= 2) {
    switch (parts[0]) {
      case RepoPaths.OBJECTS:
        return 'object';
      case RepoPaths.EVENTS:
        return 'event';
      case RepoPaths.INCLUDES:
        return 'include';
      case RepoPaths.PROFILES:
        return 'profile';
      case RepoPaths.EXTENSIONS:
        return pathDefinitionKind(...parts.slice(2));
      default:
        break;
    }
  }

  switch (parts[parts.length - 1]) {
    case SpecialFiles.DICTIONARY:
      return 'dictionary';
    case SpecialFiles.CATEGORIES:
      return 'categories';
    case SpecialFiles.VERSION:
      return 'version';
    case SpecialFiles.EXTENSION:
      return 'extension';
    default:
      throw invalidPath(
        `${sanitized} isn't a recognized repository path.`,
        sanitized
      );
  }
}
