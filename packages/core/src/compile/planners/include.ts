import path from 'node:path';

import { isRecord } from '@taxoforge/shared';

import { ErrorCode } from '../../errors/codes.js';
import {
  hasAttributes,
  includeTargets,
  isRecordFile,
  type DefinitionFile,
} from '../../repository/definitions.js';
import {
  asPath,
  extensionOf,
  extensionless,
  pathParts,
  type RepoPath,
} from '../../repository/paths.js';
import type { Repository } from '../../repository/repository.js';
import { DefinitionError } from '../../types/errors.js';
import { merge, type FieldPath } from '../merge.js';
import { BasePlanner, type Analysis, type Operation } from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

const INCLUDE = 'include';

/** A path and each of its ancestors, nearest first, ending at the root. */
function withParents(p: RepoPath): RepoPath[] {
  const parts = pathParts(p);
  const out: RepoPath[] = [];
  for (let i = parts.length; i >= 0; i--) {
    out.push(parts.slice(0, i).join('/'));
  }
  return out;
}

/**
 * Locate the file an include directive names, searching the including
 * file's directory and its parents (and the same locations in core when the
 * including file belongs to an extension).
 */
export function findDependency(
  repo: Repository,
  subject: string,
  relativeTo?: RepoPath
): RepoPath | undefined {
  const candidates = [subject];
  if (path.posix.extname(subject) !== '.json') {
    candidates.push(`${subject}.json`);
  }

  const roots: RepoPath[] = [];
  if (relativeTo !== undefined) {
    roots.push(relativeTo);
    if (extensionOf(relativeTo) !== undefined) {
      roots.push(extensionless(relativeTo));
    }
  }

  for (const root of roots) {
    for (const dir of withParents(root)) {
      for (const candidate of candidates) {
        const key = asPath(dir, candidate);
        if (repo.has(key)) return key;
      }
    }
  }
  return undefined;
}

/** Splice an included file into the target, then drop the directive. */
export class IncludeOp implements Operation {
  constructor(
    readonly target: RepoPath,
    readonly prerequisite: RepoPath,
    readonly inAttributes = false
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const target = schema.get(this.target);
    const included = schema.get(this.prerequisite);

    const results = merge(
      target,
      included,
      this.inAttributes ? { allowedFields: ['attributes'] } : {}
    );

    if (this.inAttributes) {
      if (hasAttributes(target) && target.data.attributes !== undefined) {
        if (INCLUDE in target.data.attributes) {
          delete target.data.attributes[INCLUDE];
          results.push(['attributes', INCLUDE]);
        }
      }
    } else if (isRecordFile(target) && target.data.include !== undefined) {
      delete target.data.include;
      results.push([INCLUDE]);
    }
    return results;
  }

  describe(): string {
    return `Include ${this.target} <- ${this.prerequisite}`;
  }
}

export class IncludePlanner extends BasePlanner {
  readonly name = 'include';

  analyze(file: DefinitionFile): Analysis {
    const found: Operation[] = [];

    if (isRecordFile(file)) {
      for (const subject of includeTargets(file.data.include)) {
        found.push(new IncludeOp(file.path, this.#resolve(subject, file.path)));
      }
    }

    if (hasAttributes(file)) {
      const directive = file.data.attributes?.[INCLUDE];
      if (directive !== undefined && !isRecord(directive)) {
        for (const subject of includeTargets(directive)) {
          found.push(
            new IncludeOp(file.path, this.#resolve(subject, file.path), true)
          );
        }
      }
    }

    return found;
  }

  #resolve(subject: string, relativeTo: RepoPath): RepoPath {
    const location = findDependency(this.schema.repo, subject, relativeTo);
    if (location === undefined) {
      throw new DefinitionError({
        message: `Cannot resolve include "${subject}" in ${relativeTo}`,
        errorCode: ErrorCode.UNRESOLVED_INCLUDE,
        context: { path: relativeTo, value: subject },
      });
    }
    return location;
  }
}
