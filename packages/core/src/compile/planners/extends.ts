import { ErrorCode } from '../../errors/codes.js';
import { isRecordFile, type DefinitionFile } from '../../repository/definitions.js';
import {
  RepoPaths,
  extensionOf,
  extensionless,
  pathParts,
  shortName,
  type RepoPath,
} from '../../repository/paths.js';
import type { Repository } from '../../repository/repository.js';
import { DefinitionError } from '../../types/errors.js';
import { merge, type FieldPath } from '../merge.js';
import { BasePlanner, type Analysis, type Operation } from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

function searchPrefix(relativeTo: RepoPath): string {
  const parts = pathParts(relativeTo);
  let idx = parts.indexOf(RepoPaths.OBJECTS);
  if (idx < 0) idx = parts.indexOf(RepoPaths.EVENTS);
  return `${parts.slice(0, idx + 1).join('/')}/`;
}

function search(
  repo: Repository,
  subject: string,
  relativeTo: RepoPath,
  child: RepoPath
): RepoPath | undefined {
  const prefix = searchPrefix(relativeTo);
  for (const file of repo.files()) {
    if (file.path === child || !file.path.startsWith(prefix)) continue;
    if (shortName(file.path) === subject) return file.path;
    if (isRecordFile(file) && file.data.name === subject) return file.path;
  }

  if (extensionOf(relativeTo) !== undefined) {
    return search(repo, subject, extensionless(relativeTo), child);
  }
  return undefined;
}

/**
 * Find the parent named by an `extends` directive. The search covers the
 * child's own `objects/` or `events/` tree, then the core tree when the child
 * belongs to an extension. A missing parent is an error.
 */
export function findBase(
  repo: Repository,
  subject: string,
  relativeTo: RepoPath
): RepoPath {
  const found = search(repo, subject, relativeTo, relativeTo);
  if (found === undefined) {
    throw new DefinitionError({
      message: `${relativeTo} extends unknown record "${subject}"`,
      errorCode: ErrorCode.UNRESOLVED_BASE,
      context: { path: relativeTo, value: subject },
    });
  }
  return found;
}

/** Merge the parent into the child; values the child already has win. */
export class ExtendsOp implements Operation {
  constructor(
    readonly target: RepoPath,
    readonly prerequisite: RepoPath
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    return merge(schema.get(this.target), schema.get(this.prerequisite));
  }

  describe(): string {
    return `Extends ${this.target} <- ${this.prerequisite}`;
  }
}

export class ExtendsPlanner extends BasePlanner {
  readonly name = 'extends';

  analyze(file: DefinitionFile): Analysis {
    if (!isRecordFile(file) || file.data.extends === undefined) {
      return undefined;
    }
    return new ExtendsOp(
      file.path,
      findBase(this.schema.repo, file.data.extends, file.path)
    );
  }
}
