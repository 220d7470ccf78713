/**
 * Profiles are named bundles of attributes that objects and events opt into
 * through their `profiles` list.
 */

import {
  attrEntries,
  isRecordFile,
  type DefinitionFile,
} from '../../repository/definitions.js';
import {
  RepoPaths,
  asPath,
  extensionOf,
  pathParts,
  shortName,
  type RepoPath,
} from '../../repository/paths.js';
import { DefinitionError, isTaxoforgeError } from '../../types/errors.js';
import type { FieldPath } from '../merge.js';
import { BasePlanner, type Analysis, type Operation } from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

/** Remove a disabled profile's attributes from a record. */
export class ExcludeProfileAttrsOp implements Operation {
  constructor(
    readonly target: RepoPath,
    readonly prerequisite: RepoPath
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const target = schema.get(this.target);
    if (!isRecordFile(target)) return [];
    const { attributes } = target.data;
    if (attributes === undefined) return [];

    const profile = schema.narrow(this.prerequisite, 'profile');
    const results: FieldPath[] = [];
    for (const name of Object.keys(profile.data.attributes ?? {})) {
      if (name in attributes) {
        delete attributes[name];
        results.push(['attributes', name]);
      }
    }
    return results;
  }

  describe(): string {
    return `Exclude profile ${this.prerequisite} from ${this.target}`;
  }
}

/** Tag each attribute of a profile with the profile's name. */
export class MarkProfileOp implements Operation {
  constructor(readonly target: RepoPath) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const profile = schema.narrow(this.target, 'profile');
    const { attributes, name } = profile.data;
    if (attributes === undefined) return [];
    if (name === undefined) {
      throw new DefinitionError({
        message: `Profile name is required ${this.target}`,
        context: { path: this.target },
      });
    }

    const results: FieldPath[] = [];
    for (const [attrName, attr] of attrEntries(attributes)) {
      attr.profile = name;
      results.push(['attributes', attrName, 'profile']);
    }
    return results;
  }

  describe(): string {
    return `Mark profile ${this.target}`;
  }
}

/**
 * Resolve a profile reference (`name`, `profiles/name`, `profiles/name.json`
 * or `<extension>/name`) made by the record at `relativeTo`. Candidates are
 * tried most specific first.
 */
export function findProfile(
  schema: WorkingSchema,
  ref: string,
  relativeTo: RepoPath
): RepoPath | undefined {
  const stem = shortName(ref);
  const file = `${stem}.json`;
  const search = [ref, asPath(RepoPaths.PROFILES, file)];

  const extension = extensionOf(relativeTo);
  if (extension !== undefined) {
    search.push(asPath(RepoPaths.EXTENSIONS, extension, RepoPaths.PROFILES, file));
  }

  const [head, ...rest] = pathParts(ref);
  if (head !== undefined && rest.length > 0) {
    try {
      search.push(asPath(schema.findExtensionPath(head), RepoPaths.PROFILES, file));
    } catch (error) {
      // `profiles/<name>` and similar are not extension references
      if (!isTaxoforgeError(error)) throw error;
    }
  }

  return search.reverse().find((candidate) => schema.repo.has(candidate));
}

export class ExcludeProfileAttrsPlanner extends BasePlanner {
  readonly name = 'exclude-profile-attrs';

  analyze(file: DefinitionFile): Analysis {
    if (!isRecordFile(file)) return undefined;

    const ops: Operation[] = [];
    for (const ref of file.data.profiles ?? []) {
      const path = findProfile(this.schema, ref, file.path);
      if (path !== undefined && !this.options.profiles.includes(shortName(ref))) {
        ops.push(new ExcludeProfileAttrsOp(file.path, path));
      }
    }
    return ops;
  }
}

export class MarkProfilePlanner extends BasePlanner {
  readonly name = 'mark-profile';

  analyze(file: DefinitionFile): Analysis {
    if (file.kind === 'profile') {
      return new MarkProfileOp(file.path);
    }
    return undefined;
  }
}
