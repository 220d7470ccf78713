/**
 * Planners for records that live under `extensions/<name>/`.
 *
 * A record whose extensionless path exists in core modifies that core
 * record. Any other record is introduced by the extension: it is tagged with
 * its source extension, optionally prefixed, and finally copied into core.
 */

import { deepClone } from '@taxoforge/shared';

import { ErrorCode } from '../../errors/codes.js';
import {
  attrEntries,
  canBeIntroducedByExtension,
  hasAttributes,
  type DefinitionFile,
} from '../../repository/definitions.js';
import {
  RepoPaths,
  SpecialFiles,
  asPath,
  extensionOf,
  extensionless,
  type RepoPath,
} from '../../repository/paths.js';
import type { Repository } from '../../repository/repository.js';
import { DefinitionError } from '../../types/errors.js';
import { merge, type FieldPath } from '../merge.js';
import {
  BasePlanner,
  type Analysis,
  type Operation,
  type PlannerContext,
} from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

function extensionFilePath(dir: string): RepoPath {
  return asPath(RepoPaths.EXTENSIONS, dir, SpecialFiles.EXTENSION);
}

/**
 * Name declared by an extension directory's `extension.json`. The directory
 * name may differ from it.
 */
export function extensionName(repo: Repository, dir: string): string {
  const path = extensionFilePath(dir);
  const file = repo.get(path);
  if (file?.kind !== 'extension' || file.data.name === undefined) {
    throw new DefinitionError({
      message: `Extension ${dir} has no name in ${path}`,
      errorCode: ErrorCode.UNKNOWN_EXTENSION,
      context: { path },
    });
  }
  return file.data.name;
}

/** The enabled extension a path belongs to, if any. */
function enabledExtension(path: RepoPath, enabled: readonly string[]): string | undefined {
  const dir = extensionOf(path);
  return dir !== undefined && enabled.includes(dir) ? dir : undefined;
}

/** Whether a path is an extension's amendment of an existing core record. */
export function modifiesCore(repo: Repository, path: RepoPath): boolean {
  return extensionOf(path) !== undefined && repo.has(extensionless(path));
}

/**
 * Map of extension-introduced object and event names to their prefixed
 * keys (`<extension>/<name>`), built once from the repository.
 */
export function extensionTypeMap(
  repo: Repository,
  extensions: readonly string[]
): ReadonlyMap<string, string> {
  const map = new Map<string, string>();
  for (const file of repo.files()) {
    const dir = enabledExtension(file.path, extensions);
    if (dir === undefined) continue;
    if (file.kind !== 'object' && file.kind !== 'event') continue;
    if (repo.has(extensionless(file.path))) continue;
    const { name } = file.data;
    if (name !== undefined) {
      map.set(name, `${extensionName(repo, dir)}/${name}`);
    }
  }
  return map;
}

/** Set `src_extension` on a record introduced by an extension. */
export class MarkExtensionOp implements Operation {
  constructor(
    readonly target: RepoPath,
    readonly prerequisite: RepoPath
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const source = schema.get(this.prerequisite);
    if (!canBeIntroducedByExtension(source)) return [];

    const dir = extensionOf(this.prerequisite);
    if (dir === undefined) return [];
    const extension = schema.narrow(extensionFilePath(dir), 'extension');
    if (extension.data.name === undefined) {
      throw new DefinitionError({
        message: `Extension ${dir} has no name`,
        errorCode: ErrorCode.UNKNOWN_EXTENSION,
        context: { path: extension.path },
      });
    }
    source.data.src_extension = extension.data.name;
    return [['src_extension']];
  }

  describe(): string {
    return `Mark ${this.prerequisite} as introduced by its extension`;
  }
}

export class MarkExtensionPlanner extends BasePlanner {
  readonly name = 'mark-extension';

  analyze(file: DefinitionFile): Analysis {
    if (!canBeIntroducedByExtension(file)) return undefined;
    if (enabledExtension(file.path, this.options.extensions) === undefined) {
      return undefined;
    }
    const dest = extensionless(file.path);
    if (this.schema.repo.has(dest)) return undefined;
    return new MarkExtensionOp(dest, file.path);
  }
}

/** Merge an extension's version of a core record into the core record. */
export class ExtensionModifyOp implements Operation {
  constructor(
    readonly target: RepoPath,
    readonly prerequisite: RepoPath
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    return merge(schema.get(this.target), schema.get(this.prerequisite));
  }

  describe(): string {
    return `Extension modifies ${this.target} <- ${this.prerequisite}`;
  }
}

export class ExtensionMergePlanner extends BasePlanner {
  readonly name = 'extension-merge';

  analyze(file: DefinitionFile): Analysis {
    if (enabledExtension(file.path, this.options.extensions) === undefined) {
      return undefined;
    }
    const dest = extensionless(file.path);
    if (!this.schema.repo.has(dest)) return undefined;
    return new ExtensionModifyOp(dest, file.path);
  }
}

/** Copy an extension-only record to its core path. */
export class ExtensionCopyOp implements Operation {
  constructor(
    readonly target: RepoPath,
    readonly prerequisite: RepoPath
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const source = schema.get(this.prerequisite);
    if (!canBeIntroducedByExtension(source)) return [];

    const copy = deepClone(source);
    schema.set(this.target, copy);
    return Object.keys(copy.data).map((field) => [field]);
  }

  describe(): string {
    return `Extension creates ${this.target} <- ${this.prerequisite}`;
  }
}

export class ExtensionCopyPlanner extends BasePlanner {
  readonly name = 'extension-copy';

  analyze(file: DefinitionFile): Analysis {
    if (!canBeIntroducedByExtension(file)) return undefined;
    if (enabledExtension(file.path, this.options.extensions) === undefined) {
      return undefined;
    }
    const dest = extensionless(file.path);
    if (this.schema.repo.has(dest)) return undefined;
    return new ExtensionCopyOp(dest, file.path);
  }
}

/** Key an extension-introduced record as `<extension>/<name>`. */
export class PrefixKeyOp implements Operation {
  constructor(readonly target: RepoPath) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const source = schema.get(this.target);
    if (!canBeIntroducedByExtension(source)) return [];

    const { src_extension, name } = source.data;
    if (src_extension === undefined || name === undefined) return [];
    source.data.key = `${src_extension}/${name}`;
    return [['key']];
  }

  describe(): string {
    return `Prepend extension name to ${this.target}`;
  }
}

/** Rewrite attribute types that name extension-introduced records. */
export class PrefixTypeOp implements Operation {
  constructor(
    readonly target: RepoPath,
    private readonly types: ReadonlyMap<string, string>
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const source = schema.get(this.target);
    if (!hasAttributes(source)) return [];

    const results: FieldPath[] = [];
    for (const [name, attr] of attrEntries(source.data.attributes)) {
      const prefixed = attr.type === undefined ? undefined : this.types.get(attr.type);
      if (prefixed !== undefined) {
        attr.type = prefixed;
        results.push(['attributes', name, 'type']);
      }
    }
    return results;
  }

  describe(): string {
    return `Prefix extension types in ${this.target}`;
  }
}

export class ExtensionPrefixPlanner extends BasePlanner {
  readonly name = 'extension-prefix';

  readonly #types: ReadonlyMap<string, string>;

  constructor(context: PlannerContext) {
    super(context);
    this.#types = context.options.prefixExtensions
      ? extensionTypeMap(context.schema.repo, context.options.extensions)
      : new Map();
  }

  analyze(file: DefinitionFile): Analysis {
    if (!this.options.prefixExtensions) return undefined;

    const ops: Operation[] = [];
    if (enabledExtension(file.path, this.options.extensions) !== undefined) {
      ops.push(new PrefixKeyOp(file.path));
    }
    if (hasAttributes(file)) {
      ops.push(new PrefixTypeOp(file.path, this.#types));
    }
    return ops;
  }
}
