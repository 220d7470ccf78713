import { ErrorCode } from '../../errors/codes.js';
import {
  attrEntries,
  hasAttributes,
  type DefinitionFile,
} from '../../repository/definitions.js';
import { extensionOf, extensionless, type RepoPath } from '../../repository/paths.js';
import type { Repository } from '../../repository/repository.js';
import { DefinitionError } from '../../types/errors.js';
import type { FieldPath } from '../merge.js';
import {
  BasePlanner,
  type Analysis,
  type Operation,
  type PlannerContext,
} from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';
import { extensionTypeMap } from './extension.js';

type RecordType = { kind: 'object' | 'event'; caption: string | undefined };

/**
 * Object and event names (and, with prefixing, their `<extension>/<name>`
 * keys) mapped to the kind and caption of the record they name. Records of
 * extensions outside `extensions` are not indexed.
 */
export class RecordTypeRegistry {
  readonly #types = new Map<string, RecordType>();

  constructor(repo: Repository, extensions: readonly string[], prefixed: boolean) {
    const aliases = prefixed ? extensionTypeMap(repo, extensions) : new Map<string, string>();

    for (const file of repo.files()) {
      if (file.kind !== 'object' && file.kind !== 'event') continue;
      const dir = extensionOf(file.path);
      if (dir !== undefined && !extensions.includes(dir)) continue;
      const { name, caption } = file.data;
      if (name === undefined) continue;

      const type: RecordType = { kind: file.kind, caption };
      if (!this.#types.has(name)) this.#types.set(name, type);

      const alias = aliases.get(name);
      const introduced = dir !== undefined && !repo.has(extensionless(file.path));
      if (alias !== undefined && introduced) this.#types.set(alias, type);
    }
  }

  get(name: string): RecordType | undefined {
    return this.#types.get(name);
  }
}

function isRecordTypeName(type: string): boolean {
  return !type.endsWith('_t') && type !== 'object' && type !== 'event';
}

/** Rewrite attributes typed by a record name to `object`/`event` references. */
export class ObjectTypeOp implements Operation {
  constructor(
    readonly target: RepoPath,
    private readonly registry: RecordTypeRegistry
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const file = schema.get(this.target);
    if (!hasAttributes(file)) return [];

    const results: FieldPath[] = [];
    for (const [name, attr] of attrEntries(file.data.attributes)) {
      if (attr.type === undefined || !isRecordTypeName(attr.type)) continue;

      const found = this.registry.get(attr.type);
      if (found === undefined) {
        throw new DefinitionError({
          message: `Unknown object type ${attr.type} for attribute ${name}`,
          errorCode: ErrorCode.UNKNOWN_OBJECT_TYPE,
          context: { path: this.target, value: attr.type },
        });
      }

      attr.object_type = attr.type;
      attr.type = found.kind;
      results.push(['attributes', name, 'type'], ['attributes', name, 'object_type']);
      if (found.caption !== undefined) {
        attr.object_name = found.caption;
        results.push(['attributes', name, 'object_name']);
      }
    }
    return results;
  }

  describe(): string {
    return `Set object types in ${this.target}`;
  }
}

export class ObjectTypePlanner extends BasePlanner {
  readonly name = 'object-type';

  readonly #registry: RecordTypeRegistry;

  constructor(context: PlannerContext) {
    super(context);
    this.#registry = new RecordTypeRegistry(
      this.schema.repo,
      this.options.extensions,
      this.options.prefixExtensions
    );
  }

  analyze(file: DefinitionFile): Analysis {
    if (!this.options.setObjectTypes || !hasAttributes(file)) return undefined;
    return new ObjectTypeOp(file.path, this.#registry);
  }
}
