/**
 * Observables: values worth surfacing for detection (IP addresses, hashes,
 * user names). Each carries a numeric type id, declared on dictionary types,
 * dictionary attributes, objects, or individual object and event attributes.
 *
 * Phase one gathers every declared id into the `type_id` enum of
 * `objects/observable.json`. Phase four stamps each attribute with the id
 * its name or type maps to in the dictionary.
 */

import { isRecord } from '@taxoforge/shared';

import { ErrorCode } from '../../errors/codes.js';
import {
  attrEntries,
  hasAttributes,
  type DefinitionFile,
  type EnumMemberDefn,
} from '../../repository/definitions.js';
import {
  RepoPaths,
  SpecialFiles,
  asPath,
  extensionOf,
  pathParts,
  type RepoPath,
} from '../../repository/paths.js';
import { DefinitionError, InternalError } from '../../types/errors.js';
import type { FieldPath } from '../merge.js';
import {
  BasePlanner,
  type Analysis,
  type Operation,
} from '../operation.js';
import type { WorkingSchema } from '../working-schema.js';

export const OBSERVABLE_PATH = asPath(RepoPaths.OBJECTS, 'observable.json');
const TYPE_ID = 'type_id';

function missingDictionary(target: RepoPath): DefinitionError {
  return new DefinitionError({
    message: `Missing ${SpecialFiles.DICTIONARY} (required by ${target})`,
    errorCode: ErrorCode.MISSING_DICTIONARY,
    context: { path: target },
  });
}

/** Add one `type_id` member per declared observable id. */
export class BuildObservableTypesOp implements Operation {
  readonly prerequisite = SpecialFiles.DICTIONARY;

  constructor(
    readonly target: RepoPath,
    private readonly extensions: readonly string[]
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    if (!schema.has(SpecialFiles.DICTIONARY)) {
      throw missingDictionary(this.target);
    }

    const found = new Map<string, string>();
    const add = (id: number | undefined, caption: string): void => {
      if (id === undefined) return;
      const key = String(id);
      if (!found.has(key)) found.set(key, caption);
    };

    const dictionary = schema.narrow(SpecialFiles.DICTIONARY, 'dictionary').data;
    for (const [name, type] of Object.entries(dictionary.types?.attributes ?? {})) {
      if (isRecord(type)) add(type.observable, type.caption ?? name);
    }
    for (const [name, attr] of attrEntries(dictionary.attributes)) {
      add(attr.observable, attr.caption ?? name);
    }

    for (const file of schema.repo.files()) {
      const dir = extensionOf(file.path);
      if (dir !== undefined && !this.extensions.includes(dir)) continue;
      const top = pathParts(file.path)[dir === undefined ? 0 : 2];

      if (file.kind === 'object' && top === RepoPaths.OBJECTS) {
        const caption = file.data.caption ?? file.data.name ?? '';
        add(file.data.observable, caption);
        for (const [name, attr] of attrEntries(file.data.attributes)) {
          add(attr.observable, `${caption} Object: ${name}`);
        }
      } else if (file.kind === 'event' && top === RepoPaths.EVENTS) {
        const caption = file.data.caption ?? file.data.name ?? '';
        for (const [name, attr] of attrEntries(file.data.attributes)) {
          add(attr.observable, `${caption} Event: ${name}`);
        }
      }
    }

    const observable = schema.narrow(this.target, 'object');
    const attributes = (observable.data.attributes ??= {});
    let typeId = attributes[TYPE_ID];
    if (!isRecord(typeId)) {
      typeId = {};
      attributes[TYPE_ID] = typeId;
    }
    const members: Record<string, EnumMemberDefn> = (typeId.enum ??= {});

    const results: FieldPath[] = [];
    for (const [key, caption] of found) {
      if (key in members) continue;
      members[key] = { caption };
      results.push(['attributes', TYPE_ID, 'enum', key]);
    }
    return results;
  }

  describe(): string {
    return `Build observable type ids in ${this.target}`;
  }
}

export class BuildObservableTypesPlanner extends BasePlanner {
  readonly name = 'build-observable-types';

  analyze(file: DefinitionFile): Analysis {
    if (file.path === OBSERVABLE_PATH) {
      return new BuildObservableTypesOp(file.path, this.options.extensions);
    }
    return undefined;
  }
}

/**
 * Observable ids keyed by dictionary attribute name and by type name.
 * Filled once by IndexObservablesOp, read by every MarkObservablesOp.
 */
export class ObservableRegistry {
  #attrs: ReadonlyMap<string, number> | undefined;
  #types: ReadonlyMap<string, number> | undefined;

  build(schema: WorkingSchema): void {
    if (!schema.has(SpecialFiles.DICTIONARY)) {
      throw missingDictionary(SpecialFiles.DICTIONARY);
    }
    const dictionary = schema.narrow(SpecialFiles.DICTIONARY, 'dictionary').data;

    const attrs = new Map<string, number>();
    for (const [name, attr] of attrEntries(dictionary.attributes)) {
      if (attr.observable !== undefined) attrs.set(name, attr.observable);
    }
    const types = new Map<string, number>();
    for (const [name, type] of Object.entries(dictionary.types?.attributes ?? {})) {
      if (isRecord(type) && type.observable !== undefined) {
        types.set(name, type.observable);
      }
    }

    this.#attrs = attrs;
    this.#types = types;
  }

  lookup(name: string, type: string | undefined): number | undefined {
    if (this.#attrs === undefined || this.#types === undefined) {
      throw new InternalError({ message: 'Observable registry used before it was built' });
    }
    return this.#attrs.get(name) ?? (type === undefined ? undefined : this.#types.get(type));
  }
}

export class IndexObservablesOp implements Operation {
  readonly target = SpecialFiles.DICTIONARY;

  constructor(private readonly registry: ObservableRegistry) {}

  apply(schema: WorkingSchema): FieldPath[] {
    this.registry.build(schema);
    return [];
  }

  describe(): string {
    return `Index observables in ${this.target}`;
  }
}

export class MarkObservablesOp implements Operation {
  readonly prerequisite = SpecialFiles.DICTIONARY;

  constructor(
    readonly target: RepoPath,
    private readonly registry: ObservableRegistry
  ) {}

  apply(schema: WorkingSchema): FieldPath[] {
    const file = schema.get(this.target);
    if (!hasAttributes(file)) return [];

    const results: FieldPath[] = [];
    for (const [name, attr] of attrEntries(file.data.attributes)) {
      const observable = this.registry.lookup(name, attr.type);
      if (observable !== undefined) {
        attr.observable = observable;
        results.push(['attributes', name, 'observable']);
      }
    }
    return results;
  }

  describe(): string {
    return `Set observables in ${this.target}`;
  }
}

export class MarkObservablesPlanner extends BasePlanner {
  readonly name = 'mark-observables';

  readonly #registry = new ObservableRegistry();

  analyze(file: DefinitionFile): Analysis {
    if (!this.options.setObservable) return undefined;

    const ops: Operation[] = [];
    if (file.path === SpecialFiles.DICTIONARY) {
      ops.push(new IndexObservablesOp(this.#registry));
    }
    if (hasAttributes(file)) {
      ops.push(new MarkObservablesOp(file.path, this.#registry));
    }
    return ops;
  }
}
