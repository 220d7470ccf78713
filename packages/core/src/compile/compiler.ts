/**
 * Compilation engine.
 *
 * Planners run in four phases. The arrangement is a contract: every phase
 * assumes the invariants established by the phases before it hold across
 * the whole working schema.
 *
 *   1. annotations, extension marking, profile marking, includes, extends,
 *      observable type ids, extension amendments, disabled profiles
 *   2. event categories
 *   3. uids, dictionary backfill
 *   4. extension prefixes, object types, uid siblings, datetime twins,
 *      observables, category classes, extension copies
 */

import type { DefinitionFile } from '../repository/definitions.js';
import { extensionOf, type RepoPath } from '../repository/paths.js';
import type { Repository } from '../repository/repository.js';
import type { Schema } from '../schema/model.js';
import { CompilationError, isTaxoforgeError, toError } from '../types/errors.js';
import { silentLogger, type Logger } from '../util/logger.js';
import type { FieldPath } from './merge.js';
import {
  toOperations,
  type Operation,
  type Planner,
  type PlannerContext,
} from './operation.js';
import {
  resolveCompilationOptions,
  type CompilationOptions,
  type ResolvedCompilationOptions,
} from './options.js';
import { AnnotationPlanner } from './planners/annotations.js';
import { MapEventToCategoryPlanner } from './planners/category-events.js';
import { DateTimePlanner } from './planners/datetime.js';
import { DictionaryPlanner } from './planners/dictionary.js';
import { ExtendsPlanner } from './planners/extends.js';
import {
  ExtensionCopyPlanner,
  ExtensionMergePlanner,
  ExtensionPrefixPlanner,
  MarkExtensionPlanner,
} from './planners/extension.js';
import { IncludePlanner } from './planners/include.js';
import { ObjectTypePlanner } from './planners/object-type.js';
import {
  BuildObservableTypesPlanner,
  MarkObservablesPlanner,
} from './planners/observable.js';
import {
  ExcludeProfileAttrsPlanner,
  MarkProfilePlanner,
} from './planners/profile.js';
import { SetCategoryPlanner } from './planners/set-category.js';
import { UidPlanner } from './planners/uid.js';
import { UidSiblingPlanner } from './planners/uid-names.js';
import { WorkingSchema } from './working-schema.js';

/** Operations of one phase, grouped by target in first-seen order. */
export type PhaseOperations = Map<RepoPath, Operation[]>;

export interface Mutation {
  operation: Operation;
  changes: FieldPath[];
}

/** Applied operations and their changes, grouped by target. */
export type CompilationMutations = Map<RepoPath, Mutation[]>;

type PlannerClass = new (context: PlannerContext) => Planner;

export const PHASES: readonly (readonly PlannerClass[])[] = [
  [
    AnnotationPlanner,
    MarkExtensionPlanner,
    MarkProfilePlanner,
    IncludePlanner,
    ExtendsPlanner,
    BuildObservableTypesPlanner,
    ExtensionMergePlanner,
    ExcludeProfileAttrsPlanner,
  ],
  [SetCategoryPlanner],
  [UidPlanner, DictionaryPlanner],
  [
    ExtensionPrefixPlanner,
    ObjectTypePlanner,
    UidSiblingPlanner,
    DateTimePlanner,
    MarkObservablesPlanner,
    MapEventToCategoryPlanner,
    ExtensionCopyPlanner,
  ],
];

export interface CompilationConfig extends CompilationOptions {
  logger?: Logger;
}

export class Compilation {
  readonly repo: Repository;
  readonly options: ResolvedCompilationOptions;
  readonly working: WorkingSchema;

  readonly #logger: Logger;
  readonly #phases: Planner[][];
  #operations: PhaseOperations[] | undefined;
  #plan: Operation[] | undefined;
  #mutations: CompilationMutations | undefined;
  #schema: Schema | undefined;

  constructor(repo: Repository, config: CompilationConfig = {}) {
    const { logger, ...options } = config;
    this.repo = repo;
    this.options = resolveCompilationOptions(repo, options);
    this.working = new WorkingSchema(repo);
    this.#logger = logger ?? silentLogger;

    const context: PlannerContext = { schema: this.working, options: this.options };
    this.#phases = PHASES.map((phase) => phase.map((Ctor) => new Ctor(context)));
  }

  /** Operations proposed by every planner, one map per phase. */
  analyze(): PhaseOperations[] {
    if (this.#operations !== undefined) return this.#operations;

    this.#operations = this.#phases.map((planners, index) => {
      const found: PhaseOperations = new Map();
      for (const planner of planners) {
        for (const file of this.repo.files()) {
          if (!this.#isEnabled(file)) continue;
          for (const op of toOperations(planner.analyze(file))) {
            const list = found.get(op.target);
            if (list === undefined) {
              found.set(op.target, [op]);
            } else {
              list.push(op);
            }
          }
        }
      }
      this.#logger.debug(
        `phase ${index + 1}: ${countOperations(found)} operations on ${found.size} targets`
      );
      return found;
    });
    return this.#operations;
  }

  /** The analyzed operations in application order. */
  order(): Operation[] {
    this.#plan ??= orderOperations(this.analyze());
    return this.#plan;
  }

  /** Apply the plan to the working schema. */
  compile(): CompilationMutations {
    if (this.#mutations !== undefined) return this.#mutations;

    const mutations: CompilationMutations = new Map();
    for (const operation of this.order()) {
      let changes: FieldPath[];
      try {
        changes = operation.apply(this.working);
      } catch (error) {
        if (isTaxoforgeError(error)) throw error;
        const cause = toError(error);
        throw new CompilationError({
          message: `${operation.describe()} failed: ${cause.message}`,
          context: { operation: operation.describe(), target: operation.target },
          cause,
        });
      }

      const list = mutations.get(operation.target);
      if (list === undefined) {
        mutations.set(operation.target, [{ operation, changes }]);
      } else {
        list.push({ operation, changes });
      }
    }

    this.#logger.debug(`applied ${this.order().length} operations`);
    this.#mutations = mutations;
    return mutations;
  }

  /** The compiled schema. */
  build(): Schema {
    if (this.#schema === undefined) {
      this.compile();
      this.#schema = this.working.schema(this.options.extensions);
    }
    return this.#schema;
  }

  /** Files from extensions left out of the compilation are never analyzed. */
  #isEnabled(file: DefinitionFile): boolean {
    const dir = extensionOf(file.path);
    return dir === undefined || this.options.extensions.includes(dir);
  }
}

/**
 * Flatten phases into one plan. Within a phase, the operations targeting an
 * operation's prerequisite are emitted before it; each target is visited
 * once, so no operation appears twice.
 */
export function orderOperations(phases: readonly PhaseOperations[]): Operation[] {
  const plan: Operation[] = [];
  for (const phase of phases) {
    const planned = new Set<RepoPath>();
    const follow = (path: RepoPath): void => {
      const ops = phase.get(path);
      if (ops === undefined || planned.has(path)) return;
      planned.add(path);
      for (const op of ops) {
        if (op.prerequisite !== undefined && !planned.has(op.prerequisite)) {
          follow(op.prerequisite);
        }
        plan.push(op);
      }
    };
    for (const path of phase.keys()) follow(path);
  }
  return plan;
}

function countOperations(phase: PhaseOperations): number {
  let count = 0;
  for (const ops of phase.values()) count += ops.length;
  return count;
}

export function compileRepository(
  repo: Repository,
  config: CompilationConfig = {}
): Schema {
  return new Compilation(repo, config).build();
}
