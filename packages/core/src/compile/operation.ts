/**
 * Planner/operation framework.
 *
 * A planner looks at one repository file and proposes operations. An
 * operation mutates one working-schema path, optionally after its
 * prerequisite path has been fully processed within the same phase.
 */

import type { DefinitionFile } from '../repository/definitions.js';
import type { RepoPath } from '../repository/paths.js';
import type { FieldPath } from './merge.js';
import type { ResolvedCompilationOptions } from './options.js';
import type { WorkingSchema } from './working-schema.js';

export interface Operation {
  readonly target: RepoPath;
  readonly prerequisite?: RepoPath;
  /** Apply the step and return the paths of the fields it changed. */
  apply(schema: WorkingSchema): FieldPath[];
  /** One-line description, used by `explain`. */
  describe(): string;
}

export type Analysis = Operation | Operation[] | undefined;

export interface Planner {
  readonly name: string;
  analyze(file: DefinitionFile): Analysis;
}

export interface PlannerContext {
  schema: WorkingSchema;
  options: ResolvedCompilationOptions;
}

/** Base for planners: holds the working schema and resolved options. */
export abstract class BasePlanner implements Planner {
  abstract readonly name: string;

  protected readonly schema: WorkingSchema;
  protected readonly options: ResolvedCompilationOptions;

  constructor(context: PlannerContext) {
    this.schema = context.schema;
    this.options = context.options;
  }

  abstract analyze(file: DefinitionFile): Analysis;
}

export function toOperations(analysis: Analysis): Operation[] {
  if (analysis === undefined) return [];
  return Array.isArray(analysis) ? analysis : [analysis];
}

/** Prefix every changed path with `["attributes", name]`. */
export function underAttribute(
  name: string,
  results: readonly FieldPath[]
): FieldPath[] {
  return results.map((path) => ['attributes', name, ...path]);
}
