import type { RepoPath } from '../repository/paths.js';
import type { Compilation, Mutation } from './compiler.js';
import type { Operation } from './operation.js';

export interface ExplainOptions {
  /** Only operations targeting this path */
  file?: RepoPath;
  /** With `file`, also operations targeting its prerequisites (transitively) */
  prereqs?: boolean;
}

/** Every path `file` depends on through operation prerequisites, in any phase. */
export function findPrerequisites(
  compilation: Compilation,
  file: RepoPath,
  found: Set<RepoPath> = new Set()
): Set<RepoPath> {
  for (const phase of compilation.analyze()) {
    for (const op of phase.get(file) ?? []) {
      if (op.prerequisite !== undefined && !found.has(op.prerequisite)) {
        found.add(op.prerequisite);
        findPrerequisites(compilation, op.prerequisite, found);
      }
    }
  }
  return found;
}

function scope(
  compilation: Compilation,
  options: ExplainOptions
): Set<RepoPath> | undefined {
  if (options.file === undefined) return undefined;
  const files = options.prereqs
    ? findPrerequisites(compilation, options.file)
    : new Set<RepoPath>();
  files.add(options.file);
  return files;
}

/** Planned operations, in application order. */
export function explainOperations(
  compilation: Compilation,
  options: ExplainOptions = {}
): Operation[] {
  const files = scope(compilation, options);
  return compilation
    .order()
    .filter((op) => files === undefined || files.has(op.target));
}

/** Operations that changed something, in application order, with their changes. */
export function explainMutations(
  compilation: Compilation,
  options: ExplainOptions = {}
): Mutation[] {
  const files = scope(compilation, options);
  const changed = new Map<Operation, Mutation>();
  for (const [target, mutations] of compilation.compile()) {
    if (files !== undefined && !files.has(target)) continue;
    for (const mutation of mutations) {
      if (mutation.changes.length > 0) changed.set(mutation.operation, mutation);
    }
  }

  const out: Mutation[] = [];
  for (const op of compilation.order()) {
    const mutation = changed.get(op);
    if (mutation !== undefined) out.push(mutation);
  }
  return out;
}
