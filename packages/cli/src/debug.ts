import type { Mutation, Operation } from '@taxoforge/core';

/** One line per planned operation, in application order. */
export function renderOperations(operations: readonly Operation[]): string[] {
  return operations.map((op) => op.describe());
}

/**
 * Each operation that changed its target, followed by the changed field
 * paths and a blank line.
 */
export function renderMutations(mutations: readonly Mutation[]): string[] {
  const lines: string[] = [];
  for (const { operation, changes } of mutations) {
    lines.push(operation.describe());
    for (const change of changes) {
      lines.push(`  ${change.join('.')}`);
    }
    lines.push('');
  }
  return lines;
}
