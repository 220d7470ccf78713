import type { Command } from 'commander';
import {
  Compilation,
  explainMutations,
  explainOperations,
  readRepository,
  type ExplainOptions,
} from '@taxoforge/core';

import { renderMutations, renderOperations } from '../debug.js';
import { commandLogger, type CliIO } from '../io.js';

interface ExplainFlags {
  file?: string;
  prereqs?: boolean;
  changes?: boolean;
}

export function registerExplainCommand(program: Command, io: CliIO): void {
  program
    .command('explain')
    .description('Print the operations compiling a repository applies, in order')
    .argument('<path>', 'Path to the schema repository')
    .option('--file <path>', 'Only operations on this repository file')
    .option('--prereqs', 'With --file, include operations on its prerequisites')
    .option('--changes', 'Show the fields each operation changed (default)')
    .option('--no-changes', 'Show every planned operation and nothing else')
    .action(async (repoPath: string, flags: ExplainFlags, command: Command) => {
      const logger = commandLogger(command, io);
      const compilation = new Compilation(await readRepository(repoPath, { logger }), { logger });
      const options: ExplainOptions = { file: flags.file, prereqs: flags.prereqs === true };

      const lines =
        flags.changes === false
          ? renderOperations(explainOperations(compilation, options))
          : renderMutations(explainMutations(compilation, options));
      if (lines.length > 0) io.out(`${lines.join('\n')}\n`);
    });
}
