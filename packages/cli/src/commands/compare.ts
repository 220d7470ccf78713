import { Option, type Command } from 'commander';
import { compareSchemas, formatDifference, getSchema } from '@taxoforge/core';
import { ANSI, colorize, shouldUseColors } from '@taxoforge/shared';

import { commandLogger, createClient, type CliIO, type ServerFlags } from '../io.js';

interface CompareFlags extends ServerFlags {
  expandChanges?: boolean;
  collapseChanges?: boolean;
}

export function registerCompareCommand(program: Command, io: CliIO): void {
  program
    .command('compare')
    .description('Print the differences between two schemas')
    .argument('<old>', 'Old schema: JSON file, schema repository or version')
    .argument('<new>', 'New schema: JSON file, schema repository or version')
    .addOption(
      new Option('--expand-changes', 'Print a change as a + line and a - line').conflicts(
        'collapseChanges'
      )
    )
    .option('--collapse-changes', 'Print a change as a single ~ line (default)')
    .option('--url <url>', 'Schema server to fetch versions from')
    .option('--cache <dir>', 'Schema cache directory')
    .action(async (oldSource: string, newSource: string, flags: CompareFlags, command: Command) => {
      const logger = commandLogger(command, io);
      const options = {
        client: createClient(flags.url, flags.cache, io, logger),
        compilation: { logger },
      };
      const before = await getSchema(oldSource, options);
      const after = await getSchema(newSource, options);
      const colors = shouldUseColors(undefined, io.env);

      const lines = [
        colorize(`--- ${oldSource}:${before.version}`, colors, ANSI.red),
        colorize(`+++ ${newSource}:${after.version}`, colors, ANSI.green),
        ...formatDifference(compareSchemas(before, after), {
          collapseChanges: flags.expandChanges !== true,
          colors,
        }),
      ];
      io.out(`${lines.join('\n')}\n`);
    });
}
