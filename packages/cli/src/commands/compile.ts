import type { Command } from 'commander';
import { compileRepository, readRepository, schemaToJson } from '@taxoforge/core';

import { parseCompilationOptions, type CompileFlags } from '../flags.js';
import { commandLogger, type CliIO } from '../io.js';

export function registerCompileCommand(program: Command, io: CliIO): void {
  program
    .command('compile')
    .description('Compile a schema repository and print the schema as JSON')
    .argument('<path>', 'Path to the schema repository')
    .option('--profile <names...>', 'Profiles to enable (default: all)')
    .option('--ignore-profile <names...>', 'Profiles to disable')
    .option(
      '--extension <names...>',
      'Extensions to enable, by directory name (default: all)'
    )
    .option('--ignore-extension <names...>', 'Extensions to disable')
    .option(
      '--prefix-extensions',
      'Prefix extension objects and events, and attribute types naming them, with the extension name (default)'
    )
    .option('--no-prefix-extensions', 'Keep extension object and event names unprefixed')
    .option(
      '--set-object-types',
      "Rewrite attributes typed by an object to type 'object' with object_type and object_name (default)"
    )
    .option('--no-set-object-types', 'Keep object names as attribute types')
    .option('--set-observable', 'Set observable type IDs on attributes (default)')
    .option('--no-set-observable', 'Leave observable unset')
    .option('--map-events-to-categories', "List events under their category's classes (default)")
    .option('--no-map-events-to-categories', 'Leave category classes unset')
    .action(async (repoPath: string, flags: CompileFlags, command: Command) => {
      const logger = commandLogger(command, io);
      const repo = await readRepository(repoPath, { logger });
      const schema = compileRepository(repo, { ...parseCompilationOptions(flags), logger });
      io.out(`${schemaToJson(schema)}\n`);
    });
}
