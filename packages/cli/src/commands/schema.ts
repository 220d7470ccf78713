import type { Command } from 'commander';
import { getSchema, schemaToJson } from '@taxoforge/core';

import { commandLogger, createClient, type CliIO, type ServerFlags } from '../io.js';

export function registerSchemaCommand(program: Command, io: CliIO): void {
  program
    .command('schema')
    .description('Print a schema as JSON')
    .argument('<source>', 'Schema JSON file, schema repository or version')
    .option('--url <url>', 'Schema server to fetch versions from')
    .option('--cache <dir>', 'Schema cache directory')
    .action(async (source: string, flags: ServerFlags, command: Command) => {
      const logger = commandLogger(command, io);
      const schema = await getSchema(source, {
        client: createClient(flags.url, flags.cache, io, logger),
        compilation: { logger },
      });
      io.out(`${schemaToJson(schema)}\n`);
    });
}
