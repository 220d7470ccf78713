import type { Command } from 'commander';
import {
  ColoringValidationFormatter,
  CompatibilityValidator,
  ValidationFormatter,
  getSchema,
  hasBlockingFindings,
  isErr,
} from '@taxoforge/core';
import { ANSI, colorize, shouldUseColors } from '@taxoforge/shared';

import {
  DEFAULT_BEFORE,
  loadCompatibilityConfig,
  resolveCompatibilityConfig,
  type CompatibilityFlags,
} from '../config/compatibility-config.js';
import { commandLogger, createClient, type CliIO } from '../io.js';

/** Exit status when error or fatal findings are reported. */
export const BREAKING_CHANGES_EXIT_CODE = 2;

function header(before: string, after: string, colors: boolean): string {
  return [
    '',
    colorize(' Compatibility Validator', colors, ANSI.bold),
    colorize('='.repeat(30), colors, ANSI.magenta),
    '',
    'Validate backwards compatibility between two schemas.',
    '',
    `Looking for breaking changes between schema-${before} and schema-${after}.`,
    '',
    '',
  ].join('\n');
}

export function registerValidateCompatibilityCommand(program: Command, io: CliIO): void {
  program
    .command('validate-compatibility')
    .description('Check that a schema is backwards compatible with an older one')
    .usage('[options] [before] <after>')
    .argument(
      '[before]',
      `Old schema: JSON file, schema repository or version (default: ${DEFAULT_BEFORE})`
    )
    .argument('[after]', 'New schema: JSON file, schema repository or version')
    .option('--cache <dir>', 'Schema cache directory')
    .option('--config <file>', 'JSON configuration file')
    .option('--info <findings...>', 'Findings to report as info')
    .option('--warning <findings...>', 'Findings to report as warnings')
    .option('--error <findings...>', 'Findings to report as errors')
    .option('--fatal <findings...>', 'Findings that stop validation')
    .option('--color', 'Colored output')
    .option('--no-color', 'Plain output')
    .option('--url <url>', 'Schema server to fetch versions from')
    .option('--before-url <url>', 'Schema server for the old schema (default: --url)')
    .option('--after-url <url>', 'Schema server for the new schema (default: --url)')
    .action(
      async (
        first: string | undefined,
        second: string | undefined,
        flags: CompatibilityFlags,
        command: Command
      ) => {
        const logger = commandLogger(command, io);
        const file =
          flags.config === undefined ? undefined : await loadCompatibilityConfig(flags.config);
        const schemas = [first, second].filter((s): s is string => s !== undefined);
        const config = resolveCompatibilityConfig(schemas, flags, file);

        const before = await getSchema(config.before, {
          client: createClient(config.beforeUrl, config.cache, io, logger),
          compilation: { logger },
        });
        const after = await getSchema(config.after, {
          client: createClient(config.afterUrl, config.cache, io, logger),
          compilation: { logger },
        });

        const colors = shouldUseColors(flags.color, io.env);
        io.out(header(before.version, after.version, colors));

        const result = CompatibilityValidator.fromSchemas(before, after, {
          severities: config.severities,
          logger,
        }).validate();

        if (isErr(result)) {
          const { rule, finding } = result.error;
          io.out(
            `${colorize(`[FATAL] ${rule.metadata.name}: ${finding.message()}`, colors, ANSI.brightRed)}\n`
          );
          io.exitCode = BREAKING_CHANGES_EXIT_CODE;
          return;
        }

        const formatter = colors ? new ColoringValidationFormatter() : new ValidationFormatter();
        io.out(formatter.format(result.value));
        if (hasBlockingFindings(result.value)) {
          io.exitCode = BREAKING_CHANGES_EXIT_CODE;
        }
      }
    );
}
