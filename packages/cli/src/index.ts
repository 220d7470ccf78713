#!/usr/bin/env node
// CLI entry point: `taxoforge` with subcommands compile, explain, schema,
// compare and validate-compatibility. Library errors are rendered through
// ErrorPresenter and mapped to their exit codes.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  isTaxoforgeError,
  toError,
  type TaxoforgeError,
} from '@taxoforge/core';

import { registerCompareCommand } from './commands/compare.js';
import { registerCompileCommand } from './commands/compile.js';
import { registerExplainCommand } from './commands/explain.js';
import { registerSchemaCommand } from './commands/schema.js';
import { registerValidateCompatibilityCommand } from './commands/validate-compatibility.js';
import { processIO, type CliIO } from './io.js';
import { renderCLIView } from './render.js';

export function createProgram(io: CliIO = processIO()): Command {
  const program = new Command();

  program
    .name('taxoforge')
    .description('Compile, compare and validate event taxonomy schemas')
    .version('0.1.0')
    .option('--debug', 'Print debug diagnostics to stderr');

  registerCompileCommand(program, io);
  registerExplainCommand(program, io);
  registerSchemaCommand(program, io);
  registerCompareCommand(program, io);
  registerValidateCompatibilityCommand(program, io);

  return program;
}

/**
 * Render an error to stderr and set the exit code. With `debug`, the
 * serialized error (stack and context included outside production) follows.
 */
export function handleCliError(err: unknown, io: CliIO, debug = false): void {
  const env = io.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { env: io.env });

  let error: TaxoforgeError;
  if (isTaxoforgeError(err)) {
    error = err;
  } else {
    const cause = toError(err);
    error = new InternalError({ message: cause.message || 'Unexpected error', cause });
  }

  io.err(`${renderCLIView(presenter.formatForCLI(error))}\n`);
  if (debug) {
    io.err(`${JSON.stringify(presenter.formatForProduction(error), null, 2)}\n`);
  }
  io.exitCode = error.getExitCode();
}

/** Run one command line (without the node and script arguments) and return its exit code. */
export async function run(argv: readonly string[], io: CliIO = processIO()): Promise<number> {
  try {
    await createProgram(io).parseAsync([...argv], { from: 'user' });
  } catch (err) {
    handleCliError(err, io, argv.includes('--debug') || io.env.TAXOFORGE_DEBUG === '1');
  }
  return io.exitCode ?? 0;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  process.exitCode = await run(argv.slice(2));
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
