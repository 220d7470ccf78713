import type { Command } from 'commander';
import {
  ConfigError,
  SchemaClient,
  createStderrLogger,
  type Fetch,
  type Logger,
} from '@taxoforge/core';
import { isValidUrl } from '@taxoforge/shared';

/**
 * Where commands write and what they read from the environment. Tests pass
 * their own; `main` uses the process streams.
 */
export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  env: NodeJS.ProcessEnv;
  /** Used by the schema server client (default: global fetch) */
  fetch?: Fetch;
  /** Set by a command that finishes with a non-zero status */
  exitCode?: number;
}

export function processIO(): CliIO {
  return {
    out: (text) => void process.stdout.write(text),
    err: (text) => void process.stderr.write(text),
    env: process.env,
  };
}

export interface ServerFlags {
  url?: string;
  cache?: string;
}

/** Logger honoring the global `--debug` flag and TAXOFORGE_DEBUG. */
export function commandLogger(command: Command, io: CliIO): Logger {
  const { debug } = command.optsWithGlobals<{ debug?: boolean }>();
  return createStderrLogger({
    debug: debug === true || io.env.TAXOFORGE_DEBUG === '1',
    write: io.err,
  });
}

/** A schema server client, or none when no server URL is configured. */
export function createClient(
  url: string | undefined,
  cacheDir: string | undefined,
  io: CliIO,
  logger: Logger
): SchemaClient | undefined {
  if (url === undefined) return undefined;
  if (!isValidUrl(url)) {
    throw new ConfigError({
      message: `Invalid schema server URL: ${url}`,
      context: { setting: 'url', value: url },
    });
  }
  return new SchemaClient({ baseUrl: url, cacheDir, fetch: io.fetch, logger });
}
