import { promises as fs } from 'node:fs';

import { isRecord } from '@taxoforge/shared';

import { compileRepository, type CompilationConfig } from '../compile/compiler.js';
import { readRepository } from '../repository/reader.js';
import { schemaFromFile } from '../schema/json.js';
import type { Schema } from '../schema/model.js';
import { ConfigError } from '../types/errors.js';
import type { SchemaClient } from './client.js';

export interface GetSchemaOptions {
  client?: SchemaClient;
  /** Used when the source is a repository directory */
  compilation?: CompilationConfig;
}

async function sourceKind(source: string): Promise<'file' | 'directory' | undefined> {
  try {
    const stat = await fs.stat(source);
    return stat.isDirectory() ? 'directory' : 'file';
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') return undefined;
    throw error;
  }
}

/**
 * Load a schema from whatever `source` names: a compiled schema file, a
 * repository directory (read and compiled), or else a version to fetch
 * through the client. Without a source, the client's default version is
 * fetched.
 */
export async function getSchema(
  source: string | undefined,
  options: GetSchemaOptions = {}
): Promise<Schema> {
  if (source !== undefined) {
    const kind = await sourceKind(source);
    if (kind === 'file') return schemaFromFile(source);
    if (kind === 'directory') {
      const repo = await readRepository(source, { logger: options.compilation?.logger });
      return compileRepository(repo, options.compilation);
    }
  }

  if (options.client === undefined) {
    throw new ConfigError({
      message:
        source === undefined
          ? 'No schema source given and no schema server configured'
          : `${source} is not a file or directory, and no schema server is configured to fetch it`,
      context: { setting: 'url', value: source },
    });
  }
  return options.client.getSchema(source);
}
