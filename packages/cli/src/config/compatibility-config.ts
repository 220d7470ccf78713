import { promises as fs } from 'node:fs';
import type { SchemaObject } from 'ajv';
import {
  ConfigError,
  createAjv,
  formatAjvErrors,
  toError,
  validateSeverities,
  type SeverityMap,
} from '@taxoforge/core';

import { parseSeverityFlags, type SeverityFlags } from '../flags.js';

/** Contents of a `validate-compatibility --config` file. */
export interface CompatibilityConfigFile {
  before?: string;
  after?: string;
  cache?: string;
  url?: string;
  before_url?: string;
  after_url?: string;
  severity?: Record<string, string>;
}

export interface CompatibilityFlags extends SeverityFlags {
  cache?: string;
  config?: string;
  color?: boolean;
  url?: string;
  beforeUrl?: string;
  afterUrl?: string;
}

export interface CompatibilityConfig {
  before: string;
  after: string;
  cache?: string;
  beforeUrl?: string;
  afterUrl?: string;
  severities: SeverityMap;
}

export const DEFAULT_BEFORE = 'latest-stable';

const CONFIG_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    before: { type: 'string' },
    after: { type: 'string' },
    cache: { type: 'string' },
    url: { type: 'string', format: 'uri' },
    before_url: { type: 'string', format: 'uri' },
    after_url: { type: 'string', format: 'uri' },
    severity: { type: 'object', additionalProperties: { type: 'string' } },
  },
  additionalProperties: false,
};

const validateConfig = createAjv().compile<CompatibilityConfigFile>(CONFIG_SCHEMA);

export async function loadCompatibilityConfig(file: string): Promise<CompatibilityConfigFile> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (error) {
    const cause = toError(error);
    throw new ConfigError({
      message: `Unable to read configuration ${file}: ${cause.message}`,
      context: { setting: 'config', path: file },
      cause,
    });
  }
  if (!validateConfig(data)) {
    throw new ConfigError({
      message: `Invalid configuration ${file}: ${formatAjvErrors(validateConfig.errors)}`,
      context: { setting: 'config', path: file },
    });
  }
  return data;
}

/**
 * Combine positional schemas, flags and the configuration file; flags win.
 * With one positional schema it is the `after` schema.
 */
export function resolveCompatibilityConfig(
  schemas: readonly string[],
  flags: CompatibilityFlags,
  file: CompatibilityConfigFile = {}
): CompatibilityConfig {
  const [first, second] = schemas;
  const before = second === undefined ? undefined : first;
  const after = second ?? first;

  const resolvedAfter = after ?? file.after;
  if (resolvedAfter === undefined) {
    throw new ConfigError({
      message: 'Missing after schema file or version',
      context: { setting: 'after' },
    });
  }

  const url = flags.url ?? file.url;
  return {
    before: before ?? file.before ?? DEFAULT_BEFORE,
    after: resolvedAfter,
    cache: flags.cache ?? file.cache,
    beforeUrl: flags.beforeUrl ?? file.before_url ?? url,
    afterUrl: flags.afterUrl ?? file.after_url ?? url,
    severities: validateSeverities({ ...file.severity, ...parseSeverityFlags(flags) }),
  };
}
