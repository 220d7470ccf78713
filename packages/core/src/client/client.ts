/**
 * Caching client for a schema server.
 *
 * The server publishes its version list at `api/versions` and each compiled
 * schema at `<version>/export/schema` (the default version at
 * `export/schema`). Fetched schemas are written to an optional cache
 * directory as `schema-<version>.json`.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { JSONSchemaType } from 'ajv';
import { isRecord } from '@taxoforge/shared';
import { prerelease, rcompare, valid } from 'semver';

import { createAjv, formatAjvErrors } from '../ajv/factory.js';
import { ErrorCode } from '../errors/codes.js';
import { schemaFromFile, schemaFromJson, schemaToFile } from '../schema/json.js';
import type { Schema } from '../schema/model.js';
import { ClientError, ConfigError, toError } from '../types/errors.js';
import { silentLogger, type Logger } from '../util/logger.js';

export const LATEST = 'latest';
export const LATEST_STABLE = 'latest-stable';

export interface SchemaVersion {
  version: string;
  url: string;
}

export interface SchemaVersions {
  default: SchemaVersion;
  versions: SchemaVersion[];
}

const versionSchema: JSONSchemaType<SchemaVersion> = {
  type: 'object',
  properties: {
    version: { type: 'string' },
    url: { type: 'string' },
  },
  required: ['version', 'url'],
};

const VERSIONS_SCHEMA: JSONSchemaType<SchemaVersions> = {
  type: 'object',
  properties: {
    default: versionSchema,
    versions: { type: 'array', items: versionSchema },
  },
  required: ['default', 'versions'],
};

const validateVersions = createAjv().compile(VERSIONS_SCHEMA);

export type Fetch = typeof fetch;

export interface SchemaClientOptions {
  baseUrl: string;
  /** Directory for cached schemas; no caching when unset */
  cacheDir?: string;
  fetch?: Fetch;
  logger?: Logger;
}

function isDevVersion(version: string): boolean {
  return (prerelease(version) ?? []).includes('dev');
}

export class SchemaClient {
  readonly baseUrl: string;
  readonly cacheDir: string | undefined;

  readonly #fetch: Fetch;
  readonly #logger: Logger;
  #versions: SchemaVersions | undefined;

  constructor(options: SchemaClientOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.cacheDir = options.cacheDir;
    this.#fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.#logger = options.logger ?? silentLogger;
  }

  /** Versions the server offers, as listed by the server. */
  async getVersions(): Promise<string[]> {
    const versions = await this.#loadVersions();
    return versions.versions.map((v) => v.version);
  }

  async getDefaultVersion(): Promise<string> {
    const versions = await this.#loadVersions();
    return versions.default.version;
  }

  /**
   * Resolve `latest` (highest version, prereleases included) and
   * `latest-stable` (highest version without a prerelease tag). Other
   * versions are returned unchanged.
   */
  async resolveVersion(version: string): Promise<string> {
    if (version !== LATEST && version !== LATEST_STABLE) return version;
    const candidates = (await this.getVersions())
      .filter((v) => valid(v) !== null)
      .filter((v) => version === LATEST || prerelease(v) === null)
      .sort(rcompare);
    const [highest] = candidates;
    if (highest === undefined) {
      throw new ClientError({
        message: `No ${version === LATEST ? '' : 'stable '}version found on ${this.baseUrl}`,
        context: { url: this.baseUrl },
      });
    }
    return highest;
  }

  /**
   * Get a schema from the cache or the server. Without a version, the
   * server's default version is fetched; the cache is then written but never
   * read.
   *
   * @throws ConfigError for an invalid version or one the server lacks
   * @throws ClientError when the server cannot be reached or answers badly
   */
  async getSchema(version?: string): Promise<Schema> {
    let resolved: string | undefined;
    if (version !== undefined) {
      resolved = await this.resolveVersion(version);
      if (valid(resolved) === null) {
        throw new ConfigError({
          message: `Invalid version: ${resolved}`,
          errorCode: ErrorCode.INVALID_VERSION,
          context: { setting: 'version', value: resolved },
        });
      }

      const cached = await this.#readCache(resolved);
      if (cached !== undefined) return cached;

      if (!(await this.getVersions()).includes(resolved)) {
        throw new ConfigError({
          message: `Version ${resolved} not found on ${this.baseUrl}`,
          errorCode: ErrorCode.INVALID_VERSION,
          context: { setting: 'version', value: resolved },
        });
      }
    }

    const schema = schemaFromJson(await this.#get(this.#schemaUrl(resolved)));
    await this.#writeCache(schema);
    return schema;
  }

  #schemaUrl(version: string | undefined): string {
    const base = version === undefined ? this.baseUrl : new URL(`${version}/`, this.baseUrl);
    return new URL('export/schema', base).toString();
  }

  #cacheFile(version: string): string | undefined {
    return this.cacheDir === undefined
      ? undefined
      : path.join(this.cacheDir, `schema-${version}.json`);
  }

  async #readCache(version: string): Promise<Schema | undefined> {
    const file = this.#cacheFile(version);
    if (file === undefined) return undefined;
    try {
      const schema = await schemaFromFile(file);
      this.#logger.info(`read schema ${version} from cache: ${file}`);
      return schema;
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        this.#logger.debug(`cache miss: ${file}`);
        return undefined;
      }
      throw error;
    }
  }

  async #writeCache(schema: Schema): Promise<void> {
    const file = this.#cacheFile(schema.version);
    if (file === undefined || isDevVersion(schema.version)) return;
    await fs.mkdir(path.dirname(file), { recursive: true });
    this.#logger.debug(`caching schema ${schema.version} to ${file}`);
    await schemaToFile(schema, file);
  }

  async #loadVersions(): Promise<SchemaVersions> {
    if (this.#versions !== undefined) return this.#versions;
    const url = new URL('api/versions', this.baseUrl).toString();
    const text = await this.#get(url);
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ClientError({
        message: `Malformed version list from ${url}`,
        context: { url },
        cause: toError(error),
      });
    }
    if (!validateVersions(data)) {
      throw new ClientError({
        message: `Malformed version list from ${url}: ${formatAjvErrors(validateVersions.errors)}`,
        context: { url },
      });
    }
    this.#versions = data;
    return data;
  }

  async #get(url: string): Promise<string> {
    this.#logger.debug(`GET ${url}`);
    let response: Response;
    try {
      response = await this.#fetch(url);
    } catch (error) {
      const cause = toError(error);
      throw new ClientError({
        message: `Unable to reach the schema server at ${url}: ${cause.message}`,
        context: { url },
        cause,
      });
    }
    if (!response.ok) {
      throw new ClientError({
        message: `${url} answered ${response.status} ${response.statusText}`.trimEnd(),
        context: { url },
      });
    }
    return response.text();
  }
}
