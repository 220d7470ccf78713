import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { access, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { schemaToJson } from '../../schema/json.js';
import { schemaObject, schemaAttr, schemaWith } from '../../test-utils/schemas.js';
import { ClientError, ConfigError } from '../../types/errors.js';
import { SchemaClient, type Fetch } from '../client.js';
import { getSchema } from '../get-schema.js';

const BASE = 'http://schemas.test/';

const VERSIONS = {
  default: { version: '1.1.0', url: `${BASE}1.1.0/` },
  versions: ['1.0.0', '1.1.0', '1.2.0-dev', '1.2.0-rc.1'].map((version) => ({
    version,
    url: `${BASE}${version}/`,
  })),
};

interface FakeServer {
  fetch: Fetch;
  requests: string[];
}

function fakeServer(versions: unknown = VERSIONS): FakeServer {
  const requests: string[] = [];
  const fetch: Fetch = async (input) => {
    const url = String(input);
    requests.push(url);
    if (url === `${BASE}api/versions`) return new Response(JSON.stringify(versions));
    if (url === `${BASE}export/schema`) return new Response(schemaToJson(schemaWith({}, '1.1.0')));
    const match = /^http:\/\/schemas\.test\/([^/]+)\/export\/schema$/.exec(url);
    if (match?.[1] !== undefined) return new Response(schemaToJson(schemaWith({}, match[1])));
    return new Response('', { status: 404 });
  };
  return { fetch, requests };
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

let cacheDir: string;

beforeEach(async () => {
  cacheDir = await mkdtemp(path.join(os.tmpdir(), 'taxoforge-client-'));
});

afterEach(async () => {
  await rm(cacheDir, { recursive: true, force: true });
});

describe('SchemaClient versions', () => {
  it('lists versions and the default from one request', async () => {
    const server = fakeServer();
    const client = new SchemaClient({ baseUrl: 'http://schemas.test', fetch: server.fetch });
    expect(await client.getVersions()).toEqual(['1.0.0', '1.1.0', '1.2.0-dev', '1.2.0-rc.1']);
    expect(await client.getDefaultVersion()).toBe('1.1.0');
    expect(server.requests).toEqual([`${BASE}api/versions`]);
  });

  it('resolves latest and latest-stable', async () => {
    const client = new SchemaClient({ baseUrl: BASE, fetch: fakeServer().fetch });
    expect(await client.resolveVersion('latest')).toBe('1.2.0-rc.1');
    expect(await client.resolveVersion('latest-stable')).toBe('1.1.0');
    expect(await client.resolveVersion('1.0.0')).toBe('1.0.0');
  });

  it('fails when no stable version exists', async () => {
    const client = new SchemaClient({
      baseUrl: BASE,
      fetch: fakeServer({
        default: { version: '2.0.0-rc.1', url: 'x' },
        versions: [{ version: '2.0.0-rc.1', url: 'x' }],
      }).fetch,
    });
    await expect(client.resolveVersion('latest-stable')).rejects.toThrow(
      `No stable version found on ${BASE}`
    );
  });

  it('rejects a malformed version list', async () => {
    const client = new SchemaClient({
      baseUrl: BASE,
      fetch: fakeServer({ default: { version: '1.0.0' } }).fetch,
    });
    await expect(client.getVersions()).rejects.toThrow(
      `Malformed version list from ${BASE}api/versions`
    );
    await expect(client.getVersions()).rejects.toBeInstanceOf(ClientError);
  });
});

describe('SchemaClient.getSchema', () => {
  it('rejects invalid and unknown versions', async () => {
    const client = new SchemaClient({ baseUrl: BASE, fetch: fakeServer().fetch });
    await expect(client.getSchema('nope')).rejects.toThrow('Invalid version: nope');
    await expect(client.getSchema('nope')).rejects.toBeInstanceOf(ConfigError);
    await expect(client.getSchema('2.0.0')).rejects.toThrow(`Version 2.0.0 not found on ${BASE}`);
  });

  it('fetches a version and reads it back from the cache', async () => {
    const first = fakeServer();
    const fetched = await new SchemaClient({ baseUrl: BASE, fetch: first.fetch, cacheDir }).getSchema(
      '1.0.0'
    );
    expect(fetched.version).toBe('1.0.0');
    expect(first.requests).toEqual([`${BASE}api/versions`, `${BASE}1.0.0/export/schema`]);
    expect(await exists(path.join(cacheDir, 'schema-1.0.0.json'))).toBe(true);

    const second = fakeServer();
    const cached = await new SchemaClient({ baseUrl: BASE, fetch: second.fetch, cacheDir }).getSchema(
      '1.0.0'
    );
    expect(cached).toEqual(fetched);
    expect(second.requests).toEqual([]);
  });

  it('caches prereleases but never dev versions', async () => {
    const client = new SchemaClient({ baseUrl: BASE, fetch: fakeServer().fetch, cacheDir });
    expect((await client.getSchema('latest')).version).toBe('1.2.0-rc.1');
    await client.getSchema('1.2.0-dev');
    expect(await exists(path.join(cacheDir, 'schema-1.2.0-rc.1.json'))).toBe(true);
    expect(await exists(path.join(cacheDir, 'schema-1.2.0-dev.json'))).toBe(false);
  });

  it('always fetches the default version', async () => {
    const server = fakeServer();
    const client = new SchemaClient({ baseUrl: BASE, fetch: server.fetch, cacheDir });
    await client.getSchema();
    await client.getSchema();
    expect(server.requests).toEqual([`${BASE}export/schema`, `${BASE}export/schema`]);
    expect(await exists(path.join(cacheDir, 'schema-1.1.0.json'))).toBe(true);
  });

  it('reports unreachable servers and error responses', async () => {
    const refused = new SchemaClient({
      baseUrl: BASE,
      fetch: async () => {
        throw new Error('connection refused');
      },
    });
    await expect(refused.getVersions()).rejects.toThrow(
      `Unable to reach the schema server at ${BASE}api/versions: connection refused`
    );

    const failing = new SchemaClient({
      baseUrl: BASE,
      fetch: async () => new Response('', { status: 500 }),
    });
    await expect(failing.getVersions()).rejects.toThrow(`${BASE}api/versions answered 500`);
  });
});

describe('getSchema', () => {
  it('loads a compiled schema file', async () => {
    const file = path.join(cacheDir, 'schema.json');
    const schema = schemaWith({ objects: { user: schemaObject('user', { name: schemaAttr() }) } });
    await writeFile(file, schemaToJson(schema), 'utf8');
    expect(await getSchema(file)).toEqual(schema);
  });

  it('compiles a repository directory', async () => {
    const root = path.join(cacheDir, 'repo');
    await mkdir(path.join(root, 'objects'), { recursive: true });
    await writeFile(path.join(root, 'version.json'), JSON.stringify({ version: '1.3.0' }), 'utf8');
    await writeFile(
      path.join(root, 'dictionary.json'),
      JSON.stringify({
        attributes: { name: { caption: 'Name', requirement: 'optional', type: 'string_t' } },
        types: { attributes: { string_t: { caption: 'String' } } },
      }),
      'utf8'
    );
    await writeFile(
      path.join(root, 'objects', 'user.json'),
      JSON.stringify({ name: 'user', caption: 'User', attributes: { name: {} } }),
      'utf8'
    );

    const schema = await getSchema(root);
    expect(schema.version).toBe('1.3.0');
    expect(Object.keys(schema.objects)).toEqual(['user']);
    expect(Object.keys(schema.objects.user?.attributes ?? {})).toEqual(['name']);
  });

  it('fetches anything else through the client', async () => {
    const client = new SchemaClient({ baseUrl: BASE, fetch: fakeServer().fetch });
    expect((await getSchema('1.0.0', { client })).version).toBe('1.0.0');
    expect((await getSchema(undefined, { client })).version).toBe('1.1.0');
  });

  it('needs a client for versions and defaults', async () => {
    await expect(getSchema(undefined)).rejects.toThrow(
      'No schema source given and no schema server configured'
    );
    await expect(getSchema('1.0.0')).rejects.toThrow(
      '1.0.0 is not a file or directory, and no schema server is configured to fetch it'
    );
  });
});
