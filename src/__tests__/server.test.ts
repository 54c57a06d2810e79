import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { QueryFirewallServer } from '../server.js';
import { DEFAULT_GRAPHQL_CONFIG, DEFAULT_JQL_CONFIG } from '../config/defaults.js';
import { ServerConfig } from '../types/index.js';

function makeConfig(audit: ServerConfig['audit'] = { enabled: false, logPath: './logs' }): ServerConfig {
  return { jql: DEFAULT_JQL_CONFIG, graphql: DEFAULT_GRAPHQL_CONFIG, audit };
}

async function connect(config: ServerConfig): Promise<{ server: QueryFirewallServer; client: Client }> {
  const server = new QueryFirewallServer(config);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  await server.connect(serverTransport);
  await client.connect(clientTransport);
  return { server, client };
}

async function call(
  client: Client,
  name: string,
  args: Record<string, unknown>
): Promise<{ isError: boolean; text: string }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (first?.type !== 'text') {
    throw new Error(`Expected text content from ${name}`);
  }
  return { isError: result.isError ?? false, text: first.text };
}

async function callJson(client: Client, name: string, args: Record<string, unknown>) {
  const { isError, text } = await call(client, name, args);
  const body: unknown = JSON.parse(text);
  return { isError, body };
}

describe('QueryFirewallServer', () => {
  let server: QueryFirewallServer;
  let client: Client;

  beforeEach(async () => {
    ({ server, client } = await connect(makeConfig()));
  });

  afterEach(async () => {
    await client.close();
    await server.stop();
  });

  it('lists the validation tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map(tool => tool.name)).toEqual([
      'validate_jql',
      'escape_jql_value',
      'validate_graphql',
      'validate_graphql_operation',
      'escape_graphql_value'
    ]);
    expect(tools[0].inputSchema.required).toEqual(['jql']);
  });

  it('accepts a valid JQL filter', async () => {
    const { isError, body } = await callJson(client, 'validate_jql', {
      jql: ' project = "TEST" AND status = "Open" '
    });

    expect(isError).toBe(false);
    expect(body).toEqual({
      valid: true,
      query: 'project = "TEST" AND status = "Open"',
      fields: ['project', 'status'],
      functions: [],
      depth: 0,
      message: 'JQL accepted (2 field(s), 0 function(s), depth 0).'
    });
  });

  it('reports rejections as tool errors', async () => {
    const { isError, body } = await callJson(client, 'validate_jql', { jql: 'unknownField = "value"' });

    expect(isError).toBe(true);
    expect(body).toEqual({
      valid: false,
      kind: 'UnknownField',
      language: 'jql',
      message: 'Unknown or disallowed field: unknownField'
    });
  });

  it('validates GraphQL documents and reports the operation', async () => {
    const query = 'query GetTests($limit: Int) { getTests(limit: $limit) { total } }';
    const { isError, body } = await callJson(client, 'validate_graphql', { query, variables: { limit: 10 } });

    expect(isError).toBe(false);
    expect(body).toEqual({ valid: true, query, operation: { type: 'query', name: 'GetTests', explicit: true } });
  });

  it('checks the expected GraphQL operation', async () => {
    const { isError, body } = await callJson(client, 'validate_graphql_operation', {
      query: '{ getTests { total } }',
      operation: 'getTest'
    });

    expect(isError).toBe(true);
    expect(body).toMatchObject({ kind: 'UnknownOperation', language: 'graphql' });
  });

  it('escapes literal values', async () => {
    await expect(callJson(client, 'escape_jql_value', { value: 'with"quotes' })).resolves.toEqual({
      isError: false,
      body: { escaped: 'with\\"quotes', quoted: '"with\\"quotes"' }
    });
    await expect(callJson(client, 'escape_graphql_value', { value: 'a\nb' })).resolves.toEqual({
      isError: false,
      body: { escaped: 'a\\nb', quoted: '"a\\nb"' }
    });
  });

  it('reports invalid arguments', async () => {
    const { isError, text } = await call(client, 'validate_jql', {});

    expect(isError).toBe(true);
    expect(text).toBe('Error: Invalid arguments: jql: Required');
  });

  it('reports unknown tools', async () => {
    await expect(call(client, 'drop_tables', {})).resolves.toEqual({
      isError: true,
      text: 'Error: Unknown tool: drop_tables'
    });
  });
});

describe('QueryFirewallServer audit log', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'query-firewall-server-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('records accepted and rejected calls', async () => {
    const { server, client } = await connect(makeConfig({ enabled: true, logPath: dir }));

    await call(client, 'validate_jql', { jql: 'project = "TEST"' });
    await call(client, 'validate_graphql', { query: 'subscription OnTest { testUpdated { id } }' });
    await client.close();
    await server.stop();

    const [file] = await fs.readdir(dir);
    const lines = (await fs.readFile(path.join(dir, file), 'utf8')).trim().split('\n');
    const entries = lines.map(line => {
      const entry: Record<string, unknown> = JSON.parse(line);
      return entry;
    });

    expect(entries.map(entry => [entry.operation, entry.success])).toEqual([
      ['validate_jql', true],
      ['validate_graphql', false]
    ]);
    expect(entries[1].rejection).toEqual({
      kind: 'UnsupportedOperation',
      message: 'Subscription operations are not allowed'
    });
  });
});
