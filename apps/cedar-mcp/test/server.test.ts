import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createMcpServer } from '../src/server.js';
import { createTempProject, createTestContext, testConfig, type TempProject } from './helpers.js';

describe('MCP server', () => {
  let project: TempProject;
  let client: Client;
  let closeServer: () => Promise<void>;

  beforeEach(async () => {
    project = createTempProject();
    const { context } = createTestContext(testConfig(project.root));
    const server = createMcpServer(context);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await client.connect(clientTransport);
    closeServer = () => server.close();
  });

  afterEach(async () => {
    await client.close();
    await closeServer();
    project.cleanup();
  });

  it('lists the three tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual([
      'parse_cedarscript',
      'apply_cedarscript',
      'list_capabilities',
    ]);
  });

  it('calls a tool over the transport', async () => {
    const result = await client.callTool({ name: 'list_capabilities', arguments: {} });

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent).toMatchObject({
      server: 'cedarscript-mcp-server',
      request_id: 'req_1',
    });
  });

  it('returns tool failures as error results', async () => {
    const result = await client.callTool({
      name: 'apply_cedarscript',
      arguments: { commands: 'DELETE FILE "../Outside/secret.txt";' },
    });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({ error: { code: -32001 } });
  });
});
