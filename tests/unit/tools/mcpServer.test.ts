/**
 * Unit Tests: MCP server over an in-memory transport
 */

import { promises as fs } from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createMcpServer } from '../../../src/services/tools/mcpServer';
import type { AppContext } from '../../../src/app';
import { buildTestContext, fixedClock, makeTempDir, removeDir } from '../../fixtures/factories';

async function connect(ctx: AppContext): Promise<{ client: Client; server: McpServer }> {
  const server = createMcpServer(ctx.tools);
  const client = new Client({ name: 'report-test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
  return { client, server };
}

async function callTool(client: Client, name: string, args: Record<string, unknown>): Promise<unknown> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [block] = result.content;
  if (block?.type !== 'text') {
    throw new Error(`Expected a text result from ${name}`);
  }
  const parsed: unknown = JSON.parse(block.text);
  return parsed;
}

describe('MCP server', () => {
  let dir: string;
  let ctx: AppContext;
  let client: Client;
  let server: McpServer;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    ctx.broadcaster.close();
    await removeDir(dir);
  });

  it('lists the plain tool', async () => {
    ctx = buildTestContext({ dir, mode: 'plain' });
    ({ client, server } = await connect(ctx));

    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual(['write_weekly_report']);
    expect(tools[0]?.inputSchema.properties).toHaveProperty('content');
  });

  it('lists the streaming tools', async () => {
    ctx = buildTestContext({ dir });
    ({ client, server } = await connect(ctx));

    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual(['write_weekly_report_sse', 'get_connected_clients']);
  });

  it('write_weekly_report_sse saves the file and notifies subscribers', async () => {
    ctx = buildTestContext({ dir, clock: fixedClock(new Date(2024, 2, 30, 10, 15, 0)) });
    ctx.broadcaster.subscribe();
    ({ client, server } = await connect(ctx));

    const output = await callTool(client, 'write_weekly_report_sse', { content: 'Shipped the stream' });

    expect(output).toEqual({
      success: true,
      message: 'Weekly report saved successfully and clients notified',
      reportId: 'weekly_report_20240330_101500',
      filename: 'weekly_report_20240330_101500.txt',
      filepath: path.join(dir, 'weekly_report_20240330_101500.txt'),
      clients_notified: 1,
    });
    await expect(fs.readFile(path.join(dir, 'weekly_report_20240330_101500.txt'), 'utf8')).resolves.toBe(
      'Shipped the stream',
    );
    expect(ctx.broadcaster.current()?.value).toEqual({
      reportId: 'weekly_report_20240330_101500',
      content: 'Shipped the stream',
    });
  });

  it('get_connected_clients reports the subscriber count', async () => {
    ctx = buildTestContext({ dir });
    ctx.broadcaster.subscribe();
    ctx.broadcaster.subscribe();
    ctx.broadcaster.subscribe();
    ({ client, server } = await connect(ctx));

    await expect(callTool(client, 'get_connected_clients', {})).resolves.toEqual({
      success: true,
      connected_clients: 3,
    });
  });

  it('reports invalid arguments as a tool error', async () => {
    ctx = buildTestContext({ dir });
    ({ client, server } = await connect(ctx));

    // Rejected either as a protocol error or as an error result
    const rejected = await client
      .callTool({ name: 'write_weekly_report_sse', arguments: { content: 42 } })
      .then(
        (result) => CallToolResultSchema.parse(result).isError === true,
        () => true,
      );

    expect(rejected).toBe(true);
    expect(ctx.broadcaster.generationCount()).toBe(0);
  });
});
