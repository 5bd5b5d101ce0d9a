/**
 * Integration Tests: MCP over streamable HTTP
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { createApp, type AppContext } from '../../../src/app';
import { MCP_SERVER_INFO } from '../../../src/services/tools/mcpServer';
import { buildTestContext, makeTempDir, removeDir } from '../../fixtures/factories';

describe('/mcp', () => {
  let dir: string;
  let ctx: AppContext;

  beforeEach(async () => {
    dir = await makeTempDir();
    ctx = buildTestContext({ dir });
  });

  afterEach(async () => {
    ctx.broadcaster.close();
    await removeDir(dir);
  });

  it('answers initialize with the server info', async () => {
    const response = await request(createApp(ctx))
      .post('/mcp')
      .set('Accept', 'application/json, text/event-stream')
      .send({
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: {
          protocolVersion: '2025-03-26',
          capabilities: {},
          clientInfo: { name: 'report-test-client', version: '0.0.0' },
        },
      });

    expect(response.status).toBe(200);
    expect(response.body.id).toBe(1);
    expect(response.body.result.serverInfo).toEqual(MCP_SERVER_INFO);
  });

  it('rejects GET since there are no sessions', async () => {
    const response = await request(createApp(ctx)).get('/mcp');

    expect(response.status).toBe(405);
    expect(response.body).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  });
});
