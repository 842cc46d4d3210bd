import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, describe, expect, it } from 'vitest';
import { createSidekickServer, type SidekickApp } from '../../../src/app/bootstrap';
import { FakeBackend, testSidekickConfig } from '../../helpers/fakeBackend';

async function connect(backend: FakeBackend): Promise<{ app: SidekickApp; client: Client }> {
  const app = createSidekickServer(testSidekickConfig, { client: backend, sleep: async () => {} });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await app.server.connect(serverTransport);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  await client.connect(clientTransport);
  return { app, client };
}

async function callText(client: Client, name: string, args: Record<string, unknown> = {}): Promise<string> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  return first?.type === 'text' ? first.text : '';
}

describe('sidekick MCP server', () => {
  let open: Array<{ app: SidekickApp; client: Client }> = [];

  afterEach(async () => {
    for (const { app, client } of open) {
      await client.close();
      await app.server.close();
    }
    open = [];
  });

  it('advertises every sidekick tool', async () => {
    const connection = await connect(new FakeBackend());
    open.push(connection);

    const { tools } = await connection.client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'automate_menial_task',
      'batch_process',
      'chat_completion',
      'clear_contexts',
      'get_current_model',
      'get_sidekick_stats',
      'health_check',
      'list_models',
      'load_model',
      'offload_context',
    ]);
  });

  it('answers tool calls with text content', async () => {
    const backend = new FakeBackend();
    backend.queueReply('pong');
    const connection = await connect(backend);
    open.push(connection);

    await expect(callText(connection.client, 'chat_completion', { prompt: 'ping' })).resolves.toBe('pong');
    await expect(
      callText(connection.client, 'offload_context', { context_id: 'notes', context_data: 'abcdefgh' }),
    ).resolves.toBe('✅ Context stored successfully. ID: notes (2 tokens)');
  });

  it('returns backend failures as text instead of protocol errors', async () => {
    const connection = await connect(new FakeBackend());
    open.push(connection);

    await expect(callText(connection.client, 'offload_context', { context_id: 'ghost', operation: 'retrieve' })).resolves.toBe(
      "❌ Context ID 'ghost' not found.",
    );
  });
});
