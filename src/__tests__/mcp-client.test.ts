/**
 * Tests for the MCP client and manager over an in-process server.
 */

import { describe, it, expect } from 'vitest';
import { MCPClient, jsonSchemaToZod } from '../mcp/client';
import { MCPManager } from '../mcp/manager';
import type { MCPTransport } from '../mcp/transport';
import { ToolRegistry } from '../tools/types';
import { FakeMcpServer } from './fakes';

function docsServer(): FakeMcpServer {
  return new FakeMcpServer({
    'read-doc': args => `contents of ${String(args.document_id)}`,
    'rewrite-document': () => {
      throw new Error('document is locked');
    },
  });
}

// ---------------------------------------------------------------------------
// MCPClient
// ---------------------------------------------------------------------------

describe('MCPClient', () => {
  it('discovers tools after connecting', async () => {
    const server = docsServer();
    const client = new MCPClient({ name: 'docs', type: 'command', command: 'docs-mcp' }, server.transport);

    await client.connect();
    const tools = await client.listTools();

    expect(tools.map(t => t.name)).toEqual(['read-doc', 'rewrite-document']);
    expect(client.hasTool('read-doc')).toBe(true);
    expect(client.hasTool('post')).toBe(false);
    expect(server.started).toBe(1);
  });

  it('joins the text blocks of a tool result', async () => {
    const server = docsServer();
    const client = new MCPClient({ name: 'docs', type: 'command', command: 'docs-mcp' }, server.transport);

    const result = await client.callTool('read-doc', { document_id: 'doc-1' });

    expect(result).toEqual({ output: 'contents of doc-1', isError: false, error: undefined });
    expect(server.calls).toEqual([{ server: 'docs', name: 'read-doc', args: { document_id: 'doc-1' } }]);
  });

  it('reports a tool-level error as an error result', async () => {
    const client = new MCPClient({ name: 'docs', type: 'command', command: 'docs-mcp' }, docsServer().transport);

    const result = await client.callTool('rewrite-document', {});

    expect(result).toEqual({ output: 'document is locked', isError: true, error: 'document is locked' });
  });

  it('reports a transport failure without throwing', async () => {
    const client = new MCPClient({ name: 'docs', type: 'command', command: 'docs-mcp' }, docsServer().transport);

    const result = await client.callTool('missing', {});

    expect(result).toEqual({ output: '', isError: true, error: 'MCP tool call failed: no such tool: missing' });
  });

  it('joins multiple text blocks and ignores other content', async () => {
    const transport: MCPTransport = {
      start: async () => {},
      close: async () => {},
      request: async () => ({
        content: [
          { type: 'text', text: 'line one' },
          { type: 'image', data: 'aGk=' },
          { type: 'text', text: 'line two' },
        ],
      }),
    };
    const client = new MCPClient({ name: 'multi', type: 'http', url: 'http://localhost:9' }, () => transport);

    const result = await client.callTool('anything', {});

    expect(result.output).toBe('line one\nline two');
  });

  it('exposes discovered tools as prefixed tool definitions', async () => {
    const client = new MCPClient({ name: 'docs', type: 'command', command: 'docs-mcp' }, docsServer().transport);
    await client.listTools();

    const [readDoc] = client.toToolDefinitions();

    expect(readDoc.name).toBe('read-doc');
    expect(readDoc.description).toBe('[MCP: docs] read-doc tool');
    expect(readDoc.category).toBe('mcp');
    expect(await readDoc.execute({ document_id: 'doc-2' })).toEqual({
      output: 'contents of doc-2',
      isError: false,
      error: undefined,
    });
  });

  it('closes the transport on disconnect', async () => {
    const server = docsServer();
    const client = new MCPClient({ name: 'docs', type: 'command', command: 'docs-mcp' }, server.transport);
    await client.listTools();

    await client.disconnect();

    expect(client.isConnected).toBe(false);
    expect(client.discoveredTools).toEqual([]);
    expect(server.closed).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// jsonSchemaToZod
// ---------------------------------------------------------------------------

describe('jsonSchemaToZod', () => {
  const schema = jsonSchemaToZod({
    type: 'object',
    properties: {
      document_id: { type: 'string' },
      mode: { type: 'string', enum: ['replace', 'append'] },
      limit: { type: 'integer' },
      tags: { type: 'array', items: { type: 'string' } },
    },
    required: ['document_id'],
  });

  it('accepts valid input and keeps unknown keys', () => {
    expect(schema.parse({ document_id: 'd', mode: 'append', extra: true })).toEqual({
      document_id: 'd',
      mode: 'append',
      extra: true,
    });
  });

  it('enforces required keys, enums and item types', () => {
    expect(schema.safeParse({}).success).toBe(false);
    expect(schema.safeParse({ document_id: 'd', mode: 'delete' }).success).toBe(false);
    expect(schema.safeParse({ document_id: 'd', tags: [1] }).success).toBe(false);
  });

  it('treats a non-object schema as an open object', () => {
    expect(jsonSchemaToZod({ type: 'string' }).parse({ a: 1 })).toEqual({ a: 1 });
  });
});

// ---------------------------------------------------------------------------
// MCPManager
// ---------------------------------------------------------------------------

describe('MCPManager', () => {
  it('finds the connected server that provides a tool', async () => {
    const docs = docsServer();
    const chat = new FakeMcpServer({ slack_post_message: () => 'ok' });
    const manager = new MCPManager(
      {
        docs: { type: 'command', command: 'docs-mcp' },
        chat: { type: 'command', command: 'chat-mcp' },
      },
      config => (config.name === 'docs' ? docs.transport(config) : chat.transport(config))
    );

    await manager.connectAll();

    expect(manager.connectedCount).toBe(2);
    expect(manager.findClientForTool('slack_post_message')?.config.name).toBe('chat');
    expect(manager.findClientForTool('read-doc')?.config.name).toBe('docs');
    expect(manager.findClientForTool('unknown')).toBeUndefined();
  });

  it('leaves a server that fails to start disconnected', async () => {
    const broken = docsServer();
    broken.failStart = true;
    const manager = new MCPManager({ docs: { type: 'command', command: 'docs-mcp' } }, broken.transport);

    await manager.connectAll();

    expect(manager.serverCount).toBe(1);
    expect(manager.connectedCount).toBe(0);
    expect(manager.getAllTools()).toEqual([]);
  });

  it('registers tools once when servers overlap', async () => {
    const first = new FakeMcpServer({ shared: () => 'first' });
    const second = new FakeMcpServer({ shared: () => 'second' });
    const manager = new MCPManager(
      {
        a: { type: 'command', command: 'a' },
        b: { type: 'command', command: 'b' },
      },
      config => (config.name === 'a' ? first.transport(config) : second.transport(config))
    );
    await manager.connectAll();

    const registry = new ToolRegistry();
    manager.registerTools(registry);

    expect(registry.getNames()).toEqual(['shared']);
    expect(registry.get('shared')?.description).toBe('[MCP: a] shared tool');
  });
});
