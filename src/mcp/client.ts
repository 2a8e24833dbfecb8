/**
 * MCP Client
 *
 * Connects to one Model Context Protocol server, discovers its tools and
 * calls them. Capability providers (document store, comment store, chat
 * channel) are reached through these clients.
 *
 * MCP specification: https://modelcontextprotocol.io/
 */

import { z } from 'zod';
import { errorMessage } from '../utils';
import type { ToolDefinition, ToolResult } from '../tools/types';
import {
  defaultTransportFactory,
  type MCPServerConfig,
  type MCPTransport,
  type TransportFactory,
} from './transport';

const toolSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  inputSchema: z.record(z.unknown()).default({ type: 'object' }),
});

export type MCPToolDefinition = z.infer<typeof toolSchema>;

const listToolsResultSchema = z.object({
  tools: z.array(toolSchema).default([]),
});

const callResultSchema = z
  .object({
    content: z
      .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
      .default([]),
    isError: z.boolean().optional(),
  })
  .passthrough();

export class MCPClient {
  readonly config: MCPServerConfig;
  private transport: MCPTransport | null = null;
  private connected = false;
  private tools: MCPToolDefinition[] = [];
  private readonly createTransport: TransportFactory;

  constructor(config: MCPServerConfig, createTransport: TransportFactory = defaultTransportFactory) {
    this.config = config;
    this.createTransport = createTransport;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get discoveredTools(): readonly MCPToolDefinition[] {
    return this.tools;
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    const transport = this.createTransport(this.config);
    await transport.start();
    this.transport = transport;
    this.connected = true;
  }

  async listTools(): Promise<MCPToolDefinition[]> {
    const raw = await this.request('tools/list', {});
    const parsed = listToolsResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`MCP server '${this.config.name}' returned a malformed tool list`);
    }
    this.tools = parsed.data.tools;
    return this.tools;
  }

  hasTool(name: string): boolean {
    return this.tools.some(t => t.name === name);
  }

  /**
   * Call a tool. Transport and protocol failures are reported inside the
   * result, never thrown.
   */
  async callTool(name: string, input: unknown): Promise<ToolResult> {
    try {
      const raw = await this.request('tools/call', { name, arguments: input });
      const parsed = callResultSchema.safeParse(raw);
      if (!parsed.success) {
        return { output: '', error: `Malformed result from MCP tool ${name}`, isError: true };
      }

      const text = parsed.data.content
        .map(block => (block.type === 'text' ? block.text : undefined))
        .filter((t): t is string => typeof t === 'string')
        .join('\n');
      const isError = parsed.data.isError ?? false;

      return {
        output: text || (isError ? '' : JSON.stringify(raw)),
        isError,
        error: isError ? text || `MCP tool ${name} reported an error` : undefined,
      };
    } catch (error) {
      return { output: '', error: `MCP tool call failed: ${errorMessage(error)}`, isError: true };
    }
  }

  toToolDefinitions(): ToolDefinition[] {
    return this.tools.map(mcpTool => ({
      name: mcpTool.name,
      description: `[MCP: ${this.config.name}] ${mcpTool.description}`,
      inputSchema: jsonSchemaToZod(mcpTool.inputSchema),
      parameters: mcpTool.inputSchema,
      execute: (input: unknown) => this.callTool(mcpTool.name, input),
      category: 'mcp' as const,
    }));
  }

  async disconnect(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    this.connected = false;
    this.tools = [];
    await transport?.close();
  }

  private async request(method: string, params: unknown): Promise<unknown> {
    await this.connect();
    if (!this.transport) {
      throw new Error(`MCP server '${this.config.name}' is not connected`);
    }
    return this.transport.request(method, params);
  }
}

// ---------------------------------------------------------------
// JSON Schema -> Zod conversion
// ---------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function propertyToZod(prop: unknown): z.ZodTypeAny {
  if (!isRecord(prop)) {
    return z.unknown();
  }

  let field: z.ZodTypeAny;
  switch (prop.type) {
    case 'string': {
      const allowed = stringList(prop.enum);
      field =
        allowed.length > 0
          ? z.string().refine(v => allowed.includes(v), { message: `Expected one of: ${allowed.join(', ')}` })
          : z.string();
      break;
    }
    case 'number':
    case 'integer':
      field = z.number();
      break;
    case 'boolean':
      field = z.boolean();
      break;
    case 'array':
      field = z.array(prop.items === undefined ? z.unknown() : propertyToZod(prop.items));
      break;
    case 'object':
      field = jsonSchemaToZod(prop);
      break;
    default:
      field = z.unknown();
  }

  return typeof prop.description === 'string' ? field.describe(prop.description) : field;
}

/**
 * Convert the JSON Schema an MCP server advertises into a Zod validator.
 * Unknown keys pass through untouched.
 */
export function jsonSchemaToZod(schema: unknown): z.ZodTypeAny {
  if (!isRecord(schema) || schema.type !== 'object') {
    return z.object({}).passthrough();
  }

  const required = new Set(stringList(schema.required));
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [key, prop] of Object.entries(properties)) {
    const field = propertyToZod(prop);
    shape[key] = required.has(key) ? field : field.optional();
  }

  return z.object(shape).passthrough();
}
