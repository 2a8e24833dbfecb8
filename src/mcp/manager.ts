/**
 * MCP Manager
 *
 * Owns one client per configured MCP server for a session and answers
 * "which server provides tool X".
 */

import { logger, errorMessage } from '../utils';
import type { ToolDefinition, ToolRegistry } from '../tools/types';
import { MCPClient } from './client';
import { defaultTransportFactory, type MCPServerConfig, type TransportFactory } from './transport';

export type MCPServersConfig = Record<string, Omit<MCPServerConfig, 'name'>>;

export class MCPManager {
  private clients: Map<string, MCPClient> = new Map();

  constructor(servers: MCPServersConfig = {}, createTransport: TransportFactory = defaultTransportFactory) {
    for (const [name, serverConfig] of Object.entries(servers)) {
      this.clients.set(name, new MCPClient({ ...serverConfig, name }, createTransport));
    }
  }

  /**
   * Connect to every server and discover its tools. A server that fails is
   * logged and left disconnected.
   */
  async connectAll(): Promise<void> {
    await Promise.all(
      Array.from(this.clients.entries()).map(async ([name, client]) => {
        try {
          await client.connect();
          const tools = await client.listTools();
          logger.info(`MCP server '${name}' connected with ${tools.length} tools`);
        } catch (error) {
          logger.warn(`MCP server '${name}' failed to connect: ${errorMessage(error)}`);
        }
      })
    );
  }

  getAllTools(): ToolDefinition[] {
    const tools: ToolDefinition[] = [];
    for (const client of this.clients.values()) {
      if (client.isConnected) {
        tools.push(...client.toToolDefinitions());
      }
    }
    return tools;
  }

  /**
   * Register every discovered tool. When two servers advertise the same name
   * the first one wins.
   */
  registerTools(registry: ToolRegistry): void {
    for (const tool of this.getAllTools()) {
      if (registry.has(tool.name)) {
        logger.warn(`Skipping duplicate MCP tool '${tool.name}'`);
        continue;
      }
      registry.register(tool);
    }
  }

  /** The connected client that advertises `toolName`, if any. */
  findClientForTool(toolName: string): MCPClient | undefined {
    for (const client of this.clients.values()) {
      if (client.isConnected && client.hasTool(toolName)) {
        return client;
      }
    }
    return undefined;
  }

  getClient(name: string): MCPClient | undefined {
    return this.clients.get(name);
  }

  async disconnectAll(): Promise<void> {
    await Promise.all(Array.from(this.clients.values()).map(client => client.disconnect()));
  }

  get serverCount(): number {
    return this.clients.size;
  }

  get connectedCount(): number {
    return Array.from(this.clients.values()).filter(c => c.isConnected).length;
  }
}
