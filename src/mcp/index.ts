export { MCPClient, jsonSchemaToZod } from './client';
export type { MCPToolDefinition } from './client';
export { MCPManager } from './manager';
export type { MCPServersConfig } from './manager';
export {
  StdioTransport,
  HttpTransport,
  defaultTransportFactory,
  MCP_PROTOCOL_VERSION,
} from './transport';
export type { MCPServerConfig, MCPTransport, TransportFactory } from './transport';
