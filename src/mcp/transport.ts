/**
 * JSON-RPC transports for MCP servers: a spawned process speaking
 * newline-delimited JSON over stdio, or a plain HTTP endpoint.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { z } from 'zod';
import { logger, type Logger } from '../utils';
import { VERSION } from '../version';

/** MCP server configuration */
export interface MCPServerConfig {
  /** Unique server identifier */
  name: string;
  type: 'command' | 'http';
  /** For command servers: the command to spawn */
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  /** For HTTP servers: the base URL */
  url?: string;
  /** For HTTP servers: bearer token */
  token?: string;
}

export interface MCPTransport {
  start(): Promise<void>;
  request(method: string, params: unknown): Promise<unknown>;
  close(): Promise<void>;
}

export type TransportFactory = (config: MCPServerConfig) => MCPTransport;

export const MCP_PROTOCOL_VERSION = '2024-11-05';
const REQUEST_TIMEOUT_MS = 30_000;

const responseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.number(), z.string()]).optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string(), data: z.unknown().optional() }).optional(),
});

interface PendingRequest {
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class StdioTransport implements MCPTransport {
  private process: ChildProcess | null = null;
  private requestId = 0;
  private pending = new Map<number, PendingRequest>();
  private buffer = '';
  private readonly log: Logger;

  constructor(private readonly config: MCPServerConfig) {
    this.log = logger.child(`mcp:${config.name}`);
  }

  async start(): Promise<void> {
    if (!this.config.command) {
      throw new Error(`MCP server '${this.config.name}' has type 'command' but no command specified`);
    }

    const child = spawn(this.config.command, this.config.args ?? [], {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env, ...this.config.env },
    });
    this.process = child;

    child.stdout?.on('data', (data: Buffer) => {
      this.buffer += data.toString();
      this.processBuffer();
    });
    child.stderr?.on('data', (data: Buffer) => {
      this.log.debug(data.toString().trimEnd());
    });
    child.on('exit', code => {
      this.process = null;
      this.rejectAll(new Error(`MCP server '${this.config.name}' exited with code ${code ?? 'null'}`));
    });
    child.on('error', error => {
      this.rejectAll(error);
    });

    await this.request('initialize', {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: 'tandem', version: VERSION },
    });
    this.write({ jsonrpc: '2.0', method: 'notifications/initialized', params: {} });
  }

  request(method: string, params: unknown): Promise<unknown> {
    return new Promise((resolve, reject) => {
      if (!this.process?.stdin) {
        reject(new Error('MCP server process stdin not available'));
        return;
      }

      const id = ++this.requestId;
      const timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          reject(new Error(`MCP request timed out: ${method}`));
        }
      }, REQUEST_TIMEOUT_MS);
      this.pending.set(id, { method, resolve, reject, timer });
      this.write({ jsonrpc: '2.0', id, method, params });
    });
  }

  async close(): Promise<void> {
    this.process?.kill();
    this.process = null;
    this.rejectAll(new Error(`MCP server '${this.config.name}' disconnected`));
  }

  private write(message: Record<string, unknown>): void {
    this.process?.stdin?.write(`${JSON.stringify(message)}\n`);
  }

  private rejectAll(error: Error): void {
    for (const request of this.pending.values()) {
      clearTimeout(request.timer);
      request.reject(error);
    }
    this.pending.clear();
  }

  private processBuffer(): void {
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      if (!line.trim()) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        this.log.debug(`Ignoring non-JSON output: ${line.slice(0, 120)}`);
        continue;
      }

      const parsed = responseSchema.safeParse(raw);
      if (!parsed.success || typeof parsed.data.id !== 'number') continue;

      const request = this.pending.get(parsed.data.id);
      if (!request) continue;
      this.pending.delete(parsed.data.id);
      clearTimeout(request.timer);

      if (parsed.data.error) {
        request.reject(new Error(`${request.method}: ${parsed.data.error.message}`));
      } else {
        request.resolve(parsed.data.result);
      }
    }
  }
}

export class HttpTransport implements MCPTransport {
  constructor(private readonly config: MCPServerConfig) {}

  async start(): Promise<void> {
    const response = await fetch(this.baseUrl(), { headers: this.headers() });
    if (!response.ok) {
      throw new Error(`MCP server '${this.config.name}' returned HTTP ${response.status}`);
    }
  }

  async request(method: string, params: unknown): Promise<unknown> {
    const url = `${this.baseUrl()}/${method}`;
    const response =
      method === 'tools/list'
        ? await fetch(url, { headers: this.headers() })
        : await fetch(url, {
            method: 'POST',
            headers: { ...this.headers(), 'Content-Type': 'application/json' },
            body: JSON.stringify(params),
          });
    if (!response.ok) {
      throw new Error(`MCP server '${this.config.name}' returned HTTP ${response.status} for ${method}`);
    }
    return response.json();
  }

  async close(): Promise<void> {}

  private baseUrl(): string {
    if (!this.config.url) {
      throw new Error(`MCP server '${this.config.name}' has type 'http' but no URL specified`);
    }
    return this.config.url.replace(/\/+$/, '');
  }

  private headers(): Record<string, string> {
    return this.config.token ? { Authorization: `Bearer ${this.config.token}` } : {};
  }
}

export const defaultTransportFactory: TransportFactory = config =>
  config.type === 'command' ? new StdioTransport(config) : new HttpTransport(config);
