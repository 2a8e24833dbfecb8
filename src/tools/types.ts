/**
 * Tool definitions exposed to the model.
 *
 * Every tool the completion service may invoke, whether a capability
 * operation or a tool discovered on an MCP server, is described by a
 * {@link ToolDefinition} and registered in a {@link ToolRegistry}. The
 * registry is built per session; nothing here is process-global.
 *
 * @module tools/types
 */

import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { JSONSchema, ToolSchema } from '../llm/types';

/** `builtin` tools are defined in code; `mcp` tools were discovered on a server. */
export type ToolCategory = 'builtin' | 'mcp';

/**
 * Result of one tool execution. Check {@link isError} before reading
 * {@link output}.
 */
export interface ToolResult {
  output: string;
  /** Present only when {@link isError} is true. */
  error?: string;
  isError: boolean;
}

export interface ToolDefinition {
  /** Unique identifier surfaced to the model. */
  name: string;
  description: string;
  /** Validates and parses raw arguments before {@link execute} sees them. */
  inputSchema: z.ZodType<unknown>;
  /**
   * JSON Schema sent to providers. Derived from {@link inputSchema} when
   * absent; MCP tools pass the server's own schema through.
   */
  parameters?: JSONSchema;
  /**
   * Implementations return failures inside the result rather than throwing
   * so the model sees them on its next turn.
   */
  execute: (input: unknown) => Promise<ToolResult>;
  category: ToolCategory;
}

export function toJsonSchema(schema: z.ZodType<unknown>): JSONSchema {
  const { $schema: _ignored, ...rest } = zodToJsonSchema(schema, { $refStrategy: 'none' });
  return rest;
}

export function toToolSchema(tool: ToolDefinition): ToolSchema {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters ?? toJsonSchema(tool.inputSchema),
    },
  };
}

export class ToolRegistry {
  private readonly tools: Map<string, ToolDefinition> = new Map();

  /**
   * @throws {Error} when a tool with the same name is already registered.
   */
  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(
        `ToolRegistry: tool '${tool.name}' is already registered. ` +
          `Unregister it first or use a different name.`
      );
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get size(): number {
    return this.tools.size;
  }

  toToolSchemas(): ToolSchema[] {
    return this.getAll().map(toToolSchema);
  }
}
