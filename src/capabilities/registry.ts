/**
 * Per-session capability registry: a mapping from operation name to the
 * provider handle that serves it. Built once when a session starts and
 * passed to the watchers and the controller.
 */

import { logger, errorMessage, ProviderUnavailableError } from '../utils';
import type { ToolResult } from '../tools/types';
import type { MCPManager } from '../mcp/manager';
import {
  DEFAULT_OPERATION_TOOLS,
  OPERATION_NAMES,
  operationParams,
  type OperationName,
  type OperationParams,
} from './operations';

/** Anything that can run a named tool; MCP clients qualify. */
export interface ProviderHandle {
  callTool(name: string, input: unknown): Promise<ToolResult>;
}

export interface CapabilityResult {
  output: string;
}

export interface CapabilityInvoker {
  call<K extends OperationName>(operation: K, params: OperationParams<K>): Promise<CapabilityResult>;
}

interface Binding {
  toolName: string;
  handle: ProviderHandle;
}

export class CapabilityRegistry implements CapabilityInvoker {
  private readonly bindings = new Map<OperationName, Binding>();

  /**
   * Bind every operation whose configured tool name is advertised by one of
   * the manager's connected servers.
   */
  static fromManager(
    manager: MCPManager,
    toolNames: Record<OperationName, string> = DEFAULT_OPERATION_TOOLS
  ): CapabilityRegistry {
    const registry = new CapabilityRegistry();
    for (const operation of OPERATION_NAMES) {
      const toolName = toolNames[operation];
      const client = manager.findClientForTool(toolName);
      if (client) {
        registry.bind(operation, toolName, client);
      }
    }
    return registry;
  }

  bind(operation: OperationName, toolName: string, handle: ProviderHandle): this {
    this.bindings.set(operation, { toolName, handle });
    return this;
  }

  has(operation: OperationName): boolean {
    return this.bindings.has(operation);
  }

  missing(operations: readonly OperationName[]): OperationName[] {
    return operations.filter(op => !this.bindings.has(op));
  }

  /**
   * @throws {ProviderUnavailableError} when no provider serves the
   * operation, the parameters are rejected, or the call fails.
   */
  async call<K extends OperationName>(
    operation: K,
    params: OperationParams<K>
  ): Promise<CapabilityResult> {
    const binding = this.bindings.get(operation);
    if (!binding) {
      throw new ProviderUnavailableError(operation, 'no provider is bound to this operation');
    }

    const checked = operationParams[operation].safeParse(params);
    if (!checked.success) {
      throw new ProviderUnavailableError(operation, 'invalid parameters', checked.error.issues);
    }

    let result: ToolResult;
    try {
      result = await binding.handle.callTool(binding.toolName, checked.data);
    } catch (error) {
      throw new ProviderUnavailableError(operation, errorMessage(error));
    }

    if (result.isError) {
      throw new ProviderUnavailableError(operation, result.error ?? 'provider reported an error');
    }
    logger.debug(`Capability ${operation} via ${binding.toolName} returned ${result.output.length} chars`);
    return { output: result.output };
  }
}
