/**
 * Tool-loop decorator.
 *
 * Wraps a provider so that a single `complete` call resolves every tool call
 * the model makes against a registry (typically the tools discovered on the
 * session's MCP servers), feeding results back until the model answers in
 * plain text. Callers see one response with no pending tool calls.
 */

import { logger, LoopBudgetExceededError, ValidationError } from '../utils';
import { executeToolCall, toolResultContent } from '../tools/executor';
import type { ToolRegistry } from '../tools/types';
import type {
  CompletionRequest,
  LLMMessage,
  LLMProvider,
  LLMResponse,
  ToolCompletionRequest,
} from './types';

export const DEFAULT_MAX_TOOL_LOOPS = 5;

export interface ToolLoopOptions {
  maxLoops?: number;
}

export class ToolLoopProvider implements LLMProvider {
  readonly name: string;
  private readonly maxLoops: number;

  constructor(
    private readonly inner: LLMProvider,
    private readonly registry: ToolRegistry,
    options: ToolLoopOptions = {}
  ) {
    this.name = `tool-loop(${inner.name})`;
    this.maxLoops = options.maxLoops ?? DEFAULT_MAX_TOOL_LOOPS;
  }

  complete(request: CompletionRequest): Promise<LLMResponse> {
    return this.run(request);
  }

  /**
   * @throws {ValidationError} when the caller also supplies its own tools.
   */
  async completeWithTools(request: ToolCompletionRequest): Promise<LLMResponse> {
    if (request.tools.length > 0) {
      throw new ValidationError('Cannot combine caller-supplied tools with the tool loop registry');
    }
    return this.run(request);
  }

  /**
   * @throws {UnknownToolError} when the model calls a tool the registry lacks.
   * @throws {LoopBudgetExceededError} when the model is still calling tools after `maxLoops` rounds.
   */
  private async run(request: CompletionRequest): Promise<LLMResponse> {
    const tools = this.registry.toToolSchemas();
    if (tools.length === 0) {
      return this.inner.complete(request);
    }

    let messages: LLMMessage[] = [...request.messages];
    for (let round = 1; round <= this.maxLoops; round++) {
      const response = await this.inner.completeWithTools({
        ...request,
        messages,
        tools,
        toolChoice: 'auto',
      });

      const toolCalls = response.toolCalls ?? [];
      if (toolCalls.length === 0) {
        return response;
      }

      logger.debug(`Tool loop round ${round}: ${toolCalls.map(tc => tc.function.name).join(', ')}`);
      for (const call of toolCalls) {
        const result = await executeToolCall(call, this.registry, { throwOnUnknown: true });
        messages = [
          ...messages,
          { role: 'assistant', content: '', toolCalls: [call] },
          {
            role: 'tool',
            name: call.function.name,
            toolCallId: call.id,
            content: toolResultContent(result),
          },
        ];
      }
    }

    throw new LoopBudgetExceededError(this.maxLoops);
  }
}
