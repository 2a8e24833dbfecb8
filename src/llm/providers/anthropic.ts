/**
 * Anthropic Claude Provider
 * Messages API with tool use
 */

import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils';
import {
  BaseProvider,
  type CompletionRequest,
  type LLMMessage,
  type LLMResponse,
  type ToolCall,
  type ToolCompletionRequest,
  type ToolSchema,
} from '../types';

export class AnthropicProvider extends BaseProvider {
  name = 'anthropic';
  private client: Anthropic;
  private defaultModel = 'claude-3-5-sonnet-latest';

  constructor(apiKey?: string, client?: Anthropic) {
    super();
    this.client = client ?? new Anthropic({ apiKey: apiKey ?? process.env.ANTHROPIC_API_KEY });
  }

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    const response = await this.client.messages.create({
      model: request.model || this.defaultModel,
      max_tokens: request.maxTokens || 4096,
      messages: this.convertMessages(this.filterSystemMessages(request.messages)),
      system: this.extractSystemPrompt(request.messages),
      temperature: request.temperature,
    });

    return this.convertResponse(response);
  }

  async completeWithTools(request: ToolCompletionRequest): Promise<LLMResponse> {
    const toolChoice = this.convertToolChoice(request.toolChoice);
    const sendTools = request.toolChoice !== 'none' && request.tools.length > 0;
    const response = await this.client.messages.create({
      model: request.model || this.defaultModel,
      max_tokens: request.maxTokens || 4096,
      messages: this.convertMessages(this.filterSystemMessages(request.messages)),
      system: this.extractSystemPrompt(request.messages),
      ...(sendTools && { tools: this.convertTools(request.tools) }),
      ...(sendTools && toolChoice && { tool_choice: toolChoice }),
      temperature: request.temperature,
    });

    return this.convertResponse(response);
  }

  private convertMessages(messages: LLMMessage[]): Anthropic.MessageParam[] {
    return messages.map((m): Anthropic.MessageParam => {
      if (m.role === 'tool') {
        return {
          role: 'user',
          content: [{ type: 'tool_result', tool_use_id: m.toolCallId ?? '', content: m.content }],
        };
      }

      if (m.toolCalls && m.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: [
            ...(m.content ? [{ type: 'text' as const, text: m.content }] : []),
            ...m.toolCalls.map(tc => ({
              type: 'tool_use' as const,
              id: tc.id,
              name: tc.function.name,
              input: this.parseArguments(tc),
            })),
          ],
        };
      }

      return { role: m.role === 'assistant' ? 'assistant' : 'user', content: m.content };
    });
  }

  private parseArguments(tc: ToolCall): unknown {
    try {
      return JSON.parse(tc.function.arguments);
    } catch (error) {
      logger.warn(`Failed to parse tool call arguments for ${tc.function.name}`, error);
      return {};
    }
  }

  private convertTools(tools: ToolSchema[]): Anthropic.Tool[] {
    return tools.map(t => ({
      name: t.function.name,
      description: t.function.description,
      input_schema: {
        ...t.function.parameters,
        type: 'object' as const,
      },
    }));
  }

  private convertToolChoice(
    toolChoice?: ToolCompletionRequest['toolChoice']
  ): Anthropic.MessageCreateParams['tool_choice'] | undefined {
    if (!toolChoice || toolChoice === 'auto') {
      return { type: 'auto' };
    }
    if (toolChoice === 'none') {
      return undefined;
    }
    if (toolChoice === 'required') {
      return { type: 'any' };
    }
    return { type: 'tool', name: toolChoice.function.name };
  }

  private convertResponse(response: Anthropic.Message): LLMResponse {
    let content = '';
    const toolCalls: ToolCall[] = [];

    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      } else if (block.type === 'tool_use') {
        toolCalls.push({
          id: block.id,
          type: 'function',
          function: {
            name: block.name,
            arguments: JSON.stringify(block.input),
          },
        });
      }
    }

    return {
      content,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      model: response.model,
      finishReason: this.mapFinishReason(response.stop_reason),
    };
  }
}
