/**
 * OpenAI Provider
 * Chat Completions with function calling
 */

import OpenAI from 'openai';
import {
  BaseProvider,
  type CompletionRequest,
  type LLMMessage,
  type LLMResponse,
  type ToolCall,
  type ToolCompletionRequest,
} from '../types';

export class OpenAIProvider extends BaseProvider {
  name = 'openai';
  private client: OpenAI;
  private defaultModel = 'gpt-4o';

  constructor(apiKey?: string, client?: OpenAI) {
    super();
    this.client = client ?? new OpenAI({ apiKey: apiKey ?? process.env.OPENAI_API_KEY });
  }

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    const response = await this.client.chat.completions.create({
      model: request.model || this.defaultModel,
      messages: this.convertMessages(request.messages),
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    });
    return this.convertResponse(response);
  }

  async completeWithTools(request: ToolCompletionRequest): Promise<LLMResponse> {
    const response = await this.client.chat.completions.create({
      model: request.model || this.defaultModel,
      messages: this.convertMessages(request.messages),
      tools: request.tools.map(t => ({
        type: 'function' as const,
        function: {
          name: t.function.name,
          description: t.function.description,
          parameters: t.function.parameters,
        },
      })),
      tool_choice: request.tools.length > 0 ? request.toolChoice : undefined,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    });
    return this.convertResponse(response);
  }

  private convertResponse(response: OpenAI.Chat.Completions.ChatCompletion): LLMResponse {
    const choice = response.choices[0];
    if (!choice) {
      throw new Error('OpenAI response missing choices');
    }

    return {
      content: choice.message.content ?? '',
      toolCalls: choice.message.tool_calls?.map(tc => this.convertToolCall(tc)),
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
      model: response.model,
      finishReason: this.mapFinishReason(choice.finish_reason),
    };
  }

  private convertMessages(messages: LLMMessage[]): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
    return messages.map((m): OpenAI.Chat.Completions.ChatCompletionMessageParam => {
      switch (m.role) {
        case 'tool':
          return { role: 'tool', content: m.content, tool_call_id: m.toolCallId ?? '' };
        case 'assistant':
          if (m.toolCalls && m.toolCalls.length > 0) {
            return {
              role: 'assistant',
              content: m.content || null,
              tool_calls: m.toolCalls.map(tc => ({
                id: tc.id,
                type: 'function' as const,
                function: { name: tc.function.name, arguments: tc.function.arguments },
              })),
            };
          }
          return { role: 'assistant', content: m.content };
        case 'system':
          return { role: 'system', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
      }
    });
  }

  private convertToolCall(tc: OpenAI.Chat.Completions.ChatCompletionMessageToolCall): ToolCall {
    return {
      id: tc.id,
      type: 'function',
      function: {
        name: tc.function.name,
        arguments: tc.function.arguments,
      },
    };
  }
}
