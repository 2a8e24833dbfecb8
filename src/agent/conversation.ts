/**
 * Conversation and Completion Service
 *
 * A conversation is the system prompt plus the message history of one
 * session. The completion service sends it to an LLM provider, runs any tool
 * calls the model makes, and hands back the messages to append.
 *
 * @module agent/conversation
 */

import { randomUUID } from 'node:crypto';
import { logger } from '../utils';
import type { LLMMessage, LLMProvider, LLMResponse } from '../llm/types';
import { executeToolCall, toolResultContent } from '../tools/executor';
import type { ToolRegistry } from '../tools/types';
import type { Completion, CompletionService, ConversationState } from './types';

export class Conversation {
  readonly id: string;
  private history: LLMMessage[] = [];

  constructor(readonly system: string, id: string = randomUUID()) {
    this.id = id;
  }

  get messages(): readonly LLMMessage[] {
    return this.history;
  }

  append(...messages: LLMMessage[]): void {
    this.history = [...this.history, ...messages];
  }

  state(): ConversationState {
    return { system: this.system, messages: this.history };
  }
}

export interface CompletionOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class AgentCompletionService implements CompletionService {
  constructor(
    private readonly provider: LLMProvider,
    private readonly tools: ToolRegistry,
    private readonly options: CompletionOptions = {}
  ) {}

  async complete(state: ConversationState): Promise<Completion> {
    const messages: LLMMessage[] = [{ role: 'system', content: state.system }, ...state.messages];
    const tools = this.tools.toToolSchemas();

    const response: LLMResponse =
      tools.length > 0
        ? await this.provider.completeWithTools({ ...this.options, messages, tools, toolChoice: 'auto' })
        : await this.provider.complete({ ...this.options, messages });

    const toolCalls = response.toolCalls ?? [];
    const appended: LLMMessage[] = [
      {
        role: 'assistant',
        content: response.content,
        ...(toolCalls.length > 0 ? { toolCalls } : {}),
      },
    ];

    for (const call of toolCalls) {
      logger.debug(`Model called ${call.function.name}`);
      const result = await executeToolCall(call, this.tools);
      appended.push({
        role: 'tool',
        name: call.function.name,
        toolCallId: call.id,
        content: toolResultContent(result),
      });
    }

    return { text: response.content, toolCall: toolCalls[0], messages: appended };
  }
}
