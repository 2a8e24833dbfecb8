/**
 * Provider-neutral completion types. Every provider adapter converts to and
 * from these shapes.
 */

export type Role = 'system' | 'user' | 'assistant' | 'tool';

export interface LLMMessage {
  role: Role;
  content: string;
  toolCalls?: ToolCall[];
  toolCallId?: string;
  name?: string;
}

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

export interface CompletionRequest {
  messages: LLMMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export type ToolChoice = 'auto' | 'none' | 'required' | { type: 'function'; function: { name: string } };

export interface ToolCompletionRequest extends CompletionRequest {
  tools: ToolSchema[];
  toolChoice?: ToolChoice;
}

/** Function-calling tool description as sent to providers. */
export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JSONSchema;
  };
}

/** JSON Schema document; providers receive it as-is. */
export type JSONSchema = Record<string, unknown>;

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  toolCalls?: ToolCall[];
  usage: TokenUsage;
  model: string;
  finishReason: 'stop' | 'length' | 'tool_calls' | 'content_filter';
}

export interface LLMProvider {
  /** Provider name, e.g. 'anthropic' or 'openai'. */
  name: string;
  complete(request: CompletionRequest): Promise<LLMResponse>;
  completeWithTools(request: ToolCompletionRequest): Promise<LLMResponse>;
}

export const EMPTY_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

/**
 * Shared helpers for provider adapters.
 */
export abstract class BaseProvider implements LLMProvider {
  abstract name: string;
  abstract complete(request: CompletionRequest): Promise<LLMResponse>;
  abstract completeWithTools(request: ToolCompletionRequest): Promise<LLMResponse>;

  protected extractSystemPrompt(messages: LLMMessage[]): string | undefined {
    const systemMessages = messages.filter(m => m.role === 'system');
    if (systemMessages.length === 0) {
      return undefined;
    }
    return systemMessages.map(m => m.content).join('\n\n');
  }

  protected filterSystemMessages(messages: LLMMessage[]): LLMMessage[] {
    return messages.filter(m => m.role !== 'system');
  }

  protected mapFinishReason(reason: string | null | undefined): LLMResponse['finishReason'] {
    if (!reason) {
      return 'stop';
    }
    const normalized = reason.toLowerCase();
    if (normalized.includes('tool')) {
      return 'tool_calls';
    }
    if (normalized.includes('length') || normalized.includes('max_tokens')) {
      return 'length';
    }
    if (normalized.includes('filter') || normalized.includes('safety')) {
      return 'content_filter';
    }
    return 'stop';
  }
}
