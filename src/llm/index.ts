export type {
  Role,
  LLMMessage,
  ToolCall,
  CompletionRequest,
  ToolChoice,
  ToolCompletionRequest,
  ToolSchema,
  JSONSchema,
  TokenUsage,
  LLMResponse,
  LLMProvider,
} from './types';
export { BaseProvider, EMPTY_USAGE } from './types';
export { LLMRouter } from './router';
export type { RouterConfig, RouterOptions } from './router';
export { ProviderCircuitBreaker } from './circuit-breaker';
export type { CircuitState, CircuitBreakerOptions } from './circuit-breaker';
export { detectProvider, stripProviderPrefix } from './provider-registry';
export { ToolLoopProvider, DEFAULT_MAX_TOOL_LOOPS } from './tool-loop';
export type { ToolLoopOptions } from './tool-loop';
export { OpenAIProvider } from './providers/openai';
export { AnthropicProvider } from './providers/anthropic';
