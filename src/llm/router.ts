/**
 * LLM Router
 * Picks a provider for the requested model and falls back through the
 * configured provider chain, skipping providers whose circuit is open.
 */

import { ConfigurationError, getEnvBoolean, getOptionalEnv, logger, sleep } from '../utils';
import type {
  CompletionRequest,
  LLMProvider,
  LLMResponse,
  ToolCompletionRequest,
} from './types';
import { AnthropicProvider } from './providers/anthropic';
import { OpenAIProvider } from './providers/openai';
import { detectProvider, stripProviderPrefix } from './provider-registry';
import { ProviderCircuitBreaker } from './circuit-breaker';

export interface RouterConfig {
  defaultProvider: string;
  defaultModel: string;
  fallback: {
    enabled: boolean;
    providers: string[];
  };
  /** Retries per provider for rate-limit and 5xx errors. */
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface RouterOptions {
  /** Providers to use instead of the ones discovered from API keys. */
  providers?: LLMProvider[];
  circuitBreaker?: ProviderCircuitBreaker;
}

export class LLMRouter implements LLMProvider {
  readonly name = 'router';
  private providers: Map<string, LLMProvider> = new Map();
  private config: RouterConfig;
  private circuitBreaker: ProviderCircuitBreaker;

  constructor(config?: Partial<RouterConfig>, options: RouterOptions = {}) {
    this.config = {
      defaultProvider: config?.defaultProvider || getOptionalEnv('DEFAULT_PROVIDER') || 'openai',
      defaultModel: config?.defaultModel || getOptionalEnv('DEFAULT_MODEL') || 'gpt-4o',
      fallback: {
        enabled: config?.fallback?.enabled ?? !getEnvBoolean('DISABLE_FALLBACK', false),
        providers: config?.fallback?.providers ?? ['openai', 'anthropic'],
      },
      maxRetries: config?.maxRetries ?? 3,
      retryBaseDelayMs: config?.retryBaseDelayMs ?? 1000,
    };
    this.circuitBreaker = options.circuitBreaker ?? new ProviderCircuitBreaker();

    if (options.providers) {
      for (const provider of options.providers) this.registerProvider(provider);
    } else {
      this.initializeProviders();
    }
  }

  private initializeProviders(): void {
    if (getOptionalEnv('OPENAI_API_KEY')) {
      this.registerProvider(new OpenAIProvider());
    }
    if (getOptionalEnv('ANTHROPIC_API_KEY')) {
      this.registerProvider(new AnthropicProvider());
    }
  }

  registerProvider(provider: LLMProvider): void {
    this.providers.set(provider.name, provider);
    logger.info(`Initialized ${provider.name} provider`);
  }

  getAvailableProviders(): string[] {
    return [...this.providers.keys()];
  }

  getDisabledProviders(): string[] {
    return this.circuitBreaker.getOpenCircuits();
  }

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    const routed = this.prepare(request);
    return this.executeWithFallback(routed.provider, provider => provider.complete(routed.request));
  }

  async completeWithTools(request: ToolCompletionRequest): Promise<LLMResponse> {
    const routed = this.prepare(request);
    return this.executeWithFallback(routed.provider, provider =>
      provider.completeWithTools(routed.request)
    );
  }

  private prepare<T extends CompletionRequest>(request: T): { provider: LLMProvider; request: T } {
    const model = request.model || this.config.defaultModel;
    const providerName = this.getProviderForModel(model);
    const provider = this.providers.get(providerName) ?? this.providers.get(this.config.defaultProvider);
    if (!provider) {
      throw new ConfigurationError(
        'No LLM provider available. Set OPENAI_API_KEY or ANTHROPIC_API_KEY in the environment.'
      );
    }
    return { provider, request: { ...request, model: stripProviderPrefix(model) } };
  }

  private getProviderForModel(model: string): string {
    const detected = detectProvider(model, this.config.defaultProvider);
    return this.providers.has(detected) ? detected : this.config.defaultProvider;
  }

  private async executeWithFallback(
    primary: LLMProvider,
    call: (provider: LLMProvider) => Promise<LLMResponse>
  ): Promise<LLMResponse> {
    const chain = this.config.fallback.enabled
      ? [
          primary,
          ...this.config.fallback.providers
            .map(name => this.providers.get(name))
            .filter((p): p is LLMProvider => p !== undefined && p !== primary),
        ]
      : [primary];

    let lastError: unknown;
    for (const provider of chain) {
      if (!this.circuitBreaker.isAvailable(provider.name)) {
        logger.info(`Skipping ${provider.name} (circuit open)`);
        continue;
      }
      try {
        logger.debug(`Attempting request with ${provider.name}`);
        const result = await this.withRetry(() => call(provider));
        this.circuitBreaker.recordSuccess(provider.name);
        return result;
      } catch (error) {
        lastError = error;
        this.circuitBreaker.recordFailure(provider.name);
        logger.warn(`Provider ${provider.name} failed`, error);
      }
    }

    if (chain.length === 1 && lastError !== undefined) {
      throw lastError;
    }
    throw new Error('All LLM providers failed. Check your API keys and network connection.', {
      cause: lastError,
    });
  }

  private static isRetryableError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
      return false;
    }
    const status =
      'status' in error && typeof error.status === 'number'
        ? error.status
        : 'statusCode' in error && typeof error.statusCode === 'number'
          ? error.statusCode
          : undefined;
    if (status !== undefined && (status === 429 || (status >= 500 && status < 600))) {
      return true;
    }
    const message = error instanceof Error ? error.message : '';
    return /rate.?limit|429|too many requests|overloaded|503/i.test(message);
  }

  /**
   * Retry rate limits and server errors with exponential backoff (1s, 2s, 4s, ...).
   */
  private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    const { maxRetries, retryBaseDelayMs } = this.config;
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= maxRetries || !LLMRouter.isRetryableError(error)) {
          throw error;
        }
        const delay = Math.min(retryBaseDelayMs * 2 ** attempt, 8 * retryBaseDelayMs);
        logger.info(`Rate limited; retrying in ${delay}ms (attempt ${attempt + 1}/${maxRetries})`);
        await sleep(delay);
      }
    }
  }
}
