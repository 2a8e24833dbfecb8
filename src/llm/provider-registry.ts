/**
 * Detect the provider for a model identifier.
 *
 * An explicit `provider/model` prefix wins; otherwise the model family is
 * matched by name. Unknown models fall back to `defaultProvider`.
 */
export function detectProvider(model: string, defaultProvider = 'openai'): string {
  if (model.includes('/')) {
    return model.split('/')[0].toLowerCase();
  }
  if (model.startsWith('claude')) return 'anthropic';
  if (model.startsWith('gpt') || /^o\d/.test(model)) return 'openai';
  return defaultProvider;
}

export function stripProviderPrefix(model: string): string {
  const slash = model.indexOf('/');
  return slash === -1 ? model : model.slice(slash + 1);
}
