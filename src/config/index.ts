export { loadConfig, parseConfig, resolveEnvVars, defaultConfigPath } from './manager';
export type { Env } from './manager';
export { TandemConfigSchema } from './schema';
export type { TandemConfig, LLMConfig, SessionConfig, WatchersConfig, AgentConfig } from './schema';
