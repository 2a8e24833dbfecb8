export { logger, Logger, sanitizeString, isLogLevel } from './logger';
export type { LogLevel, LogSink } from './logger';
export * from './errors';
export { getOptionalEnv, getEnvBoolean } from './env';
export { sleep } from './sleep';
