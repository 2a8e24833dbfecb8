/**
 * Config Manager
 *
 * Loads configuration from ~/.tandem/config.yaml (or $TANDEM_CONFIG),
 * interpolates environment variables and validates the result.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from '../utils';
import { TandemConfigSchema, type TandemConfig } from './schema';

/**
 * Keys that could lead to prototype pollution
 */
const FORBIDDEN_KEYS = ['__proto__', 'constructor', 'prototype'];

export type Env = Record<string, string | undefined>;

export function defaultConfigPath(env: Env = process.env): string {
  return env.TANDEM_CONFIG || path.join(os.homedir(), '.tandem', 'config.yaml');
}

/**
 * Resolve ${VAR} and ${VAR:-default} in every string, recursively. Unknown
 * variables without a default become the empty string.
 */
export function resolveEnvVars(value: unknown, env: Env = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_match, expr: string) => {
      const defaultSep = expr.indexOf(':-');
      if (defaultSep !== -1) {
        const varName = expr.slice(0, defaultSep);
        return env[varName] || expr.slice(defaultSep + 2);
      }
      return env[expr] ?? '';
    });
  }
  if (Array.isArray(value)) {
    return value.map(v => resolveEnvVars(v, env));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (FORBIDDEN_KEYS.includes(k)) {
        throw new ConfigurationError(`Invalid config key: "${k}" is not allowed`);
      }
      result[k] = resolveEnvVars(v, env);
    }
    return result;
  }
  return value;
}

/**
 * Parse and validate configuration text. Environment overrides:
 * DEFAULT_MODEL replaces llm.defaultModel.
 */
export function parseConfig(content: string, env: Env = process.env): TandemConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content) ?? {};
  } catch (error) {
    throw new ConfigurationError(`Config is not valid YAML: ${errorMessage(error)}`);
  }

  const result = TandemConfigSchema.safeParse(resolveEnvVars(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration:\n  ${issues.join('\n  ')}`, result.error.issues);
  }

  const config = result.data;
  if (env.DEFAULT_MODEL) {
    config.llm.defaultModel = env.DEFAULT_MODEL;
  }
  return config;
}

/**
 * Load the configuration file. A missing file yields the defaults.
 */
export function loadConfig(configPath: string = defaultConfigPath(), env: Env = process.env): TandemConfig {
  if (!fs.existsSync(configPath)) {
    return parseConfig('', env);
  }
  return parseConfig(fs.readFileSync(configPath, 'utf-8'), env);
}
