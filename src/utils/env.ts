/**
 * Environment variable helpers. Empty values count as unset.
 */

export function getOptionalEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === '' ? undefined : value;
}

export function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const raw = getOptionalEnv(key);
  if (raw === undefined) return defaultValue;
  return raw === 'true' || raw === '1';
}
