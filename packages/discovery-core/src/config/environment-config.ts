/**
 * Environment Configuration Utilities
 *
 * Typed readers over process.env. Blank values count as unset.
 */

import { DiscoverySettingsError } from '../error-handling/errors.js';

export type EnvSource = Record<string, string | undefined>;

export function getOptionalConfig(key: string, env: EnvSource = process.env): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function getConfig(key: string, defaultValue: string, env: EnvSource = process.env): string {
  return getOptionalConfig(key, env) ?? defaultValue;
}

export function parsePositiveInt(
  key: string,
  defaultValue: number | undefined,
  env: EnvSource = process.env,
  minValue = 1
): number | undefined {
  const value = getOptionalConfig(key, env);
  if (value === undefined) return defaultValue;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < minValue) {
    throw new DiscoverySettingsError(`${key}="${value}" must be an integer >= ${minValue}`, { key, value });
  }
  return parsed;
}
