/**
 * Environment Variable Access
 *
 * Typed readers for environment variables. Configuration values read here
 * override the YAML file (see config.ts).
 */

import { createLogger } from './logger';

export type Env = Record<string, string | undefined>;

/**
 * Get a required environment variable
 * Throws descriptive error if missing
 */
export function getRequiredEnv(name: string, env: Env = process.env): string {
  const value = env[name];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${name}. ` +
      `Please set it in your environment.`
    );
  }
  return value;
}

/**
 * Get an optional environment variable with a default value
 */
export function getOptionalEnv(name: string, defaultValue: string, env: Env = process.env): string {
  return env[name] || defaultValue;
}

/**
 * Get a boolean environment variable
 */
export function getBooleanEnv(name: string, defaultValue: boolean = false, env: Env = process.env): boolean {
  const value = env[name];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get a numeric environment variable
 */
export function getNumericEnv(name: string, defaultValue: number, env: Env = process.env): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    createLogger('env').warn('Invalid numeric env var', { name, value, defaultValue });
    return defaultValue;
  }
  return parsed;
}

/**
 * Get a comma-separated list, trimmed, empty entries dropped
 */
export function getListEnv(name: string, env: Env = process.env): string[] | undefined {
  const value = env[name];
  if (!value) return undefined;
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : undefined;
}

