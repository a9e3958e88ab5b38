// Utility functions for configuration parsing
import { logger } from './logger';

export type Env = Record<string, string | undefined>;

/**
 * Parse environment variable with type conversion, falling back to the default on bad input
 */
export function parseEnvVar<T>(
  env: Env,
  key: string,
  defaultValue: T,
  parser: (value: string) => T
): T {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  try {
    return parser(value);
  } catch (error) {
    logger.warn({ key, value, defaultValue, error }, `Invalid value for ${key}, using default`);
    return defaultValue;
  }
}

/**
 * Parse integer with validation
 */
export function parseIntWithValidation(
  value: string,
  min?: number,
  max?: number
): number {
  if (!/^\s*-?\d+\s*$/.test(value)) {
    throw new Error(`Invalid integer: ${value}`);
  }
  const parsed = parseInt(value, 10);

  if (min !== undefined && parsed < min) {
    throw new Error(`Value ${parsed} is below minimum ${min}`);
  }

  if (max !== undefined && parsed > max) {
    throw new Error(`Value ${parsed} is above maximum ${max}`);
  }

  return parsed;
}

/**
 * Parse positive integer
 */
export function parsePositiveInt(env: Env, key: string, defaultValue: number): number {
  return parseEnvVar(env, key, defaultValue, (value) =>
    parseIntWithValidation(value, 1)
  );
}

/**
 * Parse non-negative integer
 */
export function parseNonNegativeInt(env: Env, key: string, defaultValue: number): number {
  return parseEnvVar(env, key, defaultValue, (value) =>
    parseIntWithValidation(value, 0)
  );
}

/**
 * Read an optional string, treating blank values as absent
 */
export function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}
