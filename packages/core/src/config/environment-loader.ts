/**
 * Environment Loader Module
 *
 * Loads and merges environment configurations: runbox.json `defaults`
 * first, then the environment file on top, then `${VAR}` placeholders
 * resolved from the supplied process environment.
 */

import { ConfigurationError } from './configuration-error';
import {
  validateEnvironmentConfig,
  validateEnvironmentSettings,
  validateRunboxConfig,
  isEnvironmentConfig
} from './config-validator';
import type { EnvironmentConfig } from './config-types';

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge utility for configuration objects.
 * Arrays and scalars from later sources replace earlier ones.
 */
export function deepMerge(target: PlainObject, ...sources: unknown[]): PlainObject {
  for (const source of sources) {
    if (!isPlainObject(source)) continue;
    for (const [key, value] of Object.entries(source)) {
      const existing = target[key];
      if (isPlainObject(value)) {
        target[key] = deepMerge(isPlainObject(existing) ? existing : {}, value);
      } else if (value !== undefined) {
        target[key] = value;
      }
    }
  }
  return target;
}

/**
 * Recursively resolve environment variable placeholders.
 * Replaces ${VAR_NAME} with the value from `env`; unknown names are left as written.
 */
export function resolveEnvVars(value: unknown, env: Record<string, string | undefined>): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match, varName: string) => env[varName] ?? match);
  }

  if (Array.isArray(value)) {
    return value.map(item => resolveEnvVars(item, env));
  }

  if (isPlainObject(value)) {
    const resolved: PlainObject = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveEnvVars(item, env);
    }
    return resolved;
  }

  return value;
}

/**
 * Parse and merge configuration files.
 * Pure function - accepts file contents instead of reading from the filesystem.
 *
 * @param baseContent - Contents of runbox.json
 * @param envContent - Contents of environments/<environment>.json
 * @param env - Process environment used for placeholder resolution
 * @throws ConfigurationError if parsing or validation fails
 */
export function parseAndMergeConfigs(
  baseContent: string,
  envContent: string,
  env: Record<string, string | undefined>,
  environment: string,
  projectRoot: string
): EnvironmentConfig {
  let baseConfig: unknown;
  let envConfig: unknown;
  try {
    baseConfig = JSON.parse(baseContent);
  } catch (error) {
    throw new ConfigurationError(
      'Invalid JSON syntax in runbox.json',
      environment,
      'Check for missing commas, quotes, or brackets.',
      error instanceof Error ? error : undefined
    );
  }
  try {
    envConfig = JSON.parse(envContent);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON syntax in environments/${environment}.json`,
      environment,
      'Check for missing commas, quotes, or brackets.',
      error instanceof Error ? error : undefined
    );
  }

  const baseValidation = validateRunboxConfig(baseConfig);
  if (!baseValidation.valid || !isPlainObject(baseConfig)) {
    throw new ConfigurationError(
      `Invalid runbox.json: ${baseValidation.errorMessage ?? 'expected an object'}`,
      environment,
      'Fix the validation errors in runbox.json'
    );
  }
  const envValidation = validateEnvironmentSettings(envConfig);
  if (!envValidation.valid || !isPlainObject(envConfig)) {
    throw new ConfigurationError(
      `Invalid environments/${environment}.json: ${envValidation.errorMessage ?? 'expected an object'}`,
      environment,
      `Fix the validation errors in environments/${environment}.json`
    );
  }

  const merged = deepMerge({}, baseConfig.defaults, envConfig);
  const resolved = resolveEnvVars(merged, env);
  if (!isPlainObject(resolved)) {
    throw new ConfigurationError('Configuration did not resolve to an object', environment);
  }

  const candidate: PlainObject = {
    ...resolved,
    name: baseConfig.name,
    _metadata: { environment, projectRoot }
  };

  if (!isEnvironmentConfig(candidate)) {
    const validation = validateEnvironmentConfig(candidate);
    throw new ConfigurationError(
      `Invalid environment configuration: ${validation.errorMessage}`,
      environment,
      `Fix the validation errors in environments/${environment}.json`
    );
  }

  if (!candidate.container.image) {
    candidate.container.image = candidate.name;
  }

  return candidate;
}

/**
 * List environment names from filenames
 * Pure function - accepts array of filenames instead of reading from filesystem
 */
export function listEnvironmentNames(files: string[]): string[] {
  return files
    .filter(file => file.endsWith('.json'))
    .map(file => {
      const lastSlash = Math.max(file.lastIndexOf('/'), file.lastIndexOf('\\'));
      const filename = lastSlash >= 0 ? file.substring(lastSlash + 1) : file;
      return filename.slice(0, -5);
    })
    .sort();
}
