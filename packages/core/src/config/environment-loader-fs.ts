/**
 * Filesystem-based wrapper for environment loading
 *
 * The pure functions in environment-loader.ts stay testable without
 * touching disk; these wrappers read the files for application code.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseAndMergeConfigs, listEnvironmentNames } from './environment-loader';
import { getEnvironmentsPath, getProjectConfigPath } from './project-discovery';
import { ConfigurationError } from './configuration-error';
import type { EnvironmentConfig } from './config-types';

/**
 * Load environment configuration from filesystem
 *
 * @param projectRoot - Absolute path to the directory containing runbox.json
 * @param environment - Environment name (must match a file in environments/)
 * @throws ConfigurationError if files are missing or invalid
 */
export function loadEnvironmentConfig(
  projectRoot: string,
  environment: string,
  env: Record<string, string | undefined> = process.env
): EnvironmentConfig {
  const baseConfigPath = getProjectConfigPath(projectRoot);
  if (!fs.existsSync(baseConfigPath)) {
    throw new ConfigurationError(
      `Project configuration missing: ${baseConfigPath}`,
      environment,
      'Create it with: runbox init'
    );
  }

  const envPath = path.join(getEnvironmentsPath(projectRoot), `${environment}.json`);
  if (!fs.existsSync(envPath)) {
    const available = getAvailableEnvironments(projectRoot);
    throw new ConfigurationError(
      `Environment configuration missing: ${envPath}`,
      environment,
      available.length > 0
        ? `Available environments: ${available.join(', ')}`
        : 'Create the configuration file or use: runbox init'
    );
  }

  return parseAndMergeConfigs(
    fs.readFileSync(baseConfigPath, 'utf-8'),
    fs.readFileSync(envPath, 'utf-8'),
    env,
    environment,
    projectRoot
  );
}

/**
 * Get available environments by scanning the environments directory
 */
export function getAvailableEnvironments(projectRoot: string): string[] {
  const configDir = getEnvironmentsPath(projectRoot);
  if (!fs.existsSync(configDir)) {
    return [];
  }
  return listEnvironmentNames(fs.readdirSync(configDir));
}

/**
 * Check if an environment exists
 */
export function isValidEnvironment(projectRoot: string, environment: string): boolean {
  return getAvailableEnvironments(projectRoot).includes(environment);
}
