/**
 * @runbox/core
 *
 * Configuration, dependency manifest handling and runtime activation shared
 * by the runbox CLI platforms.
 */

// Configuration
export type {
  EnvironmentConfig,
  EnvironmentSettings,
  RunboxConfig,
  RuntimeConfig,
  EntrypointConfig,
  ContainerSettings,
  ContainerRuntimeName,
} from './config/config-types';
export type { PlatformType } from './config/platform-types';
export { ConfigurationError } from './config/configuration-error';
export {
  deepMerge,
  resolveEnvVars,
  parseAndMergeConfigs,
  listEnvironmentNames,
  isPlainObject,
} from './config/environment-loader';
export type { PlainObject } from './config/environment-loader';
export {
  loadEnvironmentConfig,
  getAvailableEnvironments,
  isValidEnvironment,
} from './config/environment-loader-fs';
export {
  PROJECT_FILE,
  findProjectRoot,
  isProjectRoot,
  getEnvironmentsPath,
  getProjectConfigPath,
} from './config/project-discovery';
export {
  validateRunboxConfig,
  validateEnvironmentConfig,
  isEnvironmentConfig,
} from './config/config-validator';
export type { ValidationResult } from './config/config-validator';

// Dependency manifest
export type {
  Requirement,
  IncludeEntry,
  EditableEntry,
  ReferenceEntry,
  OptionEntry,
  ManifestEntry,
  ParsedManifest,
  DependencyManifest,
} from './manifest/manifest-types';
export { ManifestError } from './manifest/manifest-error';
export { parseRequirements, normalizePackageName } from './manifest/requirements-parser';
export { loadManifest, computeManifestDigest, requirementNames } from './manifest/manifest-loader';

// Bootstrap
export {
  BootstrapError,
  EnvironmentIsolationError,
  DependencyInstallError,
  EntrypointMissingError,
  LaunchError,
  NotProvisionedError,
  errorMessage,
} from './bootstrap/errors';
export type { BootstrapStep } from './bootstrap/errors';
export { IsolatedEnvironment, activationEnv } from './bootstrap/activation';
export type { ProcessEnv } from './bootstrap/activation';
export { formatPlan } from './bootstrap/plan';
export type { PlanStep } from './bootstrap/plan';

// Logging
export type { Logger } from './logger';
