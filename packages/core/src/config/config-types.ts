/**
 * Configuration types for runbox.json and environments/*.json
 *
 * Mirrors config.schema.json. `EnvironmentConfig` is the shape after
 * merging and schema defaults, so every field the bootstrap needs is present.
 */

import type { PlatformType } from './platform-types';

export type ContainerRuntimeName = 'docker' | 'podman';

export interface EntrypointConfig {
  /** Script handed to the interpreter, relative to the project root */
  script: string;
  interpreter: string;
  args: string[];
}

export interface RuntimeConfig {
  /** Interpreter used to create the virtual environment */
  interpreter: string;
  /** Base image for the container platform */
  baseImage: string;
}

export interface ContainerSettings {
  image?: string;
  tag: string;
  runtime?: ContainerRuntimeName;
}

/**
 * Settings accepted in runbox.json `defaults` and in environment files.
 * Everything is optional here; the merge fills the gaps.
 */
export interface EnvironmentSettings {
  platform?: { type: PlatformType };
  runtime?: Partial<RuntimeConfig>;
  environmentPath?: string;
  manifest?: string;
  entrypoint?: Partial<EntrypointConfig>;
  port?: number;
  systemPackages?: { upgrade?: boolean };
  container?: Partial<ContainerSettings>;
  env?: Record<string, string>;
}

/**
 * Contents of runbox.json
 */
export interface RunboxConfig {
  name: string;
  defaults?: EnvironmentSettings;
}

/**
 * Fully merged configuration for one environment
 */
export interface EnvironmentConfig {
  name: string;
  platform: { type: PlatformType };
  runtime: RuntimeConfig;
  environmentPath: string;
  manifest: string;
  entrypoint: EntrypointConfig;
  port: number;
  systemPackages: { upgrade: boolean };
  container: ContainerSettings;
  env: Record<string, string>;
  _metadata: {
    environment: string;
    projectRoot: string;
  };
}
