/**
 * Unified Command Result Types
 *
 * One result shape for every command, with command-specific extensions.
 */

import type { PlanStep, PlatformType } from '@runbox/core';
import type { PlatformResources } from '../platforms/platform-resources.js';

export type RuntimeStatus =
  | 'initialized'
  | 'planned'
  | 'provisioned'
  | 'skipped'
  | 'running'
  | 'exited'
  | 'stopped'
  | 'destroyed'
  | 'not-provisioned'
  | 'stale'
  | 'unhealthy'
  | 'unknown'
  | 'failed';

export interface CommandResult {
  /** The environment the result applies to */
  entity: string;
  platform: PlatformType;
  success: boolean;
  timestamp: Date;
  error?: string;
  metadata?: Record<string, unknown>;
  extensions?: CommandExtensions;
}

export interface CommandExtensions {
  status?: RuntimeStatus;

  // start
  endpoint?: string;
  exitCode?: number;
  signal?: string;
  resources?: PlatformResources;

  // provision
  plan?: PlanStep[];
  requirements?: string[];
  manifestDigest?: string;

  // check
  health?: {
    healthy: boolean;
    details: Record<string, unknown>;
  };
  dependencies?: {
    installed: string[];
    missing: string[];
  };

  // stop
  stoppedAt?: Date;
  graceful?: boolean;

  // init
  files?: string[];
}

/**
 * Type guard to check if a result has specific extensions
 */
export function hasExtension<K extends keyof CommandExtensions>(
  result: CommandResult,
  extension: K
): result is CommandResult & { extensions: Required<Pick<CommandExtensions, K>> } {
  return result.extensions !== undefined && result.extensions[extension] !== undefined;
}

export function createCommandResult(
  base: Omit<CommandResult, 'timestamp' | 'extensions'>,
  extensions?: CommandExtensions
): CommandResult {
  return {
    ...base,
    timestamp: new Date(),
    extensions,
  };
}
