/**
 * Pieces shared by every platform's handlers
 */

import * as path from 'path';
import {
  DependencyInstallError,
  NotProvisionedError,
  errorMessage,
  type EnvironmentConfig,
  type PlatformType,
} from '@runbox/core';
import type { HandlerResult } from '../core/handlers/types.js';
import type { CommandExtensions } from '../core/command-result.js';
import { StateManager, type ProvisionRecord } from '../core/state-manager.js';

/**
 * argv of the entry point: interpreter, script, then arguments
 */
export function entrypointArgv(config: EnvironmentConfig): string[] {
  return [config.entrypoint.interpreter, config.entrypoint.script, ...config.entrypoint.args];
}

export function resolveProjectPath(projectRoot: string, target: string): string {
  return path.isAbsolute(target) ? target : path.join(projectRoot, target);
}

export function endpointFor(port: number): string {
  return `http://localhost:${port}`;
}

/**
 * The provision record for an environment, checked against the current
 * manifest digest
 *
 * @throws NotProvisionedError when the record is missing, belongs to
 *   another platform, or was made from a different manifest
 */
export async function requireFreshProvision(
  projectRoot: string,
  environment: string,
  platform: PlatformType,
  manifestDigest: string
): Promise<ProvisionRecord> {
  const record = await StateManager.loadProvision(projectRoot, environment);
  if (!record || record.platform !== platform) {
    throw new NotProvisionedError(
      `Environment '${environment}' is not provisioned. Run: runbox provision -e ${environment}`
    );
  }
  if (record.manifestDigest !== manifestDigest) {
    throw new NotProvisionedError(
      `Dependency manifest changed since the last provision. Run: runbox provision -e ${environment}`,
      true
    );
  }
  return record;
}

/**
 * Turn a thrown error into a failed handler result
 */
export function failedResult(error: unknown, extensions: CommandExtensions = {}): HandlerResult {
  const metadata: Record<string, unknown> = {};
  if (error instanceof DependencyInstallError) {
    metadata.installerExitCode = error.exitCode;
    if (error.stderrTail.length > 0) {
      metadata.installerOutput = error.stderrTail;
    }
  }
  if (error instanceof NotProvisionedError) {
    return {
      success: false,
      error: errorMessage(error),
      metadata,
      extensions: { ...extensions, status: error.stale ? 'stale' : 'not-provisioned' },
    };
  }
  return {
    success: false,
    error: errorMessage(error),
    metadata,
    extensions: { ...extensions, status: 'failed' },
  };
}
