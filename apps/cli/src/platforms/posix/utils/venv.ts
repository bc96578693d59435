/**
 * Virtual environment steps for the POSIX platform
 *
 * Creation yields the activated IsolatedEnvironment that installation and
 * launch require. Both steps fail fatally.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  DependencyInstallError,
  EnvironmentIsolationError,
  IsolatedEnvironment,
  NotProvisionedError,
  errorMessage,
  type Logger,
  type ProcessEnv,
} from '@runbox/core';
import { runProcess, tailLines, type ProcessOutcome } from '../../../core/io/process-runner.js';

export interface CreateEnvironmentOptions {
  interpreter: string;
  environmentPath: string;
  baseEnv: ProcessEnv;
  /** Extra variables from configuration, applied before activation */
  extraEnv?: Record<string, string>;
  cwd?: string;
  logger: Logger;
}

export function venvCommand(interpreter: string, environmentPath: string): string[] {
  return [interpreter, '-m', 'venv', environmentPath];
}

export function pipInstallCommand(python: string, manifestPath: string): string[] {
  return [python, '-m', 'pip', 'install', '-r', manifestPath];
}

/**
 * Whether a directory holds a usable virtual environment
 */
export function isEnvironmentPresent(environmentPath: string): boolean {
  return fs.existsSync(path.join(environmentPath, 'bin', 'python'));
}

/**
 * Activate an environment a previous provision created
 *
 * @throws NotProvisionedError if the environment is not on disk
 */
export function activateEnvironment(
  environmentPath: string,
  baseEnv: ProcessEnv,
  extraEnv: Record<string, string> = {}
): IsolatedEnvironment {
  if (!isEnvironmentPresent(environmentPath)) {
    throw new NotProvisionedError(`Virtual environment missing at ${environmentPath}`);
  }
  return IsolatedEnvironment.activate(environmentPath, baseEnv, extraEnv);
}

/**
 * Create the virtual environment and activate it
 *
 * @throws EnvironmentIsolationError if the interpreter is missing or venv fails
 */
export async function createEnvironment(options: CreateEnvironmentOptions): Promise<IsolatedEnvironment> {
  const [command, ...args] = venvCommand(options.interpreter, options.environmentPath);
  options.logger.info('Creating virtual environment', { path: options.environmentPath });

  let outcome: ProcessOutcome;
  try {
    outcome = await runProcess(command, args, { cwd: options.cwd, env: definedEnv(options.baseEnv) });
  } catch (error) {
    throw new EnvironmentIsolationError(
      `Cannot run ${options.interpreter}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (outcome.code !== 0 || !isEnvironmentPresent(options.environmentPath)) {
    const detail = tailLines(outcome.stderr, 5).join('\n');
    throw new EnvironmentIsolationError(
      `Failed to create virtual environment at ${options.environmentPath}` +
        (detail ? `:\n${detail}` : '')
    );
  }

  return IsolatedEnvironment.activate(options.environmentPath, options.baseEnv, options.extraEnv);
}

/**
 * Install the manifest into the environment
 *
 * @throws DependencyInstallError when the installer exits non-zero
 */
export async function installRequirements(
  venv: IsolatedEnvironment,
  manifestPath: string,
  options: { cwd?: string; stream?: boolean; logger: Logger }
): Promise<void> {
  const [command, ...args] = pipInstallCommand(venv.python, manifestPath);
  options.logger.info('Installing dependencies', { manifest: manifestPath });

  let outcome: ProcessOutcome;
  try {
    outcome = await runProcess(command, args, { cwd: options.cwd, env: { ...venv.env }, stream: options.stream });
  } catch (error) {
    throw new DependencyInstallError(`Cannot run installer: ${errorMessage(error)}`, null);
  }

  if (outcome.code !== 0) {
    throw new DependencyInstallError(
      `Dependency installation failed (exit code ${outcome.code ?? 'none'})`,
      outcome.code,
      tailLines(outcome.stderr)
    );
  }
}

/**
 * Names of the requirements pip does not report as installed
 */
export async function findMissingPackages(venv: IsolatedEnvironment, names: string[]): Promise<string[]> {
  const missing: string[] = [];
  for (const name of names) {
    const outcome = await runProcess(venv.python, ['-m', 'pip', 'show', '--quiet', name], { env: { ...venv.env } });
    if (outcome.code !== 0) {
      missing.push(name);
    }
  }
  return missing;
}

/**
 * Remove an environment directory; used to discard a failed provision
 */
export async function removeEnvironment(environmentPath: string): Promise<void> {
  await fs.promises.rm(environmentPath, { recursive: true, force: true });
}

function definedEnv(env: ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
