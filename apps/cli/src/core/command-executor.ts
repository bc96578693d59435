/**
 * Command Executor - runs a lifecycle command against one environment
 *
 * Pipeline: find the project root, pick the environment, load and
 * validate its configuration, then hand off to the handler registered for
 * the environment's platform. A handler failure becomes a failed result
 * rather than an exception, so output formatting always happens.
 */

import {
  ConfigurationError,
  errorMessage,
  findProjectRoot,
  getAvailableEnvironments,
  loadEnvironmentConfig,
  type EnvironmentConfig,
} from '@runbox/core';
import type { CommandOutcome } from './command-definition.js';
import { createCommandResult } from './command-result.js';
import { createCommandResults } from './command-results.js';
import { HandlerRegistry } from './handlers/registry.js';
import type { HandlerCommand, HandlerOptions, HandlerResult } from './handlers/types.js';
import { createLogger, Logger } from '../lib/logger.js';

export interface ExecutorDependencies {
  registry?: HandlerRegistry;
  cwd?: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

/**
 * Pick the environment from the flag, then RUNBOX_ENV
 *
 * @throws ConfigurationError listing the available environments
 */
export function resolveEnvironment(
  requested: string | undefined,
  projectRoot: string,
  env: Record<string, string | undefined> = process.env
): string {
  const environment = requested ?? env.RUNBOX_ENV;
  const available = getAvailableEnvironments(projectRoot);
  const listing = available.length > 0 ? available.join(', ') : 'none found';

  if (!environment) {
    throw new ConfigurationError(
      'Environment not specified',
      undefined,
      `Use --environment or set RUNBOX_ENV. Available: ${listing}`
    );
  }
  if (!available.includes(environment)) {
    throw new ConfigurationError(`Unknown environment '${environment}'`, environment, `Available: ${listing}`);
  }
  return environment;
}

export async function executeLifecycleCommand<C extends HandlerCommand>(
  command: C,
  options: HandlerOptions<C>,
  deps: ExecutorDependencies = {}
): Promise<CommandOutcome> {
  const startTime = Date.now();
  const env = deps.env ?? process.env;
  const registry = deps.registry ?? HandlerRegistry.getInstance();

  const projectRoot = findProjectRoot(deps.cwd ?? process.cwd(), env);
  const environment = resolveEnvironment(options.environment, projectRoot, env);
  const config: EnvironmentConfig = loadEnvironmentConfig(projectRoot, environment, env);
  const platform = config.platform.type;

  const logger = (deps.logger ?? createLogger({ ...options, stderr: options.output !== 'summary' }, env))
    .child({ command, environment });

  const descriptor = registry.getHandler(platform, command);
  if (!descriptor) {
    throw new ConfigurationError(
      `Command '${command}' is not supported on platform '${platform}'`,
      environment
    );
  }

  logger.debug('Dispatching handler', { platform, projectRoot });

  let result: HandlerResult;
  try {
    result = await descriptor.handler({
      command,
      config,
      projectRoot,
      environment,
      options,
      logger,
    });
  } catch (error) {
    logger.error(`${command} failed`, { error: errorMessage(error) });
    result = {
      success: false,
      error: errorMessage(error),
      extensions: { status: 'failed' },
    };
  }

  const results = createCommandResults({
    command,
    environment,
    startTime,
    dryRun: options.dryRun,
    results: [
      createCommandResult(
        {
          entity: config.name,
          platform,
          success: result.success,
          error: result.error,
          metadata: result.metadata,
        },
        result.extensions
      ),
    ],
  });

  return { results, exitCode: result.exitCode };
}
