import * as fs from 'fs';
import {
  EntrypointMissingError,
  NotProvisionedError,
  loadManifest,
  type EnvironmentConfig,
  type PlanStep,
} from '@runbox/core';
import type { HandlerContext, HandlerDescriptor, HandlerResult } from '../../../core/handlers/types.js';
import { StateManager } from '../../../core/state-manager.js';
import { isPortInUse } from '../../../core/io/network-utils.js';
import { printInfo, printSuccess, printWarning } from '../../../core/io/cli-logger.js';
import type { PlatformResources } from '../../platform-resources.js';
import { endpointFor, failedResult, requireFreshProvision, resolveProjectPath } from '../../runtime-common.js';
import {
  detectContainerRuntime,
  inspectImageId,
  isContainerRunning,
  runArgs,
  runContainerDetached,
  runContainerForeground,
} from '../../container-runtime.js';
import { imageTagFor } from './runtime-provision.js';

export function containerNameFor(config: EnvironmentConfig, environment: string): string {
  return `${config.name}-${environment}`;
}

/**
 * Start handler for the container platform
 *
 * Runs the provisioned image with the declared port published. In the
 * foreground the runtime CLI is the child process and its exit code (the
 * container's) is reported.
 */
const startContainer = async (context: HandlerContext<'start'>): Promise<HandlerResult> => {
  const { config, projectRoot, environment, options, logger } = context;
  const imageTag = imageTagFor(config);
  const endpoint = endpointFor(config.port);
  const containerName = containerNameFor(config, environment);
  const runOptions = {
    port: config.port,
    env: config.env,
    detachAs: options.detach ? containerName : undefined,
  };

  const plan: PlanStep[] = [
    { step: 'declare-port', description: `Publish TCP port ${config.port} on the host` },
    {
      step: 'launch',
      description: `Run ${imageTag}${options.detach ? ` as ${containerName}` : ''}`,
      command: [config.container.runtime ?? 'docker', ...runArgs(imageTag, runOptions)],
    },
  ];

  try {
    if (options.dryRun) {
      return { success: true, extensions: { status: 'planned', plan, endpoint } };
    }

    if (!fs.existsSync(resolveProjectPath(projectRoot, config.entrypoint.script))) {
      throw new EntrypointMissingError(config.entrypoint.script);
    }

    const manifest = loadManifest(projectRoot, config.manifest);
    const record = await requireFreshProvision(projectRoot, environment, 'container', manifest.digest);
    const runtime = record.resources.platform === 'container'
      ? record.resources.data.runtime
      : await detectContainerRuntime(config.container.runtime);

    if ((await inspectImageId(runtime, imageTag)) === undefined) {
      throw new NotProvisionedError(`Image ${imageTag} not found. Run: runbox provision -e ${environment} --force`);
    }

    if (await isPortInUse(config.port)) {
      printWarning(`Port ${config.port} is already in use; publishing it may fail`);
    }

    if (options.detach) {
      if (await isContainerRunning(runtime, containerName)) {
        return {
          success: false,
          error: `Container ${containerName} is already running`,
          extensions: { status: 'running', endpoint },
        };
      }
      const containerId = await runContainerDetached(runtime, imageTag, { ...runOptions, detachAs: containerName });
      const resources: PlatformResources = {
        platform: 'container',
        data: { runtime, image: imageTag, containerName, containerId },
      };
      await StateManager.saveRun(projectRoot, environment, {
        environment,
        platform: 'container',
        startTime: new Date().toISOString(),
        endpoint,
        resources,
      });
      logger.info('Started container', { containerName, containerId });
      printSuccess(`Started container ${containerName}`);
      return { success: true, extensions: { status: 'running', endpoint, resources, plan } };
    }

    printInfo(`Running ${imageTag} on port ${config.port}`);
    const exit = await runContainerForeground(runtime, imageTag, runOptions);
    logger.debug('Container exited', { exitCode: exit.exitCode, signal: exit.signal });

    return {
      success: exit.exitCode === 0,
      error: exit.exitCode === 0 ? undefined : `Container exited with code ${exit.exitCode}`,
      exitCode: exit.exitCode,
      extensions: {
        status: 'exited',
        endpoint,
        exitCode: exit.exitCode,
        signal: exit.signal ?? undefined,
      },
    };
  } catch (error) {
    return failedResult(error, { endpoint });
  }
};

export const containerStartDescriptor: HandlerDescriptor<'start'> = {
  command: 'start',
  platform: 'container',
  handler: startContainer,
};
