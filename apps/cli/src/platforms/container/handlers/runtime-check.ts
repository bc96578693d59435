import * as fs from 'fs';
import { errorMessage, loadManifest, requirementNames, type ContainerRuntimeName, type DependencyManifest } from '@runbox/core';
import type { HandlerContext, HandlerDescriptor, HandlerResult } from '../../../core/handlers/types.js';
import type { RuntimeStatus } from '../../../core/command-result.js';
import { StateManager } from '../../../core/state-manager.js';
import { isHostReachable } from '../../../core/io/network-utils.js';
import { endpointFor, resolveProjectPath } from '../../runtime-common.js';
import { detectContainerRuntime, inspectImageId, isContainerRunning } from '../../container-runtime.js';
import { imageTagFor } from './runtime-provision.js';

/**
 * Check handler for the container platform
 *
 * The image is immutable, so an existing image built from the current
 * manifest has every dependency installed.
 */
const checkContainer = async (context: HandlerContext<'check'>): Promise<HandlerResult> => {
  const { config, projectRoot, environment } = context;
  const imageTag = imageTagFor(config);
  const details: Record<string, unknown> = { image: imageTag, port: config.port };

  let manifest: DependencyManifest | undefined;
  try {
    manifest = loadManifest(projectRoot, config.manifest);
  } catch (error) {
    details.manifestError = errorMessage(error);
  }

  let runtimeName: ContainerRuntimeName;
  try {
    runtimeName = await detectContainerRuntime(config.container.runtime);
  } catch (error) {
    return {
      success: false,
      error: errorMessage(error),
      extensions: { status: 'unknown', health: { healthy: false, details } },
    };
  }
  const runtime = runtimeName;
  details.runtime = runtime;

  const record = await StateManager.loadProvision(projectRoot, environment);
  const imageId = await inspectImageId(runtime, imageTag);
  const provisioned = record?.platform === 'container' && imageId !== undefined;
  const fresh = provisioned && manifest !== undefined && record?.manifestDigest === manifest.digest;
  const entrypointPresent = fs.existsSync(resolveProjectPath(projectRoot, config.entrypoint.script));
  details.imageId = imageId;
  details.provisioned = provisioned;
  details.fresh = fresh;
  details.entrypoint = entrypointPresent ? config.entrypoint.script : `${config.entrypoint.script} (missing)`;

  const requirements = manifest ? requirementNames(manifest) : [];

  let running = false;
  const run = await StateManager.loadRun(projectRoot, environment);
  if (run?.resources.platform === 'container' && run.resources.data.containerName) {
    running = await isContainerRunning(runtime, run.resources.data.containerName);
    details.container = run.resources.data.containerName;
  }
  details.listening = await isHostReachable('127.0.0.1', config.port);

  const healthy = provisioned && fresh && entrypointPresent;

  let status: RuntimeStatus;
  if (!provisioned) {
    status = 'not-provisioned';
  } else if (!fresh) {
    status = 'stale';
  } else if (!healthy) {
    status = 'unhealthy';
  } else {
    status = running ? 'running' : 'stopped';
  }

  let error: string | undefined;
  if (status === 'not-provisioned') error = `Image ${imageTag} is not provisioned`;
  else if (status === 'stale') error = 'Dependency manifest changed since the image was built';
  else if (!entrypointPresent) error = 'Entry point not found';

  return {
    success: healthy,
    error,
    extensions: {
      status,
      endpoint: running ? endpointFor(config.port) : undefined,
      health: { healthy, details },
      dependencies: fresh ? { installed: requirements, missing: [] } : { installed: [], missing: requirements },
    },
  };
};

export const containerCheckDescriptor: HandlerDescriptor<'check'> = {
  command: 'check',
  platform: 'container',
  handler: checkContainer,
};
