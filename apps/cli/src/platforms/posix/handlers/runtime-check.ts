import * as fs from 'fs';
import { errorMessage, loadManifest, type DependencyManifest } from '@runbox/core';
import type { HandlerContext, HandlerDescriptor, HandlerResult } from '../../../core/handlers/types.js';
import type { RuntimeStatus } from '../../../core/command-result.js';
import { StateManager } from '../../../core/state-manager.js';
import { isHostReachable } from '../../../core/io/network-utils.js';
import { endpointFor } from '../../runtime-common.js';
import { activateEnvironment, findMissingPackages, isEnvironmentPresent } from '../utils/venv.js';
import { isProcessRunning } from '../utils/process-manager.js';
import { getRuntimePaths } from './runtime-paths.js';

/**
 * Check handler for the POSIX platform
 *
 * Reports provision state, manifest freshness, the entry point, installed
 * dependencies, a detached process and the port. The check succeeds when
 * the runtime could be started; running is not required.
 */
const checkRuntime = async (context: HandlerContext<'check'>): Promise<HandlerResult> => {
  const { config, projectRoot, environment } = context;
  const paths = getRuntimePaths(context);
  const details: Record<string, unknown> = {
    environmentPath: paths.environmentPath,
    port: config.port,
  };

  let manifest: DependencyManifest | undefined;
  try {
    manifest = loadManifest(projectRoot, config.manifest);
  } catch (error) {
    details.manifestError = errorMessage(error);
  }

  const record = await StateManager.loadProvision(projectRoot, environment);
  const provisioned = record?.platform === 'posix' && isEnvironmentPresent(paths.environmentPath);
  const fresh = provisioned && manifest !== undefined && record?.manifestDigest === manifest.digest;
  const entrypointPresent = fs.existsSync(paths.entrypointPath);
  details.provisioned = provisioned;
  details.fresh = fresh;
  details.entrypoint = entrypointPresent ? config.entrypoint.script : `${config.entrypoint.script} (missing)`;

  let installed: string[] = [];
  let missing: string[] = [];
  if (provisioned && manifest) {
    // Requirements behind an environment marker may be skipped by pip on this host
    const names = manifest.requirements.filter(r => r.marker === undefined).map(r => r.name);
    const venv = activateEnvironment(paths.environmentPath, process.env, config.env);
    missing = await findMissingPackages(venv, names);
    installed = names.filter(name => !missing.includes(name));
  }

  let running = false;
  const run = await StateManager.loadRun(projectRoot, environment);
  if (run?.resources.platform === 'posix' && run.resources.data.pid) {
    running = isProcessRunning(run.resources.data.pid);
    details.pid = run.resources.data.pid;
  }
  details.listening = await isHostReachable('127.0.0.1', config.port);

  const healthy = provisioned && fresh && entrypointPresent && missing.length === 0;

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

  return {
    success: healthy,
    error: healthy ? undefined : describeProblem(status, entrypointPresent, missing),
    extensions: {
      status,
      endpoint: running ? endpointFor(config.port) : undefined,
      health: { healthy, details },
      dependencies: { installed, missing },
    },
  };
};

function describeProblem(status: RuntimeStatus, entrypointPresent: boolean, missing: string[]): string {
  if (status === 'not-provisioned') return 'Runtime is not provisioned';
  if (status === 'stale') return 'Dependency manifest changed since the last provision';
  if (!entrypointPresent) return 'Entry point not found';
  return `Missing dependencies: ${missing.join(', ')}`;
}

export const runtimeCheckDescriptor: HandlerDescriptor<'check'> = {
  command: 'check',
  platform: 'posix',
  handler: checkRuntime,
};
