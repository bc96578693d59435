import * as path from 'path';
import { loadManifest, requirementNames, type PlanStep } from '@runbox/core';
import type { HandlerContext, HandlerDescriptor, HandlerResult } from '../../../core/handlers/types.js';
import { StateManager, type ProvisionRecord } from '../../../core/state-manager.js';
import { printInfo, printSuccess } from '../../../core/io/cli-logger.js';
import { entrypointArgv, failedResult } from '../../runtime-common.js';
import {
  createEnvironment,
  installRequirements,
  isEnvironmentPresent,
  pipInstallCommand,
  removeEnvironment,
  venvCommand,
} from '../utils/venv.js';
import { isProcessRunning } from '../utils/process-manager.js';
import { getRuntimePaths } from './runtime-paths.js';

/**
 * Provision handler for the POSIX platform
 *
 * Creates the virtual environment and installs the manifest into it. The
 * environment directory and the provision record exist afterwards only if
 * both steps succeeded.
 */
const provisionRuntime = async (context: HandlerContext<'provision'>): Promise<HandlerResult> => {
  const { config, projectRoot, environment, options, logger } = context;
  const paths = getRuntimePaths(context);

  if (options.destroy) {
    return destroyRuntime(context, paths.environmentPath);
  }

  try {
    const manifest = loadManifest(projectRoot, config.manifest);
    const requirements = requirementNames(manifest);
    const relativeEnv = path.relative(projectRoot, paths.environmentPath) || '.';

    const plan: PlanStep[] = [
      {
        step: 'isolate',
        description: `Create virtual environment at ${relativeEnv}`,
        command: venvCommand(config.runtime.interpreter, paths.environmentPath),
      },
      {
        step: 'install',
        description: `Install ${requirements.length} requirement(s) from ${config.manifest}`,
        command: pipInstallCommand(path.join(paths.environmentPath, 'bin', 'python'), paths.manifestPath),
      },
    ];

    if (options.dryRun) {
      return { success: true, extensions: { status: 'planned', plan, requirements, manifestDigest: manifest.digest } };
    }

    const existing = await StateManager.loadProvision(projectRoot, environment);
    if (
      !options.force &&
      existing?.platform === 'posix' &&
      existing.manifestDigest === manifest.digest &&
      isEnvironmentPresent(paths.environmentPath)
    ) {
      printInfo(`Environment '${environment}' is already provisioned; use --force to rebuild`);
      return {
        success: true,
        extensions: { status: 'skipped', requirements, manifestDigest: manifest.digest },
        metadata: { provisionedAt: existing.provisionedAt },
      };
    }

    // The record describes the old environment until the new one is complete
    await StateManager.clearProvision(projectRoot, environment);
    await removeEnvironment(paths.environmentPath);

    try {
      const venv = await createEnvironment({
        interpreter: config.runtime.interpreter,
        environmentPath: paths.environmentPath,
        baseEnv: process.env,
        extraEnv: config.env,
        cwd: projectRoot,
        logger,
      });
      await installRequirements(venv, paths.manifestPath, {
        cwd: projectRoot,
        stream: options.output === 'summary' && !options.quiet,
        logger,
      });
    } catch (error) {
      logger.warn('Provision failed, removing environment', { path: paths.environmentPath });
      await removeEnvironment(paths.environmentPath);
      throw error;
    }

    const record: ProvisionRecord = {
      environment,
      platform: 'posix',
      provisionedAt: new Date().toISOString(),
      manifestDigest: manifest.digest,
      manifestFiles: manifest.files,
      requirements,
      port: config.port,
      entrypoint: entrypointArgv(config),
      resources: { platform: 'posix', data: { environmentPath: paths.environmentPath } },
    };
    await StateManager.saveProvision(projectRoot, environment, record);

    printSuccess(`Provisioned '${environment}' with ${requirements.length} requirement(s)`);
    return {
      success: true,
      extensions: {
        status: 'provisioned',
        plan,
        requirements,
        manifestDigest: manifest.digest,
        resources: record.resources,
      },
      metadata: { environmentPath: paths.environmentPath },
    };
  } catch (error) {
    return failedResult(error);
  }
};

async function destroyRuntime(context: HandlerContext<'provision'>, environmentPath: string): Promise<HandlerResult> {
  const { projectRoot, environment, options } = context;

  const run = await StateManager.loadRun(projectRoot, environment);
  if (run?.resources.platform === 'posix' && run.resources.data.pid && isProcessRunning(run.resources.data.pid)) {
    return failedResult(
      new Error(`Runtime is running (PID ${run.resources.data.pid}). Stop it first: runbox stop -e ${environment}`)
    );
  }

  if (options.dryRun) {
    return { success: true, extensions: { status: 'planned' }, metadata: { remove: environmentPath } };
  }

  await removeEnvironment(environmentPath);
  await StateManager.clearProvision(projectRoot, environment);
  await StateManager.clearRun(projectRoot, environment);
  printSuccess(`Removed environment at ${environmentPath}`);
  return { success: true, extensions: { status: 'destroyed' }, metadata: { environmentPath } };
}

export const runtimeProvisionDescriptor: HandlerDescriptor<'provision'> = {
  command: 'provision',
  platform: 'posix',
  handler: provisionRuntime,
};
