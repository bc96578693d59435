import * as fs from 'fs';
import * as path from 'path';
import { DependencyInstallError, loadManifest, requirementNames, type EnvironmentConfig, type PlanStep } from '@runbox/core';
import type { HandlerContext, HandlerDescriptor, HandlerResult } from '../../../core/handlers/types.js';
import { StateManager, type ProvisionRecord } from '../../../core/state-manager.js';
import { printInfo, printSuccess } from '../../../core/io/cli-logger.js';
import { tailLines } from '../../../core/io/process-runner.js';
import { entrypointArgv, failedResult } from '../../runtime-common.js';
import {
  buildArgs,
  buildImage,
  detectContainerRuntime,
  imageReference,
  inspectImageId,
  isContainerRunning,
  removeImage,
} from '../../container-runtime.js';
import { RECIPE_DIR, RECIPE_FILE, renderDockerfile, renderDockerignore } from '../utils/dockerfile.js';

export function imageTagFor(config: EnvironmentConfig): string {
  return imageReference(config.container.image ?? config.name, config.container.tag);
}

/**
 * Provision handler for the container platform
 *
 * Writes the build recipe and builds the image. Isolation, installation and
 * the optional system upgrade all happen inside the build, so a failed build
 * leaves no tagged image and no record.
 */
const provisionImage = async (context: HandlerContext<'provision'>): Promise<HandlerResult> => {
  const { config, projectRoot, environment, options, logger } = context;
  const imageTag = imageTagFor(config);

  try {
    if (options.destroy) {
      return await destroyImage(context, imageTag);
    }

    const manifest = loadManifest(projectRoot, config.manifest);
    const requirements = requirementNames(manifest);
    const recipePath = path.join(projectRoot, RECIPE_DIR, RECIPE_FILE);
    const relativeRecipe = path.join(RECIPE_DIR, RECIPE_FILE);
    const runtimeLabel = config.container.runtime ?? 'docker';

    const plan: PlanStep[] = [
      {
        step: 'isolate',
        description: `Build ${imageTag} from ${config.runtime.baseImage} with a virtual environment`,
        command: [runtimeLabel, ...buildArgs(imageTag, relativeRecipe, '.')],
      },
      {
        step: 'install',
        description: `Install ${requirements.length} requirement(s) from ${config.manifest} during the build` +
          (config.systemPackages.upgrade ? ', then upgrade system packages' : ''),
      },
    ];

    if (options.dryRun) {
      return { success: true, extensions: { status: 'planned', plan, requirements, manifestDigest: manifest.digest } };
    }

    const runtime = await detectContainerRuntime(config.container.runtime);
    plan[0].command = [runtime, ...buildArgs(imageTag, relativeRecipe, '.')];

    const existing = await StateManager.loadProvision(projectRoot, environment);
    if (
      !options.force &&
      existing?.platform === 'container' &&
      existing.manifestDigest === manifest.digest &&
      (await inspectImageId(runtime, imageTag)) !== undefined
    ) {
      printInfo(`Image ${imageTag} is already provisioned; use --force to rebuild`);
      return {
        success: true,
        extensions: { status: 'skipped', requirements, manifestDigest: manifest.digest },
        metadata: { image: imageTag, provisionedAt: existing.provisionedAt },
      };
    }

    await StateManager.clearProvision(projectRoot, environment);

    await fs.promises.mkdir(path.dirname(recipePath), { recursive: true });
    await fs.promises.writeFile(recipePath, renderDockerfile(config, manifest.files), 'utf-8');
    const ignorePath = path.join(projectRoot, '.dockerignore');
    if (!fs.existsSync(ignorePath)) {
      await fs.promises.writeFile(ignorePath, renderDockerignore(), 'utf-8');
    }
    logger.info('Building image', { image: imageTag, recipe: relativeRecipe, runtime });

    const outcome = await buildImage(runtime, imageTag, relativeRecipe, projectRoot, {
      stream: options.output === 'summary' && !options.quiet,
    });
    if (outcome.code !== 0) {
      throw new DependencyInstallError(
        `Image build failed (exit code ${outcome.code ?? 'none'})`,
        outcome.code,
        tailLines(outcome.stderr)
      );
    }

    const imageId = await inspectImageId(runtime, imageTag);
    const record: ProvisionRecord = {
      environment,
      platform: 'container',
      provisionedAt: new Date().toISOString(),
      manifestDigest: manifest.digest,
      manifestFiles: manifest.files,
      requirements,
      port: config.port,
      entrypoint: entrypointArgv(config),
      resources: { platform: 'container', data: { runtime, image: imageTag, imageId } },
    };
    await StateManager.saveProvision(projectRoot, environment, record);

    printSuccess(`Built ${imageTag} with ${requirements.length} requirement(s)`);
    return {
      success: true,
      extensions: {
        status: 'provisioned',
        plan,
        requirements,
        manifestDigest: manifest.digest,
        resources: record.resources,
      },
      metadata: { image: imageTag, recipe: relativeRecipe },
    };
  } catch (error) {
    return failedResult(error);
  }
};

async function destroyImage(context: HandlerContext<'provision'>, imageTag: string): Promise<HandlerResult> {
  const { config, projectRoot, environment, options } = context;

  if (options.dryRun) {
    return { success: true, extensions: { status: 'planned' }, metadata: { remove: imageTag } };
  }

  const runtime = await detectContainerRuntime(config.container.runtime);
  const run = await StateManager.loadRun(projectRoot, environment);
  const containerName = run?.resources.platform === 'container' ? run.resources.data.containerName : undefined;
  if (containerName && (await isContainerRunning(runtime, containerName))) {
    return failedResult(
      new Error(`Container ${containerName} is running. Stop it first: runbox stop -e ${environment}`)
    );
  }

  if ((await inspectImageId(runtime, imageTag)) !== undefined && !(await removeImage(runtime, imageTag))) {
    return failedResult(new Error(`Failed to remove image ${imageTag}`));
  }
  await StateManager.clearProvision(projectRoot, environment);
  await StateManager.clearRun(projectRoot, environment);
  printSuccess(`Removed image ${imageTag}`);
  return { success: true, extensions: { status: 'destroyed' }, metadata: { image: imageTag } };
}

export const imageProvisionDescriptor: HandlerDescriptor<'provision'> = {
  command: 'provision',
  platform: 'container',
  handler: provisionImage,
};
