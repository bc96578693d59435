import type { HandlerContext, HandlerDescriptor, HandlerResult } from '../../../core/handlers/types.js';
import { StateManager } from '../../../core/state-manager.js';
import { printInfo, printSuccess } from '../../../core/io/cli-logger.js';
import { isContainerRunning, stopContainer } from '../../container-runtime.js';

/**
 * Stop handler for the container platform
 */
const stopRunningContainer = async (context: HandlerContext<'stop'>): Promise<HandlerResult> => {
  const { projectRoot, environment, options, logger } = context;

  const run = await StateManager.loadRun(projectRoot, environment);
  if (run?.resources.platform !== 'container' || !run.resources.data.containerName) {
    printInfo(`Nothing running for '${environment}'`);
    return { success: true, extensions: { status: 'stopped' }, metadata: { message: 'not running' } };
  }
  const containerName = run.resources.data.containerName;
  const runtime = run.resources.data.runtime;

  if (options.dryRun) {
    return { success: true, extensions: { status: 'planned' }, metadata: { container: containerName } };
  }

  if (await isContainerRunning(runtime, containerName)) {
    logger.debug('Stopping container', { containerName, force: options.force });
    const stopped = await stopContainer(runtime, containerName, { force: options.force, timeout: options.timeout });
    if (!stopped) {
      return {
        success: false,
        error: `Failed to stop container ${containerName}`,
        extensions: { status: 'running' },
        metadata: { container: containerName },
      };
    }
  }

  await StateManager.clearRun(projectRoot, environment);
  printSuccess(`Stopped container ${containerName}`);
  return {
    success: true,
    extensions: { status: 'stopped', stoppedAt: new Date(), graceful: !options.force },
    metadata: { container: containerName },
  };
};

export const containerStopDescriptor: HandlerDescriptor<'stop'> = {
  command: 'stop',
  platform: 'container',
  handler: stopRunningContainer,
};
