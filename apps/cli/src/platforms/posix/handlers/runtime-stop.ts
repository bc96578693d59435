import type { HandlerContext, HandlerDescriptor, HandlerResult } from '../../../core/handlers/types.js';
import { StateManager } from '../../../core/state-manager.js';
import { printInfo, printSuccess } from '../../../core/io/cli-logger.js';
import { gracefulStop } from '../utils/process-manager.js';

/**
 * Stop handler for the POSIX platform
 *
 * Stops a process started with `start --detach`. A foreground runtime stops
 * with its terminal.
 */
const stopRuntime = async (context: HandlerContext<'stop'>): Promise<HandlerResult> => {
  const { projectRoot, environment, options, logger } = context;

  const run = await StateManager.loadRun(projectRoot, environment);
  const pid = run?.resources.platform === 'posix' ? run.resources.data.pid : undefined;
  if (!pid) {
    printInfo(`Nothing running for '${environment}'`);
    return { success: true, extensions: { status: 'stopped' }, metadata: { message: 'not running' } };
  }

  if (options.dryRun) {
    return { success: true, extensions: { status: 'planned' }, metadata: { pid } };
  }

  const outcome = await gracefulStop(pid, { timeoutSeconds: options.timeout, force: options.force, logger });
  if (!outcome.stopped) {
    return {
      success: false,
      error: `Process ${pid} did not stop`,
      extensions: { status: 'running' },
      metadata: { pid },
    };
  }

  await StateManager.clearRun(projectRoot, environment);
  printSuccess(`Stopped '${environment}' (PID ${pid})`);
  return {
    success: true,
    extensions: { status: 'stopped', stoppedAt: new Date(), graceful: outcome.graceful },
    metadata: { pid },
  };
};

export const runtimeStopDescriptor: HandlerDescriptor<'stop'> = {
  command: 'stop',
  platform: 'posix',
  handler: stopRuntime,
};
