/**
 * Stopping detached runtimes started by `start --detach`
 */

import type { Logger } from '@runbox/core';

const POLL_INTERVAL_MS = 100;

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isProcessRunning(pid)) {
      return true;
    }
    await new Promise(resolve => setTimeout(resolve, POLL_INTERVAL_MS));
  }
  return !isProcessRunning(pid);
}

/**
 * Send a signal to the process group, falling back to the process alone.
 * Detached children lead their own group, so the group takes any workers
 * the application spawned with it.
 */
function signalProcess(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(-pid, signal);
  } catch {
    if (isProcessRunning(pid)) {
      process.kill(pid, signal);
    }
  }
}

export interface StopOutcome {
  stopped: boolean;
  graceful: boolean;
}

/**
 * SIGTERM, then SIGKILL once the grace period runs out
 *
 * @param timeoutSeconds - Grace period; ignored when `force` is set
 */
export async function gracefulStop(
  pid: number,
  options: { timeoutSeconds: number; force: boolean; logger: Logger }
): Promise<StopOutcome> {
  if (!isProcessRunning(pid)) {
    return { stopped: true, graceful: true };
  }

  if (!options.force) {
    options.logger.debug('Sending SIGTERM', { pid });
    signalProcess(pid, 'SIGTERM');
    if (await waitForExit(pid, options.timeoutSeconds * 1000)) {
      return { stopped: true, graceful: true };
    }
    options.logger.warn('Process did not exit in time, killing', { pid, timeout: options.timeoutSeconds });
  }

  signalProcess(pid, 'SIGKILL');
  const stopped = await waitForExit(pid, 2000);
  return { stopped, graceful: false };
}
