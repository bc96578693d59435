import * as fs from 'fs';
import { EntrypointMissingError, NotProvisionedError, loadManifest, type PlanStep } from '@runbox/core';
import type { HandlerContext, HandlerDescriptor, HandlerResult } from '../../../core/handlers/types.js';
import { StateManager } from '../../../core/state-manager.js';
import { isPortInUse } from '../../../core/io/network-utils.js';
import { runForeground, spawnDetached } from '../../../core/io/process-runner.js';
import { printInfo, printSuccess, printWarning } from '../../../core/io/cli-logger.js';
import type { PlatformResources } from '../../platform-resources.js';
import { endpointFor, entrypointArgv, failedResult, requireFreshProvision } from '../../runtime-common.js';
import { activateEnvironment, isEnvironmentPresent } from '../utils/venv.js';
import { isProcessRunning } from '../utils/process-manager.js';
import { getRuntimePaths } from './runtime-paths.js';

/**
 * Start handler for the POSIX platform
 *
 * Launches the entry point inside the activated environment. In the
 * foreground the handler resolves when the process exits and reports its
 * exit code; with --detach it returns once the process is spawned.
 */
const startRuntime = async (context: HandlerContext<'start'>): Promise<HandlerResult> => {
  const { config, projectRoot, environment, options, logger } = context;
  const paths = getRuntimePaths(context);
  const argv = entrypointArgv(config);
  const endpoint = endpointFor(config.port);

  const plan: PlanStep[] = [
    { step: 'declare-port', description: `Declare TCP port ${config.port}` },
    { step: 'launch', description: `Run the entry point in ${projectRoot}`, command: argv },
  ];

  try {
    if (options.dryRun) {
      return { success: true, extensions: { status: 'planned', plan, endpoint } };
    }

    if (!fs.existsSync(paths.entrypointPath)) {
      throw new EntrypointMissingError(config.entrypoint.script);
    }

    const manifest = loadManifest(projectRoot, config.manifest);
    await requireFreshProvision(projectRoot, environment, 'posix', manifest.digest);
    if (!isEnvironmentPresent(paths.environmentPath)) {
      throw new NotProvisionedError(
        `Virtual environment missing at ${paths.environmentPath}. Run: runbox provision -e ${environment} --force`
      );
    }

    const run = await StateManager.loadRun(projectRoot, environment);
    if (run?.resources.platform === 'posix' && run.resources.data.pid && isProcessRunning(run.resources.data.pid)) {
      return {
        success: false,
        error: `Already running with PID ${run.resources.data.pid}`,
        extensions: { status: 'running', endpoint: run.endpoint },
      };
    }

    if (await isPortInUse(config.port)) {
      printWarning(`Port ${config.port} is already in use; the entry point may fail to bind it`);
    }

    const venv = activateEnvironment(paths.environmentPath, process.env, config.env);
    const [command, ...args] = argv;

    if (options.detach) {
      await fs.promises.mkdir(paths.logsDir, { recursive: true });
      const pid = spawnDetached(command, args, { cwd: projectRoot, env: venv.env, logFile: paths.logFile });
      const resources: PlatformResources = {
        platform: 'posix',
        data: { environmentPath: paths.environmentPath, pid, logFile: paths.logFile },
      };
      await StateManager.saveRun(projectRoot, environment, {
        environment,
        platform: 'posix',
        startTime: new Date().toISOString(),
        endpoint,
        resources,
      });
      logger.info('Started detached', { pid, logFile: paths.logFile });
      printSuccess(`Started '${environment}' (PID ${pid}), logs: ${paths.logFile}`);
      return { success: true, extensions: { status: 'running', endpoint, resources, plan } };
    }

    printInfo(`Launching ${argv.join(' ')} on port ${config.port}`);
    const exit = await runForeground(command, args, { cwd: projectRoot, env: venv.env });
    logger.debug('Entry point exited', { exitCode: exit.exitCode, signal: exit.signal });

    return {
      success: exit.exitCode === 0,
      error: exit.exitCode === 0 ? undefined : `Entry point exited with code ${exit.exitCode}`,
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

export const runtimeStartDescriptor: HandlerDescriptor<'start'> = {
  command: 'start',
  platform: 'posix',
  handler: startRuntime,
};
