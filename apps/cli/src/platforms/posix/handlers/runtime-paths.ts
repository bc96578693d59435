import * as path from 'path';
import type { EnvironmentConfig } from '@runbox/core';
import { resolveProjectPath } from '../../runtime-common.js';
import { StateManager } from '../../../core/state-manager.js';

/**
 * Paths a POSIX runtime uses, all absolute
 */
export interface RuntimePaths {
  environmentPath: string;
  manifestPath: string;
  entrypointPath: string;
  logsDir: string;
  logFile: string;
}

export function getRuntimePaths(context: {
  config: EnvironmentConfig;
  projectRoot: string;
  environment: string;
}): RuntimePaths {
  const { config, projectRoot, environment } = context;
  const logsDir = path.join(StateManager.getStateDir(projectRoot, environment), 'logs');
  return {
    environmentPath: resolveProjectPath(projectRoot, config.environmentPath),
    manifestPath: resolveProjectPath(projectRoot, config.manifest),
    entrypointPath: resolveProjectPath(projectRoot, config.entrypoint.script),
    logsDir,
    logFile: path.join(logsDir, 'app.log'),
  };
}
