/**
 * Command Results - aggregated results for one command execution
 */

import * as os from 'os';
import type { CommandResult } from './command-result.js';

export interface CommandResults {
  command: string;
  environment: string;
  timestamp: Date;
  duration: number;
  results: CommandResult[];
  summary: {
    total: number;
    succeeded: number;
    failed: number;
    warnings: number;
  };
  executionContext: {
    user: string;
    workingDirectory: string;
    cliVersion?: string;
    dryRun: boolean;
  };
}

export interface CreateCommandResultsOptions {
  command: string;
  environment: string;
  startTime: number;
  results: CommandResult[];
  dryRun: boolean;
  warnings?: number;
  cliVersion?: string;
}

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env.USER ?? 'unknown';
  }
}

export function createCommandResults(options: CreateCommandResultsOptions): CommandResults {
  const succeeded = options.results.filter(r => r.success).length;
  return {
    command: options.command,
    environment: options.environment,
    timestamp: new Date(),
    duration: Date.now() - options.startTime,
    results: options.results,
    summary: {
      total: options.results.length,
      succeeded,
      failed: options.results.length - succeeded,
      warnings: options.warnings ?? 0,
    },
    executionContext: {
      user: currentUser(),
      workingDirectory: process.cwd(),
      cliVersion: options.cliVersion,
      dryRun: options.dryRun,
    },
  };
}
