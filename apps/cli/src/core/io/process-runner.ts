/**
 * Process Runner - child process helpers shared by the platforms
 *
 * Three shapes of execution:
 * - runProcess: run to completion, capture output (optionally echo it)
 * - runForeground: hand the terminal to the child, forward signals, and
 *   resolve with the exit code the CLI should exit with
 * - spawnDetached: start in the background with output to a log file
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import { LaunchError } from '@runbox/core';

export interface RunProcessOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Echo output to this process's stdout/stderr while capturing it */
  stream?: boolean;
}

export interface ProcessOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface ForegroundOptions {
  cwd?: string;
  env?: Record<string, string>;
  forwardSignals?: NodeJS.Signals[];
  /** Whether stdin is a terminal; defaults to process.stdin.isTTY */
  terminal?: boolean;
}

export interface ForegroundExit {
  /** Exit code to propagate: the child's own, or 128 + signal number */
  exitCode: number;
  signal: NodeJS.Signals | null;
}

export const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Map a child's exit to a shell-style exit code
 */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal) {
    const number = os.constants.signals[signal];
    return typeof number === 'number' ? 128 + number : 1;
  }
  return 1;
}

/**
 * Last `count` non-empty lines of some output
 */
export function tailLines(output: string, count: number = 20): string[] {
  return output
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0)
    .slice(-count);
}

/**
 * Run a command to completion and capture its output.
 * Rejects only when the process cannot be spawned at all.
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions = {}
): Promise<ProcessOutcome> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
      if (options.stream) process.stdout.write(chunk);
    });
    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
      if (options.stream) process.stderr.write(chunk);
    });

    proc.on('error', (error) => {
      reject(error);
    });

    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ code, signal, stdout, stderr });
    });
  });
}

/**
 * Run a command as the foreground process.
 *
 * stdio is inherited. Signals this process receives are passed to the
 * child instead of terminating us, so the child decides how to shut down
 * and its exit code is what we report.
 */
export function runForeground(
  command: string,
  args: string[],
  options: ForegroundOptions = {}
): Promise<ForegroundExit> {
  const signals = options.forwardSignals ?? FORWARDED_SIGNALS;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: 'inherit',
    });

    // Ctrl-C at a terminal already reaches the child through the shared
    // process group, so SIGINT is only absorbed here
    const terminal = options.terminal ?? process.stdin.isTTY === true;
    const forwarders = new Map<NodeJS.Signals, () => void>();
    for (const signal of signals) {
      const forward = (): void => {
        if (!(terminal && signal === 'SIGINT')) {
          proc.kill(signal);
        }
      };
      forwarders.set(signal, forward);
      process.on(signal, forward);
    }

    const release = (): void => {
      for (const [signal, forward] of forwarders) {
        process.removeListener(signal, forward);
      }
    };

    proc.on('error', (error) => {
      release();
      reject(new LaunchError(`Failed to launch ${command}: ${error.message}`, { cause: error }));
    });

    proc.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      release();
      resolve({ exitCode: exitCodeFor(code, signal), signal });
    });
  });
}

/**
 * Start a command in the background, appending its output to `logFile`.
 *
 * @returns The child's pid
 */
export function spawnDetached(
  command: string,
  args: string[],
  options: { cwd?: string; env?: Record<string, string>; logFile: string }
): number {
  const logFd = fs.openSync(options.logFile, 'a');
  try {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      detached: true,
      stdio: ['ignore', logFd, logFd],
    });
    // A failed spawn also emits 'error' on the next tick; the missing pid below reports it
    proc.once('error', () => undefined);

    if (!proc.pid) {
      throw new LaunchError(`Failed to start ${command}`);
    }

    proc.unref();
    return proc.pid;
  } finally {
    fs.closeSync(logFd);
  }
}
