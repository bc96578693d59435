/**
 * Bootstrap errors
 *
 * Each error names the bootstrap step that failed. All of them are fatal:
 * the command stops and nothing past the failing step runs.
 */

export type BootstrapStep = 'isolate' | 'install' | 'declare-port' | 'launch';

export class BootstrapError extends Error {
  constructor(
    message: string,
    public readonly step: BootstrapStep,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BootstrapError';
  }
}

export class EnvironmentIsolationError extends BootstrapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'isolate', options);
    this.name = 'EnvironmentIsolationError';
  }
}

export class DependencyInstallError extends BootstrapError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderrTail: string[] = []
  ) {
    super(message, 'install');
    this.name = 'DependencyInstallError';
  }
}

export class EntrypointMissingError extends BootstrapError {
  constructor(public readonly script: string) {
    super(`Entry point not found: ${script}`, 'launch');
    this.name = 'EntrypointMissingError';
  }
}

export class LaunchError extends BootstrapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'launch', options);
    this.name = 'LaunchError';
  }
}

/**
 * The runtime was never provisioned, or the manifest changed since
 */
export class NotProvisionedError extends BootstrapError {
  constructor(message: string, public readonly stale: boolean = false) {
    super(message, 'launch');
    this.name = 'NotProvisionedError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
