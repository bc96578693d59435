/**
 * Virtual environment activation
 *
 * Activation is the process environment every later step runs with:
 * VIRTUAL_ENV set, the environment's bin directory first on PATH, and
 * PYTHONHOME removed so the host interpreter's library path cannot leak in.
 */

import * as path from 'path';

export type ProcessEnv = Record<string, string | undefined>;

/**
 * An environment that exists on disk, activated.
 * Installation and launch both take one, so activation always comes first.
 * Callers activate a root only after creating it or checking it is there.
 */
export class IsolatedEnvironment {
  readonly binDir: string;
  /** Interpreter inside the environment */
  readonly python: string;

  private constructor(
    readonly root: string,
    readonly env: Readonly<Record<string, string>>
  ) {
    this.binDir = path.join(root, 'bin');
    this.python = path.join(this.binDir, 'python');
  }

  /**
   * Activate an environment root
   *
   * @param root - Absolute path to the virtual environment
   * @param base - Environment to inherit from
   * @param extra - Variables from configuration; cannot override activation
   */
  static activate(root: string, base: ProcessEnv, extra: Record<string, string> = {}): IsolatedEnvironment {
    return new IsolatedEnvironment(root, Object.freeze(activationEnv(root, { ...base, ...extra })));
  }
}

/**
 * Build the activated process environment for an environment root
 */
export function activationEnv(root: string, base: ProcessEnv, pathDelimiter: string = path.delimiter): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined && key !== 'PYTHONHOME') {
      env[key] = value;
    }
  }
  const binDir = path.join(root, 'bin');
  env.VIRTUAL_ENV = root;
  env.PATH = base.PATH ? `${binDir}${pathDelimiter}${base.PATH}` : binDir;
  return env;
}
