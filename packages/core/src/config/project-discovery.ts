/**
 * Project Discovery Module
 *
 * Finds the runbox project root: RUNBOX_ROOT when set, otherwise the
 * nearest ancestor of the starting directory that contains runbox.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from './configuration-error';

export const PROJECT_FILE = 'runbox.json';

/**
 * Check if a path looks like a runbox project root
 */
export function isProjectRoot(projectPath: string): boolean {
  return fs.existsSync(path.join(projectPath, PROJECT_FILE));
}

/**
 * Find project root
 *
 * @param startDir - Directory to start the upward search from
 * @param env - Process environment (RUNBOX_ROOT)
 * @throws ConfigurationError if no project can be found
 */
export function findProjectRoot(
  startDir: string = process.cwd(),
  env: Record<string, string | undefined> = process.env
): string {
  const root = env.RUNBOX_ROOT;

  if (root) {
    if (!fs.existsSync(root)) {
      throw new ConfigurationError(
        `RUNBOX_ROOT points to non-existent directory: ${root}`,
        undefined,
        'Check that the RUNBOX_ROOT environment variable is set correctly'
      );
    }
    if (!isProjectRoot(root)) {
      throw new ConfigurationError(
        `RUNBOX_ROOT does not contain ${PROJECT_FILE}: ${root}`,
        undefined,
        'Run `runbox init` in that directory first'
      );
    }
    return path.resolve(root);
  }

  let current = path.resolve(startDir);
  for (;;) {
    if (isProjectRoot(current)) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  throw new ConfigurationError(
    `No ${PROJECT_FILE} found in ${startDir} or any parent directory`,
    undefined,
    'Run `runbox init` to create a project, or set RUNBOX_ROOT'
  );
}

/**
 * Get the path to the environments directory
 */
export function getEnvironmentsPath(projectRoot: string): string {
  return path.join(projectRoot, 'environments');
}

/**
 * Get the path to runbox.json
 */
export function getProjectConfigPath(projectRoot: string): string {
  return path.join(projectRoot, PROJECT_FILE);
}
