/**
 * Build recipe generation for the container platform
 *
 * The recipe isolates with a virtual environment at /opt/venv, installs the
 * manifest before the source is copied so the dependency layer stays cached,
 * declares the port and runs the entry point as PID 1.
 */

import type { EnvironmentConfig } from '@runbox/core';

export const CONTAINER_VENV = '/opt/venv';
export const CONTAINER_WORKDIR = '/app';
export const RECIPE_DIR = '.runbox';
export const RECIPE_FILE = 'Dockerfile';

const IGNORED_PATHS = ['.venv', '.runbox', 'state', '.git'];

/**
 * Render the Dockerfile for an environment
 *
 * @param manifestFiles - Manifest and the files it includes, relative to the project root
 */
export function renderDockerfile(config: EnvironmentConfig, manifestFiles: string[]): string {
  const lines: string[] = [
    `# Generated by runbox for ${config.name} (${config._metadata.environment})`,
    `FROM ${config.runtime.baseImage}`,
    '',
    `ENV VIRTUAL_ENV=${CONTAINER_VENV}`,
    `RUN ${config.runtime.interpreter} -m venv $VIRTUAL_ENV`,
    'ENV PATH="$VIRTUAL_ENV/bin:$PATH"',
    '',
    `WORKDIR ${CONTAINER_WORKDIR}`,
  ];

  for (const file of manifestFiles) {
    lines.push(`COPY ${toPosix(file)} ./${toPosix(file)}`);
  }
  lines.push(`RUN pip install -r ${toPosix(config.manifest)}`);
  lines.push('');

  if (config.systemPackages.upgrade) {
    lines.push('RUN apt update && apt -y upgrade');
  }

  const cmd = [config.entrypoint.interpreter, config.entrypoint.script, ...config.entrypoint.args];
  lines.push('COPY . .');
  lines.push(`EXPOSE ${config.port}`);
  lines.push(`CMD [${cmd.map(part => JSON.stringify(part)).join(', ')}]`);

  return lines.join('\n') + '\n';
}

export function renderDockerignore(): string {
  return IGNORED_PATHS.join('\n') + '\n';
}

function toPosix(file: string): string {
  return file.split('\\').join('/');
}
