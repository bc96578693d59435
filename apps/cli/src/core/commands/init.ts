/**
 * Init Command
 *
 * Scaffolds a runbox project in a directory:
 * - runbox.json: project name and defaults (entry point, manifest, port)
 * - environments/local.json: the POSIX platform with a .venv environment
 * - environments/container.json: the container platform
 * - requirements.txt and .gitignore, only when absent
 *
 * Existing configuration is kept unless --force is given.
 */

import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { PROJECT_FILE, errorMessage } from '@runbox/core';
import { defineCommand, withBaseArgs, type CommandOutcome } from '../command-definition.js';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { createCommandResult } from '../command-result.js';
import { createCommandResults } from '../command-results.js';
import { printSuccess, printWarning } from '../io/cli-logger.js';

export const InitOptionsSchema = BaseOptionsSchema.extend({
  name: z.string().optional(),
  directory: z.string().optional(),
  port: z.number().int().min(1).max(65535).default(8080),
  force: z.boolean().default(false),
});

export type InitOptions = z.output<typeof InitOptionsSchema>;

interface ScaffoldFile {
  /** Path relative to the project directory */
  target: string;
  template: string;
  /** Written over an existing file only with --force */
  overwrite: boolean;
}

const SCAFFOLD: ScaffoldFile[] = [
  { target: PROJECT_FILE, template: 'runbox.json', overwrite: true },
  { target: path.join('environments', 'local.json'), template: path.join('environments', 'local.json'), overwrite: true },
  { target: path.join('environments', 'container.json'), template: path.join('environments', 'container.json'), overwrite: true },
  { target: '.gitignore', template: 'gitignore', overwrite: false },
];

export function getTemplatesDir(env: Record<string, string | undefined> = process.env): string {
  if (env.RUNBOX_TEMPLATES_DIR) {
    return env.RUNBOX_TEMPLATES_DIR;
  }
  // src/core/commands -> package root
  return path.join(path.dirname(fileURLToPath(import.meta.url)), '..', '..', '..', 'templates');
}

/**
 * Project names become image names, so they follow the image naming rules
 */
export function toProjectName(raw: string): string {
  const name = raw
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/[._-]{2,}/g, '-')
    .replace(/^[._-]+|[._-]+$/g, '');
  return name || 'app';
}

export function renderTemplate(content: string, replacements: Record<string, string>): string {
  let rendered = content;
  for (const [key, value] of Object.entries(replacements)) {
    rendered = rendered.split(`{{${key}}}`).join(value);
  }
  return rendered;
}

async function init(options: InitOptions): Promise<CommandOutcome> {
  const startTime = Date.now();
  const projectDir = path.resolve(options.directory ?? process.cwd());
  const projectName = toProjectName(options.name ?? path.basename(projectDir));
  const templatesDir = getTemplatesDir();
  const replacements = { PROJECT_NAME: projectName, PORT: String(options.port) };

  const finish = (success: boolean, files: string[], error?: string): CommandOutcome => ({
    results: createCommandResults({
      command: 'init',
      environment: 'none',
      startTime,
      dryRun: options.dryRun,
      results: [
        createCommandResult(
          { entity: projectName, platform: 'posix', success, error, metadata: { projectDir } },
          { status: success ? (options.dryRun ? 'planned' : 'initialized') : 'failed', files }
        ),
      ],
    }),
  });

  if (fs.existsSync(path.join(projectDir, PROJECT_FILE)) && !options.force) {
    return finish(false, [], `${PROJECT_FILE} already exists in ${projectDir}. Use --force to overwrite`);
  }

  const written: string[] = [];
  try {
    for (const file of SCAFFOLD) {
      const destination = path.join(projectDir, file.target);
      if (fs.existsSync(destination) && !(file.overwrite && options.force)) {
        continue;
      }
      written.push(file.target);
      if (options.dryRun) continue;

      const content = renderTemplate(fs.readFileSync(path.join(templatesDir, file.template), 'utf-8'), replacements);
      fs.mkdirSync(path.dirname(destination), { recursive: true });
      fs.writeFileSync(destination, content);
    }

    const manifest = path.join(projectDir, 'requirements.txt');
    if (!fs.existsSync(manifest)) {
      written.push('requirements.txt');
      if (!options.dryRun) {
        fs.writeFileSync(manifest, '# One requirement per line, e.g. flask==2.0.0\n');
      }
    }
  } catch (error) {
    return finish(false, written, errorMessage(error));
  }

  if (!options.dryRun) {
    printSuccess(`Initialized runbox project '${projectName}' in ${projectDir}`);
    if (!fs.existsSync(path.join(projectDir, 'main.py'))) {
      printWarning('No main.py yet; add your entry point before running start');
    }
  }
  return finish(true, written);
}

export const initCommand = defineCommand({
  name: 'init',
  description: 'Create runbox.json and environment files in a project directory',
  schema: InitOptionsSchema,
  argSpec: withBaseArgs(
    {
      '--name': { type: 'string', description: 'Project name (defaults to the directory name)' },
      '--directory': { type: 'string', description: 'Project directory (defaults to the current one)' },
      '--port': { type: 'number', description: 'Port the entry point listens on', default: 8080 },
      '--force': { type: 'boolean', description: 'Overwrite existing configuration', default: false },
    },
    { '-f': '--force' }
  ),
  requiresEnvironment: false,
  examples: [
    'runbox init',
    'runbox init --name cat-sim --port 8080',
    'runbox init --force',
  ],
  handler: init,
});
