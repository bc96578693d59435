/**
 * Command Loader - command table and execution lifecycle
 *
 * Parses arguments with the command's schema, prints the preamble, runs
 * the handler, formats the results and works out the exit code.
 */

import * as fs from 'fs';
import { ConfigurationError } from '@runbox/core';
import type { RunnableCommand } from './command-definition.js';
import { generateHelp } from './io/arg-parser.js';
import { OutputFormatter } from './io/output-formatter.js';
import { printError, setSuppressOutput } from './io/cli-logger.js';
import { getPreamble, getPreambleSeparator } from './io/cli-colors.js';
import type { BaseOptions } from './base-options-schema.js';
import { initCommand } from './commands/init.js';
import { provisionCommand } from './commands/provision.js';
import { startCommand } from './commands/start.js';
import { checkCommand } from './commands/check.js';
import { stopCommand } from './commands/stop.js';
import { registerPlatformHandlers } from '../platforms/index.js';

const COMMANDS: readonly RunnableCommand[] = [
  initCommand,
  provisionCommand,
  startCommand,
  checkCommand,
  stopCommand,
];

/**
 * CLI version from the package manifest
 */
export function getVersion(): string {
  try {
    const manifest: unknown = JSON.parse(
      fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
    );
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch {
    return '0.0.0';
  }
  return '0.0.0';
}

export function getAvailableCommands(): string[] {
  return COMMANDS.map(command => command.name);
}

export function loadCommand(name: string): RunnableCommand | undefined {
  return COMMANDS.find(command => command.name === name);
}

/**
 * The preamble only goes with human-readable output
 */
function printPreamble(options: BaseOptions): void {
  if (options.output !== 'summary' || options.quiet) {
    return;
  }
  console.log(getPreamble(getVersion()));
  console.log(getPreambleSeparator());
}

function describeError(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return error.toString();
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Execute a command with full lifecycle management
 *
 * @returns The exit code for the process
 */
export async function executeCommand(commandName: string, argv: string[]): Promise<number> {
  const command = loadCommand(commandName);
  if (!command) {
    printError(`Unknown command: ${commandName}`);
    return 1;
  }

  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(generateHelp(command));
    return 0;
  }

  const previousSuppress = setSuppressOutput(false);
  try {
    const prepared = command.prepare(argv);
    const { options } = prepared;

    const structured = options.output !== 'summary';
    setSuppressOutput(structured || options.quiet);
    printPreamble(options);

    registerPlatformHandlers();
    const outcome = await prepared.run();

    const formatted = OutputFormatter.format(outcome.results, {
      format: options.output,
      quiet: options.quiet,
      verbose: options.verbose,
    });
    if (formatted.length > 0) {
      process.stdout.write(formatted.endsWith('\n') ? formatted : `${formatted}\n`);
    }

    if (outcome.exitCode !== undefined) {
      return outcome.exitCode;
    }
    return outcome.results.summary.failed > 0 ? 1 : 0;
  } catch (error) {
    printError(describeError(error));
    return 1;
  } finally {
    setSuppressOutput(previousSuppress);
  }
}

/**
 * Help text for all commands
 */
export function generateGlobalHelp(): string {
  const lines: string[] = [];

  lines.push('runbox - provision and launch an isolated Python runtime');
  lines.push('');
  lines.push('USAGE:');
  lines.push('  runbox <command> [options]');
  lines.push('');

  lines.push('COMMON PARAMETERS:');
  lines.push('  -e, --environment <name>   Target environment (required for most commands)');
  lines.push('  -v, --verbose              Enable verbose output');
  lines.push('  -q, --quiet                Suppress output except errors');
  lines.push('  -o, --output <format>      Output format: summary, json, yaml');
  lines.push('  --dry-run                  Print the bootstrap plan without executing it');
  lines.push('  --help                     Show help for a command');
  lines.push('');

  lines.push('ENVIRONMENT VARIABLES:');
  lines.push('  RUNBOX_ENV                 Environment to use when --environment is not provided');
  lines.push('  RUNBOX_ROOT                Project root directory (contains runbox.json)');
  lines.push('  RUNBOX_LOG_LEVEL           Log level: debug, info, warn, error');
  lines.push('');

  lines.push('COMMANDS:');
  for (const command of COMMANDS) {
    const envFlag = command.requiresEnvironment ? ' (requires -e)' : '';
    lines.push(`  ${command.name.padEnd(12)} ${command.description}${envFlag}`);
  }
  lines.push('');

  lines.push('EXAMPLES:');
  lines.push('  # Scaffold a project, then build and run it');
  lines.push('  runbox init');
  lines.push('  runbox provision -e local');
  lines.push('  runbox start -e local');
  lines.push('');
  lines.push('  # Same thing in a container, in the background');
  lines.push('  runbox provision -e container');
  lines.push('  runbox start -e container --detach');
  lines.push('');
  lines.push('  # Check with JSON output');
  lines.push('  runbox check -e local -o json');
  lines.push('');
  lines.push('For command-specific help:');
  lines.push('  runbox <command> --help');

  return lines.join('\n');
}
