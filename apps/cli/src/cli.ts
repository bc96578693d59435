/**
 * runbox CLI entry point
 *
 * Dispatches to the command loader, which handles parsing, validation,
 * execution, output and the exit code.
 */

import { getPreamble, getPreambleSeparator } from './core/io/cli-colors.js';
import { printError } from './core/io/cli-logger.js';
import { executeCommand, getAvailableCommands, generateGlobalHelp, getVersion } from './core/command-loader.js';

function printHelp(): void {
  console.log(getPreamble(getVersion()));
  console.log(getPreambleSeparator());
  console.log();
  console.log(generateGlobalHelp());
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printHelp();
    return 0;
  }

  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`runbox v${getVersion()}`);
    return 0;
  }

  const command = args[0];
  const availableCommands = getAvailableCommands();
  if (!availableCommands.includes(command)) {
    printError(`Unknown command: ${command}`);
    console.log(`Available commands: ${availableCommands.join(', ')}`);
    console.log(`Run 'runbox --help' for more information.`);
    return 1;
  }

  return executeCommand(command, args.slice(1));
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    printError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
