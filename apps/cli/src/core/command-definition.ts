/**
 * Command Definition - Unified structure for CLI command metadata
 *
 * A definition pairs the declarative argument spec (for parsing and help)
 * with the Zod schema that validates the parsed options and the handler
 * that runs with them.
 */

import { z } from 'zod';
import type { BaseOptions } from './base-options-schema.js';
import { BASE_ARGS, BASE_ALIASES } from './base-options-schema.js';
import type { CommandResults } from './command-results.js';
import { createArgParser } from './io/arg-parser.js';

/**
 * Declarative argument definition for CLI parsing
 */
export interface ArgDefinition {
  type: 'string' | 'boolean' | 'number' | 'array';
  description: string;
  default?: string | number | boolean;
  choices?: readonly string[];
  required?: boolean;
}

export interface ArgSpec {
  args: Record<string, ArgDefinition>;
  aliases?: Record<string, string>;
  positional?: string[];
}

/**
 * What a command hands back to the loader
 */
export interface CommandOutcome {
  results: CommandResults;
  /**
   * Exit code to use instead of the one derived from the summary.
   * Set by a foreground start, which exits with the application's code.
   */
  exitCode?: number;
}

export interface CommandDefinition<TOptions extends BaseOptions> {
  name: string;
  description: string;
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  argSpec: ArgSpec;
  requiresEnvironment: boolean;
  examples: string[];
  handler: (options: TOptions) => Promise<CommandOutcome>;
}

/**
 * A command whose options have been parsed and validated
 */
export interface PreparedCommand {
  options: BaseOptions;
  run(): Promise<CommandOutcome>;
}

/**
 * A command definition with its option type erased, so commands with
 * different options can share one table
 */
export interface RunnableCommand {
  name: string;
  description: string;
  argSpec: ArgSpec;
  requiresEnvironment: boolean;
  examples: string[];
  prepare(argv: string[]): PreparedCommand;
}

/**
 * Merge command-specific args with the common ones
 */
export function withBaseArgs(
  commandArgs: Record<string, ArgDefinition> = {},
  commandAliases: Record<string, string> = {}
): ArgSpec {
  return {
    args: { ...BASE_ARGS, ...commandArgs },
    aliases: { ...BASE_ALIASES, ...commandAliases },
  };
}

export function defineCommand<TOptions extends BaseOptions>(
  definition: CommandDefinition<TOptions>
): RunnableCommand {
  const parse = createArgParser(definition.argSpec, definition.schema);
  return {
    name: definition.name,
    description: definition.description,
    argSpec: definition.argSpec,
    requiresEnvironment: definition.requiresEnvironment,
    examples: definition.examples,
    prepare(argv: string[]): PreparedCommand {
      const options = parse(argv);
      return {
        options,
        run: () => definition.handler(options),
      };
    },
  };
}
