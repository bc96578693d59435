/**
 * Argument Parser - parser generator for CLI arguments
 *
 * Turns a declarative ArgSpec into an arg parser, normalizes the result to
 * camelCase keys and validates it with the command's Zod schema.
 */

import arg from 'arg';
import { z } from 'zod';
import type { ArgSpec, RunnableCommand } from '../command-definition.js';

const ARG_TYPE_MAP = {
  string: String,
  boolean: Boolean,
  number: Number,
  array: [String],
} satisfies Record<string, arg.Handler | [arg.Handler]>;

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * Create a parser function for a command
 */
export function createArgParser<T>(
  spec: ArgSpec,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): (argv: string[]) => T {
  const argSpec = buildArgSpec(spec);

  return (argv: string[]) => {
    try {
      const rawArgs = arg(argSpec, { argv, permissive: false });
      return schema.parse(normalizeArgs(rawArgs, spec));
    } catch (error) {
      if (error instanceof arg.ArgError) {
        throw new ArgumentError(`Invalid arguments: ${error.message}`);
      }
      if (error instanceof z.ZodError) {
        const issues = error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
        throw new ArgumentError(`Invalid arguments:\n${issues}`);
      }
      throw error;
    }
  };
}

function buildArgSpec(spec: ArgSpec): arg.Spec {
  const result: arg.Spec = {};
  for (const [key, def] of Object.entries(spec.args)) {
    result[key] = ARG_TYPE_MAP[def.type];
  }
  if (spec.aliases) {
    Object.assign(result, spec.aliases);
  }
  return result;
}

/**
 * arg returns '--kebab-case' keys; schemas expect camelCase
 */
export function normalizeArgs(
  rawArgs: arg.Result<arg.Spec>,
  spec: ArgSpec
): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  if (spec.positional) {
    spec.positional.forEach((name, index) => {
      const value = rawArgs._[index];
      if (value !== undefined) {
        normalized[name] = value;
      }
    });
  }

  for (const [key, value] of Object.entries(rawArgs)) {
    if (key === '_' || value === undefined) continue;
    normalized[kebabToCamel(key.replace(/^--/, ''))] = value;
  }

  for (const [key, def] of Object.entries(spec.args)) {
    const normalizedKey = kebabToCamel(key.replace(/^--/, ''));
    if (normalized[normalizedKey] === undefined && def.default !== undefined) {
      normalized[normalizedKey] = def.default;
    }
  }

  return normalized;
}

export function kebabToCamel(str: string): string {
  return str.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * Generate help text from a command definition
 */
export function generateHelp(command: RunnableCommand): string {
  const lines: string[] = [];
  const { args, aliases } = command.argSpec;

  lines.push(`${command.name} - ${command.description}`);
  lines.push('');
  lines.push('OPTIONS:');

  const keys = Object.keys(args).map(key => {
    const keyAliases = findAliases(key, aliases);
    return keyAliases.length > 0 ? `${keyAliases.join(', ')}, ${key}` : key;
  });
  const width = Math.max(...keys.map(k => k.length)) + 2;

  Object.entries(args).forEach(([, def], index) => {
    let description = def.description;
    if (def.choices) {
      description += ` (${def.choices.join(', ')})`;
    }
    if (def.default !== undefined) {
      description += ` [default: ${def.default}]`;
    }
    if (def.required) {
      description += ' (required)';
    }
    lines.push(`  ${keys[index].padEnd(width)}${description}`);
  });

  if (command.examples.length > 0) {
    lines.push('');
    lines.push('EXAMPLES:');
    for (const example of command.examples) {
      lines.push(`  ${example}`);
    }
  }

  return lines.join('\n');
}

function findAliases(key: string, aliases?: Record<string, string>): string[] {
  if (!aliases) return [];
  return Object.entries(aliases)
    .filter(([, target]) => target === key)
    .map(([alias]) => alias);
}
