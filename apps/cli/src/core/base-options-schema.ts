/**
 * Base Options Schema - Zod schema for common command options
 *
 * Every command extends this schema, so the options a handler receives
 * always carry the common fields with their defaults applied.
 */

import { z } from 'zod';
import type { ArgDefinition } from './command-definition.js';

export const OUTPUT_FORMATS = ['summary', 'json', 'yaml'] as const;

export const BaseOptionsSchema = z.object({
  environment: z.string().optional(),
  verbose: z.boolean().optional().default(false),
  dryRun: z.boolean().optional().default(false),
  quiet: z.boolean().optional().default(false),
  output: z.enum(OUTPUT_FORMATS).optional().default('summary'),
});

export type BaseOptions = z.output<typeof BaseOptionsSchema>;

/**
 * Argument definitions matching BaseOptionsSchema
 */
export const BASE_ARGS: Record<string, ArgDefinition> = {
  '--environment': {
    type: 'string',
    description: 'Target environment',
  },
  '--verbose': {
    type: 'boolean',
    description: 'Verbose output',
    default: false,
  },
  '--dry-run': {
    type: 'boolean',
    description: 'Print the plan without executing it',
    default: false,
  },
  '--quiet': {
    type: 'boolean',
    description: 'Suppress output',
    default: false,
  },
  '--output': {
    type: 'string',
    description: 'Output format',
    choices: OUTPUT_FORMATS,
    default: 'summary',
  },
};

export const BASE_ALIASES: Record<string, string> = {
  '-e': '--environment',
  '-v': '--verbose',
  '-q': '--quiet',
  '-o': '--output',
};
