/**
 * Start Command
 *
 * Declares the port and launches the entry point from the provisioned
 * runtime. In the foreground runbox exits with the entry point's code.
 */

import { z } from 'zod';
import { defineCommand, withBaseArgs } from '../command-definition.js';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { executeLifecycleCommand } from '../command-executor.js';

export const StartOptionsSchema = BaseOptionsSchema.extend({
  detach: z.boolean().default(false),
});

export type StartOptions = z.output<typeof StartOptionsSchema>;

export const startCommand = defineCommand({
  name: 'start',
  description: 'Launch the entry point in the provisioned runtime',
  schema: StartOptionsSchema,
  argSpec: withBaseArgs(
    {
      '--detach': { type: 'boolean', description: 'Run in the background and return', default: false },
    },
    { '-d': '--detach' }
  ),
  requiresEnvironment: true,
  examples: [
    'runbox start -e local',
    'runbox start -e container --detach',
  ],
  handler: (options: StartOptions) => executeLifecycleCommand('start', options),
});
