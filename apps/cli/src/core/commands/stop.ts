/**
 * Stop Command
 *
 * Stops a runtime started with `start --detach`.
 */

import { z } from 'zod';
import { defineCommand, withBaseArgs } from '../command-definition.js';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { executeLifecycleCommand } from '../command-executor.js';

export const StopOptionsSchema = BaseOptionsSchema.extend({
  force: z.boolean().default(false).describe('Kill without a graceful shutdown'),
  timeout: z.number().int().positive().default(30).describe('Seconds to wait for a graceful shutdown'),
});

export type StopOptions = z.output<typeof StopOptionsSchema>;

export const stopCommand = defineCommand({
  name: 'stop',
  description: 'Stop a detached runtime',
  schema: StopOptionsSchema,
  argSpec: withBaseArgs(
    {
      '--force': { type: 'boolean', description: 'Kill without a graceful shutdown', default: false },
      '--timeout': { type: 'number', description: 'Seconds to wait for a graceful shutdown', default: 30 },
    },
    { '-f': '--force' }
  ),
  requiresEnvironment: true,
  examples: [
    'runbox stop -e local',
    'runbox stop -e container --force',
  ],
  handler: (options: StopOptions) => executeLifecycleCommand('stop', options),
});
