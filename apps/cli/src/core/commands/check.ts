/**
 * Check Command
 *
 * Reports whether the runtime is provisioned from the current manifest,
 * whether the entry point and dependencies are present, and whether a
 * detached runtime is running.
 */

import { z } from 'zod';
import { defineCommand, withBaseArgs } from '../command-definition.js';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { executeLifecycleCommand } from '../command-executor.js';

export const CheckOptionsSchema = BaseOptionsSchema;

export type CheckOptions = z.output<typeof CheckOptionsSchema>;

export const checkCommand = defineCommand({
  name: 'check',
  description: 'Check the provisioned runtime',
  schema: CheckOptionsSchema,
  argSpec: withBaseArgs(),
  requiresEnvironment: true,
  examples: [
    'runbox check -e local',
    'runbox check -e container -o json',
  ],
  handler: (options: CheckOptions) => executeLifecycleCommand('check', options),
});
