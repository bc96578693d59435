/**
 * Provision Command
 *
 * Creates the isolated runtime and installs the dependency manifest into
 * it: a virtual environment on posix, an image on container. Provisioning
 * happens once; start reuses the result.
 */

import { z } from 'zod';
import { defineCommand, withBaseArgs } from '../command-definition.js';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { executeLifecycleCommand } from '../command-executor.js';

export const ProvisionOptionsSchema = BaseOptionsSchema.extend({
  force: z.boolean().default(false),
  destroy: z.boolean().default(false),
});

export type ProvisionOptions = z.output<typeof ProvisionOptionsSchema>;

export const provisionCommand = defineCommand({
  name: 'provision',
  description: 'Create the isolated runtime and install dependencies',
  schema: ProvisionOptionsSchema,
  argSpec: withBaseArgs(
    {
      '--force': { type: 'boolean', description: 'Rebuild even if the manifest is unchanged', default: false },
      '--destroy': { type: 'boolean', description: 'Remove the provisioned runtime', default: false },
    },
    { '-f': '--force' }
  ),
  requiresEnvironment: true,
  examples: [
    'runbox provision -e local',
    'runbox provision -e container --force',
    'runbox provision -e local --dry-run',
    'runbox provision -e local --destroy',
  ],
  handler: (options: ProvisionOptions) => executeLifecycleCommand('provision', options),
});
