/**
 * Platform-specific Resource Types
 *
 * The resource identifiers each platform produces when it provisions or
 * starts a runtime. They are persisted in state for later commands.
 */

import { z } from 'zod';

export const PosixResourcesSchema = z.object({
  environmentPath: z.string(),
  pid: z.number().int().positive().optional(),
  logFile: z.string().optional(),
});

export const ContainerResourcesSchema = z.object({
  runtime: z.enum(['docker', 'podman']),
  image: z.string(),
  imageId: z.string().optional(),
  containerName: z.string().optional(),
  containerId: z.string().optional(),
});

export type PosixResources = z.infer<typeof PosixResourcesSchema>;
export type ContainerResources = z.infer<typeof ContainerResourcesSchema>;

/**
 * Discriminated union of all platform resources
 */
export const PlatformResourcesSchema = z.discriminatedUnion('platform', [
  z.object({ platform: z.literal('posix'), data: PosixResourcesSchema }),
  z.object({ platform: z.literal('container'), data: ContainerResourcesSchema }),
]);

export type PlatformResources = z.infer<typeof PlatformResourcesSchema>;
