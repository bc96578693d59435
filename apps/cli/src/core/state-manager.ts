/**
 * State Manager - records what provision and start produced
 *
 * Two records per environment, under <projectRoot>/state/<environment>/:
 * - provision.json: written only after a successful provision; start
 *   compares its manifest digest with the current manifest
 * - run.json: written when a runtime is started detached; cleared by stop
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PlatformResourcesSchema } from '../platforms/platform-resources.js';

const PlatformTypeSchema = z.enum(['posix', 'container']);

export const ProvisionRecordSchema = z.object({
  environment: z.string(),
  platform: PlatformTypeSchema,
  provisionedAt: z.string(),
  manifestDigest: z.string(),
  manifestFiles: z.array(z.string()),
  requirements: z.array(z.string()),
  port: z.number().int(),
  entrypoint: z.array(z.string()),
  resources: PlatformResourcesSchema,
});

export const RunRecordSchema = z.object({
  environment: z.string(),
  platform: PlatformTypeSchema,
  startTime: z.string(),
  endpoint: z.string(),
  resources: PlatformResourcesSchema,
});

export type ProvisionRecord = z.infer<typeof ProvisionRecordSchema>;
export type RunRecord = z.infer<typeof RunRecordSchema>;

type RecordKind = 'provision' | 'run';

export class StateManager {
  static getStateDir(projectRoot: string, environment: string): string {
    return path.join(projectRoot, 'state', environment);
  }

  private static getStateFile(projectRoot: string, environment: string, kind: RecordKind): string {
    return path.join(this.getStateDir(projectRoot, environment), `${kind}.json`);
  }

  private static async write(projectRoot: string, environment: string, kind: RecordKind, record: unknown): Promise<void> {
    const stateFile = this.getStateFile(projectRoot, environment, kind);
    await fs.promises.mkdir(path.dirname(stateFile), { recursive: true });
    // Write then rename so a reader never sees a half-written record
    const tmpFile = `${stateFile}.tmp`;
    await fs.promises.writeFile(tmpFile, JSON.stringify(record, null, 2), 'utf-8');
    await fs.promises.rename(tmpFile, stateFile);
  }

  private static async read<T>(
    projectRoot: string,
    environment: string,
    kind: RecordKind,
    schema: z.ZodType<T>
  ): Promise<T | null> {
    const stateFile = this.getStateFile(projectRoot, environment, kind);
    let content: string;
    try {
      content = await fs.promises.readFile(stateFile, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      // A corrupted record counts as no record
      return null;
    }
    const parsed = schema.safeParse(data);
    return parsed.success ? parsed.data : null;
  }

  private static async remove(projectRoot: string, environment: string, kind: RecordKind): Promise<void> {
    await fs.promises.rm(this.getStateFile(projectRoot, environment, kind), { force: true });
  }

  static saveProvision(projectRoot: string, environment: string, record: ProvisionRecord): Promise<void> {
    return this.write(projectRoot, environment, 'provision', record);
  }

  static loadProvision(projectRoot: string, environment: string): Promise<ProvisionRecord | null> {
    return this.read(projectRoot, environment, 'provision', ProvisionRecordSchema);
  }

  static clearProvision(projectRoot: string, environment: string): Promise<void> {
    return this.remove(projectRoot, environment, 'provision');
  }

  static saveRun(projectRoot: string, environment: string, record: RunRecord): Promise<void> {
    return this.write(projectRoot, environment, 'run', record);
  }

  static loadRun(projectRoot: string, environment: string): Promise<RunRecord | null> {
    return this.read(projectRoot, environment, 'run', RunRecordSchema);
  }

  static clearRun(projectRoot: string, environment: string): Promise<void> {
    return this.remove(projectRoot, environment, 'run');
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
