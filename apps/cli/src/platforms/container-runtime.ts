/**
 * Container Runtime - unified interface for Docker and Podman
 *
 * Detects which runtime is available and builds the argv for each
 * operation. Both runtimes take the same arguments for everything used here.
 */

import type { ContainerRuntimeName } from '@runbox/core';
import {
  runForeground,
  runProcess,
  type ForegroundExit,
  type ProcessOutcome,
} from '../core/io/process-runner.js';

// Cache the detected runtime to avoid repeated detection
let detectedRuntime: ContainerRuntimeName | null = null;

const DETECTION_ORDER: ContainerRuntimeName[] = ['docker', 'podman'];

/**
 * Detect which container runtime is available
 *
 * @param preferred - Runtime named in configuration; checked instead of detecting
 */
export async function detectContainerRuntime(preferred?: ContainerRuntimeName): Promise<ContainerRuntimeName> {
  if (preferred) {
    if (await isRuntimeAvailable(preferred)) {
      return preferred;
    }
    throw new Error(`Container runtime '${preferred}' is not available`);
  }

  if (detectedRuntime) {
    return detectedRuntime;
  }

  for (const runtime of DETECTION_ORDER) {
    if (await isRuntimeAvailable(runtime)) {
      detectedRuntime = runtime;
      return runtime;
    }
  }

  throw new Error('No container runtime found. Please install Docker or Podman.');
}

/**
 * Forget the cached detection (useful for testing)
 */
export function resetContainerRuntimeDetection(): void {
  detectedRuntime = null;
}

async function isRuntimeAvailable(runtime: ContainerRuntimeName): Promise<boolean> {
  try {
    const outcome = await runProcess(runtime, ['--version']);
    return outcome.code === 0;
  } catch {
    return false;
  }
}

export function imageReference(image: string, tag: string): string {
  return `${image}:${tag}`;
}

export function buildArgs(imageTag: string, dockerfile: string, context: string): string[] {
  return ['build', '-t', imageTag, '-f', dockerfile, context];
}

export interface RunArgsOptions {
  port: number;
  env?: Record<string, string>;
  /** Run in the background under this container name */
  detachAs?: string;
}

/**
 * argv for `run`: the container is removed when it exits and the declared
 * port is published on the same host port
 */
export function runArgs(imageTag: string, options: RunArgsOptions): string[] {
  const args = ['run', '--rm'];
  if (options.detachAs) {
    args.push('-d', '--name', options.detachAs);
  }
  args.push('-p', `${options.port}:${options.port}`);
  for (const [key, value] of Object.entries(options.env ?? {})) {
    args.push('-e', `${key}=${value}`);
  }
  args.push(imageTag);
  return args;
}

export function buildImage(
  runtime: ContainerRuntimeName,
  imageTag: string,
  dockerfile: string,
  context: string,
  options: { stream?: boolean } = {}
): Promise<ProcessOutcome> {
  return runProcess(runtime, buildArgs(imageTag, dockerfile, context), { cwd: context, stream: options.stream });
}

/**
 * Id of a local image, or undefined when it does not exist
 */
export async function inspectImageId(runtime: ContainerRuntimeName, imageTag: string): Promise<string | undefined> {
  const outcome = await runProcess(runtime, ['image', 'inspect', '--format', '{{.Id}}', imageTag]);
  const id = outcome.stdout.trim();
  return outcome.code === 0 && id ? id : undefined;
}

export async function removeImage(runtime: ContainerRuntimeName, imageTag: string): Promise<boolean> {
  const outcome = await runProcess(runtime, ['image', 'rm', imageTag]);
  return outcome.code === 0;
}

export function runContainerForeground(
  runtime: ContainerRuntimeName,
  imageTag: string,
  options: RunArgsOptions
): Promise<ForegroundExit> {
  return runForeground(runtime, runArgs(imageTag, { ...options, detachAs: undefined }));
}

/**
 * Start a container in the background
 *
 * @returns The container id
 */
export async function runContainerDetached(
  runtime: ContainerRuntimeName,
  imageTag: string,
  options: RunArgsOptions & { detachAs: string }
): Promise<string> {
  const outcome = await runProcess(runtime, runArgs(imageTag, options));
  if (outcome.code !== 0) {
    throw new Error(`Failed to start container ${options.detachAs}: ${outcome.stderr.trim()}`);
  }
  return outcome.stdout.trim();
}

export async function isContainerRunning(runtime: ContainerRuntimeName, containerName: string): Promise<boolean> {
  const outcome = await runProcess(runtime, ['container', 'inspect', '--format', '{{.State.Running}}', containerName]);
  return outcome.code === 0 && outcome.stdout.trim() === 'true';
}

/**
 * Stop a container; `force` kills it without a grace period
 */
export async function stopContainer(
  runtime: ContainerRuntimeName,
  containerName: string,
  options: { force?: boolean; timeout?: number } = {}
): Promise<boolean> {
  const args = options.force
    ? ['kill', containerName]
    : ['stop', '--time', String(options.timeout ?? 10), containerName];
  const outcome = await runProcess(runtime, args);
  return outcome.code === 0;
}
