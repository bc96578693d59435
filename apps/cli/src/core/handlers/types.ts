import type { EnvironmentConfig, Logger, PlatformType } from '@runbox/core';
import type { BaseOptions } from '../base-options-schema.js';
import type { CommandExtensions } from '../command-result.js';

/**
 * Core handler types that every platform's handlers implement
 */

export interface ProvisionFlags {
  /** Rebuild even when the recorded manifest digest matches */
  force: boolean;
  /** Remove the provisioned runtime instead of creating it */
  destroy: boolean;
}

export interface StartFlags {
  /** Run in the background instead of as the foreground process */
  detach: boolean;
}

export interface StopFlags {
  force: boolean;
  /** Seconds to wait for a graceful shutdown */
  timeout: number;
}

export type CheckFlags = Record<never, never>;

/**
 * Command-specific options, keyed by the command that receives them
 */
export interface HandlerOptionsMap {
  provision: ProvisionFlags;
  start: StartFlags;
  check: CheckFlags;
  stop: StopFlags;
}

export type HandlerCommand = keyof HandlerOptionsMap;

export type HandlerOptions<C extends HandlerCommand> = BaseOptions & HandlerOptionsMap[C];

/**
 * Context provided to all handlers
 */
export interface HandlerContext<C extends HandlerCommand> {
  command: C;
  config: EnvironmentConfig;
  projectRoot: string;
  environment: string;
  options: HandlerOptions<C>;
  logger: Logger;
}

/**
 * Result that handlers return
 */
export interface HandlerResult {
  success: boolean;
  error?: string;
  metadata?: Record<string, unknown>;
  extensions: CommandExtensions;
  /**
   * Exit code the CLI should exit with, when it is the application's own.
   * Only a foreground start sets it.
   */
  exitCode?: number;
}

/**
 * A handler declares the platform and command it serves
 */
export interface HandlerDescriptor<C extends HandlerCommand> {
  command: C;
  platform: PlatformType;
  // Method syntax keeps descriptors for different commands in one list
  handler(context: HandlerContext<C>): Promise<HandlerResult>;
}

export type AnyHandlerDescriptor = { [C in HandlerCommand]: HandlerDescriptor<C> }[HandlerCommand];
