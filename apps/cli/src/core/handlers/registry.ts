import type { PlatformType } from '@runbox/core';
import type { AnyHandlerDescriptor, HandlerCommand, HandlerDescriptor } from './types.js';

type HandlerTable = { [C in HandlerCommand]?: HandlerDescriptor<C> };

/**
 * Handler Registry
 *
 * Central registry of command handlers for every platform
 */
export class HandlerRegistry {
  private static instance: HandlerRegistry | undefined;
  private handlers: Map<PlatformType, HandlerTable> = new Map();

  static getInstance(): HandlerRegistry {
    if (!HandlerRegistry.instance) {
      HandlerRegistry.instance = new HandlerRegistry();
    }
    return HandlerRegistry.instance;
  }

  /**
   * Register a handler; a later registration for the same platform and
   * command replaces the earlier one
   */
  registerHandler<C extends HandlerCommand>(descriptor: HandlerDescriptor<C>): void {
    let table = this.handlers.get(descriptor.platform);
    if (!table) {
      table = {};
      this.handlers.set(descriptor.platform, table);
    }
    table[descriptor.command] = descriptor;
  }

  registerHandlers(descriptors: AnyHandlerDescriptor[]): void {
    for (const descriptor of descriptors) {
      this.registerHandler(descriptor);
    }
  }

  getHandler<C extends HandlerCommand>(platform: PlatformType, command: C): HandlerDescriptor<C> | undefined {
    return this.handlers.get(platform)?.[command];
  }
}
