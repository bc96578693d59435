/**
 * Platform registration
 *
 * Registers every platform's handlers with a registry. Registering twice
 * replaces the same entries.
 */

import { HandlerRegistry } from '../core/handlers/registry.js';
import { posixHandlers } from './posix/handlers/index.js';
import { containerHandlers } from './container/handlers/index.js';

export function registerPlatformHandlers(registry: HandlerRegistry = HandlerRegistry.getInstance()): HandlerRegistry {
  registry.registerHandlers(posixHandlers);
  registry.registerHandlers(containerHandlers);
  return registry;
}
