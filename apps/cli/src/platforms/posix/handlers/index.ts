import type { AnyHandlerDescriptor } from '../../../core/handlers/types.js';
import { runtimeProvisionDescriptor } from './runtime-provision.js';
import { runtimeStartDescriptor } from './runtime-start.js';
import { runtimeCheckDescriptor } from './runtime-check.js';
import { runtimeStopDescriptor } from './runtime-stop.js';

/**
 * All POSIX platform handler descriptors
 */
export const posixHandlers: AnyHandlerDescriptor[] = [
  runtimeProvisionDescriptor,
  runtimeStartDescriptor,
  runtimeCheckDescriptor,
  runtimeStopDescriptor,
];
