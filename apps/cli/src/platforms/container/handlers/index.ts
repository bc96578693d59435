import type { AnyHandlerDescriptor } from '../../../core/handlers/types.js';
import { imageProvisionDescriptor } from './runtime-provision.js';
import { containerStartDescriptor } from './runtime-start.js';
import { containerCheckDescriptor } from './runtime-check.js';
import { containerStopDescriptor } from './runtime-stop.js';

/**
 * All container platform handler descriptors
 */
export const containerHandlers: AnyHandlerDescriptor[] = [
  imageProvisionDescriptor,
  containerStartDescriptor,
  containerCheckDescriptor,
  containerStopDescriptor,
];
