/**
 * @modgate/module-loader
 *
 * modgate module loader — bundle descriptor validation and the registry of
 * loaded modules.
 */

export type { LoadResult } from './loader.js';
export { ModuleLoader, formatValidationError } from './loader.js';

export { ModuleRegistry } from './registry.js';

export type { DeliveryMode, LoadedBundle } from './validator.js';
export { DELIVERY_MODES, DescriptorValidator } from './validator.js';
