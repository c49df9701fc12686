/**
 * Compute resource registry module.
 *
 * @module
 */

export { ResourceRegistry } from './registry.js';
export type { ComputeResource, ResourceSpec } from './types.js';
