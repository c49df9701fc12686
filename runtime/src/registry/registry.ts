/**
 * ResourceRegistry: compute offers listed by providers.
 *
 * @module
 */

import type { BlockClock } from '../adapters/types.js';
import type { StateStore } from '../state/store.js';
import { ValidationError, validateAmount, validateNonNegativeInteger } from '../types/errors.js';
import type { ComputeResource, ResourceSpec } from './types.js';

export class ResourceRegistry {
  constructor(
    private readonly store: StateStore,
    private readonly clock: BlockClock,
  ) {}

  /**
   * List a resource owned by `provider`. Capacities are only checked for
   * shape; a zero-capacity listing is accepted.
   *
   * Ids are sequential, starting at 1.
   */
  list(provider: string, spec: ResourceSpec): ComputeResource {
    validateResourceSpec(spec);

    const resource: ComputeResource = {
      resourceId: this.store.nextId('resource'),
      provider,
      gpu: spec.gpu,
      cpu: spec.cpu,
      ram: spec.ram,
      hourlyRate: spec.hourlyRate,
      available: true,
      createdAtHeight: this.clock.currentHeight(),
    };

    this.store.state.resources.set(resource.resourceId, resource);
    return { ...resource };
  }

  get(resourceId: number): ComputeResource | null {
    const resource = this.store.state.resources.get(resourceId);
    return resource ? { ...resource } : null;
  }

  listByProvider(provider: string): ComputeResource[] {
    return Array.from(this.store.state.resources.values())
      .filter((resource) => resource.provider === provider)
      .sort((a, b) => a.resourceId - b.resourceId)
      .map((resource) => ({ ...resource }));
  }
}

function validateResourceSpec(spec: ResourceSpec): void {
  validateNonNegativeInteger(spec.gpu, 'gpu');
  validateNonNegativeInteger(spec.cpu, 'cpu');
  validateNonNegativeInteger(spec.ram, 'ram');
  if (typeof spec.hourlyRate !== 'bigint') {
    throw new ValidationError('hourlyRate must be a bigint');
  }
  validateAmount(spec.hourlyRate, 'hourlyRate');
}
