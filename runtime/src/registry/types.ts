/**
 * Types for the compute resource registry
 * @module
 */

/** Hardware capacity and price a provider lists. */
export interface ResourceSpec {
  /** GPU units */
  gpu: number;
  /** CPU cores */
  cpu: number;
  /** Memory in GB */
  ram: number;
  /** Price per hour in lamports */
  hourlyRate: bigint;
}

/** A listed compute offer. Immutable after listing. */
export interface ComputeResource extends ResourceSpec {
  resourceId: number;
  provider: string;
  /**
   * Initialised to true and never read or toggled by any operation; kept
   * for a future reservation feature.
   */
  available: boolean;
  createdAtHeight: number;
}
