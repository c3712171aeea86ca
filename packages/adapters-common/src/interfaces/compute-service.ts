/**
 * Compute Service Interface
 *
 * Provides abstraction for compute instance operations across cloud providers.
 * Implemented by the AWS EC2 Service.
 */

import type { InstanceSnapshot, InstanceTermination } from "../types/compute";

/**
 * Interface for inspecting and terminating compute instances.
 */
export interface IComputeService {
  /**
   * Describe a single compute instance.
   *
   * @param instanceId - Provider instance ID
   * @returns The instance snapshot, or undefined when the control plane does
   *   not (yet) report the instance
   */
  describeInstance(instanceId: string): Promise<InstanceSnapshot | undefined>;

  /**
   * Request termination of a compute instance. Idempotent on the provider side.
   *
   * @param instanceId - Provider instance ID
   * @returns The resulting state change, if the provider reported one
   */
  terminateInstance(instanceId: string): Promise<InstanceTermination | undefined>;
}
