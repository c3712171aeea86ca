/**
 * Load Balancer Service Interface
 *
 * Provides abstraction for target registration across cloud providers.
 * Implemented by the AWS ELBv2 (ALB/NLB) Service.
 */

import type { TargetHealthDescription } from "../types/loadbalancer";

/**
 * Interface for managing load balancer target membership.
 */
export interface ILoadBalancerService {
  /**
   * Register an instance with a target group. Safe to repeat.
   *
   * @param targetGroupId - Target group ARN or ID
   * @param instanceId - Instance to register
   */
  registerTarget(targetGroupId: string, instanceId: string): Promise<void>;

  /**
   * List the targets of a target group together with their health.
   *
   * @param targetGroupId - Target group ARN or ID
   */
  describeTargetHealth(targetGroupId: string): Promise<TargetHealthDescription[]>;
}
