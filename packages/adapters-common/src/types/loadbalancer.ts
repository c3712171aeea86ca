/**
 * Load balancer service type definitions.
 *
 * Shared types for cloud load balancer operations across providers.
 */

/**
 * Health entry for one target registered with a target group / backend pool.
 */
export interface TargetHealthDescription {
  /** Target identifier (instance ID or IP) */
  targetId: string;
  /** Port the target receives traffic on */
  port?: number;
  /** Provider health state (e.g., "initial", "healthy", "unhealthy") */
  state?: string;
  /** Provider reason code for the current state */
  reason?: string;
}
