/**
 * Compute service type definitions.
 *
 * Shared types for cloud compute operations across providers.
 */

/**
 * Lifecycle state of a compute instance as reported by the control plane.
 */
export interface InstanceLifecycleState {
  /** Numeric state code (EC2: 0 pending, 16 running, 32 shutting-down, 48 terminated, 64 stopping, 80 stopped) */
  code: number;
  /** Provider state name (e.g., "running", "terminated") */
  name: string;
}

/**
 * Point-in-time view of one compute instance.
 */
export interface InstanceSnapshot {
  /** Provider-assigned instance ID */
  instanceId: string;
  /** Public IP address (if assigned) */
  publicIpAddress?: string;
  /** Current lifecycle state */
  state: InstanceLifecycleState;
}

/**
 * Result of a terminate request for one instance.
 */
export interface InstanceTermination {
  instanceId: string;
  previousState?: InstanceLifecycleState;
  currentState?: InstanceLifecycleState;
}
