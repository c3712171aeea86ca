export type {
  InstanceLifecycleState,
  InstanceSnapshot,
  InstanceTermination,
} from "./compute";
export type { TargetHealthDescription } from "./loadbalancer";
