export type { IComputeService } from "./compute-service";
export type { ILoadBalancerService } from "./loadbalancer-service";
