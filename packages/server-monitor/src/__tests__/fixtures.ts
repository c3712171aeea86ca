import type {
  IComputeService,
  ILoadBalancerService,
  InstanceLifecycleState,
  InstanceSnapshot,
  InstanceTermination,
  TargetHealthDescription,
} from "@transitops/adapters-common";
import type { Clock } from "../clock";
import {
  parseDeploymentDescriptor,
  DeploymentDescriptor,
  DeploymentDescriptorInput,
  InstanceDescriptor,
} from "../config";

export const TARGET_GROUP_ARN =
  "arn:aws:elasticloadbalancing:us-east-1:123456789012:targetgroup/routers/0123456789abcdef";
export const INSTANCE_ID = "i-0abc123";
export const PUBLIC_IP = "203.0.113.10";
export const STATUS_URL = `http://${PUBLIC_IP}/status.json`;
export const ROUTER_URL = `http://${PUBLIC_IP}/otp/routers/default`;
export const LOG_PATH = `s3://test-bucket/deployments/dep-1/${INSTANCE_ID}-runner.log`;

export const PENDING: InstanceLifecycleState = { code: 0, name: "pending" };
export const RUNNING: InstanceLifecycleState = { code: 16, name: "running" };
export const SHUTTING_DOWN: InstanceLifecycleState = { code: 32, name: "shutting-down" };
export const TERMINATED: InstanceLifecycleState = { code: 48, name: "terminated" };
export const STOPPING: InstanceLifecycleState = { code: 64, name: "stopping" };
export const STOPPED: InstanceLifecycleState = { code: 80, name: "stopped" };

/** Marker for a status document request that fails at the transport level */
export const NETWORK_ERROR = Symbol("network-error");

export const makeDeployment = (
  overrides?: Partial<DeploymentDescriptorInput>,
): DeploymentDescriptor =>
  parseDeploymentDescriptor({
    deploymentId: "dep-1",
    targetGroupArn: TARGET_GROUP_ARN,
    logFolderUri: "s3://test-bucket/deployments/dep-1",
    ...overrides,
  });

export const makeInstance = (overrides?: Partial<InstanceDescriptor>): InstanceDescriptor => ({
  instanceId: INSTANCE_ID,
  publicIpAddress: PUBLIC_IP,
  ...overrides,
});

/**
 * Clock whose sleep advances time instantly.
 */
export class FakeClock implements Clock {
  private current: number;
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export class FakeComputeService implements IComputeService {
  /** State reported at a given time; undefined = instance not listed */
  stateAt: (now: number) => InstanceLifecycleState | undefined = () => RUNNING;
  terminationState: InstanceLifecycleState | undefined = SHUTTING_DOWN;

  readonly describeInstance = jest.fn(
    async (instanceId: string): Promise<InstanceSnapshot | undefined> => {
      const state = this.stateAt(this.clock.now());
      return state ? { instanceId, publicIpAddress: PUBLIC_IP, state } : undefined;
    },
  );

  readonly terminateInstance = jest.fn(
    async (instanceId: string): Promise<InstanceTermination | undefined> => ({
      instanceId,
      previousState: RUNNING,
      currentState: this.terminationState,
    }),
  );

  constructor(private readonly clock: Clock) {}
}

export class FakeLoadBalancerService implements ILoadBalancerService {
  /** Registrations before this time are accepted but not yet listed */
  listTargetsFrom = 0;
  readonly targets = new Set<string>();

  readonly registerTarget = jest.fn(async (_targetGroupId: string, instanceId: string) => {
    if (this.clock.now() >= this.listTargetsFrom) {
      this.targets.add(instanceId);
    }
  });

  readonly describeTargetHealth = jest.fn(
    async (_targetGroupId: string): Promise<TargetHealthDescription[]> =>
      [...this.targets].map((targetId) => ({ targetId, state: "initial" })),
  );

  constructor(private readonly clock: Clock) {}
}

/**
 * Stands in for the HTTP endpoints served by a launched instance.
 */
export class FakeInstanceEndpoints {
  /** Status document at a given time; undefined = 404 */
  statusDocument: (now: number) => unknown = () => undefined;
  routerUp: (now: number) => boolean = () => false;

  readonly fetch = jest.fn(async (url: string, _init?: RequestInit): Promise<Response> => {
    const now = this.clock.now();
    if (url === STATUS_URL) {
      const document = this.statusDocument(now);
      if (document === NETWORK_ERROR) throw new TypeError("fetch failed");
      if (document === undefined) return new Response("Not Found", { status: 404 });
      return new Response(JSON.stringify(document), {
        status: 200,
        headers: { "content-type": "application/json" },
      });
    }
    if (url === ROUTER_URL) {
      return this.routerUp(now)
        ? new Response('{"routerId":"default"}', { status: 200 })
        : new Response("Service Unavailable", { status: 503 });
    }
    throw new TypeError("fetch failed");
  });

  constructor(private readonly clock: Clock) {}
}
