import {
  EC2Client,
  DescribeInstancesCommand,
  TerminateInstancesCommand,
  Instance,
  InstanceState,
} from "@aws-sdk/client-ec2";
import type {
  IComputeService,
  InstanceLifecycleState,
  InstanceSnapshot,
  InstanceTermination,
} from "@transitops/adapters-common";
import type { AwsLogCallback } from "../types";

export class EC2Service implements IComputeService {
  constructor(
    private readonly client: EC2Client,
    private readonly log: AwsLogCallback = () => undefined,
  ) {}

  /**
   * Describe a single instance by ID. Returns undefined when no reservation
   * lists the instance, which happens briefly after launch.
   */
  async describeInstance(instanceId: string): Promise<InstanceSnapshot | undefined> {
    const result = await this.client.send(
      new DescribeInstancesCommand({ InstanceIds: [instanceId] }),
    );

    for (const reservation of result.Reservations ?? []) {
      for (const instance of reservation.Instances ?? []) {
        if (instance.InstanceId === instanceId) {
          return this.mapInstanceToSnapshot(instance, instanceId);
        }
      }
    }
    return undefined;
  }

  async terminateInstance(instanceId: string): Promise<InstanceTermination | undefined> {
    const result = await this.client.send(
      new TerminateInstancesCommand({ InstanceIds: [instanceId] }),
    );
    this.log(`Terminate requested: ${instanceId}`);

    const change = result.TerminatingInstances?.[0];
    if (!change) return undefined;

    return {
      instanceId: change.InstanceId ?? instanceId,
      previousState: this.mapState(change.PreviousState),
      currentState: this.mapState(change.CurrentState),
    };
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  private mapInstanceToSnapshot(instance: Instance, instanceId: string): InstanceSnapshot {
    return {
      instanceId,
      publicIpAddress: instance.PublicIpAddress,
      state: this.mapState(instance.State) ?? { code: 0, name: "pending" },
    };
  }

  private mapState(state: InstanceState | undefined): InstanceLifecycleState | undefined {
    if (state?.Code === undefined) return undefined;
    return { code: state.Code, name: state.Name ?? "unknown" };
  }
}
