import {
  ElasticLoadBalancingV2Client,
  RegisterTargetsCommand,
  DescribeTargetHealthCommand,
  TargetHealthDescription as SdkTargetHealthDescription,
} from "@aws-sdk/client-elastic-load-balancing-v2";
import type {
  ILoadBalancerService,
  TargetHealthDescription,
} from "@transitops/adapters-common";
import type { AwsLogCallback } from "../types";

export class ELBv2Service implements ILoadBalancerService {
  constructor(
    private readonly client: ElasticLoadBalancingV2Client,
    private readonly log: AwsLogCallback = () => undefined,
  ) {}

  async registerTarget(targetGroupArn: string, instanceId: string): Promise<void> {
    await this.client.send(
      new RegisterTargetsCommand({
        TargetGroupArn: targetGroupArn,
        Targets: [{ Id: instanceId }],
      }),
    );
    this.log(`Register target requested: ${instanceId} → ${targetGroupArn}`);
  }

  async describeTargetHealth(targetGroupArn: string): Promise<TargetHealthDescription[]> {
    const result = await this.client.send(
      new DescribeTargetHealthCommand({ TargetGroupArn: targetGroupArn }),
    );

    const targets: TargetHealthDescription[] = [];
    for (const description of result.TargetHealthDescriptions ?? []) {
      const mapped = this.mapTargetHealth(description);
      if (mapped) targets.push(mapped);
    }
    return targets;
  }

  private mapTargetHealth(
    description: SdkTargetHealthDescription,
  ): TargetHealthDescription | undefined {
    const targetId = description.Target?.Id;
    if (!targetId) return undefined;
    return {
      targetId,
      port: description.Target?.Port,
      state: description.TargetHealth?.State,
      reason: description.TargetHealth?.Reason,
    };
  }
}
