/**
 * Registers an instance with a load balancer target group and confirms the
 * registration by looking for the instance among the group's targets.
 */

import { Logger } from "@nestjs/common";
import type { ILoadBalancerService } from "@transitops/adapters-common";
import type { Clock } from "../clock";
import type { HealthResult } from "../health/health-probe";
import { runPollLoop, PollOutcome } from "../polling/poll-loop";

export interface RegisterAndConfirmOptions {
  targetGroupArn: string;
  instanceId: string;
  healthCheck: () => Promise<HealthResult>;
  deadlineMs: number;
  signal?: AbortSignal;
}

export class TargetRegistrar {
  private readonly logger = new Logger(TargetRegistrar.name);

  constructor(
    private readonly loadBalancer: ILoadBalancerService,
    private readonly clock: Clock,
    private readonly delayMs: number,
  ) {}

  /**
   * Membership is enough: a target in "initial" state counts as registered.
   */
  async isRegistered(targetGroupArn: string, instanceId: string): Promise<boolean> {
    const targets = await this.loadBalancer.describeTargetHealth(targetGroupArn);
    return targets.some((target) => target.targetId === instanceId);
  }

  async registerAndConfirm(options: RegisterAndConfirmOptions): Promise<PollOutcome> {
    const { targetGroupArn, instanceId } = options;

    const outcome = await runPollLoop({
      action: async () => {
        await this.loadBalancer.registerTarget(targetGroupArn, instanceId);
        return this.isRegistered(targetGroupArn, instanceId);
      },
      healthCheck: options.healthCheck,
      delayMs: this.delayMs,
      deadlineMs: options.deadlineMs,
      clock: this.clock,
      signal: options.signal,
      description: "instance to register with target group",
      log: (message) => this.logger.log(message),
    });

    if (outcome.status === "completed") {
      this.logger.log(`Instance ${instanceId} successfully added to target group ${targetGroupArn}`);
    }
    return outcome;
  }
}
