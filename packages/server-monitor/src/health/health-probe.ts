/**
 * Instance health probe.
 *
 * Classifies the control plane's lifecycle state for one instance as healthy
 * or terminal. Read-only; control plane errors propagate to the caller.
 */

import { Logger } from "@nestjs/common";
import type { IComputeService, InstanceLifecycleState } from "@transitops/adapters-common";
import { RUNNING_STATE_CODE } from "../constants";

export type HealthResult =
  | { status: "healthy"; state?: InstanceLifecycleState }
  | { status: "terminal"; stateName: string };

/** Only the low byte of an EC2 state code is meaningful. */
export function normalizeStateCode(code: number): number {
  return code & 0xff;
}

/**
 * Pending and running are healthy. Shutting-down, terminated, stopping and
 * stopped all sit above the running code and are treated alike.
 */
export function isTerminalState(state: InstanceLifecycleState): boolean {
  return normalizeStateCode(state.code) > RUNNING_STATE_CODE;
}

export class HealthProbe {
  private readonly logger = new Logger(HealthProbe.name);

  constructor(private readonly compute: IComputeService) {}

  async check(instanceId: string): Promise<HealthResult> {
    const instance = await this.compute.describeInstance(instanceId);
    if (!instance) {
      // Freshly launched instances can be missing from describe results for a while.
      this.logger.debug(`Instance ${instanceId} not yet listed by the control plane`);
      return { status: "healthy" };
    }

    if (isTerminalState(instance.state)) {
      this.logger.warn(`Instance ${instanceId} is no longer healthy (state: ${instance.state.name})`);
      return { status: "terminal", stateName: instance.state.name };
    }
    return { status: "healthy", state: instance.state };
  }
}
