/**
 * Runs every monitor of one deployment concurrently. Monitors share nothing
 * but the deployment's completed-server counter.
 */

import { Logger } from "@nestjs/common";
import { toError } from "../errors";
import type { DeploymentMonitor, MonitorResult } from "./deployment-monitor";

export interface MonitorGroupResult {
  results: MonitorResult[];
  succeeded: number;
  failed: number;
}

const logger = new Logger("MonitorGroup");

export async function runMonitorGroup(monitors: DeploymentMonitor[]): Promise<MonitorGroupResult> {
  const settled = await Promise.allSettled(monitors.map((monitor) => monitor.run()));

  const results: MonitorResult[] = [];
  let failed = 0;
  settled.forEach((outcome, index) => {
    if (outcome.status === "fulfilled") {
      results.push(outcome.value);
      if (outcome.value.status.error) failed++;
    } else {
      failed++;
      logger.error(
        `Monitor for instance ${monitors[index].instanceId} crashed: ${toError(outcome.reason).message}`,
      );
    }
  });

  return { results, succeeded: monitors.length - failed, failed };
}
