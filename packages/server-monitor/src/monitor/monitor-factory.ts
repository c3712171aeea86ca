/**
 * Builds a DeploymentMonitor wired to AWS for one instance.
 *
 * Each monitor gets its own control plane clients, scoped to the
 * deployment's region and (optionally) an assumed role.
 */

import { Logger } from "@nestjs/common";
import { AwsServiceFactory, AwsCredentials, AwsMonitorServices } from "@transitops/adapters-aws";
import {
  loadMonitorTimeouts,
  parseDeploymentDescriptor,
  parseInstanceDescriptor,
  MonitorTimeouts,
} from "../config";
import type { CompletedServerSink } from "../deployment/completed-server-counter";
import { MonitorError, MonitorErrorType, toError } from "../errors";
import { DeploymentMonitor } from "./deployment-monitor";

export interface CreateDeploymentMonitorConfig {
  instance: unknown;
  deployment: unknown;
  completedServers: CompletedServerSink;
  credentials?: AwsCredentials;
  /** Overrides on top of the MONITOR_*_MS environment variables */
  timeouts?: Partial<MonitorTimeouts>;
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
}

const logger = new Logger("DeploymentMonitorFactory");

export async function createDeploymentMonitor(
  config: CreateDeploymentMonitorConfig,
): Promise<DeploymentMonitor> {
  const instance = parseInstanceDescriptor(config.instance);
  const deployment = parseDeploymentDescriptor(config.deployment);
  const timeouts = { ...loadMonitorTimeouts(config.env), ...config.timeouts };

  let services: AwsMonitorServices;
  try {
    services = await AwsServiceFactory.createMonitorServices({
      region: deployment.region,
      credentials: config.credentials,
      roleArn: deployment.roleArn,
      roleSessionName: `monitor-${instance.instanceId}`,
      log: (line) => logger.log(line),
    });
  } catch (error) {
    const cause = toError(error);
    throw new MonitorError(
      `Could not obtain AWS clients for instance ${instance.instanceId}: ${cause.message}`,
      MonitorErrorType.CREDENTIALS,
      cause,
    );
  }

  return new DeploymentMonitor({
    instance,
    deployment,
    compute: services.compute,
    loadBalancer: services.loadBalancer,
    completedServers: config.completedServers,
    timeouts,
    signal: config.signal,
  });
}
