/**
 * Factory that wires AWS SDK clients and injects them into services.
 *
 * All SDK clients are created here and shared via constructor injection.
 */

import { EC2Client } from "@aws-sdk/client-ec2";
import { ElasticLoadBalancingV2Client } from "@aws-sdk/client-elastic-load-balancing-v2";
import { STSClient } from "@aws-sdk/client-sts";
import type { IComputeService, ILoadBalancerService } from "@transitops/adapters-common";
import { sanitizeRoleSessionName } from "@transitops/adapters-common";
import { EC2Service } from "./ec2/ec2-service";
import { ELBv2Service } from "./elbv2/elbv2-service";
import { STSService } from "./sts/sts-service";
import type { AwsCredentials, AwsLogCallback } from "./types";

export const DEFAULT_AWS_REGION = "us-east-1";

/** Services returned by the factory, typed to interfaces */
export interface AwsMonitorServices {
  compute: IComputeService;
  loadBalancer: ILoadBalancerService;
}

export interface AwsServiceFactoryConfig {
  /** Region override; falls back to AWS_REGION, then us-east-1 */
  region?: string;
  /** Static credentials; the SDK default chain is used when omitted */
  credentials?: AwsCredentials;
  /** Role to assume before creating the service clients */
  roleArn?: string;
  /** Session name used when assuming roleArn */
  roleSessionName?: string;
  log?: AwsLogCallback;
}

export class AwsServiceFactory {
  static async createMonitorServices(config: AwsServiceFactoryConfig): Promise<AwsMonitorServices> {
    const region = config.region ?? process.env.AWS_REGION ?? DEFAULT_AWS_REGION;
    const log = config.log ?? (() => undefined);

    let credentials = config.credentials;
    if (config.roleArn) {
      const sts = new STSService(new STSClient({ region, credentials }));
      credentials = await sts.assumeRole(
        config.roleArn,
        sanitizeRoleSessionName(config.roleSessionName ?? "deployment-monitor"),
      );
      log(`Assumed role ${config.roleArn}`);
    }

    const clientConfig = { region, credentials };
    return {
      compute: new EC2Service(new EC2Client(clientConfig), log),
      loadBalancer: new ELBv2Service(new ElasticLoadBalancingV2Client(clientConfig), log),
    };
  }
}
