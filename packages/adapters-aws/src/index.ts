// EC2
export { EC2Service } from "./ec2/ec2-service";

// Elastic Load Balancing v2
export { ELBv2Service } from "./elbv2/elbv2-service";

// STS
export { STSService } from "./sts/sts-service";
export type { AssumedRoleCredentials } from "./sts/sts-service";

// Factory
export { AwsServiceFactory, DEFAULT_AWS_REGION } from "./aws-service-factory";
export type { AwsServiceFactoryConfig, AwsMonitorServices } from "./aws-service-factory";

export type { AwsCredentials, AwsLogCallback } from "./types";
