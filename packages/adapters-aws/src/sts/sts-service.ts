import { STSClient, AssumeRoleCommand, Credentials } from "@aws-sdk/client-sts";
import type { AwsCredentials } from "../types";

export interface AssumedRoleCredentials extends AwsCredentials {
  sessionToken: string;
  expiration: Date;
}

export class STSService {
  constructor(private readonly client: STSClient) {}

  /**
   * Assume a role and get temporary credentials.
   */
  async assumeRole(
    roleArn: string,
    roleSessionName: string,
    options?: { durationSeconds?: number; externalId?: string },
  ): Promise<AssumedRoleCredentials> {
    const result = await this.client.send(
      new AssumeRoleCommand({
        RoleArn: roleArn,
        RoleSessionName: roleSessionName,
        DurationSeconds: options?.durationSeconds ?? 3600,
        ExternalId: options?.externalId,
      }),
    );

    const creds = result.Credentials;
    if (!creds) {
      throw new Error("Failed to assume role - no credentials returned");
    }
    return this.mapCredentials(creds);
  }

  private mapCredentials(creds: Credentials): AssumedRoleCredentials {
    return {
      accessKeyId: creds.AccessKeyId || "",
      secretAccessKey: creds.SecretAccessKey || "",
      sessionToken: creds.SessionToken || "",
      expiration: creds.Expiration || new Date(),
    };
  }
}
