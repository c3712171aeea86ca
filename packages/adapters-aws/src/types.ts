/**
 * Shared types for the AWS adapters.
 */

/** Log callback for streaming adapter output */
export type AwsLogCallback = (line: string) => void;

/** Static or temporary AWS credentials */
export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}
