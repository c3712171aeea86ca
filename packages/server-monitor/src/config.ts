/**
 * Monitor configuration schemas.
 *
 * Deployment and instance descriptors are immutable for one monitor run;
 * timeouts default to the fixed constants and may be tuned from the
 * environment.
 */

import { z } from "zod";
import {
  POLL_DELAY_MS,
  STATUS_FILE_TIMEOUT_MS,
  RUNNER_TIMEOUT_MS,
  GRAPH_BUILT_RUNNER_TIMEOUT_MS,
  ROUTER_TIMEOUT_MS,
  REGISTRATION_TIMEOUT_MS,
  HTTP_REQUEST_TIMEOUT_MS,
  RUNNER_STATUS_FILE,
} from "./constants";
import { MonitorError, MonitorErrorType } from "./errors";

// ── Deployment Descriptor ────────────────────────────────────────────────
export const DeploymentDescriptorSchema = z.object({
  deploymentId: z.string().min(1),
  /** Load balancer target group the serving instances join */
  targetGroupArn: z.string().min(1).optional(),
  /** The deployment only builds a graph; nothing is served */
  buildGraphOnly: z.boolean().default(false),
  /** The graph was built by an earlier job and only needs loading */
  graphAlreadyBuilt: z.boolean().default(false),
  /** The server definition uses separate instances for building and serving */
  separateGraphBuildConfig: z.boolean().default(false),
  /** Folder (e.g. an s3:// URI) the instance uploads its logs to */
  logFolderUri: z.string().min(1),
  /** Custom AWS region for the control plane clients */
  region: z.string().min(1).optional(),
  /** IAM role assumed for this deployment's control plane calls */
  roleArn: z.string().min(1).optional(),
  /** Path of the runner status document on the instance */
  statusFilePath: z.string().min(1).default(RUNNER_STATUS_FILE),
});

export type DeploymentDescriptor = z.infer<typeof DeploymentDescriptorSchema>;
export type DeploymentDescriptorInput = z.input<typeof DeploymentDescriptorSchema>;

// ── Instance Descriptor ──────────────────────────────────────────────────
export const InstanceDescriptorSchema = z.object({
  instanceId: z.string().min(1),
  publicIpAddress: z.string().min(1),
});

export type InstanceDescriptor = z.infer<typeof InstanceDescriptorSchema>;

// ── Timeouts ─────────────────────────────────────────────────────────────
const durationMs = z.coerce.number().int().positive();

export const MonitorTimeoutsSchema = z.object({
  pollDelayMs: durationMs.default(POLL_DELAY_MS),
  statusFileTimeoutMs: durationMs.default(STATUS_FILE_TIMEOUT_MS),
  runnerTimeoutMs: durationMs.default(RUNNER_TIMEOUT_MS),
  graphBuiltRunnerTimeoutMs: durationMs.default(GRAPH_BUILT_RUNNER_TIMEOUT_MS),
  routerTimeoutMs: durationMs.default(ROUTER_TIMEOUT_MS),
  registrationTimeoutMs: durationMs.default(REGISTRATION_TIMEOUT_MS),
  httpRequestTimeoutMs: durationMs.default(HTTP_REQUEST_TIMEOUT_MS),
});

export type MonitorTimeouts = z.infer<typeof MonitorTimeoutsSchema>;

export const DEFAULT_MONITOR_TIMEOUTS: MonitorTimeouts = MonitorTimeoutsSchema.parse({});

const TIMEOUT_ENV_VARS: Record<keyof MonitorTimeouts, string> = {
  pollDelayMs: "MONITOR_POLL_DELAY_MS",
  statusFileTimeoutMs: "MONITOR_STATUS_FILE_TIMEOUT_MS",
  runnerTimeoutMs: "MONITOR_RUNNER_TIMEOUT_MS",
  graphBuiltRunnerTimeoutMs: "MONITOR_GRAPH_BUILT_RUNNER_TIMEOUT_MS",
  routerTimeoutMs: "MONITOR_ROUTER_TIMEOUT_MS",
  registrationTimeoutMs: "MONITOR_REGISTRATION_TIMEOUT_MS",
  httpRequestTimeoutMs: "MONITOR_HTTP_REQUEST_TIMEOUT_MS",
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseDeploymentDescriptor(input: unknown): DeploymentDescriptor {
  const result = DeploymentDescriptorSchema.safeParse(input);
  if (!result.success) {
    throw new MonitorError(
      `Invalid deployment descriptor: ${formatIssues(result.error)}`,
      MonitorErrorType.INVALID_CONFIG,
    );
  }
  return result.data;
}

export function parseInstanceDescriptor(input: unknown): InstanceDescriptor {
  const result = InstanceDescriptorSchema.safeParse(input);
  if (!result.success) {
    throw new MonitorError(
      `Invalid instance descriptor: ${formatIssues(result.error)}`,
      MonitorErrorType.INVALID_CONFIG,
    );
  }
  return result.data;
}

/**
 * Read timeout overrides from the environment. Unset variables keep their
 * defaults.
 */
export function loadMonitorTimeouts(
  env: Record<string, string | undefined> = process.env,
): MonitorTimeouts {
  const raw = Object.fromEntries(
    Object.entries(TIMEOUT_ENV_VARS)
      .map(([key, envVar]) => [key, env[envVar]] as const)
      .filter(([, value]) => value !== undefined && value !== ""),
  );

  const result = MonitorTimeoutsSchema.safeParse(raw);
  if (!result.success) {
    throw new MonitorError(
      `Invalid monitor timeouts: ${formatIssues(result.error)}`,
      MonitorErrorType.INVALID_CONFIG,
    );
  }
  return result.data;
}
