/**
 * Runner status document published by the instance, and the rules that
 * decide when the runner's work is finished.
 */

import { z } from "zod";
import type { DeploymentDescriptor } from "../config";

/**
 * Only the flags are strict. A missing, null or odd message or progress value
 * must not hide an error report; progress is clamped by JobStatus.
 */
export const RunnerStatusSchema = z
  .object({
    error: z.boolean().default(false),
    message: z
      .string()
      .nullish()
      .transform((value) => value ?? "")
      .catch(""),
    pctProgress: z.number().catch(0),
    serverStarted: z.boolean().default(false),
    graphUploaded: z.boolean().default(false),
  })
  .transform(({ pctProgress, ...rest }) => ({ ...rest, percentProgress: pctProgress }));

export type RunnerStatus = z.output<typeof RunnerStatusSchema>;

export type RunnerProgress =
  | { kind: "failed"; message: string }
  | { kind: "complete" }
  | { kind: "in-progress" };

/**
 * An instance only builds the graph when the deployment asks for that, or when
 * the server definition splits building from serving and no graph exists yet.
 */
export function isBuildOnlyServer(
  deployment: Pick<
    DeploymentDescriptor,
    "buildGraphOnly" | "graphAlreadyBuilt" | "separateGraphBuildConfig"
  >,
): boolean {
  return (
    deployment.buildGraphOnly ||
    (!deployment.graphAlreadyBuilt && deployment.separateGraphBuildConfig)
  );
}

export function evaluateRunnerStatus(status: RunnerStatus, buildOnly: boolean): RunnerProgress {
  if (status.error) {
    return { kind: "failed", message: status.message };
  }
  const done = buildOnly ? status.graphUploaded : status.serverStarted;
  return done ? { kind: "complete" } : { kind: "in-progress" };
}
