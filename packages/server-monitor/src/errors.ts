/**
 * Error types raised before or around a monitor run.
 *
 * Outcomes of the run itself are modelled as {@link MonitorFailure} values.
 */

export enum MonitorErrorType {
  INVALID_CONFIG = "INVALID_CONFIG",
  CREDENTIALS = "CREDENTIALS",
  UNKNOWN = "UNKNOWN",
}

export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly type: MonitorErrorType,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = "MonitorError";
  }
}

/** Phases that wait on something and can therefore time out */
export type WaitingPhaseName =
  | "awaiting-status-file"
  | "awaiting-runner-completion"
  | "awaiting-router"
  | "registering-with-load-balancer";

export type MonitorFailure =
  | { kind: "missing-target-group" }
  | { kind: "timeout"; phase: WaitingPhaseName }
  | { kind: "instance-health"; stateName: string }
  | { kind: "runner-error"; message: string }
  | { kind: "cancelled" }
  | { kind: "unexpected"; message: string };

const TIMEOUT_MESSAGES: Record<WaitingPhaseName, string> = {
  "awaiting-status-file": "Job timed out while waiting for the runner to produce a status file!",
  "awaiting-runner-completion": "Job timed out while waiting for the runner to finish!",
  "awaiting-router": "Job timed out while waiting for trip planner to start up.",
  "registering-with-load-balancer":
    "Job timed out while waiting to register EC2 instance with load balancer target group.",
};

/**
 * Operator-facing message for a failure, without the log location.
 */
export function describeFailure(failure: MonitorFailure): string {
  switch (failure.kind) {
    case "missing-target-group":
      return "There is no load balancer under which to register EC2 instance.";
    case "timeout":
      return TIMEOUT_MESSAGES[failure.phase];
    case "instance-health":
      return `EC2 instance was stopped or terminated before job could complete! Instance state changed to: ${failure.stateName}.`;
    case "runner-error":
      return failure.message || "The runner reported an error.";
    case "cancelled":
      return "Server monitoring was cancelled before job could complete.";
    case "unexpected":
      return `Server monitoring failed unexpectedly: ${failure.message}`;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
