/**
 * Health-checked poll loop.
 *
 * Each attempt checks instance health, waits one delay, checks health again,
 * then runs the action. A terminal instance or a cancelled signal aborts the
 * loop at the next check instead of at the deadline.
 */

import type { Clock } from "../clock";
import type { HealthResult } from "../health/health-probe";

/** true = done, false = try again, { failed } = stop without retrying */
export type PollActionResult = boolean | { failed: string };

export type PollAbortReason =
  | { kind: "instance-health"; stateName: string }
  | { kind: "cancelled" };

export type PollOutcome =
  | { status: "completed"; elapsedMs: number; attempts: number }
  | { status: "timed-out"; elapsedMs: number; attempts: number }
  | { status: "failed"; message: string }
  | { status: "aborted"; reason: PollAbortReason };

export interface PollLoopOptions {
  action: () => Promise<PollActionResult>;
  healthCheck: () => Promise<HealthResult>;
  delayMs: number;
  deadlineMs: number;
  clock: Clock;
  signal?: AbortSignal;
  /** What is being waited for; used in wait log lines */
  description?: string;
  log?: (message: string) => void;
}

export async function runPollLoop(options: PollLoopOptions): Promise<PollOutcome> {
  const { action, healthCheck, delayMs, deadlineMs, clock, signal } = options;
  const description = options.description ?? "condition";
  const startTime = clock.now();
  let attempts = 0;

  const checkpoint = async (): Promise<PollAbortReason | undefined> => {
    if (signal?.aborted) return { kind: "cancelled" };
    const health = await healthCheck();
    if (health.status === "terminal") {
      return { kind: "instance-health", stateName: health.stateName };
    }
    return undefined;
  };

  for (;;) {
    const before = await checkpoint();
    if (before) return { status: "aborted", reason: before };

    options.log?.(`Waiting ${delayMs}ms for ${description}`);
    await clock.sleep(delayMs);

    const after = await checkpoint();
    if (after) return { status: "aborted", reason: after };

    attempts++;
    const result = await action();
    const elapsedMs = clock.now() - startTime;

    if (result === true) {
      return { status: "completed", elapsedMs, attempts };
    }
    if (result !== false) {
      return { status: "failed", message: result.failed };
    }
    if (elapsedMs >= deadlineMs) {
      return { status: "timed-out", elapsedMs, attempts };
    }
  }
}
