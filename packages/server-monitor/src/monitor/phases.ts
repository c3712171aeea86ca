/**
 * Deployment monitor state machine.
 *
 * Phases only move forward. Every waiting phase is resolved by one poll loop
 * and its outcome picks the next phase.
 */

import type { MonitorFailure, WaitingPhaseName } from "../errors";
import type { PollOutcome } from "../polling/poll-loop";

export type WaitingPhase = { name: WaitingPhaseName };

export type TerminalPhase =
  | { name: "graph-ready" }
  | { name: "succeeded" }
  | { name: "failed"; failure: MonitorFailure };

export type MonitorPhase = WaitingPhase | TerminalPhase;

export const WAITING_PHASE_ORDER: readonly WaitingPhaseName[] = [
  "awaiting-status-file",
  "awaiting-runner-completion",
  "awaiting-router",
  "registering-with-load-balancer",
];

export function isWaitingPhase(phase: MonitorPhase): phase is WaitingPhase {
  return WAITING_PHASE_ORDER.some((name) => name === phase.name);
}

/**
 * A deployment without a target group fails before any polling starts.
 */
export function initialPhase(targetGroupArn: string | undefined): MonitorPhase {
  if (!targetGroupArn) {
    return { name: "failed", failure: { kind: "missing-target-group" } };
  }
  return { name: "awaiting-status-file" };
}

function successor(phase: WaitingPhaseName, buildOnly: boolean): MonitorPhase {
  switch (phase) {
    case "awaiting-status-file":
      return { name: "awaiting-runner-completion" };
    case "awaiting-runner-completion":
      return buildOnly ? { name: "graph-ready" } : { name: "awaiting-router" };
    case "awaiting-router":
      return { name: "registering-with-load-balancer" };
    case "registering-with-load-balancer":
      return { name: "succeeded" };
  }
}

export function nextPhase(
  phase: WaitingPhase,
  outcome: PollOutcome,
  buildOnly: boolean,
): MonitorPhase {
  switch (outcome.status) {
    case "completed":
      return successor(phase.name, buildOnly);
    case "timed-out":
      return { name: "failed", failure: { kind: "timeout", phase: phase.name } };
    case "failed":
      return { name: "failed", failure: { kind: "runner-error", message: outcome.message } };
    case "aborted":
      return outcome.reason.kind === "instance-health"
        ? { name: "failed", failure: { kind: "instance-health", stateName: outcome.reason.stateName } }
        : { name: "failed", failure: { kind: "cancelled" } };
  }
}
