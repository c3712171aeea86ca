import { initialPhase, isWaitingPhase, nextPhase, WaitingPhase } from "./phases";
import type { PollOutcome } from "../polling/poll-loop";

const completed: PollOutcome = { status: "completed", elapsedMs: 4_000, attempts: 1 };
const timedOut: PollOutcome = { status: "timed-out", elapsedMs: 304_000, attempts: 76 };

describe("initialPhase", () => {
  it("starts by waiting for the status file", () => {
    expect(initialPhase("arn:tg")).toEqual({ name: "awaiting-status-file" });
  });

  it("fails up front without a target group", () => {
    expect(initialPhase(undefined)).toEqual({
      name: "failed",
      failure: { kind: "missing-target-group" },
    });
  });
});

describe("nextPhase", () => {
  it("walks a serving deployment through every phase in order", () => {
    const visited: string[] = [];
    let phase = initialPhase("arn:tg");
    while (isWaitingPhase(phase)) {
      visited.push(phase.name);
      phase = nextPhase(phase, completed, false);
    }

    expect(visited).toEqual([
      "awaiting-status-file",
      "awaiting-runner-completion",
      "awaiting-router",
      "registering-with-load-balancer",
    ]);
    expect(phase).toEqual({ name: "succeeded" });
  });

  it("stops a build-only deployment after the runner completes", () => {
    expect(nextPhase({ name: "awaiting-runner-completion" }, completed, true)).toEqual({
      name: "graph-ready",
    });
  });

  it.each<WaitingPhase["name"]>([
    "awaiting-status-file",
    "awaiting-runner-completion",
    "awaiting-router",
    "registering-with-load-balancer",
  ])("turns a timeout in %s into a failure naming the phase", (name) => {
    expect(nextPhase({ name }, timedOut, false)).toEqual({
      name: "failed",
      failure: { kind: "timeout", phase: name },
    });
  });

  it("fails with the runner's message", () => {
    expect(
      nextPhase({ name: "awaiting-runner-completion" }, { status: "failed", message: "Out of memory" }, false),
    ).toEqual({ name: "failed", failure: { kind: "runner-error", message: "Out of memory" } });
  });

  it("fails on instance health from any phase", () => {
    const aborted: PollOutcome = {
      status: "aborted",
      reason: { kind: "instance-health", stateName: "shutting-down" },
    };

    expect(nextPhase({ name: "awaiting-router" }, aborted, false)).toEqual({
      name: "failed",
      failure: { kind: "instance-health", stateName: "shutting-down" },
    });
  });

  it("fails on cancellation", () => {
    expect(
      nextPhase({ name: "awaiting-status-file" }, { status: "aborted", reason: { kind: "cancelled" } }, false),
    ).toEqual({ name: "failed", failure: { kind: "cancelled" } });
  });
});
