/**
 * Deployment Monitor
 *
 * Follows one freshly launched instance from boot to either "graph ready"
 * (build-only deployments) or "serving behind the load balancer". Every wait
 * is a health-checked poll loop with its own deadline. When the job fails for
 * any reason the instance is terminated so it does not linger.
 */

import { Logger } from "@nestjs/common";
import type { IComputeService, ILoadBalancerService } from "@transitops/adapters-common";
import { systemClock, Clock } from "../clock";
import {
  DEFAULT_MONITOR_TIMEOUTS,
  DeploymentDescriptor,
  InstanceDescriptor,
  MonitorTimeouts,
} from "../config";
import { ROUTER_PATH, RUNNER_LOG_SUFFIX, TERMINATED_STATE_CODE } from "../constants";
import type { CompletedServerSink } from "../deployment/completed-server-counter";
import { describeFailure, toError, MonitorFailure } from "../errors";
import { HealthProbe, HealthResult, normalizeStateCode } from "../health/health-probe";
import { HttpStatusClient } from "../http/http-status-client";
import { JobStatus, JobStatusSnapshot } from "../job/job-status";
import { TargetRegistrar } from "../loadbalancer/target-registrar";
import { runPollLoop, PollActionResult, PollOutcome } from "../polling/poll-loop";
import { evaluateRunnerStatus, isBuildOnlyServer } from "../status/runner-status";
import {
  initialPhase,
  isWaitingPhase,
  nextPhase,
  MonitorPhase,
  TerminalPhase,
  WaitingPhase,
} from "./phases";

export interface DeploymentMonitorOptions {
  instance: InstanceDescriptor;
  deployment: DeploymentDescriptor;
  compute: IComputeService;
  loadBalancer: ILoadBalancerService;
  completedServers: CompletedServerSink;
  httpClient?: HttpStatusClient;
  clock?: Clock;
  timeouts?: Partial<MonitorTimeouts>;
  /** Checked at every health check; aborting fails the job */
  signal?: AbortSignal;
  status?: JobStatus;
}

export interface MonitorResult {
  instanceId: string;
  phase: TerminalPhase;
  status: JobStatusSnapshot;
  graphTaskSeconds?: number;
}

export class DeploymentMonitor {
  private readonly logger = new Logger(DeploymentMonitor.name);
  readonly status: JobStatus;

  private readonly instance: InstanceDescriptor;
  private readonly deployment: DeploymentDescriptor;
  private readonly compute: IComputeService;
  private readonly completedServers: CompletedServerSink;
  private readonly http: HttpStatusClient;
  private readonly probe: HealthProbe;
  private readonly registrar: TargetRegistrar;
  private readonly clock: Clock;
  readonly timeouts: Readonly<MonitorTimeouts>;
  private readonly signal?: AbortSignal;
  private readonly buildOnly: boolean;

  private readonly statusUrl: string;
  private readonly routerUrl: string;

  private phase: MonitorPhase = { name: "awaiting-status-file" };
  private runnerStartedAt?: number;
  private graphTaskSeconds?: number;

  constructor(options: DeploymentMonitorOptions) {
    this.instance = options.instance;
    this.deployment = options.deployment;
    this.compute = options.compute;
    this.completedServers = options.completedServers;
    this.clock = options.clock ?? systemClock;
    this.timeouts = { ...DEFAULT_MONITOR_TIMEOUTS, ...options.timeouts };
    this.http =
      options.httpClient ??
      new HttpStatusClient({ requestTimeoutMs: this.timeouts.httpRequestTimeoutMs });
    this.probe = new HealthProbe(options.compute);
    this.registrar = new TargetRegistrar(
      options.loadBalancer,
      this.clock,
      this.timeouts.pollDelayMs,
    );
    this.signal = options.signal;
    this.buildOnly = isBuildOnlyServer(options.deployment);

    const ipUrl = `http://${this.instance.publicIpAddress}`;
    this.statusUrl = [ipUrl, this.deployment.statusFilePath].join("/");
    this.routerUrl = [ipUrl, ROUTER_PATH].join("/");

    this.status = options.status ?? new JobStatus();
    this.status.update("Checking server status...");
  }

  get instanceId(): string {
    return this.instance.instanceId;
  }

  get deploymentId(): string {
    return this.deployment.deploymentId;
  }

  get currentPhase(): MonitorPhase {
    return this.phase;
  }

  /**
   * Where the instance uploads its runner log. Included in every failure
   * message since the instance may be gone by the time someone looks.
   */
  get runnerLogPath(): string {
    const folder = this.deployment.logFolderUri.replace(/\/+$/, "");
    return `${folder}/${this.instance.instanceId}${RUNNER_LOG_SUFFIX}`;
  }

  async run(): Promise<MonitorResult> {
    let terminal: TerminalPhase;
    try {
      terminal = await this.runStateMachine();
    } catch (error) {
      terminal = {
        name: "failed",
        failure: { kind: "unexpected", message: toError(error).message },
      };
      this.phase = terminal;
    }

    this.settle(terminal);
    await this.finalize();

    return {
      instanceId: this.instance.instanceId,
      phase: terminal,
      status: this.status.snapshot(),
      graphTaskSeconds: this.graphTaskSeconds,
    };
  }

  // ── State Machine ────────────────────────────────────────────────────

  private async runStateMachine(): Promise<TerminalPhase> {
    let phase = initialPhase(this.deployment.targetGroupArn);
    this.phase = phase;

    while (isWaitingPhase(phase)) {
      const outcome = await this.runPhase(phase);
      if (outcome.status === "completed") {
        this.onPhaseCompleted(phase);
      }
      phase = nextPhase(phase, outcome, this.buildOnly);
      this.phase = phase;
    }
    return phase;
  }

  private async runPhase(phase: WaitingPhase): Promise<PollOutcome> {
    switch (phase.name) {
      case "awaiting-status-file":
        return this.poll(
          () => this.http.reachable(this.statusUrl),
          this.timeouts.statusFileTimeoutMs,
          `runner status file availability check: ${this.statusUrl}`,
        );

      case "awaiting-runner-completion":
        this.runnerStartedAt = this.clock.now();
        return this.poll(
          () => this.checkRunnerCompletion(),
          this.deployment.graphAlreadyBuilt
            ? this.timeouts.graphBuiltRunnerTimeoutMs
            : this.timeouts.runnerTimeoutMs,
          `runner completion check: ${this.statusUrl}`,
        );

      case "awaiting-router":
        return this.poll(
          () => this.http.reachable(this.routerUrl),
          this.timeouts.routerTimeoutMs,
          `router to become available: ${this.routerUrl}`,
        );

      case "registering-with-load-balancer": {
        const targetGroupArn = this.deployment.targetGroupArn;
        if (!targetGroupArn) {
          throw new Error("No target group configured for load balancer registration");
        }
        return this.registrar.registerAndConfirm({
          targetGroupArn,
          instanceId: this.instance.instanceId,
          healthCheck: () => this.checkHealth(),
          deadlineMs: this.timeouts.registrationTimeoutMs,
          signal: this.signal,
        });
      }
    }
  }

  private onPhaseCompleted(phase: WaitingPhase): void {
    switch (phase.name) {
      case "awaiting-status-file":
        this.status.update("Runner status file found. Waiting for runner to finish...");
        break;
      case "awaiting-runner-completion": {
        const startedAt = this.runnerStartedAt ?? this.clock.now();
        this.graphTaskSeconds = Math.floor((this.clock.now() - startedAt) / 1000);
        this.logger.log(`Graph build/download completed in ${this.graphTaskSeconds} seconds!`);
        break;
      }
      case "awaiting-router":
        this.status.update("Graph loaded!", 90);
        break;
      case "registering-with-load-balancer":
        break;
    }
  }

  private async checkRunnerCompletion(): Promise<PollActionResult> {
    const runnerStatus = await this.http.fetchRunnerStatus(this.statusUrl);
    if (!runnerStatus) return false;

    const progress = evaluateRunnerStatus(runnerStatus, this.buildOnly);
    if (progress.kind === "failed") {
      return { failed: progress.message };
    }
    this.status.update(runnerStatus.message, runnerStatus.percentProgress);
    return progress.kind === "complete";
  }

  private checkHealth(): Promise<HealthResult> {
    return this.probe.check(this.instance.instanceId);
  }

  private poll(
    action: () => Promise<PollActionResult>,
    deadlineMs: number,
    description: string,
  ): Promise<PollOutcome> {
    return runPollLoop({
      action,
      healthCheck: () => this.checkHealth(),
      delayMs: this.timeouts.pollDelayMs,
      deadlineMs,
      clock: this.clock,
      signal: this.signal,
      description,
      log: (message) => this.logger.log(message),
    });
  }

  // ── Outcome ──────────────────────────────────────────────────────────

  private settle(terminal: TerminalPhase): void {
    switch (terminal.name) {
      case "graph-ready":
        this.status.completeSuccessfully(
          `Graph build/download completed in ${this.graphTaskSeconds ?? 0} seconds!`,
        );
        this.logger.log(`View logs at ${this.runnerLogPath}`);
        break;
      case "succeeded":
        this.status.completeSuccessfully(
          `Server successfully registered with load balancer ${this.deployment.targetGroupArn}. ` +
            `Trip planner running at ${this.routerUrl}`,
        );
        this.logger.log(`View logs at ${this.runnerLogPath}`);
        this.completedServers.incrementCompletedServers();
        break;
      case "failed":
        this.failJob(terminal.failure);
        break;
    }
  }

  private failJob(failure: MonitorFailure): void {
    const message = describeFailure(failure);
    this.logger.error(`Instance ${this.instance.instanceId}: ${message}`);
    this.status.fail(`${message} Check logs at: ${this.runnerLogPath}`);
  }

  /**
   * A failed job always terminates its instance. Nothing here escalates.
   */
  private async finalize(): Promise<void> {
    if (!this.status.isError) return;

    const instanceId = this.instance.instanceId;
    try {
      const termination = await this.compute.terminateInstance(instanceId);
      const state = termination?.currentState;
      if (state && normalizeStateCode(state.code) === TERMINATED_STATE_CODE) {
        this.status.addNote("Instance is terminated!");
      } else {
        this.logger.log(`Instance ${instanceId} terminating (state: ${state?.name ?? "unknown"})`);
      }
    } catch (error) {
      this.logger.error(`Could not terminate instance ${instanceId}: ${toError(error).message}`);
    }
  }
}
