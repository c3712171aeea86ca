// Monitor
export {
  DeploymentMonitor,
  DeploymentMonitorOptions,
  MonitorResult,
} from "./monitor/deployment-monitor";
export { createDeploymentMonitor, CreateDeploymentMonitorConfig } from "./monitor/monitor-factory";
export { runMonitorGroup, MonitorGroupResult } from "./monitor/monitor-group";
export {
  MonitorPhase,
  WaitingPhase,
  TerminalPhase,
  WAITING_PHASE_ORDER,
  initialPhase,
  nextPhase,
  isWaitingPhase,
} from "./monitor/phases";

// Building blocks
export { HealthProbe, HealthResult, isTerminalState, normalizeStateCode } from "./health/health-probe";
export {
  runPollLoop,
  PollLoopOptions,
  PollOutcome,
  PollActionResult,
  PollAbortReason,
} from "./polling/poll-loop";
export { HttpStatusClient, HttpStatusClientOptions, FetchFn } from "./http/http-status-client";
export {
  RunnerStatusSchema,
  RunnerStatus,
  RunnerProgress,
  evaluateRunnerStatus,
  isBuildOnlyServer,
} from "./status/runner-status";
export { TargetRegistrar, RegisterAndConfirmOptions } from "./loadbalancer/target-registrar";
export { JobStatus, JobStatusSnapshot, JobStatusListener } from "./job/job-status";
export {
  CompletedServerCounter,
  CompletedServerSink,
} from "./deployment/completed-server-counter";
export { Clock, systemClock } from "./clock";

// Configuration
export {
  DeploymentDescriptorSchema,
  DeploymentDescriptor,
  DeploymentDescriptorInput,
  InstanceDescriptorSchema,
  InstanceDescriptor,
  MonitorTimeoutsSchema,
  MonitorTimeouts,
  DEFAULT_MONITOR_TIMEOUTS,
  parseDeploymentDescriptor,
  parseInstanceDescriptor,
  loadMonitorTimeouts,
} from "./config";

// Errors
export {
  MonitorError,
  MonitorErrorType,
  MonitorFailure,
  WaitingPhaseName,
  describeFailure,
} from "./errors";

export * from "./constants";
