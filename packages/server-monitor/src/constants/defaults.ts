/**
 * Default values for deployment monitoring.
 */

/** Path of the runner's self-reported status document */
export const RUNNER_STATUS_FILE = "status.json";

/** Path that answers 200 once the router has loaded its graph */
export const ROUTER_PATH = "otp/routers/default";

/** Suffix of the runner log the instance uploads next to the deployment's files */
export const RUNNER_LOG_SUFFIX = "-runner.log";

/** EC2 state code for "running". Any higher code is stopping, stopped or gone. */
export const RUNNING_STATE_CODE = 16;

/** EC2 state code for "terminated" */
export const TERMINATED_STATE_CODE = 48;
