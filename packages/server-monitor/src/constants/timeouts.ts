/**
 * Timeout constants for deployment monitoring.
 */

/** Delay between poll attempts. Gives the instance's startup script time to upload its log if a step fails. */
export const POLL_DELAY_MS = 4_000;

/** Maximum time to wait for the runner to publish its first status file (5 minutes) */
export const STATUS_FILE_TIMEOUT_MS = 5 * 60_000;

/** Maximum time to wait for the runner when the graph was already built elsewhere (5 hours) */
export const GRAPH_BUILT_RUNNER_TIMEOUT_MS = 5 * 60 * 60_000;

/** Maximum time to wait for the runner otherwise (1 hour) */
export const RUNNER_TIMEOUT_MS = 60 * 60_000;

/** Maximum time to wait for the router to load the graph and answer (20 minutes) */
export const ROUTER_TIMEOUT_MS = 20 * 60_000;

/** Maximum time to wait for the target group to list the instance (2 minutes) */
export const REGISTRATION_TIMEOUT_MS = 2 * 60_000;

/** Per-request timeout for HTTP probes against the instance */
export const HTTP_REQUEST_TIMEOUT_MS = 10_000;
