/**
 * Timeout constants for control-plane operations.
 */

/** Maximum time to wait for any single compute operation (10 minutes) */
export const OPERATION_TIMEOUT_MS = 600_000;

/** Polling interval for checking operation status */
export const OPERATION_POLL_INTERVAL_MS = 5_000;

/** How long the health check waits for the VM to report RUNNING */
export const HEALTH_CHECK_TIMEOUT_MS = 300_000;

/** Polling interval for the health check */
export const HEALTH_CHECK_POLL_INTERVAL_MS = 10_000;
