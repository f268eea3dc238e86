/**
 * Failover constants.
 * The cleanup interval is fixed for the process; registries may override it
 * per instance but it is never read from the environment.
 */

/** How long a recorded failure keeps an endpoint out of the preferred set (ms) */
export const FAILED_ENDPOINTS_CLEANUP_INTERVAL_MS = 60_000;

/**
 * Response statuses that signal transient unavailability of one mirror:
 * internal server error, bad gateway, service unavailable, gateway timeout
 * and request timeout.
 */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([500, 502, 503, 504, 408]);
