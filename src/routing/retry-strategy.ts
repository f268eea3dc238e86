import { RETRYABLE_STATUS_CODES } from "@/config/failover.ts";
import { TimeoutError } from "@/types/timeout.ts";
import { HttpStatusError, type StatusResponse, TransportError } from "@/types/transport.ts";

/**
 * Determine whether an error is local to one endpoint and worth trying the
 * next one for.
 *
 * Retryable errors:
 *  - Transport failures of any kind (connection, name resolution, timeout,
 *    unclassified network-layer)
 *  - Per-attempt timeouts
 *  - A non-success status raised as an error, when the status is one of the
 *    transient gateway-class statuses
 *
 * Anything else, malformed requests included, is terminal.
 */
export function isRetryableError(error: unknown): boolean {
	if (error instanceof TransportError) {
		return true;
	}

	if (error instanceof TimeoutError) {
		return true;
	}

	if (error instanceof HttpStatusError) {
		return RETRYABLE_STATUS_CODES.has(error.status);
	}

	return false;
}

/**
 * Determine whether a non-success response means "try another endpoint".
 * Only consulted for responses that are not `ok`; a success is always final.
 */
export function isRetryableResponse(response: StatusResponse): boolean {
	return RETRYABLE_STATUS_CODES.has(response.status);
}
