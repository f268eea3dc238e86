import { logger } from "@/middleware/logging.ts";
import { getEndpointIdentity } from "@/routing/endpoint-identity.ts";
import { type RandomSource, selectEndpoints } from "@/routing/endpoint-selector.ts";
import {
	type EndpointHealthRegistry,
	getDefaultHealthRegistry,
} from "@/routing/health-registry.ts";
import { isRetryableError, isRetryableResponse } from "@/routing/retry-strategy.ts";
import type { EndpointInput, EndpointOperation, FailoverAttempt } from "@/types/failover.ts";
import { HttpStatusError, type StatusResponse } from "@/types/transport.ts";

/**
 * Aggregated error thrown when every candidate endpoint failed with a
 * retryable failure. `errors` holds one entry per attempt, in attempt order.
 * An empty candidate list produces this error with no entries.
 */
export class AllEndpointsFailedError extends AggregateError {
	public readonly attempts: FailoverAttempt[];
	public readonly statusCode = 502;

	constructor(attempts: FailoverAttempt[]) {
		const tried = attempts.map((a) => a.endpoint).join(", ");

		super(
			attempts.map((a) => a.error),
			attempts.length === 0
				? "No endpoints available to attempt."
				: `All endpoints exhausted. Tried: [${tried}]. ` +
						`Last error: ${attempts[attempts.length - 1]?.error.message ?? "unknown"}`,
		);

		this.name = "AllEndpointsFailedError";
		this.attempts = attempts;
	}
}

export interface FailoverHandlerOptions {
	/** Health registry to consult and update; defaults to the shared one */
	registry?: EndpointHealthRegistry;
	/** Random source for ordering candidates */
	random?: RandomSource;
}

/**
 * FailoverHandler runs one logical request against a set of interchangeable
 * endpoints.
 *
 * Flow per call:
 *   1. Sweep expired health entries (throttled to once per interval)
 *   2. Order candidates: healthy ones shuffled, else all of them shuffled
 *   3. Attempt endpoints one at a time
 *        - retryable error or retryable status → mark unhealthy, try next
 *        - any other error → rethrow immediately
 *        - any other result → return it
 *   4. If every endpoint failed → throw `AllEndpointsFailedError`
 */
export class FailoverHandler {
	private readonly registry: EndpointHealthRegistry;
	private readonly random: RandomSource | undefined;

	constructor(opts?: FailoverHandlerOptions) {
		this.registry = opts?.registry ?? getDefaultHealthRegistry();
		this.random = opts?.random;
	}

	/**
	 * Execute an operation that yields a plain value. The value is never
	 * inspected: any resolved value is final.
	 */
	execute<T>(endpoints: readonly EndpointInput[], operation: EndpointOperation<T>): Promise<T> {
		return this.run(endpoints, operation);
	}

	/**
	 * Execute an operation that yields a response. A non-success response
	 * with a transient status counts as a failure of that endpoint; any other
	 * response, successful or not, is returned as-is.
	 *
	 * `discard` is called with every response that is skipped, so the caller
	 * can release what it holds (e.g. cancel an unread body).
	 */
	executeResponse<R extends StatusResponse>(
		endpoints: readonly EndpointInput[],
		operation: EndpointOperation<R>,
		discard?: (response: R) => Promise<void> | void,
	): Promise<R> {
		return this.run(endpoints, operation, { discard });
	}

	private async run<T>(
		endpoints: readonly EndpointInput[],
		operation: EndpointOperation<T>,
		inspect?: { discard?: (response: T) => Promise<void> | void },
	): Promise<T> {
		this.registry.sweepExpired();

		const { order, fallback } = selectEndpoints(endpoints, this.registry, this.random);
		if (fallback) {
			logger.warn({
				type: "failover_all_unhealthy",
				endpoints: order.map((url) => url.href),
			});
		}

		const attempts: FailoverAttempt[] = [];

		for (const endpoint of order) {
			const identity = getEndpointIdentity(endpoint);
			const start = Date.now();

			let result: T;
			try {
				result = await operation(endpoint);
			} catch (err) {
				const error = err instanceof Error ? err : new Error(String(err));

				if (!isRetryableError(err)) {
					logger.warn({
						type: "failover_non_retryable",
						endpoint: endpoint.href,
						attempt: attempts.length + 1,
						error: error.message,
					});
					throw err;
				}

				this.recordFailure(attempts, endpoint, identity, error, start);
				continue;
			}

			if (inspect && isStatusResponse(result) && !result.ok && isRetryableResponse(result)) {
				const error = new HttpStatusError(result.status, endpoint.href, result.statusText);
				this.recordFailure(attempts, endpoint, identity, error, start);
				await this.discard(inspect.discard, result, endpoint);
				continue;
			}

			logger.debug({
				type: "failover_success",
				endpoint: endpoint.href,
				attempt: attempts.length + 1,
				latencyMs: Date.now() - start,
			});

			return result;
		}

		// Every candidate endpoint has failed
		logger.error({
			type: "failover_exhausted",
			endpoints: order.map((url) => url.href),
			totalAttempts: attempts.length,
			errors: attempts.map((a) => ({
				endpoint: a.endpoint,
				error: a.error.message,
				latencyMs: a.latencyMs,
			})),
		});

		throw new AllEndpointsFailedError(attempts);
	}

	private async discard<T>(
		dispose: ((response: T) => Promise<void> | void) | undefined,
		response: T,
		endpoint: URL,
	): Promise<void> {
		if (!dispose) return;
		try {
			await dispose(response);
		} catch (err) {
			// The attempt already failed; a release error must not end the call
			logger.warn({
				type: "failover_discard_failed",
				endpoint: endpoint.href,
				error: err instanceof Error ? err.message : String(err),
			});
		}
	}

	private recordFailure(
		attempts: FailoverAttempt[],
		endpoint: URL,
		identity: string,
		error: Error,
		start: number,
	): void {
		const latencyMs = Date.now() - start;
		attempts.push({ endpoint: endpoint.href, identity, error, latencyMs, timestamp: start });
		this.registry.recordFailure(identity);

		logger.warn({
			type: "failover_attempt_failed",
			endpoint: endpoint.href,
			identity,
			attempt: attempts.length,
			latencyMs,
			error: error.message,
		});
	}
}

function isStatusResponse(value: unknown): value is StatusResponse {
	return (
		typeof value === "object" &&
		value !== null &&
		"status" in value &&
		"ok" in value &&
		typeof value.status === "number" &&
		typeof value.ok === "boolean"
	);
}
