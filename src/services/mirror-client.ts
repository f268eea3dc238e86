import type { ZodType } from "zod";
import { logger } from "@/middleware/logging.ts";
import { FailoverHandler } from "@/routing/failover-handler.ts";
import type { EndpointHealthRegistry } from "@/routing/health-registry.ts";
import type { RandomSource } from "@/routing/endpoint-selector.ts";
import { FetchTransport, toTransportError } from "@/services/fetch-transport.ts";
import type { EndpointInput } from "@/types/failover.ts";
import { TimeoutError } from "@/types/timeout.ts";
import { HttpStatusError, type Transport } from "@/types/transport.ts";

export interface MirrorClientOptions {
	/** Network transport; defaults to a FetchTransport */
	transport?: Transport;
	/** Per-attempt timeout (ms), covering the body read for text and JSON */
	attemptTimeoutMs?: number;
	/** Health registry shared with other clients of the same mirror pool */
	registry?: EndpointHealthRegistry;
	random?: RandomSource;
}

/**
 * MirrorClient fetches one logical resource from any of several mirrors
 * serving identical data, failing over between them.
 */
export class MirrorClient {
	private readonly transport: Transport;
	private readonly attemptTimeoutMs: number | undefined;
	private readonly handler: FailoverHandler;

	constructor(opts?: MirrorClientOptions) {
		this.transport = opts?.transport ?? new FetchTransport();
		this.attemptTimeoutMs = opts?.attemptTimeoutMs;
		this.handler = new FailoverHandler({ registry: opts?.registry, random: opts?.random });
	}

	/**
	 * Fetch the raw response. A non-success status outside the transient set
	 * (404, 401, ...) is returned as the final outcome for the caller to
	 * interpret. The attempt timeout stops at the response headers; the body
	 * belongs to the caller.
	 */
	get(endpoints: readonly EndpointInput[], signal?: AbortSignal): Promise<Response> {
		return this.handler.executeResponse(
			endpoints,
			(endpoint) => this.attempt(endpoint, signal, async (response) => response),
			releaseBody,
		);
	}

	/** Fetch the body as text. Any non-success status raises `HttpStatusError`. */
	getText(endpoints: readonly EndpointInput[], signal?: AbortSignal): Promise<string> {
		return this.handler.execute(endpoints, (endpoint) =>
			this.attempt(endpoint, signal, async (response) => {
				await expectSuccess(response, endpoint);
				return response.text();
			}),
		);
	}

	/**
	 * Fetch, parse and validate a JSON body. Parse and validation failures end
	 * the call without trying other mirrors.
	 */
	getJson<T>(endpoints: readonly EndpointInput[], schema: ZodType<T>, signal?: AbortSignal): Promise<T> {
		return this.handler.execute(endpoints, (endpoint) =>
			this.attempt(endpoint, signal, async (response) => {
				await expectSuccess(response, endpoint);
				const body: unknown = await response.json();
				return schema.parse(body);
			}),
		);
	}

	/**
	 * Run one attempt against one endpoint.
	 *
	 * The attempt gets its own AbortController, aborted by the caller's signal
	 * or by the attempt timeout (with a `TimeoutError`). It stays armed until
	 * `read` settles, so a mirror that stalls or drops mid-body fails this
	 * attempt only.
	 */
	private async attempt<T>(
		endpoint: URL,
		callerSignal: AbortSignal | undefined,
		read: (response: Response) => Promise<T>,
	): Promise<T> {
		if (callerSignal?.aborted) {
			throw callerSignal.reason;
		}

		const controller = new AbortController();
		const { signal } = controller;
		const onCallerAbort = () => controller.abort(callerSignal?.reason);
		callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

		const timeoutMs = this.attemptTimeoutMs;
		const timer =
			timeoutMs !== undefined
				? setTimeout(() => {
						if (!signal.aborted) {
							controller.abort(new TimeoutError(timeoutMs, endpoint.href));
						}
					}, timeoutMs)
				: undefined;

		try {
			const response = await this.transport.send(endpoint, { signal });
			return await read(response);
		} catch (err) {
			if (signal.aborted) {
				// Either the attempt timeout or the caller's abort; surface whichever fired
				throw signal.reason;
			}
			throw toTransportError(err, endpoint.href);
		} finally {
			clearTimeout(timer);
			callerSignal?.removeEventListener("abort", onCallerAbort);
		}
	}
}

async function expectSuccess(response: Response, endpoint: URL): Promise<void> {
	if (response.ok) return;

	logger.debug({
		type: "mirror_status_error",
		endpoint: endpoint.href,
		status: response.status,
	});
	// Release the connection before failing the attempt
	await releaseBody(response);
	throw new HttpStatusError(response.status, endpoint.href, response.statusText);
}

/** Cancel a body nobody is going to read. */
async function releaseBody(response: Response): Promise<void> {
	await response.body?.cancel();
}
