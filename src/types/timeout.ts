/** Error raised when a single endpoint attempt exceeds its timeout */
export class TimeoutError extends Error {
	/** HTTP status code for timeout responses */
	readonly status = 408;
	/** Timeout that was exceeded (ms) */
	readonly timeoutMs: number;
	/** Endpoint that was being called, if known */
	readonly endpoint: string | null;

	constructor(timeoutMs: number, endpoint: string | null = null) {
		const endpointInfo = endpoint ? ` (endpoint: ${endpoint})` : "";
		super(`Request timed out after ${timeoutMs}ms${endpointInfo}`);
		this.name = "TimeoutError";
		this.timeoutMs = timeoutMs;
		this.endpoint = endpoint;
	}
}
