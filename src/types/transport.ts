/**
 * Low-level failure kinds a transport reports.
 * Every kind is local to one endpoint.
 */
export type TransportFailureKind =
	| "connection_failure"
	| "name_resolution_failure"
	| "timeout"
	/** Unclassified network-layer failure */
	| "transport";

/** Network-layer failure reported by a transport, tagged with its kind */
export class TransportError extends Error {
	readonly kind: TransportFailureKind;
	/** Endpoint the failed attempt was addressed to */
	readonly endpoint: string;
	/** Low-level error code (e.g. ECONNREFUSED), when one was available */
	readonly code: string | undefined;

	constructor(
		kind: TransportFailureKind,
		endpoint: string,
		options?: { code?: string; cause?: unknown },
	) {
		const codeInfo = options?.code ? ` [${options.code}]` : "";
		super(`${kind} while calling ${endpoint}${codeInfo}`, { cause: options?.cause });
		this.name = "TransportError";
		this.kind = kind;
		this.endpoint = endpoint;
		this.code = options?.code;
	}
}

/** Raised when a response was received but its status is not a success */
export class HttpStatusError extends Error {
	readonly status: number;
	readonly endpoint: string;

	constructor(status: number, endpoint: string, statusText = "") {
		const reason = statusText ? ` ${statusText}` : "";
		super(`HTTP ${status}${reason} from ${endpoint}`);
		this.name = "HttpStatusError";
		this.status = status;
		this.endpoint = endpoint;
	}
}

/** The part of a response the failover loop needs to judge it */
export interface StatusResponse {
	readonly status: number;
	readonly ok: boolean;
	readonly statusText?: string;
}

/** Options for a single transport call */
export interface SendOptions {
	/**
	 * Attempt signal; aborting it aborts the request and, for fetch, any read
	 * of the response body still in progress
	 */
	signal?: AbortSignal;
}

/** The capability the failover layer consumes from the network stack */
export interface Transport {
	send(url: URL, options?: SendOptions): Promise<Response>;
}
