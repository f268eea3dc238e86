import {
	type SendOptions,
	type Transport,
	TransportError,
	type TransportFailureKind,
} from "@/types/transport.ts";

/** Low-level error codes (Node sockets and undici) mapped to failure kinds */
const ERROR_CODE_KINDS: Readonly<Partial<Record<string, TransportFailureKind>>> = {
	ECONNREFUSED: "connection_failure",
	ECONNRESET: "connection_failure",
	EHOSTUNREACH: "connection_failure",
	ENETUNREACH: "connection_failure",
	EPIPE: "connection_failure",
	UND_ERR_SOCKET: "connection_failure",
	ENOTFOUND: "name_resolution_failure",
	EAI_AGAIN: "name_resolution_failure",
	ETIMEDOUT: "timeout",
	UND_ERR_CONNECT_TIMEOUT: "timeout",
	UND_ERR_HEADERS_TIMEOUT: "timeout",
	UND_ERR_BODY_TIMEOUT: "timeout",
};

/**
 * Messages undici gives the `TypeError` it raises for a network failure:
 * "fetch failed" before the response, "terminated" while its body streams.
 */
const NETWORK_FAILURE_MESSAGES: ReadonlySet<string> = new Set(["fetch failed", "terminated"]);

function errorCode(value: unknown): string | undefined {
	if (typeof value === "object" && value !== null && "code" in value) {
		return typeof value.code === "string" ? value.code : undefined;
	}
	return undefined;
}

/**
 * Tag a failure raised by `fetch` or by reading a fetched body with its kind.
 *
 * Network failures surface from undici as a `TypeError` with the socket or
 * DNS error as `cause`. Returns `null` for errors that are not network
 * failures (malformed URLs, invalid request options, unparsable bodies).
 */
export function classifyFetchFailure(error: unknown): { kind: TransportFailureKind; code?: string } | null {
	if (!(error instanceof TypeError) || !NETWORK_FAILURE_MESSAGES.has(error.message)) {
		return null;
	}

	const code = errorCode(error.cause) ?? errorCode(error);
	if (!code) return { kind: "transport" };
	return { kind: ERROR_CODE_KINDS[code] ?? "transport", code };
}

/** Rethrow a network failure as a tagged `TransportError`; anything else as is. */
export function toTransportError(error: unknown, endpoint: string): unknown {
	const failure = classifyFetchFailure(error);
	if (!failure) return error;
	return new TransportError(failure.kind, endpoint, { code: failure.code, cause: error });
}

export interface FetchTransportOptions {
	/** Headers sent with every request */
	headers?: Record<string, string>;
}

/**
 * Transport over the global `fetch`.
 *
 * Network failures are rethrown as tagged `TransportError`s. When the attempt
 * signal aborts, its reason is rethrown untouched.
 */
export class FetchTransport implements Transport {
	private readonly headers: Record<string, string>;

	constructor(opts?: FetchTransportOptions) {
		this.headers = opts?.headers ?? {};
	}

	async send(url: URL, options?: SendOptions): Promise<Response> {
		const signal = options?.signal;

		if (signal?.aborted) {
			throw signal.reason;
		}

		try {
			return await fetch(url, { method: "GET", headers: this.headers, signal });
		} catch (err) {
			if (signal?.aborted) {
				throw signal.reason;
			}
			throw toTransportError(err, url.href);
		}
	}
}
