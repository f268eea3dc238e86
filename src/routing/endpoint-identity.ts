import type { EndpointInput } from "@/types/failover.ts";

/** Parse a candidate endpoint into a URL. Malformed input throws a TypeError. */
export function toEndpointUrl(endpoint: EndpointInput): URL {
	return endpoint instanceof URL ? endpoint : new URL(endpoint);
}

/**
 * Health-tracking identity of an endpoint: scheme, host, port and path.
 * Query and fragment are dropped so that the same mirror requested with
 * different parameters shares one health entry.
 */
export function getEndpointIdentity(endpoint: EndpointInput): string {
	const url = toEndpointUrl(endpoint);
	return `${url.protocol}//${url.host}${url.pathname}`;
}
