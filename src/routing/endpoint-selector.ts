import { getEndpointIdentity, toEndpointUrl } from "@/routing/endpoint-identity.ts";
import type { EndpointHealthRegistry } from "@/routing/health-registry.ts";
import type { EndpointInput } from "@/types/failover.ts";

/** Uniform random source in [0, 1) */
export type RandomSource = () => number;

/** Result of ordering a candidate list for one call */
export interface EndpointSelection {
	/** Endpoints in the order they should be attempted */
	order: URL[];
	/** True when every candidate was unhealthy and the full list was used instead */
	fallback: boolean;
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
	const out = [...items];
	for (let i = out.length - 1; i > 0; i--) {
		const j = Math.floor(random() * (i + 1));
		[out[i], out[j]] = [out[j], out[i]];
	}
	return out;
}

/**
 * Order candidates for one call: healthy endpoints in a fresh random order,
 * or, when the registry marks all of them unhealthy, every candidate in a
 * fresh random order. Stale health data never prevents an attempt.
 */
export function selectEndpoints(
	endpoints: readonly EndpointInput[],
	registry: EndpointHealthRegistry,
	random: RandomSource = Math.random,
): EndpointSelection {
	const urls = endpoints.map(toEndpointUrl);
	const healthy = urls.filter((url) => registry.isHealthy(getEndpointIdentity(url)));

	if (healthy.length > 0) {
		return { order: shuffle(healthy, random), fallback: false };
	}

	return { order: shuffle(urls, random), fallback: urls.length > 0 };
}
