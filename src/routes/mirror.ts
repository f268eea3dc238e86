import { Hono } from "hono";
import type { MirrorClient } from "@/services/mirror-client.ts";

const ROUTE_PREFIX = "/v1/mirror";

/**
 * Build one candidate URL per mirror base for the requested resource.
 * The resource path is appended to each base path; the query string is
 * carried over unchanged.
 */
export function buildMirrorUrls(mirrors: readonly string[], resourcePath: string, search: string): URL[] {
	const relative = resourcePath.replace(/^\/+/, "");

	return mirrors.map((mirror) => {
		const url = new URL(mirror);
		const basePath = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
		url.pathname = `${basePath}${relative}`;
		url.search = search;
		return url;
	});
}

/** Relay GET requests to the first mirror that answers usefully */
export function createMirrorRoutes(client: MirrorClient, mirrors: readonly string[]): Hono {
	const mirror = new Hono();

	mirror.get(`${ROUTE_PREFIX}/*`, async (c) => {
		const resourcePath = c.req.path.slice(ROUTE_PREFIX.length);
		const { search } = new URL(c.req.url);
		const candidates = buildMirrorUrls(mirrors, resourcePath, search);

		// Failover errors propagate to the app-level error handler
		const upstream = await client.get(candidates, c.req.raw.signal);

		const headers = new Headers();
		const contentType = upstream.headers.get("content-type");
		if (contentType) headers.set("content-type", contentType);
		if (upstream.url) headers.set("x-mirror-endpoint", upstream.url);

		return new Response(upstream.body, { status: upstream.status, headers });
	});

	return mirror;
}
