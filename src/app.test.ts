import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { createApp } from "@/app.ts";
import { EndpointHealthRegistry } from "@/routing/health-registry.ts";
import { buildMirrorUrls } from "@/routes/mirror.ts";
import { MirrorClient } from "@/services/mirror-client.ts";
import { type Transport, TransportError } from "@/types/transport.ts";

const MIRRORS = ["http://a.test/base", "http://b.test/"];

/** Keeps mirrors in configured order */
const keepOrder = () => 0.999;

describe("buildMirrorUrls", () => {
	it("appends the resource path to each base and keeps the query", () => {
		const urls = buildMirrorUrls(MIRRORS, "/pkg/index.json", "?semVerLevel=2.0.0");

		expect(urls.map((url) => url.href)).toEqual([
			"http://a.test/base/pkg/index.json?semVerLevel=2.0.0",
			"http://b.test/pkg/index.json?semVerLevel=2.0.0",
		]);
	});

	it("omits an empty query", () => {
		expect(buildMirrorUrls(["http://a.test/base/"], "x.json", "")[0]?.href).toBe("http://a.test/base/x.json");
	});
});

describe("app", () => {
	let send: Mock<Transport["send"]>;
	let registry: EndpointHealthRegistry;

	function appWith(mirrors: readonly string[] = MIRRORS) {
		const client = new MirrorClient({ transport: { send }, registry, random: keepOrder });
		return createApp({ client, registry, mirrors });
	}

	beforeEach(() => {
		send = vi.fn<Transport["send"]>();
		registry = new EndpointHealthRegistry();
	});

	it("answers liveness checks", async () => {
		const res = await appWith().request("/health");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ status: "ok" });
		expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
	});

	describe("GET /v1/mirror/*", () => {
		it("relays the first mirror's response", async () => {
			send.mockResolvedValue(
				new Response('{"ok":true}', { headers: { "content-type": "application/json" } }),
			);

			const res = await appWith().request("/v1/mirror/pkg/index.json?semVerLevel=2.0.0");

			expect(res.status).toBe(200);
			expect(res.headers.get("content-type")).toBe("application/json");
			expect(await res.json()).toEqual({ ok: true });
			expect(send.mock.calls.map(([url]) => url.href)).toEqual([
				"http://a.test/base/pkg/index.json?semVerLevel=2.0.0",
			]);
		});

		it("fails over and marks the broken mirror unhealthy", async () => {
			send.mockImplementation(async (url) =>
				url.host === "a.test" ? new Response("", { status: 503 }) : new Response("from b"),
			);
			const app = appWith();

			const res = await app.request("/v1/mirror/pkg/x.json");
			expect(res.status).toBe(200);
			expect(await res.text()).toBe("from b");

			const health = await app.request("/v1/health/endpoints");
			expect(await health.json()).toEqual({
				unhealthy: [{ identity: "http://a.test/base/pkg/x.json", failedAt: expect.any(Number) }],
			});
		});

		it("passes a not-found status through", async () => {
			send.mockResolvedValue(new Response("not here", { status: 404 }));

			const res = await appWith().request("/v1/mirror/missing.json");

			expect(res.status).toBe(404);
			expect(await res.text()).toBe("not here");
			expect(send).toHaveBeenCalledTimes(1);
		});

		it("returns 502 with every cause when all mirrors fail", async () => {
			send.mockImplementation(async (url) => {
				throw new TransportError("connection_failure", url.href, { code: "ECONNREFUSED" });
			});

			const res = await appWith().request("/v1/mirror/x.json");

			expect(res.status).toBe(502);
			expect(await res.json()).toEqual({
				error: {
					message: expect.stringMatching(/^All endpoints exhausted\./),
					type: "all_endpoints_failed",
					causes: [
						"http://a.test/base/x.json: connection_failure while calling http://a.test/base/x.json [ECONNREFUSED]",
						"http://b.test/x.json: connection_failure while calling http://b.test/x.json [ECONNREFUSED]",
					],
				},
			});
		});

		it("returns 502 with no causes when no mirrors are configured", async () => {
			const res = await appWith([]).request("/v1/mirror/x.json");

			expect(res.status).toBe(502);
			expect(await res.json()).toEqual({
				error: {
					message: "No endpoints available to attempt.",
					type: "all_endpoints_failed",
					causes: [],
				},
			});
		});

		it("answers an abandoned request without an error body", async () => {
			send.mockImplementation(
				(_url, options) =>
					new Promise<Response>((_resolve, reject) => {
						options?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
					}),
			);
			const controller = new AbortController();
			const request = new Request("http://localhost/v1/mirror/x.json", { signal: controller.signal });

			const pending = appWith().request(request);
			controller.abort();
			const res = await pending;

			expect(res.status).toBe(499);
			expect(await res.text()).toBe("");
		});

		it("returns 500 on a terminal error", async () => {
			send.mockRejectedValue(new Error("certificate rejected"));

			const res = await appWith().request("/v1/mirror/x.json");

			expect(res.status).toBe(500);
			expect(await res.json()).toEqual({
				error: { message: "Internal server error", type: "internal_error" },
			});
			expect(send).toHaveBeenCalledTimes(1);
		});
	});

	describe("GET /v1/health/endpoints", () => {
		it("reports an empty registry", async () => {
			const res = await appWith().request("/v1/health/endpoints");

			expect(await res.json()).toEqual({ unhealthy: [] });
		});

		it("reports the health of a single endpoint by identity", async () => {
			registry.recordFailure("http://a.test/base/x.json");
			const query = encodeURIComponent("http://a.test/base/x.json?page=2");

			const res = await appWith().request(`/v1/health/endpoints?endpoint=${query}`);

			expect(res.status).toBe(200);
			expect(await res.json()).toEqual({ identity: "http://a.test/base/x.json", healthy: false });
		});

		it("rejects an invalid endpoint query", async () => {
			const res = await appWith().request("/v1/health/endpoints?endpoint=nope");

			expect(res.status).toBe(400);
			expect(await res.json()).toMatchObject({
				error: { type: "invalid_request_error", code: "validation_error" },
			});
		});
	});

	it("returns 404 for unknown routes", async () => {
		const res = await appWith().request("/v2/anything");

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({
			error: { message: "Route not found: /v2/anything", type: "not_found" },
		});
	});
});
