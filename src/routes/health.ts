import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";
import { getEndpointIdentity } from "@/routing/endpoint-identity.ts";
import type { EndpointHealthRegistry } from "@/routing/health-registry.ts";

const HealthQuerySchema = z.object({
	endpoint: z.string().url().optional(),
});

export function createHealthRoutes(registry: EndpointHealthRegistry): Hono {
	const health = new Hono();

	health.get("/health", (c) => c.json({ status: "ok" }));

	health.get(
		"/v1/health/endpoints",
		zValidator("query", HealthQuerySchema, (result, c) => {
			if (!result.success) {
				return c.json(
					{
						error: {
							message: "Invalid query parameters",
							type: "invalid_request_error",
							code: "validation_error",
							details: result.error.issues,
						},
					},
					400,
				);
			}
		}),
		(c) => {
			const { endpoint } = c.req.valid("query");

			if (endpoint) {
				const identity = getEndpointIdentity(endpoint);
				return c.json({ identity, healthy: registry.isHealthy(identity) });
			}

			return c.json({ unhealthy: registry.snapshot() });
		},
	);

	return health;
}
