import { Hono } from "hono";
import { logger, requestLogger } from "@/middleware/logging.ts";
import { AllEndpointsFailedError } from "@/routing/failover-handler.ts";
import type { EndpointHealthRegistry } from "@/routing/health-registry.ts";
import { createHealthRoutes } from "@/routes/health.ts";
import { createMirrorRoutes } from "@/routes/mirror.ts";
import type { MirrorClient } from "@/services/mirror-client.ts";

/** Non-standard status logged for requests the client abandoned (nginx convention) */
const CLIENT_CLOSED_REQUEST = 499;

export interface AppDependencies {
	client: MirrorClient;
	/** Registry the client reports into, exposed on the health routes */
	registry: EndpointHealthRegistry;
	/** Mirror base URLs serving identical content */
	mirrors: readonly string[];
}

export function createApp({ client, registry, mirrors }: AppDependencies): Hono {
	const app = new Hono();

	app.use("*", requestLogger());

	app.route("/", createHealthRoutes(registry));
	app.route("/", createMirrorRoutes(client, mirrors));

	app.notFound((c) =>
		c.json({ error: { message: `Route not found: ${c.req.path}`, type: "not_found" } }, 404),
	);

	app.onError((err, c) => {
		if (err instanceof AllEndpointsFailedError) {
			return c.json(
				{
					error: {
						message: err.message,
						type: "all_endpoints_failed",
						causes: err.attempts.map((a) => `${a.endpoint}: ${a.error.message}`),
					},
				},
				err.statusCode,
			);
		}

		if (c.req.raw.signal.aborted || err.name === "AbortError") {
			// The client went away; nobody is left to read a response body
			logger.info({ type: "client_aborted", path: c.req.path });
			return new Response(null, { status: CLIENT_CLOSED_REQUEST });
		}

		logger.error({ type: "unhandled_error", path: c.req.path, error: err.message });
		return c.json({ error: { message: "Internal server error", type: "internal_error" } }, 500);
	});

	return app;
}
