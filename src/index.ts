import { serve } from "@hono/node-server";
import { createApp } from "@/app.ts";
import { env } from "@/config/env.ts";
import { logger } from "@/middleware/logging.ts";
import { getDefaultHealthRegistry } from "@/routing/health-registry.ts";
import { FetchTransport } from "@/services/fetch-transport.ts";
import { MirrorClient } from "@/services/mirror-client.ts";

const registry = getDefaultHealthRegistry();
const client = new MirrorClient({
	transport: new FetchTransport(),
	attemptTimeoutMs: env.ATTEMPT_TIMEOUT_MS,
	registry,
});

if (env.MIRROR_ENDPOINTS.length === 0) {
	logger.warn({ type: "startup" }, "MIRROR_ENDPOINTS is empty; every mirror request will fail");
}

const app = createApp({ client, registry, mirrors: env.MIRROR_ENDPOINTS });

serve({ fetch: app.fetch, port: env.PORT }, (info) => {
	logger.info({
		type: "startup",
		port: info.port,
		mirrors: env.MIRROR_ENDPOINTS,
		attemptTimeoutMs: env.ATTEMPT_TIMEOUT_MS,
	});
});
