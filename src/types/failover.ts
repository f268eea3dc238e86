/** Candidate endpoint as accepted by the failover layer */
export type EndpointInput = string | URL;

/** Work performed against one endpoint */
export type EndpointOperation<T> = (endpoint: URL) => Promise<T>;

/** Record of a single failed endpoint attempt */
export interface FailoverAttempt {
	/** Endpoint that was tried */
	endpoint: string;
	/** Health-tracking identity of the endpoint */
	identity: string;
	/** Error collected for this attempt */
	error: Error;
	/** Time spent on this attempt (ms) */
	latencyMs: number;
	/** Timestamp when the attempt started */
	timestamp: number;
}

/** A registry entry as exposed for observability */
export interface HealthEntry {
	identity: string;
	/** Epoch ms of the most recent recorded failure */
	failedAt: number;
}

/** Options for constructing an EndpointHealthRegistry */
export interface HealthRegistryOptions {
	/** How long a failure keeps an endpoint unhealthy before it may be swept (ms) */
	cleanupIntervalMs?: number;
	/** Clock source, epoch ms */
	now?: () => number;
}
