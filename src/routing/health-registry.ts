import { FAILED_ENDPOINTS_CLEANUP_INTERVAL_MS } from "@/config/failover.ts";
import { logger } from "@/middleware/logging.ts";
import type { HealthEntry, HealthRegistryOptions } from "@/types/failover.ts";

/**
 * Tracks endpoints recently observed to fail.
 *
 * Health is binary: an identity with an entry is unhealthy, one without is
 * healthy. A single failure marks the endpoint and later failures only move
 * its timestamp forward. Entries are removed opportunistically by
 * `sweepExpired`, at most once per cleanup interval.
 *
 * Every method runs to completion without yielding, so concurrent in-flight
 * requests on the event loop never observe a partially swept map. The first
 * caller past the interval moves `lastCleanup` forward before sweeping, so
 * later callers in the same interval return on the timestamp comparison.
 */
export class EndpointHealthRegistry {
	private readonly failures = new Map<string, number>();
	private readonly cleanupIntervalMs: number;
	private readonly now: () => number;
	private lastCleanup: number;

	constructor(opts?: HealthRegistryOptions) {
		this.cleanupIntervalMs = opts?.cleanupIntervalMs ?? FAILED_ENDPOINTS_CLEANUP_INTERVAL_MS;
		this.now = opts?.now ?? Date.now;
		this.lastCleanup = this.now();
	}

	/** Mark an identity as failed as of now. */
	recordFailure(identity: string): void {
		this.failures.set(identity, this.now());
	}

	isHealthy(identity: string): boolean {
		return !this.failures.has(identity);
	}

	/**
	 * Remove entries older than one cleanup interval.
	 *
	 * Returns `true` when a sweep actually ran. The common path is a single
	 * timestamp comparison.
	 */
	sweepExpired(now: number = this.now()): boolean {
		const cutoff = now - this.cleanupIntervalMs;
		if (this.lastCleanup >= cutoff) return false;
		this.lastCleanup = now;

		let removed = 0;
		for (const [identity, failedAt] of this.failures) {
			if (failedAt < cutoff) {
				this.failures.delete(identity);
				removed++;
			}
		}

		logger.debug({
			type: "health_sweep",
			removed,
			remaining: this.failures.size,
		});
		return true;
	}

	/** Current entries, oldest failure first. */
	snapshot(): HealthEntry[] {
		return [...this.failures]
			.map(([identity, failedAt]) => ({ identity, failedAt }))
			.sort((a, b) => a.failedAt - b.failedAt);
	}

	get size(): number {
		return this.failures.size;
	}

	/** Forget every recorded failure. */
	reset(): void {
		this.failures.clear();
	}
}

/* ------------------------------------------------------------------ */
/*  Lazy process-wide default                                          */
/* ------------------------------------------------------------------ */

let _instance: EndpointHealthRegistry | null = null;

/**
 * Registry shared by every client that is not given its own.
 * Created on first access so that importing this module has no side effects.
 */
export function getDefaultHealthRegistry(): EndpointHealthRegistry {
	if (!_instance) {
		_instance = new EndpointHealthRegistry();
	}
	return _instance;
}

/** Drop the shared registry (for tests). */
export function resetDefaultHealthRegistry(): void {
	_instance?.reset();
	_instance = null;
}
