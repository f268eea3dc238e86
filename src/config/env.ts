import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

/** Comma-separated list of absolute http(s) mirror base URLs */
const MirrorListSchema = z
	.string()
	.default("")
	.transform((raw) =>
		raw
			.split(",")
			.map((entry) => entry.trim())
			.filter((entry) => entry.length > 0),
	)
	.pipe(
		z.array(
			z
				.string()
				.url()
				.refine((value) => /^https?:\/\//i.test(value), {
					message: "Mirror endpoints must use http or https",
				}),
		),
	);

export const EnvSchema = z.object({
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
	MIRROR_ENDPOINTS: MirrorListSchema,
	/** Timeout applied to each individual endpoint attempt (ms) */
	ATTEMPT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parse and validate environment variables.
 * Throws a single error listing every invalid variable.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
	const result = EnvSchema.safeParse(source);
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new Error(`Invalid environment configuration: ${details}`);
	}
	return result.data;
}

export const env: Env = loadEnv();
