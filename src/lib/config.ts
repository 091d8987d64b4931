// ---------------------------------------------------------------------------
// Environment Configuration Loader
// Validates all env vars at startup using Zod
// ---------------------------------------------------------------------------
//
// Recommended flag values per environment:
//
// ┌──────────────────────────────┬──────────┬──────────┬──────────┐
// │ Flag                         │ Local    │ CI/Test  │ Prod     │
// ├──────────────────────────────┼──────────┼──────────┼──────────┤
// │ ROLLBAR_ENABLED              │ 1        │ 0        │ 1        │
// │ TELEMETRY_CONSENT            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_ALLOW_PII            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_SAMPLE_RATE_INFO     │ 1        │ —        │ 0.05     │
// │ ROLLBAR_SAMPLE_RATE_ERROR    │ 1        │ —        │ 1        │
// │ SYNC_CONCURRENCY             │ 4        │ 2        │ 4        │
// └──────────────────────────────┴──────────┴──────────┴──────────┘
// * Set to 1 only with explicit user consent.
// — Not applicable (Rollbar is disabled in CI).
//
// See .env.example for the full list.
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { z } from "zod";

/**
 * Coerce environment variable strings to booleans for use in Zod schemas.
 *
 * Truthy values: `"1"`, `1`, `true`, `"true"`
 * Falsy values:  `"0"`, `0`, `false`, `"false"`; unset falls back to the default.
 *
 * @example
 * ```ts
 * const Schema = z.object({
 *   ROLLBAR_ENABLED: envBool(true),
 *   TELEMETRY_CONSENT: envBool(false),
 * });
 * ```
 */
export const envBool = (defaultValue: boolean) =>
	z
		.preprocess((v) => {
			if (v == null || v === "") return undefined;
			if (v === "1" || v === 1 || v === true || v === "true") return true;
			if (v === "0" || v === 0 || v === false || v === "false") return false;
			return v;
		}, z.boolean().optional())
		.transform((v) => v ?? defaultValue);

/** Empty strings in .env files mean "unset". */
const optionalString = z.preprocess((v) => (v === "" ? undefined : v), z.string().min(1).optional());

/**
 * Rollbar and privacy settings. Monitoring loads these without the Canvas
 * settings, which it does not need.
 */
const MonitoringEnvSchema = z.object({
	ROLLBAR_SERVER_TOKEN: z.string().default(""),
	ROLLBAR_ENABLED: envBool(false),
	ROLLBAR_SAMPLE_RATE_ALL: z.coerce.number().min(0).max(1).default(1),
	ROLLBAR_SAMPLE_RATE_INFO: z.coerce.number().min(0).max(1).default(0.05),
	ROLLBAR_SAMPLE_RATE_WARN: z.coerce.number().min(0).max(1).default(0.05),
	ROLLBAR_SAMPLE_RATE_ERROR: z.coerce.number().min(0).max(1).default(1),
	ROLLBAR_SAMPLE_RATE_CRITICAL: z.coerce.number().min(0).max(1).default(1),

	// Privacy
	TELEMETRY_CONSENT: envBool(false),
	ROLLBAR_ALLOW_PII: envBool(false),
});

const EnvSchema = z
	.object({
		// Canvas LMS — full origin, e.g. https://canvas.example.edu
		CANVAS_API_BASE_URL: z.string().url(),
		CANVAS_ACCESS_TOKEN: z.string().min(1),

		// OpenAI vector stores — uploads are skipped when unset
		OPENAI_API_KEY: optionalString,

		// Local mirror and durable sync state
		MIRROR_DIR: z.string().min(1).default("file_index"),
		SYNC_STATE_DIR: optionalString,

		// Sync tuning
		SYNC_CONCURRENCY: z.coerce.number().int().positive().max(32).default(4),
		SYNC_MAX_ATTEMPTS: z.coerce.number().int().positive().max(10).default(3),
		SYNC_RETRY_MIN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(1000),
		// A run still going after this long is cancelled (default: 30 minutes)
		SYNC_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
		CANVAS_RATE_LIMIT: z.coerce.number().int().positive().default(5),
		INDEX_RATE_LIMIT: z.coerce.number().int().positive().default(10),
	})
	.merge(MonitoringEnvSchema)
	// Rollbar token validation: require token if enabled
	.refine((env) => !env.ROLLBAR_ENABLED || env.ROLLBAR_SERVER_TOKEN.length > 0, {
		message: "ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		path: ["ROLLBAR_SERVER_TOKEN"],
	});

export type AppConfig = z.infer<typeof EnvSchema>;
export type MonitoringConfig = z.infer<typeof MonitoringEnvSchema>;

let _config: AppConfig | null = null;

/**
 * Load and validate environment configuration.
 * Throws a descriptive error if any required env var is missing or invalid.
 * Result is cached after first successful load.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	if (_config) return _config;

	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
		throw new Error(`Environment configuration invalid:\n${issues}`);
	}

	_config = result.data;
	return _config;
}

/**
 * Monitoring subset of the configuration, parsed with the same rules as
 * `loadConfig()`. Not cached, so consent changes apply to the next log entry.
 */
export function loadMonitoringConfig(env: NodeJS.ProcessEnv = process.env): MonitoringConfig {
	return MonitoringEnvSchema.parse(env);
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
	_config = null;
}

/** Directory holding the manifests; defaults to `<MIRROR_DIR>/.sync`. */
export function resolveStateDir(config: AppConfig): string {
	return config.SYNC_STATE_DIR ?? path.join(config.MIRROR_DIR, ".sync");
}
