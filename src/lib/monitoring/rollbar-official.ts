// ---------------------------------------------------------------------------
// Rollbar Configuration
// Singleton instance with environment detection, test no-op, PII filtering,
// sampling rates, and structured error reporting.
// ---------------------------------------------------------------------------

import Rollbar from "rollbar";
import { loadMonitoringConfig, type MonitoringConfig } from "@/lib/config";
import { isTelemetryConsentGranted } from "./privacy";

type LogArgument = string | Error | Record<string, unknown> | undefined;

/** The subset of the Rollbar surface this project calls. */
export interface MonitoringInstance {
	critical: (...args: LogArgument[]) => unknown;
	error: (...args: LogArgument[]) => unknown;
	warning: (...args: LogArgument[]) => unknown;
	warn: (...args: LogArgument[]) => unknown;
	info: (...args: LogArgument[]) => unknown;
	debug: (...args: LogArgument[]) => unknown;
	log: (...args: LogArgument[]) => unknown;
	wait: (cb: () => void) => void;
}

// ── Enablement rules ──────────────────────────────────────────────────────

const isTestMode =
	process.env.NODE_ENV === "test" ||
	// Vitest sets VITEST / VITEST_POOL_ID
	typeof process.env.VITEST !== "undefined";
const isDevelopment = process.env.NODE_ENV === "development";
const monitoring = loadMonitoringConfig();

/** Reporting needs both the flag and a token. */
export function isReportingEnabled(config: MonitoringConfig): boolean {
	return config.ROLLBAR_ENABLED && config.ROLLBAR_SERVER_TOKEN.length > 0;
}

const baseConfig = {
	// In development, disable automatic capture to reduce noise; errors are still
	// reported explicitly via reportError() / logSyncError() etc.
	captureUncaught: !isDevelopment,
	captureUnhandledRejections: !isDevelopment,
	environment: process.env.NODE_ENV || "development",
	enabled: !isTestMode && isReportingEnabled(monitoring),
};

const noopInstance: MonitoringInstance = {
	critical: () => undefined,
	error: () => undefined,
	warning: () => undefined,
	warn: () => undefined,
	info: () => undefined,
	debug: () => undefined,
	log: () => undefined,
	wait: (cb: () => void) => cb(),
};

// Server-side singleton instance. In test mode a no-op instance avoids network calls.
export const serverInstance: MonitoringInstance = isTestMode
	? noopInstance
	: new Rollbar({
			accessToken: monitoring.ROLLBAR_SERVER_TOKEN || "disabled",
			...baseConfig,
			payload: {
				server: { root: process.cwd() },
			},
			// Always scrub secrets; scrub user-identifying fields when consent is not granted
			scrubFields: [
				"password",
				"apiKey",
				"api_key",
				"secret",
				"token",
				"access_token",
				"authorization",
				...(isTelemetryConsentGranted() ? [] : ["email", "user_email", "login_id", "path", "person"]),
			],
		});

// ── Severity & Error Context ──────────────────────────────────────────────

export const ErrorSeverity = {
	CRITICAL: "critical",
	ERROR: "error",
	WARNING: "warning",
	INFO: "info",
	DEBUG: "debug",
} as const;

export type ErrorSeverityType = (typeof ErrorSeverity)[keyof typeof ErrorSeverity];

export interface ErrorContext {
	runId?: string;
	courseId?: string;
	operation?: string;
	timestamp?: Date;
	additionalData?: Record<string, unknown>;
}

// ── Structured error reporting with sampling ──────────────────────────────

export function reportError(
	error: Error | string,
	context?: ErrorContext,
	severity: ErrorSeverityType = ErrorSeverity.ERROR,
): void {
	if (!baseConfig.enabled) return;

	try {
		const rateAll = monitoring.ROLLBAR_SAMPLE_RATE_ALL;
		const rateInfo = monitoring.ROLLBAR_SAMPLE_RATE_INFO;
		const rateWarn = monitoring.ROLLBAR_SAMPLE_RATE_WARN;
		const rateError = monitoring.ROLLBAR_SAMPLE_RATE_ERROR;
		const rateCritical = monitoring.ROLLBAR_SAMPLE_RATE_CRITICAL;

		const pick = (rate: number) => Math.random() < rate && Math.random() < rateAll;

		const rollbarContext: Record<string, unknown> = {
			custom: {
				runId: context?.runId,
				courseId: context?.courseId,
				operation: context?.operation,
				timestamp: (context?.timestamp ?? new Date()).toISOString(),
				...context?.additionalData,
			},
		};

		switch (severity) {
			case ErrorSeverity.CRITICAL:
				if (pick(rateCritical)) serverInstance.critical(error, rollbarContext);
				break;
			case ErrorSeverity.WARNING:
				if (pick(rateWarn)) serverInstance.warning(error, rollbarContext);
				break;
			case ErrorSeverity.INFO:
				if (pick(rateInfo)) serverInstance.info(error, rollbarContext);
				break;
			case ErrorSeverity.DEBUG:
				if (pick(rateInfo)) serverInstance.debug(error, rollbarContext);
				break;
			default:
				if (pick(rateError)) serverInstance.error(error, rollbarContext);
		}
	} catch (reportFailure) {
		// Reporting must never take down a sync run
		console.warn("[monitoring] failed to report error:", reportFailure);
	}
}

// ── Flush helper ──────────────────────────────────────────────────────────

export function flushRollbar(): Promise<void> {
	return new Promise((resolve) => {
		if (!baseConfig.enabled) return resolve();
		serverInstance.wait(() => resolve());
	});
}
