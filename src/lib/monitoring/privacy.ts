// ---------------------------------------------------------------------------
// Privacy & Consent helpers for telemetry/monitoring.
// Default: no file paths or names attached unless explicit consent.
// ---------------------------------------------------------------------------

import { loadMonitoringConfig } from "@/lib/config";

/**
 * Returns whether telemetry consent is granted.
 * `TELEMETRY_CONSENT` or `ROLLBAR_ALLOW_PII`, with the usual env flag values.
 */
export function isTelemetryConsentGranted(): boolean {
	const { TELEMETRY_CONSENT, ROLLBAR_ALLOW_PII } = loadMonitoringConfig();
	return TELEMETRY_CONSENT || ROLLBAR_ALLOW_PII;
}
