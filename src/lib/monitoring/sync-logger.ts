// ---------------------------------------------------------------------------
// Sync Logging — Rollbar Integration
// Structured log entries for sync runs, courses and single files
// ---------------------------------------------------------------------------

import { isTelemetryConsentGranted } from "@/lib/monitoring/privacy";
import { serverInstance } from "@/lib/monitoring/rollbar-official";

export interface SyncLogTarget {
	courseId?: string;
	remoteId?: string;
	/** Mirror-relative path; may contain names of people, so it is redacted without consent. */
	path?: string;
}

/**
 * Build a safe context payload for sync log entries.
 * When PII consent is not granted, `path` is redacted because file and
 * folder names often carry student or instructor names.
 */
function safeSyncContext(runId: string, target: SyncLogTarget = {}): Record<string, string | undefined> {
	return {
		runId,
		courseId: target.courseId,
		remoteId: target.remoteId,
		path: target.path === undefined ? undefined : isTelemetryConsentGranted() ? target.path : "[redacted]",
		timestamp: new Date().toISOString(),
	};
}

export function logSyncInfo(runId: string, message: string, target?: SyncLogTarget): void {
	serverInstance.info(`Sync: ${message}`, safeSyncContext(runId, target));
}

export function logSyncWarning(runId: string, message: string, target?: SyncLogTarget): void {
	serverInstance.warning(`Sync warning: ${message}`, safeSyncContext(runId, target));
}

export function logSyncError(runId: string, message: string, target?: SyncLogTarget): void {
	serverInstance.error(`Sync error: ${message}`, safeSyncContext(runId, target));
}

export function logSyncCritical(runId: string, message: string): void {
	serverInstance.critical(`Sync critical: ${message}`, {
		runId,
		timestamp: new Date().toISOString(),
	});
}
