// ---------------------------------------------------------------------------
// Sync Service Factory
// Wires clients, stores and the orchestrator from environment configuration
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { createCanvasClient } from "@/lib/canvas/factory";
import { type AppConfig, loadConfig, resolveStateDir } from "@/lib/config";
import { InaccessibilityTracker } from "@/lib/mirror/inaccessibility-tracker";
import { LocalMirrorStore } from "@/lib/mirror/store";
import { createIndexClient } from "@/lib/search-index/factory";
import { RemoteIndexUploader } from "@/lib/search-index/uploader";
import { CourseInventoryFetcher } from "./inventory-fetcher";
import { SyncOrchestrator } from "./orchestrator";
import { SyncService } from "./service";

/** State file names under the sync state directory. */
export const STATE_FILES = {
	mirrorManifest: "mirror-manifest.json",
	indexManifest: "index-manifest.json",
	inaccessible: "inaccessible.json",
	lastRun: "last-run.json",
} as const;

let _service: SyncService | null = null;

/**
 * Build a SyncService from configuration. The instance is cached so that
 * every caller in the process shares one orchestrator (and one run lock).
 */
export function getSyncService(config: AppConfig = loadConfig()): SyncService {
	if (_service) return _service;

	const stateDir = resolveStateDir(config);
	const client = createCanvasClient(config);
	const indexClient = createIndexClient(config);
	const retry = {
		maxAttempts: config.SYNC_MAX_ATTEMPTS,
		minTimeoutMs: config.SYNC_RETRY_MIN_TIMEOUT_MS,
	};

	const store = new LocalMirrorStore({
		rootDir: config.MIRROR_DIR,
		manifestPath: path.join(stateDir, STATE_FILES.mirrorManifest),
	});
	const tracker = new InaccessibilityTracker(path.join(stateDir, STATE_FILES.inaccessible));
	const uploader = indexClient
		? new RemoteIndexUploader({
				client: indexClient,
				manifestPath: path.join(stateDir, STATE_FILES.indexManifest),
			})
		: null;
	const fetcher = new CourseInventoryFetcher({ client, retry });
	const lastRunPath = path.join(stateDir, STATE_FILES.lastRun);

	const orchestrator = new SyncOrchestrator({
		client,
		store,
		tracker,
		uploader,
		fetcher,
		concurrency: config.SYNC_CONCURRENCY,
		retry,
		lastRunPath,
		timeoutMs: config.SYNC_TIMEOUT_MS,
	});

	_service = new SyncService({ orchestrator, fetcher, store, tracker, uploader, lastRunPath });
	return _service;
}

/** Drop the cached service (for testing). */
export function resetSyncService(): void {
	_service = null;
}
