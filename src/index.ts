// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export { CanvasApiError, CanvasClient, type CanvasClientOptions } from "./lib/canvas/client";
export type { LmsClient } from "./lib/canvas/types";
export { loadConfig, resetConfig, type AppConfig } from "./lib/config";
export { InaccessibilityTracker } from "./lib/mirror/inaccessibility-tracker";
export { LocalMirrorStore, type LocalMirrorStoreOptions } from "./lib/mirror/store";
export { OpenAiIndexClient } from "./lib/search-index/openai-client";
export type { SearchIndexClient } from "./lib/search-index/types";
export { RemoteIndexUploader } from "./lib/search-index/uploader";
export * from "./lib/sync/errors";
export { getSyncService, resetSyncService } from "./lib/sync/factory";
export { CourseInventoryFetcher } from "./lib/sync/inventory-fetcher";
export { SyncOrchestrator, type SyncOrchestratorOptions } from "./lib/sync/orchestrator";
export { missingFilesCount, plan } from "./lib/sync/planner";
export type { StartSyncResponse, StatusResponse, SyncProgressResponse } from "./lib/sync/schemas";
export { SyncService } from "./lib/sync/service";
export type * from "./lib/sync/types";
export { fileKey } from "./lib/sync/types";
