// ---------------------------------------------------------------------------
// Sync Service
// Status, start/progress/cancel, and operator actions over one orchestrator
// ---------------------------------------------------------------------------

import type { InaccessibilityTracker } from "@/lib/mirror/inaccessibility-tracker";
import type { LocalMirrorStore } from "@/lib/mirror/store";
import { ErrorSeverity, reportError } from "@/lib/monitoring/rollbar-official";
import type { RemoteIndexUploader } from "@/lib/search-index/uploader";
import { readJsonFile } from "@/lib/storage/json-file";
import { SimpleMutex } from "@/lib/storage/mutex";
import { AlreadyRunningError, errorMessage, PartialInventoryError } from "./errors";
import type { CourseInventoryFetcher } from "./inventory-fetcher";
import type { SyncOrchestrator } from "./orchestrator";
import { missingFilesCount, plan } from "./planner";
import {
	type MissingFileDetail,
	type StartSyncResponse,
	type StatusResponse,
	type SyncProgressResponse,
	SyncRunSummarySchema,
} from "./schemas";
import type { Inventory, SyncPlan, SyncRunOptions, SyncRunSummary } from "./types";

/** Upper bound of `missing_files_sample` and `missing_files_detail`. */
const MISSING_SAMPLE_SIZE = 10;

export interface SyncServiceOptions {
	orchestrator: SyncOrchestrator;
	fetcher: CourseInventoryFetcher;
	store: LocalMirrorStore;
	tracker: InaccessibilityTracker;
	uploader: RemoteIndexUploader | null;
	/** Location of `last-run.json`, read when no run happened in this process */
	lastRunPath?: string;
}

export interface StatusOptions {
	/** Re-fetch the inventory instead of reusing the last plan */
	refresh?: boolean;
	courseIds?: string[];
}

interface CachedStatus {
	inventory: Inventory;
	plan: SyncPlan;
	/** Course ids the inventory was fetched for, sorted; null for every course */
	scope: string[] | null;
}

/**
 * The surface exposed to the chat tools and the CLI. Every method returns a
 * plain JSON-serializable object with snake_case keys.
 */
export class SyncService {
	private readonly orchestrator: SyncOrchestrator;
	private readonly fetcher: CourseInventoryFetcher;
	private readonly store: LocalMirrorStore;
	private readonly tracker: InaccessibilityTracker;
	private readonly uploader: RemoteIndexUploader | null;
	private readonly lastRunPath: string | null;
	private readonly statusMutex = new SimpleMutex();
	private cached: CachedStatus | null = null;

	constructor(options: SyncServiceOptions) {
		this.orchestrator = options.orchestrator;
		this.fetcher = options.fetcher;
		this.store = options.store;
		this.tracker = options.tracker;
		this.uploader = options.uploader;
		this.lastRunPath = options.lastRunPath ?? null;
	}

	/**
	 * Reconciled view of LMS, mirror and index. The inventory is fetched on
	 * first use, when `refresh` is set, or when `courseIds` names a different
	 * set of courses than the cached one; the plan is recomputed from the
	 * current manifests on every call.
	 */
	async getStatus(options: StatusOptions = {}): Promise<StatusResponse> {
		return this.statusMutex.runExclusive(async () => {
			const scope = normalizeScope(options.courseIds);
			const reusable = !options.refresh && this.cached !== null && sameScope(this.cached.scope, scope);
			const inventory =
				reusable && this.cached ? this.cached.inventory : await this.fetchInventory(options.courseIds);

			const [localManifest, indexManifest, inaccessibleKeys, indexes, rejected] = await Promise.all([
				this.store.manifestSnapshot(),
				this.uploader ? this.uploader.listIndexed() : Promise.resolve([]),
				this.tracker.inaccessibleKeys(),
				this.uploader ? this.uploader.listIndexes() : Promise.resolve([]),
				this.uploader ? this.uploader.listRejected() : Promise.resolve([]),
			]);
			const syncPlan = plan(inventory, localManifest, indexManifest, inaccessibleKeys, { rejected });
			this.cached = { inventory, plan: syncPlan, scope };

			const courseNames = new Map(inventory.courses.map((course) => [course.id, course.name]));
			const missingByCourse: Record<string, number> = {};
			const detail: MissingFileDetail[] = [];
			for (const { file, classification } of syncPlan.files) {
				if (
					classification !== "missing-locally" &&
					classification !== "missing-in-index" &&
					classification !== "changed"
				) {
					continue;
				}
				const courseName = courseNames.get(file.courseId) ?? file.courseId;
				missingByCourse[courseName] = (missingByCourse[courseName] ?? 0) + 1;
				if (detail.length < MISSING_SAMPLE_SIZE) {
					detail.push({
						course_id: file.courseId,
						course_name: courseName,
						remote_id: file.id,
						path: file.path,
						classification,
					});
				}
			}

			return {
				canvas_courses: inventory.courses.length,
				canvas_files_total: inventory.files.length,
				indexed_files_total: indexManifest.length,
				missing_files_count: missingFilesCount(syncPlan),
				extra_files_count: syncPlan.extraInIndex.length,
				vector_stores_count: indexes.length,
				has_local_index: localManifest.length > 0,
				missing_by_course: missingByCourse,
				missing_files_sample: detail.map((file) => file.path),
				missing_files_detail: detail,
				known_inaccessible_count: syncPlan.totals.knownInaccessible,
				unsupported_files_count: syncPlan.totals.unsupported,
				courses_failed: syncPlan.coursesFailed.map((f) => ({ course_id: f.courseId, message: f.message })),
				plan_computed_at: syncPlan.computedAt,
				last_sync: await this.getLastRun(),
			};
		});
	}

	/**
	 * Start a run in the background and return immediately. An overlapping
	 * call returns `already_running` without touching the network.
	 */
	startSync(options: SyncRunOptions = {}): StartSyncResponse {
		let started: { runId: string; done: Promise<SyncRunSummary> };
		try {
			started = this.orchestrator.start(options);
		} catch (err) {
			if (err instanceof AlreadyRunningError) return { status: "already_running", run_id: err.runId };
			throw err;
		}

		// Run in background — do NOT await
		started.done
			.then(() => {
				// The next status call reflects what the run changed
				this.cached = null;
			})
			.catch((err) => {
				reportError(
					err instanceof Error ? err : String(err),
					{ runId: started.runId, operation: "sync-run" },
					ErrorSeverity.CRITICAL,
				);
			});

		return { status: "started", run_id: started.runId };
	}

	getSyncProgress(): SyncProgressResponse {
		const progress = this.orchestrator.getProgress();
		const summary = progress.summary;
		return {
			is_running: progress.isRunning,
			state: progress.state,
			run_id: progress.runId,
			tasks_total: progress.tasksTotal,
			tasks_done: progress.tasksDone,
			files_downloaded: summary?.filesDownloaded ?? 0,
			files_uploaded: summary?.filesUploaded ?? 0,
			files_skipped_inaccessible: summary?.filesSkippedInaccessible ?? 0,
			files_known_inaccessible: summary?.filesKnownInaccessible ?? 0,
			files_unsupported: summary?.filesUnsupported ?? 0,
			files_failed: summary?.filesFailed ?? 0,
			cancelled: summary?.cancelled ?? false,
			started_at: summary?.startedAt ?? null,
			finished_at: summary?.finishedAt ?? null,
			error: summary?.error ?? null,
		};
	}

	async resetInaccessible(courseId?: string): Promise<{ cleared: number }> {
		const cleared = await this.tracker.reset(courseId);
		return { cleared };
	}

	cancelSync(): { cancelled: boolean } {
		return { cancelled: this.orchestrator.cancel() };
	}

	/**
	 * Remove index documents whose file no longer exists in the LMS.
	 * Operator action; never triggered by a sync run.
	 */
	async pruneExtra(courseId?: string): Promise<{ pruned: number; failed: number }> {
		if (!this.uploader) return { pruned: 0, failed: 0 };
		const uploader = this.uploader;
		const { plan: syncPlan } = await this.currentPlan();

		let pruned = 0;
		let failed = 0;
		for (const entry of syncPlan.extraInIndex) {
			if (courseId !== undefined && entry.courseId !== courseId) continue;
			try {
				if (await uploader.removeEntry(entry)) pruned++;
			} catch (err) {
				failed++;
				reportError(
					err instanceof Error ? err : String(err),
					{ courseId: entry.courseId, operation: "prune-extra", additionalData: { remoteId: entry.remoteId } },
					ErrorSeverity.WARNING,
				);
			}
		}
		return { pruned, failed };
	}

	/** Rebuild index manifest rows from the remote indexes. Operator action. */
	async recoverIndexManifest(courseId?: string): Promise<{ recovered: number }> {
		if (!this.uploader) return { recovered: 0 };
		const uploader = this.uploader;
		const courseIds =
			courseId !== undefined ? [courseId] : (await this.currentPlan()).inventory.courses.map((c) => c.id);

		let recovered = 0;
		for (const id of courseIds) {
			recovered += await uploader.recoverFromIndex(id);
		}
		return { recovered };
	}

	/** Summary of the last finished run, from memory or `last-run.json`. */
	async getLastRun(): Promise<SyncRunSummary | null> {
		const progress = this.orchestrator.getProgress();
		if (!progress.isRunning && progress.summary) return progress.summary;
		if (!this.lastRunPath) return null;
		try {
			return await readJsonFile(this.lastRunPath, SyncRunSummarySchema.nullable(), () => null);
		} catch (err) {
			reportError(`last-run summary unreadable: ${errorMessage(err)}`, { operation: "read-last-run" }, ErrorSeverity.WARNING);
			return null;
		}
	}

	private async currentPlan(): Promise<CachedStatus> {
		if (!this.cached) await this.getStatus();
		if (this.cached) return this.cached;
		throw new Error("SyncService: status could not be computed");
	}

	private async fetchInventory(courseIds?: string[]): Promise<Inventory> {
		try {
			return await this.fetcher.fetchInventory(courseIds);
		} catch (err) {
			if (err instanceof PartialInventoryError) return err.inventory;
			throw err;
		}
	}
}

function normalizeScope(courseIds: string[] | undefined): string[] | null {
	return courseIds && courseIds.length > 0 ? [...new Set(courseIds)].sort() : null;
}

function sameScope(a: string[] | null, b: string[] | null): boolean {
	if (a === null || b === null) return a === b;
	return a.length === b.length && a.every((id, i) => id === b[i]);
}
