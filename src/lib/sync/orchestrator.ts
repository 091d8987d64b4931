// ---------------------------------------------------------------------------
// Sync Orchestrator
// Plan → mark stale → download/upload per file through a bounded worker pool
// ---------------------------------------------------------------------------

import type { LmsClient } from "@/lib/canvas/types";
import type { InaccessibilityTracker } from "@/lib/mirror/inaccessibility-tracker";
import type { LocalMirrorStore } from "@/lib/mirror/store";
import { ErrorSeverity, reportError } from "@/lib/monitoring/rollbar-official";
import { logSyncCritical, logSyncError, logSyncInfo, logSyncWarning } from "@/lib/monitoring/sync-logger";
import type { RemoteIndexUploader } from "@/lib/search-index/uploader";
import { writeJsonFile } from "@/lib/storage/json-file";
import { v4 as uuidv4 } from "uuid";
import {
	AlreadyRunningError,
	classifyError,
	errorMessage,
	PartialInventoryError,
	PermissionDeniedError,
	toFileError,
} from "./errors";
import { CourseInventoryFetcher } from "./inventory-fetcher";
import { plan } from "./planner";
import { type RetryOptions, withRetry } from "./retry-policy";
import type {
	CourseInfo,
	Inventory,
	PlannedFile,
	RemoteFile,
	SyncPlan,
	SyncProgress,
	SyncRunOptions,
	SyncRunState,
	SyncRunSummary,
} from "./types";
import { runPool } from "./worker-pool";

export interface SyncOrchestratorOptions {
	client: LmsClient;
	store: LocalMirrorStore;
	tracker: InaccessibilityTracker;
	/** Null when no search index is configured; runs are then download-only */
	uploader: RemoteIndexUploader | null;
	/** Defaults to a fetcher over `client` */
	fetcher?: CourseInventoryFetcher;
	/** Parallel file tasks (default: 4) */
	concurrency?: number;
	retry?: Omit<RetryOptions, "onFailedAttempt">;
	/** Where the summary of the last run is persisted */
	lastRunPath?: string;
	/** Cancel a run that is still going after this long */
	timeoutMs?: number;
}

interface FileTask {
	file: RemoteFile;
	course: CourseInfo | undefined;
	download: boolean;
	upload: boolean;
}

interface ActiveRun {
	runId: string;
	controller: AbortController;
	summary: SyncRunSummary;
	tasksTotal: number;
	tasksDone: number;
	touched: Set<string>;
	timedOut: boolean;
}

/**
 * Drives one sync run at a time through `idle → planning → executing →
 * completed | failed`.
 *
 * - Overlapping runs are rejected with `AlreadyRunningError` before any I/O
 * - File failures are recorded in the summary and never abort the run
 * - `cancel()` stops new tasks from starting; running tasks finish
 */
export class SyncOrchestrator {
	private readonly client: LmsClient;
	private readonly store: LocalMirrorStore;
	private readonly tracker: InaccessibilityTracker;
	private readonly uploader: RemoteIndexUploader | null;
	private readonly fetcher: CourseInventoryFetcher;
	private readonly concurrency: number;
	private readonly retry: Omit<RetryOptions, "onFailedAttempt">;
	private readonly lastRunPath: string | null;
	private readonly timeoutMs: number | null;

	private state: SyncRunState = "idle";
	private active: ActiveRun | null = null;
	private lastSummary: SyncRunSummary | null = null;
	private lastPlan: SyncPlan | null = null;

	constructor(options: SyncOrchestratorOptions) {
		this.client = options.client;
		this.store = options.store;
		this.tracker = options.tracker;
		this.uploader = options.uploader;
		this.retry = options.retry ?? {};
		this.fetcher = options.fetcher ?? new CourseInventoryFetcher({ client: options.client, retry: this.retry });
		this.concurrency = Math.max(1, options.concurrency ?? 4);
		this.lastRunPath = options.lastRunPath ?? null;
		this.timeoutMs = options.timeoutMs ?? null;
	}

	get isRunning(): boolean {
		return this.active !== null;
	}

	/** Plan computed by the most recent run, if any. */
	get latestPlan(): SyncPlan | null {
		return this.lastPlan;
	}

	/**
	 * Begin a run and return its id together with the completion promise.
	 * Throws `AlreadyRunningError` synchronously when a run is in progress.
	 */
	start(options: SyncRunOptions = {}): { runId: string; done: Promise<SyncRunSummary> } {
		if (this.active) throw new AlreadyRunningError(this.active.runId);

		const runId = uuidv4();
		const active: ActiveRun = {
			runId,
			controller: new AbortController(),
			summary: emptySummary(runId),
			tasksTotal: 0,
			tasksDone: 0,
			touched: new Set(),
			timedOut: false,
		};
		this.active = active;
		this.state = "planning";

		return { runId, done: this.execute(active, options) };
	}

	/** Start a run and wait for its summary. */
	async run(options: SyncRunOptions = {}): Promise<SyncRunSummary> {
		return this.start(options).done;
	}

	/** Request cooperative cancellation. Returns false when nothing is running. */
	cancel(): boolean {
		if (!this.active || this.active.controller.signal.aborted) return false;
		logSyncInfo(this.active.runId, "cancellation requested");
		this.active.controller.abort();
		return true;
	}

	/** Snapshot of the current run, or of the last finished run when idle. */
	getProgress(): SyncProgress {
		const active = this.active;
		if (active) {
			return {
				state: this.state,
				isRunning: true,
				runId: active.runId,
				tasksTotal: active.tasksTotal,
				tasksDone: active.tasksDone,
				summary: cloneSummary(active.summary),
			};
		}
		return {
			state: this.state,
			isRunning: false,
			runId: this.lastSummary?.runId ?? null,
			tasksTotal: 0,
			tasksDone: 0,
			summary: this.lastSummary ? cloneSummary(this.lastSummary) : null,
		};
	}

	private async execute(active: ActiveRun, options: SyncRunOptions): Promise<SyncRunSummary> {
		const { runId, summary, controller } = active;
		const skipUpload = options.skipUpload === true || this.uploader === null;
		const timer =
			this.timeoutMs === null
				? null
				: setTimeout(() => {
						active.timedOut = true;
						logSyncWarning(runId, `run exceeded ${this.timeoutMs}ms, cancelling`);
						controller.abort();
					}, this.timeoutMs);

		logSyncInfo(runId, `run started${options.courseIds?.length ? ` for ${options.courseIds.join(", ")}` : ""}`);

		try {
			// Planning
			const inventory = await this.fetchInventory(runId, options.courseIds);
			summary.coursesFailed = [...inventory.coursesFailed];

			const [localManifest, indexManifest, inaccessibleKeys, rejected] = await Promise.all([
				this.store.manifestSnapshot(),
				this.uploader ? this.uploader.listIndexed() : Promise.resolve([]),
				this.tracker.inaccessibleKeys(),
				this.uploader ? this.uploader.listRejected() : Promise.resolve([]),
			]);
			const syncPlan = plan(inventory, localManifest, indexManifest, inaccessibleKeys, { rejected });
			this.lastPlan = syncPlan;

			// Executing
			this.state = "executing";
			summary.state = "executing";
			const courses = new Map(inventory.courses.map((course) => [course.id, course]));
			const tasks = this.buildTasks(syncPlan.files, courses, options.skipDownload === true, skipUpload);
			summary.filesKnownInaccessible = syncPlan.totals.knownInaccessible;
			summary.filesUnsupported = syncPlan.files.filter(
				(planned) => !planned.indexable && planned.classification !== "known-inaccessible",
			).length;
			active.tasksTotal = tasks.length;

			// Changed files are marked stale before any download starts
			for (const task of tasks) {
				if (!task.download) continue;
				const entry = await this.store.get(task.file.courseId, task.file.id);
				if (entry && entry.status === "ok" && entry.fingerprint !== task.file.fingerprint) {
					await this.store.setStatus(task.file.courseId, task.file.id, "stale");
				}
			}

			logSyncInfo(runId, `${tasks.length} file task(s) planned`);
			await runPool(tasks, this.concurrency, (task) => this.runTask(active, task), controller.signal);

			summary.cancelled = controller.signal.aborted;
			summary.state = "completed";
			if (active.timedOut) summary.error = `Sync timed out after ${this.timeoutMs}ms`;
		} catch (err) {
			summary.state = "failed";
			summary.error = errorMessage(err);
			logSyncCritical(runId, `run failed: ${summary.error}`);
			reportError(err instanceof Error ? err : summary.error, { runId, operation: "sync-run" }, ErrorSeverity.CRITICAL);
		} finally {
			if (timer) clearTimeout(timer);
		}

		summary.coursesTouched = [...active.touched].sort();
		summary.finishedAt = new Date().toISOString();
		await this.persistSummary(summary);

		this.state = summary.state;
		this.lastSummary = cloneSummary(summary);
		this.active = null;

		logSyncInfo(
			runId,
			`run ${summary.state}${summary.cancelled ? " (cancelled)" : ""}: ` +
				`${summary.filesDownloaded} downloaded, ${summary.filesUploaded} uploaded, ` +
				`${summary.filesSkippedInaccessible} inaccessible, ${summary.filesFailed} failed`,
		);

		return cloneSummary(summary);
	}

	private async fetchInventory(runId: string, courseIds: string[] | undefined): Promise<Inventory> {
		try {
			return await this.fetcher.fetchInventory(courseIds, { runId });
		} catch (err) {
			if (err instanceof PartialInventoryError) {
				logSyncWarning(runId, `continuing without ${err.coursesFailed.length} failed course(s)`);
				return err.inventory;
			}
			throw err;
		}
	}

	/** One task per file that needs work, grouped by course. */
	private buildTasks(
		files: readonly PlannedFile[],
		courses: ReadonlyMap<string, CourseInfo>,
		skipDownload: boolean,
		skipUpload: boolean,
	): FileTask[] {
		const tasks: FileTask[] = [];
		for (const { file, classification, indexable } of files) {
			let download = false;
			let upload = false;
			switch (classification) {
				case "missing-locally":
				case "changed":
					download = !skipDownload;
					upload = download && indexable && !skipUpload;
					break;
				case "missing-in-index":
					upload = !skipUpload;
					break;
				default:
					break;
			}
			if (download || upload) tasks.push({ file, course: courses.get(file.courseId), download, upload });
		}
		return tasks.sort((a, b) => a.file.courseId.localeCompare(b.file.courseId));
	}

	private async runTask(active: ActiveRun, task: FileTask): Promise<void> {
		const { runId, summary } = active;
		const { file } = task;
		const target = { courseId: file.courseId, remoteId: file.id, path: file.path };
		const retry: RetryOptions = {
			...this.retry,
			onFailedAttempt: (error, attempt, retriesLeft) => {
				if (retriesLeft > 0) {
					logSyncWarning(runId, `attempt ${attempt} failed, retrying: ${error.message}`, target);
				}
			},
		};

		try {
			let bytes: Uint8Array | null = null;

			if (task.download) {
				try {
					const downloaded = await withRetry(() => this.client.downloadContent(file.courseId, file.id), retry);
					await this.store.write(file, downloaded);
					bytes = downloaded;
					summary.filesDownloaded++;
					active.touched.add(file.courseId);
				} catch (err) {
					await this.handleDownloadFailure(active, file, err);
					return;
				}
			}

			if (task.upload && this.uploader) {
				const uploader = this.uploader;
				try {
					const content = bytes ?? (await this.store.read(file.courseId, file.id));
					await withRetry(async () => {
						await uploader.ensureIndex(file.courseId, task.course?.name);
						return uploader.upload(file.courseId, file, content);
					}, retry);
					summary.filesUploaded++;
					active.touched.add(file.courseId);
				} catch (err) {
					const category = classifyError(err);
					summary.failures.push({ ...target, phase: "upload", category, message: errorMessage(err) });
					if (category === "unsupported") {
						summary.filesUnsupported++;
						logSyncInfo(runId, `not indexable: ${errorMessage(err)}`, target);
					} else {
						summary.filesFailed++;
						logSyncError(runId, `upload failed: ${errorMessage(err)}`, target);
					}
				}
			}
		} finally {
			active.tasksDone++;
		}
	}

	private async handleDownloadFailure(active: ActiveRun, file: RemoteFile, err: unknown): Promise<void> {
		const { runId, summary } = active;
		const target = { courseId: file.courseId, remoteId: file.id, path: file.path };
		const failure = toFileError(err, file.courseId, file.id);

		if (failure instanceof PermissionDeniedError) {
			const reason = failure.message;
			await this.tracker.markInaccessible(file.id, file.courseId, { path: file.path, reason });
			await this.store.setStatus(file.courseId, file.id, "inaccessible");
			summary.filesSkippedInaccessible++;
			logSyncWarning(runId, `download refused (${reason}), recorded as inaccessible`, target);
			return;
		}

		const category = classifyError(failure);
		summary.filesFailed++;
		summary.failures.push({ ...target, phase: "download", category, message: failure.message });
		logSyncError(runId, `download failed (${category}): ${failure.message}`, target);
	}

	private async persistSummary(summary: SyncRunSummary): Promise<void> {
		if (!this.lastRunPath) return;
		try {
			await writeJsonFile(this.lastRunPath, summary);
		} catch (err) {
			logSyncError(summary.runId, `could not persist run summary: ${errorMessage(err)}`);
		}
	}
}

function emptySummary(runId: string): SyncRunSummary {
	return {
		runId,
		state: "planning",
		startedAt: new Date().toISOString(),
		finishedAt: null,
		cancelled: false,
		filesDownloaded: 0,
		filesUploaded: 0,
		filesSkippedInaccessible: 0,
		filesKnownInaccessible: 0,
		filesUnsupported: 0,
		filesFailed: 0,
		coursesTouched: [],
		coursesFailed: [],
		failures: [],
		error: null,
	};
}

function cloneSummary(summary: SyncRunSummary): SyncRunSummary {
	return {
		...summary,
		coursesTouched: [...summary.coursesTouched],
		coursesFailed: summary.coursesFailed.map((failure) => ({ ...failure })),
		failures: summary.failures.map((failure) => ({ ...failure })),
	};
}
