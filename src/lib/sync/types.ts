// ---------------------------------------------------------------------------
// Sync Engine — Types
// ---------------------------------------------------------------------------

import type { RemoteFileKind } from "@/lib/canvas/content-id";

/** A course as seen by the inventory. */
export interface CourseInfo {
	id: string;
	name: string;
	code: string | null;
	/** Sanitized folder name under the mirror root */
	folder: string;
}

/** One file as listed by the LMS. Rebuilt from every inventory fetch. */
export interface RemoteFile {
	id: string;
	courseId: string;
	kind: RemoteFileKind;
	/** Mirror-relative path, always with forward slashes */
	path: string;
	size: number;
	fingerprint: string;
	modifiedAt: string | null;
	contentType: string | null;
}

export interface CourseFailure {
	courseId: string;
	message: string;
}

/** Result of one inventory fetch. */
export interface Inventory {
	fetchedAt: string;
	/** Courses whose content was enumerated */
	courses: CourseInfo[];
	files: RemoteFile[];
	coursesFailed: CourseFailure[];
	/** "all" when every enrolled course was requested, else the requested ids */
	scope: "all" | string[];
}

export type LocalEntryStatus = "ok" | "inaccessible" | "stale";

/** Durable row of the local mirror manifest. */
export interface LocalEntry {
	remoteId: string;
	courseId: string;
	/** Path relative to the mirror root */
	localPath: string;
	fingerprint: string;
	size: number;
	downloadedAt: string;
	status: LocalEntryStatus;
}

/** Durable course → search index mapping. */
export interface IndexRecord {
	courseId: string;
	indexId: string;
	name: string;
	createdAt: string;
}

/** Durable row of the index manifest. */
export interface IndexedEntry {
	remoteId: string;
	courseId: string;
	indexId: string;
	documentId: string;
	fingerprint: string;
	path: string;
	uploadedAt: string;
}

/** A file version the index refused; not offered again until its fingerprint changes. */
export interface RejectedEntry {
	remoteId: string;
	courseId: string;
	fingerprint: string;
	path: string;
	reason: string;
	rejectedAt: string;
}

/** Durable record of a permission-denied download. */
export interface InaccessibleRecord {
	remoteId: string;
	courseId: string;
	path: string | null;
	reason: string;
	firstSeenAt: string;
	lastAttemptAt: string;
	attempts: number;
}

export type FileClassification =
	| "up-to-date"
	| "missing-locally"
	| "missing-in-index"
	| "changed"
	| "known-inaccessible";

export interface PlannedFile {
	file: RemoteFile;
	classification: FileClassification;
	/** False when the index cannot accept this file (format or size) or refused this version */
	indexable: boolean;
}

export interface CoursePlanCounts {
	courseId: string;
	courseName: string;
	upToDate: number;
	missingLocally: number;
	missingInIndex: number;
	changed: number;
	knownInaccessible: number;
	unsupported: number;
	extraInIndex: number;
}

/** Derived, never persisted. */
export interface SyncPlan {
	computedAt: string;
	files: PlannedFile[];
	extraInIndex: IndexedEntry[];
	byCourse: Record<string, CoursePlanCounts>;
	totals: Omit<CoursePlanCounts, "courseId" | "courseName">;
	coursesFailed: CourseFailure[];
}

export type SyncRunState = "idle" | "planning" | "executing" | "completed" | "failed";

export type FailureCategory = "permission" | "not-found" | "transient" | "unsupported" | "fatal";

export interface FileFailure {
	courseId: string;
	remoteId: string;
	path: string;
	phase: "download" | "upload";
	category: FailureCategory;
	message: string;
}

export interface SyncRunSummary {
	runId: string;
	state: SyncRunState;
	startedAt: string;
	finishedAt: string | null;
	cancelled: boolean;
	filesDownloaded: number;
	filesUploaded: number;
	/** Files whose download was refused during this run */
	filesSkippedInaccessible: number;
	/** Files skipped because an earlier run already recorded them as inaccessible */
	filesKnownInaccessible: number;
	filesUnsupported: number;
	filesFailed: number;
	coursesTouched: string[];
	coursesFailed: CourseFailure[];
	failures: FileFailure[];
	error: string | null;
}

export interface SyncProgress {
	state: SyncRunState;
	isRunning: boolean;
	runId: string | null;
	tasksTotal: number;
	tasksDone: number;
	summary: SyncRunSummary | null;
}

export interface SyncRunOptions {
	/** Restrict the run to these course ids */
	courseIds?: string[];
	/** Upload-only: index what is already mirrored, download nothing */
	skipDownload?: boolean;
	/** Download-only: never touch the search index */
	skipUpload?: boolean;
}

/** Composite manifest key; every durable record is keyed by (courseId, remoteId). */
export function fileKey(courseId: string, remoteId: string): string {
	return `${courseId}/${remoteId}`;
}
