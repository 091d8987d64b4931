// ---------------------------------------------------------------------------
// Sync Engine — Zod Validation Schemas
// Persisted run summaries and the payloads returned by the sync service
// ---------------------------------------------------------------------------

import { z } from "zod";

const SyncRunStateSchema = z.enum(["idle", "planning", "executing", "completed", "failed"]);

export const CourseFailureSchema = z.object({
	courseId: z.string(),
	message: z.string(),
});

export const FileFailureSchema = z.object({
	courseId: z.string(),
	remoteId: z.string(),
	path: z.string(),
	phase: z.enum(["download", "upload"]),
	category: z.enum(["permission", "not-found", "transient", "unsupported", "fatal"]),
	message: z.string(),
});

/** Shape of `last-run.json` */
export const SyncRunSummarySchema = z.object({
	runId: z.string().uuid(),
	state: SyncRunStateSchema,
	startedAt: z.string().datetime({ offset: true }),
	finishedAt: z.string().datetime({ offset: true }).nullable(),
	cancelled: z.boolean(),
	filesDownloaded: z.number().int().nonnegative(),
	filesUploaded: z.number().int().nonnegative(),
	filesSkippedInaccessible: z.number().int().nonnegative(),
	filesKnownInaccessible: z.number().int().nonnegative(),
	filesUnsupported: z.number().int().nonnegative(),
	filesFailed: z.number().int().nonnegative(),
	coursesTouched: z.array(z.string()),
	coursesFailed: z.array(CourseFailureSchema),
	failures: z.array(FileFailureSchema),
	error: z.string().nullable(),
});

// --- Sync service payloads ---

export const MissingFileDetailSchema = z.object({
	course_id: z.string(),
	course_name: z.string(),
	remote_id: z.string(),
	path: z.string(),
	classification: z.enum(["missing-locally", "missing-in-index", "changed"]),
});

export const StatusResponseSchema = z.object({
	canvas_courses: z.number().int().nonnegative(),
	canvas_files_total: z.number().int().nonnegative(),
	indexed_files_total: z.number().int().nonnegative(),
	missing_files_count: z.number().int().nonnegative(),
	extra_files_count: z.number().int().nonnegative(),
	vector_stores_count: z.number().int().nonnegative(),
	has_local_index: z.boolean(),
	missing_by_course: z.record(z.number().int().nonnegative()),
	/** Paths of up to ten files that still need work */
	missing_files_sample: z.array(z.string()),
	/** The same files with their course and classification */
	missing_files_detail: z.array(MissingFileDetailSchema),
	known_inaccessible_count: z.number().int().nonnegative(),
	unsupported_files_count: z.number().int().nonnegative(),
	courses_failed: z.array(z.object({ course_id: z.string(), message: z.string() })),
	plan_computed_at: z.string().datetime({ offset: true }),
	last_sync: SyncRunSummarySchema.nullable(),
});

export const StartSyncResponseSchema = z.discriminatedUnion("status", [
	z.object({ status: z.literal("started"), run_id: z.string().uuid() }),
	z.object({ status: z.literal("already_running"), run_id: z.string().uuid().nullable() }),
]);

export const SyncProgressResponseSchema = z.object({
	is_running: z.boolean(),
	state: SyncRunStateSchema,
	run_id: z.string().uuid().nullable(),
	tasks_total: z.number().int().nonnegative(),
	tasks_done: z.number().int().nonnegative(),
	files_downloaded: z.number().int().nonnegative(),
	files_uploaded: z.number().int().nonnegative(),
	files_skipped_inaccessible: z.number().int().nonnegative(),
	files_known_inaccessible: z.number().int().nonnegative(),
	files_unsupported: z.number().int().nonnegative(),
	files_failed: z.number().int().nonnegative(),
	cancelled: z.boolean(),
	started_at: z.string().nullable(),
	finished_at: z.string().nullable(),
	error: z.string().nullable(),
});

export type StatusResponse = z.infer<typeof StatusResponseSchema>;
export type StartSyncResponse = z.infer<typeof StartSyncResponseSchema>;
export type SyncProgressResponse = z.infer<typeof SyncProgressResponseSchema>;
export type MissingFileDetail = z.infer<typeof MissingFileDetailSchema>;
