// ---------------------------------------------------------------------------
// CLI output formatting
// ---------------------------------------------------------------------------

import type { StatusResponse, SyncProgressResponse } from "@/lib/sync/schemas";
import type { SyncRunSummary } from "@/lib/sync/types";
import { c } from "./colors";

export function formatStatus(status: StatusResponse): string[] {
	const lines = [
		c.title("Course file index"),
		`  Courses:             ${status.canvas_courses}`,
		`  Files in Canvas:     ${status.canvas_files_total}`,
		`  Files indexed:       ${status.indexed_files_total}`,
		`  Vector stores:       ${status.vector_stores_count}`,
		`  Missing or changed:  ${status.missing_files_count === 0 ? c.success("0") : c.warning(String(status.missing_files_count))}`,
		`  Extra in index:      ${status.extra_files_count}`,
		`  Inaccessible:        ${status.known_inaccessible_count}`,
		`  Not indexable:       ${status.unsupported_files_count}`,
	];

	const byCourse = Object.entries(status.missing_by_course).sort(([a], [b]) => a.localeCompare(b));
	if (byCourse.length > 0) {
		lines.push("", c.bold("Missing by course"));
		for (const [course, count] of byCourse) lines.push(c.list(`${course}: ${count}`));
	}

	if (status.missing_files_detail.length > 0) {
		lines.push("", c.bold("Sample"));
		for (const file of status.missing_files_detail) {
			lines.push(c.list(`${c.path(file.path)} ${c.dim(`(${file.classification})`)}`));
		}
	}

	for (const failure of status.courses_failed) {
		lines.push(c.warning(`Course ${failure.course_id} could not be listed: ${failure.message}`));
	}

	if (status.last_sync) {
		lines.push("", `Last sync: ${status.last_sync.state} at ${status.last_sync.finishedAt ?? status.last_sync.startedAt}`);
	}

	return lines;
}

export function formatProgress(progress: SyncProgressResponse): string {
	const tasks = progress.tasks_total > 0 ? `${progress.tasks_done}/${progress.tasks_total}` : "-";
	return (
		`[${progress.state}] tasks ${tasks} · ` +
		`downloaded ${progress.files_downloaded} · uploaded ${progress.files_uploaded} · ` +
		`inaccessible ${progress.files_skipped_inaccessible} · failed ${progress.files_failed}`
	);
}

export function formatSummary(summary: SyncRunSummary): string[] {
	const headline =
		summary.state === "completed"
			? c.success(summary.cancelled ? "Sync cancelled" : "Sync completed")
			: c.error("Sync failed");
	const lines = [
		headline,
		`  Downloaded:            ${summary.filesDownloaded}`,
		`  Uploaded:              ${summary.filesUploaded}`,
		`  Newly inaccessible:    ${summary.filesSkippedInaccessible}`,
		`  Known inaccessible:    ${summary.filesKnownInaccessible}`,
		`  Not indexable:         ${summary.filesUnsupported}`,
		`  Failed:                ${summary.filesFailed}`,
	];
	if (summary.error) lines.push(c.warning(summary.error));
	for (const failure of summary.failures.filter((f) => f.category !== "unsupported")) {
		lines.push(c.list(`${c.path(failure.path)}: ${failure.phase} ${failure.category}: ${failure.message}`));
	}
	for (const failure of summary.coursesFailed) {
		lines.push(c.warning(`Course ${failure.courseId} skipped: ${failure.message}`));
	}
	return lines;
}
