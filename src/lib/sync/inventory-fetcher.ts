// ---------------------------------------------------------------------------
// Course Inventory Fetcher
// Lists courses and normalizes files, modules, pages and assignments into one
// RemoteFile namespace per course.
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { toContentId } from "@/lib/canvas/content-id";
import type {
	CanvasAssignment,
	CanvasCourse,
	CanvasFile,
	CanvasPage,
	ContentItemByKind,
	ContentKind,
	LmsClient,
} from "@/lib/canvas/types";
import { logSyncWarning } from "@/lib/monitoring/sync-logger";
import {
	classifyError,
	errorMessage,
	PartialInventoryError,
	RemoteUnavailableError,
	UnknownCourseError,
} from "./errors";
import { hashChangeToken, hashContent } from "./fingerprint";
import { courseFolderName, extractLinkedFileIds, sanitizeFilename, withDisambiguator } from "./paths";
import { type RetryOptions, withRetry } from "./retry-policy";
import type { CourseFailure, CourseInfo, Inventory, RemoteFile } from "./types";

type CategoryResult<T> =
	| { status: "ok"; items: T[] }
	| { status: "denied"; items: T[] }
	| { status: "failed"; items: T[]; error: unknown };

interface ExportedHtml {
	folder: string;
	html: string;
}

export interface FetchContext {
	/** Correlates log entries with a sync run */
	runId?: string;
}

export interface CourseInventoryFetcherOptions {
	client: LmsClient;
	retry?: Omit<RetryOptions, "onFailedAttempt">;
}

/**
 * Builds an `Inventory` from the LMS. Read-only: nothing is written locally.
 *
 * Placement precedence when the same file is reachable several ways:
 * module items, then the Files area, then pages, then assignments, then
 * files linked from exported HTML. The first placement wins.
 */
export class CourseInventoryFetcher {
	private readonly client: LmsClient;
	private readonly retry: Omit<RetryOptions, "onFailedAttempt">;

	constructor(options: CourseInventoryFetcherOptions) {
		this.client = options.client;
		this.retry = options.retry ?? {};
	}

	/**
	 * Fetch the inventory of every enrolled course, or of `courseIds` only.
	 *
	 * @throws RemoteUnavailableError  course list unavailable, or every course failed
	 * @throws UnknownCourseError      none of `courseIds` is an enrolled course
	 * @throws PartialInventoryError   some courses failed; carries the rest
	 */
	async fetchInventory(courseIds?: string[], context: FetchContext = {}): Promise<Inventory> {
		const runId = context.runId ?? "inventory";
		const requested = courseIds && courseIds.length > 0 ? courseIds : null;

		let listed: CanvasCourse[];
		try {
			listed = await this.call(() => this.client.listCourses());
		} catch (err) {
			throw new RemoteUnavailableError(`Could not list courses: ${errorMessage(err)}`, err);
		}

		const selected = requested ? listed.filter((course) => requested.includes(String(course.id))) : listed;
		const coursesFailed: CourseFailure[] = [];

		if (requested) {
			if (selected.length === 0) throw new UnknownCourseError(requested);
			const enrolled = new Set(selected.map((course) => String(course.id)));
			for (const id of requested) {
				if (!enrolled.has(id)) coursesFailed.push({ courseId: id, message: "not an enrolled course" });
			}
		}

		const results = await Promise.all(
			selected.map(async (course) => {
				try {
					return { course, outcome: await this.fetchCourse(course, runId), message: null };
				} catch (err) {
					logSyncWarning(runId, `course listing failed: ${errorMessage(err)}`, { courseId: String(course.id) });
					return { course, outcome: null, message: errorMessage(err) };
				}
			}),
		);

		const courses: CourseInfo[] = [];
		const files: RemoteFile[] = [];
		for (const result of results) {
			if (result.outcome) {
				courses.push(result.outcome.course);
				files.push(...result.outcome.files);
				// Listed files are kept, but the course is not treated as fully known
				if (result.outcome.gaps.length > 0) {
					coursesFailed.push({
						courseId: result.outcome.course.id,
						message: `incomplete listing: ${result.outcome.gaps.join("; ")}`,
					});
				}
			} else {
				coursesFailed.push({ courseId: String(result.course.id), message: result.message ?? "unknown error" });
			}
		}

		const inventory: Inventory = {
			fetchedAt: new Date().toISOString(),
			courses,
			files,
			coursesFailed,
			scope: requested ? [...requested] : "all",
		};

		if (selected.length > 0 && courses.length === 0) {
			throw new RemoteUnavailableError(
				`Every course failed to list: ${coursesFailed.map((f) => `${f.courseId} (${f.message})`).join(", ")}`,
			);
		}
		if (coursesFailed.length > 0) throw new PartialInventoryError(coursesFailed, inventory);

		return inventory;
	}

	private async fetchCourse(
		canvasCourse: CanvasCourse,
		runId: string,
	): Promise<{ course: CourseInfo; files: RemoteFile[]; gaps: string[] }> {
		const courseId = String(canvasCourse.id);
		const name = sanitizeFilename(canvasCourse.name ?? `Course_${courseId}`);
		const code = canvasCourse.course_code ?? null;
		const course: CourseInfo = { id: courseId, name, code, folder: courseFolderName(name, code) };

		const [files, modules, pages, assignments] = await Promise.all([
			this.listCategory(courseId, "files"),
			this.listCategory(courseId, "modules"),
			this.listCategory(courseId, "pages"),
			this.listCategory(courseId, "assignments"),
		]);

		const categories = [files, modules, pages, assignments];
		if (categories.every((category) => category.status === "failed")) {
			const first = categories[0];
			throw first.status === "failed" ? first.error : new Error("course content unavailable");
		}
		const gaps: string[] = [];
		for (const [kind, category] of [
			["files", files],
			["modules", modules],
			["pages", pages],
			["assignments", assignments],
		] as const) {
			if (category.status === "denied") {
				logSyncWarning(runId, `${kind} are not accessible, skipping category`, { courseId });
			} else if (category.status === "failed") {
				logSyncWarning(runId, `${kind} could not be listed: ${errorMessage(category.error)}`, { courseId });
				gaps.push(`${kind} could not be listed: ${errorMessage(category.error)}`);
			}
		}

		const collector = new CourseFileCollector(course);
		const filesById = new Map(files.items.map((file) => [String(file.id), file]));
		const pagesByUrl = new Map(pages.items.map((page) => [page.url, page]));
		const assignmentsById = new Map(assignments.items.map((a) => [String(a.id), a]));

		const lookup = async <T>(label: string, fn: () => Promise<T>): Promise<T | null> => {
			try {
				return await this.call(fn);
			} catch (err) {
				logSyncWarning(runId, `${label} unavailable: ${errorMessage(err)}`, { courseId });
				// A missing or hidden item is simply absent; anything else leaves the course incomplete
				const category = classifyError(err);
				if (category !== "permission" && category !== "not-found") {
					gaps.push(`${label} unavailable: ${errorMessage(err)}`);
				}
				return null;
			}
		};

		// 1. Module items
		const orderedModules = [...modules.items].sort((a, b) => (a.position ?? 0) - (b.position ?? 0));
		for (const module of orderedModules) {
			const folder = path.posix.join("Modules", sanitizeFilename(module.name));
			for (const item of module.items ?? []) {
				if (item.type === "File" && item.content_id !== undefined) {
					const fileId = String(item.content_id);
					if (collector.has("file", fileId)) continue;
					const file =
						filesById.get(fileId) ?? (await lookup(`file ${fileId}`, () => this.client.getFile(courseId, fileId)));
					if (file) collector.addFile(file, folder);
				} else if (item.type === "Page" && item.page_url) {
					const pageUrl = item.page_url;
					const page =
						pagesByUrl.get(pageUrl) ??
						(await lookup(`page ${pageUrl}`, () => this.client.getPage(courseId, pageUrl)));
					if (page) collector.addPage(page, folder, item.title);
				} else if (item.type === "Assignment" && item.content_id !== undefined) {
					const assignmentId = String(item.content_id);
					const assignment =
						assignmentsById.get(assignmentId) ??
						(await lookup(`assignment ${assignmentId}`, () =>
							this.client.getAssignment(courseId, assignmentId),
						));
					if (assignment) collector.addAssignment(assignment, folder, item.title);
				}
			}
		}

		// 2. Files area
		for (const file of files.items) collector.addFile(file, "Files");

		// 3. Pages, 4. Assignments not reached through a module
		for (const page of pages.items) collector.addPage(page, "Pages");
		for (const assignment of assignments.items) collector.addAssignment(assignment, "Assignments");

		// 5. Files linked from exported HTML, placed beside the document linking them
		for (const exported of collector.exportedHtml()) {
			for (const fileId of extractLinkedFileIds(exported.html)) {
				if (collector.has("file", fileId)) continue;
				const file =
					filesById.get(fileId) ?? (await lookup(`linked file ${fileId}`, () => this.client.getFile(courseId, fileId)));
				if (file) collector.addFile(file, exported.folder);
			}
		}

		return { course, files: collector.files(), gaps };
	}

	/** Permission and not-found errors leave a category empty; anything else is reported as failed. */
	private async listCategory<K extends ContentKind>(
		courseId: string,
		kind: K,
	): Promise<CategoryResult<ContentItemByKind[K]>> {
		try {
			const items = await this.call(() => this.client.listCourseContent(courseId, kind));
			return { status: "ok", items };
		} catch (err) {
			const category = classifyError(err);
			if (category === "permission" || category === "not-found") {
				return { status: "denied", items: [] };
			}
			return { status: "failed", items: [], error: err };
		}
	}

	private call<T>(fn: () => Promise<T>): Promise<T> {
		return withRetry(fn, this.retry);
	}
}

/**
 * Accumulates the RemoteFiles of one course, enforcing one placement per id
 * and unique paths.
 */
class CourseFileCollector {
	private readonly byId = new Map<string, RemoteFile>();
	private readonly paths = new Set<string>();
	private readonly html: ExportedHtml[] = [];

	constructor(private readonly course: CourseInfo) {}

	has(kind: RemoteFile["kind"], sourceId: string): boolean {
		return this.byId.has(toContentId(kind, sourceId));
	}

	addFile(file: CanvasFile, folder: string): void {
		const id = toContentId("file", file.id);
		if (this.byId.has(id)) return;
		const updatedAt = file.updated_at ?? file.modified_at ?? null;
		this.claim({
			id,
			courseId: this.course.id,
			kind: "file",
			path: this.placePath(folder, sanitizeFilename(file.display_name || file.filename || "unnamed"), file.id),
			size: file.size ?? 0,
			fingerprint: hashChangeToken({ id: file.id, size: file.size ?? null, updatedAt, uuid: file.uuid ?? null }),
			modifiedAt: file.modified_at ?? file.updated_at ?? null,
			contentType: file["content-type"] ?? null,
		});
	}

	addPage(page: CanvasPage, folder: string, title = page.title): void {
		const id = toContentId("page", page.page_id);
		if (this.byId.has(id) || !page.body) return;
		this.claimHtml(id, "page", page.body, this.placePath(folder, sanitizeFilename(`${title}.html`), page.page_id), page.updated_at, folder);
	}

	addAssignment(assignment: CanvasAssignment, folder: string, title = assignment.name): void {
		const id = toContentId("assignment", assignment.id);
		if (this.byId.has(id)) return;
		if (assignment.description) {
			this.claimHtml(
				id,
				"assignment",
				assignment.description,
				this.placePath(folder, sanitizeFilename(`${title}_description.html`), assignment.id),
				assignment.updated_at,
				folder,
			);
		}
		for (const attachment of assignment.attachments ?? []) this.addFile(attachment, folder);
	}

	exportedHtml(): ExportedHtml[] {
		return [...this.html];
	}

	files(): RemoteFile[] {
		return [...this.byId.values()];
	}

	private claimHtml(
		id: string,
		kind: "page" | "assignment",
		html: string,
		filePath: string,
		updatedAt: string | null | undefined,
		folder: string,
	): void {
		this.claim({
			id,
			courseId: this.course.id,
			kind,
			path: filePath,
			size: Buffer.byteLength(html, "utf-8"),
			fingerprint: hashContent(html),
			modifiedAt: updatedAt ?? null,
			contentType: "text/html",
		});
		this.html.push({ folder, html });
	}

	private claim(file: RemoteFile): void {
		this.byId.set(file.id, file);
		this.paths.add(file.path);
	}

	/** Course-relative placement; a taken path gets ` (<id>)` before the extension. */
	private placePath(folder: string, name: string, sourceId: number): string {
		const candidate = path.posix.join(this.course.folder, folder, name);
		return this.paths.has(candidate) ? withDisambiguator(candidate, String(sourceId)) : candidate;
	}
}
