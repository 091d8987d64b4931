// ---------------------------------------------------------------------------
// Canvas LMS API — Entity Types and the LMS client contract
// ---------------------------------------------------------------------------

import type { z } from "zod";
import type {
	CanvasAssignmentSchema,
	CanvasCourseSchema,
	CanvasFileSchema,
	CanvasModuleItemSchema,
	CanvasModuleSchema,
	CanvasPageSchema,
} from "./schemas";

export type CanvasCourse = z.infer<typeof CanvasCourseSchema>;
export type CanvasFile = z.infer<typeof CanvasFileSchema>;
export type CanvasModuleItem = z.infer<typeof CanvasModuleItemSchema>;
export type CanvasModule = z.infer<typeof CanvasModuleSchema>;
export type CanvasPage = z.infer<typeof CanvasPageSchema>;
export type CanvasAssignment = z.infer<typeof CanvasAssignmentSchema>;

/** Content categories enumerated per course. */
export type ContentKind = "files" | "modules" | "assignments" | "pages";

export interface ContentItemByKind {
	files: CanvasFile;
	modules: CanvasModule;
	assignments: CanvasAssignment;
	pages: CanvasPage;
}

/**
 * What the sync engine consumes from the LMS. `CanvasClient` is the real
 * implementation; tests provide in-memory fakes.
 *
 * Every method may fail with a `CanvasApiError` whose `kind` is one of
 * `unauthorized`, `forbidden`, `not-found`, `rate-limited`, `unavailable`.
 */
export interface LmsClient {
	listCourses(): Promise<CanvasCourse[]>;
	listCourseContent<K extends ContentKind>(courseId: string, kind: K): Promise<ContentItemByKind[K][]>;
	getFile(courseId: string, fileId: string): Promise<CanvasFile>;
	/** `pageUrl` is the page slug (or numeric id). */
	getPage(courseId: string, pageUrl: string): Promise<CanvasPage>;
	getAssignment(courseId: string, assignmentId: string): Promise<CanvasAssignment>;
	/** `contentId` is a namespaced RemoteFile id (`file-…`, `page-…`, `assignment-…`). */
	downloadContent(courseId: string, contentId: string): Promise<Uint8Array>;
}
