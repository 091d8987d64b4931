// ---------------------------------------------------------------------------
// Canvas LMS API — Zod Validation Schemas
// Only the fields the inventory needs; unknown keys are stripped.
// ---------------------------------------------------------------------------

import { z } from "zod";

const timestamp = z.string().nullable().optional();

// --- Course ---

export const CanvasCourseSchema = z.object({
	id: z.number().int(),
	// Courses restricted by date come back with only an id
	name: z.string().optional(),
	course_code: z.string().nullable().optional(),
	access_restricted_by_date: z.boolean().optional(),
});

// --- File ---

export const CanvasFileSchema = z.object({
	id: z.number().int(),
	display_name: z.string(),
	filename: z.string().optional(),
	size: z.number().int().nonnegative().nullable().optional(),
	"content-type": z.string().optional(),
	// Empty or missing when the file is locked for the current user
	url: z.string().optional(),
	uuid: z.string().optional(),
	updated_at: timestamp,
	modified_at: timestamp,
	locked_for_user: z.boolean().optional(),
});

// --- Module ---

export const CanvasModuleItemSchema = z.object({
	id: z.number().int(),
	title: z.string(),
	type: z.string(),
	content_id: z.number().int().optional(),
	page_url: z.string().optional(),
});

export const CanvasModuleSchema = z.object({
	id: z.number().int(),
	name: z.string(),
	position: z.number().int().optional(),
	items: z.array(CanvasModuleItemSchema).optional(),
});

// --- Page ---

export const CanvasPageSchema = z.object({
	page_id: z.number().int(),
	url: z.string(),
	title: z.string(),
	body: z.string().nullable().optional(),
	updated_at: timestamp,
});

// --- Assignment ---

export const CanvasAssignmentSchema = z.object({
	id: z.number().int(),
	name: z.string(),
	description: z.string().nullable().optional(),
	updated_at: timestamp,
	attachments: z.array(CanvasFileSchema).optional(),
});

// --- Response wrappers ---

export const CanvasCoursesResponseSchema = z.array(CanvasCourseSchema);
export const CanvasFilesResponseSchema = z.array(CanvasFileSchema);
export const CanvasModulesResponseSchema = z.array(CanvasModuleSchema);
export const CanvasPagesResponseSchema = z.array(CanvasPageSchema);
export const CanvasAssignmentsResponseSchema = z.array(CanvasAssignmentSchema);
