// ---------------------------------------------------------------------------
// CLI helpers
// ---------------------------------------------------------------------------

import { InvalidArgumentError } from "commander";
import { z } from "zod";

const CourseIdSchema = z.string().regex(/^\d+$/, "course ids are numeric");

/** Validate a single `--course` value. */
export function parseCourseId(value: string | undefined): string | undefined {
	if (value === undefined) return undefined;
	const result = CourseIdSchema.safeParse(value.trim());
	if (!result.success) throw new InvalidArgumentError(`Invalid course id "${value}": ${result.error.issues[0].message}`);
	return result.data;
}

/** Validate repeated or comma-separated `--course` values. */
export function parseCourseIds(values: string[] | undefined): string[] | undefined {
	if (!values || values.length === 0) return undefined;
	const ids = values.flatMap((value) => value.split(",")).filter((value) => value.trim().length > 0);
	return ids.map((id) => parseCourseId(id) ?? id);
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
