// ---------------------------------------------------------------------------
// Mirror path helpers
// ---------------------------------------------------------------------------

import * as path from "node:path";

const ILLEGAL_CHARACTERS = /[<>:"/\\|?*]/g;
const MAX_NAME_LENGTH = 200;

/**
 * Make a name safe as a single path segment on every common filesystem.
 * Illegal characters become `_`; leading/trailing spaces and dots are trimmed.
 */
export function sanitizeFilename(name: string): string {
	const cleaned = name
		.replace(ILLEGAL_CHARACTERS, "_")
		.replace(/^[. ]+|[. ]+$/g, "")
		.slice(0, MAX_NAME_LENGTH);
	return cleaned || "unnamed";
}

/** `<code>_<name>` when the course has a code, else the name alone. */
export function courseFolderName(name: string, code: string | null): string {
	return sanitizeFilename(code ? `${code}_${name}` : name);
}

/** Insert ` (<suffix>)` before the extension: `notes.pdf` → `notes (42).pdf`. */
export function withDisambiguator(filePath: string, suffix: string): string {
	const extension = path.posix.extname(filePath);
	const stem = extension ? filePath.slice(0, -extension.length) : filePath;
	return `${stem} (${suffix})${extension}`;
}

/** Canvas file links inside HTML: `/files/<id>` and `/files/<id>/download`. */
export function extractLinkedFileIds(html: string | null | undefined): string[] {
	if (!html) return [];
	const ids = new Set<string>();
	for (const match of html.matchAll(/\/files\/(\d+)(?:\/download)?/g)) {
		ids.add(match[1]);
	}
	return [...ids];
}
