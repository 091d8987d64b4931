// ---------------------------------------------------------------------------
// Indexable formats
// ---------------------------------------------------------------------------

import * as path from "node:path";

export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
	".pdf",
	".txt",
	".md",
	".doc",
	".docx",
	".ppt",
	".pptx",
	".xls",
	".xlsx",
	".json",
	".csv",
	".html",
	".htm",
]);

export const MAX_INDEXABLE_BYTES = 512 * 1024 * 1024;

/** Why the index would reject a file, or null when it is accepted. */
export function unsupportedReason(filePath: string, size: number): string | null {
	const extension = path.posix.extname(filePath).toLowerCase();
	if (!SUPPORTED_EXTENSIONS.has(extension)) {
		return extension ? `unsupported file type "${extension}"` : "file has no extension";
	}
	if (size < 1) return "file is empty";
	if (size > MAX_INDEXABLE_BYTES) return "file exceeds 512 MiB";
	return null;
}

export function isIndexable(filePath: string, size: number): boolean {
	return unsupportedReason(filePath, size) === null;
}
