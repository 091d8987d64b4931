// ---------------------------------------------------------------------------
// Namespaced content ids
// Exported pages and assignment descriptions live in the same id space as
// real files, so every id carries its kind as a prefix.
// ---------------------------------------------------------------------------

export type RemoteFileKind = "file" | "page" | "assignment";

export interface ParsedContentId {
	kind: RemoteFileKind;
	sourceId: string;
}

const CONTENT_ID_PATTERN = /^(file|page|assignment)-(\d+)$/;

export function toContentId(kind: RemoteFileKind, sourceId: number | string): string {
	return `${kind}-${sourceId}`;
}

/** Returns null for ids that were not produced by `toContentId`. */
export function parseContentId(contentId: string): ParsedContentId | null {
	const match = CONTENT_ID_PATTERN.exec(contentId);
	if (!match) return null;
	const [, kind, sourceId] = match;
	if (kind !== "file" && kind !== "page" && kind !== "assignment") return null;
	return { kind, sourceId };
}
