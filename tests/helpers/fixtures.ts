// ---------------------------------------------------------------------------
// Builders for sync records used across unit tests
// ---------------------------------------------------------------------------

import type { IndexedEntry, Inventory, LocalEntry, RemoteFile } from "@/lib/sync/types";

export function remoteFile(id: string, overrides: Partial<RemoteFile> = {}): RemoteFile {
	return {
		id,
		courseId: "101",
		kind: "file",
		path: `BIO101_Biology/Files/${id}.pdf`,
		size: 100,
		fingerprint: `fp-${id}`,
		modifiedAt: "2024-01-01T00:00:00Z",
		contentType: "application/pdf",
		...overrides,
	};
}

export function localEntry(file: RemoteFile, overrides: Partial<LocalEntry> = {}): LocalEntry {
	return {
		remoteId: file.id,
		courseId: file.courseId,
		localPath: file.path,
		fingerprint: file.fingerprint,
		size: file.size,
		downloadedAt: "2024-01-02T00:00:00Z",
		status: "ok",
		...overrides,
	};
}

export function indexedEntry(file: RemoteFile, overrides: Partial<IndexedEntry> = {}): IndexedEntry {
	return {
		remoteId: file.id,
		courseId: file.courseId,
		indexId: `vs_${file.courseId}`,
		documentId: `doc-${file.id}`,
		fingerprint: file.fingerprint,
		path: file.path,
		uploadedAt: "2024-01-03T00:00:00Z",
		...overrides,
	};
}

export function inventory(files: RemoteFile[], overrides: Partial<Inventory> = {}): Inventory {
	const courseIds = [...new Set(files.map((file) => file.courseId))];
	return {
		fetchedAt: "2024-02-01T00:00:00Z",
		courses: courseIds.map((id) => ({ id, name: `Course ${id}`, code: null, folder: `Course ${id}` })),
		files,
		coursesFailed: [],
		scope: "all",
		...overrides,
	};
}
