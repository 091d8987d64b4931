// ---------------------------------------------------------------------------
// Remote Index Uploader
// One index per course, created lazily; uploads are idempotent by
// (remote id, fingerprint) and recorded in the index manifest, together with
// the versions the index refused.
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { z } from "zod";
import { ErrorSeverity, reportError } from "@/lib/monitoring/rollbar-official";
import { readJsonFile, writeJsonFile } from "@/lib/storage/json-file";
import { KeyedMutex, SimpleMutex } from "@/lib/storage/mutex";
import { classifyError, errorMessage, UnsupportedFormatError } from "@/lib/sync/errors";
import { fileKey, type IndexedEntry, type IndexRecord, type RejectedEntry, type RemoteFile } from "@/lib/sync/types";
import { unsupportedReason } from "./indexable";
import type { DocumentMetadata, SearchIndexClient } from "./types";

const IndexRecordSchema = z.object({
	courseId: z.string().min(1),
	indexId: z.string().min(1),
	name: z.string(),
	createdAt: z.string(),
});

const IndexedEntrySchema = z.object({
	remoteId: z.string().min(1),
	courseId: z.string().min(1),
	indexId: z.string().min(1),
	documentId: z.string().min(1),
	fingerprint: z.string().min(1),
	path: z.string(),
	uploadedAt: z.string(),
});

const RejectedEntrySchema = z.object({
	remoteId: z.string().min(1),
	courseId: z.string().min(1),
	fingerprint: z.string().min(1),
	path: z.string(),
	reason: z.string(),
	rejectedAt: z.string(),
});

const IndexManifestSchema = z.object({
	version: z.literal(1),
	indexes: z.record(IndexRecordSchema),
	entries: z.record(IndexedEntrySchema),
	// Absent in manifests written before rejections were tracked
	rejected: z.record(RejectedEntrySchema).default({}),
});

interface IndexState {
	indexes: Map<string, IndexRecord>;
	entries: Map<string, IndexedEntry>;
	rejected: Map<string, RejectedEntry>;
}

export interface RemoteIndexUploaderOptions {
	client: SearchIndexClient;
	/** Location of the index manifest JSON file */
	manifestPath: string;
}

export class RemoteIndexUploader {
	private readonly client: SearchIndexClient;
	private readonly manifestPath: string;
	private readonly fileLocks = new KeyedMutex();
	private readonly manifestLock = new SimpleMutex();
	private readonly pendingIndexes = new Map<string, Promise<IndexRecord>>();
	private state: IndexState | null = null;
	private loading: Promise<IndexState> | null = null;

	constructor(options: RemoteIndexUploaderOptions) {
		this.client = options.client;
		this.manifestPath = options.manifestPath;
	}

	/**
	 * Return the course's index id, creating the index on first use.
	 * Concurrent callers for the same course share a single creation.
	 */
	async ensureIndex(courseId: string, courseName?: string): Promise<string> {
		const state = await this.load();
		const known = state.indexes.get(courseId);
		if (known) return known.indexId;

		let pending = this.pendingIndexes.get(courseId);
		if (!pending) {
			pending = this.createIndex(courseId, courseName).finally(() => {
				this.pendingIndexes.delete(courseId);
			});
			this.pendingIndexes.set(courseId, pending);
		}
		const record = await pending;
		return record.indexId;
	}

	/**
	 * Upload `bytes` as the current version of `remoteFile`.
	 *
	 * Returns the existing entry without any network call when the same
	 * fingerprint was already uploaded. A changed file replaces its entry and
	 * the superseded document is removed from the index.
	 *
	 * A version that cannot be indexed, by local check or because the index
	 * rejected it, is recorded and rethrown as `UnsupportedFormatError`.
	 */
	async upload(courseId: string, remoteFile: RemoteFile, bytes: Uint8Array): Promise<IndexedEntry> {
		const key = fileKey(courseId, remoteFile.id);
		const reason = unsupportedReason(remoteFile.path, bytes.byteLength);
		if (reason) {
			await this.reject(courseId, remoteFile, reason);
			throw new UnsupportedFormatError(remoteFile.path, reason);
		}

		return this.fileLocks.runExclusive(key, async () => {
			const state = await this.load();
			const existing = state.entries.get(key);
			if (existing && existing.fingerprint === remoteFile.fingerprint) {
				return { ...existing };
			}

			const indexId = await this.ensureIndex(courseId);
			let documentId: string;
			try {
				documentId = await this.client.uploadDocument(indexId, bytes, toMetadata(courseId, remoteFile));
			} catch (err) {
				if (classifyError(err) !== "unsupported") throw err;
				await this.reject(courseId, remoteFile, errorMessage(err));
				throw new UnsupportedFormatError(remoteFile.path, errorMessage(err));
			}

			const entry: IndexedEntry = {
				remoteId: remoteFile.id,
				courseId,
				indexId,
				documentId,
				fingerprint: remoteFile.fingerprint,
				path: remoteFile.path,
				uploadedAt: new Date().toISOString(),
			};
			await this.commit((s) => {
				s.entries.set(key, entry);
				s.rejected.delete(key);
			});

			if (existing && existing.documentId !== documentId) {
				await this.detachSuperseded(existing);
			}

			return { ...entry };
		});
	}

	async listIndexed(courseId?: string): Promise<IndexedEntry[]> {
		const state = await this.load();
		return [...state.entries.values()]
			.filter((entry) => courseId === undefined || entry.courseId === courseId)
			.map((entry) => ({ ...entry }));
	}

	/** Versions the index refused, still skipped while their fingerprint is current. */
	async listRejected(courseId?: string): Promise<RejectedEntry[]> {
		const state = await this.load();
		return [...state.rejected.values()]
			.filter((entry) => courseId === undefined || entry.courseId === courseId)
			.map((entry) => ({ ...entry }));
	}

	async listIndexes(): Promise<IndexRecord[]> {
		const state = await this.load();
		return [...state.indexes.values()].map((record) => ({ ...record }));
	}

	/** Remove an entry's document from the index, then forget the entry. */
	async removeEntry(entry: Pick<IndexedEntry, "courseId" | "remoteId">): Promise<boolean> {
		const key = fileKey(entry.courseId, entry.remoteId);
		return this.fileLocks.runExclusive(key, async () => {
			const state = await this.load();
			const current = state.entries.get(key);
			if (!current) return false;
			await this.client.removeDocument(current.indexId, current.documentId);
			await this.commit((s) => s.entries.delete(key));
			return true;
		});
	}

	/**
	 * Rebuild missing manifest rows from the documents the index reports.
	 * Only documents carrying `remote_id`, `course_id` and `fingerprint`
	 * attributes for this course are recovered. Returns the number of rows added.
	 */
	async recoverFromIndex(courseId: string): Promise<number> {
		const state = await this.load();
		let record = state.indexes.get(courseId);
		if (!record) {
			const indexId = await this.client.findIndex(courseId);
			if (!indexId) return 0;
			const found: IndexRecord = {
				courseId,
				indexId,
				name: `course-${courseId}`,
				createdAt: new Date().toISOString(),
			};
			await this.commit((s) => s.indexes.set(courseId, found));
			record = found;
		}

		const { indexId } = record;
		const documents = await this.client.listDocuments(indexId);
		const recovered: IndexedEntry[] = [];
		for (const doc of documents) {
			const { remote_id, course_id, fingerprint, path: docPath } = doc.metadata;
			if (typeof remote_id !== "string" || typeof fingerprint !== "string" || course_id !== courseId) {
				continue;
			}
			if (state.entries.has(fileKey(courseId, remote_id))) continue;
			recovered.push({
				remoteId: remote_id,
				courseId,
				indexId,
				documentId: doc.documentId,
				fingerprint,
				path: typeof docPath === "string" ? docPath : "",
				uploadedAt: new Date().toISOString(),
			});
		}

		if (recovered.length > 0) {
			await this.commit((s) => {
				for (const entry of recovered) s.entries.set(fileKey(courseId, entry.remoteId), entry);
			});
		}
		return recovered.length;
	}

	private async createIndex(courseId: string, courseName?: string): Promise<IndexRecord> {
		const name = courseName ? `${courseName} (${courseId})` : `course-${courseId}`;
		const indexId = await this.client.createIndex(courseId, name);
		const record: IndexRecord = { courseId, indexId, name, createdAt: new Date().toISOString() };
		await this.commit((s) => s.indexes.set(courseId, record));
		return record;
	}

	private async reject(courseId: string, remoteFile: RemoteFile, reason: string): Promise<void> {
		const rejected: RejectedEntry = {
			remoteId: remoteFile.id,
			courseId,
			fingerprint: remoteFile.fingerprint,
			path: remoteFile.path,
			reason,
			rejectedAt: new Date().toISOString(),
		};
		await this.commit((s) => s.rejected.set(fileKey(courseId, remoteFile.id), rejected));
	}

	private async detachSuperseded(entry: IndexedEntry): Promise<void> {
		try {
			await this.client.removeDocument(entry.indexId, entry.documentId);
		} catch (err) {
			reportError(
				err instanceof Error ? err : String(err),
				{
					courseId: entry.courseId,
					operation: "detach-superseded-document",
					additionalData: { remoteId: entry.remoteId, documentId: entry.documentId },
				},
				ErrorSeverity.WARNING,
			);
		}
	}

	private async load(): Promise<IndexState> {
		if (this.state) return this.state;
		if (!this.loading) {
			this.loading = readJsonFile(this.manifestPath, IndexManifestSchema, () => ({
				version: 1 as const,
				indexes: {},
				entries: {},
				rejected: {},
			})).then((manifest) => {
				this.state = {
					indexes: new Map(Object.entries(manifest.indexes)),
					entries: new Map(Object.entries(manifest.entries)),
					rejected: new Map(Object.entries(manifest.rejected)),
				};
				return this.state;
			});
		}
		return this.loading;
	}

	private async commit(mutate: (state: IndexState) => void): Promise<void> {
		await this.manifestLock.runExclusive(async () => {
			const state = await this.load();
			mutate(state);
			await writeJsonFile(this.manifestPath, {
				version: 1,
				indexes: Object.fromEntries(state.indexes),
				entries: Object.fromEntries(state.entries),
				rejected: Object.fromEntries(state.rejected),
			});
		});
	}
}

function toMetadata(courseId: string, remoteFile: RemoteFile): DocumentMetadata {
	return {
		remote_id: remoteFile.id,
		course_id: courseId,
		fingerprint: remoteFile.fingerprint,
		path: remoteFile.path,
		filename: path.posix.basename(remoteFile.path),
	};
}
