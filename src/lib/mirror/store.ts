// ---------------------------------------------------------------------------
// Local Mirror Store
// Downloaded bytes on disk plus a manifest: remote file → local copy
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { readJsonFile, writeJsonFile } from "@/lib/storage/json-file";
import { KeyedMutex, SimpleMutex } from "@/lib/storage/mutex";
import { MirrorNotFoundError } from "@/lib/sync/errors";
import { fileKey, type LocalEntry, type LocalEntryStatus, type RemoteFile } from "@/lib/sync/types";

const LocalEntrySchema = z.object({
	remoteId: z.string().min(1),
	courseId: z.string().min(1),
	localPath: z.string().min(1),
	fingerprint: z.string().min(1),
	size: z.number().int().nonnegative(),
	downloadedAt: z.string(),
	status: z.enum(["ok", "inaccessible", "stale"]),
});

const MirrorManifestSchema = z.object({
	version: z.literal(1),
	updatedAt: z.string(),
	entries: z.record(LocalEntrySchema),
});

type MirrorManifest = z.infer<typeof MirrorManifestSchema>;

export interface LocalMirrorStoreOptions {
	/** Directory that receives the mirrored course folders */
	rootDir: string;
	/** Location of the manifest JSON file */
	manifestPath: string;
}

/**
 * Persists mirrored bytes and the manifest describing them.
 *
 * `write()` stages bytes in a sibling temp file and renames it into place
 * before the manifest entry is published, so a manifest entry never points at
 * partial content. Writes for the same (course, remote id) are serialized;
 * writes for different ids run independently. Manifest persistence itself is
 * serialized by a single mutex.
 */
export class LocalMirrorStore {
	private readonly rootDir: string;
	private readonly manifestPath: string;
	private readonly fileLocks = new KeyedMutex();
	private readonly manifestLock = new SimpleMutex();
	private entries: Map<string, LocalEntry> | null = null;
	private loading: Promise<Map<string, LocalEntry>> | null = null;

	constructor(options: LocalMirrorStoreOptions) {
		this.rootDir = path.resolve(options.rootDir);
		this.manifestPath = options.manifestPath;
	}

	get root(): string {
		return this.rootDir;
	}

	async has(courseId: string, remoteId: string): Promise<boolean> {
		const entries = await this.load();
		return entries.has(fileKey(courseId, remoteId));
	}

	async get(courseId: string, remoteId: string): Promise<LocalEntry | null> {
		const entries = await this.load();
		const entry = entries.get(fileKey(courseId, remoteId));
		return entry ? { ...entry } : null;
	}

	/**
	 * Store the bytes of `remoteFile` and publish its manifest entry.
	 * The recorded fingerprint is the remote fingerprint at download time.
	 */
	async write(remoteFile: RemoteFile, bytes: Uint8Array): Promise<LocalEntry> {
		const key = fileKey(remoteFile.courseId, remoteFile.id);

		return this.fileLocks.runExclusive(key, async () => {
			const entries = await this.load();
			const previous = entries.get(key);
			const target = this.resolveInside(remoteFile.path);

			await fs.mkdir(path.dirname(target), { recursive: true });
			const stagingPath = `${target}.${uuidv4()}.part`;
			try {
				await fs.writeFile(stagingPath, bytes);
				await fs.rename(stagingPath, target);
			} catch (err) {
				await fs.rm(stagingPath, { force: true });
				throw err;
			}

			const entry: LocalEntry = {
				remoteId: remoteFile.id,
				courseId: remoteFile.courseId,
				localPath: remoteFile.path,
				fingerprint: remoteFile.fingerprint,
				size: bytes.byteLength,
				downloadedAt: new Date().toISOString(),
				status: "ok",
			};
			await this.commit((map) => map.set(key, entry));

			// The file moved (renamed in the LMS): drop the orphaned copy
			if (previous && previous.localPath !== entry.localPath && !this.isPathShared(previous.localPath)) {
				await fs.rm(this.resolveInside(previous.localPath), { force: true });
			}

			return { ...entry };
		});
	}

	/** Read mirrored bytes; fails with `MirrorNotFoundError` when absent. */
	async read(courseId: string, remoteId: string): Promise<Uint8Array> {
		const entries = await this.load();
		const entry = entries.get(fileKey(courseId, remoteId));
		if (!entry || entry.status === "inaccessible") {
			throw new MirrorNotFoundError(courseId, remoteId);
		}

		try {
			return await fs.readFile(this.resolveInside(entry.localPath));
		} catch (err) {
			if (err instanceof Error && "code" in err && err.code === "ENOENT") {
				throw new MirrorNotFoundError(courseId, remoteId);
			}
			throw err;
		}
	}

	async manifestSnapshot(): Promise<LocalEntry[]> {
		const entries = await this.load();
		return [...entries.values()].map((entry) => ({ ...entry }));
	}

	/** Returns false when there is no entry to update. */
	async setStatus(courseId: string, remoteId: string, status: LocalEntryStatus): Promise<boolean> {
		const key = fileKey(courseId, remoteId);
		return this.fileLocks.runExclusive(key, async () => {
			const entries = await this.load();
			const entry = entries.get(key);
			if (!entry) return false;
			if (entry.status === status) return true;
			await this.commit((map) => map.set(key, { ...entry, status }));
			return true;
		});
	}

	/** Drop an entry and, unless told otherwise, its bytes. */
	async remove(courseId: string, remoteId: string, options: { deleteFile?: boolean } = {}): Promise<boolean> {
		const key = fileKey(courseId, remoteId);
		return this.fileLocks.runExclusive(key, async () => {
			const entries = await this.load();
			const entry = entries.get(key);
			if (!entry) return false;
			await this.commit((map) => map.delete(key));
			if (options.deleteFile !== false && !this.isPathShared(entry.localPath)) {
				await fs.rm(this.resolveInside(entry.localPath), { force: true });
			}
			return true;
		});
	}

	private isPathShared(localPath: string): boolean {
		for (const entry of this.entries?.values() ?? []) {
			if (entry.localPath === localPath) return true;
		}
		return false;
	}

	/** Resolve a mirror-relative path, refusing anything that escapes the root. */
	private resolveInside(relativePath: string): string {
		const resolved = path.resolve(this.rootDir, relativePath);
		if (!resolved.startsWith(this.rootDir + path.sep)) {
			throw new Error(`LocalMirrorStore: path "${relativePath}" escapes the mirror root`);
		}
		return resolved;
	}

	private async load(): Promise<Map<string, LocalEntry>> {
		if (this.entries) return this.entries;
		if (!this.loading) {
			this.loading = readJsonFile(this.manifestPath, MirrorManifestSchema, () => ({
				version: 1 as const,
				updatedAt: new Date(0).toISOString(),
				entries: {},
			})).then((manifest) => {
				this.entries = new Map(Object.entries(manifest.entries));
				return this.entries;
			});
		}
		return this.loading;
	}

	private async commit(mutate: (entries: Map<string, LocalEntry>) => void): Promise<void> {
		await this.manifestLock.runExclusive(async () => {
			const entries = await this.load();
			mutate(entries);
			const manifest: MirrorManifest = {
				version: 1,
				updatedAt: new Date().toISOString(),
				entries: Object.fromEntries(entries),
			};
			await writeJsonFile(this.manifestPath, manifest);
		});
	}
}
