// ---------------------------------------------------------------------------
// Inaccessibility Tracker
// Files whose download was refused (401/403) are skipped until reset
// ---------------------------------------------------------------------------

import { z } from "zod";
import { readJsonFile, writeJsonFile } from "@/lib/storage/json-file";
import { SimpleMutex } from "@/lib/storage/mutex";
import { fileKey, type InaccessibleRecord } from "@/lib/sync/types";

const InaccessibleRecordSchema = z.object({
	remoteId: z.string().min(1),
	courseId: z.string().min(1),
	path: z.string().nullable(),
	reason: z.string(),
	firstSeenAt: z.string(),
	lastAttemptAt: z.string(),
	attempts: z.number().int().positive(),
});

const InaccessibleFileSchema = z.object({
	version: z.literal(1),
	records: z.record(InaccessibleRecordSchema),
});

export interface MarkInaccessibleDetails {
	path?: string | null;
	reason?: string;
}

export class InaccessibilityTracker {
	private readonly lock = new SimpleMutex();
	private records: Map<string, InaccessibleRecord> | null = null;

	constructor(private readonly filePath: string) {}

	/**
	 * Record a permission failure. Repeated marks keep `firstSeenAt` and bump
	 * `lastAttemptAt` and `attempts`.
	 */
	async markInaccessible(
		remoteId: string,
		courseId: string,
		details: MarkInaccessibleDetails = {},
	): Promise<InaccessibleRecord> {
		return this.lock.runExclusive(async () => {
			const records = await this.load();
			const key = fileKey(courseId, remoteId);
			const now = new Date().toISOString();
			const existing = records.get(key);

			const record: InaccessibleRecord = existing
				? {
						...existing,
						path: details.path ?? existing.path,
						reason: details.reason ?? existing.reason,
						lastAttemptAt: now,
						attempts: existing.attempts + 1,
					}
				: {
						remoteId,
						courseId,
						path: details.path ?? null,
						reason: details.reason ?? "403 Forbidden",
						firstSeenAt: now,
						lastAttemptAt: now,
						attempts: 1,
					};

			records.set(key, record);
			await this.persist(records);
			return { ...record };
		});
	}

	async isInaccessible(courseId: string, remoteId: string): Promise<boolean> {
		const records = await this.load();
		return records.has(fileKey(courseId, remoteId));
	}

	/** Clear records for one course, or all courses. Returns the number cleared. */
	async reset(courseId?: string): Promise<number> {
		return this.lock.runExclusive(async () => {
			const records = await this.load();
			let cleared = 0;
			for (const [key, record] of records) {
				if (courseId === undefined || record.courseId === courseId) {
					records.delete(key);
					cleared++;
				}
			}
			if (cleared > 0) await this.persist(records);
			return cleared;
		});
	}

	async list(courseId?: string): Promise<InaccessibleRecord[]> {
		const records = await this.load();
		return [...records.values()]
			.filter((record) => courseId === undefined || record.courseId === courseId)
			.map((record) => ({ ...record }));
	}

	/** Composite keys, as consumed by the planner. */
	async inaccessibleKeys(): Promise<Set<string>> {
		const records = await this.load();
		return new Set(records.keys());
	}

	private async load(): Promise<Map<string, InaccessibleRecord>> {
		if (!this.records) {
			const file = await readJsonFile(this.filePath, InaccessibleFileSchema, () => ({
				version: 1 as const,
				records: {},
			}));
			this.records ??= new Map(Object.entries(file.records));
		}
		return this.records;
	}

	private async persist(records: Map<string, InaccessibleRecord>): Promise<void> {
		await writeJsonFile(this.filePath, { version: 1, records: Object.fromEntries(records) });
	}
}
