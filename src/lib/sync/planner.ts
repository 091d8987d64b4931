// ---------------------------------------------------------------------------
// Reconciliation Planner
// Pure diff of remote inventory, local mirror and search index.
// ---------------------------------------------------------------------------

import { isIndexable } from "@/lib/search-index/indexable";
import {
	type CoursePlanCounts,
	type FileClassification,
	fileKey,
	type IndexedEntry,
	type Inventory,
	type LocalEntry,
	type PlannedFile,
	type RejectedEntry,
	type SyncPlan,
} from "./types";

export interface PlanOptions {
	/** Classification timestamp (default: now) */
	now?: Date;
	/** Versions the index refused; treated as not indexable while the fingerprint matches */
	rejected?: readonly Pick<RejectedEntry, "courseId" | "remoteId" | "fingerprint">[];
}

type Counts = Omit<CoursePlanCounts, "courseId" | "courseName">;

const COUNT_FIELD: Record<FileClassification, keyof Counts> = {
	"up-to-date": "upToDate",
	"missing-locally": "missingLocally",
	"missing-in-index": "missingInIndex",
	changed: "changed",
	"known-inaccessible": "knownInaccessible",
};

const COUNT_KEYS: readonly (keyof Counts)[] = [
	"upToDate",
	"missingLocally",
	"missingInIndex",
	"changed",
	"knownInaccessible",
	"unsupported",
	"extraInIndex",
];

function emptyCounts(): Counts {
	return {
		upToDate: 0,
		missingLocally: 0,
		missingInIndex: 0,
		changed: 0,
		knownInaccessible: 0,
		unsupported: 0,
		extraInIndex: 0,
	};
}

/**
 * Assign every remote file exactly one classification, in priority order:
 *
 * 1. recorded inaccessible       → `known-inaccessible`
 * 2. no mirror entry             → `missing-locally`
 * 3. mirror fingerprint differs  → `changed`
 * 4. indexable, index behind     → `missing-in-index`
 * 5. otherwise                   → `up-to-date`
 *
 * Files the index cannot take, or refused in this version, skip step 4.
 * Index entries with no remote counterpart are reported as `extraInIndex`,
 * but only for courses the inventory actually covered.
 */
export function plan(
	inventory: Inventory,
	localManifest: readonly LocalEntry[],
	indexManifest: readonly IndexedEntry[],
	inaccessibleKeys: ReadonlySet<string>,
	options: PlanOptions = {},
): SyncPlan {
	const local = new Map(localManifest.map((entry) => [fileKey(entry.courseId, entry.remoteId), entry]));
	const indexed = new Map(indexManifest.map((entry) => [fileKey(entry.courseId, entry.remoteId), entry]));
	const refused = new Map(
		(options.rejected ?? []).map((entry) => [fileKey(entry.courseId, entry.remoteId), entry.fingerprint]),
	);

	const byCourse: Record<string, CoursePlanCounts> = {};
	for (const course of inventory.courses) {
		byCourse[course.id] = { courseId: course.id, courseName: course.name, ...emptyCounts() };
	}
	const countsFor = (courseId: string): CoursePlanCounts => {
		byCourse[courseId] ??= { courseId, courseName: courseId, ...emptyCounts() };
		return byCourse[courseId];
	};

	const files: PlannedFile[] = inventory.files.map((file) => {
		const key = fileKey(file.courseId, file.id);
		const indexable = isIndexable(file.path, file.size) && refused.get(key) !== file.fingerprint;
		const classification = classify(
			inaccessibleKeys.has(key),
			local.get(key),
			indexed.get(key),
			file.fingerprint,
			indexable,
		);

		const counts = countsFor(file.courseId);
		counts[COUNT_FIELD[classification]]++;
		if (!indexable) counts.unsupported++;

		return { file, classification, indexable };
	});

	const remoteKeys = new Set(inventory.files.map((file) => fileKey(file.courseId, file.id)));
	const coveredCourses = new Set(inventory.courses.map((course) => course.id));
	const failedCourses = new Set(inventory.coursesFailed.map((failure) => failure.courseId));
	const isCovered = (courseId: string): boolean => {
		if (failedCourses.has(courseId)) return false;
		if (coveredCourses.has(courseId)) return true;
		// An unrestricted fetch that no longer lists the course at all
		return inventory.scope === "all";
	};

	const extraInIndex = indexManifest.filter(
		(entry) => isCovered(entry.courseId) && !remoteKeys.has(fileKey(entry.courseId, entry.remoteId)),
	);
	for (const entry of extraInIndex) countsFor(entry.courseId).extraInIndex++;

	const totals = emptyCounts();
	for (const counts of Object.values(byCourse)) {
		for (const field of COUNT_KEYS) {
			totals[field] += counts[field];
		}
	}

	return {
		computedAt: (options.now ?? new Date()).toISOString(),
		files,
		extraInIndex: extraInIndex.map((entry) => ({ ...entry })),
		byCourse,
		totals,
		coursesFailed: [...inventory.coursesFailed],
	};
}

function classify(
	inaccessible: boolean,
	localEntry: LocalEntry | undefined,
	indexedEntry: IndexedEntry | undefined,
	remoteFingerprint: string,
	indexable: boolean,
): FileClassification {
	if (inaccessible) return "known-inaccessible";
	if (!localEntry || localEntry.status === "inaccessible") return "missing-locally";
	if (localEntry.fingerprint !== remoteFingerprint || localEntry.status === "stale") return "changed";
	if (indexable && (!indexedEntry || indexedEntry.fingerprint !== localEntry.fingerprint)) {
		return "missing-in-index";
	}
	return "up-to-date";
}

/** Files that still need work: missing locally, missing in the index, or changed. */
export function missingFilesCount(syncPlan: SyncPlan): number {
	const { missingLocally, missingInIndex, changed } = syncPlan.totals;
	return missingLocally + missingInIndex + changed;
}
