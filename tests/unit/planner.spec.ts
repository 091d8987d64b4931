// ---------------------------------------------------------------------------
// Unit Tests: Reconciliation Planner
// ---------------------------------------------------------------------------

import { missingFilesCount, plan } from "@/lib/sync/planner";
import { fileKey } from "@/lib/sync/types";
import { describe, expect, it } from "vitest";
import { indexedEntry, inventory, localEntry, remoteFile } from "../helpers/fixtures";

const NONE = new Set<string>();

function classificationOf(result: ReturnType<typeof plan>, id: string): string | undefined {
	return result.files.find((planned) => planned.file.id === id)?.classification;
}

describe("plan", () => {
	it("classifies ten remote files against seven mirrored and five indexed", () => {
		const files = Array.from({ length: 10 }, (_, i) => remoteFile(`file-${i + 1}`));
		const local = files.slice(0, 7).map((file) => localEntry(file));
		const indexed = files.slice(0, 5).map((file) => indexedEntry(file));

		const result = plan(inventory(files), local, indexed, NONE);

		expect(result.totals).toEqual({
			upToDate: 5,
			missingLocally: 3,
			missingInIndex: 2,
			changed: 0,
			knownInaccessible: 0,
			unsupported: 0,
			extraInIndex: 0,
		});
		expect(missingFilesCount(result)).toBe(5);
		expect(classificationOf(result, "file-6")).toBe("missing-in-index");
		expect(classificationOf(result, "file-8")).toBe("missing-locally");
	});

	it("gives every remote file exactly one classification", () => {
		const files = Array.from({ length: 6 }, (_, i) => remoteFile(`file-${i + 1}`));
		const result = plan(inventory(files), [localEntry(files[0])], [], new Set([fileKey("101", "file-2")]));

		expect(result.files.map((planned) => planned.file.id)).toEqual(files.map((file) => file.id));
		const { upToDate, missingLocally, missingInIndex, changed, knownInaccessible } = result.totals;
		expect(upToDate + missingLocally + missingInIndex + changed + knownInaccessible).toBe(6);
	});

	it("ranks known-inaccessible above every other classification", () => {
		const file = remoteFile("file-1");
		const result = plan(
			inventory([file]),
			[localEntry(file, { fingerprint: "old" })],
			[],
			new Set([fileKey("101", "file-1")]),
		);

		expect(classificationOf(result, "file-1")).toBe("known-inaccessible");
	});

	it("classifies a fingerprint mismatch as changed even when the index is behind", () => {
		const file = remoteFile("file-1", { fingerprint: "fp-new" });
		const result = plan(inventory([file]), [localEntry(file, { fingerprint: "fp-old" })], [], NONE);

		expect(classificationOf(result, "file-1")).toBe("changed");
	});

	it("treats stale mirror entries as changed and inaccessible ones as missing", () => {
		const stale = remoteFile("file-1");
		const refused = remoteFile("file-2");
		const result = plan(
			inventory([stale, refused]),
			[localEntry(stale, { status: "stale" }), localEntry(refused, { status: "inaccessible" })],
			[indexedEntry(stale), indexedEntry(refused)],
			NONE,
		);

		expect(classificationOf(result, "file-1")).toBe("changed");
		expect(classificationOf(result, "file-2")).toBe("missing-locally");
	});

	it("reports an outdated index entry as missing-in-index", () => {
		const file = remoteFile("file-1");
		const result = plan(
			inventory([file]),
			[localEntry(file)],
			[indexedEntry(file, { fingerprint: "fp-previous" })],
			NONE,
		);

		expect(classificationOf(result, "file-1")).toBe("missing-in-index");
	});

	it("never asks to index files the index cannot accept", () => {
		const video = remoteFile("file-1", { path: "BIO101_Biology/Files/lecture.mp4" });
		const result = plan(inventory([video]), [localEntry(video)], [], NONE);

		expect(classificationOf(result, "file-1")).toBe("up-to-date");
		expect(result.files[0].indexable).toBe(false);
		expect(result.totals.unsupported).toBe(1);
		expect(missingFilesCount(result)).toBe(0);
	});

	it("skips indexing a refused version until the file changes", () => {
		const file = remoteFile("file-1");
		const rejected = [{ courseId: "101", remoteId: "file-1", fingerprint: "fp-file-1" }];

		const same = plan(inventory([file]), [localEntry(file)], [], NONE, { rejected });

		expect(same.files[0]).toMatchObject({ classification: "up-to-date", indexable: false });
		expect(same.totals.unsupported).toBe(1);
		expect(missingFilesCount(same)).toBe(0);

		const edited = remoteFile("file-1", { fingerprint: "fp-file-1-v2" });
		const next = plan(inventory([edited]), [localEntry(edited)], [], NONE, { rejected });

		expect(next.files[0]).toMatchObject({ classification: "missing-in-index", indexable: true });
	});

	it("reports index entries whose file is gone as extra", () => {
		const kept = remoteFile("file-1");
		const removed = remoteFile("file-2");
		const result = plan(
			inventory([kept]),
			[localEntry(kept)],
			[indexedEntry(kept), indexedEntry(removed)],
			NONE,
		);

		expect(result.extraInIndex.map((entry) => entry.remoteId)).toEqual(["file-2"]);
		expect(result.byCourse["101"].extraInIndex).toBe(1);
	});

	it("does not report extras for courses the inventory failed to list", () => {
		const kept = remoteFile("file-1");
		const other = remoteFile("file-9", { courseId: "202" });
		const result = plan(
			inventory([kept], { coursesFailed: [{ courseId: "202", message: "Status 500" }] }),
			[],
			[indexedEntry(other)],
			NONE,
		);

		expect(result.extraInIndex).toEqual([]);
		expect(result.coursesFailed).toEqual([{ courseId: "202", message: "Status 500" }]);
	});

	it("only reports extras for requested courses on a restricted inventory", () => {
		const kept = remoteFile("file-1");
		const elsewhere = remoteFile("file-9", { courseId: "202" });
		const restricted = plan(inventory([kept], { scope: ["101"] }), [], [indexedEntry(elsewhere)], NONE);
		const unrestricted = plan(inventory([kept]), [], [indexedEntry(elsewhere)], NONE);

		expect(restricted.extraInIndex).toEqual([]);
		expect(unrestricted.extraInIndex.map((entry) => entry.remoteId)).toEqual(["file-9"]);
	});

	it("counts per course and stamps the plan", () => {
		const a = remoteFile("file-1");
		const b = remoteFile("file-2", { courseId: "202" });
		const result = plan(inventory([a, b]), [localEntry(a)], [indexedEntry(a)], NONE, {
			now: new Date("2024-03-01T12:00:00Z"),
		});

		expect(result.computedAt).toBe("2024-03-01T12:00:00.000Z");
		expect(result.byCourse["101"]).toMatchObject({ courseName: "Course 101", upToDate: 1 });
		expect(result.byCourse["202"]).toMatchObject({ courseName: "Course 202", missingLocally: 1 });
	});

	it("is a pure function of its inputs", () => {
		const files = [remoteFile("file-1"), remoteFile("file-2")];
		const local = [localEntry(files[0])];
		const now = new Date("2024-03-01T00:00:00Z");

		expect(plan(inventory(files), local, [], NONE, { now })).toEqual(
			plan(inventory(files), local, [], NONE, { now }),
		);
	});
});
