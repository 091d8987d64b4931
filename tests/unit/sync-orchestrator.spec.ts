// ---------------------------------------------------------------------------
// Unit Tests: Sync Orchestrator
// Idempotent runs, change propagation, inaccessible files, run lock,
// cancellation and timeouts against in-memory LMS and index fakes
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { InaccessibilityTracker } from "@/lib/mirror/inaccessibility-tracker";
import { LocalMirrorStore } from "@/lib/mirror/store";
import { RemoteIndexUploader } from "@/lib/search-index/uploader";
import { AlreadyRunningError } from "@/lib/sync/errors";
import { SyncOrchestrator, type SyncOrchestratorOptions } from "@/lib/sync/orchestrator";
import { SyncRunSummarySchema } from "@/lib/sync/schemas";
import OpenAI from "openai";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeSearchIndexClient } from "../helpers/fake-index";
import { canvasError, canvasFile, FakeLmsClient } from "../helpers/fake-lms";
import { makeTempDir, removeTempDir } from "../helpers/temp-dir";

const NO_RETRY = { maxAttempts: 1, minTimeoutMs: 0 };

describe("SyncOrchestrator", () => {
	let tmpDir: string;
	let lms: FakeLmsClient;
	let index: FakeSearchIndexClient;
	let store: LocalMirrorStore;
	let tracker: InaccessibilityTracker;
	let uploader: RemoteIndexUploader;
	let lastRunPath: string;

	function createOrchestrator(overrides: Partial<SyncOrchestratorOptions> = {}): SyncOrchestrator {
		return new SyncOrchestrator({
			client: lms,
			store,
			tracker,
			uploader,
			concurrency: 2,
			retry: NO_RETRY,
			lastRunPath,
			...overrides,
		});
	}

	beforeEach(async () => {
		tmpDir = await makeTempDir();
		lms = new FakeLmsClient();
		lms.addCourse(
			{ id: 101, name: "Biology", course_code: "BIO101" },
			{ files: [canvasFile(1, "a.pdf"), canvasFile(2, "b.pdf"), canvasFile(3, "lecture.mp4")] },
		);
		lms.setBytes("101", "file-1", "alpha");
		lms.setBytes("101", "file-2", "beta");
		lms.setBytes("101", "file-3", "video");

		index = new FakeSearchIndexClient();
		store = new LocalMirrorStore({
			rootDir: path.join(tmpDir, "mirror"),
			manifestPath: path.join(tmpDir, ".sync", "mirror-manifest.json"),
		});
		tracker = new InaccessibilityTracker(path.join(tmpDir, ".sync", "inaccessible.json"));
		uploader = new RemoteIndexUploader({ client: index, manifestPath: path.join(tmpDir, ".sync", "index-manifest.json") });
		lastRunPath = path.join(tmpDir, ".sync", "last-run.json");
	});

	afterEach(async () => {
		await removeTempDir(tmpDir);
	});

	describe("full runs", () => {
		it("downloads every file and indexes the indexable ones", async () => {
			const summary = await createOrchestrator().run();

			expect(summary).toMatchObject({
				state: "completed",
				cancelled: false,
				filesDownloaded: 3,
				filesUploaded: 2,
				filesUnsupported: 1,
				filesFailed: 0,
				filesSkippedInaccessible: 0,
				coursesTouched: ["101"],
				failures: [],
				error: null,
			});
			expect(Buffer.from(await store.read("101", "file-3")).toString("utf-8")).toBe("video");
			expect(index.countCalls("createIndex")).toBe(1);
			expect([...index.indexes.values()][0].name).toBe("Biology (101)");
		});

		it("does nothing on a second run when nothing changed", async () => {
			const orchestrator = createOrchestrator();
			await orchestrator.run();
			const downloadsBefore = lms.countCalls("download");
			const indexCallsBefore = index.calls.length;

			const summary = await orchestrator.run();

			expect(summary.filesDownloaded).toBe(0);
			expect(summary.filesUploaded).toBe(0);
			expect(lms.countCalls("download")).toBe(downloadsBefore);
			expect(index.calls.length).toBe(indexCallsBefore);
			expect(orchestrator.latestPlan?.totals.upToDate).toBe(3);
		});

		it("re-downloads and re-indexes a changed file only", async () => {
			const orchestrator = createOrchestrator();
			await orchestrator.run();
			const previous = (await uploader.listIndexed()).find((entry) => entry.remoteId === "file-1");
			lms.content.set("101", {
				files: [
					canvasFile(1, "a.pdf", { updated_at: "2024-02-01T00:00:00Z" }),
					canvasFile(2, "b.pdf"),
					canvasFile(3, "lecture.mp4"),
				],
			});
			lms.setBytes("101", "file-1", "alpha v2");

			const summary = await orchestrator.run();

			expect(summary).toMatchObject({ filesDownloaded: 1, filesUploaded: 1 });
			expect(Buffer.from(await store.read("101", "file-1")).toString("utf-8")).toBe("alpha v2");
			expect(previous && index.documents.has(previous.documentId)).toBe(false);
			expect(index.documents.size).toBe(2);
		});

		it("persists the run summary", async () => {
			const summary = await createOrchestrator().run();

			const persisted = SyncRunSummarySchema.parse(JSON.parse(await fs.readFile(lastRunPath, "utf-8")));

			expect(persisted).toEqual(summary);
		});
	});

	describe("failures", () => {
		it("records a refused download as inaccessible and skips it afterwards", async () => {
			lms.fail("download:101:file-2", canvasError(403));
			const orchestrator = createOrchestrator();

			const first = await orchestrator.run();
			const second = await orchestrator.run();

			expect(first).toMatchObject({ filesDownloaded: 2, filesSkippedInaccessible: 1, filesFailed: 0, failures: [] });
			expect(await tracker.isInaccessible("101", "file-2")).toBe(true);
			expect(second).toMatchObject({ filesDownloaded: 0, filesKnownInaccessible: 1 });
			expect(lms.countCalls("download:101:file-2")).toBe(1);
		});

		it("retries an inaccessible file after a reset", async () => {
			lms.fail("download:101:file-2", canvasError(403));
			const orchestrator = createOrchestrator();
			await orchestrator.run();

			expect(await tracker.reset("101")).toBe(1);
			const summary = await orchestrator.run();

			expect(summary).toMatchObject({ filesDownloaded: 1, filesUploaded: 1, filesKnownInaccessible: 0 });
		});

		it("records a failed download and keeps going", async () => {
			lms.fail("download:101:file-1", canvasError(503));

			const summary = await createOrchestrator().run();

			expect(summary).toMatchObject({ state: "completed", filesDownloaded: 2, filesFailed: 1 });
			expect(summary.failures).toHaveLength(1);
			expect(summary.failures[0]).toMatchObject({
				courseId: "101",
				remoteId: "file-1",
				path: "BIO101_Biology/Files/a.pdf",
				phase: "download",
				category: "transient",
			});
		});

		it("leaves a changed file stale when its download fails", async () => {
			const orchestrator = createOrchestrator();
			await orchestrator.run();
			lms.content.set("101", {
				files: [canvasFile(1, "a.pdf", { uuid: "uuid-1-v2" }), canvasFile(2, "b.pdf"), canvasFile(3, "lecture.mp4")],
			});
			lms.fail("download:101:file-1", canvasError(500));

			const summary = await orchestrator.run();

			expect(summary.filesFailed).toBe(1);
			expect((await store.get("101", "file-1"))?.status).toBe("stale");
			expect(orchestrator.latestPlan?.totals.changed).toBe(1);
		});

		it("uploads a file on the next run when its upload failed", async () => {
			index.uploadFailures.push(new Error("index unavailable"));
			const orchestrator = createOrchestrator({ concurrency: 1 });

			const first = await orchestrator.run();
			const second = await orchestrator.run();

			expect(first).toMatchObject({ filesDownloaded: 3, filesUploaded: 1, filesFailed: 1 });
			expect(first.failures[0]).toMatchObject({ remoteId: "file-1", phase: "upload" });
			expect(second).toMatchObject({ filesDownloaded: 0, filesUploaded: 1 });
		});

		it("does not offer a version the index refused again", async () => {
			index.uploadFailures.push(OpenAI.APIError.generate(400, { error: { message: "Unsupported file type" } }, undefined, {}));
			const orchestrator = createOrchestrator({ concurrency: 1 });

			const first = await orchestrator.run();
			const uploadsAfterFirst = index.countCalls("upload:");
			const second = await orchestrator.run();

			expect(first).toMatchObject({ filesUploaded: 1, filesUnsupported: 2, filesFailed: 0 });
			expect(first.failures).toEqual([
				expect.objectContaining({ remoteId: "file-1", phase: "upload", category: "unsupported" }),
			]);
			expect(second).toMatchObject({ filesUploaded: 0, filesUnsupported: 2, filesFailed: 0, failures: [] });
			expect(index.countCalls("upload:")).toBe(uploadsAfterFirst);
			expect(orchestrator.latestPlan?.totals.missingInIndex).toBe(0);
		});

		it("fails the run when the course list is unavailable", async () => {
			lms.fail("listCourses", canvasError(503));
			const orchestrator = createOrchestrator();

			const summary = await orchestrator.run();

			expect(summary.state).toBe("failed");
			expect(summary.error).toMatch(/^Could not list courses/);
			expect(orchestrator.getProgress()).toMatchObject({ state: "failed", isRunning: false });
		});

		it("syncs the courses that listed when another course fails", async () => {
			lms.addCourse({ id: 202, name: "Chemistry" });
			for (const kind of ["files", "modules", "pages", "assignments"]) {
				lms.fail(`list:202:${kind}`, canvasError(500));
			}

			const summary = await createOrchestrator().run();

			expect(summary.state).toBe("completed");
			expect(summary.filesDownloaded).toBe(3);
			expect(summary.coursesFailed.map((failure) => failure.courseId)).toEqual(["202"]);
		});
	});

	describe("run options", () => {
		it("downloads without indexing when uploads are skipped", async () => {
			const summary = await createOrchestrator().run({ skipUpload: true });

			expect(summary).toMatchObject({ filesDownloaded: 3, filesUploaded: 0 });
			expect(index.calls).toEqual([]);
		});

		it("indexes mirrored files without downloading when downloads are skipped", async () => {
			const orchestrator = createOrchestrator();
			await orchestrator.run({ skipUpload: true });

			const summary = await orchestrator.run({ skipDownload: true });

			expect(summary).toMatchObject({ filesDownloaded: 0, filesUploaded: 2 });
			expect(lms.countCalls("download")).toBe(3);
		});

		it("only downloads when no search index is configured", async () => {
			const summary = await createOrchestrator({ uploader: null }).run();

			expect(summary).toMatchObject({ filesDownloaded: 3, filesUploaded: 0, state: "completed" });
		});

		it("limits the run to the requested courses", async () => {
			lms.addCourse({ id: 202, name: "Chemistry" }, { files: [canvasFile(9, "c.pdf")] });
			lms.setBytes("202", "file-9", "gamma");

			const summary = await createOrchestrator().run({ courseIds: ["202"] });

			expect(summary).toMatchObject({ filesDownloaded: 1, coursesTouched: ["202"] });
			expect(lms.countCalls("download:101")).toBe(0);
		});
	});

	describe("run lifecycle", () => {
		it("rejects an overlapping run without touching the network", async () => {
			const orchestrator = createOrchestrator();
			const first = orchestrator.start();
			const callsBefore = lms.calls.length;

			let rejected: unknown = null;
			try {
				orchestrator.start();
			} catch (err) {
				rejected = err;
			}

			expect(rejected).toBeInstanceOf(AlreadyRunningError);
			expect(rejected).toMatchObject({ runId: first.runId });
			expect(lms.calls.length).toBe(callsBefore);
			await first.done;
		});

		it("reports progress while running and after finishing", async () => {
			const orchestrator = createOrchestrator();
			const { runId, done } = orchestrator.start();

			expect(orchestrator.getProgress()).toMatchObject({ isRunning: true, runId, state: "planning" });
			await done;

			const progress = orchestrator.getProgress();
			expect(progress).toMatchObject({ isRunning: false, runId, state: "completed" });
			expect(progress.summary?.filesDownloaded).toBe(3);
			expect(orchestrator.isRunning).toBe(false);
		});

		it("finishes the current task and starts no other after cancel", async () => {
			const orchestrator = createOrchestrator({ concurrency: 1 });
			lms.onCall = (label) => {
				if (label === "download:101:file-1") orchestrator.cancel();
			};

			const summary = await orchestrator.run();

			expect(summary).toMatchObject({ state: "completed", cancelled: true, filesDownloaded: 1, filesUploaded: 1 });
			expect(lms.countCalls("download")).toBe(1);
		});

		it("returns false when there is nothing to cancel", () => {
			expect(createOrchestrator().cancel()).toBe(false);
		});

		it("cancels a run that exceeds its timeout", async () => {
			lms.downloadDelayMs = 300;
			const orchestrator = createOrchestrator({ concurrency: 1, timeoutMs: 100 });

			const summary = await orchestrator.run();

			expect(summary).toMatchObject({
				cancelled: true,
				filesDownloaded: 1,
				error: "Sync timed out after 100ms",
			});
		});
	});
});
