// ---------------------------------------------------------------------------
// Unit Tests: Local Mirror Store
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LocalMirrorStore } from "@/lib/mirror/store";
import { MirrorNotFoundError } from "@/lib/sync/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { remoteFile } from "../helpers/fixtures";
import { makeTempDir, removeTempDir } from "../helpers/temp-dir";

describe("LocalMirrorStore", () => {
	let tmpDir: string;
	let manifestPath: string;
	let store: LocalMirrorStore;

	beforeEach(async () => {
		tmpDir = await makeTempDir();
		manifestPath = path.join(tmpDir, ".sync", "mirror-manifest.json");
		store = new LocalMirrorStore({ rootDir: path.join(tmpDir, "mirror"), manifestPath });
	});

	afterEach(async () => {
		await removeTempDir(tmpDir);
	});

	it("writes bytes under the mirror root and records the remote fingerprint", async () => {
		const file = remoteFile("file-1");

		const entry = await store.write(file, Buffer.from("hello"));

		expect(entry).toMatchObject({
			remoteId: "file-1",
			courseId: "101",
			localPath: "BIO101_Biology/Files/file-1.pdf",
			fingerprint: "fp-file-1",
			size: 5,
			status: "ok",
		});
		const onDisk = await fs.readFile(path.join(tmpDir, "mirror", "BIO101_Biology", "Files", "file-1.pdf"), "utf-8");
		expect(onDisk).toBe("hello");
	});

	it("reads back what was written", async () => {
		await store.write(remoteFile("file-1"), Buffer.from("content"));

		const bytes = await store.read("101", "file-1");

		expect(Buffer.from(bytes).toString("utf-8")).toBe("content");
	});

	it("persists the manifest across instances", async () => {
		await store.write(remoteFile("file-1"), Buffer.from("a"));

		const reopened = new LocalMirrorStore({ rootDir: path.join(tmpDir, "mirror"), manifestPath });

		expect(await reopened.has("101", "file-1")).toBe(true);
		expect((await reopened.get("101", "file-1"))?.fingerprint).toBe("fp-file-1");
	});

	it("leaves no staging files behind", async () => {
		await store.write(remoteFile("file-1"), Buffer.from("a"));

		const entries = await fs.readdir(path.join(tmpDir, "mirror", "BIO101_Biology", "Files"));

		expect(entries).toEqual(["file-1.pdf"]);
	});

	it("fails with MirrorNotFoundError for unknown files", async () => {
		await expect(store.read("101", "file-404")).rejects.toBeInstanceOf(MirrorNotFoundError);
	});

	it("fails with MirrorNotFoundError when the bytes were deleted behind its back", async () => {
		await store.write(remoteFile("file-1"), Buffer.from("a"));
		await fs.rm(path.join(tmpDir, "mirror", "BIO101_Biology", "Files", "file-1.pdf"));

		await expect(store.read("101", "file-1")).rejects.toBeInstanceOf(MirrorNotFoundError);
	});

	it("keeps entries for the same remote id in different courses apart", async () => {
		await store.write(remoteFile("file-1", { courseId: "101" }), Buffer.from("a"));
		await store.write(
			remoteFile("file-1", { courseId: "202", path: "CHEM202_Chemistry/Files/file-1.pdf" }),
			Buffer.from("b"),
		);

		const snapshot = await store.manifestSnapshot();

		expect(snapshot.map((entry) => `${entry.courseId}/${entry.remoteId}`).sort()).toEqual(["101/file-1", "202/file-1"]);
	});

	it("replaces the copy and removes the old path when a file moves", async () => {
		await store.write(remoteFile("file-1"), Buffer.from("v1"));
		await store.write(remoteFile("file-1", { path: "BIO101_Biology/Modules/Week 1/file-1.pdf", fingerprint: "fp-2" }), Buffer.from("v2"));

		const entry = await store.get("101", "file-1");

		expect(entry).toMatchObject({ localPath: "BIO101_Biology/Modules/Week 1/file-1.pdf", fingerprint: "fp-2" });
		await expect(fs.access(path.join(tmpDir, "mirror", "BIO101_Biology", "Files", "file-1.pdf"))).rejects.toThrow();
	});

	it("updates the status of an entry", async () => {
		await store.write(remoteFile("file-1"), Buffer.from("a"));

		expect(await store.setStatus("101", "file-1", "stale")).toBe(true);
		expect((await store.get("101", "file-1"))?.status).toBe("stale");
		expect(await store.setStatus("101", "file-404", "stale")).toBe(false);
	});

	it("does not serve bytes of an entry marked inaccessible", async () => {
		await store.write(remoteFile("file-1"), Buffer.from("a"));
		await store.setStatus("101", "file-1", "inaccessible");

		await expect(store.read("101", "file-1")).rejects.toBeInstanceOf(MirrorNotFoundError);
	});

	it("removes an entry together with its bytes", async () => {
		await store.write(remoteFile("file-1"), Buffer.from("a"));

		expect(await store.remove("101", "file-1")).toBe(true);
		expect(await store.has("101", "file-1")).toBe(false);
		await expect(fs.access(path.join(tmpDir, "mirror", "BIO101_Biology", "Files", "file-1.pdf"))).rejects.toThrow();
		expect(await store.remove("101", "file-1")).toBe(false);
	});

	it("serializes concurrent writes into one consistent manifest", async () => {
		const files = Array.from({ length: 20 }, (_, i) => remoteFile(`file-${i}`));

		await Promise.all(files.map((file) => store.write(file, Buffer.from(file.id))));

		const reopened = new LocalMirrorStore({ rootDir: path.join(tmpDir, "mirror"), manifestPath });
		expect(await reopened.manifestSnapshot()).toHaveLength(20);
	});

	it("refuses paths that escape the mirror root", async () => {
		await expect(store.write(remoteFile("file-1", { path: "../outside.pdf" }), Buffer.from("a"))).rejects.toThrow(
			/escapes the mirror root/,
		);
	});

	it("rejects a corrupt manifest", async () => {
		await fs.mkdir(path.dirname(manifestPath), { recursive: true });
		await fs.writeFile(manifestPath, JSON.stringify({ version: 1, entries: "nope" }), "utf-8");

		await expect(store.manifestSnapshot()).rejects.toThrow(/Corrupt state file/);
	});
});
