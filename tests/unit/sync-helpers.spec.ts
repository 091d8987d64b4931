// ---------------------------------------------------------------------------
// Unit Tests: Paths, fingerprints, content ids, indexable formats, errors
// ---------------------------------------------------------------------------

import { CanvasApiError } from "@/lib/canvas/client";
import { parseContentId, toContentId } from "@/lib/canvas/content-id";
import { isIndexable, MAX_INDEXABLE_BYTES, unsupportedReason } from "@/lib/search-index/indexable";
import {
	classifyError,
	errorMessage,
	MirrorNotFoundError,
	PermissionDeniedError,
	TransientError,
	toFileError,
	UnsupportedFormatError,
} from "@/lib/sync/errors";
import { hashChangeToken, hashContent } from "@/lib/sync/fingerprint";
import { courseFolderName, extractLinkedFileIds, sanitizeFilename, withDisambiguator } from "@/lib/sync/paths";
import OpenAI from "openai";
import { describe, expect, it } from "vitest";

describe("paths", () => {
	it("replaces characters that are illegal in file names", () => {
		expect(sanitizeFilename('Week 1: "Intro" <draft>?.pdf')).toBe("Week 1_ _Intro_ _draft__.pdf");
		expect(sanitizeFilename("a/b\\c|d*e")).toBe("a_b_c_d_e");
	});

	it("trims leading and trailing dots and spaces", () => {
		expect(sanitizeFilename("  ..hidden notes.. ")).toBe("hidden notes");
		expect(sanitizeFilename(" ... ")).toBe("unnamed");
	});

	it("caps names at 200 characters", () => {
		expect(sanitizeFilename("x".repeat(250))).toHaveLength(200);
	});

	it("prefixes the course code to the folder name", () => {
		expect(courseFolderName("Biology", "BIO101")).toBe("BIO101_Biology");
		expect(courseFolderName("Biology", null)).toBe("Biology");
		expect(courseFolderName("Cells: Basics", "BIO/1")).toBe("BIO_1_Cells_ Basics");
	});

	it("inserts a disambiguator before the extension", () => {
		expect(withDisambiguator("Biology/Files/notes.pdf", "42")).toBe("Biology/Files/notes (42).pdf");
		expect(withDisambiguator("Biology/Files/README", "7")).toBe("Biology/Files/README (7)");
	});

	it("extracts linked Canvas file ids once each", () => {
		const html =
			'<a href="/courses/1/files/12/download?wrap=1">a</a> <img src="https://c.test/courses/1/files/34/preview">' +
			'<a href="/files/12">again</a>';

		expect(extractLinkedFileIds(html)).toEqual(["12", "34"]);
		expect(extractLinkedFileIds(null)).toEqual([]);
	});
});

describe("fingerprints", () => {
	it("hashes content with SHA-256", () => {
		expect(hashContent("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
		expect(hashContent(Buffer.from("abc"))).toBe(hashContent("abc"));
	});

	it("ignores key order in change tokens", () => {
		expect(hashChangeToken({ id: 1, size: 10, updatedAt: "t" })).toBe(hashChangeToken({ updatedAt: "t", size: 10, id: 1 }));
		expect(hashChangeToken({ id: 1, size: 10 })).not.toBe(hashChangeToken({ id: 1, size: 11 }));
	});
});

describe("content ids", () => {
	it("namespaces ids by kind", () => {
		expect(toContentId("page", 5)).toBe("page-5");
		expect(parseContentId("assignment-7")).toEqual({ kind: "assignment", sourceId: "7" });
	});

	it("rejects foreign ids", () => {
		expect(parseContentId("quiz-1")).toBeNull();
		expect(parseContentId("file-abc")).toBeNull();
	});
});

describe("indexable formats", () => {
	it("accepts supported document types regardless of case", () => {
		expect(isIndexable("Biology/Files/Slides.PPTX", 10)).toBe(true);
		expect(isIndexable("Biology/Pages/Intro.html", 10)).toBe(true);
	});

	it("explains why a file cannot be indexed", () => {
		expect(unsupportedReason("a/lecture.mp4", 10)).toBe('unsupported file type ".mp4"');
		expect(unsupportedReason("a/README", 10)).toBe("file has no extension");
		expect(unsupportedReason("a/empty.pdf", 0)).toBe("file is empty");
		expect(unsupportedReason("a/huge.pdf", MAX_INDEXABLE_BYTES + 1)).toBe("file exceeds 512 MiB");
	});
});

describe("classifyError", () => {
	const canvas = (status: number, body = "") => new CanvasApiError(status, "x", body, "https://canvas.test");

	it("maps Canvas failures onto retry categories", () => {
		expect(classifyError(canvas(401))).toBe("permission");
		expect(classifyError(canvas(403))).toBe("permission");
		expect(classifyError(canvas(403, "Rate Limit Exceeded"))).toBe("transient");
		expect(classifyError(canvas(404))).toBe("not-found");
		expect(classifyError(canvas(429))).toBe("transient");
		expect(classifyError(canvas(500))).toBe("transient");
		expect(classifyError(canvas(400))).toBe("fatal");
	});

	it("maps index API failures by status", () => {
		const apiError = (status: number) => OpenAI.APIError.generate(status, { error: { message: "x" } }, "x", {});

		expect(classifyError(apiError(429))).toBe("transient");
		expect(classifyError(apiError(503))).toBe("transient");
		expect(classifyError(apiError(403))).toBe("permission");
		expect(classifyError(apiError(400))).toBe("fatal");
	});

	it("treats a refused document as unsupported", () => {
		const rejected = (status: number, message: string) =>
			OpenAI.APIError.generate(status, { error: { message } }, undefined, {});

		expect(classifyError(rejected(400, "Invalid file format. Supported formats: pdf, docx"))).toBe("unsupported");
		expect(classifyError(rejected(400, "Files with extensions [.xyz] are not supported"))).toBe("unsupported");
		expect(classifyError(rejected(415, "x"))).toBe("unsupported");
		expect(classifyError(rejected(400, "Missing required parameter: 'file_id'"))).toBe("fatal");
	});

	it("maps sync errors and network failures", () => {
		expect(classifyError(new PermissionDeniedError("no", "101", "file-1"))).toBe("permission");
		expect(classifyError(new TransientError("later"))).toBe("transient");
		expect(classifyError(new UnsupportedFormatError("a.mp4", "unsupported"))).toBe("unsupported");
		expect(classifyError(new MirrorNotFoundError("101", "file-1"))).toBe("not-found");
		expect(classifyError(new TypeError("fetch failed"))).toBe("transient");
		expect(classifyError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe("transient");
		expect(classifyError(new Error("bug"))).toBe("fatal");
		expect(classifyError("string")).toBe("fatal");
	});

	it("renders any thrown value as a message", () => {
		expect(errorMessage(new Error("boom"))).toBe("boom");
		expect(errorMessage(42)).toBe("42");
	});
});

describe("toFileError", () => {
	const canvas = (status: number) => new CanvasApiError(status, `Status ${status}`, "", "https://canvas.test");

	it("turns a refused download into PermissionDeniedError", () => {
		const error = toFileError(canvas(403), "101", "file-1");

		expect(error).toBeInstanceOf(PermissionDeniedError);
		if (!(error instanceof PermissionDeniedError)) return;
		expect(error.message).toBe("403 Status 403");
		expect([error.courseId, error.remoteId]).toEqual(["101", "file-1"]);
		expect(error.cause).toBeInstanceOf(CanvasApiError);
	});

	it("turns an exhausted transient failure into TransientError", () => {
		const error = toFileError(canvas(503), "101", "file-1");

		expect(error).toBeInstanceOf(TransientError);
		expect(error.message).toBe("Canvas API error 503 (Status 503) for https://canvas.test");
		expect(classifyError(error)).toBe("transient");
	});

	it("passes other failures through", () => {
		const notFound = canvas(404);

		expect(toFileError(notFound, "101", "file-1")).toBe(notFound);
		expect(toFileError("boom", "101", "file-1").message).toBe("boom");
	});
});
