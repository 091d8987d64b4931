// ---------------------------------------------------------------------------
// Sync Error Taxonomy
// ---------------------------------------------------------------------------

import { CanvasApiError } from "@/lib/canvas/client";
import OpenAI from "openai";
import type { CourseFailure, FailureCategory, Inventory } from "./types";

/** The course list could not be fetched, or every requested course failed. */
export class RemoteUnavailableError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = "RemoteUnavailableError";
	}
}

/** Some courses failed; `inventory` holds everything that succeeded. */
export class PartialInventoryError extends Error {
	constructor(
		public readonly coursesFailed: CourseFailure[],
		public readonly inventory: Inventory,
	) {
		super(`Inventory incomplete: ${coursesFailed.length} course(s) could not be listed`);
		this.name = "PartialInventoryError";
	}
}

export class UnknownCourseError extends Error {
	constructor(public readonly courseIds: string[]) {
		super(`No enrolled course matches: ${courseIds.join(", ")}`);
		this.name = "UnknownCourseError";
	}
}

/** A download the LMS refused; the file goes to the inaccessibility tracker. */
export class PermissionDeniedError extends Error {
	constructor(
		message: string,
		public readonly courseId: string,
		public readonly remoteId: string,
		cause?: unknown,
	) {
		super(message, { cause });
		this.name = "PermissionDeniedError";
	}
}

/** A per-file failure that was still transient when the retry budget ran out. */
export class TransientError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = "TransientError";
	}
}

export class UnsupportedFormatError extends Error {
	constructor(
		public readonly path: string,
		public readonly reason: string,
	) {
		super(`Cannot index ${path}: ${reason}`);
		this.name = "UnsupportedFormatError";
	}
}

export class AlreadyRunningError extends Error {
	constructor(public readonly runId: string | null) {
		super("A sync run is already in progress");
		this.name = "AlreadyRunningError";
	}
}

export class MirrorNotFoundError extends Error {
	constructor(
		public readonly courseId: string,
		public readonly remoteId: string,
	) {
		super(`No mirrored copy of ${courseId}/${remoteId}`);
		this.name = "MirrorNotFoundError";
	}
}

/** Index responses that reject the document itself rather than the request */
const REJECTED_FORMAT = /unsupported|not supported|file format|file type|invalid extension/i;

function classifyStatus(status: number | undefined): FailureCategory {
	if (status === undefined || status === 0 || status === 408 || status === 429) {
		return "transient";
	}
	if (status >= 500) return "transient";
	if (status === 401 || status === 403) return "permission";
	if (status === 404) return "not-found";
	return "fatal";
}

/**
 * Map any thrown value onto the retry policy's categories.
 *
 * - `permission`: never retried; downloads route to the inaccessibility tracker
 * - `transient`: retried with backoff, then recorded as a failure
 * - `not-found`, `unsupported`, `fatal`: recorded once, never retried
 */
export function classifyError(err: unknown): FailureCategory {
	if (err instanceof PermissionDeniedError) return "permission";
	if (err instanceof TransientError) return "transient";
	if (err instanceof UnsupportedFormatError) return "unsupported";
	if (err instanceof MirrorNotFoundError) return "not-found";

	if (err instanceof CanvasApiError) {
		switch (err.kind) {
			case "unauthorized":
			case "forbidden":
				return "permission";
			case "not-found":
				return "not-found";
			case "rate-limited":
			case "unavailable":
				return "transient";
			default:
				return "fatal";
		}
	}

	// Covers APIConnectionError / timeouts too (status undefined)
	if (err instanceof OpenAI.APIError) {
		if (err.status === 415 || (err.status === 400 && REJECTED_FORMAT.test(err.message))) return "unsupported";
		return classifyStatus(err.status);
	}

	// Undici surfaces socket failures as TypeError("fetch failed")
	if (err instanceof TypeError && /fetch failed|network/i.test(err.message)) return "transient";
	if (err instanceof Error && "code" in err) {
		const { code } = err;
		if (code === "ECONNRESET" || code === "ETIMEDOUT" || code === "EAI_AGAIN") return "transient";
	}

	return "fatal";
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a per-file download failure in the error for its category.
 * Permission and transient failures get their own type; anything else is
 * returned as is.
 */
export function toFileError(err: unknown, courseId: string, remoteId: string): Error {
	switch (classifyError(err)) {
		case "permission": {
			const reason = err instanceof CanvasApiError ? `${err.status} ${err.statusText}` : errorMessage(err);
			return new PermissionDeniedError(reason, courseId, remoteId, err);
		}
		case "transient":
			return new TransientError(errorMessage(err), err);
		default:
			return err instanceof Error ? err : new Error(String(err));
	}
}
