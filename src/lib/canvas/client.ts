// ---------------------------------------------------------------------------
// Canvas LMS API — HTTP Client
// Auth, throttling (p-throttle), Link-header pagination, typed failures.
// Retries are applied by the caller's retry policy, not here.
// ---------------------------------------------------------------------------

import pThrottle from "p-throttle";
import type { z } from "zod";
import { parseContentId } from "./content-id";
import {
	CanvasAssignmentSchema,
	CanvasAssignmentsResponseSchema,
	CanvasCoursesResponseSchema,
	CanvasFileSchema,
	CanvasFilesResponseSchema,
	CanvasModulesResponseSchema,
	CanvasPageSchema,
	CanvasPagesResponseSchema,
} from "./schemas";
import type {
	CanvasAssignment,
	CanvasCourse,
	CanvasFile,
	CanvasPage,
	ContentItemByKind,
	ContentKind,
	LmsClient,
} from "./types";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface CanvasClientOptions {
	/** Canvas origin, e.g. https://canvas.example.edu */
	baseUrl: string;
	accessToken: string;
	/** Requests per second (default: 5) */
	rateLimit?: number;
	/** Page size for list endpoints (default: 100, Canvas caps at 100) */
	perPage?: number;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
}

export type CanvasErrorKind =
	| "unauthorized"
	| "forbidden"
	| "not-found"
	| "rate-limited"
	| "unavailable"
	| "bad-request";

export class CanvasApiError extends Error {
	readonly kind: CanvasErrorKind;

	constructor(
		public readonly status: number,
		public readonly statusText: string,
		public readonly body: string,
		public readonly url: string,
		public readonly retryAfterMs: number | null = null,
	) {
		super(`Canvas API error ${status} (${statusText}) for ${url}`);
		this.name = "CanvasApiError";
		this.kind = CanvasApiError.kindFor(status, body);
	}

	static kindFor(status: number, body: string): CanvasErrorKind {
		if (status === 0 || status >= 500) return "unavailable";
		if (status === 401) return "unauthorized";
		// Canvas throttles with 403 and a "Rate Limit Exceeded" body
		if (status === 403) return /rate limit exceeded/i.test(body) ? "rate-limited" : "forbidden";
		if (status === 404) return "not-found";
		if (status === 429) return "rate-limited";
		return "bad-request";
	}
}

interface ContentEndpoint<T> {
	path: (courseId: string) => string;
	params: Record<string, string>;
	schema: Schema<T[]>;
}

const CONTENT_ENDPOINTS: { [K in ContentKind]: ContentEndpoint<ContentItemByKind[K]> } = {
	files: {
		path: (courseId) => `/api/v1/courses/${courseId}/files`,
		params: {},
		schema: CanvasFilesResponseSchema,
	},
	modules: {
		path: (courseId) => `/api/v1/courses/${courseId}/modules`,
		params: { "include[]": "items" },
		schema: CanvasModulesResponseSchema,
	},
	assignments: {
		path: (courseId) => `/api/v1/courses/${courseId}/assignments`,
		params: {},
		schema: CanvasAssignmentsResponseSchema,
	},
	pages: {
		path: (courseId) => `/api/v1/courses/${courseId}/pages`,
		params: { "include[]": "body" },
		schema: CanvasPagesResponseSchema,
	},
};

/**
 * Extract the `rel="next"` target from a Canvas `Link` header.
 * Returns null on the last page.
 */
export function parseNextLink(linkHeader: string | null): string | null {
	if (!linkHeader) return null;
	for (const part of linkHeader.split(",")) {
		if (!/rel="next"/.test(part)) continue;
		const match = /<([^>]+)>/.exec(part);
		if (match) return match[1];
	}
	return null;
}

/**
 * HTTP client for the Canvas REST API.
 *
 * Features:
 * - Bearer token authentication
 * - Rate limiting via p-throttle (default: 5 req/s)
 * - Transparent pagination over the `Link` header
 * - Zod validation of every JSON response
 * - Failures surface as `CanvasApiError` with a classified `kind`
 */
export class CanvasClient implements LmsClient {
	private readonly baseUrl: string;
	private readonly origin: string;
	private readonly accessToken: string;
	private readonly perPage: number;
	private readonly fetchFn: typeof fetch;
	private readonly throttledFetch: (input: string, init?: RequestInit) => Promise<Response>;

	constructor(options: CanvasClientOptions) {
		if (!options.accessToken || options.accessToken.trim().length === 0) {
			throw new Error("CanvasClient construction error: `accessToken` must be a non-empty string.");
		}
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.origin = new URL(this.baseUrl).origin;
		this.accessToken = options.accessToken;
		this.perPage = options.perPage ?? 100;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;

		const throttle = pThrottle({
			limit: options.rateLimit ?? 5,
			interval: 1000,
		});

		this.throttledFetch = throttle((input: string, init?: RequestInit) => this.fetchFn(input, init));
	}

	async listCourses(): Promise<CanvasCourse[]> {
		return this.getAll("/api/v1/courses", CanvasCoursesResponseSchema, {
			enrollment_state: "active",
		});
	}

	async listCourseContent<K extends ContentKind>(
		courseId: string,
		kind: K,
	): Promise<ContentItemByKind[K][]> {
		const endpoint = CONTENT_ENDPOINTS[kind];
		return this.getAll(endpoint.path(courseId), endpoint.schema, endpoint.params);
	}

	async getFile(courseId: string, fileId: string): Promise<CanvasFile> {
		return this.getJson(`/api/v1/courses/${courseId}/files/${fileId}`, CanvasFileSchema);
	}

	async getPage(courseId: string, pageUrl: string): Promise<CanvasPage> {
		return this.getJson(`/api/v1/courses/${courseId}/pages/${encodeURIComponent(pageUrl)}`, CanvasPageSchema);
	}

	async getAssignment(courseId: string, assignmentId: string): Promise<CanvasAssignment> {
		return this.getJson(`/api/v1/courses/${courseId}/assignments/${assignmentId}`, CanvasAssignmentSchema);
	}

	/**
	 * Fetch the bytes behind a namespaced content id. Files are streamed from
	 * their (signed) download URL; pages and assignment descriptions are
	 * exported as their HTML body.
	 */
	async downloadContent(courseId: string, contentId: string): Promise<Uint8Array> {
		const parsed = parseContentId(contentId);
		if (!parsed) {
			throw new Error(`CanvasClient: unrecognised content id "${contentId}"`);
		}

		switch (parsed.kind) {
			case "file": {
				const file = await this.getFile(courseId, parsed.sourceId);
				if (file.locked_for_user || !file.url) {
					throw new CanvasApiError(
						403,
						"Forbidden",
						"file is locked for the current user",
						`${this.baseUrl}/api/v1/courses/${courseId}/files/${parsed.sourceId}`,
					);
				}
				const res = await this.request(file.url, {}, { accept: "*/*" });
				return new Uint8Array(await res.arrayBuffer());
			}
			case "page": {
				const page = await this.getPage(courseId, parsed.sourceId);
				return Buffer.from(page.body ?? "", "utf-8");
			}
			case "assignment": {
				const assignment = await this.getAssignment(courseId, parsed.sourceId);
				return Buffer.from(assignment.description ?? "", "utf-8");
			}
		}
	}

	/**
	 * GET a single JSON resource and validate it with Zod.
	 */
	async getJson<T>(path: string, schema: Schema<T>, params: Record<string, string> = {}): Promise<T> {
		const res = await this.request(this.buildUrl(path), params);
		return schema.parse(await res.json());
	}

	/**
	 * GET every page of a list endpoint, following `Link: rel="next"`.
	 */
	async getAll<T>(
		path: string,
		schema: Schema<T[]>,
		params: Record<string, string> = {},
	): Promise<T[]> {
		const items: T[] = [];
		let nextUrl: string | null = this.buildUrl(path);
		let query: Record<string, string> = { ...params, per_page: String(this.perPage) };

		while (nextUrl) {
			const res = await this.request(nextUrl, query);
			items.push(...schema.parse(await res.json()));
			nextUrl = parseNextLink(res.headers.get("Link"));
			// The next link already carries every query parameter
			query = {};
		}

		return items;
	}

	private buildUrl(path: string): string {
		return `${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
	}

	private async request(
		rawUrl: string,
		params: Record<string, string>,
		options: { accept?: string } = {},
	): Promise<Response> {
		const url = new URL(rawUrl);
		for (const [key, value] of Object.entries(params)) {
			url.searchParams.append(key, value);
		}
		const href = url.toString();

		const headers: Record<string, string> = { Accept: options.accept ?? "application/json" };
		// Never hand the token to a foreign host (signed download URLs, CDNs)
		if (url.origin === this.origin) {
			headers.Authorization = `Bearer ${this.accessToken}`;
		}

		let res: Response;
		try {
			res = await this.throttledFetch(href, { method: "GET", headers });
		} catch (err) {
			throw new CanvasApiError(0, "Network Error", err instanceof Error ? err.message : String(err), href);
		}

		if (!res.ok) {
			const body = await res.text();
			const retryAfter = res.headers.get("Retry-After");
			const retryAfterMs = retryAfter ? Number.parseInt(retryAfter, 10) * 1000 : null;
			throw new CanvasApiError(
				res.status,
				res.statusText,
				body,
				href,
				retryAfterMs !== null && Number.isFinite(retryAfterMs) ? retryAfterMs : null,
			);
		}

		return res;
	}
}
