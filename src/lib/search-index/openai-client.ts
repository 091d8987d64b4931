// ---------------------------------------------------------------------------
// OpenAI Vector Store Client
// One vector store per course; documents are uploaded as `assistants` files
// and attached with their sync attributes.
// ---------------------------------------------------------------------------

import type OpenAI from "openai";
import { toFile } from "openai";
import pThrottle from "p-throttle";
import { ErrorSeverity, reportError } from "@/lib/monitoring/rollbar-official";
import type { DocumentMetadata, IndexDocument, SearchIndexClient } from "./types";

/** Vector store names are capped by the API. */
const MAX_INDEX_NAME_LENGTH = 100;
/** Attribute string values are capped by the API. */
const MAX_ATTRIBUTE_LENGTH = 512;

export interface OpenAiIndexClientOptions {
	client: OpenAI;
	/** Requests per second (default: 10) */
	rateLimit?: number;
}

export class OpenAiIndexClient implements SearchIndexClient {
	private readonly client: OpenAI;
	private readonly gate: () => Promise<void>;

	constructor(options: OpenAiIndexClientOptions) {
		this.client = options.client;
		const throttle = pThrottle({ limit: options.rateLimit ?? 10, interval: 1000 });
		this.gate = throttle(async () => undefined);
	}

	async createIndex(courseId: string, name: string): Promise<string> {
		const store = await this.throttled(() =>
			this.client.vectorStores.create({
				name: name.slice(0, MAX_INDEX_NAME_LENGTH),
				metadata: { course_id: courseId },
			}),
		);
		return store.id;
	}

	async findIndex(courseId: string): Promise<string | null> {
		for await (const store of this.client.vectorStores.list({ limit: 100 })) {
			if (store.metadata?.course_id === courseId) return store.id;
		}
		return null;
	}

	/**
	 * Upload the bytes as a file and attach it to the vector store. If the
	 * attach step fails the uploaded file is deleted again.
	 */
	async uploadDocument(indexId: string, bytes: Uint8Array, metadata: DocumentMetadata): Promise<string> {
		const file = await this.throttled(async () =>
			this.client.files.create({
				file: await toFile(bytes, metadata.filename),
				purpose: "assistants",
			}),
		);

		try {
			await this.throttled(() =>
				this.client.vectorStores.files.create(indexId, {
					file_id: file.id,
					attributes: truncateAttributes(metadata),
				}),
			);
		} catch (err) {
			await this.client.files.del(file.id).catch((cleanupErr: unknown) => {
				reportError(
					cleanupErr instanceof Error ? cleanupErr : String(cleanupErr),
					{ operation: "delete-orphaned-file", additionalData: { fileId: file.id, indexId } },
					ErrorSeverity.WARNING,
				);
			});
			throw err;
		}

		return file.id;
	}

	async listDocuments(indexId: string): Promise<IndexDocument[]> {
		const documents: IndexDocument[] = [];
		for await (const file of this.client.vectorStores.files.list(indexId, { limit: 100 })) {
			documents.push({ documentId: file.id, metadata: file.attributes ?? {} });
		}
		return documents;
	}

	async removeDocument(indexId: string, documentId: string): Promise<void> {
		await this.throttled(() => this.client.vectorStores.files.del(indexId, documentId));
		await this.throttled(() => this.client.files.del(documentId));
	}

	/** Waits for a request slot before calling `fn`. */
	private async throttled<T>(fn: () => Promise<T>): Promise<T> {
		await this.gate();
		return fn();
	}
}

function truncateAttributes(metadata: DocumentMetadata): Record<string, string> {
	return Object.fromEntries(
		Object.entries(metadata).map(([key, value]) => [key, String(value).slice(0, MAX_ATTRIBUTE_LENGTH)]),
	);
}
