// ---------------------------------------------------------------------------
// Search Index — collaborator contract
// ---------------------------------------------------------------------------

export type DocumentAttributes = Record<string, string | number | boolean>;

/** Attributes attached to every uploaded document. */
export interface DocumentMetadata extends DocumentAttributes {
	remote_id: string;
	course_id: string;
	fingerprint: string;
	path: string;
	filename: string;
}

export interface IndexDocument {
	documentId: string;
	metadata: DocumentAttributes;
}

/**
 * What the uploader consumes from the semantic search service. One index
 * per course. `OpenAiIndexClient` is the real implementation.
 */
export interface SearchIndexClient {
	createIndex(courseId: string, name: string): Promise<string>;
	/** Look up an existing index created for `courseId`, e.g. after the manifest was lost. */
	findIndex(courseId: string): Promise<string | null>;
	uploadDocument(indexId: string, bytes: Uint8Array, metadata: DocumentMetadata): Promise<string>;
	listDocuments(indexId: string): Promise<IndexDocument[]>;
	removeDocument(indexId: string, documentId: string): Promise<void>;
}
