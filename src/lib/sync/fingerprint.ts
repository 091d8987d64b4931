// ---------------------------------------------------------------------------
// Content Fingerprints
// SHA-256 over bytes, or over a provider change token with sorted keys
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";

/** SHA-256 hex digest of raw content. */
export function hashContent(content: string | Uint8Array): string {
	const hash = createHash("sha256");
	if (typeof content === "string") {
		hash.update(content, "utf-8");
	} else {
		hash.update(content);
	}
	return hash.digest("hex");
}

/**
 * Compute a SHA-256 hash of a metadata record (the provider's change token).
 * Keys are sorted for deterministic output regardless of insertion order.
 */
export function hashChangeToken(token: Record<string, unknown>): string {
	const normalized = JSON.stringify(token, (_key, value: unknown) => {
		if (value !== null && typeof value === "object" && !Array.isArray(value)) {
			return Object.fromEntries(Object.entries(value).sort(([a], [b]) => a.localeCompare(b)));
		}
		return value;
	});

	return hashContent(normalized);
}
