// ---------------------------------------------------------------------------
// Retry Policy
// Transient failures back off and retry (p-retry); everything else aborts on
// the first attempt and surfaces the original error.
// ---------------------------------------------------------------------------

import pRetry, { AbortError } from "p-retry";
import { CanvasApiError } from "@/lib/canvas/client";
import { classifyError } from "./errors";

/** Upper bound for a server-provided Retry-After delay. */
const MAX_RETRY_AFTER_MS = 60_000;

export interface RetryOptions {
	/** Total attempts including the first (default: 3) */
	maxAttempts?: number;
	/** Base backoff in ms (default: 1000) */
	minTimeoutMs?: number;
	onFailedAttempt?: (error: Error, attemptNumber: number, retriesLeft: number) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
	const minTimeout = options.minTimeoutMs ?? 1000;

	return pRetry(
		async () => {
			try {
				return await fn();
			} catch (err) {
				if (err instanceof Error && classifyError(err) !== "transient") {
					throw new AbortError(err);
				}
				throw err;
			}
		},
		{
			retries: maxAttempts - 1,
			minTimeout,
			maxTimeout: Math.max(minTimeout, 30_000),
			factor: 2,
			randomize: minTimeout > 0,
			onFailedAttempt: async (error) => {
				options.onFailedAttempt?.(error, error.attemptNumber, error.retriesLeft);
				if (error.retriesLeft > 0 && error instanceof CanvasApiError && error.retryAfterMs) {
					await delay(Math.min(error.retryAfterMs, MAX_RETRY_AFTER_MS));
				}
			},
		},
	);
}

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
