// ---------------------------------------------------------------------------
// Search Index Client Factory
// Creates the OpenAI-backed index client, or null when no key is configured
// ---------------------------------------------------------------------------

import OpenAI from "openai";
import { type AppConfig, loadConfig } from "../config";
import { OpenAiIndexClient } from "./openai-client";

/**
 * Create a configured index client.
 *
 * @returns Client ready for API calls, or null when `OPENAI_API_KEY` is unset
 */
export function createIndexClient(config: AppConfig = loadConfig()): OpenAiIndexClient | null {
	if (!config.OPENAI_API_KEY) return null;

	return new OpenAiIndexClient({
		// Retries are applied by the sync retry policy
		client: new OpenAI({ apiKey: config.OPENAI_API_KEY, maxRetries: 0 }),
		rateLimit: config.INDEX_RATE_LIMIT,
	});
}
