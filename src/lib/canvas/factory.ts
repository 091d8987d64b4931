// ---------------------------------------------------------------------------
// Canvas Client Factory
// Creates a configured CanvasClient from environment configuration
// ---------------------------------------------------------------------------

import { type AppConfig, loadConfig } from "../config";
import { CanvasClient } from "./client";

/**
 * Create a configured CanvasClient instance.
 *
 * @returns Configured CanvasClient ready for API calls
 */
export function createCanvasClient(config: AppConfig = loadConfig()): CanvasClient {
	return new CanvasClient({
		baseUrl: config.CANVAS_API_BASE_URL,
		accessToken: config.CANVAS_ACCESS_TOKEN,
		rateLimit: config.CANVAS_RATE_LIMIT,
	});
}
