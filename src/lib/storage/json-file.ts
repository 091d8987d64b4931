// ---------------------------------------------------------------------------
// Durable JSON documents
// Schema-validated reads, atomic writes (tmp + rename)
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { z } from "zod";

/**
 * Read a JSON document from disk and validate it.
 * Returns `fallback()` if the file doesn't exist; throws if it exists but
 * does not validate.
 */
export async function readJsonFile<T>(
	filePath: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	fallback: () => T,
): Promise<T> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf-8");
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") return fallback();
		throw err;
	}

	const result = schema.safeParse(JSON.parse(content));
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
		throw new Error(`Corrupt state file ${filePath}: ${issues}`);
	}
	return result.data;
}

/**
 * Write a JSON document atomically (tmp + rename), so a crash mid-write
 * leaves either the old or the new document, never a truncated one.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });

	const tmpPath = `${filePath}.${uuidv4()}.tmp`;
	await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf-8");
	await fs.rename(tmpPath, filePath);
}
