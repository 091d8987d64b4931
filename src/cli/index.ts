#!/usr/bin/env node

/**
 * Course Index Sync CLI
 *
 * Commands:
 * - status: reconcile Canvas, the local mirror and the search index
 * - sync: download and upload whatever is missing or changed
 * - reset-inaccessible, prune, recover-index: operator actions
 */

import "./env";
import { Command } from "commander";
import { flushRollbar } from "@/lib/monitoring/rollbar-official";
import { getSyncService } from "@/lib/sync/factory";
import { c } from "./colors";
import { registerMaintenanceCommands } from "./commands/maintenance";
import { registerStatusCommand } from "./commands/status";
import { registerSyncCommand } from "./commands/sync";

const program = new Command();

program
	.name("course-index-sync")
	.description("Mirror Canvas course files locally and keep per-course search indexes in sync")
	.version("0.1.0");

registerStatusCommand(program, getSyncService);
registerSyncCommand(program, getSyncService);
registerMaintenanceCommands(program, getSyncService);

try {
	await program.parseAsync(process.argv);
} catch (err) {
	console.error(c.error("Error"), err instanceof Error ? err.message : String(err));
	process.exitCode = 1;
} finally {
	await flushRollbar();
}
