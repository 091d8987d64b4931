/**
 * Maintenance Commands
 *
 * Operator actions that are never part of a regular sync run.
 */

import type { Command } from "commander";
import type { SyncService } from "@/lib/sync/service";
import { c } from "../colors";
import { parseCourseId } from "../helpers";

export function registerMaintenanceCommands(program: Command, getService: () => SyncService): void {
	program
		.command("reset-inaccessible")
		.description("Forget permission failures so the files are retried on the next sync")
		.option("-c, --course <id>", "Only this course")
		.action(async (options: { course?: string }) => {
			const { cleared } = await getService().resetInaccessible(parseCourseId(options.course));
			console.log(c.success(`Cleared ${cleared} inaccessible record(s)`));
		});

	program
		.command("prune")
		.description("Remove index documents whose file no longer exists in Canvas")
		.option("-c, --course <id>", "Only this course")
		.action(async (options: { course?: string }) => {
			const { pruned, failed } = await getService().pruneExtra(parseCourseId(options.course));
			console.log(c.success(`Pruned ${pruned} document(s)`));
			if (failed > 0) {
				console.log(c.warning(`${failed} document(s) could not be removed`));
				process.exitCode = 1;
			}
		});

	program
		.command("recover-index")
		.description("Rebuild the local index manifest from the documents in the search index")
		.option("-c, --course <id>", "Only this course")
		.action(async (options: { course?: string }) => {
			const { recovered } = await getService().recoverIndexManifest(parseCourseId(options.course));
			console.log(c.success(`Recovered ${recovered} manifest entr${recovered === 1 ? "y" : "ies"}`));
		});
}
