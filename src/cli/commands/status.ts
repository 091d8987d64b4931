/**
 * Status Command
 *
 * Reconcile Canvas, the local mirror and the search index and print the result.
 */

import type { Command } from "commander";
import type { SyncService } from "@/lib/sync/service";
import { formatStatus } from "../format";
import { parseCourseIds } from "../helpers";

export function registerStatusCommand(program: Command, getService: () => SyncService): void {
	program
		.command("status")
		.description("Show what is missing locally or in the search index")
		.option("-c, --course <ids...>", "Restrict to these course ids")
		.option("--json", "Print the raw status object")
		.action(async (options: { course?: string[]; json?: boolean }) => {
			const status = await getService().getStatus({
				refresh: true,
				courseIds: parseCourseIds(options.course),
			});
			if (options.json) {
				console.log(JSON.stringify(status, null, 2));
				return;
			}
			for (const line of formatStatus(status)) console.log(line);
		});
}
