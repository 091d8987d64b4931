/**
 * Sync Command
 *
 * Start a run, print progress until it finishes, then print the summary.
 * Ctrl-C requests cancellation; files already processed are kept.
 */

import type { Command } from "commander";
import type { SyncService } from "@/lib/sync/service";
import { c } from "../colors";
import { formatProgress, formatSummary } from "../format";
import { parseCourseIds, sleep } from "../helpers";

const POLL_INTERVAL_MS = 1000;

export function registerSyncCommand(program: Command, getService: () => SyncService): void {
	program
		.command("sync")
		.description("Download missing or changed files and upload them to the search index")
		.option("-c, --course <ids...>", "Restrict to these course ids")
		.option("--upload-only", "Only upload files that are already mirrored")
		.option("--download-only", "Never touch the search index")
		.action(async (options: { course?: string[]; uploadOnly?: boolean; downloadOnly?: boolean }) => {
			const service = getService();
			const started = service.startSync({
				courseIds: parseCourseIds(options.course),
				skipDownload: options.uploadOnly === true,
				skipUpload: options.downloadOnly === true,
			});

			if (started.status === "already_running") {
				console.log(c.warning(`A sync is already running (${started.run_id ?? "unknown run"})`));
				process.exitCode = 1;
				return;
			}

			console.log(c.title(`Sync ${started.run_id} started`));
			const onInterrupt = () => {
				if (service.cancelSync().cancelled) console.log(c.warning("\nCancelling after running tasks finish…"));
			};
			process.on("SIGINT", onInterrupt);

			try {
				let progress = service.getSyncProgress();
				while (progress.is_running) {
					if (process.stdout.isTTY) process.stdout.write(`\r${formatProgress(progress)}`);
					await sleep(POLL_INTERVAL_MS);
					progress = service.getSyncProgress();
				}
				if (process.stdout.isTTY) process.stdout.write("\n");
			} finally {
				process.off("SIGINT", onInterrupt);
			}

			const summary = await service.getLastRun();
			if (!summary) return;
			for (const line of formatSummary(summary)) console.log(line);
			if (summary.state === "failed") process.exitCode = 1;
		});
}
