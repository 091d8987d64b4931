// ---------------------------------------------------------------------------
// Worker Pool
// Bounded-concurrency task runner. Each worker owns one task at a time.
// ---------------------------------------------------------------------------

/**
 * Run `worker` over `items` with at most `concurrency` tasks in flight.
 * Once `signal` aborts, no new task starts; tasks already running finish.
 * Workers are expected to handle their own errors; a rejection stops the
 * pool from starting new tasks and is rethrown after in-flight tasks settle.
 */
export async function runPool<T>(
	items: readonly T[],
	concurrency: number,
	worker: (item: T, index: number) => Promise<void>,
	signal?: AbortSignal,
): Promise<void> {
	let next = 0;
	const failures: unknown[] = [];

	const lane = async (): Promise<void> => {
		while (next < items.length && !signal?.aborted && failures.length === 0) {
			const index = next++;
			try {
				await worker(items[index], index);
			} catch (error) {
				failures.push(error);
			}
		}
	};

	const lanes = Math.max(1, Math.min(concurrency, items.length));
	await Promise.all(Array.from({ length: lanes }, lane));

	if (failures.length > 0) throw failures[0];
}
