// ---------------------------------------------------------------------------
// Promise-based mutexes for critical sections
// ---------------------------------------------------------------------------

/** Simple Promise-based mutex; waiters are served in FIFO order. */
export class SimpleMutex {
	private locked = false;
	private queue: Array<() => void> = [];

	async acquire(): Promise<void> {
		return new Promise((resolve) => {
			if (!this.locked) {
				this.locked = true;
				resolve();
			} else {
				this.queue.push(() => {
					this.locked = true;
					resolve();
				});
			}
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}

	get isLocked(): boolean {
		return this.locked;
	}

	get pending(): number {
		return this.queue.length;
	}

	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}

/**
 * One mutex per key. Work on distinct keys runs independently; work on the
 * same key is serialized. Idle mutexes are dropped.
 */
export class KeyedMutex {
	private readonly locks = new Map<string, SimpleMutex>();

	async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
		let mutex = this.locks.get(key);
		if (!mutex) {
			mutex = new SimpleMutex();
			this.locks.set(key, mutex);
		}
		try {
			return await mutex.runExclusive(fn);
		} finally {
			if (!mutex.isLocked && mutex.pending === 0) {
				this.locks.delete(key);
			}
		}
	}
}
