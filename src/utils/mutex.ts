/**
 * Promise-based mutual exclusion for a single event loop.
 *
 * Waiters are served in arrival order; the lock is handed directly to the
 * next waiter on release so no newcomer can slip in between.
 */
export interface Mutex {
	acquire(): Promise<() => void>;
	runExclusive<T>(fn: () => Promise<T>): Promise<T>;
	isLocked(): boolean;
	getQueueLength(): number;
}

export function createMutex(): Mutex {
	let locked = false;
	const queue: Array<() => void> = [];

	function release(): void {
		const next = queue.shift();
		if (next) {
			next();
			return;
		}
		locked = false;
	}

	function acquire(): Promise<() => void> {
		let released = false;
		const releaseOnce = () => {
			if (released) return;
			released = true;
			release();
		};

		if (!locked) {
			locked = true;
			return Promise.resolve(releaseOnce);
		}

		return new Promise((resolve) => {
			queue.push(() => resolve(releaseOnce));
		});
	}

	async function runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		const unlock = await acquire();
		try {
			return await fn();
		} finally {
			unlock();
		}
	}

	return {
		acquire,
		runExclusive,
		isLocked: () => locked,
		getQueueLength: () => queue.length,
	};
}
