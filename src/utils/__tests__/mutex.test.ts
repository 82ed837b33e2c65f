import { describe, expect, it } from 'vitest';
import { createMutex } from '../mutex.js';

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('createMutex', () => {
	it('serializes overlapping critical sections in arrival order', async () => {
		const mutex = createMutex();
		const events: string[] = [];

		const task = (name: string, ms: number) =>
			mutex.runExclusive(async () => {
				events.push(`${name}:start`);
				await delay(ms);
				events.push(`${name}:end`);
				return name;
			});

		const results = await Promise.all([task('a', 20), task('b', 1), task('c', 5)]);

		expect(results).toEqual(['a', 'b', 'c']);
		expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
		expect(mutex.isLocked()).toBe(false);
	});

	it('releases the lock when the critical section throws', async () => {
		const mutex = createMutex();

		await expect(
			mutex.runExclusive(async () => {
				throw new Error('boom');
			}),
		).rejects.toThrow('boom');

		expect(mutex.isLocked()).toBe(false);
		await expect(mutex.runExclusive(async () => 'after')).resolves.toBe('after');
	});

	it('ignores a second call to the same release function', async () => {
		const mutex = createMutex();
		const unlock = await mutex.acquire();
		const waiter = mutex.acquire();
		expect(mutex.getQueueLength()).toBe(1);

		unlock();
		unlock();
		const unlockWaiter = await waiter;
		expect(mutex.isLocked()).toBe(true);
		unlockWaiter();
		expect(mutex.isLocked()).toBe(false);
	});
});
