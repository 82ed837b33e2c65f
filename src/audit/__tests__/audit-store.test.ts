import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createAuditStore, createInMemoryAuditStore } from '../audit-store.js';
import type { AuditEntry, AuditStore } from '../types.js';

let counter = 0;

function makeEntry(overrides: Partial<AuditEntry> = {}): AuditEntry {
	counter += 1;
	return {
		id: `entry-${counter}`,
		timestamp: new Date('2026-03-01T10:00:00.000Z'),
		tool: 'Read',
		resource: '/tmp/notes.txt',
		decision: 'auto',
		result: 'success',
		durationMs: 5,
		requestedBy: 'agent',
		...overrides,
	};
}

describe.each([
	['sqlite', () => createAuditStore(':memory:')],
	['in-memory', () => createInMemoryAuditStore()],
])('%s audit store', (_name, create: () => AuditStore) => {
	let store: AuditStore;

	beforeEach(() => {
		store = create();
	});

	afterEach(() => {
		store.close();
	});

	it('stores and returns entries', () => {
		store.log(
			makeEntry({
				id: 'a',
				params: { file_path: 'notes.txt', offset: 2 },
				errorKind: 'concurrency',
				result: 'error',
			}),
		);

		const [entry] = store.getRecent(1);
		expect(entry).toEqual({
			id: 'a',
			timestamp: new Date('2026-03-01T10:00:00.000Z'),
			tool: 'Read',
			resource: '/tmp/notes.txt',
			params: { file_path: 'notes.txt', offset: 2 },
			decision: 'auto',
			result: 'error',
			errorKind: 'concurrency',
			output: undefined,
			durationMs: 5,
			requestedBy: 'agent',
		});
	});

	it('returns the newest entries first', () => {
		store.log(makeEntry({ id: 'old', timestamp: new Date('2026-03-01T09:00:00.000Z') }));
		store.log(makeEntry({ id: 'new', timestamp: new Date('2026-03-01T11:00:00.000Z') }));
		store.log(makeEntry({ id: 'same-time-later', timestamp: new Date('2026-03-01T11:00:00.000Z') }));

		expect(store.getRecent(3).map((entry) => entry.id)).toEqual(['same-time-later', 'new', 'old']);
		expect(store.getRecent(1).map((entry) => entry.id)).toEqual(['same-time-later']);
	});

	it('filters by tool, result and time', () => {
		store.log(makeEntry({ id: 'read', tool: 'Read' }));
		store.log(makeEntry({ id: 'bash-denied', tool: 'Bash', result: 'denied', decision: 'blocked' }));
		store.log(
			makeEntry({ id: 'bash-late', tool: 'Bash', timestamp: new Date('2026-03-02T00:00:00.000Z') }),
		);

		expect(store.query({ tool: 'Bash' }).map((entry) => entry.id)).toEqual(['bash-late', 'bash-denied']);
		expect(store.query({ result: 'denied' }).map((entry) => entry.id)).toEqual(['bash-denied']);
		expect(store.query({ decision: 'blocked' }).map((entry) => entry.id)).toEqual(['bash-denied']);
		expect(
			store.query({ since: new Date('2026-03-01T12:00:00.000Z') }).map((entry) => entry.id),
		).toEqual(['bash-late']);
	});

	it('caps stored output at 1 KiB', () => {
		store.log(makeEntry({ output: 'x'.repeat(5_000) }));

		expect(store.getRecent(1)[0]?.output).toHaveLength(1_024);
	});

	it('summarizes calls per tool', () => {
		store.log(makeEntry({ tool: 'Read', durationMs: 4 }));
		store.log(makeEntry({ tool: 'Bash', durationMs: 100, result: 'error' }));
		store.log(makeEntry({ tool: 'Bash', durationMs: 20, result: 'denied' }));
		store.log(makeEntry({ tool: 'Bash', durationMs: 30 }));

		expect(store.summarize()).toEqual([
			{ tool: 'Bash', calls: 3, errors: 1, denied: 1, totalDurationMs: 150 },
			{ tool: 'Read', calls: 1, errors: 0, denied: 0, totalDurationMs: 4 },
		]);
	});
});

describe('createAuditStore on disk', () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'tollgate-audit-'));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it('creates missing parent directories and keeps entries across reopen', () => {
		const dbPath = join(dir, 'nested', 'audit.db');
		const first = createAuditStore(dbPath);
		first.log(makeEntry({ id: 'persisted' }));
		first.close();

		const second = createAuditStore(dbPath);
		expect(second.getRecent(5).map((entry) => entry.id)).toEqual(['persisted']);
		second.close();
	});
});
