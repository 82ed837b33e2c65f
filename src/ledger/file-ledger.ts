import { realpathSync, statSync } from 'node:fs';
import { resolve as resolvePath } from 'node:path';
import { errorMessage, isMissingPathError } from '../utils/fs-errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ledger');

export interface FileAccessRecord {
	/** Modification time observed when the file was last read or written */
	mtimeMs: number;
	/** True when only a window of the file was read */
	partial: boolean;
}

/** `unreadable`: the path exists but cannot be resolved or stat'ed */
export type LedgerFailureCode = 'not-read' | 'stale' | 'unreadable';

export type LedgerCheck =
	| { ok: true }
	| { ok: false; code: LedgerFailureCode; reason: string };

export interface FileAccessLedger {
	recordRead(path: string, partial: boolean): void;
	recordWrite(path: string): void;
	check(path: string): LedgerCheck;
	get(path: string): FileAccessRecord | undefined;
	size(): number;
}

type FileState =
	| { kind: 'present'; realPath: string; mtimeMs: number }
	| { kind: 'missing' }
	| { kind: 'unreadable'; reason: string };

// Symlinks resolve to their target, so a file has one record whichever
// path reached it.
function inspect(path: string): FileState {
	try {
		const realPath = realpathSync(path);
		return { kind: 'present', realPath, mtimeMs: statSync(realPath).mtimeMs };
	} catch (err: unknown) {
		if (isMissingPathError(err)) {
			return { kind: 'missing' };
		}
		return { kind: 'unreadable', reason: errorMessage(err) };
	}
}

/**
 * Creates the per-session ledger of last-known file states.
 *
 * Mutating an existing file is only valid after it was read in this session
 * and while nothing has touched it since. Paths that do not exist yet always
 * pass. Records are keyed by real path, with relative paths resolved
 * against `baseDir`.
 */
export function createFileAccessLedger(baseDir?: () => string): FileAccessLedger {
	const records = new Map<string, FileAccessRecord>();

	function absolutePath(path: string): string {
		return baseDir ? resolvePath(baseDir(), path) : resolvePath(path);
	}

	function store(path: string, partial: boolean): void {
		const absolute = absolutePath(path);
		const state = inspect(absolute);
		if (state.kind !== 'present') {
			logger.debug('Not recording file', { path: absolute, state: state.kind });
			return;
		}
		records.set(state.realPath, { mtimeMs: state.mtimeMs, partial });
	}

	function check(path: string): LedgerCheck {
		const absolute = absolutePath(path);
		const state = inspect(absolute);
		if (state.kind === 'missing') {
			return { ok: true };
		}
		if (state.kind === 'unreadable') {
			return { ok: false, code: 'unreadable', reason: `Cannot check ${absolute}: ${state.reason}` };
		}

		const record = records.get(state.realPath);
		if (!record) {
			return {
				ok: false,
				code: 'not-read',
				reason: `File has not been read yet: ${absolute}. Read it first before writing to it.`,
			};
		}

		if (state.mtimeMs > record.mtimeMs) {
			return {
				ok: false,
				code: 'stale',
				reason: `File has been modified since it was last read: ${absolute}. Read it again before writing to it.`,
			};
		}

		return { ok: true };
	}

	function get(path: string): FileAccessRecord | undefined {
		const state = inspect(absolutePath(path));
		return state.kind === 'present' ? records.get(state.realPath) : undefined;
	}

	return {
		recordRead: (path, partial) => store(path, partial),
		recordWrite: (path) => store(path, false),
		check,
		get,
		size: () => records.size,
	};
}
