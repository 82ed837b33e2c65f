import type { LedgerCheck } from '../ledger/file-ledger.js';
import { errorCode, errorMessage } from '../utils/fs-errors.js';
import type { ToolErrorKind, ToolResult } from './types.js';

export function toolSuccess(content: string, metadata?: Record<string, unknown>): ToolResult {
	return metadata ? { content, isError: false, metadata } : { content, isError: false };
}

export function toolError(kind: ToolErrorKind, content: string, final = false): ToolResult {
	return final ? { content, isError: true, errorKind: kind, final } : { content, isError: true, errorKind: kind };
}

/** Execution error carrying the OS error text. */
export function fsError(action: string, path: string, err: unknown): ToolResult {
	const code = errorCode(err);
	if (code === 'ENOENT') {
		return toolError('execution', `File does not exist: ${path}`);
	}
	if (code === 'EACCES' || code === 'EPERM') {
		return toolError('execution', `Permission denied while trying to ${action} ${path}: ${errorMessage(err)}`);
	}
	return toolError('execution', `Failed to ${action} ${path}: ${errorMessage(err)}`);
}

/** A failed ledger check: stale or unread files are concurrency errors, unstattable paths execution errors. */
export function ledgerError(check: Extract<LedgerCheck, { ok: false }>): ToolResult {
	return toolError(check.code === 'unreadable' ? 'execution' : 'concurrency', check.reason);
}
