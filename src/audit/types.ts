import type { ToolErrorKind } from '../tools/types.js';

export const AUDIT_DECISIONS = [
	'auto',
	'user-approved',
	'blocked',
	'user-denied',
	'cancelled',
	'busy',
	'unavailable',
	'not-evaluated',
] as const;

export const AUDIT_RESULTS = ['success', 'denied', 'error'] as const;

/** How the permission gate decided; `not-evaluated` when the call failed before reaching it */
export type AuditDecision = (typeof AUDIT_DECISIONS)[number];
export type AuditResult = (typeof AUDIT_RESULTS)[number];

/** One mediated tool call */
export interface AuditEntry {
	id: string;
	timestamp: Date;
	tool: string;
	resource: string;
	params?: Record<string, unknown>;
	decision: AuditDecision;
	result: AuditResult;
	errorKind?: ToolErrorKind;
	output?: string;
	durationMs: number;
	requestedBy: string;
}

export interface AuditFilters {
	tool?: string;
	result?: AuditResult;
	decision?: AuditDecision;
	since?: Date;
	until?: Date;
	requestedBy?: string;
}

export interface ToolUsage {
	tool: string;
	calls: number;
	errors: number;
	denied: number;
	totalDurationMs: number;
}

export interface AuditStore {
	log(entry: AuditEntry): void;
	query(filters: AuditFilters): AuditEntry[];
	getRecent(limit: number): AuditEntry[];
	/** Per-tool totals, sorted by tool name */
	summarize(): ToolUsage[];
	close(): void;
}
