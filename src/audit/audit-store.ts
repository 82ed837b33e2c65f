import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { TOOL_ERROR_KINDS } from '../tools/types.js';
import { errorMessage } from '../utils/fs-errors.js';
import { createLogger } from '../utils/logger.js';
import {
	AUDIT_DECISIONS,
	AUDIT_RESULTS,
	type AuditEntry,
	type AuditFilters,
	type AuditStore,
	type ToolUsage,
} from './types.js';

const logger = createLogger('audit');

const MAX_STORED_OUTPUT = 1_024;
const MAX_QUERY_ROWS = 1_000;

const AuditRowSchema = z.object({
	id: z.string(),
	timestamp: z.string(),
	tool: z.string(),
	resource: z.string().nullable(),
	params: z.string().nullable(),
	decision: z.enum(AUDIT_DECISIONS),
	result: z.enum(AUDIT_RESULTS),
	error_kind: z.enum(TOOL_ERROR_KINDS).nullable(),
	output: z.string().nullable(),
	duration_ms: z.number(),
	requested_by: z.string(),
});

const UsageRowSchema = z.object({
	tool: z.string(),
	calls: z.number(),
	errors: z.number(),
	denied: z.number(),
	total_duration_ms: z.number().nullable(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseParams(raw: string | null): Record<string, unknown> | undefined {
	if (!raw) return undefined;
	const parsed: unknown = JSON.parse(raw);
	return isRecord(parsed) ? parsed : undefined;
}

function rowToEntry(row: unknown): AuditEntry {
	const parsed = AuditRowSchema.parse(row);
	return {
		id: parsed.id,
		timestamp: new Date(parsed.timestamp),
		tool: parsed.tool,
		resource: parsed.resource ?? '',
		params: parseParams(parsed.params),
		decision: parsed.decision,
		result: parsed.result,
		errorKind: parsed.error_kind ?? undefined,
		output: parsed.output ?? undefined,
		durationMs: parsed.duration_ms,
		requestedBy: parsed.requested_by,
	};
}

export function createInMemoryAuditStore(): AuditStore {
	const entries: Array<{ seq: number; entry: AuditEntry }> = [];
	let seq = 0;

	function toStoredEntry(entry: AuditEntry): AuditEntry {
		return {
			...entry,
			output: entry.output?.slice(0, MAX_STORED_OUTPUT),
			params: entry.params ? parseParams(JSON.stringify(entry.params)) : undefined,
		};
	}

	function newestFirst(items: Array<{ seq: number; entry: AuditEntry }>): AuditEntry[] {
		return [...items]
			.sort((a, b) => b.entry.timestamp.getTime() - a.entry.timestamp.getTime() || b.seq - a.seq)
			.map((item) => item.entry);
	}

	return {
		log(entry) {
			entries.push({ seq: seq++, entry: toStoredEntry(entry) });
		},
		query(filters) {
			const filtered = entries.filter(({ entry }) => {
				if (filters.tool && entry.tool !== filters.tool) return false;
				if (filters.result && entry.result !== filters.result) return false;
				if (filters.decision && entry.decision !== filters.decision) return false;
				if (filters.requestedBy && entry.requestedBy !== filters.requestedBy) return false;
				if (filters.since && entry.timestamp < filters.since) return false;
				if (filters.until && entry.timestamp > filters.until) return false;
				return true;
			});
			return newestFirst(filtered).slice(0, MAX_QUERY_ROWS);
		},
		getRecent(limit) {
			return newestFirst(entries).slice(0, limit);
		},
		summarize() {
			const byTool = new Map<string, ToolUsage>();
			for (const { entry } of entries) {
				const usage = byTool.get(entry.tool) ?? {
					tool: entry.tool,
					calls: 0,
					errors: 0,
					denied: 0,
					totalDurationMs: 0,
				};
				usage.calls += 1;
				if (entry.result === 'error') usage.errors += 1;
				if (entry.result === 'denied') usage.denied += 1;
				usage.totalDurationMs += entry.durationMs;
				byTool.set(entry.tool, usage);
			}
			return [...byTool.values()].sort((a, b) => a.tool.localeCompare(b.tool));
		},
		close() {
			entries.length = 0;
		},
	};
}

/**
 * Creates an append-only audit log of tool calls backed by SQLite, in WAL
 * mode. Falls back to an in-memory log when the database cannot be opened.
 */
export function createAuditStore(dbPath: string): AuditStore {
	let db: InstanceType<typeof Database>;
	try {
		if (dbPath !== ':memory:') {
			mkdirSync(dirname(dbPath), { recursive: true });
		}
		db = new Database(dbPath);
	} catch (err: unknown) {
		logger.warn('SQLite audit store unavailable, using in-memory fallback', { reason: errorMessage(err) });
		return createInMemoryAuditStore();
	}

	db.pragma('journal_mode = WAL');

	db.exec(`
		CREATE TABLE IF NOT EXISTS tool_calls (
			id TEXT PRIMARY KEY,
			timestamp TEXT NOT NULL,
			tool TEXT NOT NULL,
			resource TEXT,
			params TEXT,
			decision TEXT NOT NULL,
			result TEXT NOT NULL,
			error_kind TEXT,
			output TEXT,
			duration_ms INTEGER NOT NULL,
			requested_by TEXT NOT NULL
		)
	`);

	db.exec(`
		CREATE INDEX IF NOT EXISTS idx_tool_calls_timestamp ON tool_calls(timestamp);
		CREATE INDEX IF NOT EXISTS idx_tool_calls_tool ON tool_calls(tool);
		CREATE INDEX IF NOT EXISTS idx_tool_calls_result ON tool_calls(result);
	`);

	const insertStmt = db.prepare(`
		INSERT INTO tool_calls (id, timestamp, tool, resource, params, decision, result, error_kind, output, duration_ms, requested_by)
		VALUES (@id, @timestamp, @tool, @resource, @params, @decision, @result, @errorKind, @output, @durationMs, @requestedBy)
	`);

	const queryStmt = db.prepare(`
		SELECT * FROM tool_calls
		WHERE (@tool IS NULL OR tool = @tool)
		AND (@result IS NULL OR result = @result)
		AND (@decision IS NULL OR decision = @decision)
		AND (@since IS NULL OR timestamp >= @since)
		AND (@until IS NULL OR timestamp <= @until)
		AND (@requestedBy IS NULL OR requested_by = @requestedBy)
		ORDER BY timestamp DESC, rowid DESC
		LIMIT ${MAX_QUERY_ROWS}
	`);

	const recentStmt = db.prepare('SELECT * FROM tool_calls ORDER BY timestamp DESC, rowid DESC LIMIT ?');

	const summaryStmt = db.prepare(`
		SELECT tool,
			COUNT(*) AS calls,
			SUM(CASE WHEN result = 'error' THEN 1 ELSE 0 END) AS errors,
			SUM(CASE WHEN result = 'denied' THEN 1 ELSE 0 END) AS denied,
			SUM(duration_ms) AS total_duration_ms
		FROM tool_calls
		GROUP BY tool
		ORDER BY tool
	`);

	function log(entry: AuditEntry): void {
		insertStmt.run({
			id: entry.id,
			timestamp: entry.timestamp.toISOString(),
			tool: entry.tool,
			resource: entry.resource,
			params: entry.params ? JSON.stringify(entry.params) : null,
			decision: entry.decision,
			result: entry.result,
			errorKind: entry.errorKind ?? null,
			output: entry.output?.slice(0, MAX_STORED_OUTPUT) ?? null,
			durationMs: Math.round(entry.durationMs),
			requestedBy: entry.requestedBy,
		});

		logger.debug('Audit entry logged', {
			id: entry.id,
			tool: entry.tool,
			decision: entry.decision,
			result: entry.result,
		});
	}

	function query(filters: AuditFilters): AuditEntry[] {
		const rows = queryStmt.all({
			tool: filters.tool ?? null,
			result: filters.result ?? null,
			decision: filters.decision ?? null,
			since: filters.since?.toISOString() ?? null,
			until: filters.until?.toISOString() ?? null,
			requestedBy: filters.requestedBy ?? null,
		});
		return rows.map(rowToEntry);
	}

	function getRecent(limit: number): AuditEntry[] {
		return recentStmt.all(limit).map(rowToEntry);
	}

	function summarize(): ToolUsage[] {
		return summaryStmt.all().map((row) => {
			const parsed = UsageRowSchema.parse(row);
			return {
				tool: parsed.tool,
				calls: parsed.calls,
				errors: parsed.errors,
				denied: parsed.denied,
				totalDurationMs: parsed.total_duration_ms ?? 0,
			};
		});
	}

	return {
		log,
		query,
		getRecent,
		summarize,
		close: () => db.close(),
	};
}
