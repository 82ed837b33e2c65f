import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogLevel } from '../config/schema.js';
import { redactSecretsInRecord } from './secret-redaction.js';

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

interface LogEntry {
	timestamp: string;
	level: LogLevel;
	module: string;
	message: string;
	[key: string]: unknown;
}

export interface LoggerOptions {
	level: LogLevel;
	filePath?: string;
	silent?: boolean;
}

export interface Logger {
	debug: (message: string, context?: Record<string, unknown>) => void;
	info: (message: string, context?: Record<string, unknown>) => void;
	warn: (message: string, context?: Record<string, unknown>) => void;
	error: (message: string, context?: Record<string, unknown>) => void;
	/** Logger for the same module with extra fields attached to every entry. */
	child: (bindings: Record<string, unknown>) => Logger;
}

let _globalOptions: LoggerOptions = { level: 'info', silent: process.env.VITEST === 'true' };

/**
 * Initializes global logger settings. Call once at startup.
 */
export function initLogger(options: LoggerOptions): void {
	_globalOptions = options;
	if (options.filePath) {
		mkdirSync(dirname(options.filePath), { recursive: true });
	}
}

function shouldLog(level: LogLevel): boolean {
	return LOG_LEVELS[level] >= LOG_LEVELS[_globalOptions.level];
}

function formatForStderr(entry: LogEntry): string {
	const { timestamp, level, module, message, ...rest } = entry;
	const time = timestamp.split('T')[1]?.replace('Z', '') ?? timestamp;
	const prefix = `${time} [${level.toUpperCase().padEnd(5)}] [${module}]`;
	const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
	return `${prefix} ${message}${extra}`;
}

function writeLog(entry: LogEntry): void {
	const safeEntry: LogEntry = { ...entry, ...redactSecretsInRecord(entry) };

	if (_globalOptions.filePath) {
		try {
			appendFileSync(_globalOptions.filePath, `${JSON.stringify(safeEntry)}\n`);
		} catch (err: unknown) {
			// The log file is best effort; fall back to stderr for this entry.
			const reason = err instanceof Error ? err.message : String(err);
			process.stderr.write(`log file write failed: ${reason}\n`);
		}
	}

	if (!_globalOptions.silent) {
		process.stderr.write(`${formatForStderr(safeEntry)}\n`);
	}
}

/**
 * Creates a scoped logger for a specific module.
 */
export function createLogger(moduleName: string, bindings: Record<string, unknown> = {}): Logger {
	function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (!shouldLog(level)) return;

		writeLog({
			timestamp: new Date().toISOString(),
			level,
			module: moduleName,
			message,
			...bindings,
			...context,
		});
	}

	return {
		debug: (message, context) => log('debug', message, context),
		info: (message, context) => log('info', message, context),
		warn: (message, context) => log('warn', message, context),
		error: (message, context) => log('error', message, context),
		child: (extra) => createLogger(moduleName, { ...bindings, ...extra }),
	};
}

/**
 * Resets logger to defaults (for testing).
 */
export function resetLogger(): void {
	_globalOptions = { level: 'info', silent: process.env.VITEST === 'true' };
}
