import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { getDefaultConfigPath, getTollgateHome } from './defaults.js';
import { ConfigSchema, type TollgateConfig } from './schema.js';

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Resolves ${ENV_VAR} references in string values. Unset variables become ''.
 */
function resolveEnvVars(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			return process.env[varName] ?? '';
		});
	}
	if (Array.isArray(value)) {
		return value.map(resolveEnvVars);
	}
	if (isPlainObject(value)) {
		const result: Record<string, unknown> = {};
		for (const [key, val] of Object.entries(value)) {
			result[key] = resolveEnvVars(val);
		}
		return result;
	}
	return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function snakeToCamel(str: string): string {
	return str.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function convertKeysToCamelCase(obj: unknown): unknown {
	if (Array.isArray(obj)) {
		return obj.map(convertKeysToCamelCase);
	}
	if (isPlainObject(obj)) {
		const result: Record<string, unknown> = {};
		for (const [key, val] of Object.entries(obj)) {
			result[snakeToCamel(key)] = convertKeysToCamelCase(val);
		}
		return result;
	}
	return obj;
}

/**
 * Validates an already-parsed config object (snake_case or camelCase keys).
 */
export function parseConfig(raw: unknown): Result<TollgateConfig> {
	const camelConfig = convertKeysToCamelCase(isPlainObject(raw) ? raw : {});
	const result = ConfigSchema.safeParse(resolveEnvVars(camelConfig));

	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `  - ${issue.path.join('.')}: ${issue.message}`,
		);
		return {
			ok: false,
			error: new Error(`Invalid configuration:\n${issues.join('\n')}`),
		};
	}

	return { ok: true, value: result.data };
}

/**
 * Loads and validates the configuration at the given path. A missing file
 * yields the defaults.
 */
export function loadConfig(configPath?: string): Result<TollgateConfig> {
	const path = configPath ?? getDefaultConfigPath();

	let rawConfig: unknown = {};
	if (existsSync(path)) {
		try {
			rawConfig = parseYaml(readFileSync(path, 'utf-8'));
		} catch (err) {
			return {
				ok: false,
				error: new Error(
					`Failed to parse config at ${path}: ${err instanceof Error ? err.message : String(err)}`,
				),
			};
		}
	}

	return parseConfig(rawConfig);
}

export function ensureTollgateHome(): string {
	const home = getTollgateHome();
	mkdirSync(join(home, 'logs'), { recursive: true });
	return home;
}

let _config: TollgateConfig | null = null;

export function initConfig(configPath?: string): Result<TollgateConfig> {
	const result = loadConfig(configPath);
	if (result.ok) {
		_config = result.value;
	}
	return result;
}

export function getConfig(): TollgateConfig {
	if (_config === null) {
		throw new Error('Config not initialized. Call initConfig() first.');
	}
	return _config;
}

/**
 * Resets config (for testing).
 */
export function resetConfig(): void {
	_config = null;
}
