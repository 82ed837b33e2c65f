import { resolve } from 'node:path';
import { expandHome } from '../config/defaults.js';
import { ensureTollgateHome, getConfig, initConfig } from '../config/loader.js';
import type { TollgateConfig } from '../config/schema.js';
import { isPermissionMode, type PermissionMode } from '../permissions/modes.js';
import { type AgentSession, createAgentSession } from '../session/agent-session.js';
import { initLogger } from '../utils/logger.js';

export interface CommonOptions {
	config?: string;
	mode?: string;
	cwd?: string;
	verbose?: boolean;
}

export function parseModeOption(value: string | undefined): PermissionMode | undefined {
	if (value === undefined) return undefined;
	if (!isPermissionMode(value)) {
		throw new Error(`Unknown permission mode "${value}". Use safe, default or yolo.`);
	}
	return value;
}

export function initCliConfig(options: CommonOptions): TollgateConfig {
	const configResult = initConfig(options.config);
	if (!configResult.ok) {
		throw configResult.error;
	}
	const config = getConfig();
	ensureTollgateHome();
	initLogger({
		level: options.verbose ? 'debug' : config.logging.level,
		filePath: expandHome(config.logging.file),
		silent: !options.verbose,
	});
	return config;
}

export function openCliSession(options: CommonOptions): AgentSession {
	const mode = parseModeOption(options.mode);
	const config = initCliConfig(options);
	return createAgentSession({
		config,
		mode,
		cwd: options.cwd ? resolve(options.cwd) : undefined,
	});
}
