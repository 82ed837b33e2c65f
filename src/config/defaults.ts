import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Resolves the base directory for tollgate's data.
 * TOLLGATE_HOME wins; otherwise XDG_DATA_HOME on Linux, then ~/.tollgate.
 */
export function getTollgateHome(): string {
	const envHome = process.env.TOLLGATE_HOME;
	if (envHome) return envHome;

	const xdgData = process.env.XDG_DATA_HOME;
	if (xdgData && process.platform === 'linux') {
		return join(xdgData, 'tollgate');
	}
	return join(homedir(), '.tollgate');
}

export function getDefaultConfigPath(): string {
	return join(getTollgateHome(), 'config.yaml');
}

/**
 * Expands a leading `~` to the user's home directory.
 */
export function expandHome(value: string, home = homedir()): string {
	if (value === '~') return home;
	if (value.startsWith('~/')) {
		return join(home, value.slice(2));
	}
	return value;
}
