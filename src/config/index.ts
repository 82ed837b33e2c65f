export { expandHome, getDefaultConfigPath, getTollgateHome } from './defaults.js';
export {
	ensureTollgateHome,
	getConfig,
	initConfig,
	loadConfig,
	parseConfig,
	resetConfig,
	type Result,
} from './loader.js';
export {
	ConfigSchema,
	type FilesConfig,
	type LogLevel,
	PERMISSION_MODES,
	type PermissionModeName,
	type ShellConfig,
	type TollgateConfig,
} from './schema.js';
