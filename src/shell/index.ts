export {
	buildShellEnv,
	createSentinelToken,
	createShellSession,
	type ShellCommandResult,
	type ShellSession,
	type ShellSessionOptions,
	truncateOutput,
	wrapCommand,
} from './session.js';
