import { type ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { statSync } from 'node:fs';
import { homedir } from 'node:os';
import { basename } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';
import { createMutex } from '../utils/mutex.js';
import { redactSecrets } from '../utils/secret-redaction.js';

const logger = createLogger('shell');

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_OUTPUT_LIMIT = 30_000;
const DEFAULT_KILL_GRACE_MS = 500;
const DEFAULT_CLOSE_TIMEOUT_MS = 5_000;
const RESTART_WAIT_MS = 2_000;
const EXIT_CODE_VARIABLE = '__tollgate_ec';

export interface ShellCommandResult {
	/** stdout and stderr, interleaved as the shell wrote them */
	output: string;
	/** -1 when the command timed out or the shell died before reporting */
	exitCode: number;
	/** Working directory after the command */
	cwd: string;
	/** ISO timestamp of when the command started */
	timestamp: string;
	elapsedMs: number;
	timedOut: boolean;
	/** Set when `interrupt()` stopped the command */
	interrupted?: boolean;
}

export interface ShellSessionOptions {
	cwd?: string;
	/** Per-session environment overrides, applied after prefix stripping */
	env?: Record<string, string>;
	shell?: string;
	defaultTimeoutMs?: number;
	outputLimit?: number;
	killGraceMs?: number;
	closeTimeoutMs?: number;
	stripEnvPrefixes?: string[];
	/** Directory used when the tracked cwd no longer exists */
	fallbackCwd?: string;
	createToken?: () => string;
}

export interface ShellSession {
	run(command: string, timeoutMs?: number): Promise<ShellCommandResult>;
	restart(): Promise<void>;
	/**
	 * Stops the running command: the shell's process group gets SIGINT and
	 * the shell is replaced. Returns false when no command is running.
	 */
	interrupt(): boolean;
	close(): Promise<void>;
	getCwd(): string;
	getPid(): number | undefined;
	isAlive(): boolean;
}

interface LiveShell {
	child: ChildProcessWithoutNullStreams;
	pid: number;
	lines: string[];
	partial: string;
	ended: boolean;
	exited: boolean;
	notify: (() => void) | null;
	exitWaiters: Array<() => void>;
	onHostExit: () => void;
}

type ReadOutcome =
	| { status: 'sentinel'; exitCode: number; cwd: string | null }
	| { status: 'eof' };

export function createSentinelToken(): string {
	return `___TOLLGATE_${uuidv4().replace(/-/g, '')}___`;
}

/**
 * Host environment minus variables carrying one of the given prefixes,
 * with the overrides applied on top.
 */
export function buildShellEnv(
	base: NodeJS.ProcessEnv,
	stripPrefixes: string[],
	overrides: Record<string, string> = {},
): Record<string, string> {
	const env: Record<string, string> = {};
	for (const [key, value] of Object.entries(base)) {
		if (value === undefined) continue;
		if (stripPrefixes.some((prefix) => key.startsWith(prefix))) continue;
		env[key] = value;
	}
	return { ...env, ...overrides };
}

/**
 * Wraps a command so the shell prints the sentinel line, the exit status and
 * the working directory once the command has finished.
 */
export function wrapCommand(command: string, token: string): string {
	return [
		command,
		`${EXIT_CODE_VARIABLE}=$?`,
		`printf '\\n${token}%s %s\\n' "$${EXIT_CODE_VARIABLE}" "$(pwd)"`,
		'',
	].join('\n');
}

export function truncateOutput(output: string, limit: number): string {
	if (output.length <= limit) return output;
	const omitted = output.length - limit;
	return `${output.slice(0, limit)}\n... [output truncated: ${omitted} chars omitted]`;
}

function isDirectory(path: string): boolean {
	try {
		return statSync(path).isDirectory();
	} catch {
		return false;
	}
}

function isMissingProcess(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

/**
 * Signals the shell's whole process group so children started by the
 * command receive it too. Falls back to the pid alone.
 */
function signalProcessTree(pid: number, signal: NodeJS.Signals): void {
	try {
		process.kill(-pid, signal);
		return;
	} catch (err: unknown) {
		if (!isMissingProcess(err)) throw err;
	}
	try {
		process.kill(pid, signal);
	} catch (err: unknown) {
		if (!isMissingProcess(err)) throw err;
	}
}

function waitForExit(shell: LiveShell, timeoutMs: number): Promise<boolean> {
	if (shell.exited) return Promise.resolve(true);
	return new Promise((resolve) => {
		const timer = setTimeout(() => resolve(false), timeoutMs);
		shell.exitWaiters.push(() => {
			clearTimeout(timer);
			resolve(true);
		});
	});
}

async function nextLine(shell: LiveShell): Promise<string | null> {
	for (;;) {
		const line = shell.lines.shift();
		if (line !== undefined) return line;
		if (shell.ended) return null;
		await new Promise<void>((resolve) => {
			shell.notify = resolve;
		});
	}
}

async function readUntilSentinel(
	shell: LiveShell,
	token: string,
	collected: string[],
): Promise<ReadOutcome> {
	for (;;) {
		const line = await nextLine(shell);
		if (line === null) {
			return { status: 'eof' };
		}

		const index = line.indexOf(token);
		if (index === -1) {
			collected.push(`${line}\n`);
			continue;
		}

		collected.push(line.slice(0, index));
		const match = /^(-?\d+) (.*)$/.exec(line.slice(index + token.length).trimEnd());
		if (!match) {
			return { status: 'sentinel', exitCode: -1, cwd: null };
		}
		return {
			status: 'sentinel',
			exitCode: Number(match[1]),
			cwd: match[2] ? match[2] : null,
		};
	}
}

/**
 * Joins what was read before the sentinel and drops the newline the
 * sentinel printf injects ahead of the token.
 */
function assembleOutput(collected: string[]): string {
	const raw = collected.join('');
	return raw.endsWith('\n') ? raw.slice(0, -1) : raw;
}

/**
 * Creates a persistent shell session.
 *
 * One long-lived shell process keeps environment, working directory and
 * shell state across calls. Each command's output is delimited by a
 * per-call sentinel line that also carries the exit status and the new
 * working directory. Calls are serialized; the process is spawned lazily and
 * respawned after it is killed or exits.
 */
export function createShellSession(options: ShellSessionOptions = {}): ShellSession {
	const shellPath = options.shell ?? 'bash';
	const defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
	const outputLimit = options.outputLimit ?? DEFAULT_OUTPUT_LIMIT;
	const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
	const closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
	const fallbackCwd = options.fallbackCwd ?? homedir();
	const createToken = options.createToken ?? createSentinelToken;
	const env = buildShellEnv(process.env, options.stripEnvPrefixes ?? [], options.env);
	const mutex = createMutex();

	let cwd = options.cwd ?? process.cwd();
	let current: LiveShell | null = null;
	let stopRunning: (() => void) | null = null;

	function ensureUsableCwd(): void {
		if (!isDirectory(cwd)) {
			logger.warn('Tracked working directory is gone, falling back', { cwd, fallbackCwd });
			cwd = fallbackCwd;
		}
	}

	function discard(shell: LiveShell): void {
		process.off('exit', shell.onHostExit);
		if (current === shell) {
			current = null;
		}
	}

	async function spawnShell(): Promise<LiveShell> {
		ensureUsableCwd();
		const args = basename(shellPath) === 'bash' ? ['--norc', '--noprofile'] : [];
		const child = spawn(shellPath, args, {
			cwd,
			env,
			stdio: 'pipe',
			detached: true,
		});

		await new Promise<void>((resolve, reject) => {
			child.once('spawn', () => resolve());
			child.once('error', reject);
		});

		const pid = child.pid;
		if (pid === undefined) {
			throw new Error(`Failed to start ${shellPath}: no pid assigned`);
		}

		const shell: LiveShell = {
			child,
			pid,
			lines: [],
			partial: '',
			ended: false,
			exited: false,
			notify: null,
			exitWaiters: [],
			onHostExit: () => {
				// Last resort at host shutdown: signal the pid directly, the
				// ChildProcess handle may no longer be usable here.
				if (shell.exited) return;
				try {
					process.kill(-pid, 'SIGTERM');
				} catch (err: unknown) {
					if (!isMissingProcess(err)) {
						process.stderr.write(`failed to terminate shell ${pid}\n`);
					}
				}
			},
		};

		const wake = () => {
			const notify = shell.notify;
			shell.notify = null;
			notify?.();
		};

		const onData = (chunk: string) => {
			const parts = `${shell.partial}${chunk}`.split('\n');
			shell.partial = parts.pop() ?? '';
			shell.lines.push(...parts);
			wake();
		};

		child.stdout.setEncoding('utf-8');
		child.stderr.setEncoding('utf-8');
		child.stdout.on('data', onData);
		child.stderr.on('data', onData);
		child.stdout.on('end', () => {
			if (shell.partial) {
				shell.lines.push(shell.partial);
				shell.partial = '';
			}
			shell.ended = true;
			wake();
		});
		child.stdin.on('error', (err) => {
			logger.debug('Shell stdin closed', { pid, error: err.message });
		});
		child.on('error', (err) => {
			logger.warn('Shell process error', { pid, error: err.message });
		});
		child.on('exit', (code, signal) => {
			shell.exited = true;
			process.off('exit', shell.onHostExit);
			for (const waiter of shell.exitWaiters.splice(0)) waiter();
			logger.debug('Shell process exited', { pid, code, signal });
		});

		process.on('exit', shell.onHostExit);

		// Fold stderr into stdout so output keeps its original interleaving.
		child.stdin.write('exec 2>&1\n');

		logger.debug('Shell spawned', { pid, shell: shellPath, cwd });
		return shell;
	}

	async function ensureAlive(): Promise<LiveShell> {
		if (current && !current.exited && !current.ended) {
			return current;
		}
		if (current) {
			discard(current);
		}
		current = await spawnShell();
		return current;
	}

	function writeToShell(shell: LiveShell, data: string): Promise<void> {
		return new Promise((resolve, reject) => {
			shell.child.stdin.write(data, (err) => {
				if (err) {
					reject(err);
					return;
				}
				resolve();
			});
		});
	}

	async function stopShell(shell: LiveShell): Promise<void> {
		signalProcessTree(shell.pid, 'SIGINT');
		const exited = await waitForExit(shell, killGraceMs);
		if (!exited) {
			signalProcessTree(shell.pid, 'SIGKILL');
		}
		discard(shell);
	}

	async function run(command: string, timeoutMs = defaultTimeoutMs): Promise<ShellCommandResult> {
		return mutex.runExclusive(async () => {
			const shell = await ensureAlive();
			const token = createToken();
			const timestamp = new Date().toISOString();
			const start = Date.now();
			const collected: string[] = [];

			try {
				await writeToShell(shell, wrapCommand(command, token));
			} catch (err: unknown) {
				discard(shell);
				throw err;
			}

			let timer: NodeJS.Timeout | undefined;
			const timeout = new Promise<'timeout'>((resolve) => {
				timer = setTimeout(() => resolve('timeout'), timeoutMs);
			});
			const interrupted = new Promise<'interrupted'>((resolve) => {
				stopRunning = () => resolve('interrupted');
			});
			const outcome = await Promise.race([readUntilSentinel(shell, token, collected), timeout, interrupted]);
			clearTimeout(timer);
			stopRunning = null;

			const elapsedMs = Date.now() - start;
			const output = truncateOutput(assembleOutput(collected), outputLimit);

			if (outcome === 'timeout') {
				logger.warn('Shell command timed out', {
					command: redactSecrets(command),
					timeoutMs,
					pid: shell.pid,
				});
				await stopShell(shell);
				return { output, exitCode: -1, cwd, timestamp, elapsedMs, timedOut: true };
			}

			if (outcome === 'interrupted') {
				logger.info('Shell command interrupted', { command: redactSecrets(command), pid: shell.pid });
				await stopShell(shell);
				return { output, exitCode: -1, cwd, timestamp, elapsedMs, timedOut: false, interrupted: true };
			}

			if (outcome.status === 'eof') {
				logger.warn('Shell exited before reporting completion', {
					command: redactSecrets(command),
					pid: shell.pid,
				});
				discard(shell);
				return { output, exitCode: -1, cwd, timestamp, elapsedMs, timedOut: false };
			}

			if (outcome.cwd) {
				cwd = outcome.cwd;
			}

			logger.debug('Shell command finished', {
				exitCode: outcome.exitCode,
				elapsedMs,
				cwd,
			});

			return { output, exitCode: outcome.exitCode, cwd, timestamp, elapsedMs, timedOut: false };
		});
	}

	async function restart(): Promise<void> {
		await mutex.runExclusive(async () => {
			const shell = current;
			if (shell && !shell.exited) {
				signalProcessTree(shell.pid, 'SIGKILL');
				await waitForExit(shell, RESTART_WAIT_MS);
			}
			if (shell) {
				discard(shell);
			}
			ensureUsableCwd();
			logger.info('Shell restarted', { cwd });
		});
	}

	function interrupt(): boolean {
		if (!stopRunning) return false;
		stopRunning();
		return true;
	}

	async function close(): Promise<void> {
		const shell = current;
		if (!shell) return;

		if (!shell.exited) {
			signalProcessTree(shell.pid, 'SIGTERM');
			const exited = await waitForExit(shell, closeTimeoutMs);
			if (!exited) {
				logger.warn('Shell ignored SIGTERM, killing', { pid: shell.pid });
				signalProcessTree(shell.pid, 'SIGKILL');
			}
		}
		shell.child.stdin.destroy();
		discard(shell);
	}

	return {
		run,
		restart,
		interrupt,
		close,
		getCwd: () => cwd,
		getPid: () => current?.pid,
		isAlive: () => current !== null && !current.exited,
	};
}
